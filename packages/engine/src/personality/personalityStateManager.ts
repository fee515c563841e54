import { NumericInstabilityError, OutOfOrderActionError, PersonalityValidationError } from '../errors';
import { createLogger, type Logger } from '../observability/logger';
import { categoryForAction, emotionForAction, isActionType, isNegativePattern, patternForAction } from './actionCatalog';
import { EmotionalMemorySystem, temporalWeightForAge } from './emotionalMemory';
import { resolveResentmentBand, resolveTrustBand, selectModifierPreset } from './modifierPresets';
import { MS_PER_DAY, clamp, isFiniteNumber, round2, systemClock, toEpochMs, toStoredScore } from './numeric';
import { PatternTracker } from './patternTracker';
import { APOLOGY_TYPE_MULTIPLIERS, TrustDynamicsEngine } from './trustDynamics';
import { DEFAULT_TUNABLES, type RelationshipTunables } from './tunables';
import type {
  ActionType,
  ApologyType,
  Clock,
  DominantEmotion,
  EmotionType,
  PersonalityState,
  PlayerAction,
  ResponseModifiers,
} from './types';

const STRESS_ACKNOWLEDGED_GAIN = 3.0;
const STRESS_DISMISSED_PENALTY = 1.0;
const PARENTING_UNITY_RATE = 5.0;
const CONFLICT_ENGAGEMENT_RELIEF = -1.0;
const CONFLICT_AVOIDANCE_RELIEF = -0.25;
const INITIATION_STREAK_THRESHOLD = 3;
const INITIATION_STREAK_BONUS = 0.15;
const CONTROL_COOPERATION_MAX_PENALTY = 0.6;
const CONSISTENCY_WINDOW_DAYS = 7;
const DOMINANT_EMOTION_WINDOW_DAYS = 7;
const DOMINANT_EMOTION_LIMIT = 3;

const unityActions: ReadonlySet<ActionType> = new Set<ActionType>([
  'public_support',
  'public_contradiction',
  'parenting_present',
  'parenting_absent',
]);

const apologyTypes: ReadonlyArray<ApologyType> = ['defensive', 'generic', 'genuine', 'action_oriented'];

const isApologyType = (value: unknown): value is ApologyType => {
  return typeof value === 'string' && apologyTypes.some((entry) => entry === value);
};

export interface ManagerEngineState {
  emotionalSafety: number;
  parentingUnity: number;
  consecutiveInitiationAccepts: number;
  lastProcessedIso: string | null;
}

export interface PersonalityStateManagerOptions {
  patternTracker?: PatternTracker;
  emotionalMemory?: EmotionalMemorySystem;
  trustEngine?: TrustDynamicsEngine;
  engineState?: Partial<ManagerEngineState>;
}

export interface ProcessActionResult {
  accepted: boolean;
  state: PersonalityState;
  modifiers: ResponseModifiers;
}

interface ManagerDependencies {
  clock: Clock;
  tunables: RelationshipTunables;
  logger: Logger;
}

const defaultDependencies = (): ManagerDependencies => ({
  clock: systemClock,
  tunables: DEFAULT_TUNABLES,
  logger: createLogger('personality-state'),
});

export class PersonalityStateManager {
  private readonly dependencies: ManagerDependencies;
  private readonly patternTracker: PatternTracker;
  private readonly emotionalMemory: EmotionalMemorySystem;
  private readonly trustEngine: TrustDynamicsEngine;
  private emotionalSafety: number;
  private parentingUnity: number;
  private consecutiveInitiationAccepts: number;
  private lastProcessedMs: number | null;
  private modifiers: ResponseModifiers;
  private recovering = false;

  constructor(options: PersonalityStateManagerOptions = {}, partialDependencies: Partial<ManagerDependencies> = {}) {
    this.dependencies = {
      ...defaultDependencies(),
      ...partialDependencies,
    };

    const { clock, tunables } = this.dependencies;
    this.patternTracker = options.patternTracker ?? new PatternTracker({ clock, tunables });
    this.emotionalMemory = options.emotionalMemory ?? new EmotionalMemorySystem({ clock, tunables });
    this.trustEngine = options.trustEngine ?? new TrustDynamicsEngine({}, { clock, tunables });

    const engineState = options.engineState ?? {};
    this.emotionalSafety = toStoredScore(engineState.emotionalSafety ?? 50);
    this.parentingUnity = toStoredScore(engineState.parentingUnity ?? 70);
    this.consecutiveInitiationAccepts = engineState.consecutiveInitiationAccepts ?? 0;
    this.lastProcessedMs = engineState.lastProcessedIso ? toEpochMs(engineState.lastProcessedIso) : null;
    this.modifiers = this.computeTargetModifiers(this.referenceTime());
  }

  getPatternTracker(): PatternTracker {
    return this.patternTracker;
  }

  getEmotionalMemory(): EmotionalMemorySystem {
    return this.emotionalMemory;
  }

  getTrustEngine(): TrustDynamicsEngine {
    return this.trustEngine;
  }

  getEngineState(): ManagerEngineState {
    return {
      emotionalSafety: this.emotionalSafety,
      parentingUnity: this.parentingUnity,
      consecutiveInitiationAccepts: this.consecutiveInitiationAccepts,
      lastProcessedIso: this.lastProcessedMs === null ? null : new Date(this.lastProcessedMs).toISOString(),
    };
  }

  getLastProcessedIso(): string | null {
    return this.getEngineState().lastProcessedIso;
  }

  private referenceTime(): number {
    return this.lastProcessedMs ?? this.dependencies.clock.now();
  }

  private validate(action: PlayerAction): PlayerAction | null {
    const { logger } = this.dependencies;

    if (!isActionType(action.actionType)) {
      const error = new PersonalityValidationError('actionType', `is not a known action: ${String(action.actionType)}`);
      logger.error('Rejected action', { actionId: action.id, message: error.message });
      return null;
    }

    if (action.context !== 'public' && action.context !== 'private') {
      const error = new PersonalityValidationError('context', 'must be public or private');
      logger.error('Rejected action', { actionId: action.id, message: error.message });
      return null;
    }

    if (!isFiniteNumber(action.valence)) {
      const error = new NumericInstabilityError('valence', action.valence);
      logger.error('Discarded action with non-finite valence', { actionId: action.id, message: error.message });
      return null;
    }

    const parsedMs = Date.parse(action.timestampIso);
    if (!Number.isFinite(parsedMs)) {
      const error = new PersonalityValidationError('timestampIso', 'is not an ISO-8601 timestamp');
      logger.error('Rejected action', { actionId: action.id, message: error.message });
      return null;
    }

    if (action.valence < -1 || action.valence > 1) {
      logger.warn('Clamped action valence into [-1, 1]', { actionId: action.id, valence: action.valence });
      return { ...action, valence: clamp(action.valence, -1, 1) };
    }

    return action;
  }

  /**
   * Applies one action to every subsystem. Throws OutOfOrderActionError when the
   * action predates the last processed one; state is left untouched in that case.
   */
  processAction(incoming: PlayerAction): ProcessActionResult {
    const action = this.validate(incoming);
    if (!action) {
      return { accepted: false, state: this.getCurrentState(), modifiers: this.getResponseModifiers() };
    }

    const atMs = toEpochMs(action.timestampIso);
    if (this.lastProcessedMs !== null && atMs < this.lastProcessedMs) {
      const error = new OutOfOrderActionError(
        action.id,
        action.timestampIso,
        new Date(this.lastProcessedMs).toISOString()
      );
      this.dependencies.logger.warn('Rejected out-of-order action', { actionId: action.id, message: error.message });
      throw error;
    }

    const { tunables } = this.dependencies;
    const wasWithdrawn = this.trustEngine.isInWithdrawal();

    this.patternTracker.recordAction(action);
    const activePatterns = this.patternTracker.detectPatterns(tunables.patternWindowDays * MS_PER_DAY, atMs);
    const activeTypes = activePatterns.map((pattern) => pattern.patternType);

    const ownPattern = patternForAction(action.actionType);
    const negativePatternActive = ownPattern !== null && isNegativePattern(ownPattern) && activeTypes.includes(ownPattern);

    this.emotionalMemory.storeMemory(
      {
        interactionId: action.id,
        context: action.context,
        timestampIso: action.timestampIso,
        associatedPatterns: activeTypes,
      },
      {
        primaryEmotion: emotionForAction(action.actionType, action.valence),
        intensity: Math.abs(action.valence),
        valence: action.valence,
        contextCategory: categoryForAction(action.actionType),
      }
    );

    this.trustEngine.applyResentmentDecay(atMs, this.patternTracker.getPositiveStreak());

    this.applyTrust(action, atMs);

    if (action.valence < 0 && action.actionType !== 'apology') {
      this.trustEngine.recordBehaviorRecurrence(action.actionType, action.timestampIso);
    }

    this.applyResentment(action, negativePatternActive);
    this.applySecondaryMetrics(action);

    this.patternTracker.clearHistory(new Date(atMs - tunables.historyRetentionDays * MS_PER_DAY).toISOString());
    this.lastProcessedMs = atMs;

    this.refreshModifiers(wasWithdrawn, atMs);

    return {
      accepted: true,
      state: this.getCurrentState(atMs),
      modifiers: this.getResponseModifiers(),
    };
  }

  /** Sorts the batch by timestamp and applies it in order. */
  processBatch(actions: ReadonlyArray<PlayerAction>): ProcessActionResult[] {
    const ordered = [...actions].sort((left, right) => toEpochMs(left.timestampIso) - toEpochMs(right.timestampIso));

    const first = ordered[0];
    if (first && this.lastProcessedMs !== null && toEpochMs(first.timestampIso) < this.lastProcessedMs) {
      const error = new OutOfOrderActionError(
        first.id,
        first.timestampIso,
        new Date(this.lastProcessedMs).toISOString()
      );
      this.dependencies.logger.warn('Rejected out-of-order batch', { size: ordered.length, message: error.message });
      throw error;
    }

    return ordered.map((action) => this.processAction(action));
  }

  private applyTrust(action: PlayerAction, atMs: number): void {
    let deltaBase = action.valence;
    let positiveScale = 1;

    if (action.actionType === 'apology') {
      const behavior = action.metadata.behaviorType;
      const rawType = action.metadata.apologyType;
      const apologyType: ApologyType = isApologyType(rawType) ? rawType : 'generic';
      const factor = isActionType(behavior)
        ? this.trustEngine.recordApology(behavior, apologyType, action.timestampIso)
        : APOLOGY_TYPE_MULTIPLIERS[apologyType];
      deltaBase = action.valence * factor;
    }

    if (action.actionType === 'parenting_present') {
      positiveScale = 0.5 + this.getParentingConsistency(atMs);
    }

    const attenuate = this.emotionalSafety > 70 && action.actionType !== 'stress_dismissed';

    this.trustEngine.updateTrust({
      deltaBase,
      context: action.context,
      kind: action.actionType,
      timestampIso: action.timestampIso,
      exemptFromPublicMultiplier: action.actionType === 'private_correction',
      negativeAttenuation: attenuate ? this.dependencies.tunables.emotionalSafetyAttenuation : 1,
      positiveScale,
    });
  }

  private applyResentment(action: PlayerAction, negativePatternActive: boolean): void {
    if (action.actionType === 'conflict_avoid') {
      if (negativePatternActive) {
        this.trustEngine.updateResentment(1, true);
        this.emotionalMemory.flagPlayer('unreliable');
        return;
      }
      this.trustEngine.updateResentment(CONFLICT_AVOIDANCE_RELIEF);
      return;
    }

    if (action.actionType === 'conflict_engage' && action.valence >= 0) {
      this.trustEngine.updateResentment(CONFLICT_ENGAGEMENT_RELIEF);
      return;
    }

    if (action.valence < 0) {
      this.trustEngine.updateResentment(1, negativePatternActive);
    }
  }

  private applySecondaryMetrics(action: PlayerAction): void {
    const magnitude = Math.abs(action.valence);

    if (action.actionType === 'stress_acknowledged') {
      this.emotionalSafety = toStoredScore(this.emotionalSafety + STRESS_ACKNOWLEDGED_GAIN * magnitude);
    } else if (action.actionType === 'stress_dismissed') {
      this.emotionalSafety = toStoredScore(this.emotionalSafety - STRESS_DISMISSED_PENALTY * magnitude);
    }

    if (action.context === 'public' && unityActions.has(action.actionType)) {
      this.parentingUnity = toStoredScore(this.parentingUnity + PARENTING_UNITY_RATE * action.valence);
    }

    if (action.actionType === 'initiation_accepted') {
      this.consecutiveInitiationAccepts += 1;
    } else if (action.actionType === 'initiation_ignored') {
      this.consecutiveInitiationAccepts = 0;
    }
  }

  /** 1 / (1 + cv) over daily parenting_present counts; 0 without any presence. */
  getParentingConsistency(nowMs: number = this.referenceTime()): number {
    const counts = new Array<number>(CONSISTENCY_WINDOW_DAYS).fill(0);

    for (const action of this.patternTracker.getHistory()) {
      if (action.actionType !== 'parenting_present') continue;
      const ageMs = nowMs - toEpochMs(action.timestampIso);
      if (ageMs < 0) continue;
      const day = Math.floor(ageMs / MS_PER_DAY);
      if (day < CONSISTENCY_WINDOW_DAYS) counts[day] += 1;
    }

    const total = counts.reduce((sum, count) => sum + count, 0);
    if (total === 0) return 0;

    const mean = total / CONSISTENCY_WINDOW_DAYS;
    const variance = counts.reduce((sum, count) => sum + (count - mean) ** 2, 0) / CONSISTENCY_WINDOW_DAYS;
    const coefficientOfVariation = Math.sqrt(variance) / mean;
    return round2(1 / (1 + coefficientOfVariation));
  }

  private computeTargetModifiers(nowMs: number): ResponseModifiers {
    const trust = this.trustEngine.getTrustScore();
    const resentment = this.trustEngine.getResentmentScore();
    const preset = selectModifierPreset(
      resolveTrustBand(trust, this.trustEngine.isInWithdrawal()),
      resolveResentmentBand(resentment)
    );

    let initiation = this.trustEngine.getInitiationProbability();
    if (this.consecutiveInitiationAccepts >= INITIATION_STREAK_THRESHOLD) {
      initiation += INITIATION_STREAK_BONUS;
    }

    let cooperation = this.trustEngine.getCooperationLevel();
    const controlWeight = this.patternTracker.getPatternWeight('control_taking', nowMs);
    if (controlWeight > 0) {
      const frequency = this.patternTracker.getPatternFrequency('control_taking', nowMs);
      cooperation *= 1 - Math.min(CONTROL_COOPERATION_MAX_PENALTY, frequency * 0.5 * controlWeight);
    }

    let bias = 0;
    if (trust > 70) bias += (trust - 70) / 30;
    if (resentment > 50) bias -= (resentment - 50) / 50;

    return {
      responseLengthMultiplier: this.trustEngine.getResponseLengthMultiplier(),
      initiationProbability: round2(clamp(initiation, 0, 1)),
      cooperationLevel: round2(clamp(cooperation, 0, 1)),
      emotionalVulnerability: round2(clamp(((this.emotionalSafety + trust) / 200) * preset.vulnerabilityScale, 0, 1)),
      interpretationBias: round2(clamp(bias, -1, 1)),
      tone: preset.tone,
    };
  }

  private refreshModifiers(wasWithdrawn: boolean, nowMs: number): void {
    const target = this.computeTargetModifiers(nowMs);

    if (this.trustEngine.isInWithdrawal()) {
      this.recovering = false;
    } else if (wasWithdrawn) {
      this.recovering = true;
    }

    if (!this.recovering) {
      this.modifiers = target;
      return;
    }

    const step = this.dependencies.tunables.recoveryStepPerInteraction;
    const ramp = (previous: number, goal: number): number => {
      return goal > previous ? round2(Math.min(goal, previous + step)) : goal;
    };

    const next: ResponseModifiers = {
      ...target,
      responseLengthMultiplier: ramp(this.modifiers.responseLengthMultiplier, target.responseLengthMultiplier),
      initiationProbability: ramp(this.modifiers.initiationProbability, target.initiationProbability),
      cooperationLevel: ramp(this.modifiers.cooperationLevel, target.cooperationLevel),
    };

    this.recovering =
      next.responseLengthMultiplier < target.responseLengthMultiplier ||
      next.initiationProbability < target.initiationProbability ||
      next.cooperationLevel < target.cooperationLevel;
    this.modifiers = next;
  }

  private dominantEmotions(nowMs: number): DominantEmotion[] {
    const totals = new Map<EmotionType, { score: number; count: number }>();
    const recent = this.emotionalMemory.getRecentMemories(DOMINANT_EMOTION_WINDOW_DAYS * 24, undefined, nowMs);

    for (const memory of recent) {
      const emotion = memory.emotionalImpact.primaryEmotion;
      const weight = temporalWeightForAge(nowMs - toEpochMs(memory.timestampIso));
      const entry = totals.get(emotion) ?? { score: 0, count: 0 };
      entry.score += memory.emotionalImpact.intensity * weight;
      entry.count += 1;
      totals.set(emotion, entry);
    }

    return [...totals.entries()]
      .sort((left, right) => right[1].score - left[1].score)
      .slice(0, DOMINANT_EMOTION_LIMIT)
      .map(([emotion, entry]) => ({ emotion, intensity: round2(clamp(entry.score / entry.count, 0, 1)) }));
  }

  getCurrentState(nowMs: number = this.referenceTime()): PersonalityState {
    return {
      trustScore: this.trustEngine.getTrustScore(),
      resentmentScore: this.trustEngine.getResentmentScore(),
      emotionalSafety: this.emotionalSafety,
      parentingUnity: this.parentingUnity,
      parentingConsistency: this.getParentingConsistency(nowMs),
      isWithdrawn: this.trustEngine.isInWithdrawal(),
      withdrawalSeverity: this.trustEngine.getWithdrawalSeverity(),
      recentPatterns: this.patternTracker.getAllPatterns(nowMs).map((pattern) => pattern.patternType),
      dominantEmotions: this.dominantEmotions(nowMs),
      playerFlags: this.emotionalMemory.getPlayerFlags(),
    };
  }

  getResponseModifiers(): ResponseModifiers {
    return { ...this.modifiers };
  }
}
