import { NumericInstabilityError } from '../errors';
import { createLogger, type Logger } from '../observability/logger';
import { isActionType } from './actionCatalog';
import { resolveResentmentBand, resolveTrustBand, selectModifierPreset } from './modifierPresets';
import { MS_PER_HOUR, daysBetween, isFiniteNumber, round2, systemClock, toEpochMs, toStoredScore } from './numeric';
import { DEFAULT_TUNABLES, type RelationshipTunables } from './tunables';
import type { ActionType, ApologyRecord, ApologyType, Clock, ContextType, WithdrawalSeverity } from './types';

export const BASE_TRUST_INCREASE = 2.0;
export const BASE_TRUST_DECREASE = 4.0;
export const PUBLIC_CONTEXT_MULTIPLIER = 2.0;
export const DIMINISHING_RETURNS_WINDOW_MS = MS_PER_HOUR;
export const DIMINISHING_RETURNS_MULTIPLIER = 0.5;
export const HIGH_TRUST_THRESHOLD = 70;
export const RESENTMENT_TRUST_IMPACT_THRESHOLD = 50;

export const PATTERN_RESENTMENT_INCREASE = 3.0;
export const SINGLE_INCIDENT_RESENTMENT = 0.5;
export const RESENTMENT_DECAY_PER_DAY = 0.5;
export const SUSTAINED_POSITIVE_STREAK = 3;

export const INITIAL_APOLOGY_EFFECTIVENESS = 1.0;
export const APOLOGY_DECAY_PER_RECURRENCE = 0.2;
export const MIN_APOLOGY_EFFECTIVENESS = 0.1;
export const APOLOGY_RECOVERY_PER_WEEK = 0.1;

export const APOLOGY_TYPE_MULTIPLIERS: Record<ApologyType, number> = {
  defensive: 0.3,
  generic: 0.5,
  genuine: 1.0,
  action_oriented: 1.5,
};

export interface TrustUpdateInput {
  /** Signed valence of the interaction. */
  deltaBase: number;
  context: ContextType;
  /** Diminishing returns are tracked per kind. */
  kind?: string;
  timestampIso?: string;
  exemptFromPublicMultiplier?: boolean;
  /** Extra multiplier on negative impacts, applied after high-trust resilience. */
  negativeAttenuation?: number;
  /** Extra multiplier on positive impacts, applied before diminishing returns. */
  positiveScale?: number;
}

export interface ScoreUpdateResult {
  applied: number;
  score: number;
  discarded: boolean;
}

interface PositiveWindow {
  startMs: number;
  firstImpact: number;
}

export interface TrustDynamicsSnapshot {
  trustScore: number;
  resentmentScore: number;
  apologyRecords: Partial<Record<ActionType, ApologyRecord>>;
  positiveWindows: Record<string, { startIso: string; firstImpact: number }>;
  lastDecayIso: string | null;
  withdrawn: boolean;
}

interface TrustDynamicsDependencies {
  clock: Clock;
  tunables: RelationshipTunables;
  logger: Logger;
}

const defaultDependencies = (): TrustDynamicsDependencies => ({
  clock: systemClock,
  tunables: DEFAULT_TUNABLES,
  logger: createLogger('trust-dynamics'),
});

export class TrustDynamicsEngine {
  private readonly dependencies: TrustDynamicsDependencies;
  private trustScore: number;
  private resentmentScore: number;
  private withdrawn: boolean;
  private readonly apologyRecords = new Map<ActionType, ApologyRecord>();
  private readonly positiveWindows = new Map<string, PositiveWindow>();
  private lastDecayMs: number | null = null;

  constructor(
    initial: { trustScore?: number; resentmentScore?: number; withdrawn?: boolean } = {},
    partialDependencies: Partial<TrustDynamicsDependencies> = {}
  ) {
    this.dependencies = {
      ...defaultDependencies(),
      ...partialDependencies,
    };
    this.trustScore = toStoredScore(initial.trustScore ?? 60);
    this.resentmentScore = toStoredScore(initial.resentmentScore ?? 10);
    this.withdrawn = initial.withdrawn ?? false;
    this.refreshWithdrawal();
  }

  getTrustScore(): number {
    return this.trustScore;
  }

  getResentmentScore(): number {
    return this.resentmentScore;
  }

  private discard(field: string, value: number): ScoreUpdateResult {
    const error = new NumericInstabilityError(field, value);
    this.dependencies.logger.error('Discarded update with non-finite value', {
      field,
      message: error.message,
    });
    return {
      applied: 0,
      score: field === 'resentment' ? this.resentmentScore : this.trustScore,
      discarded: true,
    };
  }

  updateTrust(input: TrustUpdateInput): ScoreUpdateResult {
    if (!isFiniteNumber(input.deltaBase)) return this.discard('trust', input.deltaBase);

    const { tunables } = this.dependencies;
    const atMs = input.timestampIso ? toEpochMs(input.timestampIso) : this.dependencies.clock.now();
    const before = this.trustScore;

    let impact = input.deltaBase > 0 ? input.deltaBase * BASE_TRUST_INCREASE : input.deltaBase * BASE_TRUST_DECREASE;

    if (input.context === 'public' && !input.exemptFromPublicMultiplier) {
      impact *= PUBLIC_CONTEXT_MULTIPLIER;
    }

    if (impact > 0) {
      impact *= input.positiveScale ?? 1;
      impact = this.applyDiminishingReturns(input.kind ?? 'generic', impact, atMs);
      if (this.resentmentScore > RESENTMENT_TRUST_IMPACT_THRESHOLD) {
        impact *= tunables.resentmentDampening;
      }
    } else if (impact < 0) {
      if (before > HIGH_TRUST_THRESHOLD) {
        impact *= tunables.highTrustResilience;
      }
      impact *= input.negativeAttenuation ?? 1;
    }

    const next = toStoredScore(before + impact);
    if (!isFiniteNumber(next)) return this.discard('trust', next);

    this.trustScore = next;
    this.refreshWithdrawal();

    return {
      applied: round2(next - before),
      score: next,
      discarded: false,
    };
  }

  private applyDiminishingReturns(kind: string, impact: number, atMs: number): number {
    const window = this.positiveWindows.get(kind);
    if (window && atMs >= window.startMs && atMs - window.startMs < DIMINISHING_RETURNS_WINDOW_MS) {
      return Math.min(impact * DIMINISHING_RETURNS_MULTIPLIER, window.firstImpact * DIMINISHING_RETURNS_MULTIPLIER);
    }

    this.positiveWindows.set(kind, { startMs: atMs, firstImpact: impact });
    return impact;
  }

  /**
   * Positive deltas are replaced by the fixed pattern or isolated-incident amount,
   * scaled by the delta. Negative deltas apply as given.
   */
  updateResentment(delta: number, isPattern = false): ScoreUpdateResult {
    if (!isFiniteNumber(delta)) return this.discard('resentment', delta);

    const before = this.resentmentScore;
    const amount = delta > 0 ? delta * (isPattern ? PATTERN_RESENTMENT_INCREASE : SINGLE_INCIDENT_RESENTMENT) : delta;
    const next = toStoredScore(before + amount);
    if (!isFiniteNumber(next)) return this.discard('resentment', next);

    this.resentmentScore = next;
    return {
      applied: round2(next - before),
      score: next,
      discarded: false,
    };
  }

  /**
   * Lazily decays resentment for the days since the last call. Nothing decays unless
   * the caller's positive streak has reached SUSTAINED_POSITIVE_STREAK.
   */
  applyResentmentDecay(nowMs: number = this.dependencies.clock.now(), positiveStreak = 0): number {
    const lastMs = this.lastDecayMs ?? nowMs;
    this.lastDecayMs = Math.max(lastMs, nowMs);

    if (positiveStreak < SUSTAINED_POSITIVE_STREAK) return 0;

    const days = daysBetween(lastMs, nowMs);
    if (days === 0) return 0;

    const before = this.resentmentScore;
    this.resentmentScore = toStoredScore(before - RESENTMENT_DECAY_PER_DAY * days);
    return round2(before - this.resentmentScore);
  }

  private refreshWithdrawal(): void {
    const { withdrawalThreshold, withdrawalExitThreshold } = this.dependencies.tunables;
    this.withdrawn = this.withdrawn
      ? this.trustScore < Math.max(withdrawalThreshold, withdrawalExitThreshold)
      : this.trustScore < withdrawalThreshold;
  }

  isInWithdrawal(): boolean {
    return this.withdrawn;
  }

  getWithdrawalSeverity(): WithdrawalSeverity {
    if (!this.withdrawn) return 'none';
    if (this.trustScore >= 40) return 'mild';
    if (this.trustScore >= 30) return 'moderate';
    return 'severe';
  }

  private liveEffectiveness(record: ApologyRecord, nowMs: number): number {
    if (record.lastRecurrenceIso === null) return record.effectiveness;
    const weeks = Math.floor(daysBetween(toEpochMs(record.lastRecurrenceIso), nowMs) / 7);
    if (weeks < 1) return record.effectiveness;
    return Math.min(INITIAL_APOLOGY_EFFECTIVENESS, record.effectiveness + APOLOGY_RECOVERY_PER_WEEK * weeks);
  }

  /** Records an apology and returns the trust multiplier it earns. */
  recordApology(behaviorType: ActionType, apologyType: ApologyType, timestampIso: string): number {
    const existing = this.apologyRecords.get(behaviorType);
    const record: ApologyRecord = existing
      ? { ...existing, lastApologyType: apologyType, lastApologyIso: timestampIso }
      : {
          effectiveness: INITIAL_APOLOGY_EFFECTIVENESS,
          lastRecurrenceIso: null,
          lastApologyType: apologyType,
          lastApologyIso: timestampIso,
          recurrenceCount: 0,
        };
    this.apologyRecords.set(behaviorType, record);

    return round2(this.liveEffectiveness(record, toEpochMs(timestampIso)) * APOLOGY_TYPE_MULTIPLIERS[apologyType]);
  }

  /** Returns whether the recurrence followed an apology and lowered its effectiveness. */
  recordBehaviorRecurrence(behaviorType: ActionType, timestampIso: string): boolean {
    const record = this.apologyRecords.get(behaviorType);
    if (!record) return false;

    const atMs = toEpochMs(timestampIso);
    if (atMs < toEpochMs(record.lastApologyIso)) return false;

    const restored = this.liveEffectiveness(record, atMs);
    this.apologyRecords.set(behaviorType, {
      ...record,
      effectiveness: round2(Math.max(MIN_APOLOGY_EFFECTIVENESS, restored - APOLOGY_DECAY_PER_RECURRENCE)),
      lastRecurrenceIso: timestampIso,
      recurrenceCount: record.recurrenceCount + 1,
    });
    return true;
  }

  getApologyEffectiveness(
    behaviorType: ActionType,
    apologyType: ApologyType = 'genuine',
    nowMs: number = this.dependencies.clock.now()
  ): number {
    const record = this.apologyRecords.get(behaviorType);
    const base = record ? this.liveEffectiveness(record, nowMs) : INITIAL_APOLOGY_EFFECTIVENESS;
    return round2(base * APOLOGY_TYPE_MULTIPLIERS[apologyType]);
  }

  getStoredApologyEffectiveness(behaviorType: ActionType): number {
    return this.apologyRecords.get(behaviorType)?.effectiveness ?? INITIAL_APOLOGY_EFFECTIVENESS;
  }

  getApologyRecord(behaviorType: ActionType): ApologyRecord | undefined {
    const record = this.apologyRecords.get(behaviorType);
    return record ? { ...record } : undefined;
  }

  getResponseLengthMultiplier(): number {
    switch (this.getWithdrawalSeverity()) {
      case 'none':
        return 1.0;
      case 'mild':
        return 0.7;
      case 'moderate':
        return 0.5;
      case 'severe':
        return 0.3;
    }
  }

  getInitiationProbability(): number {
    if (this.trustScore > HIGH_TRUST_THRESHOLD) return 1.0;
    if (this.trustScore > 40) return round2((this.trustScore - 40) / 30);
    return 0.1;
  }

  getCooperationLevel(): number {
    const trustBand = resolveTrustBand(this.trustScore, this.withdrawn);
    return selectModifierPreset(trustBand, resolveResentmentBand(this.resentmentScore)).cooperation;
  }

  toSnapshot(): TrustDynamicsSnapshot {
    return {
      trustScore: this.trustScore,
      resentmentScore: this.resentmentScore,
      apologyRecords: Object.fromEntries(
        [...this.apologyRecords.entries()].map(([behavior, record]) => [behavior, { ...record }])
      ),
      positiveWindows: Object.fromEntries(
        [...this.positiveWindows.entries()].map(([kind, window]) => [
          kind,
          { startIso: new Date(window.startMs).toISOString(), firstImpact: round2(window.firstImpact) },
        ])
      ),
      lastDecayIso: this.lastDecayMs === null ? null : new Date(this.lastDecayMs).toISOString(),
      withdrawn: this.withdrawn,
    };
  }

  static fromSnapshot(
    snapshot: TrustDynamicsSnapshot,
    partialDependencies: Partial<TrustDynamicsDependencies> = {}
  ): TrustDynamicsEngine {
    const engine = new TrustDynamicsEngine(
      { trustScore: snapshot.trustScore, resentmentScore: snapshot.resentmentScore, withdrawn: snapshot.withdrawn },
      partialDependencies
    );
    for (const [behavior, record] of Object.entries(snapshot.apologyRecords)) {
      if (record && isActionType(behavior)) engine.apologyRecords.set(behavior, { ...record });
    }
    for (const [kind, window] of Object.entries(snapshot.positiveWindows)) {
      engine.positiveWindows.set(kind, { startMs: toEpochMs(window.startIso), firstImpact: window.firstImpact });
    }
    engine.lastDecayMs = snapshot.lastDecayIso === null ? null : toEpochMs(snapshot.lastDecayIso);
    return engine;
  }
}
