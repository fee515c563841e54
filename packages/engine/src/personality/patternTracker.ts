import { isNegativePattern, isPatternType, patternForAction } from './actionCatalog';
import { MS_PER_DAY, daysBetween, round2, systemClock, toEpochMs } from './numeric';
import { DEFAULT_TUNABLES, type RelationshipTunables } from './tunables';
import type { BehaviorPattern, Clock, PatternType, PlayerAction } from './types';

/** Valence above which an action counts toward streaks and pattern breaking. */
export const POSITIVE_ACTION_THRESHOLD = 0.3;

/** Weights below this floor are treated as fully decayed. */
const FULLY_DECAYED_WEIGHT = 0.1;

interface TrackedPattern {
  patternType: PatternType;
  occurrences: PlayerAction[];
  frequency: number;
  /** Weight as of lastSeenMs; the live weight decays from here. */
  baseWeight: number;
  firstSeenMs: number;
  lastSeenMs: number;
}

export interface PatternSnapshotEntry {
  patternType: PatternType;
  occurrenceIds: string[];
  frequency: number;
  weight: number;
  firstSeenIso: string;
  lastSeenIso: string;
}

export interface PatternTrackerSnapshot {
  history: PlayerAction[];
  patterns: PatternSnapshotEntry[];
  opposingCounts: Partial<Record<PatternType, number>>;
  suppressedSinceIso: Partial<Record<PatternType, string>>;
  positiveStreak: number;
}

interface PatternTrackerDependencies {
  clock: Clock;
  tunables: RelationshipTunables;
}

const defaultDependencies: PatternTrackerDependencies = {
  clock: systemClock,
  tunables: DEFAULT_TUNABLES,
};

const toIso = (ms: number): string => new Date(ms).toISOString();

export class PatternTracker {
  private readonly dependencies: PatternTrackerDependencies;
  private history: PlayerAction[] = [];
  private readonly patterns = new Map<PatternType, TrackedPattern>();
  private readonly opposingCounts = new Map<PatternType, number>();
  private readonly suppressedSince = new Map<PatternType, number>();
  private positiveStreak = 0;

  constructor(partialDependencies: Partial<PatternTrackerDependencies> = {}) {
    this.dependencies = {
      ...defaultDependencies,
      ...partialDependencies,
    };
  }

  private get windowMs(): number {
    return this.dependencies.tunables.patternWindowDays * MS_PER_DAY;
  }

  recordAction(action: PlayerAction): void {
    const atMs = toEpochMs(action.timestampIso);
    this.insertOrdered(action, atMs);

    const pattern = patternForAction(action.actionType);
    if (pattern) {
      this.opposingCounts.set(pattern, 0);
      const tracked = this.patterns.get(pattern);
      if (tracked && atMs >= tracked.lastSeenMs) {
        tracked.baseWeight = 1;
        tracked.lastSeenMs = atMs;
        tracked.occurrences = [...tracked.occurrences, action];
      }
    }

    if (action.valence <= POSITIVE_ACTION_THRESHOLD) {
      this.positiveStreak = 0;
      for (const tracked of this.patterns.keys()) {
        if (tracked !== pattern) this.opposingCounts.set(tracked, 0);
      }
      return;
    }

    this.positiveStreak += 1;
    for (const tracked of [...this.patterns.keys()]) {
      if (tracked === pattern || !isNegativePattern(tracked)) continue;
      this.opposingCounts.set(tracked, (this.opposingCounts.get(tracked) ?? 0) + 1);
      this.breakPattern(tracked, atMs);
    }
  }

  private insertOrdered(action: PlayerAction, atMs: number): void {
    const last = this.history[this.history.length - 1];
    if (!last || toEpochMs(last.timestampIso) <= atMs) {
      this.history.push(action);
      return;
    }

    const index = this.history.findIndex((entry) => toEpochMs(entry.timestampIso) > atMs);
    this.history.splice(index, 0, action);
  }

  detectPatterns(windowMs: number = this.windowMs, nowMs: number = this.dependencies.clock.now()): BehaviorPattern[] {
    const cutoff = nowMs - windowMs;
    const windowDays = windowMs > 0 ? windowMs / MS_PER_DAY : 1;
    const grouped = new Map<PatternType, PlayerAction[]>();

    for (const action of this.history) {
      const atMs = toEpochMs(action.timestampIso);
      if (atMs < cutoff || atMs > nowMs) continue;
      const pattern = patternForAction(action.actionType);
      if (!pattern) continue;
      const suppressedAt = this.suppressedSince.get(pattern);
      if (suppressedAt !== undefined && atMs <= suppressedAt) continue;
      const group = grouped.get(pattern);
      if (group) {
        group.push(action);
      } else {
        grouped.set(pattern, [action]);
      }
    }

    const emitted: PatternType[] = [];
    for (const [patternType, actions] of grouped) {
      if (actions.length < this.dependencies.tunables.patternMinOccurrences) continue;
      emitted.push(patternType);

      const firstMs = toEpochMs(actions[0].timestampIso);
      const lastMs = toEpochMs(actions[actions.length - 1].timestampIso);
      const existing = this.patterns.get(patternType);

      if (existing) {
        existing.occurrences = actions;
        existing.frequency = actions.length / windowDays;
        if (lastMs > existing.lastSeenMs) {
          existing.lastSeenMs = lastMs;
          existing.baseWeight = 1;
        }
        continue;
      }

      this.patterns.set(patternType, {
        patternType,
        occurrences: actions,
        frequency: actions.length / windowDays,
        baseWeight: 1,
        firstSeenMs: firstMs,
        lastSeenMs: lastMs,
      });
    }

    this.dropDecayedPatterns(nowMs);

    return emitted
      .map((patternType) => this.patterns.get(patternType))
      .filter((tracked): tracked is TrackedPattern => tracked !== undefined)
      .map((tracked) => this.toBehaviorPattern(tracked, nowMs));
  }

  private dropDecayedPatterns(nowMs: number): void {
    for (const [patternType, tracked] of [...this.patterns.entries()]) {
      if (this.liveWeight(tracked, nowMs) === 0) {
        this.patterns.delete(patternType);
        this.opposingCounts.delete(patternType);
      }
    }
  }

  private liveWeight(tracked: TrackedPattern, nowMs: number): number {
    const elapsedDays = daysBetween(tracked.lastSeenMs, nowMs);
    const decayed = tracked.baseWeight * Math.pow(1 - this.dependencies.tunables.patternDailyDecay, elapsedDays);
    return decayed < FULLY_DECAYED_WEIGHT ? 0 : decayed;
  }

  private toBehaviorPattern(tracked: TrackedPattern, nowMs: number): BehaviorPattern {
    return {
      patternType: tracked.patternType,
      occurrences: tracked.occurrences,
      frequency: tracked.frequency,
      weight: this.liveWeight(tracked, nowMs),
      firstSeenIso: toIso(tracked.firstSeenMs),
      lastSeenIso: toIso(tracked.lastSeenMs),
    };
  }

  getPatternFrequency(patternType: PatternType, nowMs: number = this.dependencies.clock.now()): number {
    const cutoff = nowMs - this.windowMs;
    const windowDays = this.dependencies.tunables.patternWindowDays || 1;
    const count = this.history.filter((action) => {
      const atMs = toEpochMs(action.timestampIso);
      return atMs >= cutoff && atMs <= nowMs && patternForAction(action.actionType) === patternType;
    }).length;
    return count / windowDays;
  }

  getPatternWeight(patternType: PatternType, nowMs: number = this.dependencies.clock.now()): number {
    const tracked = this.patterns.get(patternType);
    return tracked ? this.liveWeight(tracked, nowMs) : 0;
  }

  /**
   * Resets a negative pattern once enough consecutive opposing actions were seen.
   * Returns whether the pattern was broken.
   */
  breakPattern(patternType: PatternType, atMs: number = this.dependencies.clock.now()): boolean {
    if (!isNegativePattern(patternType)) return false;
    const opposing = this.opposingCounts.get(patternType) ?? 0;
    if (opposing < this.dependencies.tunables.patternBreakThreshold) return false;

    this.patterns.delete(patternType);
    this.opposingCounts.delete(patternType);
    this.suppressedSince.set(patternType, atMs);
    return true;
  }

  getOpposingCount(patternType: PatternType): number {
    return this.opposingCounts.get(patternType) ?? 0;
  }

  getAllPatterns(nowMs: number = this.dependencies.clock.now()): BehaviorPattern[] {
    return [...this.patterns.values()]
      .map((tracked) => this.toBehaviorPattern(tracked, nowMs))
      .filter((pattern) => pattern.weight > 0);
  }

  getPositiveStreak(): number {
    return this.positiveStreak;
  }

  getHistory(): ReadonlyArray<PlayerAction> {
    return this.history;
  }

  clearHistory(beforeIso?: string): void {
    if (beforeIso === undefined) {
      this.history = [];
      this.patterns.clear();
      this.opposingCounts.clear();
      this.suppressedSince.clear();
      this.positiveStreak = 0;
      return;
    }

    const cutoff = toEpochMs(beforeIso);
    this.history = this.history.filter((action) => toEpochMs(action.timestampIso) >= cutoff);
  }

  toSnapshot(): PatternTrackerSnapshot {
    return {
      history: [...this.history],
      patterns: [...this.patterns.values()].map((tracked) => ({
        patternType: tracked.patternType,
        occurrenceIds: tracked.occurrences.map((action) => action.id),
        frequency: round2(tracked.frequency),
        weight: round2(tracked.baseWeight),
        firstSeenIso: toIso(tracked.firstSeenMs),
        lastSeenIso: toIso(tracked.lastSeenMs),
      })),
      opposingCounts: Object.fromEntries(this.opposingCounts),
      suppressedSinceIso: Object.fromEntries(
        [...this.suppressedSince.entries()].map(([patternType, ms]) => [patternType, toIso(ms)])
      ),
      positiveStreak: this.positiveStreak,
    };
  }

  static fromSnapshot(
    snapshot: PatternTrackerSnapshot,
    partialDependencies: Partial<PatternTrackerDependencies> = {}
  ): PatternTracker {
    const tracker = new PatternTracker(partialDependencies);
    tracker.history = [...snapshot.history].sort(
      (left, right) => toEpochMs(left.timestampIso) - toEpochMs(right.timestampIso)
    );
    const byId = new Map(tracker.history.map((action) => [action.id, action]));

    for (const entry of snapshot.patterns) {
      const occurrences = entry.occurrenceIds
        .map((id) => byId.get(id))
        .filter((action): action is PlayerAction => action !== undefined);
      tracker.patterns.set(entry.patternType, {
        patternType: entry.patternType,
        occurrences,
        frequency: entry.frequency,
        baseWeight: entry.weight,
        firstSeenMs: toEpochMs(entry.firstSeenIso),
        lastSeenMs: toEpochMs(entry.lastSeenIso),
      });
    }

    for (const [patternType, count] of Object.entries(snapshot.opposingCounts)) {
      if (isPatternType(patternType) && typeof count === 'number') tracker.opposingCounts.set(patternType, count);
    }
    for (const [patternType, iso] of Object.entries(snapshot.suppressedSinceIso)) {
      if (isPatternType(patternType) && typeof iso === 'string') {
        tracker.suppressedSince.set(patternType, toEpochMs(iso));
      }
    }
    tracker.positiveStreak = snapshot.positiveStreak;
    return tracker;
  }
}
