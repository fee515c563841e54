import { v4 as uuidv4 } from 'uuid';
import { createLogger, type Logger } from '../observability/logger';
import { MS_PER_DAY, MS_PER_HOUR, clamp, round2, systemClock, toEpochMs } from './numeric';
import { DEFAULT_TUNABLES, type RelationshipTunables } from './tunables';
import type {
  Clock,
  ContextCategory,
  ContextType,
  EmotionalImpact,
  EmotionalMemory,
  EmotionType,
  InteractionSummary,
  PatternType,
  PlayerFlag,
} from './types';

/** Entries above this live weight are never evicted. */
const PROTECTED_WEIGHT = 0.8;

// Coarse freshness buckets, checked in order.
const temporalWeightTable: ReadonlyArray<{ maxAgeMs: number; weight: number }> = [
  { maxAgeMs: 24 * MS_PER_HOUR, weight: 1.0 },
  { maxAgeMs: 7 * MS_PER_DAY, weight: 0.8 },
  { maxAgeMs: 30 * MS_PER_DAY, weight: 0.5 },
];
const STALE_WEIGHT = 0.3;

export const temporalWeightForAge = (ageMs: number): number => {
  const age = Math.max(0, ageMs);
  const bucket = temporalWeightTable.find((entry) => age < entry.maxAgeMs);
  return bucket ? bucket.weight : STALE_WEIGHT;
};

export interface MemoryQuery {
  context?: ContextType;
  category?: ContextCategory;
}

export interface MemoryStats {
  totalMemories: number;
  averageValence: number;
  oldestMemoryAgeDays: number;
  newestMemoryAgeHours: number;
  contextBreakdown: Partial<Record<ContextCategory, number>>;
}

export interface EmotionalMemorySnapshot {
  memories: EmotionalMemory[];
  playerFlags: PlayerFlag[];
}

interface EmotionalMemoryDependencies {
  clock: Clock;
  tunables: RelationshipTunables;
  logger: Logger;
}

const defaultDependencies = (): EmotionalMemoryDependencies => ({
  clock: systemClock,
  tunables: DEFAULT_TUNABLES,
  logger: createLogger('emotional-memory'),
});

const newestFirst = (left: EmotionalMemory, right: EmotionalMemory): number => {
  return toEpochMs(right.timestampIso) - toEpochMs(left.timestampIso);
};

export class EmotionalMemorySystem {
  private readonly dependencies: EmotionalMemoryDependencies;
  private memories: EmotionalMemory[] = [];
  private readonly playerFlags = new Set<PlayerFlag>();

  constructor(partialDependencies: Partial<EmotionalMemoryDependencies> = {}) {
    this.dependencies = {
      ...defaultDependencies(),
      ...partialDependencies,
    };
  }

  private weightAt(memory: EmotionalMemory, nowMs: number): number {
    return temporalWeightForAge(nowMs - toEpochMs(memory.timestampIso));
  }

  storeMemory(summary: InteractionSummary, impact: EmotionalImpact): EmotionalMemory {
    const memory: EmotionalMemory = {
      id: summary.interactionId ?? uuidv4(),
      emotionalImpact: {
        primaryEmotion: impact.primaryEmotion,
        intensity: round2(clamp(impact.intensity, 0, 1)),
        valence: round2(clamp(impact.valence, -1, 1)),
        contextCategory: impact.contextCategory,
      },
      timestampIso: summary.timestampIso,
      context: summary.context,
      weight: 1,
      associatedPatterns: [...(summary.associatedPatterns ?? [])],
    };

    this.memories.push(memory);

    if (this.memories.length > this.dependencies.tunables.memoryCapacity) {
      this.pruneToCapacity(toEpochMs(summary.timestampIso));
    }

    return memory;
  }

  private pruneToCapacity(nowMs: number): void {
    const overflow = this.memories.length - this.dependencies.tunables.memoryCapacity;
    const candidates = this.memories
      .map((memory) => ({ memory, weight: this.weightAt(memory, nowMs) }))
      .filter((entry) => entry.weight <= PROTECTED_WEIGHT)
      .sort((left, right) => {
        if (left.weight !== right.weight) return left.weight - right.weight;
        return toEpochMs(left.memory.timestampIso) - toEpochMs(right.memory.timestampIso);
      })
      .slice(0, overflow);

    const evicted = new Set(candidates.map((entry) => entry.memory));
    this.memories = this.memories.filter((memory) => !evicted.has(memory));

    this.dependencies.logger.info('Pruned emotional memories over capacity', {
      removed: evicted.size,
      remaining: this.memories.length,
    });

    if (evicted.size < overflow) {
      this.dependencies.logger.warn('Capacity exceeded by protected recent memories', {
        capacity: this.dependencies.tunables.memoryCapacity,
        size: this.memories.length,
      });
    }
  }

  applyTemporalDecay(nowMs: number = this.dependencies.clock.now()): void {
    this.memories = this.memories.map((memory) => ({
      ...memory,
      weight: this.weightAt(memory, nowMs),
    }));
  }

  recallSimilar(
    query: MemoryQuery = {},
    limit = 5,
    nowMs: number = this.dependencies.clock.now()
  ): EmotionalMemory[] {
    this.applyTemporalDecay(nowMs);

    return this.memories
      .filter((memory) => query.context === undefined || memory.context === query.context)
      .filter((memory) => query.category === undefined || memory.emotionalImpact.contextCategory === query.category)
      .sort((left, right) => {
        if (left.weight !== right.weight) return right.weight - left.weight;
        return newestFirst(left, right);
      })
      .slice(0, Math.max(0, limit));
  }

  /** Recency-weighted mean valence for a category; 0 when nothing is stored. */
  getEmotionalAssociation(category: ContextCategory, nowMs: number = this.dependencies.clock.now()): number {
    let weightedSum = 0;
    let totalWeight = 0;

    for (const memory of this.memories) {
      if (memory.emotionalImpact.contextCategory !== category) continue;
      const weight = this.weightAt(memory, nowMs);
      weightedSum += memory.emotionalImpact.valence * weight;
      totalWeight += weight;
    }

    return totalWeight === 0 ? 0 : clamp(weightedSum / totalWeight, -1, 1);
  }

  getRecentMemories(hours = 24, limit?: number, nowMs: number = this.dependencies.clock.now()): EmotionalMemory[] {
    const cutoff = nowMs - hours * MS_PER_HOUR;
    const recent = this.memories
      .filter((memory) => toEpochMs(memory.timestampIso) >= cutoff)
      .sort(newestFirst);
    return limit === undefined ? recent : recent.slice(0, limit);
  }

  getMemoriesByEmotion(emotion: EmotionType, limit = 10): EmotionalMemory[] {
    return this.memories
      .filter((memory) => memory.emotionalImpact.primaryEmotion === emotion)
      .sort(newestFirst)
      .slice(0, limit);
  }

  getMemoriesByPattern(pattern: PatternType, limit = 10): EmotionalMemory[] {
    return this.memories
      .filter((memory) => memory.associatedPatterns.includes(pattern))
      .sort(newestFirst)
      .slice(0, limit);
  }

  getAverageValence(category?: ContextCategory, days = 7, nowMs: number = this.dependencies.clock.now()): number {
    const cutoff = nowMs - days * MS_PER_DAY;
    const recent = this.memories.filter(
      (memory) =>
        toEpochMs(memory.timestampIso) >= cutoff &&
        (category === undefined || memory.emotionalImpact.contextCategory === category)
    );
    if (recent.length === 0) return 0;
    return recent.reduce((sum, memory) => sum + memory.emotionalImpact.valence, 0) / recent.length;
  }

  clearOldMemories(days = 365, nowMs: number = this.dependencies.clock.now()): number {
    const cutoff = nowMs - days * MS_PER_DAY;
    const before = this.memories.length;
    this.memories = this.memories.filter((memory) => toEpochMs(memory.timestampIso) >= cutoff);
    return before - this.memories.length;
  }

  getMemoryStats(nowMs: number = this.dependencies.clock.now()): MemoryStats {
    if (this.memories.length === 0) {
      return {
        totalMemories: 0,
        averageValence: 0,
        oldestMemoryAgeDays: 0,
        newestMemoryAgeHours: 0,
        contextBreakdown: {},
      };
    }

    const stamps = this.memories.map((memory) => toEpochMs(memory.timestampIso));
    const contextBreakdown: Partial<Record<ContextCategory, number>> = {};
    for (const memory of this.memories) {
      const category = memory.emotionalImpact.contextCategory;
      contextBreakdown[category] = (contextBreakdown[category] ?? 0) + 1;
    }

    return {
      totalMemories: this.memories.length,
      averageValence:
        this.memories.reduce((sum, memory) => sum + memory.emotionalImpact.valence, 0) / this.memories.length,
      oldestMemoryAgeDays: Math.floor((nowMs - Math.min(...stamps)) / MS_PER_DAY),
      newestMemoryAgeHours: (nowMs - Math.max(...stamps)) / MS_PER_HOUR,
      contextBreakdown,
    };
  }

  getMemoryCount(): number {
    return this.memories.length;
  }

  flagPlayer(flag: PlayerFlag): void {
    this.playerFlags.add(flag);
  }

  hasPlayerFlag(flag: PlayerFlag): boolean {
    return this.playerFlags.has(flag);
  }

  getPlayerFlags(): PlayerFlag[] {
    return [...this.playerFlags];
  }

  toSnapshot(nowMs: number = this.dependencies.clock.now()): EmotionalMemorySnapshot {
    this.applyTemporalDecay(nowMs);
    return {
      memories: this.memories.map((memory) => ({
        ...memory,
        emotionalImpact: { ...memory.emotionalImpact },
        associatedPatterns: [...memory.associatedPatterns],
      })),
      playerFlags: this.getPlayerFlags(),
    };
  }

  static fromSnapshot(
    snapshot: EmotionalMemorySnapshot,
    partialDependencies: Partial<EmotionalMemoryDependencies> = {}
  ): EmotionalMemorySystem {
    const system = new EmotionalMemorySystem(partialDependencies);
    system.memories = snapshot.memories.map((memory) => ({ ...memory }));
    for (const flag of snapshot.playerFlags) {
      system.playerFlags.add(flag);
    }
    return system;
  }
}
