import Ajv from 'ajv';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import { isActionType, isPatternType } from '../personality/actionCatalog';
import { EmotionalMemorySystem } from '../personality/emotionalMemory';
import { PersonalityStateManager } from '../personality/personalityStateManager';
import { PatternTracker } from '../personality/patternTracker';
import { TrustDynamicsEngine } from '../personality/trustDynamics';
import { DEFAULT_TUNABLES, type RelationshipTunables } from '../personality/tunables';
import { systemClock } from '../personality/numeric';
import type { Logger } from '../observability/logger';
import type {
  ActionMetadataValue,
  ActionType,
  ApologyRecord,
  ApologyType,
  Clock,
  ContextCategory,
  ContextType,
  EmotionType,
  PatternType,
  PlayerFlag,
} from '../personality/types';

export const SNAPSHOT_VERSION = '1.0';

export interface SnapshotPattern {
  pattern_type: PatternType;
  /** Ids of the actions in action_history. */
  occurrences: string[];
  frequency: number;
  weight: number;
  first_seen: string;
  last_seen: string;
}

export interface SnapshotMemory {
  id: string;
  emotional_impact: {
    primary_emotion: EmotionType;
    intensity: number;
    valence: number;
    context_category: ContextCategory;
  };
  timestamp: string;
  context: ContextType;
  weight: number;
  associated_patterns: PatternType[];
}

export interface SnapshotApologyRecord {
  effectiveness: number;
  last_recurrence: string | null;
  last_apology_type: ApologyType;
  last_apology: string;
  recurrence_count: number;
}

export interface SnapshotAction {
  id: string;
  action_type: ActionType;
  context: ContextType;
  valence: number;
  timestamp: string;
  metadata: Record<string, ActionMetadataValue>;
}

export interface SnapshotEngineState {
  pattern_opposing_counts: Record<string, number>;
  pattern_suppressed_since: Record<string, string>;
  pattern_positive_streak: number;
  trust_withdrawn?: boolean;
  positive_windows: Record<string, { start: string; first_impact: number }>;
  last_resentment_decay: string | null;
  consecutive_initiation_accepts: number;
  last_processed: string | null;
}

export interface SnapshotDocumentV1 {
  version: '1.0';
  timestamp: string;
  trust_score: number;
  resentment_score: number;
  emotional_safety: number;
  parenting_unity: number;
  patterns: SnapshotPattern[];
  emotional_memories: SnapshotMemory[];
  apology_effectiveness: Partial<Record<ActionType, SnapshotApologyRecord>>;
  action_history?: SnapshotAction[];
  player_flags?: PlayerFlag[];
  engine_state?: SnapshotEngineState;
}

export interface SnapshotFormatError {
  path: string;
  message: string;
}

export type SnapshotParseResult =
  | {
      ok: true;
      document: SnapshotDocumentV1;
    }
  | {
      ok: false;
      errors: SnapshotFormatError[];
    };

export type SnapshotEncoding = 'json' | 'yaml';

const score = { type: 'number', minimum: 0, maximum: 100 } as const;
const unit = { type: 'number', minimum: 0, maximum: 1 } as const;
const signedUnit = { type: 'number', minimum: -1, maximum: 1 } as const;
const ISO_TIMESTAMP_FORMAT = 'iso-timestamp';
const ISO_TIMESTAMP_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:\d{2})$/;

const isoString = { type: 'string', format: ISO_TIMESTAMP_FORMAT } as const;
const nullableIsoString = { type: ['string', 'null'], format: ISO_TIMESTAMP_FORMAT } as const;

const actionTypeEnum = [
  'conflict_engage',
  'conflict_avoid',
  'parenting_present',
  'parenting_absent',
  'control_taking',
  'supportive_autonomy',
  'empathy_shown',
  'empathy_lacking',
  'public_support',
  'public_contradiction',
  'private_correction',
  'stress_acknowledged',
  'stress_dismissed',
  'apology',
  'initiation_accepted',
  'initiation_ignored',
] as const;

const patternTypeEnum = [
  'consistent_presence',
  'sporadic_involvement',
  'conflict_engagement',
  'repeated_avoidance',
  'control_taking',
  'supportive_autonomy',
  'empathetic_support',
  'emotional_dismissal',
  'public_unity',
  'public_undermining',
] as const;

export const snapshotDocumentV1Schema = {
  $id: 'coparent-relationship/snapshot-v1.json',
  type: 'object',
  required: [
    'version',
    'timestamp',
    'trust_score',
    'resentment_score',
    'emotional_safety',
    'parenting_unity',
    'patterns',
    'emotional_memories',
    'apology_effectiveness',
  ],
  properties: {
    version: { type: 'string', const: SNAPSHOT_VERSION },
    timestamp: isoString,
    trust_score: score,
    resentment_score: score,
    emotional_safety: score,
    parenting_unity: score,
    patterns: {
      type: 'array',
      items: {
        type: 'object',
        required: ['pattern_type', 'occurrences', 'frequency', 'weight', 'first_seen', 'last_seen'],
        properties: {
          pattern_type: { type: 'string', enum: patternTypeEnum },
          occurrences: { type: 'array', items: { type: 'string' } },
          frequency: { type: 'number', minimum: 0 },
          weight: unit,
          first_seen: isoString,
          last_seen: isoString,
        },
      },
    },
    emotional_memories: {
      type: 'array',
      items: {
        type: 'object',
        required: ['id', 'emotional_impact', 'timestamp', 'context', 'weight', 'associated_patterns'],
        properties: {
          id: { type: 'string', minLength: 1 },
          emotional_impact: {
            type: 'object',
            required: ['primary_emotion', 'intensity', 'valence', 'context_category'],
            properties: {
              primary_emotion: {
                type: 'string',
                enum: [
                  'joy',
                  'sadness',
                  'anger',
                  'fear',
                  'trust',
                  'love',
                  'guilt',
                  'anxiety',
                  'frustration',
                  'contentment',
                  'resentment',
                  'calm',
                  'stress',
                  'disappointment',
                  'hope',
                ],
              },
              intensity: unit,
              valence: signedUnit,
              context_category: { type: 'string', enum: ['support', 'conflict', 'parenting', 'intimacy'] },
            },
          },
          timestamp: isoString,
          context: { type: 'string', enum: ['public', 'private'] },
          weight: unit,
          associated_patterns: { type: 'array', items: { type: 'string', enum: patternTypeEnum } },
        },
      },
    },
    apology_effectiveness: {
      type: 'object',
      propertyNames: { enum: actionTypeEnum },
      additionalProperties: {
        type: 'object',
        required: ['effectiveness', 'last_recurrence', 'last_apology_type', 'last_apology', 'recurrence_count'],
        properties: {
          effectiveness: { type: 'number', minimum: 0.1, maximum: 1 },
          last_recurrence: nullableIsoString,
          last_apology_type: { type: 'string', enum: ['defensive', 'generic', 'genuine', 'action_oriented'] },
          last_apology: isoString,
          recurrence_count: { type: 'integer', minimum: 0 },
        },
      },
    },
    action_history: {
      type: 'array',
      items: {
        type: 'object',
        required: ['id', 'action_type', 'context', 'valence', 'timestamp', 'metadata'],
        properties: {
          id: { type: 'string', minLength: 1 },
          action_type: { type: 'string', enum: actionTypeEnum },
          context: { type: 'string', enum: ['public', 'private'] },
          valence: signedUnit,
          timestamp: isoString,
          metadata: {
            type: 'object',
            additionalProperties: { type: ['string', 'number', 'boolean'] },
          },
        },
      },
    },
    player_flags: { type: 'array', items: { type: 'string', enum: ['unreliable'] } },
    engine_state: {
      type: 'object',
      required: [
        'pattern_opposing_counts',
        'pattern_suppressed_since',
        'pattern_positive_streak',
        'positive_windows',
        'last_resentment_decay',
        'consecutive_initiation_accepts',
        'last_processed',
      ],
      properties: {
        pattern_opposing_counts: { type: 'object', additionalProperties: { type: 'integer', minimum: 0 } },
        pattern_suppressed_since: { type: 'object', additionalProperties: isoString },
        pattern_positive_streak: { type: 'integer', minimum: 0 },
        trust_withdrawn: { type: 'boolean' },
        positive_windows: {
          type: 'object',
          additionalProperties: {
            type: 'object',
            required: ['start', 'first_impact'],
            properties: {
              start: isoString,
              first_impact: { type: 'number' },
            },
          },
        },
        last_resentment_decay: nullableIsoString,
        consecutive_initiation_accepts: { type: 'integer', minimum: 0 },
        last_processed: nullableIsoString,
      },
    },
  },
} as const;

const ajv = new Ajv({ allErrors: true, strict: false });
ajv.addFormat(ISO_TIMESTAMP_FORMAT, {
  type: 'string',
  validate: (value: string) => ISO_TIMESTAMP_PATTERN.test(value) && Number.isFinite(Date.parse(value)),
});
const validateSnapshotDocument = ajv.compile<SnapshotDocumentV1>(snapshotDocumentV1Schema);

const toErrors = (rawErrors: ReadonlyArray<{ instancePath?: string; message?: string }>): SnapshotFormatError[] => {
  return rawErrors.map((entry) => ({
    path: entry.instancePath && entry.instancePath.length > 0 ? entry.instancePath : '/',
    message: entry.message ?? 'invalid value',
  }));
};

const definedEntries = <V>(record: Partial<Record<string, V>>): Record<string, V> => {
  return Object.fromEntries(
    Object.entries(record).filter((entry): entry is [string, V] => entry[1] !== undefined)
  );
};

/** Documented fallback scores used whenever a snapshot cannot be trusted. */
export const DEFAULT_SNAPSHOT_SCORES = {
  trustScore: 60,
  resentmentScore: 10,
  emotionalSafety: 50,
  parentingUnity: 70,
} as const;

export const createSnapshotDocument = (
  manager: PersonalityStateManager,
  timestampIso: string = new Date().toISOString()
): SnapshotDocumentV1 => {
  const tracker = manager.getPatternTracker().toSnapshot();
  const atMs = Date.parse(timestampIso);
  const memory = manager.getEmotionalMemory().toSnapshot(Number.isFinite(atMs) ? atMs : undefined);
  const trust = manager.getTrustEngine().toSnapshot();
  const engine = manager.getEngineState();

  const apologyEffectiveness: Partial<Record<ActionType, SnapshotApologyRecord>> = {};
  for (const [behavior, record] of Object.entries(trust.apologyRecords)) {
    if (!record || !isActionType(behavior)) continue;
    apologyEffectiveness[behavior] = {
      effectiveness: record.effectiveness,
      last_recurrence: record.lastRecurrenceIso,
      last_apology_type: record.lastApologyType,
      last_apology: record.lastApologyIso,
      recurrence_count: record.recurrenceCount,
    };
  }

  return {
    version: SNAPSHOT_VERSION,
    timestamp: timestampIso,
    trust_score: trust.trustScore,
    resentment_score: trust.resentmentScore,
    emotional_safety: engine.emotionalSafety,
    parenting_unity: engine.parentingUnity,
    patterns: tracker.patterns.map((pattern) => ({
      pattern_type: pattern.patternType,
      occurrences: [...pattern.occurrenceIds],
      frequency: pattern.frequency,
      weight: pattern.weight,
      first_seen: pattern.firstSeenIso,
      last_seen: pattern.lastSeenIso,
    })),
    emotional_memories: memory.memories.map((entry) => ({
      id: entry.id,
      emotional_impact: {
        primary_emotion: entry.emotionalImpact.primaryEmotion,
        intensity: entry.emotionalImpact.intensity,
        valence: entry.emotionalImpact.valence,
        context_category: entry.emotionalImpact.contextCategory,
      },
      timestamp: entry.timestampIso,
      context: entry.context,
      weight: entry.weight,
      associated_patterns: [...entry.associatedPatterns],
    })),
    apology_effectiveness: apologyEffectiveness,
    action_history: tracker.history.map((action) => ({
      id: action.id,
      action_type: action.actionType,
      context: action.context,
      valence: action.valence,
      timestamp: action.timestampIso,
      metadata: { ...action.metadata },
    })),
    player_flags: memory.playerFlags,
    engine_state: {
      pattern_opposing_counts: definedEntries(tracker.opposingCounts),
      pattern_suppressed_since: definedEntries(tracker.suppressedSinceIso),
      pattern_positive_streak: tracker.positiveStreak,
      trust_withdrawn: trust.withdrawn,
      positive_windows: Object.fromEntries(
        Object.entries(trust.positiveWindows).map(([kind, window]) => [
          kind,
          { start: window.startIso, first_impact: window.firstImpact },
        ])
      ),
      last_resentment_decay: trust.lastDecayIso,
      consecutive_initiation_accepts: engine.consecutiveInitiationAccepts,
      last_processed: engine.lastProcessedIso,
    },
  };
};

// Pattern occurrences refer to history entries by id.
const duplicateActionIds = (history: ReadonlyArray<SnapshotAction>): SnapshotFormatError[] => {
  const seen = new Set<string>();
  const errors: SnapshotFormatError[] = [];
  history.forEach((action, index) => {
    if (seen.has(action.id)) {
      errors.push({ path: `/action_history/${index}/id`, message: `duplicate action id ${action.id}` });
    }
    seen.add(action.id);
  });
  return errors;
};

/** Validates an already-decoded value against the versioned schema. */
export const parseSnapshotDocument = (value: unknown): SnapshotParseResult => {
  if (!validateSnapshotDocument(value)) {
    return {
      ok: false,
      errors: toErrors(
        (validateSnapshotDocument.errors ?? []).map((error) => ({
          instancePath: error.instancePath,
          message: error.message,
        }))
      ),
    };
  }

  const duplicates = duplicateActionIds(value.action_history ?? []);
  if (duplicates.length > 0) {
    return { ok: false, errors: duplicates };
  }

  return { ok: true, document: value };
};

export const encodeSnapshot = (document: SnapshotDocumentV1, encoding: SnapshotEncoding = 'json'): string => {
  if (encoding === 'yaml') {
    return stringifyYaml(document);
  }
  return `${JSON.stringify(document, null, 2)}\n`;
};

export const decodeSnapshot = (content: string, encoding: SnapshotEncoding = 'json'): SnapshotParseResult => {
  try {
    const parsed: unknown = encoding === 'yaml' ? parseYaml(content) : JSON.parse(content);
    return parseSnapshotDocument(parsed);
  } catch (error) {
    return {
      ok: false,
      errors: [
        {
          path: '/',
          message: error instanceof Error ? error.message : 'Snapshot decode error',
        },
      ],
    };
  }
};

export interface RestoreDependencies {
  clock: Clock;
  tunables: RelationshipTunables;
  logger?: Logger;
}

const defaultRestoreDependencies: RestoreDependencies = {
  clock: systemClock,
  tunables: DEFAULT_TUNABLES,
};

export const createDefaultManager = (
  partialDependencies: Partial<RestoreDependencies> = {}
): PersonalityStateManager => {
  const dependencies = { ...defaultRestoreDependencies, ...partialDependencies };
  return new PersonalityStateManager(
    {
      trustEngine: new TrustDynamicsEngine(
        {
          trustScore: DEFAULT_SNAPSHOT_SCORES.trustScore,
          resentmentScore: DEFAULT_SNAPSHOT_SCORES.resentmentScore,
        },
        dependencies
      ),
      engineState: {
        emotionalSafety: DEFAULT_SNAPSHOT_SCORES.emotionalSafety,
        parentingUnity: DEFAULT_SNAPSHOT_SCORES.parentingUnity,
      },
    },
    dependencies
  );
};

/** Rebuilds a manager from a document that already passed parseSnapshotDocument. */
export const restoreFromSnapshot = (
  document: SnapshotDocumentV1,
  partialDependencies: Partial<RestoreDependencies> = {}
): PersonalityStateManager => {
  const dependencies = { ...defaultRestoreDependencies, ...partialDependencies };
  const engineState = document.engine_state;

  const history = (document.action_history ?? []).map((action) => ({
    id: action.id,
    actionType: action.action_type,
    context: action.context,
    valence: action.valence,
    timestampIso: action.timestamp,
    metadata: { ...action.metadata },
  }));

  const patternTracker = PatternTracker.fromSnapshot(
    {
      history,
      patterns: document.patterns.map((pattern) => ({
        patternType: pattern.pattern_type,
        occurrenceIds: [...pattern.occurrences],
        frequency: pattern.frequency,
        weight: pattern.weight,
        firstSeenIso: pattern.first_seen,
        lastSeenIso: pattern.last_seen,
      })),
      opposingCounts: Object.fromEntries(
        Object.entries(engineState?.pattern_opposing_counts ?? {}).filter(([pattern]) => isPatternType(pattern))
      ),
      suppressedSinceIso: Object.fromEntries(
        Object.entries(engineState?.pattern_suppressed_since ?? {}).filter(([pattern]) => isPatternType(pattern))
      ),
      positiveStreak: engineState?.pattern_positive_streak ?? 0,
    },
    { clock: dependencies.clock, tunables: dependencies.tunables }
  );

  const emotionalMemory = EmotionalMemorySystem.fromSnapshot(
    {
      memories: document.emotional_memories.map((entry) => ({
        id: entry.id,
        emotionalImpact: {
          primaryEmotion: entry.emotional_impact.primary_emotion,
          intensity: entry.emotional_impact.intensity,
          valence: entry.emotional_impact.valence,
          contextCategory: entry.emotional_impact.context_category,
        },
        timestampIso: entry.timestamp,
        context: entry.context,
        weight: entry.weight,
        associatedPatterns: [...entry.associated_patterns],
      })),
      playerFlags: [...(document.player_flags ?? [])],
    },
    dependencies
  );

  const apologyRecords: Partial<Record<ActionType, ApologyRecord>> = {};
  for (const [behavior, record] of Object.entries(document.apology_effectiveness)) {
    if (!record || !isActionType(behavior)) continue;
    apologyRecords[behavior] = {
      effectiveness: record.effectiveness,
      lastRecurrenceIso: record.last_recurrence,
      lastApologyType: record.last_apology_type,
      lastApologyIso: record.last_apology,
      recurrenceCount: record.recurrence_count,
    };
  }

  const trustEngine = TrustDynamicsEngine.fromSnapshot(
    {
      trustScore: document.trust_score,
      resentmentScore: document.resentment_score,
      apologyRecords,
      positiveWindows: Object.fromEntries(
        Object.entries(engineState?.positive_windows ?? {}).map(([kind, window]) => [
          kind,
          { startIso: window.start, firstImpact: window.first_impact },
        ])
      ),
      lastDecayIso: engineState?.last_resentment_decay ?? null,
      withdrawn: engineState?.trust_withdrawn ?? false,
    },
    dependencies
  );

  return new PersonalityStateManager(
    {
      patternTracker,
      emotionalMemory,
      trustEngine,
      engineState: {
        emotionalSafety: document.emotional_safety,
        parentingUnity: document.parenting_unity,
        consecutiveInitiationAccepts: engineState?.consecutive_initiation_accepts ?? 0,
        lastProcessedIso: engineState?.last_processed ?? null,
      },
    },
    dependencies
  );
};
