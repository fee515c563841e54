import { readFile } from 'node:fs/promises';
import Ajv from 'ajv';
import { parse as parseYaml } from 'yaml';
import {
  createLogger,
  resolveLogLevel,
  resolveTunables,
  type LogLevel,
  type Logger,
  type RelationshipTunables,
  type SnapshotEncoding,
} from '@coparent/engine';

export const DEFAULT_CONFIG_PATH = 'config/relationship.yaml';

export interface RelationshipConfig {
  logLevel: LogLevel;
  saveDirectory: string;
  snapshotEncoding: SnapshotEncoding;
  tunables: RelationshipTunables;
}

interface RelationshipConfigFile {
  log_level?: 'debug' | 'info' | 'warn' | 'error' | 'silent';
  save_directory?: string;
  snapshot_encoding?: SnapshotEncoding;
  tunables?: {
    pattern_window_days?: number;
    pattern_min_occurrences?: number;
    pattern_daily_decay?: number;
    pattern_break_threshold?: number;
    memory_capacity?: number;
    withdrawal_threshold?: number;
    withdrawal_exit_threshold?: number;
    high_trust_resilience?: number;
    resentment_dampening?: number;
    emotional_safety_attenuation?: number;
    recovery_step_per_interaction?: number;
    queue_depth?: number;
    history_retention_days?: number;
  };
}

export interface ConfigError {
  path: string;
  message: string;
}

export type RelationshipConfigParseResult =
  | {
      ok: true;
      config: RelationshipConfig;
    }
  | {
      ok: false;
      errors: ConfigError[];
    };

const positiveInteger = { type: 'integer', minimum: 1 } as const;
const unitInterval = { type: 'number', minimum: 0, maximum: 1 } as const;
const scoreThreshold = { type: 'number', minimum: 0, maximum: 100 } as const;

export const relationshipConfigSchema = {
  $id: 'coparent-relationship/config.json',
  type: 'object',
  additionalProperties: false,
  properties: {
    log_level: { type: 'string', enum: ['debug', 'info', 'warn', 'error', 'silent'] },
    save_directory: { type: 'string', minLength: 1 },
    snapshot_encoding: { type: 'string', enum: ['json', 'yaml'] },
    tunables: {
      type: 'object',
      additionalProperties: false,
      properties: {
        pattern_window_days: positiveInteger,
        pattern_min_occurrences: positiveInteger,
        pattern_daily_decay: unitInterval,
        pattern_break_threshold: positiveInteger,
        memory_capacity: positiveInteger,
        withdrawal_threshold: scoreThreshold,
        withdrawal_exit_threshold: scoreThreshold,
        high_trust_resilience: unitInterval,
        resentment_dampening: unitInterval,
        emotional_safety_attenuation: unitInterval,
        recovery_step_per_interaction: unitInterval,
        queue_depth: positiveInteger,
        history_retention_days: positiveInteger,
      },
    },
  },
} as const;

const ajv = new Ajv({ allErrors: true, strict: false });
const validateConfigFile = ajv.compile<RelationshipConfigFile>(relationshipConfigSchema);

export const defaultRelationshipConfig = (): RelationshipConfig => ({
  logLevel: 'info',
  saveDirectory: 'saves',
  snapshotEncoding: 'json',
  tunables: resolveTunables(),
});

const toConfig = (file: RelationshipConfigFile): RelationshipConfig => {
  const defaults = defaultRelationshipConfig();
  const tunables = file.tunables ?? {};
  const base = defaults.tunables;

  return {
    logLevel: file.log_level ?? defaults.logLevel,
    saveDirectory: file.save_directory ?? defaults.saveDirectory,
    snapshotEncoding: file.snapshot_encoding ?? defaults.snapshotEncoding,
    tunables: resolveTunables({
      patternWindowDays: tunables.pattern_window_days ?? base.patternWindowDays,
      patternMinOccurrences: tunables.pattern_min_occurrences ?? base.patternMinOccurrences,
      patternDailyDecay: tunables.pattern_daily_decay ?? base.patternDailyDecay,
      patternBreakThreshold: tunables.pattern_break_threshold ?? base.patternBreakThreshold,
      memoryCapacity: tunables.memory_capacity ?? base.memoryCapacity,
      withdrawalThreshold: tunables.withdrawal_threshold ?? base.withdrawalThreshold,
      withdrawalExitThreshold: tunables.withdrawal_exit_threshold ?? base.withdrawalExitThreshold,
      highTrustResilience: tunables.high_trust_resilience ?? base.highTrustResilience,
      resentmentDampening: tunables.resentment_dampening ?? base.resentmentDampening,
      emotionalSafetyAttenuation: tunables.emotional_safety_attenuation ?? base.emotionalSafetyAttenuation,
      recoveryStepPerInteraction: tunables.recovery_step_per_interaction ?? base.recoveryStepPerInteraction,
      queueDepth: tunables.queue_depth ?? base.queueDepth,
      historyRetentionDays: tunables.history_retention_days ?? base.historyRetentionDays,
    }),
  };
};

export const parseRelationshipConfig = (content: string): RelationshipConfigParseResult => {
  try {
    const parsed: unknown = parseYaml(content) ?? {};

    if (!validateConfigFile(parsed)) {
      return {
        ok: false,
        errors: (validateConfigFile.errors ?? []).map((error) => ({
          path: error.instancePath && error.instancePath.length > 0 ? error.instancePath : '/',
          message: error.message ?? 'invalid value',
        })),
      };
    }

    return { ok: true, config: toConfig(parsed) };
  } catch (error) {
    return {
      ok: false,
      errors: [
        {
          path: '/',
          message: error instanceof Error ? error.message : 'YAML parse error',
        },
      ],
    };
  }
};

const applyEnvironment = (
  config: RelationshipConfig,
  env: Record<string, string | undefined>,
  logger: Logger
): RelationshipConfig => {
  const next: RelationshipConfig = {
    ...config,
    tunables: { ...config.tunables },
  };

  if (env.LOG_LEVEL) {
    next.logLevel = resolveLogLevel(env.LOG_LEVEL, config.logLevel);
  }

  const saveDirectory = env.SAVE_DIR?.trim();
  if (saveDirectory) {
    next.saveDirectory = saveDirectory;
  }

  if (env.QUEUE_DEPTH) {
    const depth = Number.parseInt(env.QUEUE_DEPTH, 10);
    if (Number.isInteger(depth) && depth > 0) {
      next.tunables.queueDepth = depth;
    } else {
      logger.warn('Ignoring invalid QUEUE_DEPTH', { value: env.QUEUE_DEPTH });
    }
  }

  return next;
};

export interface LoadRelationshipConfigOptions {
  env?: Record<string, string | undefined>;
  readText?: (path: string) => Promise<string>;
  logger?: Logger;
}

const isMissingFile = (error: unknown): boolean => {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
};

/** File values override defaults; LOG_LEVEL, SAVE_DIR and QUEUE_DEPTH override the file. */
export const loadRelationshipConfig = async (
  options: LoadRelationshipConfigOptions = {}
): Promise<RelationshipConfig> => {
  const env = options.env ?? process.env;
  const readText = options.readText ?? ((path: string) => readFile(path, 'utf8'));
  const logger = options.logger ?? createLogger('config');
  const path = env.RELATIONSHIP_CONFIG_PATH?.trim() || DEFAULT_CONFIG_PATH;

  let config = defaultRelationshipConfig();

  try {
    const parsed = parseRelationshipConfig(await readText(path));
    if (parsed.ok) {
      config = parsed.config;
    } else {
      logger.warn('Invalid relationship config, using defaults', { path, errors: parsed.errors });
    }
  } catch (error) {
    if (isMissingFile(error)) {
      logger.debug('No relationship config file, using defaults', { path });
    } else {
      logger.warn('Relationship config unreadable, using defaults', {
        path,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  return applyEnvironment(config, env, logger);
};
