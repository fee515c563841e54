export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  debug: (message: string, payload?: Record<string, unknown>) => void;
  info: (message: string, payload?: Record<string, unknown>) => void;
  warn: (message: string, payload?: Record<string, unknown>) => void;
  error: (message: string, payload?: Record<string, unknown>) => void;
}

const levelRank: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const isLogLevel = (value: string): value is LogLevel => {
  return Object.prototype.hasOwnProperty.call(levelRank, value);
};

export const resolveLogLevel = (raw: string | undefined, fallback: LogLevel = 'info'): LogLevel => {
  const candidate = (raw ?? '').trim().toLowerCase();
  return isLogLevel(candidate) ? candidate : fallback;
};

let defaultLevel: LogLevel = resolveLogLevel(
  typeof process !== 'undefined' ? process.env.LOG_LEVEL : undefined
);

export const setDefaultLogLevel = (level: LogLevel): void => {
  defaultLevel = level;
};

export const createLogger = (scope: string, level?: LogLevel): Logger => {
  const tag = `[${scope}]`;
  const enabled = (target: LogLevel): boolean => levelRank[target] >= levelRank[level ?? defaultLevel];

  const emit = (
    target: Exclude<LogLevel, 'silent'>,
    write: (...args: unknown[]) => void,
    message: string,
    payload?: Record<string, unknown>
  ): void => {
    if (!enabled(target)) return;
    if (payload) {
      write(tag, message, payload);
      return;
    }
    write(tag, message);
  };

  return {
    debug: (message, payload) => emit('debug', console.debug, message, payload),
    info: (message, payload) => emit('info', console.info, message, payload),
    warn: (message, payload) => emit('warn', console.warn, message, payload),
    error: (message, payload) => emit('error', console.error, message, payload),
  };
};
