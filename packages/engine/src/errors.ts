export type EngineErrorKind =
  | 'validation'
  | 'io_failure'
  | 'concurrency_overflow'
  | 'out_of_order'
  | 'numeric_instability';

export class PersonalityValidationError extends Error {
  readonly kind: EngineErrorKind = 'validation';
  readonly path: string;

  constructor(path: string, message: string) {
    super(`${path} ${message}`);
    this.name = 'PersonalityValidationError';
    this.path = path;
  }
}

export class PersistenceIOError extends Error {
  readonly kind: EngineErrorKind = 'io_failure';
  readonly operation: 'save' | 'load' | 'list' | 'delete';
  readonly causeValue: unknown;

  constructor(operation: 'save' | 'load' | 'list' | 'delete', causeValue: unknown, message?: string) {
    super(message ?? `Snapshot ${operation} failed`);
    this.name = 'PersistenceIOError';
    this.operation = operation;
    this.causeValue = causeValue;
  }
}

export class QueueOverflowError extends Error {
  readonly kind: EngineErrorKind = 'concurrency_overflow';
  readonly depth: number;
  readonly limit: number;

  constructor(depth: number, limit: number) {
    super(`Action queue depth ${depth} exceeds limit ${limit}`);
    this.name = 'QueueOverflowError';
    this.depth = depth;
    this.limit = limit;
  }
}

export class OutOfOrderActionError extends Error {
  readonly kind: EngineErrorKind = 'out_of_order';
  readonly actionId: string;

  constructor(actionId: string, actionIso: string, lastProcessedIso: string) {
    super(`Action ${actionId} at ${actionIso} precedes last processed action at ${lastProcessedIso}`);
    this.name = 'OutOfOrderActionError';
    this.actionId = actionId;
  }
}

export class NumericInstabilityError extends Error {
  readonly kind: EngineErrorKind = 'numeric_instability';
  readonly field: string;

  constructor(field: string, value: number) {
    super(`Non-finite value for ${field}: ${String(value)}`);
    this.name = 'NumericInstabilityError';
    this.field = field;
  }
}
