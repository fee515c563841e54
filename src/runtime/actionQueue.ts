import { QueueOverflowError, createLogger, toEpochMs, type Logger, type PlayerAction } from '@coparent/engine';

export interface ActionQueueStatus {
  pending: number;
  processed: number;
  rejected: number;
  overflowCount: number;
  limit: number;
}

interface PendingAction<TResult> {
  action: PlayerAction;
  resolve: (result: TResult) => void;
  reject: (error: unknown) => void;
}

interface ActionQueueDependencies {
  logger: Logger;
  schedule: (task: () => void) => void;
}

const defaultDependencies = (): ActionQueueDependencies => ({
  logger: createLogger('action-queue'),
  schedule: (task) => queueMicrotask(task),
});

/**
 * Single-consumer queue in front of the state manager. Actions enqueued before a
 * drain runs are applied together in timestamp order.
 */
export class ActionQueue<TResult> {
  private readonly dependencies: ActionQueueDependencies;
  private pending: PendingAction<TResult>[] = [];
  private drainScheduled = false;
  private holds = 0;
  private processed = 0;
  private rejected = 0;
  private overflowCount = 0;

  constructor(
    private readonly processor: (action: PlayerAction) => TResult,
    private readonly limit = 10,
    partialDependencies: Partial<ActionQueueDependencies> = {}
  ) {
    this.dependencies = {
      ...defaultDependencies(),
      ...partialDependencies,
    };
  }

  enqueue(action: PlayerAction): Promise<TResult> {
    if (this.pending.length >= this.limit) {
      this.overflowCount += 1;
      const overflow = new QueueOverflowError(this.pending.length + 1, this.limit);
      this.dependencies.logger.warn('Action queue over capacity', {
        depth: overflow.depth,
        limit: overflow.limit,
        actionId: action.id,
      });
    }

    return new Promise<TResult>((resolve, reject) => {
      this.pending.push({ action, resolve, reject });
      this.scheduleDrain();
    });
  }

  enqueueBatch(actions: ReadonlyArray<PlayerAction>): Promise<TResult[]> {
    return Promise.all(actions.map((action) => this.enqueue(action)));
  }

  getStatus(): ActionQueueStatus {
    return {
      pending: this.pending.length,
      processed: this.processed,
      rejected: this.rejected,
      overflowCount: this.overflowCount,
      limit: this.limit,
    };
  }

  /**
   * Applies everything already pending, then keeps later actions queued until
   * release(). Holds nest.
   */
  hold(): void {
    if (this.holds === 0) this.drain();
    this.holds += 1;
  }

  release(): void {
    if (this.holds === 0) return;
    this.holds -= 1;
    if (this.holds === 0 && this.pending.length > 0) this.scheduleDrain();
  }

  isHeld(): boolean {
    return this.holds > 0;
  }

  private scheduleDrain(): void {
    if (this.drainScheduled || this.holds > 0) return;
    this.drainScheduled = true;
    this.dependencies.schedule(() => this.drain());
  }

  private drain(): void {
    this.drainScheduled = false;
    if (this.holds > 0) return;
    const batch = this.pending
      .splice(0)
      .sort((left, right) => toEpochMs(left.action.timestampIso) - toEpochMs(right.action.timestampIso));

    for (const entry of batch) {
      try {
        const result = this.processor(entry.action);
        this.processed += 1;
        entry.resolve(result);
      } catch (error) {
        this.rejected += 1;
        entry.reject(error);
      }
    }
  }
}
