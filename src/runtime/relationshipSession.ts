import { v4 as uuidv4 } from 'uuid';
import { createStore, type StoreApi } from 'zustand/vanilla';
import {
  createDefaultManager,
  createLogger,
  createSnapshotDocument,
  systemClock,
  type ActionMetadataValue,
  type ActionType,
  type Clock,
  type ContextType,
  type Logger,
  type PersonalityState,
  type PersonalityStateManager,
  type PlayerAction,
  type ProcessActionResult,
  type RelationshipTunables,
  type ResponseModifiers,
} from '@coparent/engine';
import { ActionQueue, type ActionQueueStatus } from './actionQueue';
import type { SnapshotLoadResult, SnapshotSaveResult, SnapshotStore } from './snapshotStore';

export interface PlayerActionInput {
  id?: string;
  actionType: ActionType;
  context: ContextType;
  valence: number;
  timestampIso?: string;
  metadata?: Record<string, ActionMetadataValue>;
}

export interface RelationshipSessionState {
  state: PersonalityState;
  modifiers: ResponseModifiers;
  lastActionId: string | null;
  pendingSaves: number;
}

export interface RelationshipSessionOptions {
  snapshotStore: SnapshotStore;
  tunables: RelationshipTunables;
  manager?: PersonalityStateManager;
}

interface RelationshipSessionDependencies {
  clock: Clock;
  logger: Logger;
}

const defaultDependencies = (): RelationshipSessionDependencies => ({
  clock: systemClock,
  logger: createLogger('relationship-session'),
});

export const createPlayerAction = (input: PlayerActionInput, clock: Clock = systemClock): PlayerAction => {
  return {
    id: input.id ?? uuidv4(),
    actionType: input.actionType,
    context: input.context,
    valence: input.valence,
    timestampIso: input.timestampIso ?? new Date(clock.now()).toISOString(),
    metadata: { ...(input.metadata ?? {}) },
  };
};

/**
 * One relationship: the manager, its action queue, ordered saves and the
 * published read model for the dialogue layer.
 */
export class RelationshipSession {
  readonly store: StoreApi<RelationshipSessionState>;
  private readonly dependencies: RelationshipSessionDependencies;
  private readonly options: RelationshipSessionOptions;
  private readonly queue: ActionQueue<ProcessActionResult>;
  private manager: PersonalityStateManager;
  private saveChain: Promise<unknown> = Promise.resolve();

  constructor(options: RelationshipSessionOptions, partialDependencies: Partial<RelationshipSessionDependencies> = {}) {
    this.dependencies = {
      ...defaultDependencies(),
      ...partialDependencies,
    };
    this.options = options;
    this.manager =
      options.manager ?? createDefaultManager({ clock: this.dependencies.clock, tunables: options.tunables });
    this.queue = new ActionQueue((action) => this.apply(action), options.tunables.queueDepth, {
      logger: this.dependencies.logger,
    });
    this.store = createStore<RelationshipSessionState>()(() => ({
      state: this.manager.getCurrentState(),
      modifiers: this.manager.getResponseModifiers(),
      lastActionId: null,
      pendingSaves: 0,
    }));
  }

  private apply(action: PlayerAction): ProcessActionResult {
    const result = this.manager.processAction(action);
    if (result.accepted) {
      this.store.setState({
        state: result.state,
        modifiers: result.modifiers,
        lastActionId: action.id,
      });
    }
    return result;
  }

  submit(input: PlayerActionInput): Promise<ProcessActionResult> {
    return this.queue.enqueue(createPlayerAction(input, this.dependencies.clock));
  }

  submitBatch(inputs: ReadonlyArray<PlayerActionInput>): Promise<ProcessActionResult[]> {
    return this.queue.enqueueBatch(inputs.map((input) => createPlayerAction(input, this.dependencies.clock)));
  }

  /** Captures the current state now and writes it after any earlier saves. */
  requestSave(slot: string): Promise<SnapshotSaveResult> {
    const document = createSnapshotDocument(this.manager, new Date(this.dependencies.clock.now()).toISOString());
    this.adjustPendingSaves(1);

    const pending = this.saveChain.then(() => this.options.snapshotStore.save(slot, document));
    this.saveChain = pending.then(
      () => this.adjustPendingSaves(-1),
      (error: unknown) => {
        this.adjustPendingSaves(-1);
        this.dependencies.logger.error('Snapshot save raised', {
          slot,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    );
    return pending;
  }

  async flushSaves(): Promise<void> {
    await this.saveChain;
  }

  /**
   * Replaces the manager with the slot's state. Actions submitted while the load
   * is pending are held and applied to the loaded manager.
   */
  async load(slot: string): Promise<SnapshotLoadResult> {
    this.queue.hold();
    try {
      await this.flushSaves();
      const result = await this.options.snapshotStore.load(slot, {
        clock: this.dependencies.clock,
        tunables: this.options.tunables,
      });
      this.manager = result.manager;
      this.store.setState({
        state: this.manager.getCurrentState(),
        modifiers: this.manager.getResponseModifiers(),
        lastActionId: null,
      });
      return result;
    } finally {
      this.queue.release();
    }
  }

  getCurrentState(): PersonalityState {
    return this.manager.getCurrentState();
  }

  getResponseModifiers(): ResponseModifiers {
    return this.manager.getResponseModifiers();
  }

  getQueueStatus(): ActionQueueStatus {
    return this.queue.getStatus();
  }

  getManager(): PersonalityStateManager {
    return this.manager;
  }

  private adjustPendingSaves(delta: number): void {
    this.store.setState((current) => ({ pendingSaves: Math.max(0, current.pendingSaves + delta) }));
  }
}
