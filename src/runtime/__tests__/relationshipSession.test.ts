import { describe, expect, it, vi } from 'vitest';
import { DEFAULT_TUNABLES, OutOfOrderActionError, type Logger } from '@coparent/engine';
import { RelationshipSession, createPlayerAction } from '../relationshipSession';
import { SnapshotStore, type SnapshotStorage } from '../snapshotStore';

const HOUR = 60 * 60 * 1000;
const base = Date.parse('2026-09-14T09:00:00.000Z');
const clock = { now: () => base };

const createLoggerSpy = () => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
}) satisfies Logger;

const createSession = (readGate: Promise<void> = Promise.resolve()) => {
  const files = new Map<string, string>();
  const writes: string[] = [];
  const storage: SnapshotStorage = {
    readFile: async (path) => {
      await readGate;
      const content = files.get(path);
      if (content === undefined) throw new Error(`ENOENT: ${path}`);
      return content;
    },
    writeFile: async (path, content) => {
      writes.push(path);
      files.set(path, content);
    },
    readdir: async () => [...files.keys()],
    remove: async (path) => {
      files.delete(path);
    },
    ensureDirectory: async () => undefined,
  };
  const logger = createLoggerSpy();
  const snapshotStore = new SnapshotStore({ directory: 'saves' }, { storage, logger });
  const session = new RelationshipSession({ snapshotStore, tunables: DEFAULT_TUNABLES }, { clock, logger });
  return { session, files, writes, logger };
};

const readTrust = (content: string | undefined): unknown => {
  const parsed: unknown = JSON.parse(content ?? 'null');
  if (typeof parsed !== 'object' || parsed === null || !('trust_score' in parsed)) return undefined;
  return parsed.trust_score;
};

describe('createPlayerAction', () => {
  it('fills the id and timestamp from the clock', () => {
    const action = createPlayerAction({ actionType: 'empathy_shown', context: 'private', valence: 0.5 }, clock);

    expect(action.id).toMatch(/^[0-9a-f-]{36}$/);
    expect(action.timestampIso).toBe('2026-09-14T09:00:00.000Z');
    expect(action.metadata).toEqual({});
  });
});

describe('RelationshipSession', () => {
  it('publishes the processed state to its store', async () => {
    const { session } = createSession();

    const result = await session.submit({
      id: 'support-1',
      actionType: 'public_support',
      context: 'public',
      valence: 0.8,
    });

    expect(result.accepted).toBe(true);
    expect(session.store.getState().state.trustScore).toBe(63.2);
    expect(session.store.getState().state.parentingUnity).toBe(74);
    expect(session.store.getState().lastActionId).toBe('support-1');
  });

  it('applies a batch in timestamp order', async () => {
    const { session } = createSession();

    await session.submitBatch([
      { id: 'late', actionType: 'empathy_shown', context: 'private', valence: 0.5, timestampIso: new Date(base + 2 * HOUR).toISOString() },
      { id: 'early', actionType: 'empathy_shown', context: 'private', valence: 0.5, timestampIso: new Date(base).toISOString() },
    ]);

    expect(session.getManager().getPatternTracker().getHistory().map((action) => action.id)).toEqual(['early', 'late']);
    expect(session.store.getState().lastActionId).toBe('late');
  });

  it('rejects an action older than the last processed one', async () => {
    const { session } = createSession();
    await session.submit({ actionType: 'empathy_shown', context: 'private', valence: 0.5, timestampIso: new Date(base + HOUR).toISOString() });

    await expect(
      session.submit({ actionType: 'empathy_lacking', context: 'private', valence: -0.5, timestampIso: new Date(base).toISOString() })
    ).rejects.toThrow(OutOfOrderActionError);
    expect(session.getQueueStatus().rejected).toBe(1);
    expect(session.getCurrentState().trustScore).toBe(61);
  });

  it('writes saves in the order they were requested', async () => {
    const { session, files, writes } = createSession();

    await session.submit({ actionType: 'public_support', context: 'public', valence: 0.8 });
    const first = session.requestSave('first');
    expect(session.store.getState().pendingSaves).toBe(1);

    await session.submit({
      actionType: 'empathy_shown',
      context: 'private',
      valence: 0.5,
      timestampIso: new Date(base + HOUR).toISOString(),
    });
    const second = session.requestSave('second');
    expect(session.store.getState().pendingSaves).toBe(2);

    await session.flushSaves();

    expect((await first).saved).toBe(true);
    expect((await second).saved).toBe(true);
    expect(writes).toEqual(['saves/first.json', 'saves/second.json']);
    expect(readTrust(files.get('saves/first.json'))).toBe(63.2);
    expect(readTrust(files.get('saves/second.json'))).toBe(64.2);
    expect(session.store.getState().pendingSaves).toBe(0);
  });

  it('swaps in the loaded manager and republishes', async () => {
    const { session } = createSession();
    await session.submit({ actionType: 'public_support', context: 'public', valence: 0.8 });
    void session.requestSave('checkpoint');
    await session.submit({
      actionType: 'empathy_lacking',
      context: 'private',
      valence: -0.5,
      timestampIso: new Date(base + HOUR).toISOString(),
    });
    expect(session.getCurrentState().trustScore).toBe(61.2);

    const loaded = await session.load('checkpoint');

    expect(loaded.ok).toBe(true);
    expect(session.getCurrentState().trustScore).toBe(63.2);
    expect(session.store.getState().state.trustScore).toBe(63.2);
    expect(session.store.getState().lastActionId).toBeNull();
  });

  it('applies actions submitted during a load to the loaded manager', async () => {
    let openGate: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      openGate = resolve;
    });
    const { session } = createSession(gate);
    await session.requestSave('baseline');

    const loading = session.load('baseline');
    const submitted = session.submit({
      id: 'during-load',
      actionType: 'public_support',
      context: 'public',
      valence: 0.8,
    });
    expect(session.getQueueStatus().pending).toBe(1);

    openGate();
    const [loaded, result] = await Promise.all([loading, submitted]);

    expect(loaded.ok).toBe(true);
    expect(result.accepted).toBe(true);
    expect(session.getCurrentState().trustScore).toBe(63.2);
    expect(session.getManager().getPatternTracker().getHistory().map((action) => action.id)).toEqual(['during-load']);
    expect(session.store.getState().lastActionId).toBe('during-load');
  });

  it('keeps the default state when the slot cannot be read', async () => {
    const { session, logger } = createSession();

    const loaded = await session.load('missing');

    expect(loaded.ok).toBe(false);
    expect(session.getCurrentState().trustScore).toBe(60);
    expect(logger.warn).toHaveBeenCalledWith('Snapshot load failed, using defaults', {
      slot: 'missing',
      error: 'ENOENT: saves/missing.json',
    });
  });
});
