import { join } from 'node:path';
import { describe, expect, it, vi } from 'vitest';
import {
  PersonalityValidationError,
  createDefaultManager,
  createSnapshotDocument,
  type Logger,
  type PlayerAction,
} from '@coparent/engine';
import { SnapshotStore, type SnapshotStorage } from '../snapshotStore';

const savedAt = Date.parse('2026-08-12T18:00:00.000Z');
const clock = { now: () => savedAt };

const createLoggerSpy = () => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
}) satisfies Logger;

const createMemoryStorage = (overrides: Partial<SnapshotStorage> = {}) => {
  const files = new Map<string, string>();
  const storage: SnapshotStorage = {
    readFile: async (path) => {
      const content = files.get(path);
      if (content === undefined) {
        throw Object.assign(new Error(`ENOENT: ${path}`), { code: 'ENOENT' });
      }
      return content;
    },
    writeFile: async (path, content) => {
      files.set(path, content);
    },
    readdir: async (directory) => {
      return [...files.keys()]
        .filter((path) => path.startsWith(`${directory}/`))
        .map((path) => path.slice(directory.length + 1));
    },
    remove: async (path) => {
      if (!files.delete(path)) throw new Error(`ENOENT: ${path}`);
    },
    ensureDirectory: async () => undefined,
    ...overrides,
  };
  return { files, storage };
};

const playedDocument = () => {
  const manager = createDefaultManager({ clock, logger: createLoggerSpy() });
  const action: PlayerAction = {
    id: 'store-action-1',
    actionType: 'public_support',
    context: 'public',
    valence: 0.8,
    timestampIso: new Date(savedAt - 60_000).toISOString(),
    metadata: {},
  };
  manager.processAction(action);
  return createSnapshotDocument(manager, new Date(savedAt).toISOString());
};

describe('SnapshotStore', () => {
  it('saves and loads a slot', async () => {
    const { files, storage } = createMemoryStorage();
    const store = new SnapshotStore({ directory: 'saves' }, { storage, logger: createLoggerSpy() });

    const saved = await store.save('slot-a', playedDocument());
    expect(saved).toEqual({ saved: true, path: join('saves', 'slot-a.json'), attempts: 1 });
    expect(files.has(join('saves', 'slot-a.json'))).toBe(true);

    const loaded = await store.load('slot-a', { clock });
    expect(loaded.ok).toBe(true);
    expect(loaded.manager.getCurrentState().trustScore).toBe(63.2);
    expect(loaded.manager.getCurrentState().parentingUnity).toBe(74);
  });

  it('writes YAML slots when configured', async () => {
    const { files, storage } = createMemoryStorage();
    const store = new SnapshotStore({ directory: 'saves', encoding: 'yaml' }, { storage, logger: createLoggerSpy() });

    await store.save('slot-y', playedDocument());
    const content = files.get(join('saves', 'slot-y.yaml'));

    expect(content?.startsWith('version: "1.0"')).toBe(true);
    expect((await store.load('slot-y', { clock })).ok).toBe(true);
  });

  it('retries a failed save once', async () => {
    const logger = createLoggerSpy();
    const memory = createMemoryStorage();
    const writeFile = vi
      .fn<[string, string], Promise<void>>()
      .mockRejectedValueOnce(new Error('disk busy'))
      .mockImplementation(memory.storage.writeFile);
    const store = new SnapshotStore({ directory: 'saves' }, { storage: { ...memory.storage, writeFile }, logger });

    const result = await store.save('slot-b', playedDocument());

    expect(result.saved).toBe(true);
    expect(result.attempts).toBe(2);
    expect(logger.warn).toHaveBeenCalledWith('Snapshot save failed, retrying', {
      slot: 'slot-b',
      attempt: 1,
      error: 'disk busy',
    });
  });

  it('skips the save after the retry fails', async () => {
    const logger = createLoggerSpy();
    const { storage } = createMemoryStorage({
      writeFile: async () => {
        throw new Error('read-only volume');
      },
    });
    const store = new SnapshotStore({ directory: 'saves' }, { storage, logger });

    const result = await store.save('slot-c', playedDocument());

    expect(result.saved).toBe(false);
    expect(result.attempts).toBe(2);
    if (result.saved) return;
    expect(result.error.kind).toBe('io_failure');
    expect(logger.error).toHaveBeenCalledWith('Snapshot save skipped', {
      slot: 'slot-c',
      attempts: 2,
      error: 'read-only volume',
    });
  });

  it('falls back to defaults when the slot is missing', async () => {
    const logger = createLoggerSpy();
    const { storage } = createMemoryStorage();
    const store = new SnapshotStore({ directory: 'saves' }, { storage, logger });

    const loaded = await store.load('absent', { clock });

    expect(loaded.ok).toBe(false);
    expect(loaded.manager.getCurrentState().trustScore).toBe(60);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it('falls back to defaults when the document is corrupt', async () => {
    const logger = createLoggerSpy();
    const { files, storage } = createMemoryStorage();
    const store = new SnapshotStore({ directory: 'saves' }, { storage, logger });
    const { emotional_memories: _dropped, ...partial } = playedDocument();
    files.set(join('saves', 'broken.json'), JSON.stringify(partial));

    const loaded = await store.load('broken', { clock });

    expect(loaded.ok).toBe(false);
    if (loaded.ok) return;
    expect(loaded.errors[0].message).toBe("must have required property 'emotional_memories'");
    expect(loaded.manager.getCurrentState()).toMatchObject({
      trustScore: 60,
      resentmentScore: 10,
      emotionalSafety: 50,
      parentingUnity: 70,
    });
  });

  it('lists and deletes slots', async () => {
    const { files, storage } = createMemoryStorage();
    const store = new SnapshotStore({ directory: 'saves' }, { storage, logger: createLoggerSpy() });
    const document = playedDocument();
    await store.save('beta', document);
    await store.save('alpha', document);
    files.set(join('saves', 'notes.txt'), 'ignored');

    expect(await store.listSaves()).toEqual(['alpha', 'beta']);
    expect(await store.deleteSave('alpha')).toBe(true);
    expect(await store.deleteSave('alpha')).toBe(false);
    expect(await store.listSaves()).toEqual(['beta']);
  });

  it('rejects slot names that could escape the save directory', async () => {
    const { storage } = createMemoryStorage();
    const store = new SnapshotStore({ directory: 'saves' }, { storage, logger: createLoggerSpy() });

    await expect(store.save('../outside', playedDocument())).rejects.toThrow(PersonalityValidationError);
  });
});
