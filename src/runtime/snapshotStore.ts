import { mkdir, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import {
  PersistenceIOError,
  PersonalityValidationError,
  createDefaultManager,
  createLogger,
  decodeSnapshot,
  encodeSnapshot,
  restoreFromSnapshot,
  type Logger,
  type PersonalityStateManager,
  type RestoreDependencies,
  type SnapshotDocumentV1,
  type SnapshotEncoding,
  type SnapshotFormatError,
} from '@coparent/engine';

export interface SnapshotStorage {
  readFile: (path: string) => Promise<string>;
  writeFile: (path: string, content: string) => Promise<void>;
  readdir: (directory: string) => Promise<string[]>;
  remove: (path: string) => Promise<void>;
  ensureDirectory: (directory: string) => Promise<void>;
}

export const nodeSnapshotStorage: SnapshotStorage = {
  readFile: (path) => readFile(path, 'utf8'),
  writeFile: (path, content) => writeFile(path, content, 'utf8'),
  readdir: (directory) => readdir(directory),
  remove: (path) => rm(path),
  ensureDirectory: async (directory) => {
    await mkdir(directory, { recursive: true });
  },
};

export type SnapshotSaveResult =
  | {
      saved: true;
      path: string;
      attempts: number;
    }
  | {
      saved: false;
      attempts: number;
      error: PersistenceIOError;
    };

export type SnapshotLoadResult =
  | {
      ok: true;
      manager: PersonalityStateManager;
      document: SnapshotDocumentV1;
    }
  | {
      ok: false;
      manager: PersonalityStateManager;
      errors: SnapshotFormatError[];
    };

export interface SnapshotStoreOptions {
  directory: string;
  encoding?: SnapshotEncoding;
}

interface SnapshotStoreDependencies {
  storage: SnapshotStorage;
  logger: Logger;
}

const defaultDependencies = (): SnapshotStoreDependencies => ({
  storage: nodeSnapshotStorage,
  logger: createLogger('snapshot-store'),
});

const SLOT_PATTERN = /^[A-Za-z0-9_-]+$/;
const SAVE_ATTEMPTS = 2;

const describe = (error: unknown): string => {
  return error instanceof Error ? error.message : String(error);
};

export class SnapshotStore {
  private readonly dependencies: SnapshotStoreDependencies;
  private readonly directory: string;
  private readonly encoding: SnapshotEncoding;

  constructor(options: SnapshotStoreOptions, partialDependencies: Partial<SnapshotStoreDependencies> = {}) {
    this.dependencies = {
      ...defaultDependencies(),
      ...partialDependencies,
    };
    this.directory = options.directory;
    this.encoding = options.encoding ?? 'json';
  }

  private get extension(): string {
    return this.encoding === 'yaml' ? '.yaml' : '.json';
  }

  slotPath(slot: string): string {
    if (!SLOT_PATTERN.test(slot)) {
      throw new PersonalityValidationError('slot', 'may only contain letters, digits, dashes and underscores');
    }
    return join(this.directory, `${slot}${this.extension}`);
  }

  /** Writes the document, retrying once. Failures are logged and reported, never thrown. */
  async save(slot: string, document: SnapshotDocumentV1): Promise<SnapshotSaveResult> {
    const { storage, logger } = this.dependencies;
    const path = this.slotPath(slot);
    const content = encodeSnapshot(document, this.encoding);
    let lastError: unknown = null;

    for (let attempt = 1; attempt <= SAVE_ATTEMPTS; attempt += 1) {
      try {
        await storage.ensureDirectory(this.directory);
        await storage.writeFile(path, content);
        return { saved: true, path, attempts: attempt };
      } catch (error) {
        lastError = error;
        if (attempt < SAVE_ATTEMPTS) {
          logger.warn('Snapshot save failed, retrying', { slot, attempt, error: describe(error) });
        }
      }
    }

    const failure = new PersistenceIOError('save', lastError, `Snapshot save for slot ${slot} failed`);
    logger.error('Snapshot save skipped', { slot, attempts: SAVE_ATTEMPTS, error: describe(lastError) });
    return { saved: false, attempts: SAVE_ATTEMPTS, error: failure };
  }

  /** Restores a manager from the slot, or returns the default manager with the reasons. */
  async load(slot: string, restoreDependencies: Partial<RestoreDependencies> = {}): Promise<SnapshotLoadResult> {
    const { storage, logger } = this.dependencies;

    let content: string;
    try {
      content = await storage.readFile(this.slotPath(slot));
    } catch (error) {
      const failure = new PersistenceIOError('load', error, `Snapshot load for slot ${slot} failed`);
      logger.warn('Snapshot load failed, using defaults', { slot, error: describe(error) });
      return {
        ok: false,
        manager: createDefaultManager(restoreDependencies),
        errors: [{ path: '/', message: failure.message }],
      };
    }

    const parsed = decodeSnapshot(content, this.encoding);
    if (!parsed.ok) {
      logger.warn('Snapshot failed validation, using defaults', { slot, errors: parsed.errors });
      return {
        ok: false,
        manager: createDefaultManager(restoreDependencies),
        errors: parsed.errors,
      };
    }

    return {
      ok: true,
      manager: restoreFromSnapshot(parsed.document, restoreDependencies),
      document: parsed.document,
    };
  }

  async listSaves(): Promise<string[]> {
    try {
      const entries = await this.dependencies.storage.readdir(this.directory);
      return entries
        .filter((entry) => entry.endsWith(this.extension))
        .map((entry) => entry.slice(0, -this.extension.length))
        .sort();
    } catch (error) {
      const failure = new PersistenceIOError('list', error);
      this.dependencies.logger.debug('No snapshot slots listed', { error: describe(error), message: failure.message });
      return [];
    }
  }

  async deleteSave(slot: string): Promise<boolean> {
    try {
      await this.dependencies.storage.remove(this.slotPath(slot));
      return true;
    } catch (error) {
      const failure = new PersistenceIOError('delete', error);
      this.dependencies.logger.warn('Snapshot delete failed', { slot, error: describe(error), message: failure.message });
      return false;
    }
  }
}
