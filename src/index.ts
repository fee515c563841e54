import { setDefaultLogLevel } from '@coparent/engine';
import { loadRelationshipConfig, type LoadRelationshipConfigOptions } from './config/relationshipConfig';
import { RelationshipSession } from './runtime/relationshipSession';
import { SnapshotStore } from './runtime/snapshotStore';

export * from './config/relationshipConfig';
export * from './runtime/actionQueue';
export * from './runtime/relationshipSession';
export * from './runtime/snapshotStore';

/** Loads configuration and wires a session with file-backed saves. */
export const createRelationshipSession = async (
  options: LoadRelationshipConfigOptions = {}
): Promise<RelationshipSession> => {
  const config = await loadRelationshipConfig(options);
  setDefaultLogLevel(config.logLevel);

  const snapshotStore = new SnapshotStore({
    directory: config.saveDirectory,
    encoding: config.snapshotEncoding,
  });

  return new RelationshipSession({ snapshotStore, tunables: config.tunables });
};
