export * from './errors';
export * from './observability/logger';
export * from './personality/types';
export * from './personality/numeric';
export * from './personality/tunables';
export * from './personality/actionCatalog';
export * from './personality/modifierPresets';
export * from './personality/patternTracker';
export * from './personality/emotionalMemory';
export * from './personality/trustDynamics';
export * from './personality/personalityStateManager';
export * from './persistence/snapshotDocument';
