export interface RelationshipTunables {
  patternWindowDays: number;
  patternMinOccurrences: number;
  patternDailyDecay: number;
  patternBreakThreshold: number;
  memoryCapacity: number;
  withdrawalThreshold: number;
  /** Trust needed to leave withdrawal. Equal to withdrawalThreshold means no hysteresis. */
  withdrawalExitThreshold: number;
  highTrustResilience: number;
  resentmentDampening: number;
  emotionalSafetyAttenuation: number;
  recoveryStepPerInteraction: number;
  queueDepth: number;
  historyRetentionDays: number;
}

export const DEFAULT_TUNABLES: RelationshipTunables = {
  patternWindowDays: 7,
  patternMinOccurrences: 3,
  patternDailyDecay: 0.1,
  patternBreakThreshold: 5,
  memoryCapacity: 1000,
  withdrawalThreshold: 50,
  withdrawalExitThreshold: 50,
  highTrustResilience: 0.7,
  resentmentDampening: 0.5,
  emotionalSafetyAttenuation: 0.7,
  recoveryStepPerInteraction: 0.1,
  queueDepth: 10,
  historyRetentionDays: 30,
};

export const resolveTunables = (overrides: Partial<RelationshipTunables> = {}): RelationshipTunables => {
  return {
    ...DEFAULT_TUNABLES,
    ...overrides,
  };
};
