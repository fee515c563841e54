import { describe, expect, it, vi } from 'vitest';
import type { Logger } from '../../observability/logger';
import { PersonalityStateManager } from '../../personality/personalityStateManager';
import { TrustDynamicsEngine } from '../../personality/trustDynamics';
import { resolveTunables } from '../../personality/tunables';
import type { ActionMetadataValue, ActionType, ContextType, PlayerAction } from '../../personality/types';
import {
  DEFAULT_SNAPSHOT_SCORES,
  createDefaultManager,
  createSnapshotDocument,
  decodeSnapshot,
  encodeSnapshot,
  parseSnapshotDocument,
  restoreFromSnapshot,
} from '../snapshotDocument';

const HOUR = 60 * 60 * 1000;
const DAY = 24 * HOUR;
const base = Date.parse('2026-06-08T07:30:00.000Z');
const savedAtMs = base + 2 * DAY + 4 * HOUR;
const clock = { now: () => savedAtMs };

const silentLogger = (): Logger => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
});

let sequence = 0;
const makeAction = (
  actionType: ActionType,
  valence: number,
  atMs: number,
  context: ContextType = 'private',
  metadata: Record<string, ActionMetadataValue> = {}
): PlayerAction => {
  sequence += 1;
  return {
    id: `persist-${sequence}`,
    actionType,
    context,
    valence,
    timestampIso: new Date(atMs).toISOString(),
    metadata,
  };
};

const buildPlayedManager = (): PersonalityStateManager => {
  const manager = new PersonalityStateManager({}, { clock, logger: silentLogger() });
  manager.processBatch([
    makeAction('control_taking', -0.5, base),
    makeAction('control_taking', -0.5, base + DAY),
    makeAction('control_taking', -0.5, base + 2 * DAY),
    makeAction('public_support', 0.8, base + 2 * DAY + HOUR, 'public'),
    makeAction('stress_acknowledged', 0.6, base + 2 * DAY + 2 * HOUR),
    makeAction('apology', 0.5, base + 2 * DAY + 3 * HOUR, 'private', {
      behaviorType: 'control_taking',
      apologyType: 'genuine',
    }),
    makeAction('control_taking', -0.4, base + 2 * DAY + 4 * HOUR),
  ]);
  return manager;
};

const expectEquivalent = (restored: PersonalityStateManager, original: PersonalityStateManager): void => {
  const before = original.getCurrentState(savedAtMs);
  const after = restored.getCurrentState(savedAtMs);

  expect(after.trustScore).toBeCloseTo(before.trustScore, 2);
  expect(after.resentmentScore).toBeCloseTo(before.resentmentScore, 2);
  expect(after.emotionalSafety).toBeCloseTo(before.emotionalSafety, 2);
  expect(after.parentingUnity).toBeCloseTo(before.parentingUnity, 2);
  expect(after.recentPatterns).toEqual(before.recentPatterns);
  expect(restored.getPatternTracker().getAllPatterns(savedAtMs)).toHaveLength(
    original.getPatternTracker().getAllPatterns(savedAtMs).length
  );
  expect(restored.getEmotionalMemory().getMemoryCount()).toBe(original.getEmotionalMemory().getMemoryCount());
  expect(restored.getTrustEngine().getStoredApologyEffectiveness('control_taking')).toBe(
    original.getTrustEngine().getStoredApologyEffectiveness('control_taking')
  );
  expect(restored.getResponseModifiers()).toEqual(original.getResponseModifiers());
};

describe('snapshot document', () => {
  it('round-trips a played manager through JSON', () => {
    const original = buildPlayedManager();
    const document = createSnapshotDocument(original, new Date(savedAtMs).toISOString());

    const decoded = decodeSnapshot(encodeSnapshot(document));
    expect(decoded.ok).toBe(true);
    if (!decoded.ok) return;

    expect(decoded.document.patterns).toHaveLength(1);
    expect(decoded.document.patterns[0].occurrences).toHaveLength(4);
    expect(decoded.document.emotional_memories).toHaveLength(7);
    expect(decoded.document.apology_effectiveness.control_taking?.effectiveness).toBe(0.8);

    const restored = restoreFromSnapshot(decoded.document, { clock, logger: silentLogger() });
    expectEquivalent(restored, original);
  });

  it('round-trips through YAML', () => {
    const original = buildPlayedManager();
    const document = createSnapshotDocument(original, new Date(savedAtMs).toISOString());

    const decoded = decodeSnapshot(encodeSnapshot(document, 'yaml'), 'yaml');
    expect(decoded.ok).toBe(true);
    if (!decoded.ok) return;

    expectEquivalent(restoreFromSnapshot(decoded.document, { clock, logger: silentLogger() }), original);
  });

  it('keeps rejecting stale actions after a restore', () => {
    const original = buildPlayedManager();
    const document = createSnapshotDocument(original, new Date(savedAtMs).toISOString());
    const restored = restoreFromSnapshot(document, { clock, logger: silentLogger() });

    expect(restored.getLastProcessedIso()).toBe(new Date(base + 2 * DAY + 4 * HOUR).toISOString());
    expect(() => restored.processAction(makeAction('empathy_shown', 0.5, base))).toThrow();
  });

  it('treats a missing required field as corruption', () => {
    const document = createSnapshotDocument(buildPlayedManager(), new Date(savedAtMs).toISOString());
    const { trust_score: _dropped, ...withoutTrust } = document;

    const result = parseSnapshotDocument(withoutTrust);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.errors[0].path).toBe('/');
    expect(result.errors[0].message).toBe("must have required property 'trust_score'");
  });

  it('rejects out-of-range scores', () => {
    const document = createSnapshotDocument(buildPlayedManager(), new Date(savedAtMs).toISOString());

    const result = parseSnapshotDocument({ ...document, resentment_score: 140 });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.errors.map((error) => error.path)).toEqual(['/resentment_score']);
  });

  it('rejects timestamps that are not ISO-8601', () => {
    const document = createSnapshotDocument(buildPlayedManager(), new Date(savedAtMs).toISOString());

    const result = parseSnapshotDocument({
      ...document,
      timestamp: 'not-a-date',
      patterns: document.patterns.map((pattern) => ({ ...pattern, first_seen: 'garbage' })),
      emotional_memories: document.emotional_memories.map((memory, index) =>
        index === 0 ? { ...memory, timestamp: 'garbage' } : memory
      ),
    });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.errors.map((error) => error.path)).toEqual([
      '/timestamp',
      '/patterns/0/first_seen',
      '/emotional_memories/0/timestamp',
    ]);
    expect(result.errors[0].message).toBe('must match format "iso-timestamp"');
  });

  it('rejects repeated action ids in the history', () => {
    const document = createSnapshotDocument(buildPlayedManager(), new Date(savedAtMs).toISOString());
    const history = document.action_history ?? [];

    const result = parseSnapshotDocument({ ...document, action_history: [...history, { ...history[0] }] });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.errors).toEqual([
      { path: `/action_history/${history.length}/id`, message: `duplicate action id ${history[0].id}` },
    ]);
  });

  it('keeps withdrawal between the entry and exit thresholds across a restore', () => {
    const tunables = resolveTunables({ withdrawalExitThreshold: 55 });
    const logger = silentLogger();
    const manager = new PersonalityStateManager(
      { trustEngine: new TrustDynamicsEngine({ trustScore: 51 }, { clock, tunables, logger }) },
      { clock, tunables, logger }
    );
    manager.processAction(makeAction('empathy_lacking', -0.5, base));
    manager.processAction(makeAction('empathy_shown', 0.5, base + HOUR));
    expect(manager.getCurrentState().trustScore).toBe(50);
    expect(manager.getCurrentState().isWithdrawn).toBe(true);

    const document = createSnapshotDocument(manager, new Date(base + HOUR).toISOString());
    expect(document.engine_state?.trust_withdrawn).toBe(true);

    const decoded = decodeSnapshot(encodeSnapshot(document));
    expect(decoded.ok).toBe(true);
    if (!decoded.ok) return;

    const restored = restoreFromSnapshot(decoded.document, { clock, tunables, logger });
    expect(restored.getCurrentState().isWithdrawn).toBe(true);
    expect(restored.getResponseModifiers().responseLengthMultiplier).toBe(0.7);
  });

  it('rejects an unknown version and unparseable content', () => {
    const document = createSnapshotDocument(buildPlayedManager(), new Date(savedAtMs).toISOString());

    expect(parseSnapshotDocument({ ...document, version: '2.0' }).ok).toBe(false);
    expect(decodeSnapshot('{"version": "1.0",').ok).toBe(false);
    expect(decodeSnapshot('null').ok).toBe(false);
  });

  it('builds the documented default manager', () => {
    const state = createDefaultManager({ clock, logger: silentLogger() }).getCurrentState();

    expect(state.trustScore).toBe(DEFAULT_SNAPSHOT_SCORES.trustScore);
    expect(state.resentmentScore).toBe(DEFAULT_SNAPSHOT_SCORES.resentmentScore);
    expect(state.emotionalSafety).toBe(DEFAULT_SNAPSHOT_SCORES.emotionalSafety);
    expect(state.parentingUnity).toBe(DEFAULT_SNAPSHOT_SCORES.parentingUnity);
    expect(DEFAULT_SNAPSHOT_SCORES).toEqual({
      trustScore: 60,
      resentmentScore: 10,
      emotionalSafety: 50,
      parentingUnity: 70,
    });
  });
});
