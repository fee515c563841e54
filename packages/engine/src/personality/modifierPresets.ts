import type { ResponseTone } from './types';

export type TrustBand = 'secure' | 'guarded' | 'withdrawn';
export type ResentmentBand = 'calm' | 'simmering' | 'bitter' | 'hostile';

export interface ModifierPreset {
  tone: ResponseTone;
  cooperation: number;
  vulnerabilityScale: number;
}

export const resolveTrustBand = (trustScore: number, isWithdrawn: boolean): TrustBand => {
  if (isWithdrawn) return 'withdrawn';
  if (trustScore > 70) return 'secure';
  return 'guarded';
};

export const resolveResentmentBand = (resentmentScore: number): ResentmentBand => {
  if (resentmentScore < 30) return 'calm';
  if (resentmentScore < 50) return 'simmering';
  if (resentmentScore < 70) return 'bitter';
  return 'hostile';
};

// Cooperation follows the resentment band; tone and openness follow both.
const presets: Record<TrustBand, Record<ResentmentBand, ModifierPreset>> = {
  secure: {
    calm: { tone: 'warm', cooperation: 1.0, vulnerabilityScale: 1.0 },
    simmering: { tone: 'open', cooperation: 0.7, vulnerabilityScale: 0.85 },
    bitter: { tone: 'measured', cooperation: 0.4, vulnerabilityScale: 0.6 },
    hostile: { tone: 'guarded', cooperation: 0.2, vulnerabilityScale: 0.4 },
  },
  guarded: {
    calm: { tone: 'open', cooperation: 1.0, vulnerabilityScale: 0.75 },
    simmering: { tone: 'measured', cooperation: 0.7, vulnerabilityScale: 0.6 },
    bitter: { tone: 'guarded', cooperation: 0.4, vulnerabilityScale: 0.45 },
    hostile: { tone: 'cold', cooperation: 0.2, vulnerabilityScale: 0.3 },
  },
  withdrawn: {
    calm: { tone: 'measured', cooperation: 1.0, vulnerabilityScale: 0.4 },
    simmering: { tone: 'guarded', cooperation: 0.7, vulnerabilityScale: 0.3 },
    bitter: { tone: 'cold', cooperation: 0.4, vulnerabilityScale: 0.2 },
    hostile: { tone: 'cold', cooperation: 0.2, vulnerabilityScale: 0.1 },
  },
};

export const selectModifierPreset = (trustBand: TrustBand, resentmentBand: ResentmentBand): ModifierPreset => {
  return presets[trustBand][resentmentBand];
};
