export const MS_PER_HOUR = 60 * 60 * 1000;
export const MS_PER_DAY = 24 * MS_PER_HOUR;

export const clamp = (value: number, min: number, max: number): number => {
  return Math.max(min, Math.min(max, value));
};

export const round2 = (value: number): number => {
  return Math.round(value * 100) / 100;
};

/** Clamp then round; every stored score goes through here. */
export const toStoredScore = (value: number, min = 0, max = 100): number => {
  return round2(clamp(value, min, max));
};

export const isFiniteNumber = (value: unknown): value is number => {
  return typeof value === 'number' && Number.isFinite(value);
};

export const toEpochMs = (iso: string): number => {
  const parsed = Date.parse(iso);
  return Number.isFinite(parsed) ? parsed : 0;
};

export const daysBetween = (fromMs: number, toMs: number): number => {
  return Math.max(0, toMs - fromMs) / MS_PER_DAY;
};

export const systemClock = {
  now: (): number => Date.now(),
};
