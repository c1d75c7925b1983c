import { RiskLevel } from './enums';

export const MIN_SCALED_SCORE = 300;
export const MAX_SCALED_SCORE = 850;
export const SCORE_RANGE_LABEL = `${MIN_SCALED_SCORE}-${MAX_SCALED_SCORE}`;

export interface RawScoreRange {
  rawMin: number;
  rawMax: number;
}

export const DEFAULT_RAW_RANGE: Readonly<RawScoreRange> = {
  rawMin: 0,
  rawMax: 100,
};

const RISK_BANDS: [number, RiskLevel][] = [
  [750, RiskLevel.VeryLow],
  [650, RiskLevel.Low],
  [550, RiskLevel.Medium],
  [450, RiskLevel.High],
];

/**
 * Validates a raw range before it is used for scaling.
 */
export function createRawScoreRange(rawMin: number, rawMax: number): RawScoreRange {
  if (!Number.isFinite(rawMin) || !Number.isFinite(rawMax) || rawMax <= rawMin) {
    throw new RangeError(
      `Invalid raw score range [${rawMin}, ${rawMax}]: max must be greater than min`,
    );
  }
  return { rawMin, rawMax };
}

/**
 * Maps a weighted total onto 300-850. Totals outside the raw range saturate
 * at the bounds; the result is truncated, not rounded.
 */
export function scaleToRange(
  totalScore: number,
  range: RawScoreRange = DEFAULT_RAW_RANGE,
): number {
  const fraction = (totalScore - range.rawMin) / (range.rawMax - range.rawMin);
  const normalized = Number.isNaN(fraction)
    ? 0
    : Math.max(0, Math.min(1, fraction));

  return Math.trunc(
    MIN_SCALED_SCORE + (MAX_SCALED_SCORE - MIN_SCALED_SCORE) * normalized,
  );
}

export function getRiskLevel(score: number): RiskLevel {
  const band = RISK_BANDS.find(([minimum]) => score >= minimum);
  return band ? band[1] : RiskLevel.VeryHigh;
}
