/**
 * Reads a numeric setting: a value that did not parse (NaN) takes the
 * fallback, anything below `minimum` is raised to it.
 */
export function boundedNumber(
  value: number | undefined,
  fallback: number,
  minimum: number,
): number {
  if (value === undefined || !Number.isFinite(value)) {
    return fallback;
  }
  return Math.max(minimum, value);
}
