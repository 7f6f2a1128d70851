/** Points closer than this are the same line (float noise from parsed odds). */
export const POINT_EPSILON = 1e-9;

/**
 * Coerce a feed value (number or numeric string) to a finite number,
 * returning `fallback` for blanks and garbage.
 */
export function normalizeNumber(value: unknown, fallback = 0): number {
  if (typeof value === 'number') return Number.isFinite(value) ? value : fallback;
  if (typeof value !== 'string' || value.trim() === '') return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export function isApproximatelyEqual(a: number, b: number, epsilon = POINT_EPSILON): boolean {
  return Math.abs(a - b) < epsilon;
}
