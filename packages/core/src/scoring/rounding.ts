/**
 * Rounding and clamping used by every score computation.
 *
 * Ties round half away from zero: 7.5 → 8, 2.5 → 3, -2.5 → -3.
 */

export function roundHalfUp(value: number): number {
  const magnitude = Math.floor(Math.abs(value) + 0.5);
  return value < 0 ? -magnitude : magnitude;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/**
 * Round a real-valued score and bound it to [0, weight]
 */
export function boundedScore(value: number, weight: number): number {
  if (!Number.isFinite(value)) return 0;
  return clamp(roundHalfUp(value), 0, weight);
}
