/**
 * Subtract, floored at zero.
 * @returns `max(0, a - b)`.
 */
export function subFloor(a: number, b: number): number {
  return a > b ? a - b : 0;
}

/**
 * Truncate a byte quantity to a non-negative integer.
 * Infinity and NaN become zero.
 */
export function toBytes(v: number): number {
  return Number.isFinite(v) ? Math.max(0, Math.trunc(v)) : 0;
}
