/**
 * Round to the nearest integer, ties to the even neighbour.
 *
 * Population sizes are rounded this way every generation so that growth
 * factors accumulate identically to banker's rounding: 38.5 -> 38, 82.5 -> 82.
 */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const fraction = value - floor;
  if (fraction === 0.5) return floor % 2 === 0 ? floor : floor + 1;
  return Math.round(value);
}

/** Clamp `value` into [low, high]. */
export function clamp(value: number, low: number, high: number): number {
  return Math.min(high, Math.max(low, value));
}
