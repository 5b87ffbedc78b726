export function clip(value: number, min = -1, max = 1): number {
  return Math.max(min, Math.min(max, value));
}

/** numerator / denominator, or `fallback` when the denominator is 0 or the result is not finite. */
export function safeDivide(numerator: number, denominator: number, fallback = 0): number {
  if (denominator === 0) return fallback;
  const result = numerator / denominator;
  return Number.isFinite(result) ? result : fallback;
}
