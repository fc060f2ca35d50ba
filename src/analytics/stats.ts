/**
 * Calculate arithmetic mean of an array of numbers.
 */
export function mean(values: number[]): number {
  if (values.length === 0) return NaN;
  const sum = values.reduce((a, b) => a + b, 0);
  return sum / values.length;
}

/**
 * Standard deviation with `ddof` delta degrees of freedom
 * (0 = population, 1 = sample). NaN when n - ddof <= 0.
 */
export function stdDev(values: number[], ddof: number = 1): number {
  const n = values.length;
  if (n - ddof <= 0) return NaN;
  const avg = mean(values);
  const squaredDiffs = values.map((v) => (v - avg) ** 2);
  return Math.sqrt(squaredDiffs.reduce((a, b) => a + b, 0) / (n - ddof));
}

/**
 * Quantile `q` (0–1) of already-sorted values, linear interpolation
 * between the two closest ranks.
 */
export function quantileSorted(sorted: number[], q: number): number {
  if (sorted.length === 0) return NaN;
  const pos = (sorted.length - 1) * q;
  const lo = Math.floor(pos);
  const hi = Math.ceil(pos);
  if (lo === hi) return sorted[lo];
  return sorted[lo] + (sorted[hi] - sorted[lo]) * (pos - lo);
}

export interface DescriptiveStats {
  count: number;
  mean: number;
  std: number;
  min: number;
  q25: number;
  q50: number;
  q75: number;
  max: number;
}

/**
 * count, mean, sample std, min, quartiles and max of one column.
 */
export function describe(values: number[]): DescriptiveStats {
  const sorted = [...values].sort((a, b) => a - b);
  const count = sorted.length;
  return {
    count,
    mean: mean(sorted),
    std: stdDev(sorted, 1),
    min: count > 0 ? sorted[0] : NaN,
    q25: quantileSorted(sorted, 0.25),
    q50: quantileSorted(sorted, 0.5),
    q75: quantileSorted(sorted, 0.75),
    max: count > 0 ? sorted[count - 1] : NaN,
  };
}

/**
 * Round to specified decimal places.
 */
export function round(value: number, decimals: number = 4): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}
