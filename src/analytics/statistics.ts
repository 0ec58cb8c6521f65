export interface MetricBaseline {
  mean: number;
  stdev: number;
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  let sum = 0;
  for (const value of values) sum += value;
  return sum / values.length;
}

/**
 * Sample standard deviation (n - 1 denominator); 0 for fewer than two values
 */
export function sampleStdev(values: readonly number[]): number {
  if (values.length < 2) return 0;
  if (values.every(value => value === values[0])) return 0;
  const avg = mean(values);
  let squares = 0;
  for (const value of values) {
    squares += (value - avg) ** 2;
  }
  return Math.sqrt(squares / (values.length - 1));
}

export function baseline(values: readonly number[]): MetricBaseline {
  return { mean: mean(values), stdev: sampleStdev(values) };
}

/** Spread below this fraction of the mean's magnitude is rounding noise */
export const NEGLIGIBLE_STDEV_RATIO = 1e-12;

/**
 * Whether the baseline has enough spread to measure deviations against
 */
export function hasSignal(reference: MetricBaseline): boolean {
  return reference.stdev > NEGLIGIBLE_STDEV_RATIO * Math.max(1, Math.abs(reference.mean));
}

/**
 * Signed distance from the baseline mean in standard deviations. With no
 * variance there is no signal and the result is 0.
 */
export function zScore(value: number, reference: MetricBaseline): number {
  return hasSignal(reference) ? (value - reference.mean) / reference.stdev : 0;
}
