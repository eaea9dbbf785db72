export function mean(values: readonly number[]): number {
  if (values.length === 0) throw new RangeError("mean of an empty sample");
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/** Sample standard deviation (divisor n - 1); 0 for fewer than two values. */
export function sampleStd(values: readonly number[]): number {
  if (values.length < 2) return 0;
  const m = mean(values);
  const squares = values.reduce((sum, v) => sum + (v - m) ** 2, 0);
  return Math.sqrt(squares / (values.length - 1));
}

/** Coefficient of variation in percent, or null when the mean is not positive. */
export function coefficientOfVariation(std: number, m: number): number | null {
  return m > 0 ? (std / m) * 100 : null;
}
