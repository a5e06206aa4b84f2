/**
 * @fileoverview Descriptive statistics over sample columns
 *
 * Sums run left to right so results are reproducible across runs. Variance
 * and covariance use the n - 1 denominator.
 */

export type Sample = ArrayLike<number>;

export function sum(values: Sample): number {
  let total = 0;
  for (let i = 0; i < values.length; i++) total += values[i];
  return total;
}

/**
 * Arithmetic mean. NaN for an empty sample.
 */
export function mean(values: Sample): number {
  return sum(values) / values.length;
}

/**
 * Sample covariance of two aligned columns.
 */
export function covariance(x: Sample, y: Sample): number {
  const mx = mean(x);
  const my = mean(y);
  let total = 0;
  for (let i = 0; i < x.length; i++) {
    total += (x[i] - mx) * (y[i] - my);
  }
  return total / (x.length - 1);
}

export function variance(values: Sample): number {
  return covariance(values, values);
}

/**
 * Mean of squares (second raw moment), used as the scale of a residual.
 */
export function meanOfSquares(values: Sample): number {
  let total = 0;
  for (let i = 0; i < values.length; i++) total += values[i] * values[i];
  return total / values.length;
}

/**
 * Sample skewness, the third standardized moment with population moments.
 * Zero when the sample has no spread.
 */
export function skewness(values: Sample): number {
  const n = values.length;
  const m = mean(values);
  let m2 = 0;
  let m3 = 0;
  for (let i = 0; i < n; i++) {
    const d = values[i] - m;
    m2 += d * d;
    m3 += d * d * d;
  }
  m2 /= n;
  m3 /= n;
  if (m2 === 0) return 0;
  return m3 / Math.pow(m2, 1.5);
}
