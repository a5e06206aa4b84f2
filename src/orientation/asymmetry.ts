/**
 * @fileoverview Skew-based left-right asymmetry statistic
 *
 * For a candidate edge x→y, y is first residualized on x and the
 * conditioning set. The statistic compares the x·residual products in the two
 * tails where x and the linear prediction |a|·x + ry disagree in sign. A
 * positive value favours x→y.
 */

import type { Dataset, Variable } from '../data/dataset.js';
import { covariance, variance, type Sample } from '../utils/math.js';
import { residualize } from '../stats/residualizer.js';

export type TailDirection = 1 | -1;

/**
 * Mean of x_k·ry_k over rows with sign(x_k) = dir and
 * sign(|a|·x_k + ry_k) = -dir. Undefined when no row qualifies.
 */
export function tailExpectation(
  a: number,
  x: Sample,
  ry: Sample,
  dir: TailDirection,
): number | undefined {
  const slope = Math.abs(a);
  let total = 0;
  let count = 0;
  for (let k = 0; k < x.length; k++) {
    const predicted = slope * x[k] + ry[k];
    if (x[k] * dir > 0 && predicted * dir < 0) {
      total += x[k] * ry[k];
      count += 1;
    }
  }
  return count === 0 ? undefined : total / count;
}

/**
 * Left-right statistic for x→y given the conditioning set `z`, which must not
 * contain x or y. Undefined when either tail is empty.
 *
 * @throws NumericalError when y cannot be regressed on x and z
 */
export function leftRight(
  dataset: Dataset,
  x: Variable,
  y: Variable,
  z: readonly Variable[],
): number | undefined {
  const xs = dataset.getColumn(x);
  const ys = dataset.getColumn(y);
  const ry = residualize(dataset, y, [x, ...z]);
  const a = covariance(xs, ys) / variance(xs);

  const upper = tailExpectation(a, xs, ry, 1);
  const lower = tailExpectation(a, xs, ry, -1);
  if (upper === undefined || lower === undefined) return undefined;
  return upper - lower;
}

/** An undefined statistic counts against the direction. */
export function favoursDirection(value: number | undefined): boolean {
  return value !== undefined && value > 0;
}
