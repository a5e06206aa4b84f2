/**
 * @fileoverview Least-squares residuals over optionally filtered rows
 *
 * Regresses a target column on a set of regressor columns by solving the
 * normal equations ZᵀZ b = Zᵀv with Gaussian elimination and partial
 * pivoting. There is no intercept term: every caller works on centred data.
 * Residuals are aligned to the selected row indices, in ascending row order.
 */

import type { Dataset, Variable } from '../data/dataset.js';
import { NumericalError } from '../core/errors.js';

// ============================================================================
// ROW FILTERS
// ============================================================================

export type RowDirection = 1 | -1;

/**
 * Which rows enter a regression. `threshold` keeps row k when
 * `direction * (values[k] - threshold) > 0`.
 */
export type RowFilter =
  | { readonly kind: 'all' }
  | {
      readonly kind: 'threshold';
      readonly variable: Variable;
      readonly threshold: number;
      readonly direction: RowDirection;
    };

export const ALL_ROWS: RowFilter = Object.freeze({ kind: 'all' });

/** Rows where `variable` lies strictly above zero. */
export function positiveRows(variable: Variable): RowFilter {
  return { kind: 'threshold', variable, threshold: 0, direction: 1 };
}

/**
 * Indices of the rows a threshold keeps, ascending.
 */
export function selectRows(
  values: ArrayLike<number>,
  threshold: number,
  direction: RowDirection,
): number[] {
  const rows: number[] = [];
  for (let k = 0; k < values.length; k++) {
    if (direction * (values[k] - threshold) > 0) rows.push(k);
  }
  return rows;
}

// ============================================================================
// REGRESSION
// ============================================================================

const SINGULARITY_TOLERANCE = 1e-12;

/**
 * Residuals of `target` after regressing it on `regressors`. All arrays
 * must have the same length. With no regressors the target is returned as
 * a copy.
 *
 * @throws NumericalError when the design is singular or has more
 * regressors than rows
 */
export function regressionResiduals(
  target: ArrayLike<number>,
  regressors: ReadonlyArray<ArrayLike<number>>,
): Float64Array {
  const n = target.length;
  const k = regressors.length;
  const y = Float64Array.from(target);
  if (k === 0) return y;
  if (k > n) {
    throw new NumericalError('regression', `${k} regressors for ${n} rows`, n, k);
  }

  const gram: number[][] = [];
  const moment: number[] = [];
  for (let a = 0; a < k; a++) {
    const row: number[] = [];
    for (let b = 0; b < k; b++) {
      row.push(dot(regressors[a], regressors[b]));
    }
    gram.push(row);
    moment.push(dot(regressors[a], y));
  }

  const beta = solveNormalEquations(gram, moment, n);

  const residuals = new Float64Array(n);
  for (let i = 0; i < n; i++) {
    let fitted = 0;
    for (let a = 0; a < k; a++) fitted += beta[a] * regressors[a][i];
    residuals[i] = y[i] - fitted;
  }
  return residuals;
}

/**
 * Residuals of `target` on `conditioning` within `dataset`, restricted to
 * the rows `filter` keeps.
 *
 * @throws NumericalError on a singular design
 */
export function residualize(
  dataset: Dataset,
  target: Variable,
  conditioning: readonly Variable[],
  filter: RowFilter = ALL_ROWS,
): Float64Array {
  const rows =
    filter.kind === 'all'
      ? undefined
      : selectRows(dataset.getColumn(filter.variable), filter.threshold, filter.direction);

  const gather = (variable: Variable): Float64Array => {
    const column = dataset.getColumn(variable);
    if (!rows) return column;
    const out = new Float64Array(rows.length);
    for (let i = 0; i < rows.length; i++) out[i] = column[rows[i]];
    return out;
  };

  return regressionResiduals(gather(target), conditioning.map(gather));
}

// ============================================================================
// LINEAR ALGEBRA
// ============================================================================

function dot(u: ArrayLike<number>, v: ArrayLike<number>): number {
  let total = 0;
  for (let i = 0; i < u.length; i++) total += u[i] * v[i];
  return total;
}

/**
 * Solve A x = b for symmetric A in place on copies. A pivot at or below
 * 1e-12 times the largest diagonal entry of A counts as singular.
 */
function solveNormalEquations(gram: number[][], moment: number[], rows: number): number[] {
  const k = moment.length;
  const a = gram.map((row) => [...row]);
  const b = [...moment];

  let scale = 0;
  for (let i = 0; i < k; i++) scale = Math.max(scale, Math.abs(a[i][i]));

  for (let c = 0; c < k; c++) {
    let pivot = c;
    for (let r = c + 1; r < k; r++) {
      if (Math.abs(a[r][c]) > Math.abs(a[pivot][c])) pivot = r;
    }
    if (scale === 0 || Math.abs(a[pivot][c]) <= SINGULARITY_TOLERANCE * scale) {
      throw new NumericalError('regression', `singular design at column ${c}`, rows, k);
    }
    [a[c], a[pivot]] = [a[pivot], a[c]];
    [b[c], b[pivot]] = [b[pivot], b[c]];

    for (let r = c + 1; r < k; r++) {
      const factor = a[r][c] / a[c][c];
      for (let j = c; j < k; j++) a[r][j] -= factor * a[c][j];
      b[r] -= factor * b[c];
    }
  }

  const x = new Array<number>(k).fill(0);
  for (let r = k - 1; r >= 0; r--) {
    let total = b[r];
    for (let j = r + 1; j < k; j++) total -= a[r][j] * x[j];
    x[r] = total / a[r][r];
  }
  return x;
}
