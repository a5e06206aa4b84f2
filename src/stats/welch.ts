/**
 * @fileoverview Welch's unequal-variance two-sample t test
 */

import { mean, variance, type Sample } from '../utils/math.js';
import { studentTTwoSided } from './distributions.js';

export interface WelchResult {
  readonly statistic: number;
  /** Welch–Satterthwaite degrees of freedom. */
  readonly df: number;
  /** Two-sided p-value. */
  readonly pValue: number;
  /**
   * True when either sample has fewer than two values or the pooled standard
   * error is zero. A degenerate result never rejects.
   */
  readonly degenerate: boolean;
}

const DEGENERATE: WelchResult = Object.freeze({
  statistic: 0,
  df: 0,
  pValue: 1,
  degenerate: true,
});

/**
 * Test whether two independent samples share a mean without assuming equal
 * variances.
 */
export function welchTest(first: Sample, second: Sample): WelchResult {
  const n1 = first.length;
  const n2 = second.length;
  if (n1 < 2 || n2 < 2) return DEGENERATE;

  const v1 = variance(first) / n1;
  const v2 = variance(second) / n2;
  const se2 = v1 + v2;
  if (!(se2 > 0)) return DEGENERATE;

  const statistic = (mean(first) - mean(second)) / Math.sqrt(se2);
  const df = (se2 * se2) / ((v1 * v1) / (n1 - 1) + (v2 * v2) / (n2 - 1));

  return {
    statistic,
    df,
    pValue: studentTTwoSided(statistic, df),
    degenerate: false,
  };
}

/** True when the test rejects equal means at level `alpha`. */
export function welchRejects(result: WelchResult, alpha: number): boolean {
  return !result.degenerate && result.pValue < alpha;
}
