import { describe, it, expect } from 'vitest';
import { logGamma, regularizedIncompleteBeta, studentTCdf, studentTTwoSided } from '../distributions.js';
import { welchRejects, welchTest } from '../welch.js';

describe('distributions', () => {
  it('computes log-gamma at known points', () => {
    expect(logGamma(1)).toBeCloseTo(0, 10);
    expect(logGamma(5)).toBeCloseTo(Math.log(24), 10);
    expect(logGamma(0.5)).toBeCloseTo(0.5 * Math.log(Math.PI), 10);
  });

  it('computes the regularized incomplete beta', () => {
    expect(regularizedIncompleteBeta(1, 1, 0.3)).toBeCloseTo(0.3, 10);
    expect(regularizedIncompleteBeta(2, 3, 0.4)).toBeCloseTo(0.5248, 10);
    expect(regularizedIncompleteBeta(4, 4, 0.5)).toBeCloseTo(0.5, 10);
    expect(regularizedIncompleteBeta(2, 3, 0)).toBe(0);
    expect(regularizedIncompleteBeta(2, 3, 1)).toBe(1);
  });

  it('matches closed forms of the t distribution', () => {
    expect(studentTCdf(0, 7)).toBeCloseTo(0.5, 12);
    expect(studentTCdf(1, 1)).toBeCloseTo(0.75, 10);
    // df = 2: F(t) = 1/2 + t / (2 sqrt(2 + t^2))
    expect(studentTCdf(2, 2)).toBeCloseTo(0.5 + 1 / Math.sqrt(6), 10);
    expect(studentTCdf(-2, 2)).toBeCloseTo(0.5 - 1 / Math.sqrt(6), 10);
  });

  it('gives the familiar two-sided critical value', () => {
    expect(studentTTwoSided(2.228, 10)).toBeCloseTo(0.05, 3);
  });
});

describe('welchTest', () => {
  it('uses the Welch–Satterthwaite degrees of freedom', () => {
    const result = welchTest([1, 2, 3, 4], [2, 4, 6, 8]);
    expect(result.degenerate).toBe(false);
    expect(result.statistic).toBeCloseTo(-Math.sqrt(3), 10);
    expect(result.df).toBeCloseTo(75 / 17, 10);
    expect(result.pValue).toBeCloseTo(0.15158, 4);
  });

  it('does not reject identical samples', () => {
    const result = welchTest([1, 2, 3, 4, 5], [1, 2, 3, 4, 5]);
    expect(result.statistic).toBe(0);
    expect(result.pValue).toBeCloseTo(1, 12);
    expect(welchRejects(result, 0.05)).toBe(false);
  });

  it('rejects clearly separated samples', () => {
    const result = welchTest([10, 11, 12, 10, 11, 12], [0, 1, 2, 0, 1, 2]);
    expect(result.pValue).toBeLessThan(1e-6);
    expect(welchRejects(result, 0.05)).toBe(true);
  });

  it('is degenerate with fewer than two values', () => {
    const result = welchTest([1], [1, 2, 3]);
    expect(result.degenerate).toBe(true);
    expect(result.pValue).toBe(1);
    expect(welchRejects(result, 0.5)).toBe(false);
  });

  it('is degenerate with zero standard error', () => {
    expect(welchTest([2, 2, 2], [5, 5]).degenerate).toBe(true);
  });
});
