import { describe, it, expect } from 'vitest';
import { createDataset, createDatasetFromRows } from '../dataset.js';
import { ValidationError } from '../../core/errors.js';

describe('createDataset', () => {
  it('centres columns by default', () => {
    const dataset = createDataset(['A', 'B'], [
      [1, 2, 3],
      [10, 10, 13],
    ]);
    expect(dataset.size).toBe(2);
    expect(dataset.sampleSize).toBe(3);
    const [a, b] = dataset.variables;
    expect(Array.from(dataset.getColumn(a))).toEqual([-1, 0, 1]);
    expect(Array.from(dataset.getColumn(b))).toEqual([-1, -1, 2]);
  });

  it('keeps raw values when centring is disabled', () => {
    const dataset = createDataset(['A'], [[1, 2, 3]], { center: false });
    expect(Array.from(dataset.getColumn(dataset.variables[0]))).toEqual([1, 2, 3]);
  });

  it('copies its input', () => {
    const column = [1, 2, 3];
    const dataset = createDataset(['A'], [column], { center: false });
    column[0] = 99;
    expect(dataset.getColumn(dataset.variables[0])[0]).toBe(1);
  });

  it('looks variables up by name', () => {
    const dataset = createDataset(['A', 'B'], [[1, 2], [3, 4]]);
    expect(dataset.getVariable('B')).toBe(dataset.variables[1]);
    expect(dataset.getVariable('C')).toBeUndefined();
  });

  it('shares variable identities with its centred copy', () => {
    const raw = createDataset(['A'], [[1, 3]], { center: false });
    const centred = raw.centered();
    expect(centred.variables[0]).toBe(raw.variables[0]);
    expect(Array.from(centred.getColumn(raw.variables[0]))).toEqual([-1, 1]);
  });

  it('rejects variables from another dataset', () => {
    const first = createDataset(['A'], [[1, 2]]);
    const second = createDataset(['A'], [[1, 2]]);
    expect(first.owns(second.variables[0])).toBe(false);
    expect(() => first.getColumn(second.variables[0])).toThrow(ValidationError);
  });

  it('validates shape and values', () => {
    expect(() => createDataset(['A', 'B'], [[1, 2]])).toThrow(ValidationError);
    expect(() => createDataset([], [])).toThrow(/at least one variable/);
    expect(() => createDataset(['A', 'A'], [[1], [2]])).toThrow(/duplicate A/);
    expect(() => createDataset([' '], [[1]])).toThrow(/non-empty variable names/);
    expect(() => createDataset(['A', 'B'], [[1, 2], [1]])).toThrow(/columns\.B/);
    expect(() => createDataset(['A'], [[1, Number.NaN]])).toThrow(/columns\.A\[1\]/);
  });
});

describe('createDatasetFromRows', () => {
  it('transposes row-major records', () => {
    const dataset = createDatasetFromRows(['A', 'B'], [[1, 4], [2, 5], [3, 6]], { center: false });
    expect(Array.from(dataset.getColumn(dataset.variables[1]))).toEqual([4, 5, 6]);
  });

  it('rejects ragged rows', () => {
    expect(() => createDatasetFromRows(['A', 'B'], [[1, 2], [3]])).toThrow(/rows\[1\]/);
  });
});
