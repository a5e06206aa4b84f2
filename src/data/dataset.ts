/**
 * @fileoverview Observation matrix and variable identities
 *
 * A dataset is an ordered list of variables, each bound to one column of
 * samples. All columns share the same length and row alignment; rows are
 * never reordered once created. Variables compare by identity: two datasets
 * built separately from the same names have distinct variables, while a
 * centred copy keeps the original's.
 */

import { ValidationError } from '../core/errors.js';
import { mean } from '../utils/math.js';

// ============================================================================
// TYPES
// ============================================================================

export interface Variable {
  readonly name: string;
  /** Column index into the owning dataset. */
  readonly index: number;
}

export type Column = Float64Array;

export interface DatasetOptions {
  /** Subtract each column's mean (default: true). */
  center?: boolean;
}

// ============================================================================
// DATASET
// ============================================================================

export class Dataset {
  private readonly byName: Map<string, Variable>;

  private constructor(
    readonly variables: readonly Variable[],
    private readonly columns: readonly Column[],
    readonly sampleSize: number,
  ) {
    this.byName = new Map(variables.map((v) => [v.name, v]));
  }

  /** @internal use {@link createDataset} */
  static fromValidated(names: readonly string[], columns: readonly Column[]): Dataset {
    const variables = names.map((name, index): Variable => Object.freeze({ name, index }));
    return new Dataset(variables, columns, columns[0]?.length ?? 0);
  }

  get size(): number {
    return this.variables.length;
  }

  getVariable(name: string): Variable | undefined {
    return this.byName.get(name);
  }

  /** True when `variable` is one of this dataset's own variable objects. */
  owns(variable: Variable): boolean {
    return this.variables[variable.index] === variable;
  }

  /**
   * Column for a variable of this dataset. The returned array is shared and
   * must be treated as read-only.
   */
  getColumn(variable: Variable): Column {
    if (!this.owns(variable)) {
      throw new ValidationError('variable', 'a variable of this dataset', variable.name);
    }
    return this.columns[variable.index];
  }

  /**
   * Copy with every column shifted to zero mean. The copy shares this
   * dataset's variable identities.
   */
  centered(): Dataset {
    const shifted = this.columns.map((column) => {
      const m = mean(column);
      return column.map((value) => value - m);
    });
    return new Dataset(this.variables, shifted, this.sampleSize);
  }
}

// ============================================================================
// CONSTRUCTION
// ============================================================================

/**
 * Build a dataset from named columns, validating shape and values.
 * Columns are copied.
 */
export function createDataset(
  names: readonly string[],
  columns: ReadonlyArray<ArrayLike<number>>,
  options: DatasetOptions = {},
): Dataset {
  if (names.length !== columns.length) {
    throw new ValidationError('columns', `${names.length} columns`, `${columns.length}`);
  }
  if (names.length === 0) {
    throw new ValidationError('names', 'at least one variable', 'none');
  }

  const seen = new Set<string>();
  for (const name of names) {
    if (name.trim().length === 0) {
      throw new ValidationError('names', 'non-empty variable names', JSON.stringify(name));
    }
    if (seen.has(name)) {
      throw new ValidationError('names', 'unique variable names', `duplicate ${name}`);
    }
    seen.add(name);
  }

  const sampleSize = columns[0].length;
  const copies: Column[] = columns.map((column, c) => {
    if (column.length !== sampleSize) {
      throw new ValidationError(`columns.${names[c]}`, `${sampleSize} samples`, `${column.length}`);
    }
    const copy = Float64Array.from(column);
    for (let i = 0; i < copy.length; i++) {
      if (!Number.isFinite(copy[i])) {
        throw new ValidationError(`columns.${names[c]}[${i}]`, 'a finite number', String(copy[i]));
      }
    }
    return copy;
  });

  const dataset = Dataset.fromValidated(names, copies);
  return options.center === false ? dataset : dataset.centered();
}

/**
 * Build a dataset from row-major records, e.g. parsed CSV rows.
 */
export function createDatasetFromRows(
  names: readonly string[],
  rows: ReadonlyArray<ArrayLike<number>>,
  options: DatasetOptions = {},
): Dataset {
  const columns = names.map((_, c) => {
    const column = new Float64Array(rows.length);
    rows.forEach((row, r) => {
      if (row.length !== names.length) {
        throw new ValidationError(`rows[${r}]`, `${names.length} values`, `${row.length}`);
      }
      column[r] = row[c];
    });
    return column;
  });
  return createDataset(names, columns, options);
}
