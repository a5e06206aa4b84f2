/**
 * @fileoverview Depth-bounded subset enumeration
 *
 * Enumerates index combinations of {0..n-1} by increasing size, from the empty
 * choice up to `depth` elements, each size in lexicographic order. State is a
 * single index array, so enumeration can stop early and be restarted without
 * recursion.
 */

export class DepthChoiceGenerator {
  private readonly depth: number;
  private size = 0;
  private choice: number[] = [];
  private started = false;
  private exhausted = false;

  constructor(
    readonly n: number,
    depth: number,
  ) {
    if (!Number.isInteger(n) || n < 0) {
      throw new RangeError(`n must be a non-negative integer, got ${n}`);
    }
    if (!Number.isInteger(depth) || depth < 0) {
      throw new RangeError(`depth must be a non-negative integer, got ${depth}`);
    }
    this.depth = Math.min(depth, n);
  }

  /**
   * Next combination, or null once every subset up to `depth` was produced.
   * The returned array is a copy.
   */
  next(): number[] | null {
    if (this.exhausted) return null;

    if (!this.started) {
      this.started = true;
      return [];
    }

    if (this.advanceWithinSize()) {
      return [...this.choice];
    }

    this.size += 1;
    if (this.size > this.depth) {
      this.exhausted = true;
      return null;
    }
    this.choice = Array.from({ length: this.size }, (_, i) => i);
    return [...this.choice];
  }

  reset(): void {
    this.size = 0;
    this.choice = [];
    this.started = false;
    this.exhausted = false;
  }

  *[Symbol.iterator](): IterableIterator<number[]> {
    this.reset();
    let choice = this.next();
    while (choice !== null) {
      yield choice;
      choice = this.next();
    }
  }

  private advanceWithinSize(): boolean {
    const k = this.choice.length;
    for (let i = k - 1; i >= 0; i--) {
      if (this.choice[i] < this.n - k + i) {
        this.choice[i] += 1;
        for (let j = i + 1; j < k; j++) {
          this.choice[j] = this.choice[j - 1] + 1;
        }
        return true;
      }
    }
    return false;
  }
}

/**
 * Select the items at the given indices.
 */
export function pick<T>(items: readonly T[], indices: readonly number[]): T[] {
  const selected: T[] = [];
  for (const index of indices) {
    const item = items[index];
    if (item !== undefined) selected.push(item);
  }
  return selected;
}
