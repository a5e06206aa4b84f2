/**
 * @fileoverview Background knowledge: forbidden and required edges, tiers
 *
 * Knowledge is keyed by variable name so it can be written before a dataset
 * exists. Tiers impose a temporal order: a variable in a later tier can never
 * cause one in an earlier tier.
 */

// ============================================================================
// INTERFACE
// ============================================================================

/**
 * Read-only view the search consults.
 */
export interface Knowledge {
  /** True when the directed edge `from → to` may not appear. */
  isForbidden(from: string, to: string): boolean;
  /** True when the directed edge `from → to` must appear. */
  isRequired(from: string, to: string): boolean;
  getNumTiers(): number;
  /** Names in tier `tier`, in insertion order. Empty for unknown tiers. */
  getTier(tier: number): readonly string[];
  isInTier(tier: number, name: string): boolean;
  isEmpty(): boolean;
}

// ============================================================================
// IMPLEMENTATION
// ============================================================================

export class BackgroundKnowledge implements Knowledge {
  private readonly forbidden = new Set<string>();
  private readonly required = new Set<string>();
  private readonly tiers: string[][] = [];
  private readonly tierOf = new Map<string, number>();

  setForbidden(from: string, to: string): this {
    this.forbidden.add(edgeKey(from, to));
    return this;
  }

  removeForbidden(from: string, to: string): this {
    this.forbidden.delete(edgeKey(from, to));
    return this;
  }

  setRequired(from: string, to: string): this {
    this.required.add(edgeKey(from, to));
    return this;
  }

  removeRequired(from: string, to: string): this {
    this.required.delete(edgeKey(from, to));
    return this;
  }

  /**
   * Place `name` in `tier`, moving it out of any tier it was in. Intermediate
   * tiers are created empty.
   */
  addToTier(tier: number, name: string): this {
    if (!Number.isInteger(tier) || tier < 0) {
      throw new RangeError(`tier must be a non-negative integer, got ${tier}`);
    }
    const previous = this.tierOf.get(name);
    if (previous !== undefined) {
      this.tiers[previous] = this.tiers[previous].filter((n) => n !== name);
    }
    while (this.tiers.length <= tier) this.tiers.push([]);
    this.tiers[tier].push(name);
    this.tierOf.set(name, tier);
    return this;
  }

  isForbidden(from: string, to: string): boolean {
    if (this.forbidden.has(edgeKey(from, to))) return true;
    const fromTier = this.tierOf.get(from);
    const toTier = this.tierOf.get(to);
    return fromTier !== undefined && toTier !== undefined && fromTier > toTier;
  }

  isRequired(from: string, to: string): boolean {
    return this.required.has(edgeKey(from, to));
  }

  getNumTiers(): number {
    return this.tiers.length;
  }

  getTier(tier: number): readonly string[] {
    return this.tiers[tier] ?? [];
  }

  isInTier(tier: number, name: string): boolean {
    return this.tierOf.get(name) === tier;
  }

  isEmpty(): boolean {
    return this.forbidden.size === 0 && this.required.size === 0 && this.tiers.length === 0;
  }
}

function edgeKey(from: string, to: string): string {
  return `${from}\u0000${to}`;
}

/** Knowledge that permits everything. */
export const EMPTY_KNOWLEDGE: Knowledge = Object.freeze({
  isForbidden: () => false,
  isRequired: () => false,
  getNumTiers: () => 0,
  getTier: () => [],
  isInTier: () => false,
  isEmpty: () => true,
});
