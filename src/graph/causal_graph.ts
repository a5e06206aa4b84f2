/**
 * @fileoverview Mutable causal graph with one relation per variable pair
 *
 * Each unordered pair carries at most one relation. Setting a relation for a
 * pair replaces whatever the pair held, so undirected, directed, bidirected
 * and two-cycle classifications are mutually exclusive by construction.
 * A two-cycle is reported by {@link CausalGraph.getEdges} as the two directed
 * edges A→B and B→A.
 */

import type { Variable } from '../data/dataset.js';
import { InvalidGraphError } from '../core/errors.js';

// ============================================================================
// TYPES
// ============================================================================

export type PairRelation =
  | { readonly kind: 'undirected' }
  | { readonly kind: 'directed'; readonly tail: Variable; readonly head: Variable }
  | { readonly kind: 'bidirected' }
  | { readonly kind: 'two-cycle' };

export type PairRelationKind = PairRelation['kind'];

export type EdgeKind = 'undirected' | 'directed' | 'bidirected';

/**
 * A single edge. For directed edges `node1` is the tail and `node2` the head.
 */
export interface GraphEdge {
  readonly node1: Variable;
  readonly node2: Variable;
  readonly kind: EdgeKind;
}

/**
 * A pair and its relation, in the order the pair was first connected (or, for
 * directed relations, tail first).
 */
export interface GraphPair {
  readonly first: Variable;
  readonly second: Variable;
  readonly relation: PairRelation;
}

const UNDIRECTED: PairRelation = Object.freeze({ kind: 'undirected' });
const BIDIRECTED: PairRelation = Object.freeze({ kind: 'bidirected' });
const TWO_CYCLE: PairRelation = Object.freeze({ kind: 'two-cycle' });

// ============================================================================
// GRAPH
// ============================================================================

export class CausalGraph {
  private readonly nodes = new Map<string, Variable>();
  private readonly pairs = new Map<string, GraphPair>();

  constructor(nodes: Iterable<Variable> = []) {
    for (const node of nodes) this.addNode(node);
  }

  // --------------------------------------------------------------------------
  // Nodes
  // --------------------------------------------------------------------------

  addNode(node: Variable): void {
    const existing = this.nodes.get(node.name);
    if (existing && existing !== node) {
      throw new InvalidGraphError(`a different node named ${node.name} is already present`);
    }
    this.nodes.set(node.name, node);
  }

  getNodes(): Variable[] {
    return Array.from(this.nodes.values());
  }

  containsNode(node: Variable): boolean {
    return this.nodes.get(node.name) === node;
  }

  // --------------------------------------------------------------------------
  // Mutation
  // --------------------------------------------------------------------------

  /**
   * Replace the relation of the pair {a, b}. The pair keeps its position in
   * edge iteration order.
   */
  setRelation(a: Variable, b: Variable, relation: PairRelation): void {
    this.requireNode(a);
    this.requireNode(b);
    if (a === b) {
      throw new InvalidGraphError(`self-loop on ${a.name}`);
    }
    if (relation.kind === 'directed' && !isEndpointPair(relation, a, b)) {
      throw new InvalidGraphError(`directed relation does not join ${a.name} and ${b.name}`);
    }
    const key = pairKey(a, b);
    const existing = this.pairs.get(key);
    const [first, second] =
      relation.kind === 'directed'
        ? [relation.tail, relation.head]
        : existing
          ? [existing.first, existing.second]
          : [a, b];
    this.pairs.set(key, { first, second, relation });
  }

  addUndirectedEdge(a: Variable, b: Variable): void {
    this.setRelation(a, b, UNDIRECTED);
  }

  addDirectedEdge(tail: Variable, head: Variable): void {
    this.setRelation(tail, head, { kind: 'directed', tail, head });
  }

  addBidirectedEdge(a: Variable, b: Variable): void {
    this.setRelation(a, b, BIDIRECTED);
  }

  /**
   * Mark {a, b} as a feedback loop: a→b and b→a coexist.
   */
  addTwoCycle(a: Variable, b: Variable): void {
    this.setRelation(a, b, TWO_CYCLE);
  }

  removeEdges(a: Variable, b: Variable): boolean {
    return this.pairs.delete(pairKey(a, b));
  }

  // --------------------------------------------------------------------------
  // Queries
  // --------------------------------------------------------------------------

  getRelation(a: Variable, b: Variable): PairRelation | undefined {
    return this.pairs.get(pairKey(a, b))?.relation;
  }

  getPair(a: Variable, b: Variable): GraphPair | undefined {
    return this.pairs.get(pairKey(a, b));
  }

  /** Snapshot of all pairs in insertion order. */
  getPairs(): GraphPair[] {
    return Array.from(this.pairs.values());
  }

  getEdges(): GraphEdge[] {
    const edges: GraphEdge[] = [];
    for (const { first, second, relation } of this.pairs.values()) {
      switch (relation.kind) {
        case 'undirected':
        case 'bidirected':
          edges.push({ node1: first, node2: second, kind: relation.kind });
          break;
        case 'directed':
          edges.push({ node1: relation.tail, node2: relation.head, kind: 'directed' });
          break;
        case 'two-cycle':
          edges.push({ node1: first, node2: second, kind: 'directed' });
          edges.push({ node1: second, node2: first, kind: 'directed' });
          break;
      }
    }
    return edges;
  }

  getNumEdges(): number {
    return this.getEdges().length;
  }

  getNumPairs(): number {
    return this.pairs.size;
  }

  isAdjacentTo(a: Variable, b: Variable): boolean {
    return this.pairs.has(pairKey(a, b));
  }

  getAdjacentNodes(node: Variable): Variable[] {
    const adjacent: Variable[] = [];
    for (const { first, second } of this.pairs.values()) {
      if (first === node) adjacent.push(second);
      else if (second === node) adjacent.push(first);
    }
    return adjacent;
  }

  /**
   * Tails of the directed edges pointing into `node`. Two-cycle partners are
   * parents too.
   */
  getParents(node: Variable): Variable[] {
    const parents: Variable[] = [];
    for (const { first, second, relation } of this.pairs.values()) {
      if (relation.kind === 'directed') {
        if (relation.head === node) parents.push(relation.tail);
      } else if (relation.kind === 'two-cycle') {
        if (first === node) parents.push(second);
        else if (second === node) parents.push(first);
      }
    }
    return parents;
  }

  isDirectedFromTo(tail: Variable, head: Variable): boolean {
    const relation = this.getRelation(tail, head);
    return relation?.kind === 'directed' && relation.tail === tail && relation.head === head;
  }

  isUndirected(a: Variable, b: Variable): boolean {
    return this.getRelation(a, b)?.kind === 'undirected';
  }

  isBidirected(a: Variable, b: Variable): boolean {
    return this.getRelation(a, b)?.kind === 'bidirected';
  }

  isTwoCycle(a: Variable, b: Variable): boolean {
    return this.getRelation(a, b)?.kind === 'two-cycle';
  }

  /**
   * True when the relation between `from` and `to` has an arrowhead at `to`.
   */
  pointsTowards(from: Variable, to: Variable): boolean {
    const relation = this.getRelation(from, to);
    if (!relation) return false;
    switch (relation.kind) {
      case 'directed':
        return relation.head === to;
      case 'bidirected':
      case 'two-cycle':
        return true;
      case 'undirected':
        return false;
    }
  }

  // --------------------------------------------------------------------------
  // Derived graphs
  // --------------------------------------------------------------------------

  /** Copy with every adjacency made undirected. */
  toUndirected(): CausalGraph {
    const graph = new CausalGraph(this.nodes.values());
    for (const { first, second } of this.pairs.values()) {
      graph.addUndirectedEdge(first, second);
    }
    return graph;
  }

  /**
   * Copy whose nodes are replaced by the same-named variables from
   * `variables`. Throws {@link InvalidGraphError} naming any node that has no
   * counterpart.
   */
  rebind(variables: readonly Variable[]): CausalGraph {
    const byName = new Map(variables.map((v) => [v.name, v]));
    const missing = this.getNodes()
      .map((node) => node.name)
      .filter((name) => !byName.has(name));
    if (missing.length > 0) {
      throw new InvalidGraphError(`nodes not present in the dataset: ${missing.join(', ')}`, missing);
    }
    const swap = (node: Variable): Variable => byName.get(node.name) ?? node;
    const graph = new CausalGraph(this.getNodes().map(swap));
    for (const { first, second, relation } of this.pairs.values()) {
      const rebound: PairRelation =
        relation.kind === 'directed'
          ? { kind: 'directed', tail: swap(relation.tail), head: swap(relation.head) }
          : relation;
      graph.setRelation(swap(first), swap(second), rebound);
    }
    return graph;
  }

  // --------------------------------------------------------------------------
  // Rendering
  // --------------------------------------------------------------------------

  toString(): string {
    const lines = ['Graph Nodes:', this.getNodes().map((n) => n.name).join(';'), '', 'Graph Edges:'];
    let index = 1;
    for (const { first, second, relation } of this.pairs.values()) {
      lines.push(`${index}. ${renderPair(first, second, relation)}`);
      index += 1;
    }
    return lines.join('\n');
  }

  private requireNode(node: Variable): void {
    if (!this.containsNode(node)) {
      throw new InvalidGraphError(`node ${node.name} is not in the graph`, [node.name]);
    }
  }
}

// ============================================================================
// HELPERS
// ============================================================================

function pairKey(a: Variable, b: Variable): string {
  return a.name < b.name ? `${a.name}\u0000${b.name}` : `${b.name}\u0000${a.name}`;
}

function isEndpointPair(
  relation: { readonly tail: Variable; readonly head: Variable },
  a: Variable,
  b: Variable,
): boolean {
  return (relation.tail === a && relation.head === b) || (relation.tail === b && relation.head === a);
}

function renderPair(first: Variable, second: Variable, relation: PairRelation): string {
  switch (relation.kind) {
    case 'undirected':
      return `${first.name} --- ${second.name}`;
    case 'directed':
      return `${relation.tail.name} --> ${relation.head.name}`;
    case 'bidirected':
      return `${first.name} <-> ${second.name}`;
    case 'two-cycle':
      return `${first.name} <=> ${second.name}`;
  }
}
