/**
 * @fileoverview Skeleton acquisition and knowledge pre-orientation
 *
 * The search starts from an undirected skeleton, either supplied by the
 * caller or built by a skeleton builder (BIC neighbourhood selection by
 * default). Knowledge is applied before any statistic is computed.
 */

import type { Dataset } from '../data/dataset.js';
import { CausalGraph } from '../graph/causal_graph.js';
import type { Knowledge } from '../knowledge/background_knowledge.js';
import { edgeForbiddenByKnowledge, knowledgeOrients } from '../knowledge/knowledge_filter.js';
import { InvalidGraphError } from '../core/errors.js';
import { buildBicSkeleton } from './bic_neighborhood.js';

// ============================================================================
// TYPES
// ============================================================================

export interface SkeletonRequest {
  dataset: Dataset;
  penaltyDiscount: number;
  faithfulnessAssumed: boolean;
  symmetricFirstStep: boolean;
  /** -1 for no limit. */
  maxDegree: number;
  knowledge: Knowledge;
  verbose: boolean;
}

/**
 * Builds an undirected graph over the request's variables. May return null
 * when it has nothing to offer, which the search treats as an error.
 */
export type SkeletonBuilder = (request: SkeletonRequest) => CausalGraph | null | undefined;

export type SkeletonSource =
  | { readonly kind: 'search'; readonly build?: SkeletonBuilder }
  | { readonly kind: 'graph'; readonly graph: CausalGraph };

export interface KnowledgeAdjustment {
  removed: number;
  oriented: number;
}

// ============================================================================
// OPERATIONS
// ============================================================================

/**
 * Undirected skeleton over the dataset's own variables.
 *
 * @throws InvalidGraphError when no graph is produced or a node has no
 * same-named variable in the dataset
 */
export function obtainSkeleton(source: SkeletonSource, request: SkeletonRequest): CausalGraph {
  const graph =
    source.kind === 'graph' ? source.graph : (source.build ?? buildBicSkeleton)(request);
  if (!graph) {
    throw new InvalidGraphError('skeleton builder returned no graph');
  }
  const rebound = graph.toUndirected().rebind(request.dataset.variables);
  for (const variable of request.dataset.variables) rebound.addNode(variable);
  return rebound;
}

/**
 * Remove edges knowledge forbids in both directions and direct the edges
 * whose direction knowledge fixes. Mutates `graph`.
 */
export function preOrientByKnowledge(graph: CausalGraph, knowledge: Knowledge): KnowledgeAdjustment {
  const adjustment: KnowledgeAdjustment = { removed: 0, oriented: 0 };
  for (const { first, second } of graph.getPairs()) {
    if (edgeForbiddenByKnowledge(knowledge, first, second)) {
      graph.removeEdges(first, second);
      adjustment.removed += 1;
    } else if (knowledgeOrients(knowledge, first, second)) {
      graph.addDirectedEdge(first, second);
      adjustment.oriented += 1;
    } else if (knowledgeOrients(knowledge, second, first)) {
      graph.addDirectedEdge(second, first);
      adjustment.oriented += 1;
    }
  }
  return adjustment;
}
