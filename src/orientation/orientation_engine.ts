/**
 * @fileoverview Worklist fixpoint that orients skeleton edges
 *
 * A bootstrap pass scores every edge with empty conditioning sets. The first
 * round then rescores every edge against the current parent sets; later
 * rounds rescore only the edges touching a variable whose parent set changed
 * in the previous round. Two worklists are swapped between rounds; the loop
 * stops once a round changes nothing or the round cap is reached.
 */

import type { Dataset, Variable } from '../data/dataset.js';
import type { CausalGraph, PairRelation } from '../graph/causal_graph.js';
import type { Knowledge } from '../knowledge/background_knowledge.js';
import { EMPTY_KNOWLEDGE } from '../knowledge/background_knowledge.js';
import {
  edgeForbiddenByKnowledge,
  knowledgeOrients,
  removeProtectedTier,
} from '../knowledge/knowledge_filter.js';
import { isNumericalError } from '../core/errors.js';
import { safeSync } from '../core/result.js';
import { createStageLogger, type StageLogger } from '../telemetry/logger.js';
import { favoursDirection, leftRight } from './asymmetry.js';

// ============================================================================
// TYPES
// ============================================================================

/**
 * Directional evidence for x→y given z. Positive favours x→y; undefined
 * counts as no evidence.
 */
export type AsymmetryStatistic = (
  dataset: Dataset,
  x: Variable,
  y: Variable,
  z: readonly Variable[],
) => number | undefined;

export interface OrientationOptions {
  /** Cap on rounds after the bootstrap pass. */
  maxIterations: number;
  knowledge?: Knowledge;
  /** Replaces the left-right statistic; used to exercise the tie-break rules. */
  statistic?: AsymmetryStatistic;
  logger?: StageLogger;
}

export interface OrientationReport {
  /** Rounds executed after the bootstrap pass. */
  rounds: number;
  /** Worklist size each round started from. */
  worklistSizes: number[];
  /** True when the loop ended on an empty worklist. */
  converged: boolean;
  /** Pair evaluations skipped because a regression was singular. */
  numericalFallbacks: number;
}

export type PairOutcome =
  | 'forbidden'
  | 'knowledge'
  | 'directed'
  | 'bidirected'
  | 'undirected'
  | 'unchanged'
  | 'numerical-fallback';

export interface OrientationContext {
  readonly dataset: Dataset;
  readonly graph: CausalGraph;
  readonly knowledge: Knowledge;
  readonly statistic: AsymmetryStatistic;
  readonly logger: StageLogger;
}

// ============================================================================
// SINGLE PAIR
// ============================================================================

/**
 * Apply the transition rule to {x, y}. `zx` and `zy` are the parent sets of x
 * and y; the partner and protected-tier variables are dropped here. Every
 * variable whose parent set changes is added to `changed`.
 */
export function orientPair(
  context: OrientationContext,
  x: Variable,
  y: Variable,
  zx: readonly Variable[],
  zy: readonly Variable[],
  changed: Set<Variable>,
): PairOutcome {
  const { graph, knowledge, dataset, statistic, logger } = context;
  const current = graph.getRelation(x, y);
  if (!current) return 'unchanged';

  if (edgeForbiddenByKnowledge(knowledge, x, y)) return 'forbidden';

  if (knowledgeOrients(knowledge, x, y)) {
    if (direct(graph, current, x, y)) changed.add(y);
    return 'knowledge';
  }
  if (knowledgeOrients(knowledge, y, x)) {
    if (direct(graph, current, y, x)) changed.add(x);
    return 'knowledge';
  }

  const condX = removeProtectedTier(knowledge, zx.filter((v) => v !== y));
  const condY = removeProtectedTier(knowledge, zy.filter((v) => v !== x));

  const scored = safeSync(() => ({
    xy: statistic(dataset, x, y, condY),
    yx: statistic(dataset, y, x, condX),
  }));
  if (!scored.ok) {
    if (!isNumericalError(scored.error)) throw scored.error;
    logger.warn('leaving pair unchanged after numerical failure', {
      pair: `${x.name},${y.name}`,
      reason: scored.error.message,
    });
    return 'numerical-fallback';
  }

  const cxy = favoursDirection(scored.value.xy);
  const cyx = favoursDirection(scored.value.yx);
  logger.debug('scored pair', {
    pair: `${x.name},${y.name}`,
    forward: scored.value.xy,
    backward: scored.value.yx,
  });

  if (cxy && !cyx) {
    if (!direct(graph, current, x, y)) return 'unchanged';
    changed.add(y);
    return 'directed';
  }
  if (cyx && !cxy) {
    if (!direct(graph, current, y, x)) return 'unchanged';
    changed.add(x);
    return 'directed';
  }
  if (!cxy && !cyx) {
    // Alternates between bidirected and undirected on each rescoring.
    changed.add(x);
    changed.add(y);
    if (current.kind !== 'bidirected') {
      graph.addBidirectedEdge(x, y);
      return 'bidirected';
    }
    graph.addUndirectedEdge(x, y);
    return 'undirected';
  }
  return 'unchanged';
}

function direct(graph: CausalGraph, current: PairRelation, tail: Variable, head: Variable): boolean {
  if (current.kind === 'directed' && current.tail === tail && current.head === head) return false;
  graph.addDirectedEdge(tail, head);
  return true;
}

// ============================================================================
// FIXPOINT LOOP
// ============================================================================

/**
 * Orient `graph` in place.
 */
export function runOrientation(
  dataset: Dataset,
  graph: CausalGraph,
  options: OrientationOptions,
): OrientationReport {
  const context: OrientationContext = {
    dataset,
    graph,
    knowledge: options.knowledge ?? EMPTY_KNOWLEDGE,
    statistic: options.statistic ?? leftRight,
    logger: options.logger ?? createStageLogger('orientation', false),
  };
  const report: OrientationReport = {
    rounds: 0,
    worklistSizes: [],
    converged: false,
    numericalFallbacks: 0,
  };
  const tally = (outcome: PairOutcome): void => {
    if (outcome === 'numerical-fallback') report.numericalFallbacks += 1;
  };

  const bootstrapChanged = new Set<Variable>();
  for (const { first, second } of graph.getPairs()) {
    tally(orientPair(context, first, second, [], [], bootstrapChanged));
  }
  context.logger.info('bootstrap pass complete', { changed: bootstrapChanged.size });

  // Round one covers every node, including parents fixed before the bootstrap.
  let worklist = new Set<Variable>(graph.getNodes());

  for (let round = 0; round < options.maxIterations; round++) {
    if (worklist.size === 0) break;
    const next = new Set<Variable>();
    report.worklistSizes.push(worklist.size);

    for (const { first, second } of graph.getPairs()) {
      const relation = graph.getRelation(first, second);
      if (!relation || relation.kind === 'two-cycle') continue;

      let x = first;
      let y = second;
      if (relation.kind === 'directed') {
        x = relation.tail;
        y = relation.head;
        if (!worklist.has(y)) continue;
      } else if (!worklist.has(x) && !worklist.has(y)) {
        continue;
      }

      tally(orientPair(context, x, y, graph.getParents(x), graph.getParents(y), next));
    }

    report.rounds += 1;
    context.logger.info(`round ${report.rounds} complete`, {
      consumed: worklist.size,
      changed: next.size,
    });
    worklist = next;
  }

  report.converged = worklist.size === 0;
  return report;
}
