/**
 * @fileoverview Two-cycle detection by conditional Welch tests
 *
 * An undirected edge left over by the orientation loop may hide a feedback
 * loop. For every conditioning subset Z drawn from the directed neighbours of
 * the pair, and for each ordering (A, B), the normalized residual product
 * rA·rB / E[rA²] is compared between all rows and the rows where A > 0. A
 * loop shows up as a shift in that product in both orderings and for every
 * subset; one subset without the shift rules the loop out.
 */

import type { Dataset, Variable } from '../data/dataset.js';
import type { CausalGraph } from '../graph/causal_graph.js';
import type { Knowledge } from '../knowledge/background_knowledge.js';
import { EMPTY_KNOWLEDGE } from '../knowledge/background_knowledge.js';
import { knowledgeOrients, removeProtectedTier } from '../knowledge/knowledge_filter.js';
import { NumericalError, isNumericalError } from '../core/errors.js';
import { safeSync } from '../core/result.js';
import { createStageLogger, type StageLogger } from '../telemetry/logger.js';
import { ALL_ROWS, positiveRows, residualize, type RowFilter } from '../stats/residualizer.js';
import { welchTest, type WelchResult } from '../stats/welch.js';
import { meanOfSquares } from '../utils/math.js';
import { DepthChoiceGenerator, pick } from '../utils/combinations.js';

// ============================================================================
// TYPES
// ============================================================================

export interface TwoCycleOptions {
  /** Largest conditioning subset tried. */
  depth: number;
  /** Level of each Welch test. */
  alpha: number;
  knowledge?: Knowledge;
  logger?: StageLogger;
}

export interface OrderingOutcome {
  readonly rejects: boolean;
  /** Absent when the residual products could not be formed. */
  readonly welch?: WelchResult;
  readonly failure?: 'numerical' | 'degenerate';
}

export interface TwoCycleFailure {
  readonly subset: readonly Variable[];
  readonly reason: 'not-rejected' | 'numerical' | 'degenerate';
}

export interface TwoCycleEvaluation {
  readonly confirmed: boolean;
  readonly subsetsTested: number;
  /** The subset that ruled the loop out. */
  readonly failure?: TwoCycleFailure;
}

export interface TwoCyclePairResult {
  readonly x: Variable;
  readonly y: Variable;
  readonly evaluation: TwoCycleEvaluation;
}

export interface TwoCycleReport {
  readonly evaluated: TwoCyclePairResult[];
  readonly confirmed: TwoCyclePairResult[];
}

// ============================================================================
// CONDITIONING CANDIDATES
// ============================================================================

/**
 * Neighbours of x or y joined by a directed or bidirected edge, without the
 * protected tier and without x and y. Order follows x's neighbours, then
 * y's.
 */
export function candidateConditioningSet(
  graph: CausalGraph,
  knowledge: Knowledge,
  x: Variable,
  y: Variable,
): Variable[] {
  const candidates: Variable[] = [];
  for (const node of [x, y]) {
    for (const neighbour of graph.getAdjacentNodes(node)) {
      const kind = graph.getRelation(node, neighbour)?.kind;
      if (kind === 'undirected' || kind === 'two-cycle') continue;
      if (neighbour === x || neighbour === y || candidates.includes(neighbour)) continue;
      candidates.push(neighbour);
    }
  }
  return removeProtectedTier(knowledge, candidates);
}

// ============================================================================
// TESTS
// ============================================================================

/**
 * rA·rB / mean(rA²) over the rows `filter` keeps, where rA and rB are the
 * residuals of a and b on z.
 *
 * @throws NumericalError when a regression is singular or rA vanishes
 */
export function pairedResidualProducts(
  dataset: Dataset,
  a: Variable,
  b: Variable,
  z: readonly Variable[],
  filter: RowFilter = ALL_ROWS,
): Float64Array {
  const ra = residualize(dataset, a, z, filter);
  const rb = residualize(dataset, b, z, filter);
  const scale = meanOfSquares(ra);
  if (!(scale > 0)) {
    throw new NumericalError('normalization', `residual of ${a.name} has no variance`, ra.length, z.length);
  }
  const products = new Float64Array(ra.length);
  for (let i = 0; i < ra.length; i++) products[i] = (ra[i] * rb[i]) / scale;
  return products;
}

/**
 * Whether the residual products for (a, b) given z differ between the rows
 * with a > 0 and all rows.
 */
export function orderingRejects(
  dataset: Dataset,
  a: Variable,
  b: Variable,
  z: readonly Variable[],
  alpha: number,
): OrderingOutcome {
  const samples = safeSync(() => ({
    all: pairedResidualProducts(dataset, a, b, z, ALL_ROWS),
    truncated: pairedResidualProducts(dataset, a, b, z, positiveRows(a)),
  }));
  if (!samples.ok) {
    if (!isNumericalError(samples.error)) throw samples.error;
    return { rejects: false, failure: 'numerical' };
  }

  const welch = welchTest(samples.value.truncated, samples.value.all);
  if (welch.degenerate) return { rejects: false, welch, failure: 'degenerate' };
  return { rejects: welch.pValue < alpha, welch };
}

/**
 * Test {x, y} for a two-cycle. Every subset of the candidate set up to
 * `depth` elements must reject in both orderings.
 */
export function evaluateTwoCycle(
  dataset: Dataset,
  graph: CausalGraph,
  x: Variable,
  y: Variable,
  options: TwoCycleOptions,
): TwoCycleEvaluation {
  const knowledge = options.knowledge ?? EMPTY_KNOWLEDGE;
  const logger = options.logger ?? createStageLogger('two-cycle', false);
  const candidates = candidateConditioningSet(graph, knowledge, x, y);

  let subsetsTested = 0;
  for (const choice of new DepthChoiceGenerator(candidates.length, options.depth)) {
    const subset = pick(candidates, choice);
    subsetsTested += 1;

    const forward = orderingRejects(dataset, x, y, subset, options.alpha);
    const backward = orderingRejects(dataset, y, x, subset, options.alpha);
    logger.debug('tested subset', {
      pair: `${x.name},${y.name}`,
      subset: subset.map((v) => v.name),
      forward: forward.welch?.pValue,
      backward: backward.welch?.pValue,
    });

    if (!forward.rejects || !backward.rejects) {
      const reason = forward.failure ?? backward.failure ?? 'not-rejected';
      return { confirmed: false, subsetsTested, failure: { subset, reason } };
    }
  }
  return { confirmed: true, subsetsTested };
}

// ============================================================================
// PASS
// ============================================================================

/**
 * Evaluate every undirected edge that knowledge leaves free and turn the
 * confirmed ones into two-cycles, in edge order.
 */
export function runTwoCyclePass(
  dataset: Dataset,
  graph: CausalGraph,
  options: TwoCycleOptions,
): TwoCycleReport {
  const knowledge = options.knowledge ?? EMPTY_KNOWLEDGE;
  const logger = options.logger ?? createStageLogger('two-cycle', false);
  const evaluated: TwoCyclePairResult[] = [];
  const confirmed: TwoCyclePairResult[] = [];

  for (const { first: x, second: y } of graph.getPairs()) {
    if (!graph.isUndirected(x, y)) continue;
    if (knowledgeOrients(knowledge, x, y) || knowledgeOrients(knowledge, y, x)) continue;

    const evaluation = evaluateTwoCycle(dataset, graph, x, y, { ...options, knowledge, logger });
    const result: TwoCyclePairResult = { x, y, evaluation };
    evaluated.push(result);
    if (evaluation.confirmed) {
      graph.addTwoCycle(x, y);
      confirmed.push(result);
      logger.info('pair confirmed', { pair: `${x.name},${y.name}` });
    }
  }

  return { evaluated, confirmed };
}
