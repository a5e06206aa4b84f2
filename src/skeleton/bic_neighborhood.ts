/**
 * @fileoverview Default skeleton: stepwise BIC neighbourhood selection
 *
 * Each variable picks its neighbourhood by forward/backward stepwise least
 * squares. Adding X to the set S of target T gains
 * n·ln(RSS_S / RSS_{S∪X}) − c·ln(n), with c the penalty discount. Forward
 * steps take the largest strictly positive gain; backward steps drop the
 * variable whose removal costs least while that cost stays below the
 * penalty. The neighbourhoods are then merged into an undirected graph.
 */

import type { Dataset, Variable } from '../data/dataset.js';
import { CausalGraph } from '../graph/causal_graph.js';
import { edgeForbiddenByKnowledge } from '../knowledge/knowledge_filter.js';
import { isNumericalError } from '../core/errors.js';
import { safeSync } from '../core/result.js';
import { residualize } from '../stats/residualizer.js';
import { createStageLogger } from '../telemetry/logger.js';
import type { SkeletonRequest } from './bootstrap.js';

function residualSumOfSquares(dataset: Dataset, target: Variable, regressors: readonly Variable[]): number {
  const residuals = residualize(dataset, target, regressors);
  let total = 0;
  for (let i = 0; i < residuals.length; i++) total += residuals[i] * residuals[i];
  return total;
}

/** RSS, or undefined when the design is singular. */
function tryResidualSumOfSquares(
  dataset: Dataset,
  target: Variable,
  regressors: readonly Variable[],
): number | undefined {
  const result = safeSync(() => residualSumOfSquares(dataset, target, regressors));
  if (result.ok) return result.value;
  if (isNumericalError(result.error)) return undefined;
  throw result.error;
}

/**
 * Neighbourhood of `target` among `candidates`.
 */
export function selectNeighborhood(
  dataset: Dataset,
  target: Variable,
  candidates: readonly Variable[],
  options: Pick<SkeletonRequest, 'penaltyDiscount' | 'faithfulnessAssumed' | 'maxDegree'>,
): Variable[] {
  const n = dataset.sampleSize;
  const penalty = options.penaltyDiscount * Math.log(n);
  const baseline = residualSumOfSquares(dataset, target, []);

  let pool = [...candidates];
  if (options.faithfulnessAssumed) {
    pool = pool.filter((candidate) => {
      const rss = tryResidualSumOfSquares(dataset, target, [candidate]);
      return rss !== undefined && n * Math.log(baseline / rss) > penalty;
    });
  }

  const selected: Variable[] = [];
  let current = baseline;

  // Forward
  while (options.maxDegree < 0 || selected.length < options.maxDegree) {
    let best: Variable | undefined;
    let bestGain = 0;
    let bestRss = current;
    for (const candidate of pool) {
      if (selected.includes(candidate)) continue;
      const rss = tryResidualSumOfSquares(dataset, target, [...selected, candidate]);
      if (rss === undefined) continue;
      const gain = n * Math.log(current / rss) - penalty;
      if (gain > bestGain) {
        best = candidate;
        bestGain = gain;
        bestRss = rss;
      }
    }
    if (!best) break;
    selected.push(best);
    current = bestRss;
  }

  // Backward
  while (selected.length > 0) {
    let worst: Variable | undefined;
    let worstLoss = 0;
    let worstRss = current;
    for (const member of selected) {
      const rss = residualSumOfSquares(dataset, target, selected.filter((v) => v !== member));
      const loss = n * Math.log(rss / current) - penalty;
      if (loss < worstLoss) {
        worst = member;
        worstLoss = loss;
        worstRss = rss;
      }
    }
    if (!worst) break;
    selected.splice(selected.indexOf(worst), 1);
    current = worstRss;
  }

  return selected;
}

/**
 * Undirected skeleton from per-variable neighbourhoods. With
 * `symmetricFirstStep` both endpoints must pick each other; otherwise one
 * suffices. Pairs forbidden in both directions are never considered.
 */
export function buildBicSkeleton(request: SkeletonRequest): CausalGraph {
  const { dataset, knowledge } = request;
  const logger = createStageLogger('skeleton', request.verbose);
  const variables = dataset.variables;

  const neighborhoods = new Map<Variable, Set<Variable>>();
  for (const target of variables) {
    const candidates = variables.filter(
      (v) => v !== target && !edgeForbiddenByKnowledge(knowledge, target, v),
    );
    const selected = selectNeighborhood(dataset, target, candidates, request);
    neighborhoods.set(target, new Set(selected));
    logger.debug('selected neighbourhood', {
      target: target.name,
      neighbours: selected.map((v) => v.name),
    });
  }

  const graph = new CausalGraph(variables);
  for (let i = 0; i < variables.length; i++) {
    for (let j = i + 1; j < variables.length; j++) {
      const a = variables[i];
      const b = variables[j];
      const aPicksB = neighborhoods.get(a)?.has(b) ?? false;
      const bPicksA = neighborhoods.get(b)?.has(a) ?? false;
      const adjacent = request.symmetricFirstStep ? aPicksB && bPicksA : aPicksB || bPicksA;
      if (adjacent) graph.addUndirectedEdge(a, b);
    }
  }
  logger.info('skeleton built', { edges: graph.getNumPairs() });
  return graph;
}
