/**
 * @fileoverview skewcycle public API
 *
 * Causal search over continuous data: a skeleton is oriented by a skew-based
 * left-right statistic, then undirected pairs are tested for feedback loops.
 *
 * @example
 * ```typescript
 * import { SkewCycleSearch, createDataset } from 'skewcycle';
 *
 * const dataset = createDataset(['X', 'Y'], [xs, ys]);
 * const { graph } = new SkewCycleSearch(dataset, { depth: 2 }).search();
 * console.log(graph.toString());
 * ```
 */

// Search
export { SkewCycleSearch, type SearchResult } from './search/skew_cycle_search.js';

// Data and graph
export {
  Dataset,
  createDataset,
  createDatasetFromRows,
  type Variable,
  type Column,
  type DatasetOptions,
} from './data/dataset.js';
export {
  CausalGraph,
  type PairRelation,
  type PairRelationKind,
  type EdgeKind,
  type GraphEdge,
  type GraphPair,
} from './graph/causal_graph.js';

// Knowledge
export { BackgroundKnowledge, EMPTY_KNOWLEDGE, type Knowledge } from './knowledge/background_knowledge.js';
export {
  PROTECTED_TIER,
  knowledgeOrients,
  edgeForbiddenByKnowledge,
  removeProtectedTier,
} from './knowledge/knowledge_filter.js';

// Skeleton
export {
  obtainSkeleton,
  preOrientByKnowledge,
  type SkeletonBuilder,
  type SkeletonRequest,
  type SkeletonSource,
  type KnowledgeAdjustment,
} from './skeleton/bootstrap.js';
export { buildBicSkeleton, selectNeighborhood } from './skeleton/bic_neighborhood.js';

// Orientation
export { tailExpectation, leftRight, favoursDirection, type TailDirection } from './orientation/asymmetry.js';
export {
  orientPair,
  runOrientation,
  type AsymmetryStatistic,
  type OrientationContext,
  type OrientationOptions,
  type OrientationReport,
  type PairOutcome,
} from './orientation/orientation_engine.js';
export {
  candidateConditioningSet,
  pairedResidualProducts,
  orderingRejects,
  evaluateTwoCycle,
  runTwoCyclePass,
  type OrderingOutcome,
  type TwoCycleEvaluation,
  type TwoCycleFailure,
  type TwoCycleOptions,
  type TwoCyclePairResult,
  type TwoCycleReport,
} from './orientation/two_cycle_detector.js';

// Statistics
export {
  ALL_ROWS,
  positiveRows,
  selectRows,
  residualize,
  regressionResiduals,
  type RowFilter,
  type RowDirection,
} from './stats/residualizer.js';
export { welchTest, welchRejects, type WelchResult } from './stats/welch.js';
export { logGamma, regularizedIncompleteBeta, studentTCdf, studentTTwoSided } from './stats/distributions.js';

// Configuration
export {
  SearchConfigSchema,
  DEFAULT_SEARCH_CONFIG,
  resolveSearchConfig,
  parseSearchConfig,
  loadSearchConfigFile,
  type SearchConfig,
  type SearchConfigInput,
} from './config/index.js';

// Errors, results and logging
export * from './core/index.js';
export {
  logInfo,
  logWarning,
  logError,
  logDebug,
  createStageLogger,
  type LogContext,
  type LogLevel,
  type StageLogger,
} from './telemetry/logger.js';
