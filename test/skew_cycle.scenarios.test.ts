/**
 * End-to-end searches on seeded synthetic data.
 */

import { describe, it, expect } from 'vitest';
import { SkewCycleSearch, createDataset } from '../src/index.js';
import { confoundedPair, feedbackLoop, independentPair, skewedChain } from '../src/test/synthetic_data.js';

describe('independent normals', () => {
  const data = independentPair(1, 1000);
  const result = new SkewCycleSearch(createDataset(data.names, data.columns)).search();

  it('yields an empty graph', () => {
    expect(result.graph.getNumEdges()).toBe(0);
    expect(result.orientation).toEqual({ rounds: 1, worklistSizes: [2], converged: true, numericalFallbacks: 0 });
    expect(result.twoCycles.evaluated).toEqual([]);
  });
});

describe('skewed linear chain', () => {
  const data = skewedChain(2, 2000);
  const dataset = createDataset(data.names, data.columns);
  const [X, Y] = dataset.variables;
  const result = new SkewCycleSearch(dataset).search();

  it('orients exactly X → Y', () => {
    expect(result.graph.getEdges()).toEqual([{ node1: X, node2: Y, kind: 'directed' }]);
  });

  it('converges after one round', () => {
    expect(result.orientation).toEqual({ rounds: 1, worklistSizes: [2], converged: true, numericalFallbacks: 0 });
  });

  it('has nothing left for the two-cycle pass', () => {
    expect(result.twoCycles.evaluated).toEqual([]);
  });
});

describe('confounded pair', () => {
  const data = confoundedPair(5, 2000);
  const dataset = createDataset(data.names, data.columns);
  const [X, Y] = dataset.variables;
  const result = new SkewCycleSearch(dataset).search();

  it('leaves the edge undirected when both directions look causal', () => {
    expect(result.graph.isUndirected(X, Y)).toBe(true);
    expect(result.orientation).toEqual({ rounds: 1, worklistSizes: [2], converged: true, numericalFallbacks: 0 });
  });

  it('does not mistake the shared cause for a loop', () => {
    expect(result.twoCycles.evaluated.map(({ evaluation }) => evaluation)).toEqual([
      { confirmed: false, subsetsTested: 1, failure: { subset: [], reason: 'not-rejected' } },
    ]);
    expect(result.twoCycles.confirmed).toEqual([]);
  });
});

describe('negative-rectified feedback loop', () => {
  const data = feedbackLoop(9, 2000);
  const dataset = createDataset(data.names, data.columns);
  const [W1, X, Y, W2] = dataset.variables;
  const result = new SkewCycleSearch(dataset).search();

  it('finds the mutual pair on X and Y', () => {
    expect(result.graph.isTwoCycle(X, Y)).toBe(true);
    expect(result.twoCycles.confirmed.map(({ x, y }) => [x.name, y.name])).toEqual([['X', 'Y']]);
  });

  it('tests every conditioning subset of the two exogenous parents', () => {
    expect(result.twoCycles.confirmed[0].evaluation).toEqual({ confirmed: true, subsetsTested: 4 });
  });

  it('orients the exogenous parents into the loop', () => {
    expect(result.graph.isDirectedFromTo(W1, X)).toBe(true);
    expect(result.graph.isDirectedFromTo(W1, Y)).toBe(true);
    expect(result.graph.isDirectedFromTo(W2, X)).toBe(true);
    expect(result.graph.isDirectedFromTo(W2, Y)).toBe(true);
    expect(result.graph.isAdjacentTo(W1, W2)).toBe(false);
  });

  it('stops at the round cap while the loop edge keeps flipping', () => {
    expect(result.orientation.rounds).toBe(15);
    expect(result.orientation.converged).toBe(false);
    expect(result.orientation.worklistSizes).toEqual([4, ...Array.from({ length: 14 }, () => 2)]);
  });

  it('renders the two-cycle', () => {
    expect(result.graph.toString()).toBe(
      [
        'Graph Nodes:',
        'W1;X;Y;W2',
        '',
        'Graph Edges:',
        '1. W1 --> X',
        '2. W1 --> Y',
        '3. X <=> Y',
        '4. W2 --> X',
        '5. W2 --> Y',
      ].join('\n'),
    );
  });
});
