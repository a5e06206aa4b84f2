import { describe, it, expect } from 'vitest';
import { buildBicSkeleton, selectNeighborhood } from '../bic_neighborhood.js';
import { obtainSkeleton, preOrientByKnowledge, type SkeletonRequest } from '../bootstrap.js';
import { createDataset, type Dataset } from '../../data/dataset.js';
import { CausalGraph } from '../../graph/causal_graph.js';
import { BackgroundKnowledge, EMPTY_KNOWLEDGE } from '../../knowledge/background_knowledge.js';
import { InvalidGraphError } from '../../core/errors.js';
import { feedbackLoop, independentPair, mulberry32, normal, skewedChain } from '../../test/synthetic_data.js';

function request(dataset: Dataset, overrides: Partial<SkeletonRequest> = {}): SkeletonRequest {
  return {
    dataset,
    penaltyDiscount: 1,
    faithfulnessAssumed: true,
    symmetricFirstStep: false,
    maxDegree: -1,
    knowledge: EMPTY_KNOWLEDGE,
    verbose: false,
    ...overrides,
  };
}

function edgeNames(graph: CausalGraph): string[] {
  return graph.getPairs().map(({ first, second }) => `${first.name}-${second.name}`);
}

/** A → B → C with a weak A → C link; A and C do not select each other. */
function weakTriangle(): Dataset {
  const rng = mulberry32(37);
  const columns = [new Float64Array(60), new Float64Array(60), new Float64Array(60)];
  for (let i = 0; i < 60; i++) {
    const a = normal(rng);
    const b = 0.3 * a + normal(rng);
    const c = 0.3 * a + 0.3 * b + normal(rng);
    columns[0][i] = a;
    columns[1][i] = b;
    columns[2][i] = c;
  }
  return createDataset(['A', 'B', 'C'], columns);
}

describe('buildBicSkeleton', () => {
  it('finds no adjacency between independent variables', () => {
    const data = independentPair(1, 1000);
    const graph = buildBicSkeleton(request(createDataset(data.names, data.columns)));
    expect(graph.getNumPairs()).toBe(0);
    expect(graph.getNodes().map((v) => v.name)).toEqual(['X', 'Y']);
  });

  it('connects a dependent pair', () => {
    const data = skewedChain(2, 2000);
    expect(edgeNames(buildBicSkeleton(request(createDataset(data.names, data.columns))))).toEqual(['X-Y']);
  });

  it('connects every pair in the feedback loop except the two exogenous parents', () => {
    const data = feedbackLoop(9, 2000);
    expect(edgeNames(buildBicSkeleton(request(createDataset(data.names, data.columns))))).toEqual([
      'W1-X',
      'W1-Y',
      'X-Y',
      'X-W2',
      'Y-W2',
    ]);
  });

  it('needs both endpoints to agree under the symmetric rule', () => {
    const dataset = weakTriangle();
    expect(edgeNames(buildBicSkeleton(request(dataset)))).toEqual(['A-B', 'B-C']);
    expect(edgeNames(buildBicSkeleton(request(dataset, { symmetricFirstStep: true })))).toEqual(['B-C']);
  });

  it('never connects pairs forbidden in both directions', () => {
    const data = skewedChain(2, 2000);
    const knowledge = new BackgroundKnowledge().setForbidden('X', 'Y').setForbidden('Y', 'X');
    const graph = buildBicSkeleton(request(createDataset(data.names, data.columns), { knowledge }));
    expect(graph.getNumPairs()).toBe(0);
  });
});

describe('selectNeighborhood', () => {
  const dataset = weakTriangle();
  const [A, B, C] = dataset.variables;
  const options = { penaltyDiscount: 1, faithfulnessAssumed: true, maxDegree: -1 };

  it('picks the neighbours that pay for their penalty', () => {
    expect(selectNeighborhood(dataset, A, [B, C], options)).toEqual([B]);
    expect(selectNeighborhood(dataset, B, [A, C], options)).toEqual([C]);
  });

  it('respects the degree cap', () => {
    expect(selectNeighborhood(dataset, B, [A, C], { ...options, maxDegree: 0 })).toEqual([]);
  });

  it('gives the same answer without the faithfulness pre-filter here', () => {
    expect(selectNeighborhood(dataset, B, [A, C], { ...options, faithfulnessAssumed: false })).toEqual([C]);
  });

  it('selects nothing under a prohibitive penalty', () => {
    expect(selectNeighborhood(dataset, B, [A, C], { ...options, penaltyDiscount: 100 })).toEqual([]);
  });
});

describe('obtainSkeleton', () => {
  const dataset = createDataset(['X', 'Y', 'Z'], [[1, 2, 3], [3, 1, 2], [2, 3, 1]]);
  const [X, Y, Z] = dataset.variables;

  it('rebinds a supplied graph to the dataset and drops directions', () => {
    const other = createDataset(['Y', 'X'], [[1, 2], [3, 4]]);
    const supplied = new CausalGraph(other.variables);
    supplied.addDirectedEdge(other.variables[0], other.variables[1]);

    const skeleton = obtainSkeleton({ kind: 'graph', graph: supplied }, request(dataset));
    expect(skeleton.isUndirected(X, Y)).toBe(true);
    expect(skeleton.containsNode(X)).toBe(true);
    expect(skeleton.containsNode(Z)).toBe(true);
  });

  it('uses a custom builder', () => {
    const skeleton = obtainSkeleton(
      {
        kind: 'search',
        build: (req) => {
          const graph = new CausalGraph(req.dataset.variables);
          graph.addDirectedEdge(Z, X);
          return graph;
        },
      },
      request(dataset),
    );
    expect(edgeNames(skeleton)).toEqual(['Z-X']);
    expect(skeleton.isUndirected(X, Z)).toBe(true);
  });

  it('rejects a missing graph', () => {
    expect(() => obtainSkeleton({ kind: 'search', build: () => null }, request(dataset))).toThrow(
      InvalidGraphError,
    );
  });

  it('rejects nodes the dataset lacks', () => {
    const other = createDataset(['X', 'Q'], [[1, 2], [3, 4]]);
    const supplied = new CausalGraph(other.variables);
    expect(() => obtainSkeleton({ kind: 'graph', graph: supplied }, request(dataset))).toThrow(/Q/);
  });
});

describe('preOrientByKnowledge', () => {
  const dataset = createDataset(['X', 'Y', 'Z'], [[1, 2, 3], [3, 1, 2], [2, 3, 1]]);
  const [X, Y, Z] = dataset.variables;

  it('removes doubly forbidden edges and directs constrained ones', () => {
    const graph = new CausalGraph(dataset.variables);
    graph.addUndirectedEdge(X, Y);
    graph.addUndirectedEdge(Y, Z);
    graph.addUndirectedEdge(X, Z);
    const knowledge = new BackgroundKnowledge()
      .setForbidden('X', 'Y')
      .setForbidden('Y', 'X')
      .setRequired('Z', 'Y');

    expect(preOrientByKnowledge(graph, knowledge)).toEqual({ removed: 1, oriented: 1 });
    expect(graph.isAdjacentTo(X, Y)).toBe(false);
    expect(graph.isDirectedFromTo(Z, Y)).toBe(true);
    expect(graph.isUndirected(X, Z)).toBe(true);
  });
});
