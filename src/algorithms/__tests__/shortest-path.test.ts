import { describe, it, expect } from 'vitest';
import { Graph } from '../../model/graph.js';
import { costOf } from '../../model/weight.js';
import { dijkstra } from '../dijkstra.js';
import { aStar } from '../astar.js';
import { buildGraph, pathGraph, seededRandom, unwrap } from '../../__tests__/fixtures.js';
import type { PathData } from '../../core/types.js';

function pathCost(graph: Graph, data: PathData): number {
  let total = 0;
  for (const [a, b] of data.edges) {
    const edge = graph.getEdge(a, b);
    if (!edge) throw new Error(`no edge ${a}-${b}`);
    total += costOf(edge.weight);
  }
  return total;
}

// Random traits and links, nodes packed within a few pixels so the A*
// estimate stays below the cheapest possible edge cost of 1. Spread out at
// the default scale, A* may return a dearer path than dijkstra (see below).
function randomGraph(seed: number): Graph {
  const random = seededRandom(seed);
  const graph = new Graph({ random });
  for (let i = 0; i < 10; i++) graph.addNode({ x: i, y: 0 });
  const ids = graph.nodeIds();
  for (let i = 0; i < ids.length; i++) {
    for (let j = i + 1; j < ids.length; j++) {
      if (random() < 0.3) graph.addEdge(ids[i], ids[j]);
    }
  }
  return graph;
}

describe('dijkstra', () => {
  it('sums reciprocal weights along the path', () => {
    // degrees 1, 2, 1: both edges weigh 0.5
    const graph = pathGraph(3);
    const result = dijkstra(graph, 1, 3);
    if (!result.success) throw new Error(result.message);
    expect(result.data.path).toEqual([1, 2, 3]);
    expect(result.data.edges).toEqual([[1, 2], [2, 3]]);
    expect(result.data.totalCost).toBe(4);
    expect(result.message).toBe('Path found: 3 nodes, cost 4.000');
  });

  it('breaks ties by discovery order', () => {
    const graph = buildGraph(4, [[1, 2], [2, 3], [3, 4], [4, 1]]);
    const result = dijkstra(graph, 1, 3);
    if (!result.success) throw new Error(result.message);
    expect(result.data.path).toEqual([1, 2, 3]);
    expect(result.data.totalCost).toBe(2);
  });

  it('returns a single-node path when start equals target', () => {
    const result = dijkstra(pathGraph(2), 1, 1);
    if (!result.success) throw new Error(result.message);
    expect(result.data.path).toEqual([1]);
    expect(result.data.totalCost).toBe(0);
    expect(result.message).toBe('Path found: 1 node, cost 0.000');
  });

  it('reports unreachable targets', () => {
    const graph = buildGraph(4, [[1, 2], [3, 4]]);
    expect(dijkstra(graph, 1, 4)).toMatchObject({
      success: false,
      code: 'UNREACHABLE',
      message: 'No path found between 1 and 4',
      steps: [],
    });
  });

  it('names the missing endpoint', () => {
    expect(dijkstra(pathGraph(2), 1, 8)).toMatchObject({ code: 'NOT_FOUND', message: 'Target node 8 not found' });
    expect(dijkstra(pathGraph(2), 8, 1)).toMatchObject({ code: 'NOT_FOUND', message: 'Start node 8 not found' });
  });
});

describe('aStar', () => {
  it('finds the same path as dijkstra on a chain', () => {
    const result = aStar(pathGraph(4), 1, 4);
    if (!result.success) throw new Error(result.message);
    expect(result.data.path).toEqual([1, 2, 3, 4]);
  });

  it('agrees with dijkstra on cost for every pair', () => {
    for (const seed of [1, 2, 3]) {
      const graph = randomGraph(seed);
      for (const s of graph.nodeIds()) {
        for (const t of graph.nodeIds()) {
          const d = dijkstra(graph, s, t);
          const a = aStar(graph, s, t);
          expect(a.success).toBe(d.success);
          if (d.success && a.success) {
            expect(a.data.totalCost).toBeCloseTo(d.data.totalCost, 9);
            expect(pathCost(graph, a.data)).toBeCloseTo(a.data.totalCost, 9);
            expect(a.data.path[0]).toBe(s);
            expect(a.data.path[a.data.path.length - 1]).toBe(t);
          }
        }
      }
    }
  });

  it('can settle for a dearer path when the pixel estimate outweighs edge costs', () => {
    // 1 -> 3 -> 2 costs 6 with 3 drawn beside the target;
    // 1 -> 4 -> 2 costs 2 but 4 is drawn 2000px away from it
    const graph = new Graph();
    unwrap(graph.addNode({ x: 0, y: 0, activity: 0.5, interaction: 10 }));
    unwrap(graph.addNode({ x: 1000, y: 0, activity: 0.5, interaction: 10 }));
    unwrap(graph.addNode({ x: 1000, y: 10, activity: 0.5, interaction: 12 }));
    unwrap(graph.addNode({ x: -1000, y: 0, activity: 0.5, interaction: 10 }));
    for (const [s, t] of [[1, 3], [3, 2], [1, 4], [4, 2]]) unwrap(graph.addEdge(s, t));

    const d = dijkstra(graph, 1, 2);
    if (!d.success) throw new Error(d.message);
    expect(d.data.path).toEqual([1, 4, 2]);
    expect(d.data.totalCost).toBe(2);

    const a = aStar(graph, 1, 2);
    if (!a.success) throw new Error(a.message);
    expect(a.data.path).toEqual([1, 3, 2]);
    expect(a.data.totalCost).toBe(6);

    const unscaled = aStar(graph, 1, 2, 0);
    if (!unscaled.success) throw new Error(unscaled.message);
    expect(unscaled.data.path).toEqual([1, 4, 2]);
  });

  it('fails across components', () => {
    const graph = buildGraph(4, [[1, 2], [3, 4]]);
    expect(aStar(graph, 2, 3)).toMatchObject({ success: false, code: 'UNREACHABLE' });
  });
});
