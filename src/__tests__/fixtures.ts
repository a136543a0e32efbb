import { Graph } from '../model/graph.js';
import type { NodeInput } from '../model/types.js';
import type { Result } from '../core/types.js';

export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) throw new Error(`${result.code}: ${result.message}`);
  return result.value;
}

/**
 * Nodes 1..count laid out on a row with identical traits, so edge weights
 * depend only on degree differences.
 */
export function buildGraph(count: number, edges: Array<[number, number]> = [], node: NodeInput = {}): Graph {
  const graph = new Graph({ random: () => 0.5 });
  for (let i = 1; i <= count; i++) {
    unwrap(graph.addNode({ x: i * 100, y: 100, activity: 0.5, interaction: 10, ...node }));
  }
  for (const [a, b] of edges) unwrap(graph.addEdge(a, b));
  return graph;
}

export function pathGraph(count: number): Graph {
  const edges: Array<[number, number]> = [];
  for (let i = 1; i < count; i++) edges.push([i, i + 1]);
  return buildGraph(count, edges);
}

/** Deterministic uniform source in [0, 1) */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state / 2 ** 32;
  };
}
