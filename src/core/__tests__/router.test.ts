import { describe, it, expect } from 'vitest';
import { Graph } from '../../model/graph.js';
import { ALGORITHMS, detectAlgorithm, runAlgorithm } from '../router.js';
import { runTimed } from '../pipeline.js';
import { ok } from '../errors.js';
import { buildGraph, pathGraph } from '../../__tests__/fixtures.js';

describe('detectAlgorithm', () => {
  it('resolves names and aliases', () => {
    expect(detectAlgorithm('BFS')).toBe('bfs');
    expect(detectAlgorithm('breadth_first')).toBe('bfs');
    expect(detectAlgorithm('A*')).toBe('astar');
    expect(detectAlgorithm('Welsh Powell')).toBe('coloring');
    expect(detectAlgorithm(' connected-components ')).toBe('components');
    expect(detectAlgorithm('pagerank')).toBeUndefined();
  });

  it('covers every catalog entry', () => {
    for (const name of Object.keys(ALGORITHMS)) expect(detectAlgorithm(name)).toBe(name);
  });
});

describe('runAlgorithm', () => {
  it('dispatches by name', () => {
    const result = runAlgorithm(pathGraph(3), { algorithm: 'dijkstra', startId: 1, targetId: 3 });
    expect(result.algorithm).toBe('dijkstra');
    expect(result.success).toBe(true);
  });

  it('asks for a missing start node', () => {
    expect(runAlgorithm(pathGraph(2), { algorithm: 'bfs' })).toMatchObject({
      success: false,
      code: 'INVALID_INPUT',
      message: 'Breadth-first search needs a startId',
      hint: 'Pass --start <id>.',
    });
    expect(runAlgorithm(pathGraph(2), { algorithm: 'astar', startId: 1 })).toMatchObject({
      code: 'INVALID_INPUT',
      message: 'A* shortest path needs a targetId',
      hint: 'Pass --target <id>.',
    });
  });

  it('reports an empty graph as degenerate input', () => {
    expect(runAlgorithm(new Graph(), { algorithm: 'dfs' })).toMatchObject({
      success: false,
      code: 'DEGENERATE_INPUT',
      message: 'Graph is empty',
    });
  });

  it('applies the default top-k', () => {
    const graph = buildGraph(7, [[1, 2], [1, 3]]);
    const result = runAlgorithm(graph, { algorithm: 'centrality' });
    if (result.algorithm !== 'centrality' || !result.success) throw new Error('centrality failed');
    expect(result.data.top).toHaveLength(5);
    expect(result.data.ranking).toHaveLength(7);
  });
});

describe('runTimed', () => {
  it('turns a thrown error into an internal failure', () => {
    const result = runTimed('components', (log) => {
      log.add('visit', 1);
      throw new Error('boom');
    });
    expect(result).toMatchObject({
      algorithm: 'components',
      success: false,
      code: 'INTERNAL',
      message: 'Internal components error: boom',
      data: null,
      steps: [],
    });
  });

  it('keeps the step log on success', () => {
    const result = runTimed('coloring', (log) => {
      log.add('color', 4, { value: 1 });
      return ok({ data: { colors: { 4: 1 }, chromaticCount: 1, order: [4], groups: [{ color: 1, nodes: [4] }] }, message: 'done' });
    });
    expect(result.success).toBe(true);
    expect(result.steps).toEqual([{ type: 'color', nodeId: 4, value: 1 }]);
    expect(result.elapsedMs).toBeGreaterThanOrEqual(0);
  });
});
