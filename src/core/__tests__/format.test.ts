import { describe, it, expect } from 'vitest';
import { issuesReport, statisticsReport, textReport, toJsonResult } from '../format.js';
import { formatAdjacencyList, formatAdjacencyMatrix } from '../adjacency.js';
import type { AlgorithmResult } from '../types.js';
import { buildGraph, pathGraph } from '../../__tests__/fixtures.js';

const bfsResult: AlgorithmResult = {
  algorithm: 'bfs',
  success: true,
  elapsedMs: 1.5,
  message: '3 nodes visited',
  data: { startId: 1, order: [1, 2, 3], levels: { 1: 0, 2: 1, 3: 1 }, visitedCount: 3 },
  steps: [{ type: 'visit', nodeId: 1, value: 0 }],
};

const unreachableResult: AlgorithmResult = {
  algorithm: 'dijkstra',
  success: false,
  elapsedMs: 0.2,
  message: 'No path found between 1 and 4',
  data: null,
  steps: [],
  code: 'UNREACHABLE',
  hint: 'The two nodes lie in different connected components.',
};

describe('textReport', () => {
  it('lists BFS order and levels', () => {
    expect(textReport(bfsResult).split('\n')).toEqual([
      'Breadth-first search: 3 nodes visited (1.50 ms)',
      'order: 1 -> 2 -> 3',
      '  level 0: 1',
      '  level 1: 2, 3',
    ]);
  });

  it('prints failures with their code and hint', () => {
    expect(textReport(unreachableResult).split('\n')).toEqual([
      '\x1b[31merror\x1b[0m[UNREACHABLE]: Dijkstra shortest path: No path found between 1 and 4',
      'hint: The two nodes lie in different connected components.',
    ]);
  });

  it('describes components', () => {
    const result: AlgorithmResult = {
      algorithm: 'components',
      success: true,
      elapsedMs: 0,
      message: '2 connected components found',
      data: { components: [[1, 2], [3]], count: 2, componentOf: { 1: 0, 2: 0, 3: 1 }, largestSize: 2, isolated: [3] },
      steps: [],
    };
    expect(textReport(result).split('\n').slice(1)).toEqual(['  #1 (2): 1, 2', '  #2 (1): 3']);
  });
});

describe('toJsonResult', () => {
  it('includes code and hint only for failures', () => {
    expect(toJsonResult(unreachableResult)).toEqual({
      algorithm: 'dijkstra',
      success: false,
      message: 'No path found between 1 and 4',
      elapsedMs: 0.2,
      code: 'UNREACHABLE',
      hint: 'The two nodes lie in different connected components.',
      data: null,
      stepCount: 0,
      steps: [],
    });
    const ok = toJsonResult(bfsResult);
    expect(ok).not.toHaveProperty('code');
    expect(ok.stepCount).toBe(1);
  });
});

describe('statistics and issues', () => {
  it('formats graph statistics', () => {
    expect(statisticsReport('team.graph.json', pathGraph(4).getStatistics())).toBe(
      [
        'team.graph.json',
        '  nodes: 4',
        '  edges: 3',
        '  average degree: 1.50',
        '  density: 0.500',
        '  degree range: 1..2',
      ].join('\n'),
    );
  });

  it('prints errors before warnings', () => {
    const report = issuesReport('g.json', [
      { message: 'Target node 9 not found; edge skipped', severity: 'warning', code: 'NOT_FOUND', path: 'edges[0]' },
      { message: 'Node with id 1 already exists', severity: 'error', code: 'INVALID_OPERATION', path: 'nodes[1].id' },
    ]);
    expect(report.split('\n')).toEqual([
      '\x1b[31merror\x1b[0m[INVALID_OPERATION]: Node with id 1 already exists',
      'at g.json:nodes[1].id',
      '\x1b[33mwarning\x1b[0m[NOT_FOUND]: Target node 9 not found; edge skipped',
      'at g.json:edges[0]',
    ]);
  });
});

describe('adjacency exports', () => {
  it('writes one line per node', () => {
    expect(formatAdjacencyList(pathGraph(3))).toBe('1 (User_1): [2]\n2 (User_2): [1, 3]\n3 (User_3): [2]');
  });

  it('writes the weight matrix as a table', () => {
    expect(formatAdjacencyMatrix(buildGraph(2, [[1, 2]])).split('\n')).toEqual([
      '         1     2',
      '------------------',
      '   1| 0.00  1.00',
      '   2| 1.00  0.00',
    ]);
  });
});
