import { describe, it, expect } from 'vitest';
import { breadthFirstSearch } from '../bfs.js';
import { depthFirstSearch } from '../dfs.js';
import { buildGraph, pathGraph } from '../../__tests__/fixtures.js';

// 1 - 2 - 4
//  \
//   3 - 5
const tree = () => buildGraph(5, [[1, 2], [1, 3], [2, 4], [3, 5]]);

describe('breadthFirstSearch', () => {
  it('walks a path level by level', () => {
    const result = breadthFirstSearch(pathGraph(5), 1);
    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data.order).toEqual([1, 2, 3, 4, 5]);
    expect(result.data.levels).toEqual({ 1: 0, 2: 1, 3: 2, 4: 3, 5: 4 });
    expect(result.data.visitedCount).toBe(5);
    expect(result.message).toBe('5 nodes visited');
  });

  it('visits siblings before their children', () => {
    const result = breadthFirstSearch(tree(), 1);
    if (!result.success) throw new Error(result.message);
    expect(result.data.order).toEqual([1, 2, 3, 4, 5]);
    expect(result.data.levels).toEqual({ 1: 0, 2: 1, 3: 1, 4: 2, 5: 2 });
  });

  it('logs visits and discoveries', () => {
    const result = breadthFirstSearch(pathGraph(3), 1);
    expect(result.steps.slice(0, 3)).toEqual([
      { type: 'visit', nodeId: 1, value: 0 },
      { type: 'discover', nodeId: 2, fromId: 1, value: 1 },
      { type: 'visit', nodeId: 2, value: 1 },
    ]);
  });

  it('only reaches its own component', () => {
    const result = breadthFirstSearch(buildGraph(3, [[2, 3]]), 1);
    if (!result.success) throw new Error(result.message);
    expect(result.data.order).toEqual([1]);
    expect(result.message).toBe('1 node visited');
  });

  it('fails on a missing start node with no steps', () => {
    const result = breadthFirstSearch(pathGraph(2), 42);
    expect(result).toMatchObject({
      success: false,
      code: 'NOT_FOUND',
      message: 'Start node 42 not found',
      data: null,
      steps: [],
    });
  });
});

describe('depthFirstSearch', () => {
  it('visits every node on a path exactly once', () => {
    const result = depthFirstSearch(pathGraph(5), 1);
    if (!result.success) throw new Error(result.message);
    expect(result.data.order).toEqual([1, 2, 3, 4, 5]);
    expect(new Set(result.data.order).size).toBe(5);
  });

  it('finishes a branch before backtracking', () => {
    const result = depthFirstSearch(tree(), 1);
    if (!result.success) throw new Error(result.message);
    expect(result.data.order).toEqual([1, 2, 4, 3, 5]);
    expect(result.data.discovery).toEqual({ 1: 0, 2: 1, 4: 2, 3: 3, 5: 4 });
  });

  it('processes a node reached twice only once', () => {
    // 2 and 3 are both pushed from 1, and 3 again from 2
    const result = depthFirstSearch(buildGraph(3, [[1, 2], [1, 3], [2, 3]]), 1);
    if (!result.success) throw new Error(result.message);
    expect(result.data.order).toEqual([1, 2, 3]);
    expect(result.steps.filter((s) => s.type === 'visit')).toHaveLength(3);
  });

  it('fails on a missing start node', () => {
    const result = depthFirstSearch(pathGraph(2), 9);
    expect(result).toMatchObject({ success: false, code: 'NOT_FOUND', message: 'Start node 9 not found' });
  });
});
