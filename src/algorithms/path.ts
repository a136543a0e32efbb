import type { Graph } from '../model/graph.js';
import type { Failure } from '../core/types.js';
import { notFound } from '../core/errors.js';

export function checkEndpoints(graph: Graph, startId: number, targetId: number): Failure | undefined {
  if (!graph.hasNode(startId)) return notFound(startId, 'Start node');
  if (!graph.hasNode(targetId)) return notFound(targetId, 'Target node');
  return undefined;
}

/** Walks predecessor links back from the target */
export function reconstructPath(previous: Map<number, number>, startId: number, targetId: number): number[] {
  const path = [targetId];
  let current = targetId;
  while (current !== startId) {
    const prev = previous.get(current);
    if (prev === undefined) break;
    path.push(prev);
    current = prev;
  }
  return path.reverse();
}

export function pathEdges(path: number[]): Array<[number, number]> {
  const edges: Array<[number, number]> = [];
  for (let i = 0; i + 1 < path.length; i++) edges.push([path[i], path[i + 1]]);
  return edges;
}

export function describePath(path: number[], cost: number): string {
  return `Path found: ${path.length} node${path.length === 1 ? '' : 's'}, cost ${cost.toFixed(3)}`;
}
