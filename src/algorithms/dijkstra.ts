import type { Graph } from '../model/graph.js';
import type { ResultOf } from '../core/types.js';
import { runTimed } from '../core/pipeline.js';
import { fail, ok, unreachable } from '../core/errors.js';
import { costOf } from '../model/weight.js';
import { MinFrontier } from './frontier.js';
import { checkEndpoints, describePath, pathEdges, reconstructPath } from './path.js';

/** Cheapest path by summed edge cost (1 / weight) */
export function dijkstra(graph: Graph, startId: number, targetId: number): ResultOf<'dijkstra'> {
  return runTimed('dijkstra', (log) => {
    const missing = checkEndpoints(graph, startId, targetId);
    if (missing) return fail(missing);

    const distances = new Map<number, number>([[startId, 0]]);
    const previous = new Map<number, number>();
    const settled = new Set<number>();
    const frontier = new MinFrontier<number>();
    frontier.push(startId, 0);

    while (frontier.size > 0) {
      const next = frontier.pop();
      if (!next) break;
      const { item: id, key: dist } = next;
      if (settled.has(id)) continue;
      settled.add(id);
      log.add('visit', id, { value: dist });
      if (id === targetId) break;

      for (const n of graph.getNeighbors(id)) {
        if (settled.has(n)) continue;
        const edge = graph.getEdge(id, n);
        if (!edge) continue;
        const candidate = dist + costOf(edge.weight);
        if (candidate < (distances.get(n) ?? Infinity)) {
          distances.set(n, candidate);
          previous.set(n, id);
          frontier.push(n, candidate);
          log.add('relax', n, { fromId: id, value: candidate });
        }
      }
    }

    if (!settled.has(targetId)) return fail(unreachable(startId, targetId));

    const path = reconstructPath(previous, startId, targetId);
    const totalCost = distances.get(targetId) ?? 0;
    return ok({
      data: {
        startId,
        targetId,
        path,
        edges: pathEdges(path),
        totalCost,
        explored: settled.size,
        distances: Object.fromEntries(distances),
      },
      message: describePath(path, totalCost),
    });
  });
}
