import type { Graph } from '../model/graph.js';
import type { ResultOf } from '../core/types.js';
import { runTimed } from '../core/pipeline.js';
import { fail, ok, unreachable } from '../core/errors.js';
import { costOf } from '../model/weight.js';
import { MinFrontier } from './frontier.js';
import { checkEndpoints, describePath, pathEdges, reconstructPath } from './path.js';

/**
 * Scale applied to the on-screen Euclidean distance to estimate remaining
 * cost. An empirical calibration, not an admissibility proof: positions are
 * pixels while costs are at least 1 per edge.
 */
export const DEFAULT_HEURISTIC_SCALE = 0.01;

export function aStar(
  graph: Graph,
  startId: number,
  targetId: number,
  heuristicScale = DEFAULT_HEURISTIC_SCALE
): ResultOf<'astar'> {
  return runTimed('astar', (log) => {
    const missing = checkEndpoints(graph, startId, targetId);
    if (missing) return fail(missing);

    const goal = graph.getNode(targetId);
    const heuristic = (id: number): number => {
      const node = graph.getNode(id);
      if (!node || !goal) return 0;
      return Math.hypot(node.x - goal.x, node.y - goal.y) * heuristicScale;
    };

    const g = new Map<number, number>([[startId, 0]]);
    const previous = new Map<number, number>();
    const frontier = new MinFrontier<{ id: number; g: number }>();
    frontier.push({ id: startId, g: 0 }, heuristic(startId));
    let explored = 0;
    let reached = false;

    while (frontier.size > 0) {
      const next = frontier.pop();
      if (!next) break;
      const { id, g: entryG } = next.item;
      // A cheaper route was found after this entry was queued
      if (entryG > (g.get(id) ?? Infinity)) continue;
      explored++;
      log.add('visit', id, { value: entryG });
      if (id === targetId) {
        reached = true;
        break;
      }

      for (const n of graph.getNeighbors(id)) {
        const edge = graph.getEdge(id, n);
        if (!edge) continue;
        const tentative = entryG + costOf(edge.weight);
        if (tentative < (g.get(n) ?? Infinity)) {
          g.set(n, tentative);
          previous.set(n, id);
          frontier.push({ id: n, g: tentative }, tentative + heuristic(n));
          log.add('relax', n, { fromId: id, value: tentative });
        }
      }
    }

    if (!reached) return fail(unreachable(startId, targetId));

    const path = reconstructPath(previous, startId, targetId);
    const totalCost = g.get(targetId) ?? 0;
    return ok({
      data: {
        startId,
        targetId,
        path,
        edges: pathEdges(path),
        totalCost,
        explored,
        distances: Object.fromEntries(g),
      },
      message: describePath(path, totalCost),
    });
  });
}
