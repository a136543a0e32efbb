import type { Graph } from '../model/graph.js';
import type { ResultOf } from '../core/types.js';
import { runTimed } from '../core/pipeline.js';
import { fail, notFound, ok } from '../core/errors.js';

/**
 * Breadth-first search. Each node is enqueued once, when first discovered;
 * same-level ties follow neighbor insertion order.
 */
export function breadthFirstSearch(graph: Graph, startId: number): ResultOf<'bfs'> {
  return runTimed('bfs', (log) => {
    if (!graph.hasNode(startId)) return fail(notFound(startId, 'Start node'));

    const order: number[] = [];
    const levels: Record<number, number> = { [startId]: 0 };
    const queue: number[] = [startId];
    let head = 0;

    while (head < queue.length) {
      const id = queue[head++];
      const level = levels[id];
      order.push(id);
      log.add('visit', id, { value: level });

      for (const n of graph.getNeighbors(id)) {
        if (n in levels) continue;
        levels[n] = level + 1;
        queue.push(n);
        log.add('discover', n, { fromId: id, value: level + 1 });
      }
    }

    return ok({
      data: { startId, order, levels, visitedCount: order.length },
      message: `${order.length} node${order.length === 1 ? '' : 's'} visited`,
    });
  });
}
