import type { Graph } from '../model/graph.js';
import type { ResultOf } from '../core/types.js';
import { runTimed } from '../core/pipeline.js';
import { fail, notFound, ok } from '../core/errors.js';

/**
 * Depth-first search on an explicit stack. Nodes are marked when popped, so a
 * node can sit on the stack more than once but is processed once. Neighbors
 * go on in reverse so the first neighbor is explored first.
 */
export function depthFirstSearch(graph: Graph, startId: number): ResultOf<'dfs'> {
  return runTimed('dfs', (log) => {
    if (!graph.hasNode(startId)) return fail(notFound(startId, 'Start node'));

    const order: number[] = [];
    const discovery: Record<number, number> = {};
    const stack: Array<{ id: number; from?: number }> = [{ id: startId }];

    while (stack.length > 0) {
      const top = stack.pop();
      if (!top || top.id in discovery) continue;
      discovery[top.id] = order.length;
      order.push(top.id);
      log.add('visit', top.id, { value: discovery[top.id], ...(top.from !== undefined ? { fromId: top.from } : {}) });

      const neighbors = graph.getNeighbors(top.id);
      for (let i = neighbors.length - 1; i >= 0; i--) {
        const n = neighbors[i];
        if (n in discovery) continue;
        stack.push({ id: n, from: top.id });
        log.add('push', n, { fromId: top.id });
      }
    }

    return ok({
      data: { startId, order, discovery, visitedCount: order.length },
      message: `${order.length} node${order.length === 1 ? '' : 's'} visited`,
    });
  });
}
