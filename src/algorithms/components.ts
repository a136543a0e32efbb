import type { Graph } from '../model/graph.js';
import type { ResultOf } from '../core/types.js';
import { runTimed } from '../core/pipeline.js';
import { ok } from '../core/errors.js';

/**
 * Partitions the graph into connected components. Members are listed in
 * ascending id order; components come largest first, ties by smallest id.
 */
export function connectedComponents(graph: Graph): ResultOf<'components'> {
  return runTimed('components', (log) => {
    const seen = new Set<number>();
    const found: number[][] = [];

    for (const root of graph.nodeIds()) {
      if (seen.has(root)) continue;
      const index = found.length;
      const members: number[] = [];
      const queue = [root];
      seen.add(root);
      for (let head = 0; head < queue.length; head++) {
        const id = queue[head];
        members.push(id);
        log.add('visit', id, { value: index });
        for (const n of graph.getNeighbors(id)) {
          if (seen.has(n)) continue;
          seen.add(n);
          queue.push(n);
        }
      }
      members.sort((a, b) => a - b);
      log.add('component', root, { value: index });
      found.push(members);
    }

    // members are sorted, so [0] is the minimum id
    const components = found.sort((a, b) => b.length - a.length || a[0] - b[0]);
    const componentOf: Record<number, number> = {};
    components.forEach((members, i) => {
      for (const id of members) componentOf[id] = i;
    });

    return ok({
      data: {
        components,
        count: components.length,
        componentOf,
        largestSize: components[0]?.length ?? 0,
        isolated: components.filter((c) => c.length === 1).map((c) => c[0]),
      },
      message: components.length === 0
        ? 'Graph is empty'
        : `${components.length} connected component${components.length === 1 ? '' : 's'} found`,
    });
  });
}
