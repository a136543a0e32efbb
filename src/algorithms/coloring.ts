import type { Graph } from '../model/graph.js';
import type { ResultOf } from '../core/types.js';
import { runTimed } from '../core/pipeline.js';
import { ok } from '../core/errors.js';

/**
 * Welsh-Powell greedy coloring. Nodes are scanned by descending degree (ties
 * by ascending id); each pass hands the current color to every uncolored node
 * with no neighbor already holding it. The count is an upper bound on the
 * chromatic number, not the minimum.
 */
export function welshPowell(graph: Graph): ResultOf<'coloring'> {
  return runTimed('coloring', (log) => {
    const order = graph
      .nodeIds()
      .map((id) => ({ id, degree: graph.getDegree(id) }))
      .sort((a, b) => b.degree - a.degree || a.id - b.id)
      .map((entry) => entry.id);

    const colors = new Map<number, number>();
    const groups: Array<{ color: number; nodes: number[] }> = [];
    let color = 0;

    while (colors.size < order.length) {
      color++;
      const members: number[] = [];
      for (const id of order) {
        if (colors.has(id)) continue;
        const clash = graph.getNeighbors(id).some((n) => colors.get(n) === color);
        if (clash) continue;
        colors.set(id, color);
        members.push(id);
        log.add('color', id, { value: color });
      }
      groups.push({ color, nodes: members });
    }

    return ok({
      data: {
        colors: Object.fromEntries(colors),
        chromaticCount: color,
        order,
        groups,
      },
      message: order.length === 0
        ? 'Graph is empty'
        : `Graph colored with ${color} color${color === 1 ? '' : 's'}`,
    });
  });
}
