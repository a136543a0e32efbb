import type { Graph } from '../model/graph.js';
import type { CentralityEntry, ResultOf } from '../core/types.js';
import { runTimed } from '../core/pipeline.js';
import { ok } from '../core/errors.js';

export const DEFAULT_TOP_K = 5;

/**
 * Normalized degree centrality, degree / (n - 1), or 0 when n <= 1.
 * The ranking always holds every node; `top` is the first `topK` of it.
 */
export function degreeCentrality(graph: Graph, topK = DEFAULT_TOP_K): ResultOf<'centrality'> {
  return runTimed('centrality', (log) => {
    const nodes = graph.getNodes();
    const n = nodes.length;

    const scored = nodes.map((node) => {
      const degree = graph.getDegree(node.id);
      const centrality = n > 1 ? degree / (n - 1) : 0;
      log.add('score', node.id, { value: centrality });
      return { nodeId: node.id, name: node.name, degree, centrality };
    });
    scored.sort((a, b) => b.centrality - a.centrality || a.nodeId - b.nodeId);

    const ranking: CentralityEntry[] = scored.map((s, i) => ({ rank: i + 1, ...s }));
    const top = ranking.slice(0, Math.max(0, topK));

    const values = ranking.map((r) => r.centrality);
    const degrees = ranking.map((r) => r.degree);
    const sum = (xs: number[]) => xs.reduce((acc, x) => acc + x, 0);
    const max = (xs: number[]) => xs.reduce((acc, x) => (x > acc ? x : acc), -Infinity);
    const min = (xs: number[]) => xs.reduce((acc, x) => (x < acc ? x : acc), Infinity);

    const leader = ranking[0];
    return ok({
      data: {
        ranking,
        top,
        statistics: {
          averageCentrality: n ? sum(values) / n : 0,
          maxCentrality: n ? max(values) : 0,
          minCentrality: n ? min(values) : 0,
          averageDegree: n ? sum(degrees) / n : 0,
          maxDegree: n ? max(degrees) : 0,
        },
      },
      message: leader
        ? `Most central node: ${leader.name} (degree ${leader.degree})`
        : 'Graph is empty',
    });
  });
}
