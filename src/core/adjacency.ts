import type { Graph } from '../model/graph.js';

/** One line per node, ascending id: `3 (name): [1, 4]` */
export function formatAdjacencyList(graph: Graph): string {
  const lines: string[] = [];
  for (const [id, neighbors] of graph.getAdjacencyList()) {
    const name = graph.getNode(id)?.name ?? '';
    lines.push(`${id} (${name}): [${neighbors.join(', ')}]`);
  }
  return lines.join('\n');
}

/** Weight matrix as a fixed-width table; 0 means no edge */
export function formatAdjacencyMatrix(graph: Graph): string {
  const { ids, matrix } = graph.getAdjacencyMatrix();
  const lines = [
    '     ' + ids.map((id) => String(id).padStart(5)).join(' '),
    '-'.repeat(6 + 6 * ids.length),
  ];
  matrix.forEach((row, i) => {
    lines.push(String(ids[i]).padStart(4) + '|' + row.map((w) => w.toFixed(2).padStart(5)).join(' '));
  });
  return lines.join('\n');
}
