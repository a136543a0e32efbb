import type { Graph } from '../model/graph.js';
import type { AlgorithmResult } from './types.js';

// BFS level buckets: 0, 1, 2, 3, 4, 5+
export const LEVEL_COLORS = ['#00d9ff', '#00ff88', '#b429f9', '#ff6b6b', '#ffd700', '#00ffff'];

// DFS discovery gradient, first to last discovered
export const GRADIENT_START = '#00d9ff';
export const GRADIENT_END = '#b429f9';

export const CATEGORY_COLORS = [
  '#00d9ff',
  '#00ff88',
  '#b429f9',
  '#ff6b6b',
  '#ffd700',
  '#00ffff',
  '#ff69b4',
  '#32cd32',
  '#ffa500',
  '#8a2be2',
  '#ff6347',
  '#00bfff',
  '#ff1493',
  '#7cfc00',
  '#ff8c00',
];

export const PATH_COLOR = '#00ff88';
export const TOP_RANK_COLOR = '#ffd700';

export function levelColor(level: number): string {
  return LEVEL_COLORS[Math.min(Math.max(0, level), LEVEL_COLORS.length - 1)];
}

/** Categorical color; falls back to HSL cycling past the fixed palette */
export function palette(index: number): string {
  if (index < CATEGORY_COLORS.length) return CATEGORY_COLORS[index];
  const i = index - CATEGORY_COLORS.length;
  const hue = (i * 47) % 360;
  return `hsl(${hue} 60% 55%)`;
}

function channels(hex: string): [number, number, number] {
  const v = parseInt(hex.slice(1), 16);
  return [(v >> 16) & 0xff, (v >> 8) & 0xff, v & 0xff];
}

/** Linear blend between two #rrggbb colors, t in [0, 1] */
export function mix(from: string, to: string, t: number): string {
  const a = channels(from);
  const b = channels(to);
  const k = Math.min(1, Math.max(0, t));
  return '#' + a.map((c, i) => Math.round(c + (b[i] - c) * k).toString(16).padStart(2, '0')).join('');
}

/** Display color for each node a successful result touches */
export function colorsForResult(result: AlgorithmResult): Map<number, string> {
  const out = new Map<number, string>();
  if (!result.success) return out;

  switch (result.algorithm) {
    case 'bfs':
      for (const id of result.data.order) out.set(id, levelColor(result.data.levels[id] ?? 0));
      break;
    case 'dfs': {
      const last = Math.max(1, result.data.order.length - 1);
      result.data.order.forEach((id, i) => out.set(id, mix(GRADIENT_START, GRADIENT_END, i / last)));
      break;
    }
    case 'dijkstra':
    case 'astar':
      for (const id of result.data.path) out.set(id, PATH_COLOR);
      break;
    case 'components':
      result.data.components.forEach((members, i) => {
        for (const id of members) out.set(id, palette(i));
      });
      break;
    case 'centrality': {
      const max = result.data.statistics.maxCentrality;
      for (const entry of result.data.ranking) {
        out.set(entry.nodeId, mix(GRADIENT_START, GRADIENT_END, max > 0 ? entry.centrality / max : 0));
      }
      for (const entry of result.data.top) out.set(entry.nodeId, TOP_RANK_COLOR);
      break;
    }
    case 'coloring':
      for (const [id, color] of Object.entries(result.data.colors)) out.set(Number(id), palette(color - 1));
      break;
  }
  return out;
}

/**
 * Writes a result onto the graph's display state: node colors, plus
 * highlights for path nodes/edges and top-ranked nodes. Clears the previous
 * result first.
 */
export function applyResult(graph: Graph, result: AlgorithmResult): void {
  graph.resetDisplay();
  for (const [id, color] of colorsForResult(result)) {
    graph.updateNode(id, { color });
  }
  if (!result.success) return;

  if (result.algorithm === 'dijkstra' || result.algorithm === 'astar') {
    for (const id of result.data.path) graph.updateNode(id, { highlighted: true });
    for (const [a, b] of result.data.edges) graph.setEdgeHighlight(a, b, true);
  } else if (result.algorithm === 'centrality') {
    for (const entry of result.data.top) graph.updateNode(entry.nodeId, { highlighted: true });
  }
}
