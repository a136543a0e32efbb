import type { GraphStatistics } from '../model/types.js';
import type { AlgorithmResult, GraphIssue } from './types.js';
import { ALGORITHMS } from './router.js';

export type OutputFormat = 'text' | 'json';

const ids = (list: number[]) => list.join(', ');
const chain = (list: number[]) => list.join(' -> ');

function detailLines(result: AlgorithmResult): string[] {
  if (!result.success) return [];
  switch (result.algorithm) {
    case 'bfs': {
      const byLevel = new Map<number, number[]>();
      for (const id of result.data.order) {
        const level = result.data.levels[id] ?? 0;
        const bucket = byLevel.get(level) ?? [];
        bucket.push(id);
        byLevel.set(level, bucket);
      }
      const lines = [`order: ${chain(result.data.order)}`];
      for (const [level, members] of byLevel) lines.push(`  level ${level}: ${ids(members)}`);
      return lines;
    }
    case 'dfs':
      return [`order: ${chain(result.data.order)}`];
    case 'dijkstra':
    case 'astar':
      return [
        `path: ${chain(result.data.path)}`,
        `cost: ${result.data.totalCost.toFixed(3)}`,
        `explored: ${result.data.explored}`,
      ];
    case 'components':
      return result.data.components.map((members, i) => `  #${i + 1} (${members.length}): ${ids(members)}`);
    case 'centrality':
      return result.data.top.map(
        (e) => `  ${e.rank}. ${e.name} (id ${e.nodeId}) degree ${e.degree}, centrality ${e.centrality.toFixed(3)}`,
      );
    case 'coloring':
      return result.data.groups.map((g) => `  color ${g.color}: ${ids(g.nodes)}`);
  }
}

export function textReport(result: AlgorithmResult): string {
  const title = ALGORITHMS[result.algorithm].title;
  const lines: string[] = [];
  if (result.success) {
    lines.push(`${title}: ${result.message} (${result.elapsedMs.toFixed(2)} ms)`);
    lines.push(...detailLines(result));
  } else {
    lines.push(`\x1b[31merror\x1b[0m[${result.code}]: ${title}: ${result.message}`);
    if (result.hint) lines.push(`hint: ${result.hint}`);
  }
  return lines.join('\n');
}

export function toJsonResult(result: AlgorithmResult) {
  return {
    algorithm: result.algorithm,
    success: result.success,
    message: result.message,
    elapsedMs: result.elapsedMs,
    ...(result.success ? {} : { code: result.code, ...(result.hint ? { hint: result.hint } : {}) }),
    data: result.data,
    stepCount: result.steps.length,
    steps: result.steps,
  };
}

export function statisticsReport(filename: string, stats: GraphStatistics): string {
  return [
    filename,
    `  nodes: ${stats.nodeCount}`,
    `  edges: ${stats.edgeCount}`,
    `  average degree: ${stats.averageDegree.toFixed(2)}`,
    `  density: ${stats.density.toFixed(3)}`,
    `  degree range: ${stats.minDegree}..${stats.maxDegree}`,
  ].join('\n');
}

export function issuesReport(filename: string, issues: GraphIssue[]): string {
  const lines: string[] = [];
  const block = (issue: GraphIssue) => {
    const kind = issue.severity === 'error' ? '\x1b[31merror\x1b[0m' : '\x1b[33mwarning\x1b[0m';
    lines.push(`${kind}[${issue.code}]: ${issue.message}`);
    lines.push(`at ${filename}${issue.path ? `:${issue.path}` : ''}`);
  };
  // Errors before warnings
  for (const issue of issues) if (issue.severity === 'error') block(issue);
  for (const issue of issues) if (issue.severity === 'warning') block(issue);
  return lines.join('\n');
}
