import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { fromRecords, toRecords } from './core/records.js';
import { ALGORITHMS, detectAlgorithm, runAlgorithm } from './core/router.js';
import { toJsonResult } from './core/format.js';
import { ForceDirectedLayout } from './layout/force-directed.js';
import { AlgorithmArgsSchema, LayoutArgsSchema, StatisticsArgsSchema } from './core/schema.js';

const graphProperty = {
  type: 'object',
  description: 'Graph records: { nodes: [{ id, name?, x?, y?, activity?, interaction? }], edges: [{ source_id, target_id }] }',
  properties: {
    nodes: { type: 'array', items: { type: 'object' } },
    edges: { type: 'array', items: { type: 'object' } },
  },
  required: ['nodes'],
};

export const TOOLS: Tool[] = [
  {
    name: 'run_graph_algorithm',
    description:
      'Run a graph algorithm on a social graph and return its result with the step log. ' +
      `Algorithms: ${Object.keys(ALGORITHMS).join(', ')}. Traversals need startId; shortest paths need startId and targetId.`,
    inputSchema: {
      type: 'object',
      properties: {
        graph: graphProperty,
        algorithm: { type: 'string', description: 'Algorithm name or alias (e.g. "bfs", "a*", "welsh-powell")' },
        startId: { type: 'number', description: 'Start node id' },
        targetId: { type: 'number', description: 'Target node id' },
        topK: { type: 'number', description: 'Top nodes reported by centrality (default 5)' },
        heuristicScale: { type: 'number', description: 'A* heuristic multiplier (default 0.01)' },
      },
      required: ['graph', 'algorithm'],
    },
  },
  {
    name: 'graph_statistics',
    description: 'Node and edge counts, average degree, density and degree range of a graph.',
    inputSchema: {
      type: 'object',
      properties: { graph: graphProperty },
      required: ['graph'],
    },
  },
  {
    name: 'layout_graph',
    description: 'Run the force-directed layout and return the graph records with updated positions.',
    inputSchema: {
      type: 'object',
      properties: {
        graph: graphProperty,
        iterations: { type: 'number', description: 'Layout steps (default 150)' },
        repulsion: { type: 'number' },
        attraction: { type: 'number' },
        damping: { type: 'number', description: 'Between 0 and 1' },
      },
      required: ['graph'],
    },
  },
];

/**
 * Executes one tool call and returns the JSON payload for the reply.
 * Throws on unknown tools and invalid arguments.
 */
export function callTool(name: string, args: unknown): unknown {
  try {
    switch (name) {
      case 'run_graph_algorithm': {
        const parsed = AlgorithmArgsSchema.parse(args);
        const algorithm = detectAlgorithm(parsed.algorithm);
        if (!algorithm) throw new Error(`Unknown algorithm: ${parsed.algorithm}`);
        const { graph, issues } = fromRecords(parsed.graph);
        const result = runAlgorithm(graph, {
          algorithm,
          startId: parsed.startId,
          targetId: parsed.targetId,
          topK: parsed.topK,
          heuristicScale: parsed.heuristicScale,
        });
        return { ...toJsonResult(result), issues };
      }
      case 'graph_statistics': {
        const parsed = StatisticsArgsSchema.parse(args);
        const { graph, issues } = fromRecords(parsed.graph);
        return { statistics: graph.getStatistics(), issues };
      }
      case 'layout_graph': {
        const { graph: records, ...options } = LayoutArgsSchema.parse(args);
        const { graph, issues } = fromRecords(records);
        const summary = new ForceDirectedLayout(options).layout(graph);
        return { summary, graph: toRecords(graph), issues };
      }
    }
  } catch (error) {
    if (error instanceof z.ZodError) {
      throw new Error(`Invalid arguments: ${error.message}`);
    }
    throw error;
  }
  throw new Error(`Unknown tool: ${name}`);
}
