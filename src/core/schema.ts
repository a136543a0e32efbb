import { z } from 'zod';

// Derived fields (connection_count, weight) are accepted and ignored on import.
export const NodeRecordSchema = z.object({
  id: z.number().int().nonnegative(),
  name: z.string().optional(),
  x: z.number().finite().optional(),
  y: z.number().finite().optional(),
  activity: z.number().finite().optional(),
  interaction: z.number().finite().optional(),
  connection_count: z.number().int().nonnegative().optional(),
  color: z.string().optional(),
  selected: z.boolean().optional(),
  highlighted: z.boolean().optional(),
});

export const EdgeRecordSchema = z.object({
  source_id: z.number().int().nonnegative(),
  target_id: z.number().int().nonnegative(),
  weight: z.number().optional(),
});

export const GraphRecordsSchema = z.object({
  nodes: z.array(NodeRecordSchema),
  edges: z.array(EdgeRecordSchema).default([]),
});

export type GraphRecordsInput = z.input<typeof GraphRecordsSchema>;

const NodeId = z.number().int().nonnegative();

export const AlgorithmArgsSchema = z.object({
  graph: GraphRecordsSchema.describe('Graph records: { nodes, edges } with snake_case keys'),
  algorithm: z.string().describe('bfs, dfs, dijkstra, astar, components, centrality or coloring'),
  startId: NodeId.optional().describe('Start node for traversals and shortest paths'),
  targetId: NodeId.optional().describe('Target node for shortest paths'),
  topK: z.number().int().nonnegative().optional().describe('How many top nodes centrality highlights'),
  heuristicScale: z.number().nonnegative().optional().describe('A* heuristic multiplier'),
});

export const LayoutArgsSchema = z.object({
  graph: GraphRecordsSchema,
  iterations: z.number().int().positive().max(10000).optional(),
  repulsion: z.number().positive().optional(),
  attraction: z.number().positive().optional(),
  damping: z.number().gt(0).lt(1).optional(),
});

export const StatisticsArgsSchema = z.object({
  graph: GraphRecordsSchema,
});

/** `nodes[2].id` style path for an issue */
export function formatIssuePath(path: ReadonlyArray<string | number>): string {
  return path.reduce<string>((acc, part) => {
    if (typeof part === 'number') return `${acc}[${part}]`;
    return acc ? `${acc}.${part}` : part;
  }, '');
}

// CLI flags arrive as strings
const FlagId = z.coerce.number().int().nonnegative();

export const RunFlagsSchema = z.object({
  start: FlagId.optional(),
  target: FlagId.optional(),
  topK: FlagId.optional(),
  heuristicScale: z.coerce.number().nonnegative().optional(),
  format: z.enum(['text', 'json']).default('text'),
});

export const LayoutFlagsSchema = z.object({
  iterations: z.coerce.number().int().positive().max(10000).optional(),
  repulsion: z.coerce.number().positive().optional(),
  attraction: z.coerce.number().positive().optional(),
  damping: z.coerce.number().gt(0).lt(1).optional(),
});

export const SampleFlagsSchema = z.object({
  count: z.coerce.number().int().nonnegative().max(5000),
  probability: z.coerce.number().min(0).max(1).default(0.3),
  output: z.string().optional(),
});

export const ExportFlagsSchema = z.object({
  as: z.enum(['list', 'matrix']).default('list'),
});

export const StatsFlagsSchema = z.object({
  format: z.enum(['text', 'json']).default('text'),
});
