import { Graph } from '../model/graph.js';
import type { GraphOptions } from '../model/types.js';
import type { GraphIssue, GraphRecords } from './types.js';
import { issueAt, warningAt } from './errors.js';
import { GraphRecordsSchema, formatIssuePath, type GraphRecordsInput } from './schema.js';

export interface RecordsImport {
  graph: Graph;
  issues: GraphIssue[];
}

export interface ImportResult {
  /** null when the input could not be read at all */
  graph: Graph | null;
  issues: GraphIssue[];
}

export function toRecords(graph: Graph): GraphRecords {
  return {
    nodes: graph.getNodes().map((n) => ({
      id: n.id,
      name: n.name,
      x: n.x,
      y: n.y,
      activity: n.activity,
      interaction: n.interaction,
      connection_count: n.connectionCount,
      color: n.color,
      selected: n.selected,
      highlighted: n.highlighted,
    })),
    edges: graph.getEdges().map((e) => ({
      source_id: e.sourceId,
      target_id: e.targetId,
      weight: e.weight,
    })),
  };
}

/**
 * Rebuilds a graph from records. Ids are kept; degrees and weights are
 * recomputed. Bad entries are skipped and reported, the rest still loads.
 */
export function fromRecords(records: GraphRecordsInput, options: GraphOptions = {}): RecordsImport {
  const graph = new Graph(options);
  const issues: GraphIssue[] = [];
  const loaded: typeof records.nodes = [];

  records.nodes.forEach((rec, i) => {
    const added = graph.addNode({
      id: rec.id,
      name: rec.name,
      x: rec.x,
      y: rec.y,
      activity: rec.activity,
      interaction: rec.interaction,
    });
    if (added.ok) loaded.push(rec);
    else issues.push(issueAt(`nodes[${i}].id`, added.message, added.code));
  });

  (records.edges ?? []).forEach((rec, i) => {
    const added = graph.addEdge(rec.source_id, rec.target_id);
    if (!added.ok) issues.push(warningAt(`edges[${i}]`, `${added.message}; edge skipped`, added.code));
  });

  // Display state goes last: every mutation above resets it
  for (const rec of loaded) {
    if (rec.color === undefined && rec.selected === undefined && rec.highlighted === undefined) continue;
    graph.updateNode(rec.id, { color: rec.color, selected: rec.selected, highlighted: rec.highlighted });
  }

  return { graph, issues };
}

export function parseGraphJson(text: string, options: GraphOptions = {}): ImportResult {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    return { graph: null, issues: [issueAt(undefined, `Invalid JSON: ${msg}`)] };
  }

  const parsed = GraphRecordsSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) =>
      issueAt(formatIssuePath(issue.path) || undefined, issue.message),
    );
    return { graph: null, issues };
  }
  return fromRecords(parsed.data, options);
}
