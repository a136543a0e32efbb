import type { Result } from '../core/types.js';
import { fail, invalidOperation, notFound, ok } from '../core/errors.js';
import { calculateWeight } from './weight.js';
import {
  NEUTRAL_COLOR,
  type AdjacencyMatrix,
  type GraphEdge,
  type GraphNode,
  type GraphOptions,
  type GraphStatistics,
  type NodeInput,
  type NodeUpdate,
} from './types.js';

type Mutable<T> = { -readonly [K in keyof T]: T[K] };
type NodeState = Mutable<GraphNode>;
type EdgeState = Mutable<GraphEdge>;

function edgeKey(a: number, b: number): string {
  return a < b ? `${a}:${b}` : `${b}:${a}`;
}

/**
 * Undirected weighted graph. The only place nodes and edges are created or
 * destroyed; degrees and edge weights are kept consistent on every mutation.
 */
export class Graph {
  private nodes: Map<number, NodeState> = new Map();
  // Insertion ordered, keyed by the unordered id pair
  private edges: Map<string, EdgeState> = new Map();
  private adjacency: Map<number, number[]> = new Map();
  private nextId = 1;
  // Set once any color or highlight leaves its neutral value
  private displayDirty = false;
  private readonly random: () => number;

  constructor(options: GraphOptions = {}) {
    this.random = options.random ?? Math.random;
  }

  get nodeCount(): number {
    return this.nodes.size;
  }

  get edgeCount(): number {
    return this.edges.size;
  }

  addNode(input: NodeInput = {}): Result<GraphNode> {
    let id = input.id;
    if (id !== undefined) {
      if (!Number.isSafeInteger(id) || id < 0) {
        return fail(invalidOperation(`Node id must be a non-negative integer, got ${id}`));
      }
      if (this.nodes.has(id)) {
        return fail(invalidOperation(`Node with id ${id} already exists`, { hint: 'Omit the id to have the next free one assigned.' }));
      }
    } else {
      id = this.nextId;
    }

    this.clearDisplay();
    const node: NodeState = {
      id,
      name: input.name || `User_${id}`,
      x: input.x ?? 100 + this.random() * 600,
      y: input.y ?? 100 + this.random() * 400,
      vx: 0,
      vy: 0,
      activity: input.activity ?? 0.1 + this.random() * 0.9,
      interaction: input.interaction ?? 1 + this.random() * 19,
      connectionCount: 0,
      color: input.color ?? NEUTRAL_COLOR,
      selected: input.selected ?? false,
      highlighted: input.highlighted ?? false,
    };

    this.nodes.set(id, node);
    this.adjacency.set(id, []);
    // Ids are never handed out twice, even after removal
    if (id >= this.nextId) this.nextId = id + 1;
    if (node.color !== NEUTRAL_COLOR || node.highlighted) this.displayDirty = true;
    return ok(node);
  }

  removeNode(id: number): boolean {
    const neighbors = this.adjacency.get(id);
    if (!neighbors) return false;

    for (const n of neighbors) {
      this.edges.delete(edgeKey(id, n));
      const list = this.adjacency.get(n);
      if (list) list.splice(list.indexOf(id), 1);
      this.syncDegree(n);
    }
    this.adjacency.delete(id);
    this.nodes.delete(id);
    this.reweightAround(neighbors);
    this.clearDisplay();
    return true;
  }

  updateNode(id: number, patch: NodeUpdate): boolean {
    const node = this.nodes.get(id);
    if (!node) return false;

    const traitsChanged =
      (patch.activity !== undefined && patch.activity !== node.activity) ||
      (patch.interaction !== undefined && patch.interaction !== node.interaction);

    if (patch.name !== undefined) node.name = patch.name;
    if (patch.activity !== undefined) node.activity = patch.activity;
    if (patch.interaction !== undefined) node.interaction = patch.interaction;
    if (patch.x !== undefined || patch.y !== undefined) {
      // Dragging a node cancels any momentum it had
      node.x = patch.x ?? node.x;
      node.y = patch.y ?? node.y;
      node.vx = 0;
      node.vy = 0;
    }

    if (traitsChanged) {
      this.reweightAround([id]);
      this.clearDisplay();
    }

    if (patch.color !== undefined) node.color = patch.color;
    if (patch.selected !== undefined) node.selected = patch.selected;
    if (patch.highlighted !== undefined) node.highlighted = patch.highlighted;
    if (patch.color !== undefined || patch.highlighted !== undefined) this.displayDirty = true;
    return true;
  }

  addEdge(sourceId: number, targetId: number): Result<GraphEdge> {
    if (!this.nodes.has(sourceId)) return fail(notFound(sourceId, 'Source node'));
    if (!this.nodes.has(targetId)) return fail(notFound(targetId, 'Target node'));
    if (sourceId === targetId) {
      return fail(invalidOperation(`Cannot connect node ${sourceId} to itself`));
    }

    const key = edgeKey(sourceId, targetId);
    const existing = this.edges.get(key);
    if (existing) return ok(existing);

    const edge: EdgeState = { sourceId, targetId, weight: 1, highlighted: false };
    this.edges.set(key, edge);
    this.adjacency.get(sourceId)?.push(targetId);
    this.adjacency.get(targetId)?.push(sourceId);
    this.syncDegree(sourceId);
    this.syncDegree(targetId);
    this.reweightAround([sourceId, targetId]);
    this.clearDisplay();
    return ok(edge);
  }

  removeEdge(sourceId: number, targetId: number): boolean {
    const key = edgeKey(sourceId, targetId);
    if (!this.edges.has(key)) return false;

    this.edges.delete(key);
    const a = this.adjacency.get(sourceId);
    if (a) a.splice(a.indexOf(targetId), 1);
    const b = this.adjacency.get(targetId);
    if (b) b.splice(b.indexOf(sourceId), 1);
    this.syncDegree(sourceId);
    this.syncDegree(targetId);
    this.reweightAround([sourceId, targetId]);
    this.clearDisplay();
    return true;
  }

  hasNode(id: number): boolean {
    return this.nodes.has(id);
  }

  hasEdge(sourceId: number, targetId: number): boolean {
    return this.edges.has(edgeKey(sourceId, targetId));
  }

  getNode(id: number): GraphNode | undefined {
    return this.nodes.get(id);
  }

  getEdge(sourceId: number, targetId: number): GraphEdge | undefined {
    return this.edges.get(edgeKey(sourceId, targetId));
  }

  /** Node ids in ascending order */
  nodeIds(): number[] {
    return Array.from(this.nodes.keys()).sort((a, b) => a - b);
  }

  /** Nodes in ascending id order */
  getNodes(): GraphNode[] {
    return this.nodeIds().map((id) => this.nodes.get(id)).filter((n): n is NodeState => n !== undefined);
  }

  /** Edges in insertion order */
  getEdges(): GraphEdge[] {
    return Array.from(this.edges.values());
  }

  /** Neighbor ids in edge insertion order */
  getNeighbors(id: number): number[] {
    return (this.adjacency.get(id) ?? []).slice();
  }

  getDegree(id: number): number {
    return this.adjacency.get(id)?.length ?? 0;
  }

  getAdjacencyList(): Map<number, number[]> {
    const out = new Map<number, number[]>();
    for (const id of this.nodeIds()) out.set(id, this.getNeighbors(id));
    return out;
  }

  getAdjacencyMatrix(): AdjacencyMatrix {
    const ids = this.nodeIds();
    const index = new Map(ids.map((id, i) => [id, i] as const));
    const matrix = ids.map(() => ids.map(() => 0));
    for (const e of this.edges.values()) {
      const i = index.get(e.sourceId);
      const j = index.get(e.targetId);
      if (i === undefined || j === undefined) continue;
      matrix[i][j] = e.weight;
      matrix[j][i] = e.weight;
    }
    return { ids, matrix };
  }

  getStatistics(): GraphStatistics {
    const v = this.nodes.size;
    const e = this.edges.size;
    const degrees = Array.from(this.adjacency.values(), (list) => list.length);
    return {
      nodeCount: v,
      edgeCount: e,
      averageDegree: v > 0 ? (2 * e) / v : 0,
      density: v > 1 ? (2 * e) / (v * (v - 1)) : 0,
      maxDegree: degrees.reduce((max, d) => (d > max ? d : max), 0),
      minDegree: degrees.length ? degrees.reduce((min, d) => (d < min ? d : min), Infinity) : 0,
    };
  }

  setEdgeHighlight(sourceId: number, targetId: number, highlighted: boolean): boolean {
    const edge = this.edges.get(edgeKey(sourceId, targetId));
    if (!edge) return false;
    edge.highlighted = highlighted;
    if (highlighted) this.displayDirty = true;
    return true;
  }

  /** Neutral color, no highlights. Selection is left alone. */
  resetDisplay(): void {
    for (const node of this.nodes.values()) {
      node.color = NEUTRAL_COLOR;
      node.highlighted = false;
    }
    for (const edge of this.edges.values()) edge.highlighted = false;
    this.displayDirty = false;
  }

  clear(): void {
    this.nodes.clear();
    this.edges.clear();
    this.adjacency.clear();
    this.nextId = 1;
    this.displayDirty = false;
  }

  // Mutations reset the display, but only sweep when something is colored
  private clearDisplay() {
    if (this.displayDirty) this.resetDisplay();
  }

  private syncDegree(id: number) {
    const node = this.nodes.get(id);
    if (node) node.connectionCount = this.adjacency.get(id)?.length ?? 0;
  }

  // Degrees feed the weight formula, so every edge touching a node whose
  // degree or traits changed gets a fresh weight.
  private reweightAround(ids: number[]) {
    for (const id of ids) {
      const node = this.nodes.get(id);
      if (!node) continue;
      for (const n of this.adjacency.get(id) ?? []) {
        const other = this.nodes.get(n);
        const edge = this.edges.get(edgeKey(id, n));
        if (other && edge) edge.weight = calculateWeight(node, other);
      }
    }
  }
}
