// Graph model types

export const NEUTRAL_COLOR = '#00d9ff';

export interface GraphNode {
  readonly id: number;
  name: string;
  x: number;
  y: number;
  // Velocity, owned by the layout solver
  vx: number;
  vy: number;
  activity: number;
  interaction: number;
  /** Current degree; maintained by Graph */
  readonly connectionCount: number;
  /** Display state; written through Graph.updateNode */
  readonly color: string;
  selected: boolean;
  readonly highlighted: boolean;
}

export interface GraphEdge {
  readonly sourceId: number;
  readonly targetId: number;
  /** Derived from the endpoints, in (0, 1] */
  readonly weight: number;
  /** Written through Graph.setEdgeHighlight */
  readonly highlighted: boolean;
}

export interface NodeInput {
  /** Explicit id, used when rebuilding a graph from records */
  id?: number;
  name?: string;
  x?: number;
  y?: number;
  activity?: number;
  interaction?: number;
  color?: string;
  selected?: boolean;
  highlighted?: boolean;
}

export type NodeUpdate = Partial<
  Pick<GraphNode, 'name' | 'x' | 'y' | 'activity' | 'interaction' | 'color' | 'selected' | 'highlighted'>
>;

export interface GraphStatistics {
  nodeCount: number;
  edgeCount: number;
  averageDegree: number;
  density: number;
  maxDegree: number;
  minDegree: number;
}

export interface AdjacencyMatrix {
  /** Row/column order */
  ids: number[];
  matrix: number[][];
}

export interface GraphOptions {
  /** Random source for default positions and scores; Math.random when omitted */
  random?: () => number;
}
