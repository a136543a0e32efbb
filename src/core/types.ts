// Plain data contracts shared by the model, the algorithms and the shells

export type FailureCode =
  | 'NOT_FOUND'
  | 'INVALID_OPERATION'
  | 'UNREACHABLE'
  | 'DEGENERATE_INPUT'
  | 'INVALID_INPUT'
  | 'INTERNAL';

export interface Failure {
  code: FailureCode;
  message: string;
  hint?: string;
}

export type Result<T> = { ok: true; value: T } | ({ ok: false } & Failure);

// Import/export records (snake_case keys are the external contract)
export interface NodeRecord {
  id: number;
  name: string;
  x: number;
  y: number;
  activity: number;
  interaction: number;
  connection_count: number;
  color: string;
  selected: boolean;
  highlighted: boolean;
}

export interface EdgeRecord {
  source_id: number;
  target_id: number;
  weight: number;
}

export interface GraphRecords {
  nodes: NodeRecord[];
  edges: EdgeRecord[];
}

export interface GraphIssue {
  message: string;
  severity: 'error' | 'warning';
  code: FailureCode;
  path?: string;
}

export type AlgorithmName =
  | 'bfs'
  | 'dfs'
  | 'dijkstra'
  | 'astar'
  | 'components'
  | 'centrality'
  | 'coloring';

export interface AlgorithmParams {
  startId?: number;
  targetId?: number;
  topK?: number;
  heuristicScale?: number;
}

export interface AlgorithmRequest extends AlgorithmParams {
  algorithm: AlgorithmName;
}

// Animation log entries. `value` carries the step's number: level, distance,
// component index, centrality or color depending on the algorithm.
export type StepType =
  | 'visit'
  | 'discover'
  | 'push'
  | 'relax'
  | 'component'
  | 'score'
  | 'color';

export interface AlgorithmStep {
  type: StepType;
  nodeId: number;
  fromId?: number;
  value?: number;
}

export interface BfsData {
  startId: number;
  order: number[];
  levels: Record<number, number>;
  visitedCount: number;
}

export interface DfsData {
  startId: number;
  order: number[];
  /** 0-based position of each node in `order` */
  discovery: Record<number, number>;
  visitedCount: number;
}

export interface PathData {
  startId: number;
  targetId: number;
  path: number[];
  edges: Array<[number, number]>;
  totalCost: number;
  /** Nodes taken off the frontier before the target was reached */
  explored: number;
  /** Best known cost of every node reached during the search */
  distances: Record<number, number>;
}

export interface ComponentsData {
  components: number[][];
  count: number;
  componentOf: Record<number, number>;
  largestSize: number;
  isolated: number[];
}

export interface CentralityEntry {
  rank: number;
  nodeId: number;
  name: string;
  degree: number;
  centrality: number;
}

export interface CentralityData {
  ranking: CentralityEntry[];
  top: CentralityEntry[];
  statistics: {
    averageCentrality: number;
    maxCentrality: number;
    minCentrality: number;
    averageDegree: number;
    maxDegree: number;
  };
}

export interface ColoringData {
  /** node id -> 1-based color index */
  colors: Record<number, number>;
  chromaticCount: number;
  order: number[];
  groups: Array<{ color: number; nodes: number[] }>;
}

export interface AlgorithmPayloads {
  bfs: BfsData;
  dfs: DfsData;
  dijkstra: PathData;
  astar: PathData;
  components: ComponentsData;
  centrality: CentralityData;
  coloring: ColoringData;
}

interface ResultBase<K extends AlgorithmName> {
  algorithm: K;
  elapsedMs: number;
  message: string;
}

export interface SucceededResult<K extends AlgorithmName> extends ResultBase<K> {
  success: true;
  data: AlgorithmPayloads[K];
  steps: AlgorithmStep[];
}

export interface FailedResult<K extends AlgorithmName> extends ResultBase<K> {
  success: false;
  data: null;
  steps: AlgorithmStep[];
  code: FailureCode;
  hint?: string;
}

export type AlgorithmResult<N extends AlgorithmName = AlgorithmName> = {
  [K in N]: SucceededResult<K> | FailedResult<K>;
}[N];

export type ResultOf<K extends AlgorithmName> = SucceededResult<K> | FailedResult<K>;
