// Public SDK surface for programmatic use
// Re-export core types
export type {
  AlgorithmName,
  AlgorithmParams,
  AlgorithmRequest,
  AlgorithmResult,
  AlgorithmStep,
  ResultOf,
  StepType,
  BfsData,
  DfsData,
  PathData,
  ComponentsData,
  CentralityData,
  CentralityEntry,
  ColoringData,
  Failure,
  FailureCode,
  Result,
  GraphIssue,
  GraphRecords,
  NodeRecord,
  EdgeRecord,
} from './core/types.js';

// Graph model
export { Graph } from './model/graph.js';
export type {
  GraphNode,
  GraphEdge,
  NodeInput,
  NodeUpdate,
  GraphStatistics,
  AdjacencyMatrix,
  GraphOptions,
} from './model/types.js';
export { NEUTRAL_COLOR } from './model/types.js';
export type { WeightTraits, PropertyDifferences } from './model/weight.js';
export {
  calculateWeight,
  calculateCost,
  propertyDistance,
  propertyDifferences,
  similarityScore,
} from './model/weight.js';

// Algorithms
export { runAlgorithm, detectAlgorithm, ALGORITHMS } from './core/router.js';
export type { AlgorithmInfo } from './core/router.js';
export { breadthFirstSearch } from './algorithms/bfs.js';
export { depthFirstSearch } from './algorithms/dfs.js';
export { dijkstra } from './algorithms/dijkstra.js';
export { aStar, DEFAULT_HEURISTIC_SCALE } from './algorithms/astar.js';
export { connectedComponents } from './algorithms/components.js';
export { degreeCentrality, DEFAULT_TOP_K } from './algorithms/centrality.js';
export { welshPowell } from './algorithms/coloring.js';

// Layout
export { ForceDirectedLayout, DEFAULT_LAYOUT_OPTIONS } from './layout/force-directed.js';
export type { LayoutOptions } from './layout/force-directed.js';
export type { ILayoutEngine, LayoutSummary } from './layout/interfaces.js';

// Records, exports and reporting
export { toRecords, fromRecords, parseGraphJson } from './core/records.js';
export type { ImportResult, RecordsImport } from './core/records.js';
export { formatAdjacencyList, formatAdjacencyMatrix } from './core/adjacency.js';
export { generateSampleGraph } from './core/sample.js';
export { colorsForResult, applyResult } from './core/palette.js';
export { textReport, toJsonResult, statisticsReport, issuesReport } from './core/format.js';
