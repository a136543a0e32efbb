import type { Graph } from '../model/graph.js';
import type { AlgorithmName, AlgorithmRequest, AlgorithmResult, ResultOf } from './types.js';
import { runTimed } from './pipeline.js';
import { failure, fail } from './errors.js';
import { breadthFirstSearch } from '../algorithms/bfs.js';
import { depthFirstSearch } from '../algorithms/dfs.js';
import { dijkstra } from '../algorithms/dijkstra.js';
import { aStar, DEFAULT_HEURISTIC_SCALE } from '../algorithms/astar.js';
import { connectedComponents } from '../algorithms/components.js';
import { degreeCentrality, DEFAULT_TOP_K } from '../algorithms/centrality.js';
import { welshPowell } from '../algorithms/coloring.js';

export interface AlgorithmInfo {
  title: string;
  description: string;
  needsStart: boolean;
  needsTarget: boolean;
}

export const ALGORITHMS: Record<AlgorithmName, AlgorithmInfo> = {
  bfs: {
    title: 'Breadth-first search',
    description: 'Explores every reachable node level by level from a start node.',
    needsStart: true,
    needsTarget: false,
  },
  dfs: {
    title: 'Depth-first search',
    description: 'Follows each branch as deep as it goes before backtracking.',
    needsStart: true,
    needsTarget: false,
  },
  dijkstra: {
    title: 'Dijkstra shortest path',
    description: 'Finds the cheapest path between two nodes; cost is the reciprocal of edge weight.',
    needsStart: true,
    needsTarget: true,
  },
  astar: {
    title: 'A* shortest path',
    description: 'Cheapest path search guided by the on-screen distance to the target.',
    needsStart: true,
    needsTarget: true,
  },
  components: {
    title: 'Connected components',
    description: 'Splits the graph into groups of mutually reachable nodes.',
    needsStart: false,
    needsTarget: false,
  },
  centrality: {
    title: 'Degree centrality',
    description: 'Ranks nodes by how many connections they have.',
    needsStart: false,
    needsTarget: false,
  },
  coloring: {
    title: 'Welsh-Powell coloring',
    description: 'Colors nodes so that no two neighbors share a color.',
    needsStart: false,
    needsTarget: false,
  },
};

const ALIASES: Record<string, AlgorithmName> = {
  'bfs': 'bfs',
  'breadth-first': 'bfs',
  'breadth-first-search': 'bfs',
  'dfs': 'dfs',
  'depth-first': 'dfs',
  'depth-first-search': 'dfs',
  'dijkstra': 'dijkstra',
  'shortest-path': 'dijkstra',
  'astar': 'astar',
  'a*': 'astar',
  'a-star': 'astar',
  'components': 'components',
  'connected-components': 'components',
  'centrality': 'centrality',
  'degree-centrality': 'centrality',
  'coloring': 'coloring',
  'colouring': 'coloring',
  'welsh-powell': 'coloring',
};

export function detectAlgorithm(name: string): AlgorithmName | undefined {
  const key = name.trim().toLowerCase().replace(/[\s_]+/g, '-');
  return ALIASES[key];
}

function missingParam<K extends AlgorithmName>(graph: Graph, algorithm: K, param: 'startId' | 'targetId'): ResultOf<K> {
  return runTimed(algorithm, () => {
    if (graph.nodeCount === 0) {
      return fail(failure('DEGENERATE_INPUT', 'Graph is empty', { hint: 'Add nodes before running a search.' }));
    }
    const flag = param === 'startId' ? '--start' : '--target';
    return fail(failure('INVALID_INPUT', `${ALGORITHMS[algorithm].title} needs a ${param}`, { hint: `Pass ${flag} <id>.` }));
  });
}

export function runAlgorithm(graph: Graph, request: AlgorithmRequest): AlgorithmResult {
  const { startId, targetId } = request;
  switch (request.algorithm) {
    case 'bfs':
      return startId === undefined ? missingParam(graph, 'bfs', 'startId') : breadthFirstSearch(graph, startId);
    case 'dfs':
      return startId === undefined ? missingParam(graph, 'dfs', 'startId') : depthFirstSearch(graph, startId);
    case 'dijkstra':
      if (startId === undefined) return missingParam(graph, 'dijkstra', 'startId');
      if (targetId === undefined) return missingParam(graph, 'dijkstra', 'targetId');
      return dijkstra(graph, startId, targetId);
    case 'astar':
      if (startId === undefined) return missingParam(graph, 'astar', 'startId');
      if (targetId === undefined) return missingParam(graph, 'astar', 'targetId');
      return aStar(graph, startId, targetId, request.heuristicScale ?? DEFAULT_HEURISTIC_SCALE);
    case 'components':
      return connectedComponents(graph);
    case 'centrality':
      return degreeCentrality(graph, request.topK ?? DEFAULT_TOP_K);
    case 'coloring':
      return welshPowell(graph);
  }
}
