import type { Graph } from '../model/graph.js';

export interface LayoutSummary {
  /** Steps taken in this run */
  iterations: number;
  /** True when the run ended through stop() rather than the budget */
  stopped: boolean;
  /** Largest distance any node moved in the last step */
  maxDisplacement: number;
}

/**
 * Interface for layout engines that move node positions in place
 */
export interface ILayoutEngine {
  /**
   * Run the engine over a graph until its budget is spent or it is stopped
   * @param iterations Step budget; the engine default when omitted
   */
  layout(graph: Graph, iterations?: number): LayoutSummary;
}
