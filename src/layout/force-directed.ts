import type { Graph } from '../model/graph.js';
import type { GraphNode } from '../model/types.js';
import type { ILayoutEngine, LayoutSummary } from './interfaces.js';

export interface LayoutOptions {
  /** Pairwise push, divided by the squared distance */
  repulsion: number;
  /** Spring strength along each edge */
  attraction: number;
  /** Velocity multiplier per step, below 1 */
  damping: number;
  /** Distance floor for repulsion */
  minDistance: number;
  maxVelocity: number;
  /** Spring rest length for an edge of weight 0.5; heavier edges rest shorter */
  springLength: number;
  /** Pull toward the centroid */
  gravity: number;
  iterations: number;
  /** Called after every step; the caller may stop() the engine from here */
  onStep?: (iteration: number, maxDisplacement: number) => void;
}

export const DEFAULT_LAYOUT_OPTIONS: LayoutOptions = {
  repulsion: 15000,
  attraction: 0.04,
  damping: 0.85,
  minDistance: 80,
  maxVelocity: 50,
  springLength: 100,
  gravity: 0.01,
  iterations: 150,
};

const GOLDEN_ANGLE = Math.PI * (3 - Math.sqrt(5));

const TUNABLES = [
  'repulsion',
  'attraction',
  'damping',
  'minDistance',
  'maxVelocity',
  'springLength',
  'gravity',
  'iterations',
] as const;

/**
 * Spring-embedder layout. Mutates node positions and velocities in place;
 * both survive stop()/start() so a paused run picks up where it left off.
 */
export class ForceDirectedLayout implements ILayoutEngine {
  readonly options: LayoutOptions;
  private running = false;
  private remaining = 0;
  private completed = 0;

  constructor(options: Partial<LayoutOptions> = {}) {
    // Unset keys keep their defaults, even when passed as undefined
    const merged: LayoutOptions = { ...DEFAULT_LAYOUT_OPTIONS, onStep: options.onStep };
    for (const key of TUNABLES) {
      const value = options[key];
      if (value !== undefined) merged[key] = value;
    }
    this.options = merged;
  }

  get isRunning(): boolean {
    return this.running;
  }

  get remainingIterations(): number {
    return this.remaining;
  }

  /** Arms the engine. A paused run keeps its remaining budget. */
  start(iterations?: number): void {
    if (iterations !== undefined || this.remaining === 0) {
      this.remaining = Math.max(0, Math.floor(iterations ?? this.options.iterations));
      this.completed = 0;
    }
    this.running = this.remaining > 0;
  }

  stop(): void {
    this.running = false;
  }

  /** Drops the budget and all momentum */
  reset(graph: Graph): void {
    this.running = false;
    this.remaining = 0;
    this.completed = 0;
    for (const node of graph.getNodes()) {
      node.vx = 0;
      node.vy = 0;
    }
  }

  layout(graph: Graph, iterations?: number): LayoutSummary {
    this.start(iterations ?? this.options.iterations);
    return this.run(graph);
  }

  /** Steps until the budget runs out or stop() is called */
  run(graph: Graph): LayoutSummary {
    let iterations = 0;
    let maxDisplacement = 0;
    while (this.running) {
      maxDisplacement = this.step(graph);
      iterations++;
      this.remaining--;
      this.completed++;
      this.options.onStep?.(this.completed, maxDisplacement);
      if (this.remaining <= 0) {
        this.remaining = 0;
        this.running = false;
        for (const node of graph.getNodes()) {
          node.vx = 0;
          node.vy = 0;
        }
        return { iterations, stopped: false, maxDisplacement };
      }
    }
    // Budget left over means stop() ended the run; an empty one never started
    return { iterations, stopped: this.remaining > 0, maxDisplacement };
  }

  /**
   * One integration step, independent of the budget.
   * @returns the largest distance any node moved
   */
  step(graph: Graph): number {
    const nodes = graph.getNodes();
    const n = nodes.length;
    if (n === 0) return 0;

    const { repulsion, attraction, damping, minDistance, maxVelocity, springLength, gravity } = this.options;
    const fx = new Array<number>(n).fill(0);
    const fy = new Array<number>(n).fill(0);
    const index = new Map<number, number>();
    nodes.forEach((node, i) => index.set(node.id, i));

    const floor = minDistance * minDistance;
    for (let i = 0; i < n; i++) {
      for (let j = i + 1; j < n; j++) {
        let dx = nodes[i].x - nodes[j].x;
        let dy = nodes[i].y - nodes[j].y;
        const d2 = dx * dx + dy * dy;
        if (d2 === 0) {
          // Coincident nodes: pick a fixed direction from the pair
          const angle = GOLDEN_ANGLE * (i * n + j + 1);
          dx = Math.cos(angle);
          dy = Math.sin(angle);
        }
        const d = d2 === 0 ? 1 : Math.sqrt(d2);
        const force = repulsion / Math.max(d2, floor);
        const ux = dx / d;
        const uy = dy / d;
        fx[i] += ux * force;
        fy[i] += uy * force;
        fx[j] -= ux * force;
        fy[j] -= uy * force;
      }
    }

    for (const edge of graph.getEdges()) {
      const i = index.get(edge.sourceId);
      const j = index.get(edge.targetId);
      if (i === undefined || j === undefined) continue;
      const dx = nodes[j].x - nodes[i].x;
      const dy = nodes[j].y - nodes[i].y;
      const d = Math.hypot(dx, dy);
      if (d === 0) continue;
      const rest = springLength * (1.5 - edge.weight);
      const force = attraction * (d - rest);
      fx[i] += (dx / d) * force;
      fy[i] += (dy / d) * force;
      fx[j] -= (dx / d) * force;
      fy[j] -= (dy / d) * force;
    }

    const cx = nodes.reduce((acc, node) => acc + node.x, 0) / n;
    const cy = nodes.reduce((acc, node) => acc + node.y, 0) / n;

    let maxDisplacement = 0;
    nodes.forEach((node, i) => {
      fx[i] += (cx - node.x) * gravity;
      fy[i] += (cy - node.y) * gravity;
      maxDisplacement = Math.max(maxDisplacement, integrate(node, fx[i], fy[i], damping, maxVelocity));
    });
    return maxDisplacement;
  }
}

function integrate(node: GraphNode, fx: number, fy: number, damping: number, maxVelocity: number): number {
  node.vx = (node.vx + fx) * damping;
  node.vy = (node.vy + fy) * damping;
  const speed = Math.hypot(node.vx, node.vy);
  if (speed > maxVelocity) {
    node.vx = (node.vx / speed) * maxVelocity;
    node.vy = (node.vy / speed) * maxVelocity;
  }
  node.x += node.vx;
  node.y += node.vy;
  return Math.min(speed, maxVelocity);
}
