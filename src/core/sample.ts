import { Graph } from '../model/graph.js';

const NAMES = [
  'Alex', 'Blake', 'Casey', 'Dana', 'Eli', 'Frankie',
  'Gray', 'Harper', 'Indy', 'Jules', 'Kai', 'Lane',
  'Morgan', 'Noel', 'Oakley', 'Parker', 'Quinn', 'Reese',
  'Sage', 'Tatum', 'Uma', 'Val', 'Wren', 'Zion',
];

export const SAMPLE_CENTER = { x: 400, y: 300 };

export function sampleName(index: number): string {
  const base = NAMES[index % NAMES.length];
  return index < NAMES.length ? base : `${base}_${Math.floor(index / NAMES.length)}`;
}

/**
 * Random social graph with nodes on a circle. Each node pair is linked with
 * the given probability. Traits are drawn from `random`, activity in
 * [0.1, 1.0) and interaction in [1, 50).
 */
export function generateSampleGraph(count: number, probability = 0.3, random: () => number = Math.random): Graph {
  const graph = new Graph({ random });
  const radius = Math.min(300, 50 + count * 8);

  for (let i = 0; i < count; i++) {
    const angle = (2 * Math.PI * i) / count;
    graph.addNode({
      name: sampleName(i),
      x: SAMPLE_CENTER.x + radius * Math.cos(angle),
      y: SAMPLE_CENTER.y + radius * Math.sin(angle),
      activity: 0.1 + random() * 0.9,
      interaction: 1 + random() * 49,
    });
  }

  const ids = graph.nodeIds();
  for (let i = 0; i < ids.length; i++) {
    for (let j = i + 1; j < ids.length; j++) {
      if (random() < probability) graph.addEdge(ids[i], ids[j]);
    }
  }
  return graph;
}
