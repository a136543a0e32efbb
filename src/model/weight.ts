/**
 * Edge weight derivation.
 *
 * weight(i, j) = 1 / (1 + sqrt(Δactivity² + Δinteraction² + ΔconnectionCount²))
 *
 * Similar endpoints give a weight close to 1; shortest-path searches walk the
 * reciprocal (`cost`), so similar nodes are cheap to travel between.
 */

export interface WeightTraits {
  activity: number;
  interaction: number;
  connectionCount: number;
}

export interface PropertyDifferences {
  activity: number;
  interaction: number;
  connection: number;
  total: number;
}

export function propertyDistance(a: WeightTraits, b: WeightTraits): number {
  const da = a.activity - b.activity;
  const di = a.interaction - b.interaction;
  const dc = a.connectionCount - b.connectionCount;
  return Math.sqrt(da * da + di * di + dc * dc);
}

export function calculateWeight(a: WeightTraits, b: WeightTraits): number {
  return 1 / (1 + propertyDistance(a, b));
}

export function costOf(weight: number): number {
  return weight > 0 ? 1 / weight : Infinity;
}

export function calculateCost(a: WeightTraits, b: WeightTraits): number {
  return costOf(calculateWeight(a, b));
}

// 0..100
export function similarityScore(a: WeightTraits, b: WeightTraits): number {
  return calculateWeight(a, b) * 100;
}

export function propertyDifferences(a: WeightTraits, b: WeightTraits): PropertyDifferences {
  return {
    activity: Math.abs(a.activity - b.activity),
    interaction: Math.abs(a.interaction - b.interaction),
    connection: Math.abs(a.connectionCount - b.connectionCount),
    total: propertyDistance(a, b),
  };
}
