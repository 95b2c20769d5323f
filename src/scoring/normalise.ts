import { DEFAULT_URGENCY, DEFAULT_URGENCY_TABLE, type UrgencyEntry } from "../config/planning.js";
import type { BuildingType, Priority } from "../records/schemas.js";

/**
 * Maps every value to `v / max`. A column of zeros (or an empty one) stays at
 * zero rather than dividing by zero.
 */
export function populationScores(inhabitants: readonly number[]): number[] {
  const max = inhabitants.reduce((highest, value) => Math.max(highest, value), 0);
  if (max <= 0) {
    return inhabitants.map(() => 0);
  }
  return inhabitants.map((value) => value / max);
}

function bounds(values: readonly number[]): { min: number; max: number } {
  let min = Number.POSITIVE_INFINITY;
  let max = Number.NEGATIVE_INFINITY;
  for (const value of values) {
    min = Math.min(min, value);
    max = Math.max(max, value);
  }
  return { min, max };
}

/**
 * Inverted min-max scaling: the cheapest entry scores 1 and the most expensive
 * 0. When every value is identical all entries score 1.
 */
export function invertedMinMax(values: readonly number[]): number[] {
  if (values.length === 0) {
    return [];
  }
  const { min, max } = bounds(values);
  if (max === min) {
    return values.map(() => 1);
  }
  return values.map((value) => 1 - (value - min) / (max - min));
}

export function costScores(costs: readonly number[]): number[] {
  return invertedMinMax(costs);
}

/** Closer buildings score higher, with the same edge cases as {@link costScores}. */
export function distanceScores(distances: readonly number[]): number[] {
  return invertedMinMax(distances);
}

export function urgencyScore(
  buildingType: BuildingType,
  priority: Priority,
  table: readonly Readonly<UrgencyEntry>[] = DEFAULT_URGENCY_TABLE,
  fallback = DEFAULT_URGENCY,
): number {
  const entry = table.find((candidate) => candidate.buildingType === buildingType && candidate.priority === priority);
  return entry ? entry.score : fallback;
}

/**
 * Inhabitants reconnected per unit of cost, min-max scaled to [0, 1]. Reported
 * next to the ranking; it does not take part in the composite score. When every
 * ratio is equal the batch carries no signal and each building scores 0.5.
 */
export function efficiencyScores(inhabitants: readonly number[], costs: readonly number[]): number[] {
  if (inhabitants.length !== costs.length) {
    throw new RangeError(`expected as many costs as inhabitants (${inhabitants.length} != ${costs.length})`);
  }
  if (inhabitants.length === 0) {
    return [];
  }
  const ratios = inhabitants.map((count, index) => count / ((costs[index] ?? 0) + 1));
  const { min, max } = bounds(ratios);
  if (max === min) {
    return ratios.map(() => 0.5);
  }
  return ratios.map((ratio) => (ratio - min) / (max - min));
}
