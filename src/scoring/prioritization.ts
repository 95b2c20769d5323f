import { assertScoringWeights, DEFAULT_SCORING_CONFIG, type ScoringConfig } from "../config/planning.js";
import { createSilentLogger, type StructuredLogger } from "../logger.js";
import type { BuildingRecord, BuildingType, Priority } from "../records/schemas.js";
import {
  costScores,
  distanceScores,
  efficiencyScores,
  populationScores,
  urgencyScore,
} from "./normalise.js";

/** Building enriched with every per-criterion score. The input record is left untouched. */
export interface ScoredBuilding {
  id: string;
  inhabitants: number;
  buildingType: BuildingType;
  priority: Priority;
  connected: boolean;
  cost: number;
  distance: number;
  populationScore: number;
  costScore: number;
  urgencyScore: number;
  distanceScore: number;
  /** Inhabitants per unit of cost, scaled to [0, 1]. Informational only. */
  efficiencyScore: number;
  compositeScore: number;
}

export interface RankedBuilding extends ScoredBuilding {
  /** 1-based position in the ranking. */
  rank: number;
}

export interface PrioritizedBuilding extends RankedBuilding {
  cumulativeInhabitants: number;
  cumulativeCost: number;
  /** Percentages are expressed on a 0-100 scale. */
  cumulativeInhabitantsPct: number;
  cumulativeCostPct: number;
  buildingsReconnected: number;
  buildingsReconnectedPct: number;
}

export interface PrioritizeOptions {
  /** Number of rows returned. Cumulative figures are computed before truncation. */
  readonly topN?: number;
  readonly logger?: StructuredLogger;
}

function clampUnit(value: number): number {
  if (Number.isNaN(value)) {
    return 0;
  }
  return Math.min(1, Math.max(0, value));
}

/**
 * Computes the per-criterion scores of every building and their weighted sum.
 * Normalisation is relative to the batch, so scores are only comparable within
 * one call.
 */
export function scoreBuildings(
  buildings: readonly BuildingRecord[],
  config: ScoringConfig = DEFAULT_SCORING_CONFIG,
): ScoredBuilding[] {
  const weights = config.scoringWeights;
  assertScoringWeights(weights);

  const inhabitants = buildings.map((building) => building.inhabitants);
  const costs = buildings.map((building) => building.cost);
  const population = populationScores(inhabitants);
  const cost = costScores(costs);
  const distance = distanceScores(buildings.map((building) => building.distance));
  const efficiency = efficiencyScores(inhabitants, costs);

  return buildings.map((building, index) => {
    const scores = {
      populationScore: population[index] ?? 0,
      costScore: cost[index] ?? 0,
      urgencyScore: urgencyScore(building.building_type, building.priority, config.urgencyTable, config.defaultUrgency),
      distanceScore: distance[index] ?? 0,
    };
    const composite =
      weights.population * scores.populationScore +
      weights.cost * scores.costScore +
      weights.urgency * scores.urgencyScore +
      weights.distance * scores.distanceScore;
    return {
      id: building.id,
      inhabitants: building.inhabitants,
      buildingType: building.building_type,
      priority: building.priority,
      connected: building.connected,
      cost: building.cost,
      distance: building.distance,
      ...scores,
      efficiencyScore: efficiency[index] ?? 0,
      compositeScore: clampUnit(composite),
    };
  });
}

/** Orders by composite score (highest first); ties fall back to the identifier. */
export function compareScored(left: ScoredBuilding, right: ScoredBuilding): number {
  if (left.compositeScore !== right.compositeScore) {
    return right.compositeScore - left.compositeScore;
  }
  return left.id < right.id ? -1 : left.id > right.id ? 1 : 0;
}

export function rankBuildings(scored: readonly ScoredBuilding[]): RankedBuilding[] {
  return [...scored].sort(compareScored).map((building, index) => ({ ...building, rank: index + 1 }));
}

function percentage(part: number, total: number): number {
  return total > 0 ? (part / total) * 100 : 0;
}

/** Running totals following the ranking order. */
export function cumulativeImpact(ranked: readonly RankedBuilding[]): PrioritizedBuilding[] {
  const totalInhabitants = ranked.reduce((sum, building) => sum + building.inhabitants, 0);
  const totalCost = ranked.reduce((sum, building) => sum + building.cost, 0);

  let inhabitants = 0;
  let cost = 0;
  return ranked.map((building, index) => {
    inhabitants += building.inhabitants;
    cost += building.cost;
    return {
      ...building,
      cumulativeInhabitants: inhabitants,
      cumulativeCost: cost,
      cumulativeInhabitantsPct: percentage(inhabitants, totalInhabitants),
      cumulativeCostPct: percentage(cost, totalCost),
      buildingsReconnected: index + 1,
      buildingsReconnectedPct: percentage(index + 1, ranked.length),
    };
  });
}

/** Scores, ranks and accumulates a batch of buildings. */
export function prioritizeBuildings(
  buildings: readonly BuildingRecord[],
  config: ScoringConfig = DEFAULT_SCORING_CONFIG,
  options: PrioritizeOptions = {},
): PrioritizedBuilding[] {
  const logger = options.logger ?? createSilentLogger();
  const rows = cumulativeImpact(rankBuildings(scoreBuildings(buildings, config)));

  const first = rows[0];
  logger.info("prioritization_completed", {
    buildings: rows.length,
    top_building: first ? first.id : null,
    top_score: first ? first.compositeScore : null,
  });

  if (options.topN === undefined) {
    return rows;
  }
  if (!Number.isInteger(options.topN) || options.topN < 0) {
    throw new RangeError(`topN must be a non-negative integer (received ${options.topN})`);
  }
  return rows.slice(0, options.topN);
}
