import type { PrioritizedBuilding } from "./prioritization.js";

export const SCORE_COLUMNS = [
  "populationScore",
  "costScore",
  "urgencyScore",
  "distanceScore",
  "efficiencyScore",
  "compositeScore",
] as const;

export type ScoreColumn = (typeof SCORE_COLUMNS)[number];

export interface ScoreStatistics {
  mean: number;
  median: number;
  /** Sample standard deviation; 0 for fewer than two rows. */
  std: number;
  min: number;
  max: number;
}

export interface PriorityReportEntry {
  rank: number;
  id: string;
  buildingType: PrioritizedBuilding["buildingType"];
  priority: PrioritizedBuilding["priority"];
  inhabitants: number;
  cost: number;
  compositeScore: number;
}

export interface PriorityReport {
  totalBuildings: number;
  totalInhabitants: number;
  totalCost: number;
  top: PriorityReportEntry[];
  scoreStatistics: Record<ScoreColumn, ScoreStatistics> | null;
  /** Buildings in the leading share of the ranking and what reconnecting them covers. */
  topShare: {
    share: number;
    buildings: number;
    inhabitantsCovered: number;
    totalCost: number;
  };
}

export interface PriorityReportOptions {
  readonly topCount?: number;
  readonly topShare?: number;
}

export function describeScores(values: readonly number[]): ScoreStatistics {
  if (values.length === 0) {
    return { mean: 0, median: 0, std: 0, min: 0, max: 0 };
  }
  const sorted = [...values].sort((a, b) => a - b);
  const mean = sorted.reduce((sum, value) => sum + value, 0) / sorted.length;
  const middle = Math.floor(sorted.length / 2);
  const median =
    sorted.length % 2 === 0 ? ((sorted[middle - 1] ?? 0) + (sorted[middle] ?? 0)) / 2 : (sorted[middle] ?? 0);
  const variance =
    sorted.length > 1
      ? sorted.reduce((sum, value) => sum + (value - mean) ** 2, 0) / (sorted.length - 1)
      : 0;
  return {
    mean,
    median,
    std: Math.sqrt(variance),
    min: sorted[0] ?? 0,
    max: sorted[sorted.length - 1] ?? 0,
  };
}

/**
 * Summarises a full ranking. Expects rows in rank order, as returned by
 * `prioritizeBuildings` without `topN`.
 */
export function buildPriorityReport(
  rows: readonly PrioritizedBuilding[],
  options: PriorityReportOptions = {},
): PriorityReport {
  const topCount = options.topCount ?? 10;
  const share = options.topShare ?? 0.2;

  const column = (name: ScoreColumn): ScoreStatistics => describeScores(rows.map((row) => row[name]));
  const statistics: Record<ScoreColumn, ScoreStatistics> | null =
    rows.length === 0
      ? null
      : {
          populationScore: column("populationScore"),
          costScore: column("costScore"),
          urgencyScore: column("urgencyScore"),
          distanceScore: column("distanceScore"),
          efficiencyScore: column("efficiencyScore"),
          compositeScore: column("compositeScore"),
        };

  const leading = rows.slice(0, Math.floor(rows.length * share));

  return {
    totalBuildings: rows.length,
    totalInhabitants: rows.reduce((sum, row) => sum + row.inhabitants, 0),
    totalCost: rows.reduce((sum, row) => sum + row.cost, 0),
    top: rows.slice(0, topCount).map((row) => ({
      rank: row.rank,
      id: row.id,
      buildingType: row.buildingType,
      priority: row.priority,
      inhabitants: row.inhabitants,
      cost: row.cost,
      compositeScore: row.compositeScore,
    })),
    scoreStatistics: statistics,
    topShare: {
      share,
      buildings: leading.length,
      inhabitantsCovered: leading.reduce((sum, row) => sum + row.inhabitants, 0),
      totalCost: leading.reduce((sum, row) => sum + row.cost, 0),
    },
  };
}

