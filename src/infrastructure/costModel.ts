import { DEFAULT_PLANNING_CONFIG, type CostModelConfig } from "../config/planning.js";
import type { InfrastructureRecord } from "../records/schemas.js";

/** Length of the shift paid by one daily wage. */
export const WORK_DAY_HOURS = 8;

/** Infrastructure fields the cost model reads. */
export type CostedInfrastructure = Pick<InfrastructureRecord, "type" | "length">;

export interface BuildingRepair {
  buildingId: string;
  /** Infrastructures marked `to_replace`, in input order. */
  infrastructureIds: string[];
  cost: number;
  /** Total labour, in worker-hours. */
  durationHours: number;
  workerCost: number;
  totalLength: number;
  /** Longest single job when every infrastructure gets a full crew. */
  minElapsedHours: number;
  /** Σ length / houses served; a line serving nobody counts its raw length. */
  difficulty: number;
}

export function infrastructurePrice(
  infrastructure: CostedInfrastructure,
  config: CostModelConfig = DEFAULT_PLANNING_CONFIG,
): number {
  return infrastructure.length * config.pricePerMetre[infrastructure.type];
}

/** Worker-hours needed to replace the line. */
export function infrastructureDurationHours(
  infrastructure: CostedInfrastructure,
  config: CostModelConfig = DEFAULT_PLANNING_CONFIG,
): number {
  return infrastructure.length * config.hoursPerMetre[infrastructure.type];
}

export function infrastructureWorkerCost(
  infrastructure: CostedInfrastructure,
  config: CostModelConfig = DEFAULT_PLANNING_CONFIG,
): number {
  return (infrastructureDurationHours(infrastructure, config) / WORK_DAY_HOURS) * config.dailyWage;
}

/**
 * Wall-clock hours for a crew of `workers`. The crew is clamped to
 * `[1, maxWorkersPerInfrastructure]`: extra workers cannot share one line.
 */
export function elapsedHours(
  infrastructure: CostedInfrastructure,
  workers: number,
  config: CostModelConfig = DEFAULT_PLANNING_CONFIG,
): number {
  const crew = Math.min(config.maxWorkersPerInfrastructure, Math.max(1, Math.floor(workers)));
  return infrastructureDurationHours(infrastructure, config) / crew;
}

/**
 * Smallest crew finishing within `targetHours`. Falls back to the maximum crew
 * when the target cannot be met or is not positive.
 */
export function requiredWorkersForTarget(
  infrastructure: CostedInfrastructure,
  targetHours: number,
  config: CostModelConfig = DEFAULT_PLANNING_CONFIG,
): number {
  const max = config.maxWorkersPerInfrastructure;
  if (!(targetHours > 0)) {
    return max;
  }
  const needed = Math.ceil(infrastructureDurationHours(infrastructure, config) / targetHours);
  return Math.min(max, Math.max(1, needed));
}

function infrastructuresOf<T extends Pick<InfrastructureRecord, "building_id">>(
  buildingId: string,
  infrastructures: readonly T[],
): T[] {
  return infrastructures.filter((infrastructure) => infrastructure.building_id === buildingId);
}

/** A building needs work when it is disconnected or one of its lines must be replaced. */
export function requiresRepair(
  building: { id: string; connected: boolean },
  infrastructures: readonly Pick<InfrastructureRecord, "building_id" | "state">[],
): boolean {
  if (!building.connected) {
    return true;
  }
  return infrastructuresOf(building.id, infrastructures).some((infrastructure) => infrastructure.state === "to_replace");
}

export function aggregateBuildingRepair(
  building: { id: string },
  infrastructures: readonly InfrastructureRecord[],
  config: CostModelConfig = DEFAULT_PLANNING_CONFIG,
): BuildingRepair {
  const repair: BuildingRepair = {
    buildingId: building.id,
    infrastructureIds: [],
    cost: 0,
    durationHours: 0,
    workerCost: 0,
    totalLength: 0,
    minElapsedHours: 0,
    difficulty: 0,
  };

  for (const infrastructure of infrastructuresOf(building.id, infrastructures)) {
    if (infrastructure.state !== "to_replace") {
      continue;
    }
    repair.infrastructureIds.push(infrastructure.id);
    repair.cost += infrastructurePrice(infrastructure, config);
    repair.durationHours += infrastructureDurationHours(infrastructure, config);
    repair.workerCost += infrastructureWorkerCost(infrastructure, config);
    repair.totalLength += infrastructure.length;
    repair.minElapsedHours = Math.max(
      repair.minElapsedHours,
      elapsedHours(infrastructure, config.maxWorkersPerInfrastructure, config),
    );
    repair.difficulty +=
      infrastructure.houses_served > 0 ? infrastructure.length / infrastructure.houses_served : infrastructure.length;
  }

  return repair;
}
