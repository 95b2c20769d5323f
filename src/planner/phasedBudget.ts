import type { PlanningConfig } from "../config/planning.js";
import type { PlanWarning } from "../errors.js";
import { aggregateBuildingRepair, requiresRepair, type BuildingRepair } from "../infrastructure/costModel.js";
import { createSilentLogger, type StructuredLogger } from "../logger.js";
import type { BuildingRecord, BuildingType, InfrastructureRecord } from "../records/schemas.js";

/** Stands in for `1 / 0` in the combined score. */
export const ZERO_DENOMINATOR_RECIPROCAL = 1e6;

/** Building fields the planner reads. */
export type PlannedBuilding = Pick<BuildingRecord, "id" | "building_type" | "connected">;

export type PlannerState =
  | { kind: "init" }
  | { kind: "critical_phase" }
  | { kind: "budget_phase"; index: number }
  | { kind: "done" };

/** Aggregate of one phase. Phase 0 is reserved for hospitals. */
export interface PlanPhase {
  index: number;
  kind: "critical" | "budget";
  buildingIds: string[];
  infrastructureIds: string[];
  cost: number;
  durationHours: number;
  /** Slowest job of the phase when every line gets a full crew. */
  minElapsedHours: number;
  workerCost: number;
  /** Budget granted when the phase opened; `null` for the critical phase. */
  budgetAllotment: number | null;
  remainingBudgetAfter: number;
  warnings: PlanWarning[];
}

export interface PhasedPlan {
  phases: PlanPhase[];
  /** Buildings still requiring repair once the phases ran out, in id order. */
  unplanned: string[];
  warnings: PlanWarning[];
  totalCost: number;
  remainingBudget: number;
}

export interface PlannerOptions {
  readonly logger?: StructuredLogger;
}

export interface CombinedScore {
  buildingId: string;
  score: number;
}

function reciprocal(value: number): number {
  return value > 0 ? 1 / value : ZERO_DENOMINATOR_RECIPROCAL;
}

function byId(left: string, right: string): number {
  return left < right ? -1 : left > right ? 1 : 0;
}

/**
 * `α·priority + β/difficulty + γ/cost + δ/duration`, each reciprocal guarded
 * by {@link ZERO_DENOMINATOR_RECIPROCAL}. A building's score depends on its
 * own figures only. Returned highest first, ties by id.
 */
export function combinedScores(
  candidates: readonly { repair: BuildingRepair; buildingType: BuildingType }[],
  config: Pick<PlanningConfig, "combinedScoreCoefficients" | "priorityWeights">,
): CombinedScore[] {
  const { alpha, beta, gamma, delta } = config.combinedScoreCoefficients;

  return candidates
    .map(({ repair, buildingType }) => ({
      buildingId: repair.buildingId,
      score:
        alpha * config.priorityWeights[buildingType] +
        beta * reciprocal(repair.difficulty) +
        gamma * reciprocal(repair.cost) +
        delta * reciprocal(repair.durationHours),
    }))
    .sort((left, right) => right.score - left.score || byId(left.buildingId, right.buildingId));
}

interface Candidate {
  building: PlannedBuilding;
  repair: BuildingRepair;
}

/**
 * Splits the buildings that need work into a critical hospital phase followed
 * by budget phases. Each phase depends on the budget left by the previous one,
 * so phases are produced strictly in order by a single {@link plan} call.
 */
export class PhasedBudgetPlanner {
  private readonly logger: StructuredLogger;
  private state: PlannerState = { kind: "init" };
  private remainingBudget: number;

  constructor(
    private readonly config: PlanningConfig,
    options: PlannerOptions = {},
  ) {
    this.logger = options.logger ?? createSilentLogger();
    this.remainingBudget = config.totalBudget;
  }

  /** Current position in the state machine. */
  getState(): PlannerState {
    return this.state;
  }

  plan(buildings: readonly PlannedBuilding[], infrastructures: readonly InfrastructureRecord[]): PhasedPlan {
    if (this.state.kind !== "init") {
      throw new Error("a PhasedBudgetPlanner instance plans a single run; create a new one");
    }

    let remaining: Candidate[] = buildings
      .filter((building) => requiresRepair(building, infrastructures))
      .map((building) => ({ building, repair: aggregateBuildingRepair(building, infrastructures, this.config) }))
      .sort((left, right) => byId(left.building.id, right.building.id));

    this.logger.info("planner_started", {
      buildings_requiring_repair: remaining.length,
      total_budget: this.config.totalBudget,
    });

    const phases: PlanPhase[] = [];
    this.transition({ kind: "critical_phase" });
    const hospitals = remaining.filter((candidate) => candidate.building.building_type === "hospital");
    if (hospitals.length > 0) {
      phases.push(this.closeCriticalPhase(hospitals));
      remaining = remaining.filter((candidate) => candidate.building.building_type !== "hospital");
    }

    for (const [offset, fraction] of this.config.phaseBudgetFractions.entries()) {
      if (this.remainingBudget <= 0 || remaining.length === 0) {
        break;
      }
      const index = offset + 1;
      this.transition({ kind: "budget_phase", index });
      const allotment = fraction * this.remainingBudget;
      const selected = this.selectForBudgetPhase(remaining, allotment);
      phases.push(this.aggregatePhase(index, "budget", selected, allotment));
      const chosen = new Set(selected.map((candidate) => candidate.building.id));
      remaining = remaining.filter((candidate) => !chosen.has(candidate.building.id));
    }

    this.transition({ kind: "done" });
    const unplanned = remaining.map((candidate) => candidate.building.id);
    const warnings: PlanWarning[] = [];
    if (unplanned.length > 0) {
      const warning: PlanWarning = {
        code: "W-BUDGET-EXHAUSTED",
        message: `${unplanned.length} building(s) requiring repair could not be placed in a phase`,
        details: { unplanned, remainingBudget: this.remainingBudget },
      };
      warnings.push(warning);
      this.logger.warn("planner_buildings_unplanned", { count: unplanned.length, remaining_budget: this.remainingBudget });
    }

    const totalCost = phases.reduce((sum, phase) => sum + phase.cost, 0);
    this.logger.info("planner_completed", {
      phases: phases.length,
      unplanned: unplanned.length,
      total_cost: totalCost,
      remaining_budget: this.remainingBudget,
    });
    return { phases, unplanned, warnings, totalCost, remainingBudget: this.remainingBudget };
  }

  private transition(next: PlannerState): void {
    this.logger.info("planner_state_changed", { from: describeState(this.state), to: describeState(next) });
    this.state = next;
  }

  private closeCriticalPhase(hospitals: readonly Candidate[]): PlanPhase {
    const phase = this.aggregatePhase(0, "critical", hospitals, null);
    const threshold = this.config.generatorAutonomyHours * this.config.safetyMargin;
    if (phase.minElapsedHours > threshold) {
      const warning: PlanWarning = {
        code: "W-GENERATOR-AUTONOMY",
        message: `hospital repairs need at least ${phase.minElapsedHours} h, beyond the ${threshold} h generator threshold`,
        details: {
          minElapsedHours: phase.minElapsedHours,
          generatorAutonomyHours: this.config.generatorAutonomyHours,
          safetyMargin: this.config.safetyMargin,
          threshold,
        },
      };
      phase.warnings.push(warning);
      this.logger.warn("planner_generator_autonomy_exceeded", { min_elapsed_hours: phase.minElapsedHours, threshold });
    }
    return phase;
  }

  /**
   * Takes buildings in combined-score order until the accumulated cost reaches
   * the allotment. The building crossing the allotment stays in the phase.
   */
  private selectForBudgetPhase(remaining: readonly Candidate[], allotment: number): Candidate[] {
    const byBuilding = new Map(remaining.map((candidate) => [candidate.building.id, candidate]));
    const order = combinedScores(
      remaining.map((candidate) => ({ repair: candidate.repair, buildingType: candidate.building.building_type })),
      this.config,
    );

    const selected: Candidate[] = [];
    let accumulated = 0;
    for (const { buildingId } of order) {
      if (accumulated >= allotment) {
        break;
      }
      const candidate = byBuilding.get(buildingId);
      if (!candidate) {
        continue;
      }
      selected.push(candidate);
      accumulated += candidate.repair.cost;
    }
    return selected;
  }

  private aggregatePhase(
    index: number,
    kind: PlanPhase["kind"],
    members: readonly Candidate[],
    allotment: number | null,
  ): PlanPhase {
    const phase: PlanPhase = {
      index,
      kind,
      buildingIds: [],
      infrastructureIds: [],
      cost: 0,
      durationHours: 0,
      minElapsedHours: 0,
      workerCost: 0,
      budgetAllotment: allotment,
      remainingBudgetAfter: 0,
      warnings: [],
    };
    for (const { repair } of members) {
      phase.buildingIds.push(repair.buildingId);
      phase.infrastructureIds.push(...repair.infrastructureIds);
      phase.cost += repair.cost;
      phase.durationHours += repair.durationHours;
      phase.workerCost += repair.workerCost;
      phase.minElapsedHours = Math.max(phase.minElapsedHours, repair.minElapsedHours);
    }
    this.remainingBudget -= phase.cost;
    phase.remainingBudgetAfter = this.remainingBudget;

    this.logger.info("planner_phase_closed", {
      phase: index,
      kind,
      buildings: phase.buildingIds.length,
      infrastructures: phase.infrastructureIds.length,
      cost: phase.cost,
      budget_allotment: allotment,
      remaining_budget: this.remainingBudget,
    });
    return phase;
  }
}

function describeState(state: PlannerState): string {
  return state.kind === "budget_phase" ? `budget_phase(${state.index})` : state.kind;
}

/** Plans a single run with a fresh {@link PhasedBudgetPlanner}. */
export function planPhases(
  buildings: readonly PlannedBuilding[],
  infrastructures: readonly InfrastructureRecord[],
  config: PlanningConfig,
  options: PlannerOptions = {},
): PhasedPlan {
  return new PhasedBudgetPlanner(config, options).plan(buildings, infrastructures);
}
