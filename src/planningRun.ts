import {
  resolvePlanningConfig,
  type PlanningConfig,
  type PlanningConfigInput,
  type ResolvePlanningConfigOptions,
} from "./config/planning.js";
import { RecordValidationError } from "./errors.js";
import { createSilentLogger, type StructuredLogger } from "./logger.js";
import { analyseNetwork, buildNetworkGraph, type AnalyseNetworkOptions, type GraphMetricsReport } from "./network/analysis.js";
import { planPhases, type PhasedPlan } from "./planner/phasedBudget.js";
import {
  parseBuildingRecord,
  parseBuildingSiteRecord,
  parseInfrastructureRecord,
  parseNetworkPointRecord,
  parseSegmentRecord,
  parseSubstationRecord,
  partitionRecords,
  type InfrastructureRecord,
} from "./records/schemas.js";
import { buildPriorityReport, type PriorityReport } from "./scoring/report.js";
import { prioritizeBuildings, type PrioritizedBuilding } from "./scoring/prioritization.js";

/** Raw rows handed over by the loading layer; every row is validated here. */
export interface PlanningRunInput {
  readonly buildings: readonly unknown[];
  readonly infrastructures: readonly unknown[];
  readonly network?: {
    readonly segments: readonly unknown[];
    readonly networkPoints: readonly unknown[];
    readonly substations?: readonly unknown[];
    readonly buildingSites?: readonly unknown[];
  };
}

export interface PlanningRunOptions extends ResolvePlanningConfigOptions {
  /** Already resolved configuration. Takes precedence over {@link configInput}. */
  readonly config?: PlanningConfig;
  readonly configInput?: PlanningConfigInput;
  readonly logger?: StructuredLogger;
  /** Length of the returned ranking; the report always covers every building. */
  readonly topN?: number;
  readonly analysis?: Omit<AnalyseNetworkOptions, "logger">;
}

export interface PlanningRunResult {
  config: PlanningConfig;
  ranking: PrioritizedBuilding[];
  report: PriorityReport;
  plan: PhasedPlan;
  network: GraphMetricsReport | null;
  rejected: RecordValidationError[];
}

/**
 * Runs a full planning pass: configuration, record validation, ranking,
 * phased plan and (when network rows are supplied) topology metrics.
 * Configuration and graph construction errors are thrown; invalid rows are
 * returned in `rejected` and left out of the computation.
 */
export function runReconnectionPlanning(input: PlanningRunInput, options: PlanningRunOptions = {}): PlanningRunResult {
  const logger = options.logger ?? createSilentLogger();
  const config =
    options.config ?? resolvePlanningConfig(options.configInput, options.env ? { env: options.env } : {});
  logger.info("run_started", { buildings: input.buildings.length, infrastructures: input.infrastructures.length });

  const buildings = partitionRecords(input.buildings, parseBuildingRecord, "building");
  const known = new Set(buildings.accepted.map((building) => building.id));
  const infrastructures = partitionRecords(input.infrastructures, parseInfrastructureRecord, "infrastructure");
  const attached: InfrastructureRecord[] = [];
  const orphans: RecordValidationError[] = [];
  for (const infrastructure of infrastructures.accepted) {
    if (known.has(infrastructure.building_id)) {
      attached.push(infrastructure);
    } else {
      orphans.push(
        new RecordValidationError("infrastructure", infrastructure.id, [
          `building_id: unknown building '${infrastructure.building_id}'`,
        ]),
      );
    }
  }
  const rejected = [...buildings.rejected, ...infrastructures.rejected, ...orphans];

  let network: GraphMetricsReport | null = null;
  if (input.network) {
    const segments = partitionRecords(input.network.segments, parseSegmentRecord, "segment");
    const points = partitionRecords(input.network.networkPoints, parseNetworkPointRecord, "network_point");
    const substations = partitionRecords(input.network.substations ?? [], parseSubstationRecord, "substation");
    const sites = partitionRecords(input.network.buildingSites ?? [], parseBuildingSiteRecord, "building_site");
    for (const batch of [segments.rejected, points.rejected, substations.rejected, sites.rejected]) {
      for (const error of batch) {
        rejected.push(error);
      }
    }

    const built = buildNetworkGraph(
      {
        segments: segments.accepted,
        networkPoints: points.accepted,
        substations: substations.accepted,
        buildingSites: sites.accepted,
      },
      { logger },
    );
    network = analyseNetwork(built.graph, { ...options.analysis, logger });
  }

  if (rejected.length > 0) {
    logger.warn("records_rejected", {
      count: rejected.length,
      records: rejected.map((error) => ({ kind: error.recordKind, id: error.recordId, issues: error.issues })),
    });
  }

  const fullRanking = prioritizeBuildings(buildings.accepted, config, { logger });
  const report = buildPriorityReport(fullRanking);
  const ranking = options.topN === undefined ? fullRanking : fullRanking.slice(0, Math.max(0, options.topN));
  const plan = planPhases(buildings.accepted, attached, config, { logger });

  logger.info("run_completed", {
    ranked: fullRanking.length,
    phases: plan.phases.length,
    unplanned: plan.unplanned.length,
    rejected: rejected.length,
  });
  return { config, ranking, report, plan, network, rejected };
}
