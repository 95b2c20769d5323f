import { readFile } from "node:fs/promises";
import { parse as parseYaml } from "yaml";
import { z } from "zod";

import { ConfigurationError } from "../errors.js";
import {
  BUILDING_TYPES,
  PRIORITIES,
  type BuildingType,
  type InfrastructureType,
  type Priority,
} from "../records/schemas.js";
import { readOptionalInt, readOptionalNumber } from "./env.js";

/** Tolerance applied when checking that weight sets sum to one. */
export const WEIGHT_SUM_TOLERANCE = 1e-6;

export interface ScoringWeights {
  population: number;
  cost: number;
  urgency: number;
  distance: number;
}

/** Coefficients of the phase planner's combined score (α, β, γ, δ). */
export interface CombinedScoreCoefficients {
  alpha: number;
  beta: number;
  gamma: number;
  delta: number;
}

export interface UrgencyEntry {
  buildingType: BuildingType;
  priority: Priority;
  score: number;
}

/** Subset of the configuration consumed by the ranking engine. */
export interface ScoringConfig {
  readonly scoringWeights: Readonly<ScoringWeights>;
  readonly urgencyTable: readonly Readonly<UrgencyEntry>[];
  /** Urgency used for (type, priority) pairs absent from the table. */
  readonly defaultUrgency: number;
}

/** Subset consumed by the infrastructure cost model. */
export interface CostModelConfig {
  readonly pricePerMetre: Readonly<Record<InfrastructureType, number>>;
  readonly hoursPerMetre: Readonly<Record<InfrastructureType, number>>;
  /** Pay for one eight-hour shift. */
  readonly dailyWage: number;
  readonly maxWorkersPerInfrastructure: number;
}

export interface PlanningConfig extends ScoringConfig, CostModelConfig {
  readonly totalBudget: number;
  /** Share of the remaining budget granted to each budget phase, in order. */
  readonly phaseBudgetFractions: readonly number[];
  readonly generatorAutonomyHours: number;
  readonly safetyMargin: number;
  readonly priorityWeights: Readonly<Record<BuildingType, number>>;
  readonly combinedScoreCoefficients: Readonly<CombinedScoreCoefficients>;
}

/** Urgency granted to (type, priority) pairs missing from the table. */
export const DEFAULT_URGENCY = 0.5;

export const DEFAULT_URGENCY_TABLE: readonly UrgencyEntry[] = [
  { buildingType: "hospital", priority: "high", score: 1.0 },
  { buildingType: "school", priority: "high", score: 1.0 },
  { buildingType: "residential", priority: "high", score: 0.75 },
  { buildingType: "commercial", priority: "medium", score: 0.55 },
  { buildingType: "residential", priority: "medium", score: 0.55 },
  { buildingType: "residential", priority: "low", score: 0.35 },
];

export const DEFAULT_SCORING_CONFIG: ScoringConfig = deepFreeze({
  scoringWeights: { population: 0.4, cost: 0.3, urgency: 0.2, distance: 0.1 },
  urgencyTable: DEFAULT_URGENCY_TABLE.map((entry) => ({ ...entry })),
  defaultUrgency: DEFAULT_URGENCY,
});

/** Every default except the total budget, which callers must always supply. */
export const DEFAULT_PLANNING_CONFIG: Omit<PlanningConfig, "totalBudget"> = deepFreeze({
  ...DEFAULT_SCORING_CONFIG,
  pricePerMetre: { aerial: 500, semi_aerial: 750, duct: 900 },
  hoursPerMetre: { aerial: 2, semi_aerial: 4, duct: 5 },
  dailyWage: 300,
  maxWorkersPerInfrastructure: 4,
  phaseBudgetFractions: [0.4, 0.2, 0.2, 0.2],
  generatorAutonomyHours: 20,
  safetyMargin: 0.8,
  priorityWeights: { hospital: 1.0, school: 0.75, residential: 0.5, commercial: 0.25 },
  combinedScoreCoefficients: { alpha: 0.4, beta: 0.3, gamma: 0.2, delta: 0.1 },
});

const nonNegative = z.number().finite().nonnegative();
const rateTable = z.record(z.string(), nonNegative);

const PlanningConfigInputSchema = z
  .object({
    totalBudget: z.number().finite(),
    phaseBudgetFractions: z.array(z.number().finite().positive().max(1)).min(1),
    generatorAutonomyHours: z.number().finite().positive(),
    safetyMargin: z.number().finite().positive().max(1),
    pricePerMetre: rateTable,
    hoursPerMetre: rateTable,
    dailyWage: nonNegative,
    maxWorkersPerInfrastructure: z.number().int().positive(),
    priorityWeights: z
      .object({ hospital: nonNegative, school: nonNegative, residential: nonNegative, commercial: nonNegative })
      .strict(),
    scoringWeights: z
      .object({ population: nonNegative, cost: nonNegative, urgency: nonNegative, distance: nonNegative })
      .strict(),
    combinedScoreCoefficients: z
      .object({ alpha: nonNegative, beta: nonNegative, gamma: nonNegative, delta: nonNegative })
      .strict(),
    urgencyTable: z.array(
      z
        .object({
          buildingType: z.enum(BUILDING_TYPES),
          priority: z.enum(PRIORITIES),
          score: z.number().finite().min(0).max(1),
        })
        .strict(),
    ),
    defaultUrgency: z.number().finite().min(0).max(1),
  })
  .strict();

/** Configuration accepted from callers, YAML documents or tests. */
export type PlanningConfigInput = Partial<z.input<typeof PlanningConfigInputSchema>>;

/**
 * Rejects weight sets that do not sum to one. Shared by the planner
 * configuration and the ranking engine so both fail before any scoring.
 */
export function assertScoringWeights(weights: ScoringWeights): void {
  const values = Object.values(weights);
  if (values.some((value) => !Number.isFinite(value) || value < 0)) {
    throw new ConfigurationError("scoring weights must be finite and non-negative", "E-CONFIG-WEIGHTS", { weights });
  }
  const sum = values.reduce((total, value) => total + value, 0);
  if (Math.abs(sum - 1) > WEIGHT_SUM_TOLERANCE) {
    throw new ConfigurationError(`scoring weights must sum to 1 (received ${sum})`, "E-CONFIG-WEIGHTS", { weights, sum });
  }
}

function resolveRateTable(table: Record<string, number>, name: string): Record<InfrastructureType, number> {
  const rate = (type: InfrastructureType): number => {
    const value = table[type];
    if (value === undefined) {
      throw new ConfigurationError(`${name} has no entry for infrastructure type '${type}'`, "E-CONFIG-MISSING-RATE", {
        table: name,
        type,
      });
    }
    return value;
  };
  return { aerial: rate("aerial"), semi_aerial: rate("semi_aerial"), duct: rate("duct") };
}

/** Scalars operators may override through the environment. */
function readEnvOverrides(env: NodeJS.ProcessEnv): PlanningConfigInput {
  const overrides: PlanningConfigInput = {};
  const totalBudget = readOptionalNumber("RECONNECT_TOTAL_BUDGET", undefined, env);
  if (totalBudget !== undefined) {
    overrides.totalBudget = totalBudget;
  }
  const autonomy = readOptionalNumber("RECONNECT_GENERATOR_AUTONOMY_HOURS", { min: 0 }, env);
  if (autonomy !== undefined) {
    overrides.generatorAutonomyHours = autonomy;
  }
  const margin = readOptionalNumber("RECONNECT_SAFETY_MARGIN", { min: 0, max: 1 }, env);
  if (margin !== undefined) {
    overrides.safetyMargin = margin;
  }
  const wage = readOptionalNumber("RECONNECT_DAILY_WAGE", { min: 0 }, env);
  if (wage !== undefined) {
    overrides.dailyWage = wage;
  }
  const workers = readOptionalInt("RECONNECT_MAX_WORKERS_PER_INFRA", { min: 1 }, env);
  if (workers !== undefined) {
    overrides.maxWorkersPerInfrastructure = workers;
  }
  return overrides;
}

export interface ResolvePlanningConfigOptions {
  /** Environment consulted for overrides. Pass `{}` to ignore the process environment. */
  readonly env?: NodeJS.ProcessEnv;
}

/**
 * Builds the immutable configuration shared by every component of a run.
 * Layers, last wins: defaults, caller input (top-level keys replace the
 * default value wholesale, tables included), environment overrides.
 */
export function resolvePlanningConfig(
  input: PlanningConfigInput = {},
  options: ResolvePlanningConfigOptions = {},
): PlanningConfig {
  const merged = {
    ...DEFAULT_PLANNING_CONFIG,
    totalBudget: Number.NaN,
    ...input,
    ...readEnvOverrides(options.env ?? process.env),
  };
  if (!Number.isFinite(merged.totalBudget) || merged.totalBudget <= 0) {
    throw new ConfigurationError("total budget must be a positive amount", "E-CONFIG-BUDGET", {
      totalBudget: input.totalBudget ?? null,
    });
  }

  const parsed = PlanningConfigInputSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigurationError(`invalid planning configuration: ${issues.join("; ")}`, "E-CONFIG-INVALID", { issues });
  }
  const config = parsed.data;

  assertScoringWeights(config.scoringWeights);
  const fractionSum = config.phaseBudgetFractions.reduce((total, value) => total + value, 0);
  if (fractionSum > 1 + WEIGHT_SUM_TOLERANCE) {
    throw new ConfigurationError(`phase budget fractions must sum to at most 1 (received ${fractionSum})`, "E-CONFIG-PHASES", {
      phaseBudgetFractions: config.phaseBudgetFractions,
    });
  }

  return deepFreeze({
    ...config,
    pricePerMetre: resolveRateTable(config.pricePerMetre, "pricePerMetre"),
    hoursPerMetre: resolveRateTable(config.hoursPerMetre, "hoursPerMetre"),
  });
}

/** Parses a YAML configuration document and resolves it. */
export function parsePlanningConfigDocument(source: string, options: ResolvePlanningConfigOptions = {}): PlanningConfig {
  let document: unknown;
  try {
    document = parseYaml(source);
  } catch (error) {
    throw new ConfigurationError("configuration document is not valid YAML", "E-CONFIG-PARSE", {
      reason: error instanceof Error ? error.message : String(error),
    });
  }
  if (document === null || document === undefined) {
    return resolvePlanningConfig({}, options);
  }
  if (typeof document !== "object" || Array.isArray(document)) {
    throw new ConfigurationError("configuration document must be a mapping", "E-CONFIG-PARSE");
  }
  const shape = PlanningConfigInputSchema.partial().safeParse(document);
  if (!shape.success) {
    const issues = shape.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigurationError(`invalid planning configuration: ${issues.join("; ")}`, "E-CONFIG-INVALID", { issues });
  }
  return resolvePlanningConfig(shape.data, options);
}

export async function loadPlanningConfigFile(path: string, options: ResolvePlanningConfigOptions = {}): Promise<PlanningConfig> {
  const source = await readFile(path, "utf8");
  return parsePlanningConfigDocument(source, options);
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  const entries: unknown[] = Object.values(value);
  for (const entry of entries) {
    if (entry !== null && typeof entry === "object") {
      deepFreeze(entry);
    }
  }
  return Object.freeze(value);
}
