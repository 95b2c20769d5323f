export * from "./errors.js";
export * from "./logger.js";
export * from "./config/env.js";
export * from "./config/planning.js";
export * from "./records/schemas.js";
export * from "./scoring/normalise.js";
export * from "./scoring/prioritization.js";
export * from "./scoring/report.js";
export * from "./infrastructure/costModel.js";
export * from "./planner/phasedBudget.js";
export * from "./network/analysis.js";
export * from "./planningRun.js";
