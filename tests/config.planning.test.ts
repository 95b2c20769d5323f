import { describe, it } from "mocha";
import { expect } from "chai";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import {
  assertScoringWeights,
  loadPlanningConfigFile,
  parsePlanningConfigDocument,
  resolvePlanningConfig,
} from "../src/config/planning.js";
import { ConfigurationError } from "../src/errors.js";

function captureError(fn: () => unknown): ConfigurationError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return error;
    }
    throw error;
  }
  throw new Error("expected a ConfigurationError");
}

describe("config/planning", () => {
  it("fills every default around the supplied budget", () => {
    const config = resolvePlanningConfig({ totalBudget: 100_000 }, { env: {} });

    expect(config.totalBudget).to.equal(100_000);
    expect(config.pricePerMetre).to.deep.equal({ aerial: 500, semi_aerial: 750, duct: 900 });
    expect(config.hoursPerMetre).to.deep.equal({ aerial: 2, semi_aerial: 4, duct: 5 });
    expect(config.dailyWage).to.equal(300);
    expect(config.maxWorkersPerInfrastructure).to.equal(4);
    expect(config.phaseBudgetFractions).to.deep.equal([0.4, 0.2, 0.2, 0.2]);
    expect(config.generatorAutonomyHours).to.equal(20);
    expect(config.safetyMargin).to.equal(0.8);
    expect(config.scoringWeights).to.deep.equal({ population: 0.4, cost: 0.3, urgency: 0.2, distance: 0.1 });
    expect(config.combinedScoreCoefficients).to.deep.equal({ alpha: 0.4, beta: 0.3, gamma: 0.2, delta: 0.1 });
    expect(config.priorityWeights).to.deep.equal({ hospital: 1, school: 0.75, residential: 0.5, commercial: 0.25 });
    expect(config.urgencyTable).to.have.length(6);
    expect(config.defaultUrgency).to.equal(0.5);
  });

  it("returns a deeply frozen value", () => {
    const config = resolvePlanningConfig({ totalBudget: 10 }, { env: {} });

    expect(Object.isFrozen(config)).to.equal(true);
    expect(Object.isFrozen(config.pricePerMetre)).to.equal(true);
    expect(Object.isFrozen(config.phaseBudgetFractions)).to.equal(true);
    expect(Object.isFrozen(config.urgencyTable[0])).to.equal(true);
  });

  it("requires a positive budget", () => {
    expect(captureError(() => resolvePlanningConfig({}, { env: {} })).code).to.equal("E-CONFIG-BUDGET");
    expect(captureError(() => resolvePlanningConfig({ totalBudget: 0 }, { env: {} })).code).to.equal("E-CONFIG-BUDGET");
    expect(captureError(() => resolvePlanningConfig({ totalBudget: -5 }, { env: {} })).code).to.equal("E-CONFIG-BUDGET");
  });

  it("rejects weights that do not sum to one", () => {
    const error = captureError(() =>
      resolvePlanningConfig(
        { totalBudget: 10, scoringWeights: { population: 0.5, cost: 0.3, urgency: 0.2, distance: 0.1 } },
        { env: {} },
      ),
    );
    expect(error.code).to.equal("E-CONFIG-WEIGHTS");
    expect(() => assertScoringWeights({ population: 0.25, cost: 0.25, urgency: 0.25, distance: 0.25 })).to.not.throw();
  });

  it("rejects negative coefficients", () => {
    const error = captureError(() =>
      resolvePlanningConfig(
        { totalBudget: 10, combinedScoreCoefficients: { alpha: -0.1, beta: 0.3, gamma: 0.2, delta: 0.1 } },
        { env: {} },
      ),
    );
    expect(error.code).to.equal("E-CONFIG-INVALID");
    expect(error.message).to.contain("combinedScoreCoefficients.alpha");
  });

  it("rejects a price table missing an infrastructure type", () => {
    const error = captureError(() =>
      resolvePlanningConfig({ totalBudget: 10, pricePerMetre: { aerial: 500, semi_aerial: 750 } }, { env: {} }),
    );
    expect(error.code).to.equal("E-CONFIG-MISSING-RATE");
    expect(error.details).to.deep.equal({ table: "pricePerMetre", type: "duct" });
  });

  it("rejects phase fractions summing above one", () => {
    const error = captureError(() =>
      resolvePlanningConfig({ totalBudget: 10, phaseBudgetFractions: [0.6, 0.5] }, { env: {} }),
    );
    expect(error.code).to.equal("E-CONFIG-PHASES");
  });

  it("applies environment overrides last", () => {
    const config = resolvePlanningConfig(
      { totalBudget: 10, safetyMargin: 0.5 },
      {
        env: {
          RECONNECT_TOTAL_BUDGET: "2500",
          RECONNECT_SAFETY_MARGIN: "0.9",
          RECONNECT_MAX_WORKERS_PER_INFRA: "6",
          RECONNECT_DAILY_WAGE: "not-a-number",
        },
      },
    );

    expect(config.totalBudget).to.equal(2500);
    expect(config.safetyMargin).to.equal(0.9);
    expect(config.maxWorkersPerInfrastructure).to.equal(6);
    expect(config.dailyWage).to.equal(300);
  });

  it("parses YAML documents", () => {
    const config = parsePlanningConfigDocument(
      ["totalBudget: 50000", "generatorAutonomyHours: 12", "phaseBudgetFractions: [0.5, 0.5]"].join("\n"),
      { env: {} },
    );

    expect(config.totalBudget).to.equal(50_000);
    expect(config.generatorAutonomyHours).to.equal(12);
    expect(config.phaseBudgetFractions).to.deep.equal([0.5, 0.5]);
  });

  it("rejects unknown keys and malformed documents", () => {
    expect(captureError(() => parsePlanningConfigDocument("totalBudget: 10\ntotal_budjet: 5", { env: {} })).code).to.equal(
      "E-CONFIG-INVALID",
    );
    expect(captureError(() => parsePlanningConfigDocument("- 1\n- 2", { env: {} })).code).to.equal("E-CONFIG-PARSE");
    expect(captureError(() => parsePlanningConfigDocument("totalBudget: [", { env: {} })).code).to.equal("E-CONFIG-PARSE");
  });

  it("loads a configuration file from disk", async () => {
    const directory = await mkdtemp(path.join(tmpdir(), "planning-config-"));
    const file = path.join(directory, "planning.yaml");
    try {
      await writeFile(file, "totalBudget: 75000\ndailyWage: 280\n", "utf8");
      const config = await loadPlanningConfigFile(file, { env: {} });
      expect(config.totalBudget).to.equal(75_000);
      expect(config.dailyWage).to.equal(280);
    } finally {
      await rm(directory, { recursive: true, force: true });
    }
  });
});
