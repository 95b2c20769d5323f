import { describe, it } from "mocha";
import { expect } from "chai";

import { DEFAULT_SCORING_CONFIG, type ScoringConfig } from "../src/config/planning.js";
import { ConfigurationError } from "../src/errors.js";
import type { BuildingRecord } from "../src/records/schemas.js";
import {
  cumulativeImpact,
  prioritizeBuildings,
  rankBuildings,
  scoreBuildings,
} from "../src/scoring/prioritization.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";

function building(overrides: Partial<BuildingRecord> & Pick<BuildingRecord, "id">): BuildingRecord {
  return {
    inhabitants: 10,
    building_type: "residential",
    priority: "medium",
    connected: false,
    cost: 100,
    distance: 10,
    ...overrides,
  };
}

const batch: BuildingRecord[] = [
  building({ id: "C", inhabitants: 0, building_type: "commercial", priority: "low", cost: 300, distance: 20 }),
  building({ id: "A", inhabitants: 100, building_type: "residential", priority: "high", cost: 100, distance: 10 }),
  building({ id: "B", inhabitants: 50, building_type: "hospital", priority: "high", cost: 200, distance: 30 }),
];

/** Deterministic generator so the property checks are reproducible. */
function sequence(seed: number): () => number {
  let state = seed;
  return () => {
    state = (state * 48_271) % 2_147_483_647;
    return state / 2_147_483_647;
  };
}

describe("scoring/prioritization", () => {
  it("computes every criterion and the weighted composite", () => {
    const scored = scoreBuildings(batch);
    const byId = new Map(scored.map((row) => [row.id, row]));

    const a = byId.get("A");
    expect(a).to.include({ populationScore: 1, costScore: 1, distanceScore: 1, urgencyScore: 0.75 });
    expect(a?.compositeScore).to.be.closeTo(0.95, 1e-12);

    const b = byId.get("B");
    expect(b).to.include({ populationScore: 0.5, costScore: 0.5, distanceScore: 0, urgencyScore: 1 });
    expect(b?.compositeScore).to.be.closeTo(0.55, 1e-12);

    const c = byId.get("C");
    expect(c).to.include({ populationScore: 0, costScore: 0, distanceScore: 0.5, urgencyScore: 0.5 });
    expect(c?.compositeScore).to.be.closeTo(0.15, 1e-12);
  });

  it("leaves the input records untouched", () => {
    const snapshot = JSON.stringify(batch);
    prioritizeBuildings(batch);
    expect(JSON.stringify(batch)).to.equal(snapshot);
  });

  it("ranks by composite score, highest first", () => {
    const ranked = rankBuildings(scoreBuildings(batch));

    expect(ranked.map((row) => [row.id, row.rank])).to.deep.equal([
      ["A", 1],
      ["B", 2],
      ["C", 3],
    ]);
  });

  it("breaks ties by ascending identifier", () => {
    const twins = [building({ id: "b2" }), building({ id: "b10" }), building({ id: "b1" })];

    const first = rankBuildings(scoreBuildings(twins)).map((row) => row.id);
    const second = rankBuildings(scoreBuildings([...twins].reverse())).map((row) => row.id);

    expect(first).to.deep.equal(["b1", "b10", "b2"]);
    expect(second).to.deep.equal(first);
  });

  it("keeps composite scores within [0, 1] for any weight set summing to one", () => {
    const next = sequence(42);
    for (let round = 0; round < 50; round += 1) {
      const raw = [next(), next(), next(), next()];
      const total = raw.reduce((sum, value) => sum + value, 0);
      const [population = 0, cost = 0, urgency = 0] = raw.map((value) => value / total);
      const config: ScoringConfig = {
        ...DEFAULT_SCORING_CONFIG,
        scoringWeights: { population, cost, urgency, distance: 1 - population - cost - urgency },
      };
      const buildings = Array.from({ length: 6 }, (_, index) =>
        building({
          id: `r${round}-${index}`,
          inhabitants: Math.floor(next() * 200),
          cost: next() * 10_000,
          distance: next() * 500,
          priority: index % 2 === 0 ? "high" : "low",
        }),
      );

      for (const row of scoreBuildings(buildings, config)) {
        expect(row.compositeScore).to.be.within(0, 1);
      }
    }
  });

  it("accumulates inhabitants and cost along the ranking", () => {
    const rows = cumulativeImpact(rankBuildings(scoreBuildings(batch)));

    expect(rows.map((row) => row.cumulativeInhabitants)).to.deep.equal([100, 150, 150]);
    expect(rows.map((row) => row.cumulativeCost)).to.deep.equal([100, 300, 600]);
    expect(rows.map((row) => row.buildingsReconnected)).to.deep.equal([1, 2, 3]);
    expect(rows[0]?.cumulativeInhabitantsPct).to.be.closeTo(200 / 3, 1e-9);
    expect(rows[2]?.cumulativeInhabitantsPct).to.equal(100);
    expect(rows[1]?.cumulativeCostPct).to.equal(50);
  });

  it("keeps cumulative inhabitants non-decreasing and ending at the total", () => {
    const next = sequence(7);
    const buildings = Array.from({ length: 25 }, (_, index) =>
      building({ id: `n${index}`, inhabitants: Math.floor(next() * 80), cost: next() * 5_000 }),
    );
    const rows = prioritizeBuildings(buildings);

    for (let index = 1; index < rows.length; index += 1) {
      expect(rows[index]?.cumulativeInhabitants).to.be.at.least(rows[index - 1]?.cumulativeInhabitants ?? 0);
    }
    const total = buildings.reduce((sum, entry) => sum + entry.inhabitants, 0);
    expect(rows[rows.length - 1]?.cumulativeInhabitants).to.equal(total);
  });

  it("reports zero percentages when the totals are zero", () => {
    const rows = prioritizeBuildings([building({ id: "z", inhabitants: 0, cost: 0 })]);

    expect(rows[0]).to.include({ cumulativeInhabitantsPct: 0, cumulativeCostPct: 0, buildingsReconnectedPct: 100 });
  });

  it("truncates to topN after computing the cumulative figures", () => {
    const rows = prioritizeBuildings(batch, DEFAULT_SCORING_CONFIG, { topN: 1 });

    expect(rows).to.have.length(1);
    expect(rows[0]?.id).to.equal("A");
    expect(rows[0]?.cumulativeInhabitantsPct).to.be.closeTo(200 / 3, 1e-9);
    expect(() => prioritizeBuildings(batch, DEFAULT_SCORING_CONFIG, { topN: -1 })).to.throw(RangeError);
  });

  it("refuses weights that do not sum to one before scoring", () => {
    const config: ScoringConfig = {
      ...DEFAULT_SCORING_CONFIG,
      scoringWeights: { population: 0.4, cost: 0.3, urgency: 0.2, distance: 0 },
    };

    expect(() => scoreBuildings(batch, config)).to.throw(ConfigurationError, /sum to 1/);
  });

  it("logs the outcome of the ranking", () => {
    const logger = new RecordingLogger();
    prioritizeBuildings(batch, DEFAULT_SCORING_CONFIG, { logger });

    expect(logger.entries).to.have.length(1);
    expect(logger.entries[0]?.message).to.equal("prioritization_completed");
    expect(logger.entries[0]?.payload).to.deep.include({ buildings: 3, top_building: "A" });
  });
});
