import {
  aggregateZoneTime,
  analyzeWindow,
  classifyQuadrant,
  computeTrend,
  countLoadCategories,
  meanEfficiency,
} from "../efficiency-analytics";
import type { ActivityMetrics, MetricRecord } from "../activity-types";

function record(hash: string, date: string, overrides: Partial<ActivityMetrics> = {}): MetricRecord {
  return {
    contentHash: hash,
    filename: `${hash}.json`,
    date,
    sessionId: 1,
    metrics: {
      efficiencyFactor: 1.0,
      decouplingPct: 3,
      avgCadenceSpm: 165,
      avgHeartRate: 148,
      trainingLoad: 100,
      totalTrainingEffect: 3.0,
      totalAnaerobicTrainingEffect: 1.0,
      heartRateRecoverySeries: [],
      ...overrides,
    },
  };
}

describe("meanEfficiency", () => {
  test("empty window → 0 flagged insufficient", () => {
    expect(meanEfficiency([])).toEqual({ value: 0, insufficientData: true });
  });

  test("mean of 1.0, 1.1, 1.3", () => {
    const m = meanEfficiency([
      record("a", "2024-03-01", { efficiencyFactor: 1.0 }),
      record("b", "2024-03-02", { efficiencyFactor: 1.1 }),
      record("c", "2024-03-03", { efficiencyFactor: 1.3 }),
    ]);
    expect(m.value).toBeCloseTo(1.13333, 4);
    expect(m.insufficientData).toBe(false);
  });
});

describe("computeTrend", () => {
  test("single activity → insufficient-data", () => {
    expect(computeTrend([record("a", "2024-03-01")])).toEqual({ slopePerDay: 0, direction: "insufficient-data" });
  });

  test("two activities on the same day → insufficient-data", () => {
    const t = computeTrend([
      record("a", "2024-03-01", { efficiencyFactor: 1.0 }),
      record("b", "2024-03-01", { efficiencyFactor: 1.4 }),
    ]);
    expect(t.direction).toBe("insufficient-data");
  });

  test("rising efficiency over three days → improving at 0.15/day", () => {
    const t = computeTrend([
      record("a", "2024-03-01", { efficiencyFactor: 1.0 }),
      record("b", "2024-03-02", { efficiencyFactor: 1.1 }),
      record("c", "2024-03-03", { efficiencyFactor: 1.3 }),
    ]);
    expect(t.slopePerDay).toBeCloseTo(0.15, 10);
    expect(t.direction).toBe("improving");
  });

  test("input order does not change the slope", () => {
    const t = computeTrend([
      record("c", "2024-03-03", { efficiencyFactor: 1.3 }),
      record("a", "2024-03-01", { efficiencyFactor: 1.0 }),
      record("b", "2024-03-02", { efficiencyFactor: 1.1 }),
    ]);
    expect(t.slopePerDay).toBeCloseTo(0.15, 10);
  });

  test("falling efficiency → declining", () => {
    const t = computeTrend([
      record("a", "2024-03-01", { efficiencyFactor: 1.3 }),
      record("b", "2024-03-02", { efficiencyFactor: 1.0 }),
    ]);
    expect(t.slopePerDay).toBeCloseTo(-0.3, 10);
    expect(t.direction).toBe("declining");
  });

  test("0.00005/day is inside the stable band", () => {
    const t = computeTrend([
      record("a", "2024-03-01", { efficiencyFactor: 1.0 }),
      record("b", "2024-03-02", { efficiencyFactor: 1.00005 }),
    ]);
    expect(t.direction).toBe("stable");
  });

  test("a 10% gain over 30 days → improving", () => {
    const t = computeTrend([
      record("a", "2024-03-01", { efficiencyFactor: 1.0 }),
      record("b", "2024-03-31", { efficiencyFactor: 1.1 }),
    ]);
    expect(t.slopePerDay).toBeCloseTo(0.0033333, 6);
    expect(t.direction).toBe("improving");
  });

  test("runs a month apart → improving at ~0.00498/day", () => {
    const t = computeTrend([
      record("a", "2024-01-01", { efficiencyFactor: 1.0 }),
      record("b", "2024-02-01", { efficiencyFactor: 1.1 }),
      record("c", "2024-03-01", { efficiencyFactor: 1.3 }),
    ]);
    expect(t.slopePerDay).toBeCloseTo(0.0049796, 6);
    expect(t.direction).toBe("improving");
  });

  test("a month-long 10% loss → declining", () => {
    const t = computeTrend([
      record("a", "2024-03-01", { efficiencyFactor: 1.1 }),
      record("b", "2024-03-31", { efficiencyFactor: 1.0 }),
    ]);
    expect(t.direction).toBe("declining");
  });
});

describe("classifyQuadrant", () => {
  test("exactly at the mean with 5% decoupling → RACE_READY", () => {
    expect(classifyQuadrant({ efficiencyFactor: 1.2, decouplingPct: 5 }, 1.2)).toBe("RACE_READY");
  });

  test("at the mean with 5.01% decoupling → EXPENSIVE_SPEED", () => {
    expect(classifyQuadrant({ efficiencyFactor: 1.2, decouplingPct: 5.01 }, 1.2)).toBe("EXPENSIVE_SPEED");
  });

  test("below the mean and stable → BASE_MAINTENANCE", () => {
    expect(classifyQuadrant({ efficiencyFactor: 1.1, decouplingPct: 2 }, 1.2)).toBe("BASE_MAINTENANCE");
  });

  test("below the mean and drifted → STRUGGLING", () => {
    expect(classifyQuadrant({ efficiencyFactor: 1.1, decouplingPct: 7 }, 1.2)).toBe("STRUGGLING");
  });
});

describe("aggregateZoneTime", () => {
  test("sums zones and ignores activities without zone data", () => {
    expect(
      aggregateZoneTime([
        record("a", "2024-03-01", { zoneSeconds: [10, 20, 30, 40, 50] }),
        record("b", "2024-03-02", { zoneSeconds: [1, 2, 3, 4, 5] }),
        record("c", "2024-03-03"),
      ]),
    ).toEqual([11, 22, 33, 44, 55]);
  });

  test("no zone data anywhere → null", () => {
    expect(aggregateZoneTime([record("a", "2024-03-01")])).toBeNull();
  });
});

describe("countLoadCategories", () => {
  test("counts each load band", () => {
    const counts = countLoadCategories(
      [50, 75, 149.9, 150, 300].map((load, i) => record(`r${i}`, "2024-03-01", { trainingLoad: load })),
    );
    expect(counts).toEqual({ RECOVERY: 1, BASE: 2, OVERLOAD: 1, OVERREACHING: 1 });
  });
});

describe("analyzeWindow", () => {
  test("three-run window: quadrants, trend and load mix", () => {
    const result = analyzeWindow([
      record("a", "2024-03-01", { efficiencyFactor: 1.0, decouplingPct: 3, zoneSeconds: [10, 75, 5, 5, 5] }),
      record("b", "2024-03-02", { efficiencyFactor: 1.1, decouplingPct: 7 }),
      record("c", "2024-03-03", { efficiencyFactor: 1.3, decouplingPct: 2, zoneSeconds: [10, 75, 5, 5, 5] }),
    ]);

    expect(result.activityCount).toBe(3);
    expect(result.meanEfficiency.value).toBeCloseTo(1.13333, 4);
    expect(result.quadrants.map((q) => [q.contentHash, q.quadrant])).toEqual([
      ["a", "BASE_MAINTENANCE"],
      ["b", "STRUGGLING"],
      ["c", "RACE_READY"],
    ]);
    expect(result.trend.direction).toBe("improving");
    expect(result.loadMix).toBe("ZONE_2_BASE");
    expect(result.loadCategories).toEqual({ RECOVERY: 0, BASE: 3, OVERLOAD: 0, OVERREACHING: 0 });
  });

  test("empty window", () => {
    expect(analyzeWindow([])).toEqual({
      activityCount: 0,
      meanEfficiency: { value: 0, insufficientData: true },
      trend: { slopePerDay: 0, direction: "insufficient-data" },
      quadrants: [],
      loadMix: null,
      loadCategories: { RECOVERY: 0, BASE: 0, OVERLOAD: 0, OVERREACHING: 0 },
    });
  });

  test("all-zero zone time leaves the load mix unset", () => {
    const result = analyzeWindow([record("a", "2024-03-01", { zoneSeconds: [0, 0, 0, 0, 0] })]);
    expect(result.loadMix).toBeNull();
  });
});
