import type { ActivityMetrics, MetricRecord, ZoneSeconds } from "./activity-types";
import { InvalidMetricInputError, createClassifier, type RunClassifier } from "./run-classifier";
import type { LoadCategoryKey, LoadMixKey, QuadrantKey } from "./verdict-taxonomy";

export const DECOUPLING_STABLE_MAX_PCT = 5;

// Slopes with a magnitude under this many EF units per day read as flat.
export const TREND_STABLE_EPSILON_PER_DAY = 1e-4;

const MS_PER_DAY = 86_400_000;

const defaultClassifier = createClassifier();

export type TrendDirection = "improving" | "declining" | "stable" | "insufficient-data";

export interface TrendResult {
  slopePerDay: number;
  direction: TrendDirection;
}

export interface MeanEfficiency {
  value: number;
  insufficientData: boolean;
}

type EfficiencyPoint = Pick<MetricRecord, "date"> & {
  metrics: Pick<ActivityMetrics, "efficiencyFactor">;
};

function efficiencyOf(metrics: Pick<ActivityMetrics, "efficiencyFactor">): number {
  const ef = metrics.efficiencyFactor;
  if (typeof ef !== "number" || !Number.isFinite(ef)) {
    throw new InvalidMetricInputError("efficiencyFactor", ef, "must be a finite number");
  }
  return ef;
}

function dayNumber(date: string): number {
  const ms = Date.parse(date + "T00:00:00Z");
  if (isNaN(ms)) {
    throw new InvalidMetricInputError("date", date, "must be a YYYY-MM-DD calendar date");
  }
  return ms / MS_PER_DAY;
}

/**
 * Arithmetic mean of efficiency factor. An empty window yields 0 with
 * `insufficientData` set; callers must check the flag before classifying
 * quadrants against it.
 */
export function meanEfficiency(activities: ReadonlyArray<{ metrics: Pick<ActivityMetrics, "efficiencyFactor"> }>): MeanEfficiency {
  if (activities.length === 0) return { value: 0, insufficientData: true };
  const sum = activities.reduce((acc, a) => acc + efficiencyOf(a.metrics), 0);
  return { value: sum / activities.length, insufficientData: false };
}

/**
 * Least-squares slope of efficiency against days elapsed since the earliest
 * activity. Input order does not matter.
 */
export function computeTrend(
  activities: ReadonlyArray<EfficiencyPoint>,
  epsilonPerDay: number = TREND_STABLE_EPSILON_PER_DAY,
): TrendResult {
  const points = activities.map((a) => ({ day: dayNumber(a.date), ef: efficiencyOf(a.metrics) }));
  const distinctDays = new Set(points.map((p) => p.day));
  if (distinctDays.size < 2) {
    return { slopePerDay: 0, direction: "insufficient-data" };
  }

  const origin = Math.min(...points.map((p) => p.day));
  const xs = points.map((p) => p.day - origin);
  const ys = points.map((p) => p.ef);
  const n = points.length;
  const xMean = xs.reduce((a, b) => a + b, 0) / n;
  const yMean = ys.reduce((a, b) => a + b, 0) / n;

  let num = 0;
  let den = 0;
  for (let i = 0; i < n; i++) {
    num += (xs[i] - xMean) * (ys[i] - yMean);
    den += (xs[i] - xMean) ** 2;
  }
  const slopePerDay = num / den;

  let direction: TrendDirection = "stable";
  if (Math.abs(slopePerDay) >= epsilonPerDay) {
    direction = slopePerDay > 0 ? "improving" : "declining";
  }

  return { slopePerDay, direction };
}

export function classifyQuadrant(
  activity: Pick<ActivityMetrics, "efficiencyFactor" | "decouplingPct">,
  populationMeanEfficiency: number,
): QuadrantKey {
  const ef = efficiencyOf(activity);
  const decoupling = activity.decouplingPct;
  if (typeof decoupling !== "number" || !Number.isFinite(decoupling)) {
    throw new InvalidMetricInputError("decouplingPct", decoupling, "must be a finite number");
  }

  const fast = ef >= populationMeanEfficiency;
  const stable = decoupling <= DECOUPLING_STABLE_MAX_PCT;

  if (fast && stable) return "RACE_READY";
  if (fast) return "EXPENSIVE_SPEED";
  if (stable) return "BASE_MAINTENANCE";
  return "STRUGGLING";
}

/** Sums zone time across a window. Null when no activity carries zone data. */
export function aggregateZoneTime(
  activities: ReadonlyArray<{ metrics: Pick<ActivityMetrics, "zoneSeconds"> }>,
): ZoneSeconds | null {
  const total: ZoneSeconds = [0, 0, 0, 0, 0];
  let seen = false;
  for (const a of activities) {
    const zones = a.metrics.zoneSeconds;
    if (!zones) continue;
    seen = true;
    for (let i = 0; i < 5; i++) total[i] += zones[i];
  }
  return seen ? total : null;
}

export function countLoadCategories(
  activities: ReadonlyArray<{ metrics: Pick<ActivityMetrics, "trainingLoad"> }>,
  classifier: RunClassifier = defaultClassifier,
): Record<LoadCategoryKey, number> {
  const counts: Record<LoadCategoryKey, number> = { RECOVERY: 0, BASE: 0, OVERLOAD: 0, OVERREACHING: 0 };
  for (const a of activities) {
    counts[classifier.classifyLoad(a.metrics.trainingLoad)]++;
  }
  return counts;
}

export interface QuadrantPoint {
  contentHash: string;
  date: string;
  efficiencyFactor: number;
  decouplingPct: number;
  quadrant: QuadrantKey;
}

export interface WindowAnalytics {
  activityCount: number;
  meanEfficiency: MeanEfficiency;
  trend: TrendResult;
  /** Empty when the mean is flagged insufficient. */
  quadrants: QuadrantPoint[];
  loadMix: LoadMixKey | null;
  loadCategories: Record<LoadCategoryKey, number>;
}

export function analyzeWindow(
  activities: ReadonlyArray<MetricRecord>,
  classifier: RunClassifier = defaultClassifier,
): WindowAnalytics {
  const mean = meanEfficiency(activities);
  const quadrants: QuadrantPoint[] = mean.insufficientData
    ? []
    : activities.map((a) => ({
        contentHash: a.contentHash,
        date: a.date,
        efficiencyFactor: a.metrics.efficiencyFactor,
        decouplingPct: a.metrics.decouplingPct,
        quadrant: classifyQuadrant(a.metrics, mean.value),
      }));

  const zoneTime = aggregateZoneTime(activities);

  return {
    activityCount: activities.length,
    meanEfficiency: mean,
    trend: computeTrend(activities),
    quadrants,
    loadMix: zoneTime !== null && zoneTime.some((s) => s > 0) ? classifier.classifyLoadMix(zoneTime) : null,
    loadCategories: countLoadCategories(activities, classifier),
  };
}
