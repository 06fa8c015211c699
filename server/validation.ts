import type { ActivityMetrics, SplitMetrics, ZoneSeconds } from "../lib/activity-types";

const DATE_REGEX = /^\d{4}-\d{2}-\d{2}$/;
const HASH_REGEX = /^[0-9a-f]{64}$/;

export type ParseResult<T> = { ok: true; value: T } | { ok: false; errors: string[] };

export function isValidDateString(date: unknown): date is string {
  if (typeof date !== 'string') return false;
  if (!DATE_REGEX.test(date)) return false;
  const d = new Date(date + 'T00:00:00Z');
  return !isNaN(d.getTime()) && d.toISOString().slice(0, 10) === date;
}

export function isContentHash(value: unknown): value is string {
  return typeof value === 'string' && HASH_REGEX.test(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

interface Range {
  min?: number;
  max?: number;
}

function readNumber(obj: Record<string, unknown>, key: string, errors: string[], range: Range = {}, path = key): number {
  const val = obj[key];
  if (typeof val !== 'number' || !Number.isFinite(val)) {
    errors.push(`${path}: expected a finite number, got ${JSON.stringify(val)}`);
    return NaN;
  }
  if ((range.min != null && val < range.min) || (range.max != null && val > range.max)) {
    errors.push(`${path}: out of range [${range.min ?? '-inf'}-${range.max ?? 'inf'}], got ${val}`);
  }
  return val;
}

function readZoneSeconds(val: unknown, errors: string[]): ZoneSeconds | undefined {
  if (val == null) return undefined;
  if (!Array.isArray(val) || val.length !== 5) {
    errors.push(`zoneSeconds: expected 5 zone durations`);
    return undefined;
  }
  const zones: ZoneSeconds = [0, 0, 0, 0, 0];
  val.forEach((s: unknown, i: number) => {
    if (typeof s !== 'number' || !Number.isFinite(s) || s < 0) {
      errors.push(`zoneSeconds[${i}]: expected a non-negative number, got ${JSON.stringify(s)}`);
    } else {
      zones[i] = s;
    }
  });
  return zones;
}

function readSplits(val: unknown, errors: string[]): SplitMetrics[] | undefined {
  if (val == null) return undefined;
  if (!Array.isArray(val)) {
    errors.push(`splits: expected an array`);
    return undefined;
  }
  const splits: SplitMetrics[] = [];
  val.forEach((s: unknown, i: number) => {
    if (!isRecord(s)) {
      errors.push(`splits[${i}]: expected an object`);
      return;
    }
    splits.push({
      cadenceSpm: readNumber(s, 'cadenceSpm', errors, { min: 0 }, `splits[${i}].cadenceSpm`),
      heartRate: readNumber(s, 'heartRate', errors, { min: 0, max: 250 }, `splits[${i}].heartRate`),
      gradePct: readNumber(s, 'gradePct', errors, {}, `splits[${i}].gradePct`),
    });
  });
  return splits;
}

function readRecoverySeries(val: unknown, errors: string[]): number[] {
  if (val == null) return [];
  if (!Array.isArray(val)) {
    errors.push(`heartRateRecoverySeries: expected an array`);
    return [];
  }
  const out: number[] = [];
  val.forEach((d: unknown, i: number) => {
    if (typeof d !== 'number' || !Number.isInteger(d)) {
      errors.push(`heartRateRecoverySeries[${i}]: expected an integer bpm drop, got ${JSON.stringify(d)}`);
    } else {
      out.push(d);
    }
  });
  return out;
}

export function parseActivityMetrics(value: unknown): ParseResult<ActivityMetrics> {
  if (!isRecord(value)) {
    return { ok: false, errors: ['metrics: expected an object'] };
  }
  const errors: string[] = [];
  const metrics: ActivityMetrics = {
    efficiencyFactor: readNumber(value, 'efficiencyFactor', errors),
    decouplingPct: readNumber(value, 'decouplingPct', errors),
    avgCadenceSpm: readNumber(value, 'avgCadenceSpm', errors, { min: 0 }),
    avgHeartRate: readNumber(value, 'avgHeartRate', errors, { min: 0, max: 250 }),
    trainingLoad: readNumber(value, 'trainingLoad', errors, { min: 0 }),
    totalTrainingEffect: readNumber(value, 'totalTrainingEffect', errors, { min: 0, max: 5 }),
    totalAnaerobicTrainingEffect: readNumber(value, 'totalAnaerobicTrainingEffect', errors, { min: 0, max: 5 }),
    heartRateRecoverySeries: readRecoverySeries(value.heartRateRecoverySeries, errors),
  };

  if (value.distanceMi != null) metrics.distanceMi = readNumber(value, 'distanceMi', errors, { min: 0 });
  if (value.pace != null) {
    if (typeof value.pace === 'string') metrics.pace = value.pace;
    else errors.push(`pace: expected a string, got ${JSON.stringify(value.pace)}`);
  }
  if (value.zone2FloorBpm != null) metrics.zone2FloorBpm = readNumber(value, 'zone2FloorBpm', errors, { min: 0, max: 250 });

  const zones = readZoneSeconds(value.zoneSeconds, errors);
  if (zones) metrics.zoneSeconds = zones;
  const splits = readSplits(value.splits, errors);
  if (splits) metrics.splits = splits;

  return errors.length === 0 ? { ok: true, value: metrics } : { ok: false, errors };
}
