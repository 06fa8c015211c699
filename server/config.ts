import * as fs from "node:fs";
import {
  CLASSIFIER_THRESHOLDS,
  mergeThresholds,
  type ClassifierThresholds,
  type ThresholdOverrides,
} from "../lib/run-classifier";

export interface ServerConfig {
  databaseUrl: string | undefined;
  port: number;
  apiKey: string | undefined;
  classifierConfigPath: string | undefined;
}

function parsePort(raw: string | undefined): number {
  const n = parseInt(raw ?? "", 10);
  return Number.isInteger(n) && n > 0 ? n : 5000;
}

export const config: Readonly<ServerConfig> = Object.freeze({
  databaseUrl: process.env.DATABASE_URL,
  port: parsePort(process.env.PORT),
  apiKey: process.env.API_KEY,
  classifierConfigPath: process.env.CLASSIFIER_CONFIG_PATH,
});

const THRESHOLD_GROUPS = Object.keys(CLASSIFIER_THRESHOLDS) as (keyof ClassifierThresholds)[];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validates a partial thresholds document. Unknown groups or keys and
 * non-numeric values are rejected rather than ignored.
 */
export function parseThresholdOverrides(doc: unknown): ThresholdOverrides {
  if (!isRecord(doc)) {
    throw new Error("classifier config: expected a JSON object");
  }
  const overrides: ThresholdOverrides = {};
  for (const [group, values] of Object.entries(doc)) {
    const groupKey = THRESHOLD_GROUPS.find((g) => g === group);
    if (!groupKey) {
      throw new Error(`classifier config: unknown group "${group}"`);
    }
    if (!isRecord(values)) {
      throw new Error(`classifier config: "${group}" must be an object`);
    }
    const known = Object.keys(CLASSIFIER_THRESHOLDS[groupKey]);
    const parsed: Record<string, number> = {};
    for (const [key, val] of Object.entries(values)) {
      if (!known.includes(key)) {
        throw new Error(`classifier config: unknown threshold "${group}.${key}"`);
      }
      if (typeof val !== "number" || !Number.isFinite(val)) {
        throw new Error(`classifier config: "${group}.${key}" must be a finite number`);
      }
      parsed[key] = val;
    }
    Object.assign(overrides, { [groupKey]: parsed });
  }
  return overrides;
}

export function loadClassifierThresholds(
  filePath: string | undefined = config.classifierConfigPath,
): Readonly<ClassifierThresholds> {
  if (!filePath) return CLASSIFIER_THRESHOLDS;
  const doc: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
  console.log(`[config] classifier thresholds loaded from ${filePath}`);
  return mergeThresholds(CLASSIFIER_THRESHOLDS, parseThresholdOverrides(doc));
}
