import * as path from "node:path";
import type { ActivityMetrics } from "../lib/activity-types";
import { SUPPORTED_SPORTS } from "../lib/verdict-taxonomy";
import { isValidDateString, parseActivityMetrics } from "./validation";

export type ExtractionResult =
  | { kind: "ok"; filename: string; date: string; metrics: ActivityMetrics }
  | { kind: "not-applicable"; reason: string };

/** Malformed or unsupported activity file. */
export class ExtractionError extends Error {
  readonly filename: string;

  constructor(filename: string, message: string) {
    super(`${filename}: ${message}`);
    this.name = "ExtractionError";
    this.filename = filename;
  }
}

/**
 * Turns one raw activity file into a metric mapping. Non-running activities
 * come back as "not-applicable"; anything unreadable throws.
 */
export interface MetricsExtractor {
  accepts(filename: string): boolean;
  extract(filename: string, bytes: Buffer): Promise<ExtractionResult>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Reads the JSON summaries an upstream FIT analyzer writes next to each
 * activity: `{ sport, date, metrics: { ... } }`.
 */
export class JsonMetricsExtractor implements MetricsExtractor {
  accepts(filename: string): boolean {
    return path.extname(filename).toLowerCase() === ".json";
  }

  async extract(filename: string, bytes: Buffer): Promise<ExtractionResult> {
    let text = bytes.toString("utf-8");
    if (text.charCodeAt(0) === 0xfeff) {
      text = text.slice(1);
    }

    let doc: unknown;
    try {
      doc = JSON.parse(text);
    } catch {
      throw new ExtractionError(filename, "not valid JSON");
    }
    if (!isRecord(doc)) {
      throw new ExtractionError(filename, "expected a JSON object");
    }

    const sport = doc.sport;
    if (typeof sport !== "string" || sport.trim() === "") {
      throw new ExtractionError(filename, "missing sport");
    }
    if (!SUPPORTED_SPORTS.has(sport)) {
      return { kind: "not-applicable", reason: `sport "${sport}" is not a running activity` };
    }

    if (!isValidDateString(doc.date)) {
      throw new ExtractionError(filename, `invalid date ${JSON.stringify(doc.date)}`);
    }

    const parsed = parseActivityMetrics(doc.metrics);
    if (!parsed.ok) {
      throw new ExtractionError(filename, parsed.errors.join("; "));
    }

    return {
      kind: "ok",
      filename: typeof doc.filename === "string" && doc.filename !== "" ? doc.filename : filename,
      date: doc.date,
      metrics: parsed.value,
    };
  }
}
