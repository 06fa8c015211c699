import crypto from "crypto";
import type { MetricRecord } from "../lib/activity-types";
import type { ActivityFile } from "./activity-archive";
import { StorageUnavailableError } from "./activity-store";
import type { MetricsExtractor } from "./metrics-extractor";

export type ImportPhase = "idle" | "hashing" | "extracting" | "persisting";

export type FileOutcome = "imported" | "duplicate" | "not-applicable" | "failed";

export type BatchStatus = "nothing-to-import" | "no-new-activities" | "imported";

export interface ImportProgress {
  processed: number;
  total: number;
  filename: string;
  outcome: FileOutcome;
}

export interface ImportFailure {
  filename: string;
  error: string;
}

export interface ImportBatchResult {
  status: BatchStatus;
  sessionId: number | null;
  total: number;
  processed: number;
  newCount: number;
  duplicateCount: number;
  skippedCount: number;
  failedCount: number;
  failures: ImportFailure[];
  aborted: boolean;
}

/** The store operations a batch needs. */
export interface ActivityWriter {
  exists(hash: string): Promise<boolean>;
  upsert(record: MetricRecord): Promise<void>;
}

/** Files for a batch, or a loader run after the batch has claimed the importer. */
export type ActivityFileSource = ActivityFile[] | (() => Promise<ActivityFile[]>);

export interface ImportBatchOptions {
  onProgress?: (progress: ImportProgress) => void;
  /** Fires once the session id is allocated, before any file is written. */
  onSessionStart?: (sessionId: number) => void;
  /** Checked between files; a file already being extracted runs to completion. */
  signal?: AbortSignal;
}

export class ImportInProgressError extends Error {
  constructor() {
    super("an import batch is already running");
    this.name = "ImportInProgressError";
  }
}

export function hashActivityBytes(bytes: Buffer): string {
  return crypto.createHash("sha256").update(bytes).digest("hex");
}

export interface ActivityImporterOptions {
  clock?: () => number;
}

/**
 * Runs batches file by file: hash, skip if already stored, otherwise extract
 * and persist under the batch's session id. One batch at a time.
 */
export class ActivityImporter {
  private readonly clock: () => number;
  private lastSessionId = 0;
  private currentPhase: ImportPhase = "idle";
  private running = false;

  constructor(
    private readonly store: ActivityWriter,
    private readonly extractor: MetricsExtractor,
    options: ActivityImporterOptions = {},
  ) {
    this.clock = options.clock ?? Date.now;
  }

  get phase(): ImportPhase {
    return this.currentPhase;
  }

  get inProgress(): boolean {
    return this.running;
  }

  /** Batch start time in epoch seconds, bumped so two batches never share an id. */
  private nextSessionId(): number {
    const id = Math.max(Math.floor(this.clock() / 1000), this.lastSessionId + 1);
    this.lastSessionId = id;
    return id;
  }

  async importBatch(source: ActivityFileSource, options: ImportBatchOptions = {}): Promise<ImportBatchResult> {
    if (this.running) throw new ImportInProgressError();
    this.running = true;

    try {
      const files = Array.isArray(source) ? source : await source();
      return await this.runBatch(files, options);
    } finally {
      this.currentPhase = "idle";
      this.running = false;
    }
  }

  private async runBatch(files: ActivityFile[], options: ImportBatchOptions): Promise<ImportBatchResult> {
    const total = files.length;
    const result: ImportBatchResult = {
      status: "nothing-to-import",
      sessionId: null,
      total,
      processed: 0,
      newCount: 0,
      duplicateCount: 0,
      skippedCount: 0,
      failedCount: 0,
      failures: [],
      aborted: false,
    };
    if (total === 0) {
      console.log("[import] nothing to import");
      return result;
    }

    const sessionId = this.nextSessionId();
    result.sessionId = sessionId;
    console.log(`[import] session ${sessionId}: ${total} file(s)`);
    options.onSessionStart?.(sessionId);

    for (const file of files) {
      if (options.signal?.aborted) {
        result.aborted = true;
        console.warn(`[import] session ${sessionId} abandoned after ${result.processed}/${total}`);
        break;
      }

      const outcome = await this.importFile(file, sessionId, result);
      result.processed++;
      options.onProgress?.({ processed: result.processed, total, filename: file.filename, outcome });
    }

    result.status = result.newCount > 0 ? "imported" : "no-new-activities";
    console.log(
      `[import] session ${sessionId} done: ${result.newCount} new, ${result.duplicateCount} duplicate, ` +
        `${result.skippedCount} skipped, ${result.failedCount} failed`,
    );
    return result;
  }

  private async importFile(file: ActivityFile, sessionId: number, result: ImportBatchResult): Promise<FileOutcome> {
    try {
      this.currentPhase = "hashing";
      const bytes = await file.read();
      const contentHash = hashActivityBytes(bytes);

      if (await this.store.exists(contentHash)) {
        result.duplicateCount++;
        return "duplicate";
      }

      this.currentPhase = "extracting";
      const extracted = await this.extractor.extract(file.filename, bytes);
      if (extracted.kind === "not-applicable") {
        console.log(`[import] skipped ${file.filename}: ${extracted.reason}`);
        result.skippedCount++;
        return "not-applicable";
      }

      this.currentPhase = "persisting";
      await this.store.upsert({
        contentHash,
        filename: extracted.filename,
        date: extracted.date,
        sessionId,
        metrics: extracted.metrics,
      });
      result.newCount++;
      return "imported";
    } catch (err: unknown) {
      if (err instanceof StorageUnavailableError) throw err;
      const message = err instanceof Error ? err.message : String(err);
      console.error(`[import] error processing ${file.filename}:`, message);
      result.failedCount++;
      result.failures.push({ filename: file.filename, error: message });
      return "failed";
    } finally {
      this.currentPhase = "idle";
    }
  }
}
