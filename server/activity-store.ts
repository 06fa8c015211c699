import type { MetricRecord, StoredActivity } from "../lib/activity-types";
import type { Timeframe } from "../lib/verdict-taxonomy";
import type { Queryable } from "./db";
import { isValidDateString, parseActivityMetrics } from "./validation";

export class StorageUnavailableError extends Error {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`storage unavailable during ${operation}: ${detail}`, { cause });
    this.name = "StorageUnavailableError";
    this.operation = operation;
  }
}

export interface CorruptedRow {
  hash: string;
  filename: string | null;
  reason: string;
}

export interface WindowQueryResult {
  activities: StoredActivity[];
  corrupted: CorruptedRow[];
}

type ActivityRow = {
  hash: string;
  filename: string | null;
  activity_date: string | null;
  session_id: string | number | null;
  metrics_json: string | null;
  imported_at: Date | string | null;
};

const WINDOW_DAYS: Partial<Record<Timeframe, number>> = {
  "Last 30 Days": 30,
  "Last 90 Days": 90,
};

function dayString(d: Date): string {
  return d.toISOString().slice(0, 10);
}

/** Earliest calendar day (inclusive) a timeframe admits, or null for no date bound. */
export function windowStartDate(window: Timeframe, now: Date): string | null {
  const days = WINDOW_DAYS[window];
  if (days != null) {
    const d = new Date(now.getTime());
    d.setUTCDate(d.getUTCDate() - days);
    return dayString(d);
  }
  if (window === "This Year") {
    return `${now.getUTCFullYear()}-01-01`;
  }
  return null;
}

function toStoredActivity(row: ActivityRow): StoredActivity | CorruptedRow {
  const corrupted = (reason: string): CorruptedRow => ({ hash: row.hash, filename: row.filename, reason });

  if (!row.filename) return corrupted("missing filename");
  if (!isValidDateString(row.activity_date)) return corrupted(`invalid date ${JSON.stringify(row.activity_date)}`);

  const sessionId = row.session_id == null ? NaN : Number(row.session_id);
  if (!Number.isSafeInteger(sessionId)) return corrupted(`invalid session id ${JSON.stringify(row.session_id)}`);

  let payload: unknown;
  try {
    payload = JSON.parse(row.metrics_json ?? "");
  } catch (err) {
    return corrupted(`metrics payload is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  const parsed = parseActivityMetrics(payload);
  if (!parsed.ok) return corrupted(parsed.errors.join("; "));

  const importedAt = row.imported_at instanceof Date ? row.imported_at.toISOString() : row.imported_at;

  return {
    contentHash: row.hash,
    filename: row.filename,
    date: row.activity_date,
    sessionId,
    metrics: parsed.value,
    importedAt,
  };
}

function isCorrupted(r: StoredActivity | CorruptedRow): r is CorruptedRow {
  return "reason" in r;
}

export interface ActivityStoreOptions {
  now?: () => Date;
}

/**
 * One row per activity keyed by content hash. Every write replaces a whole
 * row in a single statement, so readers never see a partial record.
 */
export class ActivityStore {
  private readonly now: () => Date;

  constructor(private readonly db: Queryable, options: ActivityStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err: unknown) {
      console.error(`[store] ${operation} failed:`, err);
      throw new StorageUnavailableError(operation, err);
    }
  }

  async exists(hash: string): Promise<boolean> {
    return this.run("exists", async () => {
      const { rows } = await this.db.query(`SELECT 1 FROM activities WHERE hash = $1`, [hash]);
      return rows.length > 0;
    });
  }

  async upsert(record: MetricRecord): Promise<void> {
    const metricsJson = JSON.stringify(record.metrics);
    await this.run("upsert", () =>
      this.db.query(
        `
        INSERT INTO activities (hash, filename, activity_date, session_id, metrics_json, imported_at)
        VALUES ($1, $2, $3, $4, $5, NOW())
        ON CONFLICT (hash) DO UPDATE SET
          filename = EXCLUDED.filename,
          activity_date = EXCLUDED.activity_date,
          session_id = EXCLUDED.session_id,
          metrics_json = EXCLUDED.metrics_json,
          imported_at = EXCLUDED.imported_at
        `,
        [record.contentHash, record.filename, record.date, record.sessionId, metricsJson],
      ),
    );
  }

  async delete(hash: string): Promise<void> {
    await this.run("delete", () => this.db.query(`DELETE FROM activities WHERE hash = $1`, [hash]));
  }

  async count(): Promise<number> {
    return this.run("count", async () => {
      const { rows } = await this.db.query<{ count: string | number }>(
        `SELECT COUNT(*) AS count FROM activities`,
      );
      return Number(rows[0]?.count ?? 0);
    });
  }

  /**
   * Newest date first. "Last Import" without a session id returns nothing
   * rather than falling through to all data.
   */
  async query(window: Timeframe, sessionId?: number | null): Promise<WindowQueryResult> {
    if (window === "Last Import" && sessionId == null) {
      return { activities: [], corrupted: [] };
    }

    let sql = `SELECT hash, filename, activity_date, session_id, metrics_json, imported_at FROM activities`;
    const params: unknown[] = [];

    if (window === "Last Import") {
      sql += ` WHERE session_id = $1`;
      params.push(sessionId);
    } else {
      const start = windowStartDate(window, this.now());
      if (start) {
        sql += ` WHERE activity_date >= $1`;
        params.push(start);
      }
    }
    sql += ` ORDER BY activity_date DESC, hash ASC`;

    const { rows } = await this.run("query", () => this.db.query<ActivityRow>(sql, params));

    const result: WindowQueryResult = { activities: [], corrupted: [] };
    for (const row of rows) {
      const parsed = toStoredActivity(row);
      if (isCorrupted(parsed)) {
        console.warn(`[store] skipping corrupted row ${parsed.hash}: ${parsed.reason}`);
        result.corrupted.push(parsed);
      } else {
        result.activities.push(parsed);
      }
    }
    return result;
  }
}
