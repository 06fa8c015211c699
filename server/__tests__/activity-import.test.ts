import type { MetricRecord } from "../../lib/activity-types";
import { bufferFile, type ActivityFile } from "../activity-archive";
import {
  ActivityImporter,
  ImportInProgressError,
  hashActivityBytes,
  type ActivityWriter,
  type FileOutcome,
} from "../activity-import";
import { StorageUnavailableError } from "../activity-store";
import { JsonMetricsExtractor } from "../metrics-extractor";

const CLOCK_MS = 1_700_000_000_500;

class MemoryWriter implements ActivityWriter {
  readonly rows = new Map<string, MetricRecord>();

  async exists(hash: string): Promise<boolean> {
    return this.rows.has(hash);
  }

  async upsert(record: MetricRecord): Promise<void> {
    this.rows.set(record.contentHash, record);
  }
}

function runFile(filename: string, date: string, sport = "running"): ActivityFile {
  const doc = {
    sport,
    date,
    metrics: {
      efficiencyFactor: 1.2,
      decouplingPct: 4,
      avgCadenceSpm: 168,
      avgHeartRate: 148,
      trainingLoad: 110,
      totalTrainingEffect: 3.2,
      totalAnaerobicTrainingEffect: 0.8,
      heartRateRecoverySeries: [22, 31],
    },
  };
  return bufferFile(filename, Buffer.from(JSON.stringify(doc)));
}

function newImporter(writer: ActivityWriter = new MemoryWriter()) {
  return new ActivityImporter(writer, new JsonMetricsExtractor(), { clock: () => CLOCK_MS });
}

beforeEach(() => {
  jest.spyOn(console, "log").mockImplementation(() => {});
  jest.spyOn(console, "warn").mockImplementation(() => {});
  jest.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  jest.restoreAllMocks();
});

describe("hashActivityBytes", () => {
  test("sha256 hex of the raw bytes", () => {
    expect(hashActivityBytes(Buffer.from("abc"))).toBe(
      "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad",
    );
  });
});

describe("ActivityImporter.importBatch", () => {
  test("no files → nothing-to-import without a session", async () => {
    const importer = newImporter();
    const result = await importer.importBatch([]);
    expect(result.status).toBe("nothing-to-import");
    expect(result.sessionId).toBeNull();
    expect(result.total).toBe(0);

    const next = await importer.importBatch([runFile("a.json", "2024-03-01")]);
    expect(next.sessionId).toBe(1_700_000_000);
  });

  test("mixed batch counts every outcome", async () => {
    const writer = new MemoryWriter();
    const importer = newImporter(writer);
    const run = runFile("run.json", "2024-03-01");
    const outcomes: FileOutcome[] = [];

    const result = await importer.importBatch(
      [
        run,
        runFile("ride.json", "2024-03-02", "cycling"),
        bufferFile("bad.json", Buffer.from("{")),
        { filename: "copy.json", read: run.read },
      ],
      { onProgress: (p) => outcomes.push(p.outcome) },
    );

    expect(outcomes).toEqual(["imported", "not-applicable", "failed", "duplicate"]);
    expect(result).toEqual({
      status: "imported",
      sessionId: 1_700_000_000,
      total: 4,
      processed: 4,
      newCount: 1,
      duplicateCount: 1,
      skippedCount: 1,
      failedCount: 1,
      failures: [{ filename: "bad.json", error: "bad.json: not valid JSON" }],
      aborted: false,
    });

    const stored = [...writer.rows.values()];
    expect(stored).toHaveLength(1);
    expect(stored[0].filename).toBe("run.json");
    expect(stored[0].date).toBe("2024-03-01");
    expect(stored[0].sessionId).toBe(1_700_000_000);
    expect(importer.phase).toBe("idle");
  });

  test("re-importing the same file → no-new-activities under a new session", async () => {
    const importer = newImporter();
    await importer.importBatch([runFile("run.json", "2024-03-01")]);
    const again = await importer.importBatch([runFile("run.json", "2024-03-01")]);

    expect(again.status).toBe("no-new-activities");
    expect(again.duplicateCount).toBe(1);
    expect(again.newCount).toBe(0);
    expect(again.sessionId).toBe(1_700_000_001);
  });

  test("progress reports processed/total after each file", async () => {
    const importer = newImporter();
    const seen: string[] = [];
    await importer.importBatch(
      [runFile("a.json", "2024-03-01"), runFile("b.json", "2024-03-02")],
      { onProgress: (p) => seen.push(`${p.processed}/${p.total} ${p.filename}`) },
    );
    expect(seen).toEqual(["1/2 a.json", "2/2 b.json"]);
  });

  test("abort between files keeps what was already imported", async () => {
    const writer = new MemoryWriter();
    const importer = newImporter(writer);
    const controller = new AbortController();

    const result = await importer.importBatch(
      [runFile("a.json", "2024-03-01"), runFile("b.json", "2024-03-02")],
      { signal: controller.signal, onProgress: () => controller.abort() },
    );

    expect(result.aborted).toBe(true);
    expect(result.processed).toBe(1);
    expect(result.newCount).toBe(1);
    expect(result.status).toBe("imported");
    expect(writer.rows.size).toBe(1);
  });

  test("storage failure aborts the batch", async () => {
    const writer: ActivityWriter = {
      exists: async () => {
        throw new StorageUnavailableError("exists", new Error("connection refused"));
      },
      upsert: async () => {},
    };
    const importer = newImporter(writer);

    await expect(importer.importBatch([runFile("a.json", "2024-03-01")])).rejects.toThrow(
      "storage unavailable during exists: connection refused",
    );
    expect(importer.inProgress).toBe(false);
  });

  test("a second batch while one is running is refused", async () => {
    const importer = newImporter();
    let release: (bytes: Buffer) => void = () => {};
    const gate = new Promise<Buffer>((resolve) => {
      release = resolve;
    });

    const first = importer.importBatch([{ filename: "slow.json", read: () => gate }]);
    expect(importer.inProgress).toBe(true);
    await expect(importer.importBatch([runFile("a.json", "2024-03-01")])).rejects.toThrow(ImportInProgressError);

    const bytes = await runFile("slow.json", "2024-03-01").read();
    release(bytes);
    const result = await first;
    expect(result.newCount).toBe(1);
    expect(importer.inProgress).toBe(false);
  });

  test("the importer is claimed while files are still loading", async () => {
    const importer = newImporter();
    let release: (files: ActivityFile[]) => void = () => {};
    const loading = new Promise<ActivityFile[]>((resolve) => {
      release = resolve;
    });

    const first = importer.importBatch(() => loading);
    expect(importer.inProgress).toBe(true);
    await expect(importer.importBatch([runFile("b.json", "2024-03-02")])).rejects.toThrow(ImportInProgressError);

    release([runFile("a.json", "2024-03-01")]);
    const result = await first;
    expect(result.newCount).toBe(1);
    expect(importer.inProgress).toBe(false);
  });

  test("a loader that finds nothing → nothing-to-import without a session", async () => {
    const importer = newImporter();
    const onSessionStart = jest.fn();
    const result = await importer.importBatch(async () => [], { onSessionStart });
    expect(result.status).toBe("nothing-to-import");
    expect(onSessionStart).not.toHaveBeenCalled();
    expect(importer.inProgress).toBe(false);
  });

  test("the session id is announced before files are written", async () => {
    const writer = new MemoryWriter();
    const importer = newImporter(writer);
    const rowsAtStart: number[] = [];
    await importer.importBatch([runFile("a.json", "2024-03-01")], {
      onSessionStart: (id) => rowsAtStart.push(id, writer.rows.size),
    });
    expect(rowsAtStart).toEqual([1_700_000_000, 0]);
  });

  test("a batch cut short by storage failure has still announced its session", async () => {
    const writer = new MemoryWriter();
    let upserts = 0;
    const failing: ActivityWriter = {
      exists: (hash) => writer.exists(hash),
      upsert: async (record) => {
        upserts++;
        if (upserts === 2) throw new StorageUnavailableError("upsert", new Error("disk full"));
        await writer.upsert(record);
      },
    };
    const importer = newImporter(failing);
    const onSessionStart = jest.fn();

    await expect(
      importer.importBatch([runFile("a.json", "2024-03-01"), runFile("b.json", "2024-03-02")], { onSessionStart }),
    ).rejects.toThrow("storage unavailable during upsert: disk full");

    expect(onSessionStart).toHaveBeenCalledWith(1_700_000_000);
    expect([...writer.rows.values()].map((r) => r.sessionId)).toEqual([1_700_000_000]);
  });
});
