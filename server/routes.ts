import type { Express, NextFunction, Request, Response } from "express";
import { createServer, type Server } from "node:http";
import * as fs from "node:fs";
import multer from "multer";
import { analyzeWindow } from "../lib/efficiency-analytics";
import { InvalidMetricInputError, createClassifier } from "../lib/run-classifier";
import { TIMEFRAME_OPTIONS, isTimeframe, verdictFor, type Timeframe } from "../lib/verdict-taxonomy";
import {
  bufferFile,
  extractZipEntries,
  isZipArchive,
  listActivityFiles,
  type ActivityFile,
} from "./activity-archive";
import { ActivityImporter, ImportInProgressError, type ImportBatchResult } from "./activity-import";
import { ActivityStore, StorageUnavailableError } from "./activity-store";
import { config, loadClassifierThresholds } from "./config";
import { initDb, pool, type Queryable } from "./db";
import { JsonMetricsExtractor, type MetricsExtractor } from "./metrics-extractor";
import { createAppSessionState } from "./session-state";
import { isContentHash } from "./validation";

const upload = multer({ storage: multer.memoryStorage(), limits: { fileSize: 100 * 1024 * 1024 } });

function requireAuth(apiKey: string | undefined) {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!apiKey) {
      return res.status(500).json({ error: "Server missing API_KEY" });
    }
    const authHeader = req.headers.authorization || "";
    const token = authHeader.startsWith("Bearer ") ? authHeader.slice(7) : "";
    if (token !== apiKey) {
      return res.status(401).json({ error: "Unauthorized" });
    }
    next();
  };
}

function sendError(res: Response, context: string, err: unknown) {
  if (err instanceof InvalidMetricInputError) {
    return res.status(400).json({ error: err.message });
  }
  if (err instanceof StorageUnavailableError) {
    console.error(`${context}:`, err.message);
    return res.status(503).json({ error: "Storage unavailable" });
  }
  if (err instanceof ImportInProgressError) {
    return res.status(409).json({ error: err.message });
  }
  console.error(`${context}:`, err);
  return res.status(500).json({ error: "Internal server error" });
}

function importMessage(result: ImportBatchResult): string {
  switch (result.status) {
    case "nothing-to-import":
      return "No activity files found.";
    case "no-new-activities":
      return "No new activities were imported (all files were duplicates or skipped).";
    case "imported":
      return `Imported ${result.newCount} new`;
  }
}

function parseSessionId(raw: unknown): number | null | "invalid" {
  if (raw == null || raw === "") return null;
  if (typeof raw !== "string" || !/^\d+$/.test(raw)) return "invalid";
  return Number(raw);
}

export interface RouteDeps {
  db?: Queryable;
  extractor?: MetricsExtractor;
  apiKey?: string;
}

export async function registerRoutes(app: Express, deps: RouteDeps = {}): Promise<Server> {
  const db = deps.db ?? pool;
  await initDb(db);

  const store = new ActivityStore(db);
  const extractor = deps.extractor ?? new JsonMetricsExtractor();
  const importer = new ActivityImporter(store, extractor);
  const classifier = createClassifier(loadClassifierThresholds());
  const state = createAppSessionState();

  state.subscribe("sessionId", (id) => console.log(`[session-state] last import session -> ${id}`));

  app.use("/api", requireAuth(deps.apiKey ?? config.apiKey));

  let activeImport: AbortController | null = null;

  // The inProgress check and importBatch's claim run in the same tick; files load after.
  async function runImport(res: Response, loadFiles: () => Promise<ActivityFile[]>) {
    if (importer.inProgress) {
      return res.status(409).json({ error: "An import is already running" });
    }
    const controller = new AbortController();
    const batch = importer.importBatch(loadFiles, {
      signal: controller.signal,
      onSessionStart: (sessionId) => state.batchSet({ sessionId, timeframe: "Last Import" }),
      onProgress: ({ processed, total }) => state.set("lastProgress", { processed, total }),
    });
    activeImport = controller;
    state.batchSet({ importInProgress: true, lastProgress: null });
    res.on("close", () => {
      if (!res.writableFinished) controller.abort();
    });

    try {
      const result = await batch;
      return res.json({ ...result, message: importMessage(result), storedCount: await store.count() });
    } finally {
      activeImport = null;
      state.set("importInProgress", false);
    }
  }

  app.post("/api/import", upload.array("files"), async (req: Request, res: Response) => {
    try {
      const uploaded = Array.isArray(req.files) ? req.files : [];
      await runImport(res, async () => {
        const files: ActivityFile[] = [];
        for (const f of uploaded) {
          if (isZipArchive(f.originalname)) {
            files.push(...(await extractZipEntries(f.buffer, (name) => extractor.accepts(name))));
          } else if (extractor.accepts(f.originalname)) {
            files.push(bufferFile(f.originalname, f.buffer));
          }
        }
        return files;
      });
    } catch (err: unknown) {
      sendError(res, "activity import error", err);
    }
  });

  app.post("/api/import/folder", async (req: Request, res: Response) => {
    try {
      const folder: unknown = req.body?.folder;
      if (typeof folder !== "string" || folder.trim() === "") {
        return res.status(400).json({ error: "Missing folder" });
      }
      if (!fs.existsSync(folder) || !fs.statSync(folder).isDirectory()) {
        return res.status(400).json({ error: "Folder not found" });
      }
      await runImport(res, () => listActivityFiles(folder, (name) => extractor.accepts(name)));
    } catch (err: unknown) {
      sendError(res, "folder import error", err);
    }
  });

  app.post("/api/import/cancel", (_req: Request, res: Response) => {
    const cancelled = activeImport !== null && !activeImport.signal.aborted;
    activeImport?.abort();
    if (cancelled) console.log("[import] cancel requested");
    res.json({ ok: true, cancelled });
  });

  app.get("/api/import/status", (_req: Request, res: Response) => {
    res.json({ ...state.snapshot(), phase: importer.phase });
  });

  app.post("/api/session/timeframe", (req: Request, res: Response) => {
    const timeframe: unknown = req.body?.timeframe;
    if (!isTimeframe(timeframe)) {
      return res.status(400).json({ error: `timeframe must be one of ${TIMEFRAME_OPTIONS.join(", ")}` });
    }
    state.set("timeframe", timeframe);
    res.json({ ok: true, timeframe });
  });

  function resolveWindow(req: Request): { window: Timeframe; sessionId: number | null } | { error: string } {
    const rawWindow = req.query.window;
    const window = rawWindow == null ? state.get("timeframe") : rawWindow;
    if (!isTimeframe(window)) {
      return { error: `window must be one of ${TIMEFRAME_OPTIONS.join(", ")}` };
    }
    const sessionId = parseSessionId(req.query.sessionId);
    if (sessionId === "invalid") return { error: "sessionId must be an integer" };
    return { window, sessionId: sessionId ?? state.get("sessionId") };
  }

  app.get("/api/activities", async (req: Request, res: Response) => {
    try {
      const resolved = resolveWindow(req);
      if ("error" in resolved) return res.status(400).json({ error: resolved.error });

      const { activities, corrupted } = await store.query(resolved.window, resolved.sessionId);
      res.json({
        window: resolved.window,
        activities: activities.map((a) => ({ ...a, verdicts: classifier.classifyActivity(a.metrics) })),
        corrupted,
      });
    } catch (err: unknown) {
      sendError(res, "activities error", err);
    }
  });

  app.get("/api/activities/count", async (_req: Request, res: Response) => {
    try {
      res.json({ count: await store.count() });
    } catch (err: unknown) {
      sendError(res, "activity count error", err);
    }
  });

  app.delete("/api/activities/:hash", async (req: Request, res: Response) => {
    try {
      if (!isContentHash(req.params.hash)) {
        return res.status(400).json({ error: "Invalid activity hash" });
      }
      await store.delete(req.params.hash);
      res.json({ ok: true });
    } catch (err: unknown) {
      sendError(res, "activity delete error", err);
    }
  });

  app.get("/api/analytics", async (req: Request, res: Response) => {
    try {
      const resolved = resolveWindow(req);
      if ("error" in resolved) return res.status(400).json({ error: resolved.error });

      const { activities, corrupted } = await store.query(resolved.window, resolved.sessionId);
      const analytics = analyzeWindow(activities, classifier);
      res.json({
        window: resolved.window,
        ...analytics,
        loadMixVerdict: analytics.loadMix ? verdictFor(classifier.taxonomy.loadMix, analytics.loadMix) : null,
        corruptedCount: corrupted.length,
      });
    } catch (err: unknown) {
      sendError(res, "analytics error", err);
    }
  });

  app.get("/api/taxonomy", (_req: Request, res: Response) => {
    res.json({
      taxonomy: classifier.taxonomy,
      timeframes: TIMEFRAME_OPTIONS,
      thresholds: classifier.thresholds,
    });
  });

  const httpServer = createServer(app);
  return httpServer;
}
