import express from "express";
import cors from "cors";
import path from "node:path";
import fs from "node:fs/promises";
import archiver from "archiver";
import { z } from "zod";
import type { RunExecutor } from "./executor.js";
import type { RunManager, RunSettings } from "./run_manager.js";
import {
  MAX_CONCURRENCY_LIMIT,
  MAX_RETRIES_LIMIT,
  CALL_TIMEOUT_MAX_MS,
  CALL_TIMEOUT_MIN_MS,
  ProviderNameSchema,
  type GenerationConfig
} from "./pipeline/config.js";
import { runGenerationConfig } from "./pipeline/deck_pipeline.js";
import { analyzeDocument, detectFormat, parseDocument, validateSections, type DocumentFormat } from "./pipeline/document_parser.js";
import { ConfigurationError, DocumentParseError } from "./pipeline/errors.js";
import type { ProviderRouter } from "./pipeline/router.js";
import {
  isSafeArtifactName,
  resolveArtifactPathAbs,
  runFinalDirAbs,
  runIntermediateDirAbs,
  runOutputDirAbs,
  toErrorMessage
} from "./pipeline/utils.js";

type ArtifactFolder = "root" | "intermediate" | "final";

const RETENTION_KEEP_LAST_DEFAULT = 50;
const RETENTION_KEEP_LAST_MIN = 0;
const RETENTION_KEEP_LAST_MAX = 1000;
const MAX_DOCUMENT_CHARS = 500_000;

const RunSettingsSchema = z
  .object({
    providerPreferenceOrder: z.array(ProviderNameSchema).min(1).optional(),
    qualityThreshold: z.number().min(0).max(1).optional(),
    maxRetries: z.number().int().min(0).max(MAX_RETRIES_LIMIT).optional(),
    maxConcurrency: z.number().int().min(1).max(MAX_CONCURRENCY_LIMIT).optional(),
    perCallTimeoutMs: z.number().int().min(CALL_TIMEOUT_MIN_MS).max(CALL_TIMEOUT_MAX_MS).optional(),
    parser: z.enum(["mechanical", "model"]).optional(),
    targetAudience: z.string().trim().min(1).max(100).optional(),
    presentationStyle: z.string().trim().min(1).max(100).optional(),
    language: z.string().trim().min(2).max(20).optional(),
    maxBulletPoints: z.number().int().min(1).max(12).optional()
  })
  .strict();

const DocumentFieldsShape = {
  document: z.string().max(MAX_DOCUMENT_CHARS),
  filename: z.string().trim().min(1).max(200).optional(),
  format: z.enum(["markdown", "plain"]).optional()
};

const CreateRunBodySchema = z
  .object({
    ...DocumentFieldsShape,
    document: DocumentFieldsShape.document.refine((d) => d.trim().length > 0, "document must not be empty"),
    settings: RunSettingsSchema.optional()
  })
  .strict();

const ValidateDocumentBodySchema = z.object(DocumentFieldsShape).strict();

const CleanupRunsBodySchema = z
  .object({
    keepLast: z.number().int().min(RETENTION_KEEP_LAST_MIN).max(RETENTION_KEEP_LAST_MAX).optional(),
    dryRun: z.boolean().optional()
  })
  .strict();

function normalizeSettings(settings: RunSettings | undefined): RunSettings | undefined {
  if (!settings) return undefined;
  const entries = Object.entries(settings).filter(([, v]) => v !== undefined);
  return entries.length > 0 ? settings : undefined;
}

function retentionKeepLastDefault(): number {
  const raw = Number(process.env.SLIDESMITH_RUN_RETENTION_KEEP_LAST ?? RETENTION_KEEP_LAST_DEFAULT);
  if (!Number.isFinite(raw)) return RETENTION_KEEP_LAST_DEFAULT;
  return Math.min(RETENTION_KEEP_LAST_MAX, Math.max(RETENTION_KEEP_LAST_MIN, Math.round(raw)));
}

function resolveDocumentMeta(document: string, filename?: string, format?: DocumentFormat): { filename: string; format: DocumentFormat } {
  const resolvedFormat = format ?? detectFormat(filename ?? "", document);
  return {
    filename: filename ?? (resolvedFormat === "plain" ? "document.txt" : "document.md"),
    format: resolvedFormat
  };
}

export type AppOptions = {
  router: ProviderRouter;
  generation: GenerationConfig;
  pipelineMode: "live" | "fake";
  hasOpenAIKey: boolean;
  hasGeminiKey: boolean;
};

export function createApp(runs: RunManager, executor: RunExecutor, options: AppOptions) {
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: "2mb" }));

  const { router } = options;

  app.get("/api/health", (_req, res) => {
    res.json({
      ok: true,
      hasOpenAIKey: options.hasOpenAIKey,
      hasGeminiKey: options.hasGeminiKey,
      pipelineMode: options.pipelineMode,
      providers: router.names()
    });
  });

  app.post("/api/runs", async (req, res) => {
    const parsed = CreateRunBodySchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: parsed.error.flatten() });
      return;
    }

    const settings = normalizeSettings(parsed.data.settings);
    try {
      const config = runGenerationConfig(options.generation, settings);
      if (settings?.providerPreferenceOrder) router.reordered(config.providerPreferenceOrder);
    } catch (err) {
      if (!(err instanceof ConfigurationError)) throw err;
      res.status(400).json({ error: err.message, issues: err.issues });
      return;
    }

    const meta = resolveDocumentMeta(parsed.data.document, parsed.data.filename, parsed.data.format);
    const run = await runs.createRun({ ...meta, document: parsed.data.document, settings });
    res.json({ runId: run.runId });

    executor.enqueue(run.runId);
  });

  app.get("/api/runs", (_req, res) => {
    res.json(runs.listRuns());
  });

  app.post("/api/runs/cleanup", async (req, res) => {
    const parsed = CleanupRunsBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      res.status(400).json({ error: parsed.error.flatten() });
      return;
    }

    const keepLast = parsed.data.keepLast ?? retentionKeepLastDefault();
    const dryRun = parsed.data.dryRun ?? false;
    const result = await runs.cleanupTerminalRuns(keepLast, dryRun);
    res.json({ ...result, stats: runs.retentionStats() });
  });

  app.post("/api/documents/validate", (req, res) => {
    const parsed = ValidateDocumentBodySchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: parsed.error.flatten() });
      return;
    }

    const meta = resolveDocumentMeta(parsed.data.document, parsed.data.filename, parsed.data.format);
    try {
      const sections = parseDocument(parsed.data.document, meta.format);
      res.json({
        ...meta,
        sections,
        analysis: analyzeDocument(parsed.data.document, meta.format, sections),
        validation: validateSections(sections)
      });
    } catch (err) {
      if (!(err instanceof DocumentParseError)) throw err;
      res.status(422).json({ error: err.message });
    }
  });

  app.get("/api/providers", (_req, res) => {
    res.json(router.status());
  });

  app.post("/api/providers/:name/check", async (req, res) => {
    const name = req.params.name;
    if (!router.get(name)) {
      res.status(404).json({ error: "provider not configured" });
      return;
    }

    const healthy = await router.healthCheck(name, {
      signal: AbortSignal.timeout(options.generation.perCallTimeoutMs),
      log: (message) => console.log(`[providers] ${message}`)
    });
    res.json({ name, healthy, status: router.status().find((s) => s.name === name) ?? null });
  });

  app.get("/api/runs/:runId", (req, res) => {
    const run = runs.getRun(req.params.runId);
    if (!run) {
      res.status(404).json({ error: "run not found" });
      return;
    }
    res.json(run);
  });

  app.post("/api/runs/:runId/cancel", (req, res) => {
    const run = runs.getRun(req.params.runId);
    if (!run) {
      res.status(404).json({ error: "run not found" });
      return;
    }

    const ok = executor.cancel(run.runId);
    if (!ok) {
      res.status(409).json({ error: "run not cancellable" });
      return;
    }

    res.json({ ok: true });
  });

  app.get("/api/runs/:runId/events", (req, res) => {
    const runId = req.params.runId;
    const run = runs.getInternal(runId);
    if (!run) {
      res.status(404).end();
      return;
    }

    res.setHeader("Content-Type", "text/event-stream");
    res.setHeader("Cache-Control", "no-cache");
    res.setHeader("Connection", "keep-alive");

    const send = (type: string, payload: unknown) => {
      res.write(`event: ${type}\n`);
      res.write(`data: ${JSON.stringify(payload)}\n\n`);
    };

    const unsubscribe = runs.subscribe(runId, send);
    send("log", { message: "SSE connected" });

    const ping = setInterval(() => {
      res.write("event: ping\n");
      res.write("data: {}\n\n");
    }, 15000);

    req.on("close", () => {
      clearInterval(ping);
      unsubscribe?.();
      res.end();
    });
  });

  app.get("/api/runs/:runId/export", (req, res) => {
    const runId = req.params.runId;
    const run = runs.getRun(runId);
    if (!run) {
      res.status(404).json({ error: "run not found" });
      return;
    }

    res.setHeader("Content-Type", "application/zip");
    res.setHeader("Content-Disposition", `attachment; filename="run-${runId}.zip"`);

    const archive = archiver("zip", { zlib: { level: 9 } });

    archive.on("warning", (err) => {
      runs.log(runId, `zip warning: ${err.message}`);
    });

    archive.on("error", (err) => {
      runs.error(runId, `zip error: ${err.message}`);
      res.status(500).end();
    });

    archive.pipe(res);
    archive.directory(runOutputDirAbs(runId), false);
    void archive.finalize();
  });

  app.get("/api/runs/:runId/artifacts", async (req, res) => {
    const runId = req.params.runId;
    const run = runs.getRun(runId);
    if (!run) {
      res.status(404).json({ error: "run not found" });
      return;
    }

    const scanDirs: Array<{ dir: string; folder: ArtifactFolder }> = [
      { dir: runOutputDirAbs(runId), folder: "root" },
      { dir: runIntermediateDirAbs(runId), folder: "intermediate" },
      { dir: runFinalDirAbs(runId), folder: "final" }
    ];
    const byName = new Map<string, { name: string; size: number; mtimeMs: number; folder: ArtifactFolder }>();

    for (const scan of scanDirs) {
      const entries = await fs.readdir(scan.dir, { withFileTypes: true }).catch(() => []);
      for (const ent of entries) {
        if (!ent.isFile()) continue;
        const st = await fs.stat(path.join(scan.dir, ent.name)).catch(() => null);
        if (!st) continue;

        const next = { name: ent.name, size: st.size, mtimeMs: st.mtimeMs, folder: scan.folder };
        const prev = byName.get(ent.name);
        if (!prev || next.mtimeMs >= prev.mtimeMs) byName.set(ent.name, next);
      }
    }

    res.json([...byName.values()].sort((a, b) => b.mtimeMs - a.mtimeMs));
  });

  app.get("/api/runs/:runId/artifacts/:name", async (req, res) => {
    const runId = req.params.runId;
    const name = req.params.name;

    if (!isSafeArtifactName(name)) {
      res.status(400).send("invalid artifact name");
      return;
    }

    const run = runs.getRun(runId);
    if (!run) {
      res.status(404).send("run not found");
      return;
    }

    const filePath = await resolveArtifactPathAbs(runId, name);
    if (!filePath) {
      res.status(404).send("artifact not found");
      return;
    }

    try {
      const data = await fs.readFile(filePath);
      if (name.toLowerCase().endsWith(".json")) res.setHeader("Content-Type", "application/json; charset=utf-8");
      else res.setHeader("Content-Type", "text/plain; charset=utf-8");
      res.send(data);
    } catch (err) {
      res.status(404).send(`artifact not found: ${toErrorMessage(err)}`);
    }
  });

  return app;
}
