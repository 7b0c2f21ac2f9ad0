import { EventEmitter } from "node:events";
import fs from "node:fs/promises";
import path from "node:path";
import { randomBytes } from "node:crypto";
import type { RunOutcome } from "./pipeline/assembly.js";
import type { ProviderName } from "./pipeline/config.js";
import type { DocumentFormat } from "./pipeline/document_parser.js";
import {
  artifactAbsPath,
  ensureDir,
  nowIso,
  outputRootAbs,
  runFinalDirAbs,
  runIntermediateDirAbs,
  runOutputDirAbs,
  slug,
  tryReadJsonFile,
  writeJsonFile,
  writeTextFile
} from "./pipeline/utils.js";

export const STEP_ORDER = ["PARSE", "SLIDES", "NARRATION", "ASSEMBLE"] as const;

export type StepName = (typeof STEP_ORDER)[number];

export const SOURCE_ARTIFACT_NAME = "source.txt";

export type ParserMode = "mechanical" | "model";

export type RunSettings = {
  providerPreferenceOrder?: ProviderName[];
  qualityThreshold?: number;
  maxRetries?: number;
  maxConcurrency?: number;
  perCallTimeoutMs?: number;
  parser?: ParserMode;
  targetAudience?: string;
  presentationStyle?: string;
  language?: string;
  maxBulletPoints?: number;
};

export type StepRecord = {
  name: StepName;
  status: "queued" | "running" | "done" | "error";
  startedAt?: string;
  finishedAt?: string;
  error?: string;
  artifacts: string[];
};

export type RunResultSummary = {
  outcome: RunOutcome;
  cancelled: boolean;
  slides: number;
  passed: number;
  bestEffort: number;
  failedSections: number;
  overallQualityScore: number;
  costUsd: number;
};

export type RunStatus = {
  runId: string;
  filename: string;
  format: DocumentFormat;
  documentChars: number;
  settings?: RunSettings;
  status: "queued" | "running" | "done" | "error";
  startedAt: string;
  finishedAt?: string;
  result?: RunResultSummary;
  steps: Record<StepName, StepRecord>;
  outputFolder: string;
};

type RunInternal = RunStatus & {
  emitter: EventEmitter;
};

export type RunListItem = Pick<RunStatus, "runId" | "filename" | "status" | "startedAt" | "finishedAt"> & {
  outcome?: RunOutcome;
};

export type RunRetentionStats = {
  totalRuns: number;
  terminalRuns: number;
  activeRuns: number;
};

export type RunStorageRecord = {
  runId: string;
  filename: string;
  status: RunStatus["status"];
  startedAt: string;
  finishedAt?: string;
  ageHours: number;
  sizeBytes: number;
};

export type CleanupRunsResult = {
  keepLast: number;
  dryRun: boolean;
  scannedTerminalRuns: number;
  keptRunIds: string[];
  deletedRunIds: string[];
  reclaimedBytes: number;
  deletedRuns: RunStorageRecord[];
};

const RUN_ID_SLUG_MAX = 48;
const RUN_ID_SUFFIX_LEN = 8;
const RUN_ID_MAX_ATTEMPTS = 10;
const RUN_ID_SUFFIX_ALPHABET = "abcdefghijklmnopqrstuvwxyz0123456789";

function randomRunSuffix(length: number): string {
  const bytes = randomBytes(length);
  let out = "";
  for (const byte of bytes) {
    out += RUN_ID_SUFFIX_ALPHABET[byte % RUN_ID_SUFFIX_ALPHABET.length];
  }
  return out;
}

function isTerminalRunStatus(status: RunStatus["status"]): boolean {
  return status === "done" || status === "error";
}

function isRunStatusRecord(value: unknown): value is RunStatus {
  if (!value || typeof value !== "object") return false;
  const rec = value as Record<string, unknown>;
  return typeof rec.runId === "string" && typeof rec.status === "string" && typeof rec.steps === "object" && rec.steps !== null;
}

function emptySteps(): Record<StepName, StepRecord> {
  return {
    PARSE: { name: "PARSE", status: "queued", artifacts: [] },
    SLIDES: { name: "SLIDES", status: "queued", artifacts: [] },
    NARRATION: { name: "NARRATION", status: "queued", artifacts: [] },
    ASSEMBLE: { name: "ASSEMBLE", status: "queued", artifacts: [] }
  };
}

function recoverStaleLoadedRun(run: RunStatus): RunStatus {
  if (isTerminalRunStatus(run.status)) return run;
  const recoveredAt = nowIso();
  const recoveredSteps = { ...run.steps };

  for (const stepName of STEP_ORDER) {
    const step = recoveredSteps[stepName];
    if (!step) continue;
    if (step.status === "running" || step.status === "queued") {
      recoveredSteps[stepName] = {
        ...step,
        status: "error",
        error: step.error ?? "Recovered after server restart while run was active.",
        finishedAt: step.finishedAt ?? recoveredAt
      };
    }
  }

  return {
    ...run,
    status: "error",
    finishedAt: run.finishedAt ?? recoveredAt,
    steps: recoveredSteps
  };
}

function newEmitter(): EventEmitter {
  const emitter = new EventEmitter();
  // Node treats "error" events specially: if nobody is listening, it throws.
  // We always want errors to be an optional event stream, never a process crash.
  emitter.on("error", () => undefined);
  return emitter;
}

export class RunManager {
  private runs = new Map<string, RunInternal>();

  retentionStats(): RunRetentionStats {
    const totalRuns = this.runs.size;
    const terminalRuns = [...this.runs.values()].filter((r) => isTerminalRunStatus(r.status)).length;
    return { totalRuns, terminalRuns, activeRuns: totalRuns - terminalRuns };
  }

  async initFromDisk(): Promise<void> {
    await ensureDir(outputRootAbs());
    const entries = await fs.readdir(outputRootAbs(), { withFileTypes: true }).catch(() => []);
    for (const ent of entries) {
      if (!ent.isDirectory()) continue;
      const runId = ent.name;
      const runJsonPath = path.join(runOutputDirAbs(runId), "run.json");
      const data = await tryReadJsonFile(runJsonPath);
      if (!isRunStatusRecord(data)) continue;
      const recovered = recoverStaleLoadedRun(data);
      if (recovered !== data) {
        await writeJsonFile(runJsonPath, recovered).catch((err: unknown) => {
          console.error(`failed to persist recovered run ${runId}:`, err);
        });
      }
      this.runs.set(runId, { ...recovered, emitter: newEmitter() });
    }
  }

  listRuns(): RunListItem[] {
    return [...this.runs.values()]
      .map((r) => ({
        runId: r.runId,
        filename: r.filename,
        status: r.status,
        startedAt: r.startedAt,
        finishedAt: r.finishedAt,
        ...(r.result ? { outcome: r.result.outcome } : {})
      }))
      .sort((a, b) => (a.startedAt < b.startedAt ? 1 : -1));
  }

  async cleanupTerminalRuns(keepLast: number, dryRun: boolean): Promise<CleanupRunsResult> {
    const keep = Math.max(0, Math.floor(keepLast));
    const terminalRuns = [...this.runs.values()]
      .filter((r) => isTerminalRunStatus(r.status))
      .sort((a, b) => (a.startedAt < b.startedAt ? 1 : -1));
    const kept = terminalRuns.slice(0, keep);
    const toDelete = terminalRuns.slice(keep);

    const nowMs = Date.now();
    const deletedRuns: RunStorageRecord[] = [];
    let reclaimedBytes = 0;

    for (const run of toDelete) {
      const startedMs = Date.parse(run.startedAt);
      const ageHours = Number.isFinite(startedMs) ? Math.max(0, (nowMs - startedMs) / (1000 * 60 * 60)) : 0;
      const sizeBytes = await this.dirSizeBytes(runOutputDirAbs(run.runId));
      reclaimedBytes += sizeBytes;
      deletedRuns.push({
        runId: run.runId,
        filename: run.filename,
        status: run.status,
        startedAt: run.startedAt,
        finishedAt: run.finishedAt,
        ageHours,
        sizeBytes
      });

      if (!dryRun) {
        await fs.rm(runOutputDirAbs(run.runId), { recursive: true, force: true });
        this.runs.delete(run.runId);
      }
    }

    return {
      keepLast: keep,
      dryRun,
      scannedTerminalRuns: terminalRuns.length,
      keptRunIds: kept.map((r) => r.runId),
      deletedRunIds: toDelete.map((r) => r.runId),
      reclaimedBytes,
      deletedRuns
    };
  }

  getRun(runId: string): RunStatus | null {
    const r = this.runs.get(runId);
    if (!r) return null;
    return this.snapshot(r);
  }

  getInternal(runId: string): RunInternal | null {
    return this.runs.get(runId) ?? null;
  }

  async readDocument(runId: string): Promise<string> {
    return fs.readFile(artifactAbsPath(runId, SOURCE_ARTIFACT_NAME), "utf8");
  }

  private async runIdExists(runId: string): Promise<boolean> {
    if (this.runs.has(runId)) return true;
    const onDisk = await fs
      .stat(runOutputDirAbs(runId))
      .then((st) => st.isDirectory())
      .catch(() => false);
    return onDisk;
  }

  private async nextRunId(filename: string): Promise<string> {
    const stem = filename.replace(/\.[A-Za-z0-9]+$/, "");
    const nameSlug = (slug(stem).slice(0, RUN_ID_SLUG_MAX).replace(/^-+|-+$/g, "") || "untitled").toLowerCase();
    for (let attempt = 0; attempt < RUN_ID_MAX_ATTEMPTS; attempt++) {
      const runId = `${nameSlug}-${randomRunSuffix(RUN_ID_SUFFIX_LEN)}`;
      if (!(await this.runIdExists(runId))) return runId;
    }
    throw new Error("Unable to allocate unique runId after retries");
  }

  async createRun(input: { filename: string; format: DocumentFormat; document: string; settings?: RunSettings }): Promise<RunStatus> {
    const runId = await this.nextRunId(input.filename);
    const run: RunInternal = {
      runId,
      filename: input.filename,
      format: input.format,
      documentChars: input.document.length,
      settings: input.settings,
      status: "queued",
      startedAt: nowIso(),
      steps: emptySteps(),
      outputFolder: path.join("output", runId),
      emitter: newEmitter()
    };

    await ensureDir(runOutputDirAbs(runId));
    await ensureDir(runIntermediateDirAbs(runId));
    await ensureDir(runFinalDirAbs(runId));
    await writeTextFile(artifactAbsPath(runId, SOURCE_ARTIFACT_NAME), input.document);
    await writeJsonFile(path.join(runOutputDirAbs(runId), "run.json"), this.snapshot(run));

    this.runs.set(runId, run);
    return this.snapshot(run);
  }

  async setRunStatus(runId: string, status: RunStatus["status"], patch?: Pick<Partial<RunStatus>, "finishedAt">): Promise<void> {
    const r = this.runs.get(runId);
    if (!r) return;
    r.status = status;
    if (patch?.finishedAt) r.finishedAt = patch.finishedAt;
    await this.persist(r);
    r.emitter.emit("run_status", { status, at: nowIso() });
  }

  async setResult(runId: string, result: RunResultSummary): Promise<void> {
    const r = this.runs.get(runId);
    if (!r) return;
    r.result = result;
    await this.persist(r);
  }

  async startStep(runId: string, step: StepName): Promise<void> {
    const r = this.runs.get(runId);
    if (!r) return;
    const s = r.steps[step];
    s.status = "running";
    s.startedAt = nowIso();
    await this.persist(r);
    r.emitter.emit("step_started", { step, at: s.startedAt });
  }

  async finishStep(runId: string, step: StepName, ok: boolean, error?: string): Promise<void> {
    const r = this.runs.get(runId);
    if (!r) return;
    const s = r.steps[step];
    s.status = ok ? "done" : "error";
    s.finishedAt = nowIso();
    if (!ok && error) s.error = error;
    await this.persist(r);
    r.emitter.emit("step_finished", { step, at: s.finishedAt, ok });
    if (!ok && error) r.emitter.emit("error", { step, message: error, at: s.finishedAt });
  }

  async addArtifact(runId: string, step: StepName, name: string): Promise<void> {
    const r = this.runs.get(runId);
    if (!r) return;
    const s = r.steps[step];
    if (!s.artifacts.includes(name)) s.artifacts.push(name);
    await this.persist(r);
    r.emitter.emit("artifact_written", { step, name, at: nowIso() });
  }

  log(runId: string, message: string, step?: StepName): void {
    const r = this.runs.get(runId);
    if (!r) return;
    r.emitter.emit("log", { message, step, at: nowIso() });
  }

  error(runId: string, message: string, step?: StepName): void {
    const r = this.runs.get(runId);
    if (!r) return;
    r.emitter.emit("error", { message, step, at: nowIso() });
  }

  subscribe(runId: string, onEvent: (type: string, payload: unknown) => void): (() => void) | null {
    const r = this.runs.get(runId);
    if (!r) return null;

    const eventTypes = ["step_started", "step_finished", "artifact_written", "run_status", "log", "error"] as const;
    const handlers = eventTypes.map((type) => ({ type, fn: (payload: unknown) => onEvent(type, payload) }));
    for (const h of handlers) r.emitter.on(h.type, h.fn);

    return () => {
      for (const h of handlers) r.emitter.off(h.type, h.fn);
    };
  }

  private snapshot(run: RunInternal): RunStatus {
    const { emitter: _emitter, ...pub } = run;
    return pub;
  }

  private async persist(run: RunInternal): Promise<void> {
    await writeJsonFile(path.join(runOutputDirAbs(run.runId), "run.json"), this.snapshot(run));
  }

  private async dirSizeBytes(dir: string): Promise<number> {
    const entries = await fs.readdir(dir, { withFileTypes: true }).catch(() => []);
    let sum = 0;
    for (const ent of entries) {
      const p = path.join(dir, ent.name);
      if (ent.isDirectory()) {
        sum += await this.dirSizeBytes(p);
        continue;
      }
      if (!ent.isFile()) continue;
      const st = await fs.stat(p).catch(() => null);
      if (st) sum += st.size;
    }
    return sum;
  }
}
