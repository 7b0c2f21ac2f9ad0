import type { RunManager, RunSettings } from "./run_manager.js";
import type { DocumentFormat } from "./pipeline/document_parser.js";
import { artifactAbsPath, nowIso, toErrorMessage, writeTextFile } from "./pipeline/utils.js";

export type PipelineOptions = {
  signal: AbortSignal;
};

export type PipelineInput = {
  runId: string;
  filename: string;
  format: DocumentFormat;
  document: string;
  settings?: RunSettings;
};

export type PipelineFn = (input: PipelineInput, runs: RunManager, options: PipelineOptions) => Promise<void>;

export class RunExecutor {
  private readonly concurrency: number;
  private readonly running = new Map<string, AbortController>();
  private readonly queue: string[] = [];

  constructor(
    private readonly runs: RunManager,
    private readonly pipeline: PipelineFn,
    options?: {
      concurrency?: number;
    }
  ) {
    this.concurrency = Math.max(1, options?.concurrency ?? 1);
  }

  isRunning(runId: string): boolean {
    return this.running.has(runId);
  }

  enqueue(runId: string): boolean {
    const run = this.runs.getRun(runId);
    if (!run) return false;
    if (run.status === "running") return false;

    // Avoid duplicate queue entries.
    if (this.queue.includes(runId) || this.running.has(runId)) return true;

    this.queue.push(runId);
    this.runs.log(runId, `Queued (max concurrency ${this.concurrency})`);
    this.drain();
    return true;
  }

  cancel(runId: string): boolean {
    const run = this.runs.getRun(runId);
    if (!run) return false;

    const ctrl = this.running.get(runId);
    if (ctrl) {
      this.runs.log(runId, "Cancellation requested");
      ctrl.abort();
      return true;
    }

    const idx = this.queue.indexOf(runId);
    if (idx !== -1) {
      this.queue.splice(idx, 1);
      this.runs.error(runId, "Cancelled while queued");
      void this.runs.setRunStatus(runId, "error", { finishedAt: nowIso() }).catch((err: unknown) => {
        console.error(`failed to persist cancelled run ${runId}:`, err);
      });
      return true;
    }

    return false;
  }

  private drain(): void {
    while (this.running.size < this.concurrency) {
      const next = this.queue.shift();
      if (next === undefined) return;
      void this.start(next);
    }
  }

  private async start(runId: string): Promise<void> {
    const run = this.runs.getRun(runId);
    if (!run) return;

    const controller = new AbortController();
    this.running.set(runId, controller);

    try {
      await this.runs.setRunStatus(runId, "running");
      const document = await this.runs.readDocument(runId);
      await this.pipeline(
        { runId, filename: run.filename, format: run.format, document, settings: run.settings },
        this.runs,
        { signal: controller.signal }
      );
      await this.runs.setRunStatus(runId, "done", { finishedAt: nowIso() });
    } catch (err) {
      const aborted = controller.signal.aborted;
      const msg = aborted ? "Cancelled" : toErrorMessage(err);
      this.runs.error(runId, msg);
      await this.runs.setRunStatus(runId, "error", { finishedAt: nowIso() }).catch((persistErr: unknown) => {
        console.error(`failed to persist run ${runId}:`, persistErr);
      });

      // Persist a cancellation marker for UX.
      if (aborted) {
        await writeTextFile(artifactAbsPath(runId, "CANCELLED.txt"), `Cancelled at ${nowIso()}`).catch((markerErr: unknown) => {
          this.runs.log(runId, `Failed to write cancellation marker: ${toErrorMessage(markerErr)}`);
        });
      }
    } finally {
      this.running.delete(runId);
      this.drain();
    }
  }
}
