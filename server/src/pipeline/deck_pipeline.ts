import type { PipelineFn } from "../executor.js";
import type { RunManager, RunSettings, StepName } from "../run_manager.js";
import { assembleSlides, buildReport, buildRunResult, formatSummary, type AssembledSlides, type RunResult } from "./assembly.js";
import { applyGenerationOverrides, type GenerationConfig } from "./config.js";
import { CostLedger } from "./cost.js";
import {
  analyzeDocument,
  parseDocument,
  shapeSections,
  validateSections,
  type DocumentFormat
} from "./document_parser.js";
import { NoProviderAvailableError, ProviderError } from "./errors.js";
import { buildTranscript, type NarrationEntry } from "./narration.js";
import { callProvider, type CallBoundary } from "./provider_call.js";
import type { SectionOutcome } from "./quality_loop.js";
import type { ProviderRouter } from "./router.js";
import { generateNarrations, generateSlides } from "./scheduler.js";
import { DEFAULT_CONTEXT_HINTS, type Section, type SlideContextHints } from "./schemas.js";
import { artifactAbsPath, nowIso, toErrorMessage, writeJsonFile, writeTextFile } from "./utils.js";

export type DeckPipelineDeps = {
  router: ProviderRouter;
  generation: GenerationConfig;
};

export function slideArtifactName(order: number): string {
  return `slide_${String(order + 1).padStart(2, "0")}.json`;
}

export function runGenerationConfig(base: GenerationConfig, settings: RunSettings | undefined): GenerationConfig {
  return applyGenerationOverrides(base, {
    providerPreferenceOrder: settings?.providerPreferenceOrder,
    qualityThreshold: settings?.qualityThreshold,
    maxRetries: settings?.maxRetries,
    maxConcurrency: settings?.maxConcurrency,
    perCallTimeoutMs: settings?.perCallTimeoutMs
  });
}

function presentationDocument(result: RunResult) {
  const narrationBySlide = new Map(result.narration.map((n) => [n.slideNumber, n]));
  return {
    title: result.title,
    generatedAt: nowIso(),
    outcome: result.outcome,
    cancelled: result.cancelled,
    overallQualityScore: result.overallQualityScore,
    totalNarrationSeconds: result.totalNarrationSeconds,
    slides: result.slides.map((slide) => {
      const narration = narrationBySlide.get(slide.slideNumber);
      return {
        ...slide,
        narration: narration?.text ?? null,
        estimatedDurationSeconds: narration?.estimatedDurationSeconds ?? 0
      };
    }),
    failedSections: result.failedSections.map((f) => ({
      order: f.section.order,
      title: f.section.title,
      reason: f.reason,
      errorKind: f.errorKind,
      fallbackDraft: f.fallbackDraft
    })),
    summary: {
      slides: result.slides.length,
      passed: result.slides.filter((s) => s.status === "passed").length,
      bestEffort: result.slides.filter((s) => s.status === "best_effort").length,
      failedSections: result.failedSections.length,
      warnings: result.warnings
    }
  };
}

/**
 * PARSE -> SLIDES -> NARRATION -> ASSEMBLE. Cancellation after parsing still writes the partial
 * result before the run ends as cancelled.
 */
export function createDeckPipeline(deps: DeckPipelineDeps): PipelineFn {
  return async (input, runs: RunManager, options) => {
    const { runId, filename, document, settings } = input;
    const { signal } = options;

    // Invalid overrides fail the run before any step starts.
    const config = runGenerationConfig(deps.generation, settings);
    const router = settings?.providerPreferenceOrder ? deps.router.reordered(config.providerPreferenceOrder) : deps.router;
    const ledger = new CostLedger();

    const boundaryFor = (step: StepName): CallBoundary => ({
      signal,
      timeoutMs: config.perCallTimeoutMs,
      ledger,
      log: (message) => runs.log(runId, message, step)
    });

    async function writeJsonArtifact(step: StepName, name: string, obj: unknown): Promise<void> {
      await writeJsonFile(artifactAbsPath(runId, name), obj);
      await runs.addArtifact(runId, step, name);
    }

    async function writeTextArtifact(step: StepName, name: string, text: string): Promise<void> {
      await writeTextFile(artifactAbsPath(runId, name), text);
      await runs.addArtifact(runId, step, name);
    }

    async function runStep<T>(step: StepName, fn: () => Promise<T>): Promise<T> {
      await runs.startStep(runId, step);
      try {
        const out = await fn();
        await runs.finishStep(runId, step, true);
        return out;
      } catch (err) {
        await runs.finishStep(runId, step, false, toErrorMessage(err));
        throw err;
      }
    }

    async function parseSections(text: string, fmt: DocumentFormat, useModel: boolean): Promise<Section[]> {
      if (!useModel || text.trim().length === 0) return parseDocument(text, fmt);
      const boundary = boundaryFor("PARSE");
      try {
        const provider = router.select();
        const modelSections = await callProvider({
          provider,
          operation: "parseToSections",
          boundary,
          inputText: text,
          outputText: (out: Section[]) => out.map((s) => `${s.title}\n${s.body}`).join("\n"),
          invoke: (ctx) => provider.parseToSections(text, ctx)
        });
        return shapeSections(modelSections);
      } catch (err) {
        if (signal.aborted) throw err;
        if (!(err instanceof ProviderError) && !(err instanceof NoProviderAvailableError)) throw err;
        boundary.log(`Model parsing failed, using mechanical parser: ${toErrorMessage(err)}`);
        return parseDocument(text, fmt);
      }
    }

    runs.log(
      runId,
      `Pipeline start (providers=${router.names().join(",")}, threshold=${config.qualityThreshold}, ` +
        `maxRetries=${config.maxRetries}, maxConcurrency=${config.maxConcurrency})`
    );

    // ------------------------------------------------------------
    // PARSE
    // ------------------------------------------------------------
    if (signal.aborted) throw new Error("Cancelled");
    const format: DocumentFormat = input.format;
    const sections = await runStep("PARSE", async () => {
      const parsed = await parseSections(document, format, settings?.parser === "model");
      const analysis = analyzeDocument(document, format, parsed);
      const validation = validateSections(parsed);
      for (const w of validation.warnings) runs.log(runId, `Document warning: ${w.sectionTitle}: ${w.message}`, "PARSE");
      await writeJsonArtifact("PARSE", "document.json", { filename, format, sections: parsed, analysis, validation });
      runs.log(runId, `Parsed ${parsed.length} section(s)`, "PARSE");
      return { parsed, language: analysis.language };
    });

    const hintsBase = {
      ...DEFAULT_CONTEXT_HINTS,
      language: settings?.language ?? sections.language,
      ...(settings?.targetAudience ? { targetAudience: settings.targetAudience } : {}),
      ...(settings?.presentationStyle ? { presentationStyle: settings.presentationStyle } : {}),
      ...(settings?.maxBulletPoints ? { maxBulletPoints: settings.maxBulletPoints } : {}),
      documentFilename: filename
    };

    const warnings: string[] = [];

    // ------------------------------------------------------------
    // SLIDES
    // ------------------------------------------------------------
    const assembled: AssembledSlides = await runStep("SLIDES", async () => {
      const outcomes = await generateSlides(sections.parsed, {
        router,
        boundary: boundaryFor("SLIDES"),
        config,
        maxConcurrency: config.maxConcurrency,
        hintsFor: (_section, index): SlideContextHints => ({
          ...hintsBase,
          totalSections: sections.parsed.length,
          currentSectionIndex: index
        }),
        onOutcome: async (outcome: SectionOutcome) => {
          const draft = outcome.status === "failed" ? outcome.failure.fallbackDraft : outcome.draft;
          await writeJsonArtifact("SLIDES", slideArtifactName(outcome.section.order), {
            status: outcome.status,
            section: outcome.section,
            draft,
            attempts: outcome.attempts,
            provider: outcome.provider,
            fallbackUsed: outcome.fallbackUsed,
            ...(outcome.status === "failed"
              ? { reason: outcome.failure.reason, errorKind: outcome.failure.errorKind }
              : outcome.note
                ? { note: outcome.note }
                : {})
          });
        },
        onWarning: (message) => {
          warnings.push(message);
          runs.log(runId, message, "SLIDES");
        }
      });
      const out = assembleSlides(outcomes);
      runs.log(
        runId,
        `Slides ready: ${out.slides.length} accepted, ${out.failedSections.length} failed`,
        "SLIDES"
      );
      return out;
    });

    // ------------------------------------------------------------
    // NARRATION
    // ------------------------------------------------------------
    const cancelledBeforeNarration = signal.aborted;
    const narration: NarrationEntry[] = cancelledBeforeNarration
      ? []
      : await runStep("NARRATION", async () =>
          generateNarrations(
            assembled.slides.map((slide) => ({ draft: slide, provider: slide.provider })),
            {
              router,
              boundary: boundaryFor("NARRATION"),
              maxConcurrency: config.maxConcurrency,
              hintsFor: (_draft, index) => ({ ...hintsBase, totalSections: assembled.slides.length, currentSectionIndex: index }),
              onWarning: (message) => {
                warnings.push(message);
                runs.log(runId, message, "NARRATION");
              }
            }
          )
        );

    // ------------------------------------------------------------
    // ASSEMBLE
    // ------------------------------------------------------------
    const cancelled = signal.aborted;
    const result = await runStep("ASSEMBLE", async () => {
      const built = buildRunResult({
        title: filename,
        assembled,
        narration,
        costEstimate: ledger.snapshot(),
        warnings,
        cancelled
      });
      await writeJsonArtifact("ASSEMBLE", "presentation.json", presentationDocument(built));
      await writeTextArtifact("ASSEMBLE", "narration.txt", buildTranscript(built.narration));
      await writeJsonArtifact("ASSEMBLE", "report.json", buildReport(built));
      await writeTextArtifact("ASSEMBLE", "summary.txt", formatSummary(built));
      return built;
    });

    await runs.setResult(runId, {
      outcome: result.outcome,
      cancelled: result.cancelled,
      slides: result.slides.length,
      passed: result.slides.filter((s) => s.status === "passed").length,
      bestEffort: result.slides.filter((s) => s.status === "best_effort").length,
      failedSections: result.failedSections.length,
      overallQualityScore: result.overallQualityScore,
      costUsd: result.costEstimate.totalUsd
    });

    if (cancelled) throw new Error("Cancelled");
    runs.log(runId, `Pipeline finished: ${result.outcome}`);
  };
}
