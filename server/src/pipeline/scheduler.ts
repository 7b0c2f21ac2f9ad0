import { NoProviderAvailableError, ProviderError } from "./errors.js";
import { fallbackNarration, narrationEntry, type NarrationEntry } from "./narration.js";
import { callProvider } from "./provider_call.js";
import type { SlideProvider } from "./providers/types.js";
import { draftText, failedOutcome, runSectionLoop, type LoopDeps, type SectionOutcome } from "./quality_loop.js";
import type { Section, SlideContextHints, SlideDraft } from "./schemas.js";
import { toErrorMessage } from "./utils.js";

/**
 * Runs `fn` over every item with at most `limit` tasks in flight. Results keep input order.
 * `fn` is expected to settle every item itself; a rejection rejects the whole map.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results: R[] = [];
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next;
      next += 1;
      results[index] = await fn(items[index], index);
    }
  };

  const workers = Array.from({ length: Math.min(Math.max(1, limit), items.length) }, () => worker());
  await Promise.all(workers);
  return results;
}

export type SlideFanOutOptions = LoopDeps & {
  maxConcurrency: number;
  hintsFor: (section: Section, index: number) => SlideContextHints;
  /** Called as each section settles. A rejection is logged and reported as a warning. */
  onOutcome?: (outcome: SectionOutcome) => void | Promise<void>;
  onWarning?: (message: string) => void;
};

/**
 * One quality loop per section under the concurrency limit. The adapter is chosen when the section
 * starts; a section that cannot start is recorded as failed and its siblings carry on.
 */
export async function generateSlides(sections: readonly Section[], options: SlideFanOutOptions): Promise<SectionOutcome[]> {
  const { router, boundary, maxConcurrency } = options;

  const settle = async (section: Section, index: number): Promise<SectionOutcome> => {
    if (boundary.signal.aborted) return failedOutcome(section, "Cancelled", "cancelled");

    let provider: SlideProvider;
    try {
      provider = router.select();
    } catch (err) {
      boundary.log(`Section ${section.order + 1} "${section.title}": ${toErrorMessage(err)}`);
      return failedOutcome(section, toErrorMessage(err), err instanceof NoProviderAvailableError ? "no_provider" : "internal");
    }

    try {
      return await runSectionLoop(section, options.hintsFor(section, index), provider, options);
    } catch (err) {
      return failedOutcome(section, toErrorMessage(err), "internal", { provider: provider.name });
    }
  };

  return mapWithConcurrency(sections, maxConcurrency, async (section, index) => {
    const outcome = await settle(section, index);
    try {
      await options.onOutcome?.(outcome);
    } catch (err) {
      const message = `Section ${section.order + 1} "${section.title}": outcome not recorded (${toErrorMessage(err)})`;
      boundary.log(message);
      options.onWarning?.(message);
    }
    return outcome;
  });
}

export type NarrationJob = {
  draft: SlideDraft;
  /** Adapter that produced the slide; tried first when still healthy. */
  provider: string | null;
};

export type NarrationFanOutOptions = Omit<LoopDeps, "config"> & {
  maxConcurrency: number;
  hintsFor: (draft: SlideDraft, index: number) => SlideContextHints;
  onWarning: (message: string) => void;
};

async function narrateOne(job: NarrationJob, hints: SlideContextHints, options: NarrationFanOutOptions): Promise<NarrationEntry> {
  const { router, boundary } = options;
  const label = `Slide ${job.draft.slideNumber} "${job.draft.title}"`;
  const log = (message: string) => boundary.log(`${label}: ${message}`);
  const fallback = (reason: string): NarrationEntry => {
    options.onWarning(`${label}: narration fell back to built-in text (${reason})`);
    return narrationEntry(job.draft, fallbackNarration(job.draft), null, true);
  };

  if (boundary.signal.aborted) return fallback("Cancelled");

  const call = (provider: SlideProvider) =>
    callProvider({
      provider,
      operation: "generateNarration",
      boundary: { ...boundary, log },
      inputText: draftText(job.draft),
      outputText: (text: string) => text,
      invoke: (ctx) => provider.generateNarration(job.draft, hints, ctx)
    });

  let provider: SlideProvider;
  try {
    provider = router.select(job.provider ?? undefined);
  } catch (err) {
    return fallback(toErrorMessage(err));
  }

  try {
    return narrationEntry(job.draft, await call(provider), provider.name, false);
  } catch (err) {
    if (!(err instanceof ProviderError) || boundary.signal.aborted) return fallback(toErrorMessage(err));
    log(err.message);
    if (err.kind === "auth") router.markUnhealthy(provider.name, err.message);

    let alternate: SlideProvider;
    try {
      alternate = router.fallbackFor(provider.name);
    } catch {
      return fallback(err.message);
    }
    log(`Falling back from ${provider.name} to ${alternate.name}`);
    try {
      return narrationEntry(job.draft, await call(alternate), alternate.name, false);
    } catch (retryErr) {
      return fallback(toErrorMessage(retryErr));
    }
  }
}

/** Narration for every finished slide; no quality gate, one fallback per slide, then built-in text. */
export async function generateNarrations(jobs: readonly NarrationJob[], options: NarrationFanOutOptions): Promise<NarrationEntry[]> {
  return mapWithConcurrency(jobs, options.maxConcurrency, (job, index) => narrateOne(job, options.hintsFor(job.draft, index), options));
}
