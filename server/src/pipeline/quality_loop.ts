import type { GenerationConfig } from "./config.js";
import { NoProviderAvailableError, ProviderError, type ProviderErrorKind, type ProviderOperation } from "./errors.js";
import { callProvider, type CallBoundary } from "./provider_call.js";
import type { ProviderCallContext, SlideProvider } from "./providers/types.js";
import { gradeQualityScore, pickBestAttempt, type AttemptRecord } from "./quality.js";
import type { ProviderRouter } from "./router.js";
import type { QualityScore, Section, SlideContextHints, SlideDraft } from "./schemas.js";
import { toErrorMessage } from "./utils.js";

export type FailureKind = ProviderErrorKind | "no_provider" | "internal";

export type SectionFailure = {
  section: Section;
  reason: string;
  errorKind: FailureKind;
  fallbackDraft: SlideDraft;
};

export type AcceptedOutcome = {
  status: "passed" | "best_effort";
  section: Section;
  draft: SlideDraft;
  score: QualityScore;
  attempts: AttemptRecord[];
  provider: string;
  fallbackUsed: boolean;
  /** Set when the loop stopped early on an unrecoverable error. */
  note?: string;
};

export type FailedOutcome = {
  status: "failed";
  section: Section;
  failure: SectionFailure;
  attempts: AttemptRecord[];
  provider: string | null;
  fallbackUsed: boolean;
};

export type SectionOutcome = AcceptedOutcome | FailedOutcome;

export type LoopDeps = {
  router: ProviderRouter;
  boundary: CallBoundary;
  config: Pick<GenerationConfig, "qualityThreshold" | "maxRetries">;
};

const FALLBACK_BULLETS = 5;

export function draftText(draft: SlideDraft): string {
  return [draft.title, ...draft.bullets, draft.speakerNotes].join("\n");
}

/** Placeholder slide for a section that could not be generated. */
export function syntheticFallbackDraft(section: Section): SlideDraft {
  return {
    title: section.title.trim() || `Section ${section.order + 1}`,
    bullets: section.body
      .split("\n")
      .map((line) => line.trim())
      .filter((line) => line.length > 0)
      .slice(0, FALLBACK_BULLETS),
    speakerNotes: "",
    slideNumber: section.order + 1,
    sourceSection: section.title
  };
}

export function failedOutcome(
  section: Section,
  reason: string,
  errorKind: FailureKind,
  extra?: { attempts?: AttemptRecord[]; provider?: string | null; fallbackUsed?: boolean }
): FailedOutcome {
  return {
    status: "failed",
    section,
    failure: { section, reason, errorKind, fallbackDraft: syntheticFallbackDraft(section) },
    attempts: extra?.attempts ?? [],
    provider: extra?.provider ?? null,
    fallbackUsed: extra?.fallbackUsed ?? false
  };
}

/**
 * Drives one section from generation to an accepted slide:
 * GENERATING -> SCORING -> (ACCEPTED | OPTIMIZING -> SCORING ...) -> ACCEPTED | EXHAUSTED.
 *
 * One provider fallback is allowed per section, shared by every operation. Exhausting the attempt
 * budget yields the best-scoring attempt rather than a failure.
 */
export async function runSectionLoop(
  section: Section,
  hints: SlideContextHints,
  provider: SlideProvider,
  deps: LoopDeps
): Promise<SectionOutcome> {
  const { router, boundary, config } = deps;
  const maxAttempts = config.maxRetries + 1;
  const attempts: AttemptRecord[] = [];
  const label = `Section ${section.order + 1} "${section.title}"`;
  const log = (message: string) => boundary.log(`${label}: ${message}`);
  const sectionBoundary: CallBoundary = { ...boundary, log };

  let current = provider;
  let fallbackUsed = false;

  const withFallback = async <T>(
    operation: ProviderOperation,
    inputText: string,
    outputText: (result: T) => string,
    invoke: (p: SlideProvider, ctx: ProviderCallContext) => Promise<T>
  ): Promise<T> => {
    const attempt = (p: SlideProvider) =>
      callProvider({ provider: p, operation, boundary: sectionBoundary, inputText, outputText, invoke: (ctx) => invoke(p, ctx) });

    try {
      return await attempt(current);
    } catch (err) {
      if (!(err instanceof ProviderError) || boundary.signal.aborted) throw err;
      log(err.message);
      if (err.kind === "auth") router.markUnhealthy(current.name, err.message);
      if (fallbackUsed) throw err;

      let alternate: SlideProvider;
      try {
        alternate = router.fallbackFor(current.name);
      } catch (selectErr) {
        if (selectErr instanceof NoProviderAvailableError) throw err;
        throw selectErr;
      }

      fallbackUsed = true;
      log(`Falling back from ${current.name} to ${alternate.name}`);
      current = alternate;
      return await attempt(current);
    }
  };

  const bestEffort = (note?: string): SectionOutcome => {
    const best = pickBestAttempt(attempts);
    if (!best) return failedOutcome(section, note ?? "No attempts recorded", "internal", { provider: current.name, fallbackUsed });
    log(`Accepting best effort from attempt ${best.attemptIndex + 1} (overall ${best.score.overall})`);
    return {
      status: "best_effort",
      section,
      draft: best.draft,
      score: best.score,
      attempts,
      provider: current.name,
      fallbackUsed,
      ...(note ? { note } : {})
    };
  };

  try {
    let draft = await withFallback("generateSlide", `${section.title}\n${section.body}`, draftText, (p, ctx) =>
      p.generateSlide(section, hints, ctx)
    );

    for (;;) {
      const scoringDraft = draft;
      const raw = await withFallback(
        "scoreSlide",
        `${section.body}\n${draftText(scoringDraft)}`,
        (s: QualityScore) => `${s.feedback}\n${s.issues.join("\n")}`,
        (p, ctx) => p.scoreSlide(scoringDraft, section, config.qualityThreshold, ctx)
      );
      const score = gradeQualityScore(raw, config.qualityThreshold);
      attempts.push({ attemptIndex: attempts.length, draft: scoringDraft, score });
      log(`Attempt ${attempts.length}/${maxAttempts} scored ${score.overall} (${score.passed ? "passed" : "below threshold"})`);

      if (score.passed) {
        return { status: "passed", section, draft: scoringDraft, score, attempts, provider: current.name, fallbackUsed };
      }
      if (attempts.length >= maxAttempts) return bestEffort();

      draft = await withFallback(
        "optimizeSlide",
        `${section.body}\n${draftText(scoringDraft)}\n${score.issues.join("\n")}`,
        draftText,
        (p, ctx) => p.optimizeSlide(scoringDraft, score, section, ctx)
      );
    }
  } catch (err) {
    if (boundary.signal.aborted) {
      log("Cancelled");
      return failedOutcome(section, "Cancelled", "cancelled", { attempts, provider: current.name, fallbackUsed });
    }

    const reason = toErrorMessage(err);
    const kind: FailureKind = err instanceof ProviderError ? err.kind : "internal";
    if (attempts.length > 0) return bestEffort(`Stopped early: ${reason}`);

    log(`Failed: ${reason}`);
    return failedOutcome(section, reason, kind, { attempts, provider: current.name, fallbackUsed });
  }
}
