import { CostLedger } from "../src/pipeline/cost.js";
import type { CallBoundary } from "../src/pipeline/provider_call.js";
import type { ProviderCallContext, SlideProvider } from "../src/pipeline/providers/types.js";
import { makeQualityScore } from "../src/pipeline/quality.js";
import { DEFAULT_CONTEXT_HINTS, type QualityScore, type Section, type SlideContextHints, type SlideDraft } from "../src/pipeline/schemas.js";

// Scripted adapter doubles shared by the loop, scheduler and pipeline tests.

export type StubBehaviour = {
  parseToSections?: (documentText: string, ctx: ProviderCallContext) => Promise<Section[]>;
  generateSlide?: (section: Section, hints: SlideContextHints, ctx: ProviderCallContext) => Promise<SlideDraft>;
  scoreSlide?: (draft: SlideDraft, section: Section, threshold: number, ctx: ProviderCallContext) => Promise<QualityScore>;
  optimizeSlide?: (draft: SlideDraft, score: QualityScore, section: Section, ctx: ProviderCallContext) => Promise<SlideDraft>;
  generateNarration?: (draft: SlideDraft, hints: SlideContextHints, ctx: ProviderCallContext) => Promise<string>;
};

export function makeSection(order: number, title = `Section ${order + 1}`, body = `Body of ${title}.`): Section {
  return { title, body, level: 1, order };
}

export function draftFor(section: Section): SlideDraft {
  return {
    title: section.title,
    bullets: [`${section.title} point`],
    speakerNotes: "",
    slideNumber: section.order + 1,
    sourceSection: section.title
  };
}

export function scoreOf(overall: number, threshold = 0.8, issues: string[] = []): QualityScore {
  return makeQualityScore({ accuracy: overall, coherence: overall, clarity: overall, completeness: overall }, threshold, {
    issues,
    feedback: `scored ${overall}`
  });
}

/** Score callback that hands out `overalls` in order, repeating the last one. */
export function scoreSequence(overalls: number[]): StubBehaviour["scoreSlide"] {
  let i = 0;
  return async (_draft, _section, threshold) => {
    const overall = overalls[Math.min(i, overalls.length - 1)] ?? 0;
    i += 1;
    return scoreOf(overall, threshold);
  };
}

export class StubProvider implements SlideProvider {
  readonly usdPer1kTokens: number;
  readonly calls: string[] = [];

  constructor(
    readonly name: string,
    private readonly behaviour: StubBehaviour = {},
    usdPer1kTokens = 0
  ) {
    this.usdPer1kTokens = usdPer1kTokens;
  }

  async parseToSections(documentText: string, ctx: ProviderCallContext): Promise<Section[]> {
    this.calls.push("parseToSections");
    if (!this.behaviour.parseToSections) throw new Error("parseToSections not scripted");
    return this.behaviour.parseToSections(documentText, ctx);
  }

  async generateSlide(section: Section, hints: SlideContextHints, ctx: ProviderCallContext): Promise<SlideDraft> {
    this.calls.push(`generateSlide:${section.order}`);
    return this.behaviour.generateSlide ? this.behaviour.generateSlide(section, hints, ctx) : draftFor(section);
  }

  async scoreSlide(draft: SlideDraft, section: Section, threshold: number, ctx: ProviderCallContext): Promise<QualityScore> {
    this.calls.push(`scoreSlide:${section.order}`);
    return this.behaviour.scoreSlide ? this.behaviour.scoreSlide(draft, section, threshold, ctx) : scoreOf(0.9, threshold);
  }

  async optimizeSlide(draft: SlideDraft, score: QualityScore, section: Section, ctx: ProviderCallContext): Promise<SlideDraft> {
    this.calls.push(`optimizeSlide:${section.order}`);
    return this.behaviour.optimizeSlide
      ? this.behaviour.optimizeSlide(draft, score, section, ctx)
      : { ...draft, bullets: [...draft.bullets, "refined"] };
  }

  async generateNarration(draft: SlideDraft, hints: SlideContextHints, ctx: ProviderCallContext): Promise<string> {
    this.calls.push(`generateNarration:${draft.slideNumber}`);
    return this.behaviour.generateNarration ? this.behaviour.generateNarration(draft, hints, ctx) : `Narration for ${draft.title}.`;
  }
}

export function hintsFor(section: Section, total = 1): SlideContextHints {
  return { ...DEFAULT_CONTEXT_HINTS, documentFilename: "deck.md", totalSections: total, currentSectionIndex: section.order };
}

export function makeBoundary(overrides?: Partial<CallBoundary>): CallBoundary & { logs: string[] } {
  const logs: string[] = [];
  return {
    signal: new AbortController().signal,
    timeoutMs: 1000,
    ledger: new CostLedger(),
    log: (message) => logs.push(message),
    ...overrides,
    logs
  };
}

export function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}

/** Never settles on its own; rejects once the call context is aborted. */
export function untilAborted(ctx: ProviderCallContext): Promise<never> {
  return new Promise<never>((_resolve, reject) => {
    if (ctx.signal.aborted) {
      reject(new Error("aborted"));
      return;
    }
    ctx.signal.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
  });
}
