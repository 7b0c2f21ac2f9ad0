import { detectFormat, parseDocument } from "../document_parser.js";
import { makeQualityScore } from "../quality.js";
import { DEFAULT_CONTEXT_HINTS, type QualityScore, type Section, type SlideContextHints, type SlideDraft } from "../schemas.js";
import { wait } from "../utils.js";
import type { ProviderCallContext, SlideProvider } from "./types.js";

const MAX_BULLET_CHARS = 140;
const FIRST_DRAFT_BULLETS = 3;

export function fakeCallDelayMsFromEnv(): number {
  const raw = Number(process.env.SLIDESMITH_FAKE_CALL_DELAY_MS ?? 25);
  if (!Number.isFinite(raw) || raw < 0) return 25;
  return Math.min(2000, raw);
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function keywords(text: string): string[] {
  return (text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? []).filter((w) => w.length > 3);
}

function sentencesOf(body: string): string[] {
  return body
    .split("\n")
    .map((line) => line.trim().replace(/^([-*+]|\d+\.)\s+/, ""))
    .flatMap((line) => line.split(/(?<=[.!?])\s+/))
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

function shorten(text: string, max: number): string {
  if (text.length <= max) return text;
  const cut = text.slice(0, max);
  const lastSpace = cut.lastIndexOf(" ");
  return `${(lastSpace > max / 2 ? cut.slice(0, lastSpace) : cut).trim()}...`;
}

/**
 * Offline adapter with deterministic heuristics: first drafts take a few leading sentences of the
 * section, the reviewer rewards keyword coverage and the editor widens coverage.
 */
export class FakeProvider implements SlideProvider {
  readonly name = "fake";
  readonly usdPer1kTokens = 0;

  // Bullet limit of the run that drafted each slide; optimizing keeps within it.
  private readonly bulletCaps = new WeakMap<SlideDraft, number>();

  constructor(private readonly delayMs: number = fakeCallDelayMsFromEnv()) {}

  async parseToSections(documentText: string, ctx: ProviderCallContext): Promise<Section[]> {
    await wait(this.delayMs, ctx.signal);
    return parseDocument(documentText, detectFormat("", documentText));
  }

  async generateSlide(section: Section, hints: SlideContextHints, ctx: ProviderCallContext): Promise<SlideDraft> {
    await wait(this.delayMs, ctx.signal);
    const sentences = sentencesOf(section.body);
    const bullets = sentences.slice(0, Math.min(FIRST_DRAFT_BULLETS, hints.maxBulletPoints));
    const draft: SlideDraft = {
      title: shorten(section.title || "Untitled", hints.maxTitleLength),
      bullets: bullets.length > 0 ? bullets : [section.title],
      speakerNotes: shorten(section.body.replace(/\s+/g, " ").trim(), 400),
      slideNumber: section.order + 1,
      sourceSection: section.title
    };
    this.bulletCaps.set(draft, hints.maxBulletPoints);
    return draft;
  }

  async scoreSlide(draft: SlideDraft, section: Section, threshold: number, ctx: ProviderCallContext): Promise<QualityScore> {
    await wait(this.delayMs, ctx.signal);
    const source = new Set(keywords(`${section.title} ${section.body}`));
    const sectionKeys = [...new Set(keywords(section.body))];
    const slideWords = keywords(draft.bullets.join(" "));
    const slideSet = new Set(slideWords);

    const coverage = sectionKeys.length > 0 ? sectionKeys.filter((k) => slideSet.has(k)).length / sectionKeys.length : 1;
    const support = slideWords.length > 0 ? slideWords.filter((w) => source.has(w)).length / slideWords.length : 0;
    const longest = draft.bullets.reduce((acc, b) => Math.max(acc, b.length), 0);

    const dims = {
      accuracy: round2(0.6 + 0.4 * support),
      coherence: draft.bullets.length >= 2 ? 0.9 : 0.7,
      clarity: longest <= MAX_BULLET_CHARS ? 0.9 : 0.65,
      completeness: round2(0.4 + 0.6 * coverage)
    };

    const issues: string[] = [];
    if (dims.accuracy < 0.8) issues.push("Bullets include wording the section does not support.");
    if (dims.coherence < 0.8) issues.push("Add a second point so the slide has a line of reasoning.");
    if (dims.clarity < 0.8) issues.push(`Shorten bullets to at most ${MAX_BULLET_CHARS} characters.`);
    if (dims.completeness < 0.8) issues.push("Cover more of the section's key points.");

    return makeQualityScore(dims, threshold, {
      issues,
      feedback: issues.length === 0 ? "Slide reflects its section well." : `${issues.length} issue(s) found.`
    });
  }

  async optimizeSlide(draft: SlideDraft, score: QualityScore, section: Section, ctx: ProviderCallContext): Promise<SlideDraft> {
    await wait(this.delayMs, ctx.signal);
    const sentences = sentencesOf(section.body).map((s) => shorten(s, MAX_BULLET_CHARS));
    const wanted = Math.max(draft.bullets.length + 1, FIRST_DRAFT_BULLETS + score.issues.length);
    const cap = this.bulletCaps.get(draft) ?? DEFAULT_CONTEXT_HINTS.maxBulletPoints;
    const bullets = sentences.slice(0, Math.min(wanted, cap));
    const revised: SlideDraft = {
      ...draft,
      bullets: bullets.length > 0 ? bullets : [...draft.bullets]
    };
    this.bulletCaps.set(revised, cap);
    return revised;
  }

  async generateNarration(draft: SlideDraft, _hints: SlideContextHints, ctx: ProviderCallContext): Promise<string> {
    await wait(this.delayMs, ctx.signal);
    const points = draft.bullets.map((b) => b.replace(/[.!?]+$/, "")).join(". ");
    return `Let's look at ${draft.title}. ${points}.`;
  }
}
