import type { SlideDraft } from "./schemas.js";

export type NarrationEntry = {
  slideNumber: number;
  slideTitle: string;
  text: string;
  estimatedDurationSeconds: number;
  provider: string | null;
  /** True when the built-in text replaced a model narration. */
  fallback: boolean;
};

const WORDS_PER_MINUTE = 150;
const CJK_CHARS_PER_MINUTE = 200;
const MIN_SECONDS = 15;
const MAX_SECONDS = 180;
const NOTES_EXCERPT_CHARS = 100;
const FALLBACK_POINTS = 3;

/** Reading time in seconds, clamped to [15, 180]; an empty text takes no time. */
export function estimateNarrationSeconds(text: string): number {
  const trimmed = text.trim();
  if (trimmed.length === 0) return 0;

  const cjk = trimmed.match(/[一-鿿]/g)?.length ?? 0;
  const seconds =
    cjk > trimmed.length * 0.3
      ? (trimmed.length / CJK_CHARS_PER_MINUTE) * 60
      : (trimmed.split(/\s+/).length / WORDS_PER_MINUTE) * 60;

  return Math.round(Math.max(MIN_SECONDS, Math.min(MAX_SECONDS, seconds)) * 10) / 10;
}

export function fallbackNarration(draft: SlideDraft): string {
  const parts = [`Now let's look at ${draft.title}.`];
  const points = draft.bullets.slice(0, FALLBACK_POINTS);
  if (points.length > 0) {
    parts.push("The main points are:");
    points.forEach((p, i) => parts.push(`${i + 1}. ${p}`));
  }
  const notes = draft.speakerNotes.trim();
  if (notes.length > 0) {
    const excerpt = notes.length > NOTES_EXCERPT_CHARS ? `${notes.slice(0, NOTES_EXCERPT_CHARS)}...` : notes;
    parts.push(`More specifically, ${excerpt}`);
  }
  return parts.join(" ");
}

export function narrationEntry(draft: SlideDraft, text: string, provider: string | null, fallback: boolean): NarrationEntry {
  return {
    slideNumber: draft.slideNumber,
    slideTitle: draft.title,
    text,
    estimatedDurationSeconds: estimateNarrationSeconds(text),
    provider,
    fallback
  };
}

/** Opening line, one block per slide in slide order, closing line. */
export function buildTranscript(entries: readonly NarrationEntry[]): string {
  const lines = ["Hello everyone, and welcome.", "Today I will walk you through the following material.", ""];
  for (const entry of [...entries].sort((a, b) => a.slideNumber - b.slideNumber)) {
    lines.push(`[Slide ${entry.slideNumber}] ${entry.slideTitle}`, entry.text, "");
  }
  lines.push("That brings us to the end of today's presentation.", "Thank you for listening!");
  return lines.join("\n");
}

export function totalDurationSeconds(entries: readonly NarrationEntry[]): number {
  return Math.round(entries.reduce((acc, e) => acc + e.estimatedDurationSeconds, 0) * 10) / 10;
}
