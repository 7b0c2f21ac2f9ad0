import type { CostEstimate } from "./cost.js";
import { totalDurationSeconds, type NarrationEntry } from "./narration.js";
import { analyzeQuality, meanOverall, type QualityAnalysis } from "./quality.js";
import type { SectionFailure, SectionOutcome } from "./quality_loop.js";
import type { QualityScore, SlideDraft } from "./schemas.js";

export type SlideStatus = "passed" | "best_effort";

export type FinalSlide = SlideDraft & {
  order: number;
  status: SlideStatus;
  score: QualityScore;
  attempts: number;
  provider: string;
  fallbackUsed: boolean;
  note?: string;
};

export type SectionReport = {
  order: number;
  title: string;
  status: SlideStatus | "failed";
  attempts: number;
  finalScore: number | null;
  provider: string | null;
  fallbackUsed: boolean;
  slideNumber: number | null;
  reason?: string;
};

export type AssembledSlides = {
  slides: FinalSlide[];
  failedSections: SectionFailure[];
  sectionReports: SectionReport[];
};

export type RunOutcome = "completed" | "completed_with_warnings";

export type RunResult = AssembledSlides & {
  title: string;
  narration: NarrationEntry[];
  totalNarrationSeconds: number;
  overallQualityScore: number;
  costEstimate: CostEstimate;
  outcome: RunOutcome;
  warnings: string[];
  cancelled: boolean;
};

/** Orders outcomes by section and numbers the accepted slides consecutively from 1. */
export function assembleSlides(outcomes: readonly SectionOutcome[]): AssembledSlides {
  const ordered = [...outcomes].sort((a, b) => a.section.order - b.section.order);
  const slides: FinalSlide[] = [];
  const failedSections: SectionFailure[] = [];
  const sectionReports: SectionReport[] = [];

  for (const outcome of ordered) {
    if (outcome.status === "failed") {
      failedSections.push(outcome.failure);
      sectionReports.push({
        order: outcome.section.order,
        title: outcome.section.title,
        status: "failed",
        attempts: outcome.attempts.length,
        finalScore: null,
        provider: outcome.provider,
        fallbackUsed: outcome.fallbackUsed,
        slideNumber: null,
        reason: outcome.failure.reason
      });
      continue;
    }

    const slideNumber = slides.length + 1;
    slides.push({
      ...outcome.draft,
      slideNumber,
      order: outcome.section.order,
      status: outcome.status,
      score: outcome.score,
      attempts: outcome.attempts.length,
      provider: outcome.provider,
      fallbackUsed: outcome.fallbackUsed,
      ...(outcome.note ? { note: outcome.note } : {})
    });
    sectionReports.push({
      order: outcome.section.order,
      title: outcome.section.title,
      status: outcome.status,
      attempts: outcome.attempts.length,
      finalScore: outcome.score.overall,
      provider: outcome.provider,
      fallbackUsed: outcome.fallbackUsed,
      slideNumber,
      ...(outcome.note ? { reason: outcome.note } : {})
    });
  }

  return { slides, failedSections, sectionReports };
}

export function buildRunResult(args: {
  title: string;
  assembled: AssembledSlides;
  narration: readonly NarrationEntry[];
  costEstimate: CostEstimate;
  warnings?: readonly string[];
  cancelled?: boolean;
}): RunResult {
  const { assembled } = args;
  const warnings = [
    ...assembled.slides
      .filter((s) => s.status === "best_effort")
      .map((s) => `Slide ${s.slideNumber} "${s.title}" is best effort (overall ${s.score.overall})`),
    ...assembled.failedSections.map((f) => `Section "${f.section.title}" failed: ${f.reason}`),
    ...(args.warnings ?? [])
  ];
  const narration = [...args.narration].sort((a, b) => a.slideNumber - b.slideNumber);

  return {
    title: args.title,
    ...assembled,
    narration,
    totalNarrationSeconds: totalDurationSeconds(narration),
    overallQualityScore: meanOverall(assembled.slides.map((s) => s.score)),
    costEstimate: args.costEstimate,
    outcome: warnings.length > 0 ? "completed_with_warnings" : "completed",
    warnings,
    cancelled: args.cancelled ?? false
  };
}

export type RunReport = {
  title: string;
  outcome: RunOutcome;
  cancelled: boolean;
  totals: {
    sections: number;
    slides: number;
    passed: number;
    bestEffort: number;
    failed: number;
  };
  overallQualityScore: number;
  totalNarrationSeconds: number;
  sections: SectionReport[];
  qualityAnalysis: QualityAnalysis;
  costEstimate: CostEstimate;
  warnings: string[];
};

export function buildReport(result: RunResult): RunReport {
  const passed = result.slides.filter((s) => s.status === "passed").length;
  return {
    title: result.title,
    outcome: result.outcome,
    cancelled: result.cancelled,
    totals: {
      sections: result.sectionReports.length,
      slides: result.slides.length,
      passed,
      bestEffort: result.slides.length - passed,
      failed: result.failedSections.length
    },
    overallQualityScore: result.overallQualityScore,
    totalNarrationSeconds: result.totalNarrationSeconds,
    sections: result.sectionReports,
    qualityAnalysis: analyzeQuality(result.slides.map((s) => ({ slideNumber: s.slideNumber, title: s.title, score: s.score }))),
    costEstimate: result.costEstimate,
    warnings: result.warnings
  };
}

function formatDuration(seconds: number): string {
  const total = Math.round(seconds);
  const m = Math.floor(total / 60);
  const s = total % 60;
  return m > 0 ? `${m}m ${s}s` : `${s}s`;
}

export function formatSummary(result: RunResult): string {
  const passed = result.slides.filter((s) => s.status === "passed");
  const bestEffort = result.slides.filter((s) => s.status === "best_effort");
  const cost = result.costEstimate;

  const lines = [
    `Presentation: ${result.title}`,
    `Outcome: ${result.outcome}${result.cancelled ? " (cancelled)" : ""}`,
    `Slides: ${result.slides.length} (${passed.length} passed, ${bestEffort.length} best effort); failed sections: ${result.failedSections.length}`,
    `Overall quality: ${result.overallQualityScore}`,
    `Estimated narration: ${formatDuration(result.totalNarrationSeconds)}`,
    `Estimated cost: $${cost.totalUsd.toFixed(6)} (${cost.totalCalls} calls, ${cost.totalTokens} tokens)`,
    ""
  ];

  if (passed.length > 0) {
    lines.push("Passed slides:");
    for (const s of passed) lines.push(`  ${s.slideNumber}. ${s.title} (${s.score.overall})`);
    lines.push("");
  }
  if (bestEffort.length > 0) {
    lines.push("Best-effort slides (review before presenting):");
    for (const s of bestEffort) lines.push(`  ${s.slideNumber}. ${s.title} (${s.score.overall})${s.note ? ` - ${s.note}` : ""}`);
    lines.push("");
  }
  if (result.failedSections.length > 0) {
    lines.push("Failed sections:");
    for (const f of result.failedSections) lines.push(`  - ${f.section.title}: ${f.reason}`);
    lines.push("");
  }
  if (result.warnings.length > 0) {
    lines.push("Warnings:");
    for (const w of result.warnings) lines.push(`  - ${w}`);
  }

  return lines.join("\n").trimEnd();
}
