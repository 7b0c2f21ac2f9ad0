import { describe, expect, it } from "vitest";
import { assembleSlides, buildReport, buildRunResult, formatSummary } from "../src/pipeline/assembly.js";
import { CostLedger } from "../src/pipeline/cost.js";
import type { NarrationEntry } from "../src/pipeline/narration.js";
import { syntheticFallbackDraft, type SectionOutcome } from "../src/pipeline/quality_loop.js";
import { draftFor, makeSection, scoreOf } from "./stub_provider.js";

const intro = makeSection(0, "Intro");
const costs = makeSection(1, "Costs");
const plan = makeSection(2, "Plan");

const passed: SectionOutcome = {
  status: "passed",
  section: intro,
  draft: draftFor(intro),
  score: scoreOf(0.9),
  attempts: [{ attemptIndex: 0, draft: draftFor(intro), score: scoreOf(0.9) }],
  provider: "a",
  fallbackUsed: false
};

const failed: SectionOutcome = {
  status: "failed",
  section: costs,
  failure: {
    section: costs,
    reason: "b.generateSlide failed (network): down",
    errorKind: "network",
    fallbackDraft: syntheticFallbackDraft(costs)
  },
  attempts: [],
  provider: "b",
  fallbackUsed: true
};

const bestEffort: SectionOutcome = {
  status: "best_effort",
  section: plan,
  draft: draftFor(plan),
  score: scoreOf(0.6),
  attempts: [
    { attemptIndex: 0, draft: draftFor(plan), score: scoreOf(0.5) },
    { attemptIndex: 1, draft: draftFor(plan), score: scoreOf(0.6) }
  ],
  provider: "a",
  fallbackUsed: false,
  note: "Stopped early: x"
};

const narration: NarrationEntry[] = [
  { slideNumber: 2, slideTitle: "Plan", text: "Plan narration.", estimatedDurationSeconds: 60, provider: "a", fallback: false },
  { slideNumber: 1, slideTitle: "Intro", text: "Intro narration.", estimatedDurationSeconds: 15, provider: "a", fallback: false }
];

describe("assembly", () => {
  it("orders by section and numbers accepted slides consecutively", () => {
    const assembled = assembleSlides([bestEffort, failed, passed]);

    expect(assembled.slides.map((s) => [s.title, s.slideNumber, s.order, s.status])).toEqual([
      ["Intro", 1, 0, "passed"],
      ["Plan", 2, 2, "best_effort"]
    ]);
    expect(assembled.slides[1]?.note).toBe("Stopped early: x");
    expect(assembled.slides[0]).not.toHaveProperty("note");
    expect(assembled.failedSections.map((f) => f.section.title)).toEqual(["Costs"]);
    expect(assembled.sectionReports).toEqual([
      { order: 0, title: "Intro", status: "passed", attempts: 1, finalScore: 0.9, provider: "a", fallbackUsed: false, slideNumber: 1 },
      {
        order: 1,
        title: "Costs",
        status: "failed",
        attempts: 0,
        finalScore: null,
        provider: "b",
        fallbackUsed: true,
        slideNumber: null,
        reason: "b.generateSlide failed (network): down"
      },
      {
        order: 2,
        title: "Plan",
        status: "best_effort",
        attempts: 2,
        finalScore: 0.6,
        provider: "a",
        fallbackUsed: false,
        slideNumber: 2,
        reason: "Stopped early: x"
      }
    ]);
  });

  it("collects warnings and completes with warnings when anything fell short", () => {
    const result = buildRunResult({
      title: "Deck",
      assembled: assembleSlides([passed, failed, bestEffort]),
      narration,
      costEstimate: new CostLedger().snapshot(),
      warnings: ["extra"]
    });

    expect(result.outcome).toBe("completed_with_warnings");
    expect(result.cancelled).toBe(false);
    expect(result.warnings).toEqual([
      'Slide 2 "Plan" is best effort (overall 0.6)',
      'Section "Costs" failed: b.generateSlide failed (network): down',
      "extra"
    ]);
    expect(result.narration.map((n) => n.slideNumber)).toEqual([1, 2]);
    expect(result.totalNarrationSeconds).toBe(75);
    expect(result.overallQualityScore).toBe(0.75);
  });

  it("completes cleanly when every section passed", () => {
    const result = buildRunResult({
      title: "Deck",
      assembled: assembleSlides([passed]),
      narration: [],
      costEstimate: new CostLedger().snapshot()
    });
    expect(result.outcome).toBe("completed");
    expect(result.warnings).toEqual([]);
  });

  it("summarizes totals and quality in the report", () => {
    const report = buildReport(
      buildRunResult({
        title: "Deck",
        assembled: assembleSlides([passed, failed, bestEffort]),
        narration,
        costEstimate: new CostLedger().snapshot()
      })
    );

    expect(report.totals).toEqual({ sections: 3, slides: 2, passed: 1, bestEffort: 1, failed: 1 });
    expect(report.qualityAnalysis.passRate).toBe(0.5);
    expect(report.sections).toHaveLength(3);
  });

  it("formats a human-readable summary", () => {
    const result = buildRunResult({
      title: "Deck",
      assembled: assembleSlides([passed, failed, bestEffort]),
      narration,
      costEstimate: new CostLedger().snapshot(),
      warnings: ["extra"]
    });

    expect(formatSummary(result)).toBe(
      [
        "Presentation: Deck",
        "Outcome: completed_with_warnings",
        "Slides: 2 (1 passed, 1 best effort); failed sections: 1",
        "Overall quality: 0.75",
        "Estimated narration: 1m 15s",
        "Estimated cost: $0.000000 (0 calls, 0 tokens)",
        "",
        "Passed slides:",
        "  1. Intro (0.9)",
        "",
        "Best-effort slides (review before presenting):",
        "  2. Plan (0.6) - Stopped early: x",
        "",
        "Failed sections:",
        "  - Costs: b.generateSlide failed (network): down",
        "",
        "Warnings:",
        '  - Slide 2 "Plan" is best effort (overall 0.6)',
        '  - Section "Costs" failed: b.generateSlide failed (network): down',
        "  - extra"
      ].join("\n")
    );
  });

  it("marks cancelled runs in the summary", () => {
    const result = buildRunResult({
      title: "Deck",
      assembled: assembleSlides([passed]),
      narration: [],
      costEstimate: new CostLedger().snapshot(),
      cancelled: true
    });
    const lines = formatSummary(result).split("\n");
    expect(lines[1]).toBe("Outcome: completed (cancelled)");
    expect(lines[4]).toBe("Estimated narration: 0s");
    expect(lines[lines.length - 1]).toBe("  1. Intro (0.9)");
  });
});
