import type { QualityOutput, QualityScore, SlideDraft } from "./schemas.js";

export const QUALITY_DIMENSIONS = ["accuracy", "coherence", "clarity", "completeness"] as const;
export type QualityDimension = (typeof QUALITY_DIMENSIONS)[number];

export type QualityDimensions = Record<QualityDimension, number>;

export type AttemptRecord = {
  attemptIndex: number;
  draft: SlideDraft;
  score: QualityScore;
};

const LOW_DIMENSION_THRESHOLD = 0.7;
const LOW_OVERALL_THRESHOLD = 0.6;
const SUGGESTION_SHARE = 0.3;

function clampUnit(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

function round4(value: number): number {
  return Math.round(value * 10_000) / 10_000;
}

export function overallFromDimensions(dims: QualityDimensions): number {
  const sum = QUALITY_DIMENSIONS.reduce((acc, key) => acc + clampUnit(dims[key]), 0);
  return round4(sum / QUALITY_DIMENSIONS.length);
}

export function makeQualityScore(
  dims: QualityDimensions,
  threshold: number,
  extra?: { issues?: string[]; feedback?: string }
): QualityScore {
  const overall = overallFromDimensions(dims);
  return {
    accuracy: clampUnit(dims.accuracy),
    coherence: clampUnit(dims.coherence),
    clarity: clampUnit(dims.clarity),
    completeness: clampUnit(dims.completeness),
    overall,
    issues: [...(extra?.issues ?? [])],
    feedback: extra?.feedback ?? "",
    passed: overall >= threshold
  };
}

export function qualityScoreFromOutput(output: QualityOutput, threshold: number): QualityScore {
  return makeQualityScore(
    {
      accuracy: output.accuracy_score,
      coherence: output.coherence_score,
      clarity: output.clarity_score,
      completeness: output.completeness_score
    },
    threshold,
    { issues: output.issues, feedback: output.feedback }
  );
}

/**
 * Re-derives `passed` from `overall` for the run threshold, whatever the adapter reported.
 * Returns the same object when it already agrees.
 */
export function gradeQualityScore(score: QualityScore, threshold: number): QualityScore {
  const passed = score.overall >= threshold;
  return passed === score.passed ? score : { ...score, passed };
}

/** Highest overall wins; ties keep the earliest attempt. */
export function pickBestAttempt(attempts: readonly AttemptRecord[]): AttemptRecord | null {
  let best: AttemptRecord | null = null;
  for (const attempt of attempts) {
    if (!best || attempt.score.overall > best.score.overall) best = attempt;
  }
  return best;
}

export function meanOverall(scores: readonly QualityScore[]): number {
  if (scores.length === 0) return 0;
  return round4(scores.reduce((acc, s) => acc + s.overall, 0) / scores.length);
}

export type ScoredSlideRef = {
  slideNumber: number;
  title: string;
  score: QualityScore;
};

export type QualityIssueEntry = {
  slideNumber: number;
  title: string;
  score: number;
};

export type QualityAnalysis = {
  lowAccuracy: QualityIssueEntry[];
  poorCoherence: QualityIssueEntry[];
  unclearContent: QualityIssueEntry[];
  incompleteInformation: QualityIssueEntry[];
  overallLowQuality: QualityIssueEntry[];
  passRate: number;
  suggestions: string[];
};

const DIMENSION_SUGGESTIONS: Record<QualityDimension, string> = {
  accuracy: "Check the source document for accuracy so key facts carry over to the slides.",
  coherence: "Strengthen the logical links between bullets and between neighbouring slides.",
  clarity: "Simplify wording and structure so each bullet reads at a glance.",
  completeness: "Make sure every slide covers the key information of its section."
};

export function analyzeQuality(slides: readonly ScoredSlideRef[]): QualityAnalysis {
  const entry = (s: ScoredSlideRef): QualityIssueEntry => ({ slideNumber: s.slideNumber, title: s.title, score: s.score.overall });
  const lowOn = (dim: QualityDimension) => slides.filter((s) => s.score[dim] < LOW_DIMENSION_THRESHOLD);

  const suggestions: string[] = [];
  if (slides.length === 0) {
    suggestions.push("No scored slides to analyze.");
  } else {
    for (const dim of QUALITY_DIMENSIONS) {
      if (lowOn(dim).length > slides.length * SUGGESTION_SHARE) suggestions.push(DIMENSION_SUGGESTIONS[dim]);
    }
    if (suggestions.length === 0) suggestions.push("Overall quality is good; keep the current generation settings.");
  }

  const passed = slides.filter((s) => s.score.passed).length;

  return {
    lowAccuracy: lowOn("accuracy").map(entry),
    poorCoherence: lowOn("coherence").map(entry),
    unclearContent: lowOn("clarity").map(entry),
    incompleteInformation: lowOn("completeness").map(entry),
    overallLowQuality: slides.filter((s) => s.score.overall < LOW_OVERALL_THRESHOLD).map(entry),
    passRate: slides.length > 0 ? round4(passed / slides.length) : 0,
    suggestions
  };
}
