import { z } from "zod";

export const SectionSchema = z.object({
  title: z.string(),
  body: z.string(),
  level: z.number().int().min(1).max(6),
  order: z.number().int().min(0),
  parentTitle: z.string().optional()
});

export const SlideDraftSchema = z.object({
  title: z.string().min(1),
  bullets: z.array(z.string()),
  speakerNotes: z.string(),
  slideNumber: z.number().int().min(1),
  sourceSection: z.string()
});

const UnitIntervalSchema = z.number().min(0).max(1);

export const QualityScoreSchema = z.object({
  accuracy: UnitIntervalSchema,
  coherence: UnitIntervalSchema,
  clarity: UnitIntervalSchema,
  completeness: UnitIntervalSchema,
  overall: UnitIntervalSchema,
  issues: z.array(z.string()),
  feedback: z.string(),
  passed: z.boolean()
});

export type Section = Readonly<z.infer<typeof SectionSchema>>;
export type SlideDraft = Readonly<z.infer<typeof SlideDraftSchema>>;
export type QualityScore = Readonly<z.infer<typeof QualityScoreSchema>>;

/** Hints handed to every generation call; never used for scoring. */
export type SlideContextHints = {
  documentFilename: string;
  totalSections: number;
  currentSectionIndex: number;
  targetAudience: string;
  presentationStyle: string;
  language: string;
  maxBulletPoints: number;
  maxTitleLength: number;
};

export const DEFAULT_CONTEXT_HINTS: Omit<SlideContextHints, "documentFilename" | "totalSections" | "currentSectionIndex"> = {
  targetAudience: "professional",
  presentationStyle: "informative",
  language: "en-US",
  maxBulletPoints: 6,
  maxTitleLength: 60
};

// ------------------------------------------------------------
// Model output shapes (snake_case, as the prompts request them)
// ------------------------------------------------------------

export const SlideOutputSchema = z.object({
  title: z.string().min(1),
  bullet_points: z.array(z.string().min(1)).min(1),
  speaker_notes: z.string()
});

export const QualityOutputSchema = z.object({
  accuracy_score: UnitIntervalSchema,
  coherence_score: UnitIntervalSchema,
  clarity_score: UnitIntervalSchema,
  completeness_score: UnitIntervalSchema,
  feedback: z.string(),
  issues: z.array(z.string())
});

export const SectionsOutputSchema = z.object({
  sections: z
    .array(
      z.object({
        title: z.string().min(1),
        content: z.string(),
        level: z.number().int().min(1).max(6)
      })
    )
    .min(1)
});

export const NarrationOutputSchema = z.object({
  narration: z.string().min(1)
});

export type SlideOutput = z.infer<typeof SlideOutputSchema>;
export type QualityOutput = z.infer<typeof QualityOutputSchema>;
export type SectionsOutput = z.infer<typeof SectionsOutputSchema>;
export type NarrationOutput = z.infer<typeof NarrationOutputSchema>;
