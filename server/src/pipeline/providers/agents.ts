import { Agent } from "@openai/agents";
import { NarrationOutputSchema, QualityOutputSchema, SectionsOutputSchema, SlideOutputSchema } from "../schemas.js";

const baseSettings = { temperature: 0.2 };
const reviewSettings = { temperature: 0 };

export function makeSectionParserAgent(model: string) {
  return new Agent({
    name: "Section Parser",
    model,
    modelSettings: reviewSettings,
    tools: [],
    outputType: SectionsOutputSchema,
    instructions: `You are the Section Parser.

You will receive a raw document. Split it into the sections a presenter would turn into slides.

Rules:
- Preserve document order and heading levels.
- Never invent content that is not in the document.
- Return ONLY valid JSON matching the schema with top-level key sections.
- No extra keys.`
  });
}

export function makeSlideWriterAgent(model: string) {
  return new Agent({
    name: "Slide Writer",
    model,
    modelSettings: baseSettings,
    tools: [],
    outputType: SlideOutputSchema,
    instructions: `You are the Slide Writer.

You will receive one document section and presentation context.
Write a single slide: a punchy title, concise bullet points and speaker notes.

Rules:
- Stay faithful to the section; do not add facts it does not support.
- Respect the title length and bullet count limits in the prompt.
- Return ONLY valid JSON matching the schema with keys title, bullet_points, speaker_notes.
- No extra keys.`
  });
}

export function makeSlideReviewerAgent(model: string) {
  return new Agent({
    name: "Slide Reviewer",
    model,
    modelSettings: reviewSettings,
    tools: [],
    outputType: QualityOutputSchema,
    instructions: `You are the Slide Reviewer.

You will receive a source section and the slide written from it.
Score accuracy, coherence, clarity and completeness from 0 to 1 and list concrete issues.

Rules:
- Be strict: a score of 0.8 or more means ready to present without edits.
- Each issue must be actionable by an editor.
- Return ONLY valid JSON matching the schema.
- No extra keys.`
  });
}

export function makeSlideEditorAgent(model: string) {
  return new Agent({
    name: "Slide Editor",
    model,
    modelSettings: baseSettings,
    tools: [],
    outputType: SlideOutputSchema,
    instructions: `You are the Slide Editor.

You will receive a slide, its source section and a review listing issues.
Rewrite the slide so every issue is fixed while keeping the section's core message.

Rules:
- Return ONLY valid JSON matching the schema with keys title, bullet_points, speaker_notes.
- No extra keys.`
  });
}

export function makeNarratorAgent(model: string) {
  return new Agent({
    name: "Narrator",
    model,
    modelSettings: { temperature: 0.4 },
    tools: [],
    outputType: NarrationOutputSchema,
    instructions: `You are the Narrator.

You will receive a finished slide. Write what the presenter says while it is on screen.

Rules:
- Spoken register, smooth transitions, no bullet lists.
- Return ONLY valid JSON matching the schema with top-level key narration.
- No extra keys.`
  });
}

export type SlideAgents = {
  sectionParser: ReturnType<typeof makeSectionParserAgent>;
  slideWriter: ReturnType<typeof makeSlideWriterAgent>;
  slideReviewer: ReturnType<typeof makeSlideReviewerAgent>;
  slideEditor: ReturnType<typeof makeSlideEditorAgent>;
  narrator: ReturnType<typeof makeNarratorAgent>;
};

export function makeSlideAgents(model: string): SlideAgents {
  return {
    sectionParser: makeSectionParserAgent(model),
    slideWriter: makeSlideWriterAgent(model),
    slideReviewer: makeSlideReviewerAgent(model),
    slideEditor: makeSlideEditorAgent(model),
    narrator: makeNarratorAgent(model)
  };
}
