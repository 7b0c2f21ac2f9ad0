import type { QualityScore, Section, SectionsOutput, SlideContextHints, SlideDraft, SlideOutput } from "../schemas.js";

const SECTION_EXCERPT_CHARS = 1500;
const NOTES_EXCERPT_CHARS = 400;

function excerpt(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

function slideBlock(draft: SlideDraft, notesMax = NOTES_EXCERPT_CHARS): string {
  return (
    `Title: ${draft.title}\n` +
    `Bullets:\n${draft.bullets.map((b) => `- ${b}`).join("\n")}\n` +
    `Speaker notes: ${excerpt(draft.speakerNotes, notesMax)}`
  );
}

export function parseSectionsPrompt(documentText: string): string {
  return (
    `Split the document below into slide-sized sections.\n\n` +
    `Rules:\n` +
    `- Keep the document's own heading hierarchy (level 1-6)\n` +
    `- Each section keeps its complete content\n` +
    `- Return between 1 and 20 sections in document order\n` +
    `- Output shape: {"sections": [{"title": "...", "content": "...", "level": 1}]}\n\n` +
    `DOCUMENT:\n${documentText}`
  );
}

export function generateSlidePrompt(section: Section, hints: SlideContextHints): string {
  return (
    `Write one presentation slide for this document section.\n\n` +
    `SECTION ${hints.currentSectionIndex + 1} OF ${hints.totalSections}: ${section.title}\n` +
    `${section.body}\n\n` +
    `Context:\n` +
    `- Document: ${hints.documentFilename || "(untitled)"}\n` +
    `- Audience: ${hints.targetAudience}\n` +
    `- Style: ${hints.presentationStyle}\n` +
    `- Language: ${hints.language}\n\n` +
    `Rules:\n` +
    `- Title at most ${hints.maxTitleLength} characters\n` +
    `- At most ${hints.maxBulletPoints} bullet points, each a complete point\n` +
    `- Speaker notes add background the bullets leave out\n` +
    `- Output shape: {"title": "...", "bullet_points": ["..."], "speaker_notes": "..."}`
  );
}

export function scoreSlidePrompt(draft: SlideDraft, section: Section, threshold: number): string {
  return (
    `Review this slide against its source section. Score each dimension from 0 to 1.\n\n` +
    `SOURCE SECTION: ${section.title}\n${excerpt(section.body, SECTION_EXCERPT_CHARS)}\n\n` +
    `SLIDE:\n${slideBlock(draft)}\n\n` +
    `Dimensions:\n` +
    `- accuracy: does the slide reflect the section faithfully\n` +
    `- coherence: do the bullets follow a clear line of reasoning\n` +
    `- clarity: is the wording concise and easy to read\n` +
    `- completeness: are the section's key points covered\n\n` +
    `The acceptance bar is ${threshold}. List every concrete problem under "issues".\n` +
    `Output shape: {"accuracy_score": 0.9, "coherence_score": 0.8, "clarity_score": 0.85, ` +
    `"completeness_score": 0.8, "feedback": "...", "issues": ["..."]}`
  );
}

export function optimizeSlidePrompt(draft: SlideDraft, score: QualityScore, section: Section): string {
  const issues = score.issues.length > 0 ? score.issues.map((i) => `- ${i}`).join("\n") : "- (no specific issues listed)";
  return (
    `Improve this slide so it clears the review.\n\n` +
    `SOURCE SECTION: ${section.title}\n${excerpt(section.body, SECTION_EXCERPT_CHARS)}\n\n` +
    `CURRENT SLIDE:\n${slideBlock(draft, Number.POSITIVE_INFINITY)}\n\n` +
    `REVIEW (overall ${score.overall}):\n${score.feedback}\n` +
    `ISSUES TO FIX:\n${issues}\n\n` +
    `Rules:\n` +
    `- Keep the core message of the section\n` +
    `- Fix every listed issue\n` +
    `- Output shape: {"title": "...", "bullet_points": ["..."], "speaker_notes": "..."}`
  );
}

export function narrationPrompt(draft: SlideDraft, hints: SlideContextHints): string {
  return (
    `Write the spoken narration for slide ${draft.slideNumber} of ${hints.totalSections}.\n\n` +
    `SLIDE:\n${slideBlock(draft, Number.POSITIVE_INFINITY)}\n\n` +
    `Rules:\n` +
    `- Natural spoken ${hints.language}, for a ${hints.targetAudience} audience\n` +
    `- Cover every key point on the slide, drawing on the speaker notes\n` +
    `- Roughly one to two minutes when read aloud\n` +
    `- Output shape: {"narration": "..."}`
  );
}

export function draftFromOutput(output: SlideOutput, section: Section, maxBulletPoints?: number): SlideDraft {
  const bullets = output.bullet_points.map((b) => b.trim()).filter((b) => b.length > 0);
  return {
    title: output.title.trim() || section.title,
    bullets: maxBulletPoints ? bullets.slice(0, maxBulletPoints) : bullets,
    speakerNotes: output.speaker_notes.trim(),
    slideNumber: section.order + 1,
    sourceSection: section.title
  };
}

export function revisedDraftFromOutput(output: SlideOutput, previous: SlideDraft): SlideDraft {
  return {
    title: output.title.trim() || previous.title,
    bullets: output.bullet_points.map((b) => b.trim()).filter((b) => b.length > 0),
    speakerNotes: output.speaker_notes.trim(),
    slideNumber: previous.slideNumber,
    sourceSection: previous.sourceSection
  };
}

export function sectionsFromOutput(output: SectionsOutput): Section[] {
  const sections: Section[] = [];
  for (const [order, s] of output.sections.entries()) {
    const parent = [...sections].reverse().find((prev) => prev.level < s.level);
    sections.push({
      title: s.title.trim(),
      body: s.content.trim(),
      level: s.level,
      order,
      ...(parent ? { parentTitle: parent.title } : {})
    });
  }
  return sections;
}
