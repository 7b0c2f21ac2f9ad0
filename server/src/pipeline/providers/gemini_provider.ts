import { GoogleGenAI } from "@google/genai";
import type { z } from "zod";
import { ProviderError, type ProviderOperation } from "../errors.js";
import { qualityScoreFromOutput } from "../quality.js";
import {
  NarrationOutputSchema,
  QualityOutputSchema,
  SectionsOutputSchema,
  SlideOutputSchema,
  type QualityScore,
  type Section,
  type SlideContextHints,
  type SlideDraft
} from "../schemas.js";
import {
  draftFromOutput,
  generateSlidePrompt,
  narrationPrompt,
  optimizeSlidePrompt,
  parseSectionsPrompt,
  revisedDraftFromOutput,
  scoreSlidePrompt,
  sectionsFromOutput
} from "./prompts.js";
import type { ProviderCallContext, SlideProvider } from "./types.js";

const MAX_INPUT_CHARS = 20_000;

export type GeminiProviderOptions = {
  apiKey?: string;
  model: string;
  client?: GoogleGenAI;
};

/** Strips markdown fences and any prose around the outermost JSON object. */
export function extractJsonText(raw: string): string {
  const cleaned = raw.replace(/```(?:json)?/gi, "").trim();
  const start = cleaned.indexOf("{");
  const end = cleaned.lastIndexOf("}");
  if (start === -1 || end <= start) throw new SyntaxError("Response contained no JSON object");
  return cleaned.slice(start, end + 1);
}

export class GeminiProvider implements SlideProvider {
  readonly name = "gemini";
  readonly usdPer1kTokens = 0.001;

  private readonly client: GoogleGenAI;
  private readonly model: string;

  constructor(options: GeminiProviderOptions) {
    this.client = options.client ?? new GoogleGenAI({ apiKey: options.apiKey });
    this.model = options.model;
  }

  private async generateJson<T>(
    operation: ProviderOperation,
    prompt: string,
    schema: z.ZodType<T>,
    temperature: number,
    ctx: ProviderCallContext
  ): Promise<T> {
    try {
      const response = await this.client.models.generateContent({
        model: this.model,
        contents: prompt.slice(0, MAX_INPUT_CHARS),
        config: {
          responseMimeType: "application/json",
          temperature,
          abortSignal: ctx.signal
        }
      });
      const rawText = response.text ?? "";
      if (rawText.trim().length === 0) throw new SyntaxError("Empty response from model (no JSON)");
      const data: unknown = JSON.parse(extractJsonText(rawText));
      return schema.parse(data);
    } catch (err) {
      throw ProviderError.from(this.name, operation, err);
    }
  }

  async parseToSections(documentText: string, ctx: ProviderCallContext): Promise<Section[]> {
    const output = await this.generateJson("parseToSections", parseSectionsPrompt(documentText), SectionsOutputSchema, 0, ctx);
    return sectionsFromOutput(output);
  }

  async generateSlide(section: Section, hints: SlideContextHints, ctx: ProviderCallContext): Promise<SlideDraft> {
    const output = await this.generateJson("generateSlide", generateSlidePrompt(section, hints), SlideOutputSchema, 0.2, ctx);
    return draftFromOutput(output, section, hints.maxBulletPoints);
  }

  async scoreSlide(draft: SlideDraft, section: Section, threshold: number, ctx: ProviderCallContext): Promise<QualityScore> {
    const output = await this.generateJson("scoreSlide", scoreSlidePrompt(draft, section, threshold), QualityOutputSchema, 0, ctx);
    return qualityScoreFromOutput(output, threshold);
  }

  async optimizeSlide(draft: SlideDraft, score: QualityScore, section: Section, ctx: ProviderCallContext): Promise<SlideDraft> {
    const output = await this.generateJson("optimizeSlide", optimizeSlidePrompt(draft, score, section), SlideOutputSchema, 0.2, ctx);
    return revisedDraftFromOutput(output, draft);
  }

  async generateNarration(draft: SlideDraft, hints: SlideContextHints, ctx: ProviderCallContext): Promise<string> {
    const output = await this.generateJson("generateNarration", narrationPrompt(draft, hints), NarrationOutputSchema, 0.4, ctx);
    return output.narration.trim();
  }
}
