import { MaxTurnsExceededError, ModelBehaviorError, setDefaultOpenAIKey, type Runner } from "@openai/agents";
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
import { createStructuredRunner, runStructuredAgentOutput } from "./agent_runner.js";
import { makeSlideAgents, type SlideAgents } from "./agents.js";
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

const MAX_TURNS = 2;

export type OpenAIProviderOptions = {
  apiKey?: string;
  model: string;
  runner?: Runner;
};

export class OpenAIProvider implements SlideProvider {
  readonly name = "openai";
  readonly usdPer1kTokens = 0.002;

  private readonly runner: Runner;
  private readonly agents: SlideAgents;

  constructor(options: OpenAIProviderOptions) {
    if (options.apiKey) setDefaultOpenAIKey(options.apiKey);
    this.runner = options.runner ?? createStructuredRunner();
    this.agents = makeSlideAgents(options.model);
  }

  private async call<T>(operation: ProviderOperation, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof ModelBehaviorError || err instanceof MaxTurnsExceededError) {
        throw new ProviderError(this.name, operation, "malformed_response", err.message, { cause: err });
      }
      throw ProviderError.from(this.name, operation, err);
    }
  }

  async parseToSections(documentText: string, ctx: ProviderCallContext): Promise<Section[]> {
    return this.call("parseToSections", async () => {
      const output = await runStructuredAgentOutput({
        runner: this.runner,
        agent: this.agents.sectionParser,
        schema: SectionsOutputSchema,
        prompt: parseSectionsPrompt(documentText),
        signal: ctx.signal,
        maxTurns: MAX_TURNS,
        log: ctx.log
      });
      return sectionsFromOutput(output);
    });
  }

  async generateSlide(section: Section, hints: SlideContextHints, ctx: ProviderCallContext): Promise<SlideDraft> {
    return this.call("generateSlide", async () => {
      const output = await runStructuredAgentOutput({
        runner: this.runner,
        agent: this.agents.slideWriter,
        schema: SlideOutputSchema,
        prompt: generateSlidePrompt(section, hints),
        signal: ctx.signal,
        maxTurns: MAX_TURNS,
        log: ctx.log
      });
      return draftFromOutput(output, section, hints.maxBulletPoints);
    });
  }

  async scoreSlide(draft: SlideDraft, section: Section, threshold: number, ctx: ProviderCallContext): Promise<QualityScore> {
    return this.call("scoreSlide", async () => {
      const output = await runStructuredAgentOutput({
        runner: this.runner,
        agent: this.agents.slideReviewer,
        schema: QualityOutputSchema,
        prompt: scoreSlidePrompt(draft, section, threshold),
        signal: ctx.signal,
        maxTurns: MAX_TURNS,
        log: ctx.log
      });
      return qualityScoreFromOutput(output, threshold);
    });
  }

  async optimizeSlide(draft: SlideDraft, score: QualityScore, section: Section, ctx: ProviderCallContext): Promise<SlideDraft> {
    return this.call("optimizeSlide", async () => {
      const output = await runStructuredAgentOutput({
        runner: this.runner,
        agent: this.agents.slideEditor,
        schema: SlideOutputSchema,
        prompt: optimizeSlidePrompt(draft, score, section),
        signal: ctx.signal,
        maxTurns: MAX_TURNS,
        log: ctx.log
      });
      return revisedDraftFromOutput(output, draft);
    });
  }

  async generateNarration(draft: SlideDraft, hints: SlideContextHints, ctx: ProviderCallContext): Promise<string> {
    return this.call("generateNarration", async () => {
      const output = await runStructuredAgentOutput({
        runner: this.runner,
        agent: this.agents.narrator,
        schema: NarrationOutputSchema,
        prompt: narrationPrompt(draft, hints),
        signal: ctx.signal,
        maxTurns: MAX_TURNS,
        log: ctx.log
      });
      return output.narration.trim();
    });
  }
}
