import type { QualityScore, Section, SlideContextHints, SlideDraft } from "../schemas.js";

export type ProviderCallContext = {
  signal: AbortSignal;
  log: (message: string) => void;
};

/**
 * Capability surface every generation backend implements. Adapters make exactly one logical
 * request per call; retrying and falling back belong to the caller.
 */
export interface SlideProvider {
  readonly name: string;
  /** Estimated USD per 1k tokens, used by the caller's cost ledger. */
  readonly usdPer1kTokens: number;

  parseToSections(documentText: string, ctx: ProviderCallContext): Promise<Section[]>;
  generateSlide(section: Section, hints: SlideContextHints, ctx: ProviderCallContext): Promise<SlideDraft>;
  scoreSlide(draft: SlideDraft, section: Section, threshold: number, ctx: ProviderCallContext): Promise<QualityScore>;
  optimizeSlide(draft: SlideDraft, score: QualityScore, section: Section, ctx: ProviderCallContext): Promise<SlideDraft>;
  generateNarration(draft: SlideDraft, hints: SlideContextHints, ctx: ProviderCallContext): Promise<string>;
}
