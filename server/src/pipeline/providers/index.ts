import type { ProviderCredentials, ProviderName } from "../config.js";
import { ConfigurationError } from "../errors.js";
import { FakeProvider } from "./fake_provider.js";
import { GeminiProvider } from "./gemini_provider.js";
import { OpenAIProvider } from "./openai_provider.js";
import type { SlideProvider } from "./types.js";

export type { ProviderCallContext, SlideProvider } from "./types.js";

export function createProvider(name: ProviderName, credentials: ProviderCredentials): SlideProvider {
  switch (name) {
    case "openai":
      if (!credentials.openaiApiKey) throw new ConfigurationError("Cannot create provider openai", ["OPENAI_API_KEY is not set"]);
      return new OpenAIProvider({ apiKey: credentials.openaiApiKey, model: credentials.openaiModel });
    case "gemini":
      if (!credentials.geminiApiKey) throw new ConfigurationError("Cannot create provider gemini", ["GEMINI_API_KEY is not set"]);
      return new GeminiProvider({ apiKey: credentials.geminiApiKey, model: credentials.geminiModel });
    case "fake":
      return new FakeProvider();
  }
}

export function buildProviders(names: readonly ProviderName[], credentials: ProviderCredentials): SlideProvider[] {
  return names.map((name) => createProvider(name, credentials));
}
