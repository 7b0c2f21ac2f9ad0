import { describe, expect, it } from "vitest";
import { ConfigurationError } from "../src/pipeline/errors.js";
import { buildProviders, createProvider } from "../src/pipeline/providers/index.js";
import { FakeProvider } from "../src/pipeline/providers/fake_provider.js";
import type { ProviderCredentials } from "../src/pipeline/config.js";

const NO_KEYS: ProviderCredentials = { openaiModel: "gpt-4.1-mini", geminiModel: "gemini-2.5-flash" };

describe("provider factory", () => {
  it("builds the offline adapter without credentials", () => {
    const provider = createProvider("fake", NO_KEYS);
    expect(provider).toBeInstanceOf(FakeProvider);
    expect(provider.name).toBe("fake");
  });

  it("requires an API key for live adapters", () => {
    expect(() => createProvider("openai", NO_KEYS)).toThrow(ConfigurationError);
    expect(() => createProvider("openai", NO_KEYS)).toThrow("Cannot create provider openai: OPENAI_API_KEY is not set");
    expect(() => createProvider("gemini", NO_KEYS)).toThrow("Cannot create provider gemini: GEMINI_API_KEY is not set");
  });

  it("builds live adapters in the requested order", () => {
    const providers = buildProviders(["gemini", "fake"], { ...NO_KEYS, geminiApiKey: "test-secret" });
    expect(providers.map((p) => p.name)).toEqual(["gemini", "fake"]);
  });
});
