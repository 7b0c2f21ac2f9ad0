import { z } from "zod";
import { ConfigurationError } from "./errors.js";

export const PROVIDER_NAMES = ["openai", "gemini", "fake"] as const;
export type ProviderName = (typeof PROVIDER_NAMES)[number];

export const ProviderNameSchema = z.enum(PROVIDER_NAMES);

export const DEFAULT_QUALITY_THRESHOLD = 0.8;
export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_MAX_CONCURRENCY = 3;
export const DEFAULT_CALL_TIMEOUT_MS = 60_000;

export const MAX_RETRIES_LIMIT = 10;
export const MAX_CONCURRENCY_LIMIT = 16;
export const CALL_TIMEOUT_MIN_MS = 1_000;
export const CALL_TIMEOUT_MAX_MS = 10 * 60 * 1000;

export const GenerationConfigSchema = z
  .object({
    providerPreferenceOrder: z
      .array(ProviderNameSchema)
      .min(1, "provider list must not be empty")
      .refine((names) => new Set(names).size === names.length, "provider list must not repeat a name"),
    qualityThreshold: z.number().min(0).max(1),
    maxRetries: z.number().int().min(0).max(MAX_RETRIES_LIMIT),
    maxConcurrency: z.number().int().min(1).max(MAX_CONCURRENCY_LIMIT),
    perCallTimeoutMs: z.number().int().min(CALL_TIMEOUT_MIN_MS).max(CALL_TIMEOUT_MAX_MS)
  })
  .strict();

export type GenerationConfig = z.infer<typeof GenerationConfigSchema>;

export type ProviderCredentials = {
  openaiApiKey?: string;
  openaiModel: string;
  geminiApiKey?: string;
  geminiModel: string;
};

export type ServiceConfig = {
  generation: GenerationConfig;
  credentials: ProviderCredentials;
  pipelineMode: "live" | "fake";
};

const DEFAULT_OPENAI_MODEL = "gpt-4.1-mini";
const DEFAULT_GEMINI_MODEL = "gemini-2.5-flash";

type Env = Record<string, string | undefined>;

function envString(env: Env, name: string): string | undefined {
  const v = env[name];
  return v && v.trim().length > 0 ? v.trim() : undefined;
}

function envNumber(env: Env, name: string, fallback: number): number {
  const raw = envString(env, name);
  return raw === undefined ? fallback : Number(raw);
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`);
}

export function validateGenerationConfig(input: unknown): GenerationConfig {
  const parsed = GenerationConfigSchema.safeParse(input);
  if (!parsed.success) throw new ConfigurationError("Invalid generation config", formatIssues(parsed.error), { cause: parsed.error });
  return parsed.data;
}

export function pipelineModeFromEnv(env: Env = process.env): "live" | "fake" {
  return envString(env, "SLIDESMITH_PIPELINE_MODE")?.toLowerCase() === "fake" ? "fake" : "live";
}

/**
 * Reads SLIDESMITH_* settings and provider keys. In fake mode the preference order is
 * forced to the offline adapter and no keys are required.
 */
export function loadServiceConfig(env: Env = process.env): ServiceConfig {
  const pipelineMode = pipelineModeFromEnv(env);
  const providerList = (envString(env, "SLIDESMITH_PROVIDERS") ?? "openai")
    .split(",")
    .map((p) => p.trim().toLowerCase())
    .filter((p) => p.length > 0);

  const generation = validateGenerationConfig({
    providerPreferenceOrder: pipelineMode === "fake" ? ["fake"] : providerList,
    qualityThreshold: envNumber(env, "SLIDESMITH_QUALITY_THRESHOLD", DEFAULT_QUALITY_THRESHOLD),
    maxRetries: envNumber(env, "SLIDESMITH_MAX_RETRIES", DEFAULT_MAX_RETRIES),
    maxConcurrency: envNumber(env, "SLIDESMITH_MAX_CONCURRENCY", DEFAULT_MAX_CONCURRENCY),
    perCallTimeoutMs: envNumber(env, "SLIDESMITH_CALL_TIMEOUT_MS", DEFAULT_CALL_TIMEOUT_MS)
  });

  const credentials: ProviderCredentials = {
    openaiApiKey: envString(env, "OPENAI_API_KEY"),
    openaiModel: envString(env, "SLIDESMITH_OPENAI_MODEL") ?? DEFAULT_OPENAI_MODEL,
    geminiApiKey: envString(env, "GEMINI_API_KEY"),
    geminiModel: envString(env, "SLIDESMITH_GEMINI_MODEL") ?? DEFAULT_GEMINI_MODEL
  };

  assertCredentials(generation.providerPreferenceOrder, credentials);
  return { generation, credentials, pipelineMode };
}

export function assertCredentials(providers: readonly ProviderName[], credentials: ProviderCredentials): void {
  const missing: string[] = [];
  if (providers.includes("openai") && !credentials.openaiApiKey) missing.push("OPENAI_API_KEY is required for provider openai");
  if (providers.includes("gemini") && !credentials.geminiApiKey) missing.push("GEMINI_API_KEY is required for provider gemini");
  if (missing.length > 0) throw new ConfigurationError("Missing provider credentials", missing);
}

export type GenerationOverrides = Partial<GenerationConfig>;

export function applyGenerationOverrides(base: GenerationConfig, overrides: GenerationOverrides | undefined): GenerationConfig {
  if (!overrides) return base;
  return validateGenerationConfig({
    providerPreferenceOrder: overrides.providerPreferenceOrder ?? base.providerPreferenceOrder,
    qualityThreshold: overrides.qualityThreshold ?? base.qualityThreshold,
    maxRetries: overrides.maxRetries ?? base.maxRetries,
    maxConcurrency: overrides.maxConcurrency ?? base.maxConcurrency,
    perCallTimeoutMs: overrides.perCallTimeoutMs ?? base.perCallTimeoutMs
  });
}
