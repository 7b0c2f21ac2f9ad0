export const PROVIDER_OPERATIONS = [
  "parseToSections",
  "generateSlide",
  "scoreSlide",
  "optimizeSlide",
  "generateNarration"
] as const;

export type ProviderOperation = (typeof PROVIDER_OPERATIONS)[number];

export type ProviderErrorKind = "network" | "rate_limit" | "malformed_response" | "auth" | "timeout" | "cancelled";

export class ProviderError extends Error {
  readonly provider: string;
  readonly operation: ProviderOperation;
  readonly kind: ProviderErrorKind;

  constructor(
    provider: string,
    operation: ProviderOperation,
    kind: ProviderErrorKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`${provider}.${operation} failed (${kind}): ${message}`, options);
    this.name = "ProviderError";
    this.provider = provider;
    this.operation = operation;
    this.kind = kind;
  }

  /** Wraps any thrown value; a ProviderError passes through untouched. */
  static from(provider: string, operation: ProviderOperation, err: unknown): ProviderError {
    if (err instanceof ProviderError) return err;
    const message = err instanceof Error ? err.message : String(err);
    return new ProviderError(provider, operation, classifyProviderFailure(err), message, { cause: err });
  }
}

function statusOf(err: unknown): number | null {
  if (!err || typeof err !== "object") return null;
  const status = (err as { status?: unknown }).status;
  if (typeof status === "number") return status;
  const code = (err as { code?: unknown }).code;
  return typeof code === "number" ? code : null;
}

export function classifyProviderFailure(err: unknown): ProviderErrorKind {
  const name = err instanceof Error ? err.name : "";
  const message = err instanceof Error ? err.message.toLowerCase() : String(err).toLowerCase();

  if (name === "AbortError" || message === "cancelled") return "cancelled";
  if (name === "TimeoutError" || message.includes("timed out") || message.includes("timeout")) return "timeout";

  const status = statusOf(err);
  if (status === 401 || status === 403) return "auth";
  if (status === 429) return "rate_limit";

  if (message.includes("api key") || message.includes("unauthorized") || message.includes("permission denied")) return "auth";
  if (message.includes("rate limit") || message.includes("quota") || message.includes("resource_exhausted")) return "rate_limit";
  if (
    name === "ZodError" ||
    name === "SyntaxError" ||
    name === "ModelBehaviorError" ||
    name === "MaxTurnsExceededError" ||
    message.includes("json")
  ) {
    return "malformed_response";
  }
  return "network";
}

export class NoProviderAvailableError extends Error {
  readonly excluded: string[];

  constructor(message: string, excluded: string[] = []) {
    super(message);
    this.name = "NoProviderAvailableError";
    this.excluded = excluded;
  }
}

export class ConfigurationError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = [], options?: { cause?: unknown }) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message, options);
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}

export class DocumentParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DocumentParseError";
  }
}
