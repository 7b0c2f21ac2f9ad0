import { ConfigurationError, NoProviderAvailableError } from "./errors.js";
import type { ProviderCallContext, SlideProvider } from "./providers/types.js";
import { DEFAULT_CONTEXT_HINTS, type SlideDraft } from "./schemas.js";
import { nowIso, toErrorMessage } from "./utils.js";

export type ProviderHealth = {
  name: string;
  healthy: boolean;
  lastCheckedAt: string | null;
  lastError: string | null;
};

const PROBE_DRAFT: SlideDraft = {
  title: "Health check",
  bullets: ["Service is reachable"],
  speakerNotes: "",
  slideNumber: 1,
  sourceSection: "Health check"
};

/**
 * Ordered set of adapters with a health table. Health is a hint for selection only; nothing here
 * retries or trips a breaker.
 */
export class ProviderRouter {
  private readonly providers = new Map<string, SlideProvider>();
  private readonly order: string[] = [];
  private readonly health: Map<string, ProviderHealth>;

  constructor(providers: readonly SlideProvider[], sharedHealth?: Map<string, ProviderHealth>) {
    this.health = sharedHealth ?? new Map<string, ProviderHealth>();
    for (const provider of providers) {
      if (this.providers.has(provider.name)) continue;
      this.providers.set(provider.name, provider);
      this.order.push(provider.name);
      if (!this.health.has(provider.name)) {
        this.health.set(provider.name, { name: provider.name, healthy: true, lastCheckedAt: null, lastError: null });
      }
    }
  }

  /** Router over a subset of the adapters in a new order; health stays shared with this one. */
  reordered(names: readonly string[]): ProviderRouter {
    const missing = names.filter((name) => !this.providers.has(name));
    if (missing.length > 0) {
      throw new ConfigurationError("Invalid provider preference order", missing.map((name) => `provider ${name} is not configured`));
    }
    return new ProviderRouter(
      names.flatMap((name) => {
        const provider = this.providers.get(name);
        return provider ? [provider] : [];
      }),
      this.health
    );
  }

  names(): string[] {
    return [...this.order];
  }

  get(name: string): SlideProvider | undefined {
    return this.providers.get(name);
  }

  isHealthy(name: string): boolean {
    return this.health.get(name)?.healthy ?? false;
  }

  select(preferred?: string): SlideProvider {
    if (preferred && this.isHealthy(preferred)) {
      const provider = this.providers.get(preferred);
      if (provider) return provider;
    }
    return this.firstHealthy([]);
  }

  fallbackFor(current: string): SlideProvider {
    return this.firstHealthy([current]);
  }

  markUnhealthy(name: string, reason?: string): void {
    const entry = this.health.get(name);
    if (!entry) return;
    this.health.set(name, { ...entry, healthy: false, lastCheckedAt: nowIso(), lastError: reason ?? entry.lastError });
  }

  markHealthy(name: string): void {
    const entry = this.health.get(name);
    if (!entry) return;
    this.health.set(name, { ...entry, healthy: true, lastCheckedAt: nowIso(), lastError: null });
  }

  /** Probes the adapter with a tiny narration request and records the outcome. */
  async healthCheck(name: string, ctx: ProviderCallContext): Promise<boolean> {
    const provider = this.providers.get(name);
    if (!provider) return false;
    try {
      await provider.generateNarration(
        PROBE_DRAFT,
        { ...DEFAULT_CONTEXT_HINTS, documentFilename: "health-check", totalSections: 1, currentSectionIndex: 0 },
        ctx
      );
      this.markHealthy(name);
      return true;
    } catch (err) {
      ctx.log(`Health check failed for ${name}: ${toErrorMessage(err)}`);
      this.markUnhealthy(name, toErrorMessage(err));
      return false;
    }
  }

  status(): ProviderHealth[] {
    return this.order.flatMap((name) => {
      const entry = this.health.get(name);
      return entry ? [{ ...entry }] : [];
    });
  }

  private firstHealthy(excluded: string[]): SlideProvider {
    for (const name of this.order) {
      if (excluded.includes(name) || !this.isHealthy(name)) continue;
      const provider = this.providers.get(name);
      if (provider) return provider;
    }
    const detail = excluded.length > 0 ? ` (excluding ${excluded.join(", ")})` : "";
    throw new NoProviderAvailableError(`No healthy provider available${detail}`, excluded);
  }
}
