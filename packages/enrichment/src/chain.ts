/**
 * EnrichmentChain: ordered provider candidates with fallback.
 *
 * Enrichment is advisory. When every candidate fails the chain resolves to
 * `null` instead of throwing; only caller-initiated aborts propagate.
 */

import { getEnrichmentCalls, withSpan } from "@privacy-probe/telemetry";
import { createEnrichmentProvider } from "./providers/index.js";
import type {
  EnrichmentChainConfig,
  EnrichmentProvider,
  EnrichmentRequest,
  EnrichmentResult,
  ProviderFailureHandler,
} from "./types.js";

export class EnrichmentChain {
  private readonly providers: readonly EnrichmentProvider[];
  private readonly onProviderFailure: ProviderFailureHandler | undefined;

  constructor(providers: readonly EnrichmentProvider[], onProviderFailure?: ProviderFailureHandler) {
    this.providers = providers;
    this.onProviderFailure = onProviderFailure;
  }

  static fromConfig(config: EnrichmentChainConfig): EnrichmentChain {
    return new EnrichmentChain(
      config.providers.map((pc) => createEnrichmentProvider(pc)),
      config.onProviderFailure,
    );
  }

  get providerIds(): readonly string[] {
    return this.providers.map((p) => p.id);
  }

  get isEmpty(): boolean {
    return this.providers.length === 0;
  }

  async explain(request: EnrichmentRequest, signal?: AbortSignal): Promise<EnrichmentResult | null> {
    for (const provider of this.providers) {
      if (signal?.aborted) {
        throw new DOMException("The operation was aborted.", "AbortError");
      }

      try {
        const explanation = await withSpan(
          "privacy_probe.enrichment.explain",
          { "enrichment.provider": provider.id, "violation.type": request.violationType },
          () => provider.explain(request, signal),
        );
        getEnrichmentCalls().add(1, { provider: provider.id, outcome: "ok" });
        return { ...explanation, providerId: provider.id };
      } catch (error) {
        if (error instanceof DOMException && error.name === "AbortError") {
          throw error;
        }
        getEnrichmentCalls().add(1, { provider: provider.id, outcome: "error" });
        this.onProviderFailure?.(
          provider.id,
          error instanceof Error ? error : new Error(String(error)),
        );
      }
    }

    return null;
  }
}
