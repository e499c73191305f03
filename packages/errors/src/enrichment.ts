/**
 * Enrichment errors: text-generation providers
 *
 * Abstract base: EnrichmentError
 * Concrete:
 *   - EnrichmentProviderError        (ENRICHMENT_PROVIDER_ERROR)
 *   - EnrichmentRateLimitedError     (ENRICHMENT_RATE_LIMITED)
 *   - EnrichmentResponseInvalidError (ENRICHMENT_RESPONSE_INVALID)
 */

import { PrivacyProbeError } from "./base.js";

// ---------------------------------------------------------------------------
// Abstract Base
// ---------------------------------------------------------------------------

export abstract class EnrichmentError extends PrivacyProbeError {
  abstract readonly providerId: string;
}

// ---------------------------------------------------------------------------
// Concrete Errors
// ---------------------------------------------------------------------------

export class EnrichmentProviderError extends EnrichmentError {
  readonly code = "ENRICHMENT_PROVIDER_ERROR" as const;
  readonly providerId: string;

  constructor(providerId: string, message: string, cause?: Error) {
    super(`Enrichment provider "${providerId}" error: ${message}`, cause ? { cause } : undefined);
    this.providerId = providerId;
  }
}

export class EnrichmentRateLimitedError extends EnrichmentError {
  readonly code = "ENRICHMENT_RATE_LIMITED" as const;
  readonly providerId: string;
  /** From the provider's Retry-After header, when it sent one */
  readonly retryAfterSeconds: number | undefined;

  constructor(providerId: string, retryAfterSeconds?: number) {
    super(
      `Enrichment provider "${providerId}" rate limited${
        retryAfterSeconds !== undefined ? `; retry after ${retryAfterSeconds}s` : ""
      }`,
    );
    this.providerId = providerId;
    this.retryAfterSeconds = retryAfterSeconds;
  }
}

export class EnrichmentResponseInvalidError extends EnrichmentError {
  readonly code = "ENRICHMENT_RESPONSE_INVALID" as const;
  readonly providerId: string;

  constructor(providerId: string, reason: string) {
    super(`Enrichment provider "${providerId}" returned an invalid response: ${reason}`);
    this.providerId = providerId;
  }
}
