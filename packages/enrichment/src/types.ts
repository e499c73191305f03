/**
 * Core types for the pluggable enrichment provider interface.
 */

/**
 * What a provider is asked to explain: one violation, in isolation.
 */
export interface EnrichmentRequest {
  readonly violationType: string;
  readonly sectionCitation: string;
  readonly ruleText: string;
  /** Detector evidence; serialized into the prompt as JSON. */
  readonly evidence: unknown;
}

/**
 * Normalized explanation returned by all providers.
 */
export interface Explanation {
  readonly plainEnglish: string;
  readonly technicalFix: string;
}

/**
 * An explanation tagged with the provider that produced it.
 */
export interface EnrichmentResult extends Explanation {
  readonly providerId: string;
}

/**
 * Provider interface: single `explain()` method contract.
 */
export interface EnrichmentProvider {
  readonly id: string;
  explain(request: EnrichmentRequest, signal?: AbortSignal): Promise<Explanation>;
}

/**
 * Configuration for a single provider instance.
 */
export interface EnrichmentProviderConfig {
  readonly provider: string;
  readonly apiKey: string;
  readonly model?: string;
  readonly baseUrl?: string;
  readonly timeoutMs?: number;
  readonly maxTokens?: number;
}

/**
 * Called once per provider that fails while the chain moves on.
 */
export type ProviderFailureHandler = (providerId: string, error: Error) => void;

/**
 * Configuration for the EnrichmentChain (ordered candidates + fallback).
 */
export interface EnrichmentChainConfig {
  readonly providers: readonly EnrichmentProviderConfig[];
  readonly onProviderFailure?: ProviderFailureHandler;
}

/** Default per-request timeout in milliseconds */
export const DEFAULT_TIMEOUT_MS = 20_000;

/** Default completion budget per explanation */
export const DEFAULT_MAX_TOKENS = 1500;

/** Evidence is cut to this many characters before it reaches a prompt */
export const MAX_EVIDENCE_CHARS = 1200;
