/**
 * @privacy-probe/enrichment: pluggable text-generation providers that add a
 * plain-English explanation and a technical fix to detected violations.
 */

export { EnrichmentChain } from "./chain.js";
export { type PostJsonOptions, postJson } from "./post-json.js";
export { buildPrompt, parseExplanation, SYSTEM_PROMPT } from "./prompt.js";
export {
  createAnthropicProvider,
  createEnrichmentProvider,
  createOpenAIProvider,
  providerConfigsFromEnv,
} from "./providers/index.js";
export type {
  EnrichmentChainConfig,
  EnrichmentProvider,
  EnrichmentProviderConfig,
  EnrichmentRequest,
  EnrichmentResult,
  Explanation,
  ProviderFailureHandler,
} from "./types.js";
export { DEFAULT_MAX_TOKENS, DEFAULT_TIMEOUT_MS, MAX_EVIDENCE_CHARS } from "./types.js";
export {
  EnrichmentChainConfigSchema,
  EnrichmentProviderConfigSchema,
  ExplanationSchema,
} from "./validation.js";
