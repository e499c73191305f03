/**
 * Provider factory: creates providers from configuration.
 */

import { EnrichmentProviderError } from "@privacy-probe/errors";
import type { EnrichmentProvider, EnrichmentProviderConfig } from "../types.js";
import { createAnthropicProvider } from "./anthropic.js";
import { createOpenAIProvider } from "./openai.js";

export { createAnthropicProvider } from "./anthropic.js";
export { createOpenAIProvider } from "./openai.js";

export function createEnrichmentProvider(config: EnrichmentProviderConfig): EnrichmentProvider {
  switch (config.provider) {
    case "anthropic":
      return createAnthropicProvider(config);
    case "openai":
      return createOpenAIProvider(config);
    default:
      throw new EnrichmentProviderError(
        config.provider,
        `Unknown provider: "${config.provider}". Supported: anthropic, openai`,
      );
  }
}

/**
 * Provider configs for every API key present in the environment,
 * in fallback order: anthropic, then openai.
 */
export function providerConfigsFromEnv(
  env: Readonly<Record<string, string | undefined>> = process.env,
): EnrichmentProviderConfig[] {
  const configs: EnrichmentProviderConfig[] = [];
  const anthropicKey = env.ANTHROPIC_API_KEY;
  if (anthropicKey) {
    configs.push({ provider: "anthropic", apiKey: anthropicKey });
  }
  const openaiKey = env.OPENAI_API_KEY;
  if (openaiKey) {
    configs.push({ provider: "openai", apiKey: openaiKey });
  }
  return configs;
}
