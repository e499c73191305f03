/**
 * Anthropic provider: Messages API.
 */

import { EnrichmentResponseInvalidError } from "@privacy-probe/errors";
import { z } from "zod";
import { postJson } from "../post-json.js";
import { buildPrompt, parseExplanation, SYSTEM_PROMPT } from "../prompt.js";
import {
  DEFAULT_MAX_TOKENS,
  type EnrichmentProvider,
  type EnrichmentProviderConfig,
  type EnrichmentRequest,
  type Explanation,
} from "../types.js";

const ANTHROPIC_BASE_URL = "https://api.anthropic.com/v1/messages";
const ANTHROPIC_VERSION = "2023-06-01";
const DEFAULT_MODEL = "claude-3-5-haiku-20241022";

const MessagesResponseSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })),
});

export function createAnthropicProvider(config: EnrichmentProviderConfig): EnrichmentProvider {
  const url = config.baseUrl ?? ANTHROPIC_BASE_URL;

  return {
    id: "anthropic",

    async explain(request: EnrichmentRequest, signal?: AbortSignal): Promise<Explanation> {
      const response = await postJson("anthropic", url, {
        headers: {
          "x-api-key": config.apiKey,
          "anthropic-version": ANTHROPIC_VERSION,
        },
        body: {
          model: config.model ?? DEFAULT_MODEL,
          max_tokens: config.maxTokens ?? DEFAULT_MAX_TOKENS,
          system: SYSTEM_PROMPT,
          messages: [{ role: "user", content: buildPrompt(request) }],
        },
        timeoutMs: config.timeoutMs,
        signal,
      });

      const parsed = MessagesResponseSchema.safeParse(response);
      if (!parsed.success) {
        throw new EnrichmentResponseInvalidError("anthropic", "unexpected response shape");
      }
      const text = parsed.data.content
        .filter((block) => block.type === "text")
        .map((block) => block.text ?? "")
        .join("");
      return parseExplanation("anthropic", text);
    },
  };
}
