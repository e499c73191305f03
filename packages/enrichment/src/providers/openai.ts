/**
 * OpenAI provider: Chat Completions API in JSON mode.
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

const OPENAI_BASE_URL = "https://api.openai.com/v1/chat/completions";
const DEFAULT_MODEL = "gpt-4o";

const ChatCompletionSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullable() }) }))
    .min(1),
});

export function createOpenAIProvider(config: EnrichmentProviderConfig): EnrichmentProvider {
  const url = config.baseUrl ?? OPENAI_BASE_URL;

  return {
    id: "openai",

    async explain(request: EnrichmentRequest, signal?: AbortSignal): Promise<Explanation> {
      const response = await postJson("openai", url, {
        headers: {
          Authorization: `Bearer ${config.apiKey}`,
        },
        body: {
          model: config.model ?? DEFAULT_MODEL,
          max_tokens: config.maxTokens ?? DEFAULT_MAX_TOKENS,
          response_format: { type: "json_object" },
          messages: [
            { role: "system", content: SYSTEM_PROMPT },
            { role: "user", content: buildPrompt(request) },
          ],
        },
        timeoutMs: config.timeoutMs,
        signal,
      });

      const parsed = ChatCompletionSchema.safeParse(response);
      const content = parsed.success ? parsed.data.choices[0]?.message.content : undefined;
      if (content === undefined || content === null) {
        throw new EnrichmentResponseInvalidError("openai", "no message content");
      }
      return parseExplanation("openai", content);
    },
  };
}
