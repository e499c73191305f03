/**
 * Zod schemas for configuration and provider output validation.
 */

import { z } from "zod";

export const EnrichmentProviderConfigSchema = z.object({
  provider: z.string().min(1),
  apiKey: z.string().min(1),
  model: z.string().min(1).optional(),
  baseUrl: z.string().url().optional(),
  timeoutMs: z.number().int().min(1000).max(120_000).optional(),
  maxTokens: z.number().int().min(64).max(8192).optional(),
});

export const EnrichmentChainConfigSchema = z.object({
  providers: z.array(EnrichmentProviderConfigSchema),
});

/**
 * Accepts both snake_case (as prompted) and camelCase keys.
 */
export const ExplanationSchema = z
  .union([
    z.object({ plain_english: z.string().min(1), technical_fix: z.string().min(1) }),
    z.object({ plainEnglish: z.string().min(1), technicalFix: z.string().min(1) }),
  ])
  .transform((value) =>
    "plain_english" in value
      ? { plainEnglish: value.plain_english, technicalFix: value.technical_fix }
      : { plainEnglish: value.plainEnglish, technicalFix: value.technicalFix },
  );
