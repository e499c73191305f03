import { EnrichmentResponseInvalidError } from "@privacy-probe/errors";
import { type EnrichmentRequest, type Explanation, MAX_EVIDENCE_CHARS } from "./types.js";
import { ExplanationSchema } from "./validation.js";

export const SYSTEM_PROMPT =
  "You are a privacy compliance attorney. Return valid JSON only, with no surrounding prose.";

/**
 * Render the single-violation prompt sent to every provider.
 */
export function buildPrompt(request: EnrichmentRequest): string {
  const evidence = JSON.stringify(request.evidence) ?? "null";
  const clipped =
    evidence.length > MAX_EVIDENCE_CHARS ? `${evidence.slice(0, MAX_EVIDENCE_CHARS)}...` : evidence;

  return [
    "Explain the privacy violation below for a non-lawyer and an engineer.",
    "1. plain_english: two sentences, no legal jargon.",
    "2. technical_fix: one specific change the engineering team should make.",
    "",
    `Violation type: ${request.violationType}`,
    `Provision: ${request.sectionCitation}`,
    `Provision summary: ${request.ruleText}`,
    `Evidence: ${clipped}`,
    "",
    'Respond with a JSON object: {"plain_english": "...", "technical_fix": "..."}',
  ].join("\n");
}

/**
 * Pull the first JSON object out of a model reply and validate it.
 *
 * Models sometimes wrap JSON in a code fence or a sentence; everything
 * outside the outermost braces is ignored.
 */
export function parseExplanation(providerId: string, text: string): Explanation {
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start === -1 || end <= start) {
    throw new EnrichmentResponseInvalidError(providerId, "no JSON object in reply");
  }

  let decoded: unknown;
  try {
    decoded = JSON.parse(text.slice(start, end + 1));
  } catch {
    throw new EnrichmentResponseInvalidError(providerId, "reply is not valid JSON");
  }

  const parsed = ExplanationSchema.safeParse(decoded);
  if (!parsed.success) {
    throw new EnrichmentResponseInvalidError(
      providerId,
      parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; "),
    );
  }
  return parsed.data;
}
