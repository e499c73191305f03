import type { EnrichmentChain, EnrichmentResult, ProviderFailureHandler } from "@privacy-probe/enrichment";
import { getErrorMessage, isExpectedError } from "@privacy-probe/errors";
import { SYSTEM_SOURCE, type ScanEventLog } from "./events.js";
import type { Rule, Violation } from "./types.js";

export interface EnrichOptions {
  readonly chain: EnrichmentChain;
  readonly rules: readonly Rule[];
  readonly events: ScanEventLog;
  /** Violations past this index are returned unenriched */
  readonly maxViolations: number;
  readonly signal?: AbortSignal;
}

/**
 * Report one provider's failure before the chain falls back. A rate limit is
 * an expected condition and logs as a WARNING; anything else is an ERROR.
 */
export function logProviderFailure(events: ScanEventLog): ProviderFailureHandler {
  return (providerId, error) => {
    events.emit(
      SYSTEM_SOURCE,
      isExpectedError(error) ? "WARNING" : "ERROR",
      `Enrichment provider ${providerId} failed: ${error.message}`,
    );
  };
}

/**
 * Ask the provider chain to explain each violation, one at a time.
 *
 * Enrichment never blocks detection: a violation the chain cannot explain is
 * returned unchanged and a WARNING is emitted. Only an abort propagates.
 */
export async function enrichViolations(
  violations: readonly Violation[],
  options: EnrichOptions,
): Promise<Violation[]> {
  const { chain, events } = options;
  const ruleText = new Map(options.rules.map((r) => [r.ruleId, r.ruleText]));
  const enriched: Violation[] = [];

  for (const [index, violation] of violations.entries()) {
    if (index >= options.maxViolations) {
      enriched.push(violation);
      continue;
    }

    let explanation: EnrichmentResult | null;
    try {
      explanation = await chain.explain(
        {
          violationType: violation.violationType,
          sectionCitation: violation.sectionCitation,
          ruleText: ruleText.get(violation.ruleId) ?? violation.title,
          evidence: violation.evidence,
        },
        options.signal,
      );
    } catch (error) {
      if (options.signal?.aborted) {
        throw error;
      }
      events.warn(SYSTEM_SOURCE, `Enrichment failed for ${violation.ruleId}: ${getErrorMessage(error)}`);
      enriched.push(violation);
      continue;
    }

    if (explanation === null) {
      events.warn(SYSTEM_SOURCE, `Enrichment unavailable for ${violation.ruleId}: every provider failed`);
      enriched.push(violation);
      continue;
    }

    enriched.push({
      ...violation,
      enrichment: {
        plainEnglish: explanation.plainEnglish,
        technicalFix: explanation.technicalFix,
        providerId: explanation.providerId,
      },
    });
  }

  if (violations.length > options.maxViolations) {
    events.info(
      SYSTEM_SOURCE,
      `Enriched the first ${options.maxViolations} of ${violations.length} violations`,
    );
  }
  return enriched;
}
