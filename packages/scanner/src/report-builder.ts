import type {
  EvaluationResult,
  EvidenceReport,
  ResolvedScanConfig,
  RuleDataset,
  RuleRunStatus,
  ScanOutcome,
  SessionLog,
  SessionSummary,
  Severity,
  VerdictResult,
  Violation,
} from "./types.js";

export const TOOL_NAME = "privacy-probe";
export const TOOL_VERSION = "0.1.0";

export interface ReportInput {
  readonly config: ResolvedScanConfig;
  readonly dataset: RuleDataset;
  readonly sessions: ReadonlyMap<string, SessionLog>;
  readonly verdict: VerdictResult;
  readonly evaluation: EvaluationResult;
  /** Temporal leaks per session label */
  readonly leakCounts: ReadonlyMap<string, number>;
  readonly startedAt: Date;
  readonly completedAt: Date;
  readonly enrichmentProviders?: readonly string[];
}

const DETECTOR_INVOKED: ReadonlySet<RuleRunStatus> = new Set([
  "violation",
  "compliant",
  "not_evaluable",
  "error",
]);

function summarizeSession(log: SessionLog, temporalLeaks: number): SessionSummary {
  const trackerRequests = log.requests.filter((r) => r.isTracker).length;
  const pagesOk = log.pageVisits.filter((v) => v.status === "ok").length;
  return {
    label: log.label,
    pagesVisited: log.pageVisits.length,
    pagesOk,
    pagesFailed: log.pageVisits.length - pagesOk,
    totalRequests: log.requests.length,
    trackerRequests,
    uniqueTrackerDomains: [...log.trackerDomains],
    temporalLeaks,
    aborted: log.aborted,
    warnings: [...log.warnings],
    stats: { ...log.stats },
  };
}

function computeOutcome(violations: readonly Violation[], verdict: VerdictResult): ScanOutcome {
  if (violations.length > 0) {
    return "VIOLATIONS_FOUND";
  }
  return verdict.verdict === "INSUFFICIENT_DATA" ? "INSUFFICIENT_DATA" : "NO_VIOLATIONS";
}

/**
 * Aggregates one scan into an EvidenceReport. Pure: the same
 * input always yields the same document.
 */
export class ReportBuilder {
  static build(input: ReportInput): EvidenceReport {
    const { config, evaluation, verdict } = input;

    const sessions: SessionSummary[] = [];
    for (const signal of config.sessions) {
      const log = input.sessions.get(signal.label);
      if (log) {
        sessions.push(summarizeSession(log, input.leakCounts.get(signal.label) ?? 0));
      }
    }

    const severityCounts: Record<Severity, number> = { HIGH: 0, MEDIUM: 0, LOW: 0 };
    let minPotentialPenaltyUsd = 0;
    let maxPotentialPenaltyUsd = 0;
    let enrichedViolations = 0;

    for (const violation of evaluation.violations) {
      switch (violation.severity) {
        case "HIGH":
          severityCounts.HIGH++;
          break;
        case "MEDIUM":
          severityCounts.MEDIUM++;
          break;
        case "LOW":
          severityCounts.LOW++;
          break;
      }
      minPotentialPenaltyUsd += violation.penaltyMinUsd ?? 0;
      maxPotentialPenaltyUsd += violation.penaltyMaxUsd ?? 0;
      if (violation.enrichment) {
        enrichedViolations++;
      }
    }

    const warnings = sessions.flatMap((s) => s.warnings.map((w) => `[${s.label}] ${w}`));

    return {
      metadata: {
        tool: { name: TOOL_NAME, version: TOOL_VERSION },
        scanId: config.scanId,
        jurisdiction: config.jurisdiction,
        datasetVersion: input.dataset.version,
        startedAt: input.startedAt.toISOString(),
        completedAt: input.completedAt.toISOString(),
        durationMs: Math.max(0, input.completedAt.getTime() - input.startedAt.getTime()),
        itinerary: [...config.itinerary],
        leakThresholdMs: config.timing.leakThresholdMs,
        baselineLabel: config.baselineLabel,
        complianceLabel: config.complianceLabel,
        warnings,
        enrichmentProviders: [...(input.enrichmentProviders ?? [])],
      },
      sessions,
      verdict: {
        verdict: verdict.verdict,
        domainsIgnoringSignal: [...verdict.domainsIgnoringSignal],
        leakCount: verdict.leakCount,
      },
      violations: [...evaluation.violations],
      ruleRuns: [...evaluation.runs],
      summary: {
        totalViolations: evaluation.violations.length,
        severityCounts,
        minPotentialPenaltyUsd,
        maxPotentialPenaltyUsd,
        rulesEvaluated: evaluation.runs.filter((r) => DETECTOR_INVOKED.has(r.status)).length,
        enrichedViolations,
      },
      outcome: computeOutcome(evaluation.violations, verdict),
    };
  }
}
