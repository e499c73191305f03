import type { EvidenceReport, ScanOutcome, Severity, Violation } from "../types.js";
import type { ScanReporter } from "./types.js";

// ---------------------------------------------------------------------------
// ANSI helpers (no chalk dependency)
// ---------------------------------------------------------------------------

const RESET = "\x1b[0m";
const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const RED = "\x1b[31m";
const YELLOW = "\x1b[33m";
const GREEN = "\x1b[32m";
const CYAN = "\x1b[36m";
const MAGENTA = "\x1b[35m";

const SEVERITY_COLORS: Record<Severity, string> = {
  HIGH: MAGENTA,
  MEDIUM: YELLOW,
  LOW: CYAN,
};

const OUTCOME_LINES: Record<ScanOutcome, string> = {
  VIOLATIONS_FOUND: `${RED}${BOLD}Violations found${RESET}`,
  NO_VIOLATIONS: `${GREEN}${BOLD}No violations found${RESET}`,
  INSUFFICIENT_DATA: `${YELLOW}${BOLD}Insufficient data: a session loaded no page${RESET}`,
};

const usd = new Intl.NumberFormat("en-US", {
  style: "currency",
  currency: "USD",
  minimumFractionDigits: 0,
  maximumFractionDigits: 0,
});

function describeEvidence(violation: Violation): string {
  switch (violation.violationType) {
    case "SIGNAL_NOT_HONORED":
      return `${violation.evidence.domainsIgnoringSignal.length} tracker domain(s) ignored the signal: ${violation.evidence.domainsIgnoringSignal.join(", ")} (tracker requests ${violation.evidence.baselineTrackerRequests} → ${violation.evidence.complianceTrackerRequests}, ${violation.evidence.reductionPercent}% reduction)`;
    case "TEMPORAL_LEAK":
      return `${violation.evidence.leakCount} tracker request(s) within ${violation.evidence.windowMs}ms of page load: ${violation.evidence.leakedDomains.join(", ")}`;
    case "MISSING_OPT_OUT_LINK":
      return `${violation.evidence.affectedPages} of ${violation.evidence.pagesChecked} page(s) lack an opt-out link`;
    case "MISSING_CONSENT_BANNER":
      return `${violation.evidence.affectedPages} of ${violation.evidence.pagesChecked} page(s) show no consent banner`;
    case "PII_IN_TRACKING_REQUEST":
      return `${violation.evidence.requestCount} tracker request(s) carry ${violation.evidence.indicators.join(", ")} to ${violation.evidence.sampleDomains.join(", ")}`;
  }
}

function penaltyRange(violation: Violation): string {
  if (violation.penaltyMinUsd === null && violation.penaltyMaxUsd === null) {
    return "no statutory penalty";
  }
  return `${usd.format(violation.penaltyMinUsd ?? 0)} – ${usd.format(violation.penaltyMaxUsd ?? 0)}`;
}

// ---------------------------------------------------------------------------
// Terminal reporter
// ---------------------------------------------------------------------------

/**
 * Renders a human-readable ANSI-colored terminal report.
 */
export class TerminalReporter implements ScanReporter {
  readonly name = "terminal";

  report(result: EvidenceReport): string {
    const lines: string[] = [];
    const { metadata } = result;

    lines.push("");
    lines.push(`${BOLD}Privacy Probe: ${metadata.jurisdiction} Evidence Report${RESET}`);
    lines.push(`${DIM}Scan ${metadata.scanId} · ${metadata.itinerary.length} page(s) · dataset ${metadata.datasetVersion}${RESET}`);
    lines.push(`${"─".repeat(50)}`);
    lines.push("");

    for (const session of result.sessions) {
      const state = session.aborted ? ` ${RED}(aborted)${RESET}` : "";
      lines.push(
        `  ${BOLD}${session.label}${RESET}${state}: ${session.pagesOk}/${session.pagesVisited} pages ok, ${session.totalRequests} requests, ${session.trackerRequests} to trackers, ${session.temporalLeaks} leaks`,
      );
    }
    lines.push("");
    lines.push(`  ${BOLD}Verdict:${RESET} ${result.verdict.verdict}`);
    if (result.verdict.domainsIgnoringSignal.length > 0) {
      lines.push(`    ${DIM}Ignored the signal: ${result.verdict.domainsIgnoringSignal.join(", ")}${RESET}`);
    }
    lines.push("");

    for (const violation of result.violations) {
      const color = SEVERITY_COLORS[violation.severity];
      lines.push(`  ${color}[${violation.severity}]${RESET} ${violation.ruleId} ${violation.sectionCitation}: ${violation.title}`);
      lines.push(`    ${DIM}${describeEvidence(violation)}${RESET}`);
      lines.push(`    ${DIM}Penalty: ${penaltyRange(violation)} per violation${RESET}`);
      lines.push(`    ${DIM}Fix: ${violation.recommendation}${RESET}`);
      if (violation.enrichment) {
        lines.push(`    ${violation.enrichment.plainEnglish}`);
        lines.push(`    ${DIM}${violation.enrichment.technicalFix} (${violation.enrichment.providerId})${RESET}`);
      }
    }

    const errored = result.ruleRuns.filter((r) => r.status === "error");
    for (const run of errored) {
      lines.push(`  ${RED}! ${run.ruleId}: ${run.reason ?? "detector failed"}${RESET}`);
    }

    if (metadata.warnings.length > 0) {
      lines.push("");
      lines.push(`  ${YELLOW}Warnings:${RESET}`);
      for (const warning of metadata.warnings) {
        lines.push(`    ${DIM}${warning}${RESET}`);
      }
    }

    lines.push("");
    lines.push(`${"─".repeat(50)}`);

    const s = result.summary;
    lines.push(`  ${OUTCOME_LINES[result.outcome]}`);
    if (s.totalViolations > 0) {
      const parts: string[] = [];
      if (s.severityCounts.HIGH > 0) parts.push(`${MAGENTA}${s.severityCounts.HIGH} HIGH${RESET}`);
      if (s.severityCounts.MEDIUM > 0) parts.push(`${YELLOW}${s.severityCounts.MEDIUM} MEDIUM${RESET}`);
      if (s.severityCounts.LOW > 0) parts.push(`${CYAN}${s.severityCounts.LOW} LOW${RESET}`);
      lines.push(`  ${BOLD}Violations:${RESET} ${parts.join(", ")}`);
      lines.push(
        `  ${BOLD}Potential exposure:${RESET} ${usd.format(s.minPotentialPenaltyUsd)} – ${usd.format(s.maxPotentialPenaltyUsd)}`,
      );
    }
    lines.push(`  ${DIM}Rules: ${result.ruleRuns.length} loaded, ${s.rulesEvaluated} evaluated${RESET}`);
    lines.push(`  ${DIM}Duration: ${metadata.durationMs}ms${RESET}`);
    lines.push("");

    return lines.join("\n");
  }
}
