import { EnrichmentChain } from "@privacy-probe/enrichment";
import { getErrorMessage } from "@privacy-probe/errors";
import { addSpanEvent, withSpan } from "@privacy-probe/telemetry";
import { exportAuditTrail } from "./audit-export.js";
import { createPlaywrightLauncher } from "./browser/playwright.js";
import type { BrowserLauncher } from "./browser/types.js";
import { loadClassificationTables } from "./classification/tables.js";
import type { TimeSource } from "./clock.js";
import { enrichViolations, logProviderFailure } from "./enrichment.js";
import { SYSTEM_SOURCE, ScanEventLog } from "./events.js";
import { ReportBuilder } from "./report-builder.js";
import { loadRuleDataset } from "./rules/dataset.js";
import { type DetectorRegistry, evaluateRules } from "./rules/registry.js";
import { runSessions } from "./session-runner.js";
import { detectLeaks } from "./temporal-leak.js";
import type {
  EvaluationResult,
  EvidenceReport,
  ResolvedScanConfig,
  ScanEvent,
  SessionLog,
} from "./types.js";
import { resolveScanConfig, validateScanConfig } from "./validation.js";
import { computeVerdict } from "./verdict.js";

export interface ScanDependencies {
  /** Defaults to Chromium through playwright-core */
  readonly launcher?: BrowserLauncher;
  readonly events?: ScanEventLog;
  /** Overrides the chain built from `config.enrichment.providers`; `null` disables enrichment */
  readonly enrichment?: EnrichmentChain | null;
  readonly registry?: DetectorRegistry;
  readonly timeSource?: TimeSource;
  readonly now?: () => Date;
  readonly signal?: AbortSignal;
}

export interface ScanResult {
  readonly config: ResolvedScanConfig;
  readonly report: EvidenceReport;
  readonly sessions: ReadonlyMap<string, SessionLog>;
  readonly events: readonly ScanEvent[];
  readonly exportedFiles: readonly string[];
}

export function emptySessionLog(label: string): SessionLog {
  return Object.freeze({
    label,
    pageVisits: Object.freeze([]),
    requests: Object.freeze([]),
    trackerDomains: Object.freeze([]),
    aborted: true,
    warnings: Object.freeze(["session produced no log"]),
    stats: Object.freeze({ duplicatesDropped: 0, classificationErrors: 0, lateRequests: 0 }),
  });
}

function buildChain(config: ResolvedScanConfig, events: ScanEventLog): EnrichmentChain | null {
  if (config.enrichment.providers.length === 0) {
    return null;
  }
  return EnrichmentChain.fromConfig({
    providers: config.enrichment.providers,
    onProviderFailure: logProviderFailure(events),
  });
}

/**
 * Run one complete scan: validate config, load the rule dataset and lookup
 * tables, capture all sessions, diff them, evaluate the rules, optionally
 * enrich, then build (and optionally export) the evidence report.
 *
 * Configuration, dataset and table problems throw before any browser starts.
 * Everything after that degrades into warnings on the report.
 */
export async function runScan(input: unknown, deps: ScanDependencies = {}): Promise<ScanResult> {
  const now = deps.now ?? (() => new Date());
  const events = deps.events ?? new ScanEventLog(now);
  const config = resolveScanConfig(validateScanConfig(input));
  const startedAt = now();

  return withSpan(
    "privacy_probe.scan",
    {
      "scan.id": config.scanId,
      "scan.jurisdiction": config.jurisdiction,
      "scan.pages": config.itinerary.length,
    },
    async (span) => {
      const [dataset, tables] = await Promise.all([
        loadRuleDataset(config.jurisdiction, config.rulesDir),
        loadClassificationTables(config.dataDir),
      ]);
      events.info(
        SYSTEM_SOURCE,
        `Loaded ${dataset.rules.length} ${dataset.jurisdiction} rules (${dataset.version}), ${tables.trackers.size} tracker domains`,
      );

      const sessions = await runSessions(config.itinerary, config.sessions, {
        launcher: deps.launcher ?? createPlaywrightLauncher(),
        tables,
        events,
        timing: config.timing,
        browser: config.browser,
        ...(deps.timeSource ? { timeSource: deps.timeSource } : {}),
      });

      const baseline = sessions.get(config.baselineLabel) ?? emptySessionLog(config.baselineLabel);
      const compliance =
        sessions.get(config.complianceLabel) ?? emptySessionLog(config.complianceLabel);
      const { leakThresholdMs } = config.timing;

      const leakCounts = new Map<string, number>();
      for (const [label, log] of sessions) {
        leakCounts.set(label, detectLeaks(log, leakThresholdMs).length);
      }
      const complianceLeaks = detectLeaks(compliance, leakThresholdMs);
      const verdict = computeVerdict(baseline, compliance, { leakThresholdMs });
      addSpanEvent("verdict", {
        verdict: verdict.verdict,
        "verdict.domains_ignoring_signal": verdict.domainsIgnoringSignal,
        "verdict.leak_count": verdict.leakCount,
      });
      events.emit(
        SYSTEM_SOURCE,
        verdict.verdict === "COMPLIANT" ? "SUCCESS" : "WARNING",
        `Verdict ${verdict.verdict}: ${verdict.domainsIgnoringSignal.length} trackers ignored the signal, ${verdict.leakCount} temporal leaks`,
      );

      const evaluation = evaluateRules(
        dataset.rules,
        {
          baseline,
          compliance,
          sessions: config.sessions.map((s) => sessions.get(s.label) ?? emptySessionLog(s.label)),
          verdict,
          complianceLeaks,
          leakThresholdMs,
        },
        {
          supersession: config.supersession,
          events,
          ...(deps.registry ? { registry: deps.registry } : {}),
        },
      );

      const chain = deps.enrichment === undefined ? buildChain(config, events) : deps.enrichment;
      let finalEvaluation: EvaluationResult = evaluation;
      if (chain && !chain.isEmpty && evaluation.violations.length > 0) {
        const violations = await enrichViolations(evaluation.violations, {
          chain,
          rules: dataset.rules,
          events,
          maxViolations: config.enrichment.maxViolations,
          ...(deps.signal ? { signal: deps.signal } : {}),
        });
        finalEvaluation = { violations, runs: evaluation.runs };
      }

      const report = ReportBuilder.build({
        config,
        dataset,
        sessions,
        verdict,
        evaluation: finalEvaluation,
        leakCounts,
        startedAt,
        completedAt: now(),
        enrichmentProviders: chain ? chain.providerIds : [],
      });
      span.setAttribute("scan.outcome", report.outcome);
      events.emit(
        SYSTEM_SOURCE,
        report.outcome === "VIOLATIONS_FOUND" ? "WARNING" : "SUCCESS",
        `Scan complete: ${report.outcome}, ${report.summary.totalViolations} violations`,
      );

      let exportedFiles: string[] = [];
      if (config.exportDir) {
        try {
          exportedFiles = await exportAuditTrail(config.exportDir, sessions, report);
          events.info(SYSTEM_SOURCE, `Audit trail written to ${config.exportDir}`);
        } catch (error) {
          events.error(SYSTEM_SOURCE, `Audit export failed: ${getErrorMessage(error)}`);
        }
      }

      return { config, report, sessions, events: events.snapshot(), exportedFiles };
    },
  );
}
