/**
 * @privacy-probe/scanner
 *
 * Drives a baseline and a privacy-signal browser session over the same
 * itinerary, diffs their tracker traffic, evaluates a jurisdiction's rule
 * dataset against the result and builds an evidence report.
 */

// ============================================================================
// SCAN ORCHESTRATION
// ============================================================================

export { runScan, type ScanDependencies, type ScanResult } from "./scan.js";
export { runSession, runSessions, type SessionRunnerOptions } from "./session-runner.js";
export { SYSTEM_SOURCE, ScanEventLog, type ScanEventListener } from "./events.js";
export { createSessionClock, type SessionClock, type TimeSource } from "./clock.js";

// ============================================================================
// CAPTURE AND CLASSIFICATION
// ============================================================================

export { TrafficRecorder, type CapturedRequest, type TrafficRecorderOptions } from "./recorder.js";
export { TrackerMatcher } from "./classification/tracker-matcher.js";
export { PiiMatcher, type PiiIndicator } from "./classification/pii-matcher.js";
export {
  type ClassificationTables,
  loadClassificationTables,
  PAGE_PROBE_TABLE_FILE,
  PII_TABLE_FILE,
  type PageProbeTable,
  TRACKER_TABLE_FILE,
} from "./classification/tables.js";
export { DEFAULT_DATA_DIR } from "./paths.js";

// ============================================================================
// ANALYSIS
// ============================================================================

export { detectLeaks, msAfterLoad } from "./temporal-leak.js";
export { computeVerdict, type VerdictOptions } from "./verdict.js";
export { datasetPath, loadRuleDataset } from "./rules/dataset.js";
export {
  DETECTOR_KEYS,
  RECOMMENDATIONS,
  missingConsentBanner,
  missingOptOutLink,
  piiInTrackingRequest,
  signalNotHonored,
  temporalLeak,
} from "./rules/detectors.js";
export {
  createDefaultRegistry,
  DetectorRegistry,
  type EvaluateOptions,
  evaluateRules,
} from "./rules/registry.js";
export { type EnrichOptions, enrichViolations } from "./enrichment.js";

// ============================================================================
// REPORTING
// ============================================================================

export { ReportBuilder, type ReportInput, TOOL_NAME, TOOL_VERSION } from "./report-builder.js";
export { exportAuditTrail, REPORT_FILE, sessionFileName } from "./audit-export.js";
export { JsonReporter } from "./reporters/json-reporter.js";
export { TerminalReporter } from "./reporters/terminal-reporter.js";
export { attachConsoleSink, type ConsoleLike, formatEvent } from "./reporters/console-sink.js";
export type { ScanReporter } from "./reporters/types.js";

// ============================================================================
// BROWSER
// ============================================================================

export { createPlaywrightLauncher, type PlaywrightLauncherOptions } from "./browser/playwright.js";
export type {
  BrowserLauncher,
  BrowserSession,
  NavigationResult,
  ObservedRequest,
  ScanPage,
  SessionLaunchOptions,
} from "./browser/types.js";

// ============================================================================
// CONFIGURATION AND VALIDATION
// ============================================================================

export {
  CONFIG_DEFAULTS,
  DEFAULT_SIGNAL_CONFIGS,
  EvidenceReportSchema,
  GPC_INIT_SCRIPT,
  type ParsedScanConfig,
  resolveScanConfig,
  RuleDatasetSchema,
  RuleSchema,
  type ScanConfig,
  ScanConfigSchema,
  SignalConfigSchema,
  validateEvidenceReport,
  validateScanConfig,
} from "./validation.js";

export type * from "./types.js";

// ============================================================================
// PACKAGE METADATA
// ============================================================================

export const PACKAGE_NAME = "@privacy-probe/scanner";
export const PACKAGE_VERSION = "0.1.0";
