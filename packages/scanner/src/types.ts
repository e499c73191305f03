/**
 * Scanner domain types
 *
 * Domain values for dual-session capture, diffing and rule evaluation.
 * Everything here is produced once and never mutated afterwards.
 */

// ============================================================================
// EVENTS
// ============================================================================

export type EventLevel = "INFO" | "WARNING" | "ERROR" | "SUCCESS";

/** Session label, or "system" for scan-wide events */
export type EventSource = string;

export interface ScanEvent {
  readonly timestamp: string;
  readonly session: EventSource;
  readonly level: EventLevel;
  readonly message: string;
}

// ============================================================================
// SESSION CAPTURE
// ============================================================================

/** The privacy-signal condition a single session asserts */
export interface SignalConfig {
  readonly label: string;
  readonly httpHeaders: Readonly<Record<string, string>>;
  /** Init scripts run before any page script, in order */
  readonly scriptOverrides: readonly string[];
  readonly simulateRejectAction: boolean;
}

export type PageVisitStatus = "ok" | "failed";

export interface PageVisit {
  readonly url: string;
  /** Session clock reading when navigation to this URL began */
  readonly loadTimestampMs: number;
  readonly cookieBannerPresent: boolean;
  readonly optOutLinkPresent: boolean;
  readonly status: PageVisitStatus;
  readonly httpStatus?: number;
  readonly error?: string;
  readonly rejectActionPerformed?: boolean;
}

export interface NetworkRequest {
  readonly sessionLabel: string;
  readonly pageUrl: string;
  readonly requestTimestampMs: number;
  /** Lower-cased hostname; empty when the URL could not be parsed */
  readonly domain: string;
  readonly fullUrl: string;
  readonly method: string;
  readonly resourceType: string;
  readonly isTracker: boolean;
  readonly containsPii: boolean;
  readonly piiIndicators: readonly string[];
  readonly classificationError?: string;
}

export interface SessionStats {
  readonly duplicatesDropped: number;
  readonly classificationErrors: number;
  readonly lateRequests: number;
}

export interface StoredCookie {
  readonly name: string;
  readonly value: string;
  readonly domain: string;
  readonly path: string;
  /** Unix seconds; -1 for a session cookie */
  readonly expires: number;
  readonly httpOnly: boolean;
  readonly secure: boolean;
  readonly sameSite: "Strict" | "Lax" | "None";
}

export interface OriginStorage {
  readonly origin: string;
  readonly localStorage: readonly { readonly name: string; readonly value: string }[];
}

/** Cookie jar and local storage of a browser context at session end */
export interface SessionStateSnapshot {
  readonly cookies: readonly StoredCookie[];
  readonly origins: readonly OriginStorage[];
}

export interface SessionLog {
  readonly label: string;
  readonly pageVisits: readonly PageVisit[];
  /** Capture order */
  readonly requests: readonly NetworkRequest[];
  /** Sorted, unique */
  readonly trackerDomains: readonly string[];
  readonly aborted: boolean;
  readonly warnings: readonly string[];
  readonly stats: SessionStats;
  /** Absent when the session never launched or the browser could not report it */
  readonly state?: SessionStateSnapshot;
}

// ============================================================================
// VERDICT
// ============================================================================

export type Verdict = "COMPLIANT" | "NON_COMPLIANT" | "INSUFFICIENT_DATA";

export interface VerdictResult {
  readonly verdict: Verdict;
  readonly domainsIgnoringSignal: readonly string[];
  readonly leakCount: number;
}

// ============================================================================
// RULES
// ============================================================================

export type Severity = "HIGH" | "MEDIUM" | "LOW";

export interface Rule {
  readonly ruleId: string;
  readonly jurisdiction: string;
  readonly sectionCitation: string;
  readonly title: string;
  /** Short summary handed to enrichment providers */
  readonly ruleText: string;
  readonly detectorKey: string | null;
  readonly penaltyMin: number | null;
  readonly penaltyMax: number | null;
  readonly appliesTo: string;
  /** ruleId of the provision this one amends */
  readonly supersedes?: string;
}

export interface RuleDataset {
  readonly jurisdiction: string;
  readonly name: string;
  readonly version: string;
  readonly rules: readonly Rule[];
}

export type SupersessionMode = "prefer-latest" | "load-all";

// ============================================================================
// VIOLATIONS
// ============================================================================

export type ViolationType =
  | "SIGNAL_NOT_HONORED"
  | "TEMPORAL_LEAK"
  | "MISSING_OPT_OUT_LINK"
  | "MISSING_CONSENT_BANNER"
  | "PII_IN_TRACKING_REQUEST";

export interface SignalNotHonoredEvidence {
  readonly domainsIgnoringSignal: readonly string[];
  readonly baselineTrackerRequests: number;
  readonly complianceTrackerRequests: number;
  /** Percent drop in tracker requests from baseline to compliance, one decimal */
  readonly reductionPercent: number;
}

export interface LeakSample {
  readonly domain: string;
  readonly fullUrl: string;
  readonly pageUrl: string;
  readonly msAfterLoad: number;
}

export interface TemporalLeakEvidence {
  readonly leakCount: number;
  readonly leakedDomains: readonly string[];
  readonly sampleLeaks: readonly LeakSample[];
  readonly windowMs: number;
}

export interface PageProbeEvidence {
  readonly affectedPages: number;
  readonly sampleUrls: readonly string[];
  readonly pagesChecked: number;
}

export interface PiiEvidence {
  readonly requestCount: number;
  readonly sampleDomains: readonly string[];
  readonly indicators: readonly string[];
  readonly perSession: Readonly<Record<string, number>>;
}

export type ViolationFinding = (
  | { readonly violationType: "SIGNAL_NOT_HONORED"; readonly evidence: SignalNotHonoredEvidence }
  | { readonly violationType: "TEMPORAL_LEAK"; readonly evidence: TemporalLeakEvidence }
  | { readonly violationType: "MISSING_OPT_OUT_LINK"; readonly evidence: PageProbeEvidence }
  | { readonly violationType: "MISSING_CONSENT_BANNER"; readonly evidence: PageProbeEvidence }
  | { readonly violationType: "PII_IN_TRACKING_REQUEST"; readonly evidence: PiiEvidence }
) & {
  readonly severity: Severity;
  readonly recommendation: string;
};

export interface ViolationEnrichment {
  readonly plainEnglish: string;
  readonly technicalFix: string;
  readonly providerId: string;
}

export type Violation = ViolationFinding & {
  readonly ruleId: string;
  readonly sectionCitation: string;
  readonly title: string;
  readonly penaltyMinUsd: number | null;
  readonly penaltyMaxUsd: number | null;
  readonly enrichment?: ViolationEnrichment;
};

// ============================================================================
// DETECTORS
// ============================================================================

/** Everything a detector may read */
export interface DetectorInput {
  readonly baseline: SessionLog;
  readonly compliance: SessionLog;
  /** Every session of the scan, in configuration order */
  readonly sessions: readonly SessionLog[];
  readonly verdict: VerdictResult;
  /** Temporal leaks of the compliance session, capture order */
  readonly complianceLeaks: readonly NetworkRequest[];
  readonly leakThresholdMs: number;
}

export type DetectorOutcome =
  | { readonly kind: "violation"; readonly finding: ViolationFinding }
  | { readonly kind: "compliant" }
  | { readonly kind: "not_evaluable"; readonly reason: string };

export type Detector = (input: DetectorInput, rule: Rule) => DetectorOutcome;

export type RuleRunStatus =
  | "violation"
  | "compliant"
  | "not_evaluable"
  | "error"
  | "skipped_definitional"
  | "unmapped"
  | "superseded";

export interface RuleRunRecord {
  readonly ruleId: string;
  readonly detectorKey: string | null;
  readonly status: RuleRunStatus;
  readonly reason?: string;
}

export interface EvaluationResult {
  readonly violations: readonly Violation[];
  readonly runs: readonly RuleRunRecord[];
}

// ============================================================================
// REPORT
// ============================================================================

export type ScanOutcome = "VIOLATIONS_FOUND" | "NO_VIOLATIONS" | "INSUFFICIENT_DATA";

export interface SessionSummary {
  readonly label: string;
  readonly pagesVisited: number;
  readonly pagesOk: number;
  readonly pagesFailed: number;
  readonly totalRequests: number;
  readonly trackerRequests: number;
  readonly uniqueTrackerDomains: readonly string[];
  readonly temporalLeaks: number;
  readonly aborted: boolean;
  readonly warnings: readonly string[];
  readonly stats: SessionStats;
}

export interface ReportMetadata {
  readonly tool: { readonly name: string; readonly version: string };
  readonly scanId: string;
  readonly jurisdiction: string;
  readonly datasetVersion: string;
  readonly startedAt: string;
  readonly completedAt: string;
  readonly durationMs: number;
  readonly itinerary: readonly string[];
  readonly leakThresholdMs: number;
  readonly baselineLabel: string;
  readonly complianceLabel: string;
  readonly warnings: readonly string[];
  readonly enrichmentProviders: readonly string[];
}

export type SeverityCounts = Readonly<Record<Severity, number>>;

export interface ReportSummary {
  readonly totalViolations: number;
  readonly severityCounts: SeverityCounts;
  readonly minPotentialPenaltyUsd: number;
  readonly maxPotentialPenaltyUsd: number;
  readonly rulesEvaluated: number;
  readonly enrichedViolations: number;
}

export interface EvidenceReport {
  readonly metadata: ReportMetadata;
  readonly sessions: readonly SessionSummary[];
  readonly verdict: VerdictResult;
  readonly violations: readonly Violation[];
  readonly ruleRuns: readonly RuleRunRecord[];
  readonly summary: ReportSummary;
  readonly outcome: ScanOutcome;
}

// ============================================================================
// CONFIGURATION
// ============================================================================

export interface ViewportSize {
  readonly width: number;
  readonly height: number;
}

export interface BrowserSettings {
  readonly headless: boolean;
  readonly viewport: ViewportSize;
  readonly userAgent?: string;
  readonly ignoreHttpsErrors: boolean;
}

export interface TimingSettings {
  readonly perPageTimeoutMs: number;
  readonly totalTimeoutMs: number;
  /** Upper bound on waiting for network idle after navigation */
  readonly settleWaitMs: number;
  readonly actionDelayMs: number;
  readonly scrollSteps: number;
  readonly leakThresholdMs: number;
}

export interface EnrichmentSettings {
  readonly providers: readonly {
    readonly provider: string;
    readonly apiKey: string;
    readonly model?: string;
    readonly baseUrl?: string;
    readonly timeoutMs?: number;
    readonly maxTokens?: number;
  }[];
  /** Violations past this count are left unenriched */
  readonly maxViolations: number;
}

/** Fully resolved, frozen per-scan configuration */
export interface ResolvedScanConfig {
  readonly scanId: string;
  readonly jurisdiction: string;
  readonly itinerary: readonly string[];
  readonly sessions: readonly SignalConfig[];
  readonly baselineLabel: string;
  readonly complianceLabel: string;
  readonly timing: TimingSettings;
  readonly browser: BrowserSettings;
  readonly supersession: SupersessionMode;
  readonly dataDir: string;
  readonly rulesDir: string;
  readonly exportDir?: string;
  readonly enrichment: EnrichmentSettings;
}
