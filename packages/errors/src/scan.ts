/**
 * Scan errors: dual-session capture and rule evaluation
 *
 * Abstract base: ScanError
 * Concrete:
 *   - ScanConfigurationInvalidError   (SCAN_CONFIGURATION_INVALID)
 *   - RuleDatasetUnavailableError     (SCAN_RULE_DATASET_UNAVAILABLE)
 *   - ClassificationTableInvalidError (SCAN_CLASSIFICATION_TABLE_INVALID)
 *   - BrowserUnavailableError         (SCAN_BROWSER_UNAVAILABLE)
 *   - NavigationTimeoutError          (SCAN_NAVIGATION_TIMEOUT)
 *   - SessionAbortedError             (SCAN_SESSION_ABORTED)
 *   - DetectorFailedError             (SCAN_DETECTOR_FAILED)
 */

import { PrivacyProbeError } from "./base.js";
import type { ValidationIssue } from "./types.js";

// ---------------------------------------------------------------------------
// Abstract Base
// ---------------------------------------------------------------------------

/**
 * Enables generic catch: `if (e instanceof ScanError)`
 */
export abstract class ScanError extends PrivacyProbeError {}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export class ScanConfigurationInvalidError extends ScanError {
  readonly code = "SCAN_CONFIGURATION_INVALID" as const;
  readonly validationErrors: readonly string[];
  readonly issues: readonly ValidationIssue[];

  constructor(validationErrors: readonly string[], issues: readonly ValidationIssue[] = []) {
    super(`Invalid scan configuration: ${validationErrors.join("; ")}`);
    this.validationErrors = validationErrors;
    this.issues = issues;
  }
}

// ---------------------------------------------------------------------------
// Data files
// ---------------------------------------------------------------------------

/**
 * Thrown before any browsing starts when the jurisdiction's rule dataset
 * is missing, empty or malformed.
 */
export class RuleDatasetUnavailableError extends ScanError {
  readonly code = "SCAN_RULE_DATASET_UNAVAILABLE" as const;
  readonly jurisdiction: string;
  readonly reason: string;

  constructor(jurisdiction: string, reason: string, cause?: Error) {
    super(`Rule dataset for jurisdiction "${jurisdiction}" unavailable: ${reason}`, cause ? { cause } : undefined);
    this.jurisdiction = jurisdiction;
    this.reason = reason;
  }
}

export class ClassificationTableInvalidError extends ScanError {
  readonly code = "SCAN_CLASSIFICATION_TABLE_INVALID" as const;
  readonly table: string;
  readonly reason: string;

  constructor(table: string, reason: string, cause?: Error) {
    super(`Classification table "${table}" invalid: ${reason}`, cause ? { cause } : undefined);
    this.table = table;
    this.reason = reason;
  }
}

// ---------------------------------------------------------------------------
// Browser
// ---------------------------------------------------------------------------

export class BrowserUnavailableError extends ScanError {
  readonly code = "SCAN_BROWSER_UNAVAILABLE" as const;

  constructor(message: string, cause?: Error) {
    super(`Browser unavailable: ${message}`, cause ? { cause } : undefined);
  }
}

/** Which part of a page visit ran out of time */
export type PageTimeoutStage = "navigation" | "inspection";

/**
 * Recorded on the page visit, never thrown out of a session.
 */
export class NavigationTimeoutError extends ScanError {
  readonly code = "SCAN_NAVIGATION_TIMEOUT" as const;
  readonly url: string;
  readonly timeoutMs: number;
  readonly stage: PageTimeoutStage;

  constructor(url: string, timeoutMs: number, stage: PageTimeoutStage = "navigation") {
    super(
      stage === "navigation"
        ? `Navigation to ${url} exceeded ${timeoutMs}ms`
        : `Inspecting ${url} exceeded ${timeoutMs}ms`,
    );
    this.url = url;
    this.timeoutMs = timeoutMs;
    this.stage = stage;
  }
}

export class SessionAbortedError extends ScanError {
  readonly code = "SCAN_SESSION_ABORTED" as const;
  readonly sessionLabel: string;
  readonly reason: string;

  constructor(sessionLabel: string, reason: string) {
    super(`Session "${sessionLabel}" aborted: ${reason}`);
    this.sessionLabel = sessionLabel;
    this.reason = reason;
  }
}

// ---------------------------------------------------------------------------
// Evaluation
// ---------------------------------------------------------------------------

export class DetectorFailedError extends ScanError {
  readonly code = "SCAN_DETECTOR_FAILED" as const;
  readonly ruleId: string;
  readonly detectorKey: string;

  constructor(ruleId: string, detectorKey: string, cause?: Error) {
    super(
      `Detector "${detectorKey}" failed for rule ${ruleId}${cause ? `: ${cause.message}` : ""}`,
      cause ? { cause } : undefined,
    );
    this.ruleId = ruleId;
    this.detectorKey = detectorKey;
  }
}
