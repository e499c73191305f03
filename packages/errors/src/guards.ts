/**
 * Type guards: anticipated conditions and scan phases.
 */

import { PrivacyProbeError } from "./base.js";
import type { ErrorCode } from "./catalog.js";

/** An anticipated condition rather than a bug; false for anything outside the hierarchy. */
export function isExpectedError(error: unknown): error is PrivacyProbeError {
  return error instanceof PrivacyProbeError && error.isExpected;
}

const PRE_BROWSER_CODES: ReadonlySet<ErrorCode> = new Set<ErrorCode>([
  "SCAN_CONFIGURATION_INVALID",
  "SCAN_RULE_DATASET_UNAVAILABLE",
  "SCAN_CLASSIFICATION_TABLE_INVALID",
]);

/**
 * Errors raised while preparing a scan, before any browser starts. These
 * fail the whole scan; everything later degrades into report warnings.
 */
export function isPreflightError(error: unknown): error is PrivacyProbeError {
  return error instanceof PrivacyProbeError && PRE_BROWSER_CODES.has(error.code);
}
