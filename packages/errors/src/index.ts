/**
 * @privacy-probe/errors
 *
 * Shared error taxonomy for the privacy-probe packages: domain hierarchies
 * for scanning and enrichment. Each error carries a `.code` from the
 * catalog; use `error.code === "XXX"` for fine-grained matching, or
 * `instanceof` for category matching.
 */

// ============================================================================
// CORE EXPORTS
// ============================================================================

export { describeError, getErrorMessage, isPrivacyProbeError, PrivacyProbeError } from "./base.js";

export { ERROR_CATALOG, type ErrorCode } from "./catalog.js";

export type { ValidationIssue } from "./types.js";

// ============================================================================
// TYPE GUARDS
// ============================================================================

export { isExpectedError, isPreflightError } from "./guards.js";

// ============================================================================
// DOMAIN ERRORS
// ============================================================================

export {
  BrowserUnavailableError,
  ClassificationTableInvalidError,
  DetectorFailedError,
  NavigationTimeoutError,
  type PageTimeoutStage,
  RuleDatasetUnavailableError,
  ScanConfigurationInvalidError,
  ScanError,
  SessionAbortedError,
} from "./scan.js";

export {
  EnrichmentError,
  EnrichmentProviderError,
  EnrichmentRateLimitedError,
  EnrichmentResponseInvalidError,
} from "./enrichment.js";
