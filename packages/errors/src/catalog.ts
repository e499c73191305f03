/**
 * Error Catalog - Single Source of Truth
 *
 * Every error code used across the privacy-probe packages, with whether it
 * marks an anticipated condition (bad input, missing data, a slow site or a
 * throttling provider) rather than a bug.
 *
 * Naming convention: DOMAIN_SPECIFIC_ERROR (UPPER_SNAKE_CASE)
 */

export const ERROR_CATALOG = {
  // ============================================================================
  // SCAN ERRORS - Dual-session capture and rule evaluation
  // ============================================================================
  SCAN_CONFIGURATION_INVALID: {
    isExpected: true,
    description: "The scan configuration failed validation",
  },
  SCAN_RULE_DATASET_UNAVAILABLE: {
    isExpected: true,
    description: "The rule dataset for the jurisdiction is missing, empty or malformed",
  },
  SCAN_CLASSIFICATION_TABLE_INVALID: {
    isExpected: true,
    description: "The tracker-domain or PII-pattern table could not be loaded",
  },
  SCAN_BROWSER_UNAVAILABLE: {
    isExpected: false,
    description: "The browser automation library could not be loaded or launched",
  },
  SCAN_NAVIGATION_TIMEOUT: {
    isExpected: true,
    description: "A page did not load, or could not be inspected, within the per-page timeout",
  },
  SCAN_SESSION_ABORTED: {
    isExpected: true,
    description: "A browsing session was cancelled before its itinerary completed",
  },
  SCAN_DETECTOR_FAILED: {
    isExpected: false,
    description: "A rule detector raised while evaluating session data",
  },

  // ============================================================================
  // ENRICHMENT ERRORS - Text-generation providers
  // ============================================================================
  ENRICHMENT_PROVIDER_ERROR: {
    isExpected: false,
    description: "The text-generation provider returned an error",
  },
  ENRICHMENT_RATE_LIMITED: {
    isExpected: true,
    description: "The text-generation provider rejected the request with a rate limit",
  },
  ENRICHMENT_RESPONSE_INVALID: {
    isExpected: false,
    description: "The provider response did not contain the expected explanation fields",
  },
} as const;

/**
 * Union type of all error codes
 */
export type ErrorCode = keyof typeof ERROR_CATALOG;
