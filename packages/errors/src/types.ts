/**
 * One field-level problem in a scan configuration or data file.
 */
export interface ValidationIssue {
  /** Dotted path into the input, e.g. `timing.leakThresholdMs` or `itinerary.2`; empty for the root */
  field: string;
  message: string;
  /** Validator-specific code such as zod's `too_small` */
  code: string;
  value?: unknown;
}
