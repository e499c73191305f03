import type { EvidenceReport } from "../types.js";

/**
 * Reporter interface for formatting evidence reports.
 */
export interface ScanReporter {
  readonly name: string;
  report(result: EvidenceReport): string;
}
