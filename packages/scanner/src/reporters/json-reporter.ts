import type { EvidenceReport } from "../types.js";
import type { ScanReporter } from "./types.js";

// ---------------------------------------------------------------------------
// JSON reporter
// ---------------------------------------------------------------------------

/**
 * Renders the full evidence report as formatted JSON.
 */
export class JsonReporter implements ScanReporter {
  readonly name = "json";

  report(result: EvidenceReport): string {
    return JSON.stringify(result, null, 2);
  }
}
