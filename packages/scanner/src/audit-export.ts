import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { EvidenceReport, SessionLog } from "./types.js";

export const REPORT_FILE = "evidence-report.json";

export function sessionFileName(label: string): string {
  return `${label}.session.json`;
}

/**
 * Write one `<label>.session.json` per session (visits and requests in
 * insertion order, then the cookie and storage snapshot, `null` when the
 * browser never reported one) plus `evidence-report.json` into `dir`. Returns the paths
 * written.
 */
export async function exportAuditTrail(
  dir: string,
  sessions: ReadonlyMap<string, SessionLog>,
  report: EvidenceReport,
): Promise<string[]> {
  await mkdir(dir, { recursive: true });
  const written: string[] = [];

  for (const log of sessions.values()) {
    const path = join(dir, sessionFileName(log.label));
    const document = {
      label: log.label,
      aborted: log.aborted,
      warnings: log.warnings,
      stats: log.stats,
      trackerDomains: log.trackerDomains,
      pageVisits: log.pageVisits,
      requests: log.requests,
      state: log.state ?? null,
    };
    await writeFile(path, `${JSON.stringify(document, null, 2)}\n`, "utf8");
    written.push(path);
  }

  const reportPath = join(dir, REPORT_FILE);
  await writeFile(reportPath, `${JSON.stringify(report, null, 2)}\n`, "utf8");
  written.push(reportPath);
  return written;
}
