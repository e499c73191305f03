import { detectLeaks } from "./temporal-leak.js";
import type { SessionLog, VerdictResult } from "./types.js";

export interface VerdictOptions {
  readonly leakThresholdMs: number;
}

function hasSuccessfulVisit(log: SessionLog): boolean {
  return log.pageVisits.some((v) => v.status === "ok");
}

/**
 * Compare a baseline session against a compliance session.
 *
 * Only trackers contacted in both sessions, plus trackers leaking from the
 * compliance session, count against the site; domains seen only in baseline
 * are what the signal is supposed to suppress.
 */
export function computeVerdict(
  baseline: SessionLog,
  compliance: SessionLog,
  options: VerdictOptions,
): VerdictResult {
  const complianceDomains = new Set(compliance.trackerDomains);
  const domainsIgnoringSignal = [
    ...new Set(baseline.trackerDomains.filter((d) => complianceDomains.has(d))),
  ].sort();
  const leakCount = detectLeaks(compliance, options.leakThresholdMs).length;

  if (!hasSuccessfulVisit(baseline) || !hasSuccessfulVisit(compliance)) {
    return { verdict: "INSUFFICIENT_DATA", domainsIgnoringSignal, leakCount };
  }

  return {
    verdict: domainsIgnoringSignal.length > 0 || leakCount > 0 ? "NON_COMPLIANT" : "COMPLIANT",
    domainsIgnoringSignal,
    leakCount,
  };
}
