import { msAfterLoad } from "../temporal-leak.js";
import type { Detector, DetectorInput, PageVisit, SessionLog } from "../types.js";

export const DETECTOR_KEYS = {
  signalNotHonored: "signal_not_honored",
  temporalLeak: "temporal_leak",
  missingOptOutLink: "missing_opt_out_link",
  missingConsentBanner: "missing_consent_banner",
  piiInTrackingRequest: "pii_in_tracking_request",
} as const;

export const RECOMMENDATIONS = {
  SIGNAL_NOT_HONORED:
    "Stop all third-party tracker beacons when the Sec-GPC: 1 header is received. Process the opt-out within 15 business days (§1798.185(a)(14)).",
  TEMPORAL_LEAK:
    "Trackers fired before the privacy signal could be processed, so data left the browser before the opt-out took effect. Block trackers before page load whenever the GPC header is present.",
  MISSING_OPT_OUT_LINK:
    "Add a clear and conspicuous 'Do Not Sell or Share My Personal Information' link to all pages (CCPA §1798.135(a)).",
  MISSING_CONSENT_BANNER:
    "Display a privacy/cookie consent banner on all pages before loading non-essential tracking scripts.",
  PII_IN_TRACKING_REQUEST:
    "Remove or anonymize PII in outbound tracker URLs. Never pass email, phone or hashed IDs in beacon request parameters.",
} as const;

const MAX_SAMPLE_LEAKS = 3;
const MAX_SAMPLE_URLS = 10;
const MAX_SAMPLE_DOMAINS = 5;

// ============================================================================
// HELPERS
// ============================================================================

function successfulVisits(log: SessionLog): PageVisit[] {
  return log.pageVisits.filter((v) => v.status === "ok");
}

function trackerRequestCount(log: SessionLog): number {
  return log.requests.filter((r) => r.isTracker).length;
}

function unique<T>(values: Iterable<T>): T[] {
  return [...new Set(values)];
}

// ============================================================================
// DETECTORS
// ============================================================================

/** Trackers contacted under the signal that were also contacted without it */
export const signalNotHonored: Detector = (input: DetectorInput) => {
  if (input.verdict.verdict === "INSUFFICIENT_DATA") {
    return { kind: "not_evaluable", reason: "a session has no successfully visited page" };
  }
  const domains = input.verdict.domainsIgnoringSignal;
  if (domains.length === 0) {
    return { kind: "compliant" };
  }

  const baselineTrackerRequests = trackerRequestCount(input.baseline);
  const complianceTrackerRequests = trackerRequestCount(input.compliance);
  const reduction = (1 - complianceTrackerRequests / Math.max(baselineTrackerRequests, 1)) * 100;

  return {
    kind: "violation",
    finding: {
      violationType: "SIGNAL_NOT_HONORED",
      severity: "HIGH",
      recommendation: RECOMMENDATIONS.SIGNAL_NOT_HONORED,
      evidence: {
        domainsIgnoringSignal: [...domains],
        baselineTrackerRequests,
        complianceTrackerRequests,
        reductionPercent: Math.round(reduction * 10) / 10,
      },
    },
  };
};

/** Trackers firing inside the leak window of a compliance page load */
export const temporalLeak: Detector = (input: DetectorInput) => {
  if (input.verdict.verdict === "INSUFFICIENT_DATA") {
    return { kind: "not_evaluable", reason: "a session has no successfully visited page" };
  }
  const leaks = input.complianceLeaks;
  if (leaks.length === 0) {
    return { kind: "compliant" };
  }

  return {
    kind: "violation",
    finding: {
      violationType: "TEMPORAL_LEAK",
      severity: "HIGH",
      recommendation: RECOMMENDATIONS.TEMPORAL_LEAK,
      evidence: {
        leakCount: leaks.length,
        leakedDomains: unique(leaks.map((l) => l.domain)).sort(),
        sampleLeaks: leaks.slice(0, MAX_SAMPLE_LEAKS).map((leak) => ({
          domain: leak.domain,
          fullUrl: leak.fullUrl,
          pageUrl: leak.pageUrl,
          msAfterLoad: msAfterLoad(input.compliance, leak),
        })),
        windowMs: input.leakThresholdMs,
      },
    },
  };
};

export const missingOptOutLink: Detector = (input: DetectorInput) => {
  const visits = successfulVisits(input.compliance);
  if (visits.length === 0) {
    return { kind: "not_evaluable", reason: "no successfully visited compliance page" };
  }
  const missing = visits.filter((v) => !v.optOutLinkPresent);
  if (missing.length === 0) {
    return { kind: "compliant" };
  }

  return {
    kind: "violation",
    finding: {
      violationType: "MISSING_OPT_OUT_LINK",
      severity: "HIGH",
      recommendation: RECOMMENDATIONS.MISSING_OPT_OUT_LINK,
      evidence: {
        affectedPages: missing.length,
        sampleUrls: missing.slice(0, MAX_SAMPLE_URLS).map((v) => v.url),
        pagesChecked: visits.length,
      },
    },
  };
};

/** Pages where no consent banner was found, deduplicated across sessions */
export const missingConsentBanner: Detector = (input: DetectorInput) => {
  const visits = input.sessions.flatMap(successfulVisits);
  if (visits.length === 0) {
    return { kind: "not_evaluable", reason: "no successfully visited page" };
  }
  const checked = unique(visits.map((v) => v.url));
  const missing = unique(visits.filter((v) => !v.cookieBannerPresent).map((v) => v.url));
  if (missing.length === 0) {
    return { kind: "compliant" };
  }

  return {
    kind: "violation",
    finding: {
      violationType: "MISSING_CONSENT_BANNER",
      severity: "MEDIUM",
      recommendation: RECOMMENDATIONS.MISSING_CONSENT_BANNER,
      evidence: {
        affectedPages: missing.length,
        sampleUrls: missing.slice(0, MAX_SAMPLE_URLS),
        pagesChecked: checked.length,
      },
    },
  };
};

export const piiInTrackingRequest: Detector = (input: DetectorInput) => {
  if (input.sessions.every((log) => successfulVisits(log).length === 0)) {
    return { kind: "not_evaluable", reason: "no successfully visited page" };
  }

  const perSession: Record<string, number> = {};
  const offending = input.sessions.flatMap((log) => {
    const hits = log.requests.filter((r) => r.isTracker && r.containsPii);
    perSession[log.label] = hits.length;
    return hits;
  });
  if (offending.length === 0) {
    return { kind: "compliant" };
  }

  return {
    kind: "violation",
    finding: {
      violationType: "PII_IN_TRACKING_REQUEST",
      severity: "MEDIUM",
      recommendation: RECOMMENDATIONS.PII_IN_TRACKING_REQUEST,
      evidence: {
        requestCount: offending.length,
        sampleDomains: unique(offending.map((r) => r.domain)).slice(0, MAX_SAMPLE_DOMAINS),
        indicators: unique(offending.flatMap((r) => r.piiIndicators)).sort(),
        perSession,
      },
    },
  };
};
