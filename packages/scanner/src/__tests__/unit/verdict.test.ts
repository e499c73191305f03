import { describe, expect, it } from "vitest";
import { computeVerdict } from "../../verdict.js";
import { makeLog, makeRequest, makeVisit } from "../helpers.js";

const options = { leakThresholdMs: 500 };

/** Tracker traffic outside any leak window */
function trackers(label: string, domains: readonly string[]) {
  return makeLog({
    label,
    pageVisits: [makeVisit({ loadTimestampMs: 0 })],
    requests: domains.map((domain, i) =>
      makeRequest({ sessionLabel: label, domain, fullUrl: `https://${domain}/p`, requestTimestampMs: 2000 + i }),
    ),
  });
}

describe("computeVerdict", () => {
  it("is compliant when only baseline-only trackers disappear", () => {
    const result = computeVerdict(trackers("baseline", ["a.com", "b.com"]), trackers("compliance", ["c.com"]), options);

    expect(result).toEqual({ verdict: "COMPLIANT", domainsIgnoringSignal: [], leakCount: 0 });
  });

  it("is non-compliant when a tracker is contacted in both sessions", () => {
    const result = computeVerdict(
      trackers("baseline", ["a.com", "doubleclick.net"]),
      trackers("compliance", ["doubleclick.net"]),
      options,
    );

    expect(result).toEqual({
      verdict: "NON_COMPLIANT",
      domainsIgnoringSignal: ["doubleclick.net"],
      leakCount: 0,
    });
  });

  it("is non-compliant when the compliance session leaks", () => {
    const compliance = makeLog({
      pageVisits: [makeVisit({ loadTimestampMs: 0 })],
      requests: [makeRequest({ domain: "c.com", requestTimestampMs: 100 })],
    });

    const result = computeVerdict(trackers("baseline", ["a.com"]), compliance, options);
    expect(result).toEqual({ verdict: "NON_COMPLIANT", domainsIgnoringSignal: [], leakCount: 1 });
  });

  it("ignores leaks in the baseline session", () => {
    const baseline = makeLog({
      label: "baseline",
      pageVisits: [makeVisit({ loadTimestampMs: 0 })],
      requests: [makeRequest({ domain: "a.com", requestTimestampMs: 100 })],
    });

    expect(computeVerdict(baseline, trackers("compliance", []), options).verdict).toBe("COMPLIANT");
  });

  it("reports insufficient data when a session loaded no page", () => {
    const failed = makeLog({
      label: "compliance",
      pageVisits: [makeVisit({ status: "failed", error: "net::ERR_NAME_NOT_RESOLVED" })],
    });

    const result = computeVerdict(trackers("baseline", ["a.com"]), failed, options);
    expect(result).toEqual({ verdict: "INSUFFICIENT_DATA", domainsIgnoringSignal: [], leakCount: 0 });
  });
});
