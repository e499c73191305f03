import { mkdtemp, readdir, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { EnrichmentChain } from "@privacy-probe/enrichment";
import { RuleDatasetUnavailableError, ScanConfigurationInvalidError } from "@privacy-probe/errors";
import { describe, expect, it, vi } from "vitest";
import { emptySessionLog, runScan } from "../../scan.js";
import { validateEvidenceReport } from "../../validation.js";
import { FakeLauncher, type FakeSite, isSignalSession, manualTime, tracker } from "../helpers.js";

const PAGE_A = "https://shop.example/";
const PAGE_B = "https://shop.example/privacy";
const FIXED_NOW = () => new Date("2024-05-01T12:00:00.000Z");

/**
 * Baseline pages load two trackers well after load. Under the signal the
 * first page still fires doubleclick 100ms after load and the second page
 * has no opt-out link.
 */
const leakySite: FakeSite = (options, url) => {
  if (!isSignalSession(options)) {
    return {
      advanceMs: 1000,
      requests: [tracker(`https://doubleclick.net/ad?p=${url}`), tracker("https://connect.facebook.net/sdk.js")],
    };
  }
  return url === PAGE_A
    ? { advanceMs: 100, requests: [tracker("https://doubleclick.net/collect")] }
    : { optOut: false };
};

const cleanSite: FakeSite = (options) =>
  isSignalSession(options)
    ? { requests: [{ url: "https://shop.example/app.js", method: "GET", resourceType: "script" }] }
    : { advanceMs: 1000, requests: [tracker("https://doubleclick.net/ad")] };

function scanInput(overrides?: Record<string, unknown>) {
  return { scanId: "scan-1", jurisdiction: "CCPA", itinerary: [PAGE_A, PAGE_B], ...overrides };
}

describe("runScan", () => {
  it("finds the violations of a site that ignores the signal", async () => {
    const time = manualTime();
    const launcher = new FakeLauncher(leakySite, { time });

    const { report, events } = await runScan(scanInput(), {
      launcher,
      timeSource: time.source,
      now: FIXED_NOW,
    });

    expect(validateEvidenceReport(report)).toEqual([]);
    expect(report.verdict).toEqual({
      verdict: "NON_COMPLIANT",
      domainsIgnoringSignal: ["doubleclick.net"],
      leakCount: 1,
    });
    expect(report.ruleRuns.map((r) => [r.ruleId, r.status])).toEqual([
      ["CCPA-1798.120", "superseded"],
      ["CCPA-1798.120b", "violation"],
      ["CCPA-1798.135a", "violation"],
      ["CCPA-1798.135b", "violation"],
      ["CCPA-1798.135b2", "unmapped"],
      ["CCPA-1798.100", "compliant"],
      ["CCPA-1798.130a5A", "compliant"],
      ["CCPA-1798.140ad", "skipped_definitional"],
      ["CCPA-1798.140ah", "skipped_definitional"],
      ["CCPA-1798.185a14", "unmapped"],
      ["CCPA-1798.150", "unmapped"],
    ]);

    const leak = report.violations.find((v) => v.violationType === "TEMPORAL_LEAK");
    expect(leak?.evidence).toEqual({
      leakCount: 1,
      leakedDomains: ["doubleclick.net"],
      sampleLeaks: [
        {
          domain: "doubleclick.net",
          fullUrl: "https://doubleclick.net/collect",
          pageUrl: PAGE_A,
          msAfterLoad: 100,
        },
      ],
      windowMs: 500,
    });
    const signal = report.violations.find((v) => v.violationType === "SIGNAL_NOT_HONORED");
    expect(signal?.evidence).toMatchObject({ baselineTrackerRequests: 4, complianceTrackerRequests: 1, reductionPercent: 75 });

    expect(report.summary).toEqual({
      totalViolations: 3,
      severityCounts: { HIGH: 3, MEDIUM: 0, LOW: 0 },
      minPotentialPenaltyUsd: 7500,
      maxPotentialPenaltyUsd: 22500,
      rulesEvaluated: 5,
      enrichedViolations: 0,
    });
    expect(report.outcome).toBe("VIOLATIONS_FOUND");
    expect(report.sessions.map((s) => [s.label, s.pagesOk, s.trackerRequests, s.temporalLeaks])).toEqual([
      ["baseline", 2, 4, 0],
      ["compliance", 2, 1, 1],
    ]);

    const messages = events.filter((e) => e.session === "system").map((e) => e.message);
    expect(messages[0]).toBe("Loaded 11 CCPA rules (2023-01-01), 43 tracker domains");
    expect(messages.at(-1)).toBe("Scan complete: VIOLATIONS_FOUND, 3 violations");
  });

  it("reports no violations for a site that honors the signal", async () => {
    const { report } = await runScan(scanInput(), { launcher: new FakeLauncher(cleanSite), now: FIXED_NOW });

    expect(report.verdict.verdict).toBe("COMPLIANT");
    expect(report.violations).toEqual([]);
    expect(report.outcome).toBe("NO_VIOLATIONS");
    expect(report.summary.maxPotentialPenaltyUsd).toBe(0);
  });

  it("reports insufficient data when every compliance page fails", async () => {
    const site: FakeSite = (options) => (isSignalSession(options) ? { fail: "net::ERR_TIMED_OUT" } : {});

    const { report } = await runScan(scanInput(), { launcher: new FakeLauncher(site), now: FIXED_NOW });

    expect(report.verdict.verdict).toBe("INSUFFICIENT_DATA");
    expect(report.violations).toEqual([]);
    expect(report.outcome).toBe("INSUFFICIENT_DATA");
    expect(report.ruleRuns.find((r) => r.ruleId === "CCPA-1798.135b")).toEqual({
      ruleId: "CCPA-1798.135b",
      detectorKey: "signal_not_honored",
      status: "not_evaluable",
      reason: "a session has no successfully visited page",
    });
  });

  it("enriches violations through the given chain", async () => {
    const explain = vi.fn().mockResolvedValue({ plainEnglish: "p", technicalFix: "t" });
    const chain = new EnrichmentChain([{ id: "stub", explain }]);

    const { report } = await runScan(scanInput(), {
      launcher: new FakeLauncher(leakySite),
      enrichment: chain,
      now: FIXED_NOW,
    });

    expect(explain).toHaveBeenCalledTimes(report.violations.length);
    expect(report.summary.enrichedViolations).toBe(report.violations.length);
    expect(report.metadata.enrichmentProviders).toEqual(["stub"]);
  });

  it("writes the audit trail when an export directory is set", async () => {
    const dir = await mkdtemp(join(tmpdir(), "privacy-probe-scan-"));
    try {
      const { exportedFiles } = await runScan(scanInput({ exportDir: dir }), {
        launcher: new FakeLauncher(cleanSite),
        now: FIXED_NOW,
      });

      expect(exportedFiles).toHaveLength(3);
      expect((await readdir(dir)).sort()).toEqual([
        "baseline.session.json",
        "compliance.session.json",
        "evidence-report.json",
      ]);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it("rejects invalid input before launching a browser", async () => {
    const launcher = new FakeLauncher(cleanSite);

    await expect(runScan(scanInput({ itinerary: [] }), { launcher })).rejects.toBeInstanceOf(
      ScanConfigurationInvalidError,
    );
    await expect(runScan(scanInput({ jurisdiction: "atlantis" }), { launcher })).rejects.toBeInstanceOf(
      RuleDatasetUnavailableError,
    );
    expect(launcher.sessions).toEqual([]);
  });
});

describe("emptySessionLog", () => {
  it("is frozen like every recorded session log", () => {
    const log = emptySessionLog("compliance");

    expect(log).toMatchObject({ label: "compliance", aborted: true, warnings: ["session produced no log"] });
    expect(Object.isFrozen(log)).toBe(true);
    expect(Object.isFrozen(log.pageVisits)).toBe(true);
    expect(Object.isFrozen(log.stats)).toBe(true);
  });
});
