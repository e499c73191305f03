import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { REPORT_FILE, exportAuditTrail, sessionFileName } from "../../audit-export.js";
import { ReportBuilder } from "../../report-builder.js";
import { resolveScanConfig, validateScanConfig } from "../../validation.js";
import type { SessionLog } from "../../types.js";
import { makeLog, makeRequest, makeVerdict } from "../helpers.js";

describe("exportAuditTrail", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "privacy-probe-export-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("writes one file per session plus the report", async () => {
    const baseline = makeLog({
      label: "baseline",
      requests: [
        makeRequest({ fullUrl: "https://doubleclick.net/1", requestTimestampMs: 10 }),
        makeRequest({ fullUrl: "https://doubleclick.net/2", requestTimestampMs: 20 }),
      ],
    });
    const state = {
      cookies: [
        {
          name: "_ga",
          value: "GA1.1.test",
          domain: ".shop.example",
          path: "/",
          expires: 1730000000,
          httpOnly: false,
          secure: false,
          sameSite: "Lax" as const,
        },
      ],
      origins: [],
    };
    const sessions = new Map<string, SessionLog>([
      ["baseline", { ...baseline, state }],
      ["compliance", makeLog({ label: "compliance" })],
    ]);
    const report = ReportBuilder.build({
      config: resolveScanConfig(validateScanConfig({ jurisdiction: "CCPA", itinerary: ["https://shop.example/"] })),
      dataset: { jurisdiction: "CCPA", name: "CCPA", version: "2023-01-01", rules: [] },
      sessions,
      verdict: makeVerdict(),
      evaluation: { violations: [], runs: [] },
      leakCounts: new Map(),
      startedAt: new Date("2024-05-01T12:00:00.000Z"),
      completedAt: new Date("2024-05-01T12:00:02.000Z"),
    });
    const target = join(dir, "nested", "audit");

    const written = await exportAuditTrail(target, sessions, report);

    expect(written).toEqual([
      join(target, "baseline.session.json"),
      join(target, "compliance.session.json"),
      join(target, REPORT_FILE),
    ]);

    const raw = await readFile(join(target, sessionFileName("baseline")), "utf8");
    expect(raw.endsWith("}\n")).toBe(true);
    const document: unknown = JSON.parse(raw);
    expect(document).toMatchObject({
      label: "baseline",
      aborted: false,
      requests: [
        { fullUrl: "https://doubleclick.net/1", requestTimestampMs: 10 },
        { fullUrl: "https://doubleclick.net/2", requestTimestampMs: 20 },
      ],
      state,
    });
    const compliance: unknown = JSON.parse(await readFile(join(target, sessionFileName("compliance")), "utf8"));
    expect(compliance).toMatchObject({ label: "compliance", state: null });

    const saved: unknown = JSON.parse(await readFile(join(target, REPORT_FILE), "utf8"));
    expect(saved).toEqual(JSON.parse(JSON.stringify(report)));
  });
});
