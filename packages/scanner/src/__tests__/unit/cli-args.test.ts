import { describe, expect, it } from "vitest";
import { buildScanInput, exitCodeFor, parseArgs, parseItinerary } from "../../cli/args.js";
import { validateScanConfig } from "../../validation.js";

const argv = (...args: string[]) => ["node", "privacy-probe", ...args];

describe("parseArgs", () => {
  it("defaults to help", () => {
    expect(parseArgs(argv())).toMatchObject({ command: "help", errors: [] });
  });

  it("parses a full scan command", () => {
    const args = parseArgs(
      argv(
        "scan",
        "--jurisdiction", "gdpr",
        "--url", "https://shop.example/",
        "--url", "https://shop.example/cart",
        "--format", "json",
        "--export", "./audit",
        "--leak-threshold", "250",
        "--total-timeout", "60000",
        "--supersession", "load-all",
        "--headed",
        "--no-enrich",
        "--quiet",
      ),
    );

    expect(args).toEqual({
      command: "scan",
      urls: ["https://shop.example/", "https://shop.example/cart"],
      jurisdiction: "gdpr",
      format: "json",
      exportDir: "./audit",
      leakThresholdMs: 250,
      totalTimeoutMs: 60000,
      supersession: "load-all",
      headed: true,
      enrich: false,
      quiet: true,
      errors: [],
    });
  });

  it("requires a jurisdiction and at least one page", () => {
    expect(parseArgs(argv("scan")).errors).toEqual([
      "--jurisdiction is required",
      "--itinerary or at least one --url is required",
    ]);
  });

  it("reports malformed values and unknown flags", () => {
    const args = parseArgs(
      argv("scan", "--jurisdiction", "CCPA", "--url", "https://a.example/", "--leak-threshold", "soon", "--format", "xml", "--verbose"),
    );
    expect(args.errors).toEqual([
      "--leak-threshold expects a positive integer number of milliseconds",
      "--format expects terminal or json",
      "unknown argument: xml",
      "unknown argument: --verbose",
    ]);
  });

  it("reports a directory flag given without its value", () => {
    const base = ["scan", "--jurisdiction", "CCPA", "--url", "https://a.example/"];
    expect(parseArgs(argv(...base, "--data-dir")).errors).toEqual(["--data-dir expects a directory"]);
    expect(parseArgs(argv(...base, "--rules-dir")).errors).toEqual(["--rules-dir expects a directory"]);
  });
});

describe("parseItinerary", () => {
  it("reads a JSON array", () => {
    expect(parseItinerary('["https://a.example/", "https://b.example/"]')).toEqual([
      "https://a.example/",
      "https://b.example/",
    ]);
  });

  it("reads one URL per line, skipping blanks and comments", () => {
    expect(parseItinerary("# landing pages\nhttps://a.example/\n\n  https://b.example/  \r\n")).toEqual([
      "https://a.example/",
      "https://b.example/",
    ]);
  });

  it("rejects a JSON array with non-string entries", () => {
    expect(() => parseItinerary("[1, 2]")).toThrow("itinerary JSON must be an array of URL strings");
  });
});

describe("buildScanInput", () => {
  it("produces a config that validates", () => {
    const args = parseArgs(argv("scan", "--jurisdiction", "ccpa", "--url", "https://a.example/", "--page-timeout", "5000"));
    const input = buildScanInput(args, args.urls, [{ provider: "anthropic", apiKey: "test-secret" }]);

    expect(input).toEqual({
      jurisdiction: "ccpa",
      itinerary: ["https://a.example/"],
      browser: { headless: true },
      timing: { perPageTimeoutMs: 5000 },
      enrichment: { providers: [{ provider: "anthropic", apiKey: "test-secret" }] },
    });
    expect(validateScanConfig(input).timing?.perPageTimeoutMs).toBe(5000);
  });

  it("drops providers under --no-enrich", () => {
    const args = parseArgs(argv("scan", "--jurisdiction", "ccpa", "--url", "https://a.example/", "--no-enrich"));
    const input = buildScanInput(args, args.urls, [{ provider: "openai", apiKey: "test-secret" }]);
    expect(input.enrichment).toEqual({ providers: [] });
  });
});

describe("exitCodeFor", () => {
  it("maps each outcome to its exit code", () => {
    expect(exitCodeFor("NO_VIOLATIONS")).toBe(0);
    expect(exitCodeFor("VIOLATIONS_FOUND")).toBe(1);
    expect(exitCodeFor("INSUFFICIENT_DATA")).toBe(2);
  });
});
