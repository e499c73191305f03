import { describe, expect, it } from "vitest";
import { TrackerMatcher } from "../../classification/tracker-matcher.js";

describe("TrackerMatcher", () => {
  const matcher = new TrackerMatcher(["doubleclick.net", "Google-Analytics.com", ".segment.io", " "]);

  it("normalizes entries and ignores blanks", () => {
    expect(matcher.size).toBe(3);
  });

  it("matches the exact domain", () => {
    expect(matcher.matches("doubleclick.net")).toBe(true);
  });

  it("matches sub-domains on label boundaries", () => {
    expect(matcher.matches("stats.g.doubleclick.net")).toBe(true);
    expect(matcher.matches("api.segment.io")).toBe(true);
  });

  it("does not match a domain that merely ends with the same characters", () => {
    expect(matcher.matches("notdoubleclick.net")).toBe(false);
  });

  it("is case-insensitive and ignores a trailing dot", () => {
    expect(matcher.matches("WWW.GOOGLE-ANALYTICS.COM.")).toBe(true);
  });

  it("does not match a bare public suffix", () => {
    expect(matcher.matches("net")).toBe(false);
    expect(matcher.matches("")).toBe(false);
  });
});
