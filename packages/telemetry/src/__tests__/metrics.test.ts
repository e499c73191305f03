import { describe, expect, it } from "vitest";
import {
  getEnrichmentCalls,
  getPageLoadLatency,
  getRequestsCaptured,
  getViolationsEmitted,
} from "../metrics.js";

describe("metrics", () => {
  it("should create instruments lazily and reuse them", () => {
    expect(getRequestsCaptured()).toBe(getRequestsCaptured());
    expect(getViolationsEmitted()).toBe(getViolationsEmitted());
    expect(getPageLoadLatency()).toBe(getPageLoadLatency());
    expect(getEnrichmentCalls()).toBe(getEnrichmentCalls());
  });

  it("should accept recordings without a meter provider", () => {
    expect(() => {
      getRequestsCaptured().add(1, { session: "baseline", tracker: true });
      getViolationsEmitted().add(1, { type: "TEMPORAL_LEAK" });
      getPageLoadLatency().record(120, { session: "compliance" });
      getEnrichmentCalls().add(1, { provider: "anthropic", outcome: "ok" });
    }).not.toThrow();
  });
});
