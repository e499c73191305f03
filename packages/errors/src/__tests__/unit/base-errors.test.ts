import { describe, expect, it } from "vitest";
import {
  BrowserUnavailableError,
  describeError,
  EnrichmentRateLimitedError,
  EnrichmentResponseInvalidError,
  getErrorMessage,
  isExpectedError,
  isPreflightError,
  isPrivacyProbeError,
  RuleDatasetUnavailableError,
  ScanConfigurationInvalidError,
  SessionAbortedError,
} from "../../index.js";

describe("PrivacyProbeError", () => {
  it("should name instances after the concrete class", () => {
    expect(new SessionAbortedError("baseline", "x").name).toBe("SessionAbortedError");
  });

  it("should keep the cause", () => {
    const cause = new Error("root");
    const error = new RuleDatasetUnavailableError("CCPA", "unreadable", cause);
    expect(error.cause).toBe(cause);
  });

  it("should read isExpected from the catalog entry of its code", () => {
    expect(new ScanConfigurationInvalidError(["x"]).isExpected).toBe(true);
    expect(new BrowserUnavailableError("x").isExpected).toBe(false);
  });
});

describe("guards", () => {
  it("should recognise hierarchy members only", () => {
    expect(isPrivacyProbeError(new SessionAbortedError("baseline", "x"))).toBe(true);
    expect(isPrivacyProbeError(new Error("x"))).toBe(false);
  });

  it("should report expected errors", () => {
    expect(isExpectedError(new EnrichmentRateLimitedError("openai"))).toBe(true);
    expect(isExpectedError(new EnrichmentResponseInvalidError("openai", "not JSON"))).toBe(false);
    expect(isExpectedError({ isExpected: true })).toBe(false);
  });

  it("should treat dataset problems as preflight and session aborts as not", () => {
    expect(isPreflightError(new RuleDatasetUnavailableError("CCPA", "file not found"))).toBe(true);
    expect(isPreflightError(new SessionAbortedError("baseline", "launch failed"))).toBe(false);
    expect(isPreflightError(new Error("x"))).toBe(false);
  });
});

describe("describeError", () => {
  it("should prefix hierarchy errors with their code", () => {
    expect(describeError(new SessionAbortedError("baseline", "browser crashed"))).toBe(
      '[SCAN_SESSION_ABORTED] Session "baseline" aborted: browser crashed',
    );
  });

  it("should append a cause the message does not already mention", () => {
    const error = new RuleDatasetUnavailableError("GDPR", "unreadable", new Error("EACCES"));
    expect(describeError(error)).toBe(
      '[SCAN_RULE_DATASET_UNAVAILABLE] Rule dataset for jurisdiction "GDPR" unavailable: unreadable (caused by: EACCES)',
    );
  });

  it("should fall back to the plain message", () => {
    expect(describeError(new TypeError("bad"))).toBe("bad");
    expect(describeError(undefined)).toBe("An unknown error occurred");
  });
});

describe("getErrorMessage", () => {
  it("should extract messages", () => {
    expect(getErrorMessage(new Error("e"))).toBe("e");
    expect(getErrorMessage("s")).toBe("s");
    expect(getErrorMessage(undefined)).toBe("An unknown error occurred");
  });
});
