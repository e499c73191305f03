import { describe, expect, it } from "vitest";
import { PiiMatcher } from "../../classification/pii-matcher.js";

describe("PiiMatcher", () => {
  const matcher = new PiiMatcher([
    { name: "email", pattern: "[a-z0-9._%+-]+@[a-z0-9.-]+\\.[a-z]{2,}" },
    { name: "uid", pattern: "[?&;]uid=[^&]+" },
    { name: "ip_address", pattern: "\\b\\d{1,3}\\.\\d{1,3}\\.\\d{1,3}\\.\\d{1,3}\\b" },
  ]);

  it("lists indicator names in table order", () => {
    expect(matcher.names).toEqual(["email", "uid", "ip_address"]);
  });

  it("returns no indicators for a clean URL", () => {
    expect(matcher.match("https://tracker.example/pixel?v=2")).toEqual([]);
  });

  it("finds a percent-encoded email address", () => {
    expect(matcher.match("https://tracker.example/p?em=jane%40mail.example")).toEqual(["email"]);
  });

  it("returns every indicator that hits, in table order", () => {
    expect(matcher.match("https://tracker.example/p?ip=10.0.0.1&uid=42&e=a@b.example")).toEqual([
      "email",
      "uid",
      "ip_address",
    ]);
  });

  it("ignores an IP address in the host", () => {
    expect(matcher.match("http://192.168.1.20/collect?v=1")).toEqual([]);
  });

  it("falls back to the raw URL when percent-decoding fails", () => {
    expect(matcher.match("https://tracker.example/p?uid=%E0%A4%A")).toEqual(["uid"]);
  });

  it("applies custom flags instead of the default", () => {
    const caseSensitive = new PiiMatcher([{ name: "token", pattern: "token=", flags: "" }]);
    expect(caseSensitive.match("https://x.example/?TOKEN=1")).toEqual([]);
    expect(caseSensitive.match("https://x.example/?token=1")).toEqual(["token"]);
  });

  it("throws when a pattern does not compile", () => {
    expect(() => new PiiMatcher([{ name: "broken", pattern: "([a-z" }])).toThrow(SyntaxError);
  });
});
