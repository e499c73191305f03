import { SpanStatusCode, trace } from "@opentelemetry/api";
import { InMemorySpanExporter, SimpleSpanProcessor } from "@opentelemetry/sdk-trace-base";
import { NodeTracerProvider } from "@opentelemetry/sdk-trace-node";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { addSpanEvent, withSpan } from "../span-helpers.js";

describe("withSpan", () => {
  let exporter: InMemorySpanExporter;
  let provider: NodeTracerProvider;

  beforeEach(() => {
    exporter = new InMemorySpanExporter();
    provider = new NodeTracerProvider();
    provider.addSpanProcessor(new SimpleSpanProcessor(exporter));
    trace.disable();
    provider.register();
  });

  afterEach(async () => {
    trace.disable();
    exporter.reset();
    await provider.shutdown();
  });

  it("should start the span with the given attributes, skipping undefined ones", async () => {
    await withSpan(
      "privacy_probe.session",
      {
        "session.label": "baseline",
        "session.pages": 3,
        "session.gpc": false,
        "session.headers": ["Sec-GPC", "DNT"],
        "session.user_agent": undefined,
      },
      async () => undefined,
    );

    const spans = exporter.getFinishedSpans();
    expect(spans).toHaveLength(1);
    expect(spans[0]?.name).toBe("privacy_probe.session");
    expect(spans[0]?.attributes).toEqual({
      "session.label": "baseline",
      "session.pages": 3,
      "session.gpc": false,
      "session.headers": ["Sec-GPC", "DNT"],
    });
  });

  it("should set OK status and return the result", async () => {
    const result = await withSpan("privacy_probe.scan", {}, async () => "COMPLIANT");

    expect(result).toBe("COMPLIANT");
    expect(exporter.getFinishedSpans()[0]?.status.code).toBe(SpanStatusCode.OK);
  });

  it("should hand the live span to the callback", async () => {
    await withSpan("privacy_probe.scan", {}, async (span) => {
      span.setAttribute("scan.outcome", "VIOLATIONS_FOUND");
    });

    expect(exporter.getFinishedSpans()[0]?.attributes["scan.outcome"]).toBe("VIOLATIONS_FOUND");
  });

  it("should record exception and set ERROR status on failure", async () => {
    await expect(
      withSpan("privacy_probe.scan", {}, async () => {
        throw new Error("dataset missing");
      }),
    ).rejects.toThrow("dataset missing");

    const span = exporter.getFinishedSpans()[0];
    expect(span?.status.code).toBe(SpanStatusCode.ERROR);
    expect(span?.status.message).toBe("dataset missing");
    expect(span?.events[0]?.name).toBe("exception");
  });

  it("should handle non-Error throws", async () => {
    await expect(
      withSpan("privacy_probe.enrichment.explain", {}, async () => {
        throw "string error";
      }),
    ).rejects.toBe("string error");

    const span = exporter.getFinishedSpans()[0];
    expect(span?.status.message).toBe("string error");
    expect(span?.events).toHaveLength(0);
  });

  it("should nest session spans under the scan span", async () => {
    await withSpan("privacy_probe.scan", {}, async () => {
      await withSpan("privacy_probe.session", { "session.label": "compliance" }, async () => {});
    });

    const spans = exporter.getFinishedSpans();
    const child = spans.find((s) => s.name === "privacy_probe.session");
    const parent = spans.find((s) => s.name === "privacy_probe.scan");
    expect(child?.parentSpanId).toBe(parent?.spanContext().spanId);
  });

  it("should attach events to the active span", async () => {
    await withSpan("privacy_probe.scan", {}, async () => {
      addSpanEvent("verdict", { verdict: "NON_COMPLIANT", "verdict.leaks": 2, skipped: undefined });
    });

    const events = exporter.getFinishedSpans()[0]?.events ?? [];
    expect(events.map((e) => e.name)).toEqual(["verdict"]);
    expect(events[0]?.attributes).toEqual({ verdict: "NON_COMPLIANT", "verdict.leaks": 2 });
  });
});

describe("without a tracer provider", () => {
  it("should still execute the function", async () => {
    trace.disable();

    const result = await withSpan("privacy_probe.scan", { key: "value" }, async () => "works");
    expect(result).toBe("works");
  });

  it("should ignore events outside any span", () => {
    trace.disable();

    expect(() => addSpanEvent("orphan")).not.toThrow();
  });
});
