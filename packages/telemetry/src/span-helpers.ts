import { type Attributes, type Span, SpanStatusCode, trace } from "@opentelemetry/api";
import type { ScanSpanName, SpanAttributes } from "./types.js";

const TRACER_NAME = "privacy-probe";

function toAttributes(attributes: SpanAttributes): Attributes {
  const out: Attributes = {};
  for (const [key, value] of Object.entries(attributes)) {
    if (value === undefined) {
      continue;
    }
    out[key] = typeof value === "object" ? [...value] : value;
  }
  return out;
}

/**
 * Run `fn` inside an active span named after a scan phase.
 *
 * The span gets OK or ERROR status and is always ended; errors are recorded
 * and re-thrown unchanged. With no tracer provider registered this is a
 * pass-through over a no-op span.
 */
export async function withSpan<T>(
  name: ScanSpanName,
  attributes: SpanAttributes,
  fn: (span: Span) => Promise<T>,
): Promise<T> {
  const tracer = trace.getTracer(TRACER_NAME);
  return tracer.startActiveSpan(name, { attributes: toAttributes(attributes) }, async (span) => {
    try {
      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      if (error instanceof Error) {
        span.recordException(error);
      }
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: error instanceof Error ? error.message : String(error),
      });
      throw error;
    } finally {
      span.end();
    }
  });
}

/** Attach a named event to whichever span is active; no-op outside a span. */
export function addSpanEvent(name: string, attributes: SpanAttributes = {}): void {
  trace.getActiveSpan()?.addEvent(name, toAttributes(attributes));
}
