/**
 * @privacy-probe/telemetry: OpenTelemetry tracing and metrics for scan runs.
 *
 * Public API:
 * - setupTelemetry() / shutdownTelemetry(): SDK lifecycle
 * - isTelemetryEnabled() / resolveTelemetryConfig(): OTEL_* environment handling
 * - withSpan() / addSpanEvent(): scan-phase spans
 * - getRequestsCaptured / getViolationsEmitted / getPageLoadLatency / getEnrichmentCalls
 */

export { context, SpanStatusCode, trace } from "@opentelemetry/api";
export {
  getEnrichmentCalls,
  getPageLoadLatency,
  getRequestsCaptured,
  getViolationsEmitted,
} from "./metrics.js";
export {
  isTelemetryEnabled,
  resolveTelemetryConfig,
  setupTelemetry,
  shutdownTelemetry,
} from "./setup.js";
export { addSpanEvent, withSpan } from "./span-helpers.js";
export type {
  ResolvedTelemetryConfig,
  ScanSpanName,
  SpanAttributes,
  SpanAttributeValue,
  TelemetryConfig,
} from "./types.js";
