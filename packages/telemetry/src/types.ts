/**
 * Telemetry configuration and span attribute types.
 */

/** Explicit overrides; anything omitted comes from the OTEL_* environment variables. */
export interface TelemetryConfig {
  serviceName?: string;
  serviceVersion?: string;
  /** OTLP/HTTP base URL; `/v1/traces` is appended */
  endpoint?: string;
  /** Root sampling ratio, clamped to 0..1 */
  sampleRatio?: number;
  environment?: string;
}

export interface ResolvedTelemetryConfig {
  readonly enabled: boolean;
  readonly serviceName: string;
  readonly serviceVersion: string;
  readonly tracesUrl: string;
  readonly sampleRatio: number;
  readonly environment: string;
}

export type SpanAttributeValue = string | number | boolean | readonly string[];

/** `undefined` values are skipped, so optional scan fields can be passed straight through. */
export type SpanAttributes = Readonly<Record<string, SpanAttributeValue | undefined>>;

/** Span names emitted by a scan run */
export type ScanSpanName =
  | "privacy_probe.scan"
  | "privacy_probe.session"
  | "privacy_probe.enrichment.explain";
