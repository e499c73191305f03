/**
 * OTel SDK lifecycle. The SDK packages are imported only once telemetry is
 * switched on with OTEL_ENABLED.
 */

import type { ResolvedTelemetryConfig, TelemetryConfig } from "./types.js";

const DEFAULT_ENDPOINT = "http://localhost:4318";

let sdkInstance: { shutdown(): Promise<void> } | undefined;

/** True only when OTEL_ENABLED is "true" or "1". */
export function isTelemetryEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  const value = env.OTEL_ENABLED;
  return value === "true" || value === "1";
}

function clampRatio(raw: number): number {
  return Number.isNaN(raw) ? 1 : Math.max(0, Math.min(1, raw));
}

export function resolveTelemetryConfig(
  config: TelemetryConfig = {},
  env: NodeJS.ProcessEnv = process.env,
): ResolvedTelemetryConfig {
  const endpoint = (config.endpoint ?? env.OTEL_EXPORTER_OTLP_ENDPOINT ?? DEFAULT_ENDPOINT).replace(
    /\/+$/,
    "",
  );
  return {
    enabled: isTelemetryEnabled(env),
    serviceName: config.serviceName ?? env.OTEL_SERVICE_NAME ?? "privacy-probe",
    serviceVersion: config.serviceVersion ?? env.npm_package_version ?? "0.0.0",
    tracesUrl: `${endpoint}/v1/traces`,
    sampleRatio: clampRatio(config.sampleRatio ?? Number.parseFloat(env.OTEL_TRACES_SAMPLER_ARG ?? "1")),
    environment: config.environment ?? env.OTEL_ENVIRONMENT ?? "development",
  };
}

/**
 * Start the Node SDK: OTLP/HTTP trace export through a batch processor,
 * parent-based ratio sampling, and undici instrumentation so enrichment
 * provider calls show up as client spans.
 *
 * @returns true when this call started the SDK
 */
export async function setupTelemetry(config?: TelemetryConfig): Promise<boolean> {
  const resolved = resolveTelemetryConfig(config);
  if (!resolved.enabled || sdkInstance !== undefined) {
    return false;
  }

  const { NodeSDK } = await import("@opentelemetry/sdk-node");
  const { OTLPTraceExporter } = await import("@opentelemetry/exporter-trace-otlp-http");
  const { UndiciInstrumentation } = await import("@opentelemetry/instrumentation-undici");
  const { ATTR_SERVICE_NAME, ATTR_SERVICE_VERSION } = await import(
    "@opentelemetry/semantic-conventions"
  );
  const { Resource } = await import("@opentelemetry/resources");
  const { ParentBasedSampler, TraceIdRatioBasedSampler } = await import(
    "@opentelemetry/sdk-trace-base"
  );

  const sdk = new NodeSDK({
    resource: new Resource({
      [ATTR_SERVICE_NAME]: resolved.serviceName,
      [ATTR_SERVICE_VERSION]: resolved.serviceVersion,
      "deployment.environment": resolved.environment,
    }),
    traceExporter: new OTLPTraceExporter({ url: resolved.tracesUrl }),
    sampler: new ParentBasedSampler({ root: new TraceIdRatioBasedSampler(resolved.sampleRatio) }),
    instrumentations: [new UndiciInstrumentation()],
  });
  sdk.start();
  sdkInstance = sdk;
  return true;
}

/** Flush pending spans and stop the SDK. No-op when it never started. */
export async function shutdownTelemetry(): Promise<void> {
  const sdk = sdkInstance;
  sdkInstance = undefined;
  await sdk?.shutdown();
}
