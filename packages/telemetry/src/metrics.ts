/**
 * OTel metrics for scan runs.
 *
 * Lazily initialized: meters are only created on first access.
 * When no meter provider is registered, these return no-op instruments.
 */

import type { Counter, Histogram } from "@opentelemetry/api";
import { metrics } from "@opentelemetry/api";

const METER_NAME = "privacy-probe";

let _requestsCaptured: Counter | undefined;
let _violationsEmitted: Counter | undefined;
let _pageLoadLatency: Histogram | undefined;
let _enrichmentCalls: Counter | undefined;

/**
 * Counter of network requests captured, labelled by session and tracker flag.
 */
export function getRequestsCaptured(): Counter {
  if (_requestsCaptured === undefined) {
    _requestsCaptured = metrics
      .getMeter(METER_NAME)
      .createCounter("privacy_probe.requests.captured", {
        description: "Network requests captured during browsing sessions",
      });
  }
  return _requestsCaptured;
}

/**
 * Counter of violations emitted, labelled by violation type.
 */
export function getViolationsEmitted(): Counter {
  if (_violationsEmitted === undefined) {
    _violationsEmitted = metrics
      .getMeter(METER_NAME)
      .createCounter("privacy_probe.violations.emitted", {
        description: "Violations emitted by rule detectors",
      });
  }
  return _violationsEmitted;
}

/**
 * Histogram of page navigation latency in milliseconds.
 */
export function getPageLoadLatency(): Histogram {
  if (_pageLoadLatency === undefined) {
    _pageLoadLatency = metrics
      .getMeter(METER_NAME)
      .createHistogram("privacy_probe.page.load_ms", {
        description: "Page navigation latency in milliseconds",
        unit: "ms",
      });
  }
  return _pageLoadLatency;
}

/**
 * Counter of enrichment provider calls, labelled by provider and outcome.
 */
export function getEnrichmentCalls(): Counter {
  if (_enrichmentCalls === undefined) {
    _enrichmentCalls = metrics
      .getMeter(METER_NAME)
      .createCounter("privacy_probe.enrichment.calls", {
        description: "Text-generation provider calls made during enrichment",
      });
  }
  return _enrichmentCalls;
}
