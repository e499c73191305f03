/**
 * JSON-over-HTTP for provider calls: one POST with a timeout, and failures
 * classified into the enrichment error types.
 */

import { EnrichmentProviderError, EnrichmentRateLimitedError } from "@privacy-probe/errors";
import { DEFAULT_TIMEOUT_MS } from "./types.js";

const MAX_ERROR_DETAIL = 300;

export interface PostJsonOptions {
  readonly headers: Readonly<Record<string, string>>;
  readonly body: unknown;
  readonly timeoutMs?: number;
  /** Caller cancellation; its AbortError propagates unchanged */
  readonly signal?: AbortSignal;
}

/** Seconds from a Retry-After header; HTTP-date values are not honored. */
function parseRetryAfter(value: string | null): number | undefined {
  if (value === null) {
    return undefined;
  }
  const seconds = Number(value.trim());
  return Number.isInteger(seconds) && seconds >= 0 ? seconds : undefined;
}

/**
 * Both supported providers answer errors with `{"error": {"message": ...}}`;
 * fall back to the raw body, truncated.
 */
function errorDetail(body: string): string {
  const raw = body.length > MAX_ERROR_DETAIL ? `${body.slice(0, MAX_ERROR_DETAIL)}…` : body;
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return raw;
  }
  if (typeof parsed === "object" && parsed !== null && "error" in parsed) {
    const { error } = parsed;
    if (typeof error === "object" && error !== null && "message" in error && typeof error.message === "string") {
      return error.message;
    }
  }
  return raw;
}

/**
 * POST `body` as JSON and return the decoded response as `unknown`; each
 * provider validates it against its own schema.
 */
export async function postJson(providerId: string, url: string, options: PostJsonOptions): Promise<unknown> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const { signal } = options;
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  const onExternalAbort = () => controller.abort();
  signal?.addEventListener("abort", onExternalAbort, { once: true });

  try {
    const response = await fetch(url, {
      method: "POST",
      headers: { "Content-Type": "application/json", ...options.headers },
      body: JSON.stringify(options.body),
      signal: controller.signal,
    });

    if (response.status === 429) {
      throw new EnrichmentRateLimitedError(providerId, parseRetryAfter(response.headers.get("retry-after")));
    }
    if (!response.ok) {
      const body = await response.text().catch(() => "");
      throw new EnrichmentProviderError(providerId, `HTTP ${response.status}: ${errorDetail(body)}`);
    }

    const json: unknown = await response.json();
    return json;
  } catch (error) {
    if (error instanceof EnrichmentRateLimitedError || error instanceof EnrichmentProviderError) {
      throw error;
    }
    if (error instanceof DOMException && error.name === "AbortError") {
      if (signal?.aborted) {
        throw error;
      }
      throw new EnrichmentProviderError(providerId, `Request timed out after ${timeoutMs}ms`);
    }
    throw new EnrichmentProviderError(
      providerId,
      error instanceof Error ? error.message : String(error),
      error instanceof Error ? error : undefined,
    );
  } finally {
    clearTimeout(timeout);
    signal?.removeEventListener("abort", onExternalAbort);
  }
}
