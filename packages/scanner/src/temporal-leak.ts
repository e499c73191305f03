import type { NetworkRequest, SessionLog } from "./types.js";

/**
 * Tracker requests fired inside `[load, load + thresholdMs)` of the page that
 * was current when they were captured, in capture order. A request is
 * reported once even when several visits of the same URL cover it.
 */
export function detectLeaks(log: SessionLog, thresholdMs: number): NetworkRequest[] {
  const windows = new Map<string, number[]>();
  for (const visit of log.pageVisits) {
    const starts = windows.get(visit.url) ?? [];
    starts.push(visit.loadTimestampMs);
    windows.set(visit.url, starts);
  }

  const seen = new Set<string>();
  const leaks: NetworkRequest[] = [];
  for (const request of log.requests) {
    if (!request.isTracker) {
      continue;
    }
    const starts = windows.get(request.pageUrl);
    if (!starts) {
      continue;
    }
    const t = request.requestTimestampMs;
    if (!starts.some((start) => t >= start && t < start + thresholdMs)) {
      continue;
    }
    const identity = `${t}\u0000${request.method}\u0000${request.fullUrl}`;
    if (seen.has(identity)) {
      continue;
    }
    seen.add(identity);
    leaks.push(request);
  }
  return leaks;
}

/** Milliseconds between a leaked request and the latest visit of its page that precedes it */
export function msAfterLoad(log: SessionLog, request: NetworkRequest): number {
  let best: number | undefined;
  for (const visit of log.pageVisits) {
    if (visit.url !== request.pageUrl || visit.loadTimestampMs > request.requestTimestampMs) {
      continue;
    }
    if (best === undefined || visit.loadTimestampMs > best) {
      best = visit.loadTimestampMs;
    }
  }
  return best === undefined ? 0 : request.requestTimestampMs - best;
}
