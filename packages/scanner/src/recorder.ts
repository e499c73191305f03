import { getErrorMessage } from "@privacy-probe/errors";
import { getRequestsCaptured } from "@privacy-probe/telemetry";
import type { PiiMatcher } from "./classification/pii-matcher.js";
import type { TrackerMatcher } from "./classification/tracker-matcher.js";
import type { SessionClock } from "./clock.js";
import type { ScanEventLog } from "./events.js";
import type { NetworkRequest, PageVisit, SessionLog, SessionStateSnapshot } from "./types.js";

/** What the browser reports for one outbound request */
export interface CapturedRequest {
  readonly url: string;
  readonly method: string;
  readonly resourceType: string;
}

export interface TrafficRecorderOptions {
  readonly trackers: TrackerMatcher;
  readonly pii: PiiMatcher;
  readonly clock: SessionClock;
  readonly events: ScanEventLog;
}

/**
 * Append-only capture of one session's outbound traffic.
 *
 * Requests are attributed to the page whose navigation is current, stamped
 * with the session clock and classified on arrival. Once sealed, further
 * requests are only counted.
 */
export class TrafficRecorder {
  readonly label: string;
  private readonly options: TrafficRecorderOptions;
  private readonly requests: NetworkRequest[] = [];
  private readonly visits: PageVisit[] = [];
  private readonly warnings: string[] = [];
  private readonly seen = new Set<string>();
  private currentPage = "";
  private aborted = false;
  private sealed = false;
  private frozen: SessionLog | undefined;
  private state: SessionStateSnapshot | undefined;
  private duplicatesDropped = 0;
  private classificationErrors = 0;
  private lateRequests = 0;

  constructor(label: string, options: TrafficRecorderOptions) {
    this.label = label;
    this.options = options;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  /** Current session clock reading */
  now(): number {
    return this.options.clock.now();
  }

  /** Make `url` the current page; returns its load timestamp. */
  beginPage(url: string): number {
    this.currentPage = url;
    return this.options.clock.now();
  }

  record(request: CapturedRequest): NetworkRequest | null {
    if (this.sealed) {
      this.lateRequests++;
      return null;
    }

    const timestamp = this.options.clock.now();
    const key = `${timestamp}\u0000${request.method.toUpperCase()}\u0000${request.url}`;
    if (this.seen.has(key)) {
      this.duplicatesDropped++;
      return null;
    }
    this.seen.add(key);

    const entry = this.classify(request, timestamp);
    this.requests.push(entry);
    getRequestsCaptured().add(1, { session: this.label, tracker: entry.isTracker });
    return entry;
  }

  addVisit(visit: PageVisit): void {
    if (this.sealed) {
      return;
    }
    this.visits.push(Object.freeze({ ...visit }));
  }

  addWarning(warning: string): void {
    if (!this.sealed) {
      this.warnings.push(warning);
    }
  }

  /** Keep the browser's cookie and storage snapshot; ignored once sealed. */
  setState(state: SessionStateSnapshot): void {
    if (!this.sealed) {
      this.state = state;
    }
  }

  markAborted(reason: string): void {
    if (this.sealed) {
      return;
    }
    this.aborted = true;
    this.warnings.push(reason);
  }

  /**
   * Stop accepting data. Requests reported after this point are only counted
   * as late; visits and warnings are ignored.
   */
  seal(): void {
    this.sealed = true;
  }

  /** Seal and build the immutable log. Idempotent. */
  freeze(): SessionLog {
    this.seal();
    if (this.frozen) {
      return this.frozen;
    }
    const trackerDomains = [
      ...new Set(this.requests.filter((r) => r.isTracker).map((r) => r.domain)),
    ].sort();
    this.frozen = Object.freeze({
      label: this.label,
      pageVisits: Object.freeze([...this.visits]),
      requests: Object.freeze([...this.requests]),
      trackerDomains: Object.freeze(trackerDomains),
      aborted: this.aborted,
      warnings: Object.freeze([...this.warnings]),
      stats: Object.freeze({
        duplicatesDropped: this.duplicatesDropped,
        classificationErrors: this.classificationErrors,
        lateRequests: this.lateRequests,
      }),
      ...(this.state ? { state: freezeState(this.state) } : {}),
    });
    return this.frozen;
  }

  private classify(request: CapturedRequest, timestamp: number): NetworkRequest {
    const base = {
      sessionLabel: this.label,
      pageUrl: this.currentPage,
      requestTimestampMs: timestamp,
      fullUrl: request.url,
      method: request.method.toUpperCase(),
      resourceType: request.resourceType,
    };

    try {
      const domain = new URL(request.url).hostname.toLowerCase();
      const piiIndicators = this.options.pii.match(request.url);
      return Object.freeze({
        ...base,
        domain,
        isTracker: this.options.trackers.matches(domain),
        containsPii: piiIndicators.length > 0,
        piiIndicators: Object.freeze(piiIndicators),
      });
    } catch (error) {
      this.classificationErrors++;
      const reason = getErrorMessage(error);
      this.options.events.warn(this.label, `Could not classify ${request.url}: ${reason}`);
      return Object.freeze({
        ...base,
        domain: "",
        isTracker: false,
        containsPii: false,
        piiIndicators: Object.freeze([]),
        classificationError: reason,
      });
    }
  }
}

function freezeState(state: SessionStateSnapshot): SessionStateSnapshot {
  return Object.freeze({
    cookies: Object.freeze(state.cookies.map((cookie) => Object.freeze({ ...cookie }))),
    origins: Object.freeze(
      state.origins.map((origin) =>
        Object.freeze({
          origin: origin.origin,
          localStorage: Object.freeze(origin.localStorage.map((item) => Object.freeze({ ...item }))),
        }),
      ),
    ),
  });
}
