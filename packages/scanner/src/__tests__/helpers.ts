import type {
  BrowserLauncher,
  BrowserSession,
  NavigationResult,
  ObservedRequest,
  ScanPage,
  SessionLaunchOptions,
} from "../browser/types.js";
import { type ClassificationTables, loadClassificationTables } from "../classification/tables.js";
import { ScanEventLog } from "../events.js";
import { DEFAULT_DATA_DIR } from "../paths.js";
import type {
  DetectorInput,
  NetworkRequest,
  PageVisit,
  Rule,
  SessionLog,
  SessionStateSnapshot,
  TimingSettings,
  VerdictResult,
  Violation,
} from "../types.js";
import { RECOMMENDATIONS } from "../rules/detectors.js";
import { CONFIG_DEFAULTS } from "../validation.js";

// ============================================================================
// Domain factories
// ============================================================================

export function makeRequest(overrides?: Partial<NetworkRequest>): NetworkRequest {
  return {
    sessionLabel: "compliance",
    pageUrl: "https://shop.example/",
    requestTimestampMs: 1000,
    domain: "www.google-analytics.com",
    fullUrl: "https://www.google-analytics.com/collect?v=1",
    method: "GET",
    resourceType: "image",
    isTracker: true,
    containsPii: false,
    piiIndicators: [],
    ...overrides,
  };
}

export function makeVisit(overrides?: Partial<PageVisit>): PageVisit {
  return {
    url: "https://shop.example/",
    loadTimestampMs: 0,
    cookieBannerPresent: true,
    optOutLinkPresent: true,
    status: "ok",
    ...overrides,
  };
}

export function makeLog(overrides?: Partial<SessionLog>): SessionLog {
  const requests = overrides?.requests ?? [];
  const trackerDomains =
    overrides?.trackerDomains ??
    [...new Set(requests.filter((r) => r.isTracker).map((r) => r.domain))].sort();
  return {
    label: "compliance",
    pageVisits: [makeVisit()],
    aborted: false,
    warnings: [],
    stats: { duplicatesDropped: 0, classificationErrors: 0, lateRequests: 0 },
    ...overrides,
    requests,
    trackerDomains,
  };
}

export function makeRule(overrides?: Partial<Rule>): Rule {
  return {
    ruleId: "TEST-1",
    jurisdiction: "CCPA",
    sectionCitation: "§1.1",
    title: "Test provision",
    ruleText: "Businesses must honor opt-out signals.",
    detectorKey: "signal_not_honored",
    penaltyMin: 2500,
    penaltyMax: 7500,
    appliesTo: "business",
    ...overrides,
  };
}

type ViolationOverrides = Partial<
  Pick<
    Violation,
    "ruleId" | "sectionCitation" | "title" | "severity" | "penaltyMinUsd" | "penaltyMaxUsd" | "enrichment"
  >
>;

/** A SIGNAL_NOT_HONORED violation */
export function makeViolation(overrides?: ViolationOverrides): Violation {
  return {
    violationType: "SIGNAL_NOT_HONORED",
    evidence: {
      domainsIgnoringSignal: ["doubleclick.net"],
      baselineTrackerRequests: 4,
      complianceTrackerRequests: 2,
      reductionPercent: 50,
    },
    severity: "HIGH",
    recommendation: RECOMMENDATIONS.SIGNAL_NOT_HONORED,
    ruleId: "TEST-1",
    sectionCitation: "§1.1",
    title: "Test provision",
    penaltyMinUsd: 2500,
    penaltyMaxUsd: 7500,
    ...overrides,
  };
}

export function makeVerdict(overrides?: Partial<VerdictResult>): VerdictResult {
  return {
    verdict: "COMPLIANT",
    domainsIgnoringSignal: [],
    leakCount: 0,
    ...overrides,
  };
}

export function makeDetectorInput(overrides?: Partial<DetectorInput>): DetectorInput {
  const baseline = overrides?.baseline ?? makeLog({ label: "baseline" });
  const compliance = overrides?.compliance ?? makeLog({ label: "compliance" });
  return {
    baseline,
    compliance,
    sessions: [baseline, compliance],
    verdict: makeVerdict(),
    complianceLeaks: [],
    leakThresholdMs: 500,
    ...overrides,
  };
}

export function makeTiming(overrides?: Partial<TimingSettings>): TimingSettings {
  return {
    ...CONFIG_DEFAULTS.timing,
    settleWaitMs: 0,
    actionDelayMs: 0,
    scrollSteps: 0,
    ...overrides,
  };
}

export function loadTestTables(): Promise<ClassificationTables> {
  return loadClassificationTables(DEFAULT_DATA_DIR);
}

export function collectEvents(): ScanEventLog {
  return new ScanEventLog(() => new Date("2024-05-01T12:00:00.000Z"));
}

// ============================================================================
// Time
// ============================================================================

export interface ManualTime {
  readonly source: () => number;
  advance(ms: number): void;
}

export function manualTime(start = 1000): ManualTime {
  let now = start;
  return {
    source: () => now,
    advance(ms: number) {
      now += ms;
    },
  };
}

// ============================================================================
// Fake browser
// ============================================================================

/** What a fake page does when navigated to one URL */
export interface FakePageScript {
  /** Clock advance before the page's requests fire */
  readonly advanceMs?: number;
  /** Fired synchronously during navigation */
  readonly requests?: readonly ObservedRequest[];
  readonly httpStatus?: number;
  /** Navigation rejects with this message */
  readonly fail?: string;
  /** Navigation rejects with "Target crashed" and so does every later call on the page */
  readonly crash?: boolean;
  /** Navigation never settles until the page or session closes */
  readonly hang?: boolean;
  /** The consent-banner check never settles until the page or session closes */
  readonly stall?: boolean;
  readonly banner?: boolean;
  readonly optOut?: boolean;
  readonly rejectControl?: boolean;
}

/** Decides a page's behavior from the session's launch options and the URL */
export type FakeSite = (options: SessionLaunchOptions, url: string) => FakePageScript;

export function isSignalSession(options: SessionLaunchOptions): boolean {
  return options.extraHttpHeaders["Sec-GPC"] === "1";
}

export function tracker(url: string, method = "GET"): ObservedRequest {
  return { url, method, resourceType: "script" };
}

class FakePage implements ScanPage {
  readonly visited: string[] = [];
  rejectClicks = 0;
  closed = false;
  private crashed = false;
  private script: FakePageScript = {};
  private readonly pending: Array<(error: Error) => void> = [];

  constructor(
    private readonly site: FakeSite,
    private readonly options: SessionLaunchOptions,
    private readonly emit: (request: ObservedRequest) => void,
    private readonly time: ManualTime | undefined,
  ) {}

  async goto(url: string): Promise<NavigationResult> {
    this.ensureUsable();
    this.visited.push(url);
    this.script = this.site(this.options, url);
    if (this.script.crash) {
      this.crashed = true;
      this.ensureUsable();
    }
    if (this.script.hang) {
      return this.never<NavigationResult>();
    }
    if (this.script.fail !== undefined) {
      throw new Error(this.script.fail);
    }
    this.time?.advance(this.script.advanceMs ?? 0);
    for (const request of this.script.requests ?? []) {
      this.emit(request);
    }
    return this.script.httpStatus !== undefined ? { httpStatus: this.script.httpStatus } : {};
  }

  async settle(): Promise<void> {
    this.ensureUsable();
  }

  async scroll(): Promise<void> {
    this.ensureUsable();
  }

  async wait(): Promise<void> {
    this.ensureUsable();
  }

  async hasConsentBanner(): Promise<boolean> {
    this.ensureUsable();
    if (this.script.stall) {
      return this.never<boolean>();
    }
    return this.script.banner ?? true;
  }

  async hasOptOutLink(): Promise<boolean> {
    this.ensureUsable();
    return this.script.optOut ?? true;
  }

  async clickReject(): Promise<boolean> {
    this.ensureUsable();
    const found = this.script.rejectControl ?? false;
    if (found) {
      this.rejectClicks++;
    }
    return found;
  }

  async close(): Promise<void> {
    this.detach();
  }

  /** Reject every call still waiting on the page, as a closing browser does */
  detach(): void {
    this.closed = true;
    for (const reject of this.pending.splice(0)) {
      reject(new Error("Target closed"));
    }
  }

  private never<T>(): Promise<T> {
    return new Promise<T>((_resolve, reject) => {
      this.pending.push(reject);
    });
  }

  private ensureUsable(): void {
    if (this.crashed) {
      throw new Error("Target crashed");
    }
    if (this.closed) {
      throw new Error("Target closed");
    }
  }
}

export class FakeSession implements BrowserSession {
  readonly pages: FakePage[] = [];
  closed = false;
  private readonly listeners: Array<(request: ObservedRequest) => void> = [];

  constructor(
    private readonly site: FakeSite,
    readonly options: SessionLaunchOptions,
    private readonly launcher: FakeLauncherOptions,
  ) {}

  onRequest(listener: (request: ObservedRequest) => void): void {
    this.listeners.push(listener);
  }

  /** Deliver a request outside any navigation */
  fire(request: ObservedRequest): void {
    for (const listener of this.listeners) {
      listener(request);
    }
  }

  async newPage(): Promise<ScanPage> {
    const page = new FakePage(this.site, this.options, (r) => this.fire(r), this.launcher.time);
    this.pages.push(page);
    return page;
  }

  async snapshotState(): Promise<SessionStateSnapshot> {
    if (this.launcher.snapshotError !== undefined) {
      throw new Error(this.launcher.snapshotError);
    }
    return this.launcher.state ?? { cookies: [], origins: [] };
  }

  async close(): Promise<void> {
    this.closed = true;
    for (const page of this.pages) {
      page.detach();
    }
  }
}

export interface FakeLauncherOptions {
  readonly time?: ManualTime;
  /** What `snapshotState` reports; an empty jar by default */
  readonly state?: SessionStateSnapshot;
  /** `snapshotState` rejects with this message */
  readonly snapshotError?: string;
  /** Launch rejects with this message for sessions matching the predicate */
  readonly failLaunch?: (options: SessionLaunchOptions) => string | undefined;
}

export class FakeLauncher implements BrowserLauncher {
  readonly sessions: FakeSession[] = [];

  constructor(
    private readonly site: FakeSite,
    private readonly options: FakeLauncherOptions = {},
  ) {}

  async launch(options: SessionLaunchOptions): Promise<BrowserSession> {
    const failure = this.options.failLaunch?.(options);
    if (failure !== undefined) {
      throw new Error(failure);
    }
    const session = new FakeSession(this.site, options, this.options);
    this.sessions.push(session);
    return session;
  }
}
