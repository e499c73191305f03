import { NavigationTimeoutError, SessionAbortedError, getErrorMessage } from "@privacy-probe/errors";
import { getPageLoadLatency, withSpan } from "@privacy-probe/telemetry";
import type { BrowserLauncher, BrowserSession, ScanPage } from "./browser/types.js";
import type { ClassificationTables } from "./classification/tables.js";
import { type TimeSource, createSessionClock } from "./clock.js";
import { SYSTEM_SOURCE, type ScanEventLog } from "./events.js";
import { TrafficRecorder } from "./recorder.js";
import type {
  BrowserSettings,
  PageVisit,
  SessionLog,
  SignalConfig,
  TimingSettings,
} from "./types.js";

export interface SessionRunnerOptions {
  readonly launcher: BrowserLauncher;
  readonly tables: ClassificationTables;
  readonly events: ScanEventLog;
  readonly timing: TimingSettings;
  readonly browser: BrowserSettings;
  /** Time source for the per-session clocks; `performance.now()` by default */
  readonly timeSource?: TimeSource;
}

const TOTAL_TIMEOUT = Symbol("total-timeout");

/** Reject with `onTimeout()` unless `work` settles within `ms`. */
async function within<T>(work: Promise<T>, ms: number, onTimeout: () => Error): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const expiry = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(onTimeout()), ms);
  });
  try {
    return await Promise.race([work, expiry]);
  } finally {
    clearTimeout(timer);
  }
}

// ============================================================================
// PAGE VISIT
// ============================================================================

interface PageInspection {
  readonly cookieBannerPresent: boolean;
  readonly optOutLinkPresent: boolean;
  readonly rejectActionPerformed?: boolean;
}

/** The per-page timeout plus every wait the runner itself schedules after navigation */
function inspectionBudgetMs(timing: TimingSettings): number {
  return timing.perPageTimeoutMs + timing.settleWaitMs + (timing.scrollSteps + 1) * timing.actionDelayMs;
}

async function inspectPage(
  page: ScanPage,
  signal: SignalConfig,
  options: SessionRunnerOptions,
): Promise<PageInspection> {
  const { timing, tables } = options;
  await page.settle(timing.settleWaitMs);
  await page.scroll(timing.scrollSteps, timing.actionDelayMs);

  const cookieBannerPresent = await page.hasConsentBanner(tables.probes);
  const optOutLinkPresent = await page.hasOptOutLink(tables.probes);
  if (!signal.simulateRejectAction) {
    return { cookieBannerPresent, optOutLinkPresent };
  }

  const rejectActionPerformed = await page.clickReject(tables.probes);
  if (rejectActionPerformed) {
    await page.wait(timing.actionDelayMs);
  }
  return { cookieBannerPresent, optOutLinkPresent, rejectActionPerformed };
}

/**
 * Navigate, settle, scroll, check for consent UI and optionally reject consent on one page.
 * Navigation and inspection are each bounded. Never throws: failures become
 * a `failed` visit and a WARNING. Once `cancelled` fires the visit has been
 * written off by the runner and logs nothing more.
 */
async function visitPage(
  page: ScanPage,
  url: string,
  loadTimestampMs: number,
  signal: SignalConfig,
  recorder: TrafficRecorder,
  options: SessionRunnerOptions,
  cancelled: AbortSignal,
): Promise<PageVisit> {
  const { timing, events } = options;

  try {
    const navigation = await page.goto(url, timing.perPageTimeoutMs);
    getPageLoadLatency().record(recorder.now() - loadTimestampMs, {
      session: signal.label,
    });
    const budgetMs = inspectionBudgetMs(timing);
    const inspection = await within(
      inspectPage(page, signal, options),
      budgetMs,
      () => new NavigationTimeoutError(url, budgetMs, "inspection"),
    );

    if (!cancelled.aborted) {
      events.info(
        signal.label,
        `Visited ${url}${navigation.httpStatus !== undefined ? ` (HTTP ${navigation.httpStatus})` : ""}`,
      );
    }
    return {
      url,
      loadTimestampMs,
      ...inspection,
      status: "ok",
      ...(navigation.httpStatus !== undefined ? { httpStatus: navigation.httpStatus } : {}),
    };
  } catch (error) {
    const reason = getErrorMessage(error);
    if (!cancelled.aborted) {
      events.warn(signal.label, `Page failed: ${url}: ${reason}`);
    }
    return {
      url,
      loadTimestampMs,
      cookieBannerPresent: false,
      optOutLinkPresent: false,
      status: "failed",
      error: reason,
    };
  }
}

/**
 * A failed page may be crashed or still busy; later URLs get a new tab in
 * the same context, so cookies and storage carry over.
 */
async function replacePage(
  session: BrowserSession,
  page: ScanPage,
  signal: SignalConfig,
  events: ScanEventLog,
): Promise<ScanPage> {
  await page.close().catch((error: unknown) => {
    events.warn(signal.label, `Failed page did not close cleanly: ${getErrorMessage(error)}`);
  });
  return session.newPage();
}

// ============================================================================
// SESSION
// ============================================================================

function abortOnTimeout(
  recorder: TrafficRecorder,
  signal: SignalConfig,
  options: SessionRunnerOptions,
  where: string,
): void {
  const aborted = new SessionAbortedError(
    signal.label,
    `total timeout of ${options.timing.totalTimeoutMs}ms exceeded ${where}`,
  );
  recorder.markAborted(aborted.message);
  options.events.warn(signal.label, aborted.message);
}

/** Keep the context's cookies and storage on the log; a failure only warns. */
async function saveSessionState(
  session: BrowserSession,
  recorder: TrafficRecorder,
  signal: SignalConfig,
  options: SessionRunnerOptions,
): Promise<void> {
  const ms = options.timing.perPageTimeoutMs;
  try {
    const state = await within(
      session.snapshotState(),
      ms,
      () => new Error(`state snapshot exceeded ${ms}ms`),
    );
    recorder.setState(state);
  } catch (error) {
    options.events.warn(signal.label, `Could not save session state: ${getErrorMessage(error)}`);
  }
}

/**
 * Run one session over the itinerary. Never throws: a launch failure or a
 * total timeout yields a partial, `aborted` log.
 */
export async function runSession(
  itinerary: readonly string[],
  signal: SignalConfig,
  options: SessionRunnerOptions,
): Promise<SessionLog> {
  const { events, timing } = options;
  const recorder = new TrafficRecorder(signal.label, {
    trackers: options.tables.trackers,
    pii: options.tables.pii,
    clock: createSessionClock(options.timeSource),
    events,
  });

  let expired = false;
  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<typeof TOTAL_TIMEOUT>((resolve) => {
    timer = setTimeout(() => {
      expired = true;
      resolve(TOTAL_TIMEOUT);
    }, timing.totalTimeoutMs);
  });
  const abandoned = new AbortController();

  let session: BrowserSession | undefined;
  try {
    const active = await options.launcher.launch({
      ...options.browser,
      extraHttpHeaders: signal.httpHeaders,
      initScripts: signal.scriptOverrides,
    });
    session = active;
    active.onRequest((request) => {
      recorder.record(request);
    });
    let page = await active.newPage();
    events.info(signal.label, `Session started (${itinerary.length} pages)`);

    for (const [index, url] of itinerary.entries()) {
      const remaining = itinerary.length - index;
      if (expired) {
        abortOnTimeout(recorder, signal, options, `before ${url}; ${remaining} page(s) not visited`);
        break;
      }
      const loadTimestampMs = recorder.beginPage(url);
      const result = await Promise.race([
        visitPage(page, url, loadTimestampMs, signal, recorder, options, abandoned.signal),
        deadline,
      ]);
      if (result === TOTAL_TIMEOUT) {
        abandoned.abort();
        recorder.addVisit({
          url,
          loadTimestampMs,
          cookieBannerPresent: false,
          optOutLinkPresent: false,
          status: "failed",
          error: "total timeout exceeded",
        });
        abortOnTimeout(recorder, signal, options, `at ${url}; ${remaining} page(s) not completed`);
        break;
      }
      recorder.addVisit(result);
      if (result.status === "failed" && remaining > 1) {
        page = await replacePage(active, page, signal, events);
      }
    }
  } catch (error) {
    const aborted = new SessionAbortedError(signal.label, getErrorMessage(error));
    recorder.markAborted(aborted.message);
    events.warn(signal.label, aborted.message);
  } finally {
    clearTimeout(timer);
    if (session) {
      await saveSessionState(session, recorder, signal, options);
    }
    recorder.seal();
    if (session) {
      await session.close().catch((error: unknown) => {
        events.warn(signal.label, `Browser did not close cleanly: ${getErrorMessage(error)}`);
      });
    }
  }

  const log = recorder.freeze();
  const ok = log.pageVisits.filter((v) => v.status === "ok").length;
  events.emit(
    signal.label,
    log.aborted ? "WARNING" : "SUCCESS",
    `Session finished: ${ok}/${itinerary.length} pages ok, ${log.requests.length} requests, ${log.trackerDomains.length} tracker domains`,
  );
  return log;
}

/**
 * Run every session concurrently over the same itinerary. A failure in one
 * session never cancels another; logs are merged once all have settled.
 */
export async function runSessions(
  itinerary: readonly string[],
  configs: readonly SignalConfig[],
  options: SessionRunnerOptions,
): Promise<Map<string, SessionLog>> {
  options.events.info(SYSTEM_SOURCE, `Starting ${configs.length} sessions`);

  const settled = await Promise.allSettled(
    configs.map((config) =>
      withSpan("privacy_probe.session", { "session.label": config.label }, () =>
        runSession(itinerary, config, options),
      ),
    ),
  );

  const logs = new Map<string, SessionLog>();
  settled.forEach((outcome, i) => {
    const config = configs[i];
    if (!config) {
      return;
    }
    if (outcome.status === "fulfilled") {
      logs.set(config.label, outcome.value);
      return;
    }
    // withSpan rejected; runSession itself does not throw.
    const reason = getErrorMessage(outcome.reason);
    options.events.error(config.label, `Session failed: ${reason}`);
    logs.set(config.label, emptyAbortedLog(config.label, reason));
  });
  return logs;
}

function emptyAbortedLog(label: string, reason: string): SessionLog {
  return Object.freeze({
    label,
    pageVisits: [],
    requests: [],
    trackerDomains: [],
    aborted: true,
    warnings: [new SessionAbortedError(label, reason).message],
    stats: { duplicatesDropped: 0, classificationErrors: 0, lateRequests: 0 },
  });
}
