/**
 * Browser capability the session runner depends on. The Playwright adapter
 * implements it in production; tests supply in-process fakes.
 */

import type { PageProbeTable } from "../classification/tables.js";
import type { SessionStateSnapshot, ViewportSize } from "../types.js";

/** One outbound request as reported by the browser */
export interface ObservedRequest {
  readonly url: string;
  readonly method: string;
  readonly resourceType: string;
}

export interface NavigationResult {
  /** Main-document HTTP status, when the browser reports one */
  readonly httpStatus?: number;
}

export interface ScanPage {
  /** Navigate and wait for DOMContentLoaded; rejects on timeout or network error. */
  goto(url: string, timeoutMs: number): Promise<NavigationResult>;
  /** Resolves once the network is idle or `timeoutMs` elapses, whichever is first. */
  settle(timeoutMs: number): Promise<void>;
  scroll(steps: number, delayMs: number): Promise<void>;
  wait(ms: number): Promise<void>;
  hasConsentBanner(probes: PageProbeTable): Promise<boolean>;
  hasOptOutLink(probes: PageProbeTable): Promise<boolean>;
  /** Click the first matching reject control; resolves false when none was found. */
  clickReject(probes: PageProbeTable): Promise<boolean>;
  /** Rejects any call still pending on the page. */
  close(): Promise<void>;
}

/** An isolated context (own cookie jar, storage and cache) on its own browser */
export interface BrowserSession {
  onRequest(listener: (request: ObservedRequest) => void): void;
  newPage(): Promise<ScanPage>;
  /** Cookies and local storage of the context as they stand now */
  snapshotState(): Promise<SessionStateSnapshot>;
  close(): Promise<void>;
}

export interface SessionLaunchOptions {
  readonly headless: boolean;
  readonly viewport: ViewportSize;
  readonly userAgent?: string;
  readonly ignoreHttpsErrors: boolean;
  readonly extraHttpHeaders: Readonly<Record<string, string>>;
  /** Registered before the first navigation, in order */
  readonly initScripts: readonly string[];
}

export interface BrowserLauncher {
  launch(options: SessionLaunchOptions): Promise<BrowserSession>;
}
