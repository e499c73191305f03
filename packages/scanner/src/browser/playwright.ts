import { BrowserUnavailableError, NavigationTimeoutError, getErrorMessage } from "@privacy-probe/errors";
import type { Browser, BrowserContext, Page } from "playwright-core";
import type { PageProbeTable } from "../classification/tables.js";
import { clickRejectControl, findConsentBanner, findOptOutLink } from "./page-probes.js";
import type {
  BrowserLauncher,
  BrowserSession,
  NavigationResult,
  ObservedRequest,
  ScanPage,
  SessionLaunchOptions,
} from "./types.js";
import type { SessionStateSnapshot } from "../types.js";

type PlaywrightModule = typeof import("playwright-core");

async function loadPlaywright(): Promise<PlaywrightModule> {
  try {
    return await import("playwright-core");
  } catch (error) {
    throw new BrowserUnavailableError(
      "playwright-core is not installed. Install it with: npm install playwright-core",
      error instanceof Error ? error : undefined,
    );
  }
}

function isTimeout(error: unknown): boolean {
  return error instanceof Error && error.name === "TimeoutError";
}

class PlaywrightPage implements ScanPage {
  constructor(private readonly page: Page) {}

  async goto(url: string, timeoutMs: number): Promise<NavigationResult> {
    try {
      const response = await this.page.goto(url, { waitUntil: "domcontentloaded", timeout: timeoutMs });
      return response ? { httpStatus: response.status() } : {};
    } catch (error) {
      if (isTimeout(error)) {
        throw new NavigationTimeoutError(url, timeoutMs);
      }
      throw error;
    }
  }

  async settle(timeoutMs: number): Promise<void> {
    try {
      await this.page.waitForLoadState("networkidle", { timeout: timeoutMs });
    } catch (error) {
      // Long-polling pages never go idle; the bound is the settle time.
      if (!isTimeout(error)) {
        throw error;
      }
    }
  }

  async scroll(steps: number, delayMs: number): Promise<void> {
    for (let i = 0; i < steps; i++) {
      await this.page.evaluate(() => window.scrollBy(0, window.innerHeight * 0.8));
      await this.page.waitForTimeout(delayMs);
    }
    if (steps > 0) {
      await this.page.evaluate(() => window.scrollTo(0, 0));
    }
  }

  async wait(ms: number): Promise<void> {
    await this.page.waitForTimeout(ms);
  }

  hasConsentBanner(probes: PageProbeTable): Promise<boolean> {
    return this.page.evaluate(findConsentBanner, probes.consentBannerSelectors);
  }

  hasOptOutLink(probes: PageProbeTable): Promise<boolean> {
    return this.page.evaluate(findOptOutLink, probes.optOutLinkPatterns);
  }

  clickReject(probes: PageProbeTable): Promise<boolean> {
    return this.page.evaluate(clickRejectControl, {
      patterns: probes.rejectButtonPatterns,
      fallbackSelectors: probes.rejectFallbackSelectors,
    });
  }

  async close(): Promise<void> {
    await this.page.close();
  }
}

class PlaywrightSession implements BrowserSession {
  constructor(
    private readonly browser: Browser,
    private readonly context: BrowserContext,
  ) {}

  onRequest(listener: (request: ObservedRequest) => void): void {
    this.context.on("request", (request) => {
      listener({ url: request.url(), method: request.method(), resourceType: request.resourceType() });
    });
  }

  async newPage(): Promise<ScanPage> {
    return new PlaywrightPage(await this.context.newPage());
  }

  async snapshotState(): Promise<SessionStateSnapshot> {
    const { cookies, origins } = await this.context.storageState();
    return { cookies, origins };
  }

  async close(): Promise<void> {
    try {
      await this.context.close();
    } finally {
      await this.browser.close();
    }
  }
}

export interface PlaywrightLauncherOptions {
  /** Path to a Chromium build; defaults to the one Playwright manages */
  readonly executablePath?: string;
  /** Browser channel such as "chrome" or "msedge" */
  readonly channel?: string;
}

/**
 * Launcher backed by Chromium through playwright-core. Each call starts a
 * dedicated browser with a single fresh context, so sessions share no state.
 */
export function createPlaywrightLauncher(options: PlaywrightLauncherOptions = {}): BrowserLauncher {
  return {
    async launch(launch: SessionLaunchOptions): Promise<BrowserSession> {
      const playwright = await loadPlaywright();

      let browser: Browser;
      try {
        browser = await playwright.chromium.launch({
          headless: launch.headless,
          ...(options.executablePath ? { executablePath: options.executablePath } : {}),
          ...(options.channel ? { channel: options.channel } : {}),
        });
      } catch (error) {
        throw new BrowserUnavailableError(
          `Chromium failed to launch: ${getErrorMessage(error)}`,
          error instanceof Error ? error : undefined,
        );
      }

      try {
        const context = await browser.newContext({
          viewport: { width: launch.viewport.width, height: launch.viewport.height },
          ignoreHTTPSErrors: launch.ignoreHttpsErrors,
          extraHTTPHeaders: { ...launch.extraHttpHeaders },
          ...(launch.userAgent ? { userAgent: launch.userAgent } : {}),
        });
        for (const script of launch.initScripts) {
          await context.addInitScript(script);
        }
        return new PlaywrightSession(browser, context);
      } catch (error) {
        await browser.close();
        throw error;
      }
    },
  };
}
