import { chromium } from "playwright";
import { config } from "../config";
import {
  DeadlineExceeded,
  FetchTimeout,
  NavigationError,
  ParseCancelled,
  VehicleParseError,
  errorMessage,
} from "../errors";
import { RenderedPage } from "../types";
import { raceAbort } from "./utils";

// Structural views of the Playwright objects the fetcher touches. Playwright's
// Browser satisfies them; tests substitute in-process fakes.

export interface NavigationResponse {
  status(): number;
  url(): string;
}

export interface PageElement {
  getAttribute(name: string): Promise<string | null>;
  click(): Promise<void>;
}

export interface PageRoute {
  request(): { resourceType(): string };
  abort(): Promise<void>;
  continue(): Promise<void>;
}

export interface SessionPage {
  route(url: string, handler: (route: PageRoute) => unknown): Promise<void>;
  goto(
    url: string,
    options: { waitUntil: "load" | "domcontentloaded" | "networkidle"; timeout: number }
  ): Promise<NavigationResponse | null>;
  waitForSelector(selector: string, options: { timeout: number; state: "attached" }): Promise<unknown>;
  waitForTimeout(ms: number): Promise<void>;
  $(selector: string): Promise<PageElement | null>;
  content(): Promise<string>;
  url(): string;
  close(): Promise<void>;
}

export interface SessionContext {
  newPage(): Promise<SessionPage>;
  close(): Promise<void>;
}

export interface SessionBrowser {
  isConnected(): boolean;
  newContext(options: {
    userAgent: string;
    viewport: { width: number; height: number };
    locale: string;
  }): Promise<SessionContext>;
  close(): Promise<void>;
}

export type BrowserLauncher = (options: { headless: boolean; args: string[] }) => Promise<SessionBrowser>;

const LAUNCH_ARGS = [
  "--disable-blink-features=AutomationControlled",
  "--no-sandbox",
  "--disable-setuid-sandbox",
];

const BLOCKED_RESOURCES = new Set(["image", "font", "media"]);

const launchChromium: BrowserLauncher = (options) => chromium.launch(options);

export interface BrowserSessionOptions {
  launcher?: BrowserLauncher;
  headless?: boolean;
  userAgent?: string;
}

/**
 * Process-wide browser handle. Chromium starts lazily on the first page
 * request and stays up until close(). One context per host is shared by
 * concurrent requests; every request gets its own page.
 */
export class BrowserSession {
  private browser: Promise<SessionBrowser> | null = null;
  private readonly contexts = new Map<string, Promise<SessionContext>>();
  private readonly launcher: BrowserLauncher;
  private readonly headless: boolean;
  private readonly userAgent: string;
  private closed = false;

  constructor(options: BrowserSessionOptions = {}) {
    this.launcher = options.launcher ?? launchChromium;
    this.headless = options.headless ?? config.headless;
    this.userAgent = options.userAgent ?? config.getRandomUserAgent();
  }

  get isOpen(): boolean {
    return this.browser !== null && !this.closed;
  }

  private async getBrowser(): Promise<SessionBrowser> {
    if (this.browser) return this.browser;

    console.log(`[browser] Launching Chromium (headless=${this.headless})`);
    const launching = this.launcher({ headless: this.headless, args: LAUNCH_ARGS });
    this.browser = launching;
    try {
      return await launching;
    } catch (error) {
      this.browser = null;
      throw error;
    }
  }

  private async getContext(host: string): Promise<SessionContext> {
    // Contexts die with their browser
    if (this.browser && !(await this.browser).isConnected()) {
      console.warn("[browser] Browser disconnected, relaunching");
      this.browser = null;
      this.contexts.clear();
    }

    const existing = this.contexts.get(host);
    if (existing) return existing;

    const creating = this.getBrowser().then((b) =>
      b.newContext({
        userAgent: this.userAgent,
        viewport: { width: 1280, height: 720 },
        locale: "zh-CN",
      })
    );
    this.contexts.set(host, creating);
    creating.catch(() => this.contexts.delete(host));
    return creating;
  }

  /**
   * Run `fn` against a fresh page for `url`'s host. The page is closed on
   * every exit path, including when `signal` aborts mid-flight.
   */
  async withPage<T>(url: string, fn: (page: SessionPage) => Promise<T>, signal?: AbortSignal): Promise<T> {
    if (this.closed) throw new Error("Browser session is closed");

    const context = await raceAbort(this.getContext(new URL(url).hostname), signal);
    const page = await context.newPage();
    try {
      return await raceAbort(fn(page), signal);
    } finally {
      await page.close().catch((err: unknown) => {
        console.warn(`[browser] Failed to close page for ${url}: ${errorMessage(err)}`);
      });
    }
  }

  async close(): Promise<void> {
    this.closed = true;
    for (const [host, ctx] of this.contexts) {
      await ctx
        .then((c) => c.close())
        .catch((err: unknown) => console.warn(`[browser] Failed to close context ${host}: ${errorMessage(err)}`));
    }
    this.contexts.clear();

    if (this.browser) {
      const pending = this.browser;
      this.browser = null;
      await pending
        .then((b) => b.close())
        .catch((err: unknown) => console.warn(`[browser] Failed to close browser: ${errorMessage(err)}`));
      console.log("[browser] Closed");
    }
  }
}

export interface FetchOptions {
  /** Selector whose presence marks the page as rendered; omitted = fixed settle delay. */
  readySelector?: string;
  navigationTimeoutMs?: number;
  readyTimeoutMs?: number;
  settleDelayMs?: number;
  signal?: AbortSignal;
  /** Runs after the ready signal, before the HTML is captured. */
  prepare?: (page: SessionPage) => Promise<void>;
}

function isTimeoutError(error: unknown): boolean {
  return error instanceof Error && error.name === "TimeoutError";
}

function assertFetchableUrl(url: string): void {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch (error) {
    throw new NavigationError(`Malformed URL: ${url}`, {
      stage: "fetching",
      url,
      diagnostic: errorMessage(error),
      cause: error,
    });
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new NavigationError(`Unsupported URL scheme "${parsed.protocol}"`, { stage: "fetching", url });
  }
}

/**
 * Load `url` in the session, wait until it is rendered and return its HTML.
 * Throws NavigationError, FetchTimeout or ParseCancelled.
 */
export async function fetchRenderedPage(
  session: BrowserSession,
  url: string,
  options: FetchOptions = {}
): Promise<RenderedPage> {
  assertFetchableUrl(url);

  const {
    readySelector,
    navigationTimeoutMs = config.navigationTimeoutMs,
    readyTimeoutMs = config.readyTimeoutMs,
    settleDelayMs = config.settleDelayMs,
    signal,
    prepare,
  } = options;

  try {
    return await session.withPage(
      url,
      async (page) => {
        await page.route("**/*", (route) => {
          if (BLOCKED_RESOURCES.has(route.request().resourceType())) {
            return route.abort();
          }
          return route.continue();
        });

        let response: NavigationResponse | null;
        try {
          response = await page.goto(url, { waitUntil: "domcontentloaded", timeout: navigationTimeoutMs });
        } catch (error) {
          if (isTimeoutError(error)) {
            throw new FetchTimeout(`Navigation to ${url} timed out after ${navigationTimeoutMs}ms`, {
              stage: "fetching",
              url,
              diagnostic: errorMessage(error),
              cause: error,
            });
          }
          throw new NavigationError(`Navigation to ${url} failed`, {
            stage: "fetching",
            url,
            diagnostic: errorMessage(error),
            cause: error,
          });
        }

        const status = response?.status() ?? 200;
        if (status < 200 || status >= 300) {
          throw new NavigationError(`HTTP ${status} for ${url}`, {
            stage: "fetching",
            url,
            diagnostic: `status ${status}`,
          });
        }

        if (readySelector) {
          try {
            await page.waitForSelector(readySelector, { timeout: readyTimeoutMs, state: "attached" });
          } catch (error) {
            if (!isTimeoutError(error)) throw error;
            throw new FetchTimeout(`Ready signal "${readySelector}" did not appear within ${readyTimeoutMs}ms`, {
              stage: "fetching",
              url,
              diagnostic: errorMessage(error),
              cause: error,
            });
          }
        }

        if (prepare) await prepare(page);

        // Let trailing client renders land before capturing
        if (settleDelayMs > 0) await page.waitForTimeout(settleDelayMs);

        const html = await page.content();
        console.log(`[browser] Rendered ${url} (${html.length} bytes)`);
        return { url, finalUrl: page.url(), status, html };
      },
      signal
    );
  } catch (error) {
    if (signal?.aborted && !(error instanceof VehicleParseError)) {
      if (signal.reason instanceof DeadlineExceeded) {
        throw new FetchTimeout(`Fetching ${url} exceeded the request deadline`, {
          stage: "fetching",
          url,
          diagnostic: signal.reason.message,
          cause: signal.reason,
        });
      }
      throw new ParseCancelled(`Fetching ${url} was cancelled`, {
        stage: "fetching",
        url,
        diagnostic: errorMessage(signal.reason),
        cause: signal.reason,
      });
    }
    throw error;
  }
}

/**
 * Click a carousel "next" button until it reports disabled, so every
 * lazily-inserted slide is present in the DOM.
 */
export function clickThrough(
  buttonSelector: string,
  disabledClass: string,
  options: { stepDelayMs?: number; maxClicks?: number } = {}
): (page: SessionPage) => Promise<void> {
  const { stepDelayMs = 300, maxClicks = 60 } = options;
  return async (page) => {
    for (let clicks = 0; clicks < maxClicks; clicks++) {
      const button = await page.$(buttonSelector);
      if (!button) return;
      const classes = (await button.getAttribute("class")) ?? "";
      if (classes.includes(disabledClass)) return;
      await button.click();
      await page.waitForTimeout(stepDelayMs);
    }
    console.warn(`[browser] Stopped after ${maxClicks} clicks on ${buttonSelector}`);
  };
}

/** Close the session, then exit with the conventional 128 + signal number. */
export function shutdownHandler(
  session: BrowserSession,
  exit: (code: number) => void = (code) => process.exit(code)
): (signal: NodeJS.Signals) => void {
  return (signal) => {
    console.log(`[browser] Received ${signal}, closing browser`);
    session
      .close()
      .catch((err: unknown) => console.error(`[browser] Shutdown failed: ${errorMessage(err)}`))
      .finally(() => exit(signal === "SIGTERM" ? 143 : 130));
  };
}

/** Tear the session down on SIGINT/SIGTERM. */
export function closeOnExit(session: BrowserSession): void {
  const handle = shutdownHandler(session);
  process.once("SIGINT", handle);
  process.once("SIGTERM", handle);
}
