import {
  BrowserLauncher,
  NavigationResponse,
  PageElement,
  PageRoute,
  SessionBrowser,
  SessionContext,
  SessionPage,
} from "../../lib/scraping/browser";

export interface FakePageScript {
  html?: string;
  status?: number;
  /** null mimics a navigation that yields no response. */
  noResponse?: boolean;
  gotoError?: Error;
  readyError?: Error;
  /** goto never settles; only an abort ends the fetch. */
  hang?: boolean;
  finalUrl?: string;
  elements?: Record<string, PageElement>;
}

export function timeoutError(message = "Timeout exceeded"): Error {
  const error = new Error(message);
  error.name = "TimeoutError";
  return error;
}

export class FakePage implements SessionPage {
  closed = false;
  routeHandler: ((route: PageRoute) => unknown) | null = null;
  visited: string[] = [];
  waitedFor: string[] = [];

  constructor(private readonly script: FakePageScript) {}

  async route(_url: string, handler: (route: PageRoute) => unknown): Promise<void> {
    this.routeHandler = handler;
  }

  async goto(url: string): Promise<NavigationResponse | null> {
    this.visited.push(url);
    if (this.script.hang) return new Promise<never>(() => undefined);
    if (this.script.gotoError) throw this.script.gotoError;
    if (this.script.noResponse) return null;
    const status = this.script.status ?? 200;
    return { status: () => status, url: () => url };
  }

  async waitForSelector(selector: string): Promise<unknown> {
    this.waitedFor.push(selector);
    if (this.script.readyError) throw this.script.readyError;
    return {};
  }

  async waitForTimeout(): Promise<void> {}

  async $(selector: string): Promise<PageElement | null> {
    return this.script.elements?.[selector] ?? null;
  }

  async content(): Promise<string> {
    return this.script.html ?? "<html></html>";
  }

  url(): string {
    return this.script.finalUrl ?? this.visited[this.visited.length - 1] ?? "about:blank";
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export class FakeContext implements SessionContext {
  closed = false;
  pages: FakePage[] = [];

  constructor(private readonly nextScript: () => FakePageScript) {}

  async newPage(): Promise<FakePage> {
    const page = new FakePage(this.nextScript());
    this.pages.push(page);
    return page;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export class FakeBrowser implements SessionBrowser {
  connected = true;
  closed = false;
  contexts: FakeContext[] = [];

  constructor(private readonly nextScript: () => FakePageScript) {}

  isConnected(): boolean {
    return this.connected;
  }

  async newContext(): Promise<FakeContext> {
    const context = new FakeContext(this.nextScript);
    this.contexts.push(context);
    return context;
  }

  async close(): Promise<void> {
    this.closed = true;
    this.connected = false;
  }
}

/**
 * Launcher handing out FakeBrowsers. Pages take scripts from `scripts` in
 * order; once exhausted the last one is reused.
 */
export function fakeLauncher(scripts: FakePageScript[]): {
  launcher: BrowserLauncher;
  browsers: FakeBrowser[];
  pages: () => FakePage[];
} {
  const browsers: FakeBrowser[] = [];
  let next = 0;
  const nextScript = () => {
    const script = scripts[Math.min(next, scripts.length - 1)] ?? {};
    next++;
    return script;
  };

  const launcher: BrowserLauncher = async () => {
    const browser = new FakeBrowser(nextScript);
    browsers.push(browser);
    return browser;
  };

  return {
    launcher,
    browsers,
    pages: () => browsers.flatMap((b) => b.contexts.flatMap((c) => c.pages)),
  };
}
