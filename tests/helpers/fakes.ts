import type { PageDriver } from "../../src/scraping/browser/page-driver";
import type { BrowserLauncher, LaunchedBrowser } from "../../src/scraping/browser/browser-session";
import type { SessionConfig } from "../../src/shared/types/probe.types";

export const CHALLENGE_HTML =
  "<html><head><title>Just a moment...</title></head><body>Checking your browser before accessing the site.</body></html>";

export const SITE_HTML =
  "<html><head><title>Encyclopaedia Metallum: The Metal Archives</title></head><body><h1>Encyclopaedia Metallum</h1><p>Welcome to the archives.</p></body></html>";

export interface FakePageOptions {
  /** Successive URLs returned by url(); the last one sticks */
  urls?: string[];
  title?: string;
  /** Successive results of html(); the last one sticks. Error entries are thrown */
  html?: Array<string | Error>;
  bodyText?: string | Error;
  /** Selector → element text; Error entries are thrown */
  texts?: Record<string, string | Error>;
  gotoError?: Error;
  bodyWaitError?: Error;
  mouseError?: Error;
}

/** In-memory page that records what the probe did to it. */
export class FakePage implements PageDriver {
  readonly gotoCalls: Array<{ url: string; timeoutMs: number }> = [];
  readonly bodyWaits: number[] = [];
  readonly moves: Array<[number, number]> = [];
  readonly scrolls: number[] = [];
  private urls: string[];
  private htmlQueue: Array<string | Error>;
  private options: FakePageOptions;

  constructor(options: FakePageOptions = {}) {
    this.options = options;
    this.urls = [...(options.urls ?? ["about:blank"])];
    this.htmlQueue = [...(options.html ?? [SITE_HTML])];
  }

  async goto(url: string, timeoutMs: number): Promise<void> {
    this.gotoCalls.push({ url, timeoutMs });
    if (this.options.gotoError) throw this.options.gotoError;
    this.urls = [url];
  }

  async waitForBody(timeoutMs: number): Promise<void> {
    this.bodyWaits.push(timeoutMs);
    if (this.options.bodyWaitError) throw this.options.bodyWaitError;
  }

  url(): string {
    return this.urls.length > 1 ? this.urls.shift() ?? "" : this.urls[0] ?? "";
  }

  async title(): Promise<string> {
    return this.options.title ?? "Encyclopaedia Metallum: The Metal Archives";
  }

  async html(): Promise<string> {
    const next = this.htmlQueue.length > 1 ? this.htmlQueue.shift() : this.htmlQueue[0];
    if (next instanceof Error) throw next;
    return next ?? "";
  }

  async bodyText(): Promise<string> {
    const text = this.options.bodyText ?? "Encyclopaedia Metallum\nWelcome to the archives.";
    if (text instanceof Error) throw text;
    return text;
  }

  async textOf(selector: string): Promise<string | null> {
    const text = this.options.texts?.[selector];
    if (text instanceof Error) throw text;
    return text ?? null;
  }

  async moveMouseBy(dx: number, dy: number): Promise<void> {
    if (this.options.mouseError) throw this.options.mouseError;
    this.moves.push([dx, dy]);
  }

  async scrollBy(dy: number): Promise<void> {
    this.scrolls.push(dy);
  }
}

export interface FakeLauncherOptions {
  launchError?: Error;
  newPageError?: Error;
  closeError?: Error;
}

/** Launcher whose browser hands out one FakePage and counts closes. */
export class FakeLauncher implements BrowserLauncher {
  launches = 0;
  closes = 0;
  readonly sessions: SessionConfig[] = [];
  readonly page: FakePage;
  private options: FakeLauncherOptions;

  constructor(page: FakePage = new FakePage(), options: FakeLauncherOptions = {}) {
    this.page = page;
    this.options = options;
  }

  async launch(session: SessionConfig): Promise<LaunchedBrowser> {
    this.sessions.push(session);
    if (this.options.launchError) throw this.options.launchError;
    this.launches++;

    return {
      newPage: async () => {
        if (this.options.newPageError) throw this.options.newPageError;
        return this.page;
      },
      close: async () => {
        this.closes++;
        if (this.options.closeError) throw this.options.closeError;
      },
    };
  }
}

export const SESSION: SessionConfig = {
  headless: true,
  userAgent: "test-agent",
  windowSize: { width: 1280, height: 720 },
  stealth: false,
  extraArgs: [],
  executablePath: null,
};

export const noSleep = async (): Promise<void> => {};

/** A sleep that resolves at once and remembers each requested delay. */
export function recordingSleep() {
  const delays: number[] = [];
  const sleep = async (ms: number): Promise<void> => {
    delays.push(ms);
  };
  return { sleep, delays };
}
