/**
 * Page Driver
 *
 * The narrow contract the probe needs from a browser tab: load a URL,
 * read title / URL / HTML / text, and produce a little mouse and scroll
 * activity. PuppeteerPageDriver implements it over a Puppeteer page;
 * tests substitute an in-memory page.
 */
import type { Page } from "puppeteer-core";
import type { SessionConfig, WindowSize } from "../../shared/types/probe.types";

export interface PageDriver {
  /** Load a URL and wait until the document has a body */
  goto(url: string, timeoutMs: number): Promise<void>;
  /** Wait until the current document has a body */
  waitForBody(timeoutMs: number): Promise<void>;
  /** Current address of the tab, including redirects and manual navigation */
  url(): string;
  title(): Promise<string>;
  /** Serialized HTML of the current document */
  html(): Promise<string>;
  /** Rendered text of the document body */
  bodyText(): Promise<string>;
  /** Text of the first element matching selector, or null when none matches */
  textOf(selector: string): Promise<string | null>;
  /** Move the mouse relative to its last position, clamped to the viewport */
  moveMouseBy(dx: number, dy: number): Promise<void>;
  scrollBy(dy: number): Promise<void>;
}

export class PuppeteerPageDriver implements PageDriver {
  private page: Page;
  private viewport: WindowSize;
  private mouseX: number;
  private mouseY: number;

  private constructor(page: Page, viewport: WindowSize) {
    this.page = page;
    this.viewport = viewport;
    this.mouseX = Math.round(viewport.width / 2);
    this.mouseY = Math.round(viewport.height / 2);
  }

  /**
   * Wrap a freshly opened page, applying the session's user agent and,
   * in stealth mode, hiding navigator.webdriver before any script runs.
   */
  static async create(page: Page, session: SessionConfig): Promise<PuppeteerPageDriver> {
    if (session.userAgent) {
      await page.setUserAgent(session.userAgent);
    }
    if (session.stealth) {
      await page.evaluateOnNewDocument(() => {
        Object.defineProperty(navigator, "webdriver", { get: () => undefined });
      });
    }
    return new PuppeteerPageDriver(page, page.viewport() ?? session.windowSize);
  }

  async goto(url: string, timeoutMs: number): Promise<void> {
    await this.page.goto(url, { waitUntil: "domcontentloaded", timeout: timeoutMs });
    await this.waitForBody(timeoutMs);
  }

  async waitForBody(timeoutMs: number): Promise<void> {
    await this.page.waitForSelector("body", { timeout: timeoutMs });
  }

  url(): string {
    return this.page.url();
  }

  title(): Promise<string> {
    return this.page.title();
  }

  html(): Promise<string> {
    return this.page.content();
  }

  bodyText(): Promise<string> {
    return this.page.evaluate(() => document.body?.innerText ?? "");
  }

  async textOf(selector: string): Promise<string | null> {
    const handle = await this.page.$(selector);
    if (!handle) return null;
    try {
      return await handle.evaluate((el) =>
        el instanceof HTMLElement ? el.innerText : el.textContent ?? ""
      );
    } finally {
      await handle.dispose();
    }
  }

  async moveMouseBy(dx: number, dy: number): Promise<void> {
    this.mouseX = clamp(this.mouseX + dx, 0, this.viewport.width - 1);
    this.mouseY = clamp(this.mouseY + dy, 0, this.viewport.height - 1);
    await this.page.mouse.move(this.mouseX, this.mouseY, { steps: 5 });
  }

  async scrollBy(dy: number): Promise<void> {
    await this.page.evaluate((distance) => window.scrollBy(0, distance), dy);
  }
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}
