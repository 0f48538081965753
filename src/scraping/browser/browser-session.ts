/**
 * Browser Session
 *
 * Owns the one browser process of a probe run.
 *
 * Key behaviors:
 * - open() launches the browser and returns a driver for its first page;
 *   any launch failure becomes a fatal BrowserLaunchError
 * - close() releases the browser exactly once, however often it is
 *   called and from whichever exit path (success, failure, signal)
 *
 * The process itself is started by a BrowserLauncher, so tests can run
 * the whole pipeline against an in-memory browser.
 */
import type { Browser } from "puppeteer-core";
import type { Logger } from "pino";
import { logger as sharedLogger } from "../../monitoring/logger";
import { buildLaunchArgs, ignoredDefaultArgs, initStealthPuppeteer } from "./stealth.config";
import { PuppeteerPageDriver, type PageDriver } from "./page-driver";
import { BrowserLaunchError, errorMessage } from "../../shared/errors/probe.errors";
import type { SessionConfig } from "../../shared/types/probe.types";

export interface LaunchedBrowser {
  newPage(): Promise<PageDriver>;
  close(): Promise<void>;
}

export interface BrowserLauncher {
  launch(session: SessionConfig): Promise<LaunchedBrowser>;
}

/** Starts a real Chromium through puppeteer-extra. */
export class PuppeteerLauncher implements BrowserLauncher {
  async launch(session: SessionConfig): Promise<LaunchedBrowser> {
    const puppeteer = initStealthPuppeteer(session.stealth);
    const browser: Browser = await puppeteer.launch({
      headless: session.headless,
      args: buildLaunchArgs(session),
      ignoreDefaultArgs: ignoredDefaultArgs(session),
      defaultViewport: { ...session.windowSize },
      ...(session.executablePath
        ? { executablePath: session.executablePath }
        : { channel: "chrome" as const }),
    });

    return {
      newPage: async () => PuppeteerPageDriver.create(await browser.newPage(), session),
      close: () => browser.close(),
    };
  }
}

export class BrowserSession {
  private launcher: BrowserLauncher;
  private session: SessionConfig;
  private logger: Logger;
  private browser: LaunchedBrowser | null = null;
  private closing: Promise<void> | null = null;

  constructor(launcher: BrowserLauncher, session: SessionConfig, logger: Logger = sharedLogger) {
    this.launcher = launcher;
    this.session = session;
    this.logger = logger;
  }

  get isOpen(): boolean {
    return this.browser !== null && this.closing === null;
  }

  /**
   * Launch the browser and open the page the probe works in.
   * Can only be called once per session.
   */
  async open(): Promise<PageDriver> {
    if (this.browser || this.closing) {
      throw new BrowserLaunchError("Browser session was already opened");
    }

    this.logger.info("Launching browser");
    try {
      this.browser = await this.launcher.launch(this.session);
    } catch (error) {
      this.logger.error({ error: errorMessage(error) }, "Failed to launch browser");
      throw new BrowserLaunchError(`Failed to launch browser: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    try {
      const page = await this.browser.newPage();
      this.logger.info("Browser launched");
      return page;
    } catch (error) {
      this.logger.error({ error: errorMessage(error) }, "Failed to open page");
      throw new BrowserLaunchError(`Failed to open page: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  /**
   * Close the browser. Safe to call multiple times and concurrently;
   * every caller waits for the same single close.
   */
  close(): Promise<void> {
    if (!this.browser) return Promise.resolve();
    if (!this.closing) {
      this.closing = this.closeBrowser(this.browser);
    }
    return this.closing;
  }

  private async closeBrowser(browser: LaunchedBrowser): Promise<void> {
    this.logger.info("Closing browser");
    try {
      await browser.close();
      this.logger.info("Browser closed");
    } catch (error) {
      this.logger.warn({ error: errorMessage(error) }, "Failed to close browser");
    }
  }
}
