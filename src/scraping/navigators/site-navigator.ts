/**
 * Site Navigator
 *
 * Gets the page onto the target site, either by loading the URL or by
 * waiting for a human to open it in the visible browser window.
 */
import type { Logger } from "pino";
import { logger as sharedLogger } from "../../monitoring/logger";
import type { PageDriver } from "../browser/page-driver";
import {
  classifyNavigationError,
  errorMessage,
  ManualNavigationTimeoutError,
} from "../../shared/errors/probe.errors";
import { sleep as defaultSleep, type Sleeper } from "../../shared/utils/sleep";
import type { ManualNavigationOptions } from "../../shared/types/probe.types";

/**
 * Load the target URL.
 *
 * @throws NavigationTimeoutError if the page does not load in time
 * @throws NavigationError for any other load failure
 */
export async function navigateToTarget(
  page: PageDriver,
  targetUrl: string,
  timeoutMs: number,
  logger: Logger = sharedLogger
): Promise<void> {
  logger.info({ url: targetUrl }, "Navigating to target");
  try {
    await page.goto(targetUrl, timeoutMs);
  } catch (error) {
    throw classifyNavigationError(error, targetUrl, timeoutMs);
  }
  logger.info({ url: page.url() }, "Initial page loaded");
}

/**
 * Wait for the document a human navigated to to finish building its body.
 *
 * @throws NavigationTimeoutError if no body appears in time
 */
export async function waitForPageBody(
  page: PageDriver,
  timeoutMs: number,
  logger: Logger = sharedLogger
): Promise<void> {
  const url = page.url();
  try {
    await page.waitForBody(timeoutMs);
  } catch (error) {
    throw classifyNavigationError(error, url, timeoutMs);
  }
  logger.info({ url }, "Page body loaded");
}

/** Host of a URL without a leading "www.", or null when it has none. */
export function siteHost(url: string): string | null {
  try {
    const host = new URL(url).hostname.toLowerCase();
    return host ? host.replace(/^www\./, "") : null;
  } catch {
    return null;
  }
}

/** Whether url is on the same site as targetUrl (subdomains included). */
export function isOnTargetSite(url: string, targetUrl: string): boolean {
  const target = siteHost(targetUrl);
  const current = siteHost(url);
  if (!target || !current) return false;
  return current === target || current.endsWith(`.${target}`);
}

/**
 * Wait for a human to navigate the visible browser to the target site.
 * Logs the current URL on every check.
 *
 * @returns The URL the page was on when the target site was detected
 * @throws ManualNavigationTimeoutError when the wait expires
 */
export async function waitForManualNavigation(
  page: PageDriver,
  options: ManualNavigationOptions,
  logger: Logger = sharedLogger,
  sleep: Sleeper = defaultSleep
): Promise<string> {
  const { targetUrl, pollIntervalMs, timeoutMs } = options;
  const errorBackoffMs = options.errorBackoffMs ?? pollIntervalMs;
  const startTime = Date.now();

  logger.info(
    { targetUrl, timeoutMs },
    "Browser is ready, waiting for manual navigation to the target site"
  );

  for (;;) {
    let delay = pollIntervalMs;

    try {
      const currentUrl = page.url();
      if (isOnTargetSite(currentUrl, targetUrl)) {
        logger.info({ url: currentUrl }, "Target site detected");
        return currentUrl;
      }
      logger.info({ url: currentUrl }, "Current URL");
    } catch (error) {
      logger.warn({ error: errorMessage(error) }, "Failed to read current URL");
      delay = errorBackoffMs;
    }

    const remaining = timeoutMs - (Date.now() - startTime);
    if (remaining <= 0) {
      throw new ManualNavigationTimeoutError(siteHost(targetUrl) ?? targetUrl, timeoutMs);
    }
    await sleep(Math.min(delay, remaining));
  }
}
