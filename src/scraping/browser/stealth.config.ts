/**
 * Browser Configuration
 *
 * Configures puppeteer-extra on top of puppeteer-core. The browser binary
 * is not bundled: the session names an executable, or the installed
 * Chrome channel is used.
 *
 * In stealth mode the stealth plugin is registered and the Chromium
 * switches that reveal automation are removed or overridden.
 */
import puppeteerCore from "puppeteer-core";
import { addExtra } from "puppeteer-extra";
import StealthPlugin from "puppeteer-extra-plugin-stealth";
import { BASE_LAUNCH_ARGS, STEALTH_LAUNCH_ARGS } from "../../config/constants";
import type { SessionConfig } from "../../shared/types/probe.types";

/**
 * Build a puppeteer-extra instance for one session.
 * A fresh instance per session keeps the plugin list from leaking
 * between a stealth and a plain run in the same process.
 */
export function initStealthPuppeteer(stealth: boolean) {
  const puppeteer = addExtra(puppeteerCore);
  if (stealth) {
    puppeteer.use(StealthPlugin());
  }
  return puppeteer;
}

/**
 * Chromium switches for a session: the shared base set, the window size,
 * the user agent and, in stealth mode, the anti-detection set.
 */
export function buildLaunchArgs(session: SessionConfig): string[] {
  const args: string[] = [
    ...BASE_LAUNCH_ARGS,
    `--window-size=${session.windowSize.width},${session.windowSize.height}`,
  ];
  if (session.userAgent) {
    args.push(`--user-agent=${session.userAgent}`);
  }
  if (session.stealth) {
    args.push(...STEALTH_LAUNCH_ARGS);
  }
  args.push(...session.extraArgs);
  return args;
}

/** Default switches Puppeteer adds that must go in stealth mode */
export function ignoredDefaultArgs(session: SessionConfig): string[] {
  return session.stealth ? ["--enable-automation"] : [];
}
