#!/usr/bin/env node
/**
 * Entry Point: page-probe
 *
 * Runs one probe with the profile named by PROBE_PROFILE (basic, stealth
 * or manual) and exits:
 * - 0 when the probe succeeded or ended in a soft failure
 * - 1 on a fatal failure (bad configuration, browser did not start,
 *   uncaught exception or unhandled rejection)
 * - 130 when interrupted
 *
 * The browser is closed before every exit.
 */
import config from "./config";
import { EXIT_CODES } from "./config/constants";
import { logger } from "./monitoring/logger";
import { runCli } from "./probe/run-cli";
import { PuppeteerLauncher, type BrowserSession } from "./scraping/browser/browser-session";
import { errorMessage } from "./shared/errors/probe.errors";

let session: BrowserSession | null = null;

async function closeAndExit(code: number): Promise<void> {
  try {
    await session?.close();
  } finally {
    process.exit(code);
  }
}

// --- Graceful Shutdown ---
function shutdown(signal: string): void {
  logger.info({ signal }, "Interrupted, shutting down");
  void closeAndExit(EXIT_CODES.INTERRUPTED);
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));

// Handle uncaught errors
process.on("uncaughtException", (error) => {
  logger.fatal({ error: error.message, stack: error.stack }, "Uncaught exception");
  void closeAndExit(EXIT_CODES.FATAL);
});

process.on("unhandledRejection", (reason) => {
  logger.fatal({ reason: errorMessage(reason) }, "Unhandled rejection");
  void closeAndExit(EXIT_CODES.FATAL);
});

runCli(config, new PuppeteerLauncher(), logger, {
  onSession: (created) => {
    session = created;
  },
})
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    logger.fatal({ error: errorMessage(error) }, "Failed to start probe");
    void closeAndExit(EXIT_CODES.FATAL);
  });
