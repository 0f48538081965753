/**
 * CLI Run
 *
 * One command-line run: resolve the profile, open a browser session,
 * run the probe, and turn the outcome into a process exit code.
 * The process wiring (signals, crash handlers, process.exit) stays in
 * src/index.ts.
 */
import type { Logger } from "pino";
import type { ProbeConfig } from "../config";
import { EXIT_CODES } from "../config/constants";
import { resolveProfile, type ResolvedProfile } from "../config/profiles";
import { logger as sharedLogger } from "../monitoring/logger";
import { BrowserSession, type BrowserLauncher } from "../scraping/browser/browser-session";
import { errorMessage } from "../shared/errors/probe.errors";
import { runProbe, type ProbeDependencies } from "./page-probe";

export interface CliOptions {
  /** Called as soon as the session exists, so a signal handler can close it */
  onSession?: (session: BrowserSession) => void;
  /** Passed through to runProbe */
  probe?: Pick<ProbeDependencies, "behavior" | "sleep">;
}

export async function runCli(
  config: ProbeConfig,
  launcher: BrowserLauncher,
  logger: Logger = sharedLogger,
  options: CliOptions = {}
): Promise<number> {
  let profile: ResolvedProfile;
  try {
    profile = resolveProfile(config);
  } catch (error) {
    logger.fatal({ error: errorMessage(error) }, "Invalid configuration");
    return EXIT_CODES.FATAL;
  }

  const session = new BrowserSession(launcher, profile.session, logger);
  options.onSession?.(session);

  try {
    const result = await runProbe(profile.probe, { ...options.probe, session, logger });
    if (result.status === "success") {
      logger.info({ logFile: config.logFile }, "Probe completed successfully");
    } else {
      logger.warn({ logFile: config.logFile, reason: result.reason }, "Probe completed with warnings");
    }
    return EXIT_CODES.OK;
  } catch (error) {
    logger.fatal({ error: errorMessage(error) }, "Probe failed fatally");
    return EXIT_CODES.FATAL;
  }
}
