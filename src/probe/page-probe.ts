/**
 * Page Probe
 *
 * Runs one probe from start to finish:
 * 1. Launch the browser
 * 2. Load the target (or wait for a human to open it)
 * 3. Poll until the challenge page is gone
 * 4. Optionally simulate a human for a few seconds
 * 5. Extract title, URL and a text excerpt
 * 6. Log exactly one outcome record: "Probe succeeded" or "Probe failed"
 * 7. Close the browser, on every path
 *
 * Launch failures and unexpected errors are rethrown after cleanup; all
 * other probe errors are soft failures returned as a result.
 */
import type { Logger } from "pino";
import type { BrowserSession } from "../scraping/browser/browser-session";
import type { PageDriver } from "../scraping/browser/page-driver";
import { waitForChallengeClear } from "../scraping/challenge/challenge-waiter";
import {
  navigateToTarget,
  waitForManualNavigation,
  waitForPageBody,
} from "../scraping/navigators/site-navigator";
import { extractPageInfo } from "../scraping/extractors/page-info.extractor";
import { simulateHumanBehavior, type HumanBehaviorOptions } from "../scraping/behavior/human-behavior";
import {
  ChallengeTimeoutError,
  errorMessage,
  ProbeError,
  softFailureReason,
} from "../shared/errors/probe.errors";
import { ERROR_CODES } from "../config/constants";
import type { ChallengeWaitResult, PageSnapshot, ProbeOptions, ProbeResult } from "../shared/types/probe.types";
import type { Sleeper } from "../shared/utils/sleep";
import { logger as sharedLogger } from "../monitoring/logger";

export interface ProbeDependencies {
  session: BrowserSession;
  logger?: Logger;
  /** Overrides for the human behavior simulation (randomness, pauses) */
  behavior?: HumanBehaviorOptions;
  /** Pause used by the polling loops */
  sleep?: Sleeper;
}

async function reachTarget(
  page: PageDriver,
  options: ProbeOptions,
  deps: ProbeDependencies,
  logger: Logger
): Promise<void> {
  if (options.manual) {
    await waitForManualNavigation(page, options.manual, logger, deps.sleep);
    await waitForPageBody(page, options.navigationTimeoutMs, logger);
  } else {
    await navigateToTarget(page, options.targetUrl, options.navigationTimeoutMs, logger);
  }
}

async function probePage(
  page: PageDriver,
  options: ProbeOptions,
  deps: ProbeDependencies,
  logger: Logger
): Promise<{ snapshot: PageSnapshot; challenge: ChallengeWaitResult }> {
  await reachTarget(page, options, deps, logger);

  const challenge = await waitForChallengeClear(page, options.challenge, logger, deps.sleep);
  if (!challenge.cleared) {
    throw new ChallengeTimeoutError(challenge.waitedMs, challenge.lastMarker);
  }

  if (options.simulateHuman) {
    await simulateHumanBehavior(page, logger, deps.behavior);
  }

  const snapshot = await extractPageInfo(page, options.extraction, logger);
  return { snapshot, challenge };
}

export async function runProbe(options: ProbeOptions, deps: ProbeDependencies): Promise<ProbeResult> {
  const { session } = deps;
  const logger = deps.logger ?? sharedLogger;
  const startedAt = Date.now();

  logger.info({ profile: options.profile, targetUrl: options.targetUrl }, "Starting probe");

  try {
    const page = await session.open();
    const { snapshot, challenge } = await probePage(page, options, deps, logger);
    const durationMs = Date.now() - startedAt;

    logger.info(
      {
        title: snapshot.title,
        url: snapshot.url,
        headline: snapshot.headline?.text ?? null,
        sourceLength: snapshot.sourceLength,
        bodyExcerpt: snapshot.bodyExcerpt,
        challengeWaitMs: challenge.waitedMs,
        durationMs,
      },
      "Probe succeeded"
    );
    return { status: "success", snapshot, challenge, durationMs };
  } catch (error) {
    const reason = error instanceof ProbeError ? softFailureReason(error) : null;
    if (error instanceof ProbeError && reason) {
      const durationMs = Date.now() - startedAt;
      const level = error.code === ERROR_CODES.CHALLENGE_TIMEOUT ? "warn" : "error";
      logger[level]({ reason, code: error.code, error: error.message, durationMs }, "Probe failed");
      return { status: "soft_failure", reason, message: error.message, durationMs };
    }

    if (!(error instanceof ProbeError)) {
      logger.error({ error: errorMessage(error) }, "Probe aborted by unexpected error");
    }
    throw error;
  } finally {
    await session.close();
  }
}
