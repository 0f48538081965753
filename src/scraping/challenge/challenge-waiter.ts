/**
 * Challenge Waiter
 *
 * Polls the page at a fixed interval until no challenge marker is left
 * or the wall-clock timeout elapses. The page is always checked at least
 * once, and no sleep runs past the deadline.
 *
 * A failed page read (the document is being replaced mid-redirect, for
 * instance) is logged and retried after a shorter back-off.
 */
import type { Logger } from "pino";
import { logger as sharedLogger } from "../../monitoring/logger";
import type { PageDriver } from "../browser/page-driver";
import { detectChallenge } from "./challenge-detector";
import { errorMessage } from "../../shared/errors/probe.errors";
import { sleep as defaultSleep, type Sleeper } from "../../shared/utils/sleep";
import type { ChallengeWaitOptions, ChallengeWaitResult } from "../../shared/types/probe.types";

export async function waitForChallengeClear(
  page: PageDriver,
  options: ChallengeWaitOptions,
  logger: Logger = sharedLogger,
  sleep: Sleeper = defaultSleep
): Promise<ChallengeWaitResult> {
  const { timeoutMs, pollIntervalMs, markers } = options;
  const errorBackoffMs = Math.min(options.errorBackoffMs ?? pollIntervalMs, pollIntervalMs);
  const startTime = Date.now();
  let polls = 0;
  let lastMarker: string | null = null;

  logger.info("Checking for challenge page");

  for (;;) {
    polls++;
    let delay = pollIntervalMs;

    try {
      const detection = detectChallenge(await page.html(), markers);
      if (!detection.isChallenge) {
        const waitedMs = Date.now() - startTime;
        logger.info({ waitedMs, polls }, "No challenge on page");
        return { cleared: true, waitedMs, polls, lastMarker };
      }
      lastMarker = detection.marker;
      logger.info(
        { marker: detection.marker, elapsedMs: Date.now() - startTime },
        "Challenge detected, waiting"
      );
    } catch (error) {
      logger.warn({ error: errorMessage(error) }, "Failed to read page while checking for challenge");
      delay = errorBackoffMs;
    }

    const remaining = timeoutMs - (Date.now() - startTime);
    if (remaining <= 0) {
      return { cleared: false, waitedMs: Date.now() - startTime, polls, lastMarker };
    }
    await sleep(Math.min(delay, remaining));
  }
}
