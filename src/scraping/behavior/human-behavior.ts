/**
 * Human Behavior Simulator
 *
 * A short burst of mouse movement and scrolling run once the challenge
 * has cleared: 2-5 relative mouse moves with pauses, a downward scroll,
 * a reading pause, and a scroll back up.
 *
 * Failures are logged and never end the run.
 */
import type { Logger } from "pino";
import { logger as sharedLogger } from "../../monitoring/logger";
import type { PageDriver } from "../browser/page-driver";
import { errorMessage } from "../../shared/errors/probe.errors";
import { sleep as defaultSleep, type Sleeper } from "../../shared/utils/sleep";

export interface HumanBehaviorOptions {
  /** Uniform source in [0, 1) */
  random?: () => number;
  sleep?: Sleeper;
}

const MOVES = { MIN: 2, MAX: 5 };
const MAX_MOUSE_OFFSET_PX = 100;
const SCROLL_PX = { MIN: 100, MAX: 500 };

/** Random integer in [min, max] */
export function randomInt(random: () => number, min: number, max: number): number {
  return min + Math.floor(random() * (max - min + 1));
}

/** Random number in [min, max) */
export function randomBetween(random: () => number, min: number, max: number): number {
  return min + random() * (max - min);
}

export async function simulateHumanBehavior(
  page: PageDriver,
  logger: Logger = sharedLogger,
  options: HumanBehaviorOptions = {}
): Promise<void> {
  const random = options.random ?? Math.random;
  const sleep = options.sleep ?? defaultSleep;

  try {
    const moves = randomInt(random, MOVES.MIN, MOVES.MAX);
    for (let i = 0; i < moves; i++) {
      const dx = randomInt(random, -MAX_MOUSE_OFFSET_PX, MAX_MOUSE_OFFSET_PX);
      const dy = randomInt(random, -MAX_MOUSE_OFFSET_PX, MAX_MOUSE_OFFSET_PX);
      await page.moveMouseBy(dx, dy);
      await sleep(randomBetween(random, 500, 1500));
    }

    const scroll = randomInt(random, SCROLL_PX.MIN, SCROLL_PX.MAX);
    await page.scrollBy(scroll);
    await sleep(randomBetween(random, 1000, 2000));
    await page.scrollBy(-scroll);
    await sleep(randomBetween(random, 500, 1000));

    logger.info({ moves, scroll }, "Simulated human behavior");
  } catch (error) {
    logger.warn({ error: errorMessage(error) }, "Error simulating human behavior");
  }
}
