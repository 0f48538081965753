/**
 * Probe Profiles
 *
 * Turns the flat environment config into the session settings and probe
 * options of one of three profiles:
 *
 * - basic:   headless, fixed user agent, plain navigation
 * - stealth: headless, rotating user agent, automation signals hidden,
 *            human-like mouse and scroll activity after the challenge
 * - manual:  visible window, a human navigates to the target site
 *
 * HEADLESS overrides the profile's window mode and nothing else.
 */
import {
  BASIC_CONTENT_SELECTORS,
  CHALLENGE,
  CONTENT_SELECTORS,
  EXCERPT_LENGTH,
  MANUAL,
  NAVIGATION,
  USER_AGENTS,
  WINDOW_SIZE,
} from "./constants";
import type { ProbeConfig } from "./index";
import { InvalidConfigError } from "../shared/errors/probe.errors";
import type { ProbeOptions, ProfileName, SessionConfig } from "../shared/types/probe.types";

export const PROFILE_NAMES: readonly ProfileName[] = ["basic", "stealth", "manual"];

export interface ResolvedProfile {
  session: SessionConfig;
  probe: ProbeOptions;
}

export function parseProfileName(value: string): ProfileName {
  const name = PROFILE_NAMES.find((candidate) => candidate === value.trim().toLowerCase());
  if (!name) {
    throw new InvalidConfigError(
      `Unknown probe profile "${value}" (expected one of: ${PROFILE_NAMES.join(", ")})`
    );
  }
  return name;
}

/** Pick an entry with the supplied random source (Math.random by default). */
export function pickUserAgent(random: () => number = Math.random): string {
  const agents = USER_AGENTS.ROTATION;
  const index = Math.min(Math.floor(random() * agents.length), agents.length - 1);
  return agents[index];
}

function assertUrl(value: string): string {
  try {
    return new URL(value).toString();
  } catch {
    throw new InvalidConfigError(`TARGET_URL is not a valid URL: "${value}"`);
  }
}

export function resolveProfile(
  config: ProbeConfig,
  random: () => number = Math.random
): ResolvedProfile {
  const profile = parseProfileName(config.profile);
  const targetUrl = assertUrl(config.targetUrl);

  const challenge = {
    timeoutMs: config.challengeTimeoutMs,
    pollIntervalMs: config.challengePollIntervalMs,
    markers: CHALLENGE.MARKERS,
    errorBackoffMs: CHALLENGE.ERROR_BACKOFF_MS,
  };

  const baseSession: SessionConfig = {
    headless: true,
    userAgent: null,
    windowSize: { ...WINDOW_SIZE },
    stealth: false,
    extraArgs: [],
    executablePath: config.executablePath,
  };

  let session: SessionConfig;
  let probe: ProbeOptions;

  switch (profile) {
    case "basic":
      session = { ...baseSession, userAgent: USER_AGENTS.BASIC };
      probe = {
        profile,
        targetUrl,
        navigationTimeoutMs: config.navigationTimeoutMs ?? NAVIGATION.BASIC_TIMEOUT_MS,
        challenge,
        extraction: { contentSelectors: BASIC_CONTENT_SELECTORS, excerptLength: EXCERPT_LENGTH },
        simulateHuman: false,
        manual: null,
      };
      break;
    case "stealth":
      session = { ...baseSession, userAgent: pickUserAgent(random), stealth: true };
      probe = {
        profile,
        targetUrl,
        navigationTimeoutMs: config.navigationTimeoutMs ?? NAVIGATION.STEALTH_TIMEOUT_MS,
        challenge,
        extraction: { contentSelectors: CONTENT_SELECTORS, excerptLength: EXCERPT_LENGTH },
        simulateHuman: true,
        manual: null,
      };
      break;
    case "manual":
      session = { ...baseSession, headless: false };
      probe = {
        profile,
        targetUrl,
        navigationTimeoutMs: config.navigationTimeoutMs ?? NAVIGATION.BASIC_TIMEOUT_MS,
        challenge,
        extraction: { contentSelectors: CONTENT_SELECTORS, excerptLength: EXCERPT_LENGTH },
        simulateHuman: false,
        manual: {
          targetUrl,
          pollIntervalMs: config.manualPollIntervalMs,
          timeoutMs: config.manualWaitTimeoutMs,
          errorBackoffMs: MANUAL.ERROR_BACKOFF_MS,
        },
      };
      break;
  }

  if (config.headless !== undefined) {
    session = { ...session, headless: config.headless };
  }

  return { session, probe };
}
