/**
 * Environment Configuration
 *
 * Centralizes all environment variables into a typed configuration object.
 * All modules import config from here instead of reading process.env directly.
 *
 * Groups:
 * - Runtime: environment, log level and log file
 * - Probe: profile, target URL and the headless override
 * - Browser: Chrome binary location
 * - Timing: navigation, challenge and manual-navigation bounds
 *
 * Unset or unparsable values fall back to the defaults in constants.ts.
 * Optional overrides stay undefined so the selected profile decides.
 */
import dotenv from "dotenv";
import type { Level } from "pino";
import { CHALLENGE, MANUAL, TARGET } from "./constants";

dotenv.config();

const LOG_LEVELS: readonly Level[] = ["fatal", "error", "warn", "info", "debug", "trace"];

function parseLevel(value: string | undefined): Level {
  const level = LOG_LEVELS.find((candidate) => candidate === value?.toLowerCase());
  return level ?? "info";
}

function parseIntOr(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value ?? "", 10);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}

/** Like parseIntOr, but 0 also falls back; polling intervals must be positive */
function parsePositiveIntOr(value: string | undefined, fallback: number): number {
  const parsed = parseIntOr(value, fallback);
  return parsed > 0 ? parsed : fallback;
}

function parseOptionalInt(value: string | undefined): number | undefined {
  const parsed = parseInt(value ?? "", 10);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : undefined;
}

function parseOptionalBoolean(value: string | undefined): boolean | undefined {
  switch (value?.trim().toLowerCase()) {
    case "1":
    case "true":
    case "yes":
      return true;
    case "0":
    case "false":
    case "no":
      return false;
    default:
      return undefined;
  }
}

export function loadConfig(env: NodeJS.ProcessEnv) {
  return {
    // --- Runtime ---
    env: env.NODE_ENV || "development",
    logLevel: parseLevel(env.LOG_LEVEL),
    logFile: env.LOG_FILE || "probe.log",

    // --- Probe ---
    /** basic | stealth | manual; validated when the profile is resolved */
    profile: env.PROBE_PROFILE || "basic",
    targetUrl: env.TARGET_URL || TARGET.DEFAULT_URL,
    /** Overrides the profile's headless setting when set */
    headless: parseOptionalBoolean(env.HEADLESS),

    // --- Browser ---
    executablePath: env.CHROME_EXECUTABLE_PATH || null,

    // --- Timing ---
    navigationTimeoutMs: parseOptionalInt(env.NAVIGATION_TIMEOUT_MS),
    challengeTimeoutMs: parseIntOr(env.CHALLENGE_TIMEOUT_MS, CHALLENGE.TIMEOUT_MS),
    challengePollIntervalMs: parsePositiveIntOr(
      env.CHALLENGE_POLL_INTERVAL_MS,
      CHALLENGE.POLL_INTERVAL_MS
    ),
    manualPollIntervalMs: parsePositiveIntOr(env.MANUAL_POLL_INTERVAL_MS, MANUAL.POLL_INTERVAL_MS),
    manualWaitTimeoutMs: parseIntOr(env.MANUAL_WAIT_TIMEOUT_MS, MANUAL.WAIT_TIMEOUT_MS),
  };
}

export type ProbeConfig = ReturnType<typeof loadConfig>;

const config: ProbeConfig = loadConfig(process.env);

export default config;
