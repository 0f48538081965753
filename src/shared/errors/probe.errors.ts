/**
 * Custom Error Classes for Probe Runs
 *
 * Each error class maps to an ERROR_CODE in constants.ts.
 * Fatal errors end the process with a non-zero exit code; the others
 * are soft failures that are logged and end the run normally.
 */
import { TimeoutError as PuppeteerTimeoutError } from "puppeteer-core";
import { ERROR_CODES, type ErrorCode } from "../../config/constants";
import type { SoftFailureReason } from "../types/probe.types";

/**
 * Base class for all probe errors.
 * Includes an error code for classification in log records.
 */
export class ProbeError extends Error {
  public readonly code: ErrorCode;
  public readonly fatal: boolean;

  constructor(message: string, code: ErrorCode, fatal: boolean = false, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ProbeError";
    this.code = code;
    this.fatal = fatal;
  }
}

/** The browser process could not be started or could not open a page */
export class BrowserLaunchError extends ProbeError {
  constructor(message: string = "Browser launch failed", options?: { cause?: unknown }) {
    super(message, ERROR_CODES.BROWSER_LAUNCH_FAILED, true, options);
    this.name = "BrowserLaunchError";
  }
}

/** A configuration value cannot be used (unknown profile, malformed URL) */
export class InvalidConfigError extends ProbeError {
  constructor(message: string) {
    super(message, ERROR_CODES.INVALID_CONFIG, true);
    this.name = "InvalidConfigError";
  }
}

/** The target page did not load within the navigation timeout */
export class NavigationTimeoutError extends ProbeError {
  constructor(url: string, timeoutMs: number, options?: { cause?: unknown }) {
    super(`Timed out after ${timeoutMs}ms loading ${url}`, ERROR_CODES.NAVIGATION_TIMEOUT, false, options);
    this.name = "NavigationTimeoutError";
  }
}

/** Navigation failed for another reason (DNS, connection reset, aborted) */
export class NavigationError extends ProbeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, ERROR_CODES.NAVIGATION_ERROR, false, options);
    this.name = "NavigationError";
  }
}

/** The challenge marker was still on the page when the wait expired */
export class ChallengeTimeoutError extends ProbeError {
  public readonly marker: string | null;

  constructor(waitedMs: number, marker: string | null) {
    super(
      marker
        ? `Challenge still present after ${waitedMs}ms (marker: "${marker}")`
        : `Challenge check did not succeed within ${waitedMs}ms`,
      ERROR_CODES.CHALLENGE_TIMEOUT
    );
    this.name = "ChallengeTimeoutError";
    this.marker = marker;
  }
}

/** Nobody navigated to the target site before the manual wait expired */
export class ManualNavigationTimeoutError extends ProbeError {
  constructor(targetHost: string, timeoutMs: number) {
    super(`No navigation to ${targetHost} within ${timeoutMs}ms`, ERROR_CODES.MANUAL_NAVIGATION_TIMEOUT);
    this.name = "ManualNavigationTimeoutError";
  }
}

/** The loaded page could not be read */
export class ExtractionError extends ProbeError {
  constructor(message: string = "Page extraction failed", options?: { cause?: unknown }) {
    super(message, ERROR_CODES.EXTRACTION_FAILED, false, options);
    this.name = "ExtractionError";
  }
}

const SOFT_FAILURE_REASONS: Partial<Record<ErrorCode, SoftFailureReason>> = {
  [ERROR_CODES.NAVIGATION_TIMEOUT]: "navigation_timeout",
  [ERROR_CODES.NAVIGATION_ERROR]: "navigation_error",
  [ERROR_CODES.CHALLENGE_TIMEOUT]: "challenge_timeout",
  [ERROR_CODES.MANUAL_NAVIGATION_TIMEOUT]: "manual_navigation_timeout",
  [ERROR_CODES.EXTRACTION_FAILED]: "extraction_error",
};

/** Soft-failure reason for a probe error, or null when the error is fatal. */
export function softFailureReason(error: ProbeError): SoftFailureReason | null {
  if (error.fatal) return null;
  return SOFT_FAILURE_REASONS[error.code] ?? null;
}

/**
 * Map an error thrown while loading a page to the probe error that
 * describes it. Puppeteer signals an expired navigation with TimeoutError.
 */
export function classifyNavigationError(error: unknown, url: string, timeoutMs: number): ProbeError {
  if (error instanceof ProbeError) return error;
  if (error instanceof PuppeteerTimeoutError || (error instanceof Error && error.name === "TimeoutError")) {
    return new NavigationTimeoutError(url, timeoutMs, { cause: error });
  }
  return new NavigationError(`Failed to load ${url}: ${errorMessage(error)}`, { cause: error });
}

/** Message of anything thrown, for log fields. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
