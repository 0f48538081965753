/**
 * Application Constants
 *
 * Static values that don't change per environment.
 * Includes the default target, challenge markers, content selectors,
 * user agents, Chromium switches and error codes.
 */

// --- Target Website ---
export const TARGET = {
  DEFAULT_URL: "https://www.metal-archives.com/",
} as const;

// --- Challenge Detection ---
// Matched case-insensitively against the page HTML. Any hit means the
// anti-bot interstitial is still in front of the real page.
export const CHALLENGE = {
  MARKERS: ["checking your browser", "verifying you are human", "cloudflare"],
  TIMEOUT_MS: 30000,
  POLL_INTERVAL_MS: 2000,
  /** Shorter pause after a failed page read */
  ERROR_BACKOFF_MS: 1000,
} as const;

// --- Manual Navigation ---
export const MANUAL = {
  POLL_INTERVAL_MS: 10000,
  ERROR_BACKOFF_MS: 5000,
  WAIT_TIMEOUT_MS: 5 * 60 * 1000,
} as const;

// --- Navigation ---
export const NAVIGATION = {
  BASIC_TIMEOUT_MS: 10000,
  STEALTH_TIMEOUT_MS: 15000,
} as const;

// --- Page Extraction ---
/** Headline lookup for the basic profile: title-ish elements, then headings */
export const BASIC_CONTENT_SELECTORS = ["h1", ".title", ".logo", ".site-title", "h2", "h3"] as const;

/** Broader lookup used once a challenge page has been cleared */
export const CONTENT_SELECTORS = [
  "h1",
  "h2",
  ".title",
  ".site-title",
  ".logo",
  ".main-content",
  ".content",
  ".header",
  "nav",
  ".navigation",
  ".menu",
] as const;

export const EXCERPT_LENGTH = 200;

// --- Browser ---
export const WINDOW_SIZE = { width: 1920, height: 1080 } as const;

export const USER_AGENTS = {
  /** Fixed desktop Chrome UA used by the basic profile */
  BASIC:
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/91.0.4472.124 Safari/537.36",
  /** Picked at random by the stealth profile */
  ROTATION: [
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
    "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
    "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
  ],
} as const;

/** Switches every profile gets; tuned for containers and CI hosts */
export const BASE_LAUNCH_ARGS = [
  "--no-sandbox",
  "--disable-dev-shm-usage",
  "--disable-gpu",
] as const;

/**
 * Added in stealth mode. --disable-blink-features=AutomationControlled
 * removes the "navigator.webdriver" flag that bot managers check.
 */
export const STEALTH_LAUNCH_ARGS = [
  "--disable-blink-features=AutomationControlled",
  "--disable-web-security",
  "--disable-features=VizDisplayCompositor",
  "--start-maximized",
] as const;

// --- Error Codes ---
// Classified failure types carried by ProbeError and logged with every failure.
export const ERROR_CODES = {
  BROWSER_LAUNCH_FAILED: "BROWSER_LAUNCH_FAILED",
  INVALID_CONFIG: "INVALID_CONFIG",
  NAVIGATION_TIMEOUT: "NAVIGATION_TIMEOUT",
  NAVIGATION_ERROR: "NAVIGATION_ERROR",
  CHALLENGE_TIMEOUT: "CHALLENGE_TIMEOUT",
  MANUAL_NAVIGATION_TIMEOUT: "MANUAL_NAVIGATION_TIMEOUT",
  EXTRACTION_FAILED: "EXTRACTION_FAILED",
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

// --- Exit Codes ---
export const EXIT_CODES = {
  /** The probe succeeded or ended in a soft failure */
  OK: 0,
  FATAL: 1,
  INTERRUPTED: 130,
} as const;
