/**
 * Probe Types
 *
 * Shapes shared by the browser session, the challenge waiter, the page
 * extractor and the probe pipeline.
 */

/** The three ways a probe can be run. */
export type ProfileName = "basic" | "stealth" | "manual";

export interface WindowSize {
  width: number;
  height: number;
}

/**
 * Browser launch settings. Consumed once when the browser starts and
 * never changed for the lifetime of the run.
 */
export interface SessionConfig {
  /** Run the browser without a visible window */
  headless: boolean;
  /** User-agent string, or null to keep the browser's own */
  userAgent: string | null;
  windowSize: WindowSize;
  /** Hide automation signals (stealth plugin, navigator.webdriver patch) */
  stealth: boolean;
  /** Extra Chromium switches appended after the defaults */
  extraArgs: string[];
  /** Browser binary to drive; the installed Chrome channel when null */
  executablePath: string | null;
}

export interface ChallengeWaitOptions {
  /** Wall-clock bound on the whole wait */
  timeoutMs: number;
  /** Fixed delay between two checks */
  pollIntervalMs: number;
  /** Lower-case substrings that mean the interstitial is still displayed */
  markers: readonly string[];
  /** Delay after a failed page read (capped by pollIntervalMs) */
  errorBackoffMs?: number;
}

export interface ManualNavigationOptions {
  /** URL the human is expected to open; only its host is compared */
  targetUrl: string;
  pollIntervalMs: number;
  timeoutMs: number;
  /** Delay after a failed URL read */
  errorBackoffMs?: number;
}

export interface ExtractionOptions {
  /** CSS selectors tried in order for the page's headline */
  contentSelectors: readonly string[];
  /** Number of body-text characters kept in the excerpt */
  excerptLength: number;
}

/** Everything the probe pipeline needs besides the browser itself. */
export interface ProbeOptions {
  profile: ProfileName;
  targetUrl: string;
  navigationTimeoutMs: number;
  challenge: ChallengeWaitOptions;
  extraction: ExtractionOptions;
  /** Move the mouse and scroll once the challenge has cleared */
  simulateHuman: boolean;
  /** Wait for a human to navigate instead of navigating ourselves */
  manual: ManualNavigationOptions | null;
}

export interface ChallengeDetection {
  isChallenge: boolean;
  /** The first marker found in the page, if any */
  marker: string | null;
}

export interface ChallengeWaitResult {
  cleared: boolean;
  waitedMs: number;
  /** Number of page checks performed */
  polls: number;
  /** Marker seen on the last check that still showed a challenge */
  lastMarker: string | null;
}

export interface PageHeadline {
  selector: string;
  text: string;
}

/** What a successful probe extracts from the loaded page. */
export interface PageSnapshot {
  /** Document title, or the headline text / URL when the title is empty */
  title: string;
  url: string;
  headline: PageHeadline | null;
  /** Length of the page HTML in characters */
  sourceLength: number;
  bodyExcerpt: string;
}

export type SoftFailureReason =
  | "challenge_timeout"
  | "navigation_timeout"
  | "navigation_error"
  | "manual_navigation_timeout"
  | "extraction_error";

export type ProbeResult =
  | {
      status: "success";
      snapshot: PageSnapshot;
      challenge: ChallengeWaitResult;
      durationMs: number;
    }
  | {
      status: "soft_failure";
      reason: SoftFailureReason;
      message: string;
      durationMs: number;
    };
