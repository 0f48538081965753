/**
 * Challenge Detector
 *
 * Decides whether the loaded document is still an anti-bot interstitial
 * by looking for known marker phrases in its HTML. Matching is
 * case-insensitive; the first marker found (in list order) is reported.
 */
import type { ChallengeDetection } from "../../shared/types/probe.types";

export function detectChallenge(html: string, markers: readonly string[]): ChallengeDetection {
  const htmlLower = html.toLowerCase();

  for (const marker of markers) {
    if (marker && htmlLower.includes(marker.toLowerCase())) {
      return { isChallenge: true, marker };
    }
  }

  return { isChallenge: false, marker: null };
}
