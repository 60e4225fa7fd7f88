import { UnsupportedMediaTypeError } from "./errors";
import {
  essence,
  formatMediaRange,
  type MediaRange,
  type MediaType,
} from "./media-type";

export type MatchSpecificity = "exact" | "subtype-wildcard" | "full-wildcard";

const SPECIFICITY_WEIGHT: Record<MatchSpecificity, number> = {
  exact: 2,
  "subtype-wildcard": 1,
  "full-wildcard": 0,
};

/**
 * How closely a media range matches a media type, or undefined for no match
 */
export function matchSpecificity(
  mediaType: MediaType,
  range: MediaRange,
): MatchSpecificity | undefined {
  if (range.type === "*") {
    return "full-wildcard";
  }
  if (range.type !== mediaType.type) {
    return undefined;
  }
  if (range.subtype === "*") {
    return "subtype-wildcard";
  }
  return range.subtype === mediaType.subtype ? "exact" : undefined;
}

export interface NegotiationScore {
  quality: number;
  specificity: MatchSpecificity;
  /** Position of the matching range in the preference list */
  preferenceIndex: number;
}

export interface RankedCandidate<T> {
  candidate: T;
  score: NegotiationScore;
}

/**
 * Score a media type against a preference list. The most specific matching
 * range decides; ranges of equal specificity are decided by list position.
 * Returns undefined when nothing matches or the deciding range has q=0.
 */
export function scoreMediaType(
  mediaType: MediaType,
  preferences: readonly MediaRange[],
): NegotiationScore | undefined {
  let best: NegotiationScore | undefined;

  preferences.forEach((range, preferenceIndex) => {
    const specificity = matchSpecificity(mediaType, range);
    if (specificity === undefined) return;
    if (
      best === undefined ||
      SPECIFICITY_WEIGHT[specificity] > SPECIFICITY_WEIGHT[best.specificity]
    ) {
      best = { quality: range.quality, specificity, preferenceIndex };
    }
  });

  if (best === undefined || best.quality === 0) {
    return undefined;
  }
  return best;
}

/**
 * Negative when `a` ranks before `b`, zero when they tie
 */
export function compareScores(
  a: NegotiationScore,
  b: NegotiationScore,
): number {
  return (
    b.quality - a.quality ||
    SPECIFICITY_WEIGHT[b.specificity] - SPECIFICITY_WEIGHT[a.specificity] ||
    a.preferenceIndex - b.preferenceIndex
  );
}

/**
 * Order candidates by how well their media type satisfies the preferences.
 * Incompatible candidates are dropped; equal scores keep declaration order.
 */
export function rankCandidates<T extends { readonly mediaType: MediaType }>(
  candidates: readonly T[],
  preferences: readonly MediaRange[],
): RankedCandidate<T>[] {
  const ranked: RankedCandidate<T>[] = [];
  for (const candidate of candidates) {
    const score = scoreMediaType(candidate.mediaType, preferences);
    if (score !== undefined) {
      ranked.push({ candidate, score });
    }
  }
  // Array.prototype.sort is stable
  return ranked.sort((a, b) => compareScores(a.score, b.score));
}

/**
 * The best candidate for the preferences
 *
 * @throws UnsupportedMediaTypeError when no candidate is acceptable
 */
export function negotiate<T extends { readonly mediaType: MediaType }>(
  candidates: readonly T[],
  preferences: readonly MediaRange[],
): RankedCandidate<T> {
  const [best] = rankCandidates(candidates, preferences);
  if (best === undefined) {
    throw new UnsupportedMediaTypeError(
      candidates.map((candidate) => essence(candidate.mediaType)),
      preferences.map(formatMediaRange),
    );
  }
  return best;
}
