import { distance as levenshteinDistance } from "fastest-levenshtein";
import { locationSignature } from "./location";
import { normalizeName } from "./normalize";
import type { MatchSignals, ProfileLocation } from "./types";

export const MATCH_WEIGHTS = {
  name: 0.6,
  location: 0.2,
  socialLink: 0.2,
} as const;

export const MATCH_THRESHOLD = 0.85;
export const AMBIGUOUS_THRESHOLD = 0.7;

export type MatchSubject = {
  name: string;
  location: ProfileLocation | null;
  // Normalized website and social profile URLs.
  links: readonly string[];
};

export const nameSimilarity = (a: string, b: string) => {
  const left = normalizeName(a);
  const right = normalizeName(b);
  if (!left || !right) {
    return 0;
  }
  if (left === right) {
    return 1;
  }
  const maxLength = Math.max(left.length, right.length);
  return 1 - levenshteinDistance(left, right) / maxLength;
};

const linksOverlap = (a: readonly string[], b: readonly string[]) => {
  if (!a.length || !b.length) {
    return null;
  }
  const known = new Set(a);
  return b.some((link) => known.has(link));
};

const locationAgreement = (a: ProfileLocation | null, b: ProfileLocation | null) => {
  const left = locationSignature(a);
  const right = locationSignature(b);
  if (!left || !right) {
    return null;
  }
  return left === right ? 1 : 0;
};

/**
 * Weighted match score between an incoming record and an accepted profile.
 *
 * Location and link signals only count as supporting evidence: they enter the
 * weighted average when both sides carry them and agree. Candidates already
 * share surname and country through blocking, so a city or link mismatch is
 * not treated as evidence against. A shared website or social link forces a match.
 */
export const scoreMatch = (incoming: MatchSubject, existing: MatchSubject) => {
  const signals: MatchSignals = {
    name: nameSimilarity(incoming.name, existing.name),
    location: locationAgreement(incoming.location, existing.location),
    socialLink: linksOverlap(incoming.links, existing.links),
  };

  if (signals.socialLink) {
    return { score: 1, signals };
  }

  let weighted = MATCH_WEIGHTS.name * signals.name;
  let totalWeight: number = MATCH_WEIGHTS.name;
  if (signals.location === 1) {
    weighted += MATCH_WEIGHTS.location;
    totalWeight += MATCH_WEIGHTS.location;
  }

  return { score: weighted / totalWeight, signals };
};
