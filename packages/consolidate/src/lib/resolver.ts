import { parseLocation } from "./location";
import { lastNameKey } from "./normalize";
import { AMBIGUOUS_THRESHOLD, MATCH_THRESHOLD, scoreMatch, type MatchSubject } from "./similarity";
import type {
  CanonicalProfile,
  MatchCandidate,
  MatchDecision,
  SourceName,
  SourceRecord,
} from "./types";

const UNKNOWN_COUNTRY = "unknown";

export const blockingKey = (name: string, countryCode: string | null | undefined) =>
  `${lastNameKey(name)}|${countryCode?.toLowerCase() ?? UNKNOWN_COUNTRY}`;

const subjectLinks = (website: string | null, socialLinks: readonly string[]) =>
  website ? [website, ...socialLinks] : [...socialLinks];

const profileSubject = (profile: CanonicalProfile): MatchSubject => ({
  name: profile.identity.fullName,
  location: profile.location,
  links: subjectLinks(profile.contact.website, profile.contact.socialLinks),
});

export const recordSubject = (record: SourceRecord): MatchSubject => ({
  name: record.name,
  location: parseLocation(record.location),
  links: subjectLinks(record.website, record.socialLinks),
});

/**
 * Accepted profiles bucketed by `surname|country`. A profile is re-keyed when a
 * merge changes its name or location.
 */
export class ProfileIndex {
  private readonly profiles = new Map<string, CanonicalProfile>();
  private readonly buckets = new Map<string, Set<string>>();
  private readonly keysBySurname = new Map<string, Set<string>>();
  private readonly keyByProfile = new Map<string, string>();
  // `${source}:${sourceId}` -> profileId
  private readonly bySourceId = new Map<string, string>();
  private readonly pairsByProfile = new Map<string, string[]>();

  constructor(profiles: Iterable<CanonicalProfile> = []) {
    for (const profile of profiles) {
      this.upsert(profile);
    }
  }

  get size() {
    return this.profiles.size;
  }

  get(profileId: string) {
    return this.profiles.get(profileId) ?? null;
  }

  findBySourceId(source: SourceName, sourceId: string) {
    const profileId = this.bySourceId.get(`${source}:${sourceId}`);
    return profileId ? this.get(profileId) : null;
  }

  upsert(profile: CanonicalProfile) {
    for (const pair of this.pairsByProfile.get(profile.profileId) ?? []) {
      if (this.bySourceId.get(pair) === profile.profileId) {
        this.bySourceId.delete(pair);
      }
    }
    const pairs = Object.entries(profile.sourceIds).map(([source, id]) => `${source}:${id}`);
    for (const pair of pairs) {
      this.bySourceId.set(pair, profile.profileId);
    }
    this.pairsByProfile.set(profile.profileId, pairs);

    const key = blockingKey(profile.identity.fullName, profile.location?.countryCode);
    const previous = this.keyByProfile.get(profile.profileId);
    if (previous && previous !== key) {
      this.removeFromBucket(previous, profile.profileId);
    }
    this.profiles.set(profile.profileId, profile);
    this.keyByProfile.set(profile.profileId, key);

    const bucket = this.buckets.get(key) ?? new Set<string>();
    bucket.add(profile.profileId);
    this.buckets.set(key, bucket);

    const surname = key.slice(0, key.lastIndexOf("|"));
    const keys = this.keysBySurname.get(surname) ?? new Set<string>();
    keys.add(key);
    this.keysBySurname.set(surname, keys);
  }

  candidates(subject: MatchSubject) {
    const surname = lastNameKey(subject.name);
    const countryCode = subject.location?.countryCode ?? null;
    const keys = countryCode
      ? [blockingKey(subject.name, countryCode), `${surname}|${UNKNOWN_COUNTRY}`]
      : Array.from(this.keysBySurname.get(surname) ?? []);

    const ids = new Set<string>();
    for (const key of keys) {
      for (const id of this.buckets.get(key) ?? []) {
        ids.add(id);
      }
    }
    return Array.from(ids)
      .sort()
      .map((id) => this.profiles.get(id))
      .filter((profile): profile is CanonicalProfile => profile !== undefined);
  }

  values() {
    return Array.from(this.profiles.values()).sort((a, b) =>
      a.profileId < b.profileId ? -1 : a.profileId > b.profileId ? 1 : 0,
    );
  }

  blockingStats() {
    const sizes = Array.from(this.buckets.values()).map((bucket) => bucket.size);
    return {
      buckets: sizes.length,
      largestBucket: sizes.length ? Math.max(...sizes) : 0,
    };
  }

  private removeFromBucket(key: string, profileId: string) {
    const bucket = this.buckets.get(key);
    if (!bucket) {
      return;
    }
    bucket.delete(profileId);
    if (bucket.size) {
      return;
    }
    this.buckets.delete(key);
    const surname = key.slice(0, key.lastIndexOf("|"));
    const keys = this.keysBySurname.get(surname);
    keys?.delete(key);
    if (keys && !keys.size) {
      this.keysBySurname.delete(surname);
    }
  }
}

const compareCandidates = (a: MatchCandidate, b: MatchCandidate) =>
  b.score - a.score
  || b.profileScore - a.profileScore
  || (a.profileId < b.profileId ? -1 : a.profileId > b.profileId ? 1 : 0);

export const findMatch = (record: SourceRecord, index: ProfileIndex): MatchDecision => {
  const subject = recordSubject(record);

  // Reprocessing: a record already linked to a profile resolves to it directly.
  const linked = index.findBySourceId(record.source, record.sourceId);
  if (linked) {
    const { score, signals } = scoreMatch(subject, profileSubject(linked));
    return {
      kind: "match",
      candidate: {
        profileId: linked.profileId,
        score,
        matchedOn: signals,
        profileScore: linked.metadata.profileScore,
      },
    };
  }

  const scored: MatchCandidate[] = index.candidates(subject).map((profile) => {
    const { score, signals } = scoreMatch(subject, profileSubject(profile));
    return {
      profileId: profile.profileId,
      score,
      matchedOn: signals,
      profileScore: profile.metadata.profileScore,
    };
  });

  const [best] = scored.sort(compareCandidates);
  if (!best) {
    return { kind: "new" };
  }
  if (best.score >= MATCH_THRESHOLD) {
    return { kind: "match", candidate: best };
  }
  if (best.score >= AMBIGUOUS_THRESHOLD) {
    return { kind: "ambiguous", candidate: best };
  }
  return { kind: "new" };
};
