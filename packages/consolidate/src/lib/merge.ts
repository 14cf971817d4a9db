import { createHash } from "crypto";
import { isMoreTrusted } from "../config/sources";
import { parseFee } from "./fee";
import { parseLocation } from "./location";
import { mergeUnique, normalizeName } from "./normalize";
import { isPopulated, scoreProfile } from "./scoring";
import { emptyCategoryResult } from "./taxonomy/classifier";
import type { TaxonomyRegistry } from "./taxonomy/domains";
import {
  SOURCE_NAMES,
  type CanonicalProfile,
  type CategoryResult,
  type ClassifiedRecord,
  type ScalarSlot,
  type SourceName,
  type SourceRecord,
  type TaxonomyDomain,
} from "./types";

export type MergeOptions = {
  registry: TaxonomyRegistry;
  // match strength reported by the resolver; ignored for new profiles
  confidence?: number;
};

const SCALAR_SLOTS: readonly ScalarSlot[] = [
  "identity.displayName",
  "identity.firstName",
  "identity.lastName",
  "identity.title",
  "identity.company",
  "identity.tagline",
  "biography.short",
  "biography.full",
  "location",
  "speaking.fee",
  "speaking.yearsSpeaking",
  "speaking.talkCount",
  "speaking.averageRating",
  "speaking.ratingCount",
  "contact.email",
  "contact.phone",
  "contact.website",
];

export const buildProfileId = (record: Pick<SourceRecord, "name" | "source" | "sourceId">) =>
  createHash("md5")
    .update(`${normalizeName(record.name)}:${record.source}:${record.sourceId}`)
    .digest("hex");

const createEmptyProfile = (record: SourceRecord, taxonomyVersion: string): CanonicalProfile => ({
  profileId: buildProfileId(record),
  sourceIds: {},
  identity: {
    fullName: "",
    displayName: "",
    firstName: null,
    lastName: null,
    title: null,
    company: null,
    tagline: null,
  },
  biography: { short: null, full: null },
  location: null,
  expertise: emptyCategoryResult(),
  industries: emptyCategoryResult(),
  credentials: emptyCategoryResult(),
  languages: emptyCategoryResult(),
  demographics: emptyCategoryResult(),
  speaking: {
    formats: emptyCategoryResult(),
    fee: null,
    yearsSpeaking: null,
    talkCount: null,
    averageRating: null,
    ratingCount: null,
  },
  media: { images: [], videos: [], books: [] },
  contact: {
    email: null,
    phone: null,
    website: null,
    bookingUrls: [],
    socialLinks: [],
  },
  metadata: {
    sources: [],
    primarySource: record.source,
    dataQualityTier: record.tier,
    profileScore: 0,
    experienceScore: 0,
    completenessScore: 0,
    mergeConfidence: 1,
    taxonomyVersion,
    fieldTiers: {},
  },
});

const sortSourceIds = (ids: Partial<Record<SourceName, string>>) => {
  const sorted: Partial<Record<SourceName, string>> = {};
  for (const name of [...SOURCE_NAMES].sort()) {
    const id = ids[name];
    if (id) {
      sorted[name] = id;
    }
  }
  return sorted;
};

const sortFieldTiers = (tiers: CanonicalProfile["metadata"]["fieldTiers"]) => {
  const sorted: CanonicalProfile["metadata"]["fieldTiers"] = {};
  for (const slot of SCALAR_SLOTS) {
    const tier = tiers[slot];
    if (tier) {
      sorted[slot] = tier;
    }
  }
  return sorted;
};

/**
 * Applies one classified record to a profile (or starts a new one).
 *
 * Scalar slots fill when empty and are only overwritten by a strictly more
 * trusted tier than the one that last set them. Lists union. Taxonomy groups
 * are re-derived from the union of every original term seen for the profile,
 * so applying the same record twice is a no-op.
 */
export const mergeProfile = (
  existing: CanonicalProfile | null,
  classified: ClassifiedRecord,
  options: MergeOptions,
): CanonicalProfile => {
  const { record, categories } = classified;
  const { registry } = options;
  const base = existing ?? createEmptyProfile(record, registry.version);
  const next = structuredClone(base);
  const fieldTiers = { ...base.metadata.fieldTiers };

  const claim = (slot: ScalarSlot, current: unknown, incoming: unknown) => {
    if (!isPopulated(incoming)) {
      return false;
    }
    const recorded = fieldTiers[slot];
    if (!isPopulated(current) || !recorded || isMoreTrusted(record.tier, recorded)) {
      fieldTiers[slot] = record.tier;
      return true;
    }
    return false;
  };

  const { identity, biography, speaking, contact } = next;
  if (claim("identity.displayName", identity.displayName, record.displayName)) {
    identity.fullName = record.name;
    identity.displayName = record.displayName;
  }
  if (claim("identity.firstName", identity.firstName, record.firstName)) {
    identity.firstName = record.firstName;
  }
  if (claim("identity.lastName", identity.lastName, record.lastName)) {
    identity.lastName = record.lastName;
  }
  if (claim("identity.title", identity.title, record.title)) {
    identity.title = record.title;
  }
  if (claim("identity.company", identity.company, record.company)) {
    identity.company = record.company;
  }
  if (claim("identity.tagline", identity.tagline, record.tagline)) {
    identity.tagline = record.tagline;
  }
  if (claim("biography.short", biography.short, record.shortBio)) {
    biography.short = record.shortBio;
  }
  if (claim("biography.full", biography.full, record.biography)) {
    biography.full = record.biography;
  }

  const location = parseLocation(record.location);
  if (claim("location", next.location, location)) {
    next.location = location;
  }
  const fee = parseFee(record.feeText);
  if (claim("speaking.fee", speaking.fee, fee)) {
    speaking.fee = fee;
  }
  if (claim("speaking.yearsSpeaking", speaking.yearsSpeaking, record.yearsSpeaking)) {
    speaking.yearsSpeaking = record.yearsSpeaking;
  }
  if (claim("speaking.talkCount", speaking.talkCount, record.talkCount)) {
    speaking.talkCount = record.talkCount;
  }
  if (claim("speaking.averageRating", speaking.averageRating, record.averageRating)) {
    speaking.averageRating = record.averageRating;
  }
  if (claim("speaking.ratingCount", speaking.ratingCount, record.ratingCount)) {
    speaking.ratingCount = record.ratingCount;
  }
  if (claim("contact.email", contact.email, record.email)) {
    contact.email = record.email;
  }
  if (claim("contact.phone", contact.phone, record.phone)) {
    contact.phone = record.phone;
  }
  if (claim("contact.website", contact.website, record.website)) {
    contact.website = record.website;
  }

  next.media = {
    images: mergeUnique(base.media.images, record.images),
    videos: mergeUnique(base.media.videos, record.videos),
    books: mergeUnique(base.media.books, record.books),
  };
  contact.bookingUrls = mergeUnique(base.contact.bookingUrls, record.url ? [record.url] : []);
  contact.socialLinks = mergeUnique(base.contact.socialLinks, record.socialLinks);

  const freeText = biography.full ?? biography.short;
  const reclassify = (domain: TaxonomyDomain, current: CategoryResult, text?: string | null) =>
    registry.classifiers[domain].classify(
      mergeUnique(current.originalTerms, categories[domain].originalTerms),
      text,
    );
  next.expertise = reclassify("expertise", base.expertise, freeText);
  next.industries = reclassify("industry", base.industries);
  next.credentials = reclassify("credential", base.credentials);
  next.languages = reclassify("language", base.languages);
  next.demographics = reclassify("demographics", base.demographics, freeText);
  speaking.formats = reclassify("speaking_format", base.speaking.formats);

  const joinsNewPair = base.sourceIds[record.source] !== record.sourceId;
  const sourceIds = { ...base.sourceIds };
  sourceIds[record.source] = record.sourceId;
  next.sourceIds = sortSourceIds(sourceIds);

  const sources = new Set<SourceName>([...base.metadata.sources, record.source]);
  next.metadata = {
    ...base.metadata,
    sources: SOURCE_NAMES.filter((name) => sources.has(name)),
    dataQualityTier: isMoreTrusted(record.tier, base.metadata.dataQualityTier)
      ? record.tier
      : base.metadata.dataQualityTier,
    mergeConfidence: existing && joinsNewPair
      ? options.confidence ?? base.metadata.mergeConfidence
      : base.metadata.mergeConfidence,
    taxonomyVersion: registry.version,
    fieldTiers: sortFieldTiers(fieldTiers),
  };

  return { ...next, metadata: { ...next.metadata, ...scoreProfile(next) } };
};
