import { DocumentRejectedError } from "../errors";
import { cleanString, htmlToText, normalizeName, parsePersonName } from "../normalize";
import type { QualityTier, RawDocument, SourceName, SourceRecord } from "../types";
import { isSocialLink, normalizeSocialLink, normalizeUrl } from "../url";

const LIST_ITEM_KEYS = ["title", "name", "topic", "text", "value", "label", "language", "url"];

export const isRecord = (value: unknown): value is RawDocument =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export const readValue = (doc: RawDocument, path: string): unknown => {
  let current: unknown = doc;
  for (const key of path.split(".")) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[key];
  }
  return current;
};

const toText = (value: unknown) => {
  if (typeof value === "string") {
    return cleanString(value);
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  return null;
};

export const readString = (doc: RawDocument, ...paths: string[]) => {
  for (const path of paths) {
    const text = toText(readValue(doc, path));
    if (text) {
      return text;
    }
  }
  return null;
};

export const readText = (doc: RawDocument, ...paths: string[]) => {
  for (const path of paths) {
    const value = readValue(doc, path);
    const text = typeof value === "string" ? htmlToText(value) : null;
    if (text) {
      return text;
    }
  }
  return null;
};

const listItemText = (item: unknown) => {
  if (isRecord(item)) {
    for (const key of LIST_ITEM_KEYS) {
      const text = toText(item[key]);
      if (text) {
        return text;
      }
    }
    return null;
  }
  return toText(item);
};

export const toStringList = (value: unknown): string[] => {
  if (typeof value === "string") {
    return value
      .split(/[,;\n|]+/)
      .map((part) => cleanString(part))
      .filter((part): part is string => part !== null);
  }
  if (Array.isArray(value)) {
    return value
      .map((item) => listItemText(item))
      .filter((item): item is string => item !== null);
  }
  return [];
};

export const readStringList = (doc: RawDocument, ...paths: string[]) =>
  paths.flatMap((path) => toStringList(readValue(doc, path)));

export const readNumber = (doc: RawDocument, ...paths: string[]) => {
  for (const path of paths) {
    const value = readValue(doc, path);
    if (typeof value === "number" && Number.isFinite(value)) {
      return value;
    }
    if (typeof value === "string") {
      const match = value.replace(/,/g, "").match(/\d+(?:\.\d+)?/);
      if (match) {
        return Number(match[0]);
      }
    }
  }
  return null;
};

export const readRecord = (doc: RawDocument, path: string) => {
  const value = readValue(doc, path);
  return isRecord(value) ? value : null;
};

export const readRecords = (doc: RawDocument, path: string) => {
  const value = readValue(doc, path);
  return Array.isArray(value) ? value.filter(isRecord) : [];
};

export const readId = (doc: RawDocument, ...paths: string[]) => {
  for (const path of paths) {
    const value = readValue(doc, path);
    if (typeof value === "string" && value.trim()) {
      return value.trim();
    }
    if (typeof value === "number" && Number.isFinite(value)) {
      return String(value);
    }
    if (isRecord(value)) {
      const toHexString = value.toHexString;
      if (typeof toHexString === "function") {
        return String(toHexString.call(value));
      }
    }
  }
  return null;
};

export type AdapterContext = {
  referenceYear: number;
};

const EARLIEST_SPEAKING_YEAR = 1900;

// "Speaking since 2005", "2005-03-01" or 2005, measured against the reference year.
export const readYearsSince = (doc: RawDocument, context: AdapterContext, ...paths: string[]) => {
  for (const path of paths) {
    const value = readValue(doc, path);
    const text = typeof value === "number" ? String(value) : typeof value === "string" ? value : "";
    const match = text.match(/\b(1[89]\d{2}|2\d{3})\b/);
    if (!match) {
      continue;
    }
    const year = Number(match[1]);
    if (year >= EARLIEST_SPEAKING_YEAR && year <= context.referenceYear) {
      return context.referenceYear - year;
    }
  }
  return null;
};

// Link-valued fields of a nested social_media object, whatever its key names.
export const readLinkValues = (doc: RawDocument, path: string) => {
  const value = readValue(doc, path);
  if (isRecord(value)) {
    return Object.values(value).flatMap((entry) => toStringList(entry));
  }
  return toStringList(value);
};

export type SourceRecordInput = {
  sourceId: string | null;
  name: string | null;
  url?: string | null;
  firstName?: string | null;
  lastName?: string | null;
  title?: string | null;
  company?: string | null;
  tagline?: string | null;
  location?: string | null;
  biography?: string | null;
  shortBio?: string | null;
  expertise?: string[];
  industries?: string[];
  credentials?: string[];
  languages?: string[];
  formats?: string[];
  demographics?: string[];
  fee?: string | null;
  yearsSpeaking?: number | null;
  talkCount?: number | null;
  averageRating?: number | null;
  ratingCount?: number | null;
  images?: string[];
  videos?: string[];
  books?: string[];
  email?: string | null;
  phone?: string | null;
  website?: string | null;
  links?: string[];
};

const uniqueStrings = (values: string[] | undefined) => {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const value of values ?? []) {
    const cleaned = cleanString(value);
    if (cleaned && !seen.has(cleaned)) {
      seen.add(cleaned);
      result.push(cleaned);
    }
  }
  return result;
};

const uniqueUrls = (values: string[] | undefined) =>
  uniqueStrings(
    (values ?? [])
      .map((value) => normalizeUrl(value))
      .filter((value): value is string => value !== null),
  );

const nonNegative = (value: number | null | undefined) =>
  typeof value === "number" && Number.isFinite(value) && value >= 0 ? value : null;

const cleanEmail = (value: string | null | undefined) => {
  const cleaned = cleanString(value);
  if (!cleaned || !/^[^\s@]+@[^\s@]+\.[^\s@]+$/.test(cleaned)) {
    return null;
  }
  return cleaned.toLowerCase();
};

export const buildSourceRecord = (
  source: SourceName,
  tier: QualityTier,
  input: SourceRecordInput,
): SourceRecord => {
  const parsed = parsePersonName(input.name ?? "");
  if (!parsed) {
    throw new DocumentRejectedError(source, "no usable name", input.sourceId);
  }

  const socialLinks: string[] = [];
  let website = input.website ? normalizeUrl(input.website) : null;
  for (const link of input.links ?? []) {
    if (isSocialLink(link)) {
      const normalized = normalizeSocialLink(link);
      if (normalized) {
        socialLinks.push(normalized);
      }
    } else if (!website) {
      website = normalizeUrl(link);
    }
  }

  return {
    source,
    sourceId: input.sourceId ?? normalizeName(parsed.name),
    tier,
    url: input.url ? normalizeUrl(input.url) : null,
    name: parsed.name,
    displayName: parsed.displayName,
    firstName: cleanString(input.firstName) ?? parsed.firstName,
    lastName: cleanString(input.lastName) ?? parsed.lastName,
    title: cleanString(input.title),
    company: cleanString(input.company),
    tagline: cleanString(input.tagline),
    location: cleanString(input.location),
    biography: htmlToText(input.biography),
    shortBio: htmlToText(input.shortBio),
    rawExpertiseTerms: uniqueStrings(input.expertise),
    rawIndustryTerms: uniqueStrings(input.industries),
    rawCredentialTerms: uniqueStrings([...parsed.postNominals, ...(input.credentials ?? [])]),
    rawLanguageTerms: uniqueStrings(input.languages),
    rawFormatTerms: uniqueStrings(input.formats),
    rawDemographicTerms: uniqueStrings([
      ...(input.demographics ?? []),
      ...(parsed.pronouns ? [parsed.pronouns] : []),
    ]),
    feeText: cleanString(input.fee),
    yearsSpeaking: nonNegative(input.yearsSpeaking),
    talkCount: nonNegative(input.talkCount),
    averageRating: nonNegative(input.averageRating),
    ratingCount: nonNegative(input.ratingCount),
    images: uniqueUrls(input.images),
    videos: uniqueUrls(input.videos),
    books: uniqueStrings(input.books),
    email: cleanEmail(input.email),
    phone: cleanString(input.phone),
    website,
    socialLinks: uniqueStrings(socialLinks),
  };
};
