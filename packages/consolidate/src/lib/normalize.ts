import * as cheerio from "cheerio";

const MISSING_VALUES = new Set(["", "n/a", "na", "none", "null", "undefined", "unknown", "-", "tbd"]);

const HONORIFICS = new Set([
  "dr",
  "dr.",
  "mr",
  "mr.",
  "mrs",
  "mrs.",
  "ms",
  "ms.",
  "miss",
  "mx",
  "mx.",
  "prof",
  "prof.",
  "professor",
  "sir",
  "dame",
  "rev",
  "rev.",
  "hon",
  "hon.",
]);

const GENERATIONAL_SUFFIXES = new Set(["jr", "jr.", "sr", "sr.", "ii", "iii", "iv"]);

// Post-nominals recognised without a separating comma ("Jane Smith PhD").
const BARE_POST_NOMINALS = new Set([
  "phd",
  "ph.d.",
  "ph.d",
  "md",
  "m.d.",
  "mba",
  "m.b.a.",
  "jd",
  "j.d.",
  "edd",
  "ed.d.",
  "psyd",
  "cpa",
  "csp",
  "cfa",
  "cfp",
  "pmp",
  "dtm",
  "dds",
]);

// Upper-case or dotted abbreviations after a comma ("FRSA", "M.Sc.").
const ABBREVIATION_PATTERN = /^(?:[A-Z][A-Za-z]{0,2}[A-Z]\.?|(?:[A-Za-z]{1,3}\.){2,4})$/;

const isPostNominal = (part: string) =>
  part.split(/\s+/).every((token) => BARE_POST_NOMINALS.has(token.toLowerCase()) || ABBREVIATION_PATTERN.test(token));

const PRONOUN_PATTERN = /\(\s*((?:she|he|they|ze|xe)\s*\/\s*[a-z]+(?:\s*\/\s*[a-z]+)?)\s*\)/i;

export const normalizeWhitespace = (value: string) =>
  value.replace(/\s+/g, " ").trim();

export const stripDiacritics = (value: string) =>
  value.normalize("NFKD").replace(/[\u0300-\u036f]/g, "");

export const normalizeName = (value: string) =>
  stripDiacritics(normalizeWhitespace(value))
    .toLowerCase()
    .replace(/[^\p{L}\p{M}\p{N}\s&-]/gu, "")
    .replace(/\s+/g, " ")
    .trim();

export const normalizeTerm = (value: string) =>
  stripDiacritics(normalizeWhitespace(value))
    .toLowerCase()
    .replace(/^["'“”‘’•*\-–—\s]+/, "")
    .replace(/["'“”‘’•*,;:\s]+$/, "");

export const isMissingValue = (value: string) => MISSING_VALUES.has(normalizeTerm(value));

export const cleanString = (value: string | null | undefined) => {
  if (typeof value !== "string") {
    return null;
  }
  const normalized = normalizeWhitespace(value);
  return isMissingValue(normalized) ? null : normalized;
};

export const htmlToText = (value: string | null | undefined) => {
  if (typeof value !== "string") {
    return null;
  }
  if (!/<[a-z!/][^>]*>/i.test(value)) {
    return cleanString(value);
  }
  const $ = cheerio.load(value);
  $("br, p, div, li").after(" ");
  return cleanString($.root().text());
};

export const sortedUnique = (values: Iterable<string>) =>
  Array.from(new Set(values)).sort();

export const mergeUnique = (existing: string[], incoming: string[]) => {
  const merged = new Set(existing);
  for (const value of incoming) {
    const cleaned = cleanString(value);
    if (cleaned) {
      merged.add(cleaned);
    }
  }
  return Array.from(merged).sort();
};

export type ParsedName = {
  name: string;
  displayName: string;
  firstName: string | null;
  lastName: string | null;
  honorifics: string[];
  postNominals: string[];
  pronouns: string | null;
};

export const parsePersonName = (raw: string): ParsedName | null => {
  const displayName = cleanString(raw);
  if (!displayName) {
    return null;
  }

  let working = displayName;
  let pronouns: string | null = null;
  const pronounMatch = working.match(PRONOUN_PATTERN);
  if (pronounMatch) {
    pronouns = pronounMatch[1].replace(/\s+/g, "").toLowerCase();
    working = normalizeWhitespace(working.replace(pronounMatch[0], " "));
  }

  let [head = "", ...tail] = working.split(",").map((part) => part.trim());
  // "Smith, Jane" and "Smith, Jane, PhD"
  const leading = tail[0];
  if (
    !head.includes(" ") &&
    leading &&
    !isPostNominal(leading) &&
    !GENERATIONAL_SUFFIXES.has(leading.toLowerCase())
  ) {
    head = `${leading} ${head}`;
    tail = tail.slice(1);
  }
  const postNominals: string[] = [];
  for (const part of tail) {
    if (part && isPostNominal(part)) {
      postNominals.push(part);
    }
  }

  const tokens = head.split(" ").filter(Boolean);
  const honorifics: string[] = [];
  while (tokens.length > 1 && HONORIFICS.has(tokens[0].toLowerCase())) {
    honorifics.push(tokens[0]);
    tokens.shift();
  }
  while (tokens.length > 2) {
    const last = tokens[tokens.length - 1];
    const lowered = last.toLowerCase();
    if (GENERATIONAL_SUFFIXES.has(lowered)) {
      tokens.pop();
      continue;
    }
    if (BARE_POST_NOMINALS.has(lowered)) {
      postNominals.unshift(last);
      tokens.pop();
      continue;
    }
    break;
  }

  const name = tokens.join(" ");
  if (!name || isMissingValue(name)) {
    return null;
  }

  return {
    name,
    displayName,
    firstName: tokens.length > 1 ? tokens[0] : null,
    lastName: tokens.length > 1 ? tokens[tokens.length - 1] : null,
    honorifics,
    postNominals,
    pronouns,
  };
};

export const lastNameKey = (name: string) => {
  const tokens = normalizeName(name).split(" ").filter(Boolean);
  return tokens.length ? tokens[tokens.length - 1] : "";
};
