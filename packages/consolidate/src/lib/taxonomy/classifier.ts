import { cleanString, normalizeTerm, sortedUnique } from "../normalize";
import type { CategoryResult, TaxonomyDomain } from "../types";
import { indexTable, type IndexedTable, type TaxonomyTable } from "./table";

export type ClassifierStage = "exact" | "containment" | "decomposition";

export type FreeTextMode = "research-areas" | "self-identification" | "none";

export type DomainConfig = {
  domain: TaxonomyDomain;
  stages: readonly ClassifierStage[];
  freeText: FreeTextMode;
  // shortest alias (and term) allowed to match by containment
  minContainmentLength: number;
};

export const MIN_CONTAINMENT_LENGTH = 4;
export const DECOMPOSITION_THRESHOLD = 0.5;

const SELF_IDENTIFICATION_PREFIXES = [
  "i am a ",
  "i am an ",
  "i'm a ",
  "i'm an ",
  "as a ",
  "as an ",
  "pronouns: ",
  "pronouns are ",
];

type Resolution = {
  primary: string | null;
  secondary: string[];
  matched: string[];
};

export const emptyCategoryResult = (): CategoryResult => ({
  primaryCategories: [],
  secondaryCategories: [],
  parentCategories: [],
  keywords: [],
  originalTerms: [],
  researchAreas: [],
});

const isWordChar = (char: string | undefined) => char !== undefined && /[a-z0-9]/.test(char);

export const containsAtBoundary = (haystack: string, needle: string) => {
  if (!needle || needle.length > haystack.length) {
    return false;
  }
  let from = 0;
  while (from <= haystack.length - needle.length) {
    const index = haystack.indexOf(needle, from);
    if (index === -1) {
      return false;
    }
    const before = index > 0 ? haystack[index - 1] : undefined;
    const after = haystack[index + needle.length];
    if (!isWordChar(before) && !isWordChar(after)) {
      return true;
    }
    from = index + 1;
  }
  return false;
};

const tokenize = (term: string) =>
  term
    .split(/[\s/,;|]+/)
    .map((token) => token.replace(/^[^a-z0-9]+|[^a-z0-9+#]+$/g, ""))
    .filter((token) => token.length > 1);

export class TaxonomyClassifier {
  readonly domain: TaxonomyDomain;
  readonly version: string;
  private readonly index: IndexedTable;
  private readonly config: DomainConfig;

  constructor(table: TaxonomyTable, config: DomainConfig) {
    if (table.domain !== config.domain) {
      throw new Error(`Classifier for "${config.domain}" was given the "${table.domain}" table`);
    }
    this.domain = config.domain;
    this.version = table.version;
    this.index = indexTable(table);
    this.config = config;
  }

  hasCategory(code: string) {
    return this.index.parents.has(code);
  }

  displayName(code: string) {
    return this.index.table.categories.find((category) => category.code === code)?.displayName ?? null;
  }

  classify(rawTerms: readonly string[], freeText?: string | null): CategoryResult {
    const terms: string[] = [];
    for (const raw of rawTerms) {
      const cleaned = cleanString(raw);
      if (cleaned) {
        terms.push(cleaned);
      }
    }

    const text = freeText ? normalizeTerm(freeText) : "";
    if (text && this.config.freeText === "self-identification") {
      terms.push(...this.scanSelfIdentification(text));
    }

    const result = emptyCategoryResult();
    result.originalTerms = sortedUnique(terms);
    if (text && this.config.freeText === "research-areas") {
      result.researchAreas = this.scanResearchAreas(text);
    }
    if (!terms.length) {
      return result;
    }

    const primary = new Set<string>();
    const secondary = new Set<string>();
    const keywords = new Set<string>();

    for (const term of sortedUnique(terms.map(normalizeTerm).filter(Boolean))) {
      const resolution = this.resolve(term);
      if (!resolution) {
        for (const token of tokenize(term)) {
          keywords.add(token);
        }
        continue;
      }
      if (resolution.primary) {
        primary.add(resolution.primary);
      }
      for (const code of resolution.secondary) {
        secondary.add(code);
      }
      for (const alias of resolution.matched) {
        keywords.add(alias);
      }
    }

    const parents = new Set<string>();
    for (const code of [...primary, ...secondary]) {
      const parent = this.index.parents.get(code);
      if (parent) {
        parents.add(parent);
      }
    }

    result.primaryCategories = this.byTableOrder(primary);
    result.secondaryCategories = this.byTableOrder(
      Array.from(secondary).filter((code) => !primary.has(code)),
    );
    result.parentCategories = this.byTableOrder(parents);
    result.keywords = sortedUnique(keywords);
    return result;
  }

  private resolve(term: string): Resolution | null {
    for (const stage of this.config.stages) {
      const resolution =
        stage === "exact"
          ? this.matchExact(term)
          : stage === "containment"
            ? this.matchContainment(term)
            : this.matchDecomposition(term);
      if (resolution) {
        return resolution;
      }
    }
    return null;
  }

  private matchExact(term: string): Resolution | null {
    const codes = this.index.aliases.get(term);
    if (!codes?.length) {
      return null;
    }
    return { primary: codes[0], secondary: codes.slice(1), matched: [term] };
  }

  private matchContainment(term: string): Resolution | null {
    const codes: string[] = [];
    const matched: string[] = [];
    const minLength = this.config.minContainmentLength;
    for (const { alias, codes: aliasCodes } of this.index.rankedAliases) {
      if (alias.length < minLength) {
        break;
      }
      const aliasInTerm = containsAtBoundary(term, alias);
      const termInAlias = term.length >= minLength && containsAtBoundary(alias, term);
      if (!aliasInTerm && !termInAlias) {
        continue;
      }
      matched.push(alias);
      for (const code of aliasCodes) {
        if (!codes.includes(code)) {
          codes.push(code);
        }
      }
    }
    if (!codes.length) {
      return null;
    }
    return { primary: codes[0], secondary: codes.slice(1), matched };
  }

  private matchDecomposition(term: string): Resolution | null {
    const words = term.split(" ").filter(Boolean);
    if (words.length < 2) {
      return null;
    }
    const counts = new Map<string, number>();
    const matched: string[] = [];
    for (const word of new Set(words)) {
      const codes = this.index.aliases.get(word);
      if (!codes) {
        continue;
      }
      matched.push(word);
      for (const code of codes) {
        counts.set(code, (counts.get(code) ?? 0) + 1);
      }
    }
    const accepted = Array.from(counts.entries())
      .filter(([, count]) => count / words.length >= DECOMPOSITION_THRESHOLD)
      .map(([code]) => code);
    if (!accepted.length) {
      return null;
    }
    return { primary: null, secondary: accepted, matched };
  }

  private scanResearchAreas(text: string) {
    const found = new Set<string>();
    for (const { alias, codes } of this.index.rankedAliases) {
      if (alias.length < MIN_CONTAINMENT_LENGTH) {
        break;
      }
      if (containsAtBoundary(text, alias)) {
        for (const code of codes) {
          found.add(code);
        }
      }
    }
    return this.byTableOrder(found);
  }

  private scanSelfIdentification(text: string) {
    const statements: string[] = [];
    for (const { alias } of this.index.rankedAliases) {
      const stated =
        text.includes(`(${alias})`) ||
        SELF_IDENTIFICATION_PREFIXES.some((prefix) => containsAtBoundary(text, `${prefix}${alias}`));
      if (stated) {
        statements.push(alias);
      }
    }
    return statements;
  }

  private byTableOrder(codes: Iterable<string>) {
    return Array.from(new Set(codes)).sort(
      (a, b) => (this.index.order.get(a) ?? 0) - (this.index.order.get(b) ?? 0),
    );
  }
}
