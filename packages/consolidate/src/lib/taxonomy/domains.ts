import type { ClassifiedRecord, SourceRecord, TaxonomyDomain } from "../types";
import { MIN_CONTAINMENT_LENGTH, TaxonomyClassifier, type DomainConfig } from "./classifier";
import { loadTaxonomyTable, type TaxonomyTable } from "./table";

const FULL_PIPELINE = ["exact", "containment", "decomposition"] as const;

export const DOMAIN_CONFIGS: Record<TaxonomyDomain, DomainConfig> = {
  expertise: {
    domain: "expertise",
    stages: FULL_PIPELINE,
    freeText: "research-areas",
    minContainmentLength: MIN_CONTAINMENT_LENGTH,
  },
  industry: {
    domain: "industry",
    stages: FULL_PIPELINE,
    freeText: "none",
    minContainmentLength: MIN_CONTAINMENT_LENGTH,
  },
  language: {
    domain: "language",
    stages: FULL_PIPELINE,
    freeText: "none",
    minContainmentLength: MIN_CONTAINMENT_LENGTH,
  },
  // Degree abbreviations are short but unambiguous tokens ("PhD in Physics").
  credential: {
    domain: "credential",
    stages: FULL_PIPELINE,
    freeText: "none",
    minContainmentLength: 2,
  },
  speaking_format: {
    domain: "speaking_format",
    stages: FULL_PIPELINE,
    freeText: "none",
    minContainmentLength: MIN_CONTAINMENT_LENGTH,
  },
  // Sensitive attributes: no word-level inference, free text only via explicit self-description.
  demographics: {
    domain: "demographics",
    stages: ["exact", "containment"],
    freeText: "self-identification",
    minContainmentLength: MIN_CONTAINMENT_LENGTH,
  },
};

export const TAXONOMY_DOMAINS: readonly TaxonomyDomain[] = [
  "expertise",
  "industry",
  "language",
  "credential",
  "speaking_format",
  "demographics",
];

export type TaxonomyRegistry = {
  version: string;
  classifiers: Record<TaxonomyDomain, TaxonomyClassifier>;
};

export const createTaxonomyRegistry = (options: {
  version: string;
  directory?: string;
  tables?: Partial<Record<TaxonomyDomain, TaxonomyTable>>;
}): TaxonomyRegistry => {
  const build = (domain: TaxonomyDomain) => {
    const table = options.tables?.[domain]
      ?? loadTaxonomyTable(domain, { directory: options.directory, version: options.version });
    if (table.version !== options.version) {
      throw new Error(
        `Taxonomy "${domain}" is version ${table.version}, configured version is ${options.version}`,
      );
    }
    return new TaxonomyClassifier(table, DOMAIN_CONFIGS[domain]);
  };

  return {
    version: options.version,
    classifiers: {
      expertise: build("expertise"),
      industry: build("industry"),
      language: build("language"),
      credential: build("credential"),
      speaking_format: build("speaking_format"),
      demographics: build("demographics"),
    },
  };
};

export const classifyRecord = (registry: TaxonomyRegistry, record: SourceRecord): ClassifiedRecord => {
  const { classifiers } = registry;
  return {
    record,
    categories: {
      expertise: classifiers.expertise.classify(record.rawExpertiseTerms, record.biography),
      industry: classifiers.industry.classify(record.rawIndustryTerms),
      language: classifiers.language.classify(record.rawLanguageTerms),
      credential: classifiers.credential.classify(record.rawCredentialTerms),
      speaking_format: classifiers.speaking_format.classify(record.rawFormatTerms),
      demographics: classifiers.demographics.classify(record.rawDemographicTerms, record.biography),
    },
  };
};
