import { SOURCE_NAMES, type SourceName } from "./types";

export type ConsolidationSettings = {
  batchSize: number;
  classifyConcurrency: number;
  taxonomyVersion: string;
  // Year that "speaking since" dates are measured against.
  referenceYear: number;
};

export const DEFAULT_TAXONOMY_VERSION = "2024.06";

const coercePositiveInt = (value: string | undefined) => {
  if (!value) {
    return null;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return null;
  }
  return Math.floor(parsed);
};

const isSourceName = (value: string): value is SourceName =>
  SOURCE_NAMES.some((name) => name === value);

export const getBatchSize = (): number =>
  coercePositiveInt(process.env.CONSOLIDATE_BATCH_SIZE) ?? 500;

export const getClassifyConcurrency = (): number =>
  coercePositiveInt(process.env.CONSOLIDATE_CLASSIFY_CONCURRENCY) ?? 4;

export const getTaxonomyVersion = (): string =>
  process.env.CONSOLIDATE_TAXONOMY_VERSION?.trim() || DEFAULT_TAXONOMY_VERSION;

export const getReferenceYear = (): number =>
  coercePositiveInt(process.env.CONSOLIDATE_REFERENCE_YEAR) ?? new Date().getUTCFullYear();

export const getTargetDatabase = (): string =>
  process.env.CONSOLIDATE_TARGET_DB ?? "speaker_index";

export const getTargetCollection = (): string =>
  process.env.CONSOLIDATE_TARGET_COLLECTION ?? "speakers";

export const getInputDir = (): string | null =>
  process.env.CONSOLIDATE_INPUT_DIR?.trim() || null;

export const isDryRun = (): boolean => process.env.CONSOLIDATE_DRY_RUN === "1";

// Comma-separated subset of sources; an unknown name throws.
export const getSelectedSources = (): SourceName[] => {
  const raw = process.env.CONSOLIDATE_SOURCES?.trim();
  if (!raw) {
    return [...SOURCE_NAMES];
  }
  const selected: SourceName[] = [];
  for (const part of raw.split(",")) {
    const name = part.trim().toLowerCase();
    if (!name) {
      continue;
    }
    if (!isSourceName(name)) {
      throw new Error(`Unknown source in CONSOLIDATE_SOURCES: ${name}`);
    }
    if (!selected.includes(name)) {
      selected.push(name);
    }
  }
  return selected;
};

export const getConsolidationSettings = (): ConsolidationSettings => ({
  batchSize: getBatchSize(),
  classifyConcurrency: getClassifyConcurrency(),
  taxonomyVersion: getTaxonomyVersion(),
  referenceYear: getReferenceYear(),
});
