import { orderSources, type SourceConfig } from "../config/sources";
import type { ProfileRepository, SourceReader } from "../repo/types";
import { SOURCE_ADAPTERS } from "./adapters";
import { DocumentRejectedError } from "./errors";
import { mergeProfile } from "./merge";
import { findMatch, ProfileIndex } from "./resolver";
import type { ConsolidationSettings } from "./settings";
import { classifyRecord, createTaxonomyRegistry, type TaxonomyRegistry } from "./taxonomy/domains";
import {
  SOURCE_NAMES,
  type ClassifiedRecord,
  type ConsolidationSummary,
  type RawDocument,
  type SourceName,
  type SourceSummary,
} from "./types";

export type ConsolidationOptions = {
  reader: SourceReader;
  repository: ProfileRepository;
  settings: ConsolidationSettings;
  sources?: readonly SourceName[];
  registry?: TaxonomyRegistry;
  // resolve and merge without writing
  dryRun?: boolean;
};

export const mapWithConcurrency = async <TInput, TOutput>(
  inputs: TInput[],
  concurrency: number,
  fn: (input: TInput, index: number) => Promise<TOutput>,
) => {
  const results: TOutput[] = new Array(inputs.length);
  let nextIndex = 0;

  const worker = async () => {
    while (true) {
      const current = nextIndex;
      nextIndex += 1;
      if (current >= inputs.length) {
        return;
      }
      results[current] = await fn(inputs[current], current);
    }
  };

  const workers = Array.from({ length: Math.min(concurrency, inputs.length) }, worker);
  await Promise.all(workers);
  return results;
};

type RunCounters = Pick<ConsolidationSummary, "created" | "merged" | "ambiguous">;

export const runConsolidation = async (options: ConsolidationOptions): Promise<ConsolidationSummary> => {
  const { reader, repository, settings } = options;
  const registry = options.registry ?? createTaxonomyRegistry({ version: settings.taxonomyVersion });
  if (registry.version !== settings.taxonomyVersion) {
    throw new Error(
      `Taxonomy registry is version ${registry.version}, configured version is ${settings.taxonomyVersion}`,
    );
  }

  const existing = await repository.listProfiles();
  const index = new ProfileIndex(existing);
  console.log(`[consolidate] re-opened ${existing.length} profiles`);

  const counters: RunCounters = { created: 0, merged: 0, ambiguous: 0 };

  // Single writer: resolve + merge in input order.
  const apply = (classified: ClassifiedRecord) => {
    const { record } = classified;
    const decision = findMatch(record, index);
    if (decision.kind === "match") {
      const target = index.get(decision.candidate.profileId);
      if (target) {
        index.upsert(
          mergeProfile(target, classified, { registry, confidence: decision.candidate.score }),
        );
        counters.merged += 1;
        return;
      }
    }
    if (decision.kind === "ambiguous") {
      counters.ambiguous += 1;
      console.log(
        `[consolidate][${record.source}] ambiguous match for "${record.name}" ` +
          `(${decision.candidate.score.toFixed(2)} vs ${decision.candidate.profileId}); creating new profile`,
      );
    }
    const created = mergeProfile(null, classified, { registry });
    const clash = index.get(created.profileId);
    if (clash) {
      index.upsert(mergeProfile(clash, classified, { registry }));
      counters.merged += 1;
      return;
    }
    index.upsert(created);
    counters.created += 1;
  };

  const adapterContext = { referenceYear: settings.referenceYear };

  const processBatch = async (config: SourceConfig, docs: RawDocument[], stats: SourceSummary) => {
    const adapt = SOURCE_ADAPTERS[config.name];
    const classified = await mapWithConcurrency(docs, settings.classifyConcurrency, async (doc) => {
      try {
        return classifyRecord(registry, adapt(doc, config.tier, adapterContext));
      } catch (error) {
        if (error instanceof DocumentRejectedError) {
          stats.rejected += 1;
          console.warn(error.message);
        } else {
          stats.errors += 1;
          console.error(
            `[consolidate][${config.name}] document failed:`,
            error instanceof Error ? error.message : error,
          );
        }
        return null;
      }
    });
    stats.read += docs.length;

    for (const item of classified) {
      if (!item) {
        continue;
      }
      stats.accepted += 1;
      apply(item);
    }
  };

  const summaries: SourceSummary[] = [];
  for (const config of orderSources(options.sources ?? SOURCE_NAMES)) {
    const stats: SourceSummary = { source: config.name, read: 0, accepted: 0, rejected: 0, errors: 0 };
    console.log(`[consolidate][${config.name}] processing (${config.tier})`);

    let batch: RawDocument[] = [];
    for await (const doc of reader.read(config.name)) {
      batch.push(doc);
      if (batch.length >= settings.batchSize) {
        await processBatch(config, batch, stats);
        batch = [];
      }
    }
    if (batch.length) {
      await processBatch(config, batch, stats);
    }

    console.log(
      `[consolidate][${config.name}] read=${stats.read} accepted=${stats.accepted} ` +
        `rejected=${stats.rejected} errors=${stats.errors}`,
    );
    summaries.push(stats);
  }

  const profiles = index.values();
  const { buckets, largestBucket } = index.blockingStats();
  console.log(`[consolidate] ${profiles.length} profiles in ${buckets} blocking buckets (largest ${largestBucket})`);

  let profilesWritten = 0;
  if (options.dryRun) {
    console.log("[consolidate] dry run: skipping write");
  } else {
    profilesWritten = await repository.upsertProfiles(profiles);
    console.log(`[consolidate] upserted ${profilesWritten} profiles`);
  }

  return {
    sources: summaries,
    ...counters,
    profilesWritten,
    taxonomyVersion: registry.version,
  };
};

export type { CanonicalProfile, ConsolidationSummary, SourceName } from "./types";
export type { ProfileRepository, SourceReader } from "../repo/types";
