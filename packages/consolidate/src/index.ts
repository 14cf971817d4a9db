import { existsSync, readFileSync } from "fs";
import { dirname, resolve } from "path";
import { closeMongoClient } from "@speaker-index/db";
import { runConsolidation } from "./lib/pipeline";
import {
  getConsolidationSettings,
  getInputDir,
  getSelectedSources,
  getTargetCollection,
  getTargetDatabase,
  isDryRun,
} from "./lib/settings";
import { FileSourceReader } from "./repo/files";
import { MemoryRepository } from "./repo/memory";
import { MongoRepository, MongoSourceReader } from "./repo/mongo";
import type { ProfileRepository, SourceReader } from "./repo/types";

const requireEnv = (key: string) => {
  if (!process.env[key]) {
    throw new Error(`Missing required env var: ${key}`);
  }
};

const loadDotEnv = () => {
  let currentDir = process.cwd();
  for (let i = 0; i < 6; i += 1) {
    const envPath = resolve(currentDir, ".env");
    if (existsSync(envPath)) {
      const contents = readFileSync(envPath, "utf-8");
      for (const line of contents.split("\n")) {
        const trimmed = line.trim();
        if (!trimmed || trimmed.startsWith("#")) {
          continue;
        }
        const eqIdx = trimmed.indexOf("=");
        if (eqIdx === -1) {
          continue;
        }
        const key = trimmed.slice(0, eqIdx).trim();
        const rawValue = trimmed.slice(eqIdx + 1).trim();
        const value = rawValue.replace(/^['"]|['"]$/g, "");
        if (!process.env[key]) {
          process.env[key] = value;
        }
      }
      return envPath;
    }
    const parent = dirname(currentDir);
    if (parent === currentDir) {
      break;
    }
    currentDir = parent;
  }
  return null;
};

const main = async () => {
  const envPath = loadDotEnv();
  if (envPath) {
    console.log(`[consolidate] loaded env from ${envPath}`);
  }

  const dryRun = isDryRun();
  const inputDir = getInputDir();
  const settings = getConsolidationSettings();
  const sources = getSelectedSources();

  // File input with a dry run never touches Mongo.
  const usesMongo = !inputDir || !dryRun;
  if (usesMongo) {
    requireEnv("MONGO_URI");
  }

  const reader: SourceReader = inputDir ? new FileSourceReader(inputDir) : new MongoSourceReader();
  const repository: ProfileRepository = dryRun && inputDir
    ? new MemoryRepository()
    : new MongoRepository({ database: getTargetDatabase(), collection: getTargetCollection() });

  console.log(
    `[consolidate] sources=${sources.join(",")} taxonomy=${settings.taxonomyVersion} ` +
      `batch=${settings.batchSize} concurrency=${settings.classifyConcurrency} year=${settings.referenceYear}` +
      (inputDir ? ` input=${inputDir}` : "") +
      (dryRun ? " (dry run)" : ""),
  );

  try {
    const summary = await runConsolidation({ reader, repository, settings, sources, dryRun });
    console.log("Consolidation complete:", summary);
  } finally {
    if (usesMongo) {
      await closeMongoClient();
    }
  }
};

main().catch((error) => {
  console.error("Consolidation failed:", error);
  process.exitCode = 1;
});
