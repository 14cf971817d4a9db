import type { QualityTier, SourceName } from "../lib/types";

export type DetailJoin = {
  collection: string;
  // field on the listing document
  localField: string;
  // field on the detail document
  foreignField: string;
};

export type SourceConfig = {
  name: SourceName;
  tier: QualityTier;
  database: string;
  collections: string[];
  details?: DetailJoin;
  // field the reader stamps with the collection name each document came from
  collectionTag?: string;
};

// Processing order: most trusted tier first, stable within a tier.
export const SOURCE_CONFIGS: SourceConfig[] = [
  {
    name: "leading_authorities",
    tier: "tier_1",
    database: "leading_authorities",
    collections: ["speakers_final_details"],
  },
  {
    name: "llm_parsed_db",
    tier: "tier_2",
    database: "llm_parsed_db",
    collections: ["cat_1", "cat_2", "cat_3", "cat_4"],
    collectionTag: "category",
  },
  {
    name: "a_speakers",
    tier: "tier_2",
    database: "a_speakers",
    collections: ["speakers"],
  },
  {
    name: "allamericanspeakers",
    tier: "tier_2",
    database: "allamericanspeakers",
    collections: ["speakers"],
  },
  {
    name: "bigspeak",
    tier: "tier_2",
    database: "bigspeak_scraper",
    collections: ["speakers"],
    details: { collection: "speaker_profiles", localField: "speaker_id", foreignField: "speaker_id" },
  },
  {
    name: "speakerhub",
    tier: "tier_3",
    database: "speakerhub_scraper",
    collections: ["speakers"],
    details: { collection: "speaker_details", localField: "uid", foreignField: "uid" },
  },
  {
    name: "thespeakerhandbook",
    tier: "tier_3",
    database: "thespeakerhandbook_scraper",
    collections: ["speakers"],
    details: { collection: "speaker_profiles", localField: "speaker_id", foreignField: "speaker_id" },
  },
  {
    name: "sessionize",
    tier: "tier_3",
    database: "sessionize_scraper",
    collections: ["speakers"],
    details: { collection: "speaker_profiles", localField: "username", foreignField: "username" },
  },
  {
    name: "eventraptor",
    tier: "tier_4",
    database: "eventraptor",
    collections: ["speakers"],
  },
  {
    name: "freespeakerbureau",
    tier: "tier_4",
    database: "freespeakerbureau_scraper",
    collections: ["speakers_profiles"],
  },
];

export const TIER_RANK: Record<QualityTier, number> = {
  tier_1: 1,
  tier_2: 2,
  tier_3: 3,
  tier_4: 4,
};

export const getSourceConfig = (name: SourceName) => {
  const config = SOURCE_CONFIGS.find((source) => source.name === name);
  if (!config) {
    throw new Error(`Unknown source: ${name}`);
  }
  return config;
};

export const orderSources = (names: readonly SourceName[]) =>
  SOURCE_CONFIGS.filter((config) => names.includes(config.name))
    .map((config, index) => ({ config, index }))
    .sort((a, b) => TIER_RANK[a.config.tier] - TIER_RANK[b.config.tier] || a.index - b.index)
    .map(({ config }) => config);

export const isMoreTrusted = (candidate: QualityTier, than: QualityTier) =>
  TIER_RANK[candidate] < TIER_RANK[than];

export const mostTrusted = (a: QualityTier, b: QualityTier) => (isMoreTrusted(b, a) ? b : a);
