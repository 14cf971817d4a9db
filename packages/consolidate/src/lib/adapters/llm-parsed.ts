import type { QualityTier, RawDocument } from "../types";
import { buildSourceRecord, readId, readString, readStringList, readText } from "./fields";

// Collections cat_1 (best) .. cat_4 map onto the shared tier scale.
const CATEGORY_TIERS: Record<string, QualityTier> = {
  cat_1: "tier_1",
  cat_2: "tier_2",
  cat_3: "tier_3",
  cat_4: "tier_4",
};

export const adaptLlmParsed = (doc: RawDocument, tier: QualityTier) => {
  const category = readString(doc, "category");
  return buildSourceRecord("llm_parsed_db", (category && CATEGORY_TIERS[category]) || tier, {
    sourceId: readId(doc, "_id"),
    name: readString(doc, "speaker_name"),
    title: readString(doc, "job_title"),
    location: readString(doc, "location"),
    biography: readText(doc, "bio"),
    expertise: readStringList(doc, "field_of_expertise"),
    credentials: readStringList(doc, "education"),
    formats: readStringList(doc, "event_types"),
    languages: readStringList(doc, "languages"),
  });
};
