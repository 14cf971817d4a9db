import type { QualityTier, RawDocument } from "../types";
import { buildSourceRecord, readId, readNumber, readString, readStringList, readText } from "./fields";

export const adaptSessionize = (doc: RawDocument, tier: QualityTier) => {
  const username = readId(doc, "username", "_id");
  return buildSourceRecord("sessionize", tier, {
    sourceId: username,
    name: readString(doc, "name"),
    url: readString(doc, "url") ?? (username ? `https://sessionize.com/${username}` : null),
    title: readString(doc, "details.professional_info.job_title"),
    company: readString(doc, "details.professional_info.company"),
    tagline: readString(doc, "tagline"),
    location: readString(doc, "location"),
    biography: readText(doc, "details.basic_info.bio"),
    expertise: readStringList(doc, "categories"),
    talkCount: readNumber(doc, "details.speaking_history.total_sessions", "events_count"),
  });
};
