import type { QualityTier, RawDocument } from "../types";
import {
  buildSourceRecord,
  readId,
  readLinkValues,
  readString,
  readStringList,
  readText,
  readValue,
} from "./fields";

const countEvents = (doc: RawDocument) => {
  const events = readValue(doc, "events");
  return Array.isArray(events) && events.length ? events.length : null;
};

export const adaptEventRaptor = (doc: RawDocument, tier: QualityTier) =>
  buildSourceRecord("eventraptor", tier, {
    sourceId: readId(doc, "speaker_id", "_id"),
    name: readString(doc, "name"),
    url: readString(doc, "url"),
    tagline: readString(doc, "tagline"),
    biography: readText(doc, "biography"),
    expertise: readStringList(doc, "business_areas"),
    credentials: readStringList(doc, "credentials"),
    email: readString(doc, "email"),
    talkCount: countEvents(doc),
    images: readStringList(doc, "profile_image"),
    links: readLinkValues(doc, "social_media"),
  });
