import type { QualityTier, RawDocument } from "../types";
import {
  buildSourceRecord,
  readId,
  readLinkValues,
  readNumber,
  readString,
  readStringList,
  readText,
  readYearsSince,
  type AdapterContext,
} from "./fields";

const joinLocation = (doc: RawDocument) => {
  const parts = [readString(doc, "city"), readString(doc, "state"), readString(doc, "country")]
    .filter((part): part is string => part !== null);
  return parts.length ? parts.join(", ") : null;
};

export const adaptFreeSpeakerBureau = (doc: RawDocument, tier: QualityTier, context: AdapterContext) =>
  buildSourceRecord("freespeakerbureau", tier, {
    sourceId: readId(doc, "_id"),
    name: readString(doc, "name"),
    url: readString(doc, "profile_url"),
    title: readString(doc, "role"),
    company: readString(doc, "company"),
    location: joinLocation(doc),
    biography: readText(doc, "biography"),
    expertise: readStringList(doc, "speaking_topics", "areas_of_expertise"),
    credentials: readStringList(doc, "awards"),
    email: readString(doc, "contact_info.email"),
    phone: readString(doc, "contact_info.phone"),
    links: readLinkValues(doc, "social_media"),
    yearsSpeaking: readNumber(doc, "years_speaking") ?? readYearsSince(doc, context, "speaker_since"),
  });
