import type { QualityTier, RawDocument } from "../types";
import {
  buildSourceRecord,
  readId,
  readNumber,
  readString,
  readStringList,
  readText,
} from "./fields";

const joinLocation = (doc: RawDocument) => {
  const parts = [readString(doc, "city"), readString(doc, "state"), readString(doc, "country")]
    .filter((part): part is string => part !== null);
  return parts.length ? parts.join(", ") : null;
};

export const adaptSpeakerHub = (doc: RawDocument, tier: QualityTier) =>
  buildSourceRecord("speakerhub", tier, {
    sourceId: readId(doc, "uid", "_id"),
    name: readString(doc, "name"),
    url: readString(doc, "profile_url", "url"),
    firstName: readString(doc, "first_name"),
    lastName: readString(doc, "last_name"),
    title: readString(doc, "job_title"),
    company: readString(doc, "company"),
    location: joinLocation(doc),
    shortBio: readText(doc, "bio_summary"),
    biography: readText(doc, "details.full_bio", "bio_summary"),
    expertise: readStringList(doc, "topics", "details.topic_categories"),
    languages: readStringList(doc, "languages"),
    formats: readStringList(doc, "event_types"),
    credentials: readStringList(doc, "details.certifications", "details.awards"),
    demographics: readStringList(doc, "details.pronouns"),
    talkCount: readNumber(doc, "details.total_talks"),
    images: readStringList(doc, "profile_picture"),
    videos: readStringList(doc, "details.videos"),
    books: readStringList(doc, "details.publications"),
  });
