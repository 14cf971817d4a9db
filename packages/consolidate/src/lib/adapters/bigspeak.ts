import type { QualityTier, RawDocument } from "../types";
import {
  buildSourceRecord,
  readId,
  readLinkValues,
  readRecords,
  readString,
  readStringList,
  readText,
} from "./fields";

export const adaptBigSpeak = (doc: RawDocument, tier: QualityTier) =>
  buildSourceRecord("bigspeak", tier, {
    sourceId: readId(doc, "speaker_id", "_id"),
    name: readString(doc, "name", "details.name"),
    url: readString(doc, "details.profile_url", "profile_url", "url"),
    title: readString(doc, "job_title", "details.job_title"),
    location: readString(doc, "location", "details.location"),
    shortBio: readText(doc, "description"),
    biography: readText(doc, "details.biography", "description"),
    expertise: readStringList(doc, "topics", "details.keynote_topics"),
    languages: readStringList(doc, "details.languages"),
    credentials: readStringList(doc, "details.awards"),
    fee: readString(doc, "fee_range", "details.fee_range"),
    images: readStringList(doc, "image_url", "details.image_url"),
    videos: readStringList(doc, "details.videos"),
    books: readStringList(doc, "details.books"),
    ratingCount: readRecords(doc, "details.testimonials").length || null,
    links: readLinkValues(doc, "details.social_media"),
  });
