import type { QualityTier, RawDocument } from "../types";
import { buildSourceRecord, readId, readNumber, readString, readStringList, readText } from "./fields";

export const adaptASpeakers = (doc: RawDocument, tier: QualityTier) =>
  buildSourceRecord("a_speakers", tier, {
    sourceId: readId(doc, "url", "_id"),
    name: readString(doc, "name"),
    url: readString(doc, "url"),
    title: readString(doc, "job_title"),
    location: readString(doc, "location"),
    shortBio: readText(doc, "description"),
    biography: readText(doc, "full_bio", "description"),
    expertise: readStringList(doc, "topics"),
    fee: readString(doc, "fee_range"),
    averageRating: readNumber(doc, "average_rating"),
    ratingCount: readNumber(doc, "total_reviews"),
    images: readStringList(doc, "image_url"),
    videos: readStringList(doc, "videos"),
  });
