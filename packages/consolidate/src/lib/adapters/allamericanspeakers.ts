import type { QualityTier, RawDocument } from "../types";
import {
  buildSourceRecord,
  readId,
  readNumber,
  readRecord,
  readRecords,
  readString,
  readStringList,
  readText,
} from "./fields";

const feeText = (doc: RawDocument) => {
  const fee = readRecord(doc, "fee_range");
  if (!fee) {
    return readString(doc, "fee_range");
  }
  const text = readString(fee, "text");
  if (text) {
    return text;
  }
  const min = readNumber(fee, "min");
  const max = readNumber(fee, "max");
  if (min !== null && max !== null) {
    return `$${min} - $${max}`;
  }
  if (min !== null) {
    return `$${min}+`;
  }
  return max !== null ? `under $${max}` : null;
};

const reviewStats = (doc: RawDocument) => {
  const reviews = readRecords(doc, "reviews");
  const ratings = reviews
    .map((review) => readNumber(review, "rating"))
    .filter((rating): rating is number => rating !== null);
  if (!ratings.length) {
    return { averageRating: null, ratingCount: reviews.length || null };
  }
  const total = ratings.reduce((sum, rating) => sum + rating, 0);
  return {
    averageRating: Math.round((total / ratings.length) * 100) / 100,
    ratingCount: reviews.length,
  };
};

export const adaptAllAmericanSpeakers = (doc: RawDocument, tier: QualityTier) =>
  buildSourceRecord("allamericanspeakers", tier, {
    sourceId: readId(doc, "speaker_id", "_id"),
    name: readString(doc, "name"),
    url: readString(doc, "url"),
    title: readString(doc, "job_title"),
    location: readString(doc, "location"),
    biography: readText(doc, "biography"),
    expertise: readStringList(doc, "speaking_topics"),
    industries: readStringList(doc, "categories"),
    languages: readStringList(doc, "languages"),
    formats: readStringList(doc, "event_types"),
    fee: feeText(doc),
    videos: readStringList(doc, "videos"),
    ...reviewStats(doc),
  });
