import type { QualityTier, RawDocument } from "../types";
import {
  buildSourceRecord,
  readId,
  readLinkValues,
  readNumber,
  readRecord,
  readRecords,
  readString,
  readStringList,
  readText,
} from "./fields";

const feeText = (doc: RawDocument) => {
  const fees = readRecord(doc, "speaker_fees");
  if (!fees) {
    return readString(doc, "speaker_fees");
  }
  const display = readString(fees, "display");
  if (display) {
    return display;
  }
  const min = readNumber(fees, "min");
  const max = readNumber(fees, "max");
  return min !== null && max !== null ? `$${min} - $${max}` : null;
};

export const adaptLeadingAuthorities = (doc: RawDocument, tier: QualityTier) =>
  buildSourceRecord("leading_authorities", tier, {
    sourceId: readId(doc, "_id", "speaker_page_url"),
    name: readString(doc, "name"),
    url: readString(doc, "speaker_page_url"),
    title: readString(doc, "job_title"),
    biography: readText(doc, "description"),
    expertise: readStringList(doc, "topics"),
    fee: feeText(doc),
    images: readStringList(doc, "speaker_image_url"),
    videos: readStringList(doc, "videos"),
    books: readStringList(doc, "books_and_publications"),
    ratingCount: readRecords(doc, "client_testimonials").length || null,
    website: readString(doc, "speaker_website"),
    links: readLinkValues(doc, "social_media"),
  });
