import { countryNameForCode } from "../location";
import type { QualityTier, RawDocument } from "../types";
import {
  buildSourceRecord,
  readId,
  readLinkValues,
  readString,
  readStringList,
  readText,
} from "./fields";

export const adaptTheSpeakerHandbook = (doc: RawDocument, tier: QualityTier) =>
  buildSourceRecord("thespeakerhandbook", tier, {
    sourceId: readId(doc, "speaker_id", "_id"),
    name: readString(doc, "display_name", "name"),
    url: readString(doc, "url", "profile_url"),
    firstName: readString(doc, "first_name"),
    lastName: readString(doc, "last_name"),
    tagline: readString(doc, "strapline"),
    company: readString(doc, "details.company"),
    location: readString(doc, "details.location") ?? countryNameForCode(readString(doc, "home_country")),
    biography: readText(doc, "details.biography"),
    expertise: readStringList(doc, "topics"),
    languages: readStringList(doc, "languages"),
    formats: readStringList(doc, "event_type", "engagement_types"),
    credentials: readStringList(doc, "notability", "details.awards"),
    demographics: readStringList(doc, "gender"),
    images: readStringList(doc, "image_url"),
    videos: readStringList(doc, "details.videos"),
    books: readStringList(doc, "details.books"),
    email: readString(doc, "details.contact_info.email"),
    phone: readString(doc, "details.contact_info.phone"),
    website: readString(doc, "details.website"),
    links: readLinkValues(doc, "details.social_media"),
  });
