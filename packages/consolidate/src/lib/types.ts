export const SOURCE_NAMES = [
  "leading_authorities",
  "llm_parsed_db",
  "a_speakers",
  "allamericanspeakers",
  "bigspeak",
  "speakerhub",
  "thespeakerhandbook",
  "sessionize",
  "eventraptor",
  "freespeakerbureau",
] as const;

export type SourceName = (typeof SOURCE_NAMES)[number];

export const QUALITY_TIERS = ["tier_1", "tier_2", "tier_3", "tier_4"] as const;

// tier_1 is the most trusted.
export type QualityTier = (typeof QUALITY_TIERS)[number];

export type RawDocument = Record<string, unknown>;

export type SourceRecord = {
  source: SourceName;
  sourceId: string;
  tier: QualityTier;
  url: string | null;
  name: string;
  displayName: string;
  firstName: string | null;
  lastName: string | null;
  title: string | null;
  company: string | null;
  tagline: string | null;
  location: string | null;
  biography: string | null;
  shortBio: string | null;
  rawExpertiseTerms: string[];
  rawIndustryTerms: string[];
  rawCredentialTerms: string[];
  rawLanguageTerms: string[];
  rawFormatTerms: string[];
  rawDemographicTerms: string[];
  feeText: string | null;
  yearsSpeaking: number | null;
  talkCount: number | null;
  averageRating: number | null;
  ratingCount: number | null;
  images: string[];
  videos: string[];
  books: string[];
  email: string | null;
  phone: string | null;
  website: string | null;
  socialLinks: string[];
};

export type CategoryResult = {
  primaryCategories: string[];
  secondaryCategories: string[];
  parentCategories: string[];
  keywords: string[];
  originalTerms: string[];
  researchAreas: string[];
};

export type TaxonomyDomain =
  | "expertise"
  | "industry"
  | "language"
  | "credential"
  | "speaking_format"
  | "demographics";

export type ClassifiedRecord = {
  record: SourceRecord;
  categories: Record<TaxonomyDomain, CategoryResult>;
};

export type FeeBracket =
  | "under_5k"
  | "5k_10k"
  | "10k_20k"
  | "20k_30k"
  | "30k_50k"
  | "50k_100k"
  | "over_100k"
  | "inquire";

export type FeeInfo = {
  min: number | null;
  max: number | null;
  currency: string;
  display: string;
  bracket: FeeBracket;
};

export type ProfileLocation = {
  raw: string;
  city: string | null;
  state: string | null;
  country: string | null;
  countryCode: string | null;
};

export type ScalarSlot =
  | "identity.displayName"
  | "identity.firstName"
  | "identity.lastName"
  | "identity.title"
  | "identity.company"
  | "identity.tagline"
  | "biography.short"
  | "biography.full"
  | "location"
  | "speaking.fee"
  | "speaking.yearsSpeaking"
  | "speaking.talkCount"
  | "speaking.averageRating"
  | "speaking.ratingCount"
  | "contact.email"
  | "contact.phone"
  | "contact.website";

export type CanonicalProfile = {
  profileId: string;
  sourceIds: Partial<Record<SourceName, string>>;
  identity: {
    fullName: string;
    displayName: string;
    firstName: string | null;
    lastName: string | null;
    title: string | null;
    company: string | null;
    tagline: string | null;
  };
  biography: {
    short: string | null;
    full: string | null;
  };
  location: ProfileLocation | null;
  expertise: CategoryResult;
  industries: CategoryResult;
  credentials: CategoryResult;
  languages: CategoryResult;
  demographics: CategoryResult;
  speaking: {
    formats: CategoryResult;
    fee: FeeInfo | null;
    yearsSpeaking: number | null;
    talkCount: number | null;
    averageRating: number | null;
    ratingCount: number | null;
  };
  media: {
    images: string[];
    videos: string[];
    books: string[];
  };
  contact: {
    email: string | null;
    phone: string | null;
    website: string | null;
    bookingUrls: string[];
    socialLinks: string[];
  };
  metadata: {
    sources: SourceName[];
    primarySource: SourceName;
    dataQualityTier: QualityTier;
    profileScore: number;
    experienceScore: number;
    completenessScore: number;
    mergeConfidence: number;
    taxonomyVersion: string;
    fieldTiers: Partial<Record<ScalarSlot, QualityTier>>;
  };
};

export type MatchSignals = {
  name: number;
  location: number | null;
  socialLink: boolean | null;
};

export type MatchCandidate = {
  profileId: string;
  score: number;
  matchedOn: MatchSignals;
  profileScore: number;
};

export type MatchDecision =
  | { kind: "match"; candidate: MatchCandidate }
  | { kind: "ambiguous"; candidate: MatchCandidate }
  | { kind: "new" };

export type SourceSummary = {
  source: SourceName;
  read: number;
  accepted: number;
  rejected: number;
  errors: number;
};

export type ConsolidationSummary = {
  sources: SourceSummary[];
  created: number;
  merged: number;
  ambiguous: number;
  profilesWritten: number;
  taxonomyVersion: string;
};
