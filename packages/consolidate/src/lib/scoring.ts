import type { CanonicalProfile, CategoryResult } from "./types";

type ScoreGroup = {
  name: string;
  points: number;
  minimum: number;
  fields: (profile: CanonicalProfile) => unknown[];
};

type Bracket = readonly [threshold: number, points: number];

const categories = (result: CategoryResult) => [
  ...result.primaryCategories,
  ...result.secondaryCategories,
];

export const isPopulated = (value: unknown) => {
  if (value === null || value === undefined) {
    return false;
  }
  if (typeof value === "string") {
    return value.trim().length > 0;
  }
  if (Array.isArray(value)) {
    return value.length > 0;
  }
  return true;
};

export const PROFILE_SCORE_GROUPS: readonly ScoreGroup[] = [
  {
    name: "identity",
    points: 15,
    minimum: 3,
    fields: ({ identity }) => [
      identity.fullName,
      identity.firstName,
      identity.lastName,
      identity.title,
      identity.company,
      identity.tagline,
    ],
  },
  {
    name: "biography",
    points: 15,
    minimum: 1,
    fields: ({ biography }) => [biography.short, biography.full],
  },
  {
    name: "location",
    points: 10,
    minimum: 2,
    fields: ({ location }) => [location?.city, location?.state, location?.country],
  },
  {
    name: "expertise",
    points: 20,
    minimum: 1,
    fields: ({ expertise, industries }) => [
      categories(expertise),
      categories(industries),
      expertise.researchAreas,
    ],
  },
  {
    name: "credentials",
    points: 10,
    minimum: 1,
    fields: ({ credentials }) => [categories(credentials)],
  },
  {
    name: "languages",
    points: 5,
    minimum: 1,
    fields: ({ languages }) => [categories(languages)],
  },
  {
    name: "media",
    points: 10,
    minimum: 1,
    fields: ({ media }) => [media.images, media.videos, media.books],
  },
  {
    name: "contact",
    points: 15,
    minimum: 1,
    fields: ({ contact }) => [
      contact.email,
      contact.phone,
      contact.website,
      contact.bookingUrls,
      contact.socialLinks,
    ],
  },
];

// No fractional credit: a group earns its points once enough of its fields are populated.
export const computeProfileScore = (profile: CanonicalProfile) =>
  PROFILE_SCORE_GROUPS.reduce((total, group) => {
    const populated = group.fields(profile).filter(isPopulated).length;
    return populated >= group.minimum ? total + group.points : total;
  }, 0);

const YEARS_BRACKETS: readonly Bracket[] = [
  [20, 20],
  [10, 15],
  [5, 10],
  [2, 5],
];
const TALK_BRACKETS: readonly Bracket[] = [
  [500, 20],
  [200, 15],
  [100, 10],
  [50, 5],
];
const RATING_BRACKETS: readonly Bracket[] = [
  [4.8, 20],
  [4.5, 15],
  [4.0, 10],
  [3.5, 5],
];
const POINTS_PER_FORMAT = 4;
const COMPONENT_CAP = 20;

const bracketPoints = (value: number | null, brackets: readonly Bracket[]) => {
  if (value === null) {
    return 0;
  }
  const bracket = brackets.find(([threshold]) => value >= threshold);
  return bracket ? bracket[1] : 0;
};

export const computeExperienceScore = (profile: CanonicalProfile) => {
  const { speaking } = profile;
  const formats = new Set(categories(speaking.formats)).size;
  return (
    bracketPoints(speaking.yearsSpeaking, YEARS_BRACKETS)
    + bracketPoints(speaking.talkCount, TALK_BRACKETS)
    + bracketPoints(speaking.averageRating, RATING_BRACKETS)
    + Math.min(formats * POINTS_PER_FORMAT, COMPONENT_CAP)
  );
};

const leafFields = (profile: CanonicalProfile): unknown[] => [
  profile.identity.fullName,
  profile.identity.firstName,
  profile.identity.lastName,
  profile.identity.title,
  profile.identity.company,
  profile.identity.tagline,
  profile.biography.short,
  profile.biography.full,
  profile.location?.city,
  profile.location?.state,
  profile.location?.country,
  categories(profile.expertise),
  profile.expertise.researchAreas,
  categories(profile.industries),
  categories(profile.credentials),
  categories(profile.languages),
  categories(profile.demographics),
  categories(profile.speaking.formats),
  profile.speaking.fee,
  profile.speaking.yearsSpeaking,
  profile.speaking.talkCount,
  profile.speaking.averageRating,
  profile.media.images,
  profile.media.videos,
  profile.media.books,
  profile.contact.email,
  profile.contact.phone,
  profile.contact.website,
  profile.contact.bookingUrls,
  profile.contact.socialLinks,
];

export const computeCompletenessScore = (profile: CanonicalProfile) => {
  const leaves = leafFields(profile);
  const populated = leaves.filter(isPopulated).length;
  return Math.round((populated / leaves.length) * 100);
};

export const scoreProfile = (profile: CanonicalProfile) => ({
  profileScore: computeProfileScore(profile),
  experienceScore: computeExperienceScore(profile),
  completenessScore: computeCompletenessScore(profile),
});
