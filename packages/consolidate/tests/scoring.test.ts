import { describe, expect, it } from "vitest";
import {
  computeCompletenessScore,
  computeExperienceScore,
  computeProfileScore,
  PROFILE_SCORE_GROUPS,
} from "../src/lib/scoring";
import { makeRecord, profileFrom } from "./fixtures/records";

describe("scoring", () => {
  it("allocates exactly 100 profile points", () => {
    const total = PROFILE_SCORE_GROUPS.reduce((sum, group) => sum + group.points, 0);
    expect(total).toBe(100);
  });

  it("scores a name-only profile", () => {
    const profile = profileFrom(makeRecord({ name: "Jane Smith" }));

    expect(profile.metadata.profileScore).toBe(15);
    expect(profile.metadata.completenessScore).toBe(10);
    expect(profile.metadata.experienceScore).toBe(0);
  });

  it("gives no credit below a group's minimum", () => {
    const profile = profileFrom(makeRecord({ name: "Springfield Jones", location: "Springfield" }));

    expect(profile.location?.city).toBe("Springfield");
    expect(computeProfileScore(profile)).toBe(15);
  });

  it("never decreases when a field group is added", () => {
    const base = profileFrom(makeRecord({ name: "Jane Smith" }));
    const withBio = profileFrom(makeRecord({ name: "Jane Smith", biography: "Jane has spoken at many events." }), base);
    const withLocation = profileFrom(makeRecord({ name: "Jane Smith", location: "Boston, MA" }), withBio);

    expect(computeProfileScore(withBio)).toBe(30);
    expect(computeProfileScore(withLocation)).toBe(40);
    expect(computeCompletenessScore(withBio)).toBe(13);
    expect(computeCompletenessScore(withLocation)).toBe(23);
  });

  it("sums experience brackets", () => {
    const profile = profileFrom(
      makeRecord({
        name: "Jane Smith",
        yearsSpeaking: 12,
        talkCount: 250,
        averageRating: 4.6,
        rawFormatTerms: ["Keynote", "Workshops", "Panel discussion"],
      }),
    );

    expect(computeExperienceScore(profile)).toBe(15 + 15 + 15 + 12);
  });

  it("caps format diversity", () => {
    const profile = profileFrom(
      makeRecord({
        name: "Jane Smith",
        rawFormatTerms: ["Keynote", "Workshop", "Panel", "Fireside chat", "Emcee", "Webinar", "Podcast"],
      }),
    );

    expect(computeExperienceScore(profile)).toBe(20);
  });
});
