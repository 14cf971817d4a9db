import { describe, expect, it } from "vitest";
import { buildProfileId, mergeProfile } from "../src/lib/merge";
import { classify, makeRecord, profileFrom, registry } from "./fixtures/records";

const richRecord = makeRecord({
  name: "Jane Smith",
  displayName: "Dr. Jane Smith, PhD",
  url: "https://a-speakers.com/speakers/jane-smith",
  title: "Chief Scientist",
  location: "NYC",
  biography: "As a first-generation college graduate, Jane studies machine learning.",
  rawExpertiseTerms: ["AI", "Leadership"],
  rawCredentialTerms: ["PhD"],
  rawFormatTerms: ["Keynote"],
  feeText: "$10,000 - $20,000",
  images: ["https://a-speakers.com/img/jane.jpg"],
  socialLinks: ["https://linkedin.com/in/janesmith"],
});

describe("mergeProfile", () => {
  it("is idempotent for a repeated record", () => {
    const classified = classify(richRecord);
    const once = mergeProfile(null, classified, { registry });
    const twice = mergeProfile(once, classified, { registry, confidence: 0.9 });

    expect(twice).toEqual(once);
  });

  it("starts a profile from one record", () => {
    const profile = profileFrom(richRecord);

    expect(profile.profileId).toBe(buildProfileId(richRecord));
    expect(profile.sourceIds).toEqual({ a_speakers: "jane-smith" });
    expect(profile.identity.fullName).toBe("Jane Smith");
    expect(profile.identity.displayName).toBe("Dr. Jane Smith, PhD");
    expect(profile.location?.city).toBe("New York");
    expect(profile.speaking.fee?.bracket).toBe("10k_20k");
    expect(profile.credentials.primaryCategories).toEqual(["PhD"]);
    expect(profile.demographics.primaryCategories).toEqual(["first_generation"]);
    expect(profile.contact.bookingUrls).toEqual(["https://a-speakers.com/speakers/jane-smith"]);
    expect(profile.metadata.mergeConfidence).toBe(1);
    expect(profile.metadata.fieldTiers["identity.title"]).toBe("tier_2");
  });

  it("overwrites a scalar only from a more trusted tier", () => {
    const base = profileFrom(makeRecord({ name: "Jane Smith", source: "speakerhub", tier: "tier_3", title: "Speaker" }));

    const upgraded = profileFrom(
      makeRecord({ name: "Jane Smith", source: "bigspeak", tier: "tier_2", title: "Keynote Speaker" }),
      base,
    );
    expect(upgraded.identity.title).toBe("Keynote Speaker");
    expect(upgraded.metadata.fieldTiers["identity.title"]).toBe("tier_2");

    const sameTier = profileFrom(
      makeRecord({ name: "Jane Smith", source: "a_speakers", tier: "tier_2", title: "Author" }),
      upgraded,
    );
    expect(sameTier.identity.title).toBe("Keynote Speaker");

    const lowerTier = profileFrom(
      makeRecord({ name: "Jane Smith", source: "eventraptor", tier: "tier_4", title: "Host", company: "Acme" }),
      sameTier,
    );
    expect(lowerTier.identity.title).toBe("Keynote Speaker");
    expect(lowerTier.identity.company).toBe("Acme");
    expect(lowerTier.metadata.fieldTiers["identity.company"]).toBe("tier_4");
  });

  it("unions lists and re-derives categories from every term seen", () => {
    const first = profileFrom(makeRecord({ name: "Jane Smith", rawExpertiseTerms: ["AI"], images: ["https://img.example.com/b.jpg"] }));
    const merged = profileFrom(
      makeRecord({
        name: "Jane Smith",
        source: "sessionize",
        tier: "tier_3",
        rawExpertiseTerms: ["artificial intelligence", "Leadership"],
        images: ["https://img.example.com/a.jpg"],
      }),
      first,
    );

    expect(merged.profileId).toBe(first.profileId);
    expect(merged.expertise.primaryCategories).toEqual(["artificial_intelligence", "leadership"]);
    expect(merged.expertise.originalTerms).toEqual(["AI", "Leadership", "artificial intelligence"]);
    expect(merged.media.images).toEqual(["https://img.example.com/a.jpg", "https://img.example.com/b.jpg"]);
    expect(merged.sourceIds).toEqual({ a_speakers: "jane-smith", sessionize: "jane-smith" });
    expect(merged.metadata.sources).toEqual(["a_speakers", "sessionize"]);
    expect(merged.metadata.primarySource).toBe("a_speakers");
    expect(merged.metadata.dataQualityTier).toBe("tier_2");
  });

  it("updates merge confidence only when a new source id joins", () => {
    const base = profileFrom(makeRecord({ name: "Jane Smith" }));
    const incoming = classify(makeRecord({ name: "Jane Smith", source: "bigspeak", sourceId: "bs-1" }));

    const joined = mergeProfile(base, incoming, { registry, confidence: 0.9 });
    expect(joined.metadata.mergeConfidence).toBe(0.9);

    const repeated = mergeProfile(joined, incoming, { registry, confidence: 0.5 });
    expect(repeated.metadata.mergeConfidence).toBe(0.9);

    const replaced = mergeProfile(
      repeated,
      classify(makeRecord({ name: "Jane Smith", source: "bigspeak", sourceId: "bs-2" })),
      { registry, confidence: 0.88 },
    );
    expect(replaced.sourceIds.bigspeak).toBe("bs-2");
    expect(replaced.metadata.mergeConfidence).toBe(0.88);
  });

  it("does not modify the profile it is given", () => {
    const base = profileFrom(makeRecord({ name: "Jane Smith" }));
    const snapshot = structuredClone(base);

    profileFrom(makeRecord({ name: "Jane Smith", source: "bigspeak", title: "Author", rawExpertiseTerms: ["AI"] }), base);

    expect(base).toEqual(snapshot);
  });
});
