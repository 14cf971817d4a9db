import { describe, expect, it } from "vitest";
import { blockingKey, findMatch, ProfileIndex } from "../src/lib/resolver";
import { nameSimilarity, scoreMatch } from "../src/lib/similarity";
import { makeRecord, profileFrom } from "./fixtures/records";

describe("nameSimilarity", () => {
  it("is 1 for names that normalize identically", () => {
    expect(nameSimilarity("José Álvarez", "jose alvarez")).toBe(1);
    expect(nameSimilarity("Иван Петров", "иван петров")).toBe(1);
  });

  it("scales edit distance by the longer name", () => {
    expect(nameSimilarity("Jonathan Smith", "Jonathon Smith")).toBeCloseTo(1 - 1 / 14);
  });
});

describe("scoreMatch", () => {
  it("counts agreeing locations as support", () => {
    const { score, signals } = scoreMatch(
      { name: "Kate Smith", location: null, links: [] },
      { name: "Katherine Smith", location: null, links: [] },
    );
    expect(signals.location).toBeNull();
    expect(score).toBeCloseTo(1 - 5 / 15);
  });

  it("forces a match on a shared social link", () => {
    const link = "https://twitter.com/janesmith";
    const { score, signals } = scoreMatch(
      { name: "J. Smith", location: null, links: [link] },
      { name: "Jane Smith", location: null, links: [link] },
    );
    expect(signals.socialLink).toBe(true);
    expect(score).toBe(1);
  });
});

describe("findMatch", () => {
  it("keys profiles by surname and country", () => {
    expect(blockingKey("Jane García", "US")).toBe("garcia|us");
    expect(blockingKey("Jane García", null)).toBe("garcia|unknown");
  });

  it("keys non-Latin names by their own surname", () => {
    expect(blockingKey("Иван Петров", "RU")).toBe("петров|ru");
    expect(blockingKey("王 伟", "CN")).toBe("伟|cn");
  });

  it("matches identical non-Latin names in the same city", () => {
    const existing = profileFrom(makeRecord({ name: "Иван Петров", location: "Tokyo, Japan" }));
    const index = new ProfileIndex([
      existing,
      profileFrom(makeRecord({ name: "王 伟", location: "Tokyo, Japan" })),
    ]);

    const decision = findMatch(
      makeRecord({ name: "Иван Петров", source: "speakerhub", location: "Tokyo, Japan" }),
      index,
    );

    expect(decision.kind).toBe("match");
    if (decision.kind === "match") {
      expect(decision.candidate.profileId).toBe(existing.profileId);
      expect(decision.candidate.score).toBe(1);
    }
  });

  it("treats a shared personal website as link overlap", () => {
    const existing = profileFrom(
      makeRecord({ name: "Jane Smith", website: "https://janesmith.example.com/" }),
    );
    const index = new ProfileIndex([existing]);

    const decision = findMatch(
      makeRecord({ name: "J. Smith", source: "speakerhub", website: "https://janesmith.example.com/" }),
      index,
    );

    expect(decision.kind).toBe("match");
    if (decision.kind === "match") {
      expect(decision.candidate.profileId).toBe(existing.profileId);
      expect(decision.candidate.matchedOn.socialLink).toBe(true);
    }
  });

  it("keeps same-name people in different countries apart", () => {
    const london = profileFrom(makeRecord({ name: "John Smith", sourceId: "js-1", location: "London, UK" }));
    const index = new ProfileIndex([london]);

    const decision = findMatch(
      makeRecord({ name: "John Smith", source: "bigspeak", sourceId: "js-2", location: "Chicago, USA" }),
      index,
    );

    expect(decision).toEqual({ kind: "new" });
  });

  it("matches close names in the same bucket", () => {
    const existing = profileFrom(makeRecord({ name: "Jonathan Smith", location: "Boston, MA" }));
    const index = new ProfileIndex([existing]);

    const decision = findMatch(
      makeRecord({ name: "Jonathon Smith", source: "speakerhub", location: "Boston, MA" }),
      index,
    );

    expect(decision.kind).toBe("match");
    if (decision.kind === "match") {
      expect(decision.candidate.profileId).toBe(existing.profileId);
      expect(decision.candidate.matchedOn.location).toBe(1);
    }
  });

  it("never matches distant names even with the same city", () => {
    const index = new ProfileIndex([profileFrom(makeRecord({ name: "Jane Smith", location: "Boston, MA" }))]);

    const decision = findMatch(
      makeRecord({ name: "Robert Smith", source: "speakerhub", location: "Boston, MA" }),
      index,
    );

    expect(decision).toEqual({ kind: "new" });
  });

  it("reports scores between the thresholds as ambiguous", () => {
    const existing = profileFrom(makeRecord({ name: "Katherine Smith", location: "Boston, MA" }));
    const index = new ProfileIndex([existing]);

    const decision = findMatch(
      makeRecord({ name: "Kate Smith", source: "speakerhub", location: "Boston, MA" }),
      index,
    );

    expect(decision.kind).toBe("ambiguous");
    if (decision.kind === "ambiguous") {
      expect(decision.candidate.score).toBeCloseTo(0.75);
    }
  });

  it("lets a profile without a country match any country", () => {
    const index = new ProfileIndex([profileFrom(makeRecord({ name: "Jane Smith" }))]);

    const decision = findMatch(
      makeRecord({ name: "Jane Smith", source: "sessionize", location: "NYC" }),
      index,
    );

    expect(decision.kind).toBe("match");
  });

  it("prefers the richer profile when scores tie", () => {
    const sparse = profileFrom(makeRecord({ name: "Jane Smith", sourceId: "sparse" }));
    const rich = profileFrom(
      makeRecord({
        name: "Jane Smith",
        sourceId: "rich",
        biography: "Jane writes about leadership.",
        email: "jane@example.com",
      }),
    );
    const index = new ProfileIndex([sparse, rich]);

    const decision = findMatch(makeRecord({ name: "Jane Smith", source: "speakerhub" }), index);

    expect(rich.metadata.profileScore).toBeGreaterThan(sparse.metadata.profileScore);
    expect(decision.kind).toBe("match");
    if (decision.kind === "match") {
      expect(decision.candidate.profileId).toBe(rich.profileId);
    }
  });

  it("re-keys a profile when its country changes", () => {
    const original = profileFrom(makeRecord({ name: "Jane Smith", sourceId: "js" }));
    const index = new ProfileIndex([original]);
    const incoming = makeRecord({ name: "Jane Smith", source: "bigspeak", location: "Chicago, USA" });

    expect(findMatch(incoming, index).kind).toBe("match");

    index.upsert(profileFrom(makeRecord({ name: "Jane Smith", sourceId: "js", location: "London, UK" }), original));

    expect(findMatch(incoming, index)).toEqual({ kind: "new" });
    expect(index.blockingStats()).toEqual({ buckets: 1, largestBucket: 1 });
  });

  it("sends a reprocessed record back to its profile", () => {
    const existing = profileFrom(makeRecord({ name: "Jane Smith", sourceId: "js", location: "London, UK" }));
    const index = new ProfileIndex([existing]);

    const decision = findMatch(
      makeRecord({ name: "Jane Smith", sourceId: "js", location: "Chicago, USA" }),
      index,
    );

    expect(decision.kind).toBe("match");
  });
});
