import { describe, expect, it } from "vitest";
import { normalizeUrl, normalizeSocialLink, isSocialLink } from "../src/lib/url";
import { normalizeName } from "../src/lib/normalize";

describe("normalizeUrl", () => {
  it("strips tracking params and fragments", () => {
    const input = "https://www.example.com/path/?utm_source=foo&gclid=bar#section";
    expect(normalizeUrl(input)).toBe("https://example.com/path");
  });

  it("preserves non-tracking params", () => {
    const input = "https://example.com/path/?ref=twitter&query=speakers";
    expect(normalizeUrl(input)).toBe("https://example.com/path?query=speakers");
  });

  it("adds a scheme and upgrades to https", () => {
    expect(normalizeUrl("janesmith.example.com/about")).toBe("https://janesmith.example.com/about");
    expect(normalizeUrl("http://janesmith.example.com/about")).toBe("https://janesmith.example.com/about");
  });

  it("rejects values that are not links", () => {
    expect(normalizeUrl("not a url")).toBeNull();
    expect(normalizeUrl("localhost")).toBeNull();
  });
});

describe("normalizeSocialLink", () => {
  it("folds host aliases and path case", () => {
    expect(normalizeSocialLink("http://www.x.com/JaneSmith?lang=en")).toBe("https://twitter.com/janesmith");
  });

  it("drops linkedin country subdomains", () => {
    expect(normalizeSocialLink("https://uk.linkedin.com/in/Jane-Smith/")).toBe(
      "https://linkedin.com/in/jane-smith",
    );
  });

  it("recognizes social hosts", () => {
    expect(isSocialLink("https://m.facebook.com/janesmith")).toBe(true);
    expect(isSocialLink("https://janesmith.example.com")).toBe(false);
  });
});

describe("normalizeName", () => {
  it("normalizes casing and punctuation", () => {
    expect(normalizeName("Jane-Marie O'Neil, Ph.D.")).toBe("jane-marie oneil phd");
  });

  it("strips diacritics", () => {
    expect(normalizeName("  José  Álvarez ")).toBe("jose alvarez");
  });
});
