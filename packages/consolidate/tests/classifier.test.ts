import { describe, expect, it } from "vitest";
import { emptyCategoryResult } from "../src/lib/taxonomy/classifier";
import { createTaxonomyRegistry, TAXONOMY_DOMAINS } from "../src/lib/taxonomy/domains";
import { loadTaxonomyTable, taxonomyTableSchema } from "../src/lib/taxonomy/table";
import { registry } from "./fixtures/records";

const { expertise, credential, demographics, speaking_format } = registry.classifiers;

describe("taxonomy tables", () => {
  it("loads every domain at the configured version", () => {
    for (const domain of TAXONOMY_DOMAINS) {
      const table = loadTaxonomyTable(domain);
      expect(table.domain).toBe(domain);
      expect(table.version).toBe("2024.06");
    }
  });

  it("rejects a category whose parent is not declared", () => {
    const result = taxonomyTableSchema.safeParse({
      domain: "expertise",
      version: "test",
      categories: [{ code: "child", displayName: "Child", parent: "missing", aliases: ["child"] }],
    });
    expect(result.success).toBe(false);
  });

  it("refuses tables at a different version", () => {
    expect(() => createTaxonomyRegistry({ version: "1999.01" })).toThrow(/configured version is 1999.01/);
  });
});

describe("TaxonomyClassifier", () => {
  it("maps alias spellings onto the same primary category", () => {
    for (const term of ["AI", "Artificial Intelligence", "artificial intelligence"]) {
      const result = expertise.classify([term]);
      expect(result.primaryCategories).toEqual(["artificial_intelligence"]);
      expect(result.parentCategories).toEqual(["technology"]);
    }
  });

  it("is order independent and idempotent over its original terms", () => {
    const terms = ["Leadership", "AI", "Underwater Basket Weaving", "Cloud Computing"];
    const result = expertise.classify(terms);

    expect(expertise.classify([...terms].reverse())).toEqual(result);
    expect(expertise.classify(result.originalTerms)).toEqual(result);
  });

  it("keeps unresolved terms out of the category sets", () => {
    const result = expertise.classify(["Underwater Basket Weaving"]);

    expect(result.primaryCategories).toEqual([]);
    expect(result.secondaryCategories).toEqual([]);
    expect(result.originalTerms).toEqual(["Underwater Basket Weaving"]);
    expect(result.keywords).toEqual(["basket", "underwater", "weaving"]);
  });

  it("resolves a longer phrase by containment", () => {
    const result = expertise.classify(["Leadership Development for Executives"]);

    expect(result.primaryCategories).toEqual(["leadership"]);
    expect(result.parentCategories).toEqual(["business"]);
  });

  it("falls back to word decomposition as a secondary category", () => {
    const result = expertise.classify(["AI and ML"]);

    expect(result.primaryCategories).toEqual([]);
    expect(result.secondaryCategories).toEqual(["artificial_intelligence"]);
    expect(result.keywords).toEqual(["ai", "ml"]);
  });

  it("returns an empty result for an empty term list", () => {
    expect(expertise.classify([])).toEqual(emptyCategoryResult());
  });

  it("normalizes degree spellings to one credential code", () => {
    expect(credential.classify(["Ph.D."]).primaryCategories).toEqual(["PhD"]);
    expect(credential.classify(["PhD"]).primaryCategories).toEqual(["PhD"]);
    expect(credential.classify(["PhD in Physics"]).primaryCategories).toEqual(["PhD"]);
    expect(credential.classify(["PhD"]).parentCategories).toEqual(["doctorate"]);
  });

  it("classifies speaking formats", () => {
    const result = speaking_format.classify(["Keynote", "Workshops", "Panel discussion"]);

    expect(result.primaryCategories).toEqual(["keynote", "workshop", "panel"]);
    expect(result.parentCategories).toEqual(["in_person"]);
  });

  it("scans biography text into research areas only", () => {
    const result = expertise.classify(
      ["Leadership"],
      "Her research covers machine learning and public health.",
    );

    expect(result.primaryCategories).toEqual(["leadership"]);
    expect(result.researchAreas).toEqual(
      expect.arrayContaining(["artificial_intelligence", "public_health"]),
    );
    expect(result.secondaryCategories).toEqual([]);
  });

  it("reads demographics only from explicit self-description", () => {
    const result = demographics.classify([], "She mentors women founders. I am a veteran of the US Navy.");

    expect(result.primaryCategories).toEqual(["veteran"]);
    expect(result.originalTerms).toEqual(["veteran"]);
    expect(result.parentCategories).toEqual(["identity"]);
  });

  it("maps stated pronouns", () => {
    expect(demographics.classify(["they/them"]).primaryCategories).toEqual(["they_them"]);
  });
});
