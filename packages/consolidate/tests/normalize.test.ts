import { describe, expect, it } from "vitest";
import { cleanString, htmlToText, lastNameKey, mergeUnique, parsePersonName } from "../src/lib/normalize";

describe("parsePersonName", () => {
  it("separates honorifics and post-nominals", () => {
    expect(parsePersonName("Dr. Jane Smith, PhD")).toEqual({
      name: "Jane Smith",
      displayName: "Dr. Jane Smith, PhD",
      firstName: "Jane",
      lastName: "Smith",
      honorifics: ["Dr."],
      postNominals: ["PhD"],
      pronouns: null,
    });
  });

  it("pulls pronouns out of the name", () => {
    const parsed = parsePersonName("Alex Doe (they/them)");
    expect(parsed?.name).toBe("Alex Doe");
    expect(parsed?.pronouns).toBe("they/them");
  });

  it("drops generational suffixes and bare degrees", () => {
    expect(parsePersonName("Maria José García Jr.")?.name).toBe("Maria José García");
    expect(parsePersonName("Sam Lee Carter MBA")?.postNominals).toEqual(["MBA"]);
  });

  it("reorders surname-first names", () => {
    const parsed = parsePersonName("Smith, Jane");
    expect(parsed?.name).toBe("Jane Smith");
    expect(parsed?.firstName).toBe("Jane");
    expect(parsed?.lastName).toBe("Smith");
    expect(parsed?.postNominals).toEqual([]);
    expect(parsePersonName("Smith, Jane, PhD")?.postNominals).toEqual(["PhD"]);
  });

  it("keeps only credential-like comma tails", () => {
    expect(parsePersonName("Jane Smith, Keynote Speaker")?.postNominals).toEqual([]);
    expect(parsePersonName("John Smith, Jr., M.Sc.")).toMatchObject({
      name: "John Smith",
      postNominals: ["M.Sc."],
    });
  });

  it("returns null for placeholder names", () => {
    expect(parsePersonName("N/A")).toBeNull();
    expect(parsePersonName("   ")).toBeNull();
  });
});

describe("lastNameKey", () => {
  it("uses the normalized final token", () => {
    expect(lastNameKey("Maria José García")).toBe("garcia");
  });

  it("keeps letters outside the Latin alphabet", () => {
    expect(lastNameKey("Иван Петров")).toBe("петров");
    expect(lastNameKey("王 伟")).toBe("伟");
  });
});

describe("text helpers", () => {
  it("reduces html to text", () => {
    expect(htmlToText("<p>Hello</p><p>World</p>")).toBe("Hello World");
    expect(htmlToText("Plain   text")).toBe("Plain text");
  });

  it("treats placeholder strings as missing", () => {
    expect(cleanString(" TBD ")).toBeNull();
    expect(cleanString(" Keynote ")).toBe("Keynote");
  });

  it("merges lists into a sorted set", () => {
    expect(mergeUnique(["b", "a"], ["c", "a", " "])).toEqual(["a", "b", "c"]);
  });
});
