import { describe, expect, it } from "vitest";
import { categorizeFee, parseFee } from "../src/lib/fee";

describe("parseFee", () => {
  it("parses a dollar range", () => {
    expect(parseFee("$10,000 - $20,000")).toEqual({
      min: 10000,
      max: 20000,
      currency: "USD",
      display: "$10,000 - $20,000",
      bracket: "10k_20k",
    });
  });

  it("parses an upper bound", () => {
    expect(parseFee("Under $5k")).toEqual({
      min: null,
      max: 5000,
      currency: "USD",
      display: "Under $5k",
      bracket: "under_5k",
    });
  });

  it("parses an open lower bound", () => {
    const fee = parseFee("£30,000+");
    expect(fee?.min).toBe(30000);
    expect(fee?.max).toBeNull();
    expect(fee?.currency).toBe("GBP");
    expect(fee?.bracket).toBe("30k_50k");
    expect(parseFee("$150,000 and above")?.bracket).toBe("over_100k");
  });

  it("marks fees on request", () => {
    expect(parseFee("Please inquire")?.bracket).toBe("inquire");
  });

  it("returns null for missing or unreadable text", () => {
    expect(parseFee("TBD")).toBeNull();
    expect(parseFee("varied")).toBeNull();
    expect(parseFee(null)).toBeNull();
  });
});

describe("categorizeFee", () => {
  it("uses the range midpoint", () => {
    expect(categorizeFee(20000, 30000)).toBe("20k_30k");
    expect(categorizeFee(40000, 60000)).toBe("50k_100k");
  });
});
