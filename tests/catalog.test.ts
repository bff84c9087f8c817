import { describe, expect, it } from "vitest";

import {
  getDailyNames,
  getFeaturedPeople,
  getFieldKeywords,
  getFields,
} from "@/lib/catalog";

describe("catalog", () => {
  it("lists the browsable fields", () => {
    expect(getFields()).toEqual([
      "Technology",
      "Business",
      "Science",
      "Philosophy",
      "Arts",
      "Sports",
      "Politics",
      "Young Achievers",
    ]);
  });

  it("looks up field keywords case-insensitively", () => {
    expect(getFieldKeywords("  philosophy ")).toEqual([
      "philosopher",
      "moral philosopher",
    ]);
  });

  it("searches for an unknown field by its own name", () => {
    expect(getFieldKeywords(" Astronomy ")).toEqual(["astronomy"]);
  });

  it("has no keywords for a blank field", () => {
    expect(getFieldKeywords("   ")).toEqual([]);
  });

  it("starts the daily rotation with its first curated name", () => {
    expect(getDailyNames()[0]).toBe("Nelson Mandela");
    expect(getDailyNames()).toHaveLength(12);
  });

  it("lists featured people once each", () => {
    const featured = getFeaturedPeople();
    expect(new Set(featured).size).toBe(featured.length);
    expect(featured).toContain("Greta Thunberg");
  });
});
