import { describe, expect, it } from "vitest";

import type { Section } from "@/lib/biography-schema";
import { collectWorks, WORK_KEYWORDS } from "@/lib/works-collector";

function section(
  title: string,
  body = "",
  subsections: Section[] = [],
): Section {
  return { title, body, subsections };
}

describe("collectWorks", () => {
  it("collects a matched section and its direct children in document order", () => {
    const result = collectWorks([
      section("Early Life", "Born somewhere."),
      section("Selected Works", "X", [section("1990s", "Y")]),
      section("Legacy", "Remembered."),
    ]);

    expect(result).toEqual({
      ok: true,
      value: {
        sections: [
          { heading: "Selected Works", content: "X" },
          { heading: "Selected Works → 1990s", content: "Y" },
        ],
      },
    });
  });

  it("never inspects the children of an unmatched section", () => {
    const result = collectWorks([
      section("Personal Life", "", [section("Bibliography", "Z")]),
    ]);

    expect(result).toEqual({ ok: true, value: { sections: [] } });
  });

  it("matches titles case-insensitively as substrings", () => {
    const result = collectWorks([
      section("BIBLIOGRAPHY", "a"),
      section("Selected Works and Publications", "b"),
      section("Frameworks", "c"),
      section("Notebooks", "d"),
      section("Career", "e"),
    ]);

    expect(result.ok && result.value.sections.map((s) => s.heading)).toEqual([
      "BIBLIOGRAPHY",
      "Selected Works and Publications",
      "Frameworks",
      "Notebooks",
    ]);
  });

  it("includes every direct child whatever its title", () => {
    const result = collectWorks([
      section("Works", "", [
        section("Novels", " Three novels. "),
        section("Personal letters", "Letters."),
      ]),
    ]);

    expect(result.ok && result.value.sections).toEqual([
      { heading: "Works", content: "" },
      { heading: "Works → Novels", content: "Three novels." },
      { heading: "Works → Personal letters", content: "Letters." },
    ]);
  });

  it("does not descend to grandchildren", () => {
    const result = collectWorks([
      section("Books", "top", [
        section("Fiction", "mid", [section("Short stories", "deep")]),
      ]),
    ]);

    expect(result.ok && result.value.sections).toEqual([
      { heading: "Books", content: "top" },
      { heading: "Books → Fiction", content: "mid" },
    ]);
  });

  it("uses an empty string for absent or null bodies", () => {
    const result = collectWorks([
      { title: "Publications" },
      { title: "Works", body: null, subsections: [{ title: "Essays" }] },
    ]);

    expect(result.ok && result.value.sections).toEqual([
      { heading: "Publications", content: "" },
      { heading: "Works", content: "" },
      { heading: "Works → Essays", content: "" },
    ]);
  });

  it("returns an empty collection for empty or absent input", () => {
    expect(collectWorks([])).toEqual({ ok: true, value: { sections: [] } });
    expect(collectWorks(undefined)).toEqual({ ok: true, value: { sections: [] } });
    expect(collectWorks(null)).toEqual({ ok: true, value: { sections: [] } });
  });

  it("fails the whole call on a malformed matched child", () => {
    const result = collectWorks([
      section("Works", "fine", [section("Novels", "ok")]),
      { title: "Bibliography", body: "b", subsections: [{ title: 42 }] },
    ]);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.reason).toBe("malformed-document");
      expect(result.message).toContain("sections.1.subsections.0.title");
    }
  });

  it("fails when the top-level list is not a list of sections", () => {
    const notAList = collectWorks({ title: "Works" });
    const badTitle = collectWorks([{ body: "no title" }]);

    expect(notAList.ok).toBe(false);
    expect(badTitle.ok).toBe(false);
    if (!badTitle.ok) {
      expect(badTitle.reason).toBe("malformed-document");
    }
  });

  it("ignores malformed children of unmatched sections", () => {
    const result = collectWorks([
      { title: "Early life", subsections: [{ title: 7 }, "junk"] },
      section("Works", "w"),
    ]);

    expect(result).toEqual({
      ok: true,
      value: { sections: [{ heading: "Works", content: "w" }] },
    });
  });

  it("accepts a custom keyword list", () => {
    const result = collectWorks(
      [section("Filmography", "films"), section("Works", "w")],
      { keywords: ["filmography"] },
    );

    expect(result.ok && result.value.sections).toEqual([
      { heading: "Filmography", content: "films" },
    ]);
  });

  it("stops emitting at maxSections", () => {
    const result = collectWorks(
      [
        section("Works", "w", [section("A", "a"), section("B", "b")]),
        section("Books", "b"),
      ],
      { maxSections: 2 },
    );

    expect(result.ok && result.value.sections.map((s) => s.heading)).toEqual([
      "Works",
      "Works → A",
    ]);
  });

  it("exposes the default keywords", () => {
    expect(WORK_KEYWORDS).toEqual([
      "works",
      "books",
      "bibliography",
      "publications",
      "selected works",
    ]);
  });
});
