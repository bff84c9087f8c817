import { z } from "zod";

import type { WorkSection, WorksCollection } from "@/lib/biography-schema";
import { fail, ok, type Result } from "@/lib/result";

export const WORK_KEYWORDS = [
  "works",
  "books",
  "bibliography",
  "publications",
  "selected works",
] as const;

export const DEFAULT_MAX_WORK_SECTIONS = 500;

// Children are validated only when their parent matches, so an unmatched
// branch is never read.
const shallowSectionSchema = z.object({
  title: z.string(),
  body: z.string().nullish(),
  subsections: z.array(z.unknown()).nullish(),
});

const shallowSectionListSchema = z.array(shallowSectionSchema);

type ShallowSection = z.infer<typeof shallowSectionSchema>;

export type CollectWorksOptions = {
  keywords?: readonly string[];
  maxSections?: number;
};

function matchesKeyword(title: string, keywords: readonly string[]): boolean {
  const normalizedTitle = title.toLowerCase();
  return keywords.some((keyword) =>
    normalizedTitle.includes(keyword.toLowerCase()),
  );
}

function toWorkSection(heading: string, section: ShallowSection): WorkSection {
  return { heading, content: (section.body ?? "").trim() };
}

function formatIssue(error: z.ZodError, path: string): string {
  const issue = error.issues[0];
  const where = [path, ...(issue?.path ?? [])].filter((part) => part !== "").join(".");
  return `${where || "document"}: ${issue?.message ?? error.message}`;
}

/**
 * Flattens the "works"-like sections of a biography into heading/content
 * pairs in document order. Every direct child of a matched section is
 * included under a "Parent → Child" heading whatever its own title; the
 * children of unmatched sections are never looked at. Grandchildren are
 * not visited.
 *
 * A malformed record fails the whole call: callers get either the full
 * collection or none of it.
 */
export function collectWorks(
  sections: unknown,
  options: CollectWorksOptions = {},
): Result<WorksCollection> {
  const keywords = options.keywords ?? WORK_KEYWORDS;
  const maxSections = options.maxSections ?? DEFAULT_MAX_WORK_SECTIONS;

  if (sections === null || sections === undefined) {
    return ok({ sections: [] });
  }

  const topLevel = shallowSectionListSchema.safeParse(sections);
  if (!topLevel.success) {
    return fail("malformed-document", formatIssue(topLevel.error, "sections"));
  }

  const collected: WorkSection[] = [];

  for (const [index, section] of topLevel.data.entries()) {
    if (collected.length >= maxSections) break;
    if (!matchesKeyword(section.title, keywords)) continue;

    const children = shallowSectionListSchema.safeParse(
      section.subsections ?? [],
    );
    if (!children.success) {
      return fail(
        "malformed-document",
        formatIssue(children.error, `sections.${index}.subsections`),
      );
    }

    collected.push(toWorkSection(section.title, section));

    for (const child of children.data) {
      if (collected.length >= maxSections) break;
      collected.push(toWorkSection(`${section.title} → ${child.title}`, child));
    }
  }

  return ok({ sections: collected });
}
