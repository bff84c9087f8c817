import { z } from "zod";

import type { PersonSummary, Section } from "@/lib/biography-schema";
import { fail, ok, type Result } from "@/lib/result";
import { fetchJson, type RequestOptions } from "./http";

const REST_BASE = "https://en.wikipedia.org/api/rest_v1";
const ACTION_API = "https://en.wikipedia.org/w/api.php";

const HEADING_LINE = /^(={2,6})\s*(.+?)\s*\1\s*$/;

const restSummarySchema = z.object({
  type: z.string(),
  title: z.string().min(1),
  description: z.string().optional(),
  extract: z.string().optional(),
  thumbnail: z.object({ source: z.string().url() }).optional(),
  content_urls: z
    .object({ desktop: z.object({ page: z.string().url() }) })
    .optional(),
});

const extractResponseSchema = z.object({
  query: z.object({
    pages: z.array(
      z.object({
        title: z.string(),
        missing: z.boolean().optional(),
        invalid: z.boolean().optional(),
        extract: z.string().optional(),
        fullurl: z.string().url().optional(),
      }),
    ),
  }),
});

export type BiographyDocument = {
  title: string;
  pageUrl: string | null;
  text: string;
  summary: string;
  sections: Section[];
};

export function toPageTitle(name: string): string {
  return name.trim().replace(/\s+/g, "_");
}

export function titleCase(name: string): string {
  return name
    .trim()
    .split(/\s+/)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(" ");
}

/** The extract with its `== Heading ==` lines removed, for sentence-level scans. */
export function stripHeadings(extract: string): string {
  return extract
    .split(/\r?\n/)
    .filter((line) => !HEADING_LINE.test(line.trim()))
    .join("\n");
}

type SectionNode = {
  level: number;
  title: string;
  lines: string[];
  children: SectionNode[];
};

function toSection(node: SectionNode): Section {
  return {
    title: node.title,
    body: node.lines.join("\n").trim(),
    subsections: node.children.map(toSection),
  };
}

/**
 * Splits a plain-text extract with wiki-style headings (`== History ==`,
 * `=== Early years ===`) into the lead text and a section tree. A
 * heading nests under the nearest preceding heading of a lower level.
 */
export function parseSectionTree(extract: string): {
  summary: string;
  sections: Section[];
} {
  const leadLines: string[] = [];
  const roots: SectionNode[] = [];
  const stack: SectionNode[] = [];

  for (const line of extract.split(/\r?\n/)) {
    const heading = HEADING_LINE.exec(line.trim());

    if (!heading) {
      const current = stack[stack.length - 1];
      if (current) {
        current.lines.push(line);
      } else {
        leadLines.push(line);
      }
      continue;
    }

    const node: SectionNode = {
      level: heading[1].length,
      title: heading[2],
      lines: [],
      children: [],
    };

    while (stack.length > 0 && stack[stack.length - 1].level >= node.level) {
      stack.pop();
    }

    const parent = stack[stack.length - 1];
    if (parent) {
      parent.children.push(node);
    } else {
      roots.push(node);
    }
    stack.push(node);
  }

  return {
    summary: leadLines.join("\n").trim(),
    sections: roots.map(toSection),
  };
}

export async function fetchSummary(
  name: string,
  options: RequestOptions,
): Promise<Result<PersonSummary>> {
  const url = `${REST_BASE}/page/summary/${encodeURIComponent(toPageTitle(name))}`;
  const response = await fetchJson(url, restSummarySchema, options);
  if (!response.ok) return response;

  const page = response.value;
  if (page.type === "disambiguation") {
    return fail("not-found", `"${name}" is ambiguous on Wikipedia`);
  }

  return ok({
    title: page.title,
    description: page.description ?? "",
    extract: page.extract ?? "",
    thumbnailUrl: page.thumbnail?.source ?? null,
    pageUrl: page.content_urls?.desktop.page ?? null,
  });
}

async function fetchExtract(
  title: string,
  options: RequestOptions,
): Promise<Result<BiographyDocument>> {
  const params = new URLSearchParams({
    action: "query",
    format: "json",
    formatversion: "2",
    prop: "extracts|info",
    explaintext: "1",
    exsectionformat: "wiki",
    inprop: "url",
    redirects: "1",
    titles: title,
  });

  const response = await fetchJson(
    `${ACTION_API}?${params}`,
    extractResponseSchema,
    options,
  );
  if (!response.ok) return response;

  const page = response.value.query.pages[0];
  if (!page || page.missing || page.invalid || page.extract === undefined) {
    return fail("not-found", `No Wikipedia page for "${title}"`);
  }

  const { summary, sections } = parseSectionTree(page.extract);

  return ok({
    title: page.title,
    pageUrl: page.fullurl ?? null,
    text: stripHeadings(page.extract),
    summary,
    sections,
  });
}

/** Full plain-text article, retrying once with the title-cased name. */
export async function fetchBiography(
  name: string,
  options: RequestOptions,
): Promise<Result<BiographyDocument>> {
  const first = await fetchExtract(name.trim(), options);
  if (first.ok || first.reason !== "not-found") return first;

  const alternative = titleCase(name);
  if (alternative === name.trim()) return first;

  return fetchExtract(alternative, options);
}
