import { z } from "zod";

import { fail, ok, type Result } from "@/lib/result";
import { fetchJson, type RequestOptions } from "./http";
import { toPageTitle } from "./wikipedia-client";

const WIKIQUOTE_API = "https://en.wikiquote.org/w/api.php";

export const DEFAULT_MAX_QUOTES = 12;
const MIN_QUOTE_LENGTH = 12;

// Sections after which bullets are no longer the subject's own words.
const STOP_SECTION =
  /^={2,}\s*(quotes about|about\b|disputed|misattributed|see also|external links|references|sources|notes)/i;

const parseResponseSchema = z.object({
  parse: z.object({
    title: z.string(),
    wikitext: z.string(),
  }),
});

const apiErrorSchema = z.object({
  error: z.object({ code: z.string(), info: z.string() }),
});

export function cleanWikitext(line: string): string {
  return line
    .replace(/<ref[^>]*\/>/gi, "")
    .replace(/<ref[^>]*>[\s\S]*?<\/ref>/gi, "")
    .replace(/<br\s*\/?>/gi, " ")
    .replace(/<[^>]+>/g, "")
    .replace(/\{\{[^{}]*\}\}/g, "")
    .replace(/\[\[(?:[^|\]]*\|)?([^\]]+)\]\]/g, "$1")
    .replace(/\[https?:\/\/\S+\s+([^\]]+)\]/g, "$1")
    .replace(/\[https?:\/\/\S+\]/g, "")
    .replace(/'{2,}/g, "")
    .replace(/&nbsp;/gi, " ")
    .replace(/&quot;/gi, '"')
    .replace(/&amp;/gi, "&")
    .replace(/\s{2,}/g, " ")
    .trim();
}

/**
 * Pulls the subject's own quotes from a Wikiquote page: first-level
 * `* ` bullets only (deeper bullets are sourcing notes), up to the first
 * "quotes about"/"disputed"/"see also"-style section.
 */
export function extractQuotesFromWikitext(
  wikitext: string,
  maxQuotes: number = DEFAULT_MAX_QUOTES,
): string[] {
  const quotes: string[] = [];
  if (maxQuotes <= 0) return quotes;

  for (const line of wikitext.split(/\r?\n/)) {
    if (STOP_SECTION.test(line.trim())) break;
    if (!/^\*(?!\*)/.test(line)) continue;

    const quote = cleanWikitext(line.replace(/^\*\s*/, ""));
    if (quote.length < MIN_QUOTE_LENGTH || quotes.includes(quote)) continue;

    quotes.push(quote);
    if (quotes.length >= maxQuotes) break;
  }

  return quotes;
}

export async function fetchQuotes(
  name: string,
  options: RequestOptions,
  maxQuotes: number = DEFAULT_MAX_QUOTES,
): Promise<Result<string[]>> {
  const params = new URLSearchParams({
    action: "parse",
    format: "json",
    formatversion: "2",
    prop: "wikitext",
    redirects: "1",
    page: toPageTitle(name),
  });

  const response = await fetchJson(
    `${WIKIQUOTE_API}?${params}`,
    z.union([parseResponseSchema, apiErrorSchema]),
    options,
  );
  if (!response.ok) return response;

  if ("error" in response.value) {
    const { code, info } = response.value.error;
    return code === "missingtitle"
      ? fail("not-found", `No Wikiquote page for "${name}"`)
      : fail("invalid-response", `Wikiquote error ${code}: ${info}`);
  }

  return ok(extractQuotesFromWikitext(response.value.parse.wikitext, maxQuotes));
}
