import { XMLParser } from "fast-xml-parser";
import { z } from "zod";

import { fail, ok, type Result } from "@/lib/result";
import { fetchText, type RequestOptions } from "./http";

export const QUOTE_OF_THE_DAY_FEED =
  "https://en.wikiquote.org/w/api.php?action=featuredfeed&feed=qotd&feedformat=atom";

export interface FeedQuote {
  quote: string;
  author: string | null;
  date: string;
  link: string;
}

const entrySchema = z.record(z.string(), z.unknown());

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  parseTagValue: false,
});

function textOf(value: unknown): string {
  if (typeof value === "string") return value;
  if (typeof value === "number") return String(value);
  if (value && typeof value === "object" && "#text" in value) {
    return textOf(value["#text"]);
  }
  return "";
}

function hrefOf(value: unknown): string {
  const links = Array.isArray(value) ? value : [value];
  for (const link of links) {
    if (link && typeof link === "object" && "@_href" in link) {
      return textOf(link["@_href"]);
    }
    if (typeof link === "string") return link;
  }
  return "";
}

function stripHtml(html: string): string {
  return html
    .replace(/<[^>]+>/g, " ")
    .replace(/&nbsp;/g, " ")
    .replace(/&amp;/g, "&")
    .replace(/&lt;/g, "<")
    .replace(/&gt;/g, ">")
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/\s+/g, " ")
    .trim();
}

function normalizeDate(dateStr: string): string {
  const d = new Date(dateStr);
  if (isNaN(d.getTime())) return dateStr;
  return d.toISOString().split("T")[0];
}

// Wikiquote signs the quote of the day as "… ~ Author ~".
function splitAttribution(text: string): { quote: string; author: string | null } {
  const match = /^(.*?)\s*~\s*([^~]+?)\s*~\s*$/.exec(text);
  if (!match) return { quote: text, author: null };
  return { quote: match[1], author: match[2] };
}

function toArray(value: unknown): unknown[] {
  if (Array.isArray(value)) return value;
  return value === undefined || value === null ? [] : [value];
}

/** Parses the quote-of-the-day Atom feed, newest entry first. */
export function parseQuoteFeed(xml: string): FeedQuote[] {
  const parsed: unknown = parser.parse(xml);
  if (!parsed || typeof parsed !== "object" || !("feed" in parsed)) {
    throw new Error("Unrecognized feed format: no Atom <feed> element found");
  }

  const feed = parsed.feed;
  const entries =
    feed && typeof feed === "object" && "entry" in feed
      ? toArray(feed.entry)
      : [];

  const quotes: FeedQuote[] = [];

  for (const entry of entries) {
    const parsedEntry = entrySchema.safeParse(entry);
    if (!parsedEntry.success) continue;

    const fields = parsedEntry.data;
    const text = stripHtml(textOf(fields.summary ?? fields.content));
    if (!text) continue;

    quotes.push({
      ...splitAttribution(text),
      date: normalizeDate(textOf(fields.updated ?? fields.published)),
      link: hrefOf(fields.link),
    });
  }

  return quotes.sort((left, right) => right.date.localeCompare(left.date));
}

export async function fetchQuoteOfTheDay(
  options: RequestOptions,
): Promise<Result<FeedQuote>> {
  const response = await fetchText(QUOTE_OF_THE_DAY_FEED, {
    ...options,
    accept: "application/atom+xml, application/xml",
  });
  if (!response.ok) return response;

  let quotes: FeedQuote[];
  try {
    quotes = parseQuoteFeed(response.value);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return fail("invalid-response", message);
  }

  const latest = quotes[0];
  return latest ? ok(latest) : fail("not-found", "Quote feed has no entries");
}

export function pickRandom<T>(
  items: readonly T[],
  random: () => number = Math.random,
): T | undefined {
  if (items.length === 0) return undefined;
  const index = Math.min(Math.floor(random() * items.length), items.length - 1);
  return items[index];
}
