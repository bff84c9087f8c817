import type { Timeline, TimelineEvent } from "@/lib/biography-schema";

export const DEFAULT_MAX_EVENTS = 10;
export const CARD_MAX_EVENTS = 8;

const SENTENCE_BOUNDARY = /(?<=[.?!])\s+/;
const YEAR_PATTERN = /\b(1[89]\d{2}|20\d{2})\b/g;

export type YearMention = {
  year: number;
  sentence: string;
};

/**
 * Finds every 18xx/19xx/20xx year in the text and pairs it with the
 * sentence it appeared in. A sentence naming three years yields three
 * mentions; de-duplication is left to {@link buildTimeline}.
 */
export function extractYearEvents(text: unknown): YearMention[] {
  if (typeof text !== "string" || !text) {
    return [];
  }

  const mentions: YearMention[] = [];

  for (const rawSentence of text.split(SENTENCE_BOUNDARY)) {
    const sentence = rawSentence.trim();
    if (!sentence) continue;

    for (const match of sentence.matchAll(YEAR_PATTERN)) {
      mentions.push({ year: Number(match[1]), sentence });
    }
  }

  return mentions;
}

export function buildTimeline(
  mentions: YearMention[],
  maxEvents: number,
): Timeline {
  const cap = Math.floor(maxEvents);
  if (!Number.isFinite(cap) || cap <= 0) {
    return { events: [] };
  }

  // Array.prototype.sort is stable, so equal years keep input order.
  const sorted = [...mentions].sort((left, right) => left.year - right.year);
  const seen = new Set<string>();
  const events: TimelineEvent[] = [];

  for (const mention of sorted) {
    if (events.length >= cap) break;
    if (seen.has(mention.sentence)) continue;

    seen.add(mention.sentence);
    events.push({ year: mention.year, text: mention.sentence });
  }

  return { events };
}

export function extractTimeline(
  text: unknown,
  maxEvents: number = DEFAULT_MAX_EVENTS,
): Timeline {
  return buildTimeline(extractYearEvents(text), maxEvents);
}
