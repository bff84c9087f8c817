import { describe, expect, it } from "vitest";

import {
  buildTimeline,
  CARD_MAX_EVENTS,
  extractTimeline,
  extractYearEvents,
  type YearMention,
} from "@/lib/timeline-extraction";

const BIOGRAPHY =
  "He was born in 1821. He studied law in 1840 and 1841. He died in 1890.";

describe("extractYearEvents", () => {
  it("returns nothing for empty or absent text", () => {
    expect(extractYearEvents("")).toEqual([]);
    expect(extractYearEvents(null)).toEqual([]);
    expect(extractYearEvents(undefined)).toEqual([]);
  });

  it("treats non-string input as no text", () => {
    expect(extractYearEvents(1821)).toEqual([]);
    expect(extractYearEvents({ text: "Born 1821." })).toEqual([]);
  });

  it("emits one mention per year, sharing the sentence", () => {
    expect(extractYearEvents(BIOGRAPHY)).toEqual([
      { year: 1821, sentence: "He was born in 1821." },
      { year: 1840, sentence: "He studied law in 1840 and 1841." },
      { year: 1841, sentence: "He studied law in 1840 and 1841." },
      { year: 1890, sentence: "He died in 1890." },
    ]);
  });

  it("splits on question and exclamation marks followed by whitespace", () => {
    const text = "Was it 1905? It was!  In 2001 she won.";
    expect(extractYearEvents(text)).toEqual([
      { year: 1905, sentence: "Was it 1905?" },
      { year: 2001, sentence: "In 2001 she won." },
    ]);
  });

  it("does not split on a period without following whitespace", () => {
    const text = "It opened in 1999.It closed in 2003.";
    expect(extractYearEvents(text)).toEqual([
      { year: 1999, sentence: text },
      { year: 2003, sentence: text },
    ]);
  });

  it("keeps the terminal punctuation and trims the sentence", () => {
    expect(extractYearEvents("  Moved in 1960.\n\nRetired in 2010.  ")).toEqual([
      { year: 1960, sentence: "Moved in 1960." },
      { year: 2010, sentence: "Retired in 2010." },
    ]);
  });

  it("ignores years outside 1800-2099 and digits inside longer numbers", () => {
    const text =
      "In 1799 and 2100 nothing happened. Population 219000 in 18500. Phone 12005 rang.";
    expect(extractYearEvents(text)).toEqual([]);
  });

  it("requires a word boundary on both sides", () => {
    expect(extractYearEvents("The 1920s were loud.")).toEqual([]);
    expect(extractYearEvents("From 1914–1918 he served.")).toEqual([
      { year: 1914, sentence: "From 1914–1918 he served." },
      { year: 1918, sentence: "From 1914–1918 he served." },
    ]);
  });
});

describe("buildTimeline", () => {
  it("keeps the earliest events of a short biography", () => {
    const timeline = buildTimeline(extractYearEvents(BIOGRAPHY), 2);

    expect(timeline.events).toEqual([
      { year: 1821, text: "He was born in 1821." },
      { year: 1840, text: "He studied law in 1840 and 1841." },
    ]);
  });

  it("returns an empty timeline for empty input", () => {
    expect(buildTimeline([], 5)).toEqual({ events: [] });
  });

  it("honours a zero or negative cap immediately", () => {
    const mentions = extractYearEvents(BIOGRAPHY);
    expect(buildTimeline(mentions, 0).events).toEqual([]);
    expect(buildTimeline(mentions, -3).events).toEqual([]);
  });

  it("rounds a fractional cap down", () => {
    const mentions = extractYearEvents(BIOGRAPHY);
    expect(buildTimeline(mentions, 2.5).events).toHaveLength(2);
    expect(buildTimeline(mentions, 0.9).events).toEqual([]);
  });

  it("keeps the first-sorted occurrence of a sentence", () => {
    const mentions: YearMention[] = [
      { year: 1950, sentence: "From 1930 to 1950 she taught." },
      { year: 1930, sentence: "From 1930 to 1950 she taught." },
    ];

    expect(buildTimeline(mentions, 5).events).toEqual([
      { year: 1930, text: "From 1930 to 1950 she taught." },
    ]);
  });

  it("keeps input order for equal years", () => {
    const mentions: YearMention[] = [
      { year: 1900, sentence: "B happened." },
      { year: 1880, sentence: "A happened." },
      { year: 1900, sentence: "C happened." },
    ];

    expect(buildTimeline(mentions, 10).events.map((event) => event.text)).toEqual([
      "A happened.",
      "B happened.",
      "C happened.",
    ]);
  });

  it("picks the earliest-year unique sentences when over the cap", () => {
    const text =
      "Won in 1990. Founded in 1850. Married in 1875. Elected in 1920. Died in 1960.";
    const timeline = extractTimeline(text, 3);

    expect(timeline.events.map((event) => event.year)).toEqual([1850, 1875, 1920]);
  });

  it("never repeats a sentence and stays in ascending order", () => {
    const text = [
      "In 1912 and 1913 she travelled.",
      "She returned in 1911.",
      "Between 1913 and 1915 and 1917 she wrote.",
      "A prize came in 1911 as well.",
    ].join(" ");
    const timeline = extractTimeline(text, 10);

    const texts = timeline.events.map((event) => event.text);
    expect(new Set(texts).size).toBe(texts.length);
    expect(timeline.events).toEqual([
      { year: 1911, text: "She returned in 1911." },
      { year: 1911, text: "A prize came in 1911 as well." },
      { year: 1912, text: "In 1912 and 1913 she travelled." },
      { year: 1913, text: "Between 1913 and 1915 and 1917 she wrote." },
    ]);
  });

  it("does not mutate its input", () => {
    const mentions: YearMention[] = [
      { year: 2000, sentence: "Late." },
      { year: 1900, sentence: "Early." },
    ];
    buildTimeline(mentions, 5);

    expect(mentions.map((mention) => mention.year)).toEqual([2000, 1900]);
  });

  it("is deterministic across calls", () => {
    const first = extractTimeline(BIOGRAPHY, 3);
    const second = extractTimeline(BIOGRAPHY, 3);

    expect(second).toEqual(first);
  });
});

describe("extractTimeline", () => {
  it("defaults to ten events", () => {
    const text = Array.from({ length: 12 }, (_, index) => `Event in ${1900 + index}.`).join(" ");

    expect(extractTimeline(text).events).toHaveLength(10);
    expect(extractTimeline(text, CARD_MAX_EVENTS).events).toHaveLength(8);
  });

  it("returns an empty timeline for absent text", () => {
    expect(extractTimeline(null)).toEqual({ events: [] });
  });
});
