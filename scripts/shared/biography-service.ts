import type {
  PersonCard,
  PersonProfile,
  PersonSummary,
} from "@/lib/biography-schema";
import { getDailyNames, getFeaturedPeople } from "@/lib/catalog";
import { describeFailure, fail, ok, type Result } from "@/lib/result";
import {
  appendChatMessage,
  chatHistory,
  type SessionState,
} from "@/lib/session";
import { extractTimeline } from "@/lib/timeline-extraction";
import { cacheKey, HOUR_MS, TtlCache } from "@/lib/ttl-cache";
import { collectWorks } from "@/lib/works-collector";
import type { AppConfig } from "./config";
import { chatCompletion, generateText, type GroqConfig } from "./groq-client";
import type { RequestOptions } from "./http";
import {
  comparisonPrompt,
  lessonsPrompt,
  roleplaySystemPrompt,
} from "./prompts";
import { fetchQuoteOfTheDay, pickRandom } from "./quote-feed";
import {
  buildPeopleByFieldQuery,
  fetchPortraitUrl,
  runSparql,
  toPersonCards,
} from "./wikidata-client";
import {
  fetchBiography,
  fetchSummary,
  type BiographyDocument,
} from "./wikipedia-client";
import { fetchQuotes } from "./wikiquote-client";

const WIKIDATA_TTL_HOURS = 24;
const PROFILE_QUOTES = 12;
const DAILY_QUOTES = 6;

export type DailyInspiration = {
  quote: string | null;
  author: string;
  source: "feed" | "fallback";
};

export type RoleplayTurn = {
  reply: string;
  session: SessionState;
};

export type BiographyServiceOptions = {
  now?: () => number;
  random?: () => number;
};

export function createBiographyService(
  config: AppConfig,
  options: BiographyServiceOptions = {},
) {
  const request: RequestOptions = {
    userAgent: config.userAgent,
    timeoutMs: config.timeoutMs,
  };
  const groq: GroqConfig = {
    apiKey: config.groqApiKey,
    model: config.groqModel,
    timeoutMs: config.timeoutMs,
  };
  const random = options.random ?? Math.random;
  const wikiTtl = { ttlMs: config.cacheTtlHours * HOUR_MS, now: options.now };
  const wikidataTtl = { ttlMs: WIKIDATA_TTL_HOURS * HOUR_MS, now: options.now };

  const biographies = new TtlCache<BiographyDocument>(wikiTtl);
  const summaries = new TtlCache<PersonSummary>(wikiTtl);
  const quotes = new TtlCache<string[]>(wikiTtl);
  const portraits = new TtlCache<string | null>(wikidataTtl);
  const fields = new TtlCache<PersonCard[]>(wikidataTtl);

  function getSummary(name: string): Promise<Result<PersonSummary>> {
    return summaries.getOrLoad(cacheKey("summary", name), () =>
      fetchSummary(name, request),
    );
  }

  function getQuotes(name: string, maxQuotes: number): Promise<Result<string[]>> {
    return quotes.getOrLoad(cacheKey("quotes", name, maxQuotes), () =>
      fetchQuotes(name, request, maxQuotes),
    );
  }

  async function getPortrait(title: string): Promise<string | null> {
    const fromWikidata = await portraits.getOrLoad(cacheKey("portrait", title), () =>
      fetchPortraitUrl(title, request),
    );
    if (fromWikidata.ok && fromWikidata.value) return fromWikidata.value;
    if (!fromWikidata.ok) {
      console.warn(`Portrait lookup for ${title}: ${describeFailure(fromWikidata)}`);
    }

    const summary = await getSummary(title);
    return summary.ok ? summary.value.thumbnailUrl : null;
  }

  async function loadProfile(
    name: string,
    maxEvents: number = config.maxEvents,
  ): Promise<Result<PersonProfile>> {
    const biography = await biographies.getOrLoad(cacheKey("biography", name), () =>
      fetchBiography(name, request),
    );
    if (!biography.ok) return biography;

    const document = biography.value;
    const [quoteResult, portraitUrl] = await Promise.all([
      getQuotes(document.title, PROFILE_QUOTES),
      getPortrait(document.title),
    ]);

    if (!quoteResult.ok && quoteResult.reason !== "not-found") {
      console.warn(`Quotes for ${document.title}: ${describeFailure(quoteResult)}`);
    }

    const works = collectWorks(document.sections);
    if (!works.ok) {
      console.warn(`Works for ${document.title}: ${describeFailure(works)}`);
    }

    return ok({
      name: document.title,
      summary: document.summary,
      pageUrl: document.pageUrl,
      portraitUrl,
      timeline: extractTimeline(document.text, maxEvents),
      quotes: quoteResult.ok ? quoteResult.value : [],
      works: works.ok ? works.value : { sections: [] },
      worksWarning: works.ok ? null : works.message,
    });
  }

  async function exploreField(
    field: string,
    limit: number,
  ): Promise<Result<PersonCard[]>> {
    if (!field.trim()) {
      return fail("invalid-input", "A field name is required");
    }

    const query = buildPeopleByFieldQuery(field, limit);

    return fields.getOrLoad(cacheKey("field", query), async () => {
      const bindings = await runSparql(query, request);
      if (!bindings.ok) return bindings;

      const cards = toPersonCards(bindings.value);
      return cards.length > 0
        ? ok(cards)
        : fail("not-found", `No people found on Wikidata for "${field}"`);
    });
  }

  /** Summaries of the curated featured people; lookups that fail are skipped. */
  async function featuredPeople(): Promise<PersonSummary[]> {
    const names = getFeaturedPeople();
    const results = await Promise.all(names.map((name) => getSummary(name)));
    const summaries: PersonSummary[] = [];

    results.forEach((result, index) => {
      if (result.ok) {
        summaries.push(result.value);
      } else {
        console.warn(`Featured ${names[index]}: ${describeFailure(result)}`);
      }
    });

    return summaries;
  }

  async function dailyInspiration(): Promise<DailyInspiration> {
    const featured = await fetchQuoteOfTheDay(request);
    if (featured.ok && featured.value.author) {
      return {
        quote: featured.value.quote,
        author: featured.value.author,
        source: "feed",
      };
    }
    if (!featured.ok) {
      console.warn(`Quote of the day: ${describeFailure(featured)}`);
    }

    const author = pickRandom(getDailyNames(), random) ?? "Anonymous";
    const authorQuotes = await getQuotes(author, DAILY_QUOTES);

    return {
      quote: authorQuotes.ok ? pickRandom(authorQuotes.value, random) ?? null : null,
      author,
      source: "fallback",
    };
  }

  async function lessonsFrom(name: string): Promise<Result<string>> {
    const summary = await getSummary(name);
    if (!summary.ok) return summary;

    return generateText(groq, lessonsPrompt(summary.value.title, summary.value.extract));
  }

  async function comparePeople(
    firstName: string,
    secondName: string,
  ): Promise<Result<string>> {
    const [first, second] = await Promise.all([
      getSummary(firstName),
      getSummary(secondName),
    ]);
    if (!first.ok) return first;
    if (!second.ok) return second;

    return generateText(
      groq,
      comparisonPrompt(
        { name: first.value.title, summary: first.value.extract },
        { name: second.value.title, summary: second.value.extract },
      ),
    );
  }

  /**
   * Sends one role-play message. Both turns are appended to the returned
   * session only when the reply succeeds.
   */
  async function roleplayReply(
    session: SessionState,
    name: string,
    message: string,
  ): Promise<Result<RoleplayTurn>> {
    const summary = await getSummary(name);
    if (!summary.ok) return summary;

    const reply = await chatCompletion(
      groq,
      [
        {
          role: "system",
          content: roleplaySystemPrompt(summary.value.title, summary.value.extract),
        },
        ...chatHistory(session, name),
        { role: "user", content: message },
      ],
      { temperature: 0.7, maxTokens: 400 },
    );
    if (!reply.ok) return reply;

    const withQuestion = appendChatMessage(session, name, {
      role: "user",
      content: message,
    });

    return ok({
      reply: reply.value,
      session: appendChatMessage(withQuestion, name, {
        role: "assistant",
        content: reply.value,
      }),
    });
  }

  return {
    loadProfile,
    searchPerson: getSummary,
    exploreField,
    featuredPeople,
    dailyInspiration,
    lessonsFrom,
    comparePeople,
    roleplayReply,
  };
}

export type BiographyService = ReturnType<typeof createBiographyService>;
