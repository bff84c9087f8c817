import { afterEach, describe, expect, it, vi } from "vitest";

import {
  cleanWikitext,
  extractQuotesFromWikitext,
  fetchQuotes,
} from "../scripts/shared/wikiquote-client";

const request = { userAgent: "luminaries-test/1.0", timeoutMs: 1_000 };

const WIKITEXT = `{{Wikipedia}}
'''Jane Doe''' (1850–1920) was a writer.

== Quotes ==
* I write because I must.
** Letter to a friend (1881)
* The [[sea|ocean]] is '''patient'''.<ref>Some book</ref>
* {{cite}}Short
* I write because I must.

== Quotes about Jane Doe ==
* She was wonderful and so kind.`;

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("cleanWikitext", () => {
  it("strips links, emphasis, templates and references", () => {
    expect(
      cleanWikitext(
        "The [[sea|ocean]] and [[Paris]] are '''big'''{{citation needed}}.<ref name=\"a\">x</ref>",
      ),
    ).toBe("The ocean and Paris are big.");
  });

  it("keeps the label of external links", () => {
    expect(cleanWikitext("See [https://example.org the notes] here")).toBe(
      "See the notes here",
    );
  });

  it("turns line breaks and entities into text", () => {
    expect(cleanWikitext("One<br />two&nbsp;&amp; three")).toBe("One two & three");
  });
});

describe("extractQuotesFromWikitext", () => {
  it("keeps first-level bullets until a quotes-about section", () => {
    expect(extractQuotesFromWikitext(WIKITEXT)).toEqual([
      "I write because I must.",
      "The ocean is patient.",
    ]);
  });

  it("respects the quote limit", () => {
    expect(extractQuotesFromWikitext(WIKITEXT, 1)).toEqual([
      "I write because I must.",
    ]);
    expect(extractQuotesFromWikitext(WIKITEXT, 0)).toEqual([]);
  });

  it("stops at disputed and misattributed sections", () => {
    const wikitext = `* A genuine remark, twelve plus.
== Disputed ==
* A doubtful remark, twelve plus.`;

    expect(extractQuotesFromWikitext(wikitext)).toEqual([
      "A genuine remark, twelve plus.",
    ]);
  });
});

describe("fetchQuotes", () => {
  it("parses the page wikitext", async () => {
    const fetchMock = vi.fn().mockResolvedValue(
      new Response(
        JSON.stringify({ parse: { title: "Jane Doe", wikitext: WIKITEXT } }),
      ),
    );
    vi.stubGlobal("fetch", fetchMock);

    const result = await fetchQuotes("Jane Doe", request, 5);

    expect(result).toEqual({
      ok: true,
      value: ["I write because I must.", "The ocean is patient."],
    });
    const url = new URL(String(fetchMock.mock.calls[0][0]));
    expect(url.host).toBe("en.wikiquote.org");
    expect(url.searchParams.get("page")).toBe("Jane_Doe");
  });

  it("maps a missing page to not-found", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn().mockResolvedValue(
        new Response(
          JSON.stringify({
            error: { code: "missingtitle", info: "The page you specified doesn't exist." },
          }),
        ),
      ),
    );

    const result = await fetchQuotes("Nobody", request);

    expect(result).toEqual({
      ok: false,
      reason: "not-found",
      message: 'No Wikiquote page for "Nobody"',
    });
  });

  it("reports other API errors as invalid responses", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn().mockResolvedValue(
        new Response(
          JSON.stringify({ error: { code: "ratelimited", info: "Slow down" } }),
        ),
      ),
    );

    const result = await fetchQuotes("Jane Doe", request);

    expect(result).toEqual({
      ok: false,
      reason: "invalid-response",
      message: "Wikiquote error ratelimited: Slow down",
    });
  });
});
