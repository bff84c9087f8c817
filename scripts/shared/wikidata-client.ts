import { z } from "zod";

import type { PersonCard } from "@/lib/biography-schema";
import { getFieldKeywords } from "@/lib/catalog";
import { ok, type Result } from "@/lib/result";
import { fetchJson, type RequestOptions } from "./http";

const SPARQL_ENDPOINT = "https://query.wikidata.org/sparql";

export const MIN_FIELD_LIMIT = 1;
export const MAX_FIELD_LIMIT = 60;

const bindingValueSchema = z.object({
  type: z.string(),
  value: z.string(),
});

const sparqlResponseSchema = z.object({
  results: z.object({
    bindings: z.array(z.record(z.string(), bindingValueSchema)),
  }),
});

export type SparqlBinding = Record<string, z.infer<typeof bindingValueSchema>>;

export function escapeSparqlString(value: string): string {
  return value
    .replace(/\\/g, "\\\\")
    .replace(/"/g, '\\"')
    .replace(/\n/g, "\\n")
    .replace(/\r/g, "\\r");
}

export function clampLimit(limit: number): number {
  if (!Number.isFinite(limit)) return MAX_FIELD_LIMIT;
  return Math.min(MAX_FIELD_LIMIT, Math.max(MIN_FIELD_LIMIT, Math.floor(limit)));
}

/**
 * Humans whose occupation label contains any keyword mapped to `field`,
 * with optional English description and portrait.
 */
export function buildPeopleByFieldQuery(field: string, limit: number): string {
  const keywords = getFieldKeywords(field);
  if (keywords.length === 0) {
    throw new Error("buildPeopleByFieldQuery needs a non-blank field");
  }

  const filterClause = keywords
    .map(
      (keyword) =>
        `CONTAINS(LCASE(STR(?occLabel)), "${escapeSparqlString(keyword.toLowerCase())}")`,
    )
    .join(" || ");

  return `SELECT DISTINCT ?person ?personLabel ?description ?image WHERE {
  ?person wdt:P31 wd:Q5;
          wdt:P106 ?occ.
  ?occ rdfs:label ?occLabel FILTER(LANG(?occLabel) = "en").
  FILTER(${filterClause})
  OPTIONAL { ?person wdt:P18 ?image. }
  OPTIONAL { ?person schema:description ?description FILTER(LANG(?description) = "en"). }
  SERVICE wikibase:label { bd:serviceParam wikibase:language "en". }
}
LIMIT ${clampLimit(limit)}`;
}

export function buildPortraitQuery(name: string): string {
  return `SELECT ?image WHERE {
  ?person rdfs:label "${escapeSparqlString(name.trim())}"@en.
  ?person wdt:P18 ?image.
}
LIMIT 1`;
}

export async function runSparql(
  query: string,
  options: RequestOptions,
): Promise<Result<SparqlBinding[]>> {
  const params = new URLSearchParams({ query, format: "json" });
  const response = await fetchJson(
    `${SPARQL_ENDPOINT}?${params}`,
    sparqlResponseSchema,
    { ...options, accept: "application/sparql-results+json" },
  );
  if (!response.ok) return response;

  return ok(response.value.results.bindings);
}

function isUrl(value: string | undefined): value is string {
  return value !== undefined && /^https?:\/\//.test(value);
}

export function toPersonCards(bindings: SparqlBinding[]): PersonCard[] {
  const seen = new Set<string>();
  const cards: PersonCard[] = [];

  for (const binding of bindings) {
    const name = binding.personLabel?.value ?? "Unknown";
    const key = binding.person?.value ?? name;
    if (seen.has(key)) continue;
    seen.add(key);

    const image = binding.image?.value;
    cards.push({
      name,
      description: binding.description?.value ?? "",
      imageUrl: isUrl(image) ? image : null,
    });
  }

  return cards;
}

export async function fetchPortraitUrl(
  name: string,
  options: RequestOptions,
): Promise<Result<string | null>> {
  const response = await runSparql(buildPortraitQuery(name), options);
  if (!response.ok) return response;

  const image = response.value[0]?.image?.value;
  return ok(isUrl(image) ? image : null);
}
