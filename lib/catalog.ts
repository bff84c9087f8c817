import rawFieldKeywords from "@/data/field-keywords.json";
import rawPeople from "@/data/people.json";
import { z } from "zod";

const fieldKeywordsSchema = z.record(
  z.string().min(1),
  z.array(z.string().min(1)).min(1),
);

const peopleSchema = z.object({
  daily: z.array(z.string().min(1)).min(1),
  featured: z.array(z.string().min(1)),
});

const parsedFieldKeywords = fieldKeywordsSchema.safeParse(rawFieldKeywords);

if (!parsedFieldKeywords.success) {
  throw new Error(
    `Invalid field keyword data: ${parsedFieldKeywords.error.message}`,
  );
}

const parsedPeople = peopleSchema.safeParse(rawPeople);

if (!parsedPeople.success) {
  throw new Error(`Invalid people data: ${parsedPeople.error.message}`);
}

const fieldKeywords = parsedFieldKeywords.data;
const people = parsedPeople.data;

export function getFields(): string[] {
  return Object.keys(fieldKeywords);
}

/**
 * Occupation keywords for a field; unknown fields search for their own name.
 * A blank field has no keywords.
 */
export function getFieldKeywords(field: string): string[] {
  if (!field.trim()) return [];

  const match = Object.keys(fieldKeywords).find(
    (known) => known.toLowerCase() === field.trim().toLowerCase(),
  );
  return match ? fieldKeywords[match] : [field.trim().toLowerCase()];
}

export function getDailyNames(): string[] {
  return people.daily;
}

export function getFeaturedPeople(): string[] {
  return [...new Set(people.featured)];
}
