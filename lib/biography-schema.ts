import { z } from "zod";

export const MIN_TIMELINE_YEAR = 1800;
export const MAX_TIMELINE_YEAR = 2099;

export const timelineEventSchema = z.object({
  year: z.number().int().min(MIN_TIMELINE_YEAR).max(MAX_TIMELINE_YEAR),
  text: z.string().min(1),
});
export type TimelineEvent = z.infer<typeof timelineEventSchema>;

export const timelineSchema = z.object({
  events: z.array(timelineEventSchema),
});
export type Timeline = z.infer<typeof timelineSchema>;

export type Section = {
  title: string;
  body?: string | null;
  subsections?: Section[];
};

export const sectionSchema: z.ZodType<Section> = z.lazy(() =>
  z.object({
    title: z.string(),
    body: z.string().nullish(),
    subsections: z.array(sectionSchema).optional(),
  }),
);

export const workSectionSchema = z.object({
  heading: z.string().min(1),
  content: z.string(),
});
export type WorkSection = z.infer<typeof workSectionSchema>;

export const worksCollectionSchema = z.object({
  sections: z.array(workSectionSchema),
});
export type WorksCollection = z.infer<typeof worksCollectionSchema>;

export const personCardSchema = z.object({
  name: z.string().min(1),
  description: z.string(),
  imageUrl: z.string().url().nullable(),
});
export type PersonCard = z.infer<typeof personCardSchema>;

export const personSummarySchema = z.object({
  title: z.string().min(1),
  description: z.string(),
  extract: z.string(),
  thumbnailUrl: z.string().url().nullable(),
  pageUrl: z.string().url().nullable(),
});
export type PersonSummary = z.infer<typeof personSummarySchema>;

export type PersonProfile = {
  name: string;
  summary: string;
  pageUrl: string | null;
  portraitUrl: string | null;
  timeline: Timeline;
  quotes: string[];
  works: WorksCollection;
  worksWarning: string | null;
};
