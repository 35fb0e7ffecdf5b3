/**
 * Provider API Response Types
 *
 * zod schemas for external search provider API responses. Responses are parsed
 * through these before use; a mismatch surfaces as a "malformed" backend error.
 * Unknown fields are kept out of the parsed value.
 */

import { z } from "zod";

const optionalString = z.string().nullish();

// ============ SearXNG API Types ============

export const SearxngSearchResultSchema = z.object({
  title: optionalString,
  url: z.string().nullish(),
  content: optionalString,
  description: optionalString,
  score: z.number().nullish(),
  engine: optionalString,
  engines: z.array(z.string()).nullish(),
  category: optionalString,
});

export const SearxngInfoboxSchema = z.object({
  infobox: optionalString,
  id: optionalString,
  content: optionalString,
  engine: optionalString,
  urls: z.array(z.object({ title: optionalString, url: optionalString })).nullish(),
});

export const SearxngApiResponseSchema = z.object({
  query: optionalString,
  results: z.array(SearxngSearchResultSchema),
  number_of_results: z.number().nullish(),
  infoboxes: z.array(SearxngInfoboxSchema).nullish(),
  suggestions: z.array(z.string()).nullish(),
  unresponsive_engines: z.array(z.unknown()).nullish(),
});

export type SearxngSearchResult = z.infer<typeof SearxngSearchResultSchema>;
export type SearxngInfobox = z.infer<typeof SearxngInfoboxSchema>;
export type SearxngApiResponse = z.infer<typeof SearxngApiResponseSchema>;

// ============ DuckDuckGo Instant Answer API Types ============

export interface DuckDuckGoTopic {
  Text?: string | null;
  FirstURL?: string | null;
  /** Present on topic groups instead of Text/FirstURL */
  Name?: string | null;
  Topics?: DuckDuckGoTopic[] | null;
}

export const DuckDuckGoTopicSchema: z.ZodType<DuckDuckGoTopic> = z.lazy(() =>
  z.object({
    Text: optionalString,
    FirstURL: optionalString,
    Name: optionalString,
    Topics: z.array(DuckDuckGoTopicSchema).nullish(),
  }),
);

export const DuckDuckGoApiResponseSchema = z.object({
  Heading: optionalString,
  Abstract: optionalString,
  AbstractText: optionalString,
  AbstractURL: optionalString,
  AbstractSource: optionalString,
  RelatedTopics: z.array(DuckDuckGoTopicSchema).nullish(),
});

export type DuckDuckGoApiResponse = z.infer<typeof DuckDuckGoApiResponseSchema>;

// ============ Exa API Types ============

export const ExaSearchResultSchema = z.object({
  id: optionalString,
  title: optionalString,
  url: z.string().nullish(),
  text: optionalString,
  snippet: optionalString,
  score: z.number().nullish(),
  publishedDate: optionalString,
  author: optionalString,
});

export const ExaApiResponseSchema = z.object({
  requestId: optionalString,
  results: z.array(ExaSearchResultSchema),
});

export type ExaSearchResult = z.infer<typeof ExaSearchResultSchema>;
export type ExaApiResponse = z.infer<typeof ExaApiResponseSchema>;

// ============ Tavily API Types ============

export const TavilySearchResultSchema = z.object({
  title: optionalString,
  url: z.string().nullish(),
  content: optionalString,
  raw_content: optionalString,
  score: z.number().nullish(),
  published_date: optionalString,
});

export const TavilyApiResponseSchema = z.object({
  query: optionalString,
  answer: optionalString,
  results: z.array(TavilySearchResultSchema),
  response_time: z.union([z.number(), z.string()]).nullish(),
});

export const TavilyExtractResultSchema = z.object({
  url: z.string().nullish(),
  title: optionalString,
  raw_content: optionalString,
});

export const TavilyExtractResponseSchema = z.object({
  results: z.array(TavilyExtractResultSchema),
  failed_results: z.array(z.unknown()).nullish(),
});

export type TavilySearchResult = z.infer<typeof TavilySearchResultSchema>;
export type TavilyApiResponse = z.infer<typeof TavilyApiResponseSchema>;
export type TavilyExtractResponse = z.infer<typeof TavilyExtractResponseSchema>;
