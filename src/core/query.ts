/**
 * Query validation
 *
 * Queries are checked before any backend call; a rejected query never reaches the router.
 */

import { z } from "zod";
import type { SearchQuery } from "./types";
import { QueryValidationError } from "./types";

/** Maximum query length, in Unicode code points */
export const MAX_QUERY_LENGTH = 1000;

/** Upper bound for a requested result count */
export const MAX_RESULT_LIMIT = 50;

export const SearchFiltersSchema = z
  .object({
    category: z.string().min(1).optional(),
    language: z.string().min(1).optional(),
    timeRange: z.enum(["day", "week", "month", "year"]).optional(),
    limit: z.number().int().positive().max(MAX_RESULT_LIMIT).optional(),
  })
  .strict();

export const SearchQuerySchema = z.object({
  text: z
    .string()
    // Measured as given, surrounding whitespace included
    .refine((value) => [...value].length <= MAX_QUERY_LENGTH, {
      message: `query must be at most ${MAX_QUERY_LENGTH} characters`,
    })
    .transform((value) => value.trim())
    .refine((value) => value.length > 0, { message: "query must not be empty" }),
  filters: SearchFiltersSchema.optional(),
  complexity: z.enum(["simple", "medium", "complex"]).optional(),
});

/**
 * Validate raw input into an immutable SearchQuery
 *
 * Accepts either a bare query string or a query object.
 * @throws QueryValidationError listing every issue found
 */
export function parseQuery(input: unknown): SearchQuery {
  const candidate = typeof input === "string" ? { text: input } : input;
  const result = SearchQuerySchema.safeParse(candidate);

  if (!result.success) {
    throw new QueryValidationError(
      result.error.issues.map((issue) => {
        const path = issue.path.join(".");
        return path ? `${path}: ${issue.message}` : issue.message;
      }),
    );
  }

  const { text, filters, complexity } = result.data;
  return Object.freeze({
    text,
    ...(filters ? { filters: Object.freeze({ ...filters }) } : {}),
    ...(complexity ? { complexity } : {}),
  });
}
