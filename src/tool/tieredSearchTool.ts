/**
 * Main tiered-search tool function
 *
 * This is the single public interface that runs the whole search process
 */

import { bootstrapContainer } from "../bootstrap/container";
import type { TieredSearchOrchestrator } from "../core/orchestrator";
import { ServiceKeys } from "../core/serviceKeys";
import type { SearchFilters } from "../core/types";
import type { TieredSearchInput, TieredSearchOutput } from "./interface";

/**
 * Options for tieredSearch function
 */
export interface TieredSearchToolOptions {
  /** Explicit config file path */
  configPath?: string;
  /** Container override for testing (dependency injection) */
  containerOverride?: {
    get<T>(serviceId: string): T;
  };
  /** Cancels the search */
  signal?: AbortSignal;
  /** Token budget for the returned items */
  tokenBudget?: number;
}

function toFilters(input: TieredSearchInput): SearchFilters | undefined {
  const filters: SearchFilters = {
    ...(input.limit !== undefined ? { limit: input.limit } : {}),
    ...(input.category !== undefined ? { category: input.category } : {}),
    ...(input.language !== undefined ? { language: input.language } : {}),
    ...(input.timeRange !== undefined ? { timeRange: input.timeRange } : {}),
  };
  return Object.keys(filters).length > 0 ? filters : undefined;
}

/**
 * Execute a tiered search across configured providers
 *
 * This function:
 * 1. Bootstraps the DI container (or uses provided override)
 * 2. Resolves orchestrator from container
 * 3. Runs the query through routing, tiered retrieval and pruning
 * 4. Returns a plain, serializable result
 *
 * @throws QueryValidationError for an empty or oversized query
 * @throws BackendError when a backend rejects its credentials
 */
export async function tieredSearch(
  input: TieredSearchInput,
  options: TieredSearchToolOptions = {},
): Promise<TieredSearchOutput> {
  const container = options.containerOverride ?? (await bootstrapContainer(options.configPath));
  const orchestrator = container.get<TieredSearchOrchestrator>(ServiceKeys.ORCHESTRATOR);

  const filters = toFilters(input);
  const { query, routing, outcome } = await orchestrator.run(
    {
      text: input.query,
      ...(filters ? { filters } : {}),
      ...(input.complexity ? { complexity: input.complexity } : {}),
    },
    { signal: options.signal, tokenBudget: options.tokenBudget },
  );

  const base = {
    query: query.text,
    status: outcome.status,
    trail: outcome.trail.map((attempt) => ({ ...attempt })),
    routing: {
      complexity: routing.complexity,
      startTier: routing.startTier,
      modelHint: routing.modelHint,
    },
    estimatedCost: outcome.estimatedCost,
  };

  if (outcome.status === "cancelled") {
    return { ...base, items: [] };
  }

  return {
    ...base,
    tier: outcome.tier,
    confidence: outcome.confidence,
    items: outcome.hits.map((hit) => ({
      title: hit.title,
      url: hit.url,
      ...(hit.snippet !== undefined ? { snippet: hit.snippet } : {}),
      ...(hit.content !== undefined ? { content: hit.content } : {}),
      sourceEngine: hit.sourceEngine,
      engines: [...hit.engines],
      tier: hit.tier,
      ...(hit.score !== undefined ? { score: hit.score } : {}),
    })),
  };
}
