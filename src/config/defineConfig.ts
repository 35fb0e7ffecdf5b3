/**
 * Configuration Helper Functions
 *
 * Type-safe helpers for writing tiered-search configurations in code.
 * Inspired by Vite's defineConfig pattern.
 */

import type {
  DuckDuckGoConfigInput,
  EngineConfigInput,
  ExaConfigInput,
  SearxngConfigInput,
  TavilyConfigInput,
  TieredSearchConfigInput,
} from "./validation";

/**
 * Define a tiered-search configuration with full type safety
 *
 * Omitted sections are filled from defaults when the config is validated.
 *
 * @example
 * ```typescript
 * const config = defineConfig({
 *   engines: [
 *     defineSearxng({ id: 'searxng', displayName: 'SearXNG', endpoint: 'http://localhost:8080/search' }),
 *     defineExa({ id: 'exa', displayName: 'Exa' }),
 *   ],
 *   tiers: { free: { threshold: 0.8 } },
 * });
 * ```
 */
export function defineConfig(config: TieredSearchConfigInput): TieredSearchConfigInput {
  return config;
}

type WithoutType<T extends { type: string }> = Omit<T, "type"> & Partial<Pick<T, "type">>;

/**
 * Helper to define a SearXNG engine configuration
 */
export function defineSearxng(config: WithoutType<SearxngConfigInput>): SearxngConfigInput {
  return { ...config, type: "searxng" };
}

/**
 * Helper to define a DuckDuckGo Instant Answer engine configuration
 */
export function defineDuckDuckGo(
  config: WithoutType<DuckDuckGoConfigInput>,
): DuckDuckGoConfigInput {
  return { ...config, type: "duckduckgo" };
}

/**
 * Helper to define an Exa engine configuration
 */
export function defineExa(config: WithoutType<ExaConfigInput>): ExaConfigInput {
  return { ...config, type: "exa" };
}

/**
 * Helper to define a Tavily engine configuration
 */
export function defineTavily(config: WithoutType<TavilyConfigInput>): TavilyConfigInput {
  return { ...config, type: "tavily" };
}

/**
 * Create a configuration from a list of engines, keeping only enabled ones
 */
export function createConfig(
  engines: EngineConfigInput[],
  options: Omit<TieredSearchConfigInput, "engines"> = {},
): TieredSearchConfigInput {
  return {
    ...options,
    engines: engines.filter((engine) => engine.enabled !== false),
  };
}
