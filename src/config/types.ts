/**
 * Configuration types for tiered-search
 */

import type { Complexity, EngineId, Tier } from "../core/types";

/**
 * Retry settings for a single engine. Only transient failures are retried.
 */
export interface EngineRetryConfig {
  /** Total attempts including the first (1 disables retry) */
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
}

export interface EngineConfigBase {
  /** Unique identifier for this engine */
  id: EngineId;

  /** Whether this engine is enabled */
  enabled: boolean;

  /** Human-readable display name */
  displayName: string;

  /** Tier this engine serves; several engines may share a tier */
  tier: Tier;

  /** Optional retry policy for transient failures */
  retry?: EngineRetryConfig;
}

export interface SearxngConfig extends EngineConfigBase {
  type: "searxng";
  /** Search endpoint, e.g. http://localhost:8080/search */
  endpoint: string;
  /** Optional key for deployments behind an authenticating proxy */
  apiKeyEnv?: string;
}

export interface DuckDuckGoConfig extends EngineConfigBase {
  type: "duckduckgo";
  endpoint: string;
}

export interface ExaConfig extends EngineConfigBase {
  type: "exa";
  apiKeyEnv: string;
  endpoint: string;
  /** Upper bound on page text returned per result */
  maxCharacters: number;
}

export interface TavilyConfig extends EngineConfigBase {
  type: "tavily";
  apiKeyEnv: string;
  /** Base API URL; /search and /extract are appended */
  endpoint: string;
  searchDepth: "basic" | "advanced";
}

export type EngineConfig = SearxngConfig | DuckDuckGoConfig | ExaConfig | TavilyConfig;

export type EngineType = EngineConfig["type"];

export interface TierSettings {
  /** Minimum confidence that accepts this tier's hits */
  threshold: number;
  /** Estimated cost of one backend call at this tier */
  costPerCall: number;
}

export interface RetrievalSettings {
  /** Result count requested per tier when the query gives none */
  defaultLimit: number;
  /** Bound on each provider call */
  timeoutMs: number;
  /** Process-wide cap on simultaneous outbound requests */
  maxConcurrentRequests: number;
  /** URLs carried from the previous tier into deep extraction */
  extractTopK: number;
  /** Token budget handed to the context pruner */
  tokenBudget: number;
}

export interface RouterSettings {
  /** Queries longer than this (in characters) are at least medium */
  simpleMaxLength: number;
  /** Complex keywords only escalate to complex beyond this length */
  complexMinLength: number;
  /** Free-tier threshold used for medium queries */
  mediumFreeThreshold: number;
  complexKeywords: string[];
  technicalMarkers: string[];
  /** Filter categories that mark a query as medium */
  technicalCategories: string[];
  modelHints: Record<Complexity, string>;
}

export interface ConfidenceWeights {
  count: number;
  relevance: number;
  authority: number;
  content: number;
  agreement: number;
}

export interface ConfidenceSettings {
  /** Hits needed for a component to saturate (capped by the requested limit) */
  saturation: number;
  weights: ConfidenceWeights;
  authorityDomains: string[];
}

export interface TieredSearchConfig {
  /** Configuration for each search provider */
  engines: EngineConfig[];

  tiers: Record<Tier, TierSettings>;

  retrieval: RetrievalSettings;

  router: RouterSettings;

  confidence: ConfidenceSettings;
}
