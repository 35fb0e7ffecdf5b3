/**
 * Input and output interfaces for the tiered-search tool
 */

import type { BackendErrorKind, Complexity, Tier, TimeRange } from "../core/types";

export interface TieredSearchInput {
  /** Search query string */
  query: string;

  /** Results requested per tier */
  limit?: number;

  /** Result category passed to engines that support it (e.g. "it", "science") */
  category?: string;

  language?: string;

  timeRange?: TimeRange;

  /** Skip classification and treat the query as this complexity */
  complexity?: Complexity;
}

export interface TieredSearchOutputItem {
  title: string;
  url: string;
  snippet?: string;
  content?: string;
  /** Engine that returned this result first */
  sourceEngine: string;
  /** Every engine that returned this result */
  engines: string[];
  tier: Tier;
  score?: number;
}

export interface TieredSearchTierAttempt {
  tier: Tier;
  mode: "search" | "extract";
  hitCount: number;
  confidence: number;
  threshold: number;
  durationMs: number;
  error?: BackendErrorKind;
  skipped?: "no_candidates";
}

export interface TieredSearchOutput {
  /** Validated query text */
  query: string;

  status: "accepted" | "exhausted" | "cancelled";

  /** Tier that ended the session; absent when cancelled */
  tier?: Tier;

  confidence?: number;

  /** Pruned results; empty unless accepted */
  items: TieredSearchOutputItem[];

  /** Every tier attempted, in order */
  trail: TieredSearchTierAttempt[];

  routing: {
    complexity: Complexity;
    startTier: Tier;
    modelHint: string;
  };

  estimatedCost: number;
}
