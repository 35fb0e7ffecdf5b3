/**
 * Core search types and error handling
 */

export type EngineId = string;

/**
 * Retrieval tiers, cheapest first. Escalation only ever moves forward in this order.
 */
export const TIER_ORDER = ["free", "semantic", "deep_extract"] as const;

export type Tier = (typeof TIER_ORDER)[number];

export type Complexity = "simple" | "medium" | "complex";

export type TimeRange = "day" | "week" | "month" | "year";

export interface SearchFilters {
  /** SearXNG-style category (e.g., "general", "it", "science") */
  category?: string;
  language?: string;
  timeRange?: TimeRange;
  /** Requested result count */
  limit?: number;
}

export interface SearchQuery {
  readonly text: string;
  readonly filters?: Readonly<SearchFilters>;
  /** Explicit complexity override; bypasses the router heuristics */
  readonly complexity?: Complexity;
}

export interface SearchHit {
  title: string;
  url: string;
  snippet?: string;
  /** Full page content, when the backend extracted it */
  content?: string;
  /** Engine that produced this hit first */
  sourceEngine: EngineId;
  /** Every engine that returned this URL within the same tier call */
  engines: EngineId[];
  tier: Tier;
  /** Provider-native relevance score, if any */
  score?: number;
}

export interface ConfidenceScore {
  value: number;
  tier: Tier;
}

export interface RoutingDecision {
  complexity: Complexity;
  startTier: Tier;
  /** Per-tier threshold overrides for this query only */
  thresholds: Partial<Record<Tier, number>>;
  /** Hint for the downstream model that consumes the results */
  modelHint: string;
}

export interface TierAttempt {
  tier: Tier;
  /** "extract" when the tier worked on URLs carried over from the previous tier */
  mode: "search" | "extract";
  hitCount: number;
  confidence: number;
  threshold: number;
  durationMs: number;
  error?: BackendErrorKind;
  skipped?: "no_candidates";
}

interface OutcomeBase {
  routing: RoutingDecision;
  trail: TierAttempt[];
  /** Sum of the configured per-call cost of every tier whose backend was called */
  estimatedCost: number;
}

export interface AcceptedOutcome extends OutcomeBase {
  status: "accepted";
  hits: SearchHit[];
  tier: Tier;
  confidence: number;
}

export interface ExhaustedOutcome extends OutcomeBase {
  status: "exhausted";
  hits: [];
  tier: Tier;
  confidence: 0;
}

export interface CancelledOutcome extends OutcomeBase {
  status: "cancelled";
}

export type RetrievalOutcome = AcceptedOutcome | ExhaustedOutcome | CancelledOutcome;

export type BackendErrorKind =
  | "timeout"
  | "rate_limited"
  | "auth_failure"
  | "unreachable"
  | "malformed";

/**
 * Error thrown when a search backend fails
 */
export class BackendError extends Error {
  engineId: EngineId;
  kind: BackendErrorKind;
  statusCode?: number;

  constructor(engineId: EngineId, kind: BackendErrorKind, message: string, statusCode?: number) {
    super(message);
    this.name = "BackendError";
    this.engineId = engineId;
    this.kind = kind;
    this.statusCode = statusCode;
  }

  /** Whether the session can continue with the next tier */
  get recoverable(): boolean {
    return this.kind !== "auth_failure";
  }
}

/**
 * Error thrown when a query is rejected before any backend is called
 */
export class QueryValidationError extends Error {
  issues: string[];

  constructor(issues: string[]) {
    super(`Invalid query: ${issues.join("; ")}`);
    this.name = "QueryValidationError";
    this.issues = issues;
  }
}

/**
 * Raised internally when the caller aborts a session. The engine turns it into
 * a "cancelled" outcome.
 */
export class RetrievalCancelledError extends Error {
  constructor(message = "Retrieval cancelled by caller") {
    super(message);
    this.name = "RetrievalCancelledError";
  }
}

export function isBackendError(error: unknown): error is BackendError {
  return error instanceof BackendError;
}
