/**
 * Tiered Retrieval Engine
 *
 * Walks the tier ladder cheapest first, one tier at a time, and stops at the
 * first tier whose hits meet its confidence threshold. The last tier is
 * accepted whenever it has hits at all. A search tier reached by escalation
 * gets the query widened with terms from the previous tier's snippets; a
 * deep-extraction tier reached by escalation works on the previous tier's best
 * URLs instead of re-searching.
 */

import type { TierSettings } from "../config/types";
import type { SearchBackend } from "../core/backend/BackendAdapter";
import { createLogger } from "../core/logger";
import type {
  BackendErrorKind,
  RetrievalOutcome,
  RoutingDecision,
  SearchHit,
  SearchQuery,
  Tier,
  TierAttempt,
} from "../core/types";
import { RetrievalCancelledError, TIER_ORDER, isBackendError } from "../core/types";
import { canonicalUrl } from "../providers/utils";
import type { ConfidenceScorer } from "./confidence";

const log = createLogger("TieredRetrieval");

export interface TieredRetrievalOptions {
  tiers: Record<Tier, TierSettings>;
  /** Result count when the query does not ask for one */
  defaultLimit: number;
  /** URLs handed to deep extraction after escalation */
  extractTopK: number;
}

export interface RetrieveOptions {
  signal?: AbortSignal;
}

type TierResult =
  | { kind: "hits"; hits: SearchHit[]; mode: TierAttempt["mode"]; error?: BackendErrorKind }
  | { kind: "skipped"; mode: "extract" };

/**
 * Top URLs of a hit list, first occurrence of each canonical URL only
 */
export function topUrls(hits: readonly SearchHit[], k: number): string[] {
  const seen = new Set<string>();
  const urls: string[] = [];
  for (const hit of hits) {
    if (urls.length >= k) {
      break;
    }
    const key = canonicalUrl(hit.url);
    if (!seen.has(key)) {
      seen.add(key);
      urls.push(hit.url);
    }
  }
  return urls;
}

/** Snippet terms appended to an escalated query */
export const REFINE_MAX_TERMS = 5;

/**
 * Query text widened with the first distinct snippet words longer than three
 * characters that the query does not already contain
 */
export function refineQuery(text: string, hits: readonly SearchHit[], maxTerms = REFINE_MAX_TERMS): string {
  const seen = new Set(text.toLowerCase().split(/\s+/).filter(Boolean));
  const terms: string[] = [];
  for (const hit of hits) {
    for (const word of hit.snippet?.split(/\s+/) ?? []) {
      if (terms.length >= maxTerms) {
        break;
      }
      const key = word.toLowerCase();
      if (Array.from(word).length > 3 && !seen.has(key)) {
        seen.add(key);
        terms.push(word);
      }
    }
  }
  return terms.length > 0 ? `${text} ${terms.join(" ")}` : text;
}

/**
 * Extracted pages keep the title and snippet the earlier tier found for them
 */
function enrichFromCandidates(extracted: SearchHit[], candidates: readonly SearchHit[]): SearchHit[] {
  const byUrl = new Map(candidates.map((hit) => [canonicalUrl(hit.url), hit]));
  return extracted.map((hit) => {
    const candidate = byUrl.get(canonicalUrl(hit.url));
    if (!candidate) {
      return hit;
    }
    const engines = [...new Set([...hit.engines, ...candidate.engines])];
    return {
      ...hit,
      title: hit.title && hit.title !== hit.url ? hit.title : candidate.title,
      snippet: hit.snippet ?? candidate.snippet,
      engines,
    };
  });
}

export class TieredRetrievalEngine {
  constructor(
    private readonly backend: SearchBackend,
    private readonly scorer: ConfidenceScorer,
    private readonly options: TieredRetrievalOptions,
  ) {}

  /**
   * Configured tiers at or after the start tier; every configured tier when
   * none remain past it
   */
  ladder(startTier: Tier): Tier[] {
    const configured = TIER_ORDER.filter((tier) => this.backend.hasTier(tier));
    const startIndex = TIER_ORDER.indexOf(startTier);
    const fromStart = configured.filter((tier) => TIER_ORDER.indexOf(tier) >= startIndex);
    return fromStart.length > 0 ? fromStart : configured;
  }

  threshold(tier: Tier, routing: RoutingDecision): number {
    return routing.thresholds[tier] ?? this.options.tiers[tier].threshold;
  }

  /**
   * Run one retrieval session
   *
   * @throws BackendError("auth_failure") when any tier's backend rejects credentials
   */
  async retrieve(
    query: SearchQuery,
    routing: RoutingDecision,
    options: RetrieveOptions = {},
  ): Promise<RetrievalOutcome> {
    const { signal } = options;
    const ladder = this.ladder(routing.startTier);
    const limit = query.filters?.limit ?? this.options.defaultLimit;
    const trail: TierAttempt[] = [];
    let estimatedCost = 0;
    let candidates: SearchHit[] = [];

    const cancelled = (): RetrievalOutcome => {
      log.info(`Cancelled after ${trail.length} tier(s)`);
      return { status: "cancelled", routing, trail, estimatedCost };
    };

    for (const [index, tier] of ladder.entries()) {
      if (signal?.aborted) {
        return cancelled();
      }

      const isLast = index === ladder.length - 1;
      const threshold = this.threshold(tier, routing);
      const started = Date.now();
      const extractMode = tier === "deep_extract" && trail.length > 0;
      const urls = extractMode ? topUrls(candidates, this.options.extractTopK) : [];
      const searchText = candidates.length > 0 ? refineQuery(query.text, candidates) : query.text;

      let result: TierResult;
      if (extractMode && urls.length === 0) {
        result = { kind: "skipped", mode: "extract" };
      } else {
        estimatedCost += this.options.tiers[tier].costPerCall;
        try {
          const hits = extractMode
            ? enrichFromCandidates(await this.backend.extract(urls, { signal }), candidates)
            : await this.backend.search(tier, searchText, limit, { filters: query.filters, signal });
          result = { kind: "hits", hits, mode: extractMode ? "extract" : "search" };
        } catch (error) {
          if (error instanceof RetrievalCancelledError || signal?.aborted) {
            return cancelled();
          }
          if (isBackendError(error) && error.kind === "auth_failure") {
            log.error(`Authentication failed for ${error.engineId} at tier '${tier}'`);
            throw error;
          }
          const kind: BackendErrorKind = isBackendError(error) ? error.kind : "unreachable";
          log.warn(
            `Tier '${tier}' failed (${kind}): ${error instanceof Error ? error.message : String(error)}`,
          );
          result = { kind: "hits", hits: [], mode: extractMode ? "extract" : "search", error: kind };
        }
      }

      // A session aborted mid-call must not surface the tier it was scoring
      if (signal?.aborted) {
        return cancelled();
      }

      const hits = result.kind === "hits" ? result.hits : [];
      const confidence =
        hits.length === 0 ? 0 : this.scorer.score(hits, { tier, query: query.text, limit }).value;

      const attempt: TierAttempt = {
        tier,
        mode: result.mode,
        hitCount: hits.length,
        confidence,
        threshold,
        durationMs: Date.now() - started,
        ...(result.kind === "hits" && result.error ? { error: result.error } : {}),
        ...(result.kind === "skipped" ? { skipped: "no_candidates" as const } : {}),
      };
      trail.push(attempt);
      log.info(
        `Tier '${tier}' (${attempt.mode}): ${hits.length} hit(s), confidence ${confidence.toFixed(3)} / ${threshold}`,
      );

      if (hits.length > 0 && (confidence >= threshold || isLast)) {
        return { status: "accepted", hits, tier, confidence, routing, trail, estimatedCost };
      }

      if (isLast) {
        return { status: "exhausted", hits: [], tier, confidence: 0, routing, trail, estimatedCost };
      }

      // Only the tier just escalated from feeds the next one
      candidates = hits;
      log.debug(`Escalating past tier '${tier}'`);
    }

    // No configured tier at all
    return {
      status: "exhausted",
      hits: [],
      tier: routing.startTier,
      confidence: 0,
      routing,
      trail,
      estimatedCost,
    };
  }
}
