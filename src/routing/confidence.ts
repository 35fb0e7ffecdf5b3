/**
 * Confidence Calculator
 *
 * Scores a tier's hit set in [0, 1]. Every component is a capped sum of
 * non-negative per-hit terms, so adding hits never lowers the score until the
 * component saturates. An empty or malformed hit set scores exactly 0.
 */

import type { ConfidenceSettings } from "../config/types";
import type { ConfidenceScore, SearchHit, Tier } from "../core/types";
import { canonicalUrl, hostOf } from "../providers/utils";

export interface ScoreContext {
  tier: Tier;
  /** Query text, used for term overlap */
  query?: string;
  /** Requested result count; lowers the saturation point for small requests */
  limit?: number;
}

export interface ConfidenceScorer {
  score(hits: readonly SearchHit[], context: ScoreContext): ConfidenceScore;
}

export interface ConfidenceBreakdown {
  count: number;
  relevance: number;
  authority: number;
  content: number;
  agreement: number;
}

const MIN_TERM_LENGTH = 3;

function queryTerms(query: string | undefined): string[] {
  if (!query) {
    return [];
  }
  return query
    .toLowerCase()
    .split(/\s+/)
    .filter((term) => [...term].length >= MIN_TERM_LENGTH);
}

function normalizeTitle(title: string): string {
  return title
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, " ")
    .replace(/\s+/g, " ")
    .trim();
}

function isWellFormed(hit: SearchHit): boolean {
  return typeof hit.url === "string" && hit.url.trim() !== "";
}

function hitEngines(hit: SearchHit): string[] {
  const engines = Array.isArray(hit.engines) ? hit.engines : [];
  return typeof hit.sourceEngine === "string" ? [...engines, hit.sourceEngine] : engines;
}

function textLength(value: unknown): number {
  return typeof value === "string" ? value.length : 0;
}

export class ConfidenceCalculator implements ConfidenceScorer {
  private readonly authorityDomains: string[];

  constructor(private readonly settings: ConfidenceSettings) {
    this.authorityDomains = settings.authorityDomains.map((domain) => domain.toLowerCase());
  }

  score(hits: readonly SearchHit[], context: ScoreContext): ConfidenceScore {
    const breakdown = this.breakdown(hits, context);
    const { weights } = this.settings;
    const total =
      breakdown.count * weights.count +
      breakdown.relevance * weights.relevance +
      breakdown.authority * weights.authority +
      breakdown.content * weights.content +
      breakdown.agreement * weights.agreement;

    return { value: Math.min(1, Math.max(0, total)), tier: context.tier };
  }

  /**
   * Per-component scores, each in [0, 1]
   */
  breakdown(hits: readonly SearchHit[], context: ScoreContext): ConfidenceBreakdown {
    const valid = hits.filter(isWellFormed);
    if (valid.length === 0) {
      return { count: 0, relevance: 0, authority: 0, content: 0, agreement: 0 };
    }

    const requested = context.limit && context.limit > 0 ? context.limit : this.settings.saturation;
    const saturation = Math.max(1, Math.min(requested, this.settings.saturation));
    const saturate = (sum: number) => Math.min(1, sum / saturation);

    const terms = queryTerms(context.query);
    const agreeing = this.agreeingHits(valid);

    let relevance = 0;
    let authority = 0;
    let content = 0;
    let agreement = 0;

    for (const hit of valid) {
      relevance += this.relevanceOf(hit, terms);
      authority += this.isAuthoritative(hit.url) ? 1 : 0;
      content += this.contentOf(hit);
      agreement += agreeing.has(hit) ? 1 : 0;
    }

    return {
      count: saturate(valid.length),
      relevance: saturate(relevance),
      authority: saturate(authority),
      content: saturate(content),
      agreement: saturate(agreement),
    };
  }

  private relevanceOf(hit: SearchHit, terms: string[]): number {
    if (terms.length === 0) {
      return 0.5;
    }
    const haystack = `${hit.title ?? ""} ${hit.snippet ?? ""}`.toLowerCase();
    const matched = terms.filter((term) => haystack.includes(term)).length;
    return matched / terms.length;
  }

  private isAuthoritative(url: string): boolean {
    const host = hostOf(url);
    if (!host) {
      return false;
    }
    return this.authorityDomains.some((domain) => host === domain || host.endsWith(`.${domain}`));
  }

  private contentOf(hit: SearchHit): number {
    let value = 0;
    if (textLength(hit.snippet) > 0) {
      value += 0.3;
    }
    const contentLength = textLength(hit.content);
    if (contentLength > 0) {
      value += 0.3;
      if (contentLength > 500) {
        value += 0.2;
      }
      if (contentLength > 1000) {
        value += 0.2;
      }
    }
    return value;
  }

  /**
   * Hits whose URL or normalized title was returned by at least two engines
   */
  private agreeingHits(hits: SearchHit[]): Set<SearchHit> {
    const enginesByUrl = new Map<string, Set<string>>();
    const enginesByTitle = new Map<string, Set<string>>();

    const collect = (map: Map<string, Set<string>>, key: string, engines: string[]) => {
      const set = map.get(key) ?? new Set<string>();
      for (const engine of engines) {
        set.add(engine);
      }
      map.set(key, set);
    };

    for (const hit of hits) {
      const engines = hitEngines(hit);
      collect(enginesByUrl, canonicalUrl(hit.url), engines);
      const title = normalizeTitle(hit.title ?? "");
      if (title) {
        collect(enginesByTitle, title, engines);
      }
    }

    const agreeing = new Set<SearchHit>();
    for (const hit of hits) {
      const byUrl = enginesByUrl.get(canonicalUrl(hit.url))?.size ?? 0;
      const title = normalizeTitle(hit.title ?? "");
      const byTitle = title ? (enginesByTitle.get(title)?.size ?? 0) : 0;
      if (byUrl >= 2 || byTitle >= 2) {
        agreeing.add(hit);
      }
    }
    return agreeing;
  }
}
