/**
 * Context Pruner
 *
 * Fits an accepted hit list into a token budget for downstream consumption:
 * duplicates are folded into their earliest occurrence, markup is cleaned,
 * and hits are kept in rank order until the budget runs out. The first hit
 * that does not fit loses (part of) its content; everything after it is dropped.
 */

import type { SearchHit } from "../core/types";
import { canonicalUrl } from "../providers/utils";
import { HtmlCleaner } from "./htmlCleaner";

export const CHARS_PER_TOKEN = 4;

/** Shortest content prefix worth keeping when truncating */
export const MIN_TRUNCATED_CHARS = 100;

export const TITLE_SIMILARITY_THRESHOLD = 0.85;

/** Titles with fewer words are only matched by URL */
const MIN_TITLE_WORDS = 3;

const ELLIPSIS = "...";

/**
 * First `units` UTF-16 code units of `text`, never ending on half a surrogate pair
 */
function sliceUnits(text: string, units: number): string {
  let end = Math.min(units, text.length);
  const last = text.charCodeAt(end - 1);
  if (end < text.length && last >= 0xd800 && last <= 0xdbff) {
    end -= 1;
  }
  return text.slice(0, end);
}

/** Characters are counted in UTF-16 code units, as truncation cuts them */
export function estimateTokens(hit: SearchHit): number {
  const chars =
    hit.title.length + hit.url.length + (hit.snippet?.length ?? 0) + (hit.content?.length ?? 0);
  return Math.ceil(chars / CHARS_PER_TOKEN);
}

function titleWords(title: string): Set<string> {
  const words = title
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, " ")
    .split(/\s+/)
    .filter(Boolean);
  return new Set(words);
}

/**
 * Jaccard similarity of two titles' word sets
 */
export function titleSimilarity(a: string, b: string): number {
  const left = titleWords(a);
  const right = titleWords(b);
  if (left.size === 0 && right.size === 0) {
    return 0;
  }
  let shared = 0;
  for (const word of left) {
    if (right.has(word)) {
      shared++;
    }
  }
  return shared / (left.size + right.size - shared);
}

function isNearDuplicateTitle(a: string, b: string): boolean {
  if (titleWords(a).size < MIN_TITLE_WORDS || titleWords(b).size < MIN_TITLE_WORDS) {
    return false;
  }
  return titleSimilarity(a, b) >= TITLE_SIMILARITY_THRESHOLD;
}

function copyHit(hit: SearchHit): SearchHit {
  return { ...hit, engines: [...hit.engines] };
}

export class ContextPruner {
  /**
   * @param tokenBudget non-positive budgets yield an empty list
   */
  prune(hits: readonly SearchHit[], tokenBudget: number): SearchHit[] {
    if (tokenBudget <= 0 || hits.length === 0) {
      return [];
    }
    const cleaned = this.dedupe(hits).map((hit) => this.clean(hit));
    return this.fitBudget(cleaned, tokenBudget);
  }

  /**
   * Fold exact and near duplicates into their first occurrence
   */
  dedupe(hits: readonly SearchHit[]): SearchHit[] {
    const kept: SearchHit[] = [];
    const byUrl = new Map<string, SearchHit>();

    for (const hit of hits) {
      const key = canonicalUrl(hit.url);
      const original =
        byUrl.get(key) ?? kept.find((candidate) => isNearDuplicateTitle(candidate.title, hit.title));

      if (original) {
        for (const engine of hit.engines) {
          if (!original.engines.includes(engine)) {
            original.engines.push(engine);
          }
        }
        original.snippet ??= hit.snippet;
        original.content ??= hit.content;
        continue;
      }

      const copy = copyHit(hit);
      byUrl.set(key, copy);
      kept.push(copy);
    }

    return kept;
  }

  clean(hit: SearchHit): SearchHit {
    const { snippet, content, ...rest } = hit;
    const cleanedSnippet = snippet ? HtmlCleaner.stripMarkup(snippet) : "";
    const cleanedContent = content ? HtmlCleaner.clean(content) : "";
    return {
      ...rest,
      title: HtmlCleaner.stripMarkup(hit.title) || hit.title,
      ...(cleanedSnippet ? { snippet: cleanedSnippet } : {}),
      ...(cleanedContent ? { content: cleanedContent } : {}),
    };
  }

  fitBudget(hits: readonly SearchHit[], tokenBudget: number): SearchHit[] {
    const result: SearchHit[] = [];
    let remaining = tokenBudget;

    for (const hit of hits) {
      const cost = estimateTokens(hit);
      if (cost <= remaining) {
        result.push(hit);
        remaining -= cost;
        continue;
      }

      const reduced = this.reduceToFit(hit, remaining);
      if (reduced) {
        result.push(reduced);
      }
      break;
    }

    return result;
  }

  /**
   * Shrink a hit's content so the hit fits in `remaining` tokens
   */
  private reduceToFit(hit: SearchHit, remaining: number): SearchHit | undefined {
    const { content, ...base } = hit;
    const baseTokens = estimateTokens(base);
    if (baseTokens > remaining) {
      return undefined;
    }

    if (content) {
      const keepChars = (remaining - baseTokens) * CHARS_PER_TOKEN - ELLIPSIS.length;
      if (keepChars >= MIN_TRUNCATED_CHARS) {
        const truncated = sliceUnits(content, keepChars).trimEnd();
        return { ...base, content: `${truncated}${ELLIPSIS}` };
      }
    }

    return base;
  }
}
