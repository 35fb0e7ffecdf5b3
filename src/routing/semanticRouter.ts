/**
 * Semantic Router
 *
 * Classifies a query as simple, medium or complex from cheap lexical signals
 * and maps the class to a starting tier and per-query threshold overrides.
 * Pure: the same query and settings always produce the same decision.
 */

import type { RouterSettings, TierSettings } from "../config/types";
import type { Complexity, RoutingDecision, SearchQuery, Tier } from "../core/types";

const QUESTION_MARKS = /[?？]/g;
const CLAUSE_SEPARATORS = /[,，、;；]/g;

function countMatches(text: string, pattern: RegExp): number {
  return text.match(pattern)?.length ?? 0;
}

export interface QuerySignals {
  length: number;
  questionCount: number;
  clauseCount: number;
  hasComplexKeyword: boolean;
  hasTechnicalMarker: boolean;
  hasTechnicalCategory: boolean;
}

export class SemanticRouter {
  private readonly complexKeywords: string[];
  private readonly technicalMarkers: string[];

  constructor(
    private readonly settings: RouterSettings,
    private readonly tiers: Record<Tier, TierSettings>,
  ) {
    this.complexKeywords = settings.complexKeywords.map((kw) => kw.toLowerCase());
    this.technicalMarkers = settings.technicalMarkers.map((kw) => kw.toLowerCase());
  }

  signals(query: SearchQuery): QuerySignals {
    const text = query.text.trim();
    const lower = text.toLowerCase();
    const category = query.filters?.category?.toLowerCase();

    return {
      length: [...text].length,
      questionCount: countMatches(text, QUESTION_MARKS),
      clauseCount: countMatches(text, CLAUSE_SEPARATORS) + 1,
      hasComplexKeyword: this.complexKeywords.some((kw) => lower.includes(kw)),
      hasTechnicalMarker: this.technicalMarkers.some((kw) => lower.includes(kw)),
      hasTechnicalCategory:
        category !== undefined && this.settings.technicalCategories.includes(category),
    };
  }

  complexity(query: SearchQuery): Complexity {
    if (query.complexity) {
      return query.complexity;
    }
    if (query.text.trim() === "") {
      return "simple";
    }

    const s = this.signals(query);
    if (
      s.questionCount > 1 ||
      s.clauseCount > 2 ||
      (s.hasComplexKeyword && s.length > this.settings.complexMinLength)
    ) {
      return "complex";
    }
    if (
      s.hasComplexKeyword ||
      s.hasTechnicalMarker ||
      s.hasTechnicalCategory ||
      s.length > this.settings.simpleMaxLength
    ) {
      return "medium";
    }
    return "simple";
  }

  classify(query: SearchQuery): RoutingDecision {
    const complexity = this.complexity(query);
    const modelHint = this.settings.modelHints[complexity];

    switch (complexity) {
      case "simple":
        return { complexity, startTier: "free", thresholds: {}, modelHint };
      case "medium":
        return {
          complexity,
          startTier: "free",
          thresholds: {
            free: Math.min(this.settings.mediumFreeThreshold, this.tiers.free.threshold),
          },
          modelHint,
        };
      case "complex":
        return { complexity, startTier: "semantic", thresholds: {}, modelHint };
    }
  }
}
