/**
 * Zod schemas for configuration validation
 *
 * Every section except `engines` carries defaults, so a config file only needs
 * to list its engines.
 */

import { z } from "zod";
import { TIER_ORDER } from "../core/types";
import keywords from "../routing/keywords.json";
import type { TieredSearchConfig } from "./types";

export const TierSchema = z.enum(TIER_ORDER);

export const DEFAULT_AUTHORITY_DOMAINS = [
  "github.com",
  "stackoverflow.com",
  "docs.rs",
  "rust-lang.org",
  "arxiv.org",
  "wikipedia.org",
  "cve.mitre.org",
  "nvd.nist.gov",
  "developer.mozilla.org",
  "python.org",
  "nodejs.org",
  "w3.org",
  "ietf.org",
];

export const EngineRetrySchema = z.object({
  maxAttempts: z.number().int().min(1).max(10).default(1),
  initialDelayMs: z.number().int().nonnegative().default(500),
  maxDelayMs: z.number().int().nonnegative().default(5000),
});

// Base engine configuration shared by all providers
const engineBase = {
  id: z.string().min(1),
  enabled: z.boolean().default(true),
  displayName: z.string().min(1),
  retry: EngineRetrySchema.optional(),
};

export const SearxngConfigSchema = z.object({
  ...engineBase,
  type: z.literal("searxng"),
  tier: TierSchema.default("free"),
  endpoint: z.string().url(),
  apiKeyEnv: z.string().min(1).optional(),
});

export const DuckDuckGoConfigSchema = z.object({
  ...engineBase,
  type: z.literal("duckduckgo"),
  tier: TierSchema.default("free"),
  endpoint: z.string().url().default("https://api.duckduckgo.com/"),
});

export const ExaConfigSchema = z.object({
  ...engineBase,
  type: z.literal("exa"),
  tier: TierSchema.default("semantic"),
  apiKeyEnv: z.string().min(1).default("EXA_API_KEY"),
  endpoint: z.string().url().default("https://api.exa.ai"),
  maxCharacters: z.number().int().positive().default(1000),
});

export const TavilyConfigSchema = z.object({
  ...engineBase,
  type: z.literal("tavily"),
  tier: TierSchema.default("deep_extract"),
  apiKeyEnv: z.string().min(1).default("TAVILY_API_KEY"),
  endpoint: z.string().url().default("https://api.tavily.com"),
  searchDepth: z.enum(["basic", "advanced"]).default("advanced"),
});

// Union type for all engine configs
export const EngineConfigSchema = z.discriminatedUnion("type", [
  SearxngConfigSchema,
  DuckDuckGoConfigSchema,
  ExaConfigSchema,
  TavilyConfigSchema,
]);

const threshold = z.number().min(0).max(1);

function tierSettingsSchema(defaults: { threshold: number; costPerCall: number }) {
  return z
    .object({
      threshold: threshold.default(defaults.threshold),
      costPerCall: z.number().nonnegative().default(defaults.costPerCall),
    })
    .default({});
}

export const TiersSchema = z
  .object({
    free: tierSettingsSchema({ threshold: 0.85, costPerCall: 0 }),
    semantic: tierSettingsSchema({ threshold: 0.85, costPerCall: 0.005 }),
    deep_extract: tierSettingsSchema({ threshold: 0.85, costPerCall: 0.015 }),
  })
  .default({});

export const RetrievalSchema = z
  .object({
    defaultLimit: z.number().int().positive().max(50).default(10),
    timeoutMs: z.number().int().positive().default(10_000),
    maxConcurrentRequests: z.number().int().positive().default(10),
    extractTopK: z.number().int().positive().default(3),
    tokenBudget: z.number().int().nonnegative().default(4000),
  })
  .default({});

export const RouterSchema = z
  .object({
    simpleMaxLength: z.number().int().positive().default(50),
    complexMinLength: z.number().int().positive().default(100),
    mediumFreeThreshold: threshold.default(0.8),
    complexKeywords: z.array(z.string().min(1)).default(keywords.complexKeywords),
    technicalMarkers: z.array(z.string().min(1)).default(keywords.technicalMarkers),
    technicalCategories: z.array(z.string().min(1)).default(keywords.technicalCategories),
    modelHints: z
      .object({
        simple: z.string().min(1).default("small"),
        medium: z.string().min(1).default("medium"),
        complex: z.string().min(1).default("large"),
      })
      .default({}),
  })
  .default({});

export const ConfidenceSchema = z
  .object({
    saturation: z.number().int().positive().default(5),
    weights: z
      .object({
        count: z.number().nonnegative().default(0.15),
        relevance: z.number().nonnegative().default(0.3),
        authority: z.number().nonnegative().default(0.15),
        content: z.number().nonnegative().default(0.2),
        agreement: z.number().nonnegative().default(0.2),
      })
      .default({}),
    authorityDomains: z.array(z.string().min(1)).default(DEFAULT_AUTHORITY_DOMAINS),
  })
  .default({});

// Main configuration schema
export const TieredSearchConfigSchema = z
  .object({
    engines: z.array(EngineConfigSchema).min(1),
    tiers: TiersSchema,
    retrieval: RetrievalSchema,
    router: RouterSchema,
    confidence: ConfidenceSchema,
  })
  .superRefine((config, ctx) => {
    const seen = new Set<string>();
    config.engines.forEach((engine, index) => {
      if (seen.has(engine.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["engines", index, "id"],
          message: `Duplicate engine id '${engine.id}'`,
        });
      }
      seen.add(engine.id);
    });
  });

// Input types: what a config file or defineConfig() call may omit
export type TieredSearchConfigInput = z.input<typeof TieredSearchConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;
export type SearxngConfigInput = z.input<typeof SearxngConfigSchema>;
export type DuckDuckGoConfigInput = z.input<typeof DuckDuckGoConfigSchema>;
export type ExaConfigInput = z.input<typeof ExaConfigSchema>;
export type TavilyConfigInput = z.input<typeof TavilyConfigSchema>;

/**
 * Validate configuration against schema, filling defaults
 * @throws ZodError if validation fails
 */
export function validateConfig(config: unknown): TieredSearchConfig {
  return TieredSearchConfigSchema.parse(config);
}

/**
 * Validate configuration safely (returns result object instead of throwing)
 */
export function validateConfigSafe(config: unknown):
  | {
      success: true;
      data: TieredSearchConfig;
    }
  | {
      success: false;
      error: z.ZodError;
    } {
  const result = TieredSearchConfigSchema.safeParse(config);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: result.error };
}

/**
 * Format Zod validation errors into human-readable messages
 */
export function formatValidationErrors(error: z.ZodError): string[] {
  return error.issues.map((err) => {
    const path = err.path.join(".");
    return path ? `${path}: ${err.message}` : err.message;
  });
}
