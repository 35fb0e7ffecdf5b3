/**
 * Search provider contracts and registry
 */

import type { EngineId, SearchFilters, Tier } from "../types";
import { TIER_ORDER } from "../types";

/**
 * Single result as returned by a provider, before it is bound to a tier
 */
export interface SearchResultItem {
  title: string;
  url: string;
  snippet?: string;
  content?: string;
  /** Engine that produced this result (an upstream engine for aggregators) */
  sourceEngine: EngineId;
  /** Upstream engines that agreed on this result, when the provider reports them */
  engines?: EngineId[];
  score?: number;
}

export interface SearchResponse {
  engineId: EngineId;
  items: SearchResultItem[];
  tookMs: number;
}

export interface ProviderSearchRequest {
  query: string;
  limit: number;
  filters?: SearchFilters;
  /** Per-call bound; exceeded calls fail with a "timeout" backend error */
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface ProviderExtractRequest {
  urls: string[];
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface ProviderMetadata {
  id: EngineId;
  displayName: string;
  tier: Tier;
  docsUrl?: string;
  supportsExtraction: boolean;
}

export interface SearchProvider {
  readonly id: EngineId;
  readonly tier: Tier;

  /**
   * @throws BackendError on any backend failure
   * @throws RetrievalCancelledError when the request signal aborts
   */
  search(request: ProviderSearchRequest): Promise<SearchResponse>;

  getMetadata(): ProviderMetadata;

  /** False when required credentials are missing */
  isConfigured(): boolean;

  getMissingConfigMessage(): string;
}

/**
 * Provider that can also fetch full page content for a given set of URLs
 */
export interface ExtractionProvider extends SearchProvider {
  extract(request: ProviderExtractRequest): Promise<SearchResponse>;
}

export function isExtractionProvider(provider: SearchProvider): provider is ExtractionProvider {
  return "extract" in provider && typeof provider.extract === "function";
}

/**
 * Registry of configured providers, grouped by tier in registration order
 */
export class ProviderRegistry {
  private providers = new Map<EngineId, SearchProvider>();

  register(provider: SearchProvider): void {
    if (this.providers.has(provider.id)) {
      throw new Error(`Provider already registered: ${provider.id}`);
    }
    this.providers.set(provider.id, provider);
  }

  get(id: EngineId): SearchProvider | undefined {
    return this.providers.get(id);
  }

  has(id: EngineId): boolean {
    return this.providers.has(id);
  }

  list(): SearchProvider[] {
    return [...this.providers.values()];
  }

  byTier(tier: Tier): SearchProvider[] {
    return this.list().filter((provider) => provider.tier === tier);
  }

  /** Tiers with at least one provider, cheapest first */
  tiers(): Tier[] {
    return TIER_ORDER.filter((tier) => this.byTier(tier).length > 0);
  }
}
