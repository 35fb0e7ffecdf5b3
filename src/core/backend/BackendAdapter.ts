/**
 * Backend Adapter
 *
 * Uniform per-tier search and extraction capability over the provider registry.
 * A tier backed by several providers is queried in parallel and the results are
 * merged; the retrieval engine only ever sees one backend per tier.
 */

import type { AdmissionGate } from "../admission";
import { createLogger } from "../logger";
import type { ProviderRegistry, SearchProvider, SearchResponse } from "../provider";
import { isExtractionProvider } from "../provider";
import type { SearchFilters, SearchHit, Tier } from "../types";
import { BackendError, RetrievalCancelledError, isBackendError } from "../types";
import { canonicalUrl } from "../../providers/utils";

const log = createLogger("BackendAdapter");

export interface BackendCallOptions {
  filters?: SearchFilters;
  signal?: AbortSignal;
}

export interface BackendAdapterOptions {
  /** Bound on each provider call */
  timeoutMs: number;
}

export interface SearchBackend {
  search(tier: Tier, query: string, limit: number, options?: BackendCallOptions): Promise<SearchHit[]>;
  extract(urls: string[], options?: BackendCallOptions): Promise<SearchHit[]>;
  hasTier(tier: Tier): boolean;
  tiers(): Tier[];
}

/**
 * Normalize anything thrown by a provider into the backend error taxonomy
 */
function normalizeError(provider: SearchProvider, error: unknown, signal?: AbortSignal): Error {
  if (error instanceof RetrievalCancelledError || signal?.aborted) {
    return error instanceof RetrievalCancelledError ? error : new RetrievalCancelledError();
  }
  if (isBackendError(error)) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new BackendError(provider.id, "unreachable", message);
}

/**
 * Merge responses in provider order; a URL seen again extends the first hit
 */
export function mergeResponses(tier: Tier, responses: SearchResponse[]): SearchHit[] {
  const merged: SearchHit[] = [];
  const byUrl = new Map<string, SearchHit>();

  for (const response of responses) {
    for (const item of response.items) {
      const key = canonicalUrl(item.url);
      const engines = item.engines?.length ? item.engines : [item.sourceEngine];
      const existing = byUrl.get(key);

      if (existing) {
        for (const engine of engines) {
          if (!existing.engines.includes(engine)) {
            existing.engines.push(engine);
          }
        }
        existing.snippet ??= item.snippet;
        existing.content ??= item.content;
        continue;
      }

      const hit: SearchHit = {
        title: item.title,
        url: item.url,
        sourceEngine: item.sourceEngine,
        engines: [...new Set(engines)],
        tier,
        ...(item.snippet !== undefined ? { snippet: item.snippet } : {}),
        ...(item.content !== undefined ? { content: item.content } : {}),
        ...(item.score !== undefined ? { score: item.score } : {}),
      };
      byUrl.set(key, hit);
      merged.push(hit);
    }
  }

  return merged;
}

export class BackendAdapter implements SearchBackend {
  constructor(
    private readonly registry: ProviderRegistry,
    private readonly gate: AdmissionGate,
    private readonly options: BackendAdapterOptions,
  ) {}

  hasTier(tier: Tier): boolean {
    return this.registry.byTier(tier).length > 0;
  }

  tiers(): Tier[] {
    return this.registry.tiers();
  }

  /**
   * Search every provider of a tier in parallel
   *
   * @throws BackendError when every provider fails, or any reports auth_failure
   * @throws RetrievalCancelledError when the signal aborts
   */
  async search(
    tier: Tier,
    query: string,
    limit: number,
    options: BackendCallOptions = {},
  ): Promise<SearchHit[]> {
    const providers = this.registry.byTier(tier);
    if (providers.length === 0) {
      throw new BackendError(tier, "unreachable", `No provider configured for tier '${tier}'`);
    }

    const responses = await this.fanOut(tier, providers, (provider) =>
      provider.search({
        query,
        limit,
        filters: options.filters,
        timeoutMs: this.options.timeoutMs,
        signal: options.signal,
      }),
      options.signal,
    );

    return mergeResponses(tier, responses).slice(0, limit);
  }

  /**
   * Fetch full content for the given URLs from the deep-extraction tier
   *
   * @throws BackendError when no extraction-capable provider succeeds
   */
  async extract(urls: string[], options: BackendCallOptions = {}): Promise<SearchHit[]> {
    const tier: Tier = "deep_extract";
    const providers = this.registry.byTier(tier).filter(isExtractionProvider);
    if (providers.length === 0) {
      throw new BackendError(tier, "unreachable", "No extraction provider configured");
    }
    if (urls.length === 0) {
      return [];
    }

    const responses = await this.fanOut(tier, providers, (provider) =>
      provider.extract({ urls, timeoutMs: this.options.timeoutMs, signal: options.signal }),
      options.signal,
    );

    return mergeResponses(tier, responses);
  }

  private async fanOut<P extends SearchProvider>(
    tier: Tier,
    providers: P[],
    call: (provider: P) => Promise<SearchResponse>,
    signal?: AbortSignal,
  ): Promise<SearchResponse[]> {
    if (signal?.aborted) {
      throw new RetrievalCancelledError();
    }

    const settled = await Promise.allSettled(
      providers.map((provider) =>
        this.gate
          .use(() => call(provider), signal)
          .catch((error: unknown) => {
            throw normalizeError(provider, error, signal);
          }),
      ),
    );

    const responses: SearchResponse[] = [];
    const errors: Error[] = [];
    for (const result of settled) {
      if (result.status === "fulfilled") {
        responses.push(result.value);
      } else {
        errors.push(result.reason instanceof Error ? result.reason : new Error(String(result.reason)));
      }
    }

    const cancelled = errors.find((error) => error instanceof RetrievalCancelledError);
    if (cancelled) {
      throw cancelled;
    }

    const authFailure = errors.find((error) => isBackendError(error) && error.kind === "auth_failure");
    if (authFailure) {
      throw authFailure;
    }

    if (responses.length === 0 && errors[0]) {
      throw errors[0];
    }

    for (const error of errors) {
      log.warn(`Partial failure in tier '${tier}': ${error.message}`);
    }

    return responses;
  }
}
