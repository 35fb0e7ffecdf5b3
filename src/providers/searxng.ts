/**
 * SearXNG Search Provider Implementation
 *
 * Queries a self-hosted SearXNG aggregator through its JSON API. SearXNG reports
 * which upstream engines returned each result, which feeds cross-engine agreement.
 */

import type { SearxngConfig } from "../config/types";
import type { ProviderSearchRequest, SearchResponse, SearchResultItem } from "../core/provider";
import { BaseProvider } from "./BaseProvider";
import type { SearxngInfobox, SearxngSearchResult } from "./types";
import { SearxngApiResponseSchema } from "./types";
import { buildUrl, fetchWithErrorHandling } from "./utils";

export class SearxngProvider extends BaseProvider<SearxngConfig> {
  protected getDocsUrl(): string {
    return "https://docs.searxng.org/dev/search_api.html";
  }

  protected getApiKeyEnv(): string {
    return this.config.apiKeyEnv ?? "";
  }

  // SearXNG is usually a local service without authentication
  protected override requiresApiKey(): boolean {
    return false;
  }

  async search(request: ProviderSearchRequest): Promise<SearchResponse> {
    const { filters } = request;
    const url = buildUrl(this.config.endpoint, {
      q: request.query,
      format: "json",
      pageno: 1,
      safesearch: 0,
      categories: filters?.category,
      language: filters?.language ?? "all",
      time_range: filters?.timeRange,
    });

    const headers: Record<string, string> = { Accept: "application/json" };
    const apiKeyEnv = this.getApiKeyEnv();
    if (apiKeyEnv && process.env[apiKeyEnv]) {
      headers.Authorization = `Bearer ${process.env[apiKeyEnv]}`;
    }

    const { data: json, tookMs } = await this.retrying(
      () =>
        fetchWithErrorHandling(
          this.id,
          url,
          { method: "GET", headers, timeoutMs: request.timeoutMs, signal: request.signal },
          SearxngApiResponseSchema,
          "SearXNG",
        ),
      request.signal,
    );

    const items: SearchResultItem[] = [];
    for (const result of json.results) {
      const item = this.toItem(result);
      if (item) {
        items.push(item);
      }
    }

    // Infoboxes (Wikipedia, etc.) become results of their own
    for (const box of json.infoboxes ?? []) {
      const item = this.infoboxToItem(box);
      if (item) {
        items.push(item);
      }
    }

    return {
      engineId: this.id,
      items: items.slice(0, request.limit),
      tookMs,
    };
  }

  private toItem(result: SearxngSearchResult): SearchResultItem | undefined {
    if (!result.url) {
      return undefined;
    }
    const engines = result.engines?.length ? result.engines : result.engine ? [result.engine] : [];
    const snippet = result.content ?? result.description ?? undefined;
    return {
      title: result.title ?? result.url,
      url: result.url,
      ...(snippet ? { snippet } : {}),
      sourceEngine: result.engine ?? this.id,
      engines,
      ...(typeof result.score === "number" ? { score: result.score } : {}),
    };
  }

  private infoboxToItem(box: SearxngInfobox): SearchResultItem | undefined {
    const url = box.id ?? box.urls?.find((link) => link.url)?.url ?? undefined;
    if (!url) {
      return undefined;
    }
    const engine = box.engine ?? "wikipedia";
    return {
      title: box.infobox ?? "Info",
      url,
      ...(box.content ? { snippet: box.content } : {}),
      sourceEngine: engine,
      engines: [engine],
    };
  }
}
