/**
 * Tavily Search and Extract Provider
 *
 * Serves the deep-extraction tier: `search` asks for raw page content, and
 * `extract` pulls full content for URLs found by an earlier tier.
 */

import type { TavilyConfig } from "../config/types";
import type {
  ExtractionProvider,
  ProviderExtractRequest,
  ProviderMetadata,
  ProviderSearchRequest,
  SearchResponse,
  SearchResultItem,
} from "../core/provider";
import { BaseProvider } from "./BaseProvider";
import { TavilyApiResponseSchema, TavilyExtractResponseSchema } from "./types";
import { fetchWithErrorHandling, joinUrl } from "./utils";

export class TavilyProvider extends BaseProvider<TavilyConfig> implements ExtractionProvider {
  protected getDocsUrl(): string {
    return "https://docs.tavily.com/";
  }

  protected getApiKeyEnv(): string {
    return this.config.apiKeyEnv;
  }

  override getMetadata(): ProviderMetadata {
    return { ...super.getMetadata(), supportsExtraction: true };
  }

  private headers(apiKey: string): Record<string, string> {
    return {
      "Content-Type": "application/json",
      Authorization: `Bearer ${apiKey}`,
    };
  }

  async search(request: ProviderSearchRequest): Promise<SearchResponse> {
    const apiKey = this.getApiKey();
    const body = {
      query: request.query,
      search_depth: this.config.searchDepth,
      max_results: request.limit,
      include_answer: false,
      include_raw_content: true,
      ...(request.filters?.timeRange ? { time_range: request.filters.timeRange } : {}),
    };

    const { data: json, tookMs } = await this.retrying(
      () =>
        fetchWithErrorHandling(
          this.id,
          joinUrl(this.config.endpoint, "search"),
          {
            method: "POST",
            headers: this.headers(apiKey),
            body: JSON.stringify(body),
            timeoutMs: request.timeoutMs,
            signal: request.signal,
          },
          TavilyApiResponseSchema,
          "Tavily",
        ),
      request.signal,
    );

    const items: SearchResultItem[] = [];
    for (const result of json.results) {
      if (!result.url) {
        continue;
      }
      items.push({
        title: result.title || result.url,
        url: result.url,
        ...(result.content ? { snippet: result.content } : {}),
        ...(result.raw_content ? { content: result.raw_content } : {}),
        sourceEngine: this.id,
        engines: [this.id],
        ...(typeof result.score === "number" ? { score: result.score } : {}),
      });
    }

    return {
      engineId: this.id,
      items: items.slice(0, request.limit),
      tookMs,
    };
  }

  async extract(request: ProviderExtractRequest): Promise<SearchResponse> {
    const apiKey = this.getApiKey();

    const { data: json, tookMs } = await this.retrying(
      () =>
        fetchWithErrorHandling(
          this.id,
          joinUrl(this.config.endpoint, "extract"),
          {
            method: "POST",
            headers: this.headers(apiKey),
            body: JSON.stringify({ urls: request.urls }),
            timeoutMs: request.timeoutMs,
            signal: request.signal,
          },
          TavilyExtractResponseSchema,
          "Tavily Extract",
        ),
      request.signal,
    );

    // Only URLs that were asked for are reported back
    const requested = new Set(request.urls);
    const items: SearchResultItem[] = [];
    for (const result of json.results) {
      if (!result.url || !requested.has(result.url)) {
        continue;
      }
      items.push({
        title: result.title || result.url,
        url: result.url,
        ...(result.raw_content ? { content: result.raw_content } : {}),
        sourceEngine: this.id,
        engines: [this.id],
      });
    }

    return { engineId: this.id, items, tookMs };
  }
}
