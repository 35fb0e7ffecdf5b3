/**
 * Exa Semantic Search Provider
 *
 * Neural search over the web; returns page text trimmed to `maxCharacters`.
 */

import type { ExaConfig } from "../config/types";
import type { ProviderSearchRequest, SearchResponse, SearchResultItem } from "../core/provider";
import { BaseProvider } from "./BaseProvider";
import { ExaApiResponseSchema } from "./types";
import { fetchWithErrorHandling, joinUrl } from "./utils";

const TIME_RANGE_DAYS = { day: 1, week: 7, month: 30, year: 365 } as const;

export class ExaProvider extends BaseProvider<ExaConfig> {
  protected getDocsUrl(): string {
    return "https://docs.exa.ai/reference/search";
  }

  protected getApiKeyEnv(): string {
    return this.config.apiKeyEnv;
  }

  async search(request: ProviderSearchRequest): Promise<SearchResponse> {
    const apiKey = this.getApiKey();
    const body: Record<string, unknown> = {
      query: request.query,
      type: "auto",
      numResults: request.limit,
      contents: {
        text: { maxCharacters: this.config.maxCharacters },
      },
    };

    const timeRange = request.filters?.timeRange;
    if (timeRange) {
      const since = new Date(Date.now() - TIME_RANGE_DAYS[timeRange] * 24 * 60 * 60 * 1000);
      body.startPublishedDate = since.toISOString();
    }

    const { data: json, tookMs } = await this.retrying(
      () =>
        fetchWithErrorHandling(
          this.id,
          joinUrl(this.config.endpoint, "search"),
          {
            method: "POST",
            headers: {
              "Content-Type": "application/json",
              "x-api-key": apiKey,
            },
            body: JSON.stringify(body),
            timeoutMs: request.timeoutMs,
            signal: request.signal,
          },
          ExaApiResponseSchema,
          "Exa",
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
        ...(result.snippet ? { snippet: result.snippet } : {}),
        ...(result.text ? { content: result.text } : {}),
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
}
