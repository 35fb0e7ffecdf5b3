/**
 * DuckDuckGo Instant Answer Provider
 *
 * Free, keyless. Returns the abstract (when there is one) followed by related
 * topics; topic groups are flattened in order.
 */

import type { DuckDuckGoConfig } from "../config/types";
import type { ProviderSearchRequest, SearchResponse, SearchResultItem } from "../core/provider";
import { BaseProvider } from "./BaseProvider";
import type { DuckDuckGoTopic } from "./types";
import { DuckDuckGoApiResponseSchema } from "./types";
import { buildUrl, fetchWithErrorHandling } from "./utils";

function flattenTopics(topics: DuckDuckGoTopic[]): DuckDuckGoTopic[] {
  return topics.flatMap((topic) => (topic.Topics ? flattenTopics(topic.Topics) : [topic]));
}

export class DuckDuckGoProvider extends BaseProvider<DuckDuckGoConfig> {
  protected getDocsUrl(): string {
    return "https://duckduckgo.com/api";
  }

  protected getApiKeyEnv(): string {
    return "";
  }

  protected override requiresApiKey(): boolean {
    return false;
  }

  async search(request: ProviderSearchRequest): Promise<SearchResponse> {
    const url = buildUrl(this.config.endpoint, {
      q: request.query,
      format: "json",
      no_html: 1,
      skip_disambig: 1,
    });

    const { data: json, tookMs } = await this.retrying(
      () =>
        fetchWithErrorHandling(
          this.id,
          url,
          {
            method: "GET",
            headers: { Accept: "application/json" },
            timeoutMs: request.timeoutMs,
            signal: request.signal,
          },
          DuckDuckGoApiResponseSchema,
          "DuckDuckGo",
        ),
      request.signal,
    );

    const items: SearchResultItem[] = [];
    const abstract = json.AbstractText || json.Abstract;
    if (abstract && json.AbstractURL) {
      items.push({
        title: json.Heading || "DuckDuckGo Result",
        url: json.AbstractURL,
        snippet: abstract,
        sourceEngine: this.id,
        engines: [this.id],
      });
    }

    for (const topic of flattenTopics(json.RelatedTopics ?? [])) {
      if (!topic.Text || !topic.FirstURL) {
        continue;
      }
      items.push({
        title: topic.Text.split(" - ")[0] ?? topic.Text,
        url: topic.FirstURL,
        snippet: topic.Text,
        sourceEngine: this.id,
        engines: [this.id],
      });
    }

    return {
      engineId: this.id,
      items: items.slice(0, request.limit),
      tookMs,
    };
  }
}
