/**
 * Base class for HTTP search providers
 *
 * Holds the engine config, API key lookup, metadata and the retry wrapper so
 * concrete providers only build requests and map responses.
 */

import type { EngineConfig } from "../config/types";
import type {
  ProviderMetadata,
  ProviderSearchRequest,
  SearchProvider,
  SearchResponse,
} from "../core/provider";
import type { EngineId, Tier } from "../core/types";
import { withRetry } from "./retry";
import { getApiKey } from "./utils";

export abstract class BaseProvider<T extends EngineConfig> implements SearchProvider {
  readonly id: EngineId;
  readonly tier: Tier;

  constructor(protected readonly config: T) {
    this.id = config.id;
    this.tier = config.tier;
  }

  abstract search(request: ProviderSearchRequest): Promise<SearchResponse>;

  protected abstract getDocsUrl(): string;

  /** Environment variable holding the API key, or "" when none is used */
  protected abstract getApiKeyEnv(): string;

  protected requiresApiKey(): boolean {
    return true;
  }

  /**
   * @throws BackendError("auth_failure") when the key is required but unset
   */
  protected getApiKey(): string {
    return getApiKey(this.id, this.getApiKeyEnv());
  }

  isConfigured(): boolean {
    if (!this.requiresApiKey()) {
      return true;
    }
    const env = this.getApiKeyEnv();
    return env !== "" && Boolean(process.env[env]);
  }

  getMissingConfigMessage(): string {
    return `Missing environment variable: ${this.getApiKeyEnv()} (see ${this.getDocsUrl()})`;
  }

  getMetadata(): ProviderMetadata {
    return {
      id: this.id,
      displayName: this.config.displayName,
      tier: this.tier,
      docsUrl: this.getDocsUrl(),
      supportsExtraction: false,
    };
  }

  /**
   * Run a request under this engine's retry policy
   */
  protected retrying<R>(fn: () => Promise<R>, signal?: AbortSignal): Promise<R> {
    const retry = this.config.retry;
    if (!retry || retry.maxAttempts <= 1) {
      return fn();
    }
    return withRetry(this.id, fn, { ...retry, signal });
  }
}
