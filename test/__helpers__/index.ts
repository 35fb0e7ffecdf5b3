/**
 * Consolidated Test Utilities and Helpers
 *
 * Fakes and factories shared by the unit and integration suites.
 */

import type { SearchBackend } from "../../src/core/backend/BackendAdapter";
import type {
  ExtractionProvider,
  ProviderExtractRequest,
  ProviderMetadata,
  ProviderSearchRequest,
  SearchResponse,
  SearchResultItem,
} from "../../src/core/provider";
import type { ConfidenceScore, SearchHit, Tier } from "../../src/core/types";
import { RetrievalCancelledError } from "../../src/core/types";
import type { ConfidenceScorer, ScoreContext } from "../../src/routing/confidence";

// ============ Result Factories ============

export function createHit(overrides: Partial<SearchHit> = {}): SearchHit {
  return {
    title: "Test Result",
    url: "https://example.com/page",
    snippet: "Test snippet",
    sourceEngine: "test",
    engines: ["test"],
    tier: "free",
    ...overrides,
  };
}

/**
 * Hits with distinct URLs and titles: https://example{n}.com/, "Result {n}"
 */
export function createHits(count: number, tier: Tier = "free", engine = "test"): SearchHit[] {
  return Array.from({ length: count }, (_, i) =>
    createHit({
      title: `Result ${i + 1}`,
      url: `https://example${i + 1}.com/`,
      snippet: `Snippet ${i + 1}`,
      sourceEngine: engine,
      engines: [engine],
      tier,
    }),
  );
}

export function createItems(count: number, engine = "test"): SearchResultItem[] {
  return Array.from({ length: count }, (_, i) => ({
    title: `Item ${i + 1}`,
    url: `https://${engine}.example/${i + 1}`,
    snippet: `Item snippet ${i + 1}`,
    sourceEngine: engine,
  }));
}

// ============ Providers ============

export interface FakeProviderOptions {
  tier?: Tier;
  items?: SearchResultItem[];
  extractItems?: SearchResultItem[];
  error?: Error;
  delayMs?: number;
  configured?: boolean;
}

function wait(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new RetrievalCancelledError());
      return;
    }
    const timer = setTimeout(resolve, ms);
    signal?.addEventListener(
      "abort",
      () => {
        clearTimeout(timer);
        reject(new RetrievalCancelledError());
      },
      { once: true },
    );
  });
}

/**
 * Fake provider for unit testing: predictable, in process, records its calls
 */
export class FakeSearchProvider implements ExtractionProvider {
  readonly tier: Tier;
  readonly searchCalls: ProviderSearchRequest[] = [];
  readonly extractCalls: ProviderExtractRequest[] = [];

  constructor(
    public readonly id: string,
    private readonly options: FakeProviderOptions = {},
  ) {
    this.tier = options.tier ?? "free";
  }

  async search(request: ProviderSearchRequest): Promise<SearchResponse> {
    this.searchCalls.push(request);
    return this.respond(this.options.items ?? createItems(2, this.id), request.signal);
  }

  async extract(request: ProviderExtractRequest): Promise<SearchResponse> {
    this.extractCalls.push(request);
    const items =
      this.options.extractItems ??
      request.urls.map((url) => ({ title: url, url, content: `Content of ${url}`, sourceEngine: this.id }));
    return this.respond(items, request.signal);
  }

  private async respond(items: SearchResultItem[], signal?: AbortSignal): Promise<SearchResponse> {
    if (this.options.delayMs) {
      await wait(this.options.delayMs, signal);
    }
    if (this.options.error) {
      throw this.options.error;
    }
    return { engineId: this.id, items, tookMs: this.options.delayMs ?? 1 };
  }

  getMetadata(): ProviderMetadata {
    return {
      id: this.id,
      displayName: `${this.id} (fake)`,
      tier: this.tier,
      supportsExtraction: true,
    };
  }

  isConfigured(): boolean {
    return this.options.configured ?? true;
  }

  getMissingConfigMessage(): string {
    return `${this.id} is not configured`;
  }
}

// ============ Backend ============

export type TierScript = SearchHit[] | Error | ((signal?: AbortSignal) => Promise<SearchHit[]>);

export interface BackendCall {
  kind: "search" | "extract";
  tier: Tier;
  query?: string;
  limit?: number;
  urls?: string[];
}

/**
 * Scripted backend: each configured tier answers with fixed hits, an error,
 * or a custom async function
 */
export class FakeBackend implements SearchBackend {
  readonly calls: BackendCall[] = [];

  constructor(
    private readonly scripts: Partial<Record<Tier, TierScript>>,
    private readonly extractScript?: TierScript,
  ) {}

  hasTier(tier: Tier): boolean {
    return this.scripts[tier] !== undefined;
  }

  tiers(): Tier[] {
    return (["free", "semantic", "deep_extract"] as const).filter((tier) => this.hasTier(tier));
  }

  async search(
    tier: Tier,
    query: string,
    limit: number,
    options: { signal?: AbortSignal } = {},
  ): Promise<SearchHit[]> {
    this.calls.push({ kind: "search", tier, query, limit });
    return this.run(this.scripts[tier], options.signal);
  }

  async extract(urls: string[], options: { signal?: AbortSignal } = {}): Promise<SearchHit[]> {
    this.calls.push({ kind: "extract", tier: "deep_extract", urls });
    return this.run(this.extractScript ?? this.scripts.deep_extract, options.signal);
  }

  private async run(script: TierScript | undefined, signal?: AbortSignal): Promise<SearchHit[]> {
    if (script === undefined) {
      throw new Error("tier not scripted");
    }
    if (script instanceof Error) {
      throw script;
    }
    if (typeof script === "function") {
      return script(signal);
    }
    return script;
  }
}

/**
 * Scorer returning a fixed confidence per tier
 */
export class FixedScorer implements ConfidenceScorer {
  readonly contexts: ScoreContext[] = [];

  constructor(private readonly values: Partial<Record<Tier, number>>) {}

  score(_hits: readonly SearchHit[], context: ScoreContext): ConfidenceScore {
    this.contexts.push(context);
    return { value: this.values[context.tier] ?? 0, tier: context.tier };
  }
}

// ============ HTTP ============

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

/**
 * Wait for a specified amount of time
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
