/**
 * Tests for the per-tier backend over the provider registry
 */

import { describe, expect, test } from "vitest";
import { AdmissionGate } from "../../../src/core/admission";
import { BackendAdapter } from "../../../src/core/backend/BackendAdapter";
import { ProviderRegistry } from "../../../src/core/provider";
import { BackendError, RetrievalCancelledError } from "../../../src/core/types";
import { FakeSearchProvider, createItems } from "../../__helpers__";

function adapterFor(providers: FakeSearchProvider[], gate = new AdmissionGate(10)) {
  const registry = new ProviderRegistry();
  for (const provider of providers) {
    registry.register(provider);
  }
  return new BackendAdapter(registry, gate, { timeoutMs: 2500 });
}

describe("BackendAdapter.search", () => {
  test("merges providers of a tier by canonical URL", async () => {
    const adapter = adapterFor([
      new FakeSearchProvider("p1", {
        items: [{ title: "A", url: "https://www.x.dev/", sourceEngine: "p1" }],
      }),
      new FakeSearchProvider("p2", {
        items: [
          { title: "A again", url: "https://x.dev", snippet: "s", sourceEngine: "p2" },
          { title: "B", url: "https://y.dev", sourceEngine: "p2", score: 0.7 },
        ],
      }),
    ]);

    const hits = await adapter.search("free", "query", 10);
    expect(hits).toEqual([
      {
        title: "A",
        url: "https://www.x.dev/",
        snippet: "s",
        sourceEngine: "p1",
        engines: ["p1", "p2"],
        tier: "free",
      },
      { title: "B", url: "https://y.dev", sourceEngine: "p2", engines: ["p2"], tier: "free", score: 0.7 },
    ]);
  });

  test("keeps the engines a provider reports for each item", async () => {
    const adapter = adapterFor([
      new FakeSearchProvider("searxng", {
        items: [{ title: "A", url: "https://a.dev", sourceEngine: "google", engines: ["google", "bing"] }],
      }),
    ]);
    const [hit] = await adapter.search("free", "query", 10);
    expect(hit?.engines).toEqual(["google", "bing"]);
  });

  test("passes limit, filters and timeout to each provider and trims the merge", async () => {
    const p1 = new FakeSearchProvider("p1", { items: createItems(4, "p1") });
    const p2 = new FakeSearchProvider("p2", { items: createItems(4, "p2") });
    const adapter = adapterFor([p1, p2]);

    const hits = await adapter.search("free", "query", 3, { filters: { language: "en" } });
    expect(hits.map((hit) => hit.url)).toEqual([
      "https://p1.example/1",
      "https://p1.example/2",
      "https://p1.example/3",
    ]);
    expect(p2.searchCalls[0]).toMatchObject({
      query: "query",
      limit: 3,
      filters: { language: "en" },
      timeoutMs: 2500,
    });
  });

  test("only queries providers of the requested tier", async () => {
    const free = new FakeSearchProvider("free-1");
    const semantic = new FakeSearchProvider("semantic-1", { tier: "semantic" });
    const adapter = adapterFor([free, semantic]);

    await adapter.search("semantic", "query", 5);
    expect(free.searchCalls).toHaveLength(0);
    expect(semantic.searchCalls).toHaveLength(1);
    expect(adapter.tiers()).toEqual(["free", "semantic"]);
    expect(adapter.hasTier("deep_extract")).toBe(false);
  });

  test("returns the successful providers' hits on partial failure", async () => {
    const adapter = adapterFor([
      new FakeSearchProvider("p1", { error: new BackendError("p1", "timeout", "slow") }),
      new FakeSearchProvider("p2", { items: createItems(1, "p2") }),
    ]);
    const hits = await adapter.search("free", "query", 10);
    expect(hits.map((hit) => hit.sourceEngine)).toEqual(["p2"]);
  });

  test("throws the first error when every provider fails", async () => {
    const adapter = adapterFor([
      new FakeSearchProvider("p1", { error: new BackendError("p1", "rate_limited", "HTTP 429", 429) }),
      new FakeSearchProvider("p2", { error: new BackendError("p2", "timeout", "slow") }),
    ]);
    await expect(adapter.search("free", "query", 10)).rejects.toMatchObject({
      engineId: "p1",
      kind: "rate_limited",
    });
  });

  test("an auth failure wins over successful providers", async () => {
    const adapter = adapterFor([
      new FakeSearchProvider("p1", { items: createItems(2, "p1") }),
      new FakeSearchProvider("p2", { error: new BackendError("p2", "auth_failure", "bad key", 401) }),
    ]);
    await expect(adapter.search("free", "query", 10)).rejects.toMatchObject({ kind: "auth_failure" });
  });

  test("unknown errors become unreachable backend errors", async () => {
    const adapter = adapterFor([new FakeSearchProvider("p1", { error: new TypeError("boom") })]);
    const error = await adapter.search("free", "query", 10).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(BackendError);
    expect(error).toMatchObject({ engineId: "p1", kind: "unreachable", message: "boom" });
  });

  test("a tier with no provider is unreachable", async () => {
    const adapter = adapterFor([new FakeSearchProvider("p1")]);
    await expect(adapter.search("semantic", "query", 10)).rejects.toMatchObject({
      kind: "unreachable",
      message: "No provider configured for tier 'semantic'",
    });
  });

  test("holds one admission permit per provider call", async () => {
    const gate = new AdmissionGate(1);
    const adapter = adapterFor(
      [new FakeSearchProvider("p1", { delayMs: 5 }), new FakeSearchProvider("p2", { delayMs: 5 })],
      gate,
    );

    const pending = adapter.search("free", "query", 10);
    expect(gate.snapshot()).toEqual({ limit: 1, active: 1, queued: 1 });
    await pending;
    expect(gate.snapshot()).toEqual({ limit: 1, active: 0, queued: 0 });
  });

  test("cancellation surfaces as RetrievalCancelledError", async () => {
    const controller = new AbortController();
    const adapter = adapterFor([
      new FakeSearchProvider("p1", { delayMs: 1000 }),
      new FakeSearchProvider("p2", { items: createItems(1, "p2") }),
    ]);
    const pending = adapter.search("free", "query", 10, { signal: controller.signal });
    controller.abort();
    await expect(pending).rejects.toBeInstanceOf(RetrievalCancelledError);
  });
});

describe("BackendAdapter.extract", () => {
  test("extracts through deep-extraction providers", async () => {
    const tavily = new FakeSearchProvider("tavily", { tier: "deep_extract" });
    const adapter = adapterFor([tavily]);

    const hits = await adapter.extract(["https://a.dev/page"]);
    expect(hits).toEqual([
      {
        title: "https://a.dev/page",
        url: "https://a.dev/page",
        content: "Content of https://a.dev/page",
        sourceEngine: "tavily",
        engines: ["tavily"],
        tier: "deep_extract",
      },
    ]);
    expect(tavily.extractCalls[0]).toMatchObject({ urls: ["https://a.dev/page"], timeoutMs: 2500 });
  });

  test("no URLs means no call", async () => {
    const tavily = new FakeSearchProvider("tavily", { tier: "deep_extract" });
    expect(await adapterFor([tavily]).extract([])).toEqual([]);
    expect(tavily.extractCalls).toHaveLength(0);
  });

  test("fails without a deep-extraction provider", async () => {
    await expect(adapterFor([new FakeSearchProvider("p1")]).extract(["https://a.dev"])).rejects.toThrow(
      "No extraction provider configured",
    );
  });
});
