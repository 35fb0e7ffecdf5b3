import { describe, expect, test } from "vitest";
import type { SearchHit } from "../../../src/core/types";
import { ContextPruner, estimateTokens, titleSimilarity } from "../../../src/processing/contextPruner";
import { createHit } from "../../__helpers__";

const pruner = new ContextPruner();

// "abcd" + "https://a.io" is 16 characters: exactly 4 tokens before content
function bare(overrides: Partial<SearchHit> = {}): SearchHit {
  return createHit({ title: "abcd", url: "https://a.io", snippet: undefined, ...overrides });
}

describe("estimateTokens", () => {
  test("is a quarter of the character count, rounded up", () => {
    expect(estimateTokens(bare())).toBe(4);
    expect(estimateTokens(bare({ snippet: "x" }))).toBe(5);
  });
});

describe("titleSimilarity", () => {
  test("is the Jaccard index of the word sets", () => {
    expect(titleSimilarity("a b c d", "a b c e")).toBe(0.6);
    expect(titleSimilarity("Tokio: Tutorial", "tokio tutorial")).toBe(1);
    expect(titleSimilarity("", "")).toBe(0);
  });
});

describe("ContextPruner.dedupe", () => {
  test("folds the same canonical URL into the first hit", () => {
    const first = createHit({ url: "https://www.example.com/a/", snippet: undefined, engines: ["g"] });
    const second = createHit({ url: "https://example.com/a", snippet: "from b", engines: ["b"] });

    const result = pruner.dedupe([first, second]);
    expect(result).toEqual([{ ...first, snippet: "from b", engines: ["g", "b"] }]);
    expect(first.engines).toEqual(["g"]);
  });

  test("folds near-duplicate titles of three or more words", () => {
    const a = createHit({ title: "one two three four five six seven", url: "https://a.dev" });
    const b = createHit({ title: "One two three four five six seven eight", url: "https://b.dev" });
    expect(pruner.dedupe([a, b]).map((hit) => hit.url)).toEqual(["https://a.dev"]);
  });

  test("short titles are only matched by URL", () => {
    const a = createHit({ title: "Rust docs", url: "https://a.dev" });
    const b = createHit({ title: "rust docs", url: "https://b.dev" });
    expect(pruner.dedupe([a, b])).toHaveLength(2);
  });
});

describe("ContextPruner.clean", () => {
  test("strips markup from snippets and content", () => {
    const hit = createHit({
      title: "<b>Tokio</b>",
      snippet: "<b>Fast</b> runtime",
      content: "<p>Para one</p><p>Subscribe to our newsletter</p>",
    });
    expect(pruner.clean(hit)).toEqual({
      ...hit,
      title: "Tokio",
      snippet: "Fast runtime",
      content: "Para one",
    });
  });

  test("content that cleans to nothing is removed", () => {
    const cleaned = pruner.clean(createHit({ content: "<script>track()</script>" }));
    expect(cleaned).not.toHaveProperty("content");
  });
});

describe("ContextPruner.fitBudget", () => {
  test("keeps hits in order while they fit", () => {
    const hits = [bare({ url: "https://a.io" }), bare({ url: "https://b.io" }), bare({ url: "https://c.io" })];
    expect(pruner.fitBudget(hits, 8).map((hit) => hit.url)).toEqual(["https://a.io", "https://b.io"]);
  });

  test("truncates the first hit that does not fit", () => {
    const big = bare({ content: "x".repeat(1000) });
    const [only, ...rest] = pruner.fitBudget([big, bare({ url: "https://b.io" })], 100);

    // (100 - 4) * 4 - 3 characters survive, plus the ellipsis
    expect(only?.content).toBe(`${"x".repeat(381)}...`);
    expect(only && estimateTokens(only)).toBe(100);
    expect(rest).toEqual([]);
  });

  test("astral characters count twice and are never split", () => {
    const big = bare({ content: "\u{1F600}".repeat(1000) });
    const [only] = pruner.fitBudget([big], 100);

    // 381 code units would end inside the 191st emoji
    expect(only?.content).toBe(`${"\u{1F600}".repeat(190)}...`);
    expect(only && estimateTokens(only)).toBe(100);
  });

  test("keeps at least 100 characters when truncating", () => {
    const big = bare({ content: "x".repeat(1000) });
    expect(pruner.fitBudget([big], 30)[0]?.content).toBe(`${"x".repeat(101)}...`);
  });

  test("drops the content when fewer than 100 characters would remain", () => {
    const big = bare({ content: "x".repeat(1000) });
    expect(pruner.fitBudget([big], 29)).toEqual([bare()]);
  });

  test("drops a hit whose title and URL alone exceed the budget", () => {
    expect(pruner.fitBudget([bare()], 3)).toEqual([]);
  });
});

describe("ContextPruner.prune", () => {
  test("a non-positive budget yields nothing", () => {
    expect(pruner.prune([bare()], 0)).toEqual([]);
  });

  test("dedupes, cleans and fits in one pass", () => {
    const hits = [
      bare({ snippet: "<i>first</i>", engines: ["g"] }),
      bare({ url: "https://www.a.io/", engines: ["b"] }),
      bare({ url: "https://b.io", content: `<p>${"y".repeat(1000)}</p>` }),
    ];
    const result = pruner.prune(hits, 60);

    expect(result).toHaveLength(2);
    expect(result[0]).toEqual({ ...bare(), snippet: "first", engines: ["g", "b"] });
    // first hit costs 6 tokens; the second keeps (60 - 6 - 4) * 4 - 3 characters
    expect(result[1]?.content).toBe(`${"y".repeat(197)}...`);
  });

  test("leaves its input untouched", () => {
    const hits = [bare({ engines: ["g"] }), bare({ engines: ["b"] })];
    pruner.prune(hits, 100);
    expect(hits[0]?.engines).toEqual(["g"]);
  });
});
