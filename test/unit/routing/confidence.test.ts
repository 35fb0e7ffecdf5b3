import { describe, expect, test } from "vitest";
import { ConfidenceSchema } from "../../../src/config/validation";
import { ConfidenceCalculator } from "../../../src/routing/confidence";
import { createHit, createHits } from "../../__helpers__";

const calculator = new ConfidenceCalculator(ConfidenceSchema.parse({}));

describe("ConfidenceCalculator", () => {
  test("an empty hit set scores exactly zero", () => {
    expect(calculator.score([], { tier: "free" })).toEqual({ value: 0, tier: "free" });
  });

  test("hits without a URL are ignored", () => {
    expect(calculator.score([createHit({ url: "" })], { tier: "semantic" }).value).toBe(0);
  });

  test("weights a single plain hit against the saturation point", () => {
    // count .2, relevance .1 (no query), content .06; no authority, no agreement
    const score = calculator.score([createHit()], { tier: "free" });
    expect(score.tier).toBe("free");
    expect(score.value).toBeCloseTo(0.072, 10);
  });

  test("a small requested limit lowers the saturation point", () => {
    const score = calculator.score([createHit()], { tier: "free", limit: 1 });
    expect(score.value).toBeCloseTo(0.36, 10);
  });

  test("a limit above the configured saturation does not raise it", () => {
    const hits = createHits(5);
    expect(calculator.score(hits, { tier: "free", limit: 50 }).value).toBeCloseTo(
      calculator.score(hits, { tier: "free" }).value,
      10,
    );
  });

  test("saturated components reach a score of one", () => {
    const hits = Array.from({ length: 5 }, (_, i) =>
      createHit({
        title: `Rust async guide ${i}`,
        url: `https://github.com/org/repo${i}`,
        snippet: "rust async",
        content: "x".repeat(1001),
        sourceEngine: "google",
        engines: ["google", "bing"],
      }),
    );
    const value = calculator.score(hits, { tier: "free", query: "rust async" }).value;
    expect(value).toBeCloseTo(1, 10);
    expect(value).toBeLessThanOrEqual(1);
  });

  test("adding hits never lowers the score", () => {
    const hits = createHits(6);
    let previous = 0;
    for (let n = 1; n <= hits.length; n++) {
      const value = calculator.score(hits.slice(0, n), { tier: "free", query: "result" }).value;
      expect(value).toBeGreaterThanOrEqual(previous);
      previous = value;
    }
  });

  describe("breakdown", () => {
    test("relevance is the share of query terms of three or more characters", () => {
      const breakdown = calculator.breakdown([createHit({ title: "Rust book", snippet: "" })], {
        tier: "free",
        query: "rust async io",
        limit: 1,
      });
      expect(breakdown.relevance).toBe(0.5);
    });

    test("authority matches listed domains and their subdomains only", () => {
      const context = { tier: "free" as const, limit: 1 };
      expect(
        calculator.breakdown([createHit({ url: "https://en.wikipedia.org/wiki/Rust" })], context)
          .authority,
      ).toBe(1);
      expect(
        calculator.breakdown([createHit({ url: "https://notgithub.com/x" })], context).authority,
      ).toBe(0);
    });

    test("content rewards snippets and long page text", () => {
      const context = { tier: "free" as const, limit: 1 };
      expect(calculator.breakdown([createHit({ snippet: undefined })], context).content).toBe(0);
      expect(calculator.breakdown([createHit()], context).content).toBeCloseTo(0.3, 10);
      expect(
        calculator.breakdown([createHit({ content: "x".repeat(600) })], context).content,
      ).toBeCloseTo(0.8, 10);
    });

    test("agreement needs the same URL or title from two engines", () => {
      const a = createHit({ url: "https://www.example.com/doc/", sourceEngine: "a", engines: ["a"] });
      const b = createHit({ url: "https://example.com/doc", sourceEngine: "b", engines: ["b"] });
      const lone = createHit({
        title: "Other",
        url: "https://other.dev",
        sourceEngine: "a",
        engines: ["a"],
      });
      expect(calculator.breakdown([a, b, lone], { tier: "free" }).agreement).toBeCloseTo(0.4, 10);
    });

    test("a title seen from two engines counts as agreement", () => {
      const a = createHit({ title: "Tokio: Tutorial", url: "https://a.dev", sourceEngine: "a", engines: [] });
      const b = createHit({ title: "tokio tutorial", url: "https://b.dev", sourceEngine: "b", engines: [] });
      expect(calculator.breakdown([a, b], { tier: "free", limit: 2 }).agreement).toBe(1);
    });

    test("a hit merged from two engines agrees with itself", () => {
      const merged = createHit({ sourceEngine: "a", engines: ["a", "b"] });
      expect(calculator.breakdown([merged], { tier: "free", limit: 1 }).agreement).toBe(1);
    });
  });
});
