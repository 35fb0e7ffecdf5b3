import { describe, expect, test } from "vitest";
import { HtmlCleaner, decodeEntities, removeTags } from "../../../src/processing/htmlCleaner";

describe("removeTags", () => {
  test("drops script bodies, including tags inside them", () => {
    expect(removeTags("<p>Hello</p><script>var x = '<b>';</script>World")).toBe("\nHello\nWorld");
  });

  test("drops style bodies", () => {
    expect(removeTags("<style>p{color:red}</style>Text")).toBe("Text");
  });

  test("inline tags vanish without a line break", () => {
    expect(removeTags("a <b>bold</b> <a href='/x'>link</a>")).toBe("a bold link");
  });
});

describe("decodeEntities", () => {
  test("decodes named and numeric entities", () => {
    expect(decodeEntities("Tom &amp; Jerry &lt;3 &#39;hi&#39; &#x41;")).toBe("Tom & Jerry <3 'hi' A");
  });

  test("leaves unknown entities alone", () => {
    expect(decodeEntities("&unknown; &#0;")).toBe("&unknown; &#0;");
  });
});

describe("HtmlCleaner.clean", () => {
  test("removes boilerplate and repeated lines", () => {
    const html =
      "<div>Intro text</div><div>Accept cookie settings</div><p>Intro text</p><p>  Body   with   spaces </p>";
    expect(HtmlCleaner.clean(html)).toBe("Intro text\nBody with spaces");
  });

  test("keeps long lines even when they mention a noise phrase", () => {
    const line = `This article explains how the cookie jar in the HTTP client works ${"in detail ".repeat(15)}`.trim();
    expect(line.length).toBeGreaterThanOrEqual(200);
    expect(HtmlCleaner.clean(`<p>${line}</p>`)).toBe(line);
  });

  test("markup-only content cleans to an empty string", () => {
    expect(HtmlCleaner.clean("<script>track()</script><div> </div>")).toBe("");
  });
});

describe("HtmlCleaner.stripMarkup", () => {
  test("flattens a fragment to one line", () => {
    expect(HtmlCleaner.stripMarkup("<b>Rust</b> &amp; <i>Go</i>\n  rocks")).toBe("Rust & Go rocks");
  });
});
