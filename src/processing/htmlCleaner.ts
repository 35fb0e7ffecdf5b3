/**
 * HTML cleaner for extracted page content
 *
 * Strips markup with a small state machine (script and style bodies are
 * dropped whole), decodes common entities, then removes boilerplate and
 * repeated lines. Block-level tags become line breaks so paragraphs survive.
 */

const NOISE_PATTERNS = [
  "cookie",
  "privacy policy",
  "terms of service",
  "subscribe",
  "newsletter",
  "advertisement",
  "sponsored",
  "click here",
  "read more",
  "share on",
  "follow us",
  "copyright ©",
  "all rights reserved",
];

/** Lines this long are content even when they mention a noise pattern */
const NOISE_MAX_LINE_LENGTH = 200;

const BLOCK_TAGS = new Set([
  "address",
  "article",
  "aside",
  "blockquote",
  "br",
  "dd",
  "div",
  "dl",
  "dt",
  "figcaption",
  "footer",
  "h1",
  "h2",
  "h3",
  "h4",
  "h5",
  "h6",
  "header",
  "hr",
  "li",
  "main",
  "nav",
  "ol",
  "p",
  "pre",
  "section",
  "table",
  "td",
  "th",
  "tr",
  "ul",
]);

const NAMED_ENTITIES: Record<string, string> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
  nbsp: " ",
  mdash: "—",
  ndash: "–",
  hellip: "…",
  copy: "©",
};

function tagName(tag: string): { name: string; closing: boolean } {
  const trimmed = tag.trim().toLowerCase();
  const closing = trimmed.startsWith("/");
  const name = (closing ? trimmed.slice(1) : trimmed).split(/[\s/]/, 1)[0] ?? "";
  return { name, closing };
}

/**
 * Remove tags, dropping script and style bodies
 */
export function removeTags(html: string): string {
  let result = "";
  let tag = "";
  let inTag = false;
  let skipping: string | undefined;

  for (const ch of html) {
    if (ch === "<") {
      inTag = true;
      tag = "";
    } else if (ch === ">" && inTag) {
      inTag = false;
      const { name, closing } = tagName(tag);
      if (skipping) {
        if (closing && name === skipping) {
          skipping = undefined;
        }
      } else if (!closing && (name === "script" || name === "style") && !tag.trim().endsWith("/")) {
        skipping = name;
      } else if (BLOCK_TAGS.has(name)) {
        result += "\n";
      }
    } else if (inTag) {
      tag += ch;
    } else if (!skipping) {
      result += ch;
    }
  }

  return result;
}

export function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, entity: string) => {
    if (entity.startsWith("#")) {
      const hex = entity[1] === "x" || entity[1] === "X";
      const code = Number.parseInt(entity.slice(hex ? 2 : 1), hex ? 16 : 10);
      return Number.isFinite(code) && code > 0 && code <= 0x10ffff ? String.fromCodePoint(code) : match;
    }
    return NAMED_ENTITIES[entity.toLowerCase()] ?? match;
  });
}

function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

function isNoise(line: string): boolean {
  if (line.length >= NOISE_MAX_LINE_LENGTH) {
    return false;
  }
  const lower = line.toLowerCase();
  return NOISE_PATTERNS.some((pattern) => lower.includes(pattern));
}

export const HtmlCleaner = {
  /**
   * Clean full page content into plain text lines
   */
  clean(html: string): string {
    const text = decodeEntities(removeTags(html));
    const seen = new Set<string>();
    const lines: string[] = [];

    for (const raw of text.split(/\r?\n/)) {
      const line = collapseWhitespace(raw);
      if (!line || isNoise(line) || seen.has(line)) {
        continue;
      }
      seen.add(line);
      lines.push(line);
    }

    return lines.join("\n");
  },

  /**
   * Flatten a short fragment (snippet, title) to a single line of text
   */
  stripMarkup(fragment: string): string {
    return collapseWhitespace(decodeEntities(removeTags(fragment)));
  },
};
