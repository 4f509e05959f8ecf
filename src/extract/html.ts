import * as cheerio from "cheerio";
import { detect } from "tinyld";

/** Whitespace tokenization shared by every extractor. */
export function countWords(text: string | null): number {
  if (!text) {
    return 0;
  }
  const trimmed = text.trim();
  return trimmed.length === 0 ? 0 : trimmed.split(/\s+/).length;
}

/** Collapses runs of whitespace and trims. */
export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/** Hostname in lower case, or an empty string for unparsable URLs. */
/** Whether the URL parses with an `http:` or `https:` scheme, in any letter case. */
export function isHttpUrl(url: string): boolean {
  try {
    const { protocol } = new URL(url);
    return protocol === "http:" || protocol === "https:";
  } catch {
    return false;
  }
}

export function hostnameOf(url: string): string {
  try {
    return new URL(url).hostname.toLowerCase();
  } catch {
    return "";
  }
}

/**
 * Content of the first `<meta>` whose `name` or `property` equals `key`,
 * ignoring tags with an empty content.
 */
export function metaContent($: cheerio.CheerioAPI, key: string): string | null {
  for (const attribute of ["name", "property"]) {
    const content = $(`meta[${attribute}="${key}"]`).first().attr("content");
    if (content !== undefined && content.trim().length > 0) {
      return content.trim();
    }
  }
  return null;
}

/** First non-empty meta content among `keys`, in order. */
export function firstMetaContent($: cheerio.CheerioAPI, keys: readonly string[]): string | null {
  for (const key of keys) {
    const content = metaContent($, key);
    if (content !== null) {
      return content;
    }
  }
  return null;
}

/** Trimmed text of the document `<title>`, or null when missing or blank. */
export function documentTitle($: cheerio.CheerioAPI): string | null {
  const title = collapseWhitespace($("title").first().text());
  return title.length > 0 ? title : null;
}

/** Minimum sample length worth handing to the language detector. */
const MIN_LANGUAGE_SAMPLE = 20;

/** ISO 639-1 code detected from the text, or null when undecidable. */
export function detectLanguage(text: string | null): string | null {
  const sample = text?.slice(0, 2_000).trim() ?? "";
  if (sample.length < MIN_LANGUAGE_SAMPLE) {
    return null;
  }
  const detected = detect(sample);
  return detected.trim().length > 0 ? detected : null;
}

/** Drops entries whose value is `null` or `undefined`. */
export function compactRecord(record: Record<string, unknown>): Record<string, unknown> {
  const compact: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(record)) {
    if (value !== null && value !== undefined) {
      compact[key] = value;
    }
  }
  return compact;
}
