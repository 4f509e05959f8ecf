import * as cheerio from "cheerio";

import { ExtractionError } from "../errors.js";
import type { ExtractionOutput } from "../tabs/types.js";
import {
  collapseWhitespace,
  compactRecord,
  countWords,
  detectLanguage,
  documentTitle,
  firstMetaContent,
  hostnameOf,
  isHttpUrl,
} from "./html.js";
import type { Extractor } from "./types.js";

/** Elements never considered part of the readable content. */
const EXCLUDED_TAGS = [
  "script",
  "style",
  "nav",
  "header",
  "footer",
  "aside",
  "noscript",
  "iframe",
  "form",
  "button",
  "input",
  "select",
  "textarea",
  "svg",
  "canvas",
  "video",
  "audio",
] as const;

/** Candidate containers for the main content, tried in order before `body`. */
const CONTENT_CONTAINERS = ["article", "main", "[role='main']"] as const;

const TEXT_BLOCKS = "p, li, h1, h2, h3, h4, h5, h6";
/** Blocks this short or shorter are navigation crumbs, captions and the like. */
const MIN_BLOCK_LENGTH = 20;

const TITLE_SEPARATORS = [" | ", " - ", " – ", " — ", " :: "] as const;
/** A leading title segment must be longer than this to replace the full title. */
const MIN_TITLE_SEGMENT = 10;

const META_KEYS: ReadonlyArray<readonly [string, readonly string[]]> = [
  ["description", ["description", "og:description", "twitter:description"]],
  ["author", ["author", "og:author", "article:author"]],
  ["published", ["article:published_time", "datePublished", "date"]],
  ["image", ["og:image", "twitter:image"]],
  ["site_name", ["og:site_name"]],
  ["type", ["og:type"]],
];

/** Drops a trailing site name such as "Article title | Site". */
export function cleanTitle(title: string): string {
  for (const separator of TITLE_SEPARATORS) {
    if (!title.includes(separator)) {
      continue;
    }
    const [lead] = title.split(separator);
    if (lead !== undefined && lead.length > MIN_TITLE_SEGMENT) {
      return lead.trim();
    }
  }
  return title.trim();
}

/** Heuristic fallback matching any HTTP(S) URL. */
export class GenericExtractor implements Extractor {
  readonly name = "generic_html";
  readonly siteKind = "generic_html" as const;

  matches(url: string): boolean {
    return isHttpUrl(url);
  }

  async extract(url: string, rawHtml: string): Promise<ExtractionOutput> {
    if (rawHtml.trim().length === 0) {
      throw new ExtractionError(url, `Empty document returned for ${url}`);
    }
    const $ = cheerio.load(rawHtml);

    const title = this.extractTitle($);
    const declaredLanguage = $("html").attr("lang")?.trim();
    const canonical = $("link[rel='canonical']").first().attr("href");
    const meta: Record<string, unknown> = { url, domain: hostnameOf(url) };
    for (const [key, names] of META_KEYS) {
      meta[key] = firstMetaContent($, names);
    }

    const textFull = this.extractText($);
    meta.canonical_url = canonical && canonical.trim().length > 0 ? canonical.trim() : null;
    meta.language = declaredLanguage && declaredLanguage.length > 0 ? declaredLanguage : detectLanguage(textFull);

    return {
      siteKind: this.siteKind,
      title,
      textFull,
      wordCount: countWords(textFull),
      videoSeconds: null,
      metadata: compactRecord(meta),
    };
  }

  private extractTitle($: cheerio.CheerioAPI): string | null {
    const title = documentTitle($);
    if (title) {
      return cleanTitle(title);
    }
    const heading = collapseWhitespace($("h1").first().text());
    return heading.length > 0 ? heading : null;
  }

  /** Mutates the document: excluded elements are removed first. */
  private extractText($: cheerio.CheerioAPI): string | null {
    $(EXCLUDED_TAGS.join(", ")).remove();

    let container = $("body").first();
    for (const selector of CONTENT_CONTAINERS) {
      const candidate = $(selector).first();
      if (candidate.length > 0) {
        container = candidate;
        break;
      }
    }
    if (container.length === 0) {
      return null;
    }

    const blocks: string[] = [];
    container.find(TEXT_BLOCKS).each((_, element) => {
      const text = collapseWhitespace($(element).text());
      if (text.length > MIN_BLOCK_LENGTH) {
        blocks.push(text);
      }
    });
    if (blocks.length > 0) {
      return blocks.join("\n\n");
    }

    const text = collapseWhitespace(container.text()).replace(/\.{3,}/g, "...");
    return text.length > 0 ? text : null;
  }
}
