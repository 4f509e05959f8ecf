import * as cheerio from "cheerio";

import { ExtractionError } from "../errors.js";
import type { ExtractionOutput } from "../tabs/types.js";
import { compactRecord, countWords, documentTitle, hostnameOf, metaContent } from "./html.js";
import type { Extractor } from "./types.js";

/** `/<user>/status/<numeric id>` and the `/i/web/status/<id>` share form. */
const STATUS_PATH_PATTERN = /\/status\/\d+(?:\/|$)/;

const POST_HOSTS = new Set(["twitter.com", "www.twitter.com", "x.com", "www.x.com", "mobile.twitter.com"]);

/** "Name on X: ..." or "Name (@handle) / X". */
const DISPLAY_NAME_PATTERN = /^([^(@]+?)(?:\s+on\s+(?:X|Twitter):|\s*\(@\w+\)\s*\/\s*(?:X|Twitter))/;

export interface PostAuthor {
  username?: string;
  display_name?: string;
  twitter_handle?: string;
}

/**
 * Posts on X/Twitter. The pages render client-side, so only the meta tags
 * served to link previews are read.
 */
export class SocialPostExtractor implements Extractor {
  readonly name = "twitter";
  readonly siteKind = "twitter" as const;

  matches(url: string): boolean {
    if (!POST_HOSTS.has(hostnameOf(url))) {
      return false;
    }
    return STATUS_PATH_PATTERN.test(new URL(url).pathname);
  }

  async extract(url: string, rawHtml: string): Promise<ExtractionOutput> {
    if (rawHtml.trim().length === 0) {
      throw new ExtractionError(url, `Empty document returned for ${url}`);
    }
    const $ = cheerio.load(rawHtml);

    const title = this.extractTitle($);
    const text = this.extractPostText($);
    const textFull = text ?? title;
    const author = this.extractAuthor($, url);

    const metadata = compactRecord({
      url,
      domain: hostnameOf(url),
      platform: url.includes("twitter.com") ? "twitter" : "x",
      author: Object.keys(author).length > 0 ? author : null,
      tweet_id: /\/status\/(\d+)/.exec(url)?.[1] ?? null,
      image: metaContent($, "og:image"),
      site_name: metaContent($, "og:site_name"),
      content_type: metaContent($, "og:type"),
      has_video: $("meta[property='og:video']").length > 0 ? true : null,
      card_type: metaContent($, "twitter:card"),
    });

    return {
      siteKind: this.siteKind,
      title,
      textFull,
      wordCount: countWords(textFull),
      videoSeconds: null,
      metadata,
    };
  }

  private extractTitle($: cheerio.CheerioAPI): string | null {
    const fromMeta = metaContent($, "og:title") ?? metaContent($, "twitter:title");
    if (fromMeta) {
      return fromMeta;
    }
    const title = documentTitle($);
    if (!title) {
      return null;
    }
    if (title.includes(" / X")) {
      return title.replaceAll(" / X", "");
    }
    return title.replaceAll(" / Twitter", "");
  }

  private extractPostText($: cheerio.CheerioAPI): string | null {
    const description = metaContent($, "og:description");
    if (description) {
      // Link previews quote the post body.
      return description.length >= 2 && description.startsWith('"') && description.endsWith('"')
        ? description.slice(1, -1)
        : description;
    }
    return metaContent($, "twitter:description") ?? metaContent($, "description");
  }

  private extractAuthor($: cheerio.CheerioAPI, url: string): PostAuthor {
    const author: PostAuthor = {};
    const [username] = new URL(url).pathname.split("/").filter((segment) => segment.length > 0);
    if (username) {
      author.username = username;
    }
    const title = documentTitle($);
    const displayName = title ? DISPLAY_NAME_PATTERN.exec(title)?.[1]?.trim() : undefined;
    if (displayName) {
      author.display_name = displayName;
    }
    const handle = metaContent($, "twitter:creator");
    if (handle) {
      author.twitter_handle = handle;
    }
    return author;
  }
}
