import * as cheerio from "cheerio";

import { DEFAULT_COLLECTION_PREFIX } from "../config/index.js";
import { FileFormatError } from "../errors.js";
import { isHttpUrl } from "../extract/html.js";
import type { BookmarkCandidate } from "../tabs/types.js";

/** Label given to a collection folder named exactly after the prefix. */
export const DEFAULT_COLLECTION_LABEL = "default";

/** Number of links kept from one collection folder. */
export interface CollectionCount {
  readonly label: string;
  readonly count: number;
}

/** Dry-run view of an export, computed without touching the database. */
export interface BookmarkFileStats {
  readonly collectionCount: number;
  /** Sum of the per-collection counts, duplicates included. */
  readonly itemCount: number;
  /** In document order. */
  readonly perCollectionCounts: readonly CollectionCount[];
}

export interface BookmarkImporterOptions {
  /** Folder-name prefix marking a tab collection. */
  readonly collectionPrefix?: string;
  /** Clock used when a bookmark carries no usable `ADD_DATE`. */
  readonly clock?: () => Date;
}

interface BookmarkLink {
  readonly href: string;
  readonly text: string;
  readonly addDate: string | undefined;
}

interface Collection {
  readonly label: string;
  readonly links: readonly BookmarkLink[];
}

/**
 * Reads Netscape bookmark exports. Each `<H3>` folder whose name starts with
 * the collection prefix owns the `<DL>` list that follows it; every HTTP(S)
 * link found in that list becomes a candidate tab.
 */
export class BookmarkImporter {
  private readonly prefix: string;
  private readonly clock: () => Date;

  constructor(options: BookmarkImporterOptions = {}) {
    this.prefix = options.collectionPrefix ?? DEFAULT_COLLECTION_PREFIX;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Candidates from every collection, in document order. Duplicates are kept;
   * the ingest step skips them.
   *
   * @throws FileFormatError when the document has no `<DL>` list at all.
   */
  parse(document: string): BookmarkCandidate[] {
    const $ = this.load(document);
    const candidates: BookmarkCandidate[] = [];
    for (const collection of this.collections($)) {
      for (const link of collection.links) {
        candidates.push({
          url: link.href,
          title: link.text.length > 0 ? link.text : null,
          collectionLabel: collection.label,
          collectedAt: this.parseAddDate(link.addDate),
        });
      }
    }
    return candidates;
  }

  /** Same traversal as {@link parse}, reduced to counts. */
  stats(document: string): BookmarkFileStats {
    const $ = this.load(document);
    const perCollectionCounts: CollectionCount[] = [];
    for (const collection of this.collections($)) {
      perCollectionCounts.push({ label: collection.label, count: collection.links.length });
    }
    return {
      collectionCount: perCollectionCounts.length,
      itemCount: perCollectionCounts.reduce((total, entry) => total + entry.count, 0),
      perCollectionCounts,
    };
  }

  private load(document: string): cheerio.CheerioAPI {
    const $ = cheerio.load(document);
    if ($("dl").length === 0) {
      throw new FileFormatError("Document contains no bookmark list (<DL>)");
    }
    return $;
  }

  private *collections($: cheerio.CheerioAPI): Generator<Collection> {
    for (const element of $("h3").toArray()) {
      const header = $(element);
      const name = header.text().trim();
      if (!name.startsWith(this.prefix)) {
        continue;
      }
      const list = header.nextAll("dl").first();
      if (list.length === 0) {
        continue;
      }
      const suffix = name.slice(this.prefix.length);
      const links: BookmarkLink[] = [];
      list.find("a[href]").each((_, anchor) => {
        const link = $(anchor);
        const href = (link.attr("href") ?? "").trim();
        if (isHttpUrl(href)) {
          links.push({ href, text: link.text().trim(), addDate: link.attr("add_date") });
        }
      });
      yield { label: suffix.length > 0 ? suffix : DEFAULT_COLLECTION_LABEL, links };
    }
  }

  /** `ADD_DATE` holds seconds since the epoch; anything else falls back to the clock. */
  private parseAddDate(raw: string | undefined): Date {
    const trimmed = raw?.trim() ?? "";
    if (/^\d+$/.test(trimmed)) {
      const date = new Date(Number.parseInt(trimmed, 10) * 1000);
      if (!Number.isNaN(date.getTime())) {
        return date;
      }
    }
    return this.clock();
  }
}
