import type { ExtractionOutput, SiteKind } from "../tabs/types.js";

/**
 * Turns a fetched page into normalized content. `matches` must be a pure
 * function of the URL; `extract` may reach out to external tools but never
 * touches the database.
 */
export interface Extractor {
  readonly name: string;
  readonly siteKind: SiteKind;
  matches(url: string): boolean;
  extract(url: string, rawHtml: string): Promise<ExtractionOutput>;
}
