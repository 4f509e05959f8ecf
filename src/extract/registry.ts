import { NoExtractorMatchError } from "../errors.js";
import type { ExtractionOutput } from "../tabs/types.js";
import type { Extractor } from "./types.js";

/**
 * Ordered extractor list. Dispatch picks the first extractor whose `matches`
 * accepts the URL, so specific extractors must be registered before the
 * generic fallback. The list is frozen once the pipeline starts using it.
 */
export class ExtractorRegistry {
  private readonly extractors: Extractor[] = [];
  private sealed = false;

  constructor(extractors: readonly Extractor[] = []) {
    for (const extractor of extractors) {
      this.register(extractor);
    }
  }

  /** Appends an extractor at the lowest priority. */
  register(extractor: Extractor): this {
    if (this.sealed) {
      throw new Error(`Registry is sealed; cannot register ${extractor.name}`);
    }
    this.extractors.push(extractor);
    return this;
  }

  /** Prevents further registrations. */
  seal(): this {
    this.sealed = true;
    return this;
  }

  selectExtractor(url: string): Extractor | null {
    return this.extractors.find((extractor) => extractor.matches(url)) ?? null;
  }

  async extract(url: string, rawHtml: string): Promise<ExtractionOutput> {
    const extractor = this.selectExtractor(url);
    if (!extractor) {
      throw new NoExtractorMatchError(url);
    }
    return extractor.extract(url, rawHtml);
  }

  /** Extractor names in priority order. */
  list(): string[] {
    return this.extractors.map((extractor) => extractor.name);
  }
}
