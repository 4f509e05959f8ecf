import pLimit from "p-limit";

import type { TabRepository } from "../db/tabStore.js";
import type { EnrichmentEngine, EnrichmentOutcome } from "../enrich/engine.js";
import { StatusTransitionError, TabTriageError, errorMessage } from "../errors.js";
import type { FetchedPage } from "../extract/fetcher.js";
import type { ExtractorRegistry } from "../extract/registry.js";
import type { StructuredLogger } from "../logger.js";
import { ENRICHABLE_STATUSES, type TabStatus } from "../tabs/status.js";
import type { TabItem } from "../tabs/types.js";
import { SingleFlight } from "./singleFlight.js";

/** Concurrency used when the caller does not configure one. */
const DEFAULT_CONCURRENCY = 2;

/** Anything able to download a page; {@link PageFetcher} in production. */
export interface PageSource {
  fetchPage(url: string): Promise<FetchedPage>;
}

/** Collaborators injected into {@link TabPipeline}. */
export interface TabPipelineDependencies {
  readonly repository: TabRepository;
  readonly fetcher: PageSource;
  /** Picks the extractor by URL; the generic one is the fallback. */
  readonly registry: ExtractorRegistry;
  readonly engine: EnrichmentEngine;
  /** Stage and per-tab lines are logged here when provided. */
  readonly logger?: StructuredLogger;
  /** Maximum tabs processed at once by the batch runners. */
  readonly concurrency?: number;
  /** Source of the enrichment run timestamps. Defaults to the wall clock. */
  readonly clock?: () => Date;
}

/** Options accepted by {@link TabPipeline.runExtraction} and {@link TabPipeline.runEnrichment}. */
export interface StageRunOptions {
  /** Also pick tabs whose previous attempt at this stage failed. */
  readonly retryErrors?: boolean;
  /** Maximum number of tabs picked, lowest id first. */
  readonly limit?: number;
}

/** Outcome of one bulk stage run. */
export interface StageReport {
  readonly attempted: number;
  readonly succeeded: number;
  /** Tabs left in the stage's error status plus those whose run threw. */
  readonly failed: number;
  /** One entry per attempted tab, in pick order. */
  readonly tabs: ReadonlyArray<{ readonly tabId: number; readonly status: TabStatus | null; readonly error?: string }>;
}

/** Bulk stage name; also the prefix of the single-flight key. */
type Stage = "extract" | "enrich";

/**
 * Drives tabs through the extraction and enrichment stages. Status changes
 * and results are written in short repository transactions taken before and
 * after the network call, never around it.
 */
export class TabPipeline {
  private readonly repository: TabRepository;
  private readonly fetcher: PageSource;
  private readonly registry: ExtractorRegistry;
  private readonly engine: EnrichmentEngine;
  private readonly logger: StructuredLogger | null;
  private readonly limiter: ReturnType<typeof pLimit>;
  private readonly clock: () => Date;
  private readonly inFlight = new SingleFlight<string, TabItem>();

  constructor(dependencies: TabPipelineDependencies) {
    this.repository = dependencies.repository;
    this.fetcher = dependencies.fetcher;
    this.registry = dependencies.registry;
    this.engine = dependencies.engine;
    this.logger = dependencies.logger ?? null;
    this.limiter = pLimit(Math.max(1, Math.floor(dependencies.concurrency ?? DEFAULT_CONCURRENCY)));
    this.clock = dependencies.clock ?? (() => new Date());
  }

  /**
   * Fetches and extracts one tab. Fetch and extraction failures land the tab
   * in `fetch_error` and resolve normally; anything outside the error
   * taxonomy is recorded the same way and then rethrown.
   */
  extractTab(userId: string, tabId: number): Promise<TabItem> {
    return this.inFlight.run(`extract:${tabId}`, () => this.performExtraction(userId, tabId));
  }

  /**
   * Enriches one tab in `parsed`, or in `llm_error` on retry. Exhausted
   * retries land the tab in `llm_error`; enriched tabs are refused.
   */
  enrichTab(userId: string, tabId: number): Promise<TabItem> {
    return this.inFlight.run(`enrich:${tabId}`, () => this.performEnrichment(userId, tabId));
  }

  /** Extracts every `new` tab of the user (plus `fetch_error` ones on retry). */
  runExtraction(userId: string, options: StageRunOptions = {}): Promise<StageReport> {
    const statuses: TabStatus[] = options.retryErrors ? ["new", "fetch_error"] : ["new"];
    return this.runStage("extract", userId, statuses, options.limit);
  }

  /** Enriches every `parsed` tab of the user (plus `llm_error` ones on retry). */
  runEnrichment(userId: string, options: StageRunOptions = {}): Promise<StageReport> {
    const statuses: TabStatus[] = options.retryErrors ? ["parsed", "llm_error"] : ["parsed"];
    return this.runStage("enrich", userId, statuses, options.limit);
  }

  private async runStage(
    stage: Stage,
    userId: string,
    statuses: readonly TabStatus[],
    limit: number | undefined,
  ): Promise<StageReport> {
    const tabs = this.repository.listByStatus(userId, statuses, { limit });
    const failureStatus: TabStatus = stage === "extract" ? "fetch_error" : "llm_error";
    this.logger?.info("stage_started", { stage, user_id: userId, tabs: tabs.length });

    const settled = await Promise.allSettled(
      tabs.map((tab) =>
        this.limiter(() => (stage === "extract" ? this.extractTab(userId, tab.id) : this.enrichTab(userId, tab.id))),
      ),
    );

    let succeeded = 0;
    let failed = 0;
    const outcomes = settled.map((entry, index) => {
      const tabId = tabs[index]?.id ?? -1;
      if (entry.status === "rejected") {
        failed += 1;
        return { tabId, status: this.repository.getTab(userId, tabId)?.status ?? null, error: errorMessage(entry.reason) };
      }
      if (entry.value.status === failureStatus) {
        failed += 1;
        return { tabId, status: entry.value.status, error: entry.value.lastError ?? undefined };
      }
      succeeded += 1;
      return { tabId, status: entry.value.status };
    });

    this.logger?.info("stage_completed", { stage, user_id: userId, attempted: tabs.length, succeeded, failed });
    return { attempted: tabs.length, succeeded, failed, tabs: outcomes };
  }

  private async performExtraction(userId: string, tabId: number): Promise<TabItem> {
    const tab = this.repository.requireTab(userId, tabId);
    const pending = this.repository.transition(tab, "fetch_pending", {
      eventType: "fetch_started",
      details: { url: tab.url },
    });

    try {
      const page = await this.fetcher.fetchPage(pending.url);
      const extractor = this.registry.selectExtractor(pending.url);
      const content = await this.registry.extract(pending.url, page.html);
      const parsed = this.repository.completeExtraction(pending, content, {
        url: pending.url,
        extractor: extractor?.name ?? null,
        site_kind: content.siteKind,
        word_count: content.wordCount,
        http_status: page.status,
      });
      this.logger?.info("tab_extracted", { tab_id: tabId, site_kind: content.siteKind, word_count: content.wordCount });
      return parsed;
    } catch (error) {
      const message = errorMessage(error);
      const failed = this.repository.transition(
        pending,
        "fetch_error",
        {
          eventType: "fetch_error",
          details: { url: pending.url, error: message, code: error instanceof TabTriageError ? error.code : null },
        },
        message,
      );
      this.logger?.warn("tab_extraction_failed", { tab_id: tabId, url: pending.url, message });
      if (!(error instanceof TabTriageError)) {
        throw error;
      }
      return failed;
    }
  }

  private async performEnrichment(userId: string, tabId: number): Promise<TabItem> {
    const tab = this.repository.requireTab(userId, tabId);
    if (!ENRICHABLE_STATUSES.includes(tab.status)) {
      const reason = tab.status === "enriched" ? "tab is already enriched" : "content has not been extracted";
      throw new StatusTransitionError(tab.id, tab.status, "llm_pending", reason);
    }
    const content = this.repository.getExtractedContent(tab.id);
    if (!content) {
      throw new StatusTransitionError(tab.id, tab.status, "llm_pending", "no extracted content stored");
    }

    const pending = this.repository.transition(tab, "llm_pending", {
      eventType: "llm_started",
      details: { url: tab.url },
    });
    const startedAt = this.clock();

    let outcome: EnrichmentOutcome;
    try {
      outcome = await this.engine.enrich({
        url: pending.url,
        title: content.title ?? pending.title,
        siteKind: content.siteKind,
        text: content.textFull,
        wordCount: content.wordCount,
        videoSeconds: content.videoSeconds,
      });
    } catch (error) {
      const message = errorMessage(error);
      this.repository.transition(
        pending,
        "llm_error",
        { eventType: "llm_enrich_error", details: { url: pending.url, error: message } },
        message,
      );
      throw error;
    }

    if (!outcome.ok) {
      const failure = outcome.error;
      this.logger?.warn("tab_enrichment_failed", { tab_id: tabId, attempts: failure.attempts, message: failure.message });
      return this.repository.transition(
        pending,
        "llm_error",
        {
          eventType: "llm_enrich_error",
          details: {
            url: pending.url,
            error: failure.message,
            attempts: failure.attempts,
            raw_output: failure.rawOutput,
          },
        },
        failure.message,
      );
    }

    const enriched = this.repository.completeEnrichment(
      pending,
      outcome.result,
      { attempts: outcome.attempts, startedAt, finishedAt: this.clock() },
      { url: pending.url, model_name: outcome.result.modelName, attempts: outcome.attempts },
    );
    this.logger?.info("tab_enriched", { tab_id: tabId, attempts: outcome.attempts, content_type: outcome.result.contentType });
    return enriched;
  }
}
