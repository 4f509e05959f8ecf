import { collectRedactionTokens, type TabTriageConfig } from "./config/index.js";
import { openDatabase, type TabDatabase } from "./db/database.js";
import { TabRepository } from "./db/tabStore.js";
import { EnrichmentEngine } from "./enrich/engine.js";
import { ChatCompletionsPredictor, type EnrichmentPredictor } from "./enrich/predictor.js";
import { createDefaultRegistry } from "./extract/index.js";
import { PageFetcher } from "./extract/fetcher.js";
import type { ExecFileLike } from "./extract/videoExtractor.js";
import { BookmarkImporter } from "./ingest/bookmarkImporter.js";
import { IngestStore } from "./ingest/ingestStore.js";
import { StructuredLogger } from "./logger.js";
import { TabPipeline } from "./pipeline/tabPipeline.js";

/** Fully wired services sharing one database handle. */
export interface TabTriageRuntime {
  readonly config: TabTriageConfig;
  readonly logger: StructuredLogger;
  readonly db: TabDatabase;
  readonly importer: BookmarkImporter;
  readonly ingestStore: IngestStore;
  readonly repository: TabRepository;
  readonly pipeline: TabPipeline;
  close(): Promise<void>;
}

/** Seams replaced by tests and embedders. */
export interface RuntimeOverrides {
  readonly logger?: StructuredLogger;
  readonly fetchImpl?: typeof fetch;
  readonly execFile?: ExecFileLike;
  readonly predictor?: EnrichmentPredictor;
  readonly clock?: () => Date;
}

export function createRuntime(config: TabTriageConfig, overrides: RuntimeOverrides = {}): TabTriageRuntime {
  const logger =
    overrides.logger ??
    new StructuredLogger({
      logFile: config.logging.file,
      redactSecrets: collectRedactionTokens(config),
      stream: "stderr",
    });
  const db = openDatabase(config.database.path);
  const clock = overrides.clock ?? (() => new Date());
  const repository = new TabRepository(db, { clock });
  const engine = new EnrichmentEngine(
    overrides.predictor ?? new ChatCompletionsPredictor(config.llm, overrides.fetchImpl),
    {
      maxRetries: config.enrichment.maxRetries,
      retryDelayMs: config.enrichment.retryDelayMs,
      textMaxChars: config.enrichment.textMaxChars,
      logger: logger.child("enrich"),
    },
  );

  return {
    config,
    logger,
    db,
    importer: new BookmarkImporter({ collectionPrefix: config.processing.collectionPrefix, clock }),
    ingestStore: new IngestStore(db, { logger: logger.child("ingest"), clock }),
    repository,
    pipeline: new TabPipeline({
      repository,
      fetcher: new PageFetcher(config.fetch, { fetchImpl: overrides.fetchImpl }),
      registry: createDefaultRegistry(config.videoTool, { execFile: overrides.execFile }),
      engine,
      logger: logger.child("pipeline"),
      concurrency: config.processing.maxConcurrentRequests,
      clock,
    }),
    async close(): Promise<void> {
      db.close();
      await logger.flush();
    },
  };
}
