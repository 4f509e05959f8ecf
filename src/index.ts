export { loadConfig, collectRedactionTokens, type TabTriageConfig } from "./config/index.js";
export * from "./errors.js";
export { StructuredLogger, type LogEntry, type LoggerOptions, type LogLevel } from "./logger.js";

export * from "./tabs/status.js";
export type * from "./tabs/types.js";
export { CONTENT_TYPES, PRIORITIES } from "./tabs/types.js";

export { openDatabase, MEMORY_DATABASE, type TabDatabase } from "./db/database.js";
export { EventLog } from "./db/eventLog.js";
export { TabRepository } from "./db/tabStore.js";

export { BookmarkImporter, type BookmarkFileStats } from "./ingest/bookmarkImporter.js";
export { IngestStore, type IngestResult } from "./ingest/ingestStore.js";

export * from "./extract/index.js";

export { EnrichmentEngine, type EnrichmentOutcome } from "./enrich/engine.js";
export {
  ChatCompletionsPredictor,
  parseModelOutput,
  type EnrichmentPredictor,
} from "./enrich/predictor.js";
export { buildMessages, buildPromptContext, type EnrichmentInput, type PromptContext } from "./enrich/prompt.js";
export { modelEnrichmentSchema, PROJECT_CATEGORIES } from "./enrich/schema.js";

export { TabPipeline, type StageReport, type StageRunOptions } from "./pipeline/tabPipeline.js";
export { createRuntime, type TabTriageRuntime, type RuntimeOverrides } from "./runtime.js";
