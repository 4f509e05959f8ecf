import { readInt, readNumber, readOptionalString, readString, type EnvSource } from "./env.js";

/** Default location of the SQLite database file. */
const DEFAULT_DB_PATH = "data/tabs.db";
/** OpenAI-compatible endpoint served by a local model runner. */
const DEFAULT_LLM_API_BASE = "http://localhost:1234/v1";
const DEFAULT_LLM_API_KEY = "dummy_key";
const DEFAULT_LLM_MODEL = "llama-3.1-8b-instruct";
const DEFAULT_LLM_TIMEOUT_SECONDS = 60;
const DEFAULT_LLM_TEMPERATURE = 0.7;
const DEFAULT_LLM_MAX_TOKENS = 1024;
/** Attempts granted to the enrichment loop before a tab lands in `llm_error`. */
const DEFAULT_MAX_RETRIES = 3;
/** Characters of page text forwarded to the model. */
const DEFAULT_TEXT_MAX_CHARS = 4000;
const DEFAULT_BATCH_SIZE = 100;
const DEFAULT_MAX_CONCURRENT_REQUESTS = 2;
const DEFAULT_FETCH_TIMEOUT_SECONDS = 30;
/** Largest page body accepted by the fetcher (5 MB). */
const DEFAULT_FETCH_MAX_BYTES = 5_000_000;
export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";
const DEFAULT_YTDLP_TIMEOUT_SECONDS = 30;
/** Bookmark folders starting with this prefix are treated as tab collections. */
export const DEFAULT_COLLECTION_PREFIX = "Session-";

export interface DatabaseConfig {
  readonly path: string;
}

export interface LlmConfig {
  readonly apiBase: string;
  readonly apiKey: string;
  readonly model: string;
  readonly timeoutMs: number;
  readonly temperature: number;
  readonly maxTokens: number;
}

export interface EnrichmentConfig {
  readonly maxRetries: number;
  readonly retryDelayMs: number;
  readonly textMaxChars: number;
}

export interface FetchConfig {
  readonly timeoutMs: number;
  readonly maxBytes: number;
  readonly userAgent: string;
}

export interface VideoToolConfig {
  readonly binary: string;
  readonly timeoutMs: number;
}

export interface ProcessingConfig {
  readonly batchSize: number;
  readonly maxConcurrentRequests: number;
  readonly collectionPrefix: string;
  readonly defaultUserId: string | null;
}

export interface LoggingConfig {
  /** File mirroring the JSON log lines; null keeps logs on the console only. */
  readonly file: string | null;
}

/** Immutable snapshot of every runtime setting. */
export interface TabTriageConfig {
  readonly logging: LoggingConfig;
  readonly database: DatabaseConfig;
  readonly llm: LlmConfig;
  readonly enrichment: EnrichmentConfig;
  readonly fetch: FetchConfig;
  readonly videoTool: VideoToolConfig;
  readonly processing: ProcessingConfig;
}

/**
 * Builds the configuration from environment variables. Durations are given in
 * seconds by operators and stored in milliseconds.
 */
export function loadConfig(env: EnvSource = process.env): TabTriageConfig {
  const llmTimeoutSeconds = readInt("LLM_TIMEOUT", DEFAULT_LLM_TIMEOUT_SECONDS, { min: 1, max: 3_600 }, env);
  const fetchTimeoutSeconds = readInt("FETCH_TIMEOUT", DEFAULT_FETCH_TIMEOUT_SECONDS, { min: 1, max: 600 }, env);
  const ytdlpTimeoutSeconds = readInt("YTDLP_TIMEOUT", DEFAULT_YTDLP_TIMEOUT_SECONDS, { min: 1, max: 600 }, env);

  return {
    logging: {
      file: readOptionalString("TAB_LOG_FILE", env) ?? null,
    },
    database: {
      path: readString("TAB_DB_PATH", DEFAULT_DB_PATH, env),
    },
    llm: {
      apiBase: readString("LLM_API_BASE", DEFAULT_LLM_API_BASE, env).replace(/\/+$/, ""),
      apiKey: readString("LLM_API_KEY", DEFAULT_LLM_API_KEY, env),
      model: readString("LLM_MODEL_NAME", DEFAULT_LLM_MODEL, env),
      timeoutMs: llmTimeoutSeconds * 1000,
      temperature: readNumber("LLM_TEMPERATURE", DEFAULT_LLM_TEMPERATURE, { min: 0, max: 2 }, env),
      maxTokens: readInt("LLM_MAX_TOKENS", DEFAULT_LLM_MAX_TOKENS, { min: 16, max: 32_768 }, env),
    },
    enrichment: {
      maxRetries: readInt("MAX_RETRIES", DEFAULT_MAX_RETRIES, { min: 1, max: 20 }, env),
      retryDelayMs: readInt("RETRY_DELAY_MS", 0, { min: 0, max: 60_000 }, env),
      textMaxChars: readInt("ENRICH_TEXT_MAX_CHARS", DEFAULT_TEXT_MAX_CHARS, { min: 100, max: 100_000 }, env),
    },
    fetch: {
      timeoutMs: fetchTimeoutSeconds * 1000,
      maxBytes: readInt("FETCH_MAX_BYTES", DEFAULT_FETCH_MAX_BYTES, { min: 1 }, env),
      userAgent: readString("FETCH_USER_AGENT", DEFAULT_USER_AGENT, env),
    },
    videoTool: {
      binary: readString("YTDLP_PATH", "yt-dlp", env),
      timeoutMs: ytdlpTimeoutSeconds * 1000,
    },
    processing: {
      batchSize: readInt("BATCH_SIZE", DEFAULT_BATCH_SIZE, { min: 1, max: 10_000 }, env),
      maxConcurrentRequests: readInt(
        "MAX_CONCURRENT_REQUESTS",
        DEFAULT_MAX_CONCURRENT_REQUESTS,
        { min: 1, max: 32 },
        env,
      ),
      collectionPrefix: readString("COLLECTION_PREFIX", DEFAULT_COLLECTION_PREFIX, env),
      defaultUserId: readOptionalString("DEFAULT_USER_ID", env) ?? null,
    },
  };
}

/**
 * Secrets that must never reach a log line. The placeholder key used by local
 * runners is not worth redacting.
 */
export function collectRedactionTokens(config: TabTriageConfig): string[] {
  const key = config.llm.apiKey.trim();
  return key.length > 0 && key !== DEFAULT_LLM_API_KEY ? [key] : [];
}
