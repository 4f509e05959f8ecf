import { setTimeout as delay } from "node:timers/promises";

import { EnrichmentExhaustedError, PredictorError, errorMessage } from "../errors.js";
import type { StructuredLogger } from "../logger.js";
import type { EnrichmentResult } from "../tabs/types.js";
import type { EnrichmentPredictor } from "./predictor.js";
import { buildPromptContext, DEFAULT_TEXT_MAX_CHARS, type EnrichmentInput } from "./prompt.js";
import { MAX_PROJECTS, MAX_TAGS, type ModelEnrichment } from "./schema.js";

export const DEFAULT_MAX_RETRIES = 3;

export type EnrichmentOutcome =
  | { readonly ok: true; readonly result: EnrichmentResult; readonly attempts: number }
  | { readonly ok: false; readonly error: EnrichmentExhaustedError };

export interface EnrichmentEngineOptions {
  readonly maxRetries?: number;
  /** Pause between failed attempts; zero retries immediately. */
  readonly retryDelayMs?: number;
  readonly textMaxChars?: number;
  readonly logger?: StructuredLogger;
  readonly sleep?: (ms: number) => Promise<void>;
}

function toResult(output: ModelEnrichment, modelName: string): EnrichmentResult {
  return {
    summary: output.summary,
    contentType: output.content_type,
    tags: output.tags.slice(0, MAX_TAGS),
    projects: output.projects.slice(0, MAX_PROJECTS),
    estReadMinutes: output.est_read_min ?? null,
    priority: output.priority ?? null,
    modelName,
  };
}

/**
 * Bounded retry loop around the predictor. Every failure kind (transport,
 * malformed JSON, schema violation) consumes one attempt; the loop never
 * throws, it reports exhaustion through the outcome.
 */
export class EnrichmentEngine {
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly textMaxChars: number;
  private readonly logger?: StructuredLogger;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly predictor: EnrichmentPredictor,
    options: EnrichmentEngineOptions = {},
  ) {
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.retryDelayMs = options.retryDelayMs ?? 0;
    this.textMaxChars = options.textMaxChars ?? DEFAULT_TEXT_MAX_CHARS;
    this.logger = options.logger;
    this.sleep = options.sleep ?? ((ms: number) => delay(ms));
  }

  get modelName(): string {
    return this.predictor.modelName;
  }

  async enrich(input: EnrichmentInput, maxRetries: number = this.maxRetries): Promise<EnrichmentOutcome> {
    const attempts = Math.max(1, Math.floor(maxRetries));
    const context = buildPromptContext(input, this.textMaxChars);
    let lastError: unknown = null;
    let lastRawOutput: string | null = null;

    for (let attempt = 1; attempt <= attempts; attempt += 1) {
      try {
        const output = await this.predictor.predict(context);
        this.logger?.debug("enrichment_attempt_succeeded", { url: input.url, attempt });
        return { ok: true, result: toResult(output, this.predictor.modelName), attempts: attempt };
      } catch (error) {
        lastError = error;
        if (error instanceof PredictorError && error.rawOutput !== null) {
          lastRawOutput = error.rawOutput;
        }
        this.logger?.warn("enrichment_attempt_failed", {
          url: input.url,
          attempt,
          max_attempts: attempts,
          message: errorMessage(error),
        });
        if (attempt < attempts && this.retryDelayMs > 0) {
          await this.sleep(this.retryDelayMs);
        }
      }
    }

    return {
      ok: false,
      error: new EnrichmentExhaustedError(attempts, errorMessage(lastError), lastRawOutput, { cause: lastError }),
    };
  }
}
