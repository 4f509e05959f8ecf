import { z } from "zod";

import type { LlmConfig } from "../config/index.js";
import { ERROR_CODES, PredictorError, errorMessage } from "../errors.js";
import { buildMessages, type PromptContext } from "./prompt.js";
import { describeIssues, modelEnrichmentSchema, type ModelEnrichment } from "./schema.js";

/**
 * Structured-output model. One call per enrichment attempt; failures are
 * thrown as {@link PredictorError}.
 */
export interface EnrichmentPredictor {
  readonly modelName: string;
  predict(context: PromptContext): Promise<ModelEnrichment>;
}

/** Envelope of an OpenAI-compatible `/chat/completions` response. */
const completionSchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable() }),
      }),
    )
    .min(1),
});

/** Returns the JSON object embedded in a reply, tolerating code fences and chatter. */
export function extractJsonObject(content: string): string {
  const fenced = /```(?:json)?\s*([\s\S]*?)```/i.exec(content);
  const candidate = (fenced?.[1] ?? content).trim();
  const start = candidate.indexOf("{");
  const end = candidate.lastIndexOf("}");
  return start >= 0 && end > start ? candidate.slice(start, end + 1) : candidate;
}

/** Parses and validates a raw reply, keeping it on the error when it is rejected. */
export function parseModelOutput(content: string): ModelEnrichment {
  let parsed: unknown;
  try {
    parsed = JSON.parse(extractJsonObject(content));
  } catch (error) {
    throw new PredictorError(`Model output is not valid JSON: ${errorMessage(error)}`, {
      code: ERROR_CODES.predictorSchema,
      rawOutput: content,
      cause: error,
    });
  }
  const result = modelEnrichmentSchema.safeParse(parsed);
  if (!result.success) {
    throw new PredictorError(`Model output failed validation: ${describeIssues(result.error)}`, {
      code: ERROR_CODES.predictorSchema,
      rawOutput: content,
      cause: result.error,
    });
  }
  return result.data;
}

/**
 * Predictor backed by any OpenAI-compatible chat completions endpoint (local
 * runners included). Requests JSON mode and validates the reply with zod.
 */
export class ChatCompletionsPredictor implements EnrichmentPredictor {
  private readonly fetchImpl: typeof fetch;

  constructor(
    private readonly config: LlmConfig,
    fetchImpl: typeof fetch = fetch,
  ) {
    this.fetchImpl = fetchImpl;
  }

  get modelName(): string {
    return this.config.model;
  }

  async predict(context: PromptContext): Promise<ModelEnrichment> {
    const response = await this.performRequest({
      model: this.config.model,
      messages: buildMessages(context),
      temperature: this.config.temperature,
      max_tokens: this.config.maxTokens,
      response_format: { type: "json_object" },
    });

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      throw new PredictorError("Unable to parse the completion response", {
        code: ERROR_CODES.predictorSchema,
        status: response.status,
        cause: error,
      });
    }
    const completion = completionSchema.safeParse(payload);
    if (!completion.success) {
      throw new PredictorError(`Completion response has an unexpected shape: ${describeIssues(completion.error)}`, {
        code: ERROR_CODES.predictorSchema,
        status: response.status,
        cause: completion.error,
      });
    }
    const content = completion.data.choices[0]?.message.content ?? "";
    return parseModelOutput(content);
  }

  private async performRequest(body: Record<string, unknown>): Promise<Response> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.config.timeoutMs);
    try {
      const response = await this.fetchImpl(`${this.config.apiBase}/chat/completions`, {
        method: "POST",
        headers: {
          "content-type": "application/json",
          accept: "application/json",
          authorization: `Bearer ${this.config.apiKey}`,
        },
        body: JSON.stringify(body),
        signal: controller.signal,
      });
      if (!response.ok) {
        const detail = await response.text().catch(() => "");
        throw new PredictorError(`Model endpoint responded with HTTP ${response.status}`, {
          code: ERROR_CODES.predictorHttp,
          status: response.status,
          rawOutput: detail.length > 0 ? detail : null,
        });
      }
      return response;
    } catch (error) {
      if (error instanceof PredictorError) {
        throw error;
      }
      if (controller.signal.aborted) {
        throw new PredictorError(`Model request timed out after ${this.config.timeoutMs} ms`, {
          code: ERROR_CODES.predictorNetwork,
          cause: error,
        });
      }
      throw new PredictorError(`Model request failed: ${errorMessage(error)}`, {
        code: ERROR_CODES.predictorNetwork,
        cause: error,
      });
    } finally {
      clearTimeout(timeout);
    }
  }
}
