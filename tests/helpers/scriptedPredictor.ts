import type { EnrichmentPredictor } from "../../src/enrich/predictor.js";
import type { PromptContext } from "../../src/enrich/prompt.js";
import type { ModelEnrichment } from "../../src/enrich/schema.js";
import { ERROR_CODES, PredictorError } from "../../src/errors.js";

export const VALID_OUTPUT: ModelEnrichment = {
  summary: "A concise summary of the page.",
  content_type: "article",
  tags: ["#a", "#b"],
  projects: ["work"],
  est_read_min: 2,
  priority: null,
};

/** Predictor replaying a script of replies; strings become schema failures carrying that raw output. */
export class ScriptedPredictor implements EnrichmentPredictor {
  readonly modelName = "scripted-model";
  readonly contexts: PromptContext[] = [];

  constructor(private readonly script: Array<ModelEnrichment | string>) {}

  async predict(context: PromptContext): Promise<ModelEnrichment> {
    this.contexts.push(context);
    const next = this.script.shift();
    if (next === undefined) {
      throw new Error("script exhausted");
    }
    if (typeof next === "string") {
      throw new PredictorError(`Model output failed validation: ${next}`, {
        code: ERROR_CODES.predictorSchema,
        rawOutput: next,
      });
    }
    return next;
  }
}
