import { describe, it } from "mocha";
import { expect } from "chai";
import * as fc from "fast-check";
import sinon from "sinon";

import { EnrichmentEngine } from "../src/enrich/engine.js";
import type { EnrichmentPredictor } from "../src/enrich/predictor.js";
import type { EnrichmentInput, PromptContext } from "../src/enrich/prompt.js";
import type { ModelEnrichment } from "../src/enrich/schema.js";
import { ERROR_CODES, EnrichmentExhaustedError, PredictorError } from "../src/errors.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";
import { ScriptedPredictor, VALID_OUTPUT as OUTPUT } from "./helpers/scriptedPredictor.js";

const INPUT: EnrichmentInput = {
  url: "https://example.com/a",
  title: "A title",
  siteKind: "generic_html",
  text: "x".repeat(50),
  wordCount: 1,
  videoSeconds: null,
};

describe("enrich/engine", () => {
  it("returns the first valid output with its attempt number", async () => {
    const predictor = new ScriptedPredictor(["bad-1", OUTPUT]);
    const logger = new RecordingLogger();
    const engine = new EnrichmentEngine(predictor, { maxRetries: 3, logger });

    const outcome = await engine.enrich(INPUT);

    expect(outcome).to.deep.equal({
      ok: true,
      attempts: 2,
      result: {
        summary: "A concise summary of the page.",
        contentType: "article",
        tags: ["#a", "#b"],
        projects: ["work"],
        estReadMinutes: 2,
        priority: null,
        modelName: "scripted-model",
      },
    });
    expect(logger.entries.map((entry) => [entry.level, entry.message])).to.deep.equal([
      ["warn", "enrichment_attempt_failed"],
      ["debug", "enrichment_attempt_succeeded"],
    ]);
    expect(logger.entries[0]?.payload).to.deep.equal({
      url: "https://example.com/a",
      attempt: 1,
      max_attempts: 3,
      message: "Model output failed validation: bad-1",
    });
  });

  it("reports exhaustion with the last error and raw output", async () => {
    const predictor = new ScriptedPredictor(["bad-1", "bad-2", "bad-3", OUTPUT]);
    const engine = new EnrichmentEngine(predictor, { maxRetries: 3 });

    const outcome = await engine.enrich(INPUT);

    expect(outcome.ok).to.equal(false);
    if (outcome.ok) {
      return;
    }
    expect(outcome.error).to.be.instanceOf(EnrichmentExhaustedError);
    expect(outcome.error.attempts).to.equal(3);
    expect(outcome.error.rawOutput).to.equal("bad-3");
    expect(outcome.error.message).to.equal(
      "Enrichment failed after 3 attempts: Model output failed validation: bad-3",
    );
    expect(predictor.contexts).to.have.length(3);
  });

  it("counts transport errors as attempts and keeps the last raw output seen", async () => {
    const predict = sinon.stub<[PromptContext], Promise<ModelEnrichment>>();
    predict
      .onFirstCall()
      .rejects(new PredictorError("bad json", { code: ERROR_CODES.predictorSchema, rawOutput: "{oops" }));
    predict.onSecondCall().rejects(new PredictorError("Model request failed: reset", { code: ERROR_CODES.predictorNetwork }));
    const predictor: EnrichmentPredictor = { modelName: "flaky", predict };

    const outcome = await new EnrichmentEngine(predictor).enrich(INPUT, 2);

    expect(outcome.ok).to.equal(false);
    if (!outcome.ok) {
      expect(outcome.error.lastError).to.equal("Model request failed: reset");
      expect(outcome.error.rawOutput).to.equal("{oops");
    }
  });

  it("truncates over-long tag and project lists", async () => {
    const predictor = new ScriptedPredictor([
      {
        ...OUTPUT,
        tags: Array.from({ length: 14 }, (_, index) => `#t${index}`),
        projects: ["a", "b", "c", "d", "e", "f", "g"],
      },
    ]);

    const outcome = await new EnrichmentEngine(predictor).enrich(INPUT);

    expect(outcome.ok).to.equal(true);
    if (outcome.ok) {
      expect(outcome.result.tags).to.have.length(10);
      expect(outcome.result.tags[9]).to.equal("#t9");
      expect(outcome.result.projects).to.deep.equal(["a", "b", "c", "d", "e"]);
    }
  });

  it("waits between attempts only when a delay is configured", async () => {
    const sleep = sinon.stub<[number], Promise<void>>().resolves();
    const predictor = new ScriptedPredictor(["bad-1", "bad-2", OUTPUT]);

    await new EnrichmentEngine(predictor, { retryDelayMs: 250, sleep }).enrich(INPUT, 3);

    expect(sleep.args).to.deep.equal([[250], [250]]);

    const noDelay = sinon.stub<[number], Promise<void>>().resolves();
    await new EnrichmentEngine(new ScriptedPredictor(["bad-1", OUTPUT]), { sleep: noDelay }).enrich(INPUT, 3);
    sinon.assert.notCalled(noDelay);
  });

  it("always makes at least one attempt and truncates the prompt text", async () => {
    const predictor = new ScriptedPredictor([OUTPUT]);

    const outcome = await new EnrichmentEngine(predictor, { textMaxChars: 10 }).enrich(INPUT, 0);

    expect(outcome.ok).to.equal(true);
    expect(predictor.contexts[0]?.text).to.equal("xxxxxxxxxx... [truncated]");
  });

  it("keeps at most 10 tags and 5 projects whatever the model returns", async () => {
    const labels = fc.array(fc.string({ minLength: 1, maxLength: 12 }), { maxLength: 40 });

    await fc.assert(
      fc.asyncProperty(labels, labels, async (tags, projects) => {
        const engine = new EnrichmentEngine(new ScriptedPredictor([{ ...OUTPUT, tags, projects }]), { maxRetries: 1 });

        const outcome = await engine.enrich(INPUT);

        expect(outcome.ok).to.equal(true);
        if (outcome.ok) {
          expect(outcome.result.tags).to.deep.equal(tags.slice(0, 10));
          expect(outcome.result.projects).to.deep.equal(projects.slice(0, 5));
        }
      }),
      { numRuns: 50 },
    );
  });
});
