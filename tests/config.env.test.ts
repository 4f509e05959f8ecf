import { describe, it } from "mocha";
import { expect } from "chai";

import { readInt, readNumber, readOptionalInt, readString } from "../src/config/env.js";
import { collectRedactionTokens, DEFAULT_USER_AGENT, loadConfig } from "../src/config/index.js";

describe("config/env", () => {
  it("rejects integers that are malformed or outside the bounds", () => {
    expect(readOptionalInt("N", { min: 1, max: 10 }, { N: "7" })).to.equal(7);
    expect(readOptionalInt("N", { min: 1, max: 10 }, { N: "11" })).to.equal(undefined);
    expect(readOptionalInt("N", undefined, { N: "3.5" })).to.equal(undefined);
    expect(readInt("N", 42, { min: 1 }, { N: "0" })).to.equal(42);
    expect(readInt("N", 42, undefined, { N: "   " })).to.equal(42);
  });

  it("reads floats and strings", () => {
    expect(readNumber("T", 0.7, { min: 0, max: 2 }, { T: "0.2" })).to.equal(0.2);
    expect(readNumber("T", 0.7, { min: 0, max: 2 }, { T: "9" })).to.equal(0.7);
    expect(readString("S", "fallback", { S: "  value " })).to.equal("value");
    expect(readString("S", "fallback", { S: "" })).to.equal("fallback");
  });
});

describe("config/loadConfig", () => {
  it("applies defaults when the environment is empty", () => {
    const config = loadConfig({});

    expect(config.database.path).to.equal("data/tabs.db");
    expect(config.llm).to.deep.equal({
      apiBase: "http://localhost:1234/v1",
      apiKey: "dummy_key",
      model: "llama-3.1-8b-instruct",
      timeoutMs: 60_000,
      temperature: 0.7,
      maxTokens: 1024,
    });
    expect(config.enrichment).to.deep.equal({ maxRetries: 3, retryDelayMs: 0, textMaxChars: 4000 });
    expect(config.fetch).to.deep.equal({ timeoutMs: 30_000, maxBytes: 5_000_000, userAgent: DEFAULT_USER_AGENT });
    expect(config.videoTool).to.deep.equal({ binary: "yt-dlp", timeoutMs: 30_000 });
    expect(config.processing).to.deep.equal({
      batchSize: 100,
      maxConcurrentRequests: 2,
      collectionPrefix: "Session-",
      defaultUserId: null,
    });
    expect(config.logging.file).to.equal(null);
  });

  it("converts seconds to milliseconds and strips the trailing slash of the API base", () => {
    const config = loadConfig({
      LLM_API_BASE: "https://llm.internal.example/v1///",
      LLM_TIMEOUT: "5",
      FETCH_TIMEOUT: "12",
      YTDLP_TIMEOUT: "3",
      YTDLP_PATH: "/opt/bin/yt-dlp",
      MAX_RETRIES: "5",
      BATCH_SIZE: "25",
      DEFAULT_USER_ID: "user-1",
      TAB_LOG_FILE: "/tmp/tabs/log.jsonl",
    });

    expect(config.llm.apiBase).to.equal("https://llm.internal.example/v1");
    expect(config.llm.timeoutMs).to.equal(5_000);
    expect(config.fetch.timeoutMs).to.equal(12_000);
    expect(config.videoTool).to.deep.equal({ binary: "/opt/bin/yt-dlp", timeoutMs: 3_000 });
    expect(config.enrichment.maxRetries).to.equal(5);
    expect(config.processing.batchSize).to.equal(25);
    expect(config.processing.defaultUserId).to.equal("user-1");
    expect(config.logging.file).to.equal("/tmp/tabs/log.jsonl");
  });

  it("keeps the defaults when numeric settings are out of range", () => {
    const config = loadConfig({ MAX_CONCURRENT_REQUESTS: "0", LLM_TEMPERATURE: "3", BATCH_SIZE: "ten" });

    expect(config.processing.maxConcurrentRequests).to.equal(2);
    expect(config.llm.temperature).to.equal(0.7);
    expect(config.processing.batchSize).to.equal(100);
  });

  it("only redacts real API keys", () => {
    expect(collectRedactionTokens(loadConfig({}))).to.deep.equal([]);
    expect(collectRedactionTokens(loadConfig({ LLM_API_KEY: "test-secret" }))).to.deep.equal(["test-secret"]);
  });
});
