import { afterEach, beforeEach, describe, it } from "mocha";
import { expect } from "chai";
import { mkdtemp, readdir, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import sinon from "sinon";

import { parseRedactionDirectives, StructuredLogger, type LogEntry } from "../src/logger.js";

describe("logger", () => {
  let stderrWrite: sinon.SinonStub;

  beforeEach(() => {
    stderrWrite = sinon.stub(process.stderr, "write").returns(true);
  });

  afterEach(() => {
    sinon.restore();
  });

  describe("parseRedactionDirectives", () => {
    it("separates toggles from literal tokens", () => {
      expect(parseRedactionDirectives(undefined)).to.deep.equal({ enabled: false, tokens: [] });
      expect(parseRedactionDirectives("off")).to.deep.equal({ enabled: false, tokens: [] });
      expect(parseRedactionDirectives("on, sk-")).to.deep.equal({ enabled: true, tokens: ["sk-"] });
      expect(parseRedactionDirectives("sk-,sk-,")).to.deep.equal({ enabled: true, tokens: ["sk-"] });
      expect(parseRedactionDirectives("disable,sk-")).to.deep.equal({ enabled: false, tokens: ["sk-"] });
    });
  });

  it("writes one JSON line per entry on the configured stream", () => {
    const logger = new StructuredLogger({ stream: "stderr", component: "ingest" });

    logger.info("ingest_completed", { inserted: 2 });

    expect(stderrWrite.callCount).to.equal(1);
    const line = String(stderrWrite.firstCall.args[0]);
    expect(line.endsWith("\n")).to.equal(true);
    const parsed: unknown = JSON.parse(line);
    expect(parsed).to.include({ level: "info", message: "ingest_completed", component: "ingest" });
    expect(parsed).to.have.property("payload").that.deep.equals({ inserted: 2 });
  });

  it("redacts sensitive keys and configured secrets, including inside errors", () => {
    const entries: LogEntry[] = [];
    const logger = new StructuredLogger({
      stream: "stderr",
      redactSecrets: ["test-secret"],
      redactionEnabled: true,
      onEntry: (entry) => entries.push(entry),
    });

    logger.warn("request_failed", {
      authorization: "Bearer abc",
      note: "called with test-secret",
      nested: [{ token: "t-1" }],
      error: new Error("boom test-secret"),
    });

    expect(entries).to.have.length(1);
    expect(entries[0]?.payload).to.deep.equal({
      authorization: "[REDACTED]",
      note: "called with [REDACTED]",
      nested: [{ token: "[REDACTED]" }],
      error: { name: "Error", message: "boom [REDACTED]" },
    });
  });

  it("keeps sensitive keys when key redaction is disabled", () => {
    const entries: LogEntry[] = [];
    const logger = new StructuredLogger({
      stream: "stderr",
      redactionEnabled: false,
      onEntry: (entry) => entries.push(entry),
    });

    logger.debug("headers", { authorization: "Bearer abc" });

    expect(entries[0]?.payload).to.deep.equal({ authorization: "Bearer abc" });
  });

  it("stamps the component of child loggers while sharing the listener", () => {
    const entries: LogEntry[] = [];
    const logger = new StructuredLogger({ stream: "stderr", onEntry: (entry) => entries.push(entry) });

    logger.info("root_entry");
    logger.child("pipeline").error("child_entry");

    expect(entries.map((entry) => [entry.component, entry.message, entry.level])).to.deep.equal([
      [undefined, "root_entry", "info"],
      ["pipeline", "child_entry", "error"],
    ]);
  });

  it("rotates the mirrored file once the size limit is exceeded", async () => {
    const directory = await mkdtemp(path.join(tmpdir(), "tab-logger-"));
    const logFile = path.join(directory, "nested", "tabs.log");

    try {
      const logger = new StructuredLogger({ stream: "stderr", logFile, maxFileSizeBytes: 256, maxFileCount: 3 });
      for (let index = 0; index < 6; index += 1) {
        logger.info("rotation_entry", { index, filler: "x".repeat(120) });
      }
      await logger.flush();

      const files = (await readdir(path.join(directory, "nested"))).sort();
      expect(files).to.deep.equal(["tabs.log", "tabs.log.1", "tabs.log.2"]);
      const active = await readFile(logFile, "utf8");
      expect(active.trim().split("\n")).to.have.length(1);
      expect(active).to.contain('"index":5');
    } finally {
      await rm(directory, { recursive: true, force: true });
    }
  });

  it("flushes file writes queued by child loggers", async () => {
    const directory = await mkdtemp(path.join(tmpdir(), "tab-logger-"));
    const logFile = path.join(directory, "tabs.log");

    try {
      const logger = new StructuredLogger({ stream: "stderr", logFile });
      logger.child("ingest").info("child_entry");
      await logger.flush();

      const lines = (await readFile(logFile, "utf8")).trim().split("\n");
      expect(lines).to.have.length(1);
      expect(JSON.parse(lines[0] ?? "")).to.include({ message: "child_entry", component: "ingest" });
    } finally {
      await rm(directory, { recursive: true, force: true });
    }
  });
});
