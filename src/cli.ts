#!/usr/bin/env node
import process from "node:process";
import { realpathSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";

import { loadConfig } from "./config/index.js";
import type { EnvSource } from "./config/env.js";
import { errorMessage, TabTriageError } from "./errors.js";
import { BookmarkImporter } from "./ingest/bookmarkImporter.js";
import type { StageReport } from "./pipeline/tabPipeline.js";
import { createRuntime, type RuntimeOverrides, type TabTriageRuntime } from "./runtime.js";

export type ProcessStage = "extract" | "enrich" | "all";

export type CliCommand =
  | { readonly kind: "help" }
  | {
      readonly kind: "ingest";
      readonly file: string;
      readonly userId?: string;
      readonly batchSize?: number;
      readonly dryRun: boolean;
    }
  | { readonly kind: "stats"; readonly file: string }
  | {
      readonly kind: "process";
      readonly userId?: string;
      readonly stage: ProcessStage;
      readonly retryErrors: boolean;
      readonly limit?: number;
    }
  | { readonly kind: "summary"; readonly userId?: string }
  | { readonly kind: "toggle-processed"; readonly userId?: string; readonly tabId: number }
  | { readonly kind: "delete"; readonly userId?: string; readonly tabId: number };

/** Process-level collaborators, replaced in tests. */
export interface CliDependencies {
  readonly env?: EnvSource;
  readonly write?: (text: string) => void;
  readonly writeError?: (text: string) => void;
  readonly readFile?: (path: string) => Promise<string>;
  readonly runtime?: RuntimeOverrides;
}

/** Raised for malformed command lines; the CLI exits with status 2. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

const USAGE = [
  "Usage: tab-triage <command> [options]",
  "",
  "Commands:",
  "  ingest --file <bookmarks.html> [--user-id <id>] [--batch-size N] [--dry-run]",
  "  stats --file <bookmarks.html>",
  "  process [--user-id <id>] [--stage extract|enrich|all] [--retry-errors] [--limit N]",
  "  summary [--user-id <id>]",
  "  toggle-processed --tab-id <id> [--user-id <id>]",
  "  delete --tab-id <id> [--user-id <id>]",
  "",
  "--user-id falls back to DEFAULT_USER_ID. Results are printed as JSON on stdout.",
].join("\n");

function readValue(args: readonly string[], index: number, flag: string): string {
  const value = args[index + 1];
  if (value === undefined || value.startsWith("--")) {
    throw new UsageError(`${flag} expects a value`);
  }
  return value;
}

function readPositiveInt(args: readonly string[], index: number, flag: string): number {
  const raw = readValue(args, index, flag);
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new UsageError(`${flag} must be a positive integer, got '${raw}'`);
  }
  return value;
}

export function parseCliArgs(argv: readonly string[]): CliCommand {
  const [command, ...rest] = argv;
  if (command === undefined || command === "help" || command === "--help" || command === "-h") {
    return { kind: "help" };
  }

  let file: string | undefined;
  let userId: string | undefined;
  let batchSize: number | undefined;
  let dryRun = false;
  let stage: ProcessStage = "all";
  let retryErrors = false;
  let limit: number | undefined;
  let tabId: number | undefined;

  for (let i = 0; i < rest.length; i++) {
    const token = rest[i];
    switch (token) {
      case "--file":
        file = readValue(rest, i++, token);
        break;
      case "--user-id":
        userId = readValue(rest, i++, token);
        break;
      case "--batch-size":
        batchSize = readPositiveInt(rest, i++, token);
        break;
      case "--dry-run":
        dryRun = true;
        break;
      case "--stage": {
        const value = readValue(rest, i++, token);
        if (value !== "extract" && value !== "enrich" && value !== "all") {
          throw new UsageError("--stage must be 'extract', 'enrich' or 'all'");
        }
        stage = value;
        break;
      }
      case "--retry-errors":
        retryErrors = true;
        break;
      case "--limit":
        limit = readPositiveInt(rest, i++, token);
        break;
      case "--tab-id":
        tabId = readPositiveInt(rest, i++, token);
        break;
      default:
        throw new UsageError(`Unknown argument '${token}'`);
    }
  }

  switch (command) {
    case "ingest":
      if (file === undefined) {
        throw new UsageError("ingest requires --file");
      }
      return { kind: "ingest", file, userId, batchSize, dryRun };
    case "stats":
      if (file === undefined) {
        throw new UsageError("stats requires --file");
      }
      return { kind: "stats", file };
    case "process":
      return { kind: "process", userId, stage, retryErrors, limit };
    case "summary":
      return { kind: "summary", userId };
    case "toggle-processed":
    case "delete":
      if (tabId === undefined) {
        throw new UsageError(`${command} requires --tab-id`);
      }
      return { kind: command, userId, tabId };
    default:
      throw new UsageError(`Unknown command '${command}'`);
  }
}

function resolveUserId(runtime: TabTriageRuntime, explicit: string | undefined): string {
  const userId = explicit ?? runtime.config.processing.defaultUserId;
  if (userId === null) {
    throw new UsageError("--user-id is required when DEFAULT_USER_ID is not set");
  }
  return userId;
}

async function runProcess(
  runtime: TabTriageRuntime,
  command: Extract<CliCommand, { kind: "process" }>,
): Promise<Record<string, StageReport>> {
  const userId = resolveUserId(runtime, command.userId);
  const options = { retryErrors: command.retryErrors, limit: command.limit };
  const reports: Record<string, StageReport> = {};
  if (command.stage !== "enrich") {
    reports.extract = await runtime.pipeline.runExtraction(userId, options);
  }
  if (command.stage !== "extract") {
    reports.enrich = await runtime.pipeline.runEnrichment(userId, options);
  }
  return reports;
}

async function execute(
  command: Exclude<CliCommand, { kind: "help" }>,
  dependencies: CliDependencies,
): Promise<unknown> {
  const env = dependencies.env ?? process.env;
  const load = dependencies.readFile ?? ((path: string) => readFile(path, "utf8"));
  const config = loadConfig(env);

  // Commands that only read the export never open the database.
  if (command.kind === "stats") {
    const importer = new BookmarkImporter({ collectionPrefix: config.processing.collectionPrefix });
    return { file: command.file, ...importer.stats(await load(command.file)) };
  }
  if (command.kind === "ingest" && command.dryRun) {
    const importer = new BookmarkImporter({ collectionPrefix: config.processing.collectionPrefix });
    const candidates = importer.parse(await load(command.file));
    return { file: command.file, dryRun: true, candidates: candidates.length };
  }

  const runtime = createRuntime(config, dependencies.runtime);
  try {
    switch (command.kind) {
      case "ingest": {
        const userId = resolveUserId(runtime, command.userId);
        const candidates = runtime.importer.parse(await load(command.file));
        const result = runtime.ingestStore.ingest(
          candidates,
          userId,
          command.batchSize ?? runtime.config.processing.batchSize,
        );
        return { file: command.file, userId, ...result };
      }
      case "process":
        return await runProcess(runtime, command);
      case "summary": {
        const userId = resolveUserId(runtime, command.userId);
        return { userId, total: runtime.ingestStore.count(userId), byStatus: runtime.ingestStore.summary(userId) };
      }
      case "toggle-processed":
        return runtime.repository.toggleProcessed(resolveUserId(runtime, command.userId), command.tabId);
      case "delete":
        runtime.repository.softDelete(resolveUserId(runtime, command.userId), command.tabId);
        return { tabId: command.tabId, deleted: true };
    }
  } finally {
    await runtime.close();
  }
}

/**
 * Runs one command and returns the process exit code: 0 on success, 1 for
 * runtime failures and 2 for usage errors.
 */
export async function runCli(argv: readonly string[], dependencies: CliDependencies = {}): Promise<number> {
  const write = dependencies.write ?? ((text: string) => process.stdout.write(text));
  const writeError = dependencies.writeError ?? ((text: string) => process.stderr.write(text));

  let command: CliCommand;
  try {
    command = parseCliArgs(argv);
  } catch (error) {
    writeError(`${errorMessage(error)}\n\n${USAGE}\n`);
    return 2;
  }
  if (command.kind === "help") {
    write(`${USAGE}\n`);
    return 0;
  }

  try {
    const result = await execute(command, dependencies);
    write(`${JSON.stringify(result, null, 2)}\n`);
    return 0;
  } catch (error) {
    if (error instanceof UsageError) {
      writeError(`${error.message}\n`);
      return 2;
    }
    const code = error instanceof TabTriageError ? error.code : null;
    writeError(`${JSON.stringify({ error: errorMessage(error), code })}\n`);
    return 1;
  }
}

/**
 * Whether the script Node was started with is the module at `moduleUrl`.
 * npm links `bin` entries through symlinks, so both sides are resolved.
 */
export function isMainModule(moduleUrl: string, scriptPath: string | undefined): boolean {
  if (!scriptPath) {
    return false;
  }
  try {
    return realpathSync(scriptPath) === realpathSync(fileURLToPath(moduleUrl));
  } catch {
    // A script path that no longer resolves cannot be this module.
    return false;
  }
}

if (isMainModule(import.meta.url, process.argv[1])) {
  runCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(errorMessage(error));
      process.exitCode = 1;
    });
}
