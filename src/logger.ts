import { Buffer } from "node:buffer";
import { appendFile, mkdir, rename, rm, stat } from "node:fs/promises";
import { dirname } from "node:path";

/** Placeholder inserted where a secret used to be. */
const REDACTION_TOKEN = "[REDACTED]";

const REDACTION_ENABLE_TOKENS = new Set(["on", "true", "yes", "1", "enable", "enabled"]);
const REDACTION_DISABLE_TOKENS = new Set(["off", "false", "no", "0", "disable", "disabled"]);

/** Keys whose values are replaced when redaction is enabled. */
const SENSITIVE_KEYS = new Set([
  "authorization",
  "proxy-authorization",
  "x-api-key",
  "api-key",
  "api_key",
  "apikey",
  "token",
  "access_token",
  "refresh_token",
  "cookie",
  "set-cookie",
]);

/**
 * Parses `TAB_LOG_REDACT`. The variable takes comma-separated directives such
 * as `"on,sk-"` or `"off"`: toggles switch key-based redaction, every other
 * directive is a literal substring scrubbed from log lines. Providing tokens
 * without a toggle enables redaction.
 */
export function parseRedactionDirectives(raw: string | undefined): {
  enabled: boolean;
  tokens: string[];
} {
  if (!raw) {
    return { enabled: false, tokens: [] };
  }

  let enabled: boolean | undefined;
  const tokens: string[] = [];
  for (const directive of raw.split(",").map((value) => value.trim())) {
    if (directive.length === 0) {
      continue;
    }
    const normalised = directive.toLowerCase();
    if (REDACTION_DISABLE_TOKENS.has(normalised)) {
      enabled = false;
      continue;
    }
    if (REDACTION_ENABLE_TOKENS.has(normalised)) {
      enabled = true;
      continue;
    }
    tokens.push(directive);
  }

  return { enabled: enabled ?? tokens.length > 0, tokens: Array.from(new Set(tokens)) };
}

/** Rotation threshold of the mirrored log file (5 MiB). */
const DEFAULT_MAX_FILE_SIZE = 5 * 1024 * 1024;
/** Historical log files retained during rotation. */
const DEFAULT_MAX_FILE_COUNT = 5;

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  component?: string;
  payload?: unknown;
}

export interface LoggerOptions {
  readonly logFile?: string | null;
  /** Maximum size in bytes before the active log file is rotated. */
  readonly maxFileSizeBytes?: number;
  /** Number of historical log files to retain (including the active one). */
  readonly maxFileCount?: number;
  /** Literal secrets or patterns scrubbed from every string in an entry. */
  readonly redactSecrets?: Array<string | RegExp>;
  /**
   * Explicit toggle for key-based payload redaction. Defaults to the
   * `TAB_LOG_REDACT` directives.
   */
  readonly redactionEnabled?: boolean;
  /** Stream receiving the JSON lines; command-line runs keep stdout for results. */
  readonly stream?: "stdout" | "stderr";
  /** Name stamped on every entry, e.g. `ingest` or `pipeline`. */
  readonly component?: string;
  /** Optional listener invoked every time an entry is emitted. */
  readonly onEntry?: (entry: LogEntry) => void;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

function describeError(error: unknown): { message: string } {
  return { message: error instanceof Error ? error.message : String(error) };
}

/**
 * Structured logger that emits JSON lines on stdout and optionally mirrors them
 * to a file. File writes are queued sequentially to guarantee ordering.
 */
export class StructuredLogger {
  private readonly logFile: string | null;
  private readonly maxFileSizeBytes: number;
  private readonly maxFileCount: number;
  private readonly redactSecrets: Array<string | RegExp>;
  private readonly redactionEnabled: boolean;
  private readonly component?: string;
  private readonly stream: NodeJS.WriteStream;
  private readonly entryListener?: (entry: LogEntry) => void;
  private writeQueue: Promise<void> = Promise.resolve();
  private readonly children: StructuredLogger[] = [];
  /** Whether the directory holding {@link logFile} has been created already. */
  private logDirectoryReady = false;

  constructor(private readonly options: LoggerOptions = {}) {
    this.logFile = options.logFile ?? null;
    this.maxFileSizeBytes = options.maxFileSizeBytes ?? DEFAULT_MAX_FILE_SIZE;
    this.maxFileCount = Math.max(1, options.maxFileCount ?? DEFAULT_MAX_FILE_COUNT);
    const directives = parseRedactionDirectives(process.env.TAB_LOG_REDACT);
    this.redactSecrets = [...new Set<string | RegExp>([...directives.tokens, ...(options.redactSecrets ?? [])])];
    this.redactionEnabled = options.redactionEnabled ?? directives.enabled;
    this.component = options.component;
    this.stream = options.stream === "stderr" ? process.stderr : process.stdout;
    this.entryListener = options.onEntry;
  }

  /**
   * Returns a logger sharing this one's settings under another component name.
   * Flushing the parent also flushes its children.
   */
  child(component: string): StructuredLogger {
    const child = new StructuredLogger({ ...this.options, component });
    this.children.push(child);
    return child;
  }

  info(message: string, payload?: unknown): void {
    this.log("info", message, payload);
  }

  warn(message: string, payload?: unknown): void {
    this.log("warn", message, payload);
  }

  error(message: string, payload?: unknown): void {
    this.log("error", message, payload);
  }

  debug(message: string, payload?: unknown): void {
    this.log("debug", message, payload);
  }

  /** Waits for every pending file write, children included. */
  async flush(): Promise<void> {
    await this.writeQueue;
    await Promise.all(this.children.map((child) => child.flush()));
  }

  private log(level: LogLevel, message: string, payload?: unknown): void {
    const safePayload = payload === undefined ? undefined : this.sanitise(payload);
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(this.component !== undefined ? { component: this.component } : {}),
      ...(safePayload !== undefined ? { payload: safePayload } : {}),
    };
    const line = `${JSON.stringify(entry)}\n`;
    this.stream.write(line);
    this.entryListener?.(structuredClone(entry));

    const logFile = this.logFile;
    if (!logFile) {
      return;
    }
    this.writeQueue = this.writeQueue.then(async () => {
      try {
        await this.ensureLogDestination(logFile);
        await this.rotateIfNeeded(logFile, Buffer.byteLength(line, "utf8"));
        await appendFile(logFile, line, "utf8");
      } catch (error) {
        this.reportInternalFailure("log_file_write_failed", error);
        // Retry directory creation on the next entry.
        this.logDirectoryReady = false;
      }
    });
  }

  private reportInternalFailure(message: string, error: unknown): void {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: "error",
      message,
      payload: describeError(error),
    };
    process.stderr.write(`${JSON.stringify(entry)}\n`);
  }

  private async ensureLogDestination(logFile: string): Promise<void> {
    if (this.logDirectoryReady) {
      return;
    }
    await mkdir(dirname(logFile), { recursive: true });
    this.logDirectoryReady = true;
  }

  /**
   * Rotates the active file when appending {@link pendingBytes} would exceed
   * the size limit. At most {@link maxFileCount} files are kept.
   */
  private async rotateIfNeeded(logFile: string, pendingBytes: number): Promise<void> {
    let currentSize = 0;
    try {
      currentSize = (await stat(logFile)).size;
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        return;
      }
      throw error;
    }
    if (currentSize + pendingBytes <= this.maxFileSizeBytes) {
      return;
    }

    try {
      await this.performRotation(logFile);
    } catch (error) {
      this.reportInternalFailure("log_file_rotation_failed", error);
    }
  }

  private async performRotation(logFile: string): Promise<void> {
    if (this.maxFileCount === 1) {
      await rm(logFile, { force: true });
      return;
    }

    await rm(`${logFile}.${this.maxFileCount - 1}`, { force: true });
    for (let index = this.maxFileCount - 2; index >= 0; index -= 1) {
      const source = index === 0 ? logFile : `${logFile}.${index}`;
      try {
        await rename(source, `${logFile}.${index + 1}`);
      } catch (error) {
        if (!isErrnoException(error) || error.code !== "ENOENT") {
          throw error;
        }
      }
    }
  }

  private sanitise(value: unknown, key?: string): unknown {
    if (this.redactionEnabled && key !== undefined && SENSITIVE_KEYS.has(key.toLowerCase())) {
      return REDACTION_TOKEN;
    }
    if (typeof value === "string") {
      return this.scrubSecrets(value);
    }
    if (value instanceof Error) {
      return { name: value.name, message: this.scrubSecrets(value.message) };
    }
    if (Array.isArray(value)) {
      return value.map((item) => this.sanitise(item));
    }
    if (value && typeof value === "object") {
      const result: Record<string, unknown> = {};
      for (const [entryKey, entry] of Object.entries(value)) {
        result[entryKey] = this.sanitise(entry, entryKey);
      }
      return result;
    }
    return value;
  }

  private scrubSecrets(value: string): string {
    let sanitised = value;
    for (const pattern of this.redactSecrets) {
      if (typeof pattern === "string" && pattern.length > 0) {
        sanitised = sanitised.split(pattern).join(REDACTION_TOKEN);
      } else if (pattern instanceof RegExp) {
        sanitised = sanitised.replace(pattern, REDACTION_TOKEN);
      }
    }
    return sanitised;
  }
}
