/** Machine-readable codes carried by every error raised by the pipeline. */
export const ERROR_CODES = {
  fileFormat: "E-IMPORT-FORMAT",
  noExtractor: "E-EXTRACT-NO-MATCH",
  extraction: "E-EXTRACT-FAILED",
  fetchNetwork: "E-FETCH-NETWORK",
  fetchHttp: "E-FETCH-HTTP",
  fetchTimeout: "E-FETCH-TIMEOUT",
  fetchSize: "E-FETCH-SIZE",
  predictorHttp: "E-LLM-HTTP",
  predictorNetwork: "E-LLM-NETWORK",
  predictorSchema: "E-LLM-SCHEMA",
  enrichmentExhausted: "E-ENRICH-EXHAUSTED",
  statusTransition: "E-STATUS-TRANSITION",
  tabNotFound: "E-TAB-NOT-FOUND",
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

/** Root of the error hierarchy. */
export class TabTriageError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "TabTriageError";
    this.code = code;
  }
}

/** The bookmark export contains no bookmark list at all. */
export class FileFormatError extends TabTriageError {
  constructor(message: string, options?: ErrorOptions) {
    super(ERROR_CODES.fileFormat, message, options);
    this.name = "FileFormatError";
  }
}

/** No registered extractor accepts the URL. */
export class NoExtractorMatchError extends TabTriageError {
  readonly url: string;

  constructor(url: string) {
    super(ERROR_CODES.noExtractor, `No extractor accepts ${url}`);
    this.name = "NoExtractorMatchError";
    this.url = url;
  }
}

/** Malformed content prevented any extraction. */
export class ExtractionError extends TabTriageError {
  readonly url: string;

  constructor(url: string, message: string, options?: ErrorOptions) {
    super(ERROR_CODES.extraction, message, options);
    this.name = "ExtractionError";
    this.url = url;
  }
}

/** The page could not be downloaded. */
export class FetchError extends TabTriageError {
  readonly url: string;

  constructor(url: string, message: string, options?: ErrorOptions & { code?: ErrorCode }) {
    super(options?.code ?? ERROR_CODES.fetchNetwork, message, options);
    this.name = "FetchError";
    this.url = url;
  }
}

export class HttpStatusError extends FetchError {
  readonly status: number;

  constructor(url: string, status: number) {
    super(url, `${url} responded with HTTP ${status}`, { code: ERROR_CODES.fetchHttp });
    this.name = "HttpStatusError";
    this.status = status;
  }
}

export class FetchTimeoutError extends FetchError {
  readonly timeoutMs: number;

  constructor(url: string, timeoutMs: number, options?: ErrorOptions) {
    super(url, `Fetching ${url} timed out after ${timeoutMs} ms`, { ...options, code: ERROR_CODES.fetchTimeout });
    this.name = "FetchTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class FetchSizeExceededError extends FetchError {
  readonly maxBytes: number;

  constructor(url: string, maxBytes: number) {
    super(url, `Payload of ${url} exceeds ${maxBytes} bytes`, { code: ERROR_CODES.fetchSize });
    this.name = "FetchSizeExceededError";
    this.maxBytes = maxBytes;
  }
}

type PredictorErrorCode =
  | typeof ERROR_CODES.predictorHttp
  | typeof ERROR_CODES.predictorNetwork
  | typeof ERROR_CODES.predictorSchema;

/**
 * A single predictor call failed. `rawOutput` holds whatever the model
 * returned when the failure happened after a response was received.
 */
export class PredictorError extends TabTriageError {
  readonly status: number | null;
  readonly rawOutput: string | null;

  constructor(
    message: string,
    options: { code: PredictorErrorCode; status?: number | null; rawOutput?: string | null; cause?: unknown },
  ) {
    super(options.code, message, { cause: options.cause });
    this.name = "PredictorError";
    this.status = options.status ?? null;
    this.rawOutput = options.rawOutput ?? null;
  }
}

/** Every enrichment attempt failed. */
export class EnrichmentExhaustedError extends TabTriageError {
  readonly attempts: number;
  readonly lastError: string;
  readonly rawOutput: string | null;

  constructor(attempts: number, lastError: string, rawOutput: string | null, options?: ErrorOptions) {
    super(ERROR_CODES.enrichmentExhausted, `Enrichment failed after ${attempts} attempts: ${lastError}`, options);
    this.name = "EnrichmentExhaustedError";
    this.attempts = attempts;
    this.lastError = lastError;
    this.rawOutput = rawOutput;
  }
}

/** A status change outside the lifecycle table, or a stale compare-and-set. */
export class StatusTransitionError extends TabTriageError {
  readonly tabId: number;
  readonly from: string;
  readonly to: string;

  constructor(tabId: number, from: string, to: string, reason?: string) {
    super(
      ERROR_CODES.statusTransition,
      `Tab ${tabId} cannot move from ${from} to ${to}${reason ? `: ${reason}` : ""}`,
    );
    this.name = "StatusTransitionError";
    this.tabId = tabId;
    this.from = from;
    this.to = to;
  }
}

export class TabNotFoundError extends TabTriageError {
  readonly tabId: number;

  constructor(tabId: number) {
    super(ERROR_CODES.tabNotFound, `Tab ${tabId} does not exist or was deleted`);
    this.name = "TabNotFoundError";
    this.tabId = tabId;
  }
}

/** Renders any thrown value as a single-line message. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
