import type { FetchConfig } from "../config/index.js";
import { FetchError, FetchSizeExceededError, FetchTimeoutError, HttpStatusError, errorMessage } from "../errors.js";

const ACCEPT_HEADER = "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8";
const ACCEPT_LANGUAGE_HEADER = "en-US,en;q=0.5";

export interface FetchedPage {
  readonly requestedUrl: string;
  readonly finalUrl: string;
  readonly status: number;
  readonly contentType: string | null;
  readonly html: string;
}

/** Reads the body while enforcing the byte ceiling. */
async function readClampedBody(url: string, response: Response, maxBytes: number): Promise<Uint8Array> {
  const body = response.body;
  if (!body) {
    return new Uint8Array(0);
  }

  const reader = body.getReader();
  const chunks: Uint8Array[] = [];
  let total = 0;
  while (true) {
    const { done, value } = await reader.read();
    if (done) {
      break;
    }
    total += value.byteLength;
    if (total > maxBytes) {
      await reader.cancel();
      throw new FetchSizeExceededError(url, maxBytes);
    }
    chunks.push(value);
  }

  const merged = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    merged.set(chunk, offset);
    offset += chunk.byteLength;
  }
  return merged;
}

/** Charset declared by the content type, when the runtime knows it. */
function decoderFor(contentType: string | null): InstanceType<typeof TextDecoder> {
  const charset = /charset=["']?([\w-]+)/i.exec(contentType ?? "")?.[1];
  if (charset) {
    try {
      return new TextDecoder(charset);
    } catch {
      // Unknown labels fall through to UTF-8.
    }
  }
  return new TextDecoder("utf-8");
}

export interface PageFetcherDependencies {
  readonly fetchImpl?: typeof fetch;
}

/**
 * Downloads pages for the extraction stage. A single timeout covers the
 * request and the body; every failure surfaces as a {@link FetchError}.
 */
export class PageFetcher {
  private readonly fetchImpl: typeof fetch;

  constructor(
    private readonly config: FetchConfig,
    deps: PageFetcherDependencies = {},
  ) {
    this.fetchImpl = deps.fetchImpl ?? fetch;
  }

  async fetchPage(url: string): Promise<FetchedPage> {
    let target: URL;
    try {
      target = new URL(url);
    } catch (error) {
      throw new FetchError(url, `Invalid URL ${url}`, { cause: error });
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.config.timeoutMs);
    try {
      const response = await this.fetchImpl(target.href, {
        headers: {
          "user-agent": this.config.userAgent,
          accept: ACCEPT_HEADER,
          "accept-language": ACCEPT_LANGUAGE_HEADER,
        },
        redirect: "follow",
        signal: controller.signal,
      });
      if (response.status >= 400) {
        await response.body?.cancel();
        throw new HttpStatusError(url, response.status);
      }
      const contentType = response.headers.get("content-type");
      const body = await readClampedBody(url, response, this.config.maxBytes);
      return {
        requestedUrl: url,
        finalUrl: response.url || target.href,
        status: response.status,
        contentType,
        html: decoderFor(contentType).decode(body),
      };
    } catch (error) {
      if (error instanceof FetchError) {
        throw error;
      }
      if (controller.signal.aborted) {
        throw new FetchTimeoutError(url, this.config.timeoutMs, { cause: error });
      }
      throw new FetchError(url, `Failed to fetch ${url}: ${errorMessage(error)}`, { cause: error });
    } finally {
      clearTimeout(timeout);
    }
  }
}
