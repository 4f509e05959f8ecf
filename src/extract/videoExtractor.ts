import { execFile as execFileCallback } from "node:child_process";
import { promisify } from "node:util";
import * as cheerio from "cheerio";
import { z } from "zod";

import { errorMessage } from "../errors.js";
import type { ExtractionOutput } from "../tabs/types.js";
import { compactRecord, countWords, documentTitle, hostnameOf, metaContent } from "./html.js";
import type { Extractor } from "./types.js";

const execFile = promisify(execFileCallback);

const VIDEO_URL_PATTERNS = [
  /^(?:https?:\/\/)?(?:www\.)?youtube\.com\/watch\?v=[\w-]+/,
  /^(?:https?:\/\/)?(?:www\.)?youtube\.com\/shorts\/[\w-]+/,
  /^(?:https?:\/\/)?youtu\.be\/[\w-]+/,
  /^(?:https?:\/\/)?(?:www\.)?youtube\.com\/embed\/[\w-]+/,
  /^(?:https?:\/\/)?(?:www\.)?youtube\.com\/v\/[\w-]+/,
] as const;

const VIDEO_HOSTS = new Set(["youtube.com", "www.youtube.com", "youtu.be"]);

const TITLE_SUFFIX = " - YouTube";

/** yt-dlp output can reach several megabytes for long descriptions. */
const MAX_TOOL_OUTPUT_BYTES = 16 * 1024 * 1024;
const DEFAULT_TOOL_TIMEOUT_MS = 30_000;

/** Subset of the `yt-dlp --dump-json` document used here. */
const videoInfoSchema = z
  .object({
    id: z.string().nullish(),
    title: z.string().nullish(),
    description: z.string().nullish(),
    duration: z.number().nonnegative().nullish(),
    uploader: z.string().nullish(),
    uploader_id: z.string().nullish(),
    channel: z.string().nullish(),
    channel_id: z.string().nullish(),
    upload_date: z.string().nullish(),
    view_count: z.number().nullish(),
    like_count: z.number().nullish(),
    comment_count: z.number().nullish(),
    thumbnail: z.string().nullish(),
    categories: z.array(z.string()).nullish(),
    tags: z.array(z.string()).nullish(),
    is_live: z.boolean().nullish(),
    was_live: z.boolean().nullish(),
  })
  .passthrough();

type VideoInfo = z.infer<typeof videoInfoSchema>;

export type ExecFileLike = (
  file: string,
  args: readonly string[],
  options: { timeoutMs: number },
) => Promise<{ stdout: string; stderr: string }>;

async function defaultExecFile(
  file: string,
  args: readonly string[],
  options: { timeoutMs: number },
): Promise<{ stdout: string; stderr: string }> {
  const { stdout, stderr } = await execFile(file, [...args], {
    timeout: options.timeoutMs,
    maxBuffer: MAX_TOOL_OUTPUT_BYTES,
    encoding: "utf8",
  });
  return { stdout, stderr };
}

/**
 * Failure text recorded in `parse_error`. `execFile` rejects with
 * `killed: true` once the timeout signal was sent, which is reported as a
 * timeout rather than as the bare "Command failed" message.
 */
function describeToolFailure(binary: string, timeoutMs: number, error: unknown): string {
  if (
    error instanceof Error &&
    "killed" in error &&
    error.killed === true &&
    !("code" in error && error.code === "ERR_CHILD_PROCESS_STDIO_MAXBUFFER")
  ) {
    const signal = "signal" in error && typeof error.signal === "string" ? ` (${error.signal})` : "";
    return `${binary} timed out after ${timeoutMs} ms${signal}`;
  }
  return errorMessage(error);
}

export interface VideoExtractorOptions {
  /** Path of the yt-dlp binary. */
  readonly binary?: string;
  readonly timeoutMs?: number;
  readonly execFile?: ExecFileLike;
}

/** Video identifier carried by a watch, shorts, embed or short-link URL. */
export function extractVideoId(url: string): string | null {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return null;
  }
  if (parsed.hostname.includes("youtube.com")) {
    if (parsed.pathname === "/watch") {
      return parsed.searchParams.get("v");
    }
    const match = /^\/(?:shorts|embed|v)\/([^/?]+)/.exec(parsed.pathname);
    if (match?.[1]) {
      return match[1];
    }
  }
  if (parsed.hostname.includes("youtu.be")) {
    const [id] = parsed.pathname.replace(/^\/+/, "").split("/");
    return id && id.length > 0 ? id : null;
  }
  return null;
}

/**
 * YouTube videos. Metadata comes from yt-dlp; when the tool is missing, times
 * out or prints something unreadable, the fetched page's `<title>` and meta
 * description are used instead and the metadata records the failure.
 */
export class VideoExtractor implements Extractor {
  readonly name = "youtube";
  readonly siteKind = "youtube" as const;
  private readonly binary: string;
  private readonly timeoutMs: number;
  private readonly exec: ExecFileLike;

  constructor(options: VideoExtractorOptions = {}) {
    this.binary = options.binary ?? "yt-dlp";
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TOOL_TIMEOUT_MS;
    this.exec = options.execFile ?? defaultExecFile;
  }

  matches(url: string): boolean {
    return VIDEO_URL_PATTERNS.some((pattern) => pattern.test(url)) || VIDEO_HOSTS.has(hostnameOf(url));
  }

  async extract(url: string, rawHtml: string): Promise<ExtractionOutput> {
    let info: VideoInfo;
    try {
      info = await this.fetchVideoInfo(url);
    } catch (error) {
      return this.fallback(url, rawHtml, describeToolFailure(this.binary, this.timeoutMs, error));
    }
    return this.fromVideoInfo(url, info);
  }

  private async fetchVideoInfo(url: string): Promise<VideoInfo> {
    const { stdout } = await this.exec(
      this.binary,
      ["--dump-json", "--no-download", "--no-playlist", "--no-warnings", url],
      { timeoutMs: this.timeoutMs },
    );
    return videoInfoSchema.parse(JSON.parse(stdout));
  }

  private fromVideoInfo(url: string, info: VideoInfo): ExtractionOutput {
    const title = info.title && info.title.length > 0 ? info.title : null;
    const parts = [title, info.description].filter((part): part is string => typeof part === "string" && part.length > 0);
    const textFull = parts.length > 0 ? parts.join("\n\n") : null;

    return {
      siteKind: this.siteKind,
      title,
      textFull,
      wordCount: countWords(textFull),
      videoSeconds: info.duration ?? null,
      metadata: compactRecord({
        url,
        video_id: info.id,
        uploader: info.uploader,
        uploader_id: info.uploader_id,
        channel: info.channel,
        channel_id: info.channel_id,
        upload_date: info.upload_date,
        view_count: info.view_count,
        like_count: info.like_count,
        comment_count: info.comment_count,
        thumbnail: info.thumbnail,
        categories: info.categories ?? [],
        tags: info.tags ?? [],
        is_live: info.is_live ?? false,
        was_live: info.was_live ?? false,
      }),
    };
  }

  private fallback(url: string, rawHtml: string, parseError: string): ExtractionOutput {
    const $ = cheerio.load(rawHtml);
    const pageTitle = documentTitle($);
    const title = pageTitle?.endsWith(TITLE_SUFFIX) ? pageTitle.slice(0, -TITLE_SUFFIX.length) : pageTitle;
    const description = metaContent($, "description");
    const parts = [title, description].filter((part): part is string => typeof part === "string" && part.length > 0);
    const textFull = parts.length > 0 ? parts.join("\n\n") : null;

    return {
      siteKind: this.siteKind,
      title: title && title.length > 0 ? title : null,
      textFull,
      wordCount: countWords(textFull),
      videoSeconds: null,
      metadata: {
        url,
        video_id: extractVideoId(url),
        parse_error: parseError,
        fallback_used: true,
      },
    };
  }
}
