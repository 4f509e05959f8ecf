import type { VideoToolConfig } from "../config/index.js";
import { GenericExtractor } from "./genericExtractor.js";
import { ExtractorRegistry } from "./registry.js";
import { SocialPostExtractor } from "./socialExtractor.js";
import { VideoExtractor, type ExecFileLike } from "./videoExtractor.js";

export { PageFetcher, type FetchedPage } from "./fetcher.js";
export { GenericExtractor, cleanTitle } from "./genericExtractor.js";
export { countWords } from "./html.js";
export { ExtractorRegistry } from "./registry.js";
export { SocialPostExtractor } from "./socialExtractor.js";
export type { Extractor } from "./types.js";
export { VideoExtractor, extractVideoId, type ExecFileLike } from "./videoExtractor.js";

/**
 * Registry in its production order: video, social post, then the generic
 * fallback that accepts every HTTP(S) URL. The result is sealed.
 */
export function createDefaultRegistry(
  videoTool?: VideoToolConfig,
  deps: { execFile?: ExecFileLike } = {},
): ExtractorRegistry {
  return new ExtractorRegistry([
    new VideoExtractor({ binary: videoTool?.binary, timeoutMs: videoTool?.timeoutMs, execFile: deps.execFile }),
    new SocialPostExtractor(),
    new GenericExtractor(),
  ]).seal();
}
