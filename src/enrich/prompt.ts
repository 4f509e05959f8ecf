import type { SiteKind } from "../tabs/types.js";
import { CONTENT_TYPES, PRIORITIES } from "../tabs/types.js";
import { PROJECT_CATEGORIES } from "./schema.js";

export const DEFAULT_TEXT_MAX_CHARS = 4000;
export const TRUNCATION_MARKER = "... [truncated]";
export const UNTITLED = "Untitled";
export const NO_CONTENT = "No content available";

/** What the pipeline knows about a tab when asking for enrichment. */
export interface EnrichmentInput {
  readonly url: string;
  readonly title: string | null;
  readonly siteKind: SiteKind;
  readonly text: string | null;
  readonly wordCount: number | null;
  readonly videoSeconds: number | null;
}

/** Values substituted into the prompt, with placeholders already applied. */
export interface PromptContext {
  readonly url: string;
  readonly title: string;
  readonly siteKind: SiteKind;
  readonly text: string;
  readonly wordCount: number;
  readonly videoSeconds: number;
}

export function buildPromptContext(input: EnrichmentInput, maxChars: number = DEFAULT_TEXT_MAX_CHARS): PromptContext {
  let text = input.text ?? "";
  if (text.length > maxChars) {
    text = `${text.slice(0, maxChars)}${TRUNCATION_MARKER}`;
  }
  return {
    url: input.url,
    title: input.title && input.title.length > 0 ? input.title : UNTITLED,
    siteKind: input.siteKind,
    text: text.length > 0 ? text : NO_CONTENT,
    wordCount: input.wordCount ?? 0,
    videoSeconds: input.videoSeconds ?? 0,
  };
}

export interface ChatMessage {
  readonly role: "system" | "user" | "assistant";
  readonly content: string;
}

const SYSTEM_PROMPT = [
  "You analyse saved web pages and produce metadata that helps organise a reading backlog.",
  "Reply with a single JSON object and nothing else, using exactly these keys:",
  '- "summary": a brief 2-3 sentence summary of the content (10 to 500 characters)',
  `- "content_type": one of ${CONTENT_TYPES.join(", ")}`,
  '- "tags": 3-5 relevant tags starting with # (e.g. #tutorial, #longread, #video)',
  `- "projects": related project categories chosen from ${PROJECT_CATEGORIES.join(", ")}`,
  '- "est_read_min": estimated reading or watching time in whole minutes (1 to 600), or null',
  `- "priority": one of ${PRIORITIES.join(", ")}, or null`,
].join("\n");

export function buildMessages(context: PromptContext): ChatMessage[] {
  const user = [
    `URL: ${context.url}`,
    `Title: ${context.title}`,
    `Site kind: ${context.siteKind}`,
    `Word count: ${context.wordCount}`,
    `Video duration (seconds, 0 if not a video): ${context.videoSeconds}`,
    "",
    "Content:",
    context.text,
  ].join("\n");
  return [
    { role: "system", content: SYSTEM_PROMPT },
    { role: "user", content: user },
  ];
}
