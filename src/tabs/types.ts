import type { TabStatus } from "./status.js";

/** Bookmark read from an export file, before persistence. */
export interface BookmarkCandidate {
  readonly url: string;
  readonly title: string | null;
  readonly collectionLabel: string | null;
  readonly collectedAt: Date;
}

/** Persisted tab row. */
export interface TabItem {
  readonly id: number;
  readonly userId: string;
  readonly url: string;
  readonly title: string | null;
  readonly collectionLabel: string | null;
  readonly collectedAt: string;
  readonly status: TabStatus;
  readonly lastError: string | null;
  readonly errorAt: string | null;
  readonly isProcessed: boolean;
  readonly processedAt: string | null;
  readonly createdAt: string;
  readonly updatedAt: string;
  readonly deletedAt: string | null;
}

/** Identifies which extractor produced a piece of content. */
export type SiteKind = "youtube" | "twitter" | "generic_html";

/** Normalized output of an extractor, before it is bound to a tab. */
export interface ExtractionOutput {
  readonly siteKind: SiteKind;
  readonly title: string | null;
  readonly textFull: string | null;
  readonly wordCount: number;
  readonly videoSeconds: number | null;
  readonly metadata: Readonly<Record<string, unknown>>;
}

export interface ExtractedContent extends ExtractionOutput {
  readonly tabId: number;
}

export const CONTENT_TYPES = ["article", "video", "paper", "code_repo", "reference", "misc"] as const;
export type ContentType = (typeof CONTENT_TYPES)[number];

export const PRIORITIES = ["high", "medium", "low"] as const;
export type Priority = (typeof PRIORITIES)[number];

/** LLM-generated metadata for a tab. */
export interface EnrichmentResult {
  readonly summary: string;
  readonly contentType: ContentType;
  readonly tags: readonly string[];
  readonly projects: readonly string[];
  readonly estReadMinutes: number | null;
  readonly priority: Priority | null;
  readonly modelName: string;
}

export interface StoredEnrichment extends EnrichmentResult {
  readonly tabId: number;
}

export type EventType =
  | "tab_created"
  | "tab_duplicate_skipped"
  | "fetch_started"
  | "fetch_success"
  | "fetch_error"
  | "llm_started"
  | "llm_enrich_success"
  | "llm_enrich_error"
  | "tab_processed"
  | "tab_unprocessed"
  | "tab_deleted";

export interface EventLogEntry {
  readonly id: number;
  readonly userId: string;
  readonly eventType: EventType;
  readonly entityType: string | null;
  readonly entityId: number | null;
  readonly details: Readonly<Record<string, unknown>>;
  readonly createdAt: string;
}
