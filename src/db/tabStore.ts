import { z } from "zod";

import { StatusTransitionError, TabNotFoundError } from "../errors.js";
import { assertTransition, ERROR_STATUSES, isTabStatus, type TabStatus } from "../tabs/status.js";
import {
  CONTENT_TYPES,
  PRIORITIES,
  type EnrichmentResult,
  type EventType,
  type ExtractedContent,
  type ExtractionOutput,
  type StoredEnrichment,
  type TabItem,
} from "../tabs/types.js";
import type { TabDatabase } from "./database.js";
import { EventLog } from "./eventLog.js";

/** Raw `tab_item` row; booleans are stored as 0/1 and dates as ISO strings. */
interface TabRow {
  id: number;
  user_id: string;
  url: string;
  page_title: string | null;
  collection_label: string | null;
  collected_at: string;
  status: string;
  last_error: string | null;
  error_at: string | null;
  is_processed: number;
  processed_at: string | null;
  created_at: string;
  updated_at: string;
  deleted_at: string | null;
}

/** `tab_parsed` row. `metadata` holds a JSON object. */
interface ParsedRow {
  tab_id: number;
  site_kind: string;
  title_extracted: string | null;
  text_full: string | null;
  word_count: number;
  video_seconds: number | null;
  metadata: string;
}

/** `tab_enrichment` row with the tag and project lists serialised as JSON arrays. */
interface EnrichmentRow {
  tab_id: number;
  summary: string;
  content_type: string;
  tags: string;
  projects: string;
  est_read_min: number | null;
  priority: string | null;
  model_name: string;
}

// Guards for values read back from TEXT columns.
const siteKindSchema = z.enum(["youtube", "twitter", "generic_html"]);
const stringListSchema = z.array(z.string());
const metadataSchema = z.record(z.unknown());

function toTabItem(row: TabRow): TabItem {
  if (!isTabStatus(row.status)) {
    throw new Error(`Tab ${row.id} carries unknown status ${row.status}`);
  }
  return {
    id: row.id,
    userId: row.user_id,
    url: row.url,
    title: row.page_title,
    collectionLabel: row.collection_label,
    collectedAt: row.collected_at,
    status: row.status,
    lastError: row.last_error,
    errorAt: row.error_at,
    isProcessed: row.is_processed === 1,
    processedAt: row.processed_at,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    deletedAt: row.deleted_at,
  };
}

/** Event written alongside a status change. */
export interface TransitionEvent {
  readonly eventType: EventType;
  readonly details?: Readonly<Record<string, unknown>>;
}

/** Timing of one enrichment run, kept in the history table. */
export interface EnrichmentRun {
  readonly attempts: number;
  readonly startedAt: Date;
  readonly finishedAt: Date;
}

export interface ListTabsOptions {
  /** Omitted means no limit. */
  readonly limit?: number;
}

/**
 * Repository over `tab_item` and the tables hanging off it. Every mutation is
 * a single short transaction that also appends its audit event.
 */
export class TabRepository {
  /** Audit log sharing the repository's database and clock. */
  readonly events: EventLog;
  private readonly clock: () => Date;

  constructor(
    private readonly db: TabDatabase,
    options: { clock?: () => Date } = {},
  ) {
    this.clock = options.clock ?? (() => new Date());
    this.events = new EventLog(db, this.clock);
  }

  /** Returns the live tab or null when missing, deleted or owned by someone else. */
  getTab(userId: string, tabId: number): TabItem | null {
    const row = this.db
      .prepare<[number, string], TabRow>("SELECT * FROM tab_item WHERE id = ? AND user_id = ? AND deleted_at IS NULL")
      .get(tabId, userId);
    return row ? toTabItem(row) : null;
  }

  /** {@link getTab}, throwing {@link TabNotFoundError} instead of returning null. */
  requireTab(userId: string, tabId: number): TabItem {
    const tab = this.getTab(userId, tabId);
    if (!tab) {
      throw new TabNotFoundError(tabId);
    }
    return tab;
  }

  /** Live tabs of the user in any of `statuses`, oldest first. */
  listByStatus(userId: string, statuses: readonly TabStatus[], options: ListTabsOptions = {}): TabItem[] {
    if (statuses.length === 0) {
      return [];
    }
    const placeholders = statuses.map(() => "?").join(", ");
    const rows = this.db
      .prepare<Array<string | number>, TabRow>(
        `SELECT * FROM tab_item
         WHERE user_id = ? AND deleted_at IS NULL AND status IN (${placeholders})
         ORDER BY id LIMIT ?`,
      )
      .all(userId, ...statuses, options.limit ?? -1);
    return rows.map(toTabItem);
  }

  /**
   * Moves the tab to `to` if the table allows it and the stored status still
   * equals `tab.status`. Error states record `error`; `parsed` and `enriched`
   * clear the previous error.
   */
  transition(tab: TabItem, to: TabStatus, event: TransitionEvent, error?: string): TabItem {
    const apply = this.db.transaction((): TabItem => this.applyTransition(tab, to, event, error));
    return apply();
  }

  /** Persists extracted content and moves the tab to `parsed` atomically. */
  completeExtraction(tab: TabItem, content: ExtractionOutput, details: Readonly<Record<string, unknown>>): TabItem {
    const apply = this.db.transaction((): TabItem => {
      this.db
        .prepare(
          `INSERT INTO tab_parsed
             (tab_id, site_kind, title_extracted, text_full, word_count, video_seconds, metadata, parsed_at)
           VALUES (@tabId, @siteKind, @title, @textFull, @wordCount, @videoSeconds, @metadata, @parsedAt)
           ON CONFLICT (tab_id) DO UPDATE SET
             site_kind = excluded.site_kind,
             title_extracted = excluded.title_extracted,
             text_full = excluded.text_full,
             word_count = excluded.word_count,
             video_seconds = excluded.video_seconds,
             metadata = excluded.metadata,
             parsed_at = excluded.parsed_at`,
        )
        .run({
          tabId: tab.id,
          siteKind: content.siteKind,
          title: content.title,
          textFull: content.textFull,
          wordCount: content.wordCount,
          videoSeconds: content.videoSeconds === null ? null : Math.round(content.videoSeconds),
          metadata: JSON.stringify(content.metadata),
          parsedAt: this.clock().toISOString(),
        });
      return this.applyTransition(tab, "parsed", { eventType: "fetch_success", details });
    });
    return apply();
  }

  /**
   * Persists the enrichment, appends a history row, links the tags and
   * projects, then moves the tab to `enriched`, all in one transaction.
   */
  completeEnrichment(
    tab: TabItem,
    result: EnrichmentResult,
    run: EnrichmentRun,
    details: Readonly<Record<string, unknown>>,
  ): TabItem {
    const apply = this.db.transaction((): TabItem => {
      const row = {
        tabId: tab.id,
        summary: result.summary,
        contentType: result.contentType,
        tags: JSON.stringify(result.tags),
        projects: JSON.stringify(result.projects),
        estReadMin: result.estReadMinutes,
        priority: result.priority,
        modelName: result.modelName,
      };
      this.db
        .prepare(
          `INSERT INTO tab_enrichment
             (tab_id, summary, content_type, tags, projects, est_read_min, priority, model_name, enriched_at)
           VALUES (@tabId, @summary, @contentType, @tags, @projects, @estReadMin, @priority, @modelName, @enrichedAt)
           ON CONFLICT (tab_id) DO UPDATE SET
             summary = excluded.summary,
             content_type = excluded.content_type,
             tags = excluded.tags,
             projects = excluded.projects,
             est_read_min = excluded.est_read_min,
             priority = excluded.priority,
             model_name = excluded.model_name,
             enriched_at = excluded.enriched_at`,
        )
        .run({ ...row, enrichedAt: run.finishedAt.toISOString() });
      this.db
        .prepare(
          `INSERT INTO tab_enrichment_history
             (tab_id, summary, content_type, tags, projects, est_read_min, priority, model_name,
              attempts, run_started_at, run_finished_at)
           VALUES (@tabId, @summary, @contentType, @tags, @projects, @estReadMin, @priority, @modelName,
              @attempts, @startedAt, @finishedAt)`,
        )
        .run({
          ...row,
          attempts: run.attempts,
          startedAt: run.startedAt.toISOString(),
          finishedAt: run.finishedAt.toISOString(),
        });
      this.replaceTabTags(tab, result);
      return this.applyTransition(tab, "enriched", { eventType: "llm_enrich_success", details });
    });
    return apply();
  }

  /** Stored extraction output, or null until the tab first reaches `parsed`. */
  getExtractedContent(tabId: number): ExtractedContent | null {
    const row = this.db.prepare<[number], ParsedRow>("SELECT * FROM tab_parsed WHERE tab_id = ?").get(tabId);
    if (!row) {
      return null;
    }
    return {
      tabId: row.tab_id,
      siteKind: siteKindSchema.parse(row.site_kind),
      title: row.title_extracted,
      textFull: row.text_full,
      wordCount: row.word_count,
      videoSeconds: row.video_seconds,
      metadata: metadataSchema.parse(JSON.parse(row.metadata)),
    };
  }

  /**
   * Current enrichment of the tab. Earlier runs only survive as rows of the
   * history table counted by {@link countEnrichmentRuns}.
   */
  getEnrichment(tabId: number): StoredEnrichment | null {
    const row = this.db.prepare<[number], EnrichmentRow>("SELECT * FROM tab_enrichment WHERE tab_id = ?").get(tabId);
    if (!row) {
      return null;
    }
    return {
      tabId: row.tab_id,
      summary: row.summary,
      contentType: z.enum(CONTENT_TYPES).parse(row.content_type),
      tags: stringListSchema.parse(JSON.parse(row.tags)),
      projects: stringListSchema.parse(JSON.parse(row.projects)),
      estReadMinutes: row.est_read_min,
      priority: row.priority === null ? null : z.enum(PRIORITIES).parse(row.priority),
      modelName: row.model_name,
    };
  }

  /** Number of enrichment runs recorded for the tab. */
  countEnrichmentRuns(tabId: number): number {
    const row = this.db
      .prepare<[number], { total: number }>("SELECT COUNT(*) AS total FROM tab_enrichment_history WHERE tab_id = ?")
      .get(tabId);
    return row?.total ?? 0;
  }

  /** Names linked to the tab, split by tag kind, in alphabetical order. */
  listTabTags(tabId: number): { tags: string[]; projects: string[] } {
    const rows = this.db
      .prepare<[number], { name: string; kind: string }>(
        `SELECT tag.name AS name, tag.kind AS kind FROM tab_tag
         JOIN tag ON tag.id = tab_tag.tag_id
         WHERE tab_tag.tab_id = ? ORDER BY tag.name`,
      )
      .all(tabId);
    return {
      tags: rows.filter((row) => row.kind === "generic").map((row) => row.name),
      projects: rows.filter((row) => row.kind === "project").map((row) => row.name),
    };
  }

  /** Flips the "processed" flag set by the user once a tab has been dealt with. */
  toggleProcessed(userId: string, tabId: number): TabItem {
    const apply = this.db.transaction((): TabItem => {
      const tab = this.requireTab(userId, tabId);
      const processed = !tab.isProcessed;
      const now = this.clock().toISOString();
      this.db
        .prepare("UPDATE tab_item SET is_processed = ?, processed_at = ?, updated_at = ? WHERE id = ?")
        .run(processed ? 1 : 0, processed ? now : null, now, tab.id);
      this.events.append({
        userId,
        eventType: processed ? "tab_processed" : "tab_unprocessed",
        entityType: "tab_item",
        entityId: tab.id,
        details: { url: tab.url },
      });
      return this.requireTab(userId, tabId);
    });
    return apply();
  }

  /** Soft-deletes the tab; the URL may then be imported again as a new row. */
  softDelete(userId: string, tabId: number): void {
    const apply = this.db.transaction((): void => {
      const tab = this.requireTab(userId, tabId);
      const now = this.clock().toISOString();
      this.db.prepare("UPDATE tab_item SET deleted_at = ?, updated_at = ? WHERE id = ?").run(now, now, tab.id);
      this.events.append({
        userId,
        eventType: "tab_deleted",
        entityType: "tab_item",
        entityId: tab.id,
        details: { url: tab.url },
      });
    });
    apply();
  }

  /**
   * Compare-and-set on the stored status: the update only applies when the row
   * still holds `tab.status`. Must run inside the caller's transaction so the
   * event is written with it.
   */
  private applyTransition(tab: TabItem, to: TabStatus, event: TransitionEvent, error?: string): TabItem {
    assertTransition(tab.id, tab.status, to);
    const now = this.clock().toISOString();
    const isError = ERROR_STATUSES.includes(to);
    const clearsError = to === "parsed" || to === "enriched";
    const result = this.db
      .prepare(
        `UPDATE tab_item SET
           status = @to,
           updated_at = @now,
           last_error = CASE WHEN @isError = 1 THEN @error WHEN @clearsError = 1 THEN NULL ELSE last_error END,
           error_at = CASE WHEN @isError = 1 THEN @now WHEN @clearsError = 1 THEN NULL ELSE error_at END
         WHERE id = @id AND status = @from AND deleted_at IS NULL`,
      )
      .run({
        id: tab.id,
        from: tab.status,
        to,
        now,
        isError: isError ? 1 : 0,
        clearsError: clearsError ? 1 : 0,
        error: error ?? null,
      });
    if (result.changes === 0) {
      throw new StatusTransitionError(tab.id, tab.status, to, "stored status changed or tab deleted");
    }
    this.events.append({
      userId: tab.userId,
      eventType: event.eventType,
      entityType: "tab_item",
      entityId: tab.id,
      details: event.details ?? {},
    });
    return this.requireTab(tab.userId, tab.id);
  }

  /** Relinks the tab to its current tags, creating missing tag rows per user and kind. */
  private replaceTabTags(tab: TabItem, result: EnrichmentResult): void {
    this.db.prepare("DELETE FROM tab_tag WHERE tab_id = ?").run(tab.id);
    const now = this.clock().toISOString();
    const insertTag = this.db.prepare<[string, string, string, string]>(
      `INSERT INTO tag (user_id, name, kind, created_at) VALUES (?, ?, ?, ?)
       ON CONFLICT (user_id, kind, name) WHERE deleted_at IS NULL DO NOTHING`,
    );
    const findTag = this.db.prepare<[string, string, string], { id: number }>(
      "SELECT id FROM tag WHERE user_id = ? AND kind = ? AND name = ? AND deleted_at IS NULL",
    );
    const link = this.db.prepare<[number, number]>("INSERT OR IGNORE INTO tab_tag (tab_id, tag_id) VALUES (?, ?)");

    const entries: Array<[string, "generic" | "project"]> = [
      ...result.tags.map((name): [string, "generic"] => [name, "generic"]),
      ...result.projects.map((name): [string, "project"] => [name, "project"]),
    ];
    for (const [name, kind] of entries) {
      insertTag.run(tab.userId, name, kind, now);
      const tag = findTag.get(tab.userId, kind, name);
      if (tag) {
        link.run(tab.id, tag.id);
      }
    }
  }
}
