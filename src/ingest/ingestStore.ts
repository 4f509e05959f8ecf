import { EventLog } from "../db/eventLog.js";
import type { TabDatabase } from "../db/database.js";
import { errorMessage } from "../errors.js";
import type { StructuredLogger } from "../logger.js";
import { TAB_STATUSES, type TabStatus } from "../tabs/status.js";
import type { BookmarkCandidate } from "../tabs/types.js";

/** Source tag written in the details of ingestion events. */
export const INGEST_SOURCE = "bookmarks_import";
/** Error messages kept for display; the error counter keeps counting past it. */
export const MAX_ERROR_MESSAGES = 50;
/** Rows committed per transaction when the caller does not pick a size. */
export const DEFAULT_BATCH_SIZE = 100;

/** Counters of one ingest call. `totalProcessed` equals the sum of the other three counters. */
export interface IngestResult {
  totalProcessed: number;
  inserted: number;
  /** Candidates whose URL already had a live row for the user, earlier rows of the same call included. */
  skippedDuplicates: number;
  /** Rows rolled back on failure. */
  errors: number;
  /** First {@link MAX_ERROR_MESSAGES} failures, formatted `Error processing <url>: <message>`. */
  errorMessages: string[];
}

// Failures surface as exceptions from the row transaction.
type RowOutcome = "inserted" | "duplicate";

export interface IngestStoreOptions {
  /** Receives per-row failures and one line per committed batch. */
  readonly logger?: StructuredLogger;
  readonly clock?: () => Date;
}

/**
 * Persists bookmark candidates with deduplication on `(user_id, url)` among
 * live rows. Each batch is one transaction; each row is a savepoint inside
 * it, so one failing row never rolls back its neighbours.
 */
export class IngestStore {
  private readonly events: EventLog;
  private readonly clock: () => Date;
  private readonly logger?: StructuredLogger;

  constructor(
    private readonly db: TabDatabase,
    options: IngestStoreOptions = {},
  ) {
    this.clock = options.clock ?? (() => new Date());
    this.events = new EventLog(db, this.clock);
    this.logger = options.logger;
  }

  /**
   * Inserts the candidates for `userId` in batches of `batchSize`. A duplicate
   * keeps its stored row and only fills a missing title or collection label.
   *
   * @throws RangeError when `batchSize` is not a positive integer.
   */
  ingest(candidates: readonly BookmarkCandidate[], userId: string, batchSize: number = DEFAULT_BATCH_SIZE): IngestResult {
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new RangeError(`batchSize must be a positive integer, received ${batchSize}`);
    }

    const result: IngestResult = { totalProcessed: 0, inserted: 0, skippedDuplicates: 0, errors: 0, errorMessages: [] };

    const insert = this.db.prepare<[string, string, string | null, string | null, string, string, string], { id: number }>(
      `INSERT INTO tab_item (user_id, url, page_title, collection_label, collected_at, status, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?, 'new', ?, ?)
       ON CONFLICT (user_id, url) WHERE deleted_at IS NULL DO NOTHING
       RETURNING id`,
    );
    const fillGaps = this.db.prepare<[string | null, string | null, string, string, string], { id: number }>(
      `UPDATE tab_item SET
         page_title = COALESCE(page_title, ?),
         collection_label = COALESCE(collection_label, ?),
         updated_at = ?
       WHERE user_id = ? AND url = ? AND deleted_at IS NULL
       RETURNING id`,
    );

    const ingestRow = this.db.transaction((candidate: BookmarkCandidate): RowOutcome => {
      const now = this.clock().toISOString();
      const inserted = insert.get(
        userId,
        candidate.url,
        candidate.title,
        candidate.collectionLabel,
        candidate.collectedAt.toISOString(),
        now,
        now,
      );
      if (inserted) {
        this.events.append({
          userId,
          eventType: "tab_created",
          entityType: "tab_item",
          entityId: inserted.id,
          details: { url: candidate.url, source: INGEST_SOURCE },
        });
        return "inserted";
      }
      const existing = fillGaps.get(candidate.title, candidate.collectionLabel, now, userId, candidate.url);
      this.events.append({
        userId,
        eventType: "tab_duplicate_skipped",
        entityType: "tab_item",
        entityId: existing?.id ?? null,
        details: { url: candidate.url, source: INGEST_SOURCE },
      });
      return "duplicate";
    });

    // Called inside `ingestBatch`, so better-sqlite3 runs each row as a savepoint.
    const ingestBatch = this.db.transaction((batch: readonly BookmarkCandidate[]): void => {
      for (const candidate of batch) {
        result.totalProcessed += 1;
        try {
          const outcome = ingestRow(candidate);
          if (outcome === "inserted") {
            result.inserted += 1;
          } else {
            result.skippedDuplicates += 1;
          }
        } catch (error) {
          result.errors += 1;
          const message = `Error processing ${candidate.url}: ${errorMessage(error)}`;
          if (result.errorMessages.length < MAX_ERROR_MESSAGES) {
            result.errorMessages.push(message);
          }
          this.logger?.warn("ingest_row_failed", { url: candidate.url, message: errorMessage(error) });
        }
      }
    });

    for (let offset = 0; offset < candidates.length; offset += batchSize) {
      const batch = candidates.slice(offset, offset + batchSize);
      ingestBatch(batch);
      this.logger?.debug("ingest_batch_committed", { offset, size: batch.length });
    }

    this.logger?.info("ingest_completed", {
      user_id: userId,
      total_processed: result.totalProcessed,
      inserted: result.inserted,
      skipped_duplicates: result.skippedDuplicates,
      errors: result.errors,
    });
    return result;
  }

  /** Live tab count for the user. */
  count(userId: string): number {
    const row = this.db
      .prepare<[string], { total: number }>("SELECT COUNT(*) AS total FROM tab_item WHERE user_id = ? AND deleted_at IS NULL")
      .get(userId);
    return row?.total ?? 0;
  }

  /** Live tab counts grouped by status; statuses without tabs are omitted. */
  summary(userId: string): Partial<Record<TabStatus, number>> {
    const rows = this.db
      .prepare<[string], { status: string; total: number }>(
        `SELECT status, COUNT(*) AS total FROM tab_item
         WHERE user_id = ? AND deleted_at IS NULL GROUP BY status ORDER BY status`,
      )
      .all(userId);
    const summary: Partial<Record<TabStatus, number>> = {};
    for (const row of rows) {
      const status = TAB_STATUSES.find((candidate) => candidate === row.status);
      if (status) {
        summary[status] = row.total;
      }
    }
    return summary;
  }
}
