import type Database from "better-sqlite3";
import { z } from "zod";

import type { EventLogEntry, EventType } from "../tabs/types.js";
import type { TabDatabase } from "./database.js";

const detailsSchema = z.record(z.unknown());

interface EventRow {
  id: number;
  user_id: string;
  event_type: EventType;
  entity_type: string | null;
  entity_id: number | null;
  details: string;
  created_at: string;
}

export interface AppendEventInput {
  readonly userId: string;
  readonly eventType: EventType;
  readonly entityType?: string | null;
  readonly entityId?: number | null;
  readonly details?: Readonly<Record<string, unknown>>;
}

export interface ListEventsFilter {
  readonly eventType?: EventType;
  readonly entityId?: number;
  readonly limit?: number;
}

function parseDetails(raw: string): Record<string, unknown> {
  const parsed = detailsSchema.safeParse(JSON.parse(raw));
  return parsed.success ? parsed.data : {};
}

/**
 * Append-only audit trail. Callers append inside the transaction of the
 * mutation being recorded; the log never opens a transaction of its own.
 */
export class EventLog {
  private readonly insert: Database.Statement<[string, string, string | null, number | null, string, string]>;
  private readonly clock: () => Date;

  constructor(
    private readonly db: TabDatabase,
    clock: () => Date = () => new Date(),
  ) {
    this.clock = clock;
    this.insert = db.prepare<[string, string, string | null, number | null, string, string]>(
      `INSERT INTO event_log (user_id, event_type, entity_type, entity_id, details, created_at)
       VALUES (?, ?, ?, ?, ?, ?)`,
    );
  }

  append(input: AppendEventInput): void {
    this.insert.run(
      input.userId,
      input.eventType,
      input.entityType ?? null,
      input.entityId ?? null,
      JSON.stringify(input.details ?? {}),
      this.clock().toISOString(),
    );
  }

  /** Returns the user's events, oldest first. */
  list(userId: string, filter: ListEventsFilter = {}): EventLogEntry[] {
    const clauses = ["user_id = @userId"];
    const params: Record<string, string | number> = { userId, limit: filter.limit ?? -1 };
    if (filter.eventType !== undefined) {
      clauses.push("event_type = @eventType");
      params.eventType = filter.eventType;
    }
    if (filter.entityId !== undefined) {
      clauses.push("entity_id = @entityId");
      params.entityId = filter.entityId;
    }
    const rows = this.db
      .prepare<Record<string, string | number>, EventRow>(
        `SELECT * FROM event_log WHERE ${clauses.join(" AND ")} ORDER BY id LIMIT @limit`,
      )
      .all(params);

    return rows.map((row) => ({
      id: row.id,
      userId: row.user_id,
      eventType: row.event_type,
      entityType: row.entity_type,
      entityId: row.entity_id,
      details: parseDetails(row.details),
      createdAt: row.created_at,
    }));
  }
}
