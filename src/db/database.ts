/**
 * SQLite storage for tabs and everything derived from them.
 *
 * Uses better-sqlite3: every statement is synchronous, so a transaction can
 * never straddle a network call made by the pipeline.
 */
import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";

export type TabDatabase = Database.Database;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS tab_item (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id TEXT NOT NULL,
    url TEXT NOT NULL,
    page_title TEXT,
    collection_label TEXT,
    collected_at TEXT NOT NULL,
    status TEXT NOT NULL DEFAULT 'new'
      CHECK (status IN ('new', 'fetch_pending', 'parsed', 'fetch_error', 'llm_pending', 'enriched', 'llm_error')),
    last_error TEXT,
    error_at TEXT,
    is_processed INTEGER NOT NULL DEFAULT 0,
    processed_at TEXT,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL,
    deleted_at TEXT
  );

  CREATE UNIQUE INDEX IF NOT EXISTS idx_tab_item_user_url_live
    ON tab_item(user_id, url) WHERE deleted_at IS NULL;
  CREATE INDEX IF NOT EXISTS idx_tab_item_user_status ON tab_item(user_id, status);

  CREATE TABLE IF NOT EXISTS tab_parsed (
    tab_id INTEGER PRIMARY KEY REFERENCES tab_item(id) ON DELETE CASCADE,
    site_kind TEXT NOT NULL,
    title_extracted TEXT,
    text_full TEXT,
    word_count INTEGER NOT NULL DEFAULT 0,
    video_seconds INTEGER,
    metadata TEXT NOT NULL DEFAULT '{}',
    parsed_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS tab_enrichment (
    tab_id INTEGER PRIMARY KEY REFERENCES tab_item(id) ON DELETE CASCADE,
    summary TEXT NOT NULL,
    content_type TEXT NOT NULL,
    tags TEXT NOT NULL DEFAULT '[]',
    projects TEXT NOT NULL DEFAULT '[]',
    est_read_min INTEGER,
    priority TEXT,
    model_name TEXT NOT NULL,
    enriched_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS tab_enrichment_history (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    tab_id INTEGER NOT NULL REFERENCES tab_item(id) ON DELETE CASCADE,
    summary TEXT NOT NULL,
    content_type TEXT NOT NULL,
    tags TEXT NOT NULL,
    projects TEXT NOT NULL,
    est_read_min INTEGER,
    priority TEXT,
    model_name TEXT NOT NULL,
    attempts INTEGER NOT NULL,
    run_started_at TEXT NOT NULL,
    run_finished_at TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_enrichment_history_tab ON tab_enrichment_history(tab_id);

  CREATE TABLE IF NOT EXISTS tag (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id TEXT NOT NULL,
    name TEXT NOT NULL,
    kind TEXT NOT NULL CHECK (kind IN ('generic', 'project', 'auto')),
    created_at TEXT NOT NULL,
    deleted_at TEXT
  );

  CREATE UNIQUE INDEX IF NOT EXISTS idx_tag_user_kind_name_live
    ON tag(user_id, kind, name) WHERE deleted_at IS NULL;

  CREATE TABLE IF NOT EXISTS tab_tag (
    tab_id INTEGER NOT NULL REFERENCES tab_item(id) ON DELETE CASCADE,
    tag_id INTEGER NOT NULL REFERENCES tag(id) ON DELETE CASCADE,
    PRIMARY KEY (tab_id, tag_id)
  );

  CREATE TABLE IF NOT EXISTS event_log (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id TEXT NOT NULL,
    event_type TEXT NOT NULL,
    entity_type TEXT,
    entity_id INTEGER,
    details TEXT NOT NULL DEFAULT '{}',
    created_at TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_event_log_user_type ON event_log(user_id, event_type);
  CREATE INDEX IF NOT EXISTS idx_event_log_entity ON event_log(entity_type, entity_id);
`;

/** In-memory path understood by SQLite; used by tests. */
export const MEMORY_DATABASE = ":memory:";

/**
 * Opens (creating if needed) the database at `path` and applies the schema.
 * The statements are idempotent, so reopening an existing file is safe.
 */
export function openDatabase(path: string): TabDatabase {
  if (path !== MEMORY_DATABASE) {
    mkdirSync(dirname(path), { recursive: true });
  }
  const db = new Database(path);
  if (path !== MEMORY_DATABASE) {
    db.pragma("journal_mode = WAL");
  }
  db.pragma("foreign_keys = ON");
  db.exec(SCHEMA);
  return db;
}
