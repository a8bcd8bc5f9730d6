//database schema and initialization for the knowledge base

import Database from 'better-sqlite3';

//SQL SCHEMA DEFINITION
const SCHEMA = `
-- Knowledge items of every partition, one row per fact
CREATE TABLE IF NOT EXISTS knowledge_items (
  id TEXT PRIMARY KEY,
  collection TEXT NOT NULL,
  kind TEXT NOT NULL,
  identity_key TEXT NOT NULL,
  fingerprint TEXT NOT NULL,
  confidence_level TEXT NOT NULL,
  data TEXT NOT NULL,
  version INTEGER NOT NULL DEFAULT 1,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL,
  UNIQUE(kind, identity_key)
);

CREATE INDEX IF NOT EXISTS idx_knowledge_items_fingerprint ON knowledge_items(kind, fingerprint);
CREATE INDEX IF NOT EXISTS idx_knowledge_items_collection ON knowledge_items(collection);

-- Previous versions of updated items
CREATE TABLE IF NOT EXISTS knowledge_history (
  id TEXT PRIMARY KEY,
  item_id TEXT NOT NULL,
  version INTEGER NOT NULL,
  fingerprint TEXT NOT NULL,
  confidence_level TEXT NOT NULL,
  data TEXT NOT NULL,
  replaced_at TEXT NOT NULL,
  rationale TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_knowledge_history_item ON knowledge_history(item_id);

-- Conflicts detected by the deduplication gate, kept for audit
CREATE TABLE IF NOT EXISTS conflict_records (
  id TEXT PRIMARY KEY,
  collection TEXT NOT NULL,
  kind TEXT NOT NULL,
  identity_key TEXT NOT NULL,
  conflict_type TEXT NOT NULL,
  severity TEXT NOT NULL,
  contradictions TEXT NOT NULL,
  existing_id TEXT NOT NULL,
  existing_confidence TEXT NOT NULL,
  candidate TEXT NOT NULL,
  candidate_confidence TEXT NOT NULL,
  action TEXT NOT NULL,
  resolution TEXT NOT NULL,
  human_decision TEXT,
  resolved_by TEXT,
  created_at TEXT NOT NULL,
  resolved_at TEXT
);

CREATE INDEX IF NOT EXISTS idx_conflict_records_resolution ON conflict_records(resolution);

-- Audit Trail Table
CREATE TABLE IF NOT EXISTS audit_trail (
  id TEXT PRIMARY KEY,
  collection TEXT NOT NULL,
  kind TEXT NOT NULL,
  item_id TEXT NOT NULL,
  action TEXT NOT NULL,
  rationale TEXT NOT NULL,
  timestamp TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_audit_trail_item_id ON audit_trail(item_id);

-- Human review queue
CREATE TABLE IF NOT EXISTS review_items (
  id TEXT PRIMARY KEY,
  queue TEXT NOT NULL,
  reason TEXT NOT NULL,
  status TEXT NOT NULL DEFAULT 'pending',
  attachment_id TEXT NOT NULL,
  email_id TEXT NOT NULL,
  sender TEXT NOT NULL,
  subject TEXT NOT NULL,
  excerpt TEXT NOT NULL,
  filename TEXT NOT NULL,
  document_ref TEXT,
  predicted_asset_id TEXT,
  predicted_category TEXT NOT NULL,
  confidence REAL NOT NULL,
  created_at TEXT NOT NULL,
  resolved_at TEXT,
  resolution TEXT,
  corrected_asset_id TEXT,
  corrected_category TEXT,
  reviewer TEXT
);

CREATE INDEX IF NOT EXISTS idx_review_items_status ON review_items(status, queue, reason);

-- Per-collection bootstrap markers
CREATE TABLE IF NOT EXISTS bootstrap_markers (
  collection TEXT PRIMARY KEY,
  status TEXT NOT NULL,
  item_count INTEGER NOT NULL DEFAULT 0,
  claimed_at TEXT NOT NULL,
  completed_at TEXT
);

-- Processed attachments (for duplicate detection)
CREATE TABLE IF NOT EXISTS processed_attachments (
  content_hash TEXT PRIMARY KEY,
  attachment_id TEXT NOT NULL,
  filename TEXT NOT NULL,
  asset_id TEXT,
  category TEXT NOT NULL,
  status TEXT NOT NULL,
  document_ref TEXT,
  processed_at TEXT NOT NULL
);
`;

//initializing the database
//WAL- better concurrency and performance for read-heavy workloads
export function initializeDatabase(dbPath: string = ':memory:'): Database.Database {
  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');
  db.pragma('busy_timeout = 5000');

  //db schema execution
  db.exec(SCHEMA);

  return db;
}

//closing the database connection
export function closeDatabase(db: Database.Database): void {
  db.close();
}
