import Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import { getLogger } from '../../utils/logger.js';

let db: Database.Database | undefined;

const MIGRATIONS = [
  // Migration 000: Records
  `
  CREATE TABLE IF NOT EXISTS members (
    id TEXT PRIMARY KEY,
    name TEXT NOT NULL,
    party TEXT,
    jurisdiction TEXT NOT NULL DEFAULT '',
    active_from TEXT NOT NULL,
    active_to TEXT,
    ingested_at TEXT NOT NULL DEFAULT (datetime('now')),
    updated_at TEXT NOT NULL DEFAULT (datetime('now'))
  );

  CREATE TABLE IF NOT EXISTS documents (
    id TEXT PRIMARY KEY,
    kind TEXT NOT NULL DEFAULT 'bill',
    sponsor_id TEXT NOT NULL,
    text TEXT NOT NULL,
    timestamp TEXT NOT NULL,
    topics_json TEXT NOT NULL DEFAULT '[]',
    ingested_at TEXT NOT NULL DEFAULT (datetime('now'))
  );

  CREATE TABLE IF NOT EXISTS document_cosponsors (
    document_id TEXT NOT NULL REFERENCES documents(id) ON DELETE CASCADE,
    member_id TEXT NOT NULL,
    PRIMARY KEY (document_id, member_id)
  );

  CREATE TABLE IF NOT EXISTS votes (
    id TEXT PRIMARY KEY,
    timestamp TEXT NOT NULL,
    bill_id TEXT,
    ingested_at TEXT NOT NULL DEFAULT (datetime('now'))
  );

  CREATE TABLE IF NOT EXISTS vote_positions (
    vote_id TEXT NOT NULL REFERENCES votes(id) ON DELETE CASCADE,
    member_id TEXT NOT NULL,
    position TEXT NOT NULL CHECK (position IN ('yea', 'nay', 'abstain', 'absent')),
    PRIMARY KEY (vote_id, member_id)
  );

  CREATE INDEX IF NOT EXISTS idx_documents_timestamp ON documents(timestamp);
  CREATE INDEX IF NOT EXISTS idx_votes_timestamp ON votes(timestamp);
  CREATE INDEX IF NOT EXISTS idx_vote_positions_member ON vote_positions(member_id);
  `,
  // Migration 001: Versioned alignment scores
  `
  CREATE TABLE IF NOT EXISTS alignment_scores (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    member_id TEXT NOT NULL,
    axis TEXT NOT NULL,
    window_start TEXT NOT NULL,
    window_end TEXT NOT NULL,
    value REAL NOT NULL,
    confidence REAL NOT NULL,
    text_value REAL NOT NULL,
    text_confidence REAL NOT NULL,
    coalition_value REAL NOT NULL,
    coalition_confidence REAL NOT NULL,
    vote_value REAL NOT NULL,
    vote_confidence REAL NOT NULL,
    lexicon_version TEXT NOT NULL,
    computed_at TEXT NOT NULL,
    UNIQUE(member_id, axis, window_start, window_end, computed_at)
  );

  CREATE INDEX IF NOT EXISTS idx_scores_member_axis ON alignment_scores(member_id, axis, window_start, window_end);
  CREATE INDEX IF NOT EXISTS idx_scores_computed ON alignment_scores(computed_at);
  `,
  // Migration 002: Per-topic text breakdown
  `
  ALTER TABLE alignment_scores ADD COLUMN topics_json TEXT NOT NULL DEFAULT '[]';
  `,
];

/** Open a database and bring it up to the latest migration. */
export function openDb(dbPath: string): Database.Database {
  const log = getLogger();
  if (dbPath !== ':memory:') {
    const dir = path.dirname(dbPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  const conn = new Database(dbPath);
  conn.pragma('journal_mode = WAL');
  conn.pragma('foreign_keys = ON');

  conn.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id INTEGER PRIMARY KEY,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);

  const rows = conn.prepare('SELECT id FROM _migrations').all() as Array<{ id: number }>;
  const applied = new Set(rows.map(r => r.id));

  MIGRATIONS.forEach((sql, i) => {
    if (applied.has(i)) return;
    log.info(`Running migration ${i}`);
    conn.transaction(() => {
      conn.exec(sql);
      conn.prepare('INSERT INTO _migrations (id) VALUES (?)').run(i);
    })();
  });

  return conn;
}

export function getDb(dbPath: string): Database.Database {
  if (db) return db;
  db = openDb(dbPath);
  return db;
}

export function closeDb(): void {
  if (db) {
    db.close();
    db = undefined;
  }
}
