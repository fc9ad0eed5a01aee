import Database from 'better-sqlite3';
import type BetterSqlite3 from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { randomUUID } from 'crypto';
import { fileURLToPath } from 'url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export type Db = BetterSqlite3.Database;

export const DEFAULT_DB_PATH = path.join(__dirname, '../data/jobs.db');

function migrate(db: Db): void {
  // Durable job records. `job` holds the serialized job envelope; `attempts`
  // mirrors the counter inside it so operators can query without parsing.
  db.exec(`
    CREATE TABLE IF NOT EXISTS job_queue (
      id TEXT PRIMARY KEY,
      name TEXT NOT NULL,
      job TEXT NOT NULL,
      priority TEXT NOT NULL DEFAULT 'default'
        CHECK(priority IN ('high', 'default', 'low')),
      status TEXT NOT NULL DEFAULT 'pending'
        CHECK(status IN ('pending', 'processing', 'completed', 'failed')),
      attempts INTEGER NOT NULL DEFAULT 0,
      last_error TEXT,
      available_at TEXT NOT NULL,
      locked_until TEXT,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    )
  `);

  db.exec(`
    CREATE INDEX IF NOT EXISTS idx_job_queue_status_available
      ON job_queue(status, available_at)
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS email_verifications (
      id TEXT PRIMARY KEY,
      user_id TEXT NOT NULL,
      email TEXT NOT NULL,
      token_hash TEXT NOT NULL UNIQUE,
      ip_address TEXT,
      expires_at TEXT NOT NULL,
      verified_at TEXT,
      created_at TEXT NOT NULL
    )
  `);

  db.exec(`
    CREATE INDEX IF NOT EXISTS idx_email_verifications_user_id
      ON email_verifications(user_id)
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS audit_log (
      id TEXT PRIMARY KEY,
      action TEXT NOT NULL,
      context TEXT NOT NULL,
      created_at TEXT NOT NULL
    )
  `);
}

/**
 * Opens (creating if needed) the SQLite database and applies the schema.
 * Pass ':memory:' for a throwaway database.
 */
export function openDatabase(dbPath: string = DEFAULT_DB_PATH): Db {
  if (dbPath !== ':memory:') {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  const db: Db = new Database(dbPath);
  db.pragma('foreign_keys = ON');
  if (dbPath !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }

  migrate(db);
  return db;
}

export const generateUUID = (): string => {
  return randomUUID();
};
