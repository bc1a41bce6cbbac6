import Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import { POS_SYNC_MIGRATIONS, type LocalMigration } from './migrations';

export interface OpenDatabaseOptions {
  busyTimeoutMs?: number;
}

export const MEMORY_DATABASE = ':memory:';

function ensureMigrationsTable(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS local_migrations (
      version INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at TEXT NOT NULL
    );
  `);
}

function listAppliedVersions(db: Database.Database): Set<number> {
  const rows = db
    .prepare('SELECT version FROM local_migrations ORDER BY version ASC')
    .all() as Array<{ version: number }>;
  return new Set(rows.map((row) => Number(row.version)));
}

function applyMigration(db: Database.Database, migration: LocalMigration): boolean {
  const now = new Date().toISOString();
  const tx = db.transaction(() => {
    const done = db.prepare('SELECT 1 AS present FROM local_migrations WHERE version = ?').get(migration.version);
    if (done) return false;
    db.exec(migration.sql);
    db.prepare(`
      INSERT INTO local_migrations(version, name, applied_at)
      VALUES (@version, @name, @applied_at)
    `).run({
      version: migration.version,
      name: migration.name,
      applied_at: now,
    });
    return true;
  });
  // Two processes booting at once must not both run the same migration.
  return tx.immediate();
}

/**
 * Opens a connection with the pragmas every repository relies on.
 * `busyTimeoutMs` bounds how long a write waits for another connection's lock
 * before SQLite reports SQLITE_BUSY.
 */
export function openDatabase(dbPath: string, options: OpenDatabaseOptions = {}): Database.Database {
  if (dbPath !== MEMORY_DATABASE) {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }
  const db = new Database(dbPath, {
    timeout: options.busyTimeoutMs ?? 2000,
  });
  if (dbPath !== MEMORY_DATABASE) {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('foreign_keys = ON');
  return db;
}

export function applyPosSyncMigrations(db: Database.Database): number[] {
  ensureMigrationsTable(db);

  const applied = listAppliedVersions(db);
  const pending = POS_SYNC_MIGRATIONS
    .slice()
    .sort((a, b) => a.version - b.version)
    .filter((migration) => !applied.has(migration.version));

  return pending.filter((migration) => applyMigration(db, migration)).map((migration) => migration.version);
}

export function openMigratedDatabase(dbPath: string, options: OpenDatabaseOptions = {}): Database.Database {
  const db = openDatabase(dbPath, options);
  try {
    applyPosSyncMigrations(db);
  } catch (error) {
    db.close();
    throw error;
  }
  return db;
}
