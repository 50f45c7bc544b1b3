/**
 * SQLite database connection and initialization
 * Uses sql.js for cross-platform compatibility (pure JS, no native compilation)
 */

import initSqlJs, { Database as SqlJsDatabase, SqlValue } from 'sql.js';
import * as fs from 'fs';
import * as path from 'path';
import { env, MEMORY_DB } from '../lib/env';
import { logger } from '../lib/logger';

export type Row = Record<string, SqlValue>;
export type SqlParam = SqlValue | boolean | undefined;

let db: SqlJsDatabase | null = null;
let dbPath: string = env.DB_PATH;
let transactionDepth = 0;

const SCHEMA = `
-- Dedup bookkeeping, one row per domain
CREATE TABLE IF NOT EXISTS domains_seen (
  domain TEXT PRIMARY KEY,
  category TEXT,
  first_seen INTEGER NOT NULL,
  last_scanned INTEGER NOT NULL,
  times_scanned INTEGER NOT NULL DEFAULT 1
);

CREATE INDEX IF NOT EXISTS idx_domains_seen_category ON domains_seen(category);
CREATE INDEX IF NOT EXISTS idx_domains_seen_last_scanned ON domains_seen(last_scanned);

-- Scan results, one row per processing attempt (append-only)
CREATE TABLE IF NOT EXISTS tech_scans (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  domain TEXT NOT NULL,
  technologies TEXT NOT NULL DEFAULT '[]',
  scored_technologies TEXT NOT NULL DEFAULT '[]',
  top_technology TEXT,
  emails TEXT NOT NULL DEFAULT '[]',
  generated_email TEXT,
  category TEXT,
  error TEXT,
  emailed INTEGER NOT NULL DEFAULT 0,
  emailed_at INTEGER,
  run_id TEXT,
  created_at INTEGER NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_tech_scans_domain ON tech_scans(domain);
CREATE INDEX IF NOT EXISTS idx_tech_scans_created_at ON tech_scans(created_at);
CREATE INDEX IF NOT EXISTS idx_tech_scans_emailed ON tech_scans(emailed);

-- Persona/variant rotation counters
CREATE TABLE IF NOT EXISTS rotation_usage (
  kind TEXT NOT NULL,
  scope TEXT NOT NULL,
  key TEXT NOT NULL,
  count INTEGER NOT NULL DEFAULT 0,
  last_used_seq INTEGER NOT NULL DEFAULT 0,
  PRIMARY KEY (kind, scope, key)
);

CREATE TABLE IF NOT EXISTS rotation_state (
  id INTEGER PRIMARY KEY CHECK (id = 1),
  window_started_at INTEGER NOT NULL,
  sequence INTEGER NOT NULL DEFAULT 0
);

-- Pipeline runs table
CREATE TABLE IF NOT EXISTS runs (
  run_id TEXT PRIMARY KEY,
  stage TEXT NOT NULL,
  started_at INTEGER NOT NULL,
  completed_at INTEGER,
  status TEXT NOT NULL,
  domains_processed INTEGER DEFAULT 0,
  domains_passed INTEGER DEFAULT 0,
  domains_failed INTEGER DEFAULT 0,
  error_message TEXT,
  metadata TEXT
);

CREATE INDEX IF NOT EXISTS idx_runs_stage ON runs(stage);
CREATE INDEX IF NOT EXISTS idx_runs_status ON runs(status);
CREATE INDEX IF NOT EXISTS idx_runs_started ON runs(started_at);
`;

export async function initDatabase(targetPath: string = env.DB_PATH): Promise<SqlJsDatabase> {
  if (db) return db;

  dbPath = targetPath;
  logger.info(`Initializing database at ${dbPath}`);

  const SQL = await initSqlJs();

  if (dbPath === MEMORY_DB) {
    db = new SQL.Database();
    logger.info('Created in-memory database');
  } else {
    const dbDir = path.dirname(dbPath);
    if (!fs.existsSync(dbDir)) {
      fs.mkdirSync(dbDir, { recursive: true });
    }

    if (fs.existsSync(dbPath)) {
      db = new SQL.Database(fs.readFileSync(dbPath));
      logger.info('Loaded existing database');
    } else {
      db = new SQL.Database();
      logger.info('Created new database');
    }
  }

  db.run(SCHEMA);

  // Save immediately to ensure file exists
  saveDatabase();

  logger.info('Database initialized successfully');
  return db;
}

export function getDatabase(): SqlJsDatabase {
  if (!db) {
    throw new Error('Database not initialized. Call initDatabase() first.');
  }
  return db;
}

// Exporting mid-transaction would end it, so saves wait for the commit
export function saveDatabase(): void {
  if (db && dbPath !== MEMORY_DB && transactionDepth === 0) {
    fs.writeFileSync(dbPath, Buffer.from(db.export()));
  }
}

export function closeDatabase(): void {
  if (db) {
    saveDatabase();
    db.close();
    db = null;
    logger.info('Database connection closed');
  }
}

// Column readers: sql.js hands back loosely typed values
export function readString(row: Row, column: string): string | undefined {
  const value = row[column];
  return value === null || value === undefined ? undefined : String(value);
}

export function readNumber(row: Row, column: string): number | undefined {
  const value = row[column];
  return typeof value === 'number' ? value : undefined;
}

export function readJson<T>(row: Row, column: string, fallback: T, guard: (value: unknown) => value is T): T {
  const raw = readString(row, column);
  if (raw === undefined) return fallback;
  const parsed: unknown = JSON.parse(raw);
  return guard(parsed) ? parsed : fallback;
}

// Helper class to provide better-sqlite3 compatible API
export class DatabaseWrapper {
  private db: SqlJsDatabase;

  constructor(database: SqlJsDatabase) {
    this.db = database;
  }

  prepare(sql: string): StatementWrapper {
    return new StatementWrapper(this.db, sql);
  }

  exec(sql: string): void {
    this.db.run(sql);
    saveDatabase();
  }

  transaction<T>(fn: () => T): T {
    this.db.run('BEGIN TRANSACTION');
    transactionDepth++;
    try {
      const result = fn();
      transactionDepth--;
      this.db.run('COMMIT');
      saveDatabase();
      return result;
    } catch (error) {
      transactionDepth--;
      this.db.run('ROLLBACK');
      throw error;
    }
  }
}

export class StatementWrapper {
  private db: SqlJsDatabase;
  private sql: string;

  constructor(db: SqlJsDatabase, sql: string) {
    this.db = db;
    this.sql = sql;
  }

  // sql.js takes neither undefined nor booleans
  private sanitizeParams(params: SqlParam[]): SqlValue[] {
    return params.map((p) => {
      if (p === undefined) return null;
      if (typeof p === 'boolean') return p ? 1 : 0;
      return p;
    });
  }

  private readRows(params: SqlParam[], limit: number): Row[] {
    const rows: Row[] = [];
    const stmt = this.db.prepare(this.sql);
    try {
      stmt.bind(this.sanitizeParams(params));
      while (rows.length < limit && stmt.step()) {
        const columns = stmt.getColumnNames();
        const values = stmt.get();
        const row: Row = {};
        columns.forEach((col, i) => {
          row[col] = values[i];
        });
        rows.push(row);
      }
    } finally {
      stmt.free();
    }
    return rows;
  }

  run(...params: SqlParam[]): { changes: number; lastInsertRowid: number } {
    this.db.run(this.sql, this.sanitizeParams(params));
    const changes = this.db.getRowsModified();

    const result = this.db.exec('SELECT last_insert_rowid() as id');
    const lastId = result[0]?.values[0]?.[0];

    saveDatabase();
    return { changes, lastInsertRowid: typeof lastId === 'number' ? lastId : 0 };
  }

  get(...params: SqlParam[]): Row | undefined {
    return this.readRows(params, 1)[0];
  }

  all(...params: SqlParam[]): Row[] {
    return this.readRows(params, Number.POSITIVE_INFINITY);
  }
}

// Graceful shutdown
process.on('exit', () => closeDatabase());
process.on('SIGINT', () => {
  closeDatabase();
  process.exit(0);
});
process.on('SIGTERM', () => {
  closeDatabase();
  process.exit(0);
});
