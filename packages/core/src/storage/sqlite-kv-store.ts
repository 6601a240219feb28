/**
 * @fileoverview SQLite key-value engine
 *
 * Uses better-sqlite3. One row per key; `set` is an upsert.
 */

import Database from 'better-sqlite3';
import { createLogger } from '../logging/index.js';
import type { KeyValueStore } from './types.js';

const logger = createLogger('storage:sqlite');

export interface SqliteKeyValueStoreConfig {
  /** Database file, or ':memory:' */
  dbPath: string;
  enableWAL?: boolean;
}

interface EntryRow {
  value: string;
}

export class SqliteKeyValueStore implements KeyValueStore {
  private db: Database.Database;
  private readonly selectStmt: Database.Statement<[string], EntryRow>;
  private readonly upsertStmt: Database.Statement<[string, string, string]>;

  constructor(config: SqliteKeyValueStoreConfig) {
    this.db = new Database(config.dbPath);

    // WAL does not apply to in-memory databases
    if (config.enableWAL !== false && config.dbPath !== ':memory:') {
      this.db.pragma('journal_mode = WAL');
    }

    this.initSchema();
    this.selectStmt = this.db.prepare<[string], EntryRow>('SELECT value FROM kv_entries WHERE key = ?');
    this.upsertStmt = this.db.prepare<[string, string, string]>(`
      INSERT INTO kv_entries (key, value, updated_at)
      VALUES (?, ?, ?)
      ON CONFLICT(key) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at
    `);
    logger.debug('SQLite key-value store initialized', { dbPath: config.dbPath });
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS kv_entries (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );
    `);
  }

  async get(key: string): Promise<string | null> {
    const row = this.selectStmt.get(key);
    return row?.value ?? null;
  }

  async set(key: string, value: string): Promise<void> {
    this.upsertStmt.run(key, value, new Date().toISOString());
  }

  async close(): Promise<void> {
    if (this.db.open) {
      this.db.close();
      logger.debug('SQLite key-value store closed');
    }
  }
}
