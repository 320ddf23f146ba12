/**
 * SQLite-backed storage. Pass `:memory:` for a throwaway database.
 */

import Database from 'better-sqlite3';

import type { Storage, StorageEntry } from './interface.js';

const CREATE_TABLE_SQL = `
  CREATE TABLE IF NOT EXISTS kv (
    key TEXT PRIMARY KEY,
    value TEXT NOT NULL,
    metadata TEXT,
    updated_at INTEGER NOT NULL
  )
`;

interface Row {
  key: string;
  value: string;
  metadata: string | null;
  updated_at: number;
}

function parseMetadata(raw: string | null): Record<string, string> | undefined {
  if (!raw) return undefined;
  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed !== 'object' || parsed === null) return undefined;
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value === 'string') out[key] = value;
  }
  return out;
}

/** LIKE pattern matching keys that start with `prefix`. */
function likePrefix(prefix: string): string {
  return `${prefix.replace(/[\\%_]/g, (ch) => `\\${ch}`)}%`;
}

export class SqliteStorage implements Storage {
  private db: Database.Database;

  constructor(dbPath: string) {
    this.db = new Database(dbPath);
    if (dbPath !== ':memory:') {
      this.db.pragma('journal_mode = WAL');
    }
    this.db.exec(CREATE_TABLE_SQL);
  }

  async get(key: string): Promise<string | null> {
    const row = this.db.prepare<[string], Pick<Row, 'value'>>('SELECT value FROM kv WHERE key = ?').get(key);
    return row?.value ?? null;
  }

  async set(key: string, value: string, metadata?: Record<string, string>): Promise<void> {
    const metaStr = metadata ? JSON.stringify(metadata) : null;
    this.db
      .prepare('INSERT OR REPLACE INTO kv (key, value, metadata, updated_at) VALUES (?, ?, ?, ?)')
      .run(key, value, metaStr, Date.now());
  }

  async delete(key: string): Promise<void> {
    this.db.prepare('DELETE FROM kv WHERE key = ?').run(key);
  }

  async list(prefix: string): Promise<StorageEntry[]> {
    const rows = this.db
      .prepare<[string], Row>("SELECT key, value, metadata, updated_at FROM kv WHERE key LIKE ? ESCAPE '\\' ORDER BY key")
      .all(likePrefix(prefix));

    return rows.map((row) => ({
      key: row.key,
      value: row.value,
      metadata: parseMetadata(row.metadata),
      updatedAt: new Date(row.updated_at),
    }));
  }

  async close(): Promise<void> {
    this.db.close();
  }
}
