/**
 * Storage factory.
 */

import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

import type { Storage } from './interface.js';
import { SqliteStorage } from './sqlite-store.js';

export type { Storage, StorageEntry } from './interface.js';
export { SqliteStorage } from './sqlite-store.js';

export interface CreateStorageOpts {
  /** Database file, or `:memory:`. */
  dbPath: string;
}

/** Open the SQLite store, creating its parent directory when needed. */
export function createStorage(opts: CreateStorageOpts): Storage {
  if (opts.dbPath !== ':memory:') {
    mkdirSync(dirname(opts.dbPath), { recursive: true });
  }
  return new SqliteStorage(opts.dbPath);
}
