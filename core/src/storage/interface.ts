/**
 * Key-value storage for accounts and credentials.
 * Values are opaque strings; callers own their serialization.
 */

export interface StorageEntry {
  key: string;
  value: string;
  metadata?: Record<string, string>;
  updatedAt: Date;
}

export interface Storage {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, metadata?: Record<string, string>): Promise<void>;
  delete(key: string): Promise<void>;
  /** Entries whose key starts with `prefix`, ordered by key. */
  list(prefix: string): Promise<StorageEntry[]>;
  close(): Promise<void>;
}
