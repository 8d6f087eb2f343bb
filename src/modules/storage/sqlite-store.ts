import type { Db } from "../../db/connection";
import type { BlobStore, Clock, KeyValueStore, StoredBlob } from "./types";

type BlobRow = {
  data: Buffer;
  storedAt: number;
  validUntil: number;
};

function likePrefix(prefix: string) {
  return `${prefix.replace(/[\\%_]/g, (c) => `\\${c}`)}%`;
}

/**
 * kv_store + cache_blobs on better-sqlite3 (see migrations/0001_init.sql).
 * Each write is a single statement, so readers see either the old row or the new one.
 */
export class SqliteStorage implements KeyValueStore, BlobStore {
  constructor(
    private readonly db: Db,
    private readonly now: Clock = Date.now
  ) {}

  async saveData(key: string, value: unknown): Promise<void> {
    this.db
      .prepare(
        `INSERT INTO kv_store (key, valueJson, updatedAt) VALUES (?, ?, ?)
         ON CONFLICT(key) DO UPDATE SET valueJson = excluded.valueJson, updatedAt = excluded.updatedAt`
      )
      .run(key, JSON.stringify(value), this.now());
  }

  async getData(key: string): Promise<unknown> {
    const row = this.db.prepare("SELECT valueJson FROM kv_store WHERE key = ?").get(key) as
      | { valueJson: string }
      | undefined;
    return row ? JSON.parse(row.valueJson) : null;
  }

  async removeData(key: string): Promise<void> {
    this.db.prepare("DELETE FROM kv_store WHERE key = ?").run(key);
  }

  async read(key: string): Promise<StoredBlob | null> {
    const row = this.db
      .prepare("SELECT data, storedAt, validUntil FROM cache_blobs WHERE key = ? AND validUntil >= ?")
      .get(key, this.now()) as BlobRow | undefined;
    if (!row) return null;
    return { data: row.data, storedAt: row.storedAt, validUntil: row.validUntil };
  }

  async write(key: string, data: Buffer, maxAgeMs: number): Promise<void> {
    const storedAt = this.now();
    this.db
      .prepare(
        `INSERT OR REPLACE INTO cache_blobs (key, data, byteSize, storedAt, validUntil)
         VALUES (?, ?, ?, ?, ?)`
      )
      .run(key, data, data.byteLength, storedAt, storedAt + maxAgeMs);
  }

  async remove(key: string): Promise<void> {
    this.db.prepare("DELETE FROM cache_blobs WHERE key = ?").run(key);
  }

  async size(key: string): Promise<number> {
    const row = this.db.prepare("SELECT byteSize FROM cache_blobs WHERE key = ?").get(key) as
      | { byteSize: number }
      | undefined;
    return row?.byteSize ?? 0;
  }

  async keys(prefix = ""): Promise<string[]> {
    const rows = this.db
      .prepare("SELECT key FROM cache_blobs WHERE key LIKE ? ESCAPE '\\' ORDER BY storedAt DESC")
      .all(likePrefix(prefix)) as Array<{ key: string }>;
    return rows.map((r) => r.key);
  }

  async clear(prefix = ""): Promise<void> {
    this.db.prepare("DELETE FROM cache_blobs WHERE key LIKE ? ESCAPE '\\'").run(likePrefix(prefix));
  }

  /** Drop blobs past their validity; returns rows removed. */
  purgeExpired(): number {
    return this.db.prepare("DELETE FROM cache_blobs WHERE validUntil < ?").run(this.now()).changes;
  }
}
