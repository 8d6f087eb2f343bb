import type { BlobStore, Clock, KeyValueStore, StoredBlob } from "./types";

/** In-process storage; used for wiring without a database and in tests. */
export class MemoryStorage implements KeyValueStore, BlobStore {
  private readonly docs = new Map<string, string>();
  private readonly blobs = new Map<string, StoredBlob>();

  constructor(private readonly now: Clock = Date.now) {}

  async saveData(key: string, value: unknown): Promise<void> {
    this.docs.set(key, JSON.stringify(value));
  }

  async getData(key: string): Promise<unknown> {
    const raw = this.docs.get(key);
    return raw === undefined ? null : JSON.parse(raw);
  }

  async removeData(key: string): Promise<void> {
    this.docs.delete(key);
  }

  async read(key: string): Promise<StoredBlob | null> {
    const hit = this.blobs.get(key);
    if (!hit) return null;
    if (hit.validUntil < this.now()) return null;
    return { ...hit, data: Buffer.from(hit.data) };
  }

  async write(key: string, data: Buffer, maxAgeMs: number): Promise<void> {
    const storedAt = this.now();
    this.blobs.set(key, { data: Buffer.from(data), storedAt, validUntil: storedAt + maxAgeMs });
  }

  async remove(key: string): Promise<void> {
    this.blobs.delete(key);
  }

  async size(key: string): Promise<number> {
    return this.blobs.get(key)?.data.byteLength ?? 0;
  }

  async keys(prefix = ""): Promise<string[]> {
    return [...this.blobs.keys()].filter((k) => k.startsWith(prefix));
  }

  async clear(prefix = ""): Promise<void> {
    for (const k of [...this.blobs.keys()]) {
      if (k.startsWith(prefix)) this.blobs.delete(k);
    }
  }
}
