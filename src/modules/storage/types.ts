/**
 * Storage collaborators the caches are layered on.
 * The engine defines keys and TTL/capacity policy; these define persistence.
 */

export interface KeyValueStore {
  saveData(key: string, value: unknown): Promise<void>;
  getData(key: string): Promise<unknown>;
  removeData(key: string): Promise<void>;
}

export type StoredBlob = {
  data: Buffer;
  storedAt: number;
  validUntil: number;
};

export interface BlobStore {
  /** Null when absent or past `validUntil`. */
  read(key: string): Promise<StoredBlob | null>;
  write(key: string, data: Buffer, maxAgeMs: number): Promise<void>;
  remove(key: string): Promise<void>;
  /** Byte size of the stored blob, 0 when absent. */
  size(key: string): Promise<number>;
  keys(prefix?: string): Promise<string[]>;
  clear(prefix?: string): Promise<void>;
}

export type Clock = () => number;
