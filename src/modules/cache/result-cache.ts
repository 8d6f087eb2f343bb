import { z } from "zod";
import { CacheError, DisposedError } from "../../errors";
import { deepFreeze, frozenCopy } from "../../utils/freeze";
import type { BlobStore, Clock, KeyValueStore } from "../storage/types";

export type CacheEntry<T> = Readonly<{
  value: T;
  cachedAt: number;
  key: string;
}>;

export type Loaded<T> = {
  value: T;
  fromCache: boolean;
};

export type ResultCacheOptions<T> = {
  /** Namespace for blob keys, the metadata index and log lines. */
  name: string;
  ttlMs: number;
  keyValue: KeyValueStore;
  blobs: BlobStore;
  /** Decodes values read back from disk. */
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  maxMemoryEntries?: number;
  maxDiskEntries?: number;
  /** Loader results failing this are handed back but not cached. */
  shouldStore?: (value: T) => boolean;
  now?: Clock;
};

export type ResultCacheStats = {
  name: string;
  memoryEntries: number;
  indexedEntries: number;
  inFlight: number;
};

type InFlight<T> = {
  promise: Promise<Loaded<T>>;
  reject: (e: unknown) => void;
};

const IndexSchema = z.object({
  keys: z.array(z.string()),
  lastUpdated: z.string(),
});

const DEFAULT_MEMORY_ENTRIES = 50;
const DEFAULT_DISK_ENTRIES = 200;

const DEBUG = () => process.env.DEBUG_CACHE === "1";

/**
 * Two-tier TTL cache (memory map over a blob store) with per-key
 * de-duplication of in-flight loads.
 */
export class ResultCache<T> {
  private readonly memory = new Map<string, CacheEntry<T>>();
  private readonly inFlight = new Map<string, InFlight<T>>();
  private readonly entrySchema: z.ZodType<CacheEntry<T>, z.ZodTypeDef, unknown>;
  private readonly now: Clock;
  private readonly maxMemory: number;
  private readonly maxDisk: number;
  private indexQueue: Promise<void> = Promise.resolve();
  private disposed = false;

  constructor(private readonly opts: ResultCacheOptions<T>) {
    this.now = opts.now ?? Date.now;
    this.maxMemory = opts.maxMemoryEntries ?? DEFAULT_MEMORY_ENTRIES;
    this.maxDisk = opts.maxDiskEntries ?? DEFAULT_DISK_ENTRIES;
    this.entrySchema = z.object({
      key: z.string(),
      cachedAt: z.number(),
      value: opts.schema,
    });
  }

  get name() {
    return this.opts.name;
  }

  private get indexKey() {
    return `${this.opts.name}_metadata_cache`;
  }

  private blobKey(key: string) {
    return `${this.opts.name}:${key}`;
  }

  isValid(entry: Pick<CacheEntry<T>, "cachedAt">): boolean {
    return this.now() - entry.cachedAt <= this.opts.ttlMs;
  }

  async get(key: string): Promise<CacheEntry<T> | null> {
    this.assertOpen();

    const mem = this.memory.get(key);
    if (mem) {
      if (this.isValid(mem)) {
        if (DEBUG()) console.log(`[cache] ${this.name} hit (memory): ${key}`);
        return mem;
      }
      this.memory.delete(key);
    }

    const disk = await this.readDisk(key);
    if (disk && this.isValid(disk)) {
      if (DEBUG()) console.log(`[cache] ${this.name} hit (disk): ${key}`);
      this.remember(disk);
      return disk;
    }

    if (DEBUG()) console.log(`[cache] ${this.name} miss: ${key}`);
    return null;
  }

  async put(key: string, value: T): Promise<CacheEntry<T>> {
    this.assertOpen();

    // the loader keeps its own objects; the cache keeps a frozen copy
    const entry: CacheEntry<T> = Object.freeze({ value: frozenCopy(value), cachedAt: this.now(), key });
    this.remember(entry);

    try {
      const bytes = Buffer.from(JSON.stringify(entry), "utf8");
      await this.opts.blobs.write(this.blobKey(key), bytes, this.opts.ttlMs);
      await this.touchIndex(key);
    } catch (e) {
      console.warn(`[cache] ${this.name} write failed for ${key}:`, new CacheError("write", e).details);
    }

    return entry;
  }

  /**
   * Cached value for `key`, or the loader's result. At most one loader runs
   * per key at a time; concurrent callers share its outcome.
   */
  getOrLoad(key: string, loader: () => Promise<T>): Promise<Loaded<T>> {
    try {
      this.assertOpen();
    } catch (e) {
      return Promise.reject(e);
    }

    const pending = this.inFlight.get(key);
    if (pending) {
      if (DEBUG()) console.log(`[cache] ${this.name} joining in-flight load: ${key}`);
      return pending.promise;
    }

    let reject: (e: unknown) => void = () => undefined;
    const promise = new Promise<Loaded<T>>((res, rej) => {
      reject = rej;
      this.resolve(key, loader).then(res, rej);
    });

    const slot: InFlight<T> = { promise, reject };
    this.inFlight.set(key, slot);

    const release = () => {
      if (this.inFlight.get(key) === slot) this.inFlight.delete(key);
    };
    promise.then(release, release);

    return promise;
  }

  private async resolve(key: string, loader: () => Promise<T>): Promise<Loaded<T>> {
    const hit = await this.get(key);
    if (hit) return { value: hit.value, fromCache: true };

    const value = await loader();
    if (this.disposed) throw new DisposedError(`${this.name} cache`);

    const storable = this.opts.shouldStore ? this.opts.shouldStore(value) : true;
    if (!storable) return { value, fromCache: false };

    const entry = await this.put(key, value);
    return { value: entry.value, fromCache: false };
  }

  async clear(): Promise<void> {
    this.memory.clear();
    this.inFlight.clear();

    try {
      await this.opts.blobs.clear(`${this.opts.name}:`);
      await this.opts.keyValue.removeData(this.indexKey);
      console.log(`[cache] ${this.name} cleared`);
    } catch (e) {
      console.warn(`[cache] ${this.name} clear failed:`, new CacheError("clear", e).details);
    }
  }

  async sizeBytes(): Promise<number> {
    try {
      const keys = await this.readIndex();
      let total = 0;
      for (const k of keys) total += await this.opts.blobs.size(this.blobKey(k));
      return total;
    } catch (e) {
      console.warn(`[cache] ${this.name} size failed:`, new CacheError("size", e).details);
      return 0;
    }
  }

  async stats(): Promise<ResultCacheStats> {
    const keys = await this.readIndex().catch(() => []);
    return {
      name: this.name,
      memoryEntries: this.memory.size,
      indexedEntries: keys.length,
      inFlight: this.inFlight.size,
    };
  }

  /** Pull the most recent unexpired entries from disk into memory. */
  async warm(): Promise<number> {
    this.assertOpen();
    let loaded = 0;
    try {
      const keys = await this.readIndex();
      for (const key of keys.slice(0, this.maxMemory)) {
        const entry = await this.readDisk(key);
        if (entry && this.isValid(entry)) {
          this.remember(entry);
          loaded++;
        }
      }
    } catch (e) {
      console.warn(`[cache] ${this.name} warm failed:`, new CacheError("warm", e).details);
    }
    if (DEBUG()) console.log(`[cache] ${this.name} warmed ${loaded} entries`);
    return loaded;
  }

  inFlightCount() {
    return this.inFlight.size;
  }

  dispose() {
    if (this.disposed) return;
    this.disposed = true;

    for (const slot of this.inFlight.values()) {
      slot.reject(new DisposedError(`${this.name} cache`));
    }
    this.inFlight.clear();
    this.memory.clear();
  }

  private assertOpen() {
    if (this.disposed) throw new DisposedError(`${this.name} cache`);
  }

  private remember(entry: CacheEntry<T>) {
    this.memory.set(entry.key, entry);
    if (this.memory.size <= this.maxMemory) return;

    const oldestFirst = [...this.memory.values()].sort((a, b) => a.cachedAt - b.cachedAt);
    const toRemove = this.memory.size - this.maxMemory;
    for (let i = 0; i < toRemove; i++) {
      this.memory.delete(oldestFirst[i].key);
    }
  }

  private async readDisk(key: string): Promise<CacheEntry<T> | null> {
    try {
      const blob = await this.opts.blobs.read(this.blobKey(key));
      if (!blob) return null;

      const parsed = this.entrySchema.safeParse(JSON.parse(blob.data.toString("utf8")));
      if (!parsed.success || parsed.data.key !== key) {
        console.warn(`[cache] ${this.name} dropping unreadable entry: ${key}`);
        await this.opts.blobs.remove(this.blobKey(key));
        return null;
      }
      return deepFreeze(parsed.data);
    } catch (e) {
      console.warn(`[cache] ${this.name} read failed for ${key}:`, new CacheError("read", e).details);
      return null;
    }
  }

  private async readIndex(): Promise<string[]> {
    const raw = await this.opts.keyValue.getData(this.indexKey);
    const parsed = IndexSchema.safeParse(raw);
    return parsed.success ? parsed.data.keys : [];
  }

  /** Move `key` to the front of the index; prune blobs that fall off the end. */
  private touchIndex(key: string): Promise<void> {
    const run = async () => {
      const keys = (await this.readIndex()).filter((k) => k !== key);
      keys.unshift(key);

      const evicted = keys.splice(this.maxDisk);
      await this.opts.keyValue.saveData(this.indexKey, {
        keys,
        lastUpdated: new Date(this.now()).toISOString(),
      });

      for (const k of evicted) {
        await this.opts.blobs.remove(this.blobKey(k));
        this.memory.delete(k);
      }
      if (evicted.length && DEBUG()) console.log(`[cache] ${this.name} evicted ${evicted.length} entries`);
    };

    // index writes are read-modify-write; run them one at a time
    const next = this.indexQueue.then(run, run);
    this.indexQueue = next.catch(() => undefined);
    return next;
  }
}
