import { toAppError } from "../../errors";
import { sha256Hex } from "../../utils/hash";
import type { ConnectivityMonitor } from "../connectivity/monitor";
import type { BlobStore } from "../storage/types";
import type { Recipe } from "./types";

export const RECIPE_IMAGE_TTL_MS = 7 * 24 * 60 * 60 * 1000;
const BLOB_PREFIX = "recipe_image:";
const MAX_IMAGE_BYTES = 5 * 1024 * 1024;

export type ImagePreloaderOptions = {
  blobs: BlobStore;
  connectivity: ConnectivityMonitor;
  fetchImpl?: typeof fetch;
  timeoutMs?: number;
};

export function recipeImageKey(url: string) {
  return BLOB_PREFIX + sha256Hex(url);
}

/**
 * Best-effort download of recipe images into the blob store.
 * Nothing here throws; failures are logged and counted as not loaded.
 */
export class ImagePreloader {
  private readonly fetchImpl: typeof fetch;
  private readonly inFlight = new Map<string, Promise<boolean>>();

  constructor(private readonly opts: ImagePreloaderOptions) {
    this.fetchImpl = opts.fetchImpl ?? fetch;
  }

  /** Returns how many of the recipes' images are now cached. */
  async preloadRecipes(recipes: readonly Pick<Recipe, "imageUrl">[]): Promise<number> {
    const urls = [...new Set(recipes.map((r) => r.imageUrl).filter((u): u is string => !!u))];
    if (!urls.length) return 0;

    const results = await Promise.all(urls.map((u) => this.preload(u)));
    return results.filter(Boolean).length;
  }

  preload(url: string): Promise<boolean> {
    const pending = this.inFlight.get(url);
    if (pending) return pending;

    const p = this.download(url).finally(() => this.inFlight.delete(url));
    this.inFlight.set(url, p);
    return p;
  }

  async getCached(url: string): Promise<Buffer | null> {
    const blob = await this.opts.blobs.read(recipeImageKey(url));
    return blob ? blob.data : null;
  }

  async clear(): Promise<void> {
    await this.opts.blobs.clear(BLOB_PREFIX);
  }

  async sizeBytes(): Promise<number> {
    let total = 0;
    for (const k of await this.opts.blobs.keys(BLOB_PREFIX)) total += await this.opts.blobs.size(k);
    return total;
  }

  private async download(url: string): Promise<boolean> {
    const key = recipeImageKey(url);
    const controller = new AbortController();
    const t = setTimeout(() => controller.abort(), this.opts.timeoutMs ?? 15_000);

    try {
      if (await this.opts.blobs.read(key)) return true;
      if (this.opts.connectivity.status() === "offline") return false;

      const resp = await this.fetchImpl(url, { signal: controller.signal });
      if (!resp.ok) {
        console.warn(`[preload] image ${resp.status}: ${url}`);
        return false;
      }

      const data = Buffer.from(await resp.arrayBuffer());
      if (!data.byteLength || data.byteLength > MAX_IMAGE_BYTES) {
        console.warn(`[preload] image skipped (${data.byteLength} bytes): ${url}`);
        return false;
      }

      await this.opts.blobs.write(key, data, RECIPE_IMAGE_TTL_MS);
      return true;
    } catch (e) {
      console.warn(`[preload] image failed: ${url}`, toAppError(e).code);
      return false;
    } finally {
      clearTimeout(t);
    }
  }
}
