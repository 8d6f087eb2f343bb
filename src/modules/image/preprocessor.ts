import fs from "node:fs";
import sharp from "sharp";
import { DisposedError, InvalidImageError, ProcessingError } from "../../errors";
import { elapsedSince } from "../../utils/format";
import { imageCacheKey } from "../cache/keys";
import type { BlobStore } from "../storage/types";
import { BackgroundEncoder, InlineEncoder, type ImageEncoder } from "./encoder";

export const MAX_IMAGE_BYTES = 4 * 1024 * 1024;
export const MIN_IMAGE_SIDE = 100;
export const BACKGROUND_THRESHOLD_BYTES = 1024 * 1024;
export const PROCESSED_IMAGE_TTL_MS = 7 * 24 * 60 * 60 * 1000;

const BLOB_PREFIX = "image:";

export type ImageInfo = {
  width: number;
  height: number;
  sizeBytes: number;
};

export type ProcessedImage = {
  base64Image: string;
  originalSize: number;
  processedSize: number;
  processingTimeMs: number;
  fromCache: boolean;
  cacheKey: string;
};

export type ImagePreprocessorOptions = {
  blobs: BlobStore;
  inline?: ImageEncoder;
  background?: ImageEncoder;
  backgroundThresholdBytes?: number;
};

type FileStat = { sizeBytes: number; mtimeMs: number };

type Pending = {
  promise: Promise<ProcessedImage>;
  reject: (e: unknown) => void;
};

async function statImage(imagePath: string): Promise<FileStat> {
  let st: fs.Stats;
  try {
    st = await fs.promises.stat(imagePath);
  } catch (e) {
    throw new InvalidImageError("missing", e instanceof Error ? e.message : undefined);
  }
  if (!st.isFile()) throw new InvalidImageError("missing", "not a regular file");
  if (st.size === 0) throw new InvalidImageError("empty");
  if (st.size > MAX_IMAGE_BYTES) throw new InvalidImageError("too-large", `${st.size} bytes`);
  return { sizeBytes: st.size, mtimeMs: st.mtimeMs };
}

async function decodeDimensions(input: Buffer) {
  let meta: sharp.Metadata;
  try {
    meta = await sharp(input).metadata();
  } catch (e) {
    throw new InvalidImageError("undecodable", e instanceof Error ? e.message : undefined);
  }
  const { width, height } = meta;
  if (!width || !height) throw new InvalidImageError("undecodable", "missing dimensions");
  if (width < MIN_IMAGE_SIDE || height < MIN_IMAGE_SIDE) {
    throw new InvalidImageError("too-small", `${width}x${height}`);
  }
  return { width, height };
}

export class ImagePreprocessor {
  private readonly inline: ImageEncoder;
  private readonly background: ImageEncoder;
  private readonly threshold: number;
  private readonly inFlight = new Map<string, Pending>();
  private disposed = false;

  constructor(private readonly opts: ImagePreprocessorOptions) {
    this.inline = opts.inline ?? new InlineEncoder();
    this.background = opts.background ?? new BackgroundEncoder();
    this.threshold = opts.backgroundThresholdBytes ?? BACKGROUND_THRESHOLD_BYTES;
  }

  async validate(imagePath: string): Promise<ImageInfo> {
    this.assertOpen();
    const st = await statImage(imagePath);
    const dims = await decodeDimensions(await fs.promises.readFile(imagePath));
    return { ...dims, sizeBytes: st.sizeBytes };
  }

  /** Validate, resize and JPEG-encode `imagePath`; cached per file fingerprint for 7 days. */
  process(imagePath: string): Promise<ProcessedImage> {
    if (this.disposed) return Promise.reject(new DisposedError("image preprocessor"));

    const startedAt = performance.now();

    return statImage(imagePath).then((st) => {
      this.assertOpen();
      const cacheKey = imageCacheKey(imagePath, st.mtimeMs, st.sizeBytes);

      const pending = this.inFlight.get(cacheKey);
      if (pending) return pending.promise;

      let reject: (e: unknown) => void = () => undefined;
      const promise = new Promise<ProcessedImage>((res, rej) => {
        reject = rej;
        this.run(imagePath, st, cacheKey, startedAt).then(res, rej);
      });

      const slot: Pending = { promise, reject };
      this.inFlight.set(cacheKey, slot);
      const release = () => {
        if (this.inFlight.get(cacheKey) === slot) this.inFlight.delete(cacheKey);
      };
      promise.then(release, release);

      return promise;
    });
  }

  private async run(imagePath: string, st: FileStat, cacheKey: string, startedAt: number): Promise<ProcessedImage> {
    const cached = await this.readCached(cacheKey);
    if (cached) {
      return {
        base64Image: cached.toString("base64"),
        originalSize: st.sizeBytes,
        processedSize: cached.byteLength,
        processingTimeMs: elapsedSince(startedAt),
        fromCache: true,
        cacheKey,
      };
    }

    const input = await fs.promises.readFile(imagePath);
    const { width, height } = await decodeDimensions(input);

    const encoder = st.sizeBytes > this.threshold ? this.background : this.inline;
    let output: Buffer;
    try {
      output = await encoder.encode({ input, width, height });
    } catch (e) {
      if (e instanceof DisposedError) throw e;
      // header decoded but the pixel data did not
      throw ProcessingError.invalidImage(e instanceof Error ? e.message : String(e));
    }
    if (this.disposed) throw new DisposedError("image preprocessor");

    try {
      await this.opts.blobs.write(BLOB_PREFIX + cacheKey, output, PROCESSED_IMAGE_TTL_MS);
    } catch (e) {
      console.warn("[image] failed to cache processed image:", e);
    }

    if (process.env.DEBUG_CACHE === "1") {
      console.log(`[image] processed ${st.sizeBytes} -> ${output.byteLength} bytes (${width}x${height})`);
    }

    return {
      base64Image: output.toString("base64"),
      originalSize: st.sizeBytes,
      processedSize: output.byteLength,
      processingTimeMs: elapsedSince(startedAt),
      fromCache: false,
      cacheKey,
    };
  }

  private async readCached(cacheKey: string): Promise<Buffer | null> {
    try {
      const blob = await this.opts.blobs.read(BLOB_PREFIX + cacheKey);
      return blob ? blob.data : null;
    } catch (e) {
      console.warn("[image] cache read failed:", e);
      return null;
    }
  }

  async clearCache(): Promise<void> {
    await this.opts.blobs.clear(BLOB_PREFIX);
  }

  async getCacheSize(): Promise<number> {
    let total = 0;
    for (const k of await this.opts.blobs.keys(BLOB_PREFIX)) total += await this.opts.blobs.size(k);
    return total;
  }

  dispose() {
    if (this.disposed) return;
    this.disposed = true;
    for (const slot of this.inFlight.values()) slot.reject(new DisposedError("image preprocessor"));
    this.inFlight.clear();
    this.background.dispose();
    this.inline.dispose();
  }

  private assertOpen() {
    if (this.disposed) throw new DisposedError("image preprocessor");
  }
}
