import sharp from "sharp";
import { DisposedError } from "../../errors";

export const MAX_SIDE = 1024;
export const JPEG_QUALITY = 85;

export type EncodeJob = {
  input: Buffer;
  width: number;
  height: number;
};

export interface ImageEncoder {
  encode(job: EncodeJob): Promise<Buffer>;
  dispose(): void;
}

/**
 * Target size: the larger side capped at `max`, aspect kept, the other side rounded.
 */
export function fitWithin(width: number, height: number, max = MAX_SIDE) {
  if (width <= max && height <= max) return { width, height, resized: false };
  const scale = max / Math.max(width, height);
  return {
    width: Math.max(1, Math.round(width * scale)),
    height: Math.max(1, Math.round(height * scale)),
    resized: true,
  };
}

/** Resize (linear) and re-encode as JPEG. Same bytes whichever encoder runs it. */
export async function encodeJpeg(job: EncodeJob): Promise<Buffer> {
  const target = fitWithin(job.width, job.height);
  let img = sharp(job.input);
  if (target.resized) {
    img = img.resize({ width: target.width, height: target.height, fit: "fill", kernel: "linear" });
  }
  return img.jpeg({ quality: JPEG_QUALITY }).toBuffer();
}

export class InlineEncoder implements ImageEncoder {
  encode(job: EncodeJob) {
    return encodeJpeg(job);
  }

  dispose() {}
}

/**
 * Large images go through here: one job at a time, in arrival order,
 * so a burst of big photos cannot saturate sharp's thread pool.
 */
export class BackgroundEncoder implements ImageEncoder {
  private tail: Promise<unknown> = Promise.resolve();
  private readonly waiting = new Set<(e: unknown) => void>();
  private disposed = false;

  encode(job: EncodeJob): Promise<Buffer> {
    if (this.disposed) return Promise.reject(new DisposedError("image encoder"));

    return new Promise<Buffer>((resolve, reject) => {
      this.waiting.add(reject);

      const run = () => {
        if (this.disposed) return Promise.reject(new DisposedError("image encoder"));
        return encodeJpeg(job);
      };

      const next = this.tail.then(run, run);
      this.tail = next.catch(() => undefined);
      next.then(resolve, reject).then(() => {
        this.waiting.delete(reject);
      });
    });
  }

  dispose() {
    if (this.disposed) return;
    this.disposed = true;
    for (const reject of this.waiting) reject(new DisposedError("image encoder"));
    this.waiting.clear();
  }
}
