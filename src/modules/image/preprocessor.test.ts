import fs from "node:fs";
import path from "node:path";
import sharp from "sharp";
import { afterAll, describe, expect, it, vi } from "vitest";
import { ImagePreprocessor, MAX_IMAGE_BYTES } from "./preprocessor";
import { InlineEncoder, fitWithin, type EncodeJob } from "./encoder";
import { MemoryStorage } from "../storage/memory-store";
import { DisposedError, InvalidImageError } from "../../errors";
import { tempDir, writeJpeg } from "../../testing/images";

const dir = tempDir();

afterAll(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

function reasonOf(e: unknown) {
  return e instanceof InvalidImageError ? e.reason : null;
}

async function rejectionOf(p: Promise<unknown>): Promise<unknown> {
  try {
    await p;
  } catch (e) {
    return e;
  }
  return null;
}

describe("fitWithin", () => {
  it("scales the larger side to 1024 and rounds the other", () => {
    expect(fitWithin(2048, 1536)).toEqual({ width: 1024, height: 768, resized: true });
    expect(fitWithin(1000, 3000)).toEqual({ width: 341, height: 1024, resized: true });
    expect(fitWithin(1024, 1024)).toEqual({ width: 1024, height: 1024, resized: false });
  });
});

describe("ImagePreprocessor.validate", () => {
  const pre = new ImagePreprocessor({ blobs: new MemoryStorage() });

  it("accepts a 100x100 image", async () => {
    const p = await writeJpeg(dir, "ok.jpg", 100, 100);
    const info = await pre.validate(p);
    expect(info.width).toBe(100);
    expect(info.height).toBe(100);
    expect(info.sizeBytes).toBe(fs.statSync(p).size);
  });

  it("rejects a 99x100 image as too small", async () => {
    const p = await writeJpeg(dir, "small.jpg", 99, 100);
    expect(reasonOf(await rejectionOf(pre.validate(p)))).toBe("too-small");
  });

  it("rejects missing, empty, oversized and undecodable files", async () => {
    expect(reasonOf(await rejectionOf(pre.validate(path.join(dir, "nope.jpg"))))).toBe("missing");

    const empty = path.join(dir, "empty.jpg");
    fs.writeFileSync(empty, Buffer.alloc(0));
    expect(reasonOf(await rejectionOf(pre.validate(empty)))).toBe("empty");

    const big = path.join(dir, "big.jpg");
    fs.writeFileSync(big, Buffer.alloc(MAX_IMAGE_BYTES + 1));
    expect(reasonOf(await rejectionOf(pre.validate(big)))).toBe("too-large");

    const junk = path.join(dir, "junk.jpg");
    fs.writeFileSync(junk, Buffer.from("definitely not an image"));
    const err = await rejectionOf(pre.validate(junk));
    expect(reasonOf(err)).toBe("undecodable");
    expect(err instanceof InvalidImageError && err.code).toBe("INVALID_IMAGE_UNDECODABLE");
  });
});

describe("ImagePreprocessor.process", () => {
  it("resizes large images to 1024 on the long side as jpeg", async () => {
    const p = await writeJpeg(dir, "large.jpg", 2048, 1536);
    const pre = new ImagePreprocessor({ blobs: new MemoryStorage() });

    const out = await pre.process(p);
    const meta = await sharp(Buffer.from(out.base64Image, "base64")).metadata();

    expect(meta.format).toBe("jpeg");
    expect(meta.width).toBe(1024);
    expect(meta.height).toBe(768);
    expect(out.fromCache).toBe(false);
    expect(out.originalSize).toBe(fs.statSync(p).size);
    expect(out.processedSize).toBe(Buffer.from(out.base64Image, "base64").byteLength);
  });

  it("keeps small images at their size", async () => {
    const p = await writeJpeg(dir, "medium.jpg", 300, 200);
    const pre = new ImagePreprocessor({ blobs: new MemoryStorage() });
    const meta = await sharp(Buffer.from((await pre.process(p)).base64Image, "base64")).metadata();
    expect([meta.width, meta.height]).toEqual([300, 200]);
  });

  it("serves a repeat from the blob cache", async () => {
    const p = await writeJpeg(dir, "repeat.jpg", 400, 400);
    const blobs = new MemoryStorage();
    const pre = new ImagePreprocessor({ blobs });

    const first = await pre.process(p);
    const second = await pre.process(p);

    expect(second.fromCache).toBe(true);
    expect(second.base64Image).toBe(first.base64Image);
    expect(second.cacheKey).toBe(first.cacheKey);
    expect(await pre.getCacheSize()).toBe(first.processedSize);

    await pre.clearCache();
    expect(await pre.getCacheSize()).toBe(0);
  });

  it("shares one run for concurrent calls on the same file", async () => {
    const p = await writeJpeg(dir, "concurrent.jpg", 400, 300);
    const inner = new InlineEncoder();
    const encode = vi.fn((job: EncodeJob) => inner.encode(job));
    const pre = new ImagePreprocessor({ blobs: new MemoryStorage(), inline: { encode, dispose: () => undefined } });

    const [a, b] = await Promise.all([pre.process(p), pre.process(p)]);

    expect(encode).toHaveBeenCalledTimes(1);
    expect(a).toBe(b);
  });

  it("produces the same bytes on the background path", async () => {
    const p = await writeJpeg(dir, "paths.jpg", 1500, 1200);
    const inline = new ImagePreprocessor({ blobs: new MemoryStorage(), backgroundThresholdBytes: Number.MAX_SAFE_INTEGER });
    const background = new ImagePreprocessor({ blobs: new MemoryStorage(), backgroundThresholdBytes: 0 });

    const [a, b] = await Promise.all([inline.process(p), background.process(p)]);
    expect(b.base64Image).toBe(a.base64Image);
  });

  it("rejects waiters and later calls after dispose", async () => {
    const p = await writeJpeg(dir, "dispose.jpg", 200, 200);
    const never = new Promise<Buffer>(() => undefined);
    const pre = new ImagePreprocessor({
      blobs: new MemoryStorage(),
      inline: { encode: () => never, dispose: () => undefined },
    });

    const pending = pre.process(p);
    // let the stat and cache lookup settle so the run is registered
    await new Promise((r) => setTimeout(r, 50));
    pre.dispose();

    await expect(pending).rejects.toBeInstanceOf(DisposedError);
    await expect(pre.process(p)).rejects.toBeInstanceOf(DisposedError);
  });
});
