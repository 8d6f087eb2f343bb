import fs from "node:fs";
import path from "node:path";

const IMAGE_EXT = new Set([".jpg", ".jpeg", ".png", ".webp", ".heic"]);

export const CAPTURED_IMAGE_MAX_AGE_MS = 7 * 24 * 60 * 60 * 1000;

/**
 * Delete captured photos in `dir` older than `maxAgeMs`. Returns how many were removed.
 */
export async function cleanupOldImages(
  dir: string,
  maxAgeMs = CAPTURED_IMAGE_MAX_AGE_MS,
  now: number = Date.now()
): Promise<number> {
  if (!fs.existsSync(dir)) return 0;

  const cutoff = now - maxAgeMs;
  let removed = 0;

  for (const name of await fs.promises.readdir(dir)) {
    if (!IMAGE_EXT.has(path.extname(name).toLowerCase())) continue;

    const full = path.join(dir, name);
    try {
      const st = await fs.promises.stat(full);
      if (st.isFile() && st.mtimeMs < cutoff) {
        await fs.promises.unlink(full);
        removed++;
      }
    } catch (e) {
      console.warn(`[image] cleanup skipped ${name}:`, e);
    }
  }

  if (removed) console.log(`[image] cleanup removed ${removed} old images`);
  return removed;
}
