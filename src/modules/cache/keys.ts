import { sha256Hex } from "../../utils/hash";

export const RECIPE_CACHE_PREFIX = "recipe_cache_";
export const VISION_CACHE_PREFIX = "vision_cache_";

/** Trimmed, lower-cased, de-duplicated and sorted; blanks dropped. */
export function normalizeIngredients(ingredients: readonly string[]): string[] {
  const set = new Set<string>();
  for (const raw of ingredients) {
    const v = String(raw ?? "").trim().toLowerCase();
    if (v) set.add(v);
  }
  return [...set].sort();
}

/** Order- and case-insensitive key for an ingredient list. */
export function recipeCacheKey(ingredients: readonly string[]): string {
  return RECIPE_CACHE_PREFIX + sha256Hex(normalizeIngredients(ingredients).join(","));
}

export function visionCacheKey(imageFingerprint: string): string {
  return VISION_CACHE_PREFIX + imageFingerprint;
}

/** Fingerprint of a file on disk: changes when the file is rewritten. */
export function imageCacheKey(path: string, mtimeMs: number, sizeBytes: number): string {
  return sha256Hex(`${path}-${mtimeMs}-${sizeBytes}`);
}
