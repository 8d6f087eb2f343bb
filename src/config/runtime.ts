// src/config/runtime.ts

function toInt(v: string | undefined): number | null {
  if (!v) return null;
  const n = Number(v);
  return Number.isFinite(n) ? Math.trunc(n) : null;
}

export function envInt(name: string, fallback: number, opts?: { min?: number; max?: number }) {
  const raw = toInt(process.env[name]);
  let n = raw ?? fallback;
  if (opts?.min != null) n = Math.max(opts.min, n);
  if (opts?.max != null) n = Math.min(opts.max, n);
  return n;
}

export function queryInt(value: unknown, fallback: number, opts?: { min?: number; max?: number }) {
  if (value === undefined || value === null || value === "") return fallback;
  const n = Number(value);
  if (!Number.isFinite(n)) return fallback;
  let out = Math.trunc(n);
  if (opts?.min != null) out = Math.max(opts.min, out);
  if (opts?.max != null) out = Math.min(opts.max, out);
  return out;
}

/**
 * Tuning knobs shared by the clients and the orchestrator.
 * Read once at wiring time; components take plain numbers.
 */
export function runtimeTuning() {
  return {
    retryMaxAttempts: envInt("RETRY_MAX_ATTEMPTS", 3, { min: 1, max: 10 }),
    retryDelayMs: envInt("RETRY_DELAY_MS", 2000, { min: 0, max: 60_000 }),
    recipePageSize: envInt("RECIPE_PAGE_SIZE", 10, { min: 1, max: 100 }),
    preloadDebounceMs: envInt("PRELOAD_DEBOUNCE_MS", 500, { min: 0, max: 10_000 }),
  };
}

export type RuntimeTuning = ReturnType<typeof runtimeTuning>;
