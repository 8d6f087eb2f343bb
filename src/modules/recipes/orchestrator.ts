// src/modules/recipes/orchestrator.ts
import { DisposedError, ValidationError, toAppError } from "../../errors";
import { elapsedSince, formatBytes } from "../../utils/format";
import { normalizeIngredients, recipeCacheKey } from "../cache/keys";
import type { ResultCache } from "../cache/result-cache";
import { applyFiltersAndSorting, normalizeFilters } from "./filters";
import { emptyPage, paginate } from "./paginate";
import type {
  Recipe,
  RecipeGenerationResult,
  RecipeGenerationSuccess,
  RecipePageRequest,
  RecipePageResult,
  SortBy,
} from "./types";

export interface RecipeSource {
  generate(ingredients: readonly string[]): Promise<RecipeGenerationResult>;
}

export interface RecipeImageWarmer {
  preloadRecipes(recipes: readonly Pick<Recipe, "imageUrl">[]): Promise<number>;
  sizeBytes(): Promise<number>;
  clear(): Promise<void>;
}

export type RecipeOrchestratorOptions = {
  client: RecipeSource;
  cache: ResultCache<RecipeGenerationSuccess>;
  images?: RecipeImageWarmer;
  defaultPageSize?: number;
  preloadDebounceMs?: number;
};

export type CacheStats = {
  cacheSize: number;
  cacheSizeFormatted: string;
  activeRequests: number;
  scheduledPreloads: number;
  timestamp: string;
};

type NormalizedRequest = {
  ingredients: string[];
  page: number;
  pageSize: number;
  sortBy: SortBy;
  filters: string[];
};

export const RECIPE_CACHE_TTL_MS = 24 * 60 * 60 * 1000;

const SORTS: readonly SortBy[] = ["match", "time", "difficulty"];

function requestKey(r: NormalizedRequest) {
  return [recipeCacheKey(r.ingredients), r.page, r.pageSize, r.sortBy, r.filters.join(",")].join("_");
}

/**
 * Pages over cached recipe generations: one remote generation per ingredient
 * set, filtered/sorted/sliced locally, with the next page warmed in the background.
 */
export class RecipeOrchestrator {
  private readonly preloadTimers = new Map<string, NodeJS.Timeout>();
  private readonly defaultPageSize: number;
  private readonly debounceMs: number;
  private disposed = false;

  constructor(private readonly opts: RecipeOrchestratorOptions) {
    this.defaultPageSize = opts.defaultPageSize ?? 10;
    this.debounceMs = opts.preloadDebounceMs ?? 500;
  }

  normalize(req: RecipePageRequest): NormalizedRequest {
    const page = Number.isFinite(req.page) ? Math.trunc(req.page ?? 1) : 1;
    const pageSize = Number.isFinite(req.pageSize) ? Math.trunc(req.pageSize ?? this.defaultPageSize) : this.defaultPageSize;
    const sortBy = req.sortBy && SORTS.includes(req.sortBy) ? req.sortBy : "match";

    return {
      ingredients: normalizeIngredients(req.ingredients),
      page,
      pageSize,
      sortBy,
      filters: normalizeFilters(req.filters),
    };
  }

  async getPage(req: RecipePageRequest): Promise<RecipePageResult> {
    this.assertOpen();
    const startedAt = performance.now();
    const params = this.normalize(req);

    if (!params.ingredients.length) {
      return this.failure(ValidationError.emptyIngredients(), params.pageSize, startedAt, 0);
    }

    const cacheStartedAt = performance.now();
    let generation: RecipeGenerationSuccess;
    let fromCache: boolean;
    try {
      const loaded = await this.opts.cache.getOrLoad(recipeCacheKey(params.ingredients), () =>
        this.generate(params.ingredients)
      );
      generation = loaded.value;
      fromCache = loaded.fromCache;
    } catch (e) {
      if (e instanceof DisposedError) throw e;
      return this.failure(e, params.pageSize, startedAt, elapsedSince(cacheStartedAt));
    }
    const cacheMs = elapsedSince(cacheStartedAt);

    const recipes = applyFiltersAndSorting(generation.recipes, params.sortBy, params.filters);
    const slice = paginate(recipes, params.page, params.pageSize);
    // cached recipes are frozen; callers get their own copies
    const view = { ...slice, items: slice.items.map((r) => structuredClone(r)) };

    if (view.hasNext) this.schedulePreload({ ...params, page: params.page + 1 });
    this.warmImages(view.items);

    return {
      success: true,
      page: view,
      fromCache,
      timings: { totalMs: elapsedSince(startedAt), cacheMs },
    };
  }

  /** Warm images for a page whose recipe list is already cached. Never throws. */
  async preloadNextPage(req: RecipePageRequest): Promise<void> {
    try {
      if (this.disposed) return;
      const params = this.normalize(req);
      if (!params.ingredients.length) return;

      const cached = await this.opts.cache.get(recipeCacheKey(params.ingredients));
      if (!cached) return;

      const recipes = applyFiltersAndSorting(cached.value.recipes, params.sortBy, params.filters);
      const view = paginate(recipes, params.page, params.pageSize);
      const loaded = this.opts.images ? await this.opts.images.preloadRecipes(view.items) : 0;
      if (process.env.DEBUG_CACHE === "1") {
        console.log(`[preload] page ${params.page}: ${loaded}/${view.items.length} images`);
      }
    } catch (e) {
      console.warn("[preload] next page failed:", toAppError(e).code);
    }
  }

  async clearCache(): Promise<void> {
    this.cancelPreloads();
    try {
      await this.opts.cache.clear();
      await this.opts.images?.clear();
      console.log("[recipes] cache cleared");
    } catch (e) {
      console.warn("[recipes] clear cache failed:", toAppError(e).code);
    }
  }

  async getCacheStats(): Promise<CacheStats> {
    const recipesBytes = await this.opts.cache.sizeBytes();
    const imageBytes = this.opts.images ? await this.opts.images.sizeBytes().catch(() => 0) : 0;
    const cacheSize = recipesBytes + imageBytes;

    return {
      cacheSize,
      cacheSizeFormatted: formatBytes(cacheSize),
      activeRequests: this.opts.cache.inFlightCount(),
      scheduledPreloads: this.preloadTimers.size,
      timestamp: new Date().toISOString(),
    };
  }

  dispose() {
    if (this.disposed) return;
    this.disposed = true;
    this.cancelPreloads();
    this.opts.cache.dispose();
  }

  private async generate(ingredients: string[]): Promise<RecipeGenerationSuccess> {
    const result = await this.opts.client.generate(ingredients);
    if (!result.success) throw result.error;
    return result;
  }

  private schedulePreload(next: NormalizedRequest) {
    const key = requestKey(next);
    const existing = this.preloadTimers.get(key);
    if (existing) clearTimeout(existing);

    const timer = setTimeout(() => {
      this.preloadTimers.delete(key);
      this.preloadNextPage(next).catch((e) => console.warn("[preload] unexpected:", e));
    }, this.debounceMs);
    timer.unref();
    this.preloadTimers.set(key, timer);
  }

  private warmImages(recipes: Recipe[]) {
    if (!this.opts.images || !recipes.length) return;
    this.opts.images.preloadRecipes(recipes).catch((e) => console.warn("[preload] images failed:", toAppError(e).code));
  }

  private cancelPreloads() {
    for (const t of this.preloadTimers.values()) clearTimeout(t);
    this.preloadTimers.clear();
  }

  private failure(error: unknown, pageSize: number, startedAt: number, cacheMs: number): RecipePageResult {
    const err = toAppError(error);
    console.error(`[recipes] page failed: ${err.code}`);
    return {
      success: false,
      page: emptyPage(pageSize),
      fromCache: false,
      timings: { totalMs: elapsedSince(startedAt), cacheMs },
      error: err,
      errorMessage: err.message,
    };
  }

  private assertOpen() {
    if (this.disposed) throw new DisposedError("recipe orchestrator");
  }
}
