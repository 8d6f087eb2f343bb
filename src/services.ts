import type { AppEnv } from "./config/env";
import { requireOpenAIKey } from "./config/openai";
import { runtimeTuning, type RuntimeTuning } from "./config/runtime";
import type { Db } from "./db/connection";
import { NetworkError } from "./errors";
import { RetryPolicy } from "./utils/retry";
import { OpenAiChatClient, type ChatJsonTransport } from "./modules/ai/openai-chat";
import { ResultCache } from "./modules/cache/result-cache";
import { DnsConnectivityMonitor, hostOf, type ConnectivityMonitor } from "./modules/connectivity/monitor";
import { CustomIngredients } from "./modules/custom-ingredients/service";
import { ImagePreprocessor } from "./modules/image/preprocessor";
import { MealPlanner } from "./modules/meal-plan/service";
import { RecipeBook } from "./modules/recipe-book/service";
import { RecipeClient } from "./modules/recipes/client";
import { ImagePreloader } from "./modules/recipes/image-preloader";
import { RECIPE_CACHE_TTL_MS, RecipeOrchestrator } from "./modules/recipes/orchestrator";
import { RecipeGenerationSuccessSchema, type RecipeGenerationSuccess } from "./modules/recipes/types";
import { SqliteStorage } from "./modules/storage/sqlite-store";
import type { BlobStore, KeyValueStore } from "./modules/storage/types";
import { VISION_RESULT_TTL_MS, VisionClient } from "./modules/vision/client";
import { VisionSuccessSchema, type VisionSuccess } from "./modules/vision/types";

export type Services = {
  env: AppEnv;
  tuning: RuntimeTuning;
  connectivity: ConnectivityMonitor;
  preprocessor: ImagePreprocessor;
  vision: VisionClient;
  visionCache: ResultCache<VisionSuccess>;
  recipes: RecipeClient;
  recipeCache: ResultCache<RecipeGenerationSuccess>;
  images: ImagePreloader;
  orchestrator: RecipeOrchestrator;
  recipeBook: RecipeBook;
  customIngredients: CustomIngredients;
  mealPlanner: MealPlanner;
  dispose: () => void;
};

export type ServiceOverrides = {
  transport?: ChatJsonTransport;
  connectivity?: ConnectivityMonitor;
  storage?: KeyValueStore & BlobStore;
  fetchImpl?: typeof fetch;
  tuning?: Partial<RuntimeTuning>;
};

function transportFor(env: AppEnv): ChatJsonTransport {
  if (!env.OPENAI_API_KEY) {
    console.warn("[env] OPENAI_API_KEY not set; remote analysis will fail");
    return {
      completeJson: async () => {
        throw NetworkError.authFailure(401);
      },
    };
  }
  return new OpenAiChatClient({
    apiKey: requireOpenAIKey(env),
    baseUrl: env.OPENAI_BASE_URL,
    timeoutMs: env.API_TIMEOUT_MS,
  });
}

/** Wire every component once per process. Overrides replace the outside world in tests. */
export function createServices(db: Db, env: AppEnv, overrides: ServiceOverrides = {}): Services {
  const tuning = { ...runtimeTuning(), ...overrides.tuning };
  const storage = overrides.storage ?? new SqliteStorage(db);
  const transport = overrides.transport ?? transportFor(env);
  const connectivity = overrides.connectivity ?? new DnsConnectivityMonitor({ host: hostOf(env.OPENAI_BASE_URL) });

  const retry = new RetryPolicy({
    maxAttempts: tuning.retryMaxAttempts,
    delayMs: tuning.retryDelayMs,
  });

  const preprocessor = new ImagePreprocessor({ blobs: storage });

  const visionCache = new ResultCache<VisionSuccess>({
    name: "vision",
    ttlMs: VISION_RESULT_TTL_MS,
    keyValue: storage,
    blobs: storage,
    schema: VisionSuccessSchema,
  });

  const recipeCache = new ResultCache<RecipeGenerationSuccess>({
    name: "recipes",
    ttlMs: RECIPE_CACHE_TTL_MS,
    keyValue: storage,
    blobs: storage,
    schema: RecipeGenerationSuccessSchema,
  });

  const vision = new VisionClient({
    transport,
    model: env.OPENAI_VISION_MODEL,
    preprocessor,
    connectivity,
    retry,
    cache: visionCache,
  });

  const recipes = new RecipeClient({
    transport,
    model: env.OPENAI_TEXT_MODEL,
    retry,
    connectivity,
  });

  const images = new ImagePreloader({ blobs: storage, connectivity, fetchImpl: overrides.fetchImpl });

  const orchestrator = new RecipeOrchestrator({
    client: recipes,
    cache: recipeCache,
    images,
    defaultPageSize: tuning.recipePageSize,
    preloadDebounceMs: tuning.preloadDebounceMs,
  });

  const recipeBook = new RecipeBook(db, () => env.SUBSCRIPTION_TIER !== "free");
  const customIngredients = new CustomIngredients(storage);
  const mealPlanner = new MealPlanner(db, () => env.SUBSCRIPTION_TIER === "professional", recipeBook);

  return {
    env,
    tuning,
    connectivity,
    preprocessor,
    vision,
    visionCache,
    recipes,
    recipeCache,
    images,
    orchestrator,
    recipeBook,
    customIngredients,
    mealPlanner,
    dispose: () => {
      orchestrator.dispose();
      visionCache.dispose();
      preprocessor.dispose();
    },
  };
}
