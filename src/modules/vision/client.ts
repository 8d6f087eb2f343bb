// src/modules/vision/client.ts
import { DisposedError, ProcessingError, toAppError } from "../../errors";
import type { RetryPolicy } from "../../utils/retry";
import { elapsedSince } from "../../utils/format";
import { VisionPayloadSchema } from "../ai/contracts";
import type { ChatJsonTransport } from "../ai/openai-chat";
import { buildVisionPrompt } from "../ai/prompts";
import { visionCacheKey } from "../cache/keys";
import type { ResultCache } from "../cache/result-cache";
import { requireNetwork, type ConnectivityMonitor } from "../connectivity/monitor";
import type { ImagePreprocessor } from "../image/preprocessor";
import type { Ingredient, VisionFailure, VisionResult, VisionSuccess } from "./types";

export const MIN_INGREDIENT_CONFIDENCE = 0.3;
export const VISION_RESULT_TTL_MS = 7 * 24 * 60 * 60 * 1000;

export type VisionClientOptions = {
  transport: ChatJsonTransport;
  model: string;
  preprocessor: ImagePreprocessor;
  connectivity: ConnectivityMonitor;
  retry: RetryPolicy;
  /** Successful analyses keyed by image fingerprint. */
  cache?: ResultCache<VisionSuccess>;
};

export function visionFailure(error: unknown, processingTimeMs: number): VisionFailure {
  const err = toAppError(error);
  return {
    success: false,
    ingredients: [],
    overallConfidence: 0,
    processingTimeMs,
    fromCache: false,
    error: err,
    errorMessage: err.message,
  };
}

/**
 * Keep ingredients at or above the confidence floor, most confident first.
 * Nothing left and a low overall score means there is no food in the photo.
 */
export function selectIngredients(ingredients: Ingredient[], overallConfidence: number): Ingredient[] {
  const kept = ingredients
    .filter((i) => i.confidence >= MIN_INGREDIENT_CONFIDENCE)
    .sort((a, b) => b.confidence - a.confidence);

  if (!kept.length && overallConfidence < MIN_INGREDIENT_CONFIDENCE) {
    throw ProcessingError.noFoodDetected();
  }
  return kept;
}

export class VisionClient {
  constructor(private readonly opts: VisionClientOptions) {}

  /** Failures come back as `{ success: false, error }`; only a shut-down client rejects. */
  async analyze(imagePath: string): Promise<VisionResult> {
    const startedAt = performance.now();

    try {
      requireNetwork(this.opts.connectivity);

      const image = await this.opts.preprocessor.process(imagePath);
      const load = () =>
        this.opts.retry.run(async (attempt) => {
          if (attempt > 1) console.warn(`[vision] retrying analysis (attempt ${attempt})`);
          return this.request(image.base64Image);
        });

      let value: VisionSuccess;
      let fromCache = false;
      if (this.opts.cache) {
        const loaded = await this.opts.cache.getOrLoad(visionCacheKey(image.cacheKey), load);
        value = loaded.value;
        fromCache = loaded.fromCache;
      } else {
        value = await load();
      }

      const processingTimeMs = elapsedSince(startedAt);
      console.log(`[vision] ${value.ingredients.length} ingredients in ${processingTimeMs}ms${fromCache ? " (cached)" : ""}`);

      return { ...value, ingredients: value.ingredients.map((i) => ({ ...i })), processingTimeMs, fromCache };
    } catch (e) {
      if (e instanceof DisposedError) throw e;
      const failure = visionFailure(e, elapsedSince(startedAt));
      console.error(`[vision] analysis failed: ${failure.error.code}`, failure.error.details ?? "");
      return failure;
    }
  }

  private async request(base64Image: string): Promise<VisionSuccess> {
    const startedAt = performance.now();

    const raw = await this.opts.transport.completeJson({
      model: this.opts.model,
      messages: [
        {
          role: "user",
          content: [
            { type: "text", text: buildVisionPrompt() },
            { type: "image_url", image_url: { url: `data:image/jpeg;base64,${base64Image}`, detail: "high" } },
          ],
        },
      ],
      maxTokens: 1000,
      temperature: 0.1,
      tag: "vision.analyze",
    });

    const parsed = VisionPayloadSchema.safeParse(raw);
    if (!parsed.success) {
      throw ProcessingError.serviceFailure("vision.analyze: payload does not match schema", parsed.error);
    }

    const ingredients = selectIngredients(parsed.data.ingredients, parsed.data.overall_confidence);

    return {
      success: true,
      ingredients,
      overallConfidence: parsed.data.overall_confidence,
      processingTimeMs: elapsedSince(startedAt),
      fromCache: false,
    };
  }
}
