// src/modules/recipes/client.ts
import { ProcessingError, ValidationError, toAppError } from "../../errors";
import type { RetryPolicy } from "../../utils/retry";
import { elapsedSince } from "../../utils/format";
import { RecipePayloadSchema, toRecipe, type RecipePayload } from "../ai/contracts";
import type { ChatJsonTransport } from "../ai/openai-chat";
import {
  buildAlternativeRecipePrompt,
  buildRecipeSystemPrompt,
  buildRecipeUserPrompt,
} from "../ai/prompts";
import { requireNetwork, type ConnectivityMonitor } from "../connectivity/monitor";
import { highlightUsedIngredients, rankByMatch, substringMatcher, type IngredientMatcher } from "./matching";
import type { Recipe, RecipeGenerationFailure, RecipeGenerationResult } from "./types";

export const RECIPES_PER_REQUEST = 5;

export type RecipeClientOptions = {
  transport: ChatJsonTransport;
  model: string;
  retry: RetryPolicy;
  connectivity: ConnectivityMonitor;
  matcher?: IngredientMatcher;
  recipesPerRequest?: number;
};

export function recipeFailure(error: unknown, generationTimeMs: number): RecipeGenerationFailure {
  const err = toAppError(error);
  return {
    success: false,
    recipes: [],
    totalFound: 0,
    alternativeSuggestions: [],
    generationTimeMs,
    error: err,
    errorMessage: err.message,
  };
}

function cleanIngredients(ingredients: readonly string[]): string[] {
  return ingredients.map((i) => String(i ?? "").trim()).filter(Boolean);
}

export class RecipeClient {
  private readonly matcher: IngredientMatcher;
  private readonly count: number;

  constructor(private readonly opts: RecipeClientOptions) {
    this.matcher = opts.matcher ?? substringMatcher;
    this.count = opts.recipesPerRequest ?? RECIPES_PER_REQUEST;
  }

  /**
   * Recipes for the given ingredients. Never throws: failures come back
   * as `{ success: false, error }`.
   */
  async generate(ingredients: readonly string[]): Promise<RecipeGenerationResult> {
    const startedAt = performance.now();
    const list = cleanIngredients(ingredients);

    if (!list.length) {
      return recipeFailure(ValidationError.emptyIngredients(), elapsedSince(startedAt));
    }

    try {
      requireNetwork(this.opts.connectivity);

      const payload = await this.opts.retry.run(async (attempt) => {
        if (attempt > 1) console.warn(`[recipes] retrying generation (attempt ${attempt})`);
        return this.request(buildRecipeUserPrompt(list, this.count), 0.3, "recipes.generate");
      });

      const recipes = this.postProcess(payload.recipes.map(toRecipe), list);
      let alternatives = this.postProcess(payload.alternative_suggestions.map(toRecipe), list);

      if (!recipes.length && !alternatives.length) {
        alternatives = await this.findAlternatives(list);
      }

      const generationTimeMs = elapsedSince(startedAt);
      console.log(`[recipes] generated ${recipes.length} recipes in ${generationTimeMs}ms`);

      return {
        success: true,
        recipes,
        totalFound: Math.max(payload.total_found, recipes.length),
        alternativeSuggestions: alternatives,
        generationTimeMs,
      };
    } catch (e) {
      const failure = recipeFailure(e, elapsedSince(startedAt));
      console.error(`[recipes] generation failed: ${failure.error.code}`, failure.error.details ?? "");
      return failure;
    }
  }

  /** Looser suggestions that need only some of the ingredients. Any failure yields []. */
  async findAlternatives(ingredients: readonly string[]): Promise<Recipe[]> {
    const list = cleanIngredients(ingredients);
    if (!list.length) return [];

    try {
      requireNetwork(this.opts.connectivity);
      const payload = await this.request(
        buildAlternativeRecipePrompt(list, this.count),
        0.5,
        "recipes.alternatives"
      );
      return this.postProcess(payload.recipes.map(toRecipe), list);
    } catch (e) {
      console.warn("[recipes] alternatives failed:", toAppError(e).code);
      return [];
    }
  }

  async getTopRecipes(ingredients: readonly string[], limit: number): Promise<Recipe[]> {
    const result = await this.generate(ingredients);
    if (!result.success) throw result.error;
    return result.recipes.slice(0, Math.max(0, limit));
  }

  private async request(userPrompt: string, temperature: number, tag: string): Promise<RecipePayload> {
    const raw = await this.opts.transport.completeJson({
      model: this.opts.model,
      messages: [
        { role: "system", content: buildRecipeSystemPrompt() },
        { role: "user", content: userPrompt },
      ],
      maxTokens: 4000,
      temperature,
      tag,
    });

    const parsed = RecipePayloadSchema.safeParse(raw);
    if (!parsed.success) {
      throw ProcessingError.serviceFailure(`${tag}: payload does not match schema`, parsed.error);
    }
    return parsed.data;
  }

  private postProcess(recipes: Recipe[], ingredients: string[]): Recipe[] {
    return rankByMatch(recipes.map((r) => highlightUsedIngredients(r, ingredients, this.matcher)));
  }
}
