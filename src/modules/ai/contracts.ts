// src/modules/ai/contracts.ts
import { z } from "zod";
import type { Recipe } from "../recipes/types";

/**
 * Remote payload contracts (snake_case, as the model is told to answer).
 * Decoding fails closed: every field is required unless marked optional here.
 */

export const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable(),
        }),
      })
    )
    .min(1),
});

export const VisionIngredientPayloadSchema = z.object({
  name: z.string().trim().min(1),
  confidence: z.number().min(0).max(1),
  category: z.string().trim().min(1),
});

export const VisionPayloadSchema = z.object({
  ingredients: z.array(VisionIngredientPayloadSchema),
  overall_confidence: z.number().min(0).max(1),
});

export type VisionPayload = z.infer<typeof VisionPayloadSchema>;

export const NutritionPayloadSchema = z.object({
  calories: z.number().nonnegative(),
  protein: z.number().nonnegative(),
  carbohydrates: z.number().nonnegative(),
  fat: z.number().nonnegative(),
  fiber: z.number().nonnegative(),
  sugar: z.number().nonnegative(),
  sodium: z.number().nonnegative(),
  serving_size: z.string(),
});

export const RecipePayloadItemSchema = z.object({
  id: z.string().min(1),
  title: z.string().min(1),
  ingredients: z.array(z.string()),
  instructions: z.array(z.string()),
  cooking_time: z.number().nonnegative(),
  servings: z.number().nonnegative(),
  // the model's own estimate; recomputed locally before use
  match_percentage: z.number(),
  image_url: z.string().nullish(),
  nutrition: NutritionPayloadSchema,
  allergens: z.array(
    z.object({
      name: z.string().min(1),
      severity: z.string(),
      description: z.string(),
    })
  ),
  intolerances: z.array(
    z.object({
      name: z.string().min(1),
      type: z.string(),
      description: z.string(),
    })
  ),
  used_ingredients: z.array(z.string()),
  missing_ingredients: z.array(z.string()),
  difficulty: z.string().trim().toLowerCase(),
});

export const RecipePayloadSchema = z.object({
  recipes: z.array(RecipePayloadItemSchema),
  total_found: z.number().int().nonnegative(),
  alternative_suggestions: z.array(RecipePayloadItemSchema),
});

export type RecipePayloadItem = z.infer<typeof RecipePayloadItemSchema>;
export type RecipePayload = z.infer<typeof RecipePayloadSchema>;

export function toRecipe(raw: RecipePayloadItem): Recipe {
  return {
    id: raw.id,
    title: raw.title,
    ingredients: raw.ingredients,
    instructions: raw.instructions,
    cookingTimeMin: raw.cooking_time,
    servings: raw.servings,
    matchPercentage: Math.max(0, Math.min(100, raw.match_percentage)),
    imageUrl: raw.image_url ?? null,
    nutrition: {
      calories: raw.nutrition.calories,
      protein: raw.nutrition.protein,
      carbohydrates: raw.nutrition.carbohydrates,
      fat: raw.nutrition.fat,
      fiber: raw.nutrition.fiber,
      sugar: raw.nutrition.sugar,
      sodium: raw.nutrition.sodium,
      servingSize: raw.nutrition.serving_size,
    },
    allergens: raw.allergens,
    intolerances: raw.intolerances,
    usedIngredients: raw.used_ingredients,
    missingIngredients: raw.missing_ingredients,
    difficulty: raw.difficulty,
  };
}
