import { z } from "zod";
import type { AppError } from "../../errors";

/**
 * Recipe domain contract (camelCase, as cached and served).
 * The remote payload shape lives in ../ai/contracts.ts.
 */

export const NutritionInfoSchema = z.object({
  calories: z.number().nonnegative(),
  protein: z.number().nonnegative(),
  carbohydrates: z.number().nonnegative(),
  fat: z.number().nonnegative(),
  fiber: z.number().nonnegative(),
  sugar: z.number().nonnegative(),
  sodium: z.number().nonnegative(),
  servingSize: z.string(),
});

export const AllergenSchema = z.object({
  name: z.string().min(1),
  severity: z.string(),
  description: z.string(),
});

export const IntoleranceSchema = z.object({
  name: z.string().min(1),
  type: z.string(),
  description: z.string(),
});

export const DIFFICULTIES = ["easy", "medium", "hard"] as const;
export type Difficulty = (typeof DIFFICULTIES)[number];

export const RecipeSchema = z.object({
  id: z.string().min(1),
  title: z.string().min(1),
  ingredients: z.array(z.string()),
  instructions: z.array(z.string()),
  cookingTimeMin: z.number().nonnegative(),
  servings: z.number().nonnegative(),
  matchPercentage: z.number().min(0).max(100),
  imageUrl: z.string().nullable(),
  nutrition: NutritionInfoSchema,
  allergens: z.array(AllergenSchema),
  intolerances: z.array(IntoleranceSchema),
  usedIngredients: z.array(z.string()),
  missingIngredients: z.array(z.string()),
  // easy | medium | hard; anything else ranks as medium
  difficulty: z.string(),
});

export type NutritionInfo = z.infer<typeof NutritionInfoSchema>;
export type Allergen = z.infer<typeof AllergenSchema>;
export type Intolerance = z.infer<typeof IntoleranceSchema>;
export type Recipe = z.infer<typeof RecipeSchema>;

/** Successful generations are the only thing ever cached. */
export const RecipeGenerationSuccessSchema = z.object({
  success: z.literal(true),
  recipes: z.array(RecipeSchema),
  totalFound: z.number().int().nonnegative(),
  alternativeSuggestions: z.array(RecipeSchema),
  generationTimeMs: z.number().nonnegative(),
});

export type RecipeGenerationSuccess = z.infer<typeof RecipeGenerationSuccessSchema>;

export type RecipeGenerationFailure = {
  success: false;
  recipes: [];
  totalFound: 0;
  alternativeSuggestions: [];
  generationTimeMs: number;
  error: AppError;
  errorMessage: string;
};

export type RecipeGenerationResult = RecipeGenerationSuccess | RecipeGenerationFailure;

export type SortBy = "match" | "time" | "difficulty";

export type RecipePageRequest = {
  ingredients: string[];
  page?: number;
  pageSize?: number;
  sortBy?: SortBy | null;
  filters?: string[];
};

export type PaginatedView<T> = {
  items: T[];
  pageNumber: number;
  pageSize: number;
  totalPages: number;
  totalItems: number;
  hasNext: boolean;
  hasPrev: boolean;
};

export type RecipePageResult =
  | {
      success: true;
      page: PaginatedView<Recipe>;
      fromCache: boolean;
      timings: { totalMs: number; cacheMs: number };
    }
  | {
      success: false;
      page: PaginatedView<Recipe>;
      fromCache: false;
      timings: { totalMs: number; cacheMs: number };
      error: AppError;
      errorMessage: string;
    };
