import type { Recipe } from "./types";

/** Does a recipe ingredient line count as one of the user's ingredients? */
export type IngredientMatcher = (recipeIngredient: string, userIngredient: string) => boolean;

/** Case-insensitive, trimmed, either side contained in the other. */
export const substringMatcher: IngredientMatcher = (recipeIngredient, userIngredient) => {
  const a = recipeIngredient.trim().toLowerCase();
  const b = userIngredient.trim().toLowerCase();
  if (!a || !b) return false;
  return a.includes(b) || b.includes(a);
};

export function matchPercentage(usedCount: number, totalCount: number): number {
  if (totalCount <= 0) return 0;
  return (usedCount / totalCount) * 100;
}

/**
 * Recompute used/missing ingredients and the match percentage from the
 * user's list instead of trusting the model's numbers.
 */
export function highlightUsedIngredients(
  recipe: Recipe,
  userIngredients: readonly string[],
  matcher: IngredientMatcher = substringMatcher
): Recipe {
  const used: string[] = [];
  const missing: string[] = [];

  for (const line of recipe.ingredients) {
    if (userIngredients.some((u) => matcher(line, u))) used.push(line);
    else missing.push(line);
  }

  return {
    ...recipe,
    usedIngredients: used,
    missingIngredients: missing,
    matchPercentage: matchPercentage(used.length, recipe.ingredients.length),
  };
}

/** Highest match first; equal matches keep their order. */
export function rankByMatch<T extends Pick<Recipe, "matchPercentage">>(recipes: readonly T[]): T[] {
  return [...recipes].sort((a, b) => b.matchPercentage - a.matchPercentage);
}
