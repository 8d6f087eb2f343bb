import type { Recipe, SortBy } from "./types";

const MEAT = ["chicken", "beef", "pork", "lamb", "turkey", "fish", "salmon", "tuna"];
const ANIMAL_PRODUCTS = ["milk", "cheese", "butter", "egg", "honey", "yogurt", "cream"];
const GLUTEN_GRAINS = ["wheat", "flour", "bread"];

export const DIETARY_FILTERS = ["vegetarian", "vegan", "gluten-free", "dairy-free", "nut-free"] as const;
export type DietaryFilter = (typeof DIETARY_FILTERS)[number];

function mentionsAny(recipe: Recipe, keywords: readonly string[]) {
  return recipe.ingredients.some((line) => {
    const l = line.toLowerCase();
    return keywords.some((k) => l.includes(k));
  });
}

const containsMeat = (r: Recipe) => mentionsAny(r, MEAT);

const containsAnimalProducts = (r: Recipe) => containsMeat(r) || mentionsAny(r, ANIMAL_PRODUCTS);

const containsGluten = (r: Recipe) =>
  r.intolerances.some((i) => i.type.toLowerCase() === "gluten") || mentionsAny(r, GLUTEN_GRAINS);

const containsDairy = (r: Recipe) =>
  r.allergens.some((a) => a.name.toLowerCase() === "dairy") ||
  r.intolerances.some((i) => i.type.toLowerCase() === "lactose");

const containsNuts = (r: Recipe) => r.allergens.some((a) => a.name.toLowerCase().includes("nut"));

const EXCLUDES: Record<DietaryFilter, (r: Recipe) => boolean> = {
  vegetarian: containsMeat,
  vegan: containsAnimalProducts,
  "gluten-free": containsGluten,
  "dairy-free": containsDairy,
  "nut-free": containsNuts,
};

function isDietaryFilter(v: string): v is DietaryFilter {
  return DIETARY_FILTERS.some((f) => f === v);
}

/** Lower-cased, known names only, de-duplicated, in a stable order. */
export function normalizeFilters(filters: readonly string[] | undefined): DietaryFilter[] {
  const seen = new Set<DietaryFilter>();
  for (const f of filters ?? []) {
    const v = String(f ?? "").trim().toLowerCase();
    if (isDietaryFilter(v)) seen.add(v);
  }
  return DIETARY_FILTERS.filter((f) => seen.has(f));
}

export function matchesFilters(recipe: Recipe, filters: readonly string[]): boolean {
  return normalizeFilters(filters).every((f) => !EXCLUDES[f](recipe));
}

const DIFFICULTY_RANK: Record<string, number> = { easy: 1, medium: 2, hard: 3 };

export function difficultyRank(difficulty: string): number {
  return DIFFICULTY_RANK[difficulty.trim().toLowerCase()] ?? 2;
}

/** Array.prototype.sort is stable, so ties keep their incoming order. */
export function sortRecipes(recipes: readonly Recipe[], sortBy: SortBy | null | undefined): Recipe[] {
  const out = [...recipes];
  switch (sortBy) {
    case "time":
      return out.sort((a, b) => a.cookingTimeMin - b.cookingTimeMin);
    case "difficulty":
      return out.sort((a, b) => difficultyRank(a.difficulty) - difficultyRank(b.difficulty));
    case "match":
    default:
      return out.sort((a, b) => b.matchPercentage - a.matchPercentage);
  }
}

export function applyFiltersAndSorting(
  recipes: readonly Recipe[],
  sortBy: SortBy | null | undefined,
  filters: readonly string[] = []
): Recipe[] {
  const wanted = normalizeFilters(filters);
  const kept = wanted.length ? recipes.filter((r) => wanted.every((f) => !EXCLUDES[f](r))) : recipes;
  return sortRecipes(kept, sortBy);
}
