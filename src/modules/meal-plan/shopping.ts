import type { ShoppingListItem } from "./types";

export type ParsedIngredient = {
  quantity: string;
  unit: string;
  name: string;
};

const NUMBER = /^\d+(\.\d+)?$/;
const FRACTION = /^\d+\/\d+$/;

/**
 * "1 cup rice" -> 1 / cup / rice, "2 eggs" -> 2 / item / eggs,
 * "soy sauce" -> 1 / item / soy sauce.
 */
export function parseIngredientLine(line: string): ParsedIngredient {
  const text = line.trim();
  const parts = text.split(/\s+/);
  const [first] = parts;

  if (!NUMBER.test(first) && !FRACTION.test(first)) return { quantity: "1", unit: "item", name: text };
  if (parts.length === 1) return { quantity: first, unit: "item", name: text };
  if (parts.length === 2) return { quantity: first, unit: "item", name: parts[1] };
  return { quantity: first, unit: parts[1], name: parts.slice(2).join(" ") };
}

export const itemKey = (ingredient: string) => ingredient.trim().toLowerCase();

/**
 * Merge the ingredient lines of each recipe into one list keyed by name.
 * Repeated names join their quantities with " + "; units are not converted.
 */
export function buildShoppingItems(recipes: readonly { title: string; ingredients: readonly string[] }[]): ShoppingListItem[] {
  const items = new Map<string, ShoppingListItem>();

  for (const recipe of recipes) {
    for (const line of recipe.ingredients) {
      if (!line.trim()) continue;
      const parsed = parseIngredientLine(line);
      const key = itemKey(parsed.name);
      const existing = items.get(key);

      if (!existing) {
        items.set(key, {
          ingredient: parsed.name,
          quantity: parsed.quantity,
          unit: parsed.unit,
          usedInRecipes: [recipe.title],
          isChecked: false,
        });
        continue;
      }

      items.set(key, {
        ...existing,
        quantity: `${existing.quantity} + ${parsed.quantity}`,
        usedInRecipes: existing.usedInRecipes.includes(recipe.title)
          ? existing.usedInRecipes
          : [...existing.usedInRecipes, recipe.title],
      });
    }
  }

  return [...items.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)).map(([, item]) => item);
}
