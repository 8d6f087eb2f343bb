import { z } from "zod";
import { ValidationError } from "../../errors";
import type { KeyValueStore } from "../storage/types";
import catalog from "./common-ingredients.json";

const CatalogSchema = z.object({
  categories: z.record(z.array(z.string())),
  starters: z.array(z.string()),
});

const COMMON = CatalogSchema.parse(catalog);

export const INGREDIENTS_KEY = "custom_ingredients";
export const HISTORY_KEY = "ingredient_history";
const HISTORY_LIMIT = 50;
const OTHER_CATEGORY = "other";

const NAME_PATTERN = /^[a-zA-Z0-9\s\-']+$/;

const CustomIngredientSchema = z.object({
  name: z.string().min(1),
  category: z.string(),
  addedAt: z.string(),
  usageCount: z.number().int().nonnegative(),
  lastUsedAt: z.string().nullable(),
});

export type CustomIngredient = z.infer<typeof CustomIngredientSchema>;

const IngredientListSchema = z.array(CustomIngredientSchema);
const HistorySchema = z.array(z.string());

export type IngredientValidation =
  | { isValid: true; normalizedName: string; category: string; suggestions: string[] }
  | { isValid: false; error: string };

/** "  green   onion " -> "Green Onion" */
export function normalizeIngredientName(name: string): string {
  return name
    .trim()
    .toLowerCase()
    .split(/\s+/)
    .map((w) => (w ? w[0].toUpperCase() + w.slice(1) : ""))
    .join(" ");
}

const lookupKey = (name: string) => name.trim().toLowerCase().replace(/\s+/g, " ");

/** First catalog category where either name contains the other; `other` when none. */
export function categorizeIngredient(name: string): string {
  const n = lookupKey(name);
  for (const [category, items] of Object.entries(COMMON.categories)) {
    if (items.some((item) => n.includes(item) || item.includes(n))) return category;
  }
  return OTHER_CATEGORY;
}

/** Up to five catalog names related to `name`, excluding an exact match. */
function similarIngredients(name: string): string[] {
  const n = lookupKey(name);
  const out: string[] = [];
  for (const items of Object.values(COMMON.categories)) {
    for (const item of items) {
      if (item === n) continue;
      if (item.includes(n) || n.includes(item)) out.push(normalizeIngredientName(item));
    }
  }
  return out.slice(0, 5);
}

export function validateIngredient(name: string): IngredientValidation {
  const trimmed = name.trim();

  if (!trimmed) return { isValid: false, error: "Ingredient name cannot be empty" };
  if (trimmed.length < 2) return { isValid: false, error: "Ingredient name must be at least 2 characters long" };
  if (trimmed.length > 50) return { isValid: false, error: "Ingredient name cannot exceed 50 characters" };
  if (!NAME_PATTERN.test(trimmed)) return { isValid: false, error: "Ingredient name contains invalid characters" };
  if (!/[a-zA-Z]/.test(trimmed)) return { isValid: false, error: "Ingredient name must contain at least one letter" };

  return {
    isValid: true,
    normalizedName: normalizeIngredientName(trimmed),
    category: categorizeIngredient(trimmed),
    suggestions: similarIngredients(trimmed),
  };
}

const sameName = (a: string, b: string) => lookupKey(a) === lookupKey(b);

/**
 * Ingredients the user typed in by hand, kept in the key-value store with a
 * usage count and a most-recent-first history.
 */
export class CustomIngredients {
  private queue: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly store: KeyValueStore,
    private readonly now: () => Date = () => new Date()
  ) {}

  validate(name: string): IngredientValidation {
    return validateIngredient(name);
  }

  add(name: string): Promise<CustomIngredient> {
    return this.serial(async () => {
      const check = validateIngredient(name);
      if (!check.isValid) throw new ValidationError("CUSTOM_INGREDIENT_INVALID", check.error);

      const list = await this.list();
      if (list.some((i) => sameName(i.name, check.normalizedName))) {
        throw new ValidationError(
          "CUSTOM_INGREDIENT_EXISTS",
          `Ingredient "${check.normalizedName}" is already in your list`
        );
      }

      const ingredient: CustomIngredient = {
        name: check.normalizedName,
        category: check.category,
        addedAt: this.now().toISOString(),
        usageCount: 1,
        lastUsedAt: null,
      };
      await this.saveList([...list, ingredient]);
      await this.pushHistory([ingredient.name]);

      console.log(`[ingredients] added ${ingredient.name}`);
      return ingredient;
    });
  }

  /** False when nothing by that name was stored. */
  remove(name: string): Promise<boolean> {
    return this.serial(async () => {
      const list = await this.list();
      const kept = list.filter((i) => !sameName(i.name, name));
      if (kept.length === list.length) return false;

      await this.saveList(kept);
      console.log(`[ingredients] removed ${name}`);
      return true;
    });
  }

  async list(): Promise<CustomIngredient[]> {
    const raw = await this.store.getData(INGREDIENTS_KEY);
    if (raw == null) return [];

    const parsed = IngredientListSchema.safeParse(raw);
    if (!parsed.success) {
      console.warn("[ingredients] stored list is unreadable; starting empty");
      return [];
    }
    return parsed.data;
  }

  async byCategory(category: string): Promise<CustomIngredient[]> {
    return (await this.list()).filter((i) => i.category === category);
  }

  /** Case-insensitive substring on the name; a blank query finds nothing. */
  async search(query: string): Promise<CustomIngredient[]> {
    const q = query.trim().toLowerCase();
    if (!q) return [];
    return (await this.list()).filter((i) => i.name.toLowerCase().includes(q));
  }

  async frequent(limit = 10): Promise<CustomIngredient[]> {
    return [...(await this.list())].sort((a, b) => b.usageCount - a.usageCount).slice(0, Math.max(0, limit));
  }

  async recent(limit = 10): Promise<CustomIngredient[]> {
    return [...(await this.list())]
      .sort((a, b) => Date.parse(b.addedAt) - Date.parse(a.addedAt))
      .slice(0, Math.max(0, limit));
  }

  async history(): Promise<string[]> {
    const parsed = HistorySchema.safeParse(await this.store.getData(HISTORY_KEY));
    return parsed.success ? parsed.data : [];
  }

  /** Count a use of each named ingredient that is on the list. Returns how many matched. */
  recordUsage(names: readonly string[]): Promise<number> {
    return this.serial(async () => {
      const list = await this.list();
      const at = this.now().toISOString();
      const used: string[] = [];

      const updated = list.map((i) => {
        if (!names.some((n) => sameName(n, i.name))) return i;
        used.push(i.name);
        return { ...i, usageCount: i.usageCount + 1, lastUsedAt: at };
      });

      if (used.length) {
        await this.saveList(updated);
        await this.pushHistory(used);
      }
      return used.length;
    });
  }

  /**
   * The most used entries first, then catalog names matching `query`
   * (or a starter set without one), without repeats.
   */
  async suggestions(opts: { query?: string | null; limit?: number } = {}): Promise<string[]> {
    const limit = opts.limit ?? 10;
    const out = (await this.frequent(5)).map((i) => i.name);
    const add = (name: string) => {
      if (!out.includes(name)) out.push(name);
    };

    const q = (opts.query ?? "").trim().toLowerCase();
    if (q) {
      for (const items of Object.values(COMMON.categories)) {
        for (const item of items) {
          if (item.includes(q)) add(normalizeIngredientName(item));
        }
      }
    } else {
      COMMON.starters.forEach(add);
    }

    return out.slice(0, Math.max(0, limit));
  }

  async categoryCounts(): Promise<Record<string, number>> {
    const counts: Record<string, number> = {};
    for (const i of await this.list()) counts[i.category] = (counts[i.category] ?? 0) + 1;
    return counts;
  }

  clear(): Promise<void> {
    return this.serial(async () => {
      await this.saveList([]);
      await this.store.saveData(HISTORY_KEY, []);
      console.log("[ingredients] cleared");
    });
  }

  async exportAll(): Promise<CustomIngredient[]> {
    return this.list();
  }

  /** Replace the list with `data`. Nothing changes when any entry is malformed. */
  importAll(data: unknown): Promise<number> {
    return this.serial(async () => {
      const parsed = IngredientListSchema.safeParse(data);
      if (!parsed.success) {
        throw new ValidationError("CUSTOM_INGREDIENT_IMPORT_INVALID", "Imported ingredients are not valid.", {
          details: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; "),
        });
      }
      await this.saveList(parsed.data);
      console.log(`[ingredients] imported ${parsed.data.length}`);
      return parsed.data.length;
    });
  }

  private saveList(list: CustomIngredient[]) {
    return this.store.saveData(INGREDIENTS_KEY, list);
  }

  private async pushHistory(names: string[]) {
    const history = (await this.history()).filter((h) => !names.includes(h));
    await this.store.saveData(HISTORY_KEY, [...names, ...history].slice(0, HISTORY_LIMIT));
  }

  // writes are read-modify-write on one key; run them one at a time
  private serial<T>(fn: () => Promise<T>): Promise<T> {
    const next = this.queue.then(fn, fn);
    this.queue = next.catch(() => undefined);
    return next;
  }
}
