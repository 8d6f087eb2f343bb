import { z } from "zod";
import type { Db } from "../../db/connection";
import { ValidationError } from "../../errors";
import { RecipeSchema, type Recipe } from "../recipes/types";

export const DEFAULT_CATEGORY = "Uncategorized";

export type SavedRecipe = Recipe & {
  savedAt: string;
  updatedAt: string;
  category: string;
  tags: string[];
  personalNotes: string | null;
};

export type SaveOptions = {
  category?: string | null;
  tags?: string[] | null;
};

export type MetadataPatch = {
  category?: string | null;
  tags?: string[] | null;
  personalNotes?: string | null;
};

export type RecipeBookStats = {
  totalRecipes: number;
  totalCategories: number;
  totalTags: number;
  difficultyDistribution: Record<string, number>;
  averageCookingTimeMin: number;
  mostUsedCategory: string | null;
  recentlySaved: SavedRecipe[];
};

type SavedRecipeRow = {
  recipeId: string;
  title: string;
  recipeJson: string;
  category: string | null;
  tagsJson: string;
  personalNotes: string | null;
  savedAt: string;
  updatedAt: string;
};

const TagsSchema = z.array(z.string());

function cleanTags(tags: readonly string[] | null | undefined): string[] {
  const out = new Set<string>();
  for (const t of tags ?? []) {
    const v = String(t ?? "").trim();
    if (v) out.add(v);
  }
  return [...out];
}

function cleanCategory(category: string | null | undefined): string | null {
  const v = String(category ?? "").trim();
  return v || null;
}

function parseTags(tagsJson: string): string[] {
  try {
    const parsed = TagsSchema.safeParse(JSON.parse(tagsJson));
    return parsed.success ? parsed.data : [];
  } catch {
    return [];
  }
}

function rowToSaved(row: SavedRecipeRow): SavedRecipe | null {
  let raw: unknown;
  try {
    raw = JSON.parse(row.recipeJson);
  } catch (e) {
    console.warn(`[recipe-book] unreadable recipe ${row.recipeId}:`, e);
    return null;
  }
  const recipe = RecipeSchema.safeParse(raw);
  if (!recipe.success) {
    console.warn(`[recipe-book] recipe ${row.recipeId} does not match schema`);
    return null;
  }

  return {
    ...recipe.data,
    savedAt: row.savedAt,
    updatedAt: row.updatedAt,
    category: row.category ?? DEFAULT_CATEGORY,
    tags: parseTags(row.tagsJson),
    personalNotes: row.personalNotes,
  };
}

function notNull<T>(v: T | null): v is T {
  return v !== null;
}

/**
 * Saved recipes (premium). Reads and deletes are always allowed; saving and
 * editing need `hasAccess()`.
 */
export class RecipeBook {
  constructor(
    private readonly db: Db,
    private readonly hasAccess: () => boolean,
    private readonly now: () => Date = () => new Date()
  ) {}

  hasRecipeBookAccess(): boolean {
    try {
      return this.hasAccess();
    } catch (e) {
      console.warn("[recipe-book] access check failed:", e);
      return false;
    }
  }

  saveRecipe(recipe: Recipe, opts: SaveOptions = {}): SavedRecipe {
    this.requireAccess();
    if (this.isRecipeSaved(recipe.id)) {
      throw new ValidationError("RECIPE_ALREADY_SAVED", `Recipe "${recipe.title}" is already saved.`);
    }

    const ts = this.now().toISOString();
    const category = cleanCategory(opts.category) ?? DEFAULT_CATEGORY;
    const tags = cleanTags(opts.tags);

    this.db
      .prepare(
        `INSERT INTO saved_recipes (recipeId, title, recipeJson, category, tagsJson, personalNotes, savedAt, updatedAt)
         VALUES (?, ?, ?, ?, ?, NULL, ?, ?)`
      )
      .run(recipe.id, recipe.title, JSON.stringify(recipe), category, JSON.stringify(tags), ts, ts);

    console.log(`[recipe-book] saved ${recipe.id}`);
    return { ...recipe, savedAt: ts, updatedAt: ts, category, tags, personalNotes: null };
  }

  getSavedRecipes(): SavedRecipe[] {
    const rows = this.db
      .prepare("SELECT * FROM saved_recipes ORDER BY savedAt DESC, recipeId ASC")
      .all() as SavedRecipeRow[];
    return rows.map(rowToSaved).filter(notNull);
  }

  getRecipeById(recipeId: string): SavedRecipe | null {
    const row = this.db.prepare("SELECT * FROM saved_recipes WHERE recipeId = ?").get(recipeId) as
      | SavedRecipeRow
      | undefined;
    return row ? rowToSaved(row) : null;
  }

  isRecipeSaved(recipeId: string): boolean {
    const row = this.db.prepare("SELECT 1 AS hit FROM saved_recipes WHERE recipeId = ?").get(recipeId);
    return row !== undefined;
  }

  deleteRecipe(recipeId: string): void {
    const info = this.db.prepare("DELETE FROM saved_recipes WHERE recipeId = ?").run(recipeId);
    if (info.changes === 0) throw new ValidationError("RECIPE_NOT_FOUND", `Recipe not found: ${recipeId}`);
    console.log(`[recipe-book] deleted ${recipeId}`);
  }

  /** Case-insensitive match on title, ingredients or tags. Blank query lists everything. */
  searchSavedRecipes(query: string): SavedRecipe[] {
    const q = query.trim().toLowerCase();
    const all = this.getSavedRecipes();
    if (!q) return all;

    return all.filter(
      (r) =>
        r.title.toLowerCase().includes(q) ||
        r.ingredients.some((i) => i.toLowerCase().includes(q)) ||
        r.tags.some((t) => t.toLowerCase().includes(q))
    );
  }

  getRecipesByCategory(category: string): SavedRecipe[] {
    const rows = this.db
      .prepare("SELECT * FROM saved_recipes WHERE category = ? ORDER BY savedAt DESC, recipeId ASC")
      .all(category) as SavedRecipeRow[];
    return rows.map(rowToSaved).filter(notNull);
  }

  getCategories(): string[] {
    return [...new Set(this.getSavedRecipes().map((r) => r.category))].sort();
  }

  getTags(): string[] {
    return [...new Set(this.getSavedRecipes().flatMap((r) => r.tags))].sort();
  }

  updateRecipeMetadata(recipeId: string, patch: MetadataPatch): SavedRecipe {
    this.requireAccess();
    const existing = this.getRecipeById(recipeId);
    if (!existing) throw new ValidationError("RECIPE_NOT_FOUND", `Recipe not found: ${recipeId}`);

    const category = patch.category === undefined ? existing.category : cleanCategory(patch.category) ?? DEFAULT_CATEGORY;
    const tags = patch.tags === undefined ? existing.tags : cleanTags(patch.tags);
    const personalNotes = patch.personalNotes === undefined ? existing.personalNotes : patch.personalNotes;
    const updatedAt = this.now().toISOString();

    this.db
      .prepare(
        `UPDATE saved_recipes SET category = ?, tagsJson = ?, personalNotes = ?, updatedAt = ?
         WHERE recipeId = ?`
      )
      .run(category, JSON.stringify(tags), personalNotes, updatedAt, recipeId);

    return { ...existing, category, tags, personalNotes, updatedAt };
  }

  getStats(): RecipeBookStats {
    const recipes = this.getSavedRecipes();

    const difficultyDistribution: Record<string, number> = {};
    const categoryCount = new Map<string, number>();
    let totalTime = 0;

    for (const r of recipes) {
      difficultyDistribution[r.difficulty] = (difficultyDistribution[r.difficulty] ?? 0) + 1;
      categoryCount.set(r.category, (categoryCount.get(r.category) ?? 0) + 1);
      totalTime += r.cookingTimeMin;
    }

    let mostUsedCategory: string | null = null;
    let max = 0;
    for (const [category, count] of categoryCount) {
      if (count > max) {
        max = count;
        mostUsedCategory = category;
      }
    }

    return {
      totalRecipes: recipes.length,
      totalCategories: this.getCategories().length,
      totalTags: this.getTags().length,
      difficultyDistribution,
      averageCookingTimeMin: recipes.length ? totalTime / recipes.length : 0,
      mostUsedCategory,
      recentlySaved: recipes.slice(0, 5),
    };
  }

  private requireAccess() {
    if (!this.hasRecipeBookAccess()) {
      throw new ValidationError(
        "RECIPE_BOOK_LOCKED",
        "The recipe book needs a Premium or Professional subscription."
      );
    }
  }
}
