import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { openDb, type Db } from "../../db/connection";
import { runMigrations } from "../../db/migrate";
import { ValidationError } from "../../errors";
import { recipe } from "../../testing/fixtures";
import { DEFAULT_CATEGORY, RecipeBook } from "./service";

let db: Db;
let access: boolean;
let tick: number;

function book() {
  // each call to now() is one minute later than the last
  return new RecipeBook(
    db,
    () => access,
    () => new Date(Date.UTC(2026, 0, 1, 12, tick++))
  );
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
  db = openDb(":memory:");
  runMigrations(db);
  access = true;
  tick = 0;
});

afterEach(() => {
  db.close();
});

function codeOf(fn: () => unknown): string | null {
  try {
    fn();
    return null;
  } catch (e) {
    return e instanceof ValidationError ? e.code : "OTHER";
  }
}

describe("RecipeBook", () => {
  it("saves and reads back a recipe with its metadata", () => {
    const b = book();
    const saved = b.saveRecipe(recipe({ id: "a" }), { category: " Dinner ", tags: ["quick", " quick", ""] });

    expect(saved.category).toBe("Dinner");
    expect(saved.tags).toEqual(["quick"]);
    expect(saved.savedAt).toBe("2026-01-01T12:00:00.000Z");
    expect(b.isRecipeSaved("a")).toBe(true);
    expect(b.getRecipeById("a")).toEqual(saved);
    expect(b.getRecipeById("missing")).toBeNull();
  });

  it("defaults the category", () => {
    expect(book().saveRecipe(recipe({ id: "a" })).category).toBe(DEFAULT_CATEGORY);
  });

  it("refuses a duplicate save", () => {
    const b = book();
    b.saveRecipe(recipe({ id: "a" }));
    expect(codeOf(() => b.saveRecipe(recipe({ id: "a" })))).toBe("RECIPE_ALREADY_SAVED");
  });

  it("lists newest first", () => {
    const b = book();
    b.saveRecipe(recipe({ id: "a" }));
    b.saveRecipe(recipe({ id: "b" }));
    b.saveRecipe(recipe({ id: "c" }));
    expect(b.getSavedRecipes().map((r) => r.id)).toEqual(["c", "b", "a"]);
  });

  it("gates saving and editing but not reading or deleting", () => {
    const b = book();
    b.saveRecipe(recipe({ id: "a" }));
    access = false;

    expect(b.hasRecipeBookAccess()).toBe(false);
    expect(codeOf(() => b.saveRecipe(recipe({ id: "b" })))).toBe("RECIPE_BOOK_LOCKED");
    expect(codeOf(() => b.updateRecipeMetadata("a", { tags: ["x"] }))).toBe("RECIPE_BOOK_LOCKED");
    expect(b.getSavedRecipes()).toHaveLength(1);

    b.deleteRecipe("a");
    expect(b.isRecipeSaved("a")).toBe(false);
  });

  it("treats a throwing access check as no access", () => {
    const b = new RecipeBook(db, () => {
      throw new Error("subscription lookup failed");
    });
    expect(b.hasRecipeBookAccess()).toBe(false);
  });

  it("reports unknown ids on delete and update", () => {
    const b = book();
    expect(codeOf(() => b.deleteRecipe("nope"))).toBe("RECIPE_NOT_FOUND");
    expect(codeOf(() => b.updateRecipeMetadata("nope", { category: "x" }))).toBe("RECIPE_NOT_FOUND");
  });

  it("searches title, ingredients and tags case-insensitively", () => {
    const b = book();
    b.saveRecipe(recipe({ id: "soup", title: "Tomato Soup", ingredients: ["tomato", "onion"] }));
    b.saveRecipe(recipe({ id: "rice", title: "Fried rice", ingredients: ["rice", "EGG"] }), { tags: ["Weeknight"] });

    expect(b.searchSavedRecipes("SOUP").map((r) => r.id)).toEqual(["soup"]);
    expect(b.searchSavedRecipes("egg").map((r) => r.id)).toEqual(["rice"]);
    expect(b.searchSavedRecipes("weeknight").map((r) => r.id)).toEqual(["rice"]);
    expect(b.searchSavedRecipes("  ").map((r) => r.id)).toEqual(["rice", "soup"]);
  });

  it("groups by category and lists categories and tags", () => {
    const b = book();
    b.saveRecipe(recipe({ id: "a" }), { category: "Lunch", tags: ["veg", "fast"] });
    b.saveRecipe(recipe({ id: "b" }), { category: "Dinner", tags: ["fast"] });
    b.saveRecipe(recipe({ id: "c" }), { category: "Lunch" });

    expect(b.getRecipesByCategory("Lunch").map((r) => r.id)).toEqual(["c", "a"]);
    expect(b.getCategories()).toEqual(["Dinner", "Lunch"]);
    expect(b.getTags()).toEqual(["fast", "veg"]);
  });

  it("updates only the fields in the patch", () => {
    const b = book();
    b.saveRecipe(recipe({ id: "a" }), { category: "Lunch", tags: ["veg"] });

    const updated = b.updateRecipeMetadata("a", { personalNotes: "less salt" });
    expect(updated.category).toBe("Lunch");
    expect(updated.tags).toEqual(["veg"]);
    expect(updated.personalNotes).toBe("less salt");
    expect(updated.updatedAt).toBe("2026-01-01T12:01:00.000Z");

    b.updateRecipeMetadata("a", { category: "", tags: [] });
    const reread = b.getRecipeById("a");
    expect(reread?.category).toBe(DEFAULT_CATEGORY);
    expect(reread?.tags).toEqual([]);
    expect(reread?.personalNotes).toBe("less salt");
  });

  it("computes stats", () => {
    const b = book();
    b.saveRecipe(recipe({ id: "a", difficulty: "easy", cookingTimeMin: 10 }), { category: "Lunch", tags: ["x"] });
    b.saveRecipe(recipe({ id: "b", difficulty: "hard", cookingTimeMin: 30 }), { category: "Lunch" });
    b.saveRecipe(recipe({ id: "c", difficulty: "easy", cookingTimeMin: 20 }), { category: "Dinner", tags: ["y"] });

    const stats = b.getStats();
    expect(stats.totalRecipes).toBe(3);
    expect(stats.totalCategories).toBe(2);
    expect(stats.totalTags).toBe(2);
    expect(stats.difficultyDistribution).toEqual({ easy: 2, hard: 1 });
    expect(stats.averageCookingTimeMin).toBe(20);
    expect(stats.mostUsedCategory).toBe("Lunch");
    expect(stats.recentlySaved.map((r) => r.id)).toEqual(["c", "b", "a"]);
  });

  it("returns empty stats for an empty book", () => {
    const stats = book().getStats();
    expect(stats.totalRecipes).toBe(0);
    expect(stats.averageCookingTimeMin).toBe(0);
    expect(stats.mostUsedCategory).toBeNull();
  });
});
