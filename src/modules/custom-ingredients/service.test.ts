import { beforeEach, describe, expect, it, vi } from "vitest";
import {
  CustomIngredients,
  HISTORY_KEY,
  INGREDIENTS_KEY,
  categorizeIngredient,
  normalizeIngredientName,
  validateIngredient,
} from "./service";
import { MemoryStorage } from "../storage/memory-store";
import { ValidationError } from "../../errors";

function setup() {
  let minute = 0;
  // each call is one minute later than the last
  const now = () => new Date(Date.UTC(2026, 0, 1, 12, minute++));
  const storage = new MemoryStorage();
  return { storage, ingredients: new CustomIngredients(storage, now) };
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
});

describe("validateIngredient", () => {
  it("rejects bad names with a reason", () => {
    expect(validateIngredient("   ")).toEqual({ isValid: false, error: "Ingredient name cannot be empty" });
    expect(validateIngredient("a")).toEqual({
      isValid: false,
      error: "Ingredient name must be at least 2 characters long",
    });
    expect(validateIngredient("x".repeat(51))).toEqual({
      isValid: false,
      error: "Ingredient name cannot exceed 50 characters",
    });
    expect(validateIngredient("salt & pepper")).toEqual({
      isValid: false,
      error: "Ingredient name contains invalid characters",
    });
    expect(validateIngredient("42")).toEqual({
      isValid: false,
      error: "Ingredient name must contain at least one letter",
    });
  });

  it("normalizes, categorizes and suggests", () => {
    expect(validateIngredient("  olive   OIL ")).toEqual({
      isValid: true,
      normalizedName: "Olive Oil",
      category: "oils",
      suggestions: [],
    });
    expect(validateIngredient("oil")).toEqual({
      isValid: true,
      normalizedName: "Oil",
      category: "oils",
      suggestions: ["Olive Oil", "Vegetable Oil", "Coconut Oil", "Canola Oil", "Sesame Oil"],
    });
  });

  it("allows hyphens, apostrophes and digits", () => {
    expect(validateIngredient("Za'atar").isValid).toBe(true);
    expect(validateIngredient("half-and-half").isValid).toBe(true);
    expect(validateIngredient("7 spice").isValid).toBe(true);
  });
});

describe("helpers", () => {
  it("title-cases each word", () => {
    expect(normalizeIngredientName("green  ONION")).toBe("Green Onion");
  });

  it("falls back to other for unknown ingredients", () => {
    expect(categorizeIngredient("Sumac")).toBe("other");
    expect(categorizeIngredient("Eggs")).toBe("proteins");
  });
});

describe("CustomIngredients", () => {
  it("adds an ingredient with a usage count of one and records it in history", async () => {
    const { ingredients } = setup();
    const added = await ingredients.add(" green onion ");

    expect(added).toEqual({
      name: "Green Onion",
      category: "vegetables",
      addedAt: "2026-01-01T12:00:00.000Z",
      usageCount: 1,
      lastUsedAt: null,
    });
    expect(await ingredients.list()).toEqual([added]);
    expect(await ingredients.history()).toEqual(["Green Onion"]);
  });

  it("refuses duplicates regardless of case", async () => {
    const { ingredients } = setup();
    await ingredients.add("Sumac");

    const err = await ingredients.add("SUMAC").catch((e: unknown) => e);
    expect(err instanceof ValidationError && err.code).toBe("CUSTOM_INGREDIENT_EXISTS");
    expect(err instanceof ValidationError && err.message).toBe('Ingredient "Sumac" is already in your list');
  });

  it("refuses invalid names", async () => {
    const { ingredients } = setup();
    const err = await ingredients.add("!!").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ValidationError);
    expect(err instanceof ValidationError && err.code).toBe("CUSTOM_INGREDIENT_INVALID");
    expect(await ingredients.list()).toEqual([]);
  });

  it("removes by name, case-insensitively", async () => {
    const { ingredients } = setup();
    await ingredients.add("Sumac");

    expect(await ingredients.remove("sumac")).toBe(true);
    expect(await ingredients.remove("sumac")).toBe(false);
    expect(await ingredients.list()).toEqual([]);
  });

  it("searches, groups and counts", async () => {
    const { ingredients } = setup();
    await ingredients.add("Smoked Salmon");
    await ingredients.add("Sumac");
    await ingredients.add("Salmon Roe");

    expect((await ingredients.search("SALMON")).map((i) => i.name)).toEqual(["Smoked Salmon", "Salmon Roe"]);
    expect(await ingredients.search("  ")).toEqual([]);
    expect((await ingredients.byCategory("proteins")).map((i) => i.name)).toEqual(["Smoked Salmon", "Salmon Roe"]);
    expect(await ingredients.categoryCounts()).toEqual({ proteins: 2, other: 1 });
  });

  it("ranks frequent by usage and recent by date added", async () => {
    const { ingredients } = setup();
    await ingredients.add("Sumac");
    await ingredients.add("Tahini");
    await ingredients.add("Harissa");

    expect(await ingredients.recordUsage(["tahini", "harissa", "unknown"])).toBe(2);
    expect(await ingredients.recordUsage(["HARISSA"])).toBe(1);

    expect((await ingredients.frequent()).map((i) => [i.name, i.usageCount])).toEqual([
      ["Harissa", 3],
      ["Tahini", 2],
      ["Sumac", 1],
    ]);
    expect((await ingredients.recent(2)).map((i) => i.name)).toEqual(["Harissa", "Tahini"]);
    expect(await ingredients.history()).toEqual(["Harissa", "Tahini", "Sumac"]);

    const harissa = (await ingredients.list()).find((i) => i.name === "Harissa");
    // three adds, then two usage calls
    expect(harissa?.lastUsedAt).toBe("2026-01-01T12:04:00.000Z");
  });

  it("keeps the history to fifty names", async () => {
    const { ingredients, storage } = setup();
    await storage.saveData(
      HISTORY_KEY,
      Array.from({ length: 50 }, (_, i) => `Old ${i}`)
    );

    await ingredients.add("Sumac");
    const history = await ingredients.history();
    expect(history).toHaveLength(50);
    expect(history[0]).toBe("Sumac");
    expect(history[49]).toBe("Old 48");
  });

  it("suggests frequent entries first, then catalog matches or starters", async () => {
    const { ingredients } = setup();
    expect(await ingredients.suggestions({ limit: 3 })).toEqual(["Onion", "Garlic", "Tomato"]);

    await ingredients.add("Sumac");
    expect(await ingredients.suggestions({ query: "chee" })).toEqual([
      "Sumac",
      "Cheese",
      "Cottage Cheese",
    ]);
    expect((await ingredients.suggestions()).slice(0, 2)).toEqual(["Sumac", "Onion"]);
  });

  it("exports and imports the list, rejecting malformed imports whole", async () => {
    const { ingredients } = setup();
    await ingredients.add("Sumac");
    const exported = await ingredients.exportAll();

    await ingredients.clear();
    expect(await ingredients.list()).toEqual([]);
    expect(await ingredients.history()).toEqual([]);

    expect(await ingredients.importAll(exported)).toBe(1);
    expect(await ingredients.list()).toEqual(exported);

    const err = await ingredients.importAll([{ name: "Bad" }]).catch((e: unknown) => e);
    expect(err instanceof ValidationError && err.code).toBe("CUSTOM_INGREDIENT_IMPORT_INVALID");
    expect(await ingredients.list()).toEqual(exported);
  });

  it("treats an unreadable stored list as empty", async () => {
    const { ingredients, storage } = setup();
    await storage.saveData(INGREDIENTS_KEY, { not: "a list" });

    expect(await ingredients.list()).toEqual([]);
  });

  it("applies concurrent adds one after another", async () => {
    const { ingredients } = setup();
    await Promise.all([ingredients.add("Sumac"), ingredients.add("Tahini"), ingredients.add("Harissa")]);

    expect((await ingredients.list()).map((i) => i.name)).toEqual(["Sumac", "Tahini", "Harissa"]);
  });
});
