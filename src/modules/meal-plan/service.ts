import crypto from "node:crypto";
import type { Db } from "../../db/connection";
import { ValidationError } from "../../errors";
import type { RecipeBook, SavedRecipe } from "../recipe-book/service";
import { NutritionInfoSchema, type NutritionInfo } from "../recipes/types";
import { addDays, datesBetween, endOfMonth, isIsoDate } from "./dates";
import { dailyNutrients } from "./nutrition";
import { buildShoppingItems, itemKey } from "./shopping";
import {
  DEFAULT_NUTRITION_GOALS,
  NutritionGoalsSchema,
  type DailyNutrients,
  type MealPlan,
  type MealPlanningStats,
  type MealPlanType,
  type MealType,
  type NewMealPlan,
  type NewPlannedMeal,
  type NutritionGoals,
  type NutritionProgress,
  type PlannedMeal,
  type PlannedMealPatch,
  type ShoppingList,
} from "./types";

export type RecipeLookup = Pick<RecipeBook, "getRecipeById" | "getSavedRecipes">;

type PlanRow = {
  id: string;
  name: string;
  type: MealPlanType;
  startDate: string;
  endDate: string;
  createdAt: string;
  updatedAt: string;
};

type MealRow = {
  id: string;
  planId: string;
  date: string;
  mealType: MealType;
  recipeId: string;
  recipeTitle: string;
  servings: number;
  nutritionJson: string | null;
  createdAt: string;
};

type ListRow = {
  id: string;
  planId: string;
  planName: string;
  startDate: string;
  endDate: string;
  generatedAt: string;
};

type ItemRow = {
  itemKey: string;
  ingredient: string;
  quantity: string;
  unit: string;
  usedInJson: string;
  checked: number;
};

/** Suggestion limits per meal: minutes at most, calories per serving at most. */
const SUGGESTION_LIMITS: Record<MealType, { maxMinutes: number; maxCalories: number }> = {
  breakfast: { maxMinutes: 30, maxCalories: 600 },
  lunch: { maxMinutes: 45, maxCalories: 800 },
  dinner: { maxMinutes: 90, maxCalories: 1000 },
  snack: { maxMinutes: 15, maxCalories: 300 },
};

const MEAL_ORDER = `CASE mealType WHEN 'breakfast' THEN 0 WHEN 'lunch' THEN 1 WHEN 'dinner' THEN 2 ELSE 3 END`;

function parseJson(text: string, what: string): unknown {
  try {
    return JSON.parse(text);
  } catch (e) {
    console.warn(`[meal-plan] unreadable ${what}:`, e);
    return null;
  }
}

function rowToMeal(row: MealRow): PlannedMeal {
  let nutrition: NutritionInfo | null = null;
  if (row.nutritionJson) {
    const parsed = NutritionInfoSchema.safeParse(parseJson(row.nutritionJson, `nutrition of meal ${row.id}`));
    nutrition = parsed.success ? parsed.data : null;
  }
  return {
    id: row.id,
    planId: row.planId,
    date: row.date,
    mealType: row.mealType,
    recipeId: row.recipeId,
    recipeTitle: row.recipeTitle,
    servings: row.servings,
    nutrition,
    createdAt: row.createdAt,
  };
}

function usedIn(json: string): string[] {
  const raw = parseJson(json, "shopping item recipes");
  return Array.isArray(raw) ? raw.filter((v): v is string => typeof v === "string") : [];
}

function requireDate(value: string, field: string) {
  if (!isIsoDate(value)) {
    throw new ValidationError("MEAL_PLAN_INVALID_DATE", `${field} must be a date written as YYYY-MM-DD.`);
  }
}

function requireServings(servings: number) {
  if (!Number.isInteger(servings) || servings < 1 || servings > 50) {
    throw new ValidationError("MEAL_PLAN_INVALID_SERVINGS", "Servings must be a whole number from 1 to 50.");
  }
}

function planNotFound(planId: string) {
  return new ValidationError("MEAL_PLAN_NOT_FOUND", `Meal plan not found: ${planId}`);
}

/**
 * Meal plans, their planned meals, daily nutrition against goals, and
 * shopping lists built from saved recipes (professional). Reads and deletes
 * are always allowed; creating and editing need `hasAccess()`.
 */
export class MealPlanner {
  constructor(
    private readonly db: Db,
    private readonly hasAccess: () => boolean,
    private readonly recipes: RecipeLookup,
    private readonly now: () => Date = () => new Date()
  ) {}

  hasMealPlanningAccess(): boolean {
    try {
      return this.hasAccess();
    } catch (e) {
      console.warn("[meal-plan] access check failed:", e);
      return false;
    }
  }

  createMealPlan(input: NewMealPlan): MealPlan {
    this.requireAccess();

    const name = input.name.trim();
    if (!name) throw new ValidationError("MEAL_PLAN_INVALID_NAME", "Meal plan name cannot be empty.");
    requireDate(input.startDate, "startDate");

    let endDate: string;
    switch (input.type) {
      case "monthly":
        endDate = endOfMonth(input.startDate);
        break;
      case "custom":
        endDate = input.endDate ?? addDays(input.startDate, 6);
        requireDate(endDate, "endDate");
        if (endDate < input.startDate) {
          throw new ValidationError("MEAL_PLAN_INVALID_DATE", "endDate cannot be before startDate.");
        }
        break;
      case "weekly":
      default:
        endDate = addDays(input.startDate, 6);
    }

    const id = crypto.randomUUID();
    const ts = this.now().toISOString();
    this.db
      .prepare(
        `INSERT INTO meal_plans (id, name, type, startDate, endDate, createdAt, updatedAt)
         VALUES (?, ?, ?, ?, ?, ?, ?)`
      )
      .run(id, name, input.type, input.startDate, endDate, ts, ts);

    console.log(`[meal-plan] created ${id} (${input.startDate}..${endDate})`);
    return this.hydrate({ id, name, type: input.type, startDate: input.startDate, endDate, createdAt: ts, updatedAt: ts });
  }

  getMealPlans(): MealPlan[] {
    const rows = this.db.prepare("SELECT * FROM meal_plans ORDER BY createdAt DESC, id ASC").all() as PlanRow[];
    return rows.map((r) => this.hydrate(r));
  }

  getMealPlan(planId: string): MealPlan | null {
    const row = this.planRow(planId);
    return row ? this.hydrate(row) : null;
  }

  /** Shopping lists of the plan go with it. */
  deleteMealPlan(planId: string): void {
    const info = this.db.prepare("DELETE FROM meal_plans WHERE id = ?").run(planId);
    if (info.changes === 0) throw planNotFound(planId);
    console.log(`[meal-plan] deleted ${planId}`);
  }

  /**
   * Plan a meal. A meal already planned for the same date and meal type is
   * replaced. Title and nutrition default to the saved recipe's.
   */
  addMealToPlan(planId: string, input: NewPlannedMeal): PlannedMeal {
    this.requireAccess();
    const plan = this.requirePlan(planId);
    this.requireInPlan(plan, input.date);

    const servings = input.servings ?? 1;
    requireServings(servings);

    const saved = this.recipes.getRecipeById(input.recipeId);
    const recipeTitle = input.recipeTitle?.trim() || saved?.title;
    if (!recipeTitle) {
      throw new ValidationError("RECIPE_NOT_FOUND", `Recipe not found: ${input.recipeId}`);
    }
    const nutrition = input.nutrition ?? saved?.nutrition ?? null;

    const meal: PlannedMeal = {
      id: crypto.randomUUID(),
      planId,
      date: input.date,
      mealType: input.mealType,
      recipeId: input.recipeId,
      recipeTitle,
      servings,
      nutrition,
      createdAt: this.now().toISOString(),
    };

    this.db.transaction(() => {
      this.db
        .prepare("DELETE FROM planned_meals WHERE planId = ? AND date = ? AND mealType = ?")
        .run(planId, meal.date, meal.mealType);
      this.db
        .prepare(
          `INSERT INTO planned_meals (id, planId, date, mealType, recipeId, recipeTitle, servings, nutritionJson, createdAt)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`
        )
        .run(
          meal.id,
          planId,
          meal.date,
          meal.mealType,
          meal.recipeId,
          meal.recipeTitle,
          meal.servings,
          nutrition ? JSON.stringify(nutrition) : null,
          meal.createdAt
        );
      this.touch(planId);
    })();

    return meal;
  }

  /** Move or resize a planned meal; a meal already in the target slot is replaced. */
  updateMealInPlan(planId: string, mealId: string, patch: PlannedMealPatch): PlannedMeal {
    this.requireAccess();
    const plan = this.requirePlan(planId);
    const existing = this.mealRow(planId, mealId);
    if (!existing) throw new ValidationError("MEAL_NOT_FOUND", `Meal not found: ${mealId}`);

    const date = patch.date ?? existing.date;
    const mealType = patch.mealType ?? existing.mealType;
    const servings = patch.servings ?? existing.servings;
    this.requireInPlan(plan, date);
    requireServings(servings);

    this.db.transaction(() => {
      this.db
        .prepare("DELETE FROM planned_meals WHERE planId = ? AND date = ? AND mealType = ? AND id != ?")
        .run(planId, date, mealType, mealId);
      this.db
        .prepare("UPDATE planned_meals SET date = ?, mealType = ?, servings = ? WHERE id = ?")
        .run(date, mealType, servings, mealId);
      this.touch(planId);
    })();

    return rowToMeal({ ...existing, date, mealType, servings });
  }

  removeMealFromPlan(planId: string, mealId: string): void {
    this.requirePlan(planId);
    const info = this.db.prepare("DELETE FROM planned_meals WHERE planId = ? AND id = ?").run(planId, mealId);
    if (info.changes === 0) throw new ValidationError("MEAL_NOT_FOUND", `Meal not found: ${mealId}`);
    this.touch(planId);
  }

  calculateDailyNutrients(planId: string, date: string): DailyNutrients {
    this.requirePlan(planId);
    requireDate(date, "date");
    return dailyNutrients(date, this.meals(planId), this.getNutritionGoals());
  }

  getNutritionProgress(planId: string, date: string): NutritionProgress {
    return this.calculateDailyNutrients(planId, date).goalProgress;
  }

  getNutritionGoals(): NutritionGoals {
    const row = this.db.prepare("SELECT goalsJson FROM nutrition_goals WHERE id = 1").get() as
      | { goalsJson: string }
      | undefined;
    if (!row) return { ...DEFAULT_NUTRITION_GOALS };

    const parsed = NutritionGoalsSchema.safeParse(parseJson(row.goalsJson, "nutrition goals"));
    return parsed.success ? parsed.data : { ...DEFAULT_NUTRITION_GOALS };
  }

  setNutritionGoals(goals: NutritionGoals): NutritionGoals {
    this.requireAccess();
    const parsed = NutritionGoalsSchema.safeParse(goals);
    if (!parsed.success) {
      throw new ValidationError("NUTRITION_GOALS_INVALID", "Nutrition goals must be non-negative numbers.");
    }

    this.db
      .prepare(
        `INSERT INTO nutrition_goals (id, goalsJson, updatedAt) VALUES (1, ?, ?)
         ON CONFLICT(id) DO UPDATE SET goalsJson = excluded.goalsJson, updatedAt = excluded.updatedAt`
      )
      .run(JSON.stringify(parsed.data), this.now().toISOString());
    return parsed.data;
  }

  /**
   * Shopping list for the meals between `startDate` and `endDate` (the
   * plan's own range by default). Meals whose recipe is not in the recipe
   * book contribute nothing.
   */
  generateShoppingList(planId: string, range: { startDate?: string | null; endDate?: string | null } = {}): ShoppingList {
    this.requireAccess();
    const plan = this.requirePlan(planId);
    const startDate = range.startDate ?? plan.startDate;
    const endDate = range.endDate ?? plan.endDate;
    requireDate(startDate, "startDate");
    requireDate(endDate, "endDate");

    const recipes: SavedRecipe[] = [];
    for (const meal of this.meals(planId)) {
      if (meal.date < startDate || meal.date > endDate) continue;
      const recipe = this.recipes.getRecipeById(meal.recipeId);
      if (!recipe) {
        console.warn(`[meal-plan] recipe ${meal.recipeId} is not saved; left off the shopping list`);
        continue;
      }
      recipes.push(recipe);
    }

    const list: ShoppingList = {
      id: crypto.randomUUID(),
      planId,
      planName: plan.name,
      startDate,
      endDate,
      generatedAt: this.now().toISOString(),
      items: buildShoppingItems(recipes),
    };

    this.db.transaction(() => {
      this.db
        .prepare(
          `INSERT INTO shopping_lists (id, planId, planName, startDate, endDate, generatedAt)
           VALUES (?, ?, ?, ?, ?, ?)`
        )
        .run(list.id, planId, list.planName, startDate, endDate, list.generatedAt);

      const insert = this.db.prepare(
        `INSERT INTO shopping_list_items (listId, itemKey, position, ingredient, quantity, unit, usedInJson, checked)
         VALUES (?, ?, ?, ?, ?, ?, ?, 0)`
      );
      list.items.forEach((item, i) => {
        insert.run(list.id, itemKey(item.ingredient), i, item.ingredient, item.quantity, item.unit, JSON.stringify(item.usedInRecipes));
      });
    })();

    console.log(`[meal-plan] shopping list ${list.id}: ${list.items.length} items`);
    return list;
  }

  getShoppingLists(): ShoppingList[] {
    const rows = this.db.prepare("SELECT * FROM shopping_lists ORDER BY generatedAt DESC, id ASC").all() as ListRow[];
    return rows.map((r) => this.hydrateList(r));
  }

  getShoppingList(listId: string): ShoppingList | null {
    const row = this.db.prepare("SELECT * FROM shopping_lists WHERE id = ?").get(listId) as ListRow | undefined;
    return row ? this.hydrateList(row) : null;
  }

  setShoppingItemChecked(listId: string, ingredient: string, checked: boolean): ShoppingList {
    this.requireAccess();
    if (!this.getShoppingList(listId)) {
      throw new ValidationError("SHOPPING_LIST_NOT_FOUND", `Shopping list not found: ${listId}`);
    }

    const info = this.db
      .prepare("UPDATE shopping_list_items SET checked = ? WHERE listId = ? AND itemKey = ?")
      .run(checked ? 1 : 0, listId, itemKey(ingredient));
    if (info.changes === 0) {
      throw new ValidationError("SHOPPING_ITEM_NOT_FOUND", `Item not on the list: ${ingredient}`);
    }

    const updated = this.getShoppingList(listId);
    if (!updated) throw new ValidationError("SHOPPING_LIST_NOT_FOUND", `Shopping list not found: ${listId}`);
    return updated;
  }

  deleteShoppingList(listId: string): void {
    const info = this.db.prepare("DELETE FROM shopping_lists WHERE id = ?").run(listId);
    if (info.changes === 0) {
      throw new ValidationError("SHOPPING_LIST_NOT_FOUND", `Shopping list not found: ${listId}`);
    }
  }

  /** Saved recipes quick and light enough for the meal type, in recipe-book order. */
  getSuggestedRecipes(mealType: MealType, limit = 10) {
    const { maxMinutes, maxCalories } = SUGGESTION_LIMITS[mealType];
    return this.recipes
      .getSavedRecipes()
      .filter((r) => r.cookingTimeMin <= maxMinutes && r.nutrition.calories <= maxCalories)
      .slice(0, Math.max(0, limit));
  }

  getStats(): MealPlanningStats {
    const plans = this.getMealPlans();
    const totalShoppingLists = (this.db.prepare("SELECT COUNT(*) AS n FROM shopping_lists").get() as { n: number }).n;

    const mealTypeDistribution: Record<MealType, number> = { breakfast: 0, lunch: 0, dinner: 0, snack: 0 };
    const recipeIds = new Set<string>();
    let totalMeals = 0;
    let mostActivePlanId: string | null = null;
    let maxMeals = 0;

    for (const plan of plans) {
      totalMeals += plan.meals.length;
      for (const meal of plan.meals) {
        recipeIds.add(meal.recipeId);
        mealTypeDistribution[meal.mealType]++;
      }
      if (plan.meals.length > maxMeals) {
        maxMeals = plan.meals.length;
        mostActivePlanId = plan.id;
      }
    }

    return {
      totalMealPlans: plans.length,
      totalMeals,
      uniqueRecipes: recipeIds.size,
      totalShoppingLists,
      mealTypeDistribution,
      mostActivePlanId,
      averageMealsPerPlan: plans.length ? totalMeals / plans.length : 0,
    };
  }

  private hydrate(row: PlanRow): MealPlan {
    const meals = this.meals(row.id);
    const goals = this.getNutritionGoals();
    return {
      ...row,
      meals,
      dailyNutrients: datesBetween(row.startDate, row.endDate).map((d) => dailyNutrients(d, meals, goals)),
    };
  }

  private hydrateList(row: ListRow): ShoppingList {
    const items = this.db
      .prepare("SELECT * FROM shopping_list_items WHERE listId = ? ORDER BY position ASC")
      .all(row.id) as ItemRow[];
    return {
      ...row,
      items: items.map((i) => ({
        ingredient: i.ingredient,
        quantity: i.quantity,
        unit: i.unit,
        usedInRecipes: usedIn(i.usedInJson),
        isChecked: i.checked === 1,
      })),
    };
  }

  private meals(planId: string): PlannedMeal[] {
    const rows = this.db
      .prepare(`SELECT * FROM planned_meals WHERE planId = ? ORDER BY date ASC, ${MEAL_ORDER}, createdAt ASC`)
      .all(planId) as MealRow[];
    return rows.map(rowToMeal);
  }

  private planRow(planId: string): PlanRow | undefined {
    return this.db.prepare("SELECT * FROM meal_plans WHERE id = ?").get(planId) as PlanRow | undefined;
  }

  private mealRow(planId: string, mealId: string): MealRow | undefined {
    return this.db.prepare("SELECT * FROM planned_meals WHERE planId = ? AND id = ?").get(planId, mealId) as
      | MealRow
      | undefined;
  }

  private requirePlan(planId: string): PlanRow {
    const row = this.planRow(planId);
    if (!row) throw planNotFound(planId);
    return row;
  }

  private requireInPlan(plan: PlanRow, date: string) {
    requireDate(date, "date");
    if (date < plan.startDate || date > plan.endDate) {
      throw new ValidationError(
        "MEAL_DATE_OUT_OF_RANGE",
        `Date ${date} is outside the plan (${plan.startDate} to ${plan.endDate}).`
      );
    }
  }

  private touch(planId: string) {
    this.db.prepare("UPDATE meal_plans SET updatedAt = ? WHERE id = ?").run(this.now().toISOString(), planId);
  }

  private requireAccess() {
    if (!this.hasMealPlanningAccess()) {
      throw new ValidationError("MEAL_PLANNING_LOCKED", "Meal planning needs a Professional subscription.");
    }
  }
}
