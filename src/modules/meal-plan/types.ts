import { z } from "zod";
import type { NutritionInfo } from "../recipes/types";

export const MEAL_TYPES = ["breakfast", "lunch", "dinner", "snack"] as const;
export type MealType = (typeof MEAL_TYPES)[number];

export const PLAN_TYPES = ["weekly", "monthly", "custom"] as const;
export type MealPlanType = (typeof PLAN_TYPES)[number];

export const NutritionGoalsSchema = z.object({
  dailyCalories: z.number().nonnegative(),
  dailyProtein: z.number().nonnegative(),
  dailyCarbohydrates: z.number().nonnegative(),
  dailyFat: z.number().nonnegative(),
  dailyFiber: z.number().nonnegative(),
  dailySodium: z.number().nonnegative(),
});

export type NutritionGoals = z.infer<typeof NutritionGoalsSchema>;

/** An average adult's day. */
export const DEFAULT_NUTRITION_GOALS: NutritionGoals = Object.freeze({
  dailyCalories: 2000,
  dailyProtein: 50,
  dailyCarbohydrates: 300,
  dailyFat: 65,
  dailyFiber: 25,
  dailySodium: 2300,
});

/** Percent of each goal reached, clamped to 0..200. */
export type NutritionProgress = {
  caloriesProgress: number;
  proteinProgress: number;
  carbsProgress: number;
  fatProgress: number;
  fiberProgress: number;
  sodiumProgress: number;
};

export type DailyNutrients = {
  date: string;
  totalCalories: number;
  totalProtein: number;
  totalCarbohydrates: number;
  totalFat: number;
  totalFiber: number;
  totalSugar: number;
  totalSodium: number;
  goalProgress: NutritionProgress;
};

export type PlannedMeal = {
  id: string;
  planId: string;
  date: string;
  mealType: MealType;
  recipeId: string;
  recipeTitle: string;
  servings: number;
  /** Per serving; null when unknown. */
  nutrition: NutritionInfo | null;
  createdAt: string;
};

export type MealPlan = {
  id: string;
  name: string;
  type: MealPlanType;
  startDate: string;
  endDate: string;
  createdAt: string;
  updatedAt: string;
  meals: PlannedMeal[];
  dailyNutrients: DailyNutrients[];
};

export type NewMealPlan = {
  name: string;
  startDate: string;
  type: MealPlanType;
  /** Custom plans only; defaults to a week. */
  endDate?: string | null;
};

export type NewPlannedMeal = {
  date: string;
  mealType: MealType;
  recipeId: string;
  recipeTitle?: string | null;
  servings?: number | null;
  nutrition?: NutritionInfo | null;
};

export type PlannedMealPatch = {
  date?: string;
  mealType?: MealType;
  servings?: number;
};

export type ShoppingListItem = {
  ingredient: string;
  quantity: string;
  unit: string;
  usedInRecipes: string[];
  isChecked: boolean;
};

export type ShoppingList = {
  id: string;
  planId: string;
  planName: string;
  startDate: string;
  endDate: string;
  generatedAt: string;
  items: ShoppingListItem[];
};

export type MealPlanningStats = {
  totalMealPlans: number;
  totalMeals: number;
  uniqueRecipes: number;
  totalShoppingLists: number;
  mealTypeDistribution: Record<MealType, number>;
  mostActivePlanId: string | null;
  averageMealsPerPlan: number;
};
