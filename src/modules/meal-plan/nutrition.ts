import type { NutritionInfo } from "../recipes/types";
import type { DailyNutrients, NutritionGoals, NutritionProgress, PlannedMeal } from "./types";

/** Nutrition for `servings` portions; calories are rounded. */
export function scaleNutrition(n: NutritionInfo, servings: number): NutritionInfo {
  return {
    calories: Math.round(n.calories * servings),
    protein: n.protein * servings,
    carbohydrates: n.carbohydrates * servings,
    fat: n.fat * servings,
    fiber: n.fiber * servings,
    sugar: n.sugar * servings,
    sodium: n.sodium * servings,
    servingSize: `${servings}x ${n.servingSize}`,
  };
}

function percent(value: number, goal: number) {
  if (goal <= 0) return 0;
  return Math.min(200, Math.max(0, (value / goal) * 100));
}

export function calculateProgress(day: Omit<DailyNutrients, "goalProgress">, goals: NutritionGoals): NutritionProgress {
  return {
    caloriesProgress: percent(day.totalCalories, goals.dailyCalories),
    proteinProgress: percent(day.totalProtein, goals.dailyProtein),
    carbsProgress: percent(day.totalCarbohydrates, goals.dailyCarbohydrates),
    fatProgress: percent(day.totalFat, goals.dailyFat),
    fiberProgress: percent(day.totalFiber, goals.dailyFiber),
    sodiumProgress: percent(day.totalSodium, goals.dailySodium),
  };
}

/** Totals for the meals planned on `date`; meals without nutrition count as zero. */
export function dailyNutrients(date: string, meals: readonly PlannedMeal[], goals: NutritionGoals): DailyNutrients {
  const day = {
    date,
    totalCalories: 0,
    totalProtein: 0,
    totalCarbohydrates: 0,
    totalFat: 0,
    totalFiber: 0,
    totalSugar: 0,
    totalSodium: 0,
  };

  for (const meal of meals) {
    if (meal.date !== date || !meal.nutrition) continue;
    const n = scaleNutrition(meal.nutrition, meal.servings);
    day.totalCalories += n.calories;
    day.totalProtein += n.protein;
    day.totalCarbohydrates += n.carbohydrates;
    day.totalFat += n.fat;
    day.totalFiber += n.fiber;
    day.totalSugar += n.sugar;
    day.totalSodium += n.sodium;
  }

  return { ...day, goalProgress: calculateProgress(day, goals) };
}
