import { describe, expect, it } from "vitest";
import { addDays, datesBetween, endOfMonth, isIsoDate } from "./dates";
import { calculateProgress, scaleNutrition } from "./nutrition";
import { recipe } from "../../testing/fixtures";
import { DEFAULT_NUTRITION_GOALS } from "./types";

describe("dates", () => {
  it("accepts only real calendar dates", () => {
    expect(isIsoDate("2028-02-29")).toBe(true);
    expect(isIsoDate("2026-02-29")).toBe(false);
    expect(isIsoDate("2026-3-1")).toBe(false);
  });

  it("steps across months and years", () => {
    expect(addDays("2026-12-29", 6)).toBe("2027-01-04");
    expect(endOfMonth("2026-04-15")).toBe("2026-04-30");
    expect(endOfMonth("2026-12-01")).toBe("2026-12-31");
    expect(datesBetween("2026-02-27", "2026-03-01")).toEqual(["2026-02-27", "2026-02-28", "2026-03-01"]);
    expect(datesBetween("2026-03-02", "2026-03-01")).toEqual([]);
  });
});

describe("nutrition", () => {
  it("scales a serving", () => {
    const n = scaleNutrition({ ...recipe().nutrition, calories: 333.4 }, 3);
    expect(n.calories).toBe(1000);
    expect(n.protein).toBe(42);
    expect(n.servingSize).toBe("3x 1 bowl");
  });

  it("clamps progress and ignores zero goals", () => {
    const day = {
      date: "2026-03-02",
      totalCalories: 5000,
      totalProtein: 25,
      totalCarbohydrates: 0,
      totalFat: 0,
      totalFiber: 10,
      totalSugar: 0,
      totalSodium: 0,
    };
    const progress = calculateProgress(day, { ...DEFAULT_NUTRITION_GOALS, dailyFiber: 0 });

    expect(progress.caloriesProgress).toBe(200);
    expect(progress.proteinProgress).toBe(50);
    expect(progress.fiberProgress).toBe(0);
  });
});
