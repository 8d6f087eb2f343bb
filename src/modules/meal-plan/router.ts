import { Router } from "express";
import { z } from "zod";
import { queryInt } from "../../config/runtime";
import { ValidationError } from "../../errors";
import { apiOk } from "../../middleware/respond";
import { parseBody } from "../../middleware/validate";
import { NutritionInfoSchema } from "../recipes/types";
import type { MealPlanner } from "./service";
import { MEAL_TYPES, NutritionGoalsSchema, PLAN_TYPES } from "./types";

const PlanBodySchema = z.object({
  name: z.string().max(100),
  startDate: z.string(),
  type: z.enum(PLAN_TYPES).default("weekly"),
  endDate: z.string().nullish(),
});

const MealBodySchema = z.object({
  date: z.string(),
  mealType: z.enum(MEAL_TYPES),
  recipeId: z.string().min(1),
  recipeTitle: z.string().max(200).nullish(),
  servings: z.number().nullish(),
  nutrition: NutritionInfoSchema.nullish(),
});

const MealPatchSchema = z.object({
  date: z.string().optional(),
  mealType: z.enum(MEAL_TYPES).optional(),
  servings: z.number().optional(),
});

const ShoppingBodySchema = z.object({
  startDate: z.string().nullish(),
  endDate: z.string().nullish(),
});

const CheckBodySchema = z.object({ ingredient: z.string().min(1), checked: z.boolean() });

const MealTypeSchema = z.enum(MEAL_TYPES);

function requireDay(value: unknown): string {
  if (typeof value !== "string" || !value) {
    throw new ValidationError("MEAL_PLAN_INVALID_DATE", "Query parameter `date` is required.");
  }
  return value;
}

export function mealPlanRouter(planner: MealPlanner) {
  const r = Router();

  r.get("/", (req, res) => {
    res.json(apiOk(req, { plans: planner.getMealPlans(), hasAccess: planner.hasMealPlanningAccess() }));
  });

  r.get("/stats", (req, res) => {
    res.json(apiOk(req, planner.getStats()));
  });

  r.get("/goals", (req, res) => {
    res.json(apiOk(req, { goals: planner.getNutritionGoals() }));
  });

  r.put("/goals", (req, res) => {
    const goals = planner.setNutritionGoals(parseBody(NutritionGoalsSchema, req.body));
    res.json(apiOk(req, { goals }));
  });

  // GET /v1/meal-plans/suggestions?mealType=&limit=
  r.get("/suggestions", (req, res) => {
    const mealType = MealTypeSchema.safeParse(req.query.mealType);
    if (!mealType.success) {
      throw new ValidationError("INVALID_QUERY", `mealType must be one of: ${MEAL_TYPES.join(", ")}`);
    }
    const limit = queryInt(req.query.limit, 10, { min: 1, max: 50 });
    res.json(apiOk(req, { recipes: planner.getSuggestedRecipes(mealType.data, limit) }));
  });

  r.get("/shopping-lists", (req, res) => {
    res.json(apiOk(req, { lists: planner.getShoppingLists() }));
  });

  r.get("/shopping-lists/:listId", (req, res) => {
    const list = planner.getShoppingList(req.params.listId);
    if (!list) throw new ValidationError("SHOPPING_LIST_NOT_FOUND", `Shopping list not found: ${req.params.listId}`);
    res.json(apiOk(req, { list }));
  });

  // PATCH /v1/meal-plans/shopping-lists/:listId/items  Body: { ingredient, checked }
  r.patch("/shopping-lists/:listId/items", (req, res) => {
    const body = parseBody(CheckBodySchema, req.body);
    const list = planner.setShoppingItemChecked(req.params.listId, body.ingredient, body.checked);
    res.json(apiOk(req, { list }));
  });

  r.delete("/shopping-lists/:listId", (req, res) => {
    planner.deleteShoppingList(req.params.listId);
    res.json(apiOk(req, { deleted: req.params.listId }));
  });

  // POST /v1/meal-plans  Body: { name, startDate, type?, endDate? }
  r.post("/", (req, res) => {
    const body = parseBody(PlanBodySchema, req.body);
    res.status(201).json(apiOk(req, { plan: planner.createMealPlan(body) }));
  });

  r.get("/:planId", (req, res) => {
    const plan = planner.getMealPlan(req.params.planId);
    if (!plan) throw new ValidationError("MEAL_PLAN_NOT_FOUND", `Meal plan not found: ${req.params.planId}`);
    res.json(apiOk(req, { plan }));
  });

  r.delete("/:planId", (req, res) => {
    planner.deleteMealPlan(req.params.planId);
    res.json(apiOk(req, { deleted: req.params.planId }));
  });

  // GET /v1/meal-plans/:planId/nutrition?date=YYYY-MM-DD
  r.get("/:planId/nutrition", (req, res) => {
    res.json(apiOk(req, planner.calculateDailyNutrients(req.params.planId, requireDay(req.query.date))));
  });

  // POST /v1/meal-plans/:planId/meals  Body: { date, mealType, recipeId, recipeTitle?, servings?, nutrition? }
  r.post("/:planId/meals", (req, res) => {
    const body = parseBody(MealBodySchema, req.body);
    res.status(201).json(apiOk(req, { meal: planner.addMealToPlan(req.params.planId, body) }));
  });

  // PATCH /v1/meal-plans/:planId/meals/:mealId  Body: { date?, mealType?, servings? }
  r.patch("/:planId/meals/:mealId", (req, res) => {
    const patch = parseBody(MealPatchSchema, req.body);
    res.json(apiOk(req, { meal: planner.updateMealInPlan(req.params.planId, req.params.mealId, patch) }));
  });

  r.delete("/:planId/meals/:mealId", (req, res) => {
    planner.removeMealFromPlan(req.params.planId, req.params.mealId);
    res.json(apiOk(req, { deleted: req.params.mealId }));
  });

  // POST /v1/meal-plans/:planId/shopping-list  Body: { startDate?, endDate? }
  r.post("/:planId/shopping-list", (req, res) => {
    const range = parseBody(ShoppingBodySchema, req.body ?? {});
    res.status(201).json(apiOk(req, { list: planner.generateShoppingList(req.params.planId, range) }));
  });

  return r;
}
