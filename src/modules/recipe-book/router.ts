import { Router } from "express";
import { z } from "zod";
import { ValidationError } from "../../errors";
import { apiOk } from "../../middleware/respond";
import { parseBody } from "../../middleware/validate";
import { RecipeSchema } from "../recipes/types";
import type { RecipeBook } from "./service";

const SaveBodySchema = z.object({
  recipe: RecipeSchema,
  category: z.string().max(60).nullish(),
  tags: z.array(z.string().max(40)).max(20).nullish(),
});

const PatchBodySchema = z.object({
  category: z.string().max(60).nullish(),
  tags: z.array(z.string().max(40)).max(20).nullish(),
  personalNotes: z.string().max(2000).nullish(),
});

export function recipeBookRouter(book: RecipeBook) {
  const r = Router();

  // GET /v1/recipe-book?q=&category=
  r.get("/", (req, res) => {
    const q = typeof req.query.q === "string" ? req.query.q : "";
    const category = typeof req.query.category === "string" ? req.query.category : "";

    const recipes = category ? book.getRecipesByCategory(category) : book.searchSavedRecipes(q);
    res.json(apiOk(req, { recipes, hasAccess: book.hasRecipeBookAccess() }));
  });

  r.get("/categories", (req, res) => {
    res.json(apiOk(req, { categories: book.getCategories() }));
  });

  r.get("/tags", (req, res) => {
    res.json(apiOk(req, { tags: book.getTags() }));
  });

  r.get("/stats", (req, res) => {
    res.json(apiOk(req, book.getStats()));
  });

  r.get("/:recipeId", (req, res) => {
    const recipe = book.getRecipeById(req.params.recipeId);
    if (!recipe) throw new ValidationError("RECIPE_NOT_FOUND", `Recipe not found: ${req.params.recipeId}`);
    res.json(apiOk(req, { recipe }));
  });

  // POST /v1/recipe-book  Body: { recipe, category?, tags? }
  r.post("/", (req, res) => {
    const body = parseBody(SaveBodySchema, req.body);
    const recipe = book.saveRecipe(body.recipe, { category: body.category, tags: body.tags });
    res.status(201).json(apiOk(req, { recipe }));
  });

  // PATCH /v1/recipe-book/:recipeId  Body: { category?, tags?, personalNotes? }
  r.patch("/:recipeId", (req, res) => {
    const patch = parseBody(PatchBodySchema, req.body);
    const recipe = book.updateRecipeMetadata(req.params.recipeId, patch);
    res.json(apiOk(req, { recipe }));
  });

  r.delete("/:recipeId", (req, res) => {
    book.deleteRecipe(req.params.recipeId);
    res.json(apiOk(req, { deleted: req.params.recipeId }));
  });

  return r;
}
