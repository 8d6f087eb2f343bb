import { Router } from "express";
import { z } from "zod";
import { queryInt } from "../../config/runtime";
import { ValidationError } from "../../errors";
import { apiOk } from "../../middleware/respond";
import { parseBody } from "../../middleware/validate";
import type { CustomIngredients } from "./service";

const NameBodySchema = z.object({ name: z.string().max(200) });
const UsageBodySchema = z.object({ names: z.array(z.string().max(200)).max(100) });
const ImportBodySchema = z.object({ ingredients: z.array(z.unknown()).max(1000) });

const str = (v: unknown) => (typeof v === "string" ? v : "");

export function customIngredientsRouter(ingredients: CustomIngredients) {
  const r = Router();

  // GET /v1/custom-ingredients?q=&category=
  r.get("/", async (req, res, next) => {
    try {
      const q = str(req.query.q);
      const category = str(req.query.category);

      const items = category
        ? await ingredients.byCategory(category)
        : q
          ? await ingredients.search(q)
          : await ingredients.list();
      return res.json(apiOk(req, { ingredients: items }));
    } catch (e) {
      return next(e);
    }
  });

  r.get("/frequent", async (req, res, next) => {
    try {
      const limit = queryInt(req.query.limit, 10, { min: 1, max: 100 });
      return res.json(apiOk(req, { ingredients: await ingredients.frequent(limit) }));
    } catch (e) {
      return next(e);
    }
  });

  r.get("/recent", async (req, res, next) => {
    try {
      const limit = queryInt(req.query.limit, 10, { min: 1, max: 100 });
      return res.json(apiOk(req, { ingredients: await ingredients.recent(limit) }));
    } catch (e) {
      return next(e);
    }
  });

  r.get("/history", async (req, res, next) => {
    try {
      return res.json(apiOk(req, { history: await ingredients.history() }));
    } catch (e) {
      return next(e);
    }
  });

  // GET /v1/custom-ingredients/suggestions?q=&limit=
  r.get("/suggestions", async (req, res, next) => {
    try {
      const limit = queryInt(req.query.limit, 10, { min: 1, max: 50 });
      const suggestions = await ingredients.suggestions({ query: str(req.query.q), limit });
      return res.json(apiOk(req, { suggestions }));
    } catch (e) {
      return next(e);
    }
  });

  r.get("/categories", async (req, res, next) => {
    try {
      return res.json(apiOk(req, { counts: await ingredients.categoryCounts() }));
    } catch (e) {
      return next(e);
    }
  });

  r.get("/export", async (req, res, next) => {
    try {
      return res.json(apiOk(req, { ingredients: await ingredients.exportAll() }));
    } catch (e) {
      return next(e);
    }
  });

  // POST /v1/custom-ingredients/validate  Body: { name }
  r.post("/validate", (req, res) => {
    const { name } = parseBody(NameBodySchema, req.body);
    res.json(apiOk(req, ingredients.validate(name)));
  });

  // POST /v1/custom-ingredients  Body: { name }
  r.post("/", async (req, res, next) => {
    try {
      const { name } = parseBody(NameBodySchema, req.body);
      const ingredient = await ingredients.add(name);
      return res.status(201).json(apiOk(req, { ingredient }));
    } catch (e) {
      return next(e);
    }
  });

  // POST /v1/custom-ingredients/usage  Body: { names }
  r.post("/usage", async (req, res, next) => {
    try {
      const { names } = parseBody(UsageBodySchema, req.body);
      return res.json(apiOk(req, { updated: await ingredients.recordUsage(names) }));
    } catch (e) {
      return next(e);
    }
  });

  // POST /v1/custom-ingredients/import  Body: { ingredients }
  r.post("/import", async (req, res, next) => {
    try {
      const body = parseBody(ImportBodySchema, req.body);
      return res.json(apiOk(req, { imported: await ingredients.importAll(body.ingredients) }));
    } catch (e) {
      return next(e);
    }
  });

  r.delete("/", async (req, res, next) => {
    try {
      await ingredients.clear();
      return res.json(apiOk(req, { cleared: true }));
    } catch (e) {
      return next(e);
    }
  });

  r.delete("/:name", async (req, res, next) => {
    try {
      const removed = await ingredients.remove(req.params.name);
      if (!removed) {
        throw new ValidationError("CUSTOM_INGREDIENT_NOT_FOUND", `Ingredient not found: ${req.params.name}`);
      }
      return res.json(apiOk(req, { removed: req.params.name }));
    } catch (e) {
      return next(e);
    }
  });

  return r;
}
