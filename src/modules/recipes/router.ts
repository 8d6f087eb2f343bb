import { Router } from "express";
import { z } from "zod";
import { apiFail, apiOk } from "../../middleware/respond";
import { parseBody } from "../../middleware/validate";
import type { RecipeClient } from "./client";
import type { RecipeOrchestrator } from "./orchestrator";

const PageBodySchema = z.object({
  ingredients: z.array(z.string()).max(50),
  page: z.coerce.number().int().optional(),
  pageSize: z.coerce.number().int().max(100).optional(),
  sortBy: z.enum(["match", "time", "difficulty"]).nullish(),
  filters: z.array(z.string()).max(10).optional(),
});

const AlternativesBodySchema = z.object({
  ingredients: z.array(z.string()).max(50),
});

export function recipesRouter(orchestrator: RecipeOrchestrator, client: RecipeClient) {
  const r = Router();

  // POST /v1/recipes/page
  // Body: { ingredients, page?, pageSize?, sortBy?, filters? }
  r.post("/page", async (req, res, next) => {
    try {
      const body = parseBody(PageBodySchema, req.body);
      const result = await orchestrator.getPage(body);
      if (!result.success) {
        const e = apiFail(req, result.error);
        return res.status(e.status).json(e.body);
      }

      return res.json(apiOk(req, { page: result.page, fromCache: result.fromCache, timings: result.timings }));
    } catch (e) {
      return next(e);
    }
  });

  // POST /v1/recipes/alternatives
  r.post("/alternatives", async (req, res, next) => {
    try {
      const { ingredients } = parseBody(AlternativesBodySchema, req.body);
      const recipes = await client.findAlternatives(ingredients);
      return res.json(apiOk(req, { recipes }));
    } catch (e) {
      return next(e);
    }
  });

  return r;
}
