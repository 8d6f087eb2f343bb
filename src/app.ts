import express from "express";
import { hasOpenAIKey } from "./config/openai";
import { requestId } from "./middleware/requestId";
import { errorHandler } from "./middleware/errorHandler";
import { apiErr } from "./middleware/respond";
import type { Services } from "./services";
import { visionRouter } from "./modules/vision/router";
import { recipesRouter } from "./modules/recipes/router";
import { recipeBookRouter } from "./modules/recipe-book/router";
import { customIngredientsRouter } from "./modules/custom-ingredients/router";
import { mealPlanRouter } from "./modules/meal-plan/router";
import { metaRouter } from "./modules/meta/router";

export function createApp(services: Services) {
  const app = express();
  const { env } = services;

  app.use(express.json({ limit: "1mb" }));

  app.get("/health", (_req, res) =>
    res.json({
      ok: true,
      env: env.DB_ENV,
      aiConfigured: hasOpenAIKey(env),
      connectivity: services.connectivity.status(),
    })
  );

  app.use(requestId());

  app.use("/v1/vision", visionRouter(services.vision, env.UPLOAD_DIR));
  app.use("/v1/recipes", recipesRouter(services.orchestrator, services.recipes));
  app.use("/v1/recipe-book", recipeBookRouter(services.recipeBook));
  app.use("/v1/custom-ingredients", customIngredientsRouter(services.customIngredients));
  app.use("/v1/meal-plans", mealPlanRouter(services.mealPlanner));
  app.use("/v1/meta", metaRouter(services));

  // JSON 404 instead of express's HTML page
  app.use((req, res) => {
    const r = apiErr(req, "ENDPOINT_NOT_FOUND", `No route for ${req.method} ${req.path}`, "Check the URL.", 404);
    res.status(r.status).json(r.body);
  });

  app.use(errorHandler());

  return app;
}
