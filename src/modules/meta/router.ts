import { Router } from "express";
import { formatBytes } from "../../utils/format";
import { apiOk } from "../../middleware/respond";
import type { Services } from "../../services";

/**
 * Cache inspection and reset for the local service.
 * Recipe-book rows are not a cache and are never touched here.
 */
export function metaRouter(services: Pick<Services, "orchestrator" | "visionCache" | "recipeCache" | "preprocessor" | "connectivity">) {
  const r = Router();

  // GET /v1/meta/cache
  r.get("/cache", async (req, res, next) => {
    try {
      const recipes = await services.orchestrator.getCacheStats();
      const processedImageBytes = await services.preprocessor.getCacheSize();
      const visionBytes = await services.visionCache.sizeBytes();

      return res.json(
        apiOk(req, {
          recipes,
          caches: [await services.recipeCache.stats(), await services.visionCache.stats()],
          vision: { sizeBytes: visionBytes, sizeFormatted: formatBytes(visionBytes) },
          processedImages: { sizeBytes: processedImageBytes, sizeFormatted: formatBytes(processedImageBytes) },
          connectivity: services.connectivity.status(),
        })
      );
    } catch (e) {
      return next(e);
    }
  });

  // DELETE /v1/meta/cache
  r.delete("/cache", async (req, res, next) => {
    try {
      await services.orchestrator.clearCache();
      await services.visionCache.clear();
      await services.preprocessor.clearCache();
      return res.json(apiOk(req, { cleared: true }));
    } catch (e) {
      return next(e);
    }
  });

  return r;
}
