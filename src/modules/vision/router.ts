import { Router } from "express";
import multer from "multer";
import fs from "node:fs";
import path from "node:path";
import crypto from "node:crypto";
import type { VisionClient } from "./client";
import { MAX_IMAGE_BYTES } from "../image/preprocessor";
import { apiErr, apiFail, apiOk } from "../../middleware/respond";

const ALLOWED_EXT = new Set([".jpg", ".jpeg", ".png", ".webp", ".heic"]);

function uploadTo(dir: string) {
  fs.mkdirSync(dir, { recursive: true });

  return multer({
    storage: multer.diskStorage({
      destination: dir,
      filename: (_req, file, cb) => {
        const ext = path.extname(file.originalname).toLowerCase();
        cb(null, `capture_${Date.now()}_${crypto.randomUUID()}${ALLOWED_EXT.has(ext) ? ext : ".jpg"}`);
      },
    }),
    limits: { fileSize: MAX_IMAGE_BYTES, files: 1 },
  });
}

// the capture is only needed for the one analysis
async function discard(filePath: string) {
  try {
    await fs.promises.rm(filePath, { force: true });
  } catch (e) {
    console.warn("[vision] failed to remove capture:", e);
  }
}

export function visionRouter(vision: VisionClient, uploadDir: string) {
  const r = Router();
  const upload = uploadTo(uploadDir);

  // POST /v1/vision/analyze  (multipart, field "image")
  r.post("/analyze", upload.single("image"), async (req, res, next) => {
    try {
      const file = req.file;
      if (!file) {
        const e = apiErr(req, "INVALID_IMAGE_MISSING", "No image uploaded.", "Attach a photo in the `image` field.", 400);
        return res.status(e.status).json(e.body);
      }

      const result = await vision.analyze(file.path).finally(() => discard(file.path));
      if (!result.success) {
        const e = apiFail(req, result.error);
        return res.status(e.status).json(e.body);
      }

      return res.json(
        apiOk(req, {
          ingredients: result.ingredients,
          overallConfidence: result.overallConfidence,
          processingTimeMs: result.processingTimeMs,
          fromCache: result.fromCache,
        })
      );
    } catch (e) {
      return next(e);
    }
  });

  return r;
}
