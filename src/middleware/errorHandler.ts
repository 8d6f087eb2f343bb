import type { Request, Response, NextFunction } from "express";
import multer from "multer";
import { toAppError } from "../errors";
import { apiErr, apiFail } from "./respond";

export function errorHandler() {
  return (err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof multer.MulterError) {
      const r = apiErr(
        req,
        err.code === "LIMIT_FILE_SIZE" ? "INVALID_IMAGE_TOO_LARGE" : "INVALID_UPLOAD",
        err.message,
        "Upload a single photo in the `image` field.",
        400
      );
      return res.status(r.status).json(r.body);
    }

    // express.json() rejects malformed bodies with a 400 SyntaxError
    if (err instanceof SyntaxError) {
      const r = apiErr(req, "INVALID_JSON", "Request body is not valid JSON.", "Fix the request body.", 400);
      return res.status(r.status).json(r.body);
    }

    const appErr = toAppError(err);
    const r = apiFail(req, appErr);
    if (r.status >= 500) console.error(`[http] ${req.method} ${req.path} failed: ${appErr.code}`, appErr.details ?? "");
    return res.status(r.status).json(r.body);
  };
}
