import type { Request, Response, NextFunction } from "express";
import crypto from "node:crypto";

declare global {
  namespace Express {
    interface Request {
      requestId?: string;
    }
  }
}

export function requestId() {
  return function (req: Request, res: Response, next: NextFunction) {
    const incoming = req.header("x-request-id");
    req.requestId = incoming && incoming.length <= 128 ? incoming : crypto.randomUUID();
    res.setHeader("x-request-id", req.requestId);
    next();
  };
}
