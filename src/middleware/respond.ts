import type { Request } from "express";
import { NetworkError, toAppError, type AppError } from "../errors";

type RequestLike = Pick<Request, "requestId">;

export function apiMeta(req: RequestLike) {
  return { requestId: req.requestId ?? null };
}

export function apiOk<T>(req: RequestLike, data: T) {
  return { meta: apiMeta(req), data };
}

export function apiErr(
  req: RequestLike,
  code: string,
  message: string,
  action: string,
  status = 400,
  retryable = false
) {
  return {
    status,
    body: {
      meta: apiMeta(req),
      error: { code, message, action, retryable },
    },
  };
}

export function statusFor(err: AppError): number {
  if (err.code === "RECIPE_ALREADY_SAVED" || err.code === "CUSTOM_INGREDIENT_EXISTS") return 409;
  if (err.code.endsWith("_LOCKED")) return 403;
  if (err.code.endsWith("NOT_FOUND")) return 404;

  switch (err.kind) {
    case "validation":
      return 400;
    case "disposed":
      return 503;
    case "processing":
      return 422;
    case "network":
      return networkStatus(err);
    default:
      return 500;
  }
}

function networkStatus(err: AppError): number {
  if (!(err instanceof NetworkError)) return 500;
  switch (err.variant) {
    case "no-connection":
      return 503;
    case "rate-limited":
      return 429;
    case "auth-failure":
      return 502;
    case "timeout":
      return 504;
    default:
      return 502;
  }
}

function actionFor(err: AppError): string {
  if (err.code === "RECIPE_BOOK_LOCKED") return "Upgrade to Premium to use the recipe book.";
  if (err.code === "MEAL_PLANNING_LOCKED") return "Upgrade to Professional to use meal planning.";
  if (err.kind === "validation") return "Check the request and try again.";
  if (err.retryable) return "Try again in a moment.";
  if (err.kind === "processing") return "Try a clearer photo.";
  return "Try again later.";
}

/** Error envelope for anything thrown inside a handler. */
export function apiFail(req: RequestLike, error: unknown) {
  const err = toAppError(error);
  return apiErr(req, err.code, err.message, actionFor(err), statusFor(err), err.retryable);
}
