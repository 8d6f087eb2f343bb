import { describe, expect, it } from "vitest";
import { z } from "zod";
import {
  CacheError,
  InvalidImageError,
  NetworkError,
  ProcessingError,
  UnexpectedError,
  ValidationError,
  isRetryable,
  toAppError,
} from "./index";

describe("error taxonomy", () => {
  it("marks transient network failures retryable", () => {
    expect(NetworkError.timeout().retryable).toBe(true);
    expect(NetworkError.serverError(503).retryable).toBe(true);
    expect(NetworkError.rateLimited().retryable).toBe(true);
    expect(NetworkError.noConnection().retryable).toBe(true);
    expect(NetworkError.authFailure(401).retryable).toBe(false);
    expect(NetworkError.cancelled().retryable).toBe(false);
    expect(NetworkError.badRequest(400).retryable).toBe(false);
  });

  it("only retries network errors", () => {
    expect(isRetryable(NetworkError.timeout())).toBe(true);
    expect(isRetryable(ProcessingError.serviceFailure())).toBe(false);
    expect(isRetryable(new Error("x"))).toBe(false);
  });

  it("names invalid image codes after the reason", () => {
    const e = new InvalidImageError("too-small", "99x100");
    expect(e).toBeInstanceOf(ValidationError);
    expect(e.code).toBe("INVALID_IMAGE_TOO_SMALL");
    expect(e.kind).toBe("validation");
    expect(e.details).toBe("99x100");
    expect(e.name).toBe("InvalidImageError");
  });

  it("keeps the cause message on cache errors", () => {
    const e = new CacheError("read", new Error("EIO"));
    expect(e.code).toBe("CACHE_IO_FAILED");
    expect(e.details).toBe("EIO");
  });
});

describe("toAppError", () => {
  it("passes AppErrors through", () => {
    const e = ValidationError.emptyIngredients();
    expect(toAppError(e)).toBe(e);
  });

  it("maps aborts to timeouts", () => {
    const abort = new Error("aborted");
    abort.name = "AbortError";
    const mapped = toAppError(abort);
    expect(mapped instanceof NetworkError && mapped.variant).toBe("timeout");
  });

  it("maps fetch failures to no-connection", () => {
    const mapped = toAppError(new TypeError("fetch failed"));
    expect(mapped instanceof NetworkError && mapped.variant).toBe("no-connection");
  });

  it("maps parse failures to service-failure with the cause attached", () => {
    const zodErr = z.object({ a: z.string() }).safeParse({ a: 1 });
    expect(zodErr.success).toBe(false);
    if (zodErr.success) return;

    const mapped = toAppError(zodErr.error);
    expect(mapped instanceof ProcessingError && mapped.variant).toBe("service-failure");
    expect(mapped.cause).toBe(zodErr.error);

    const syntax = toAppError(new SyntaxError("Unexpected token"));
    expect(syntax.code).toBe("PROCESSING_SERVICE_FAILURE");
  });

  it("wraps anything else", () => {
    const mapped = toAppError("weird");
    expect(mapped).toBeInstanceOf(UnexpectedError);
    expect(mapped.details).toBe("weird");
    expect(mapped.message).toBe("An unexpected error occurred. Please try again.");
  });
});
