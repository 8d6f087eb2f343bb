import { ZodError } from "zod";

export type ErrorKind = "validation" | "network" | "processing" | "cache" | "disposed" | "unknown";

type AppErrorOptions = {
  retryable?: boolean;
  details?: string | null;
  cause?: unknown;
};

/**
 * Base of every failure this engine reports.
 * `code` is stable and machine-readable; `message` is safe to show to a user.
 */
export abstract class AppError extends Error {
  abstract readonly kind: ErrorKind;
  readonly code: string;
  readonly retryable: boolean;
  readonly details: string | null;

  constructor(code: string, message: string, opts: AppErrorOptions = {}) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = new.target.name;
    this.code = code;
    this.retryable = opts.retryable ?? false;
    this.details = opts.details ?? null;
  }
}

export class ValidationError extends AppError {
  readonly kind = "validation" as const;

  constructor(code: string, message: string, opts: AppErrorOptions = {}) {
    super(code, message, { ...opts, retryable: false });
  }

  static emptyIngredients() {
    return new ValidationError("INVALID_INGREDIENTS", "No ingredients provided. Add at least one ingredient.");
  }
}

export type InvalidImageReason =
  | "missing"
  | "empty"
  | "too-large"
  | "undecodable"
  | "too-small";

const INVALID_IMAGE_MESSAGES: Record<InvalidImageReason, string> = {
  missing: "Image file not found. Please capture a new photo.",
  empty: "Image file is empty. Please capture a new photo.",
  "too-large": "Image is too large. Please use a photo under 4MB.",
  undecodable: "Invalid image format. Please capture a new photo.",
  "too-small": "Image is too small. Please capture a closer photo.",
};

export class InvalidImageError extends ValidationError {
  readonly reason: InvalidImageReason;

  constructor(reason: InvalidImageReason, details?: string) {
    super(`INVALID_IMAGE_${reason.toUpperCase().replace(/-/g, "_")}`, INVALID_IMAGE_MESSAGES[reason], {
      details: details ?? null,
    });
    this.reason = reason;
  }
}

export type NetworkVariant =
  | "no-connection"
  | "timeout"
  | "rate-limited"
  | "server-error"
  | "auth-failure"
  | "cancelled"
  | "unknown";

export class NetworkError extends AppError {
  readonly kind = "network" as const;
  readonly variant: NetworkVariant;
  readonly status: number | null;

  constructor(
    variant: NetworkVariant,
    code: string,
    message: string,
    opts: AppErrorOptions & { status?: number | null } = {}
  ) {
    super(code, message, opts);
    this.variant = variant;
    this.status = opts.status ?? null;
  }

  static noConnection(cause?: unknown) {
    return new NetworkError(
      "no-connection",
      "NETWORK_NO_CONNECTION",
      "No internet connection. Please check your network settings.",
      { retryable: true, cause }
    );
  }

  static timeout(cause?: unknown) {
    return new NetworkError("timeout", "NETWORK_TIMEOUT", "Request timed out. Please try again.", {
      retryable: true,
      cause,
    });
  }

  static rateLimited(status = 429) {
    return new NetworkError(
      "rate-limited",
      "NETWORK_RATE_LIMITED",
      "Too many requests. Please wait a moment before trying again.",
      { retryable: true, status }
    );
  }

  static serverError(status: number, details?: string) {
    return new NetworkError(
      "server-error",
      "NETWORK_SERVER_ERROR",
      "Server error occurred. Please try again later.",
      { retryable: true, status, details: details ?? `Status code: ${status}` }
    );
  }

  static authFailure(status: number) {
    return new NetworkError(
      "auth-failure",
      "NETWORK_AUTH_FAILED",
      "Authentication failed. Please check your API key.",
      { retryable: false, status }
    );
  }

  static cancelled() {
    return new NetworkError("cancelled", "NETWORK_CANCELLED", "Request was cancelled.", { retryable: false });
  }

  static badRequest(status: number, details?: string) {
    return new NetworkError("unknown", "NETWORK_REQUEST_REJECTED", "The request was rejected by the service.", {
      retryable: false,
      status,
      details: details ?? null,
    });
  }
}

export type ProcessingVariant = "invalid-image" | "no-food-detected" | "service-failure";

export class ProcessingError extends AppError {
  readonly kind = "processing" as const;
  readonly variant: ProcessingVariant;

  constructor(variant: ProcessingVariant, code: string, message: string, opts: AppErrorOptions = {}) {
    super(code, message, { ...opts, retryable: false });
    this.variant = variant;
  }

  static invalidImage(details?: string) {
    return new ProcessingError(
      "invalid-image",
      "PROCESSING_INVALID_IMAGE",
      "Invalid image format. Please capture a new photo.",
      { details }
    );
  }

  static noFoodDetected() {
    return new ProcessingError(
      "no-food-detected",
      "PROCESSING_NO_FOOD",
      "No food items detected in the image. Please try a clearer photo."
    );
  }

  static serviceFailure(details?: string, cause?: unknown) {
    return new ProcessingError(
      "service-failure",
      "PROCESSING_SERVICE_FAILURE",
      "Failed to process the response. Please try again.",
      { details, cause }
    );
  }
}

export class CacheError extends AppError {
  readonly kind = "cache" as const;

  constructor(operation: string, cause?: unknown) {
    super("CACHE_IO_FAILED", `Cache ${operation} failed.`, {
      cause,
      details: cause instanceof Error ? cause.message : null,
    });
  }
}

export class DisposedError extends AppError {
  readonly kind = "disposed" as const;

  constructor(component = "service") {
    super("SERVICE_DISPOSED", `The ${component} has been shut down.`);
  }
}

export class UnexpectedError extends AppError {
  readonly kind = "unknown" as const;

  constructor(cause: unknown) {
    super("UNEXPECTED_ERROR", "An unexpected error occurred. Please try again.", {
      cause,
      details: cause instanceof Error ? cause.message : String(cause),
    });
  }
}

function isAbortLike(err: unknown): boolean {
  return err instanceof Error && (err.name === "AbortError" || err.name === "TimeoutError");
}

/**
 * Map anything thrown inside the engine onto the error taxonomy.
 */
export function toAppError(err: unknown): AppError {
  if (err instanceof AppError) return err;
  if (isAbortLike(err)) return NetworkError.timeout(err);
  // undici reports refused/unreachable hosts as `TypeError: fetch failed`
  if (err instanceof TypeError && /fetch failed|network/i.test(err.message)) {
    return NetworkError.noConnection(err);
  }
  if (err instanceof ZodError) {
    return ProcessingError.serviceFailure(err.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; "), err);
  }
  if (err instanceof SyntaxError) return ProcessingError.serviceFailure(err.message, err);
  return new UnexpectedError(err);
}

export function isRetryable(err: unknown): boolean {
  return err instanceof NetworkError && err.retryable;
}
