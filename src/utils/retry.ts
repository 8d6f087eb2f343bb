import { isRetryable } from "../errors";

export type RetryHook = (attempt: number, error: unknown) => void;

export type RetryPolicyOptions = {
  maxAttempts: number;
  delayMs: number;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: RetryHook;
  sleep?: (ms: number) => Promise<void>;
};

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Bounded retry with a fixed delay between attempts.
 * One instance is shared by every remote client.
 */
export class RetryPolicy {
  readonly maxAttempts: number;
  readonly delayMs: number;
  private readonly shouldRetry: (error: unknown) => boolean;
  private readonly onRetry: RetryHook | undefined;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(opts: RetryPolicyOptions) {
    if (!Number.isInteger(opts.maxAttempts) || opts.maxAttempts < 1) {
      throw new Error("INVALID_RETRY_MAX_ATTEMPTS");
    }
    this.maxAttempts = opts.maxAttempts;
    this.delayMs = Math.max(0, opts.delayMs);
    this.shouldRetry = opts.shouldRetry ?? isRetryable;
    this.onRetry = opts.onRetry;
    this.sleep = opts.sleep ?? sleep;
  }

  static none() {
    return new RetryPolicy({ maxAttempts: 1, delayMs: 0 });
  }

  async run<T>(op: (attempt: number) => Promise<T>): Promise<T> {
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        return await op(attempt);
      } catch (e) {
        lastError = e;
        if (!this.shouldRetry(e) || attempt === this.maxAttempts) break;
        this.onRetry?.(attempt, e);
        await this.sleep(this.delayMs);
      }
    }

    throw lastError;
  }
}
