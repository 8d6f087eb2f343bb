import { describe, expect, it, vi } from "vitest";
import { RetryPolicy } from "./retry";
import { NetworkError } from "../errors";

const noSleep = vi.fn(async () => undefined);

describe("RetryPolicy", () => {
  it("retries retryable errors up to maxAttempts and rethrows the last", async () => {
    const onRetry = vi.fn();
    const policy = new RetryPolicy({ maxAttempts: 3, delayMs: 2000, sleep: noSleep, onRetry });
    const op = vi.fn(async (attempt: number) => {
      throw NetworkError.serverError(500, `attempt ${attempt}`);
    });

    let caught: unknown;
    try {
      await policy.run(op);
    } catch (e) {
      caught = e;
    }

    expect(op).toHaveBeenCalledTimes(3);
    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(noSleep).toHaveBeenCalledWith(2000);
    expect(caught instanceof NetworkError && caught.details).toBe("attempt 3");
  });

  it("stops at the first non-retryable error", async () => {
    const policy = new RetryPolicy({ maxAttempts: 3, delayMs: 0, sleep: noSleep });
    const op = vi.fn(async () => {
      throw NetworkError.authFailure(401);
    });

    await expect(policy.run(op)).rejects.toMatchObject({ code: "NETWORK_AUTH_FAILED" });
    expect(op).toHaveBeenCalledTimes(1);
  });

  it("returns the first success", async () => {
    const policy = new RetryPolicy({ maxAttempts: 3, delayMs: 0, sleep: noSleep });
    let n = 0;
    const result = await policy.run(async () => {
      n++;
      if (n < 2) throw NetworkError.timeout();
      return "ok";
    });
    expect(result).toBe("ok");
    expect(n).toBe(2);
  });

  it("rejects a zero attempt budget", () => {
    expect(() => new RetryPolicy({ maxAttempts: 0, delayMs: 0 })).toThrow("INVALID_RETRY_MAX_ATTEMPTS");
  });
});
