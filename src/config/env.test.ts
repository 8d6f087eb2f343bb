import { afterEach, describe, expect, it, vi } from "vitest";
import { loadEnv } from "./env";
import { envInt, queryInt, runtimeTuning } from "./runtime";
import { hasOpenAIKey, requireOpenAIKey } from "./openai";

afterEach(() => {
  vi.unstubAllEnvs();
});

describe("loadEnv", () => {
  it("fills defaults", () => {
    const env = loadEnv({});
    expect(env.PORT).toBe(8787);
    expect(env.DB_ENV).toBe("dev");
    expect(env.UPLOAD_DIR).toBe("./uploads");
    expect(env.SUBSCRIPTION_TIER).toBe("free");
    expect(env.OPENAI_API_KEY).toBeUndefined();
    expect(hasOpenAIKey(env)).toBe(false);
  });

  it("coerces numbers", () => {
    expect(loadEnv({ PORT: "9000", API_TIMEOUT_MS: "5000" })).toMatchObject({ PORT: 9000, API_TIMEOUT_MS: 5000 });
  });

  it("fails fast on invalid values", () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    expect(() => loadEnv({ PORT: "not-a-port" })).toThrow("Invalid environment variables");
    expect(() => loadEnv({ SUBSCRIPTION_TIER: "gold" })).toThrow("Invalid environment variables");
  });

  it("requires an API key in production", () => {
    expect(() => loadEnv({ NODE_ENV: "production" })).toThrow("OPENAI_API_KEY_MISSING");
    const env = loadEnv({ NODE_ENV: "production", OPENAI_API_KEY: "test-secret" });
    expect(requireOpenAIKey(env)).toBe("test-secret");
  });
});

describe("runtime tuning", () => {
  it("clamps integers from the environment", () => {
    vi.stubEnv("RETRY_MAX_ATTEMPTS", "50");
    vi.stubEnv("RETRY_DELAY_MS", "abc");
    vi.stubEnv("RECIPE_PAGE_SIZE", "12.7");

    expect(runtimeTuning()).toEqual({
      retryMaxAttempts: 10,
      retryDelayMs: 2000,
      recipePageSize: 12,
      preloadDebounceMs: 500,
    });
    expect(envInt("UNSET_KNOB_FOR_TEST", 7, { min: 10 })).toBe(10);
  });

  it("parses query integers with a fallback", () => {
    expect(queryInt(undefined, 3)).toBe(3);
    expect(queryInt("", 3)).toBe(3);
    expect(queryInt("x", 3)).toBe(3);
    expect(queryInt("-4", 3, { min: 1 })).toBe(1);
    expect(queryInt("8.9", 3)).toBe(8);
  });
});
