import { z } from "zod";
import fs from "node:fs";
import path from "node:path";

function loadDotEnvFileIfPresent(filename = ".env") {
  try {
    const p = path.resolve(process.cwd(), filename);
    if (!fs.existsSync(p)) return;

    const raw = fs.readFileSync(p, "utf8");
    for (const line of raw.split(/\r?\n/)) {
      const trimmed = line.trim();
      if (!trimmed || trimmed.startsWith("#")) continue;

      const idx = trimmed.indexOf("=");
      if (idx === -1) continue;

      const key = trimmed.slice(0, idx).trim();
      let val = trimmed.slice(idx + 1).trim();

      // strip surrounding quotes
      if (
        (val.startsWith('"') && val.endsWith('"')) ||
        (val.startsWith("'") && val.endsWith("'"))
      ) {
        val = val.slice(1, -1);
      }

      // real env wins over the file
      if (process.env[key] === undefined) process.env[key] = val;
    }
  } catch (e) {
    console.warn("[env] failed to load .env:", e);
  }
}

const EnvSchema = z.object({
  NODE_ENV: z
    .enum(["development", "test", "production"])
    .default("development"),

  PORT: z.coerce.number().int().min(1).max(65535).default(8787),

  // dev.db, stage.db, smoke.db, prod.db
  DB_ENV: z.enum(["dev", "stage", "smoke", "prod"]).default("dev"),
  DB_DIR: z.string().default("./db"),

  // Captured photos land here before analysis
  UPLOAD_DIR: z.string().default("./uploads"),

  OPENAI_API_KEY: z.string().min(1).optional(),
  OPENAI_BASE_URL: z.string().url().default("https://api.openai.com/v1"),
  OPENAI_VISION_MODEL: z.string().min(1).default("gpt-4o-mini"),
  OPENAI_TEXT_MODEL: z.string().min(1).default("gpt-4o-mini"),

  // premium and professional unlock the recipe book
  SUBSCRIPTION_TIER: z.enum(["free", "premium", "professional"]).default("free"),

  API_TIMEOUT_MS: z.coerce.number().int().min(1000).max(120_000).default(30_000),
});

export type AppEnv = z.infer<typeof EnvSchema>;

export function loadEnv(processEnv: NodeJS.ProcessEnv = process.env): AppEnv {
  loadDotEnvFileIfPresent(".env");
  const parsed = EnvSchema.safeParse(processEnv);
  if (!parsed.success) {
    // Fail fast: no hidden fallbacks
    console.error("[env] invalid environment variables:", parsed.error.flatten().fieldErrors);
    throw new Error("Invalid environment variables");
  }

  if (parsed.data.NODE_ENV === "production" && !parsed.data.OPENAI_API_KEY) {
    throw new Error("OPENAI_API_KEY_MISSING");
  }

  return parsed.data;
}
