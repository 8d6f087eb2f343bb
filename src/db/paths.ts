import path from "node:path";
import type { AppEnv } from "../config/env";

export function getDbFilePath(env: Pick<AppEnv, "DB_ENV" | "DB_DIR">): string {
  const filename = `${env.DB_ENV}.db`; // dev.db, stage.db, smoke.db, prod.db
  // DB_DIR is relative to the project root; resolve from the process cwd.
  return path.resolve(process.cwd(), env.DB_DIR, filename);
}

export function getMigrationsDir(): string {
  return path.resolve(process.cwd(), "migrations");
}
