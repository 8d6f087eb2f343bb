import fs from "node:fs";
import path from "node:path";
import { createApp } from "./app";
import { loadEnv } from "./config/env";
import { getDbFilePath } from "./db/paths";
import { openDb } from "./db/connection";
import { runMigrations } from "./db/migrate";
import { createServices } from "./services";
import { cleanupOldImages } from "./modules/image/cleanup";
import { SqliteStorage } from "./modules/storage/sqlite-store";
import { DnsConnectivityMonitor } from "./modules/connectivity/monitor";

function ensureDbDir(dbFilePath: string) {
  const dir = path.dirname(dbFilePath);
  if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
}

async function main() {
  const env = loadEnv();
  const dbFilePath = getDbFilePath(env);

  ensureDbDir(dbFilePath);

  const db = openDb(dbFilePath);
  const applied = runMigrations(db);
  if (applied.length) console.log(`[db] applied ${applied.join(", ")}`);

  const purged = new SqliteStorage(db).purgeExpired();
  if (purged) console.log(`[cache] purged ${purged} expired blobs`);

  const services = createServices(db, env);
  await cleanupOldImages(path.resolve(process.cwd(), env.UPLOAD_DIR));

  const warmed = (await services.recipeCache.warm()) + (await services.visionCache.warm());
  if (warmed) console.log(`[cache] warmed ${warmed} entries`);

  const monitor = services.connectivity instanceof DnsConnectivityMonitor ? services.connectivity : null;
  if (monitor) {
    await monitor.checkNow();
    monitor.start();
  }

  const app = createApp(services);
  const server = app.listen(env.PORT, "0.0.0.0", () => {
    console.log(`snapcook-engine listening on port ${env.PORT}`);
    console.log(`DB_ENV=${env.DB_ENV} DB=${dbFilePath}`);
  });

  const shutdown = () => {
    console.log("[server] shutting down");
    monitor?.stop();
    services.dispose();
    server.close(() => {
      db.close();
      process.exit(0);
    });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
