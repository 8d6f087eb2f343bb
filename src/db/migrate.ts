import fs from "node:fs";
import path from "node:path";
import type { Db } from "./connection";
import { getMigrationsDir } from "./paths";

const MIGRATION_FILE = /^\d{4}_[\w-]+\.sql$/;

function ensureLedger(db: Db) {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      name TEXT PRIMARY KEY,
      appliedAt TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ','now'))
    );
  `);
}

function appliedNames(db: Db): Set<string> {
  const rows = db.prepare("SELECT name FROM schema_migrations").all() as Array<{ name: string }>;
  return new Set(rows.map((r) => r.name));
}

/** Name of the newest applied migration, or null on a fresh database. */
export function getCurrentVersion(db: Db): string | null {
  ensureLedger(db);
  const row = db.prepare("SELECT name FROM schema_migrations ORDER BY name DESC LIMIT 1").get() as
    | { name: string }
    | undefined;
  return row?.name ?? null;
}

/**
 * Apply every `NNNN_name.sql` in `dir` not yet in the ledger, in filename order.
 * Each file runs in its own transaction. Returns the names applied.
 */
export function runMigrations(db: Db, dir: string = getMigrationsDir()): string[] {
  if (!fs.existsSync(dir)) throw new Error(`MIGRATIONS_DIR_NOT_FOUND: ${dir}`);

  const files = fs.readdirSync(dir).filter((f) => MIGRATION_FILE.test(f)).sort();
  if (!files.length) throw new Error(`MIGRATIONS_EMPTY: ${dir}`);

  ensureLedger(db);
  const done = appliedNames(db);
  const pending = files.filter((f) => !done.has(f));

  const record = db.prepare("INSERT INTO schema_migrations (name) VALUES (?)");
  for (const name of pending) {
    const sql = fs.readFileSync(path.join(dir, name), "utf8");
    db.transaction(() => {
      db.exec(sql);
      record.run(name);
    })();
  }

  return pending;
}
