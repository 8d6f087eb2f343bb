import Database from "better-sqlite3";

export type Db = Database.Database;

export type OpenDbOptions = {
  busyTimeoutMs?: number;
};

export function openDb(dbFilePath: string, opts: OpenDbOptions = {}): Db {
  const db = new Database(dbFilePath);

  db.pragma("foreign_keys = ON");
  // WAL needs a file on disk
  if (dbFilePath !== ":memory:") db.pragma("journal_mode = WAL");
  db.pragma(`busy_timeout = ${Math.max(0, Math.trunc(opts.busyTimeoutMs ?? 5000))}`);

  return db;
}
