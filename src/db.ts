import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";

export type CatalogDb = Database.Database;

export const CATALOG_SCHEMA_VERSION = 1;

// Catalogs travel with the tree they describe, so they keep the default
// rollback journal: WAL would leave -wal/-shm companions lying in that tree.
const PRAGMAS = ["busy_timeout = 5000", "synchronous = NORMAL"];

export function openCatalogDb(
  dbPath: string,
  { readonly = false }: { readonly?: boolean } = {},
): CatalogDb {
  if (!readonly) mkdirSync(dirname(dbPath), { recursive: true });
  const db = new Database(dbPath, { readonly, fileMustExist: readonly });
  for (const pragma of PRAGMAS) {
    try {
      db.pragma(pragma);
    } catch {
      // a concurrent opener may hold the lock; the defaults are fine
    }
  }
  if (!readonly) ensureCatalogSchema(db);
  return db;
}

export function ensureCatalogSchema(db: CatalogDb): void {
  db.exec(`
  CREATE TABLE IF NOT EXISTS files (
    path      TEXT PRIMARY KEY NOT NULL,  -- relative to the catalog's directory
    size      INTEGER NOT NULL,
    signature TEXT NOT NULL,
    mode      TEXT NOT NULL,              -- 'full' or 'partial:<window>'
    mtime     REAL
  );
  CREATE INDEX IF NOT EXISTS files_content_idx ON files(size, signature);

  CREATE TABLE IF NOT EXISTS meta (
    key   TEXT PRIMARY KEY NOT NULL,
    value TEXT
  );
`);
  db.prepare(
    `INSERT INTO meta(key, value) VALUES ('schema_version', ?) ON CONFLICT(key) DO NOTHING`,
  ).run(String(CATALOG_SCHEMA_VERSION));
}
