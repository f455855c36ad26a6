import { readdirSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import type { SqliteDatabase } from "./database.js";

export const MIGRATIONS_DIR = fileURLToPath(new URL("./migrations", import.meta.url));

const SCHEMA_KEY = "chatsync";
const MIGRATION_FILE = /^(\d+)_[\w-]+\.sql$/;

export interface MigrationFile {
  version: number;
  path: string;
}

/** `NNN_name.sql` files in ascending version order; other files are ignored. */
export function listMigrations(dir: string = MIGRATIONS_DIR): MigrationFile[] {
  const files: MigrationFile[] = [];
  for (const name of readdirSync(dir)) {
    const match = MIGRATION_FILE.exec(name);
    if (match) files.push({ version: Number(match[1]), path: join(dir, name) });
  }
  return files.sort((a, b) => a.version - b.version);
}

export function getSchemaVersion(db: SqliteDatabase): number {
  db.exec(
    "CREATE TABLE IF NOT EXISTS _schema_versions (package TEXT PRIMARY KEY, version INTEGER NOT NULL)",
  );
  const row = db
    .prepare<[string], { version: number }>("SELECT version FROM _schema_versions WHERE package = ?")
    .get(SCHEMA_KEY);
  return row?.version ?? 0;
}

/**
 * Apply every migration newer than the recorded version. Each file runs in its
 * own transaction together with the version bump, so a failing file leaves the
 * schema at the previous version.
 */
export function ensureStorageSchema(db: SqliteDatabase, dir: string = MIGRATIONS_DIR): void {
  const current = getSchemaVersion(db);
  const record = db.prepare<[string, number]>(
    "INSERT OR REPLACE INTO _schema_versions (package, version) VALUES (?, ?)",
  );

  for (const migration of listMigrations(dir)) {
    if (migration.version <= current) continue;
    const sql = readFileSync(migration.path, "utf-8");
    db.transaction(() => {
      db.exec(sql);
      record.run(SCHEMA_KEY, migration.version);
    })();
  }
}
