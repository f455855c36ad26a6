export { openDatabase } from "./database.js";
export type { OpenDatabaseOptions, SqliteDatabase } from "./database.js";
export { MIGRATIONS_DIR, ensureStorageSchema, getSchemaVersion, listMigrations } from "./schema.js";
export type { MigrationFile } from "./schema.js";
export { SqliteLocalStore } from "./local-store.js";
export type { LocalStore } from "./local-store.js";
export type { MessageRow, PendingOpRow, SessionRow } from "./types.js";
