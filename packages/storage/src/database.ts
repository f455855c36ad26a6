import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import { SyncError } from "@chatsync/core";

export type SqliteDatabase = Database.Database;

export interface OpenDatabaseOptions {
  readonly?: boolean;
}

export function openDatabase(dbPath: string, options?: OpenDatabaseOptions): SqliteDatabase {
  try {
    if (dbPath !== ":memory:") {
      mkdirSync(dirname(dbPath), { recursive: true });
    }
    const db = new Database(dbPath, { readonly: options?.readonly ?? false });

    db.pragma("journal_mode = WAL");
    db.pragma("foreign_keys = ON");

    return db;
  } catch (error) {
    throw new SyncError("local-storage", `Failed to open database at ${dbPath}`, { cause: error });
  }
}
