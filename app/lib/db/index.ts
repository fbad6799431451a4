import Database from "better-sqlite3";
import { drizzle } from "drizzle-orm/better-sqlite3";
import { mkdirSync, readFileSync } from "fs";
import { dirname, resolve } from "path";
import { fileURLToPath } from "url";
import * as schema from "./schema";

const SCHEMA_SQL = fileURLToPath(new URL("./schema.sql", import.meta.url));

/**
 * Open (or create) the SQLite database and make sure the tables exist.
 * Pass ":memory:" for a throwaway database.
 */
export function createDb(databasePath: string) {
  const inMemory = databasePath === ":memory:";
  const path = inMemory ? databasePath : resolve(process.cwd(), databasePath);
  if (!inMemory) {
    mkdirSync(dirname(path), { recursive: true });
  }

  const sqlite = new Database(path);

  // Enable WAL mode for better concurrent performance
  if (!inMemory) {
    sqlite.pragma("journal_mode = WAL");
  }
  // Chapters cascade with their book
  sqlite.pragma("foreign_keys = ON");
  sqlite.exec(readFileSync(SCHEMA_SQL, "utf8"));

  return drizzle(sqlite, { schema });
}

export type Db = ReturnType<typeof createDb>;

// Export types
export * from "./schema";
