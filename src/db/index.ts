import { readFileSync, mkdirSync } from "fs";
import path from "path";
import Database from "better-sqlite3";
import { drizzle, BetterSQLite3Database } from "drizzle-orm/better-sqlite3";

import * as schema from "./schema";

const SCHEMA_SQL_PATH = path.resolve(__dirname, "../../sql/schema.sql");

export type OnboardingDatabase = BetterSQLite3Database<typeof schema>;

export function applySchema(sqlite: Database.Database): void {
  sqlite.exec(readFileSync(SCHEMA_SQL_PATH, "utf8"));
}

/**
 * Opens (or creates) the SQLite file and makes sure the tables exist.
 * Pass ":memory:" for a throwaway database.
 */
export function openDatabase(filePath: string): OnboardingDatabase {
  if (filePath !== ":memory:") {
    mkdirSync(path.dirname(path.resolve(filePath)), { recursive: true });
  }

  const sqlite = new Database(filePath);
  sqlite.pragma("journal_mode = WAL"); // better concurrent read performance
  sqlite.pragma("foreign_keys = ON");
  applySchema(sqlite);

  return drizzle(sqlite, { schema });
}
