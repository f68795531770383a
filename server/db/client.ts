import * as schema from "@server/db/schema";
import Database from "better-sqlite3";
import {
  drizzle,
  type BetterSQLite3Database,
} from "drizzle-orm/better-sqlite3";
import { readFileSync } from "node:fs";

export type AppDatabase = BetterSQLite3Database<typeof schema>;

const schemaSql = readFileSync(new URL("./schema.sql", import.meta.url), "utf8");

/**
 * Opens the SQLite database and makes sure the tables exist.
 * Pass ":memory:" for a throwaway database.
 */
export function openDatabase(filename: string): AppDatabase {
  const sqlite = new Database(filename);
  sqlite.pragma("journal_mode = WAL");
  sqlite.pragma("foreign_keys = ON");
  sqlite.exec(schemaSql);

  return drizzle(sqlite, { schema });
}
