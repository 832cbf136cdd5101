// pattern: Imperative Shell
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import { drizzle } from "drizzle-orm/better-sqlite3";
import type { BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import * as schema from "./schema";

export const IN_MEMORY = ":memory:";

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS articles (
  url TEXT PRIMARY KEY NOT NULL,
  title TEXT NOT NULL DEFAULT '',
  text TEXT NOT NULL DEFAULT '',
  crawled_at INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS podcast_transcripts (
  url TEXT PRIMARY KEY NOT NULL,
  title TEXT NOT NULL DEFAULT '',
  page_content TEXT NOT NULL DEFAULT '',
  transcript TEXT NOT NULL DEFAULT '',
  transcript_url TEXT NOT NULL DEFAULT '',
  crawled_at INTEGER NOT NULL
);
`;

export function createDatabase(
  dbPath: string,
): { readonly db: AppDatabase; readonly close: () => void } {
  if (dbPath !== IN_MEMORY) {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  const sqlite = new Database(dbPath);
  sqlite.pragma("journal_mode = WAL");
  sqlite.exec(SCHEMA_SQL);

  const db = drizzle(sqlite, { schema });

  return { db, close: () => sqlite.close() };
}

export type AppDatabase = BetterSQLite3Database<typeof schema>;
