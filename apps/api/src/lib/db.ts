import { mkdirSync, readFileSync } from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import Database from "better-sqlite3";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import { env } from "./env";
import { getLogger } from "./logger";
import * as schema from "./schema";

const log = getLogger("db");

const schemaFile = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../sql/schema.sql");

export type AppDatabase = BetterSQLite3Database<typeof schema>;

function openSqlite(url: string) {
  if (url !== ":memory:") mkdirSync(path.dirname(path.resolve(url)), { recursive: true });
  const sqlite = new Database(url);
  sqlite.pragma("journal_mode = WAL");
  sqlite.pragma("foreign_keys = ON");
  sqlite.exec(readFileSync(schemaFile, "utf8"));
  return sqlite;
}

const sqlite = openSqlite(env.DATABASE_URL);
export const db: AppDatabase = drizzle(sqlite, { schema });

log.debug({ url: env.DATABASE_URL }, "database ready");
