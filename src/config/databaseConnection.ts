import Database from "better-sqlite3";
import { drizzle, BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import * as schema from "../schemas";
import { logger } from "../utils/logger";

export type Db = BetterSQLite3Database<typeof schema>;

/**
 * One open SQLite file: the raw better-sqlite3 handle (migrations, catalog
 * probes) and the drizzle instance over it (everything else).
 */
export interface AppDatabase {
  readonly path: string;
  readonly sqlite: Database.Database;
  readonly db: Db;
  close(): void;
}

export const openDatabase = (path: string): AppDatabase => {
  const sqlite = new Database(path);

  // ownership cascades depend on this; SQLite leaves it off per connection
  sqlite.pragma("foreign_keys = ON");

  const db = drizzle(sqlite, { schema });

  return {
    path,
    sqlite,
    db,
    close: () => {
      if (sqlite.open) {
        sqlite.close();
      }
    },
  };
};

/**
 * Open, hand the handle to `fn`, close on every exit path.
 */
export const withDatabase = async <T>(
  path: string,
  fn: (database: AppDatabase) => Promise<T> | T
): Promise<T> => {
  const database = openDatabase(path);
  try {
    return await fn(database);
  } finally {
    database.close();
  }
};

// ✅ Connection health check (startup and /health)
export const checkDbConnection = (database: AppDatabase): string => {
  try {
    const row = database.sqlite
      .prepare<[], { version: string }>("SELECT sqlite_version() AS version")
      .get();

    const version = row?.version ?? "unknown";
    logger.debug(`🔌 SQLite ${version} reachable at ${database.path}`);
    return version;
  } catch (error) {
    logger.error("❌ Database connection error:", error);
    throw error;
  }
};
