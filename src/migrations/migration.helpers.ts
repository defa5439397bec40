import Database from "better-sqlite3";
import { nowIso } from "../utils/date";

export type Connection = Database.Database;

export interface MigrationStep {
  version: string;
  description: string;
  /** Resolves false (after rolling back) when the step's SQL failed. */
  apply(conn: Connection): Promise<boolean>;
}

export const tableExists = (conn: Connection, table: string): boolean => {
  const row = conn
    .prepare<[string], { name: string }>(
      "SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?"
    )
    .get(table);
  return row !== undefined;
};

export const listTables = (conn: Connection): string[] => {
  return conn
    .prepare<[], { name: string }>(
      "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name"
    )
    .all()
    .map((row) => row.name);
};

const isNoSuchColumn = (error: unknown): boolean =>
  error instanceof Database.SqliteError && /no such column/i.test(error.message);

/**
 * Probes with a trivial SELECT. Only "no such column" means absent; anything
 * else (missing table, locked file) propagates.
 */
export const columnExists = (
  conn: Connection,
  table: string,
  column: string
): boolean => {
  try {
    conn.prepare(`SELECT ${column} FROM ${table} LIMIT 1`);
    return true;
  } catch (error) {
    if (isNoSuchColumn(error)) return false;
    throw error;
  }
};

/**
 * Written inside the step's own transaction. OR IGNORE keeps a re-run step
 * from duplicating its history row.
 */
export const recordVersion = (
  conn: Connection,
  version: string,
  description: string
): void => {
  conn
    .prepare(
      "INSERT OR IGNORE INTO schema_version (version, applied_at, description) VALUES (?, ?, ?)"
    )
    .run(version, nowIso(), description);
};
