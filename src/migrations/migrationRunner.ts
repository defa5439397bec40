import { logger } from "../utils/logger";
import {
  Connection,
  MigrationStep,
  listTables,
  tableExists,
} from "./migration.helpers";
import { multiUserFoundation } from "./multiUserFoundation.migration";
import { scrapedDataContent } from "./scrapedDataContent.migration";
import { apiTokens } from "./apiTokens.migration";

// Strictly ascending. Append new steps at the end.
export const MIGRATIONS: readonly MigrationStep[] = [
  multiUserFoundation,
  scrapedDataContent,
  apiTokens,
];

export const LATEST_SCHEMA_VERSION = MIGRATIONS[MIGRATIONS.length - 1].version;

/**
 * Most recently applied version, or null for a legacy database. Legacy is
 * recognised by the missing history table, not by looking at data.
 */
export const currentVersion = (conn: Connection): string | null => {
  if (!tableExists(conn, "schema_version")) return null;

  const row = conn
    .prepare<[], { version: string }>(
      "SELECT version FROM schema_version ORDER BY applied_at DESC, rowid DESC LIMIT 1"
    )
    .get();

  return row?.version ?? null;
};

/**
 * A database with tables of its own but no version history: the single-user
 * layout that gets backed up before its first migration.
 */
export const isLegacyDatabase = (conn: Connection): boolean =>
  currentVersion(conn) === null && listTables(conn).length > 0;

/**
 * Steps runMigrations would apply, in order. Empty when already at the latest
 * version or at a version this build does not know.
 */
export const pendingMigrations = (conn: Connection): MigrationStep[] => {
  const current = currentVersion(conn);
  if (current === null) return [...MIGRATIONS];

  const index = MIGRATIONS.findIndex((step) => step.version === current);
  if (index === -1) return [];

  return MIGRATIONS.slice(index + 1);
};

/**
 * Drives the schema from whatever version it reports to the latest. Calling it
 * on an up-to-date database is a no-op that returns true. Stops at the first
 * failing step; that step has been rolled back and earlier ones stay committed.
 */
export const runMigrations = async (conn: Connection): Promise<boolean> => {
  const current = currentVersion(conn);
  logger.info(`📦 Current database version: ${current ?? "legacy (unversioned)"}`);

  if (current !== null && !MIGRATIONS.some((step) => step.version === current)) {
    // possibly written by a newer build; leave it alone
    logger.warn(`⚠️ Unknown database version: ${current}`);
    return true;
  }

  const pending = pendingMigrations(conn);
  if (pending.length === 0) {
    logger.info(`✅ Database already at v${LATEST_SCHEMA_VERSION}`);
    return true;
  }

  for (const step of pending) {
    logger.info(`⬆️  Applying v${step.version}: ${step.description}`);
    const applied = await step.apply(conn);
    if (!applied) {
      logger.error(`❌ Failed to migrate to v${step.version}`);
      return false;
    }
  }

  return true;
};
