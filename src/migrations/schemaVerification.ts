import { logger } from "../utils/logger";
import { Connection, listTables } from "./migration.helpers";

export const EXPECTED_TABLES: readonly string[] = [
  "users",
  "user_sessions",
  "refresh_tokens",
  "token_blacklist",
  "schema_version",
  "scraped_data",
  "saved_scrapers",
];

export interface SchemaReport {
  missing: string[];
  extra: string[];
}

export const compareSchema = (conn: Connection): SchemaReport => {
  const actual = new Set(listTables(conn));
  const expected = new Set(EXPECTED_TABLES);

  return {
    missing: EXPECTED_TABLES.filter((table) => !actual.has(table)),
    extra: [...actual].filter((table) => !expected.has(table)),
  };
};

/**
 * Missing tables fail; extra tables only warn, so additions made by a newer
 * build or by neighbouring features do not stop startup.
 */
export const verifySchema = (conn: Connection): boolean => {
  const { missing, extra } = compareSchema(conn);

  if (missing.length > 0) {
    logger.error(`❌ Missing tables: ${missing.join(", ")}`);
    return false;
  }

  if (extra.length > 0) {
    logger.warn(`⚠️ Extra tables (not in schema): ${extra.join(", ")}`);
  }

  logger.info("✅ Schema verification passed");
  return true;
};
