import { logger } from "../utils/logger";
import {
  Connection,
  MigrationStep,
  columnExists,
  recordVersion,
} from "./migration.helpers";

export const VERSION = "2.0.1";
export const DESCRIPTION = "Add content column to scraped_data table";

/**
 * 2.0.0 to 2.0.1: nullable scraped_data.content, added only when absent.
 */
export const migrateV2ToV2_0_1 = async (conn: Connection): Promise<boolean> => {
  try {
    conn.transaction(() => {
      if (columnExists(conn, "scraped_data", "content")) {
        logger.info("ℹ️  Content column already exists, recording version only");
      } else {
        logger.info("➕ Adding content column to scraped_data");
        conn.exec("ALTER TABLE scraped_data ADD COLUMN content TEXT");
      }

      recordVersion(conn, VERSION, DESCRIPTION);
    })();

    logger.info(`✅ Migration to v${VERSION} complete`);
    return true;
  } catch (error) {
    logger.error(`❌ Migration to v${VERSION} failed:`, error);
    return false;
  }
};

export const scrapedDataContent: MigrationStep = {
  version: VERSION,
  description: DESCRIPTION,
  apply: migrateV2ToV2_0_1,
};
