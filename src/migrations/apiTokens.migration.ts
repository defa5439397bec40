import { logger } from "../utils/logger";
import { Connection, MigrationStep, recordVersion } from "./migration.helpers";

export const VERSION = "2.1.0";
export const DESCRIPTION = "API token storage: refresh tokens and revocation blacklist";

/**
 * 2.0.1 to 2.1.0: persistence behind the JWT surface.
 */
export const migrateV2_0_1ToV2_1_0 = async (conn: Connection): Promise<boolean> => {
  try {
    conn.transaction(() => {
      conn.exec(`
        CREATE TABLE IF NOT EXISTS refresh_tokens (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          token TEXT NOT NULL UNIQUE,
          user_id INTEGER NOT NULL,
          created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
          expires_at TIMESTAMP NOT NULL,
          FOREIGN KEY (user_id) REFERENCES users(id) ON DELETE CASCADE
        );

        CREATE TABLE IF NOT EXISTS token_blacklist (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          token TEXT NOT NULL UNIQUE,
          blacklisted_at TIMESTAMP NOT NULL
        );

        CREATE INDEX IF NOT EXISTS idx_refresh_tokens_user_id ON refresh_tokens(user_id);
        CREATE INDEX IF NOT EXISTS idx_refresh_tokens_expires_at ON refresh_tokens(expires_at);
        CREATE INDEX IF NOT EXISTS idx_token_blacklist_blacklisted_at ON token_blacklist(blacklisted_at);
      `);

      recordVersion(conn, VERSION, DESCRIPTION);
    })();

    logger.info(`✅ Migration to v${VERSION} complete`);
    return true;
  } catch (error) {
    logger.error(`❌ Migration to v${VERSION} failed:`, error);
    return false;
  }
};

export const apiTokens: MigrationStep = {
  version: VERSION,
  description: DESCRIPTION,
  apply: migrateV2_0_1ToV2_1_0,
};
