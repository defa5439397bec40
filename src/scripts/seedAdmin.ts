import "dotenv/config";
import { seedAdministrator } from "../bootstrap";
import {
  DEFAULT_ADMIN_PASSWORD,
  DEFAULT_ADMIN_USERNAME,
} from "../config/constants";
import { logger } from "../utils/logger";

async function seedAdmin() {
  const databasePath = process.env.DATABASE_PATH?.trim() || "scrape_data.db";
  const report = await seedAdministrator(databasePath);

  if (report.backupPath) {
    logger.info("💾 Legacy database backed up to:", report.backupPath);
  }

  if (!report.adminCreated) {
    logger.warn("⚠️ Users already exist; no admin created");
    return;
  }

  logger.info("✅ Admin user created");
  logger.info("👤 Username:", DEFAULT_ADMIN_USERNAME);
  logger.info("🔑 Password:", DEFAULT_ADMIN_PASSWORD, "(change it after first login)");
}

seedAdmin().catch((err) => {
  logger.error("❌ Failed to seed admin:", err);
  process.exit(1);
});
