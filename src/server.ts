import dotenv from "dotenv";
dotenv.config();

import { createServer } from "http";
import { createApp } from "./index";
import { loadConfig } from "./config/appConfig";
import { checkDbConnection } from "./config/databaseConnection";
import { bootstrapApplication, scheduleMaintenance } from "./bootstrap";
import { LATEST_SCHEMA_VERSION } from "./migrations";
import { logger } from "./utils/logger";

const start = async () => {
  const config = loadConfig();
  const services = await bootstrapApplication(config);

  logger.info(
    `✅ Database ready (${config.databasePath}, SQLite ${checkDbConnection(services.database)}, schema ${LATEST_SCHEMA_VERSION})`
  );

  const maintenance = scheduleMaintenance(services, config.sessionCleanupCron);
  const httpServer = createServer(createApp(services, config));

  const shutdown = async (signal: string) => {
    try {
      logger.warn(`🛑 Received ${signal}. Shutting down gracefully...`);
      maintenance.stop();

      await new Promise<void>((resolve) => {
        httpServer.close(() => resolve());
      });

      services.database.close();
      logger.info("✅ Shutdown complete.");
      process.exit(0);
    } catch (e) {
      logger.error("❌ Shutdown error:", e);
      process.exit(1);
    }
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("unhandledRejection", (reason) => {
    logger.error("❌ Unhandled Promise Rejection:", reason);
  });
  process.on("uncaughtException", (err) => {
    logger.error("❌ Uncaught Exception:", err);
    void shutdown("uncaughtException");
  });

  httpServer.listen(config.port, "0.0.0.0", () => {
    logger.info(`🚀 Server running on port ${config.port}`);
    logger.info(`   http://localhost:${config.port} (local)`);
  });
};

start().catch((error) => {
  logger.error("❌ Startup failed:", error instanceof Error ? error.message : error);
  logger.error("\n💡 Troubleshooting:");
  logger.error("   1. Check JWT_SECRET is set in .env");
  logger.error("   2. Verify DATABASE_PATH points at a writable location");
  logger.error("   3. Restore the pre-v2 backup if a legacy migration failed");
  process.exit(1);
});
