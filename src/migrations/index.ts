export {
  MIGRATIONS,
  LATEST_SCHEMA_VERSION,
  currentVersion,
  isLegacyDatabase,
  pendingMigrations,
  runMigrations,
} from "./migrationRunner";
export { migrateLegacyToV2 } from "./multiUserFoundation.migration";
export { migrateV2ToV2_0_1 } from "./scrapedDataContent.migration";
export { migrateV2_0_1ToV2_1_0 } from "./apiTokens.migration";
export { createBackup } from "./backup";
export { verifySchema, compareSchema, EXPECTED_TABLES } from "./schemaVerification";
export type { Connection, MigrationStep } from "./migration.helpers";
