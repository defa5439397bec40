import { sqliteTable, text } from "drizzle-orm/sqlite-core";

// Append-only history; the newest row is the current schema version.
export const schemaVersion = sqliteTable("schema_version", {
  version: text("version").primaryKey(),
  appliedAt: text("applied_at"),
  description: text("description"),
});
