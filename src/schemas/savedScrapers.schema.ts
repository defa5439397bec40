import { sqliteTable, integer, text, index } from "drizzle-orm/sqlite-core";
import { users } from "./users.schema";

// Scraper profiles may be shared or preinstalled, so deleting the owner hands
// them to the bootstrap admin (column default) instead of dropping them.
export const savedScrapers = sqliteTable(
  "saved_scrapers",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    name: text("name").notNull(),
    url: text("url").notNull(),
    selector: text("selector").notNull(),
    defaultLimit: integer("default_limit").default(0),
    defaultTagsCsv: text("default_tags_csv"),
    description: text("description"),
    isPreinstalled: integer("is_preinstalled", { mode: "boolean" }).default(false),
    userId: integer("user_id").references(() => users.id, {
      onDelete: "set default",
    }),
    isShared: integer("is_shared", { mode: "boolean" }).default(false),
  },
  (table) => ({
    userIdx: index("idx_saved_scrapers_user").on(table.userId),
  })
);
