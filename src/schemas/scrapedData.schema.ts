import { sqliteTable, integer, text, index } from "drizzle-orm/sqlite-core";
import { users } from "./users.schema";

// Articles are personal: they go away with their owner.
export const scrapedData = sqliteTable(
  "scraped_data",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    url: text("url").notNull(),
    title: text("title"),
    summary: text("summary"),
    link: text("link").notNull(),
    timestamp: text("timestamp"),
    sentiment: text("sentiment"),
    userId: integer("user_id").references(() => users.id, {
      onDelete: "cascade",
    }),
    content: text("content"), // added in 2.0.1
  },
  (table) => ({
    userIdx: index("idx_scraped_data_user_id").on(table.userId),
  })
);
