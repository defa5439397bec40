import { sqliteTable, integer, text, index } from "drizzle-orm/sqlite-core";

export const tokenBlacklist = sqliteTable(
  "token_blacklist",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),

    token: text("token").notNull().unique(),

    blacklistedAt: text("blacklisted_at").notNull(),
  },
  (table) => ({
    blacklistedAtIdx: index("idx_token_blacklist_blacklisted_at").on(
      table.blacklistedAt
    ),
  })
);
