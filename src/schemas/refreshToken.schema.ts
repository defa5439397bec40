import { sqliteTable, integer, text, index } from "drizzle-orm/sqlite-core";
import { sql } from "drizzle-orm";
import { users } from "./users.schema";

export const refreshTokens = sqliteTable(
  "refresh_tokens",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),

    token: text("token").notNull().unique(),

    userId: integer("user_id")
      .notNull()
      .references(() => users.id, { onDelete: "cascade" }),

    createdAt: text("created_at").default(sql`CURRENT_TIMESTAMP`),

    expiresAt: text("expires_at").notNull(),
  },
  (table) => ({
    userIdx: index("idx_refresh_tokens_user_id").on(table.userId),

    expiresAtIdx: index("idx_refresh_tokens_expires_at").on(table.expiresAt),
  })
);
