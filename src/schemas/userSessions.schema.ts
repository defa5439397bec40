import { sqliteTable, integer, text, index } from "drizzle-orm/sqlite-core";
import { sql } from "drizzle-orm";
import { users } from "./users.schema";

export const userSessions = sqliteTable(
  "user_sessions",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),

    sessionToken: text("session_token").notNull().unique(),

    userId: integer("user_id")
      .notNull()
      .references(() => users.id, { onDelete: "cascade" }),

    createdAt: text("created_at").default(sql`CURRENT_TIMESTAMP`),

    expiresAt: text("expires_at").notNull(), // valid while expires_at > now

    ipAddress: text("ip_address"),
  },
  (table) => ({
    tokenIdx: index("idx_sessions_token").on(table.sessionToken),

    userIdx: index("idx_sessions_user_id").on(table.userId),
  })
);
