import { sqliteTable, integer, text, index } from "drizzle-orm/sqlite-core";
import { sql } from "drizzle-orm";
import { ROLES } from "../types/role";

export const users = sqliteTable(
  "users",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),

    username: text("username").notNull().unique(),

    passwordHash: text("password_hash").notNull(), // bcrypt, cost embedded

    email: text("email"),

    role: text("role", { enum: ROLES }).notNull().default("user"),

    createdAt: text("created_at").default(sql`CURRENT_TIMESTAMP`),

    lastLogin: text("last_login"),

    isActive: integer("is_active", { mode: "boolean" }).notNull().default(true),
  },
  (table) => ({
    usernameIdx: index("idx_users_username").on(table.username),

    emailIdx: index("idx_users_email").on(table.email),
  })
);

export type UserRow = typeof users.$inferSelect;
