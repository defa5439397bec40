import { count, eq } from "drizzle-orm";
import { Db } from "../config/databaseConnection";
import {
  DEFAULT_ADMIN_EMAIL,
  DEFAULT_ADMIN_PASSWORD,
  DEFAULT_ADMIN_USERNAME,
} from "../config/constants";
import { users } from "../schemas/users.schema";
import { nowIso } from "../utils/date";
import { hashPassword } from "../utils/password";
import { logger } from "../utils/logger";

export interface AdminBootstrapResult {
  created: boolean;
  userId: number | null;
}

/**
 * Creates the default administrator when, and only when, the users table is
 * empty. Two processes racing here both insert the same unique username, so
 * at most one row is created.
 */
export const ensureAdminUser = async (db: Db): Promise<AdminBootstrapResult> => {
  const [{ total }] = await db.select({ total: count() }).from(users);

  if (total > 0) {
    return { created: false, userId: null };
  }

  const passwordHash = await hashPassword(DEFAULT_ADMIN_PASSWORD);

  const inserted = await db
    .insert(users)
    .values({
      username: DEFAULT_ADMIN_USERNAME,
      passwordHash,
      email: DEFAULT_ADMIN_EMAIL,
      role: "admin",
      createdAt: nowIso(),
      isActive: true,
    })
    .onConflictDoNothing()
    .returning({ id: users.id });

  if (inserted.length === 0) {
    const [existing] = await db
      .select({ id: users.id })
      .from(users)
      .where(eq(users.username, DEFAULT_ADMIN_USERNAME))
      .limit(1);
    return { created: false, userId: existing?.id ?? null };
  }

  logger.info("✅ Admin user created");
  logger.info(`👤 Username: ${DEFAULT_ADMIN_USERNAME} (change the password after first login)`);
  return { created: true, userId: inserted[0].id };
};
