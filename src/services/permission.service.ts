import { eq } from "drizzle-orm";
import { Db } from "../config/databaseConnection";
import { users } from "../schemas/users.schema";
import { AccessRole, outranksOrEquals, toAccessRole } from "../types/role";
import { PermissionDeniedError } from "../utils/errors";
import { logger } from "../utils/logger";

/**
 * Hierarchical roles plus ownership. Ownership is decided only by the
 * resource's user_id column, passed in as `ownerId`; nothing here reads the
 * resource itself. Every call re-reads the user row, so a demotion applies on
 * the very next check.
 */
export class PermissionService {
  constructor(private readonly db: Db) {}

  async roleOf(userId: number): Promise<AccessRole> {
    const [row] = await this.db
      .select({ role: users.role })
      .from(users)
      .where(eq(users.id, userId))
      .limit(1);

    return toAccessRole(row?.role);
  }

  async hasAtLeast(userId: number, requiredRole: AccessRole): Promise<boolean> {
    return outranksOrEquals(await this.roleOf(userId), requiredRole);
  }

  async isAdmin(userId: number): Promise<boolean> {
    return this.hasAtLeast(userId, "admin");
  }

  async canEdit(userId: number, ownerId: number): Promise<boolean> {
    return userId === ownerId || (await this.isAdmin(userId));
  }

  // Same rule as canEdit today; kept separate so the policies can diverge.
  async canDelete(userId: number, ownerId: number): Promise<boolean> {
    return userId === ownerId || (await this.isAdmin(userId));
  }

  async canView(viewerId: number, ownerId: number): Promise<boolean> {
    return viewerId === ownerId || (await this.isAdmin(viewerId));
  }

  async requireRole(userId: number, requiredRole: AccessRole): Promise<void> {
    const held = await this.roleOf(userId);
    if (!outranksOrEquals(held, requiredRole)) {
      logger.warn(
        `🚫 Permission denied for user_id=${userId} (role=${held}, required=${requiredRole})`
      );
      throw new PermissionDeniedError(`Required role: ${requiredRole}`);
    }
  }

  async requireOwnership(userId: number, ownerId: number): Promise<void> {
    if (!(await this.canEdit(userId, ownerId))) {
      logger.warn(`🚫 Ownership check failed for user_id=${userId} (owner=${ownerId})`);
      throw new PermissionDeniedError(
        "You can only modify your own resources or be an administrator"
      );
    }
  }
}
