import { eq } from "drizzle-orm";
import { Db } from "../config/databaseConnection";
import {
  PASSWORD_MIN_LENGTH,
  USERNAME_MAX_LENGTH,
  USERNAME_MIN_LENGTH,
} from "../config/constants";
import { users, UserRow } from "../schemas/users.schema";
import { Role, isRole } from "../types/role";
import { nowIso } from "../utils/date";
import {
  ConflictError,
  NotFoundError,
  PermissionDeniedError,
  ValidationError,
  isUniqueViolation,
} from "../utils/errors";
import { logger } from "../utils/logger";
import {
  BCRYPT_MAX_PASSWORD_BYTES,
  BCRYPT_ROUNDS,
  hashCost,
  hashPassword,
  verifyPassword,
} from "../utils/password";
import { JwtTokenService } from "./jwt.service";
import { PermissionService } from "./permission.service";
import { SessionService } from "./session.service";

/* ================================
   TYPES
================================ */

export interface PublicUser {
  id: number;
  username: string;
  email: string | null;
  role: Role;
  createdAt: string | null;
  lastLogin: string | null;
  isActive: boolean;
}

export interface CreateUserInput {
  username: string;
  password: string;
  email?: string | null;
  role?: Role;
}

export interface UpdateUserInput {
  email?: string | null;
  role?: Role;
  isActive?: boolean;
}

// Well-formed but unmatchable; compared against when the username is unknown
// so that lookups for missing and existing users cost the same.
const TIMING_DUMMY_HASH =
  "$2b$12$Cz9r1rUqQ0X8v4nE2hJkLeabcdefghijklmnopqrstuvwxyzABCDE";

export const toPublicUser = (row: UserRow): PublicUser => ({
  id: row.id,
  username: row.username,
  email: row.email,
  role: row.role,
  createdAt: row.createdAt,
  lastLogin: row.lastLogin,
  isActive: row.isActive,
});

const normalizeEmail = (email?: string | null): string | null => {
  if (email === undefined || email === null) return null;
  const trimmed = email.trim().toLowerCase();
  return trimmed === "" ? null : trimmed;
};

const validatePassword = (password: string) => {
  if (!password || password.length < PASSWORD_MIN_LENGTH) {
    throw new ValidationError(
      `Password must be at least ${PASSWORD_MIN_LENGTH} characters`
    );
  }
  if (Buffer.byteLength(password, "utf8") > BCRYPT_MAX_PASSWORD_BYTES) {
    throw new ValidationError(
      `Password must be at most ${BCRYPT_MAX_PASSWORD_BYTES} bytes`
    );
  }
};

const validateUsername = (username: string): string => {
  const trimmed = (username ?? "").trim();
  if (trimmed.length < USERNAME_MIN_LENGTH || trimmed.length > USERNAME_MAX_LENGTH) {
    throw new ValidationError(
      `Username must be between ${USERNAME_MIN_LENGTH} and ${USERNAME_MAX_LENGTH} characters`
    );
  }
  return trimmed;
};

/**
 * Accounts: password login plus the administrator operations on users.
 * Every state-changing operation takes the acting user's id and checks it
 * through the PermissionService before touching anything.
 */
export class UserService {
  constructor(
    private readonly db: Db,
    private readonly permissions: PermissionService,
    private readonly sessions: SessionService,
    private readonly tokens: JwtTokenService
  ) {}

  /* ================================
     AUTHENTICATE
  ================================ */

  /**
   * User id for valid credentials on an active account, otherwise null.
   * The caller only ever learns "no identity", never which check failed.
   */
  async authenticate(username: string, password: string): Promise<number | null> {
    const [user] = await this.db
      .select()
      .from(users)
      .where(eq(users.username, username))
      .limit(1);

    const matches = await verifyPassword(password, user?.passwordHash ?? TIMING_DUMMY_HASH);

    if (!user || !user.isActive || !matches) {
      logger.warn(`🔒 Authentication failed for username: ${username}`);
      return null;
    }

    const cost = hashCost(user.passwordHash);
    const upgradedHash =
      cost !== null && cost < BCRYPT_ROUNDS ? await hashPassword(password) : undefined;

    await this.db
      .update(users)
      .set({ lastLogin: nowIso(), ...(upgradedHash ? { passwordHash: upgradedHash } : {}) })
      .where(eq(users.id, user.id))
      .run();

    if (upgradedHash) {
      logger.info(`🔐 Password hash for user_id=${user.id} upgraded to cost ${BCRYPT_ROUNDS}`);
    }
    logger.info(`✅ User authenticated: ${username}`);
    return user.id;
  }

  /* ================================
     CREATE USER (ADMIN)
  ================================ */

  async createUser(actorId: number, input: CreateUserInput): Promise<PublicUser> {
    await this.permissions.requireRole(actorId, "admin");

    const username = validateUsername(input.username);
    validatePassword(input.password);

    const role = input.role ?? "user";
    if (!isRole(role)) {
      throw new ValidationError("Role must be one of admin, user, viewer");
    }

    const existing = await this.db
      .select({ id: users.id })
      .from(users)
      .where(eq(users.username, username))
      .limit(1);

    if (existing.length > 0) {
      throw new ConflictError("Username already exists");
    }

    const passwordHash = await hashPassword(input.password);

    try {
      const created = await this.db
        .insert(users)
        .values({
          username,
          passwordHash,
          email: normalizeEmail(input.email),
          role,
          createdAt: nowIso(),
          isActive: true,
        })
        .returning()
        .get();

      logger.info(`👤 User '${username}' created (ID: ${created.id}, Role: ${role})`);
      return toPublicUser(created);
    } catch (error) {
      // a concurrent insert won the race for the name
      if (isUniqueViolation(error)) {
        throw new ConflictError("Username already exists");
      }
      throw error;
    }
  }

  /* ================================
     READ
  ================================ */

  async getUser(actorId: number, userId: number): Promise<PublicUser> {
    if (!(await this.permissions.canView(actorId, userId))) {
      throw new PermissionDeniedError("You can only view your own account");
    }
    return toPublicUser(await this.findOrThrow(userId));
  }

  async listUsers(actorId: number): Promise<PublicUser[]> {
    await this.permissions.requireRole(actorId, "admin");

    const rows = await this.db.select().from(users).orderBy(users.id);
    return rows.map(toPublicUser);
  }

  /* ================================
     UPDATE USER (ADMIN)
  ================================ */

  async updateUser(
    actorId: number,
    userId: number,
    data: UpdateUserInput
  ): Promise<PublicUser> {
    await this.permissions.requireRole(actorId, "admin");
    await this.findOrThrow(userId);

    if (data.role !== undefined && !isRole(data.role)) {
      throw new ValidationError("Role must be one of admin, user, viewer");
    }

    // an administrator cannot lock themselves out
    if (actorId === userId && (data.isActive === false || (data.role && data.role !== "admin"))) {
      throw new ValidationError("Cannot demote or deactivate your own account");
    }

    const changes: Partial<Pick<UserRow, "email" | "role" | "isActive">> = {};
    if (data.email !== undefined) changes.email = normalizeEmail(data.email);
    if (data.role !== undefined) changes.role = data.role;
    if (data.isActive !== undefined) changes.isActive = data.isActive;

    if (Object.keys(changes).length > 0) {
      await this.db.update(users).set(changes).where(eq(users.id, userId)).run();
    }

    if (data.isActive === false) {
      await this.revokeCredentials(userId);
    }

    logger.info(`✏️ User ${userId} updated by user_id=${actorId}`);
    return toPublicUser(await this.findOrThrow(userId));
  }

  /* ================================
     PASSWORDS
  ================================ */

  async changePassword(
    userId: number,
    oldPassword: string,
    newPassword: string
  ): Promise<boolean> {
    validatePassword(newPassword);

    const [row] = await this.db
      .select({ passwordHash: users.passwordHash })
      .from(users)
      .where(eq(users.id, userId))
      .limit(1);

    if (!row) {
      logger.error(`❌ User not found: ${userId}`);
      return false;
    }

    if (!(await verifyPassword(oldPassword, row.passwordHash))) {
      logger.warn(`🔒 Old password verification failed for user_id=${userId}`);
      return false;
    }

    await this.db
      .update(users)
      .set({ passwordHash: await hashPassword(newPassword) })
      .where(eq(users.id, userId))
      .run();

    logger.info(`🔐 Password changed for user_id=${userId}`);
    return true;
  }

  async resetPassword(actorId: number, userId: number, newPassword: string): Promise<void> {
    await this.permissions.requireRole(actorId, "admin");
    validatePassword(newPassword);
    await this.findOrThrow(userId);

    await this.db
      .update(users)
      .set({ passwordHash: await hashPassword(newPassword) })
      .where(eq(users.id, userId))
      .run();

    await this.revokeCredentials(userId);
    logger.info(`🔐 Password reset for user_id=${userId} by user_id=${actorId}`);
  }

  /* ================================
     DELETE USER (ADMIN)
  ================================ */

  /**
   * Owned rows follow their foreign keys: personal data cascades, shared
   * scraper profiles fall back to the bootstrap admin.
   */
  async deleteUser(actorId: number, userId: number): Promise<void> {
    await this.permissions.requireRole(actorId, "admin");

    if (actorId === userId) {
      throw new ValidationError("Cannot delete your own account");
    }

    await this.findOrThrow(userId);
    await this.db.delete(users).where(eq(users.id, userId)).run();

    logger.info(`🗑️ User ${userId} deleted by user_id=${actorId}`);
  }

  private async findOrThrow(userId: number): Promise<UserRow> {
    const [row] = await this.db.select().from(users).where(eq(users.id, userId)).limit(1);
    if (!row) {
      throw new NotFoundError("User not found");
    }
    return row;
  }

  private async revokeCredentials(userId: number) {
    const sessions = await this.sessions.revokeAllForUser(userId);
    const refreshTokens = await this.tokens.revokeAllForUser(userId);
    logger.info(
      `🚪 Revoked ${sessions} session(s) and ${refreshTokens} refresh token(s) for user_id=${userId}`
    );
  }
}
