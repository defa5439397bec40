import { and, eq, gt, lte } from "drizzle-orm";
import { Db } from "../config/databaseConnection";
import { DEFAULT_SESSION_DURATION_HOURS } from "../config/constants";
import { userSessions } from "../schemas/userSessions.schema";
import { IdentityResolver, ResolvedIdentity } from "../types/identity";
import { hoursFromNow, nowIso } from "../utils/date";
import { isUniqueViolation, NotFoundError, PermissionDeniedError } from "../utils/errors";
import { logger } from "../utils/logger";
import { newOpaqueToken } from "../utils/token";

export interface SessionServiceOptions {
  defaultDurationHours?: number;
  /** Token source; the CSPRNG generator unless a test swaps it. */
  generateToken?: () => string;
  /** Inserts tried before a token collision is reported as an error. */
  maxInsertAttempts?: number;
}

export interface SessionSummary {
  id: number;
  createdAt: string | null;
  expiresAt: string;
  ipAddress: string | null;
}

/**
 * Server-side opaque sessions for the terminal surface.
 *
 * A session is Active until `expires_at` passes or its row is deleted by
 * logout. Sessions are never extended; a new login makes a new row.
 * Validation is read-only.
 */
export class SessionService implements IdentityResolver {
  readonly source = "opaque-session" as const;

  private readonly defaultDurationHours: number;
  private readonly generateToken: () => string;
  private readonly maxInsertAttempts: number;

  constructor(private readonly db: Db, options: SessionServiceOptions = {}) {
    this.defaultDurationHours =
      options.defaultDurationHours ?? DEFAULT_SESSION_DURATION_HOURS;
    this.generateToken = options.generateToken ?? newOpaqueToken;
    this.maxInsertAttempts = Math.max(1, options.maxInsertAttempts ?? 3);
  }

  async createSession(
    userId: number,
    durationHours: number = this.defaultDurationHours,
    ipAddress?: string
  ): Promise<string> {
    const expiresAt = hoursFromNow(durationHours);

    for (let attempt = 1; ; attempt++) {
      const token = this.generateToken();
      try {
        await this.db
          .insert(userSessions)
          .values({
            sessionToken: token,
            userId,
            createdAt: nowIso(),
            expiresAt,
            ipAddress: ipAddress ?? null,
          })
          .run();

        logger.info(`🔑 Created session for user_id=${userId}, expires at ${expiresAt}`);
        return token;
      } catch (error) {
        if (isUniqueViolation(error) && attempt < this.maxInsertAttempts) {
          logger.warn(`⚠️ Session token collision for user_id=${userId}, retrying`);
          continue;
        }
        throw error;
      }
    }
  }

  /**
   * Owning user id while the session is unexpired, otherwise null. Never throws:
   * lookup errors are logged and reported as "no identity".
   */
  async validateSession(token: string): Promise<number | null> {
    if (!token) return null;

    try {
      const [row] = await this.db
        .select({ userId: userSessions.userId })
        .from(userSessions)
        .where(
          and(
            eq(userSessions.sessionToken, token),
            gt(userSessions.expiresAt, nowIso())
          )
        )
        .limit(1);

      if (!row) {
        logger.debug("Session invalid or expired");
        return null;
      }
      return row.userId;
    } catch (error) {
      logger.error("❌ Session validation error:", error);
      return null;
    }
  }

  async resolve(credential: string): Promise<ResolvedIdentity | null> {
    const userId = await this.validateSession(credential);
    return userId === null ? null : { userId, source: this.source };
  }

  /**
   * Idempotent: logging out an unknown token is not an error.
   */
  async logout(token: string): Promise<void> {
    const result = await this.db
      .delete(userSessions)
      .where(eq(userSessions.sessionToken, token))
      .run();

    if (result.changes > 0) {
      logger.info("👋 Session logged out");
    }
  }

  async cleanupExpired(): Promise<number> {
    const result = await this.db
      .delete(userSessions)
      .where(lte(userSessions.expiresAt, nowIso()))
      .run();

    if (result.changes > 0) {
      logger.info(`🧹 Cleaned up ${result.changes} expired session(s)`);
    }
    return result.changes;
  }

  async listUserSessions(userId: number): Promise<SessionSummary[]> {
    return this.db
      .select({
        id: userSessions.id,
        createdAt: userSessions.createdAt,
        expiresAt: userSessions.expiresAt,
        ipAddress: userSessions.ipAddress,
      })
      .from(userSessions)
      .where(and(eq(userSessions.userId, userId), gt(userSessions.expiresAt, nowIso())))
      .orderBy(userSessions.id);
  }

  /**
   * A user may end any of their own sessions by id, never someone else's.
   */
  async revokeUserSession(userId: number, sessionId: number): Promise<void> {
    const [session] = await this.db
      .select({ userId: userSessions.userId })
      .from(userSessions)
      .where(eq(userSessions.id, sessionId))
      .limit(1);

    if (!session) {
      throw new NotFoundError("Session not found");
    }
    if (session.userId !== userId) {
      throw new PermissionDeniedError("Cannot revoke another user's session");
    }

    await this.db.delete(userSessions).where(eq(userSessions.id, sessionId)).run();
    logger.info(`👋 Session ${sessionId} revoked by user_id=${userId}`);
  }

  async revokeAllForUser(userId: number): Promise<number> {
    const result = await this.db
      .delete(userSessions)
      .where(eq(userSessions.userId, userId))
      .run();
    return result.changes;
  }
}
