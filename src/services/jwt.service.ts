import { and, eq, lte } from "drizzle-orm";
import jwt from "jsonwebtoken";
import { Db } from "../config/databaseConnection";
import {
  ACCESS_TOKEN_EXPIRE_MINUTES,
  REFRESH_TOKEN_EXPIRE_DAYS,
} from "../config/constants";
import { refreshTokens } from "../schemas/refreshToken.schema";
import { tokenBlacklist } from "../schemas/tokenBlacklist.schema";
import { users } from "../schemas/users.schema";
import { IdentityResolver, ResolvedIdentity } from "../types/identity";
import { msFromNow, nowIso } from "../utils/date";
import { ConfigurationError, UnauthorizedError } from "../utils/errors";
import { logger } from "../utils/logger";
import { signToken, verifyToken } from "../utils/token";

export type TokenType = "access" | "refresh";

export interface TokenClaims {
  sub: string;
  type: TokenType;
  jti?: string;
  iat?: number;
  exp?: number;
}

export interface TokenPair {
  accessToken: string;
  refreshToken: string;
  tokenType: "bearer";
}

export interface JwtTokenServiceOptions {
  secret: string;
  accessTokenTtlMinutes?: number;
  refreshTokenTtlDays?: number;
}

type RotationOutcome = "rotated" | "missing" | "expired" | "inactive";

const ROTATION_FAILURES: Record<Exclude<RotationOutcome, "rotated">, string> = {
  missing: "Refresh token not found",
  expired: "Refresh token expired",
  inactive: "User inactive or not found",
};

const isTokenType = (value: unknown): value is TokenType =>
  value === "access" || value === "refresh";

const parseSubject = (sub: string): number => {
  const userId = Number(sub);
  if (!Number.isSafeInteger(userId) || userId <= 0) {
    throw new UnauthorizedError("Invalid user ID in token");
  }
  return userId;
};

/**
 * Signed access/refresh tokens for the HTTP API.
 *
 * Both kinds carry a `type` claim so neither can stand in for the other.
 * Refresh tokens are also persisted, which makes them revocable before their
 * embedded expiry; each refresh rotates the stored record. Access tokens are
 * revoked by blacklisting.
 */
export class JwtTokenService implements IdentityResolver {
  readonly source = "jwt-access" as const;

  private readonly secret: string;
  private readonly accessTtlSeconds: number;
  private readonly refreshTtlMs: number;

  constructor(private readonly db: Db, options: JwtTokenServiceOptions) {
    if (!options.secret) {
      throw new ConfigurationError("JWT secret is required");
    }
    this.secret = options.secret;
    this.accessTtlSeconds =
      (options.accessTokenTtlMinutes ?? ACCESS_TOKEN_EXPIRE_MINUTES) * 60;
    this.refreshTtlMs =
      (options.refreshTokenTtlDays ?? REFRESH_TOKEN_EXPIRE_DAYS) * 24 * 60 * 60 * 1000;
  }

  issueAccessToken(userId: number): string {
    return signToken({ sub: String(userId), type: "access" }, this.secret, this.accessTtlSeconds);
  }

  async issueRefreshToken(userId: number): Promise<string> {
    const token = this.signRefreshToken(userId);

    await this.db
      .insert(refreshTokens)
      .values({ token, userId, createdAt: nowIso(), expiresAt: msFromNow(this.refreshTtlMs) })
      .run();

    return token;
  }

  async login(userId: number): Promise<TokenPair> {
    return {
      accessToken: this.issueAccessToken(userId),
      refreshToken: await this.issueRefreshToken(userId),
      tokenType: "bearer",
    };
  }

  /**
   * Signature and expiry only. Callers still check `type`, and for refresh use
   * the blacklist and the persisted record.
   */
  decode(token: string): TokenClaims {
    let payload: string | jwt.JwtPayload;
    try {
      payload = verifyToken(token, this.secret);
    } catch (error) {
      logger.warn("⚠️ JWT decode error:", error instanceof Error ? error.message : error);
      throw new UnauthorizedError("Invalid or expired token");
    }

    if (typeof payload === "string" || typeof payload.sub !== "string" || !isTokenType(payload.type)) {
      throw new UnauthorizedError("Invalid token payload");
    }

    return {
      sub: payload.sub,
      type: payload.type,
      jti: payload.jti,
      iat: payload.iat,
      exp: payload.exp,
    };
  }

  decodeAs(token: string, expected: TokenType): TokenClaims {
    const claims = this.decode(token);
    if (claims.type !== expected) {
      throw new UnauthorizedError("Invalid token type");
    }
    return claims;
  }

  async isBlacklisted(token: string): Promise<boolean> {
    const [row] = await this.db
      .select({ id: tokenBlacklist.id })
      .from(tokenBlacklist)
      .where(eq(tokenBlacklist.token, token))
      .limit(1);
    return row !== undefined;
  }

  /**
   * Full access-token check: not blacklisted, valid, `type: access`, and the
   * user still exists and is active. Resolves to the user id.
   */
  async verifyAccessToken(token: string): Promise<number> {
    if (await this.isBlacklisted(token)) {
      throw new UnauthorizedError("Token has been revoked");
    }

    const claims = this.decodeAs(token, "access");
    const userId = parseSubject(claims.sub);

    const [user] = await this.db
      .select({ isActive: users.isActive })
      .from(users)
      .where(eq(users.id, userId))
      .limit(1);

    if (!user || !user.isActive) {
      throw new UnauthorizedError("User not found or inactive");
    }
    return userId;
  }

  async resolve(credential: string): Promise<ResolvedIdentity | null> {
    try {
      const userId = await this.verifyAccessToken(credential);
      return { userId, source: this.source };
    } catch (error) {
      if (error instanceof UnauthorizedError) return null;
      throw error;
    }
  }

  /**
   * Trades a refresh token for a new pair. The old record is deleted and the
   * new one inserted in one transaction, so of two concurrent refreshes with
   * the same token only one finds the record. If persisting the new token
   * fails, the refresh fails and no tokens are handed out.
   */
  async refresh(refreshToken: string): Promise<TokenPair> {
    if (await this.isBlacklisted(refreshToken)) {
      throw new UnauthorizedError("Refresh token has been revoked");
    }

    const claims = this.decodeAs(refreshToken, "refresh");
    const userId = parseSubject(claims.sub);

    const accessToken = this.issueAccessToken(userId);
    const nextRefreshToken = this.signRefreshToken(userId);
    const now = nowIso();

    let outcome: RotationOutcome;
    try {
      outcome = this.db.transaction((tx): RotationOutcome => {
        const record = tx
          .select({ id: refreshTokens.id, expiresAt: refreshTokens.expiresAt })
          .from(refreshTokens)
          .where(and(eq(refreshTokens.token, refreshToken), eq(refreshTokens.userId, userId)))
          .get();

        if (!record) return "missing";

        if (record.expiresAt <= now) {
          tx.delete(refreshTokens).where(eq(refreshTokens.id, record.id)).run();
          return "expired";
        }

        const user = tx
          .select({ isActive: users.isActive })
          .from(users)
          .where(eq(users.id, userId))
          .get();

        if (!user || !user.isActive) return "inactive";

        tx.delete(refreshTokens).where(eq(refreshTokens.id, record.id)).run();
        tx.insert(refreshTokens)
          .values({
            token: nextRefreshToken,
            userId,
            createdAt: now,
            expiresAt: msFromNow(this.refreshTtlMs),
          })
          .run();

        return "rotated";
      });
    } catch (error) {
      logger.error("❌ Error rotating refresh token:", error);
      throw error;
    }

    if (outcome !== "rotated") {
      throw new UnauthorizedError(ROTATION_FAILURES[outcome]);
    }

    logger.info(`🔄 Access token refreshed for user_id=${userId}`);
    return { accessToken, refreshToken: nextRefreshToken, tokenType: "bearer" };
  }

  /**
   * Blacklists the presented access token. When the paired refresh token is
   * presented too, its record is deleted and it is blacklisted as well, so it
   * can no longer mint access tokens.
   */
  async logout(accessToken: string, refreshToken?: string): Promise<void> {
    const blacklistedAt = nowIso();

    this.db.transaction((tx) => {
      tx.insert(tokenBlacklist)
        .values({ token: accessToken, blacklistedAt })
        .onConflictDoNothing()
        .run();

      if (refreshToken) {
        tx.delete(refreshTokens).where(eq(refreshTokens.token, refreshToken)).run();
        tx.insert(tokenBlacklist)
          .values({ token: refreshToken, blacklistedAt })
          .onConflictDoNothing()
          .run();
      }
    });

    logger.info(
      refreshToken ? "👋 Access and refresh tokens revoked" : "👋 Access token blacklisted"
    );
  }

  async revokeAllForUser(userId: number): Promise<number> {
    const result = await this.db
      .delete(refreshTokens)
      .where(eq(refreshTokens.userId, userId))
      .run();
    return result.changes;
  }

  /**
   * Storage hygiene only. A blacklist entry older than the refresh lifetime
   * names a token that has expired on its own anyway.
   */
  async pruneExpired(): Promise<{ refreshTokens: number; blacklist: number }> {
    const expiredTokens = await this.db
      .delete(refreshTokens)
      .where(lte(refreshTokens.expiresAt, nowIso()))
      .run();

    const staleEntries = await this.db
      .delete(tokenBlacklist)
      .where(lte(tokenBlacklist.blacklistedAt, msFromNow(-this.refreshTtlMs)))
      .run();

    const pruned = { refreshTokens: expiredTokens.changes, blacklist: staleEntries.changes };
    if (pruned.refreshTokens + pruned.blacklist > 0) {
      logger.info(
        `🧹 Pruned ${pruned.refreshTokens} refresh token(s) and ${pruned.blacklist} blacklist entr(ies)`
      );
    }
    return pruned;
  }

  private signRefreshToken(userId: number): string {
    return signToken(
      { sub: String(userId), type: "refresh" },
      this.secret,
      Math.floor(this.refreshTtlMs / 1000)
    );
  }
}
