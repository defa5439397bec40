// auth.middleware.ts
import { Request, Response, NextFunction } from "express";
import { IdentityResolver } from "../types/identity";
import { AccessRole } from "../types/role";
import { PermissionService } from "../services/permission.service";
import { bearerToken, cookieToken } from "../utils/request";

export interface RequireAuthOptions {
  /** Cookie consulted before the Authorization header. */
  cookieName?: string;
}

/**
 * Resolves the presented credential through whichever identity scheme the
 * route is mounted with (opaque session or JWT access token) and attaches
 * `req.user`. The handler never learns which scheme was used beyond
 * `req.user.source`.
 */
export const requireAuth =
  (resolver: IdentityResolver, options: RequireAuthOptions = {}) =>
  async (req: Request, res: Response, next: NextFunction) => {
    const token = cookieToken(req, options.cookieName ?? "accessToken") ?? bearerToken(req);

    if (!token) {
      return res.status(401).json({ message: "Authentication required" });
    }

    try {
      const identity = await resolver.resolve(token);

      if (!identity) {
        return res.status(401).json({ message: "Invalid or expired token" });
      }

      req.user = { id: identity.userId, source: identity.source };
      req.authToken = token;
      next();
    } catch (error) {
      next(error);
    }
  };

// role is re-read from the database on every request
export const requireRole =
  (permissions: PermissionService, requiredRole: AccessRole) =>
  async (req: Request, res: Response, next: NextFunction) => {
    if (!req.user) {
      return res.status(401).json({ message: "Authentication required" });
    }

    try {
      await permissions.requireRole(req.user.id, requiredRole);
      next();
    } catch (error) {
      next(error);
    }
  };
