import { Request, Response, NextFunction } from "express";
import { SessionService } from "../services/session.service";
import { UserService } from "../services/user.service";
import {
  AuthenticationError,
  UnauthorizedError,
  ValidationError,
} from "../utils/errors";
import { bodyString, getIpAddress } from "../utils/request";

export const SESSION_COOKIE = "sessionToken";

export interface SessionControllerDeps {
  users: UserService;
  sessions: SessionService;
  sessionDurationHours: number;
  secureCookies: boolean;
}

export const createSessionController = ({
  users,
  sessions,
  sessionDurationHours,
  secureCookies,
}: SessionControllerDeps) => {
  const cookieOptions = {
    httpOnly: true,
    secure: secureCookies,
    sameSite: "strict" as const,
    path: "/",
  };

  const open = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const username = bodyString(req, "username");
      const password = bodyString(req, "password");

      if (!username || !password) {
        throw new ValidationError("username and password are required");
      }

      const userId = await users.authenticate(username.trim(), password);
      if (userId === null) {
        throw new AuthenticationError();
      }

      const token = await sessions.createSession(
        userId,
        sessionDurationHours,
        getIpAddress(req)
      );

      res.cookie(SESSION_COOKIE, token, {
        ...cookieOptions,
        maxAge: sessionDurationHours * 60 * 60 * 1000,
      });
      res.status(201).json({
        session_token: token,
        expires_in_hours: sessionDurationHours,
      });
    } catch (error) {
      next(error);
    }
  };

  const list = async (req: Request, res: Response, next: NextFunction) => {
    try {
      if (!req.user) {
        throw new UnauthorizedError("Authentication required");
      }
      res.json(await sessions.listUserSessions(req.user.id));
    } catch (error) {
      next(error);
    }
  };

  const close = async (req: Request, res: Response, next: NextFunction) => {
    try {
      if (!req.authToken) {
        throw new UnauthorizedError("Authentication required");
      }

      await sessions.logout(req.authToken);
      res.clearCookie(SESSION_COOKIE, cookieOptions);
      res.json({ message: "Logged out successfully" });
    } catch (error) {
      next(error);
    }
  };

  const revoke = async (req: Request, res: Response, next: NextFunction) => {
    try {
      if (!req.user) {
        throw new UnauthorizedError("Authentication required");
      }

      const sessionId = Number(req.params.sessionId);
      if (!Number.isSafeInteger(sessionId) || sessionId <= 0) {
        throw new ValidationError("sessionId must be a valid number");
      }

      await sessions.revokeUserSession(req.user.id, sessionId);
      res.status(204).end();
    } catch (error) {
      next(error);
    }
  };

  return { open, list, close, revoke };
};
