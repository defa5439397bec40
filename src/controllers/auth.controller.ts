import { Request, Response, NextFunction } from "express";
import { JwtTokenService, TokenPair } from "../services/jwt.service";
import { UserService } from "../services/user.service";
import { AuthenticationError, UnauthorizedError, ValidationError } from "../utils/errors";
import { bodyString } from "../utils/request";

export interface AuthControllerDeps {
  users: UserService;
  tokens: JwtTokenService;
}

const tokenResponse = (pair: TokenPair) => ({
  access_token: pair.accessToken,
  refresh_token: pair.refreshToken,
  token_type: pair.tokenType,
});

export const createAuthController = ({ users, tokens }: AuthControllerDeps) => {
  /* ================================
     LOGIN
  ================================ */

  const login = async (req: Request, res: Response, next: NextFunction) => {
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

      res.json(tokenResponse(await tokens.login(userId)));
    } catch (error) {
      next(error);
    }
  };

  /* ================================
     REFRESH TOKEN
  ================================ */

  const refresh = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const refreshToken = bodyString(req, "refresh_token")?.trim();
      if (!refreshToken) {
        throw new UnauthorizedError("Refresh token missing");
      }

      res.json(tokenResponse(await tokens.refresh(refreshToken)));
    } catch (error) {
      next(error);
    }
  };

  /* ================================
     LOGOUT
  ================================ */

  const logout = async (req: Request, res: Response, next: NextFunction) => {
    try {
      if (!req.authToken) {
        throw new UnauthorizedError("Authentication required");
      }

      await tokens.logout(req.authToken, bodyString(req, "refresh_token")?.trim() || undefined);
      res.json({ message: "Logged out successfully" });
    } catch (error) {
      next(error);
    }
  };

  const me = async (req: Request, res: Response, next: NextFunction) => {
    try {
      if (!req.user) {
        throw new UnauthorizedError("Authentication required");
      }

      res.json(await users.getUser(req.user.id, req.user.id));
    } catch (error) {
      next(error);
    }
  };

  return { login, refresh, logout, me };
};
