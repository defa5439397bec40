import { Request, Response, NextFunction } from "express";
import { UserService } from "../services/user.service";
import { isRole } from "../types/role";
import { UnauthorizedError, ValidationError } from "../utils/errors";
import { bodyBoolean, bodyString } from "../utils/request";

const actorOf = (req: Request): number => {
  if (!req.user) {
    throw new UnauthorizedError("Authentication required");
  }
  return req.user.id;
};

const userIdParam = (req: Request): number => {
  const userId = Number(req.params.userId);
  if (!Number.isSafeInteger(userId) || userId <= 0) {
    throw new ValidationError("userId must be a valid number");
  }
  return userId;
};

const roleField = (req: Request) => {
  const role = bodyString(req, "role");
  if (role === undefined) return undefined;
  if (!isRole(role)) {
    throw new ValidationError("Role must be one of admin, user, viewer");
  }
  return role;
};

export const createUserController = (users: UserService) => {
  /* ================================
     GET ALL USERS (ADMIN)
  ================================ */

  const list = async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await users.listUsers(actorOf(req)));
    } catch (error) {
      next(error);
    }
  };

  /* ================================
     REGISTER (ADMIN)
  ================================ */

  const create = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const user = await users.createUser(actorOf(req), {
        username: bodyString(req, "username") ?? "",
        password: bodyString(req, "password") ?? "",
        email: bodyString(req, "email"),
        role: roleField(req),
      });
      res.status(201).json(user);
    } catch (error) {
      next(error);
    }
  };

  /* ================================
     UPDATE USER (ADMIN)
  ================================ */

  const update = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const user = await users.updateUser(actorOf(req), userIdParam(req), {
        email: bodyString(req, "email"),
        role: roleField(req),
        isActive: bodyBoolean(req, "is_active"),
      });
      res.json(user);
    } catch (error) {
      next(error);
    }
  };

  const remove = async (req: Request, res: Response, next: NextFunction) => {
    try {
      await users.deleteUser(actorOf(req), userIdParam(req));
      res.status(204).end();
    } catch (error) {
      next(error);
    }
  };

  /* ================================
     CHANGE PASSWORD (SELF)
  ================================ */

  const changePassword = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const changed = await users.changePassword(
        actorOf(req),
        bodyString(req, "old_password") ?? "",
        bodyString(req, "new_password") ?? ""
      );

      if (!changed) {
        throw new ValidationError("Old password is incorrect");
      }
      res.json({ message: "Password changed successfully" });
    } catch (error) {
      next(error);
    }
  };

  return { list, create, update, remove, changePassword };
};
