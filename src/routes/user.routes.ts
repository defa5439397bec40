import { Router } from "express";
import { AppServices } from "../bootstrap";
import { createUserController } from "../controllers/user.controller";
import { requireAuth, requireRole } from "../middlewares/auth.middleware";

export const createUserRoutes = (services: AppServices) => {
  const router = Router();
  const users = createUserController(services.users);
  const adminOnly = requireRole(services.permissions, "admin");

  router.use(requireAuth(services.tokens));

  router.post("/change-password", users.changePassword);
  router.get("/", adminOnly, users.list);
  router.post("/", adminOnly, users.create);
  router.put("/:userId", adminOnly, users.update);
  router.delete("/:userId", adminOnly, users.remove);

  return router;
};
