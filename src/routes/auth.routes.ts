import { Router } from "express";
import { AppServices } from "../bootstrap";
import { createAuthController } from "../controllers/auth.controller";
import { requireAuth } from "../middlewares/auth.middleware";
import { credentialRateLimit, RateLimitConfig, refreshRateLimit } from "./rateLimit";

export const createAuthRoutes = (services: AppServices, config: RateLimitConfig) => {
  const router = Router();
  const auth = createAuthController(services);

  router.post("/login", credentialRateLimit(config), auth.login);
  router.post("/refresh", refreshRateLimit(config), auth.refresh);
  router.post("/logout", requireAuth(services.tokens), auth.logout);
  router.get("/me", requireAuth(services.tokens), auth.me);

  return router;
};
