import { Router } from "express";
import { AppServices } from "../bootstrap";
import { AppConfig } from "../config/appConfig";
import { createSessionController, SESSION_COOKIE } from "../controllers/session.controller";
import { requireAuth } from "../middlewares/auth.middleware";
import { credentialRateLimit } from "./rateLimit";

type SessionRoutesConfig = Pick<
  AppConfig,
  "nodeEnv" | "sessionDurationHours" | "rateLimitLoginMax" | "rateLimitWindowMs"
>;

export const createSessionRoutes = (services: AppServices, config: SessionRoutesConfig) => {
  const router = Router();
  const controller = createSessionController({
    users: services.users,
    sessions: services.sessions,
    sessionDurationHours: config.sessionDurationHours,
    secureCookies: config.nodeEnv === "production",
  });
  const authenticated = requireAuth(services.sessions, { cookieName: SESSION_COOKIE });

  router.post("/", credentialRateLimit(config), controller.open);
  router.get("/", authenticated, controller.list);
  router.delete("/current", authenticated, controller.close);
  router.delete("/:sessionId", authenticated, controller.revoke);

  return router;
};
