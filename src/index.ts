/// <reference path="./types/express.d.ts" />
import express, { Application, NextFunction, Request, Response } from "express";
import cors from "cors";
import cookieParser from "cookie-parser";
import helmet from "helmet";
import compression from "compression";
import { AppServices } from "./bootstrap";
import { AppConfig } from "./config/appConfig";
import { createHealthController } from "./controllers/health.controller";
import { createAuthRoutes } from "./routes/auth.routes";
import { createSessionRoutes } from "./routes/session.routes";
import { createUserRoutes } from "./routes/user.routes";
import { AppError } from "./utils/errors";
import { logger } from "./utils/logger";

export type HttpConfig = Pick<
  AppConfig,
  | "nodeEnv"
  | "corsOrigins"
  | "sessionDurationHours"
  | "rateLimitLoginMax"
  | "rateLimitWindowMs"
>;

// AppErrors carry their own status; body-parser errors carry `status`
const statusOf = (err: unknown): number => {
  if (err instanceof AppError) return err.statusCode;
  if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number") {
    return err.status;
  }
  return 500;
};

export const createApp = (services: AppServices, config: HttpConfig): Application => {
  const app = express();
  const isProduction = config.nodeEnv === "production";

  // behind a reverse proxy, trust it so req.ip and secure cookies work
  if (isProduction) {
    app.set("trust proxy", 1);
  }

  // CORS first
  app.use(
    cors({
      origin: (origin, callback) => {
        // no origin: curl, terminal clients, server-to-server
        if (!origin) return callback(null, true);

        if (!isProduction || config.corsOrigins.includes(origin)) {
          return callback(null, true);
        }

        callback(new AppError("CORS policy: origin not allowed", 403, "CORS_REJECTED"));
      },
      credentials: true,
      methods: ["GET", "POST", "PUT", "DELETE", "OPTIONS"],
      allowedHeaders: ["Content-Type", "Authorization"],
      optionsSuccessStatus: 200,
    })
  );

  app.disable("x-powered-by");
  app.use(helmet());
  app.use(compression());

  app.use(express.json({ limit: "1mb" }));
  app.use(cookieParser());

  app.get("/health", createHealthController(services.database));

  app.use("/api/auth", createAuthRoutes(services, config));
  app.use("/api/sessions", createSessionRoutes(services, config));
  app.use("/api/users", createUserRoutes(services));

  // 404
  app.use((_req, res) => {
    res.status(404).json({ message: "Route not found" });
  });

  // Error handler
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = statusOf(err);
    const message =
      status >= 500
        ? "Internal server error"
        : err instanceof Error
          ? err.message
          : "Request failed";

    if (status >= 500) {
      logger.error("❌ Unhandled request error:", err);
    }

    res.status(status).json({ message });
  });

  return app;
};
