import {
  ACCESS_TOKEN_EXPIRE_MINUTES,
  DEFAULT_SESSION_DURATION_HOURS,
  REFRESH_TOKEN_EXPIRE_DAYS,
} from "./constants";
import { ConfigurationError } from "../utils/errors";

export interface AppConfig {
  nodeEnv: string;
  port: number;
  databasePath: string;
  jwtSecret: string;
  accessTokenExpireMinutes: number;
  refreshTokenExpireDays: number;
  sessionDurationHours: number;
  sessionCleanupCron: string;
  corsOrigins: string[];
  rateLimitLoginMax: number;
  rateLimitWindowMs: number;
}

const WINDOW_MS = 15 * 60 * 1000; // 15 minutes

const parseOrigins = (raw?: string): string[] =>
  (raw || "")
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);

const positiveNumber = (
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: number
): number => {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return fallback;

  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new ConfigurationError(`${name} must be a positive number`);
  }
  return parsed;
};

/**
 * Reads the environment once. The result is handed to each service explicitly;
 * nothing else in the core looks at process.env.
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const jwtSecret = env.JWT_SECRET;
  if (!jwtSecret) {
    throw new ConfigurationError("JWT_SECRET missing");
  }

  return {
    nodeEnv: env.NODE_ENV || "development",
    port: positiveNumber(env, "PORT", 8000),
    databasePath: env.DATABASE_PATH || "scrape_data.db",
    jwtSecret,
    accessTokenExpireMinutes: positiveNumber(
      env,
      "ACCESS_TOKEN_EXPIRE_MINUTES",
      ACCESS_TOKEN_EXPIRE_MINUTES
    ),
    refreshTokenExpireDays: positiveNumber(
      env,
      "REFRESH_TOKEN_EXPIRE_DAYS",
      REFRESH_TOKEN_EXPIRE_DAYS
    ),
    sessionDurationHours: positiveNumber(
      env,
      "SESSION_DURATION_HOURS",
      DEFAULT_SESSION_DURATION_HOURS
    ),
    sessionCleanupCron: env.SESSION_CLEANUP_CRON || "0 * * * *",
    corsOrigins: parseOrigins(env.CORS_ORIGINS),
    rateLimitLoginMax: Math.max(1, positiveNumber(env, "RATE_LIMIT_LOGIN_MAX", 100)),
    rateLimitWindowMs: Math.max(
      60000,
      positiveNumber(env, "RATE_LIMIT_WINDOW_MS", WINDOW_MS)
    ),
  };
};
