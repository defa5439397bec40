import rateLimit from "express-rate-limit";
import { AppConfig } from "../config/appConfig";

export type RateLimitConfig = Pick<AppConfig, "rateLimitLoginMax" | "rateLimitWindowMs">;

export const credentialRateLimit = (config: RateLimitConfig) =>
  rateLimit({
    windowMs: config.rateLimitWindowMs,
    limit: config.rateLimitLoginMax,
    message: { message: "Too many login attempts, please try again later." },
    standardHeaders: true,
    legacyHeaders: false,
  });

export const refreshRateLimit = (config: RateLimitConfig) =>
  rateLimit({
    windowMs: config.rateLimitWindowMs,
    // refresh is called on every access-token expiry, so it gets more headroom
    limit: config.rateLimitLoginMax * 10,
    message: { message: "Too many requests, please try again later." },
    standardHeaders: true,
    legacyHeaders: false,
  });
