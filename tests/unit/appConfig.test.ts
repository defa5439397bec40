import { describe, expect, it } from "vitest";
import { loadConfig } from "../../src/config/appConfig";
import { ConfigurationError } from "../../src/utils/errors";

describe("loadConfig", () => {
  it("fills defaults around the required secret", () => {
    const config = loadConfig({ JWT_SECRET: "test-secret" });

    expect(config).toEqual({
      nodeEnv: "development",
      port: 8000,
      databasePath: "scrape_data.db",
      jwtSecret: "test-secret",
      accessTokenExpireMinutes: 30,
      refreshTokenExpireDays: 7,
      sessionDurationHours: 24,
      sessionCleanupCron: "0 * * * *",
      corsOrigins: [],
      rateLimitLoginMax: 100,
      rateLimitWindowMs: 15 * 60 * 1000,
    });
  });

  it("reads overrides from the environment", () => {
    const config = loadConfig({
      JWT_SECRET: "test-secret",
      NODE_ENV: "production",
      PORT: "9100",
      DATABASE_PATH: "/var/lib/scrape/data.db",
      ACCESS_TOKEN_EXPIRE_MINUTES: "5",
      CORS_ORIGINS: "https://a.example.test, https://b.example.test,",
      RATE_LIMIT_WINDOW_MS: "1000",
    });

    expect(config.nodeEnv).toBe("production");
    expect(config.port).toBe(9100);
    expect(config.databasePath).toBe("/var/lib/scrape/data.db");
    expect(config.accessTokenExpireMinutes).toBe(5);
    expect(config.corsOrigins).toEqual(["https://a.example.test", "https://b.example.test"]);
    // the window never drops below one minute
    expect(config.rateLimitWindowMs).toBe(60000);
  });

  it("fails without a JWT secret", () => {
    expect(() => loadConfig({})).toThrow(new ConfigurationError("JWT_SECRET missing"));
  });

  it("rejects non-positive numbers", () => {
    expect(() => loadConfig({ JWT_SECRET: "test-secret", SESSION_DURATION_HOURS: "-1" })).toThrow(
      "SESSION_DURATION_HOURS must be a positive number"
    );
    expect(() => loadConfig({ JWT_SECRET: "test-secret", PORT: "eighty" })).toThrow(
      "PORT must be a positive number"
    );
  });
});
