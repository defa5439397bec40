import * as cron from "node-cron";
import { AppConfig } from "./config/appConfig";
import { AppDatabase, openDatabase, withDatabase } from "./config/databaseConnection";
import {
  createBackup,
  isLegacyDatabase,
  runMigrations,
  verifySchema,
} from "./migrations";
import { tableExists } from "./migrations/migration.helpers";
import { ensureAdminUser } from "./services/bootstrap.service";
import { JwtTokenService } from "./services/jwt.service";
import { PermissionService } from "./services/permission.service";
import { SessionService } from "./services/session.service";
import { UserService } from "./services/user.service";
import { ConfigurationError, MigrationError } from "./utils/errors";
import { logger } from "./utils/logger";

export interface AppServices {
  database: AppDatabase;
  sessions: SessionService;
  tokens: JwtTokenService;
  permissions: PermissionService;
  users: UserService;
}

type ServiceConfig = Pick<
  AppConfig,
  "jwtSecret" | "accessTokenExpireMinutes" | "refreshTokenExpireDays" | "sessionDurationHours"
>;

/**
 * Wires the services over one database handle. No globals: two calls with two
 * handles give two fully independent instances.
 */
export const createServices = (database: AppDatabase, config: ServiceConfig): AppServices => {
  const sessions = new SessionService(database.db, {
    defaultDurationHours: config.sessionDurationHours,
  });
  const tokens = new JwtTokenService(database.db, {
    secret: config.jwtSecret,
    accessTokenTtlMinutes: config.accessTokenExpireMinutes,
    refreshTokenTtlDays: config.refreshTokenExpireDays,
  });
  const permissions = new PermissionService(database.db);
  const users = new UserService(database.db, permissions, sessions, tokens);

  return { database, sessions, tokens, permissions, users };
};

export interface PreparationReport {
  /** Copy taken before migrating a legacy file, if one was needed. */
  backupPath: string | null;
  /** True when the bootstrap administrator was created during this run. */
  adminCreated: boolean;
}

const countUsers = (database: AppDatabase): number => {
  if (!tableExists(database.sqlite, "users")) return 0;
  const row = database.sqlite
    .prepare<[], { cnt: number }>("SELECT COUNT(*) AS cnt FROM users")
    .get();
  return row?.cnt ?? 0;
};

/**
 * Brings the schema to the latest version (backing up a legacy file first),
 * verifies it and seeds the administrator. Throws MigrationError when the
 * database cannot be brought to a schema this build understands.
 *
 * The administrator may be seeded by migration 2.0.0 or by ensureAdminUser,
 * so creation is reported from the user count on either side.
 */
export const prepareDatabase = async (database: AppDatabase): Promise<PreparationReport> => {
  const usersBefore = countUsers(database);

  const backupPath =
    database.path !== ":memory:" && isLegacyDatabase(database.sqlite)
      ? await createBackup(database.path, "pre-v2")
      : null;

  if (!(await runMigrations(database.sqlite))) {
    throw new MigrationError("Database migration failed; refusing to start");
  }

  if (!verifySchema(database.sqlite)) {
    throw new MigrationError("Database schema is incomplete; refusing to start");
  }

  await ensureAdminUser(database.db);

  return { backupPath, adminCreated: usersBefore === 0 && countUsers(database) > 0 };
};

/**
 * One-shot migration plus admin seed for ops scripts; same guards as startup.
 */
export const seedAdministrator = (databasePath: string): Promise<PreparationReport> =>
  withDatabase(databasePath, prepareDatabase);

export const runMaintenance = async (services: AppServices): Promise<void> => {
  const sessions = await services.sessions.cleanupExpired();
  const tokens = await services.tokens.pruneExpired();
  logger.debug(
    `🧹 Maintenance: ${sessions} session(s), ${tokens.refreshTokens} refresh token(s), ${tokens.blacklist} blacklist entr(ies) removed`
  );
};

export const bootstrapApplication = async (
  config: AppConfig,
  open: (path: string) => AppDatabase = openDatabase
): Promise<AppServices> => {
  const database = open(config.databasePath);

  try {
    await prepareDatabase(database);
    const services = createServices(database, config);
    await runMaintenance(services);
    return services;
  } catch (error) {
    database.close();
    throw error;
  }
};

export const scheduleMaintenance = (
  services: AppServices,
  cronExpression: string
): cron.ScheduledTask => {
  if (!cron.validate(cronExpression)) {
    throw new ConfigurationError(`Invalid maintenance schedule: ${cronExpression}`);
  }

  logger.info(`🧹 Session cleanup scheduled (cron: ${cronExpression})`);
  return cron.schedule(cronExpression, () => {
    runMaintenance(services).catch((error) => {
      logger.error("❌ Error during session cleanup:", error);
    });
  });
};
