import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  AppServices,
  bootstrapApplication,
  prepareDatabase,
  scheduleMaintenance,
  seedAdministrator,
} from "../../src/bootstrap";
import { AppConfig, loadConfig } from "../../src/config/appConfig";
import {
  AppDatabase,
  openDatabase,
  withDatabase,
} from "../../src/config/databaseConnection";
import { currentVersion } from "../../src/migrations";
import { ensureAdminUser } from "../../src/services/bootstrap.service";
import { ConfigurationError, MigrationError } from "../../src/utils/errors";
import {
  TEST_SECRET,
  adminIdOf,
  createIncompatibleLegacySchema,
  createLegacySchema,
  openMigratedDatabase,
} from "../helpers/testDatabase";

describe("application startup", () => {
  let dir: string;
  let config: AppConfig;
  let services: AppServices | undefined;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "auth-core-startup-"));
    config = loadConfig({
      JWT_SECRET: TEST_SECRET,
      DATABASE_PATH: path.join(dir, "scrape_data.db"),
    });
  });

  afterEach(() => {
    services?.database.close();
    services = undefined;
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("creates, migrates and seeds a brand-new database without a backup", async () => {
    services = await bootstrapApplication(config);

    expect(currentVersion(services.database.sqlite)).toBe("2.1.0");
    expect(await services.users.authenticate("admin", "Ch4ng3M3")).toBe(
      adminIdOf(services.database)
    );
    expect(fs.readdirSync(dir).filter((name) => name.includes(".pre-v2-"))).toEqual([]);
  });

  it("backs up a legacy file before migrating it", async () => {
    await withDatabase(config.databasePath, (database) => createLegacySchema(database));

    services = await bootstrapApplication(config);

    const backups = fs.readdirSync(dir).filter((name) => name.startsWith("scrape_data.db.pre-v2-"));
    expect(backups).toHaveLength(1);

    // the backup still holds the unversioned layout
    await withDatabase(path.join(dir, backups[0]), (backup) => {
      expect(currentVersion(backup.sqlite)).toBeNull();
    });
  });

  it("starts twice on the same file without reseeding", async () => {
    services = await bootstrapApplication(config);
    services.database.close();

    services = await bootstrapApplication(config);
    const row = services.database.sqlite
      .prepare<[], { cnt: number }>("SELECT COUNT(*) AS cnt FROM users")
      .get();
    expect(row?.cnt).toBe(1);
  });

  it("prunes expired sessions during startup", async () => {
    services = await bootstrapApplication(config);
    const adminId = adminIdOf(services.database);
    services.database.sqlite
      .prepare("INSERT INTO user_sessions (session_token, user_id, expires_at) VALUES (?, ?, ?)")
      .run("stale-token", adminId, "2000-01-01T00:00:00.000Z");
    services.database.close();

    services = await bootstrapApplication(config);
    const row = services.database.sqlite
      .prepare<[], { cnt: number }>("SELECT COUNT(*) AS cnt FROM user_sessions")
      .get();
    expect(row?.cnt).toBe(0);
  });

  it("aborts startup and closes the database when a migration step fails", async () => {
    await withDatabase(config.databasePath, (database) => createIncompatibleLegacySchema(database));
    const opened: AppDatabase[] = [];

    await expect(
      bootstrapApplication(config, (dbPath) => {
        const database = openDatabase(dbPath);
        opened.push(database);
        return database;
      })
    ).rejects.toThrow(new MigrationError("Database migration failed; refusing to start"));

    expect(opened).toHaveLength(1);
    expect(opened[0].sqlite.open).toBe(false);

    // the file is still the unversioned layout
    await withDatabase(config.databasePath, (database) => {
      expect(currentVersion(database.sqlite)).toBeNull();
    });
  });

  it("refuses an invalid maintenance schedule", async () => {
    services = await bootstrapApplication(config);
    const current = services;

    expect(() => scheduleMaintenance(current, "every hour")).toThrow(ConfigurationError);
  });

  it("schedules maintenance on a valid cron expression", async () => {
    services = await bootstrapApplication(config);

    const task = scheduleMaintenance(services, "0 * * * *");
    expect(typeof task.stop).toBe("function");
    task.stop();
  });
});

describe("ensureAdminUser", () => {
  it("does nothing once any user exists", async () => {
    const database = await openMigratedDatabase();
    try {
      expect(await ensureAdminUser(database.db)).toEqual({ created: false, userId: null });
    } finally {
      database.close();
    }
  });

  it("creates the administrator on an empty users table", async () => {
    const database = await openMigratedDatabase();
    try {
      database.sqlite.exec("DELETE FROM users");

      const result = await ensureAdminUser(database.db);

      expect(result.created).toBe(true);
      expect(result.userId).toBe(adminIdOf(database));
    } finally {
      database.close();
    }
  });

  it("prepares an in-memory database without trying to back it up", async () => {
    const database = openDatabase(":memory:");
    try {
      expect(await prepareDatabase(database)).toEqual({ backupPath: null, adminCreated: true });
      expect(currentVersion(database.sqlite)).toBe("2.1.0");
    } finally {
      database.close();
    }
  });

  it("rejects a database whose migration fails", async () => {
    const database = openDatabase(":memory:");
    try {
      createIncompatibleLegacySchema(database);
      await expect(prepareDatabase(database)).rejects.toBeInstanceOf(MigrationError);
    } finally {
      database.close();
    }
  });
});

describe("seedAdministrator", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "auth-core-seed-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("backs up a legacy file and reports the administrator the migration created", async () => {
    const dbPath = path.join(dir, "legacy.db");
    await withDatabase(dbPath, (database) => createLegacySchema(database));

    const report = await seedAdministrator(dbPath);

    expect(report.adminCreated).toBe(true);
    expect(report.backupPath).not.toBeNull();
    expect(path.basename(report.backupPath ?? "")).toMatch(/^legacy\.db\.pre-v2-\d{8}_\d{6}$/);
    expect(fs.readdirSync(dir).sort()).toEqual(
      ["legacy.db", path.basename(report.backupPath ?? "")].sort()
    );
  });

  it("creates the administrator on a brand-new file without a backup", async () => {
    const report = await seedAdministrator(path.join(dir, "fresh.db"));

    expect(report).toEqual({ backupPath: null, adminCreated: true });
  });

  it("reports nothing created on a second run", async () => {
    const dbPath = path.join(dir, "fresh.db");
    await seedAdministrator(dbPath);

    expect(await seedAdministrator(dbPath)).toEqual({ backupPath: null, adminCreated: false });
  });
});
