import { afterEach, describe, expect, it } from "vitest";
import { AppDatabase, openDatabase } from "../../src/config/databaseConnection";
import {
  EXPECTED_TABLES,
  LATEST_SCHEMA_VERSION,
  compareSchema,
  currentVersion,
  isLegacyDatabase,
  migrateLegacyToV2,
  pendingMigrations,
  runMigrations,
  verifySchema,
} from "../../src/migrations";
import { columnExists, listTables } from "../../src/migrations/migration.helpers";
import {
  adminIdOf,
  createIncompatibleLegacySchema,
  createLegacySchema,
  insertUser,
} from "../helpers/testDatabase";

const countRows = (database: AppDatabase, sql: string): number => {
  const row = database.sqlite.prepare<[], { cnt: number }>(sql).get();
  return row?.cnt ?? 0;
};

describe("schema migrations", () => {
  let database: AppDatabase;

  afterEach(() => {
    database.close();
  });

  it("builds the full schema on an empty database", async () => {
    database = openDatabase(":memory:");

    expect(currentVersion(database.sqlite)).toBeNull();
    expect(isLegacyDatabase(database.sqlite)).toBe(false);
    expect(pendingMigrations(database.sqlite).map((step) => step.version)).toEqual([
      "2.0.0",
      "2.0.1",
      "2.1.0",
    ]);

    expect(await runMigrations(database.sqlite)).toBe(true);

    expect(currentVersion(database.sqlite)).toBe(LATEST_SCHEMA_VERSION);
    expect(compareSchema(database.sqlite)).toEqual({ missing: [], extra: [] });
    expect(verifySchema(database.sqlite)).toBe(true);
    expect(columnExists(database.sqlite, "scraped_data", "content")).toBe(true);
    expect(pendingMigrations(database.sqlite)).toEqual([]);
  });

  it("seeds exactly one administrator", async () => {
    database = openDatabase(":memory:");
    await runMigrations(database.sqlite);

    const admins = database.sqlite
      .prepare<[], { username: string; role: string; is_active: number }>(
        "SELECT username, role, is_active FROM users"
      )
      .all();
    expect(admins).toEqual([{ username: "admin", role: "admin", is_active: 1 }]);
  });

  it("is a no-op the second time", async () => {
    database = openDatabase(":memory:");
    await runMigrations(database.sqlite);

    expect(await runMigrations(database.sqlite)).toBe(true);
    expect(countRows(database, "SELECT COUNT(*) AS cnt FROM schema_version")).toBe(3);
    expect(countRows(database, "SELECT COUNT(*) AS cnt FROM users")).toBe(1);
  });

  it("tolerates re-running a step that is already applied", async () => {
    database = openDatabase(":memory:");
    await runMigrations(database.sqlite);

    expect(await migrateLegacyToV2(database.sqlite)).toBe(true);
    expect(countRows(database, "SELECT COUNT(*) AS cnt FROM users")).toBe(1);
    expect(countRows(database, "SELECT COUNT(*) AS cnt FROM schema_version")).toBe(3);
  });

  it("moves legacy data under the administrator without losing rows", async () => {
    database = openDatabase(":memory:");
    createLegacySchema(database);

    expect(isLegacyDatabase(database.sqlite)).toBe(true);
    expect(await runMigrations(database.sqlite)).toBe(true);

    const adminId = adminIdOf(database);
    const articles = database.sqlite
      .prepare<[], { title: string; user_id: number; content: string | null }>(
        "SELECT title, user_id, content FROM scraped_data ORDER BY id"
      )
      .all();
    expect(articles).toEqual([
      { title: "First headline", user_id: adminId, content: null },
      { title: "Second headline", user_id: adminId, content: null },
    ]);

    const scrapers = database.sqlite
      .prepare<[], { name: string; user_id: number; is_shared: number }>(
        "SELECT name, user_id, is_shared FROM saved_scrapers ORDER BY id"
      )
      .all();
    expect(scrapers).toEqual([
      { name: "Example News", user_id: adminId, is_shared: 1 },
      { name: "My Blog", user_id: adminId, is_shared: 0 },
    ]);
    expect(verifySchema(database.sqlite)).toBe(true);
  });

  it("gives rows inserted after the migration the administrator as owner", async () => {
    database = openDatabase(":memory:");
    createLegacySchema(database);
    await runMigrations(database.sqlite);

    database.sqlite
      .prepare("INSERT INTO scraped_data (url, link) VALUES (?, ?)")
      .run("https://late.example.test", "https://late.example.test/1");

    expect(
      countRows(database, "SELECT COUNT(*) AS cnt FROM scraped_data WHERE user_id IS NULL")
    ).toBe(0);
  });

  it("rolls a failing step back and leaves the legacy schema as it was", async () => {
    database = openDatabase(":memory:");
    createIncompatibleLegacySchema(database);
    const tablesBefore = listTables(database.sqlite);

    expect(await runMigrations(database.sqlite)).toBe(false);

    expect(listTables(database.sqlite)).toEqual(tablesBefore);
    expect(tablesBefore).toEqual(["saved_scrapers", "scraped_data", "users"]);
    expect(currentVersion(database.sqlite)).toBeNull();
    expect(columnExists(database.sqlite, "scraped_data", "user_id")).toBe(false);
    expect(countRows(database, "SELECT COUNT(*) AS cnt FROM scraped_data")).toBe(2);
  });

  it("leaves a database at an unknown newer version untouched", async () => {
    database = openDatabase(":memory:");
    await runMigrations(database.sqlite);
    database.sqlite
      .prepare("INSERT INTO schema_version (version, applied_at, description) VALUES (?, ?, ?)")
      .run("9.0.0", "2999-01-01T00:00:00.000Z", "From the future");

    expect(await runMigrations(database.sqlite)).toBe(true);
    expect(currentVersion(database.sqlite)).toBe("9.0.0");
    expect(pendingMigrations(database.sqlite)).toEqual([]);
  });

  it("applies only the missing steps on a 2.0.0 database", async () => {
    database = openDatabase(":memory:");
    await migrateLegacyToV2(database.sqlite);

    expect(currentVersion(database.sqlite)).toBe("2.0.0");
    expect(compareSchema(database.sqlite).missing).toEqual(["refresh_tokens", "token_blacklist"]);
    expect(verifySchema(database.sqlite)).toBe(false);

    expect(await runMigrations(database.sqlite)).toBe(true);
    expect(currentVersion(database.sqlite)).toBe("2.1.0");
  });

  it("keeps existing accounts instead of seeding", async () => {
    database = openDatabase(":memory:");
    database.sqlite.exec(`
      CREATE TABLE users (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        username TEXT NOT NULL UNIQUE,
        password_hash TEXT NOT NULL,
        email TEXT,
        role TEXT NOT NULL DEFAULT 'user',
        created_at TIMESTAMP,
        last_login TIMESTAMP,
        is_active INTEGER NOT NULL DEFAULT 1
      );
    `);
    const ownerId = insertUser(database, { username: "operator", role: "admin" });

    expect(await runMigrations(database.sqlite)).toBe(true);
    expect(countRows(database, "SELECT COUNT(*) AS cnt FROM users")).toBe(1);

    database.sqlite
      .prepare("INSERT INTO saved_scrapers (name, url, selector) VALUES (?, ?, ?)")
      .run("Feed", "https://feed.example.test", "li a");
    const row = database.sqlite
      .prepare<[], { user_id: number }>("SELECT user_id FROM saved_scrapers")
      .get();
    expect(row?.user_id).toBe(ownerId);
  });

  it("reports tables outside the schema without failing", async () => {
    database = openDatabase(":memory:");
    await runMigrations(database.sqlite);
    database.sqlite.exec("CREATE TABLE tags (id INTEGER PRIMARY KEY, name TEXT)");

    expect(compareSchema(database.sqlite)).toEqual({ missing: [], extra: ["tags"] });
    expect(verifySchema(database.sqlite)).toBe(true);
    expect(EXPECTED_TABLES).toHaveLength(7);
  });
});
