import bcrypt from "bcrypt";
import { AppServices, createServices } from "../../src/bootstrap";
import { AppDatabase, openDatabase } from "../../src/config/databaseConnection";
import { runMigrations } from "../../src/migrations";
import { users } from "../../src/schemas";
import { Role } from "../../src/types/role";
import { nowIso } from "../../src/utils/date";

export const TEST_SECRET = "test-secret";

export const TEST_SERVICE_CONFIG = {
  jwtSecret: TEST_SECRET,
  accessTokenExpireMinutes: 30,
  refreshTokenExpireDays: 7,
  sessionDurationHours: 24,
};

// cheap hashes for fixture users; authenticate() upgrades them on first login
const FIXTURE_ROUNDS = 4;

export const openMigratedDatabase = async (path = ":memory:"): Promise<AppDatabase> => {
  const database = openDatabase(path);
  if (!(await runMigrations(database.sqlite))) {
    database.close();
    throw new Error("test database failed to migrate");
  }
  return database;
};

export const createTestServices = async (): Promise<AppServices> =>
  createServices(await openMigratedDatabase(), TEST_SERVICE_CONFIG);

export interface FixtureUser {
  username: string;
  password?: string;
  role?: Role;
  isActive?: boolean;
  email?: string | null;
}

export const insertUser = (database: AppDatabase, user: FixtureUser): number => {
  const row = database.db
    .insert(users)
    .values({
      username: user.username,
      passwordHash: bcrypt.hashSync(user.password ?? "password123", FIXTURE_ROUNDS),
      email: user.email ?? null,
      role: user.role ?? "user",
      createdAt: nowIso(),
      isActive: user.isActive ?? true,
    })
    .returning({ id: users.id })
    .get();
  return row.id;
};

export const adminIdOf = (database: AppDatabase): number => {
  const row = database.sqlite
    .prepare<[], { id: number }>("SELECT id FROM users WHERE username = 'admin'")
    .get();
  if (!row) throw new Error("bootstrap admin missing");
  return row.id;
};

/**
 * The single-user layout that predates accounts: resource tables only, no
 * owners, no version history.
 */
export const createLegacySchema = (database: AppDatabase): void => {
  database.sqlite.exec(`
    CREATE TABLE scraped_data (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      url TEXT NOT NULL,
      title TEXT,
      summary TEXT,
      link TEXT NOT NULL,
      timestamp TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
      sentiment TEXT
    );

    CREATE TABLE saved_scrapers (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT NOT NULL,
      url TEXT NOT NULL,
      selector TEXT NOT NULL,
      default_limit INTEGER DEFAULT 0,
      default_tags_csv TEXT,
      description TEXT,
      is_preinstalled INTEGER DEFAULT 0
    );

    INSERT INTO scraped_data (url, title, link) VALUES
      ('https://news.example.test', 'First headline', 'https://news.example.test/1'),
      ('https://news.example.test', 'Second headline', 'https://news.example.test/2');

    INSERT INTO saved_scrapers (name, url, selector, is_preinstalled) VALUES
      ('Example News', 'https://news.example.test', 'h2 a', 1),
      ('My Blog', 'https://blog.example.test', 'article h1', 0);
  `);
};

/**
 * Legacy layout plus a hand-rolled `users` table that lacks the account
 * columns, so the 2.0.0 step fails part-way through.
 */
export const createIncompatibleLegacySchema = (database: AppDatabase): void => {
  createLegacySchema(database);
  database.sqlite.exec("CREATE TABLE users (id INTEGER PRIMARY KEY, name TEXT)");
};
