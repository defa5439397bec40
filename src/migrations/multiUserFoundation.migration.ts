import {
  DEFAULT_ADMIN_EMAIL,
  DEFAULT_ADMIN_PASSWORD,
  DEFAULT_ADMIN_USERNAME,
} from "../config/constants";
import { hashPassword } from "../utils/password";
import { logger } from "../utils/logger";
import { nowIso } from "../utils/date";
import { MigrationError } from "../utils/errors";
import {
  Connection,
  MigrationStep,
  columnExists,
  recordVersion,
  tableExists,
} from "./migration.helpers";

export const VERSION = "2.0.0";
export const DESCRIPTION = "Multi-user foundation: users, sessions, ownership tracking";

const countUsers = (conn: Connection): number => {
  const row = conn
    .prepare<[], { cnt: number }>("SELECT COUNT(*) AS cnt FROM users")
    .get();
  return row?.cnt ?? 0;
};

const createAuthTables = (conn: Connection) => {
  conn.exec(`
    CREATE TABLE IF NOT EXISTS users (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      username TEXT NOT NULL UNIQUE,
      password_hash TEXT NOT NULL,
      email TEXT,
      role TEXT NOT NULL DEFAULT 'user' CHECK(role IN ('admin', 'user', 'viewer')),
      created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
      last_login TIMESTAMP,
      is_active INTEGER NOT NULL DEFAULT 1
    );

    CREATE TABLE IF NOT EXISTS user_sessions (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      session_token TEXT NOT NULL UNIQUE,
      user_id INTEGER NOT NULL,
      created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
      expires_at TIMESTAMP NOT NULL,
      ip_address TEXT,
      FOREIGN KEY (user_id) REFERENCES users(id) ON DELETE CASCADE
    );

    CREATE TABLE IF NOT EXISTS schema_version (
      version TEXT PRIMARY KEY,
      applied_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
      description TEXT
    );

    CREATE INDEX IF NOT EXISTS idx_users_username ON users(username);
    CREATE INDEX IF NOT EXISTS idx_users_email ON users(email);
    CREATE INDEX IF NOT EXISTS idx_sessions_token ON user_sessions(session_token);
    CREATE INDEX IF NOT EXISTS idx_sessions_user_id ON user_sessions(user_id);
  `);
};

const seedAdmin = (conn: Connection, passwordHash: string | null) => {
  if (countUsers(conn) > 0) return;

  if (!passwordHash) {
    // another process emptied the table between the probe and the transaction
    throw new MigrationError("Administrator password hash was not prepared");
  }

  conn
    .prepare(
      `INSERT INTO users (username, password_hash, email, role, created_at, is_active)
       VALUES (?, ?, ?, 'admin', ?, 1)`
    )
    .run(DEFAULT_ADMIN_USERNAME, passwordHash, DEFAULT_ADMIN_EMAIL, nowIso());

  logger.info(
    `👤 Default admin user created: username='${DEFAULT_ADMIN_USERNAME}' (change the password after first login)`
  );
};

const findAdminId = (conn: Connection): number => {
  const byName = conn
    .prepare<[string], { id: number }>("SELECT id FROM users WHERE username = ?")
    .get(DEFAULT_ADMIN_USERNAME);
  if (byName) return byName.id;

  const anyAdmin = conn
    .prepare<[], { id: number }>(
      "SELECT id FROM users WHERE role = 'admin' ORDER BY id LIMIT 1"
    )
    .get();
  if (anyAdmin) return anyAdmin.id;

  throw new MigrationError("No administrator account available to own existing data");
};

// adminId comes from an INTEGER PRIMARY KEY, so interpolating it into DDL is safe.
const ensureScrapedData = (conn: Connection, adminId: number) => {
  if (!tableExists(conn, "scraped_data")) {
    conn.exec(`
      CREATE TABLE scraped_data (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        url TEXT NOT NULL,
        title TEXT,
        summary TEXT,
        link TEXT NOT NULL,
        timestamp TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        sentiment TEXT,
        user_id INTEGER DEFAULT ${adminId},
        FOREIGN KEY (user_id) REFERENCES users(id) ON DELETE CASCADE
      )
    `);
  } else if (!columnExists(conn, "scraped_data", "user_id")) {
    logger.info("➕ Adding user_id column to scraped_data");
    // SQLite cannot attach a REFERENCES clause with a non-null default here
    conn.exec(`ALTER TABLE scraped_data ADD COLUMN user_id INTEGER DEFAULT ${adminId}`);
  }

  conn
    .prepare("UPDATE scraped_data SET user_id = ? WHERE user_id IS NULL")
    .run(adminId);
  conn.exec("CREATE INDEX IF NOT EXISTS idx_scraped_data_user_id ON scraped_data(user_id)");
};

const ensureSavedScrapers = (conn: Connection, adminId: number) => {
  if (!tableExists(conn, "saved_scrapers")) {
    conn.exec(`
      CREATE TABLE saved_scrapers (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT NOT NULL,
        url TEXT NOT NULL,
        selector TEXT NOT NULL,
        default_limit INTEGER DEFAULT 0,
        default_tags_csv TEXT,
        description TEXT,
        is_preinstalled INTEGER DEFAULT 0,
        user_id INTEGER DEFAULT ${adminId},
        is_shared INTEGER DEFAULT 0,
        FOREIGN KEY (user_id) REFERENCES users(id) ON DELETE SET DEFAULT
      )
    `);
  } else {
    if (!columnExists(conn, "saved_scrapers", "user_id")) {
      logger.info("➕ Adding user_id column to saved_scrapers");
      conn.exec(`ALTER TABLE saved_scrapers ADD COLUMN user_id INTEGER DEFAULT ${adminId}`);
    }
    if (!columnExists(conn, "saved_scrapers", "is_shared")) {
      logger.info("➕ Adding is_shared column to saved_scrapers");
      conn.exec("ALTER TABLE saved_scrapers ADD COLUMN is_shared INTEGER DEFAULT 0");
      if (columnExists(conn, "saved_scrapers", "is_preinstalled")) {
        conn.exec("UPDATE saved_scrapers SET is_shared = 1 WHERE is_preinstalled = 1");
      }
    }
  }

  conn
    .prepare("UPDATE saved_scrapers SET user_id = ? WHERE user_id IS NULL")
    .run(adminId);
  conn.exec("CREATE INDEX IF NOT EXISTS idx_saved_scrapers_user ON saved_scrapers(user_id)");
};

/**
 * Unversioned (legacy single-user) schema to 2.0.0.
 *
 * Creates the user/session/version tables, gives every resource table an owner
 * column, seeds the admin when there are no users and hands all ownerless rows
 * to that admin. One transaction: on failure the legacy schema is untouched.
 * Safe to call on a database that is already at or past 2.0.0.
 */
export const migrateLegacyToV2 = async (conn: Connection): Promise<boolean> => {
  try {
    logger.info(`⬆️  Migrating legacy schema to v${VERSION}...`);

    // bcrypt is async and the transaction is not, so hash up front when a seed is likely
    const needsSeed = !tableExists(conn, "users") || countUsers(conn) === 0;
    const adminPasswordHash = needsSeed
      ? await hashPassword(DEFAULT_ADMIN_PASSWORD)
      : null;

    conn.transaction(() => {
      createAuthTables(conn);
      seedAdmin(conn, adminPasswordHash);

      const adminId = findAdminId(conn);
      ensureScrapedData(conn, adminId);
      ensureSavedScrapers(conn, adminId);

      recordVersion(conn, VERSION, DESCRIPTION);
    })();

    logger.info(`✅ Migration to v${VERSION} complete`);
    return true;
  } catch (error) {
    logger.error(`❌ Migration to v${VERSION} failed:`, error);
    return false;
  }
};

export const multiUserFoundation: MigrationStep = {
  version: VERSION,
  description: DESCRIPTION,
  apply: migrateLegacyToV2,
};
