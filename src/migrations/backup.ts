import fs from "fs/promises";
import path from "path";
import { formatFileTimestamp } from "../utils/date";
import { NotFoundError } from "../utils/errors";
import { logger } from "../utils/logger";

/**
 * Copies the database file to `<file>.<label>-YYYYMMDD_HHMMSS` beside it.
 *
 * runMigrations never calls this; startup and ops scripts do, before they
 * migrate a legacy file.
 */
export const createBackup = async (
  dbPath: string,
  label = "backup"
): Promise<string> => {
  try {
    await fs.access(dbPath);
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      throw new NotFoundError(`Database not found: ${dbPath}`);
    }
    throw error;
  }

  const backupPath = path.join(
    path.dirname(dbPath),
    `${path.basename(dbPath)}.${label}-${formatFileTimestamp()}`
  );

  logger.info(`💾 Creating backup: ${backupPath}`);
  await fs.copyFile(dbPath, backupPath, fs.constants.COPYFILE_EXCL);

  return backupPath;
};
