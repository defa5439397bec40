import bcrypt from "bcrypt";
import { logger } from "./logger";
import { ValidationError } from "./errors";

// Stored hashes embed their own cost ("$2b$12$..."), so raising this later
// keeps older hashes verifiable.
export const BCRYPT_ROUNDS = 12;

// bcrypt ignores everything past this many bytes of input
export const BCRYPT_MAX_PASSWORD_BYTES = 72;

const exceedsBcryptLimit = (password: string) =>
  Buffer.byteLength(password, "utf8") > BCRYPT_MAX_PASSWORD_BYTES;

export const hashPassword = async (password: string): Promise<string> => {
  if (!password) {
    throw new ValidationError("Password is required");
  }
  if (exceedsBcryptLimit(password)) {
    throw new ValidationError(
      `Password must be at most ${BCRYPT_MAX_PASSWORD_BYTES} bytes`
    );
  }

  return bcrypt.hash(password, BCRYPT_ROUNDS);
};

/**
 * Never throws: a malformed stored hash counts as a mismatch and is logged.
 * Input past the bcrypt limit never matches, since no stored hash can have
 * been made from it.
 */
export const verifyPassword = async (
  password: string,
  passwordHash: string
): Promise<boolean> => {
  if (hashCost(passwordHash) === null) {
    logger.warn("⚠️ Stored password hash is malformed; treating as mismatch");
    return false;
  }
  if (exceedsBcryptLimit(password)) {
    return false;
  }

  try {
    return await bcrypt.compare(password, passwordHash);
  } catch (error) {
    logger.error("❌ Password verification error:", error);
    return false;
  }
};

export const hashCost = (passwordHash: string): number | null => {
  try {
    return bcrypt.getRounds(passwordHash);
  } catch {
    return null;
  }
};
