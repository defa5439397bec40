/**
 * Failure kinds raised by the auth core. Each carries the HTTP status the
 * API layer answers with, so routers never have to re-classify them.
 */
export class AppError extends Error {
  readonly statusCode: number;
  readonly code: string;

  constructor(message: string, statusCode: number, code: string) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
  }
}

/** Bad credentials or inactive account. The message never says which. */
export class AuthenticationError extends AppError {
  constructor() {
    super("Invalid username or password", 401, "AUTHENTICATION_FAILED");
  }
}

/** Invalid, expired, blacklisted or wrong-type token. */
export class UnauthorizedError extends AppError {
  constructor(message = "Invalid or expired token") {
    super(message, 401, "UNAUTHORIZED");
  }
}

/** Identity is known, but its role or ownership is insufficient. */
export class PermissionDeniedError extends AppError {
  constructor(detail?: string) {
    super(
      detail ? `Insufficient permissions. ${detail}` : "Insufficient permissions",
      403,
      "PERMISSION_DENIED"
    );
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400, "VALIDATION_FAILED");
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404, "NOT_FOUND");
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 409, "CONFLICT");
  }
}

export class MigrationError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 500, "MIGRATION_FAILED");
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(message, 500, "CONFIGURATION_INVALID");
  }
}

const errorCode = (error: unknown): string | undefined => {
  if (typeof error !== "object" || error === null || !("code" in error)) {
    return undefined;
  }
  return typeof error.code === "string" ? error.code : undefined;
};

/**
 * True when a SQLite write failed on a UNIQUE constraint. Drizzle may hand the
 * driver error back directly or wrapped, so the cause chain is checked too.
 */
export const isUniqueViolation = (error: unknown): boolean => {
  let current: unknown = error;
  for (let depth = 0; depth < 3 && current; depth++) {
    if (errorCode(current) === "SQLITE_CONSTRAINT_UNIQUE") return true;
    current = current instanceof Error ? current.cause : undefined;
  }
  return false;
};
