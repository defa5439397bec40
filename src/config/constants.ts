// Bootstrap administrator, created only while the users table is empty.
// Change the password right after the first login.
export const DEFAULT_ADMIN_USERNAME = "admin";
export const DEFAULT_ADMIN_PASSWORD = "Ch4ng3M3";
export const DEFAULT_ADMIN_EMAIL = "admin@localhost";

export const DEFAULT_SESSION_DURATION_HOURS = 24;
export const ACCESS_TOKEN_EXPIRE_MINUTES = 30;
export const REFRESH_TOKEN_EXPIRE_DAYS = 7;

export const USERNAME_MIN_LENGTH = 3;
export const USERNAME_MAX_LENGTH = 50;
export const PASSWORD_MIN_LENGTH = 8;
