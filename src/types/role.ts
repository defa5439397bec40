// Roles a user row may carry. The CHECK constraint on users.role uses the same set.
export const ROLES = ["admin", "user", "viewer"] as const;

export type Role = typeof ROLES[number];

export const isRole = (value: unknown): value is Role => {
  return typeof value === "string" && ROLES.some((role) => role === value);
};

// Effective access levels, lowest first. "guest" is what an unknown or
// deleted user resolves to; it is never stored.
export const ROLE_RANK = {
  guest: 0,
  viewer: 1,
  user: 2,
  admin: 3,
} as const;

export type AccessRole = keyof typeof ROLE_RANK;

export const toAccessRole = (value: unknown): AccessRole => {
  return isRole(value) ? value : "guest";
};

export const roleRank = (role: AccessRole): number => ROLE_RANK[role];

export const outranksOrEquals = (held: AccessRole, required: AccessRole) =>
  roleRank(held) >= roleRank(required);
