export type IdentitySource = "opaque-session" | "jwt-access";

export interface ResolvedIdentity {
  userId: number;
  source: IdentitySource;
}

/**
 * One way of turning a presented credential into a user id. Terminal sessions
 * and the HTTP API each have their own implementation with its own revocation
 * rules; callers only see this interface.
 *
 * `resolve` returns null for anything that is not a currently valid credential.
 */
export interface IdentityResolver {
  readonly source: IdentitySource;
  resolve(credential: string): Promise<ResolvedIdentity | null>;
}
