import jwt from "jsonwebtoken";
import crypto from "crypto";

export const OPAQUE_TOKEN_BYTES = 32;

/**
 * 256 bits from the CSPRNG, base64url encoded (43 characters).
 */
export const newOpaqueToken = (): string => {
  return crypto.randomBytes(OPAQUE_TOKEN_BYTES).toString("base64url");
};

export const JWT_ALGORITHM = "HS256";

export const signToken = (
  payload: { sub: string; type: string },
  secret: string,
  expiresInSeconds: number
): string => {
  return jwt.sign(payload, secret, {
    algorithm: JWT_ALGORITHM,
    expiresIn: expiresInSeconds,
    jwtid: crypto.randomUUID(),
  });
};

/**
 * Verifies signature and expiry. Throws whatever jsonwebtoken throws.
 */
export const verifyToken = (
  token: string,
  secret: string
): string | jwt.JwtPayload => {
  return jwt.verify(token, secret, { algorithms: [JWT_ALGORITHM] });
};
