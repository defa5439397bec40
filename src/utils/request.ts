import { Request } from "express";

/**
 * Reads a string field from a JSON body without trusting its shape.
 */
export const bodyString = (req: Request, key: string): string | undefined => {
  const body: unknown = req.body;
  if (typeof body !== "object" || body === null) return undefined;

  const value: unknown = Reflect.get(body, key);
  return typeof value === "string" ? value : undefined;
};

export const bodyBoolean = (req: Request, key: string): boolean | undefined => {
  const body: unknown = req.body;
  if (typeof body !== "object" || body === null) return undefined;

  const value: unknown = Reflect.get(body, key);
  return typeof value === "boolean" ? value : undefined;
};

export const bearerToken = (req: Request): string | null => {
  const header = req.headers.authorization;
  if (!header?.startsWith("Bearer ")) return null;

  const token = header.slice("Bearer ".length).trim();
  return token || null;
};

export const cookieToken = (req: Request, name: string): string | null => {
  const value: unknown = req.cookies?.[name];
  return typeof value === "string" && value ? value : null;
};

/**
 * Client address as Express resolves it. X-Forwarded-For is honoured only
 * when the app sets `trust proxy`.
 */
export const getIpAddress = (req: Request): string | undefined =>
  req.ip ?? req.socket.remoteAddress;
