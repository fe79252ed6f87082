import type { Request } from "express";
import crypto from "node:crypto";
import { isProduction, type Config } from "../config.js";

export class AuthError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "AuthError";
  }
}

export const USER_ID_HEADER = "x-user-id";

function digest(value: string): Buffer {
  return crypto.createHash("sha256").update(value).digest();
}

// Hashing first gives equal-length buffers, which timingSafeEqual requires.
function tokensMatch(given: string, expected: string): boolean {
  return crypto.timingSafeEqual(digest(given), digest(expected));
}

/**
 * Authenticates a caller of the HTTP surfaces and returns the acting user id.
 *
 * Callers present the shared `API_TOKEN` as a Bearer token and name the user
 * they act for in `X-User-Id`. Outside production, `DEV_USER_ID` skips both.
 */
export function authenticateRequest(req: Pick<Request, "headers">, config: Config): string {
  if (config.DEV_USER_ID && !isProduction(config)) {
    return config.DEV_USER_ID;
  }

  if (!config.API_TOKEN) {
    throw new AuthError("Server has no API_TOKEN configured");
  }

  const authHeader = req.headers.authorization;
  if (!authHeader?.startsWith("Bearer ")) {
    throw new AuthError("Missing or invalid Authorization header");
  }
  if (!tokensMatch(authHeader.slice(7), config.API_TOKEN)) {
    throw new AuthError("Invalid token");
  }

  const userHeader = req.headers[USER_ID_HEADER];
  const userId = (Array.isArray(userHeader) ? userHeader[0] : userHeader)?.trim();
  if (!userId) {
    throw new AuthError("Missing X-User-Id header");
  }
  return userId;
}
