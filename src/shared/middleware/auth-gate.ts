import type { RequestHandler, Response } from "express";

import { logger as rootLogger } from "../../config/logger.js";
import type { AuthErrorCode, Authenticator } from "../../modules/auth/authenticator.js";
import { SessionStoreUnavailableError } from "../errors/session-store-error.js";

const logger = rootLogger.child("auth");

export const PUBLIC_PATHS: readonly string[] = ["/", "/account/login", "/docs", "/redoc", "/openapi.json"];

export const REJECTION_DETAILS: Record<AuthErrorCode, string> = {
  MISSING_CREDENTIAL: "No AccessToken",
  INVALID_CREDENTIAL: "Invalid AccessToken",
  EXPIRED_CREDENTIAL: "AccessToken expired",
  SESSION_NOT_LIVE: "Invalid AccessToken (logged out or exceeded the limit)"
};

export const SESSION_STORE_UNAVAILABLE_DETAIL = "Session store unavailable";

export interface AuthGateOptions {
  authenticator: Authenticator;
  headerName: string;
  publicPaths?: readonly string[];
}

const reject = (res: Response, statusCode: number, detail: string): void => {
  res.status(statusCode).json({ detail });
};

/**
 * Every path outside the exact-match allow-list must end up either with
 * `req.principal` set or with a 401 before any router runs.
 */
export const createAuthGate = (options: AuthGateOptions): RequestHandler => {
  const publicPaths = new Set(options.publicPaths ?? PUBLIC_PATHS);

  return async (req, res, next) => {
    if (publicPaths.has(req.path)) {
      next();
      return;
    }

    try {
      const result = await options.authenticator.verifyRequest(req.get(options.headerName));

      if (!result.ok) {
        logger.warn(`Rejected ${req.method} ${req.path}: ${result.error.code} (${result.error.message})`);
        reject(res, 401, REJECTION_DETAILS[result.error.code]);
        return;
      }

      req.principal = result.value.principal;
      req.auth = {
        username: result.value.username,
        sessionId: result.value.sessionId
      };
      next();
    } catch (error) {
      if (error instanceof SessionStoreUnavailableError) {
        logger.error(`Session store unavailable while authenticating ${req.method} ${req.path}`, error);
        reject(res, 503, SESSION_STORE_UNAVAILABLE_DETAIL);
        return;
      }

      next(error);
    }
  };
};
