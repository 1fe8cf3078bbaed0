import type { Request, RequestHandler } from "express";
import { z } from "zod";

import { logger as rootLogger } from "../../config/logger.js";
import { HttpError } from "../../shared/errors/http-error.js";
import { SessionStoreUnavailableError } from "../../shared/errors/session-store-error.js";
import { successResponse } from "../../shared/http/api-response.js";
import type { Principal } from "../auth/session.types.js";

import type { AccountService } from "./account.service.js";

const logger = rootLogger.child("account");

const loginSchema = z
  .object({
    sampleId: z.string().trim().min(1).optional(),
    sampleID: z.string().trim().min(1).optional(),
    userName: z.string().trim().min(1).optional(),
    username: z.string().trim().min(1).optional()
  })
  .transform((body) => ({
    sampleId: body.sampleId ?? body.sampleID,
    userName: body.userName ?? body.username
  }))
  .pipe(
    z.object({
      sampleId: z.string(),
      userName: z.string()
    })
  );

const parseLoginRequest = (payload: unknown): z.infer<typeof loginSchema> => {
  const parsed = loginSchema.safeParse(payload);
  if (!parsed.success) {
    throw new HttpError(400, "Invalid login payload", "VALIDATION_ERROR");
  }

  return parsed.data;
};

interface AuthenticatedRequestContext {
  principal: Principal;
  username: string;
  sessionId: string;
}

const getAuthenticatedContext = (request: Request): AuthenticatedRequestContext => {
  if (!request.principal || !request.auth) {
    throw HttpError.unauthorized("Unverified");
  }

  return {
    principal: request.principal,
    username: request.auth.username,
    sessionId: request.auth.sessionId
  };
};

export interface AccountControllers {
  login: RequestHandler;
  me: RequestHandler;
  sessions: RequestHandler;
  logout: RequestHandler;
}

export const createAccountControllers = (accountService: AccountService): AccountControllers => ({
  login: async (req, res, next) => {
    try {
      const request = parseLoginRequest(req.body);
      const result = await accountService.login(request.sampleId, request.userName);

      res.json(successResponse(result));
    } catch (error) {
      if (error instanceof HttpError || error instanceof SessionStoreUnavailableError) {
        next(error);
        return;
      }

      logger.error("Login failed unexpectedly", error);
      next(HttpError.unauthorized("Invalid username or password", "INVALID_CREDENTIALS"));
    }
  },

  me: (req, res, next) => {
    try {
      const { principal } = getAuthenticatedContext(req);

      res.json(successResponse(principal));
    } catch (error) {
      next(error);
    }
  },

  sessions: async (req, res, next) => {
    try {
      const { username, sessionId } = getAuthenticatedContext(req);
      const sessions = await accountService.listSessions(username, sessionId);

      res.json(successResponse({ sessions }));
    } catch (error) {
      next(error);
    }
  },

  logout: async (req, res, next) => {
    try {
      const { username, sessionId } = getAuthenticatedContext(req);
      const loggedOut = await accountService.logout(username, sessionId);

      res.json(successResponse({ loggedOut }));
    } catch (error) {
      next(error);
    }
  }
});
