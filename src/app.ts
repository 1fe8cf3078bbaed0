import cors from "cors";
import express from "express";
import type { Express } from "express";

import type { AppContext } from "./context.js";
import { createAccountRouter } from "./modules/account/account.routes.js";
import { createDocsRouter } from "./modules/docs/docs.routes.js";
import { createHomeRouter } from "./modules/home/home.routes.js";
import { createAuthGate } from "./shared/middleware/auth-gate.js";
import { errorHandler } from "./shared/middleware/error-handler.js";
import { notFoundHandler } from "./shared/middleware/not-found.js";
import { createLoginRateLimiter } from "./shared/middleware/rate-limit.js";

export const createApp = (context: AppContext): Express => {
  const { env } = context;
  const app = express();

  app.disable("x-powered-by");

  const allowedOrigins = new Set<string>(env.CORS_ALLOWED_ORIGINS);

  app.use(
    cors({
      origin: (requestOrigin, callback) => {
        if (!requestOrigin || allowedOrigins.size === 0 || allowedOrigins.has(requestOrigin)) {
          callback(null, true);
          return;
        }

        callback(new Error(`CORS origin not allowed: ${requestOrigin}`));
      },
      allowedHeaders: ["Content-Type", env.ACCESS_TOKEN_HEADER]
    })
  );

  // Credentials are checked before the body is parsed.
  app.use(
    createAuthGate({
      authenticator: context.authenticator,
      headerName: env.ACCESS_TOKEN_HEADER
    })
  );

  app.use(express.json());

  app.use(createHomeRouter(env.SERVICE_NAME));
  app.use(createDocsRouter(context.openApiDocument, env.SERVICE_NAME));
  app.use(
    "/account",
    createAccountRouter(
      context.accountService,
      createLoginRateLimiter({
        windowMs: env.RATE_LIMIT_WINDOW_MS,
        max: env.RATE_LIMIT_MAX_LOGIN
      })
    )
  );

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
