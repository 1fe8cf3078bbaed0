import { Router } from "express";
import type { RequestHandler } from "express";

import type { AccountService } from "./account.service.js";
import { createAccountControllers } from "./account.controller.js";

export const createAccountRouter = (accountService: AccountService, loginRateLimiter: RequestHandler): Router => {
  const controllers = createAccountControllers(accountService);
  const accountRouter = Router();

  accountRouter.post("/login", loginRateLimiter, controllers.login);
  accountRouter.get("/me", controllers.me);
  accountRouter.get("/sessions", controllers.sessions);
  accountRouter.post("/logout", controllers.logout);

  return accountRouter;
};
