import { Router } from "express";

import { successResponse } from "../../shared/http/api-response.js";

export const createHomeRouter = (serviceName: string): Router => {
  const homeRouter = Router();

  homeRouter.get("/", (_req, res) => {
    res.json(
      successResponse({
        service: serviceName,
        status: "ok"
      })
    );
  });

  return homeRouter;
};
