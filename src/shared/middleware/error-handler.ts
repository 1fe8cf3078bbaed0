import type { ErrorRequestHandler } from "express";

import { logger } from "../../config/logger.js";
import { HttpError } from "../errors/http-error.js";
import { SessionStoreUnavailableError } from "../errors/session-store-error.js";

interface BodyParserError {
  type: string;
  status: number;
}

// express.json() reports unreadable bodies with a `type` and a 4xx `status`.
const isBodyParserError = (error: unknown): error is BodyParserError => {
  return (
    typeof error === "object" &&
    error !== null &&
    "type" in error &&
    typeof error.type === "string" &&
    "status" in error &&
    typeof error.status === "number" &&
    error.status >= 400 &&
    error.status < 500
  );
};

export const errorHandler: ErrorRequestHandler = (error, req, res, _next) => {
  if (error instanceof HttpError) {
    res.status(error.statusCode).json(error.toBody());
    return;
  }

  if (isBodyParserError(error)) {
    logger.warn(`Rejected ${req.method} ${req.path}: unreadable body (${error.type})`);
    const rejection = new HttpError(error.status, "Invalid request payload", "VALIDATION_ERROR");
    res.status(rejection.statusCode).json(rejection.toBody());
    return;
  }

  if (error instanceof SessionStoreUnavailableError) {
    logger.error("Session store unavailable", error);
    res.status(503).json({
      error: {
        code: error.code,
        message: "Session store unavailable"
      }
    });
    return;
  }

  logger.error("Unhandled error", error);

  res.status(500).json({
    error: {
      code: "INTERNAL_SERVER_ERROR",
      message: "Unexpected server error"
    }
  });
};
