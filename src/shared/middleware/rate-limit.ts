import rateLimit from "express-rate-limit";
import type { RequestHandler } from "express";

export interface LoginRateLimitConfig {
  windowMs: number;
  max: number;
}

const buildRateLimitMessage = (message: string) => ({
  error: {
    code: "RATE_LIMITED",
    message
  }
});

export const createLoginRateLimiter = (config: LoginRateLimitConfig): RequestHandler => {
  return rateLimit({
    windowMs: config.windowMs,
    limit: config.max,
    standardHeaders: true,
    legacyHeaders: false,
    message: buildRateLimitMessage("Too many login requests. Please wait and try again.")
  });
};
