import rateLimit from "express-rate-limit";
import type { RequestHandler } from "express";
import type { AppConfig } from "../config.js";

export function createApiRateLimiter(config: Pick<AppConfig, "RATE_LIMIT_WINDOW_MS" | "RATE_LIMIT_MAX">): RequestHandler {
  return rateLimit({
    windowMs: config.RATE_LIMIT_WINDOW_MS,
    limit: config.RATE_LIMIT_MAX,
    standardHeaders: true,
    legacyHeaders: false,
    message: { error: "Too many requests" }
  });
}
