import rateLimit, { type RateLimitRequestHandler } from "express-rate-limit";
import type { ApiErrorResponse } from "@supplygraph/shared";
import { appConfig } from "../config.js";

export interface RateLimiterOptions {
  windowMs?: number;
  limit?: number;
}

export function createRateLimiter(options: RateLimiterOptions = {}): RateLimitRequestHandler {
  const body: ApiErrorResponse = {
    errorCode: "INVALID_REQUEST",
    message: "Too many requests, please try again later"
  };

  return rateLimit({
    windowMs: options.windowMs ?? appConfig.RATE_LIMIT_WINDOW_MS,
    limit: options.limit ?? appConfig.RATE_LIMIT_MAX,
    standardHeaders: "draft-7",
    legacyHeaders: false,
    message: body
  });
}
