import rateLimit from "express-rate-limit";
import type { RequestHandler } from "express";
import { RATE_LIMIT_CONFIG, type RateLimitRule } from "../config/rateLimits";
import { Errors } from "../utils/apiError";

/**
 * In-memory limiter (one per process). The 429 body uses the shared error shape.
 */
function buildLimiter(rule: RateLimitRule, options: { skipSuccessfulRequests?: boolean } = {}): RequestHandler {
  return rateLimit({
    windowMs: rule.windowMs,
    limit: rule.max,
    standardHeaders: true,
    legacyHeaders: false,
    skipSuccessfulRequests: options.skipSuccessfulRequests ?? false,
    handler: (req, res) => {
      req.log.warn("Rate limit exceeded", { path: req.originalUrl, ip: req.ip });
      Errors.rateLimited(res, rule.message);
    },
  });
}

export function createLoginLimiter(): RequestHandler {
  return buildLimiter(RATE_LIMIT_CONFIG.login, { skipSuccessfulRequests: true });
}

export function createSignupLimiter(): RequestHandler {
  return buildLimiter(RATE_LIMIT_CONFIG.signup);
}
