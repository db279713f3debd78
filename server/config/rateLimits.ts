/**
 * Rate Limiter Configuration
 *
 * Centralized configuration for the express-rate-limit instances.
 *
 * Each entry defines:
 *  - windowMs: time window in milliseconds
 *  - max: maximum number of requests per window
 *  - message: error message returned when limit is exceeded
 */

export interface RateLimitRule {
  windowMs: number;
  max: number;
  message: string;
}

export const RATE_LIMIT_CONFIG = {
  /** Failed logins per IP; successful ones are not counted */
  login: {
    windowMs: 15 * 60 * 1000, // 15 minutes
    max: 10,
    message: "Too many login attempts, please try again later.",
  },

  /** Account creation per IP */
  signup: {
    windowMs: 60 * 60 * 1000, // 1 hour
    max: 5,
    message: "Too many signup attempts from this IP, please try again later.",
  },
} as const satisfies Record<string, RateLimitRule>;
