import type { User } from "../../packages/shared/schema";

interface RequestLogger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  fatal(message: string, context?: Record<string, unknown>): void;
  child(bindings: Record<string, unknown>): RequestLogger;
}

declare global {
  namespace Express {
    interface Request {
      /** Set by the bearer-token middleware; never a soft-deleted user */
      currentUser?: User;
      /** Unique request trace ID (from X-Request-ID header or generated) */
      requestId: string;
      /** Child logger with requestId pre-bound */
      log: RequestLogger;
    }
  }
}

export {};
