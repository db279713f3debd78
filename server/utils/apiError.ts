import type { Response } from "express";
import type { ServiceFailure } from "../services/types";

/**
 * Every error response has the same body:
 *
 *  {
 *    "error":   "MACHINE_READABLE_CODE",
 *    "message": "Human-readable description.",
 *    "details": { ... }          // optional
 *  }
 */
export interface ApiErrorBody {
  error: string;
  message: string;
  details?: Record<string, unknown>;
}

export function sendError(
  res: Response,
  status: number,
  error: string,
  message: string,
  details?: Record<string, unknown>
): Response {
  const body: ApiErrorBody = { error, message };
  if (details && Object.keys(details).length > 0) body.details = details;
  return res.status(status).json(body);
}

/** Translate a failed service result into its HTTP response. */
export function sendServiceFailure(res: Response, failure: ServiceFailure): Response {
  return sendError(res, failure.status, failure.error, failure.message, failure.details);
}

export const Errors = {
  /** 422 with the zod issues in details */
  validation: (res: Response, issues: unknown, message = "Request validation failed.") =>
    sendError(res, 422, "VALIDATION_ERROR", message, { issues }),

  unauthorized: (res: Response, error = "UNAUTHORIZED", message = "Authentication required.") =>
    sendError(res, 401, error, message),

  notFound: (res: Response, error = "NOT_FOUND", message = "Resource not found.") =>
    sendError(res, 404, error, message),

  rateLimited: (res: Response, message = "Too many requests. Please try again later.") =>
    sendError(res, 429, "RATE_LIMITED", message),

  internal: (res: Response, error = "INTERNAL_ERROR", message = "An unexpected error occurred.") =>
    sendError(res, 500, error, message),

  dbUnavailable: (res: Response) =>
    sendError(res, 503, "DATABASE_UNAVAILABLE", "Database unavailable. Please try again shortly."),
} as const;
