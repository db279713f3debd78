import type { Request, Response, NextFunction, RequestHandler } from "express";
import type { IStorage } from "../storage/types";
import { Errors } from "../utils/apiError";
import { DatabaseUnavailableError } from "../db";
import { AuthService, TokenExpiredError, TokenMalformedError } from "./service";

function bearerToken(req: Request): string | undefined {
  const header = req.headers.authorization ?? "";
  if (!header.startsWith("Bearer ")) return undefined;
  const token = header.slice("Bearer ".length).trim();
  return token || undefined;
}

/**
 * Resolves the bearer token to a live user and sets `req.currentUser`.
 * A token whose user is gone or soft-deleted is refused even if unexpired.
 */
export function createAuthenticateUser(auth: AuthService, storage: IStorage): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction) => {
    const token = bearerToken(req);
    if (!token) {
      return Errors.unauthorized(res, "INVALID_TOKEN", "invalid token");
    }

    let userId: number;
    try {
      userId = auth.decodeToken(token).userId;
    } catch (error) {
      if (error instanceof TokenExpiredError) {
        return Errors.unauthorized(res, "EXPIRED_TOKEN", "expired token");
      }
      if (error instanceof TokenMalformedError) {
        return Errors.unauthorized(res, "INVALID_TOKEN", "invalid token");
      }
      return next(error);
    }

    try {
      const user = await storage.getUser(userId);
      if (!user) {
        return Errors.unauthorized(res, "INVALID_TOKEN", "invalid token");
      }
      if (user.deleted) {
        return Errors.unauthorized(res, "USER_DELETED", "user has been deleted");
      }
      req.currentUser = user;
      next();
    } catch (error) {
      if (error instanceof DatabaseUnavailableError) {
        return Errors.dbUnavailable(res);
      }
      req.log.error("Authentication lookup failed", { error });
      return Errors.internal(res);
    }
  };
}
