/**
 * Express Application Factory
 *
 * Builds the app from an already-loaded config and wired services, so tests
 * and the standalone server share exactly the same middleware stack.
 */
import express, { type ErrorRequestHandler, type RequestHandler } from "express";
import compression from "compression";
import helmet from "helmet";
import cors from "cors";
import type { AppConfig } from "./config/env";
import { BODY_PARSE_LIMIT } from "./config/server";
import { requestTracing } from "./middleware/requestTracing";
import { registerRoutes } from "./routes";
import type { AppServices } from "./services";
import { Errors, sendError } from "./utils/apiError";

function statusOf(err: unknown): number | undefined {
  if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number") {
    return err.status;
  }
  return undefined;
}

// Body-parser failures carry a 4xx status; anything else is ours
export const errorHandler: ErrorRequestHandler = (err: unknown, req, res, next) => {
  if (res.headersSent) return next(err);

  const status = statusOf(err);
  if (status === 413) return sendError(res, 413, "PAYLOAD_TOO_LARGE", "Payload too large.");
  if (status !== undefined && status >= 400 && status < 500) {
    return sendError(res, status, "BAD_REQUEST", "Malformed request body.");
  }

  req.log.error("Unhandled error", { error: err, method: req.method, url: req.originalUrl });
  Errors.internal(res);
};

export const notFoundHandler: RequestHandler = (_req, res) => {
  Errors.notFound(res);
};

/**
 * No origin (curl, server-to-server) is always allowed. Outside production an
 * empty allow-list means any origin.
 */
export function isOriginAllowed(config: AppConfig, origin: string | undefined): boolean {
  const allowedOrigins = config.server.allowedOrigins;
  const open = config.nodeEnv !== "production" && allowedOrigins.length === 0;
  return !origin || open || allowedOrigins.includes(origin);
}

export function createApp(config: AppConfig, services: AppServices): express.Express {
  const app = express();

  // Trust the first proxy hop so req.ip reflects the real client (rate limiting)
  app.set("trust proxy", 1);

  // Request ID and per-request logger before anything else
  app.use(requestTracing);

  if (config.nodeEnv === "production") {
    app.use(helmet());
  }

  app.use(
    cors({
      origin(origin, callback) {
        callback(null, isOriginAllowed(config, origin));
      },
    })
  );

  app.use(compression());
  app.use(express.json({ limit: BODY_PARSE_LIMIT }));

  registerRoutes(app, services);

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
