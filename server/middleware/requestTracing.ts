import type { Request, Response, NextFunction } from "express";
import { randomUUID } from "node:crypto";
import { createChildLogger } from "../logger";

const REQUEST_ID_HEADER = "X-Request-ID";
const MAX_REQUEST_ID_LENGTH = 128;

/**
 * Attaches `req.requestId` (the upstream X-Request-ID when present, else a
 * UUIDv4) and `req.log`, a child logger bound to it, and echoes the ID back.
 * One summary line is logged per request, at a level following the status.
 */
export function requestTracing(req: Request, res: Response, next: NextFunction) {
  const incoming = req.headers[REQUEST_ID_HEADER.toLowerCase()];
  const requestId =
    typeof incoming === "string" && incoming.trim() && incoming.length <= MAX_REQUEST_ID_LENGTH
      ? incoming.trim()
      : randomUUID();

  req.requestId = requestId;
  req.log = createChildLogger({ requestId });

  res.setHeader(REQUEST_ID_HEADER, requestId);

  const start = Date.now();

  res.on("finish", () => {
    const context = {
      method: req.method,
      url: req.originalUrl,
      status: res.statusCode,
      durationMs: Date.now() - start,
      userId: req.currentUser?.id,
    };
    if (res.statusCode >= 500) req.log.error("request failed", context);
    else if (res.statusCode >= 400) req.log.warn("request rejected", context);
    else req.log.info("request completed", context);
  });

  next();
}
