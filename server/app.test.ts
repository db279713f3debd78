/**
 * @fileoverview Tests for the app-level handlers: error mapping, JSON 404 and the CORS allow-list
 */

import { describe, it, expect, vi, beforeEach } from "vitest";

vi.mock("./logger", async () => (await import("./__tests__/helpers/mockAuth")).createMockLoggerModule());

import { errorHandler, isOriginAllowed, notFoundHandler } from "./app";
import {
  createMockNext,
  createMockRequest,
  createMockResponse,
  createTestConfig,
} from "./__tests__/helpers";

describe("errorHandler", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("maps an oversized body to 413", () => {
    const req = createMockRequest();
    const res = createMockResponse();
    const err = Object.assign(new Error("request entity too large"), { status: 413, type: "entity.too.large" });

    errorHandler(err, req, res, createMockNext());

    expect(res.status).toHaveBeenCalledWith(413);
    expect(res.json).toHaveBeenCalledWith({ error: "PAYLOAD_TOO_LARGE", message: "Payload too large." });
  });

  it("maps a malformed JSON body to 400 without logging", () => {
    const req = createMockRequest();
    const res = createMockResponse();
    const err = Object.assign(new SyntaxError("Unexpected token } in JSON"), {
      status: 400,
      type: "entity.parse.failed",
    });

    errorHandler(err, req, res, createMockNext());

    expect(res.status).toHaveBeenCalledWith(400);
    expect(res.json).toHaveBeenCalledWith({ error: "BAD_REQUEST", message: "Malformed request body." });
    expect(req.log.error).not.toHaveBeenCalled();
  });

  it("logs anything else and answers 500", () => {
    const req = createMockRequest({ method: "POST", originalUrl: "/games/1/move" });
    const res = createMockResponse();
    const err = new Error("boom");

    errorHandler(err, req, res, createMockNext());

    expect(res.status).toHaveBeenCalledWith(500);
    expect(res.json).toHaveBeenCalledWith({
      error: "INTERNAL_ERROR",
      message: "An unexpected error occurred.",
    });
    expect(req.log.error).toHaveBeenCalledWith("Unhandled error", {
      error: err,
      method: "POST",
      url: "/games/1/move",
    });
  });

  it("a 5xx status on the error is still ours", () => {
    const req = createMockRequest();
    const res = createMockResponse();

    errorHandler(Object.assign(new Error("upstream"), { status: 502 }), req, res, createMockNext());

    expect(res.status).toHaveBeenCalledWith(500);
  });

  it("hands off to express once headers are sent", () => {
    const req = createMockRequest();
    const res = Object.assign(createMockResponse(), { headersSent: true });
    const next = createMockNext();
    const err = new Error("late");

    errorHandler(err, req, res, next);

    expect(next).toHaveBeenCalledWith(err);
    expect(res.status).not.toHaveBeenCalled();
  });
});

describe("notFoundHandler", () => {
  it("answers a JSON 404", () => {
    const res = createMockResponse();

    notFoundHandler(createMockRequest({ originalUrl: "/nowhere" }), res, createMockNext());

    expect(res.status).toHaveBeenCalledWith(404);
    expect(res.json).toHaveBeenCalledWith({ error: "NOT_FOUND", message: "Resource not found." });
  });
});

describe("isOriginAllowed", () => {
  const production = createTestConfig({
    NODE_ENV: "production",
    DATABASE_URL: "postgres://db/app",
    ALLOWED_ORIGINS: "https://app.example",
  });

  it("allows requests without an origin", () => {
    expect(isOriginAllowed(production, undefined)).toBe(true);
  });

  it("allows listed origins and refuses others in production", () => {
    expect(isOriginAllowed(production, "https://app.example")).toBe(true);
    expect(isOriginAllowed(production, "https://evil.example")).toBe(false);
  });

  it("refuses every browser origin in production with an empty list", () => {
    const locked = createTestConfig({ NODE_ENV: "production", DATABASE_URL: "postgres://db/app" });
    expect(isOriginAllowed(locked, "https://app.example")).toBe(false);
  });

  it("allows any origin outside production when the list is empty", () => {
    expect(isOriginAllowed(createTestConfig(), "http://localhost:5173")).toBe(true);
  });

  it("enforces a configured list outside production too", () => {
    const config = createTestConfig({ ALLOWED_ORIGINS: "http://localhost:5173" });
    expect(isOriginAllowed(config, "http://localhost:5173")).toBe(true);
    expect(isOriginAllowed(config, "http://localhost:4000")).toBe(false);
  });
});
