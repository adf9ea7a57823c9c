import type { ErrorRequestHandler, RequestHandler } from "express";
import type { Logger } from "@destruction/observability";
import type { ErrorResponse } from "@destruction/types";

import crypto from "node:crypto";

import cors from "cors";
import express from "express";
import rateLimit from "express-rate-limit";
import { pinoHttp } from "pino-http";

export class HttpError extends Error {
  public status: number;
  public code: string;
  constructor(status: number, code: string, message: string) {
    super(message);
    this.name = "HttpError";
    this.status = status;
    this.code = code;
  }
}

export function badRequest(code: string, message: string) {
  return new HttpError(400, code, message);
}
export function notFound(code: string, message: string) {
  return new HttpError(404, code, message);
}

export const TOO_MANY_REQUESTS_MESSAGE = "Too many requests";

export function createHttpApp(opts: { logger: Logger; corsAllowedOrigins: string[]; rateLimitPerMinute: number }) {
  const app = express();
  app.disable("x-powered-by");

  app.use(requestIdMiddleware());
  app.use(
    pinoHttp({
      logger: opts.logger,
      customProps: (req: express.Request) => ({ request_id: req.requestId })
    })
  );
  app.use(
    cors({
      origin: (origin, cb) => {
        if (!origin) return cb(null, true);
        if (!opts.corsAllowedOrigins.length) return cb(null, true);
        cb(null, opts.corsAllowedOrigins.includes(origin));
      }
    })
  );
  app.use(
    rateLimit({
      windowMs: 60_000,
      limit: opts.rateLimitPerMinute,
      standardHeaders: true,
      legacyHeaders: false,
      skip: (req) => req.path === "/healthz",
      handler: (req, res, _next, options) => {
        opts.logger.warn({ request_id: req.requestId, limit: opts.rateLimitPerMinute }, "rate limit exceeded");
        const body: ErrorResponse = { error: TOO_MANY_REQUESTS_MESSAGE };
        res.status(options.statusCode).json(body);
      }
    })
  );

  app.use(express.json({ limit: "1mb" }));

  return app;
}

export const notFoundHandler: RequestHandler = (req, _res, next) => {
  next(notFound("not_found", `Route not found: ${req.method} ${req.path}`));
};

declare module "express-serve-static-core" {
  interface Request {
    requestId: string;
  }
}

function requestIdMiddleware(): RequestHandler {
  return (req, res, next) => {
    const incoming = req.header("x-request-id");
    const requestId = incoming && incoming.trim().length ? incoming : crypto.randomUUID();
    req.requestId = requestId;
    res.setHeader("x-request-id", requestId);
    next();
  };
}

// body-parser raises errors carrying an http status and `expose` for client faults.
type ExposedClientError = { status: number; expose: boolean; type?: unknown };

function isExposedClientError(err: unknown): err is ExposedClientError {
  if (typeof err !== "object" || err === null) return false;
  if (!("status" in err) || !("expose" in err)) return false;
  return typeof err.status === "number" && err.status >= 400 && err.status < 500 && err.expose === true;
}

export function errorHandler(opts: { logger: Logger }): ErrorRequestHandler {
  return (err, req, res, _next) => {
    void _next;
    const requestId = req.requestId || "";
    if (err instanceof HttpError) {
      opts.logger[err.status >= 500 ? "error" : "warn"]({ err, code: err.code, request_id: requestId }, "request failed");
      const body: ErrorResponse = { error: err.message };
      res.status(err.status).json(body);
      return;
    }
    if (isExposedClientError(err)) {
      opts.logger.warn({ err, type: err.type, request_id: requestId }, "malformed request");
      const body: ErrorResponse = { error: err.type === "entity.parse.failed" ? "Request body must be valid JSON" : "Malformed request" };
      res.status(err.status).json(body);
      return;
    }
    opts.logger.error({ err, request_id: requestId }, "unhandled error");
    const body: ErrorResponse = { error: err instanceof Error ? err.message : "Unknown error" };
    res.status(500).json(body);
  };
}
