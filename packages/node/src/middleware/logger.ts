/**
 * Structured request logging middleware.
 *
 * Emits one pino entry per request with method, path, status, duration
 * and request id. Server errors log at `error`, client errors at `warn`.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export interface RequestLogEntry {
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
  readonly requestId: string;
}

/** The subset of a pino logger the middleware writes to */
export interface RequestLogger {
  info(obj: RequestLogEntry, msg: string): void;
  warn(obj: RequestLogEntry, msg: string): void;
  error(obj: RequestLogEntry, msg: string): void;
}

export function loggerMiddleware(logger: RequestLogger): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = Date.now();

    await next();

    const entry: RequestLogEntry = {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Date.now() - start,
      requestId: c.get("requestId"),
    };
    const msg = `${entry.method} ${entry.path} ${String(entry.status)}`;

    if (entry.status >= 500) {
      logger.error(entry, msg);
    } else if (entry.status >= 400) {
      logger.warn(entry, msg);
    } else {
      logger.info(entry, msg);
    }
  };
}
