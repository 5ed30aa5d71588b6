/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts for testability — tests create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import type { Context } from "hono";
import type { AppEnv } from "./types/api-contract.js";
import { CustodyService } from "./services/custody-service.js";
import type { CustodyServiceConfig } from "./services/custody-service.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogger } from "./middleware/logger.js";
import { metricsMiddleware, MetricsCollector } from "./middleware/metrics.js";
import { createHealthRoutes } from "./routes/health.js";
import { createCustodyRoutes } from "./routes/custody.js";
import { createMetricsRoute } from "./routes/metrics.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly serviceConfig: Omit<CustodyServiceConfig, "metrics">;
  /** Request logger. When omitted, requests are not logged. */
  readonly requestLogger?: RequestLogger;
  /** Receives errors that become 500 responses */
  readonly onInternalError?: (err: Error, c: Context<AppEnv>) => void;
  /** Enable metrics collection. Default: true */
  readonly enableMetrics?: boolean;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: CustodyService;
  readonly metricsCollector: MetricsCollector;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const metricsCollector = new MetricsCollector();
  const enableMetrics = options.enableMetrics !== false;
  const service = new CustodyService({
    ...options.serviceConfig,
    metrics: enableMetrics ? metricsCollector : undefined,
  });

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.requestLogger !== undefined) {
    app.use("*", loggerMiddleware(options.requestLogger));
  }

  if (enableMetrics) {
    app.use("*", metricsMiddleware(metricsCollector));
  }

  app.use("*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(createErrorHandler(options.onInternalError));

  // ─── Health Routes ──────────────────────────────────────────────
  app.route("/", createHealthRoutes());

  // ─── Metrics Route (Prometheus scraping) ────────────────────────
  if (enableMetrics) {
    app.route("/", createMetricsRoute(metricsCollector));
  }

  // ─── API Routes ─────────────────────────────────────────────────
  app.route("/api/v1", createCustodyRoutes());

  return { app, service, metricsCollector };
}
