/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { CustodyService } from "../services/custody-service.js";

/**
 * Hono environment type for the custody node.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** The custody service behind the API (set by app middleware) */
    service: CustodyService;
  };
}
