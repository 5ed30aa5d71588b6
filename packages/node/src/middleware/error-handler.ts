/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps domain error codes (LedgerError, VaultError) to HTTP status codes.
 * Anything without a known code is a 500 with a generic message.
 */

import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import type { CustodyErrorCode } from "@custody/types";
import { createErrorEnvelope } from "../types/error.js";
import type { ApiErrorCode } from "../types/error.js";
import type { AppEnv } from "../types/api-contract.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

const STATUS_MAP: Readonly<Partial<Record<CustodyErrorCode, ContentfulStatusCode>>> = {
  // Rejected input
  ZERO_AMOUNT: 400,
  INVALID_AMOUNT: 400,
  INVALID_ARGUMENT: 400,
  WRONG_DEPOSIT_PATH: 400,

  // Well-formed but refused by policy or balance
  INSUFFICIENT_BALANCE: 422,
  CAP_EXCEEDED: 422,
  LIMIT_EXCEEDED: 422,

  REENTRANT_CALL: 409,

  // Upstream collaborators
  INVALID_ORACLE_READING: 502,
  TRANSFER_FAILED: 502,
};

const KNOWN_CODES: ReadonlySet<string> = new Set<CustodyErrorCode>([
  "ZERO_AMOUNT",
  "CAP_EXCEEDED",
  "LIMIT_EXCEEDED",
  "INSUFFICIENT_BALANCE",
  "INVALID_ORACLE_READING",
  "TRANSFER_FAILED",
  "WRONG_DEPOSIT_PATH",
  "INVALID_AMOUNT",
  "INVALID_ARGUMENT",
  "INVALID_CONFIG",
  "REENTRANT_CALL",
  "INVARIANT_VIOLATION",
  "INVALID_SNAPSHOT",
]);

function isCustodyErrorCode(code: unknown): code is CustodyErrorCode {
  return typeof code === "string" && KNOWN_CODES.has(code);
}

function domainCode(err: Error): CustodyErrorCode | undefined {
  const code: unknown = "code" in err ? err.code : undefined;
  return isCustodyErrorCode(code) ? code : undefined;
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Build the global error handler. Registered as Hono's onError handler.
 *
 * `onInternalError` sees every error that maps to a 500, before its
 * details are hidden from the client.
 */
export function createErrorHandler(
  onInternalError?: (err: Error, c: Context<AppEnv>) => void,
): (err: Error, c: Context<AppEnv>) => Response {
  return (err, c) => {
    const code = domainCode(err);
    const status = (code !== undefined ? STATUS_MAP[code] : undefined) ?? 500;

    if (status === 500) {
      onInternalError?.(err, c);
      const apiCode: ApiErrorCode = code ?? "INTERNAL_ERROR";
      return c.json(createErrorEnvelope(apiCode, "Internal server error"), 500);
    }

    // status is only non-500 when the code is a mapped domain code
    return c.json(createErrorEnvelope(code ?? "INTERNAL_ERROR", err.message), status);
  };
}
