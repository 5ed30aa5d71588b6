/**
 * Runtime Type Guards
 *
 * Narrowing functions for custody domain types.
 * Used at system boundaries (API inputs, oracle adapters,
 * deserialized snapshots).
 */

import type { AccountId, AssetId } from "./financial.js";
import { MAX_UINT256 } from "./financial.js";
import type { OracleReading } from "./oracle.js";
import type { TransferOutcome } from "./transfer.js";

// =============================================================================
// Identifier guards
// =============================================================================

export function isAccountId(value: unknown): value is AccountId {
  return typeof value === "string" && value.trim().length > 0;
}

export function isAssetId(value: unknown): value is AssetId {
  return typeof value === "string" && value.trim().length > 0;
}

// =============================================================================
// Amount guards
// =============================================================================

/** A bigint inside the stored integer width: 0 ≤ value ≤ 2^256 − 1. */
export function isUint256(value: unknown): value is bigint {
  return typeof value === "bigint" && value >= 0n && value <= MAX_UINT256;
}

const UINT_STRING = /^\d+$/;

/** A base-10 digit string that parses to a uint256. */
export function isUintString(value: unknown): value is string {
  return typeof value === "string" && UINT_STRING.test(value) && BigInt(value) <= MAX_UINT256;
}

// =============================================================================
// Collaborator guards
// =============================================================================

export function isOracleReading(value: unknown): value is OracleReading {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.rate === "bigint" &&
    typeof v.precision === "number" &&
    Number.isInteger(v.precision) &&
    v.precision >= 0 &&
    (v.updatedAt === undefined ||
      (typeof v.updatedAt === "number" && Number.isFinite(v.updatedAt)))
  );
}

export function isTransferOutcome(value: unknown): value is TransferOutcome {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  if (v.ok === true) return true;
  return v.ok === false && typeof v.reason === "string";
}
