/**
 * @custody/ledger — Types for the balance ledger.
 *
 * Rules:
 * - All types are readonly
 * - Every write is a tagged LedgerMutation; the sign convention lives
 *   with the tag, never with the caller
 * - Fail-closed: an invalid mutation throws and changes nothing
 */

import type {
  AccountId,
  AccountingValue,
  AssetId,
  Balance,
  CustodyErrorCode,
  Position,
} from "@custody/types";

// ─── Mutations ───────────────────────────────────────────────────────────

/** Direction of a ledger mutation. */
export type MutationKind = "deposit" | "withdraw";

/**
 * A single ledger write.
 *
 * `value` is the mutation's accounting value, computed by the caller
 * at the current rate. The ledger adds it on deposit and subtracts it
 * on withdraw; it never converts anything itself.
 */
export interface LedgerMutation {
  readonly kind: MutationKind;
  readonly account: AccountId;
  readonly asset: AssetId;
  readonly amount: Balance;
  readonly value: AccountingValue;
}

/**
 * Sign applied to balance and running total for each mutation kind.
 */
export const MUTATION_SIGN: Readonly<Record<MutationKind, 1n | -1n>> = {
  deposit: 1n,
  withdraw: -1n,
} as const;

/**
 * Record of an applied mutation: what changed and the state before it.
 * Handing a receipt back to `revert()` undoes the mutation.
 */
export interface LedgerReceipt {
  readonly mutation: LedgerMutation;
  readonly previousBalance: Balance;
  readonly balance: Balance;
  readonly previousTotal: AccountingValue;
  readonly total: AccountingValue;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Codes the ledger can raise. */
export type LedgerErrorCode = Extract<
  CustodyErrorCode,
  | "ZERO_AMOUNT"
  | "INSUFFICIENT_BALANCE"
  | "INVALID_AMOUNT"
  | "INVALID_ARGUMENT"
  | "INVARIANT_VIOLATION"
  | "INVALID_SNAPSHOT"
>;

/**
 * Structured error from the ledger.
 * Always thrown — never returned silently.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}

// ─── Snapshot Types ──────────────────────────────────────────────────────

/** A position with its balance serialized as a base-10 string. */
export interface PositionRecord {
  readonly account: AccountId;
  readonly asset: AssetId;
  readonly balance: string;
}

/**
 * Serializable snapshot of the ledger state.
 * bigint fields are base-10 strings so the snapshot survives JSON.
 */
export interface LedgerSnapshot {
  readonly version: 1;
  readonly positions: readonly PositionRecord[];
  readonly totalDepositedValue: string;
  readonly createdAt: string;
}

// ─── Query Types ─────────────────────────────────────────────────────────

export interface PositionFilter {
  readonly account?: AccountId | undefined;
  readonly asset?: AssetId | undefined;
}

export type { Position };
