/**
 * Vault Types
 *
 * Domain types for the custodial vault.
 * The vault composes three parts around one BalanceLedger:
 *
 * 1. Valuation — native amounts → accounting value (oracle or peg)
 * 2. Limits — global cap and per-withdrawal ceiling
 * 3. Orchestration — validate → convert → guard → mutate → transfer → notify
 *
 * Rules:
 * - All amounts are bigint
 * - Limits are fixed at construction
 * - A failed operation leaves no observable trace
 */

import type {
  AccountId,
  AccountingValue,
  AssetId,
  AssetTransfer,
  Balance,
  CustodyErrorCode,
  PriceOracle,
  VaultEventSink,
} from "@custody/types";
import type { BalanceLedger } from "@custody/ledger";

// =============================================================================
// Error
// =============================================================================

export type VaultErrorCode = CustodyErrorCode;

export class VaultError extends Error {
  public readonly code: VaultErrorCode;

  constructor(code: VaultErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "VaultError";
    this.code = code;
  }
}

// =============================================================================
// Logging
// =============================================================================

/**
 * Structured logger the vault reports to. A pino logger satisfies it.
 */
export interface VaultLogger {
  info(obj: Record<string, unknown>, msg: string): void;
  warn(obj: Record<string, unknown>, msg: string): void;
  error(obj: Record<string, unknown>, msg: string): void;
}

// =============================================================================
// Configuration
// =============================================================================

export interface VaultConfig {
  /** Global cap on the running total, accounting units (× 10^6) */
  readonly maxTotalValue: AccountingValue;

  /** Ceiling on a single withdrawal's value, accounting units (× 10^6) */
  readonly maxWithdrawValue: AccountingValue;

  /** Native-currency price source */
  readonly oracle: PriceOracle;

  /** Moves assets in and out of custody */
  readonly transfer: AssetTransfer;

  /** Receives events for committed operations */
  readonly sink?: VaultEventSink | undefined;

  /** Ledger to operate on. A fresh one is created when omitted. */
  readonly ledger?: BalanceLedger | undefined;

  /** Reject oracle readings older than this many seconds */
  readonly maxOracleAgeSeconds?: number | undefined;

  /** Millisecond clock for staleness checks and event timestamps */
  readonly clock?: (() => number) | undefined;

  readonly logger?: VaultLogger | undefined;
}

// =============================================================================
// Operation results
// =============================================================================

export interface DepositReceipt {
  readonly operationId: string;
  readonly account: AccountId;
  readonly asset: AssetId;
  readonly amount: Balance;
  readonly accountingValue: AccountingValue;
  /** Account's balance in `asset` after the deposit */
  readonly balance: Balance;
  /** Running total after the deposit */
  readonly totalDepositedValue: AccountingValue;
}

export interface WithdrawReceipt {
  readonly operationId: string;
  readonly account: AccountId;
  readonly asset: AssetId;
  readonly amount: Balance;
  readonly accountingValue: AccountingValue;
  readonly balance: Balance;
  readonly totalDepositedValue: AccountingValue;
}
