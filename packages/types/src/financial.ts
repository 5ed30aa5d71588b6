/**
 * Financial Types
 *
 * Core primitives for custodial accounting.
 *
 * Rules:
 * - All amounts are bigint (no floating point, no implicit scaling)
 * - Balances are stored in the asset's own native precision
 * - Accounting values are always 6 fractional digits (value × 10^6)
 */

/**
 * Opaque asset handle.
 * The reserved value {@link NATIVE_ASSET} denotes the platform's native
 * currency; any other non-empty string is a distinct fungible asset.
 */
export type AssetId = string;

/** Opaque caller identity (address-equivalent). */
export type AccountId = string;

/**
 * Amount in an asset's native precision (wei for the native currency).
 * Never negative, never above {@link MAX_UINT256}.
 */
export type Balance = bigint;

/** Amount in the common accounting unit, scaled by 10^ACCOUNTING_DECIMALS. */
export type AccountingValue = bigint;

/** Reserved identifier of the native currency. */
export const NATIVE_ASSET: AssetId = "native";

/** Fractional digits of the accounting unit. */
export const ACCOUNTING_DECIMALS = 6;

/** Integer width of every stored amount. */
export const MAX_UINT256: bigint = (1n << 256n) - 1n;

/**
 * A single (account, asset) position held by the ledger.
 */
export interface Position {
  readonly account: AccountId;
  readonly asset: AssetId;
  readonly balance: Balance;
}

/**
 * The two immutable limits a vault enforces, in accounting units.
 */
export interface VaultLimits {
  /** Global cap on the running total of deposited value */
  readonly maxTotalValue: AccountingValue;

  /** Ceiling on the converted value of a single withdrawal */
  readonly maxWithdrawValue: AccountingValue;
}

export function isNativeAsset(asset: AssetId): boolean {
  return asset === NATIVE_ASSET;
}
