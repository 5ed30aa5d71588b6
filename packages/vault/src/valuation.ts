/**
 * Valuation — native amounts to accounting value.
 *
 * The native asset is priced through the oracle; every other asset is
 * pegged 1:1 at a fixed 18-decimal precision. Results are in accounting
 * units (value × 10^ACCOUNTING_DECIMALS), floored.
 *
 * Rules:
 * - Zero amounts are worth zero without consulting the oracle
 * - Multiply before divide, products checked against uint256
 * - A bad or stale reading is rejected, never clamped
 */

import type {
  AccountingValue,
  AssetId,
  Balance,
  OracleReading,
  PriceOracle,
} from "@custody/types";
import { ACCOUNTING_DECIMALS, isNativeAsset, isOracleReading } from "@custody/types";
import { checkedMul, mulDiv, pow10, rescale } from "@custody/ledger";
import { VaultError } from "./types.js";

/** Decimals of the native currency's base unit */
export const NATIVE_DECIMALS = 18;

/**
 * Decimals assumed for every non-native asset.
 * Tokens are not queried for their own precision.
 */
export const TOKEN_DECIMALS = 18;

/** Largest power of ten a uint256 can hold */
const MAX_ORACLE_PRECISION = 77;

export interface ValueConverterOptions {
  /** Reject readings older than this many seconds */
  readonly maxOracleAgeSeconds?: number | undefined;

  /** Millisecond clock used for the staleness check */
  readonly clock?: (() => number) | undefined;
}

export class ValueConverter {
  private readonly oracle: PriceOracle;
  private readonly maxAgeSeconds: number | undefined;
  private readonly clock: () => number;

  constructor(oracle: PriceOracle, options: ValueConverterOptions = {}) {
    const maxAge = options.maxOracleAgeSeconds;
    if (maxAge !== undefined && (!Number.isInteger(maxAge) || maxAge <= 0)) {
      throw new VaultError(
        "INVALID_CONFIG",
        `maxOracleAgeSeconds must be a positive integer, got ${String(maxAge)}`,
      );
    }
    this.oracle = oracle;
    this.maxAgeSeconds = maxAge;
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Accounting value of `amount` base units of `asset`.
   */
  async valueOf(asset: AssetId, amount: Balance): Promise<AccountingValue> {
    if (amount < 0n) {
      throw new VaultError("INVALID_AMOUNT", `Cannot value a negative amount: ${amount.toString()}`);
    }
    if (amount === 0n) {
      return 0n;
    }

    if (!isNativeAsset(asset)) {
      return rescale(amount, TOKEN_DECIMALS, ACCOUNTING_DECIMALS);
    }

    const reading: unknown = await this.oracle.latestRate();
    if (!isOracleReading(reading)) {
      throw new VaultError("INVALID_ORACLE_READING", "Oracle returned a malformed reading");
    }
    this.assertValidReading(reading);
    return nativeValue(amount, reading);
  }

  private assertValidReading(reading: OracleReading): void {
    if (reading.rate <= 0n) {
      throw new VaultError(
        "INVALID_ORACLE_READING",
        `Oracle rate must be positive, got ${reading.rate.toString()}`,
      );
    }

    const { precision } = reading;
    if (!Number.isInteger(precision) || precision < 0 || precision > MAX_ORACLE_PRECISION) {
      throw new VaultError(
        "INVALID_ORACLE_READING",
        `Oracle precision must be an integer in [0, ${String(MAX_ORACLE_PRECISION)}], got ${String(precision)}`,
      );
    }

    if (this.maxAgeSeconds === undefined) {
      return;
    }

    if (reading.updatedAt === undefined) {
      throw new VaultError("INVALID_ORACLE_READING", "Oracle reading carries no update time");
    }

    const nowSeconds = Math.floor(this.clock() / 1000);
    const age = nowSeconds - reading.updatedAt;
    if (age < 0) {
      throw new VaultError(
        "INVALID_ORACLE_READING",
        `Oracle reading is dated ${String(-age)}s in the future`,
      );
    }
    if (age > this.maxAgeSeconds) {
      throw new VaultError(
        "INVALID_ORACLE_READING",
        `Oracle reading is ${String(age)}s old (max ${String(this.maxAgeSeconds)}s)`,
      );
    }
  }
}

/**
 * amount × rate × 10^6 / 10^(18 + precision), floored.
 *
 * 0.4 native (4 × 10^17) at rate 2000_00000000 (precision 8) → 800_000000
 */
export function nativeValue(amount: Balance, reading: OracleReading): AccountingValue {
  const denominator = pow10(NATIVE_DECIMALS) * pow10(reading.precision);
  return mulDiv(checkedMul(amount, reading.rate), pow10(ACCOUNTING_DECIMALS), denominator);
}
