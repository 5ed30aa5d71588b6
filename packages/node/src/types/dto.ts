/**
 * Request/Response DTOs with Zod validation schemas.
 *
 * Amounts travel as base-unit integer strings; accounting values are
 * returned both raw and formatted to six decimals.
 */

import { z } from "zod";
import { ACCOUNTING_DECIMALS, isUintString } from "@custody/types";
import type { AccountingValue, Position, VaultLimits } from "@custody/types";
import { formatAmount } from "@custody/ledger";
import type { DepositReceipt, WithdrawReceipt } from "@custody/vault";

// =============================================================================
// Shared Schemas
// =============================================================================

/** Base-unit amount: a non-negative integer string within uint256 */
export const AmountSchema = z
  .string()
  .refine(isUintString, { message: "must be a base-unit integer string within uint256" })
  .transform((raw) => BigInt(raw));

const IdentifierSchema = z.string().trim().min(1).max(256);

// =============================================================================
// Request DTOs
// =============================================================================

export const NativeDepositSchema = z.object({
  account: IdentifierSchema,
  amount: AmountSchema,
});

export type NativeDepositDto = z.infer<typeof NativeDepositSchema>;

export const AssetDepositSchema = z.object({
  account: IdentifierSchema,
  asset: IdentifierSchema,
  amount: AmountSchema,
});

export type AssetDepositDto = z.infer<typeof AssetDepositSchema>;

export const WithdrawalSchema = z.object({
  account: IdentifierSchema,
  asset: IdentifierSchema,
  amount: AmountSchema,
});

export type WithdrawalDto = z.infer<typeof WithdrawalSchema>;

// =============================================================================
// Response DTOs
// =============================================================================

export interface AccountingValueView {
  readonly raw: string;
  readonly formatted: string;
}

export function toValueView(value: AccountingValue): AccountingValueView {
  return { raw: value.toString(), formatted: formatAmount(value, ACCOUNTING_DECIMALS) };
}

export interface ReceiptView {
  readonly operationId: string;
  readonly account: string;
  readonly asset: string;
  readonly amount: string;
  readonly accountingValue: AccountingValueView;
  readonly balance: string;
  readonly totalDepositedValue: AccountingValueView;
}

export function toReceiptView(receipt: DepositReceipt | WithdrawReceipt): ReceiptView {
  return {
    operationId: receipt.operationId,
    account: receipt.account,
    asset: receipt.asset,
    amount: receipt.amount.toString(),
    accountingValue: toValueView(receipt.accountingValue),
    balance: receipt.balance.toString(),
    totalDepositedValue: toValueView(receipt.totalDepositedValue),
  };
}

export interface BalanceView {
  readonly account: string;
  readonly asset: string;
  readonly balance: string;
}

export function toBalanceView(position: Position): BalanceView {
  return {
    account: position.account,
    asset: position.asset,
    balance: position.balance.toString(),
  };
}

export interface TotalsView {
  readonly totalDepositedValue: AccountingValueView;
  readonly maxTotalValue: AccountingValueView;
  readonly maxWithdrawValue: AccountingValueView;
  /** Value that can still be deposited before the cap is reached */
  readonly headroom: AccountingValueView;
}

export function toTotalsView(total: AccountingValue, limits: VaultLimits): TotalsView {
  const headroom = limits.maxTotalValue > total ? limits.maxTotalValue - total : 0n;
  return {
    totalDepositedValue: toValueView(total),
    maxTotalValue: toValueView(limits.maxTotalValue),
    maxWithdrawValue: toValueView(limits.maxWithdrawValue),
    headroom: toValueView(headroom),
  };
}
