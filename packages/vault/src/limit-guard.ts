/**
 * Limit Guard — global cap and per-withdrawal ceiling.
 *
 * Pure checks over pre-mutation state. The checks return a result;
 * the LimitGuard wrapper turns a failed check into a VaultError.
 */

import type { AccountingValue, VaultLimits } from "@custody/types";
import { MAX_UINT256 } from "@custody/types";
import { VaultError } from "./types.js";

export type LimitCheck =
  | { readonly ok: true }
  | { readonly ok: false; readonly code: "CAP_EXCEEDED" | "LIMIT_EXCEEDED"; readonly message: string };

const OK: LimitCheck = { ok: true };

/**
 * Would `incomingValue` push the running total past `cap`?
 */
export function checkCap(
  currentTotal: AccountingValue,
  incomingValue: AccountingValue,
  cap: AccountingValue,
): LimitCheck {
  const projected = currentTotal + incomingValue;
  if (projected <= cap) {
    return OK;
  }
  return {
    ok: false,
    code: "CAP_EXCEEDED",
    message: `Deposit of value ${incomingValue.toString()} would raise total to ${projected.toString()}, above cap ${cap.toString()}`,
  };
}

export function checkWithdrawLimit(
  value: AccountingValue,
  maxWithdraw: AccountingValue,
): LimitCheck {
  if (value <= maxWithdraw) {
    return OK;
  }
  return {
    ok: false,
    code: "LIMIT_EXCEEDED",
    message: `Withdrawal of value ${value.toString()} exceeds limit ${maxWithdraw.toString()}`,
  };
}

function assertLimit(name: string, value: AccountingValue): void {
  if (value < 0n || value > MAX_UINT256) {
    throw new VaultError("INVALID_CONFIG", `${name} must be in [0, 2^256 - 1], got ${value.toString()}`);
  }
}

export class LimitGuard {
  private readonly maxTotalValue: AccountingValue;
  private readonly maxWithdrawValue: AccountingValue;

  constructor(limits: VaultLimits) {
    assertLimit("maxTotalValue", limits.maxTotalValue);
    assertLimit("maxWithdrawValue", limits.maxWithdrawValue);
    this.maxTotalValue = limits.maxTotalValue;
    this.maxWithdrawValue = limits.maxWithdrawValue;
  }

  get limits(): VaultLimits {
    return { maxTotalValue: this.maxTotalValue, maxWithdrawValue: this.maxWithdrawValue };
  }

  assertCap(currentTotal: AccountingValue, incomingValue: AccountingValue): void {
    raise(checkCap(currentTotal, incomingValue, this.maxTotalValue));
  }

  assertWithdrawLimit(value: AccountingValue): void {
    raise(checkWithdrawLimit(value, this.maxWithdrawValue));
  }
}

function raise(check: LimitCheck): void {
  if (!check.ok) {
    throw new VaultError(check.code, check.message);
  }
}
