/**
 * @custody/ledger — Core BalanceLedger class.
 *
 * Owns the (account, asset) → balance map and the running total of
 * deposited accounting value. The ledger is a single-writer structure:
 * whoever holds the instance serializes access to it.
 *
 * API surface:
 * - apply() — Apply a tagged deposit/withdraw mutation
 * - deposit() / withdraw() — Convenience wrappers over apply()
 * - revert() — Undo the most recent mutation from its receipt
 * - balanceOf() — Read a balance (0 for unseen pairs)
 * - totalDepositedValue — Read the running total
 * - positions() — List stored positions
 * - snapshot() / fromSnapshot() — Serialize and restore
 *
 * The running total is never recomputed from balances. Deposits add
 * their deposit-time value and withdrawals subtract their
 * withdrawal-time value, so the total drifts from any literal balance
 * valuation when rates move.
 */

import type { AccountId, AccountingValue, AssetId, Balance } from "@custody/types";
import { isAccountId, isAssetId, isUintString } from "@custody/types";
import { checkedAdd, checkedSub } from "./money-math.js";
import type {
  LedgerMutation,
  LedgerReceipt,
  LedgerSnapshot,
  Position,
  PositionFilter,
} from "./types.js";
import { LedgerError, MUTATION_SIGN } from "./types.js";

/**
 * Key for a single (account, asset) position. Identifiers are free-form,
 * so the pair is encoded as a JSON array to keep keys unambiguous.
 */
function positionKey(account: AccountId, asset: AssetId): string {
  return JSON.stringify([account, asset]);
}

interface StoredPosition {
  readonly account: AccountId;
  readonly asset: AssetId;
  balance: Balance;
}

export class BalanceLedger {
  private readonly _positions: Map<string, StoredPosition> = new Map();
  private _totalDepositedValue: AccountingValue = 0n;

  // ─── Writes ──────────────────────────────────────────────────────────

  /**
   * Apply a single mutation.
   *
   * Validation rules (fail-closed — all checked before any write):
   * 1. Account and asset identifiers are non-empty strings
   * 2. Amount and value are non-negative
   * 3. Amount is non-zero
   * 4. Withdrawals do not exceed the stored balance
   * 5. Neither the balance nor the running total leaves uint256
   */
  apply(mutation: LedgerMutation): LedgerReceipt {
    const { account, asset, amount, value } = mutation;

    if (!isAccountId(account) || !isAssetId(asset)) {
      throw new LedgerError(
        "INVALID_ARGUMENT",
        `Account and asset must be non-empty strings, got "${String(account)}" / "${String(asset)}"`,
      );
    }
    if (amount < 0n || value < 0n) {
      throw new LedgerError(
        "INVALID_AMOUNT",
        `Amount and value must be non-negative, got amount=${amount.toString()} value=${value.toString()}`,
      );
    }
    if (amount === 0n) {
      throw new LedgerError("ZERO_AMOUNT", `Cannot ${mutation.kind} a zero amount`);
    }

    const previousBalance = this.balanceOf(account, asset);
    const previousTotal = this._totalDepositedValue;

    let balance: Balance;
    let total: AccountingValue;

    if (MUTATION_SIGN[mutation.kind] === 1n) {
      balance = checkedAdd(previousBalance, amount);
      total = checkedAdd(previousTotal, value);
    } else {
      if (amount > previousBalance) {
        throw new LedgerError(
          "INSUFFICIENT_BALANCE",
          `Insufficient balance for "${account}" in "${asset}": need ${amount.toString()}, have ${previousBalance.toString()}`,
        );
      }
      balance = previousBalance - amount;
      total = checkedSub(previousTotal, value);
    }

    // All checks passed — commit both writes together
    this._setBalance(account, asset, balance);
    this._totalDepositedValue = total;

    return { mutation, previousBalance, balance, previousTotal, total };
  }

  deposit(account: AccountId, asset: AssetId, amount: Balance, value: AccountingValue): LedgerReceipt {
    return this.apply({ kind: "deposit", account, asset, amount, value });
  }

  withdraw(account: AccountId, asset: AssetId, amount: Balance, value: AccountingValue): LedgerReceipt {
    return this.apply({ kind: "withdraw", account, asset, amount, value });
  }

  /**
   * Undo a mutation from its receipt.
   *
   * Only valid while the receipt describes the current state: the
   * position's balance and the running total must still equal the
   * receipt's post-mutation values.
   */
  revert(receipt: LedgerReceipt): void {
    const { account, asset } = receipt.mutation;
    const current = this.balanceOf(account, asset);

    if (current !== receipt.balance || this._totalDepositedValue !== receipt.total) {
      throw new LedgerError(
        "INVARIANT_VIOLATION",
        `Cannot revert ${receipt.mutation.kind} for "${account}" in "${asset}": state changed since it was applied`,
      );
    }

    this._setBalance(account, asset, receipt.previousBalance);
    this._totalDepositedValue = receipt.previousTotal;
  }

  private _setBalance(account: AccountId, asset: AssetId, balance: Balance): void {
    const key = positionKey(account, asset);
    const stored = this._positions.get(key);
    if (stored === undefined) {
      this._positions.set(key, { account, asset, balance });
    } else {
      stored.balance = balance;
    }
  }

  // ─── Reads ───────────────────────────────────────────────────────────

  /**
   * Balance of an (account, asset) pair. Unseen pairs are 0.
   */
  balanceOf(account: AccountId, asset: AssetId): Balance {
    return this._positions.get(positionKey(account, asset))?.balance ?? 0n;
  }

  get totalDepositedValue(): AccountingValue {
    return this._totalDepositedValue;
  }

  /**
   * Stored positions, optionally filtered. Zero balances are kept:
   * a drained position is a terminal state, not a removal.
   */
  positions(filter?: PositionFilter): readonly Position[] {
    const result: Position[] = [];
    for (const p of this._positions.values()) {
      if (filter?.account !== undefined && p.account !== filter.account) continue;
      if (filter?.asset !== undefined && p.asset !== filter.asset) continue;
      result.push({ account: p.account, asset: p.asset, balance: p.balance });
    }
    return result;
  }

  get positionCount(): number {
    return this._positions.size;
  }

  // ─── Snapshot (Persistence) ──────────────────────────────────────────

  snapshot(): LedgerSnapshot {
    return {
      version: 1,
      positions: this.positions().map((p) => ({
        account: p.account,
        asset: p.asset,
        balance: p.balance.toString(),
      })),
      totalDepositedValue: this._totalDepositedValue.toString(),
      createdAt: new Date().toISOString(),
    };
  }

  /**
   * Restore a ledger from a snapshot. Every field is validated;
   * duplicate positions are rejected.
   */
  static fromSnapshot(snapshot: LedgerSnapshot): BalanceLedger {
    if (snapshot.version !== 1) {
      throw new LedgerError(
        "INVALID_SNAPSHOT",
        `Unsupported snapshot version: ${String(snapshot.version)}`,
      );
    }
    if (!isUintString(snapshot.totalDepositedValue)) {
      throw new LedgerError(
        "INVALID_SNAPSHOT",
        `Invalid totalDepositedValue: "${String(snapshot.totalDepositedValue)}"`,
      );
    }

    const ledger = new BalanceLedger();

    for (const record of snapshot.positions) {
      if (!isAccountId(record.account) || !isAssetId(record.asset)) {
        throw new LedgerError("INVALID_SNAPSHOT", "Snapshot position has an empty account or asset");
      }
      if (!isUintString(record.balance)) {
        throw new LedgerError(
          "INVALID_SNAPSHOT",
          `Invalid balance for "${record.account}" in "${record.asset}": "${String(record.balance)}"`,
        );
      }
      const key = positionKey(record.account, record.asset);
      if (ledger._positions.has(key)) {
        throw new LedgerError(
          "INVALID_SNAPSHOT",
          `Duplicate position for "${record.account}" in "${record.asset}"`,
        );
      }
      ledger._positions.set(key, {
        account: record.account,
        asset: record.asset,
        balance: BigInt(record.balance),
      });
    }

    ledger._totalDepositedValue = BigInt(snapshot.totalDepositedValue);
    return ledger;
  }
}
