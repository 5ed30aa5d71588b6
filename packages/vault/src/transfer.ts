/**
 * In-memory asset transfer.
 *
 * Models the outside world as a set of external holdings keyed by
 * account and asset. `pull` moves funds from an external holding into
 * custody; `push` moves them back out. Deposits of the native asset
 * arrive with the call and never reach `pull`.
 */

import type { AccountId, AssetId, AssetTransfer, Balance, TransferOutcome } from "@custody/types";

export type TransferDirection = "pull" | "push";

export interface TransferRecord {
  readonly direction: TransferDirection;
  readonly account: AccountId;
  readonly asset: AssetId;
  readonly amount: Balance;
  readonly outcome: TransferOutcome;
}

function holdingKey(account: AccountId, asset: AssetId): string {
  return JSON.stringify([account, asset]);
}

export class InMemoryAssetTransfer implements AssetTransfer {
  private readonly holdings = new Map<string, Balance>();
  private readonly log: TransferRecord[] = [];
  private haltReason: string | null = null;

  /** Credit an external holding, e.g. to seed a test account */
  fund(account: AccountId, asset: AssetId, amount: Balance): void {
    const key = holdingKey(account, asset);
    this.holdings.set(key, (this.holdings.get(key) ?? 0n) + amount);
  }

  holdingOf(account: AccountId, asset: AssetId): Balance {
    return this.holdings.get(holdingKey(account, asset)) ?? 0n;
  }

  /** Make every transfer fail with `reason` until `resume()` */
  halt(reason: string): void {
    this.haltReason = reason;
  }

  resume(): void {
    this.haltReason = null;
  }

  get history(): readonly TransferRecord[] {
    return [...this.log];
  }

  async pull(account: AccountId, asset: AssetId, amount: Balance): Promise<TransferOutcome> {
    const held = this.holdingOf(account, asset);
    const outcome = this.decide(() =>
      held < amount
        ? { ok: false, reason: `external holding ${held.toString()} below ${amount.toString()}` }
        : { ok: true },
    );
    if (outcome.ok) {
      this.holdings.set(holdingKey(account, asset), held - amount);
    }
    return this.record("pull", account, asset, amount, outcome);
  }

  async push(account: AccountId, asset: AssetId, amount: Balance): Promise<TransferOutcome> {
    const outcome = this.decide(() => ({ ok: true }));
    if (outcome.ok) {
      this.fund(account, asset, amount);
    }
    return this.record("push", account, asset, amount, outcome);
  }

  private decide(otherwise: () => TransferOutcome): TransferOutcome {
    if (this.haltReason !== null) {
      return { ok: false, reason: this.haltReason };
    }
    return otherwise();
  }

  private record(
    direction: TransferDirection,
    account: AccountId,
    asset: AssetId,
    amount: Balance,
    outcome: TransferOutcome,
  ): TransferOutcome {
    this.log.push({ direction, account, asset, amount, outcome });
    return outcome;
  }
}
