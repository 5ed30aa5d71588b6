/**
 * Vault Service — custodial deposit and withdrawal orchestration.
 *
 * Every mutating operation runs the same pipeline as one serialized unit:
 *
 *   validate → convert → guard → mutate → transfer → notify
 *
 * The ledger is mutated strictly before the external transfer. A
 * transfer that refuses or throws rolls the mutation back, so a failed
 * operation leaves balances and the running total exactly as before.
 *
 * Reads always see committed state: while a transfer is pending, the
 * affected balance and the running total report their pre-operation
 * values.
 */

import { AsyncLocalStorage } from "node:async_hooks";
import { randomUUID } from "node:crypto";
import type {
  AccountId,
  AccountingValue,
  AssetId,
  AssetTransfer,
  Balance,
  VaultEvent,
  VaultEventSink,
  VaultLimits,
} from "@custody/types";
import {
  NATIVE_ASSET,
  isAccountId,
  isAssetId,
  isNativeAsset,
  isTransferOutcome,
  isUint256,
} from "@custody/types";
import type { LedgerReceipt } from "@custody/ledger";
import { BalanceLedger, LedgerError } from "@custody/ledger";
import { balanceChanged, depositCompleted, withdrawCompleted } from "./events.js";
import { LimitGuard } from "./limit-guard.js";
import { SerialExecutor } from "./serial-executor.js";
import type { SerialExecutorStats } from "./serial-executor.js";
import type { TransferDirection } from "./transfer.js";
import type { DepositReceipt, VaultConfig, VaultLogger, WithdrawReceipt } from "./types.js";
import { VaultError } from "./types.js";
import { ValueConverter } from "./valuation.js";

type OperationKind = "depositNative" | "depositAsset" | "withdraw";

interface OperationRequest {
  readonly kind: OperationKind;
  readonly account: AccountId;
  readonly asset: AssetId;
  readonly amount: Balance;
}

interface OperationContext {
  readonly operationId: string;
  readonly kind: OperationKind;
  /** Set once the operation finishes; later continuations may call in again */
  settled: boolean;
}

const SILENT_LOGGER: VaultLogger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

export class VaultService {
  private readonly ledger: BalanceLedger;
  private readonly converter: ValueConverter;
  private readonly guard: LimitGuard;
  private readonly transfer: AssetTransfer;
  private readonly sink: VaultEventSink | undefined;
  private readonly clock: () => number;
  private readonly logger: VaultLogger;

  private readonly executor = new SerialExecutor();
  private readonly context = new AsyncLocalStorage<OperationContext>();

  /** Mutation applied but not yet settled by its transfer */
  private inFlight: LedgerReceipt | null = null;

  constructor(config: VaultConfig) {
    this.guard = new LimitGuard({
      maxTotalValue: config.maxTotalValue,
      maxWithdrawValue: config.maxWithdrawValue,
    });
    this.clock = config.clock ?? Date.now;
    this.converter = new ValueConverter(config.oracle, {
      maxOracleAgeSeconds: config.maxOracleAgeSeconds,
      clock: this.clock,
    });
    this.ledger = config.ledger ?? new BalanceLedger();
    this.transfer = config.transfer;
    this.sink = config.sink;
    this.logger = config.logger ?? SILENT_LOGGER;
  }

  // ─── Mutating operations ───────────────────────────────────────────────

  /**
   * Credit native currency that arrived with the call. No pull.
   */
  depositNative(account: AccountId, amount: Balance): Promise<DepositReceipt> {
    return this.submit({ kind: "depositNative", account, asset: NATIVE_ASSET, amount }, (id) =>
      this.runDeposit(id, account, NATIVE_ASSET, amount, false),
    );
  }

  /**
   * Pull a non-native asset into custody and credit it.
   */
  depositAsset(account: AccountId, asset: AssetId, amount: Balance): Promise<DepositReceipt> {
    return this.submit({ kind: "depositAsset", account, asset, amount }, (id) =>
      this.runDeposit(id, account, asset, amount, true),
    );
  }

  /**
   * Debit an account and push the asset out of custody.
   */
  withdraw(account: AccountId, asset: AssetId, amount: Balance): Promise<WithdrawReceipt> {
    return this.submit({ kind: "withdraw", account, asset, amount }, (id) =>
      this.runWithdraw(id, account, asset, amount),
    );
  }

  // ─── Reads ─────────────────────────────────────────────────────────────

  balanceOf(account: AccountId, asset: AssetId): Balance {
    const pending = this.inFlight;
    if (pending && pending.mutation.account === account && pending.mutation.asset === asset) {
      return pending.previousBalance;
    }
    return this.ledger.balanceOf(account, asset);
  }

  totalDepositedValue(): AccountingValue {
    return this.inFlight ? this.inFlight.previousTotal : this.ledger.totalDepositedValue;
  }

  limits(): VaultLimits {
    return this.guard.limits;
  }

  queueStats(): SerialExecutorStats {
    return this.executor.getStats();
  }

  // ─── Pipeline ──────────────────────────────────────────────────────────

  private async submit<R>(
    request: OperationRequest,
    body: (operationId: string) => Promise<R>,
  ): Promise<R> {
    const outer = this.context.getStore();
    if (outer && !outer.settled) {
      throw new VaultError(
        "REENTRANT_CALL",
        `${request.kind} called from inside ${outer.kind} (operation ${outer.operationId})`,
      );
    }

    const operationId = randomUUID();
    try {
      validateRequest(request);
      return await this.executor.run(() => {
        const ctx: OperationContext = { operationId, kind: request.kind, settled: false };
        return this.context.run(ctx, async () => {
          try {
            return await body(operationId);
          } finally {
            ctx.settled = true;
          }
        });
      });
    } catch (error) {
      const normalized = normalizeError(error);
      this.logger.warn(
        {
          operationId,
          operation: request.kind,
          account: request.account,
          asset: request.asset,
          amount: String(request.amount),
          code: normalized instanceof VaultError ? normalized.code : "UNKNOWN",
          err: normalized,
        },
        "vault operation rejected",
      );
      throw normalized;
    }
  }

  private async runDeposit(
    operationId: string,
    account: AccountId,
    asset: AssetId,
    amount: Balance,
    pull: boolean,
  ): Promise<DepositReceipt> {
    const value = await this.converter.valueOf(asset, amount);
    this.guard.assertCap(this.ledger.totalDepositedValue, value);

    const receipt = this.ledger.deposit(account, asset, amount, value);
    if (pull) {
      await this.settle(receipt, "pull");
    }

    const now = this.clock();
    this.notify([
      depositCompleted({ account, asset, amount, accountingValue: value }, operationId, now),
      balanceChanged({ account, asset, newBalance: receipt.balance }, operationId, now),
    ]);
    this.logger.info(
      { operationId, account, asset, amount: amount.toString(), value: value.toString() },
      "deposit committed",
    );

    return {
      operationId,
      account,
      asset,
      amount,
      accountingValue: value,
      balance: receipt.balance,
      totalDepositedValue: receipt.total,
    };
  }

  private async runWithdraw(
    operationId: string,
    account: AccountId,
    asset: AssetId,
    amount: Balance,
  ): Promise<WithdrawReceipt> {
    const value = await this.converter.valueOf(asset, amount);
    this.guard.assertWithdrawLimit(value);

    const receipt = this.ledger.withdraw(account, asset, amount, value);
    await this.settle(receipt, "push");

    const now = this.clock();
    this.notify([
      withdrawCompleted({ account, asset, amount }, operationId, now),
      balanceChanged({ account, asset, newBalance: receipt.balance }, operationId, now),
    ]);
    this.logger.info(
      { operationId, account, asset, amount: amount.toString(), value: value.toString() },
      "withdrawal committed",
    );

    return {
      operationId,
      account,
      asset,
      amount,
      accountingValue: value,
      balance: receipt.balance,
      totalDepositedValue: receipt.total,
    };
  }

  /**
   * Run the transfer for an applied mutation. Reverts the mutation and
   * throws TRANSFER_FAILED unless the transfer reports success.
   */
  private async settle(receipt: LedgerReceipt, direction: TransferDirection): Promise<void> {
    this.inFlight = receipt;
    try {
      const failure = await this.attemptTransfer(receipt, direction);
      if (failure) {
        this.ledger.revert(receipt);
        this.logger.warn(
          {
            account: receipt.mutation.account,
            asset: receipt.mutation.asset,
            amount: receipt.mutation.amount.toString(),
            direction,
          },
          "transfer failed, ledger mutation reverted",
        );
        throw failure;
      }
    } finally {
      this.inFlight = null;
    }
  }

  private async attemptTransfer(
    receipt: LedgerReceipt,
    direction: TransferDirection,
  ): Promise<VaultError | null> {
    const { account, asset, amount } = receipt.mutation;

    let outcome: unknown;
    try {
      outcome = await this.transfer[direction](account, asset, amount);
    } catch (cause) {
      return new VaultError("TRANSFER_FAILED", `${direction} threw: ${describe(cause)}`, { cause });
    }

    if (!isTransferOutcome(outcome)) {
      return new VaultError("TRANSFER_FAILED", `${direction} returned a malformed outcome`);
    }
    if (!outcome.ok) {
      return new VaultError("TRANSFER_FAILED", `${direction} refused: ${outcome.reason}`);
    }
    return null;
  }

  private notify(events: readonly VaultEvent[]): void {
    const sink = this.sink;
    if (!sink) {
      return;
    }
    for (const event of events) {
      try {
        sink.emit(event);
      } catch (error) {
        this.logger.error(
          { eventType: event.type, correlationId: event.metadata.correlationId, err: error },
          "event sink failed",
        );
      }
    }
  }
}

// ─── Helpers ─────────────────────────────────────────────────────────────

function validateRequest(request: OperationRequest): void {
  const { kind, account, asset, amount } = request;

  if (!isAccountId(account)) {
    throw new VaultError("INVALID_ARGUMENT", `Invalid account: "${String(account)}"`);
  }
  if (!isAssetId(asset)) {
    throw new VaultError("INVALID_ARGUMENT", `Invalid asset: "${String(asset)}"`);
  }
  if (kind === "depositAsset" && isNativeAsset(asset)) {
    throw new VaultError("WRONG_DEPOSIT_PATH", "Native currency must be deposited with depositNative");
  }
  if (typeof amount !== "bigint") {
    throw new VaultError("INVALID_AMOUNT", `Amount must be a bigint, got ${typeof amount}`);
  }
  if (amount < 0n) {
    throw new VaultError("INVALID_AMOUNT", `Amount must not be negative, got ${amount.toString()}`);
  }
  if (amount === 0n) {
    throw new VaultError("ZERO_AMOUNT", "Amount must be greater than zero");
  }
  if (!isUint256(amount)) {
    throw new VaultError("INVALID_AMOUNT", "Amount exceeds uint256");
  }
}

/**
 * Ledger errors surface as VaultErrors with the same code.
 * Anything else (an oracle outage, say) propagates unchanged.
 */
function normalizeError(error: unknown): unknown {
  if (error instanceof LedgerError) {
    return new VaultError(error.code, error.message, { cause: error });
  }
  return error;
}

function describe(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
