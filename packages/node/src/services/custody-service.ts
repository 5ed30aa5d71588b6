/**
 * CustodyService — Composition root for the domain packages.
 *
 * Route handlers delegate to this service; they never build domain
 * objects themselves. The service owns one VaultService, reports its
 * events to the logger and metrics, and probes the oracle for readiness.
 */

import { NATIVE_ASSET } from "@custody/types";
import type {
  AccountId,
  AccountingValue,
  AssetId,
  AssetTransfer,
  Balance,
  Position,
  PriceOracle,
  VaultLimits,
} from "@custody/types";
import { ValueConverter, VaultError, VaultService } from "@custody/vault";
import type { DepositReceipt, VaultLogger, WithdrawReceipt } from "@custody/vault";
import type { MetricsCollector } from "../middleware/metrics.js";
import { ObservingEventSink } from "./event-sink.js";

// =============================================================================
// Configuration
// =============================================================================

export interface CustodyServiceConfig {
  readonly maxTotalValue: AccountingValue;
  readonly maxWithdrawValue: AccountingValue;
  readonly oracle: PriceOracle;
  readonly transfer: AssetTransfer;
  readonly maxOracleAgeSeconds?: number | undefined;
  readonly clock?: (() => number) | undefined;
  readonly logger?: VaultLogger | undefined;
  readonly metrics?: MetricsCollector | undefined;
}

export type OperationName = "deposit_native" | "deposit_asset" | "withdraw";

export interface SubsystemStatus {
  readonly status: "ok" | "down";
  readonly detail?: string | undefined;
}

/** One whole native unit, used to probe the oracle */
const PROBE_AMOUNT = 10n ** 18n;

// =============================================================================
// Service
// =============================================================================

export class CustodyService {
  readonly vault: VaultService;

  private readonly probe: ValueConverter;
  private readonly metrics: MetricsCollector | undefined;

  constructor(config: CustodyServiceConfig) {
    this.metrics = config.metrics;
    this.vault = new VaultService({
      maxTotalValue: config.maxTotalValue,
      maxWithdrawValue: config.maxWithdrawValue,
      oracle: config.oracle,
      transfer: config.transfer,
      sink: new ObservingEventSink(config.logger, config.metrics),
      maxOracleAgeSeconds: config.maxOracleAgeSeconds,
      clock: config.clock,
      logger: config.logger,
    });
    this.probe = new ValueConverter(config.oracle, {
      maxOracleAgeSeconds: config.maxOracleAgeSeconds,
      clock: config.clock,
    });
  }

  // ─── Operations ────────────────────────────────────────────────────

  depositNative(account: AccountId, amount: Balance): Promise<DepositReceipt> {
    return this.track("deposit_native", () => this.vault.depositNative(account, amount));
  }

  depositAsset(account: AccountId, asset: AssetId, amount: Balance): Promise<DepositReceipt> {
    return this.track("deposit_asset", () => this.vault.depositAsset(account, asset, amount));
  }

  withdraw(account: AccountId, asset: AssetId, amount: Balance): Promise<WithdrawReceipt> {
    return this.track("withdraw", () => this.vault.withdraw(account, asset, amount));
  }

  // ─── Queries ───────────────────────────────────────────────────────

  balanceOf(account: AccountId, asset: AssetId): Position {
    return { account, asset, balance: this.vault.balanceOf(account, asset) };
  }

  totals(): { readonly total: AccountingValue; readonly limits: VaultLimits } {
    return { total: this.vault.totalDepositedValue(), limits: this.vault.limits() };
  }

  // ─── Health ────────────────────────────────────────────────────────

  /**
   * Value one native unit through the oracle. Down when the oracle
   * fails or returns a reading the vault would reject.
   */
  async checkOracle(): Promise<SubsystemStatus> {
    try {
      await this.probe.valueOf(NATIVE_ASSET, PROBE_AMOUNT);
      return { status: "ok" };
    } catch (err) {
      return { status: "down", detail: err instanceof Error ? err.message : String(err) };
    }
  }

  /**
   * Sample vault gauges into the metrics collector.
   */
  sampleGauges(): void {
    if (this.metrics === undefined) {
      return;
    }
    const stats = this.vault.queueStats();
    this.metrics.setGauge("custody_queue_depth", "Vault operations waiting to run", stats.queuedCount);
    this.metrics.setGauge(
      "custody_total_deposited_value",
      "Running total of deposited accounting value, in accounting base units",
      Number(this.vault.totalDepositedValue()),
    );
  }

  // ─── Internal ──────────────────────────────────────────────────────

  private async track<T>(operation: OperationName, run: () => Promise<T>): Promise<T> {
    try {
      const result = await run();
      this.metrics?.incrementCounter("custody_operations_total", { operation, outcome: "success" });
      return result;
    } catch (err) {
      const outcome = err instanceof VaultError ? err.code : "error";
      this.metrics?.incrementCounter("custody_operations_total", { operation, outcome });
      throw err;
    }
  }
}
