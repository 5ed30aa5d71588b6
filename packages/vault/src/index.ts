/**
 * @custody/vault — Custodial vault service.
 *
 * Accepts deposits of the native currency and of fungible assets,
 * values them in a common accounting unit, and pays out withdrawals.
 *
 * Three subsystems:
 * - Valuation: native amounts → accounting value via a price oracle
 * - Limits: global cap on deposited value, per-withdrawal ceiling
 * - Orchestration: serialized check → mutate → transfer with rollback
 *
 * Design rules:
 * - The ledger changes before any external transfer is attempted
 * - A failed operation leaves no trace in balances or totals
 * - Limits are fixed for the lifetime of a vault
 * - Events are emitted only for committed operations
 */

// Top-level service
export { VaultService } from "./vault.js";

// Subsystems
export { ValueConverter, nativeValue, NATIVE_DECIMALS, TOKEN_DECIMALS } from "./valuation.js";
export type { ValueConverterOptions } from "./valuation.js";
export { LimitGuard, checkCap, checkWithdrawLimit } from "./limit-guard.js";
export type { LimitCheck } from "./limit-guard.js";
export { SerialExecutor } from "./serial-executor.js";
export type { SerialExecutorStats } from "./serial-executor.js";

// Adapters
export { InMemoryAssetTransfer } from "./transfer.js";
export type { TransferDirection, TransferRecord } from "./transfer.js";
export {
  RecordingEventSink,
  depositCompleted,
  withdrawCompleted,
  balanceChanged,
} from "./events.js";

// Types
export type {
  VaultErrorCode,
  VaultLogger,
  VaultConfig,
  DepositReceipt,
  WithdrawReceipt,
} from "./types.js";

export { VaultError } from "./types.js";
