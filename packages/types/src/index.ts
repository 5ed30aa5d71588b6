/**
 * @custody/types — Shared domain types for the custody stack.
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - Collaborators (oracle, transfer, sink) are interfaces only
 */

// Financial types
export type {
  AssetId,
  AccountId,
  Balance,
  AccountingValue,
  Position,
  VaultLimits,
} from "./financial.js";
export {
  NATIVE_ASSET,
  ACCOUNTING_DECIMALS,
  MAX_UINT256,
  isNativeAsset,
} from "./financial.js";

// Collaborators
export type { OracleReading, PriceOracle } from "./oracle.js";
export type { TransferOutcome, AssetTransfer } from "./transfer.js";

// Events
export type {
  EventMetadata,
  DomainEvent,
  DepositCompletedPayload,
  WithdrawCompletedPayload,
  BalanceChangedPayload,
  DepositCompletedEvent,
  WithdrawCompletedEvent,
  BalanceChangedEvent,
  VaultEvent,
  VaultEventType,
  VaultEventSink,
} from "./event.js";

// Errors
export type { CustodyErrorCode } from "./error.js";

// Runtime type guards
export {
  isAccountId,
  isAssetId,
  isUint256,
  isUintString,
  isOracleReading,
  isTransferOutcome,
} from "./guards.js";
