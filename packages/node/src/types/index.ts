/**
 * Type barrel — re-exports all public types from @custody/node.
 */

// DTOs
export {
  AmountSchema,
  NativeDepositSchema,
  AssetDepositSchema,
  WithdrawalSchema,
  toValueView,
  toReceiptView,
  toBalanceView,
  toTotalsView,
} from "./dto.js";
export type {
  NativeDepositDto,
  AssetDepositDto,
  WithdrawalDto,
  AccountingValueView,
  ReceiptView,
  BalanceView,
  TotalsView,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// App env
export type { AppEnv } from "./api-contract.js";
