/**
 * Error codes shared by every custody package.
 *
 * Each package throws its own error class (LedgerError, VaultError)
 * carrying one of these codes, so callers can branch on `code` without
 * knowing which layer rejected the operation.
 */
export type CustodyErrorCode =
  | "ZERO_AMOUNT"
  | "CAP_EXCEEDED"
  | "LIMIT_EXCEEDED"
  | "INSUFFICIENT_BALANCE"
  | "INVALID_ORACLE_READING"
  | "TRANSFER_FAILED"
  | "WRONG_DEPOSIT_PATH"
  | "INVALID_AMOUNT"
  | "INVALID_ARGUMENT"
  | "INVALID_CONFIG"
  | "REENTRANT_CALL"
  | "INVARIANT_VIOLATION"
  | "INVALID_SNAPSHOT";
