/**
 * @custody/ledger — Balance ledger for the custody stack.
 *
 * Tracks per-account, per-asset balances in native precision and an
 * independently maintained running total of deposited accounting value.
 *
 * Design rules:
 * - All arithmetic is checked uint256 bigint (no wrapping, no floats)
 * - Fail-closed: invalid mutations throw and change nothing
 * - No limit enforcement and no conversion — callers supply values
 * - Zero runtime dependencies
 */

// Core engine
export { BalanceLedger } from "./ledger.js";

// Fixed-point arithmetic
export {
  parseAmount,
  formatAmount,
  checkedAdd,
  checkedSub,
  checkedMul,
  pow10,
  mulDiv,
  rescale,
} from "./money-math.js";

// Types
export type {
  MutationKind,
  LedgerMutation,
  LedgerReceipt,
  LedgerErrorCode,
  PositionRecord,
  LedgerSnapshot,
  PositionFilter,
} from "./types.js";

export { LedgerError, MUTATION_SIGN } from "./types.js";
