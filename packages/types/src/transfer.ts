/**
 * Asset Transfer Types
 *
 * The transfer mechanism itself is out of scope for the core; it is
 * consumed through this interface. Outcomes are values, not exceptions:
 * a collaborator that throws is treated as a failed transfer.
 */

import type { AccountId, AssetId } from "./financial.js";

export type TransferOutcome =
  | { readonly ok: true }
  | { readonly ok: false; readonly reason: string };

export interface AssetTransfer {
  /** Move `amount` of `asset` from the account into custody (pre-authorized out-of-band) */
  pull(account: AccountId, asset: AssetId, amount: bigint): Promise<TransferOutcome>;

  /** Move `amount` of `asset` out of custody to the account */
  push(account: AccountId, asset: AssetId, amount: bigint): Promise<TransferOutcome>;
}
