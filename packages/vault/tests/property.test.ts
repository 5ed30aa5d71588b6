/**
 * Property-Based Tests for @custody/vault
 *
 * For ANY sequence of deposits and withdrawals, with transfers failing
 * at random:
 *
 * 1. The running total never exceeds the cap
 * 2. A rejected operation changes neither balances nor the total
 * 3. A committed operation moves the balance by exactly its amount and
 *    the total by exactly its accounting value
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { NATIVE_ASSET } from "@custody/types";
import { VaultService } from "../src/vault.js";
import { InMemoryAssetTransfer } from "../src/transfer.js";
import { VaultError } from "../src/types.js";
import { ONE, mutableOracle } from "./helpers.js";

// =============================================================================
// Arbitraries
// =============================================================================

const ACCOUNTS = ["0xA", "0xB"] as const;
const ASSETS = [NATIVE_ASSET, "0xT1", "0xT2"] as const;
const CAP = 1000_000000n;

interface Step {
  readonly kind: "deposit" | "withdraw";
  readonly account: string;
  readonly asset: string;
  readonly amount: bigint;
  readonly transferFails: boolean;
}

const arbStep: fc.Arbitrary<Step> = fc.record({
  kind: fc.constantFrom("deposit" as const, "withdraw" as const),
  account: fc.constantFrom(...ACCOUNTS),
  asset: fc.constantFrom(...ASSETS),
  amount: fc.bigInt({ min: 1n, max: 300n * ONE }),
  transferFails: fc.boolean(),
});

function run(vault: VaultService, step: Step): Promise<{ accountingValue: bigint }> {
  if (step.kind === "withdraw") {
    return vault.withdraw(step.account, step.asset, step.amount);
  }
  return step.asset === NATIVE_ASSET
    ? vault.depositNative(step.account, step.amount)
    : vault.depositAsset(step.account, step.asset, step.amount);
}

// =============================================================================
// Properties
// =============================================================================

describe("property: vault state transitions", () => {
  it("commits exactly or changes nothing, and respects the cap", async () => {
    await fc.assert(
      fc.asyncProperty(fc.array(arbStep, { maxLength: 25 }), async (steps) => {
        const transfer = new InMemoryAssetTransfer();
        for (const account of ACCOUNTS) {
          for (const asset of ASSETS) {
            transfer.fund(account, asset, 10_000n * ONE);
          }
        }
        const vault = new VaultService({
          maxTotalValue: CAP,
          maxWithdrawValue: 500_000000n,
          oracle: mutableOracle(),
          transfer,
        });

        for (const step of steps) {
          const balanceBefore = vault.balanceOf(step.account, step.asset);
          const totalBefore = vault.totalDepositedValue();

          if (step.transferFails) {
            transfer.halt("simulated outage");
          } else {
            transfer.resume();
          }

          const sign = step.kind === "deposit" ? 1n : -1n;
          try {
            const receipt = await run(vault, step);
            expect(vault.balanceOf(step.account, step.asset)).toBe(balanceBefore + sign * step.amount);
            expect(vault.totalDepositedValue()).toBe(totalBefore + sign * receipt.accountingValue);
          } catch (e) {
            expect(e).toBeInstanceOf(VaultError);
            expect(vault.balanceOf(step.account, step.asset)).toBe(balanceBefore);
            expect(vault.totalDepositedValue()).toBe(totalBefore);
          }

          expect(vault.totalDepositedValue()).toBeLessThanOrEqual(CAP);
        }
      }),
      { numRuns: 100 },
    );
  });
});
