/**
 * Tests for the core BalanceLedger class.
 *
 * Covers:
 * - Deposits and withdrawals per (account, asset)
 * - Zero / negative amount rejection
 * - Insufficient balance re-check
 * - Running total sign convention and rate-drift asymmetry
 * - Overflow as invariant violation
 * - Revert from receipts
 * - Positions and snapshot/restore
 */

import { describe, it, expect, beforeEach } from "vitest";
import { MAX_UINT256, NATIVE_ASSET } from "@custody/types";
import { BalanceLedger } from "../src/ledger.js";
import { LedgerError } from "../src/types.js";
import type { LedgerErrorCode, LedgerSnapshot } from "../src/types.js";

// ─── Fixtures ────────────────────────────────────────────────────────────

const ALICE = "0xAlice";
const BOB = "0xBob";
const TOKEN = "0xToken";

function expectLedgerError(fn: () => unknown, code: LedgerErrorCode): void {
  try {
    fn();
    expect.unreachable("should have thrown");
  } catch (e) {
    expect(e).toBeInstanceOf(LedgerError);
    expect((e as LedgerError).code).toBe(code);
  }
}

// ─── Tests ───────────────────────────────────────────────────────────────

describe("BalanceLedger", () => {
  let ledger: BalanceLedger;

  beforeEach(() => {
    ledger = new BalanceLedger();
  });

  describe("balanceOf", () => {
    it("returns 0 for unseen pairs", () => {
      expect(ledger.balanceOf(ALICE, NATIVE_ASSET)).toBe(0n);
      expect(ledger.totalDepositedValue).toBe(0n);
    });
  });

  describe("position keys", () => {
    it("keeps pairs apart when identifiers contain separators", () => {
      ledger.deposit("a", "b::c", 7n, 0n);

      expect(ledger.balanceOf("a::b", "c")).toBe(0n);
      expectLedgerError(() => ledger.withdraw("a::b", "c", 7n, 0n), "INSUFFICIENT_BALANCE");
      expect(ledger.balanceOf("a", "b::c")).toBe(7n);
      expect(ledger.positionCount).toBe(1);
    });

    it("restores both pairs of a separator-ambiguous snapshot", () => {
      const snap: LedgerSnapshot = {
        version: 1,
        positions: [
          { account: "a::b", asset: "c", balance: "1" },
          { account: "a", asset: "b::c", balance: "2" },
        ],
        totalDepositedValue: "0",
        createdAt: "2025-01-01T00:00:00.000Z",
      };

      const restored = BalanceLedger.fromSnapshot(snap);
      expect(restored.balanceOf("a::b", "c")).toBe(1n);
      expect(restored.balanceOf("a", "b::c")).toBe(2n);
    });
  });

  describe("deposit", () => {
    it("increases balance and running total", () => {
      const receipt = ledger.deposit(ALICE, NATIVE_ASSET, 400n, 800_000_000n);

      expect(ledger.balanceOf(ALICE, NATIVE_ASSET)).toBe(400n);
      expect(ledger.totalDepositedValue).toBe(800_000_000n);
      expect(receipt.previousBalance).toBe(0n);
      expect(receipt.balance).toBe(400n);
      expect(receipt.previousTotal).toBe(0n);
      expect(receipt.total).toBe(800_000_000n);
      expect(receipt.mutation.kind).toBe("deposit");
    });

    it("keeps assets and accounts separate", () => {
      ledger.deposit(ALICE, NATIVE_ASSET, 10n, 1n);
      ledger.deposit(ALICE, TOKEN, 20n, 2n);
      ledger.deposit(BOB, TOKEN, 30n, 3n);

      expect(ledger.balanceOf(ALICE, NATIVE_ASSET)).toBe(10n);
      expect(ledger.balanceOf(ALICE, TOKEN)).toBe(20n);
      expect(ledger.balanceOf(BOB, TOKEN)).toBe(30n);
      expect(ledger.balanceOf(BOB, NATIVE_ASSET)).toBe(0n);
      expect(ledger.totalDepositedValue).toBe(6n);
    });

    it("accepts a zero accounting value for a non-zero amount", () => {
      ledger.deposit(ALICE, TOKEN, 1n, 0n);
      expect(ledger.balanceOf(ALICE, TOKEN)).toBe(1n);
      expect(ledger.totalDepositedValue).toBe(0n);
    });

    it("rejects zero amounts", () => {
      expectLedgerError(() => ledger.deposit(ALICE, TOKEN, 0n, 0n), "ZERO_AMOUNT");
    });

    it("rejects negative amounts and values", () => {
      expectLedgerError(() => ledger.deposit(ALICE, TOKEN, -1n, 0n), "INVALID_AMOUNT");
      expectLedgerError(() => ledger.deposit(ALICE, TOKEN, 1n, -1n), "INVALID_AMOUNT");
    });

    it("rejects empty identifiers", () => {
      expectLedgerError(() => ledger.deposit("", TOKEN, 1n, 0n), "INVALID_ARGUMENT");
      expectLedgerError(() => ledger.deposit(ALICE, "", 1n, 0n), "INVALID_ARGUMENT");
    });

    it("treats balance overflow as an invariant violation and changes nothing", () => {
      ledger.deposit(ALICE, TOKEN, MAX_UINT256, 5n);

      expectLedgerError(() => ledger.deposit(ALICE, TOKEN, 1n, 1n), "INVARIANT_VIOLATION");
      expect(ledger.balanceOf(ALICE, TOKEN)).toBe(MAX_UINT256);
      expect(ledger.totalDepositedValue).toBe(5n);
    });

    it("treats running total overflow as an invariant violation", () => {
      ledger.deposit(ALICE, TOKEN, 1n, MAX_UINT256);

      expectLedgerError(() => ledger.deposit(BOB, TOKEN, 1n, 1n), "INVARIANT_VIOLATION");
      expect(ledger.balanceOf(BOB, TOKEN)).toBe(0n);
    });
  });

  describe("withdraw", () => {
    beforeEach(() => {
      ledger.deposit(ALICE, NATIVE_ASSET, 100n, 1_000n);
    });

    it("decreases balance and running total", () => {
      ledger.withdraw(ALICE, NATIVE_ASSET, 40n, 400n);

      expect(ledger.balanceOf(ALICE, NATIVE_ASSET)).toBe(60n);
      expect(ledger.totalDepositedValue).toBe(600n);
    });

    it("allows draining to exactly zero and keeps the position", () => {
      ledger.withdraw(ALICE, NATIVE_ASSET, 100n, 1_000n);

      expect(ledger.balanceOf(ALICE, NATIVE_ASSET)).toBe(0n);
      expect(ledger.positions({ account: ALICE })).toEqual([
        { account: ALICE, asset: NATIVE_ASSET, balance: 0n },
      ]);
    });

    it("rejects withdrawing more than the balance and changes nothing", () => {
      expectLedgerError(
        () => ledger.withdraw(ALICE, NATIVE_ASSET, 101n, 1n),
        "INSUFFICIENT_BALANCE",
      );
      expect(ledger.balanceOf(ALICE, NATIVE_ASSET)).toBe(100n);
      expect(ledger.totalDepositedValue).toBe(1_000n);
    });

    it("rejects withdrawing from an unseen pair", () => {
      expectLedgerError(() => ledger.withdraw(BOB, TOKEN, 1n, 0n), "INSUFFICIENT_BALANCE");
    });

    it("rejects zero amounts", () => {
      expectLedgerError(() => ledger.withdraw(ALICE, NATIVE_ASSET, 0n, 0n), "ZERO_AMOUNT");
    });

    it("subtracts the withdrawal-time value, not the deposit-time value", () => {
      // Deposited 100 units worth 1_000; rate has since halved
      ledger.withdraw(ALICE, NATIVE_ASSET, 100n, 500n);

      expect(ledger.balanceOf(ALICE, NATIVE_ASSET)).toBe(0n);
      expect(ledger.totalDepositedValue).toBe(500n);
    });

    it("rejects a withdrawal whose value exceeds the running total", () => {
      // Rate has since risen: 100 units are now worth more than was deposited
      expectLedgerError(
        () => ledger.withdraw(ALICE, NATIVE_ASSET, 100n, 1_001n),
        "INVARIANT_VIOLATION",
      );
      expect(ledger.balanceOf(ALICE, NATIVE_ASSET)).toBe(100n);
      expect(ledger.totalDepositedValue).toBe(1_000n);
    });
  });

  describe("apply", () => {
    it("dispatches on the mutation kind", () => {
      ledger.apply({ kind: "deposit", account: ALICE, asset: TOKEN, amount: 7n, value: 7n });
      ledger.apply({ kind: "withdraw", account: ALICE, asset: TOKEN, amount: 2n, value: 2n });

      expect(ledger.balanceOf(ALICE, TOKEN)).toBe(5n);
      expect(ledger.totalDepositedValue).toBe(5n);
    });
  });

  describe("revert", () => {
    it("restores the state captured in a deposit receipt", () => {
      ledger.deposit(ALICE, TOKEN, 10n, 10n);
      const receipt = ledger.deposit(ALICE, TOKEN, 5n, 5n);

      ledger.revert(receipt);

      expect(ledger.balanceOf(ALICE, TOKEN)).toBe(10n);
      expect(ledger.totalDepositedValue).toBe(10n);
    });

    it("restores the state captured in a withdraw receipt", () => {
      ledger.deposit(ALICE, TOKEN, 10n, 10n);
      const receipt = ledger.withdraw(ALICE, TOKEN, 4n, 4n);

      ledger.revert(receipt);

      expect(ledger.balanceOf(ALICE, TOKEN)).toBe(10n);
      expect(ledger.totalDepositedValue).toBe(10n);
    });

    it("refuses a stale receipt", () => {
      const receipt = ledger.deposit(ALICE, TOKEN, 10n, 10n);
      ledger.deposit(BOB, TOKEN, 1n, 1n);

      expectLedgerError(() => ledger.revert(receipt), "INVARIANT_VIOLATION");
      expect(ledger.balanceOf(ALICE, TOKEN)).toBe(10n);
    });
  });

  describe("positions", () => {
    it("lists and filters positions", () => {
      ledger.deposit(ALICE, NATIVE_ASSET, 1n, 0n);
      ledger.deposit(ALICE, TOKEN, 2n, 0n);
      ledger.deposit(BOB, TOKEN, 3n, 0n);

      expect(ledger.positionCount).toBe(3);
      expect(ledger.positions({ asset: TOKEN }).map((p) => p.account)).toEqual([ALICE, BOB]);
      expect(ledger.positions({ account: BOB, asset: TOKEN })).toEqual([
        { account: BOB, asset: TOKEN, balance: 3n },
      ]);
    });
  });

  describe("snapshot / fromSnapshot", () => {
    it("round-trips balances and running total", () => {
      ledger.deposit(ALICE, NATIVE_ASSET, 400n, 800_000_000n);
      ledger.deposit(BOB, TOKEN, 5n, 0n);

      const snap = ledger.snapshot();
      expect(snap.version).toBe(1);
      expect(snap.totalDepositedValue).toBe("800000000");

      const restored = BalanceLedger.fromSnapshot(JSON.parse(JSON.stringify(snap)) as LedgerSnapshot);
      expect(restored.balanceOf(ALICE, NATIVE_ASSET)).toBe(400n);
      expect(restored.balanceOf(BOB, TOKEN)).toBe(5n);
      expect(restored.totalDepositedValue).toBe(800_000_000n);
    });

    it("rejects malformed balances", () => {
      const snap: LedgerSnapshot = {
        version: 1,
        positions: [{ account: ALICE, asset: TOKEN, balance: "-5" }],
        totalDepositedValue: "0",
        createdAt: "2025-01-01T00:00:00.000Z",
      };
      expectLedgerError(() => BalanceLedger.fromSnapshot(snap), "INVALID_SNAPSHOT");
    });

    it("rejects duplicate positions", () => {
      const snap: LedgerSnapshot = {
        version: 1,
        positions: [
          { account: ALICE, asset: TOKEN, balance: "1" },
          { account: ALICE, asset: TOKEN, balance: "2" },
        ],
        totalDepositedValue: "0",
        createdAt: "2025-01-01T00:00:00.000Z",
      };
      expectLedgerError(() => BalanceLedger.fromSnapshot(snap), "INVALID_SNAPSHOT");
    });

    it("rejects a malformed running total", () => {
      const snap: LedgerSnapshot = {
        version: 1,
        positions: [],
        totalDepositedValue: "1.5",
        createdAt: "2025-01-01T00:00:00.000Z",
      };
      expectLedgerError(() => BalanceLedger.fromSnapshot(snap), "INVALID_SNAPSHOT");
    });
  });
});
