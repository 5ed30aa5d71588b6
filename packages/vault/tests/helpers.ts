/**
 * Shared fixtures for vault tests.
 */

import { expect, vi } from "vitest";
import type { Mock } from "vitest";
import type { OracleReading, PriceOracle } from "@custody/types";
import { VaultError } from "../src/types.js";
import type { VaultErrorCode, VaultLogger } from "../src/types.js";

export const ALICE = "0xAlice";
export const BOB = "0xBob";
export const TOKEN = "0xToken";

/** One whole unit at 18 decimals */
export const ONE = 10n ** 18n;

/** 2000.00000000 at precision 8 */
export const RATE_2000: OracleReading = { rate: 2000_00000000n, precision: 8 };

export interface MutableOracle extends PriceOracle {
  readonly latestRate: Mock<() => Promise<OracleReading>>;
  set(next: OracleReading): void;
}

export function mutableOracle(initial: OracleReading = RATE_2000): MutableOracle {
  let reading = initial;
  return {
    latestRate: vi.fn(async () => reading),
    set(next: OracleReading) {
      reading = next;
    },
  };
}

export function mockLogger() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies VaultLogger;
}

export async function expectVaultError(
  operation: Promise<unknown>,
  code: VaultErrorCode,
): Promise<VaultError> {
  const error = await operation.then(
    () => undefined,
    (e: unknown) => e,
  );
  if (!(error instanceof VaultError)) {
    return expect.unreachable(`expected VaultError ${code}, got ${String(error)}`);
  }
  expect(error.code).toBe(code);
  return error;
}

export function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}
