/**
 * Test helpers for @custody/node.
 *
 * Provides a test app factory that creates a Hono app with
 * all middleware and routes, but no HTTP server.
 */

import { StaticPriceOracle } from "@custody/oracle";
import { InMemoryAssetTransfer } from "@custody/vault";
import { createApp } from "../src/app.js";
import type { AppInstance, CreateAppOptions } from "../src/app.js";

export const ALICE = "0xAlice";
export const TOKEN = "0xToken";

/** One whole unit at 18 decimals, as a wire string */
export const ONE = "1000000000000000000";

/** 2026-01-01T00:00:00Z */
export const NOW = Date.UTC(2026, 0, 1);

export interface TestApp extends AppInstance {
  readonly oracle: StaticPriceOracle;
  readonly transfer: InMemoryAssetTransfer;
}

/**
 * Create a test app with a 1000 cap, a 500 withdrawal limit and a
 * static rate of 2000. ALICE holds 10_000 TOKEN outside custody.
 */
export function createTestApp(
  overrides: Partial<Omit<CreateAppOptions, "serviceConfig">> = {},
): TestApp {
  const oracle = new StaticPriceOracle(2000_00000000n, 8, () => NOW);
  const transfer = new InMemoryAssetTransfer();
  transfer.fund(ALICE, TOKEN, 10_000n * 10n ** 18n);

  const instance = createApp({
    serviceConfig: {
      maxTotalValue: 1000_000000n,
      maxWithdrawValue: 500_000000n,
      oracle,
      transfer,
      clock: () => NOW,
    },
    ...overrides,
  });

  return { ...instance, oracle, transfer };
}

/**
 * JSON request helper.
 */
export function jsonRequest(
  path: string,
  method: string = "GET",
  body?: unknown,
  headers?: Record<string, string>,
): Request {
  const init: RequestInit = {
    method,
    headers: {
      "Content-Type": "application/json",
      ...headers,
    },
  };

  if (body !== undefined) {
    init.body = JSON.stringify(body);
  }

  return new Request(`http://localhost${path}`, init);
}

export interface ErrorBody {
  error: { code: string; message: string; details?: Record<string, unknown> };
}
