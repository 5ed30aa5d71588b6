/**
 * Custody routes.
 *
 * POST /api/v1/deposits/native        — Credit native currency sent with the call
 * POST /api/v1/deposits/asset         — Pull and credit a fungible asset
 * POST /api/v1/withdrawals            — Debit and push an asset out
 * GET  /api/v1/balances/:account/:asset — Committed balance in base units
 * GET  /api/v1/totals                 — Running total, limits and cap headroom
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  AssetDepositSchema,
  NativeDepositSchema,
  WithdrawalSchema,
  toBalanceView,
  toReceiptView,
  toTotalsView,
} from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

export function createCustodyRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // POST /api/v1/deposits/native
  routes.post("/deposits/native", validateBody(NativeDepositSchema), async (c) => {
    const { account, amount } = c.get("validatedBody");
    const receipt = await c.get("service").depositNative(account, amount);
    return c.json({ data: toReceiptView(receipt) }, 201);
  });

  // POST /api/v1/deposits/asset
  routes.post("/deposits/asset", validateBody(AssetDepositSchema), async (c) => {
    const { account, asset, amount } = c.get("validatedBody");
    const receipt = await c.get("service").depositAsset(account, asset, amount);
    return c.json({ data: toReceiptView(receipt) }, 201);
  });

  // POST /api/v1/withdrawals
  routes.post("/withdrawals", validateBody(WithdrawalSchema), async (c) => {
    const { account, asset, amount } = c.get("validatedBody");
    const receipt = await c.get("service").withdraw(account, asset, amount);
    return c.json({ data: toReceiptView(receipt) }, 201);
  });

  // GET /api/v1/balances/:account/:asset
  routes.get("/balances/:account/:asset", (c) => {
    const position = c.get("service").balanceOf(c.req.param("account"), c.req.param("asset"));
    return c.json({ data: toBalanceView(position) });
  });

  // GET /api/v1/totals
  routes.get("/totals", (c) => {
    const { total, limits } = c.get("service").totals();
    return c.json({ data: toTotalsView(total, limits) });
  });

  return routes;
}
