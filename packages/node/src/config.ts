/**
 * @custody/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 * Accounting-unit amounts are decimal strings in the environment and
 * bigints (× 10^6) once loaded.
 */

import { z } from "zod";
import { ACCOUNTING_DECIMALS, isAccountId, isAssetId } from "@custody/types";
import { parseAmount } from "@custody/ledger";

// =============================================================================
// Field helpers
// =============================================================================

/**
 * A decimal string parsed into a non-negative bigint scaled by `decimals`.
 */
function decimalAmount(decimals: number) {
  return z.string().transform((raw, ctx) => {
    try {
      const value = parseAmount(raw, decimals);
      if (value < 0n) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: "must not be negative" });
        return z.NEVER;
      }
      return value;
    } catch (err) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: err instanceof Error ? err.message : String(err),
      });
      return z.NEVER;
    }
  });
}

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z
  .object({
    PORT: z.coerce.number().int().min(1).max(65535).default(3000),
    HOST: z.string().default("0.0.0.0"),
    LOG_LEVEL: z
      .enum(["fatal", "error", "warn", "info", "debug", "trace"])
      .default("info"),
    NODE_ENV: z
      .enum(["development", "production", "test"])
      .default("development"),

    // Limits (accounting units)
    MAX_TOTAL_VALUE: decimalAmount(ACCOUNTING_DECIMALS).default("1000"),
    MAX_WITHDRAW_VALUE: decimalAmount(ACCOUNTING_DECIMALS).default("500"),

    // Oracle
    ORACLE_MODE: z.enum(["static", "chainlink"]).default("static"),
    STATIC_RATE: z.string().default("2000"),
    STATIC_RATE_DECIMALS: z.coerce.number().int().min(0).max(77).default(8),
    ORACLE_RPC_URL: z.string().url().optional(),
    ORACLE_FEED_ADDRESS: z.string().optional(),
    ORACLE_CHAIN_ID: z.string().default("eip155:1"),
    ORACLE_MAX_AGE_SECONDS: z.coerce.number().int().min(1).optional(),

    // In-memory transfer agent
    SEED_HOLDINGS: z.string().default(""),
  })
  .superRefine((config, ctx) => {
    if (config.ORACLE_MODE !== "chainlink") {
      return;
    }
    if (config.ORACLE_RPC_URL === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["ORACLE_RPC_URL"],
        message: "required when ORACLE_MODE is chainlink",
      });
    }
    if (config.ORACLE_FEED_ADDRESS === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["ORACLE_FEED_ADDRESS"],
        message: "required when ORACLE_MODE is chainlink",
      });
    }
  });

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Seed Holdings Parsing
// =============================================================================

export interface SeedHolding {
  readonly account: string;
  readonly asset: string;
  readonly amount: bigint;
}

/**
 * Parse the SEED_HOLDINGS env var into external holdings for the
 * in-memory transfer agent.
 *
 * Format: "account:asset:amount,account:asset:amount" (amount in base units)
 */
export function parseSeedHoldings(raw: string): readonly SeedHolding[] {
  if (raw.trim() === "") {
    return [];
  }

  const holdings: SeedHolding[] = [];

  for (const entry of raw.split(",")) {
    const parts = entry.trim().split(":");
    const [account, asset, amount] = parts;
    if (parts.length !== 3 || account === undefined || asset === undefined || amount === undefined) {
      throw new Error(
        `Invalid SEED_HOLDINGS entry: "${entry.trim()}". Expected format: account:asset:amount`,
      );
    }

    if (!isAccountId(account) || !isAssetId(asset)) {
      throw new Error(`Account and asset cannot be empty in SEED_HOLDINGS entry "${entry.trim()}"`);
    }
    if (!/^\d+$/.test(amount)) {
      throw new Error(`Invalid amount "${amount}" in SEED_HOLDINGS. Must be a base-unit integer`);
    }

    holdings.push({ account, asset, amount: BigInt(amount) });
  }

  return holdings;
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if required env vars are missing or invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
