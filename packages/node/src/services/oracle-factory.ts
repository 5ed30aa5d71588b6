/**
 * Oracle factory — builds the configured price oracle.
 */

import type { PriceOracle } from "@custody/types";
import { parseAmount } from "@custody/ledger";
import { ChainlinkPriceOracle, StaticPriceOracle } from "@custody/oracle";
import type { AppConfig } from "../config.js";

export interface ManagedOracle {
  readonly oracle: PriceOracle;
  /** Human-readable description for startup logs */
  readonly description: string;
  start(): Promise<void>;
  stop(): Promise<void>;
}

type OracleSettings = Pick<
  AppConfig,
  | "ORACLE_MODE"
  | "STATIC_RATE"
  | "STATIC_RATE_DECIMALS"
  | "ORACLE_RPC_URL"
  | "ORACLE_FEED_ADDRESS"
  | "ORACLE_CHAIN_ID"
>;

export function createOracle(config: OracleSettings, clock: () => number = Date.now): ManagedOracle {
  if (config.ORACLE_MODE === "static") {
    const rate = parseAmount(config.STATIC_RATE, config.STATIC_RATE_DECIMALS);
    return {
      oracle: new StaticPriceOracle(rate, config.STATIC_RATE_DECIMALS, clock),
      description: `static rate ${config.STATIC_RATE}`,
      start: async () => undefined,
      stop: async () => undefined,
    };
  }

  const rpcUrl = config.ORACLE_RPC_URL;
  const feedAddress = config.ORACLE_FEED_ADDRESS;
  if (rpcUrl === undefined || feedAddress === undefined) {
    throw new Error("ORACLE_RPC_URL and ORACLE_FEED_ADDRESS are required for the chainlink oracle");
  }

  const chainlink = new ChainlinkPriceOracle({
    chainId: config.ORACLE_CHAIN_ID,
    rpcUrl,
    feedAddress,
  });
  return {
    oracle: chainlink,
    description: `chainlink feed ${feedAddress} on ${config.ORACLE_CHAIN_ID}`,
    start: () => chainlink.connect(),
    stop: () => chainlink.disconnect(),
  };
}
