/**
 * @custody/oracle — Price oracle adapters.
 *
 * - StaticPriceOracle: fixed rate for development and tests
 * - ChainlinkPriceOracle: aggregator feed read through viem
 *
 * Adapters only fetch readings. Validity and staleness are judged by
 * the valuation layer in @custody/vault.
 */

export { StaticPriceOracle } from "./static-oracle.js";
export { ChainlinkPriceOracle } from "./chainlink-oracle.js";
export type { ChainlinkOracleConfig } from "./chainlink-oracle.js";
export { EVM_CHAINS, resolveChain, supportedChainIds } from "./chains.js";
