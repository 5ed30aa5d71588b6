/**
 * Chainlink Price Oracle — reads an aggregator feed over JSON-RPC.
 *
 * Uses viem for all chain interactions. Read-only: no signing, no
 * transaction submission.
 *
 * The reading maps the aggregator's round data as follows:
 * - answer → rate
 * - decimals() → precision
 * - updatedAt → updatedAt (unix seconds)
 *
 * A round that never completed (updatedAt of 0, or answeredInRound
 * behind roundId) is reported with a zero rate so the valuation layer
 * rejects it like any other invalid reading.
 */

import {
  createPublicClient,
  http,
  isAddress,
  parseAbiItem,
  type Address,
  type Chain,
  type HttpTransport,
  type PublicClient,
} from "viem";
import type { OracleReading, PriceOracle } from "@custody/types";
import { resolveChain } from "./chains.js";

// Aggregator ABI fragments (read-only)
const AGGREGATOR_LATEST_ROUND_DATA = parseAbiItem(
  "function latestRoundData() view returns (uint80 roundId, int256 answer, uint256 startedAt, uint256 updatedAt, uint80 answeredInRound)",
);
const AGGREGATOR_DECIMALS = parseAbiItem(
  "function decimals() view returns (uint8)",
);

export interface ChainlinkOracleConfig {
  /** CAIP-2 chain ID of the feed, e.g. "eip155:1" */
  readonly chainId: string;

  /** HTTP JSON-RPC endpoint */
  readonly rpcUrl: string;

  /** Aggregator contract address */
  readonly feedAddress: string;

  /** Request timeout in milliseconds */
  readonly timeoutMs?: number;
}

export class ChainlinkPriceOracle implements PriceOracle {
  readonly chainId: string;
  readonly feedAddress: Address;
  private readonly chain: Chain;
  private readonly config: ChainlinkOracleConfig;
  private client: PublicClient<HttpTransport, Chain> | null = null;

  /** Feed decimals never change; read once per connection */
  private decimals: number | null = null;

  constructor(config: ChainlinkOracleConfig) {
    if (!isAddress(config.feedAddress)) {
      throw new Error(
        `ChainlinkPriceOracle: invalid feed address '${config.feedAddress}'`,
      );
    }
    this.chain = resolveChain(config.chainId);
    this.chainId = config.chainId;
    this.feedAddress = config.feedAddress;
    this.config = config;
  }

  async connect(): Promise<void> {
    this.client = createPublicClient({
      chain: this.chain,
      transport: http(this.config.rpcUrl, {
        timeout: this.config.timeoutMs ?? 30_000,
      }),
    });
    this.decimals = null;
  }

  async disconnect(): Promise<void> {
    this.client = null;
    this.decimals = null;
  }

  get connected(): boolean {
    return this.client !== null;
  }

  async latestRate(): Promise<OracleReading> {
    const client = this.requireClient();

    const [roundData, precision] = await Promise.all([
      client.readContract({
        address: this.feedAddress,
        abi: [AGGREGATOR_LATEST_ROUND_DATA],
        functionName: "latestRoundData",
      }),
      this.readDecimals(client),
    ]);

    const [roundId, answer, , updatedAt, answeredInRound] = roundData;
    const complete = updatedAt !== 0n && answeredInRound >= roundId;

    return {
      rate: complete ? answer : 0n,
      precision,
      updatedAt: Number(updatedAt),
    };
  }

  private async readDecimals(
    client: PublicClient<HttpTransport, Chain>,
  ): Promise<number> {
    if (this.decimals === null) {
      const decimals = await client.readContract({
        address: this.feedAddress,
        abi: [AGGREGATOR_DECIMALS],
        functionName: "decimals",
      });
      this.decimals = Number(decimals);
    }
    return this.decimals;
  }

  private requireClient(): PublicClient<HttpTransport, Chain> {
    if (!this.client) {
      throw new Error(
        `ChainlinkPriceOracle: not connected to '${this.chainId}'. Call connect() first.`,
      );
    }
    return this.client;
  }
}
