/**
 * Chain Definitions
 *
 * EVM chains a price feed can be read from, keyed by CAIP-2 chain ID.
 */

import type { Chain } from "viem";
import {
  mainnet,
  sepolia,
  base,
  arbitrum,
  optimism,
  polygon,
} from "viem/chains";

export const EVM_CHAINS: Readonly<Record<string, Chain>> = {
  "eip155:1": mainnet,
  "eip155:11155111": sepolia,
  "eip155:8453": base,
  "eip155:42161": arbitrum,
  "eip155:10": optimism,
  "eip155:137": polygon,
};

export function supportedChainIds(): readonly string[] {
  return Object.keys(EVM_CHAINS);
}

/**
 * Resolve a CAIP-2 chain ID to its viem chain definition.
 * Throws for chains without a known definition.
 */
export function resolveChain(chainId: string): Chain {
  const chain = EVM_CHAINS[chainId];
  if (chain === undefined) {
    throw new Error(
      `Unsupported chain '${chainId}'. Supported: ${supportedChainIds().join(", ")}`,
    );
  }
  return chain;
}
