/**
 * CAIP-2 chain id → viem chain definition.
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

export const VIEM_CHAINS: Readonly<Record<string, Chain>> = {
  "eip155:1": mainnet,
  "eip155:11155111": sepolia,
  "eip155:8453": base,
  "eip155:42161": arbitrum,
  "eip155:10": optimism,
  "eip155:137": polygon,
};

export function supportedChainIds(): readonly string[] {
  return Object.keys(VIEM_CHAINS);
}
