/**
 * @vestlock/evm-adapter — viem-backed transfer adapter.
 *
 * Lets the timelock custody ERC-20 tokens and sweep native currency on
 * any supported EVM chain. The vault is an account controlled by the
 * configured private key.
 */

export {
  EvmTransferAdapter,
  EvmAdapterError,
  NATIVE_TRANSFER_GAS,
  interpretReturn,
} from "./evm-adapter.js";
export type { EvmAdapterConfig, EvmAdapterErrorCode } from "./evm-adapter.js";
export { VIEM_CHAINS, supportedChainIds } from "./chains.js";
