/**
 * Swap Module
 *
 * Two-party escrow swap: the initiator escrows a deposit, the counterparty
 * accepts atomically or the initiator cancels and is refunded.
 */

// Types
export type {
	SwapEngineConfig,
	SwapErrorCode,
	SwapErrorCategory,
} from "./types.js";

export { SwapError, SWAP_ERROR_CATEGORY, isSwapError } from "./types.js";

// Engine
export { SwapEngine } from "./swap-engine.js";
