/**
 * Core module - Accounts, balances and swap records
 */

// Types
export type { AccountId, Balance, SwapId, Swap, CallContext } from "./types.js";

// Utilities
export {
	MAX_SWAP_ID,
	isValidSwapId,
	isValidAccountId,
	cloneSwap,
} from "./types.js";
