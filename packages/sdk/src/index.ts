/**
 * Escrow Swap SDK
 *
 * Two-party escrow for swapping deposits of the same asset type without a
 * trusted intermediary.
 *
 * @example
 * ```typescript
 * import {
 *   SwapEngine,
 *   MemorySwapRegistry,
 *   MemoryLedger,
 * } from "@escrow-swap/sdk";
 *
 * const ledger = new MemoryLedger({ alice: 100n, bob: 50n });
 * const engine = new SwapEngine({
 *   registry: new MemorySwapRegistry(),
 *   ledger,
 *   escrowAccount: "escrow",
 * });
 *
 * const swapId = await engine.initiateSwap(
 *   { caller: "alice", value: 100n },
 *   "bob",
 *   50n,
 * );
 * await engine.acceptSwap({ caller: "bob", value: 50n }, swapId);
 * ```
 */

// Core - Accounts, balances and swap records
export {
	// Types
	type AccountId,
	type Balance,
	type SwapId,
	type Swap,
	type CallContext,
	// Utilities
	MAX_SWAP_ID,
	isValidSwapId,
	isValidAccountId,
	cloneSwap,
} from "./core/index.js";

// Storage - Swap registries
export {
	// Types
	type SwapRegistry,
	type SettlingSwapRegistry,
	type RegistryErrorCode,
	type MemorySwapRegistryOptions,
	// Classes
	MemorySwapRegistry,
	RegistryError,
	// Utilities
	isSettlingRegistry,
} from "./storage/index.js";

// Ledger - Balance transfers
export {
	// Types
	type Transfer,
	type Ledger,
	type TransactionalLedger,
	type TransferHook,
	type LedgerErrorCode,
	// Classes
	MemoryLedger,
	LedgerError,
	// Utilities
	isTransactionalLedger,
} from "./ledger/index.js";

// Guard - Reentrancy protection
export { ReentrancyGuard, ReentrancyError } from "./guard/index.js";

// Events - Lifecycle notifications
export {
	// Types
	type SwapInitiated,
	type SwapAccepted,
	type SwapCancelled,
	type SwapEvent,
	type SwapEventType,
	type EventSink,
	// Constants
	SWAP_INITIATED,
	SWAP_ACCEPTED,
	SWAP_CANCELLED,
	// Classes
	RecordingEventSink,
} from "./events/index.js";

// Modules - Swap lifecycle engine
export {
	type SwapEngineConfig,
	type SwapErrorCode,
	type SwapErrorCategory,
	SWAP_ERROR_CATEGORY,
	SwapError,
	SwapEngine,
	isSwapError,
} from "./modules/swap/index.js";
