/**
 * Swap Module Types
 *
 * Configuration and error taxonomy of the swap lifecycle engine.
 */

import { AccountId } from "../../core/types.js";
import { EventSink, SwapEvent } from "../../events/types.js";
import { Ledger } from "../../ledger/types.js";
import { SwapRegistry } from "../../storage/types.js";

export interface SwapEngineConfig {
	/** Registry holding active swaps */
	registry: SwapRegistry;
	/** Ledger that moves balances */
	ledger: Ledger;
	/** Ledger account that holds escrowed deposits */
	escrowAccount: AccountId;
	/** Receiver of lifecycle events */
	events?: EventSink;
	/**
	 * Called when `events.emit` throws. The operation that produced the
	 * event has already completed and still resolves.
	 */
	onEventError?: (error: unknown, event: SwapEvent) => void;
}

export type SwapErrorCode =
	// validation
	| "InvalidAmount"
	| "SelfSwapNotAllowed"
	| "SwapNotFound"
	| "Unauthorized"
	// resource
	| "DepositFailed"
	| "TransferFailed"
	| "RefundFailed"
	// concurrency
	| "AlreadyActive"
	// fatal
	| "SwapIdOverflow"
	| "RollbackFailed";

export type SwapErrorCategory =
	| "validation"
	| "resource"
	| "concurrency"
	| "fatal";

export const SWAP_ERROR_CATEGORY: Record<SwapErrorCode, SwapErrorCategory> = {
	InvalidAmount: "validation",
	SelfSwapNotAllowed: "validation",
	SwapNotFound: "validation",
	Unauthorized: "validation",
	DepositFailed: "resource",
	TransferFailed: "resource",
	RefundFailed: "resource",
	AlreadyActive: "concurrency",
	SwapIdOverflow: "fatal",
	RollbackFailed: "fatal",
};

/**
 * Error thrown by swap engine operations.
 *
 * The underlying ledger or registry error, when there is one, is kept as
 * `cause`.
 */
export class SwapError extends Error {
	readonly category: SwapErrorCategory;

	constructor(
		message: string,
		public readonly code: SwapErrorCode,
		public readonly details?: unknown,
		cause?: unknown,
	) {
		super(message, cause === undefined ? undefined : { cause });
		this.name = "SwapError";
		this.category = SWAP_ERROR_CATEGORY[code];
	}

	isFatal(): boolean {
		return this.category === "fatal";
	}
}

export function isSwapError(
	err: unknown,
	code?: SwapErrorCode,
): err is SwapError {
	return err instanceof SwapError && (code === undefined || err.code === code);
}
