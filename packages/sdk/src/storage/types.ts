/**
 * Swap Registry Types
 *
 * Defines the interface for pluggable registry backends. The engine only
 * talks to a registry through these methods, so a registry can live in
 * memory, in SQLite, Postgres, etc.
 */

import { Swap, SwapId } from "../core/types.js";
import { Transfer } from "../ledger/types.js";

/**
 * Swap registry interface.
 *
 * Owns every active swap record and the monotonic id counter.
 *
 * @example
 * ```typescript
 * class PostgresSwapRegistry implements SwapRegistry {
 *   constructor(private pool: Pool) {}
 *
 *   async get(swapId: SwapId): Promise<Swap | null> {
 *     const { rows } = await this.pool.query(
 *       'SELECT * FROM swaps WHERE id = $1',
 *       [swapId]
 *     );
 *     return rows[0] ? toSwap(rows[0]) : null;
 *   }
 *
 *   // ... other methods
 * }
 * ```
 */
export interface SwapRegistry {
	/**
	 * Store a swap under the next free id.
	 *
	 * Ids are allocated in increasing order and never reused.
	 *
	 * @returns The allocated id
	 * @throws RegistryError with code `SWAP_ID_OVERFLOW` once the id space is exhausted
	 */
	insert(swap: Swap): Promise<SwapId>;

	/**
	 * Look up a swap.
	 *
	 * @returns The swap if it is active, null if it never existed or was resolved
	 */
	get(swapId: SwapId): Promise<Swap | null>;

	/**
	 * Delete a swap. Callers check that the swap exists first.
	 */
	remove(swapId: SwapId): Promise<void>;

	/**
	 * The id the next successful `insert` will allocate.
	 */
	peekNextId(): Promise<SwapId>;
}

/**
 * Registry that shares a unit of work with the ledger.
 *
 * Both methods apply the ledger transfers and change the record together:
 * if either part fails, neither is kept. The transfers must land on the
 * same ledger the engine was configured with.
 */
export interface SettlingSwapRegistry extends SwapRegistry {
	/**
	 * Apply `transfers`, then store `swap` under the next free id.
	 *
	 * @throws LedgerError when a transfer is rejected
	 * @throws RegistryError with code `SWAP_ID_OVERFLOW` once the id space is exhausted
	 */
	insertWithTransfers(swap: Swap, transfers: Transfer[]): Promise<SwapId>;

	/**
	 * Apply `transfers`, then delete the swap.
	 *
	 * @throws LedgerError when a transfer is rejected
	 * @throws RegistryError with code `SWAP_NOT_FOUND` if the swap is gone
	 */
	removeWithTransfers(swapId: SwapId, transfers: Transfer[]): Promise<void>;
}

export function isSettlingRegistry(
	registry: SwapRegistry,
): registry is SettlingSwapRegistry {
	return (
		"insertWithTransfers" in registry &&
		typeof registry.insertWithTransfers === "function" &&
		"removeWithTransfers" in registry &&
		typeof registry.removeWithTransfers === "function"
	);
}

export type RegistryErrorCode =
	| "SWAP_ID_OVERFLOW"
	| "SWAP_NOT_FOUND"
	| "BACKEND_FAILURE";

/**
 * Error thrown by registry operations.
 */
export class RegistryError extends Error {
	constructor(
		message: string,
		public readonly code: RegistryErrorCode,
		public readonly details?: unknown,
		cause?: unknown,
	) {
		super(message, cause === undefined ? undefined : { cause });
		this.name = "RegistryError";
	}
}
