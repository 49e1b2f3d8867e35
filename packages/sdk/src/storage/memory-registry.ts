/**
 * In-Memory Swap Registry
 *
 * A simple in-memory registry for testing and development.
 * Data is lost when the process exits.
 */

import { MAX_SWAP_ID, Swap, SwapId, cloneSwap } from "../core/types.js";
import { RegistryError, SwapRegistry } from "./types.js";

export interface MemorySwapRegistryOptions {
	/** First id to hand out (defaults to 0) */
	nextId?: SwapId;
}

/**
 * In-memory swap registry.
 *
 * @example
 * ```typescript
 * const registry = new MemorySwapRegistry();
 *
 * const id = await registry.insert({
 *   initiator: "alice",
 *   counterparty: "bob",
 *   initiatorAsset: 100n,
 *   counterpartyAsset: 50n,
 * });
 *
 * const swap = await registry.get(id);
 * ```
 */
export class MemorySwapRegistry implements SwapRegistry {
	private swaps: Map<SwapId, Swap> = new Map();
	private nextId: SwapId;

	constructor(options: MemorySwapRegistryOptions = {}) {
		this.nextId = options.nextId ?? 0;
	}

	async insert(swap: Swap): Promise<SwapId> {
		const swapId = this.nextId;
		// The last representable id is never allocated, the counter would wrap
		if (swapId >= MAX_SWAP_ID) {
			throw new RegistryError(
				`Swap id space exhausted at ${swapId}`,
				"SWAP_ID_OVERFLOW",
				{ nextId: swapId },
			);
		}
		this.nextId = swapId + 1;
		// Copy to prevent external mutations
		this.swaps.set(swapId, cloneSwap(swap));
		return swapId;
	}

	async get(swapId: SwapId): Promise<Swap | null> {
		const swap = this.swaps.get(swapId);
		if (!swap) return null;
		return cloneSwap(swap);
	}

	async remove(swapId: SwapId): Promise<void> {
		this.swaps.delete(swapId);
	}

	async peekNextId(): Promise<SwapId> {
		return this.nextId;
	}

	/**
	 * Get the number of active swaps.
	 */
	size(): number {
		return this.swaps.size;
	}

	/**
	 * Get all active swap ids.
	 */
	keys(): SwapId[] {
		return Array.from(this.swaps.keys());
	}
}
