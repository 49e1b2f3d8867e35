/**
 * Reentrancy Guard
 *
 * A single flag gating every state-mutating entry point. It is shared by all
 * swaps and carries no per-swap state.
 */

/**
 * Thrown by `acquire` when the guard is already held.
 */
export class ReentrancyError extends Error {
	constructor(message = "Reentrant call rejected: guard already active") {
		super(message);
		this.name = "ReentrancyError";
	}
}

/**
 * Process-wide reentrancy guard.
 *
 * Prefer `run`, which releases the guard on every exit path. Manual
 * `acquire`/`release` pairs must release in a `finally` block.
 *
 * @example
 * ```typescript
 * const guard = new ReentrancyGuard();
 *
 * // Scoped acquisition
 * const result = await guard.run(async () => {
 *   return await settle();
 * });
 *
 * // Manual management
 * guard.acquire();
 * try {
 *   await settle();
 * } finally {
 *   guard.release();
 * }
 * ```
 */
export class ReentrancyGuard {
	private active = false;

	/**
	 * @throws ReentrancyError if the guard is already held
	 */
	acquire(): void {
		if (this.active) {
			throw new ReentrancyError();
		}
		this.active = true;
	}

	release(): void {
		this.active = false;
	}

	isActive(): boolean {
		return this.active;
	}

	/**
	 * Run `operation` while holding the guard.
	 *
	 * Rejects with ReentrancyError without calling `operation` when the guard
	 * is already held. A rejected attempt leaves the outer holder's guard
	 * untouched.
	 */
	async run<T>(operation: () => Promise<T>): Promise<T> {
		this.acquire();
		try {
			return await operation();
		} finally {
			this.release();
		}
	}
}
