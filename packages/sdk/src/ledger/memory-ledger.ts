/**
 * In-Memory Ledger
 *
 * A reference ledger for testing and development. Balances live in a map
 * and are lost when the process exits.
 */

import { AccountId, Balance } from "../core/types.js";
import { Ledger, LedgerError, Transfer, TransferHook } from "./types.js";

/**
 * In-memory ledger with transfer hooks.
 *
 * Hooks run synchronously inside `transfer`, the way a token contract
 * notifies a receiver. They can call back into whatever invoked the
 * transfer, which makes this ledger suitable for exercising reentrancy.
 *
 * @example
 * ```typescript
 * const ledger = new MemoryLedger({ alice: 1_000n });
 *
 * const unsubscribe = ledger.onTransfer(async (t) => {
 *   console.log(`${t.from} -> ${t.to}: ${t.amount}`);
 * });
 *
 * await ledger.transfer("alice", "bob", 250n);
 * unsubscribe();
 * ```
 */
export class MemoryLedger implements Ledger {
	private balances: Map<AccountId, Balance> = new Map();
	private hooks: Set<TransferHook> = new Set();

	constructor(initialBalances: Record<AccountId, Balance> = {}) {
		for (const [account, balance] of Object.entries(initialBalances)) {
			this.credit(account, balance);
		}
	}

	async transfer(
		from: AccountId,
		to: AccountId,
		amount: Balance,
	): Promise<void> {
		if (amount < 0n) {
			throw new LedgerError(
				`Transfer amount must not be negative, got ${amount}`,
				"INVALID_AMOUNT",
				{ from, to, amount },
			);
		}
		const available = this.read(from);
		if (available < amount) {
			throw new LedgerError(
				`Insufficient funds in ${from}: ${available} < ${amount}`,
				"INSUFFICIENT_FUNDS",
				{ from, to, amount, available },
			);
		}

		this.apply(from, to, amount);

		const transfer: Transfer = { from, to, amount };
		try {
			for (const hook of Array.from(this.hooks)) {
				await hook(transfer);
			}
		} catch (err) {
			this.apply(to, from, amount);
			throw new LedgerError(
				`Transfer ${from} -> ${to} rejected by hook`,
				"HOOK_REJECTED",
				transfer,
				err,
			);
		}
	}

	async balanceOf(account: AccountId): Promise<Balance> {
		return this.read(account);
	}

	/**
	 * Mint funds into an account.
	 */
	credit(account: AccountId, amount: Balance): void {
		if (amount < 0n) {
			throw new LedgerError(
				`Credit amount must not be negative, got ${amount}`,
				"INVALID_AMOUNT",
				{ account, amount },
			);
		}
		this.balances.set(account, this.read(account) + amount);
	}

	/**
	 * Register a hook called after every applied transfer.
	 *
	 * @returns Unsubscribe function
	 */
	onTransfer(hook: TransferHook): () => void {
		this.hooks.add(hook);
		return () => {
			this.hooks.delete(hook);
		};
	}

	/**
	 * Sum of all balances.
	 */
	totalSupply(): Balance {
		let total = 0n;
		for (const balance of this.balances.values()) {
			total += balance;
		}
		return total;
	}

	private read(account: AccountId): Balance {
		return this.balances.get(account) ?? 0n;
	}

	private apply(from: AccountId, to: AccountId, amount: Balance): void {
		this.balances.set(from, this.read(from) - amount);
		this.balances.set(to, this.read(to) + amount);
	}
}
