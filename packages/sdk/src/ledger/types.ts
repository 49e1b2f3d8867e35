/**
 * Ledger Types
 *
 * The ledger is the account system that actually moves balances. The SDK
 * never implements balance accounting itself: hosts plug in their ledger
 * through these interfaces.
 */

import { AccountId, Balance } from "../core/types.js";

/**
 * A single balance movement.
 */
export interface Transfer {
	from: AccountId;
	to: AccountId;
	amount: Balance;
}

/**
 * Ledger interface.
 *
 * `transfer` either moves the full amount or throws; a rejected transfer
 * leaves every balance untouched.
 */
export interface Ledger {
	/**
	 * Move `amount` from one account to another.
	 *
	 * @throws LedgerError when the transfer is rejected
	 */
	transfer(from: AccountId, to: AccountId, amount: Balance): Promise<void>;

	/**
	 * Current balance of an account. Unknown accounts hold zero.
	 */
	balanceOf(account: AccountId): Promise<Balance>;
}

/**
 * Ledger that can apply several transfers as one atomic unit.
 *
 * Implement this if your ledger backend supports transactions. The engine
 * then settles both legs of a swap in a single call instead of running
 * compensating transfers on failure.
 */
export interface TransactionalLedger extends Ledger {
	/**
	 * Apply every transfer, in order, or none of them.
	 */
	transferAll(transfers: Transfer[]): Promise<void>;
}

export function isTransactionalLedger(
	ledger: Ledger,
): ledger is TransactionalLedger {
	return "transferAll" in ledger && typeof ledger.transferAll === "function";
}

/**
 * Callback invoked after a transfer has been applied, before the transfer
 * call returns. Throwing rejects and reverts the transfer.
 */
export type TransferHook = (transfer: Transfer) => void | Promise<void>;

export type LedgerErrorCode =
	| "INVALID_AMOUNT"
	| "INSUFFICIENT_FUNDS"
	| "HOOK_REJECTED"
	| "BACKEND_FAILURE";

/**
 * Error thrown by ledger operations.
 */
export class LedgerError extends Error {
	constructor(
		message: string,
		public readonly code: LedgerErrorCode,
		public readonly details?: unknown,
		cause?: unknown,
	) {
		super(message, cause === undefined ? undefined : { cause });
		this.name = "LedgerError";
	}
}
