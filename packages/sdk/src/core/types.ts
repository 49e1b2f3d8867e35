/**
 * Core types for the escrow swap SDK
 *
 * Accounts, balances and the swap record shared by every layer.
 */

/**
 * Ledger account identifier.
 */
export type AccountId = string;

/**
 * Amount of the single asset type a swap exchanges, in its smallest unit.
 */
export type Balance = bigint;

/**
 * Numeric swap identifier, an unsigned 32-bit integer.
 */
export type SwapId = number;

/**
 * Largest value a swap id can hold. The registry never hands it out:
 * reaching it means the id space is exhausted.
 */
export const MAX_SWAP_ID: SwapId = 0xffff_ffff;

/**
 * A proposed exchange between two parties.
 *
 * Only swaps in the `Initiated` state are stored. Accepting or canceling a
 * swap deletes its record.
 */
export interface Swap {
	/** Account that created the swap and escrowed `initiatorAsset` */
	initiator: AccountId;
	/** The only account allowed to accept the swap */
	counterparty: AccountId;
	/** Amount the initiator deposited when creating the swap */
	initiatorAsset: Balance;
	/** Amount the counterparty must attach to accept */
	counterpartyAsset: Balance;
}

/**
 * Identity and attached value of an incoming call.
 */
export interface CallContext {
	/** The calling account */
	caller: AccountId;
	/** Value attached to the call. Zero for calls that carry no deposit. */
	value: Balance;
}

export function isValidSwapId(swapId: number): swapId is SwapId {
	return Number.isInteger(swapId) && swapId >= 0 && swapId <= MAX_SWAP_ID;
}

export function isValidAccountId(accountId: unknown): accountId is AccountId {
	return typeof accountId === "string" && accountId.trim().length > 0;
}

/**
 * Copy a swap record so callers cannot mutate stored state.
 */
export function cloneSwap(swap: Swap): Swap {
	return {
		initiator: swap.initiator,
		counterparty: swap.counterparty,
		initiatorAsset: swap.initiatorAsset,
		counterpartyAsset: swap.counterpartyAsset,
	};
}
