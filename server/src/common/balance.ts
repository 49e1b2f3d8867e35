import { ValueTransformer } from "typeorm";
import type { Balance } from "@escrow-swap/sdk";

/**
 * Balances are stored as decimal text: SQLite integers stop at 2^63 and
 * the ledger has no upper bound.
 */
export const balanceTransformer: ValueTransformer = {
	to: (value: Balance | undefined): string | undefined => value?.toString(),
	from: (value: string | null): Balance | null =>
		value === null ? null : BigInt(value),
};

/**
 * Parse a decimal string that has already passed `@IsNumberString`.
 */
export function parseBalance(value: string): Balance {
	return BigInt(value);
}

export function formatBalance(value: Balance): string {
	return value.toString();
}
