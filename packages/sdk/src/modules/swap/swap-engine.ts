/**
 * Swap Lifecycle Engine
 *
 * Two-party escrow for swapping deposits of one asset type. The initiator
 * escrows a deposit and names a counterparty; the counterparty accepts by
 * attaching the requested amount, or the initiator cancels and is refunded.
 *
 * Lifecycle: idle -> initiated -> accepted | canceled. Only `initiated`
 * swaps have a registry record; resolving a swap deletes it.
 */

import {
	AccountId,
	Balance,
	CallContext,
	Swap,
	SwapId,
	isValidSwapId,
} from "../../core/types.js";
import {
	EventSink,
	SWAP_ACCEPTED,
	SWAP_CANCELLED,
	SWAP_INITIATED,
	SwapEvent,
} from "../../events/types.js";
import { ReentrancyError, ReentrancyGuard } from "../../guard/index.js";
import {
	Ledger,
	LedgerError,
	Transfer,
	isTransactionalLedger,
} from "../../ledger/types.js";
import {
	RegistryError,
	SwapRegistry,
	isSettlingRegistry,
} from "../../storage/types.js";
import { SwapEngineConfig, SwapError, SwapErrorCode } from "./types.js";

/**
 * Swap lifecycle engine.
 *
 * Every mutating call runs under the reentrancy guard: a ledger transfer
 * that calls back into `initiateSwap`, `acceptSwap` or `cancelSwap` is
 * rejected with `AlreadyActive`. Events are emitted after the guard has been
 * released; a sink that throws is reported to `onEventError` and does not
 * fail the call.
 *
 * @example
 * ```typescript
 * const engine = new SwapEngine({
 *   registry: new MemorySwapRegistry(),
 *   ledger,
 *   escrowAccount: "escrow",
 * });
 *
 * // alice escrows 100 and asks bob for 50
 * const swapId = await engine.initiateSwap(
 *   { caller: "alice", value: 100n },
 *   "bob",
 *   50n,
 * );
 *
 * // bob attaches 50: alice receives 50, bob receives 100
 * await engine.acceptSwap({ caller: "bob", value: 50n }, swapId);
 * ```
 */
export class SwapEngine {
	private readonly registry: SwapRegistry;
	private readonly ledger: Ledger;
	private readonly escrowAccount: AccountId;
	private readonly events?: EventSink;
	private readonly onEventError?: SwapEngineConfig["onEventError"];
	private readonly guard = new ReentrancyGuard();

	constructor(config: SwapEngineConfig) {
		if (config.escrowAccount.trim().length === 0) {
			throw new Error("escrowAccount must be a non-empty account id");
		}
		this.registry = config.registry;
		this.ledger = config.ledger;
		this.escrowAccount = config.escrowAccount;
		this.events = config.events;
		this.onEventError = config.onEventError;
	}

	/**
	 * Create a swap, escrowing the caller's attached value.
	 *
	 * @param call - Caller is the initiator, `value` is the initiator deposit
	 * @param counterparty - The only account allowed to accept
	 * @param counterpartyAsset - Amount the counterparty must attach to accept
	 * @returns The new swap id
	 * @throws SwapError `InvalidAmount`, `SelfSwapNotAllowed`, `Unauthorized`
	 * (escrow account as a party), `DepositFailed`, `AlreadyActive`, or the
	 * fatal `SwapIdOverflow`
	 */
	async initiateSwap(
		call: CallContext,
		counterparty: AccountId,
		counterpartyAsset: Balance,
	): Promise<SwapId> {
		const { swapId, swap } = await this.guarded(async () => {
			if (call.value <= 0n) {
				throw new SwapError(
					"Initiator deposit must be greater than zero",
					"InvalidAmount",
					{ initiatorAsset: call.value },
				);
			}
			if (counterpartyAsset <= 0n) {
				throw new SwapError(
					"Counterparty amount must be greater than zero",
					"InvalidAmount",
					{ counterpartyAsset },
				);
			}
			if (counterparty === call.caller) {
				throw new SwapError(
					"Initiator and counterparty must be different accounts",
					"SelfSwapNotAllowed",
					{ account: call.caller },
				);
			}
			if (
				call.caller === this.escrowAccount ||
				counterparty === this.escrowAccount
			) {
				throw new SwapError(
					"The escrow account cannot be a party to a swap",
					"Unauthorized",
					{ account: this.escrowAccount },
				);
			}

			const deposit: Transfer = {
				from: call.caller,
				to: this.escrowAccount,
				amount: call.value,
			};
			const depositFailed = (err: unknown) =>
				new SwapError(
					`Could not escrow deposit of ${call.value} from ${call.caller}`,
					"DepositFailed",
					{ deposit },
					err,
				);
			const swap: Swap = {
				initiator: call.caller,
				counterparty,
				initiatorAsset: call.value,
				counterpartyAsset,
			};

			if (isSettlingRegistry(this.registry)) {
				try {
					const swapId = await this.registry.insertWithTransfers(swap, [
						deposit,
					]);
					return { swapId, swap };
				} catch (err) {
					if (err instanceof LedgerError) throw depositFailed(err);
					throw toRegistryFailure(err);
				}
			}

			try {
				await this.ledger.transfer(deposit.from, deposit.to, deposit.amount);
			} catch (err) {
				throw depositFailed(err);
			}
			try {
				return { swapId: await this.registry.insert(swap), swap };
			} catch (err) {
				await this.reverse([deposit], err);
				throw toRegistryFailure(err);
			}
		});

		this.emit({
			type: SWAP_INITIATED,
			swapId,
			initiator: swap.initiator,
			counterparty: swap.counterparty,
			initiatorAsset: swap.initiatorAsset,
			counterpartyAsset: swap.counterpartyAsset,
		});
		return swapId;
	}

	/**
	 * Complete a swap. The counterparty's attached value goes to the
	 * initiator and the escrowed deposit goes to the counterparty, as one
	 * unit: if either leg fails neither is kept and the swap stays open.
	 *
	 * @throws SwapError `SwapNotFound`, `Unauthorized`, `InvalidAmount`,
	 * `TransferFailed`, `AlreadyActive`, or the fatal `RollbackFailed`
	 */
	async acceptSwap(call: CallContext, swapId: SwapId): Promise<void> {
		const swap = await this.guarded(async () => {
			const swap = await this.requireSwap(swapId);
			if (call.caller !== swap.counterparty) {
				throw new SwapError(
					`Only the counterparty can accept swap ${swapId}`,
					"Unauthorized",
					{ swapId, caller: call.caller },
				);
			}
			if (call.value !== swap.counterpartyAsset) {
				throw new SwapError(
					`Swap ${swapId} requires exactly ${swap.counterpartyAsset}, got ${call.value}`,
					"InvalidAmount",
					{ swapId, expected: swap.counterpartyAsset, received: call.value },
				);
			}

			const legs: Transfer[] = [
				{
					from: swap.counterparty,
					to: swap.initiator,
					amount: swap.counterpartyAsset,
				},
				{
					from: this.escrowAccount,
					to: swap.counterparty,
					amount: swap.initiatorAsset,
				},
			];
			await this.resolve(swapId, legs, "TransferFailed");
			return swap;
		});

		this.emit({
			type: SWAP_ACCEPTED,
			swapId,
			initiator: swap.initiator,
			counterparty: swap.counterparty,
		});
	}

	/**
	 * Cancel an open swap and refund the initiator's deposit.
	 *
	 * A swap that was already accepted no longer exists, so canceling it
	 * fails with `SwapNotFound`.
	 *
	 * @throws SwapError `SwapNotFound`, `Unauthorized`, `RefundFailed`,
	 * `AlreadyActive`, or the fatal `RollbackFailed`
	 */
	async cancelSwap(
		call: Pick<CallContext, "caller">,
		swapId: SwapId,
	): Promise<void> {
		const swap = await this.guarded(async () => {
			const swap = await this.requireSwap(swapId);
			if (call.caller !== swap.initiator) {
				throw new SwapError(
					`Only the initiator can cancel swap ${swapId}`,
					"Unauthorized",
					{ swapId, caller: call.caller },
				);
			}

			const refund: Transfer[] = [
				{
					from: this.escrowAccount,
					to: swap.initiator,
					amount: swap.initiatorAsset,
				},
			];
			await this.resolve(swapId, refund, "RefundFailed");
			return swap;
		});

		this.emit({ type: SWAP_CANCELLED, swapId, initiator: swap.initiator });
	}

	/**
	 * Read-only lookup of an open swap.
	 *
	 * @returns The swap, or null if it never existed, was resolved, or the id
	 * is not a valid swap id
	 */
	async getSwap(swapId: SwapId): Promise<Swap | null> {
		if (!isValidSwapId(swapId)) return null;
		return this.registry.get(swapId);
	}

	/**
	 * Whether a mutating call is currently in flight.
	 */
	isGuardActive(): boolean {
		return this.guard.isActive();
	}

	getEscrowAccount(): AccountId {
		return this.escrowAccount;
	}

	private async guarded<T>(operation: () => Promise<T>): Promise<T> {
		try {
			return await this.guard.run(operation);
		} catch (err) {
			if (err instanceof ReentrancyError) {
				throw new SwapError(
					"Reentrant call rejected: another swap operation is in flight",
					"AlreadyActive",
					undefined,
					err,
				);
			}
			throw err;
		}
	}

	private async requireSwap(swapId: SwapId): Promise<Swap> {
		const swap = isValidSwapId(swapId)
			? await this.registry.get(swapId)
			: null;
		if (!swap) {
			throw new SwapError(`Swap ${swapId} not found`, "SwapNotFound", {
				swapId,
			});
		}
		return swap;
	}

	/**
	 * Pay out `legs` and delete the swap. A settling registry does both in
	 * one unit of work; otherwise the legs are settled first and reversed if
	 * the delete fails.
	 */
	private async resolve(
		swapId: SwapId,
		legs: Transfer[],
		code: Extract<SwapErrorCode, "TransferFailed" | "RefundFailed">,
	): Promise<void> {
		if (isSettlingRegistry(this.registry)) {
			try {
				await this.registry.removeWithTransfers(swapId, legs);
			} catch (err) {
				if (err instanceof LedgerError) {
					throw new SwapError(
						`Settlement of swap ${swapId} failed`,
						code,
						{ swapId, legs },
						err,
					);
				}
				throw toRegistryFailure(err);
			}
			return;
		}

		await this.settle(swapId, legs, code);
		await this.removeOrReverse(swapId, legs);
	}

	/**
	 * Apply `legs` as one unit. Transactional ledgers get a single
	 * `transferAll`; otherwise completed legs are reversed when a later one
	 * fails.
	 */
	private async settle(
		swapId: SwapId,
		legs: Transfer[],
		code: Extract<SwapErrorCode, "TransferFailed" | "RefundFailed">,
	): Promise<void> {
		if (isTransactionalLedger(this.ledger)) {
			try {
				await this.ledger.transferAll(legs);
			} catch (err) {
				throw new SwapError(
					`Settlement of swap ${swapId} failed`,
					code,
					{ swapId, legs },
					err,
				);
			}
			return;
		}

		const completed: Transfer[] = [];
		for (const leg of legs) {
			try {
				await this.ledger.transfer(leg.from, leg.to, leg.amount);
			} catch (err) {
				await this.reverse(completed, err);
				throw new SwapError(
					`Settlement of swap ${swapId} failed on ${leg.from} -> ${leg.to}`,
					code,
					{ swapId, failedLeg: leg, reverted: completed },
					err,
				);
			}
			completed.push(leg);
		}
	}

	private async removeOrReverse(
		swapId: SwapId,
		settled: Transfer[],
	): Promise<void> {
		try {
			await this.registry.remove(swapId);
		} catch (err) {
			await this.reverse(settled, err);
			throw err;
		}
	}

	/**
	 * Undo already-applied transfers, newest first.
	 *
	 * @throws SwapError `RollbackFailed` if a compensating transfer is rejected
	 */
	private async reverse(applied: Transfer[], reason: unknown): Promise<void> {
		const compensations = applied
			.slice()
			.reverse()
			.map((t) => ({ from: t.to, to: t.from, amount: t.amount }));
		if (compensations.length === 0) return;

		let done = 0;
		try {
			if (isTransactionalLedger(this.ledger)) {
				await this.ledger.transferAll(compensations);
			} else {
				for (const c of compensations) {
					await this.ledger.transfer(c.from, c.to, c.amount);
					done++;
				}
			}
		} catch (err) {
			throw new SwapError(
				"Compensating transfer rejected",
				"RollbackFailed",
				{ reason, pending: compensations.slice(done) },
				err,
			);
		}
	}

	private emit(event: SwapEvent): void {
		if (!this.events) return;
		try {
			this.events.emit(event);
		} catch (err) {
			this.onEventError?.(err, event);
		}
	}
}

function toRegistryFailure(err: unknown): unknown {
	if (err instanceof RegistryError && err.code === "SWAP_ID_OVERFLOW") {
		return new SwapError(
			"Swap id space exhausted",
			"SwapIdOverflow",
			err.details,
			err,
		);
	}
	if (err instanceof RegistryError && err.code === "SWAP_NOT_FOUND") {
		return new SwapError(err.message, "SwapNotFound", err.details, err);
	}
	return err;
}
