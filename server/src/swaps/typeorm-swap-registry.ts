/**
 * TypeORM Swap Registry
 *
 * Implements the SDK's SettlingSwapRegistry interface on top of the `swaps`
 * and `swap_registry` tables, with ledger transfers applied through the
 * same transaction as the record change.
 */

import { DataSource, EntityManager } from "typeorm";
import {
	LedgerError,
	MAX_SWAP_ID,
	RegistryError,
	type SettlingSwapRegistry,
	type Swap,
	type SwapId,
	type Transfer,
	isValidSwapId,
} from "@escrow-swap/sdk";
import { CallQueue } from "../common/call-queue";
import type { LedgerService } from "../ledger/ledger.service";
import { SwapRecord } from "./swap-record.entity";
import {
	SWAP_REGISTRY_STATE_ID,
	SwapRegistryState,
} from "./swap-registry-state.entity";

export type TransferApplier = Pick<LedgerService, "applyTransfers">;

/**
 * TypeORM-based swap registry.
 *
 * `insert` stores the record and bumps the counter in one transaction, so a
 * failed insert never consumes an id. `insertWithTransfers` and
 * `removeWithTransfers` add the deposit or settlement legs to that
 * transaction: the balances and the record commit together or not at all.
 *
 * @example
 * ```typescript
 * const registry = new TypeOrmSwapRegistry(dataSource, queue, ledgerService);
 * const swapId = await registry.insertWithTransfers(
 *   { initiator: "alice", counterparty: "bob", initiatorAsset: 100n, counterpartyAsset: 50n },
 *   [{ from: "alice", to: "vault", amount: 100n }],
 * );
 * ```
 */
export class TypeOrmSwapRegistry implements SettlingSwapRegistry {
	constructor(
		private readonly dataSource: DataSource,
		private readonly dbQueue: CallQueue,
		private readonly ledger: TransferApplier,
	) {}

	async insert(swap: Swap): Promise<SwapId> {
		return this.write((manager) => insertRecord(manager, swap));
	}

	async insertWithTransfers(swap: Swap, transfers: Transfer[]): Promise<SwapId> {
		return this.write(async (manager) => {
			await this.ledger.applyTransfers(manager, transfers);
			return insertRecord(manager, swap);
		});
	}

	async get(swapId: SwapId): Promise<Swap | null> {
		if (!isValidSwapId(swapId)) return null;
		const row = await this.read((manager) =>
			manager.getRepository(SwapRecord).findOneBy({ id: swapId }),
		);
		return row ? toSwap(row) : null;
	}

	async remove(swapId: SwapId): Promise<void> {
		await this.write(async (manager) => {
			await manager.getRepository(SwapRecord).delete({ id: swapId });
		});
	}

	async removeWithTransfers(swapId: SwapId, transfers: Transfer[]): Promise<void> {
		await this.write(async (manager) => {
			const records = manager.getRepository(SwapRecord);
			const row = isValidSwapId(swapId)
				? await records.findOneBy({ id: swapId })
				: null;
			if (!row) {
				throw new RegistryError(`Swap ${swapId} not found`, "SWAP_NOT_FOUND", {
					swapId,
				});
			}
			await this.ledger.applyTransfers(manager, transfers);
			await records.delete({ id: swapId });
		});
	}

	async peekNextId(): Promise<SwapId> {
		return this.read(readNextId);
	}

	private read<T>(work: (manager: EntityManager) => Promise<T>): Promise<T> {
		return this.dbQueue.run(() => this.wrap(() => work(this.dataSource.manager)));
	}

	private write<T>(work: (manager: EntityManager) => Promise<T>): Promise<T> {
		return this.dbQueue.run(() =>
			this.wrap(() => this.dataSource.transaction(work)),
		);
	}

	private async wrap<T>(work: () => Promise<T>): Promise<T> {
		try {
			return await work();
		} catch (err) {
			if (err instanceof RegistryError || err instanceof LedgerError) throw err;
			throw new RegistryError(
				"Swap registry backend failure",
				"BACKEND_FAILURE",
				undefined,
				err,
			);
		}
	}
}

async function insertRecord(manager: EntityManager, swap: Swap): Promise<SwapId> {
	const swapId = await readNextId(manager);
	if (swapId >= MAX_SWAP_ID) {
		throw new RegistryError("Swap id space exhausted", "SWAP_ID_OVERFLOW", {
			nextId: swapId,
		});
	}
	await manager.getRepository(SwapRecord).insert({
		id: swapId,
		initiator: swap.initiator,
		counterparty: swap.counterparty,
		initiatorAsset: swap.initiatorAsset,
		counterpartyAsset: swap.counterpartyAsset,
	});
	await manager.getRepository(SwapRegistryState).save({
		id: SWAP_REGISTRY_STATE_ID,
		nextId: swapId + 1,
	});
	return swapId;
}

async function readNextId(manager: EntityManager): Promise<SwapId> {
	const state = await manager
		.getRepository(SwapRegistryState)
		.findOneBy({ id: SWAP_REGISTRY_STATE_ID });
	return state?.nextId ?? 0;
}

function toSwap(row: SwapRecord): Swap {
	return {
		initiator: row.initiator,
		counterparty: row.counterparty,
		initiatorAsset: row.initiatorAsset,
		counterpartyAsset: row.counterpartyAsset,
	};
}
