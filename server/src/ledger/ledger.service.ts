import { Inject, Injectable, Logger } from "@nestjs/common";
import { InjectRepository } from "@nestjs/typeorm";
import { DataSource, EntityManager, Repository } from "typeorm";
import {
	type AccountId,
	type Balance,
	LedgerError,
	type TransactionalLedger,
	type Transfer,
} from "@escrow-swap/sdk";
import { Account } from "./account.entity";
import { CallQueue } from "../common/call-queue";
import { errorStack } from "../common/errors";
import { DB_QUEUE } from "../db/db.constants";

/**
 * Ledger backed by the `accounts` table.
 *
 * Every write runs in its own database transaction; `transferAll` applies a
 * whole batch or nothing. Reads wait for queued transactions, so a balance
 * is never observed half-way through a batch.
 */
@Injectable()
export class LedgerService implements TransactionalLedger {
	private readonly logger = new Logger(LedgerService.name);

	constructor(
		@InjectRepository(Account)
		private readonly accountRepository: Repository<Account>,
		private readonly dataSource: DataSource,
		@Inject(DB_QUEUE) private readonly dbQueue: CallQueue,
	) {}

	async balanceOf(account: AccountId): Promise<Balance> {
		return this.dbQueue.run(() =>
			this.wrap(() => loadBalance(this.accountRepository, account)),
		);
	}

	async transfer(from: AccountId, to: AccountId, amount: Balance): Promise<void> {
		await this.transferAll([{ from, to, amount }]);
	}

	async transferAll(transfers: Transfer[]): Promise<void> {
		transfers.forEach((t) => assertAmount(t.amount));
		await this.write((manager) => this.applyTransfers(manager, transfers));
	}

	/**
	 * Apply transfers inside a transaction the caller already holds, so they
	 * commit or roll back together with the caller's other writes.
	 */
	async applyTransfers(
		manager: EntityManager,
		transfers: Transfer[],
	): Promise<void> {
		const accounts = manager.getRepository(Account);
		for (const t of transfers) {
			assertAmount(t.amount);
			await applyTransfer(accounts, t);
		}
	}

	/**
	 * Mint funds into an account. Backs the dev/test faucet.
	 */
	async credit(account: AccountId, amount: Balance): Promise<Balance> {
		assertAmount(amount);
		const balance = await this.write(async (manager) => {
			const accounts = manager.getRepository(Account);
			const next = (await loadBalance(accounts, account)) + amount;
			await accounts.save({ id: account, balance: next });
			return next;
		});
		this.logger.log(`credited ${amount} to ${account}, balance ${balance}`);
		return balance;
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
			if (err instanceof LedgerError) throw err;
			this.logger.error("Ledger backend failure", errorStack(err));
			throw new LedgerError(
				"Ledger backend failure",
				"BACKEND_FAILURE",
				undefined,
				err,
			);
		}
	}
}

function assertAmount(amount: Balance) {
	if (amount < 0n) {
		throw new LedgerError(
			`Amount must not be negative, got ${amount}`,
			"INVALID_AMOUNT",
			{ amount },
		);
	}
}

async function loadBalance(
	accounts: Repository<Account>,
	account: AccountId,
): Promise<Balance> {
	const row = await accounts.findOneBy({ id: account });
	return row?.balance ?? 0n;
}

async function applyTransfer(
	accounts: Repository<Account>,
	{ from, to, amount }: Transfer,
): Promise<void> {
	const fromBalance = await loadBalance(accounts, from);
	if (fromBalance < amount) {
		throw new LedgerError(
			`Insufficient funds in ${from}: ${fromBalance} < ${amount}`,
			"INSUFFICIENT_FUNDS",
			{ from, to, amount, available: fromBalance },
		);
	}
	if (from === to || amount === 0n) return;

	await accounts.save({ id: from, balance: fromBalance - amount });
	const toBalance = await loadBalance(accounts, to);
	await accounts.save({ id: to, balance: toBalance + amount });
}
