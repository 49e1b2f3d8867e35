import { MemoryLedger } from "./memory-ledger.js";
import { LedgerError, Transfer, isTransactionalLedger } from "./types.js";

describe("MemoryLedger", () => {
	let ledger: MemoryLedger;

	beforeEach(() => {
		ledger = new MemoryLedger({ alice: 100n });
	});

	it("should move funds between accounts", async () => {
		await ledger.transfer("alice", "bob", 40n);

		expect(await ledger.balanceOf("alice")).toBe(60n);
		expect(await ledger.balanceOf("bob")).toBe(40n);
		expect(ledger.totalSupply()).toBe(100n);
	});

	it("should report zero for unknown accounts", async () => {
		expect(await ledger.balanceOf("nobody")).toBe(0n);
	});

	it("should reject overdrafts", async () => {
		await expect(ledger.transfer("alice", "bob", 101n)).rejects.toMatchObject({
			name: "LedgerError",
			code: "INSUFFICIENT_FUNDS",
		});
		expect(await ledger.balanceOf("alice")).toBe(100n);
	});

	it("should reject negative amounts", async () => {
		await expect(ledger.transfer("alice", "bob", -1n)).rejects.toMatchObject({
			code: "INVALID_AMOUNT",
		});
		expect(() => ledger.credit("bob", -5n)).toThrow(LedgerError);
	});

	it("should call hooks after applying the transfer", async () => {
		const seen: Array<Transfer & { balance: bigint }> = [];
		ledger.onTransfer(async (t) => {
			seen.push({ ...t, balance: await ledger.balanceOf(t.to) });
		});

		await ledger.transfer("alice", "bob", 10n);

		expect(seen).toEqual([
			{ from: "alice", to: "bob", amount: 10n, balance: 10n },
		]);
	});

	it("should revert the transfer when a hook throws", async () => {
		const hookError = new Error("not accepted");
		ledger.onTransfer(() => {
			throw hookError;
		});

		const err = await ledger.transfer("alice", "bob", 10n).catch((e) => e);

		expect(err).toBeInstanceOf(LedgerError);
		expect(err.code).toBe("HOOK_REJECTED");
		expect(err.cause).toBe(hookError);
		expect(await ledger.balanceOf("alice")).toBe(100n);
		expect(await ledger.balanceOf("bob")).toBe(0n);
	});

	it("should stop calling a hook once unsubscribed", async () => {
		const hook = jest.fn();
		const unsubscribe = ledger.onTransfer(hook);

		await ledger.transfer("alice", "bob", 1n);
		unsubscribe();
		await ledger.transfer("alice", "bob", 1n);

		expect(hook).toHaveBeenCalledTimes(1);
	});

	it("should not be a transactional ledger", () => {
		expect(isTransactionalLedger(ledger)).toBe(false);
	});
});
