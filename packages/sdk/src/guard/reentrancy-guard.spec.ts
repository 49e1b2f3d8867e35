import { ReentrancyError, ReentrancyGuard } from "./reentrancy-guard.js";

describe("ReentrancyGuard", () => {
	let guard: ReentrancyGuard;

	beforeEach(() => {
		guard = new ReentrancyGuard();
	});

	it("should start released", () => {
		expect(guard.isActive()).toBe(false);
	});

	it("should reject a second acquire until released", () => {
		guard.acquire();
		expect(() => guard.acquire()).toThrow(ReentrancyError);
		expect(guard.isActive()).toBe(true);

		guard.release();
		expect(() => guard.acquire()).not.toThrow();
	});

	it("should hold the guard while the operation runs", async () => {
		const result = await guard.run(async () => {
			expect(guard.isActive()).toBe(true);
			return 42;
		});

		expect(result).toBe(42);
		expect(guard.isActive()).toBe(false);
	});

	it("should release the guard when the operation throws", async () => {
		await expect(
			guard.run(async () => {
				throw new Error("boom");
			}),
		).rejects.toThrow("boom");
		expect(guard.isActive()).toBe(false);
	});

	it("should reject a nested run without disturbing the outer one", async () => {
		let inner: unknown;
		await guard.run(async () => {
			inner = await guard.run(async () => "unreachable").catch((err) => err);
			expect(guard.isActive()).toBe(true);
		});

		expect(inner).toBeInstanceOf(ReentrancyError);
		expect(guard.isActive()).toBe(false);
	});
});
