import { CallQueue } from "./call-queue";

describe("CallQueue", () => {
	it("should run tasks in submission order without overlap", async () => {
		const queue = new CallQueue();
		const log: string[] = [];
		const task = (name: string, delayMs: number) => async () => {
			log.push(`${name}:start`);
			await new Promise((resolve) => setTimeout(resolve, delayMs));
			log.push(`${name}:end`);
			return name;
		};

		const results = await Promise.all([
			queue.run(task("a", 20)),
			queue.run(task("b", 0)),
		]);

		expect(results).toEqual(["a", "b"]);
		expect(log).toEqual(["a:start", "a:end", "b:start", "b:end"]);
	});

	it("should keep going after a task rejects", async () => {
		const queue = new CallQueue();

		const failed = queue.run(async () => {
			throw new Error("boom");
		});
		const next = queue.run(async () => "ok");

		await expect(failed).rejects.toThrow("boom");
		await expect(next).resolves.toBe("ok");
	});

	it("should count pending tasks", async () => {
		const queue = new CallQueue();
		let release: () => void = () => undefined;
		const blocked = queue.run(
			() =>
				new Promise<void>((resolve) => {
					release = resolve;
				}),
		);
		const after = queue.run(async () => undefined);

		expect(queue.size()).toBe(2);
		await new Promise((resolve) => setImmediate(resolve));
		release();
		await Promise.all([blocked, after]);
		expect(queue.size()).toBe(0);
	});
});
