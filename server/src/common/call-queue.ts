/**
 * Runs async tasks one after another, in submission order.
 *
 * The swap engine expects its host to serialize calls; only genuine
 * re-entry from inside a call should ever reach its reentrancy guard.
 */
export class CallQueue {
	private tail: Promise<void> = Promise.resolve();
	private pending = 0;

	run<T>(task: () => Promise<T>): Promise<T> {
		this.pending++;
		const result = this.tail.then(task).finally(() => {
			this.pending--;
		});
		// rejections reach the caller through `result`; the chain only tracks completion
		this.tail = result.then(
			() => undefined,
			() => undefined,
		);
		return result;
	}

	/**
	 * Number of tasks submitted and not yet settled.
	 */
	size(): number {
		return this.pending;
	}
}
