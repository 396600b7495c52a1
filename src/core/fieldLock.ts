// ─── Field Lock ──────────────────────────────────────────────────────────────

/**
 * FieldLock - runs async tasks one at a time, in submission order.
 *
 * A rejected task does not block the tasks queued behind it; its rejection
 * goes to its own caller only.
 */
export class FieldLock {
	private tail: Promise<void> = Promise.resolve();
	private pending = 0;

	run<T>(task: () => Promise<T>): Promise<T> {
		this.pending++;
		const result = this.tail.then(task);
		this.tail = result.then(
			() => { this.pending--; },
			() => { this.pending--; }
		);
		return result;
	}

	/**
	 * Number of tasks queued or running
	 */
	get size(): number {
		return this.pending;
	}
}
