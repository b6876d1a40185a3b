/**
 * Append-only buffer of pending entries, drained whole at flush time.
 *
 * Both operations are synchronous and never yield, so a drain is atomic with
 * respect to every append: an entry lands either in the batch being drained
 * or in the next one.
 */
export class BatchBuffer<T> {
	private entries: T[] = [];

	append(entry: T): void {
		this.entries.push(entry);
	}

	/** Remove and return everything buffered, in append order. */
	drainAll(): T[] {
		const drained = this.entries;
		this.entries = [];
		return drained;
	}

	/** Current count. A hint for flush decisions, stale once the caller yields. */
	get length(): number {
		return this.entries.length;
	}
}
