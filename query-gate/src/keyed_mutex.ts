/**
 * Per-key mutual exclusion for async work
 *
 * Tasks for the same key run one after another in arrival order; tasks for
 * different keys never wait on each other. Idle keys are dropped.
 */
export class KeyedMutex {
	private readonly tails = new Map<string, Promise<void>>()

	async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
		const previous = this.tails.get(key) ?? Promise.resolve()
		let release: () => void = () => {}
		const done = new Promise<void>((resolve) => {
			release = resolve
		})
		const tail = previous.then(() => done)
		this.tails.set(key, tail)

		await previous
		try {
			return await task()
		} finally {
			release()
			if (this.tails.get(key) === tail) this.tails.delete(key)
		}
	}

	/** Keys with work running or queued */
	get size(): number {
		return this.tails.size
	}
}
