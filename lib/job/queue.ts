import { errorMessage } from '~/lib/errors'
import { logger } from '~/lib/logger'

export type QueueTask = () => Promise<void>

/**
 * In-process task queue. `concurrency` of 0 (or Infinity) runs every task as
 * soon as it is enqueued.
 */
export class JobQueue {
	private readonly limit: number
	private readonly pending: QueueTask[] = []
	private running = 0
	private idleWaiters: Array<() => void> = []

	constructor(concurrency = 0) {
		const safeConcurrency = Math.floor(concurrency)
		if (concurrency !== Infinity && (!Number.isFinite(safeConcurrency) || safeConcurrency < 0)) {
			throw new Error(
				`Invalid concurrency: ${String(concurrency)} (expected integer >= 0)`,
			)
		}
		this.limit = safeConcurrency === 0 || concurrency === Infinity ? Infinity : safeConcurrency
	}

	get size(): number {
		return this.pending.length
	}

	get active(): number {
		return this.running
	}

	enqueue(task: QueueTask): void {
		this.pending.push(task)
		this.drain()
	}

	/** Resolves once nothing is running or waiting. */
	onIdle(): Promise<void> {
		if (this.running === 0 && this.pending.length === 0) return Promise.resolve()
		return new Promise((resolve) => {
			this.idleWaiters.push(resolve)
		})
	}

	private drain(): void {
		while (this.running < this.limit) {
			const task = this.pending.shift()
			if (!task) break
			this.running++
			void this.execute(task)
		}

		if (this.running === 0 && this.pending.length === 0) {
			const waiters = this.idleWaiters
			this.idleWaiters = []
			for (const resolve of waiters) resolve()
		}
	}

	private async execute(task: QueueTask): Promise<void> {
		try {
			await task()
		} catch (error) {
			logger.error('job', `[queue] task failed: ${errorMessage(error)}`, error)
		} finally {
			this.running--
			this.drain()
		}
	}
}
