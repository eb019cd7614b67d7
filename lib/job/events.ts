import type { JobStore } from './store'
import { isTerminalStatus, type Job } from './types'

/**
 * Yield the job's current snapshot, then every update, until the job reaches a
 * terminal status or `signal` aborts. Returns immediately for unknown ids.
 */
export async function* watchJob(
	store: JobStore,
	jobId: string,
	signal?: AbortSignal,
): AsyncGenerator<Job, void, unknown> {
	const buffered: Job[] = []
	let wake: (() => void) | null = null

	const unsubscribe = store.subscribe(jobId, (job) => {
		buffered.push(job)
		wake?.()
	})
	const onAbort = () => wake?.()
	signal?.addEventListener('abort', onAbort)

	try {
		const current = store.get(jobId)
		if (!current) return
		yield current
		if (isTerminalStatus(current.status)) return

		while (!signal?.aborted) {
			const next = buffered.shift()
			if (!next) {
				await new Promise<void>((resolve) => {
					wake = resolve
					if (signal?.aborted) resolve()
				})
				wake = null
				continue
			}
			yield next
			if (isTerminalStatus(next.status)) return
		}
	} finally {
		unsubscribe()
		signal?.removeEventListener('abort', onAbort)
	}
}
