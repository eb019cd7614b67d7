import { EventEmitter } from 'node:events'
import { createId } from '@paralleldrive/cuid2'
import { STATUS_LABELS, canTransition, isTerminalStatus, type Job, type SubmitJobInput } from './types'

export type JobPatch = Partial<
	Pick<Job, 'status' | 'message' | 'progress' | 'title' | 'safeTitle' | 'result' | 'error'>
>

export type JobListener = (job: Job) => void

/**
 * Job table shared by the pipeline (the only writer) and the HTTP layer.
 * Readers always get copies; mutating one does not touch the table.
 */
export interface JobStore {
	create(input: SubmitJobInput): Job
	get(jobId: string): Job | null
	list(): Job[]
	update(jobId: string, patch: JobPatch): Job
	/** Drop terminal jobs last updated more than `maxAgeMs` ago. Returns the count. */
	prune(maxAgeMs: number, now?: Date): number
	subscribe(jobId: string, listener: JobListener): () => void
}

export class InvalidJobTransitionError extends Error {
	constructor(jobId: string, from: string, to: string) {
		super(`Invalid job state transition for ${jobId}: ${from} -> ${to}`)
		this.name = 'InvalidJobTransitionError'
	}
}

function snapshot(job: Job): Job {
	return {
		...job,
		createdAt: new Date(job.createdAt),
		updatedAt: new Date(job.updatedAt),
		result: job.result ? { ...job.result } : null,
	}
}

export class InMemoryJobStore implements JobStore {
	private readonly jobs = new Map<string, Job>()
	private readonly events = new EventEmitter()

	constructor(private readonly idFactory: () => string = createId) {
		// one listener per open event stream
		this.events.setMaxListeners(0)
	}

	create(input: SubmitJobInput): Job {
		const now = new Date()
		const job: Job = {
			id: this.idFactory(),
			channel: input.channel,
			url: input.url,
			status: 'queued',
			message: STATUS_LABELS.queued,
			progress: 0,
			title: null,
			safeTitle: null,
			createdAt: now,
			updatedAt: now,
			result: null,
			error: null,
		}
		this.jobs.set(job.id, job)
		return snapshot(job)
	}

	get(jobId: string): Job | null {
		const job = this.jobs.get(jobId)
		return job ? snapshot(job) : null
	}

	list(): Job[] {
		return Array.from(this.jobs.values())
			.sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
			.map(snapshot)
	}

	update(jobId: string, patch: JobPatch): Job {
		const existing = this.jobs.get(jobId)
		if (!existing) throw new Error(`Job ${jobId} not found`)

		const nextStatus = patch.status ?? existing.status
		if (!canTransition(existing.status, nextStatus)) {
			throw new InvalidJobTransitionError(jobId, existing.status, nextStatus)
		}
		if (patch.result && nextStatus !== 'done') {
			throw new Error(`Job ${jobId}: results can only be attached when the job is done`)
		}

		const updated: Job = {
			...existing,
			...patch,
			status: nextStatus,
			progress: Math.min(100, Math.max(existing.progress, patch.progress ?? existing.progress)),
			updatedAt: new Date(),
		}
		this.jobs.set(jobId, updated)
		this.events.emit(`job:${jobId}`, snapshot(updated))
		return snapshot(updated)
	}

	prune(maxAgeMs: number, now: Date = new Date()): number {
		let removed = 0
		for (const [id, job] of this.jobs) {
			if (!isTerminalStatus(job.status)) continue
			if (now.getTime() - job.updatedAt.getTime() > maxAgeMs) {
				this.jobs.delete(id)
				removed++
			}
		}
		return removed
	}

	subscribe(jobId: string, listener: JobListener): () => void {
		this.events.on(`job:${jobId}`, listener)
		return () => {
			this.events.off(`job:${jobId}`, listener)
		}
	}
}
