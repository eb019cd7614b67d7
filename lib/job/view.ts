import type { Job, JobStatus } from './types'

/** Wire shape of a job, as returned by the status, list and events routes. */
export interface JobStatusView {
	job_id: string
	channel: string
	url: string
	status: JobStatus
	message: string
	progress: number
	title: string | null
	error?: string
	created_at: string
	updated_at: string
}

export function toJobStatusView(job: Job): JobStatusView {
	return {
		job_id: job.id,
		channel: job.channel,
		url: job.url,
		status: job.status,
		message: job.message,
		progress: job.progress,
		title: job.title,
		...(job.error ? { error: job.error } : {}),
		created_at: job.createdAt.toISOString(),
		updated_at: job.updatedAt.toISOString(),
	}
}
