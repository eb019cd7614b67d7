import { File } from 'node:buffer'
import { ORPCError } from '@orpc/server'
import { z } from 'zod'
import { CHANNEL_IDS } from '~/lib/channels/profiles'
import { watchJob } from '~/lib/job/events'
import type { Job } from '~/lib/job/types'
import { toJobStatusView } from '~/lib/job/view'
import { logger } from '~/lib/logger'
import { isValidYouTubeUrl } from '~/lib/youtube/utils'
import { os } from '~/orpc/base'

const SubmitJobInputSchema = z.object({
	channel: z.enum(CHANNEL_IDS),
	url: z
		.string()
		.trim()
		.url()
		.refine(isValidYouTubeUrl, { message: 'Not a YouTube video URL' }),
})

const JobIdInputSchema = z.object({ jobId: z.string().trim().min(1) })

function requireJob(job: Job | null, jobId: string): Job {
	if (!job) {
		throw new ORPCError('NOT_FOUND', {
			status: 404,
			message: `Job ${jobId} not found`,
		})
	}
	return job
}

function requireResult(job: Job) {
	if (job.status !== 'done' || !job.result) {
		throw new ORPCError('CONFLICT', {
			status: 409,
			message: `Job ${job.id} is not done (status: ${job.status})`,
			data: { status: job.status },
		})
	}
	return job.result
}

function artifactName(job: Job, suffix: string) {
	return `${job.safeTitle || job.id}${suffix}`
}

export const submit = os
	.route({ method: 'POST', path: '/jobs' })
	.input(SubmitJobInputSchema)
	.handler(async ({ input, context }) => {
		const job = context.pipeline.submit(input)
		return { job_id: job.id }
	})

export const list = os
	.route({ method: 'GET', path: '/jobs' })
	.handler(async ({ context }) => {
		return { jobs: context.pipeline.store.list().map(toJobStatusView) }
	})

export const status = os
	.route({ method: 'GET', path: '/jobs/{jobId}' })
	.input(JobIdInputSchema)
	.handler(async ({ input, context }) => {
		const job = requireJob(context.pipeline.store.get(input.jobId), input.jobId)
		return toJobStatusView(job)
	})

export const subtitle = os
	.route({ method: 'GET', path: '/jobs/{jobId}/subtitle' })
	.input(JobIdInputSchema)
	.handler(async ({ input, context }) => {
		const job = requireJob(context.pipeline.store.get(input.jobId), input.jobId)
		const result = requireResult(job)
		logger.debug('api', `[job.subtitle] job=${job.id} chars=${result.subtitle.length}`)
		return new File([result.subtitle], artifactName(job, '.srt'), {
			type: 'application/x-subrip',
		})
	})

export const description = os
	.route({ method: 'GET', path: '/jobs/{jobId}/description' })
	.input(JobIdInputSchema)
	.handler(async ({ input, context }) => {
		const job = requireJob(context.pipeline.store.get(input.jobId), input.jobId)
		const result = requireResult(job)
		logger.debug('api', `[job.description] job=${job.id} chars=${result.description.length}`)
		return new File([result.description], artifactName(job, '_description.txt'), {
			type: 'text/plain',
		})
	})

async function* statusEvents(jobs: AsyncIterable<Job>) {
	for await (const job of jobs) {
		yield toJobStatusView(job)
	}
}

/**
 * Server-sent events: the current status, then every change until the job
 * finishes.
 */
export const events = os
	.route({ method: 'GET', path: '/jobs/{jobId}/events' })
	.input(JobIdInputSchema)
	.handler(async ({ input, context, signal }) => {
		const { store } = context.pipeline
		requireJob(store.get(input.jobId), input.jobId)
		return statusEvents(watchJob(store, input.jobId, signal))
	})
