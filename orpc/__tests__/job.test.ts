import fs from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import { OpenAPIHandler } from '@orpc/openapi/fetch'
import { createRouterClient, isProcedure } from '@orpc/server'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { JobPipeline } from '~/lib/job/pipeline'
import { JobQueue } from '~/lib/job/queue'
import { InMemoryJobStore } from '~/lib/job/store'
import {
	FAKE_DESCRIPTION,
	FAKE_SUBTITLE,
	FAKE_TITLE,
	Gate,
	createFakeStages,
	type StageHolds,
} from '~/lib/job/__tests__/fakes'
import { appRouter } from '~/orpc/router'

const VIDEO_URL = 'https://www.youtube.com/watch?v=abcDEF12345'
const handler = new OpenAPIHandler(appRouter)

function createTestPipeline(dir: string, opts: { holds?: StageHolds; concurrency?: number } = {}) {
	let n = 0
	const store = new InMemoryJobStore(() => `job-${++n}`)
	const stages = createFakeStages(dir, opts.holds)
	const pipeline = new JobPipeline({
		store,
		queue: new JobQueue(opts.concurrency ?? 0),
		...stages,
	})
	return { store, stages, pipeline }
}

async function call(pipeline: JobPipeline, method: string, route: string, body?: unknown) {
	const request = new Request(`http://localhost/api${route}`, {
		method,
		headers: body === undefined ? undefined : { 'content-type': 'application/json' },
		body: body === undefined ? undefined : JSON.stringify(body),
	})
	const { matched, response } = await handler.handle(request, {
		prefix: '/api',
		context: { pipeline },
	})
	if (!matched || !response) throw new Error(`no route for ${method} ${route}`)
	return response
}

describe('job routes', () => {
	let dir: string

	beforeEach(async () => {
		dir = await fs.mkdtemp(path.join(os.tmpdir(), 'job-routes-'))
	})

	afterEach(async () => {
		await fs.rm(dir, { recursive: true, force: true })
	})

	it('runs a submitted job to completion and serves both artifacts verbatim', async () => {
		const { pipeline } = createTestPipeline(dir)

		const submitted = await call(pipeline, 'POST', '/jobs', {
			channel: 'trakin-tech',
			url: VIDEO_URL,
		})
		expect(submitted.status).toBe(200)
		expect(await submitted.json()).toEqual({ job_id: 'job-1' })

		await pipeline.onIdle()

		const status = await call(pipeline, 'GET', '/jobs/job-1')
		expect(status.status).toBe(200)
		const view = await status.json()
		expect(view).toMatchObject({
			job_id: 'job-1',
			channel: 'trakin-tech',
			url: VIDEO_URL,
			status: 'done',
			message: 'Completed',
			progress: 100,
			title: FAKE_TITLE,
		})
		expect(view).not.toHaveProperty('error')

		const subtitle = await call(pipeline, 'GET', '/jobs/job-1/subtitle')
		expect(subtitle.status).toBe(200)
		expect(subtitle.headers.get('content-type')).toContain('application/x-subrip')
		expect(await subtitle.text()).toBe(FAKE_SUBTITLE)

		const description = await call(pipeline, 'GET', '/jobs/job-1/description')
		expect(description.status).toBe(200)
		expect(await description.text()).toBe(FAKE_DESCRIPTION)
	})

	it('rejects unknown channels without creating a job', async () => {
		const { pipeline, store, stages } = createTestPipeline(dir)

		const response = await call(pipeline, 'POST', '/jobs', {
			channel: 'trakin-tech-english',
			url: VIDEO_URL,
		})

		expect(response.status).toBe(400)
		expect(store.list()).toEqual([])
		expect(stages.downloader.download).not.toHaveBeenCalled()
	})

	it('rejects urls that are not YouTube videos', async () => {
		const { pipeline, store } = createTestPipeline(dir)

		const response = await call(pipeline, 'POST', '/jobs', {
			channel: 'trakin-tech',
			url: 'https://vimeo.com/123456',
		})

		expect(response.status).toBe(400)
		expect(store.list()).toEqual([])
	})

	it('answers 404 for unknown jobs', async () => {
		const { pipeline } = createTestPipeline(dir)

		for (const route of ['/jobs/nope', '/jobs/nope/subtitle', '/jobs/nope/description']) {
			const response = await call(pipeline, 'GET', route)
			expect(response.status).toBe(404)
			expect(await response.json()).toMatchObject({
				code: 'NOT_FOUND',
				message: 'Job nope not found',
			})
		}
	})

	it('answers 409 for artifacts in every state before done', async () => {
		const gates = { download: new Gate(), transcribe: new Gate(), generate: new Gate() }
		const { pipeline, store } = createTestPipeline(dir, {
			concurrency: 1,
			holds: {
				download: gates.download.promise,
				transcribe: gates.transcribe.promise,
				generate: gates.generate.promise,
			},
		})
		await call(pipeline, 'POST', '/jobs', { channel: 'trakin-tech', url: VIDEO_URL })
		await call(pipeline, 'POST', '/jobs', { channel: 'trakin-tech-tamil', url: VIDEO_URL })

		const expectConflict = async (jobId: string, status: string) => {
			for (const artifact of ['subtitle', 'description']) {
				const response = await call(pipeline, 'GET', `/jobs/${jobId}/${artifact}`)
				expect(response.status).toBe(409)
				expect(await response.json()).toMatchObject({
					code: 'CONFLICT',
					message: `Job ${jobId} is not done (status: ${status})`,
				})
			}
		}

		expect(store.get('job-2')?.status).toBe('queued')
		await expectConflict('job-2', 'queued')
		await expectConflict('job-1', 'downloading')

		gates.download.open()
		await vi.waitFor(() => expect(store.get('job-1')?.status).toBe('transcribing'))
		await expectConflict('job-1', 'transcribing')

		gates.transcribe.open()
		await vi.waitFor(() => expect(store.get('job-1')?.status).toBe('generating'))
		await expectConflict('job-1', 'generating')

		gates.generate.open()
		await pipeline.onIdle()
		const subtitle = await call(pipeline, 'GET', '/jobs/job-1/subtitle')
		expect(subtitle.status).toBe(200)
	})

	it('reports failures with the stage prefix', async () => {
		const { pipeline, stages } = createTestPipeline(dir)
		stages.downloader.download.mockRejectedValueOnce(new Error('Video unavailable'))

		await call(pipeline, 'POST', '/jobs', { channel: 'trakin-tech', url: VIDEO_URL })
		await pipeline.onIdle()

		const view = await (await call(pipeline, 'GET', '/jobs/job-1')).json()
		expect(view).toMatchObject({
			status: 'failed',
			message: 'Failed',
			error: 'Download error: Video unavailable',
		})
		expect((await call(pipeline, 'GET', '/jobs/job-1/subtitle')).status).toBe(409)
	})

	it('lists jobs newest first', async () => {
		const { pipeline } = createTestPipeline(dir)
		vi.useFakeTimers({ toFake: ['Date'] })
		try {
			vi.setSystemTime(new Date('2026-01-01T00:00:00Z'))
			await call(pipeline, 'POST', '/jobs', { channel: 'trakin-tech', url: VIDEO_URL })
			vi.setSystemTime(new Date('2026-01-01T00:01:00Z'))
			await call(pipeline, 'POST', '/jobs', { channel: 'trakin-tech-marathi', url: VIDEO_URL })
		} finally {
			vi.useRealTimers()
		}
		await pipeline.onIdle()

		const body = await (await call(pipeline, 'GET', '/jobs')).json()
		expect(body.jobs.map((j: { job_id: string }) => j.job_id)).toEqual(['job-2', 'job-1'])
	})
})

describe('router', () => {
	it('holds only procedures under job', () => {
		expect(Object.keys(appRouter.job).sort()).toEqual([
			'description',
			'events',
			'list',
			'status',
			'submit',
			'subtitle',
		])
		for (const procedure of Object.values(appRouter.job)) {
			expect(isProcedure(procedure)).toBe(true)
		}
	})
})

describe('misc routes', () => {
	it('lists the channels', async () => {
		const { pipeline } = createTestPipeline(os.tmpdir())
		const response = await call(pipeline, 'GET', '/channels')

		expect(await response.json()).toEqual({
			channels: [
				{ id: 'trakin-tech', name: 'Trakin Tech', language: 'hi' },
				{ id: 'trakin-tech-marathi', name: 'Trakin Tech Marathi', language: 'mr' },
				{ id: 'trakin-tech-tamil', name: 'Trakin Tech Tamil', language: 'ta' },
			],
		})
	})

	it('reports health', async () => {
		const { pipeline } = createTestPipeline(os.tmpdir())
		expect(await (await call(pipeline, 'GET', '/health')).json()).toEqual({ ok: true })
	})
})

describe('job events', () => {
	it('streams status views until the job is done', async () => {
		const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'job-events-'))
		try {
			const gate = new Gate()
			const { pipeline } = createTestPipeline(dir, { holds: { download: gate.promise } })
			const client = createRouterClient(appRouter, { context: { pipeline } })

			const { job_id } = await client.job.submit({ channel: 'trakin-tech-marathi', url: VIDEO_URL })
			const stream = await client.job.events({ jobId: job_id })

			const seen: Array<[string, number]> = []
			for await (const view of stream) {
				seen.push([view.status, view.progress])
				// subscribed once the first snapshot arrives
				if (seen.length === 1) gate.open()
			}

			expect(seen[0]).toEqual(['downloading', 10])
			expect(seen[seen.length - 1]).toEqual(['done', 100])
			expect(seen.map(([s]) => s)).toEqual([
				'downloading',
				'downloading',
				'downloading',
				'transcribing',
				'transcribing',
				'generating',
				'done',
			])
		} finally {
			await fs.rm(dir, { recursive: true, force: true })
		}
	})
})
