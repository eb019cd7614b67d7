import fs from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { GeminiDescriptionGenerator } from '~/lib/ai/description'
import { createGeminiModel } from '~/lib/ai/gemini'
import { WhisperTranscriber } from '~/lib/asr/whisper'
import { ConfigurationError, ContentUnavailableError, UpstreamApiError } from '~/lib/errors'
import { JobPipeline } from '../pipeline'
import { InMemoryJobStore } from '../store'
import type { Job } from '../types'
import {
	FAKE_DESCRIPTION,
	FAKE_SUBTITLE,
	FAKE_TITLE,
	createFakeStages,
	fileExists,
} from './fakes'

const INPUT = { channel: 'trakin-tech', url: 'https://youtu.be/abcDEF12345' } as const

describe('JobPipeline', () => {
	let dir: string
	let stages: ReturnType<typeof createFakeStages>
	let store: InMemoryJobStore
	let pipeline: JobPipeline

	beforeEach(async () => {
		dir = await fs.mkdtemp(path.join(os.tmpdir(), 'pipeline-'))
		stages = createFakeStages(dir)
		store = new InMemoryJobStore(() => 'job-1')
		pipeline = new JobPipeline({ store, ...stages })
	})

	afterEach(async () => {
		vi.unstubAllGlobals()
		await fs.rm(dir, { recursive: true, force: true })
	})

	it('walks the stages in order and attaches both artifacts', async () => {
		const updates: Job[] = []
		store.subscribe('job-1', (job) => updates.push(job))

		const submitted = pipeline.submit(INPUT)
		expect(submitted.status).toBe('queued')
		await pipeline.onIdle()

		expect(updates.map((j) => [j.status, j.progress, j.message])).toEqual([
			['downloading', 10, 'Downloading audio...'],
			['downloading', 30, `Downloading audio for "${FAKE_TITLE}"...`],
			['downloading', 50, `Downloaded audio for "${FAKE_TITLE}"`],
			['transcribing', 60, 'Transcribing audio...'],
			['transcribing', 80, 'Subtitle ready'],
			['generating', 90, 'Generating description...'],
			['done', 100, 'Completed'],
		])

		const job = store.get('job-1')
		expect(job).toMatchObject({
			status: 'done',
			title: FAKE_TITLE,
			error: null,
			result: { subtitle: FAKE_SUBTITLE, description: FAKE_DESCRIPTION },
		})
		expect(stages.describer.generate).toHaveBeenCalledWith(FAKE_SUBTITLE, 'trakin-tech')
	})

	it('removes the downloaded audio after transcription', async () => {
		pipeline.submit(INPUT)
		await pipeline.onIdle()

		const audioPath = stages.transcriber.transcribe.mock.calls[0]?.[0]
		expect(audioPath).toBe(path.join(dir, `job-1-${FAKE_TITLE}.m4a`))
		expect(await fileExists(path.join(dir, `job-1-${FAKE_TITLE}.m4a`))).toBe(false)
	})

	it('stops after a failed download', async () => {
		stages.downloader.download.mockRejectedValueOnce(
			new ContentUnavailableError('Video is not available: Private video'),
		)

		pipeline.submit(INPUT)
		await pipeline.onIdle()

		expect(store.get('job-1')).toMatchObject({
			status: 'failed',
			message: 'Failed',
			progress: 10,
			error: 'Download error: Video is not available: Private video',
			result: null,
		})
		expect(stages.transcriber.transcribe).not.toHaveBeenCalled()
		expect(stages.describer.generate).not.toHaveBeenCalled()
	})

	it('never generates a description when transcription fails', async () => {
		stages.transcriber.transcribe.mockRejectedValueOnce(
			new UpstreamApiError('whisper', 'Whisper API failed: 401 Unauthorized', { status: 401 }),
		)

		pipeline.submit(INPUT)
		await pipeline.onIdle()

		expect(store.get('job-1')).toMatchObject({
			status: 'failed',
			error: 'Transcription error: Whisper API failed: 401 Unauthorized',
			result: null,
		})
		expect(stages.describer.generate).not.toHaveBeenCalled()
		expect(await fileExists(path.join(dir, `job-1-${FAKE_TITLE}.m4a`))).toBe(false)
	})

	it('keeps the subtitle private when generation fails', async () => {
		stages.describer.generate.mockRejectedValueOnce(new Error('boom'))

		pipeline.submit(INPUT)
		await pipeline.onIdle()

		expect(store.get('job-1')).toMatchObject({
			status: 'failed',
			progress: 90,
			error: 'Description generation error: boom',
			result: null,
		})
	})

	it('reports missing credentials as configuration errors', async () => {
		stages.describer.generate.mockRejectedValueOnce(
			new ConfigurationError('GEMINI_API_KEY is not set'),
		)

		pipeline.submit(INPUT)
		await pipeline.onIdle()

		expect(store.get('job-1')?.error).toBe('Configuration error: GEMINI_API_KEY is not set')
	})

	it('fails on missing credentials before downloading anything', async () => {
		stages.describer.preflight.mockImplementationOnce(() => {
			throw new ConfigurationError('GEMINI_API_KEY is not set')
		})

		pipeline.submit(INPUT)
		await pipeline.onIdle()

		expect(store.get('job-1')).toMatchObject({
			status: 'failed',
			progress: 0,
			error: 'Configuration error: GEMINI_API_KEY is not set',
		})
		expect(stages.downloader.download).not.toHaveBeenCalled()
		expect(stages.transcriber.transcribe).not.toHaveBeenCalled()
		expect(stages.describer.generate).not.toHaveBeenCalled()
	})

	it('checks both real adapters before the download stage', async () => {
		const mockFetch = vi.fn()
		vi.stubGlobal('fetch', mockFetch as unknown as typeof fetch)
		const describer = new GeminiDescriptionGenerator({
			getModel: () => createGeminiModel({ model: 'gemini-2.5-pro' }),
			transcriptMode: 'plain',
			minSubtitleChars: 50,
		})
		const runWithWhisperKey = async (apiKey?: string) => {
			const jobs = new InMemoryJobStore()
			const p = new JobPipeline({
				store: jobs,
				downloader: stages.downloader,
				transcriber: new WhisperTranscriber({
					baseUrl: 'https://whisper.test',
					apiKey,
					model: 'whisper-1',
					task: 'translate',
				}),
				describer,
			})
			const { id } = jobs.create(INPUT)
			await p.run(id)
			return jobs.get(id)?.error
		}

		expect(await runWithWhisperKey()).toBe('Configuration error: OPENAI_API_KEY is not set')
		expect(await runWithWhisperKey('test-secret')).toBe(
			'Configuration error: GEMINI_API_KEY is not set',
		)
		expect(stages.downloader.download).not.toHaveBeenCalled()
		expect(mockFetch).not.toHaveBeenCalled()
	})

	it('treats duplicate submissions as independent jobs', async () => {
		const shared = new InMemoryJobStore()
		const p = new JobPipeline({ store: shared, ...stages })

		const a = p.submit(INPUT)
		const b = p.submit(INPUT)
		await p.onIdle()

		expect(a.id).not.toBe(b.id)
		expect(shared.list().map((j) => j.status)).toEqual(['done', 'done'])
		expect(stages.downloader.download).toHaveBeenCalledTimes(2)
	})
})
