import fs from 'node:fs/promises'
import { ConfigurationError, errorKind, errorMessage } from '~/lib/errors'
import { logger } from '~/lib/logger'
import { JobQueue } from './queue'
import type { JobPatch, JobStore } from './store'
import {
	STATUS_LABELS,
	type AudioDownloader,
	type DescriptionGenerator,
	type Job,
	type SubmitJobInput,
	type Transcriber,
} from './types'

type StageName = 'download' | 'transcribe' | 'generate'

const STAGE_ERROR_PREFIX: Record<StageName, string> = {
	download: 'Download error',
	transcribe: 'Transcription error',
	generate: 'Description generation error',
}

export interface JobPipelineDeps {
	store: JobStore
	downloader: AudioDownloader
	transcriber: Transcriber
	describer: DescriptionGenerator
	queue?: JobQueue
}

class StageError extends Error {
	constructor(
		readonly stage: StageName,
		readonly original: unknown,
	) {
		super(errorMessage(original))
		this.name = 'StageError'
	}
}

async function runStage<T>(stage: StageName, fn: () => Promise<T>): Promise<T> {
	try {
		return await fn()
	} catch (error) {
		throw new StageError(stage, error)
	}
}

function failureMessage(error: unknown): string {
	const cause = error instanceof StageError ? error.original : error
	if (cause instanceof ConfigurationError) {
		return `Configuration error: ${cause.message}`
	}
	if (error instanceof StageError) {
		return `${STAGE_ERROR_PREFIX[error.stage]}: ${error.message}`
	}
	return errorMessage(error)
}

/**
 * Runs download → transcribe → generate for each submitted job.
 *
 * Stages run strictly in sequence; the first failure moves the job to `failed`
 * with the captured message and later stages never run. Results are attached
 * only together with the `done` status.
 */
export class JobPipeline {
	readonly store: JobStore
	private readonly queue: JobQueue
	private readonly downloader: AudioDownloader
	private readonly transcriber: Transcriber
	private readonly describer: DescriptionGenerator

	constructor(deps: JobPipelineDeps) {
		this.store = deps.store
		this.queue = deps.queue ?? new JobQueue()
		this.downloader = deps.downloader
		this.transcriber = deps.transcriber
		this.describer = deps.describer
	}

	submit(input: SubmitJobInput): Job {
		const job = this.store.create(input)
		logger.info('job', `[job.submit] job=${job.id} channel=${job.channel} url=${job.url}`)
		this.queue.enqueue(() => this.run(job.id))
		return job
	}

	/** Resolves when every submitted job has settled. */
	onIdle(): Promise<void> {
		return this.queue.onIdle()
	}

	async run(jobId: string): Promise<void> {
		const job = this.store.get(jobId)
		if (!job) throw new Error(`Job ${jobId} not found`)

		try {
			// credentials for every stage are checked before any upstream call
			this.transcriber.preflight?.()
			this.describer.preflight?.()

			this.update(jobId, {
				status: 'downloading',
				message: 'Downloading audio...',
				progress: 10,
			})
			const audio = await runStage('download', () =>
				this.downloader.download(job.url, {
					jobId,
					onInfo: ({ title, safeTitle }) => {
						this.update(jobId, {
							message: `Downloading audio for "${title}"...`,
							title,
							safeTitle,
							progress: 30,
						})
					},
				}),
			)
			this.update(jobId, {
				message: `Downloaded audio for "${audio.title}"`,
				title: audio.title,
				safeTitle: audio.safeTitle,
				progress: 50,
			})

			this.update(jobId, {
				status: 'transcribing',
				message: 'Transcribing audio...',
				progress: 60,
			})
			const subtitle = await runStage('transcribe', async () => {
				try {
					return await this.transcriber.transcribe(audio.audioPath)
				} finally {
					await this.removeAudio(jobId, audio.audioPath)
				}
			})
			this.update(jobId, { message: 'Subtitle ready', progress: 80 })

			this.update(jobId, {
				status: 'generating',
				message: 'Generating description...',
				progress: 90,
			})
			const description = await runStage('generate', () =>
				this.describer.generate(subtitle, job.channel),
			)

			this.update(jobId, {
				status: 'done',
				message: STATUS_LABELS.done,
				progress: 100,
				result: { subtitle, description },
			})
			logger.info('job', `[job.done] job=${jobId} subtitleChars=${subtitle.length} descriptionChars=${description.length}`)
		} catch (error) {
			const message = failureMessage(error)
			const cause = error instanceof StageError ? error.original : error
			logger.error('job', `[job.failed] job=${jobId} kind=${errorKind(cause)} ${message}`, cause)
			this.update(jobId, {
				status: 'failed',
				message: STATUS_LABELS.failed,
				error: message,
			})
		}
	}

	private update(jobId: string, patch: JobPatch): Job {
		const job = this.store.update(jobId, patch)
		logger.debug('job', `[job.progress] job=${jobId} status=${job.status} progress=${job.progress} ${job.message}`)
		return job
	}

	private async removeAudio(jobId: string, audioPath: string): Promise<void> {
		try {
			await fs.rm(audioPath, { force: true })
		} catch (error) {
			logger.warn('job', `[job.cleanup] job=${jobId} could not remove ${audioPath}: ${errorMessage(error)}`)
		}
	}
}
