import fs, { type FileHandle } from 'node:fs/promises'
import path from 'node:path'
import type { Innertube } from 'youtubei.js'
import { ContentUnavailableError, NetworkError, PipelineError, errorMessage } from '~/lib/errors'
import type { AudioDownloader, DownloadOptions, DownloadedAudio } from '~/lib/job/types'
import { logger } from '~/lib/logger'
import { getYouTubeClient } from './client'
import { extractVideoId, toSafeTitle } from './utils'

const NETWORK_ERROR_CODES = new Set([
	'ECONNRESET',
	'ECONNREFUSED',
	'ENOTFOUND',
	'ETIMEDOUT',
	'EAI_AGAIN',
	'UND_ERR_CONNECT_TIMEOUT',
	'UND_ERR_SOCKET',
])

function isNetworkFailure(error: unknown): boolean {
	if (!(error instanceof Error)) return false
	if (error.name === 'AbortError' || error.message === 'fetch failed') return true
	const cause: unknown = error.cause
	const code =
		cause && typeof cause === 'object' && 'code' in cause ? cause.code : undefined
	return typeof code === 'string' && NETWORK_ERROR_CODES.has(code)
}

function toDownloadError(error: unknown): unknown {
	if (error instanceof PipelineError) return error
	if (isNetworkFailure(error)) {
		return new NetworkError(`Network error while fetching video: ${errorMessage(error)}`, {
			cause: error,
		})
	}
	return error
}

async function writeStreamToFile(
	stream: ReadableStream<Uint8Array>,
	filePath: string,
): Promise<number> {
	const reader = stream.getReader()
	let handle: FileHandle | null = null
	let bytes = 0
	try {
		handle = await fs.open(filePath, 'w')
		while (true) {
			const { done, value } = await reader.read()
			if (done) break
			await handle.write(value)
			bytes += value.byteLength
		}
	} catch (error) {
		// release the upstream response
		await reader.cancel(error).catch((cancelError: unknown) => {
			logger.debug('download', `[download.cancel] ${errorMessage(cancelError)}`)
		})
		throw error
	} finally {
		await handle?.close()
	}
	return bytes
}

async function removePartialFile(jobId: string, filePath: string): Promise<void> {
	try {
		await fs.rm(filePath, { force: true })
	} catch (error) {
		logger.warn('download', `[download.cleanup] job=${jobId} could not remove ${filePath}: ${errorMessage(error)}`)
	}
}

export interface YouTubeAudioDownloaderOptions {
	tempDir: string
	cacheEnabled?: boolean
}

/**
 * Fetches the best audio-only stream of a YouTube video into a temp file.
 */
export class YouTubeAudioDownloader implements AudioDownloader {
	private client: Promise<Innertube> | null = null

	constructor(private readonly options: YouTubeAudioDownloaderOptions) {}

	private getClient(): Promise<Innertube> {
		if (!this.client) {
			this.client = getYouTubeClient({ cacheEnabled: this.options.cacheEnabled })
			// drop a rejected session; the next job creates a new one
			this.client.catch(() => {
				this.client = null
			})
		}
		return this.client
	}

	async download(url: string, { jobId, onInfo }: DownloadOptions): Promise<DownloadedAudio> {
		const videoId = extractVideoId(url)
		if (!videoId) {
			throw new ContentUnavailableError(`Not a YouTube video URL: ${url}`)
		}

		let audioPath: string | null = null
		try {
			const yt = await this.getClient()
			const info = await yt.getBasicInfo(videoId)

			const playability = info.playability_status
			if (playability && playability.status !== 'OK') {
				const reason = playability.reason || playability.status
				throw new ContentUnavailableError(`Video is not available: ${reason}`)
			}

			const title = info.basic_info.title?.trim() || videoId
			const safeTitle = toSafeTitle(title, videoId)
			logger.info('download', `[download.info] job=${jobId} video=${videoId} title="${title}"`)
			onInfo?.({ title, safeTitle })

			await fs.mkdir(this.options.tempDir, { recursive: true })
			audioPath = path.join(this.options.tempDir, `${jobId}-${safeTitle}.m4a`)

			const stream = await yt.download(videoId, {
				type: 'audio',
				quality: 'best',
				format: 'mp4',
			})
			const bytes = await writeStreamToFile(stream, audioPath)
			logger.info('download', `[download.saved] job=${jobId} bytes=${bytes} path=${audioPath}`)

			return { audioPath, title, safeTitle }
		} catch (error) {
			if (audioPath) await removePartialFile(jobId, audioPath)
			throw toDownloadError(error)
		}
	}
}
