import { createServer, type Server } from 'node:http'
import { OpenAPIGenerator } from '@orpc/openapi'
import { OpenAPIHandler } from '@orpc/openapi/node'
import { ORPCError, onError } from '@orpc/server'
import { GeminiDescriptionGenerator } from '~/lib/ai/description'
import { createGeminiModel } from '~/lib/ai/gemini'
import { WhisperTranscriber } from '~/lib/asr/whisper'
import type { AppConfig } from '~/lib/config/env'
import { errorMessage } from '~/lib/errors'
import { JobPipeline } from '~/lib/job/pipeline'
import { JobQueue } from '~/lib/job/queue'
import { InMemoryJobStore } from '~/lib/job/store'
import { logger } from '~/lib/logger'
import { YouTubeAudioDownloader } from '~/lib/youtube/download'
import { appRouter } from '~/orpc/router'

export const API_PREFIX = '/api'

export function createPipeline(config: AppConfig): JobPipeline {
	return new JobPipeline({
		store: new InMemoryJobStore(),
		queue: new JobQueue(config.jobConcurrency),
		downloader: new YouTubeAudioDownloader({
			tempDir: config.tempDir,
			cacheEnabled: config.youtubeCache,
		}),
		transcriber: new WhisperTranscriber({
			baseUrl: config.openaiBaseUrl,
			apiKey: config.openaiApiKey,
			model: config.whisperModel,
			task: config.whisperTask,
		}),
		describer: new GeminiDescriptionGenerator({
			getModel: () =>
				createGeminiModel({
					apiKey: config.geminiApiKey,
					model: config.geminiModel,
					searchGrounding: config.geminiSearchGrounding,
				}),
			transcriptMode: config.descriptionTranscript,
			minSubtitleChars: config.minSubtitleChars,
		}),
	})
}

function createHandler() {
	return new OpenAPIHandler(appRouter, {
		interceptors: [
			onError((error) => {
				if (error instanceof ORPCError) {
					const json = error.toJSON()
					logger.warn(
						'api',
						`[ORPC] Handler error: code=${json.code} status=${json.status} msg=${json.message}`,
					)
					return
				}
				logger.error('api', `[ORPC] Handler error: ${errorMessage(error)}`, error)
			}),
		],
	})
}

export function createApp(pipeline: JobPipeline): Server {
	const handler = createHandler()
	const generator = new OpenAPIGenerator()

	return createServer(async (req, res) => {
		try {
			if (req.method === 'GET' && req.url === `${API_PREFIX}/openapi.json`) {
				const doc = await generator.generate(appRouter, {
					info: { title: 'subtitle-desk API', version: '1.0.0' },
					servers: [{ url: API_PREFIX }],
				})
				res.writeHead(200, { 'content-type': 'application/json' })
				res.end(JSON.stringify(doc))
				return
			}

			const { matched } = await handler.handle(req, res, {
				prefix: API_PREFIX,
				context: { pipeline },
			})
			if (matched) return

			res.writeHead(404, { 'content-type': 'application/json' })
			res.end(JSON.stringify({ error: 'Not Found' }))
		} catch (error) {
			logger.error('server', `[http] ${req.method} ${req.url} failed: ${errorMessage(error)}`, error)
			if (!res.headersSent) {
				res.writeHead(500, { 'content-type': 'application/json' })
			}
			res.end(JSON.stringify({ error: 'Internal Server Error' }))
		}
	})
}
