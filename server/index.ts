import { loadConfig } from '~/lib/config/env'
import { errorMessage } from '~/lib/errors'
import { logger } from '~/lib/logger'
import { createApp, createPipeline } from './app'

const PRUNE_INTERVAL_MS = 10 * 60 * 1000

function main() {
	const config = loadConfig()
	if (config.logLevel) logger.setLevel(config.logLevel)

	if (!config.openaiApiKey) logger.warn('server', 'OPENAI_API_KEY is not set; transcription will fail')
	if (!config.geminiApiKey) logger.warn('server', 'GEMINI_API_KEY is not set; description generation will fail')

	const pipeline = createPipeline(config)
	const server = createApp(pipeline)

	const pruneTimer = setInterval(() => {
		const removed = pipeline.store.prune(config.jobTtlMs)
		if (removed > 0) logger.info('job', `[job.prune] removed=${removed}`)
	}, PRUNE_INTERVAL_MS)
	pruneTimer.unref()

	server.listen(config.port, config.host, () => {
		logger.info('server', `Listening on http://${config.host}:${config.port}`)
	})

	const shutdown = (signal: string) => {
		logger.info('server', `${signal} received, closing server`)
		clearInterval(pruneTimer)
		server.close((error) => {
			if (error) logger.error('server', `close failed: ${error.message}`)
			process.exit(error ? 1 : 0)
		})
		// ends open event streams
		server.closeAllConnections()
	}
	process.once('SIGINT', () => shutdown('SIGINT'))
	process.once('SIGTERM', () => shutdown('SIGTERM'))
}

try {
	main()
} catch (error) {
	logger.error('server', `Startup failed: ${errorMessage(error)}`, error)
	process.exit(1)
}
