import os from 'node:os'
import { z } from 'zod'
import { isLogLevel, type LogLevel } from '~/lib/logger'

// Server-side config, read once from process.env at startup.
// API keys are optional here; each adapter checks its key per call.

const optionalString = z
	.string()
	.trim()
	.optional()
	.transform((v) => (v ? v : undefined))

const intWithDefault = (fallback: number) =>
	z
		.string()
		.trim()
		.optional()
		.transform((v, ctx) => {
			if (!v) return fallback
			const n = Number(v)
			if (!Number.isInteger(n) || n < 0) {
				ctx.addIssue({
					code: z.ZodIssueCode.custom,
					message: `expected a non-negative integer, got "${v}"`,
				})
				return z.NEVER
			}
			return n
		})

const EnvSchema = z.object({
	OPENAI_API_KEY: optionalString,
	GEMINI_API_KEY: optionalString,
	PORT: intWithDefault(8080),
	HOST: z.string().trim().default('0.0.0.0'),
	OPENAI_BASE_URL: z.string().trim().url().default('https://api.openai.com'),
	WHISPER_MODEL: z.string().trim().min(1).default('whisper-1'),
	WHISPER_TASK: z.enum(['translate', 'transcribe']).default('translate'),
	GEMINI_MODEL: z.string().trim().min(1).default('gemini-2.5-pro'),
	GEMINI_SEARCH_GROUNDING: z.enum(['true', 'false']).default('true'),
	DESCRIPTION_TRANSCRIPT: z.enum(['plain', 'srt']).default('plain'),
	MIN_SUBTITLE_CHARS: intWithDefault(50),
	TEMP_DIR: optionalString,
	YOUTUBE_CACHE: z.enum(['true', 'false']).default('true'),
	JOB_CONCURRENCY: intWithDefault(0),
	JOB_TTL_MS: intWithDefault(6 * 60 * 60 * 1000),
	LOG_LEVEL: optionalString,
})

export type WhisperTask = 'translate' | 'transcribe'
export type TranscriptMode = 'plain' | 'srt'

export interface AppConfig {
	openaiApiKey?: string
	geminiApiKey?: string
	port: number
	host: string
	openaiBaseUrl: string
	whisperModel: string
	whisperTask: WhisperTask
	geminiModel: string
	geminiSearchGrounding: boolean
	descriptionTranscript: TranscriptMode
	minSubtitleChars: number
	tempDir: string
	youtubeCache: boolean
	jobConcurrency: number
	jobTtlMs: number
	logLevel?: LogLevel
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
	const parsed = EnvSchema.safeParse(env)
	if (!parsed.success) {
		const details = parsed.error.issues
			.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
			.join('; ')
		throw new Error(`Invalid environment: ${details}`)
	}
	const e = parsed.data

	return {
		openaiApiKey: e.OPENAI_API_KEY,
		geminiApiKey: e.GEMINI_API_KEY,
		port: e.PORT,
		host: e.HOST,
		openaiBaseUrl: e.OPENAI_BASE_URL,
		whisperModel: e.WHISPER_MODEL,
		whisperTask: e.WHISPER_TASK,
		geminiModel: e.GEMINI_MODEL,
		geminiSearchGrounding: e.GEMINI_SEARCH_GROUNDING === 'true',
		descriptionTranscript: e.DESCRIPTION_TRANSCRIPT,
		minSubtitleChars: e.MIN_SUBTITLE_CHARS,
		tempDir: e.TEMP_DIR ?? os.tmpdir(),
		youtubeCache: e.YOUTUBE_CACHE === 'true',
		jobConcurrency: e.JOB_CONCURRENCY,
		jobTtlMs: e.JOB_TTL_MS,
		logLevel: isLogLevel(e.LOG_LEVEL) ? e.LOG_LEVEL : undefined,
	}
}
