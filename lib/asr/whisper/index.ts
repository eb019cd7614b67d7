import fs from 'node:fs/promises'
import path from 'node:path'
import type { WhisperTask } from '~/lib/config/env'
import { ConfigurationError, NetworkError, UpstreamApiError, errorMessage } from '~/lib/errors'
import type { Transcriber } from '~/lib/job/types'
import { logger } from '~/lib/logger'
import { cuesFromSegments, serializeSrtCues, type TimedSegment } from '~/lib/subtitle/utils/srt'

type WhisperSegment = {
	id?: number
	start: number
	end: number
	text: string
}

type WhisperVerboseResponse = {
	task?: string
	language?: string
	duration?: number
	text?: string
	segments?: WhisperSegment[]
}

export interface WhisperApiOptions {
	baseUrl: string
	apiKey?: string
	model: string
	task: WhisperTask
}

function normalizeBaseUrl(baseUrl: string) {
	return baseUrl.trim().replace(/\/$/, '')
}

function isWhisperSegment(value: unknown): value is WhisperSegment {
	if (!value || typeof value !== 'object') return false
	return (
		'start' in value &&
		typeof value.start === 'number' &&
		'end' in value &&
		typeof value.end === 'number' &&
		'text' in value &&
		typeof value.text === 'string'
	)
}

/**
 * Turn a `verbose_json` Whisper response into SRT text.
 */
export function buildSrtFromWhisperResponse(json: WhisperVerboseResponse): string {
	const segments: TimedSegment[] = Array.isArray(json.segments)
		? json.segments.filter(isWhisperSegment)
		: []

	const srt = serializeSrtCues(cuesFromSegments(segments))
	if (srt) return srt

	const text = typeof json.text === 'string' ? json.text.trim() : ''
	if (text) {
		return serializeSrtCues([{ start: 0, end: 3, lines: [text] }])
	}

	throw new UpstreamApiError('whisper', 'Whisper API: unexpected response format')
}

export async function runWhisperApiAsr(opts: {
	baseUrl: string
	apiKey: string
	model: string
	task: WhisperTask
	audio: ArrayBuffer
	filename?: string
}): Promise<string> {
	const baseUrl = normalizeBaseUrl(opts.baseUrl)
	const endpoint = opts.task === 'translate' ? 'translations' : 'transcriptions'

	const form = new FormData()
	form.append(
		'file',
		new Blob([opts.audio], { type: 'application/octet-stream' }),
		opts.filename?.trim() || 'audio.m4a',
	)
	form.append('model', opts.model)
	form.append('response_format', 'verbose_json')

	const url = `${baseUrl}/v1/audio/${endpoint}`
	let r: Response
	try {
		r = await fetch(url, {
			method: 'POST',
			headers: { Authorization: `Bearer ${opts.apiKey}` },
			body: form,
		})
	} catch (error) {
		throw new NetworkError(`Whisper API request failed: ${errorMessage(error)}`, {
			cause: error,
		})
	}

	if (!r.ok) {
		const t = await r.text().catch(() => '')
		const detail = t.trim()
		throw new UpstreamApiError(
			'whisper',
			`Whisper API failed: ${r.status}${detail ? ` ${detail}` : ''}`,
			{ status: r.status },
		)
	}

	let json: WhisperVerboseResponse
	try {
		json = (await r.json()) as WhisperVerboseResponse
	} catch (error) {
		throw new UpstreamApiError('whisper', 'Whisper API returned invalid JSON', {
			status: r.status,
			cause: error,
		})
	}
	return buildSrtFromWhisperResponse(json)
}

/**
 * Transcription adapter backed by the OpenAI audio API.
 */
export class WhisperTranscriber implements Transcriber {
	constructor(private readonly options: WhisperApiOptions) {}

	preflight(): void {
		this.requireApiKey()
	}

	private requireApiKey(): string {
		const apiKey = this.options.apiKey?.trim()
		if (!apiKey) {
			throw new ConfigurationError('OPENAI_API_KEY is not set')
		}
		return apiKey
	}

	async transcribe(audioPath: string): Promise<string> {
		const apiKey = this.requireApiKey()

		const fileBuffer = await fs.readFile(audioPath)
		const size = fileBuffer.byteLength
		logger.info(
			'transcription',
			`Whisper ${this.options.task} upload: ${size} bytes (~${(size / (1024 * 1024)).toFixed(2)} MB) from ${audioPath}`,
		)
		const audio = fileBuffer.buffer.slice(
			fileBuffer.byteOffset,
			fileBuffer.byteOffset + fileBuffer.byteLength,
		) as ArrayBuffer

		return runWhisperApiAsr({
			baseUrl: this.options.baseUrl,
			apiKey,
			model: this.options.model,
			task: this.options.task,
			audio,
			filename: path.basename(audioPath),
		})
	}
}
