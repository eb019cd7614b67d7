import type { ChannelId } from '~/lib/channels/profiles'

export const JOB_STATUSES = [
	'queued',
	'downloading',
	'transcribing',
	'generating',
	'done',
	'failed',
] as const

export type JobStatus = (typeof JOB_STATUSES)[number]

export const TERMINAL_JOB_STATUSES: readonly JobStatus[] = ['done', 'failed']

export const STATUS_LABELS: Record<JobStatus, string> = {
	queued: 'Queued',
	downloading: 'Downloading audio',
	transcribing: 'Transcribing audio',
	generating: 'Generating description',
	done: 'Completed',
	failed: 'Failed',
}

// Position in the forward-only stage order; `failed` sits outside it.
const STAGE_ORDER: Record<Exclude<JobStatus, 'failed'>, number> = {
	queued: 0,
	downloading: 1,
	transcribing: 2,
	generating: 3,
	done: 4,
}

export function isTerminalStatus(status: JobStatus): boolean {
	return TERMINAL_JOB_STATUSES.includes(status)
}

/**
 * Allowed transitions: stay put, move forward through the stage order, or
 * fail from any non-terminal state.
 */
export function canTransition(from: JobStatus, to: JobStatus): boolean {
	if (from === to) return !isTerminalStatus(from)
	if (isTerminalStatus(from)) return false
	if (to === 'failed') return true
	if (from === 'failed') return false
	return STAGE_ORDER[to] > STAGE_ORDER[from]
}

export interface JobResult {
	subtitle: string
	description: string
}

export interface Job {
	id: string
	channel: ChannelId
	url: string
	status: JobStatus
	message: string
	/** 0–100 */
	progress: number
	title: string | null
	safeTitle: string | null
	createdAt: Date
	updatedAt: Date
	result: JobResult | null
	error: string | null
}

export interface SubmitJobInput {
	channel: ChannelId
	url: string
}

export interface DownloadedAudio {
	audioPath: string
	title: string
	safeTitle: string
}

export interface DownloadOptions {
	jobId: string
	/** Called once the video title is known, before the audio transfer starts. */
	onInfo?: (info: { title: string; safeTitle: string }) => void
}

export interface AudioDownloader {
	download(url: string, options: DownloadOptions): Promise<DownloadedAudio>
}

export interface Transcriber {
	/** Throws a `ConfigurationError` when the adapter cannot run at all. */
	preflight?(): void
	/** Returns SRT text for the audio file. */
	transcribe(audioPath: string): Promise<string>
}

export interface DescriptionGenerator {
	preflight?(): void
	generate(subtitle: string, channel: ChannelId): Promise<string>
}
