export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export type LogCategory =
	| 'api'
	| 'job'
	| 'download'
	| 'transcription'
	| 'generation'
	| 'server'

export interface LogEntry {
	timestamp: string
	level: LogLevel
	category: LogCategory
	message: string
}
