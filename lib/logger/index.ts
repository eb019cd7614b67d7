import { formatConsole, formatSimple } from './formatters'
import type { LogCategory, LogEntry, LogLevel } from './types'

const LEVEL_RANK: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
}

const WRITERS: Record<LogLevel, (line: string) => void> = {
	debug: (line) => console.debug(line),
	info: (line) => console.info(line),
	warn: (line) => console.warn(line),
	error: (line) => console.error(line),
}

export function isLogLevel(value: unknown): value is LogLevel {
	return typeof value === 'string' && Object.hasOwn(LEVEL_RANK, value)
}

function defaultLevel(): LogLevel {
	const fromEnv = process.env.LOG_LEVEL
	if (isLogLevel(fromEnv)) return fromEnv
	return process.env.NODE_ENV === 'production' ? 'info' : 'debug'
}

class Logger {
	private logLevel: LogLevel = defaultLevel()
	private readonly format: (entry: LogEntry) => string =
		process.env.NODE_ENV === 'production' ? formatSimple : formatConsole

	isEnabled(level: LogLevel): boolean {
		return LEVEL_RANK[level] >= LEVEL_RANK[this.logLevel]
	}

	private log(level: LogLevel, category: LogCategory, message: string): void {
		if (!this.isEnabled(level)) return
		WRITERS[level](
			this.format({
				timestamp: new Date().toISOString(),
				level,
				category,
				message,
			}),
		)
	}

	debug(category: LogCategory, message: string): void {
		this.log('debug', category, message)
	}

	info(category: LogCategory, message: string): void {
		this.log('info', category, message)
	}

	warn(category: LogCategory, message: string): void {
		this.log('warn', category, message)
	}

	/**
	 * Logs `message`; when `cause` is an Error its stack follows at debug level.
	 */
	error(category: LogCategory, message: string, cause?: unknown): void {
		this.log('error', category, message)
		if (cause instanceof Error && cause.stack) {
			this.log('debug', category, cause.stack)
		}
	}

	setLevel(level: LogLevel): void {
		this.logLevel = level
	}

	getLevel(): LogLevel {
		return this.logLevel
	}
}

export const logger = new Logger()
export type { LogCategory, LogEntry, LogLevel } from './types'
