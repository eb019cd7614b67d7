import type { LogEntry } from './types'

export function formatConsole(entry: LogEntry): string {
	const timestamp = new Date(entry.timestamp).toISOString()
	const level = entry.level.toUpperCase().padEnd(5)
	const category = entry.category.padEnd(13)
	return `[${timestamp}] ${level} ${category} ${entry.message}`
}

// production: no timestamp
export function formatSimple(entry: LogEntry): string {
	const level = entry.level.toUpperCase().padEnd(5)
	return `${level} [${entry.category}] ${entry.message}`
}
