/**
 * SRT timestamp helpers ("HH:MM:SS,mmm").
 */

const SRT_TIMESTAMP = /^(\d{2,}):(\d{2}):(\d{2}),(\d{1,3})$/

/**
 * Format seconds as an SRT timestamp. Negative and non-finite input clamps to zero.
 */
export function formatSrtTimestamp(seconds: number): string {
	// nearest millisecond
	let totalMs = Number.isFinite(seconds) ? Math.round(seconds * 1000) : 0
	if (totalMs < 0) totalMs = 0
	const hours = Math.floor(totalMs / 3600000)
	const minutes = Math.floor((totalMs % 3600000) / 60000)
	const secs = Math.floor((totalMs % 60000) / 1000)
	const ms = totalMs % 1000

	return `${String(hours).padStart(2, '0')}:${String(minutes).padStart(2, '0')}:${String(secs).padStart(2, '0')},${String(ms).padStart(3, '0')}`
}

/**
 * Parse an SRT timestamp into seconds. Returns null when the string is not one.
 */
export function parseSrtTimestamp(timestamp: string): number | null {
	const match = timestamp.trim().match(SRT_TIMESTAMP)
	if (!match) return null
	const [, hours, minutes, seconds, milliseconds] = match
	return (
		parseInt(hours, 10) * 3600 +
		parseInt(minutes, 10) * 60 +
		parseInt(seconds, 10) +
		parseInt(milliseconds.padEnd(3, '0'), 10) / 1000
	)
}

export function isValidTimeRange(startTime: number, endTime: number): boolean {
	return (
		Number.isFinite(startTime) &&
		Number.isFinite(endTime) &&
		startTime >= 0 &&
		startTime < endTime
	)
}
