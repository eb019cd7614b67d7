/**
 * SubRip (.srt) parsing and serialization.
 */

import { formatSrtTimestamp, isValidTimeRange, parseSrtTimestamp } from './time'

export interface SrtCue {
	start: number
	end: number
	lines: string[]
}

export interface TimedSegment {
	start: number
	end: number
	text: string
}

const TIMING_LINE = /^(\S+)\s+-->\s+(\S+)/

/**
 * Build cues from time-coded segments, dropping empty text and invalid ranges.
 */
export function cuesFromSegments(segments: TimedSegment[]): SrtCue[] {
	const cues: SrtCue[] = []
	for (const seg of segments) {
		const text = typeof seg.text === 'string' ? seg.text.trim() : ''
		if (!text) continue
		const start = Number(seg.start)
		const end = Number(seg.end)
		if (!isValidTimeRange(start, end)) continue
		cues.push({ start, end, lines: text.split(/\r?\n/).map((l) => l.trim()) })
	}
	return cues
}

/**
 * Serialize cues as an SRT document. Entries are numbered from 1 and separated
 * by a blank line; the document ends with a single newline.
 */
export function serializeSrtCues(cues: SrtCue[]): string {
	if (cues.length === 0) return ''

	return (
		cues
			.map((cue, index) =>
				[
					String(index + 1),
					`${formatSrtTimestamp(cue.start)} --> ${formatSrtTimestamp(cue.end)}`,
					...cue.lines,
				].join('\n'),
			)
			.join('\n\n') + '\n'
	)
}

export function parseSrtCues(content: string): SrtCue[] {
	if (!content) return []

	const cues: SrtCue[] = []
	const lines = content.replace(/^\uFEFF/, '').split(/\r?\n/)

	let i = 0
	while (i < lines.length) {
		const timing = lines[i]?.trim().match(TIMING_LINE)
		if (!timing) {
			i++
			continue
		}

		const start = parseSrtTimestamp(timing[1])
		const end = parseSrtTimestamp(timing[2])
		const cueLines: string[] = []
		i++
		for (; i < lines.length; i++) {
			const textLine = lines[i]?.trim()
			if (!textLine) break
			cueLines.push(textLine)
		}

		if (start !== null && end !== null && cueLines.length > 0) {
			cues.push({ start, end, lines: cueLines })
		}
	}

	return cues
}

/**
 * Strip numbering, timing lines and markup from an SRT document and join the
 * cue text into one whitespace-normalized paragraph.
 */
export function srtToPlainText(content: string): string {
	return parseSrtCues(content)
		.flatMap((cue) => cue.lines)
		.map((line) => line.replace(/<[^>]+>/g, '').replace(/\s+/g, ' ').trim())
		.filter(Boolean)
		.join(' ')
}
