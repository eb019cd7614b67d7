const VIDEO_ID = /^[A-Za-z0-9_-]{11}$/
const PATH_PREFIXES = new Set(['shorts', 'embed', 'live', 'v'])

/**
 * Extract the 11-character video id from a YouTube URL.
 * Handles watch, youtu.be, shorts, embed and live links; returns null otherwise.
 */
export function extractVideoId(url: string): string | null {
	let u: URL
	try {
		u = new URL(url)
	} catch {
		return null
	}
	if (u.protocol !== 'https:' && u.protocol !== 'http:') return null

	const host = u.hostname.replace(/^(www|m|music)\./, '')
	let candidate: string | null = null

	if (host === 'youtu.be') {
		candidate = u.pathname.split('/').filter(Boolean)[0] ?? null
	} else if (host === 'youtube.com' || host === 'youtube-nocookie.com') {
		candidate = u.searchParams.get('v')
		if (!candidate) {
			const parts = u.pathname.split('/').filter(Boolean)
			if (parts[0] && PATH_PREFIXES.has(parts[0]) && parts[1]) candidate = parts[1]
		}
	}

	return candidate && VIDEO_ID.test(candidate) ? candidate : null
}

export function isValidYouTubeUrl(url: string): boolean {
	return extractVideoId(url) !== null
}

/**
 * Filename-safe form of a video title: letters, digits, spaces, `-` and `_`.
 */
export function toSafeTitle(title: string, fallback: string): string {
	const safe = Array.from(title)
		.filter((c) => /[\p{L}\p{N} _-]/u.test(c))
		.join('')
		.trimEnd()
	return safe || fallback
}
