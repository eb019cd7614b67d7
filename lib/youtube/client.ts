import { Innertube, UniversalCache } from 'youtubei.js'

export type YouTubeClientConfig = {
	cacheEnabled?: boolean
}

export async function getYouTubeClient(
	config: YouTubeClientConfig = {},
): Promise<Innertube> {
	const cache = new UniversalCache(config.cacheEnabled !== false)
	return Innertube.create({ cache })
}
