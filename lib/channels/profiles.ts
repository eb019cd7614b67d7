import {
	HINDI_DESCRIPTION_TEMPLATE,
	MARATHI_DESCRIPTION_TEMPLATE,
	TAMIL_DESCRIPTION_TEMPLATE,
	TRANSCRIPT_PLACEHOLDER,
} from './prompts'

export const CHANNEL_IDS = [
	'trakin-tech',
	'trakin-tech-marathi',
	'trakin-tech-tamil',
] as const

export type ChannelId = (typeof CHANNEL_IDS)[number]

export interface ChannelProfile {
	id: ChannelId
	name: string
	/** BCP 47 tag of the description's language */
	language: string
	style: string
	template: string
}

export const CHANNEL_PROFILES: Record<ChannelId, ChannelProfile> = {
	'trakin-tech': {
		id: 'trakin-tech',
		name: 'Trakin Tech',
		language: 'hi',
		style: 'Casual, conversational Hindi with chapter highlights and social handles',
		template: HINDI_DESCRIPTION_TEMPLATE,
	},
	'trakin-tech-marathi': {
		id: 'trakin-tech-marathi',
		name: 'Trakin Tech Marathi',
		language: 'mr',
		style: 'Casual Marathi YouTube tone with highlights and social handles',
		template: MARATHI_DESCRIPTION_TEMPLATE,
	},
	'trakin-tech-tamil': {
		id: 'trakin-tech-tamil',
		name: 'Trakin Tech Tamil',
		language: 'ta',
		style: 'Casual Tamil with English tech words and a subscribe section',
		template: TAMIL_DESCRIPTION_TEMPLATE,
	},
}

export function isChannelId(value: unknown): value is ChannelId {
	return typeof value === 'string' && (CHANNEL_IDS as readonly string[]).includes(value)
}

export function getChannelProfile(channel: ChannelId): ChannelProfile {
	return CHANNEL_PROFILES[channel]
}

/**
 * Compose the description prompt for a channel. The transcript is inserted
 * literally, `$` sequences included.
 */
export function buildDescriptionPrompt(channel: ChannelId, transcript: string): string {
	return getChannelProfile(channel).template.split(TRANSCRIPT_PLACEHOLDER).join(transcript)
}
