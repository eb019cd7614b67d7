import { CHANNEL_IDS, getChannelProfile } from '~/lib/channels/profiles'
import { os } from '~/orpc/base'

export const list = os
	.route({ method: 'GET', path: '/channels' })
	.handler(async () => {
		return {
			channels: CHANNEL_IDS.map((id) => {
				const profile = getChannelProfile(id)
				return { id: profile.id, name: profile.name, language: profile.language }
			}),
		}
	})
