import { os } from '~/orpc/base'

export const check = os
	.route({ method: 'GET', path: '/health' })
	.handler(async () => ({ ok: true }))
