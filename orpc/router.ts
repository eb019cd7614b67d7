import { os } from '~/orpc/base'
import * as channel from './procedures/channel'
import * as health from './procedures/health'
import * as job from './procedures/job'

export const appRouter = os.router({
	health,
	channel,
	job,
})

export type AppRouter = typeof appRouter
