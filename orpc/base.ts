import { os as rawOs } from '@orpc/server'
import type { JobPipeline } from '~/lib/job/pipeline'

/**
 * Per-request context. The pipeline (and through it the job store) is created
 * once at startup and handed to every request.
 */
export interface RequestContext {
	pipeline: JobPipeline
}

export const os = rawOs.$context<RequestContext>()
