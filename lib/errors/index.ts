/**
 * Error taxonomy for pipeline stages.
 *
 * Input validation happens in the oRPC layer and never produces one of these;
 * everything thrown by a stage is caught at the stage boundary and recorded on
 * the job as its terminal message.
 */

export type PipelineErrorKind =
	| 'content_unavailable'
	| 'network'
	| 'upstream'
	| 'configuration'
	| 'internal'

export class PipelineError extends Error {
	readonly kind: PipelineErrorKind

	constructor(kind: PipelineErrorKind, message: string, options?: { cause?: unknown }) {
		super(message, options)
		this.name = 'PipelineError'
		this.kind = kind
	}
}

/** Private, removed, region-blocked or age-restricted video. */
export class ContentUnavailableError extends PipelineError {
	constructor(message: string, options?: { cause?: unknown }) {
		super('content_unavailable', message, options)
		this.name = 'ContentUnavailableError'
	}
}

export class NetworkError extends PipelineError {
	constructor(message: string, options?: { cause?: unknown }) {
		super('network', message, options)
		this.name = 'NetworkError'
	}
}

export class UpstreamApiError extends PipelineError {
	readonly service: string
	readonly status?: number

	constructor(
		service: string,
		message: string,
		options?: { status?: number; cause?: unknown },
	) {
		super('upstream', message, { cause: options?.cause })
		this.name = 'UpstreamApiError'
		this.service = service
		this.status = options?.status
	}
}

export class ConfigurationError extends PipelineError {
	constructor(message: string) {
		super('configuration', message)
		this.name = 'ConfigurationError'
	}
}

export function errorKind(error: unknown): PipelineErrorKind {
	return error instanceof PipelineError ? error.kind : 'internal'
}

export function errorMessage(error: unknown): string {
	if (error instanceof Error) return error.message
	return String(error)
}
