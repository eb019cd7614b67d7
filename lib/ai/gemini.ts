import { createGoogleGenerativeAI } from '@ai-sdk/google'
import type { LanguageModel } from 'ai'
import { ConfigurationError } from '~/lib/errors'

export interface GeminiModelOptions {
	apiKey?: string
	model: string
	/** Ground answers with Google Search results (product names, prices, links). */
	searchGrounding?: boolean
}

export function createGeminiModel(opts: GeminiModelOptions): LanguageModel {
	const apiKey = opts.apiKey?.trim()
	if (!apiKey) {
		throw new ConfigurationError('GEMINI_API_KEY is not set')
	}
	const google = createGoogleGenerativeAI({ apiKey })
	return google(opts.model, { useSearchGrounding: opts.searchGrounding ?? false })
}
