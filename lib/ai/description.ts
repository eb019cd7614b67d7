import { APICallError, generateText, type LanguageModel } from 'ai'
import { buildDescriptionPrompt, type ChannelId } from '~/lib/channels/profiles'
import type { TranscriptMode } from '~/lib/config/env'
import { PipelineError, UpstreamApiError, errorMessage } from '~/lib/errors'
import type { DescriptionGenerator } from '~/lib/job/types'
import { logger } from '~/lib/logger'
import { srtToPlainText } from '~/lib/subtitle/utils/srt'

const DESCRIPTION_TAG = /<video_description>([\s\S]*?)<\/video_description>/i

/**
 * Keep only the text inside `<video_description>` when the model used the tag.
 */
export function extractVideoDescription(text: string): string {
	const match = text.match(DESCRIPTION_TAG)
	return (match ? match[1] : text).trim()
}

export interface GeminiDescriptionOptions {
	/** Called per generation; throws when the key is missing. */
	getModel: () => LanguageModel
	transcriptMode: TranscriptMode
	minSubtitleChars: number
}

export class GeminiDescriptionGenerator implements DescriptionGenerator {
	constructor(private readonly options: GeminiDescriptionOptions) {}

	preflight(): void {
		this.options.getModel()
	}

	async generate(subtitle: string, channel: ChannelId): Promise<string> {
		const length = subtitle.trim().length
		if (length < this.options.minSubtitleChars) {
			throw new PipelineError(
				'internal',
				`Subtitle content is too short (${length} chars). The transcription may be empty or corrupted.`,
			)
		}

		const transcript =
			this.options.transcriptMode === 'srt' ? subtitle : srtToPlainText(subtitle)
		const prompt = buildDescriptionPrompt(channel, transcript)
		logger.debug(
			'generation',
			`[description.prompt] channel=${channel} transcriptChars=${transcript.length} promptChars=${prompt.length}`,
		)

		const model = this.options.getModel()
		try {
			const result = await generateText({ model, prompt })
			logger.info(
				'generation',
				`[description.done] channel=${channel} inputTokens=${result.usage.promptTokens} outputTokens=${result.usage.completionTokens}`,
			)
			return extractVideoDescription(result.text)
		} catch (error) {
			if (APICallError.isInstance(error)) {
				throw new UpstreamApiError('gemini', `Gemini API failed: ${error.message}`, {
					status: error.statusCode,
					cause: error,
				})
			}
			throw new UpstreamApiError('gemini', errorMessage(error), { cause: error })
		}
	}
}
