import OpenAI from 'openai'
import { ServiceError, errorMessage } from '../lib/errors'
import type { TranslationRequest, TranslationService } from './translation'

export interface OpenAITranslationOptions {
  model: string
  apiKey?: string
  baseUrl?: string
  /** Preconfigured client (tests, custom fetch). */
  client?: OpenAI
}

function systemPrompt(request: TranslationRequest): string {
  if (request.mode === 'html') {
    return `Translate the following HTML to ${request.targetLanguage}, keeping every HTML tag unchanged. The text inside each element should stay close to the original length. Output only the translation.`
  }
  return `Translate the following ${request.lineCount} subtitle lines to ${request.targetLanguage}.

CRITICAL REQUIREMENTS:
- Return EXACTLY ${request.lineCount} lines, no more, no less
- Format: "1. translated text" (one per line, same numbering as the input)
- Do NOT merge, split or skip lines
- Do NOT add explanations, comments, or extra text`
}

/**
 * Chat-completions translation backend (OpenAI or any compatible base URL).
 */
export class OpenAITranslationService implements TranslationService {
  private readonly client: OpenAI
  private readonly model: string

  constructor(options: OpenAITranslationOptions) {
    this.client = options.client ?? new OpenAI({ apiKey: options.apiKey, baseURL: options.baseUrl })
    this.model = options.model
  }

  async translate(request: TranslationRequest, signal?: AbortSignal): Promise<string> {
    try {
      const completion = await this.client.chat.completions.create(
        {
          model: this.model,
          temperature: 0,
          messages: [
            { role: 'system', content: systemPrompt(request) },
            { role: 'user', content: request.payload },
          ],
        },
        { signal }
      )
      return completion.choices[0]?.message?.content ?? ''
    } catch (err) {
      throw new ServiceError('translation', `chat completion failed: ${errorMessage(err)}`, { cause: err })
    }
  }
}
