import type OpenAI from 'openai';
import { TranslationError } from './types/errors.js';
import { languageName, type LanguageCode } from './types/languages.js';
import type { CallOptions, TranslationRequest, TranslationResult, Translator } from './types/pipeline.js';
import { classifyProviderError } from './provider.js';
import { createLogger } from './logger.js';

const logger = createLogger('translator');

export function translationInstruction(language: LanguageCode): string {
  return `Translate the following text to ${languageName(language)}.`;
}

export class OpenAITranslator implements Translator {
  constructor(
    private readonly client: OpenAI,
    private readonly model: string,
  ) {}

  async translate({ transcript, language }: TranslationRequest, options: CallOptions = {}): Promise<TranslationResult> {
    let content: string;
    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: [
            { role: 'system', content: translationInstruction(language) },
            { role: 'user', content: transcript.text },
          ],
        },
        { signal: options.signal }
      );
      content = response.choices[0]?.message.content?.trim() ?? '';
    } catch (error) {
      const failure = classifyProviderError(error, options.signal);
      logger.error('Translation request failed', { language, code: failure.code, status: failure.status });
      throw new TranslationError(
        `${languageName(language)} translation failed: ${failure.message}`,
        language,
        failure.code,
        { status: failure.status, cause: error }
      );
    }

    if (!content) {
      throw new TranslationError(`Provider returned an empty ${languageName(language)} translation`, language, 'EMPTY_TRANSLATION');
    }

    return { language, text: content };
  }
}
