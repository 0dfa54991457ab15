import type OpenAI from 'openai';
import { toFile } from 'openai';
import { TranscriptionError } from './types/errors.js';
import type { AudioFormat, AudioPayload } from './types/media.js';
import type { CallOptions, Transcriber, Transcript } from './types/pipeline.js';
import { classifyProviderError } from './provider.js';
import { createLogger } from './logger.js';

// Upload limit of the hosted speech-to-text endpoint
export const MAX_AUDIO_BYTES = 25 * 1024 * 1024;

const AUDIO_MIME_TYPES: Record<AudioFormat, string> = {
  mp3: 'audio/mpeg',
  wav: 'audio/wav',
  ogg: 'audio/ogg',
};

const logger = createLogger('transcriber');

export class OpenAITranscriber implements Transcriber {
  constructor(
    private readonly client: OpenAI,
    private readonly model: string,
  ) {}

  async transcribe(audio: AudioPayload, options: CallOptions = {}): Promise<Transcript> {
    if (audio.data.byteLength > MAX_AUDIO_BYTES) {
      const sizeMb = (audio.data.byteLength / 1024 / 1024).toFixed(1);
      throw new TranscriptionError(
        `Audio size (${sizeMb}MB) exceeds maximum allowed size (${MAX_AUDIO_BYTES / 1024 / 1024}MB)`,
        'AUDIO_TOO_LARGE'
      );
    }

    let text: string;
    try {
      const file = await toFile(audio.data, audio.filename, { type: AUDIO_MIME_TYPES[audio.format] });
      const response = await this.client.audio.transcriptions.create(
        { file, model: this.model, response_format: 'json' },
        { signal: options.signal }
      );
      text = response.text.trim();
    } catch (error) {
      const failure = classifyProviderError(error, options.signal);
      logger.error('Transcription request failed', { code: failure.code, status: failure.status });
      throw new TranscriptionError(failure.message, failure.code, { status: failure.status, cause: error });
    }

    if (!text) {
      throw new TranscriptionError('Provider returned an empty transcript', 'EMPTY_TRANSCRIPT');
    }

    logger.debug('Transcription received', { model: this.model, length: text.length });
    return { text };
  }
}
