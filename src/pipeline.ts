import { randomUUID } from 'crypto';
import { ExtractionError, TranscriptionError, TranslationError } from './types/errors.js';
import { distinctLanguages, type LanguageCode } from './types/languages.js';
import type { AudioFormat, AudioPayload, UploadedVideo } from './types/media.js';
import type {
  FailableStage,
  MediaExtractor,
  PipelineOutcome,
  StageError,
  Transcriber,
  Transcript,
  TranslationOutcome,
  Translator,
} from './types/pipeline.js';
import { PipelineSession, type TransitionListener } from './session.js';
import { createLogger } from './logger.js';

export interface PipelineStages {
  extractor: MediaExtractor;
  transcriber: Transcriber;
  translator: Translator;
}

export interface RunOptions {
  runId?: string;
  format?: AudioFormat;
  signal?: AbortSignal;
  onTransition?: TransitionListener;
}

const logger = createLogger('pipeline');

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function asExtractionError(error: unknown): ExtractionError {
  return error instanceof ExtractionError
    ? error
    : new ExtractionError(messageOf(error), 'TOOL_FAILED', { cause: error });
}

function asTranscriptionError(error: unknown): TranscriptionError {
  return error instanceof TranscriptionError
    ? error
    : new TranscriptionError(messageOf(error), 'PROVIDER_ERROR', { cause: error });
}

function asTranslationError(error: unknown, language: LanguageCode): TranslationError {
  return error instanceof TranslationError
    ? error
    : new TranslationError(messageOf(error), language, 'PROVIDER_ERROR', { cause: error });
}

/**
 * Extract -> transcribe -> translate, one run per call.
 *
 * Extraction and transcription failures end the run; a translation failure
 * only marks its own language. Translations run concurrently and come back
 * in the order the languages were requested.
 */
export class VideoTranslationPipeline {
  constructor(private readonly stages: PipelineStages) {}

  async run(video: UploadedVideo, languages: readonly LanguageCode[], options: RunOptions = {}): Promise<PipelineOutcome> {
    const { signal } = options;
    const targets = distinctLanguages(languages);
    const session = new PipelineSession(options.runId ?? randomUUID(), options.onTransition);

    logger.info('Starting run', { runId: session.runId, video: video.filename, languages: targets });

    await session.transition({ stage: 'extracting' });
    let audio: AudioPayload;
    try {
      audio = await this.stages.extractor.extract(video, { format: options.format, signal });
    } catch (error) {
      return this.fail(session, 'extracting', asExtractionError(error));
    }

    await session.transition({ stage: 'transcribing' });
    let transcript: Transcript;
    try {
      transcript = await this.stages.transcriber.transcribe(audio, { signal });
    } catch (error) {
      return this.fail(session, 'transcribing', asTranscriptionError(error));
    }

    const total = targets.length;
    await session.transition({ stage: 'translating', completed: 0, total });

    let completed = 0;
    const translations = await Promise.all(targets.map(async (language): Promise<TranslationOutcome> => {
      let outcome: TranslationOutcome;
      try {
        const result = await this.stages.translator.translate({ transcript, language }, { signal });
        outcome = { status: 'fulfilled', language, text: result.text };
      } catch (error) {
        outcome = { status: 'failed', language, error: asTranslationError(error, language) };
      }
      completed += 1;
      await session.transition({ stage: 'translating', completed, total });
      return outcome;
    }));

    if (signal?.aborted) {
      return this.fail(session, 'translating', new TranslationError('Translation cancelled', targets.join(','), 'CANCELLED'));
    }

    await session.transition({ stage: 'done' });
    const failed = translations.filter(outcome => outcome.status === 'failed').map(outcome => outcome.language);
    logger.info('Run finished', { runId: session.runId, elapsedMs: session.elapsedMs(), failedLanguages: failed });

    return {
      status: 'done',
      runId: session.runId,
      transcript,
      translations,
      elapsedMs: session.elapsedMs(),
    };
  }

  private async fail(session: PipelineSession, stage: FailableStage, error: StageError): Promise<PipelineOutcome> {
    await session.transition({ stage: 'failed', failedStage: stage, error });
    logger.error('Run failed', { runId: session.runId, stage, code: error.code, message: error.message });
    return {
      status: 'failed',
      runId: session.runId,
      stage,
      error,
      elapsedMs: session.elapsedMs(),
    };
  }
}
