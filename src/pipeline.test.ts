import { describe, expect, it, vi } from 'vitest';
import { VideoTranslationPipeline } from './pipeline.js';
import { describeState } from './session.js';
import { ExtractionError, TranscriptionError, TranslationError } from './types/errors.js';
import type { LanguageCode } from './types/languages.js';
import type { AudioPayload, UploadedVideo } from './types/media.js';
import type {
  CallOptions,
  ExtractOptions,
  MediaExtractor,
  PipelineTransition,
  Transcriber,
  Transcript,
  TranslationRequest,
  TranslationResult,
  Translator,
} from './types/pipeline.js';

const video: UploadedVideo = { filename: 'clip.mp4', container: 'mp4', data: Buffer.from('video') };
const audio: AudioPayload = { filename: 'clip.mp3', format: 'mp3', data: Buffer.from('audio') };

const delay = (ms: number) => new Promise(resolve => setTimeout(resolve, ms));

function stages(overrides: {
  extract?: (video: UploadedVideo, options?: ExtractOptions) => Promise<AudioPayload>;
  transcribe?: (audio: AudioPayload, options?: CallOptions) => Promise<Transcript>;
  translate?: (request: TranslationRequest, options?: CallOptions) => Promise<TranslationResult>;
} = {}) {
  const extract = vi.fn<MediaExtractor['extract']>(overrides.extract ?? (async () => audio));
  const transcribe = vi.fn<Transcriber['transcribe']>(overrides.transcribe ?? (async () => ({ text: 'hello there' })));
  const translate = vi.fn<Translator['translate']>(overrides.translate ?? (async ({ language, transcript }: TranslationRequest) => ({
    language,
    text: `[${language}] ${transcript.text}`,
  })));
  const pipeline = new VideoTranslationPipeline({
    extractor: { extract },
    transcriber: { transcribe },
    translator: { translate },
  });
  return { pipeline, extract, transcribe, translate };
}

describe('VideoTranslationPipeline', () => {
  it('returns one transcript and translations in requested order regardless of completion order', async () => {
    const latency: Partial<Record<LanguageCode, number>> = { fr: 30, de: 1 };
    const { pipeline } = stages({
      translate: async ({ language, transcript }) => {
        await delay(latency[language] ?? 0);
        return { language, text: `[${language}] ${transcript.text}` };
      },
    });

    const outcome = await pipeline.run(video, ['fr', 'de'], { runId: 'run-order' });

    expect(outcome).toMatchObject({
      status: 'done',
      runId: 'run-order',
      transcript: { text: 'hello there' },
      translations: [
        { status: 'fulfilled', language: 'fr', text: '[fr] hello there' },
        { status: 'fulfilled', language: 'de', text: '[de] hello there' },
      ],
    });
  });

  it('moves through every stage in order', async () => {
    const transitions: PipelineTransition[] = [];
    const { pipeline } = stages();

    await pipeline.run(video, ['fr', 'de'], { onTransition: transition => { transitions.push(transition); } });

    expect(transitions.map(t => describeState(t.to))).toEqual([
      'extracting',
      'transcribing',
      'translating(0/2)',
      'translating(1/2)',
      'translating(2/2)',
      'done',
    ]);
  });

  it('passes the audio format and signal to the extractor', async () => {
    const { pipeline, extract } = stages();
    const controller = new AbortController();

    await pipeline.run(video, ['it'], { format: 'wav', signal: controller.signal });

    expect(extract).toHaveBeenCalledWith(video, { format: 'wav', signal: controller.signal });
  });

  it('stops at extraction when the video has no audio', async () => {
    const error = new ExtractionError('No audio stream found in the uploaded video', 'NO_AUDIO_STREAM');
    const { pipeline, transcribe, translate } = stages({ extract: async () => { throw error; } });

    const outcome = await pipeline.run(video, ['fr']);

    expect(outcome).toMatchObject({ status: 'failed', stage: 'extracting', error });
    expect(transcribe).not.toHaveBeenCalled();
    expect(translate).not.toHaveBeenCalled();
  });

  it('makes no translator calls when transcription fails', async () => {
    const error = new TranscriptionError('Provider responded with 500', 'PROVIDER_ERROR', { status: 500 });
    const { pipeline, translate } = stages({ transcribe: async () => { throw error; } });

    const outcome = await pipeline.run(video, ['fr', 'de']);

    expect(outcome.status).toBe('failed');
    if (outcome.status !== 'failed') return;
    expect(outcome.stage).toBe('transcribing');
    expect(outcome.error).toBe(error);
    expect(translate).not.toHaveBeenCalled();
  });

  it('wraps unexpected stage errors in the stage error type', async () => {
    const { pipeline } = stages({ transcribe: async () => { throw new Error('socket hang up'); } });

    const outcome = await pipeline.run(video, ['fr']);

    if (outcome.status !== 'failed') throw new Error('expected a failed run');
    expect(outcome.error).toBeInstanceOf(TranscriptionError);
    expect(outcome.error.message).toBe('socket hang up');
    expect(outcome.error.code).toBe('PROVIDER_ERROR');
  });

  it('isolates a failing language from its siblings', async () => {
    const { pipeline } = stages({
      translate: async ({ language, transcript }) => {
        if (language === 'de') {
          throw new TranslationError('German translation failed', 'de', 'PROVIDER_ERROR', { status: 429 });
        }
        return { language, text: `[${language}] ${transcript.text}` };
      },
    });

    const outcome = await pipeline.run(video, ['fr', 'de', 'es']);

    if (outcome.status !== 'done') throw new Error('expected a finished run');
    expect(outcome.translations.map(t => [t.language, t.status])).toEqual([
      ['fr', 'fulfilled'],
      ['de', 'failed'],
      ['es', 'fulfilled'],
    ]);
    const german = outcome.translations[1];
    expect(german.status === 'failed' && german.error.status).toBe(429);
  });

  it('translates each distinct language once', async () => {
    const { pipeline, translate } = stages();

    const outcome = await pipeline.run(video, ['fr', 'de', 'fr']);

    expect(translate).toHaveBeenCalledTimes(2);
    if (outcome.status !== 'done') throw new Error('expected a finished run');
    expect(outcome.translations.map(t => t.language)).toEqual(['fr', 'de']);
  });

  it('fails the translating stage when cancelled mid-way', async () => {
    const controller = new AbortController();
    const { pipeline } = stages({
      translate: async ({ language }) => {
        controller.abort();
        throw new TranslationError('Request was cancelled', language, 'CANCELLED');
      },
    });

    const outcome = await pipeline.run(video, ['fr', 'de'], { signal: controller.signal });

    expect(outcome).toMatchObject({ status: 'failed', stage: 'translating' });
    if (outcome.status !== 'failed') return;
    expect(outcome.error.code).toBe('CANCELLED');
  });

  it('survives repeated runs on the same input', async () => {
    const { pipeline, extract } = stages();

    const first = await pipeline.run(video, ['en']);
    const second = await pipeline.run(video, ['en']);

    expect(first.status).toBe('done');
    expect(second.status).toBe('done');
    expect(first.runId).not.toBe(second.runId);
    expect(extract).toHaveBeenCalledTimes(2);
  });
});
