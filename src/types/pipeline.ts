import type { ExtractionError, TranscriptionError, TranslationError } from './errors.js';
import type { LanguageCode } from './languages.js';
import type { AudioFormat, AudioPayload, UploadedVideo } from './media.js';

export interface Transcript {
  readonly text: string;
}

export interface TranslationRequest {
  transcript: Transcript;
  language: LanguageCode;
}

export interface TranslationResult {
  language: LanguageCode;
  text: string;
}

export type TranslationOutcome =
  | { status: 'fulfilled'; language: LanguageCode; text: string }
  | { status: 'failed'; language: LanguageCode; error: TranslationError };

export interface CallOptions {
  signal?: AbortSignal;
}

export interface ExtractOptions extends CallOptions {
  format?: AudioFormat;
}

// Stage contracts the orchestrator depends on

export interface MediaExtractor {
  extract(video: UploadedVideo, options?: ExtractOptions): Promise<AudioPayload>;
}

export interface Transcriber {
  transcribe(audio: AudioPayload, options?: CallOptions): Promise<Transcript>;
}

export interface Translator {
  translate(request: TranslationRequest, options?: CallOptions): Promise<TranslationResult>;
}

export type FailableStage = 'extracting' | 'transcribing' | 'translating';

export type StageError = ExtractionError | TranscriptionError | TranslationError;

export type PipelineState =
  | { stage: 'idle' }
  | { stage: 'extracting' }
  | { stage: 'transcribing' }
  | { stage: 'translating'; completed: number; total: number }
  | { stage: 'done' }
  | { stage: 'failed'; failedStage: FailableStage; error: StageError };

export type PipelineStageName = PipelineState['stage'];

export interface PipelineTransition {
  from: PipelineState;
  to: PipelineState;
  at: string;
}

export type PipelineOutcome =
  | {
    status: 'done';
    runId: string;
    transcript: Transcript;
    translations: TranslationOutcome[];
    elapsedMs: number;
  }
  | {
    status: 'failed';
    runId: string;
    stage: FailableStage;
    error: StageError;
    elapsedMs: number;
  };
