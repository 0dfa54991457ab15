import { createLogger } from '../logger.js';
import type { StageError } from './pipeline.js';

// Interface for execFile error with proper typing
export interface ExecError extends Error {
  code?: string | number;
  stderr?: string;
  stdout?: string;
  killed?: boolean;
  signal?: NodeJS.Signals | null;
}

// Interface for Node.js file system errors
export interface FSError extends Error {
  code?: string;
  errno?: number;
  path?: string;
}

export type ExtractionErrorCode =
  | 'UNSUPPORTED_CONTAINER'
  | 'EMPTY_INPUT'
  | 'TOOL_NOT_FOUND'
  | 'NO_AUDIO_STREAM'
  | 'TOOL_FAILED'
  | 'EMPTY_OUTPUT'
  | 'IO_ERROR'
  | 'CANCELLED';

export type ProviderErrorCode = 'PROVIDER_ERROR' | 'TIMEOUT' | 'CANCELLED';

export type TranscriptionErrorCode = ProviderErrorCode | 'AUDIO_TOO_LARGE' | 'EMPTY_TRANSCRIPT';

export type TranslationErrorCode = ProviderErrorCode | 'EMPTY_TRANSLATION';

// Missing or invalid environment, fatal at startup
export class ConfigurationError extends Error {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }

  toJSON(): string {
    return JSON.stringify({
      error: 'configuration_error',
      issues: this.issues,
      message: this.message
    }, null, 2);
  }
}

// Simple error class for file system operations
export class FileSystemError extends Error {
  public readonly path: string;
  public readonly operation: string;
  public readonly code?: string;

  constructor(message: string, operation: string, filePath: string, code?: string) {
    super(message);
    this.name = 'FileSystemError';
    this.operation = operation;
    this.path = filePath;
    this.code = code;
  }

  toJSON(): string {
    return JSON.stringify({
      error: 'file_system_error',
      operation: this.operation,
      path: this.path,
      code: this.code,
      message: this.message
    }, null, 2);
  }
}

// Wraps ffmpeg/ffprobe failures and rejected inputs
export class ExtractionError extends Error {
  public readonly code: ExtractionErrorCode;
  public readonly exitCode?: number | string;
  public readonly stderr: string;

  constructor(message: string, code: ExtractionErrorCode, options: { exitCode?: number | string; stderr?: string; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'ExtractionError';
    this.code = code;
    this.exitCode = options.exitCode;
    this.stderr = options.stderr ?? '';
  }

  toJSON(): string {
    return JSON.stringify({
      error: 'extraction_failed',
      code: this.code,
      exit_code: this.exitCode,
      message: this.message,
      stderr: this.stderr
    }, null, 2);
  }
}

export class TranscriptionError extends Error {
  public readonly code: TranscriptionErrorCode;
  public readonly status?: number;

  constructor(message: string, code: TranscriptionErrorCode, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'TranscriptionError';
    this.code = code;
    this.status = options.status;
  }

  toJSON(): string {
    return JSON.stringify({
      error: 'transcription_failed',
      code: this.code,
      status: this.status,
      message: this.message
    }, null, 2);
  }
}

// Failure for a single target language; sibling languages are unaffected
export class TranslationError extends Error {
  public readonly code: TranslationErrorCode;
  public readonly language: string;
  public readonly status?: number;

  constructor(message: string, language: string, code: TranslationErrorCode, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'TranslationError';
    this.code = code;
    this.language = language;
    this.status = options.status;
  }

  toJSON(): string {
    return JSON.stringify({
      error: 'translation_failed',
      code: this.code,
      language: this.language,
      status: this.status,
      message: this.message
    }, null, 2);
  }
}

// Simple error for missing saved runs
export class RunNotFoundError extends Error {
  public readonly runId: string;
  public readonly language?: string;

  constructor(runId: string, language?: string) {
    super(language
      ? `No ${language} translation found for run: ${runId}`
      : `No saved run found for ID: ${runId}`);
    this.name = 'RunNotFoundError';
    this.runId = runId;
    this.language = language;
  }

  toJSON(): string {
    return JSON.stringify({
      error: 'run_not_found',
      run_id: this.runId,
      language: this.language,
      message: this.message,
      suggested_action: 'Use translate_video tool to create the translations for this video first'
    }, null, 2);
  }
}

// A run that ended in failed(stage); nothing was written for it
export class PipelineFailedError extends Error {
  public readonly stage: string;
  public readonly runId: string;
  public readonly code: StageError['code'];

  constructor(stage: string, runId: string, cause: StageError) {
    super(`Pipeline failed while ${stage}: ${cause.message}`, { cause });
    this.name = 'PipelineFailedError';
    this.stage = stage;
    this.runId = runId;
    this.code = cause.code;
  }

  toJSON(): string {
    return JSON.stringify({
      error: 'pipeline_failed',
      stage: this.stage,
      run_id: this.runId,
      code: this.code,
      message: this.message
    }, null, 2);
  }
}

type SerializableError =
  | ConfigurationError
  | FileSystemError
  | ExtractionError
  | TranscriptionError
  | TranslationError
  | RunNotFoundError
  | PipelineFailedError;

function isSerializableError(error: unknown): error is SerializableError {
  return error instanceof ConfigurationError
    || error instanceof FileSystemError
    || error instanceof ExtractionError
    || error instanceof TranscriptionError
    || error instanceof TranslationError
    || error instanceof RunNotFoundError
    || error instanceof PipelineFailedError;
}

const logger = createLogger('errors');

// Handle any error and convert to proper MCP error format
export function handleError(error: unknown): never {
  if (isSerializableError(error)) {
    logger.error(`${error.name}: ${error.message}`);
    throw new Error(error.toJSON());
  }

  // Handle any other error
  const errorMessage = error instanceof Error ? error.message : 'Unknown error occurred';
  logger.error('Unhandled error', { error });
  throw new Error(JSON.stringify({ error: 'unknown', message: errorMessage }, null, 2));
}
