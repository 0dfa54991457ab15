import os from 'os';
import z from 'zod';
import { ConfigurationError } from './types/errors.js';
import { LOG_LEVELS, type LogLevel } from './logger.js';

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const EnvSchema = z.object({
  OPENAI_API_KEY: z.string({ required_error: 'is required' }).trim().min(1, 'is required'),
  OPENAI_BASE_URL: z.string().url().optional(),
  TRANSCRIPTION_MODEL: z.string().min(1).default('whisper-1'),
  TRANSLATION_MODEL: z.string().min(1).default('gpt-4'),
  OUTPUT_FOLDER: z.string().min(1).default('./translations'),
  TEMP_FOLDER: z.string().min(1).optional(),
  FFMPEG_PATH: z.string().min(1).default('ffmpeg'),
  FFPROBE_PATH: z.string().min(1).default('ffprobe'),
  FFMPEG_TIMEOUT_MS: positiveInt(300_000),
  PROVIDER_TIMEOUT_MS: positiveInt(600_000),
  PROVIDER_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(2),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

export interface AppConfig {
  readonly openaiApiKey: string;
  readonly openaiBaseUrl?: string;
  readonly transcriptionModel: string;
  readonly translationModel: string;
  readonly outputFolder: string;
  readonly tempFolder: string;
  readonly ffmpegPath: string;
  readonly ffprobePath: string;
  readonly ffmpegTimeoutMs: number;
  readonly providerTimeoutMs: number;
  readonly providerMaxRetries: number;
  readonly logLevel: LogLevel;
}

/**
 * Reads and validates the process environment. Empty strings count as unset
 * so a blank line in `.env` falls back to the default.
 *
 * @throws ConfigurationError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );

  const result = EnvSchema.safeParse(present);
  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map(issue => `${issue.path.join('.')} ${issue.message}`)
    );
  }

  const parsed = result.data;
  return Object.freeze({
    openaiApiKey: parsed.OPENAI_API_KEY,
    openaiBaseUrl: parsed.OPENAI_BASE_URL,
    transcriptionModel: parsed.TRANSCRIPTION_MODEL,
    translationModel: parsed.TRANSLATION_MODEL,
    outputFolder: parsed.OUTPUT_FOLDER,
    tempFolder: parsed.TEMP_FOLDER ?? os.tmpdir(),
    ffmpegPath: parsed.FFMPEG_PATH,
    ffprobePath: parsed.FFPROBE_PATH,
    ffmpegTimeoutMs: parsed.FFMPEG_TIMEOUT_MS,
    providerTimeoutMs: parsed.PROVIDER_TIMEOUT_MS,
    providerMaxRetries: parsed.PROVIDER_MAX_RETRIES,
    logLevel: parsed.LOG_LEVEL,
  });
}
