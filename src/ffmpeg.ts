import { execFile } from "child_process";
import { promisify } from "util";
import { promises as fs } from 'fs';
import path from "path";
import { ExecError, ExtractionError } from "./types/errors.js";
import { AUDIO_CODECS, AudioPayload, UploadedVideo, isVideoContainer } from "./types/media.js";
import type { ExtractOptions, MediaExtractor } from "./types/pipeline.js";
import { createLogger } from "./logger.js";

const execFileAsync = promisify(execFile);

const logger = createLogger('ffmpeg');

export interface CommandOptions {
  timeout: number;
  signal?: AbortSignal;
}

export interface CommandOutput {
  stdout: string;
  stderr: string;
}

export type CommandRunner = (file: string, args: string[], options: CommandOptions) => Promise<CommandOutput>;

export const execFileRunner: CommandRunner = async (file, args, options) => {
  const { stdout, stderr } = await execFileAsync(file, args, {
    timeout: options.timeout,
    signal: options.signal,
    maxBuffer: 16 * 1024 * 1024,
  });
  return { stdout, stderr };
};

export interface FfmpegExtractorOptions {
  ffmpegPath: string;
  ffprobePath: string;
  tempFolder: string;
  timeoutMs: number;
  runner?: CommandRunner;
}

function isExecError(error: unknown): error is ExecError {
  return error instanceof Error;
}

function isAbort(error: unknown, signal?: AbortSignal): boolean {
  return signal?.aborted === true || (error instanceof Error && error.name === 'AbortError');
}

/**
 * Extracts the audio track of an uploaded video with ffprobe + ffmpeg.
 *
 * Every call works inside its own temp directory which is removed on
 * success, failure and cancellation alike.
 */
export class FfmpegExtractor implements MediaExtractor {
  private readonly runner: CommandRunner;

  constructor(private readonly options: FfmpegExtractorOptions) {
    this.runner = options.runner ?? execFileRunner;
  }

  async extract(video: UploadedVideo, options: ExtractOptions = {}): Promise<AudioPayload> {
    const format = options.format ?? 'mp3';
    const { signal } = options;
    const container = video.container.trim().toLowerCase().replace(/^\./, '');

    if (!isVideoContainer(container)) {
      throw new ExtractionError(`Unsupported video container: ${video.container}`, 'UNSUPPORTED_CONTAINER');
    }
    if (video.data.byteLength === 0) {
      throw new ExtractionError(`Uploaded video ${video.filename} is empty`, 'EMPTY_INPUT');
    }
    if (signal?.aborted) {
      throw new ExtractionError('Audio extraction cancelled', 'CANCELLED');
    }

    const workDir = await this.createWorkDir();
    try {
      const inputPath = path.join(workDir, `input.${container}`);
      const outputPath = path.join(workDir, `audio.${format}`);

      await this.writeInput(inputPath, video.data);
      await this.assertAudioStream(inputPath, signal);

      await this.exec(this.options.ffmpegPath, [
        '-hide_banner',
        '-loglevel', 'error',
        '-y',
        '-i', inputPath,
        '-vn',
        '-acodec', AUDIO_CODECS[format],
        outputPath
      ], signal);

      const data = await this.readOutput(outputPath);
      logger.debug('Audio extracted', { video: video.filename, format, bytes: data.byteLength });

      return {
        filename: `${path.parse(video.filename).name || 'audio'}.${format}`,
        format,
        data
      };
    } finally {
      await this.removeWorkDir(workDir);
    }
  }

  private async assertAudioStream(inputPath: string, signal?: AbortSignal): Promise<void> {
    const { stdout } = await this.exec(this.options.ffprobePath, [
      '-v', 'error',
      '-select_streams', 'a',
      '-show_entries', 'stream=index',
      '-of', 'csv=p=0',
      inputPath
    ], signal);

    if (stdout.trim() === '') {
      throw new ExtractionError('No audio stream found in the uploaded video', 'NO_AUDIO_STREAM');
    }
  }

  // Runs a media tool and maps every failure onto ExtractionError
  private async exec(file: string, args: string[], signal?: AbortSignal): Promise<CommandOutput> {
    const tool = path.basename(file);
    try {
      return await this.runner(file, args, { timeout: this.options.timeoutMs, signal });
    } catch (error) {
      if (isAbort(error, signal)) {
        throw new ExtractionError('Audio extraction cancelled', 'CANCELLED', { cause: error });
      }
      if (!isExecError(error)) {
        throw new ExtractionError(`${tool} failed`, 'TOOL_FAILED', { cause: error });
      }
      if (error.code === 'ENOENT') {
        throw new ExtractionError(`${tool} is not installed or not found in PATH`, 'TOOL_NOT_FOUND', { cause: error });
      }

      const stderr = error.stderr ?? '';
      logger.error(`${tool} exited with an error`, { exitCode: error.code, stderr });
      const message = error.killed
        ? `${tool} timed out after ${this.options.timeoutMs}ms`
        : `${tool} exited with code ${error.code ?? 'unknown'}`;
      throw new ExtractionError(message, 'TOOL_FAILED', { exitCode: error.code ?? 'unknown', stderr, cause: error });
    }
  }

  private async createWorkDir(): Promise<string> {
    try {
      return await fs.mkdtemp(path.join(this.options.tempFolder, 'video-translate-'));
    } catch (error) {
      throw new ExtractionError(`Failed to create a temp directory in ${this.options.tempFolder}`, 'IO_ERROR', { cause: error });
    }
  }

  private async writeInput(inputPath: string, data: Buffer): Promise<void> {
    try {
      await fs.writeFile(inputPath, data);
    } catch (error) {
      throw new ExtractionError('Failed to stage the uploaded video', 'IO_ERROR', { cause: error });
    }
  }

  private async readOutput(outputPath: string): Promise<Buffer> {
    let data: Buffer;
    try {
      data = await fs.readFile(outputPath);
    } catch (error) {
      throw new ExtractionError('ffmpeg produced no audio output', 'EMPTY_OUTPUT', { cause: error });
    }
    if (data.byteLength === 0) {
      throw new ExtractionError('ffmpeg produced no audio output', 'EMPTY_OUTPUT');
    }
    return data;
  }

  private async removeWorkDir(workDir: string): Promise<void> {
    try {
      await fs.rm(workDir, { recursive: true, force: true });
    } catch (error) {
      logger.warn('Failed to clean up temporary directory', { workDir, error });
    }
  }
}
