import path from "path";
import { pathToFileURL } from "url";
import { fileExists, mkdir, readBinary, readDir, readFile, readJSON, removeDir, rename, writeFile, writeJSON } from "./fs.js";
import { RunNotFoundError } from "./types/errors.js";
import type { LanguageCode } from "./types/languages.js";
import type { UploadedVideo } from "./types/media.js";
import type { PipelineOutcome } from "./types/pipeline.js";
import { RunManifest, RunManifestSchema, SavedTranslation } from "./types/run.js";
import { fileHash, fileStem, isInsideFolder } from "./util.js";
import { createLogger } from "./logger.js";

export const MANIFEST_FILE = 'run.json';

export type FinishedRun = Extract<PipelineOutcome, { status: 'done' }>;

export interface SavedRun {
  folder: string;
  manifest: RunManifest;
}

const logger = createLogger('io');

// Upload boundary: local path or base64 content

export async function readUploadedVideo(filePath: string): Promise<UploadedVideo> {
  const data = await readBinary(filePath);
  const filename = path.basename(filePath);
  return { filename, container: path.extname(filename).slice(1), data };
}

export function decodeUploadedVideo(filename: string, contentBase64: string): UploadedVideo {
  const name = path.basename(filename);
  return {
    filename: name,
    container: path.extname(name).slice(1),
    data: Buffer.from(contentBase64, 'base64'),
  };
}

// Run output files

export function runFolder(outputFolder: string, runId: string): string {
  return path.join(outputFolder, runId);
}

export function transcriptFileName(stem: string): string {
  return `${stem}_transcript.txt`;
}

export function translationFileName(stem: string, language: LanguageCode): string {
  return `${stem}_${language}_translation.txt`;
}

export function fileUri(filePath: string): string {
  return pathToFileURL(path.resolve(filePath)).href;
}

// Dot-prefixed folders are never listed or served
function isHiddenEntry(name: string): boolean {
  return name.startsWith('.');
}

/**
 * Writes the transcript, every fulfilled translation and the manifest of a
 * finished run. Files go to a hidden staging folder that is renamed into
 * place once the manifest is written; on any failure the staging folder is
 * removed and nothing of the run remains.
 */
export async function writeRunOutputs(outputFolder: string, video: UploadedVideo, run: FinishedRun): Promise<SavedRun> {
  const folder = runFolder(outputFolder, run.runId);
  const staging = path.join(outputFolder, `.staging-${run.runId}`);
  await mkdir(staging);

  try {
    const stem = fileStem(video.filename);
    const transcriptFile = transcriptFileName(stem);
    await writeFile(path.join(staging, transcriptFile), run.transcript.text);

    const translations: SavedTranslation[] = [];
    for (const outcome of run.translations) {
      if (outcome.status === 'failed') {
        translations.push({
          language: outcome.language,
          status: 'failed',
          error: { code: outcome.error.code, message: outcome.error.message },
        });
        continue;
      }
      const file = translationFileName(stem, outcome.language);
      await writeFile(path.join(staging, file), outcome.text);
      translations.push({ language: outcome.language, status: 'fulfilled', file });
    }

    const manifest: RunManifest = {
      run_id: run.runId,
      source_filename: video.filename,
      source_hash: fileHash(video.data),
      created_at: new Date().toISOString(),
      elapsed_ms: Math.round(run.elapsedMs),
      transcript_file: transcriptFile,
      translations,
    };
    await writeJSON(path.join(staging, MANIFEST_FILE), manifest, RunManifestSchema);

    if (await fileExists(folder)) {
      await removeDir(folder);
    }
    await rename(staging, folder);

    logger.info(`Run saved to ${folder}`, { runId: run.runId, files: translations.length + 1 });
    return { folder, manifest };
  } catch (error) {
    try {
      await removeDir(staging);
    } catch (cleanupError) {
      logger.warn(`Failed to remove staging folder ${staging}`, { error: cleanupError });
    }
    throw error;
  }
}

export async function readRunManifest(outputFolder: string, runId: string): Promise<RunManifest> {
  const folder = runFolder(outputFolder, runId);
  const manifestPath = path.join(folder, MANIFEST_FILE);

  if (isHiddenEntry(runId) || !isInsideFolder(outputFolder, folder) || !(await fileExists(manifestPath))) {
    throw new RunNotFoundError(runId);
  }

  return readJSON(manifestPath, RunManifestSchema);
}

// Transcript when no language is given, otherwise that language's translation
export async function readRunText(outputFolder: string, runId: string, language?: LanguageCode): Promise<string> {
  const manifest = await readRunManifest(outputFolder, runId);

  if (language === undefined) {
    return readFile(path.join(runFolder(outputFolder, runId), manifest.transcript_file));
  }

  const translation = manifest.translations.find(entry => entry.language === language);
  if (!translation || translation.status !== 'fulfilled') {
    throw new RunNotFoundError(runId, language);
  }
  return readFile(path.join(runFolder(outputFolder, runId), translation.file));
}

export async function listSavedRuns(outputFolder: string): Promise<SavedRun[]> {
  if (!(await fileExists(outputFolder))) {
    return [];
  }

  const runs: SavedRun[] = [];
  for (const entry of (await readDir(outputFolder)).sort()) {
    if (isHiddenEntry(entry)) continue;
    const folder = runFolder(outputFolder, entry);
    if (!(await fileExists(path.join(folder, MANIFEST_FILE)))) continue;

    try {
      runs.push({ folder, manifest: await readRunManifest(outputFolder, entry) });
    } catch (error) {
      logger.warn(`Skipping unreadable run ${entry}`, { error });
    }
  }
  return runs;
}
