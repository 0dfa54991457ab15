import { createHash, randomUUID } from 'crypto';
import path from 'path';
import type { UploadedVideo } from './types/media.js';

// Keeps letters, digits, spaces, dots and underscores
export function sanitizeFilename(filename: string): string {
  return Array.from(filename)
    .filter(char => /[\p{L}\p{N} ._]/u.test(char))
    .join('')
    .trimEnd();
}

export function fileHash(content: Buffer): string {
  return createHash('md5').update(content).digest('hex');
}

export function fileStem(filename: string): string {
  const stem = sanitizeFilename(path.parse(filename).name).trim().replace(/ +/g, '_');
  return stem || 'video';
}

// Name and content prefix, then a per-run suffix: concurrent runs of one video never share a folder
export function runIdFor(video: UploadedVideo, suffix: string = randomUUID().slice(0, 8)): string {
  return `${fileStem(video.filename)}-${fileHash(video.data).slice(0, 8)}-${suffix}`;
}

export function isInsideFolder(folder: string, filePath: string): boolean {
  const relative = path.relative(path.resolve(folder), path.resolve(filePath));
  return relative !== '' && !relative.startsWith('..') && !path.isAbsolute(relative);
}
