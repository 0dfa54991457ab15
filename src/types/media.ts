export const VIDEO_CONTAINERS = ['mp4', 'mov', 'avi', 'mkv'] as const;
export type VideoContainer = typeof VIDEO_CONTAINERS[number];

export const AUDIO_FORMATS = ['mp3', 'wav', 'ogg'] as const;
export type AudioFormat = typeof AUDIO_FORMATS[number];

// Encoder passed to ffmpeg's -acodec for each output format
export const AUDIO_CODECS: Record<AudioFormat, string> = {
  mp3: 'libmp3lame',
  wav: 'pcm_s16le',
  ogg: 'libvorbis',
};

export interface UploadedVideo {
  filename: string;
  // Declared container, usually the file extension; checked by the extractor
  container: string;
  data: Buffer;
}

export interface AudioPayload {
  filename: string;
  format: AudioFormat;
  data: Buffer;
}

export function isVideoContainer(value: string): value is VideoContainer {
  return VIDEO_CONTAINERS.some(container => container === value);
}
