import * as path from "node:path";
import type { TagModel } from "../config/types.js";

/**
 * Audio format classification
 */
export type AudioCompression = "lossless" | "lossy";

export interface AudioFormat {
  extension: string;
  name: string;
  compression: AudioCompression;
  /** Tag container the format carries; decides the key mapping on write */
  tagModel: TagModel;
  description?: string;
}

/**
 * Registry of formats the pipeline can read. Formats with tagModel "none"
 * can be identified and placed but not tagged.
 */
export const AUDIO_FORMATS: AudioFormat[] = [
  {
    extension: ".flac",
    name: "FLAC",
    compression: "lossless",
    tagModel: "vorbis",
    description: "Free Lossless Audio Codec",
  },
  {
    extension: ".wav",
    name: "WAV",
    compression: "lossless",
    tagModel: "none",
    description: "Waveform Audio File Format",
  },
  {
    extension: ".m4a",
    name: "M4A",
    compression: "lossless",
    tagModel: "mp4",
    description: "MPEG-4 Audio (ALAC or AAC)",
  },
  {
    extension: ".mp3",
    name: "MP3",
    compression: "lossy",
    tagModel: "id3v2",
    description: "MPEG Audio Layer III",
  },
  {
    extension: ".ogg",
    name: "OGG",
    compression: "lossy",
    tagModel: "vorbis",
    description: "Ogg Vorbis",
  },
  {
    extension: ".opus",
    name: "Opus",
    compression: "lossy",
    tagModel: "vorbis",
    description: "Opus codec",
  },
];

// Build a map for quick lookups
const FORMAT_MAP = new Map<string, AudioFormat>(
  AUDIO_FORMATS.map((f) => [f.extension.toLowerCase(), f])
);

/**
 * Get all known audio file extensions.
 */
export function getAudioExtensions(): Set<string> {
  return new Set(AUDIO_FORMATS.map((f) => f.extension));
}

/**
 * Check if a file is a known audio format.
 */
export function isKnownAudioFormat(filePath: string): boolean {
  const ext = path.extname(filePath).toLowerCase();
  return FORMAT_MAP.has(ext);
}

/**
 * Get format information for a file.
 * Returns undefined if the format is unknown.
 */
export function getAudioFormat(filePath: string): AudioFormat | undefined {
  const ext = path.extname(filePath).toLowerCase();
  return FORMAT_MAP.get(ext);
}

/**
 * Validate that a file is a known audio format.
 * Throws an error if the format is unknown.
 */
export function validateAudioFormat(filePath: string): AudioFormat {
  const format = getAudioFormat(filePath);
  if (!format) {
    const ext = path.extname(filePath);
    throw new Error(
      `Unknown audio format: ${ext}\n` +
      `File: ${path.basename(filePath)}\n` +
      `Supported formats: ${Array.from(FORMAT_MAP.keys()).join(", ")}`
    );
  }
  return format;
}
