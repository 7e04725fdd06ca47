import * as path from "node:path";
import { parseFile } from "music-metadata";
import type { AudioFileDescriptor, TagModel } from "../config/types.js";
import { canonicalKeyFor } from "../apply/tag-map.js";
import { getAudioFormat, validateAudioFormat } from "./formats.js";

/** music-metadata tag-type names that belong to each tag model */
const NATIVE_TAG_TYPES: Record<TagModel, string[]> = {
  vorbis: ["vorbis"],
  id3v2: ["ID3v2.4", "ID3v2.3", "ID3v2.2", "ID3v1"],
  mp4: ["iTunes"],
  none: [],
};

/**
 * Flatten a native tag value to a string. Comment frames carry an object
 * with a text field; track atoms may carry { no, of }.
 */
export function nativeValueToString(value: unknown): string | undefined {
  if (typeof value === "string") return value;
  if (typeof value === "number") return String(value);
  if (value !== null && typeof value === "object") {
    if ("text" in value && typeof value.text === "string") return value.text;
    if ("no" in value && typeof value.no === "number") return String(value.no);
  }
  return undefined;
}

/**
 * Map native frames onto canonical upper-case keys. The first non-empty
 * value for a key wins.
 */
export function canonicalizeNativeTags(
  model: TagModel,
  native: Record<string, ReadonlyArray<{ id: string; value: unknown }>>
): Record<string, string> {
  const tags: Record<string, string> = {};
  for (const tagType of NATIVE_TAG_TYPES[model]) {
    for (const tag of native[tagType] ?? []) {
      const raw = nativeValueToString(tag.value);
      if (raw === undefined || !raw.trim()) continue;

      const key = canonicalKeyFor(model, tag.id);
      if (key in tags) continue;
      // "3/12" -> "3"
      tags[key] = key === "TRACKNUMBER" ? raw.split("/")[0].trim() : raw.trim();
    }
  }
  return tags;
}

/**
 * Read a file's audio properties and tags into an immutable descriptor.
 * Throws if the format is unknown or the file cannot be parsed.
 */
export async function describeAudio(filePath: string): Promise<AudioFileDescriptor> {
  const format = validateAudioFormat(filePath);
  const metadata = await parseFile(filePath, { skipCovers: true });

  const existingTags = canonicalizeNativeTags(format.tagModel, metadata.native);

  return Object.freeze({
    path: path.resolve(filePath),
    rawFilename: path.basename(filePath),
    container: path.extname(filePath).toLowerCase(),
    tagModel: format.tagModel,
    durationSeconds: metadata.format.duration,
    bitrate: metadata.format.bitrate,
    sampleRate: metadata.format.sampleRate,
    channelCount: metadata.format.numberOfChannels,
    existingTags: Object.freeze(existingTags),
  });
}

/** Build a descriptor without touching the disk. */
export function createDescriptor(
  filePath: string,
  fields: Partial<Omit<AudioFileDescriptor, "path" | "rawFilename" | "container">> = {}
): AudioFileDescriptor {
  const upper: Record<string, string> = {};
  for (const [key, value] of Object.entries(fields.existingTags ?? {})) {
    upper[key.toUpperCase()] = value;
  }
  const container = path.extname(filePath).toLowerCase();
  return Object.freeze({
    path: filePath,
    rawFilename: path.basename(filePath),
    container,
    tagModel: fields.tagModel ?? getAudioFormat(filePath)?.tagModel ?? "none",
    durationSeconds: fields.durationSeconds,
    bitrate: fields.bitrate,
    sampleRate: fields.sampleRate,
    channelCount: fields.channelCount,
    existingTags: Object.freeze(upper),
  });
}
