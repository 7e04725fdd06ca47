import { execFile } from "node:child_process";
import { promisify } from "node:util";
import * as path from "node:path";
import * as fs from "node:fs/promises";
import type { TagModel } from "../config/types.js";
import { logger } from "../utils/logger.js";
import { errorMessage } from "../utils/errors.js";
import { writeKeyFor } from "./tag-map.js";
import type { TagMap } from "./tag-map.js";

const execFileAsync = promisify(execFile);

/** Writes a canonical tag map into an audio file in place */
export interface TagWriter {
  write(filePath: string, tags: Readonly<TagMap>, tagModel: TagModel): Promise<void>;
}

/**
 * Parse `metaflac --export-tags-to=-` output into key/value pairs. Lines
 * without "=" continue the previous value.
 */
export function parseVorbisExport(stdout: string): Array<[string, string]> {
  const entries: Array<[string, string]> = [];
  for (const line of stdout.replace(/\n$/, "").split("\n")) {
    const eq = line.indexOf("=");
    const last = entries[entries.length - 1];
    if (eq > 0) {
      entries.push([line.slice(0, eq), line.slice(eq + 1)]);
    } else if (last && line !== "") {
      last[1] += `\n${line}`;
    }
  }
  return entries;
}

/**
 * Existing tags matching a keep pattern (regex, case-insensitive, wildcards
 * like "REPLAYGAIN_.*"). Keys the new tag map sets are dropped: new values win.
 */
export function selectKeptTags(
  existing: Array<[string, string]>,
  keepPatterns: readonly string[],
  newTags: Readonly<TagMap>
): Array<[string, string]> {
  const patterns = keepPatterns.map((p) => new RegExp(`^${p.replace(/\*/g, ".*")}$`, "i"));
  const replaced = new Set(Object.keys(newTags).map((k) => k.toUpperCase()));
  return existing.filter(
    ([key]) => !replaced.has(key.toUpperCase()) && patterns.some((re) => re.test(key))
  );
}

/**
 * Tag a FLAC file using metaflac.
 * Uses metaflac for proper Vorbis comment support (compatible with all FLAC players).
 */
export class MetaflacTagWriter implements TagWriter {
  constructor(private readonly keepCustomTags: readonly string[]) {}

  async write(filePath: string, tags: Readonly<TagMap>): Promise<void> {
    // Step 1: Read existing tags that should be preserved
    const { stdout } = await execFileAsync("metaflac", ["--export-tags-to=-", filePath]);
    const kept = selectKeptTags(parseVorbisExport(stdout), this.keepCustomTags, tags);

    // Step 2: Remove all tags
    await execFileAsync("metaflac", ["--remove-all-tags", "--preserve-modtime", filePath]);

    // Step 3: Add our managed tags plus the preserved ones
    const setTagArgs = [
      ...Object.entries(tags).map(([key, value]) => `--set-tag=${writeKeyFor("vorbis", key)}=${value}`),
      ...kept.map(([key, value]) => `--set-tag=${key}=${value}`),
    ];
    if (setTagArgs.length > 0) {
      await execFileAsync("metaflac", [...setTagArgs, "--preserve-modtime", filePath]);
    }
    logger.debug(`  metaflac: ${setTagArgs.length} tag(s) written to ${path.basename(filePath)}`);
  }
}

/** ffmpeg arguments for a stream-copy remux that only changes metadata. */
export function buildFfmpegTagArgs(
  input: string,
  output: string,
  tags: Readonly<TagMap>,
  tagModel: TagModel
): string[] {
  const args = ["-v", "error", "-y", "-i", input, "-map", "0", "-c", "copy", "-map_metadata", "0"];
  for (const [key, value] of Object.entries(tags)) {
    args.push("-metadata", `${writeKeyFor(tagModel, key)}=${value}`);
  }
  if (tagModel === "id3v2") {
    args.push("-id3v2_version", "4");
  }
  if (tagModel === "mp4") {
    args.push("-movflags", "use_metadata_tags");
  }
  args.push(output);
  return args;
}

/**
 * Rewrite tags with an ffmpeg remux (-c copy): audio packets are copied
 * untouched. ffmpeg cannot write in place, so the remux goes to a sibling
 * file that then replaces the input.
 */
export class FfmpegTagWriter implements TagWriter {
  async write(filePath: string, tags: Readonly<TagMap>, tagModel: TagModel): Promise<void> {
    const ext = path.extname(filePath);
    const remuxed = path.join(
      path.dirname(filePath),
      `${path.basename(filePath, ext)}.remux${ext}`
    );

    try {
      await execFileAsync("ffmpeg", buildFfmpegTagArgs(filePath, remuxed, tags, tagModel));
      await fs.rename(remuxed, filePath);
    } catch (error) {
      await fs.rm(remuxed, { force: true }).catch((e: unknown) => {
        logger.warn(`Could not remove ${remuxed}: ${errorMessage(e)}`);
      });
      throw error;
    }
  }
}

/**
 * Routes each write by tag model: FLAC through metaflac, every other
 * taggable format through ffmpeg.
 */
export class FormatTagWriter implements TagWriter {
  constructor(
    private readonly flac: TagWriter,
    private readonly remux: TagWriter
  ) {}

  async write(filePath: string, tags: Readonly<TagMap>, tagModel: TagModel): Promise<void> {
    if (tagModel === "none") {
      throw new Error(`Cannot write tags to ${path.extname(filePath) || "this"} files`);
    }
    if (tagModel === "vorbis" && path.extname(filePath).toLowerCase() === ".flac") {
      return this.flac.write(filePath, tags, tagModel);
    }
    return this.remux.write(filePath, tags, tagModel);
  }
}

export function createTagWriter(keepCustomTags: readonly string[]): TagWriter {
  return new FormatTagWriter(new MetaflacTagWriter(keepCustomTags), new FfmpegTagWriter());
}
