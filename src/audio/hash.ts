import { execFile } from "node:child_process";
import { promisify } from "node:util";

const execFileAsync = promisify(execFile);

/** Content hash of the decoded audio stream, independent of the tag block */
export interface AudioHasher {
  hash(filePath: string): Promise<string>;
}

/**
 * Hashes the first audio stream with ffmpeg's hash muxer, so two files that
 * differ only in container metadata hash the same.
 */
export class FfmpegAudioHasher implements AudioHasher {
  async hash(filePath: string): Promise<string> {
    const { stdout } = await execFileAsync(
      "ffmpeg",
      ["-v", "error", "-i", filePath, "-map", "0:a:0", "-f", "hash", "-hash", "sha256", "-"],
      { maxBuffer: 1024 * 1024 }
    );
    return parseHashOutput(stdout);
  }
}

/** Parse "SHA256=<hex>" as printed by the hash muxer. */
export function parseHashOutput(stdout: string): string {
  const match = stdout.match(/SHA256=([0-9a-f]{64})/i);
  if (!match) {
    throw new Error(`Unexpected ffmpeg hash output: ${stdout.trim().slice(0, 80)}`);
  }
  return match[1].toLowerCase();
}
