import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { logger } from "./logger.js";

const execFileAsync = promisify(execFile);

interface RequiredTool {
  command: string;
  versionFlag: string;
  purpose: string;
  installHint: string;
  /** Missing optional tools only disable the feature that needs them */
  optional?: boolean;
}

const REQUIRED_TOOLS: RequiredTool[] = [
  {
    command: "ffmpeg",
    versionFlag: "-version",
    purpose: "decoded-audio hashing and non-FLAC tag writing",
    installHint:
      "Ubuntu/Debian: sudo apt install ffmpeg\n" +
      "    macOS: brew install ffmpeg\n" +
      "    Windows: https://ffmpeg.org/download.html",
  },
  {
    command: "metaflac",
    versionFlag: "--version",
    purpose: "FLAC Vorbis comment tagging",
    installHint:
      "Ubuntu/Debian: sudo apt install flac\n" +
      "    macOS: brew install flac",
  },
  {
    command: "fpcalc",
    versionFlag: "-version",
    purpose: "acoustic fingerprinting",
    installHint:
      "Ubuntu/Debian: sudo apt install libchromaprint-tools\n" +
      "    macOS: brew install chromaprint",
    optional: true,
  },
];

/**
 * Verify external tools are available on the system.
 * Throws with install instructions if a required tool is missing; optional
 * tools only produce a warning. Returns the names of missing optional tools.
 */
export async function verifyRequiredTools(): Promise<string[]> {
  const missing: RequiredTool[] = [];

  for (const tool of REQUIRED_TOOLS) {
    try {
      await execFileAsync(tool.command, [tool.versionFlag]);
    } catch {
      missing.push(tool);
    }
  }

  const optional = missing.filter((t) => t.optional);
  for (const tool of optional) {
    logger.warn(
      `${tool.command} not found; ${tool.purpose} disabled.\n    ${tool.installHint}`
    );
  }

  const required = missing.filter((t) => !t.optional);
  if (required.length > 0) {
    const details = required
      .map((t) => `  ${t.command} (${t.purpose}):\n    ${t.installHint}`)
      .join("\n\n");
    throw new Error(`Missing required tool(s):\n\n${details}`);
  }

  return optional.map((t) => t.command);
}
