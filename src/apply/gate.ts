import { randomUUID } from "node:crypto";
import { constants } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { AudioFileDescriptor } from "../config/types.js";
import type { Proposal, ProposalOption } from "../decision/types.js";
import type { AudioHasher } from "../audio/hash.js";
import { isKnownAudioFormat } from "../audio/formats.js";
import { errorCode, errorMessage, toApplyError } from "../utils/errors.js";
import { logger } from "../utils/logger.js";
import type { TagWriter } from "./tagger.js";
import type {
  ApplyError,
  ApplyMode,
  ApplyOutcome,
  ApplyResult,
  ApplyStage,
  Approval,
} from "./types.js";

/** Per-file gate states; the outcomes are terminal */
export type GateState = "Proposed" | "Unresolved" | "Applying" | ApplyOutcome;

const TRANSITIONS: Record<GateState, readonly GateState[]> = {
  Proposed: ["Applying", "Skipped", "QuarantinedUnresolved"],
  Unresolved: ["Skipped", "QuarantinedUnresolved"],
  Applying: ["Applied", "Failed", "QuarantinedDuplicate"],
  Applied: [],
  Skipped: [],
  QuarantinedDuplicate: [],
  QuarantinedUnresolved: [],
  Failed: [],
};

export function canTransition(from: GateState, to: GateState): boolean {
  return TRANSITIONS[from].includes(to);
}

export interface ApplyGateOptions {
  mode: ApplyMode;
  /** Holding directory for unresolved files; quarantine is refused when unset */
  quarantineDir?: string;
}

export interface ApplyGateDeps {
  hasher: AudioHasher;
  tagWriter: TagWriter;
}

class StageError extends Error {
  constructor(readonly applyError: ApplyError) {
    super(applyError.message);
  }
}

function asApplyError(e: unknown, fallbackStage: ApplyStage): ApplyError {
  return e instanceof StageError ? e.applyError : toApplyError(fallbackStage, e);
}

/** Run one filesystem step, tagging any failure with its stage. */
async function stage<T>(name: ApplyStage, step: () => Promise<T>): Promise<T> {
  try {
    return await step();
  } catch (e) {
    throw new StageError(toApplyError(name, e));
  }
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch (e) {
    if (errorCode(e) === "ENOENT") return false;
    throw e;
  }
}

async function removeTemp(tempPath: string): Promise<void> {
  try {
    await fs.rm(tempPath, { force: true });
  } catch (e) {
    logger.warn(`Could not remove temp file ${tempPath}: ${errorMessage(e)}`);
  }
}

/** Temp name beside `target`, keeping its extension so writers can pick a muxer. */
function tempPathFor(target: string): string {
  const ext = path.extname(target);
  const base = path.basename(target, ext);
  return path.join(path.dirname(target), `.${base}.${randomUUID().slice(0, 8)}.tmp${ext}`);
}

/**
 * Applies an approved proposal to disk. Nothing is written before the
 * duplicate check passes, audio bytes are never re-encoded, and every
 * failure leaves the original untouched.
 */
export class ApplyGate {
  constructor(
    private readonly deps: ApplyGateDeps,
    private readonly options: ApplyGateOptions
  ) {}

  async apply(
    proposal: Proposal,
    descriptor: AudioFileDescriptor,
    approval: Approval
  ): Promise<ApplyResult> {
    const from: GateState = proposal.status;
    const filePath = proposal.filePath;

    const finish = (
      outcome: ApplyOutcome,
      targetPath: string | null,
      error: ApplyError | null = null
    ): ApplyResult => {
      logger.debug(`  ${path.basename(filePath)}: ${from} → ${outcome}`);
      return Object.freeze({ filePath, outcome, targetPath, error });
    };

    if (approval.action === "skip") {
      return finish("Skipped", null);
    }

    if (approval.action === "quarantine") {
      if (!this.options.quarantineDir) {
        return finish("Skipped", null, {
          stage: "quarantine",
          code: "NoQuarantinePath",
          message: "no quarantine directory configured",
        });
      }
      try {
        const target = await this.quarantine(filePath, this.options.quarantineDir);
        return finish("QuarantinedUnresolved", target);
      } catch (e) {
        return finish("Failed", null, asApplyError(e, "quarantine"));
      }
    }

    if (!canTransition(from, "Applying")) {
      return finish("Skipped", null, {
        stage: "approve",
        code: "Unresolved",
        message: "unresolved proposals can only be skipped or quarantined",
      });
    }
    const { option } = approval;
    if (option.destinationPath === "") {
      return finish("Skipped", null, {
        stage: "approve",
        code: "NoDestination",
        message: "option has no destination",
      });
    }

    logger.debug(`  ${path.basename(filePath)}: ${from} → Applying (${this.options.mode})`);
    const inPlace =
      this.options.mode === "tag-only" ||
      path.resolve(option.destinationPath) === path.resolve(filePath);
    const targetDir = inPlace ? path.dirname(filePath) : option.destinationDir;

    try {
      const duplicate = await stage("duplicate-check", () =>
        this.findDuplicate(filePath, targetDir)
      );
      if (duplicate) {
        return finish("QuarantinedDuplicate", duplicate, {
          stage: "duplicate-check",
          code: "DuplicateAtDestination",
          message: `same audio as ${duplicate}`,
        });
      }

      const target = inPlace
        ? await this.tagInPlace(descriptor, option)
        : await this.copyAndPlace(descriptor, option);
      return finish("Applied", target);
    } catch (e) {
      return finish("Failed", null, asApplyError(e, "tag"));
    }
  }

  /** First audio file in `dir` (other than the file itself) with the same audio hash */
  private async findDuplicate(filePath: string, dir: string): Promise<string | null> {
    let entries: string[];
    try {
      entries = await fs.readdir(dir);
    } catch (e) {
      // Not there yet (or cannot be): nothing to collide with
      const code = errorCode(e);
      if (code === "ENOENT" || code === "ENOTDIR") return null;
      throw e;
    }

    const self = path.resolve(filePath);
    const others = entries
      .filter((name) => isKnownAudioFormat(name) && !name.startsWith("."))
      .map((name) => path.join(dir, name))
      .filter((candidate) => path.resolve(candidate) !== self)
      .sort();
    if (others.length === 0) return null;

    const sourceHash = await this.deps.hasher.hash(filePath);
    for (const other of others) {
      if ((await this.deps.hasher.hash(other)) === sourceHash) {
        return other;
      }
    }
    return null;
  }

  /** Copy beside the original, tag the copy, rename over the original. */
  private async tagInPlace(descriptor: AudioFileDescriptor, option: ProposalOption): Promise<string> {
    const original = descriptor.path;
    const temp = tempPathFor(original);
    try {
      await stage("copy", () => fs.copyFile(original, temp, constants.COPYFILE_EXCL));
      await stage("tag", () => this.deps.tagWriter.write(temp, option.tags, descriptor.tagModel));
      await stage("place", () => fs.rename(temp, original));
      return original;
    } catch (e) {
      await removeTemp(temp);
      throw e;
    }
  }

  /** Tag a copy in the destination directory; the source is never modified. */
  private async copyAndPlace(descriptor: AudioFileDescriptor, option: ProposalOption): Promise<string> {
    const destination = option.destinationPath;
    await stage("mkdir", () => fs.mkdir(option.destinationDir, { recursive: true }));
    if (await stage("place", () => exists(destination))) {
      throw new StageError({
        stage: "place",
        code: "EEXIST",
        message: `destination already exists: ${destination}`,
      });
    }

    const temp = tempPathFor(destination);
    try {
      await stage("copy", () => fs.copyFile(descriptor.path, temp, constants.COPYFILE_EXCL));
      await stage("tag", () => this.deps.tagWriter.write(temp, option.tags, descriptor.tagModel));
      await stage("place", async () => {
        if (await exists(destination)) {
          throw Object.assign(new Error(`destination already exists: ${destination}`), {
            code: "EEXIST",
          });
        }
        await fs.rename(temp, destination);
      });
      return destination;
    } catch (e) {
      await removeTemp(temp);
      throw e;
    }
  }

  /** Copy into the quarantine directory, numbering the name instead of overwriting. */
  private async quarantine(filePath: string, dir: string): Promise<string> {
    await stage("mkdir", () => fs.mkdir(dir, { recursive: true }));
    const ext = path.extname(filePath);
    const base = path.basename(filePath, ext);

    for (let n = 0; ; n++) {
      const target = path.join(dir, n === 0 ? `${base}${ext}` : `${base} (${n})${ext}`);
      try {
        await fs.copyFile(filePath, target, constants.COPYFILE_EXCL);
        return target;
      } catch (e) {
        if (errorCode(e) !== "EEXIST") {
          throw new StageError(toApplyError("quarantine", e));
        }
      }
    }
  }
}
