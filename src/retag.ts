import * as path from "node:path";
import * as fs from "node:fs/promises";

import type { AudioFileDescriptor, CliFlags, Config } from "./config/types.js";
import { loadConfig, loadNamingRules } from "./config/config.js";
import { describeAudio } from "./audio/audio.js";
import { isKnownAudioFormat } from "./audio/formats.js";
import { FfmpegAudioHasher } from "./audio/hash.js";
import { collect } from "./evidence/collector.js";
import { ResponseCache } from "./evidence/cache.js";
import { createRateLimiters, type EvidenceServices } from "./evidence/services.js";
import { FpcalcFingerprinter } from "./evidence/sources/fingerprint.js";
import { SqliteReferenceStore } from "./reference/store.js";
import type { ReferenceStore } from "./reference/types.js";
import { fuse } from "./fusion/fuser.js";
import { decide, isUnchanged } from "./decision/arbiter.js";
import type { Proposal } from "./decision/types.js";
import { createNormalizer, type Normalizer } from "./normalize/index.js";
import { ApplyGate } from "./apply/gate.js";
import { createTagWriter } from "./apply/tagger.js";
import type { ApplyResult } from "./apply/types.js";
import {
  formatResult,
  printProposal,
  promptApproval,
  summarizeResults,
} from "./output/presenter.js";
import { mapWithConcurrency } from "./utils/concurrency.js";
import { errorMessage, toApplyError } from "./utils/errors.js";
import { logger } from "./utils/logger.js";
import { verifyRequiredTools } from "./utils/startup.js";

/** fpcalc decodes up to fingerprintLength seconds of audio; allow for slow disks */
const FPCALC_TIMEOUT_MS = 60_000;
const RETRY_DELAY_MS = 1000;

/** Everything shared by the files of one run */
export interface RetagRun {
  config: Readonly<Config>;
  namingRules: string;
  services: EvidenceServices;
  normalizer: Normalizer;
  gate: ApplyGate;
  quarantineDir?: string;
  dryRun: boolean;
}

export interface ProposedFile {
  descriptor: AudioFileDescriptor;
  proposal: Proposal;
}

async function openReferenceStore(config: Readonly<Config>): Promise<ReferenceStore | undefined> {
  const file = config.paths.referenceDb;
  if (!file) return undefined;
  try {
    return await SqliteReferenceStore.open(file);
  } catch (e) {
    logger.warn(`✗ ReferenceDB disabled: ${errorMessage(e)}`);
    return undefined;
  }
}

/**
 * Load config and naming rules and wire up the collaborators. Throws
 * ConfigError before any file is touched.
 */
export async function createRun(flags: CliFlags): Promise<RetagRun> {
  const config = await loadConfig(flags.config);
  const namingRules = await loadNamingRules(config);
  const missingOptional = await verifyRequiredTools();

  const services: EvidenceServices = {
    fetch: (input, init) => fetch(input, init),
    cache: new ResponseCache(config.paths.cacheDir),
    fingerprinter: missingOptional.includes("fpcalc")
      ? undefined
      : new FpcalcFingerprinter(FPCALC_TIMEOUT_MS),
    referenceStore: await openReferenceStore(config),
    limiters: createRateLimiters(),
    retryDelayMs: RETRY_DELAY_MS,
  };

  const quarantineDir = flags.quarantine ?? config.paths.quarantine;
  const gate = new ApplyGate(
    { hasher: new FfmpegAudioHasher(), tagWriter: createTagWriter(config.fields.keepCustomTags) },
    { mode: flags["copy-place"] ? "copy-place" : "tag-only", quarantineDir }
  );

  const normalizer = createNormalizer(config);
  logger.debug(`Normalizer: ${normalizer.kind}`);

  return {
    config,
    namingRules,
    services,
    normalizer,
    gate,
    quarantineDir,
    dryRun: flags["dry-run"],
  };
}

export async function closeRun(run: RetagRun): Promise<void> {
  await run.services.referenceStore?.close();
}

/** Collect, fuse and decide for one file. */
export async function proposeFile(filePath: string, run: RetagRun): Promise<ProposedFile> {
  const descriptor = await describeAudio(filePath);
  const candidates = await collect(descriptor, run.config, run.services);
  const fused = fuse(candidates, run.config, descriptor);
  const proposal = await decide(fused, run.namingRules, descriptor, run.config, run.normalizer);
  return { descriptor, proposal };
}

/**
 * Show a proposal and apply what the human picks. Returns null in dry-run
 * mode or when the prompt was interrupted.
 */
export async function reviewAndApply(
  proposed: ProposedFile,
  run: RetagRun
): Promise<ApplyResult | null> {
  const { descriptor, proposal } = proposed;
  printProposal(proposal, descriptor);
  if (proposal.status === "Proposed" && isUnchanged(proposal.primary, descriptor)) {
    console.log("    (already tagged and placed as proposed)");
  }
  if (run.dryRun) return null;

  const approval = await promptApproval(proposal, run.quarantineDir !== undefined);
  if (approval === null) return null;

  const result = await run.gate.apply(proposal, descriptor, approval);
  console.log(formatResult(result));
  return result;
}

/** Supported audio files under `dir`, hidden files excluded, sorted. */
export async function findAudioFiles(dir: string): Promise<string[]> {
  const entries = await fs.readdir(dir, { recursive: true });
  return entries
    .filter((rel) => isKnownAudioFormat(rel) && !rel.split(path.sep).some((p) => p.startsWith(".")))
    .map((rel) => path.join(dir, rel))
    .sort();
}

/** Single file: propose, prompt, apply. */
export async function retagFile(filePath: string, flags: CliFlags): Promise<ApplyResult | null> {
  const run = await createRun(flags);
  try {
    return await reviewAndApply(await proposeFile(filePath, run), run);
  } finally {
    await closeRun(run);
  }
}

/**
 * Every audio file under a directory. Proposals are computed with bounded
 * concurrency; approvals are asked one file at a time. Ctrl-C stops between
 * files.
 */
export async function retagBatch(dir: string, flags: CliFlags): Promise<ApplyResult[]> {
  const run = await createRun(flags);
  const files = await findAudioFiles(dir);
  logger.info(`Found ${files.length} audio file(s) in ${dir}`);

  let stopping = false;
  const onSigint = () => {
    stopping = true;
    logger.warn("Interrupted; stopping after the current file");
  };
  process.on("SIGINT", onSigint);

  const results: ApplyResult[] = [];
  try {
    const proposals = await mapWithConcurrency(
      files,
      run.config.behavior.concurrency,
      async (filePath): Promise<ProposedFile | ApplyResult | null> => {
        if (stopping) return null;
        try {
          return await proposeFile(filePath, run);
        } catch (e) {
          logger.error(`${path.basename(filePath)}: ${errorMessage(e)}`);
          return { filePath, outcome: "Failed", targetPath: null, error: toApplyError("propose", e) };
        }
      }
    );

    for (const item of proposals) {
      if (stopping || item === null) break;
      if ("outcome" in item) {
        results.push(item);
        continue;
      }
      const result = await reviewAndApply(item, run);
      if (result === null && !run.dryRun) {
        stopping = true;
        break;
      }
      if (result) results.push(result);
    }
  } finally {
    process.off("SIGINT", onSigint);
    await closeRun(run);
  }

  if (results.length > 0) {
    console.log(`\n${summarizeResults(results)}`);
  }
  return results;
}
