/**
 * Evidence collection: runs every source for one file and normalizes the
 * results into Candidates.
 *
 * The fingerprint chain (fpcalc -> AcoustID -> MusicBrainz) and the
 * reference query run concurrently and are joined before returning. A
 * failing source contributes zero candidates; collect() never throws.
 */

import type { AudioFileDescriptor, Config } from "../config/types.js";
import type { EvidenceServices } from "./services.js";
import type { Candidate } from "./types.js";
import { fingerprintCandidate, lookupAcoustid, type FingerprintMatch } from "./sources/fingerprint.js";
import { lookupRecording, metadataCandidate } from "./sources/musicbrainz.js";
import { queryReference } from "./sources/reference.js";
import { deriveHints, fileTagsCandidate, filenameCandidate } from "./sources/local.js";
import { SourceUnavailableError, errorMessage } from "../utils/errors.js";
import { logger } from "../utils/logger.js";

async function collectFingerprintChain(
  descriptor: AudioFileDescriptor,
  config: Readonly<Config>,
  services: EvidenceServices
): Promise<Candidate[]> {
  const fingerprinter = services.fingerprinter;
  if (!fingerprinter) {
    logger.debug("Fingerprint source disabled (fpcalc unavailable)");
    return [];
  }

  let matches: FingerprintMatch[];
  try {
    const fp = await fingerprinter.fingerprint(descriptor.path, config.evidence.fingerprintLength);
    matches = await lookupAcoustid(fp, config, services);
  } catch (e) {
    if (e instanceof SourceUnavailableError) throw e;
    throw new SourceUnavailableError("Fingerprint", errorMessage(e), { cause: e });
  }

  const candidates = matches.map(fingerprintCandidate);
  logger.debug(`Fingerprint: ${matches.length} match(es)`);

  // One lookup per distinct recording id, best match first
  const lookups = new Map<string, FingerprintMatch>();
  for (const match of matches) {
    if (lookups.size >= config.evidence.maxMetadataLookups) break;
    if (!lookups.has(match.recordingId)) lookups.set(match.recordingId, match);
  }

  for (const match of lookups.values()) {
    try {
      const recording = await lookupRecording(match.recordingId, config, services);
      candidates.push(metadataCandidate(recording, match));
    } catch (e) {
      const err = new SourceUnavailableError("MetadataService", errorMessage(e), { cause: e });
      logger.warn(`${err.message} (recording ${match.recordingId})`);
    }
  }

  return candidates;
}

async function collectReference(
  descriptor: AudioFileDescriptor,
  config: Readonly<Config>,
  services: EvidenceServices
): Promise<Candidate[]> {
  const store = services.referenceStore;
  if (!store) return [];

  const hints = deriveHints(descriptor);
  try {
    const candidates = await queryReference(store, hints, config);
    logger.debug(`ReferenceDB: ${candidates.length} hit(s) for ${JSON.stringify(hints)}`);
    return candidates;
  } catch (e) {
    throw new SourceUnavailableError("ReferenceDB", errorMessage(e), { cause: e });
  }
}

/**
 * Gather every candidate for one file. Order: Fingerprint, MetadataService,
 * ReferenceDB, FileTags, Filename.
 */
export async function collect(
  descriptor: AudioFileDescriptor,
  config: Readonly<Config>,
  services: EvidenceServices
): Promise<Candidate[]> {
  const settled = await Promise.allSettled([
    collectFingerprintChain(descriptor, config, services),
    collectReference(descriptor, config, services),
  ]);

  const candidates: Candidate[] = [];
  for (const result of settled) {
    if (result.status === "fulfilled") {
      candidates.push(...result.value);
    } else {
      logger.warn(`✗ ${errorMessage(result.reason)}`);
    }
  }

  const fromTags = fileTagsCandidate(descriptor);
  if (fromTags) candidates.push(fromTags);
  const fromName = filenameCandidate(descriptor);
  if (fromName) candidates.push(fromName);

  logger.debug(`Collected ${candidates.length} candidate(s) for ${descriptor.rawFilename}`);
  return candidates;
}
