import path from "node:path";
import type { AudioFileDescriptor, Config } from "../config/types.js";
import type { FusedDecision, ScoredCandidate } from "../fusion/types.js";
import { scoreKey } from "../fusion/weights.js";
import { buildNormalizationInput, promote } from "../normalize/input.js";
import { normalizeByRules } from "../normalize/rule-based.js";
import type { NormalizationInput, Normalizer } from "../normalize/types.js";
import { REQUIRED_TAGS, validateNormalization } from "../normalize/validate.js";
import type { NormalizationOutput } from "../normalize/validate.js";
import { getTag } from "../apply/tag-map.js";
import type { TagMap } from "../apply/tag-map.js";
import { NormalizationSchemaViolation, TimeoutError, errorMessage } from "../utils/errors.js";
import { withTimeout } from "../utils/timeout.js";
import { logger } from "../utils/logger.js";
import type { Proposal, ProposalIssue, ProposalOption } from "./types.js";

/** Template placeholder -> tag it renders */
const PLACEHOLDER_TAGS: Record<string, string> = {
  title: "TITLE",
  artist: "ARTIST",
  album: "ALBUM",
  date: "DATE",
  year: "DATE",
  city: "CITY",
  venue: "VENUE",
  source: "SOURCE",
  tracknum: "TRACKNUMBER",
};

/** Required tags, then template fields in template order, that are empty. */
export function findMissingFields(tags: Readonly<TagMap>, template: string | undefined): string[] {
  const wanted: string[] = [...REQUIRED_TAGS];
  for (const match of (template ?? "").matchAll(/\{(\w+)(?::[^}]+)?\}/g)) {
    const tag = PLACEHOLDER_TAGS[match[1]];
    if (tag && !wanted.includes(tag)) wanted.push(tag);
  }
  return wanted.filter((key) => getTag(tags, key) === undefined);
}

const EMPTY_OPTION: ProposalOption = Object.freeze({
  tags: Object.freeze({}),
  category: "",
  destinationDir: "",
  filename: "",
  destinationPath: "",
  notes: Object.freeze([]),
  usedFallback: true,
  missingFields: Object.freeze([...REQUIRED_TAGS]),
  candidateRank: null,
  sourceKind: null,
});

interface OptionContext {
  ranked: readonly ScoredCandidate[];
  namingRules: string;
  descriptor: AudioFileDescriptor;
  config: Readonly<Config>;
  categories: string[];
}

function toOption(
  output: NormalizationOutput,
  index: number,
  ctx: OptionContext,
  usedFallback: boolean
): ProposalOption {
  const { config, descriptor } = ctx;
  const categoryRoot = config.paths.categoryRoots[output.category] ?? output.category;
  const destinationDir = path.join(config.paths.root, categoryRoot, output.directory);
  const filename = output.filename + descriptor.container;

  return Object.freeze({
    tags: Object.freeze({ ...output.tags }),
    category: output.category,
    destinationDir,
    filename,
    destinationPath: path.join(destinationDir, filename),
    notes: Object.freeze([...output.notes]),
    usedFallback,
    missingFields: Object.freeze(
      findMissingFields(output.tags, config.naming.templates[output.category])
    ),
    candidateRank: index + 1,
    sourceKind: ctx.ranked[index]?.candidate.sourceKind ?? null,
  });
}

function inputFor(index: number, ctx: OptionContext): NormalizationInput {
  return buildNormalizationInput(
    promote(ctx.ranked, index),
    ctx.descriptor,
    ctx.namingRules,
    ctx.categories
  );
}

/**
 * Deterministic template around ranked[index]: identity from that candidate,
 * date and place only from candidates agreeing with its title.
 */
function fallbackOption(index: number, ctx: OptionContext): ProposalOption {
  return toOption(normalizeByRules(inputFor(index, ctx), ctx.config), index, ctx, true);
}

/**
 * Ask the normalizer for an option built around ranked[index], falling
 * back to the template when the call fails or its output is rejected.
 */
async function normalizedOption(
  index: number,
  ctx: OptionContext,
  normalizer: Normalizer
): Promise<{ option: ProposalOption; issue?: ProposalIssue }> {
  const input = inputFor(index, ctx);
  const rank = index + 1;
  let issue: ProposalIssue;

  try {
    const raw = await withTimeout(
      normalizer.normalize(input),
      ctx.config.llm.timeoutMs,
      `${normalizer.kind} normalizer`
    );
    const result = validateNormalization(raw, ctx.categories, ctx.descriptor.container);
    if (result.ok) {
      return { option: toOption(result.output, index, ctx, false) };
    }
    issue = {
      stage: "normalize",
      check: "schema",
      message: new NormalizationSchemaViolation(result.violations).message,
      candidateRank: rank,
    };
  } catch (e) {
    issue = {
      stage: "normalize",
      check: e instanceof TimeoutError ? "timeout" : "error",
      message: errorMessage(e),
      candidateRank: rank,
    };
  }

  logger.warn(`  ✗ Normalizer (${normalizer.kind}) for candidate #${rank}: ${issue.message}`);
  return { option: fallbackOption(index, ctx), issue };
}

/**
 * Turn a fused ranking into a proposal for human review. Never applies
 * anything; a proposal is Proposed only when the top score clears
 * behavior.minAutoScore and the normalizer's output was accepted.
 */
export async function decide(
  fused: FusedDecision,
  namingRules: string,
  descriptor: AudioFileDescriptor,
  config: Readonly<Config>,
  normalizer: Normalizer
): Promise<Proposal> {
  const { ranked } = fused;
  const filePath = descriptor.path;

  if (ranked.length === 0) {
    const issue: ProposalIssue = {
      stage: "collect",
      check: "candidates",
      message: "no candidates from any source",
      candidateRank: null,
    };
    return freezeProposal({
      filePath,
      status: "Unresolved",
      confidence: 0,
      primary: EMPTY_OPTION,
      alternates: [],
      issues: [issue],
    });
  }

  const ctx: OptionContext = {
    ranked,
    namingRules,
    descriptor,
    config,
    categories: Object.keys(config.paths.categoryRoots),
  };
  const top = ranked[0].score;
  const { minAutoScore, alternateProximity } = config.behavior;
  const alternateIndexes = [1, 2].filter(
    (i) =>
      i < ranked.length &&
      scoreKey(top) - scoreKey(ranked[i].score) <= scoreKey(alternateProximity)
  );

  if (top < minAutoScore) {
    logger.debug(`  top score ${top.toFixed(3)} below ${minAutoScore}; using template only`);
    const issue: ProposalIssue = {
      stage: "decide",
      check: "minAutoScore",
      message: `top score ${top.toFixed(3)} is below minAutoScore ${minAutoScore}`,
      candidateRank: 1,
    };
    return freezeProposal({
      filePath,
      status: "Unresolved",
      confidence: top,
      primary: fallbackOption(0, ctx),
      alternates: alternateIndexes.map((i) => fallbackOption(i, ctx)),
      issues: [issue],
    });
  }

  const issues: ProposalIssue[] = [];
  const primary = await normalizedOption(0, ctx, normalizer);
  if (primary.issue) issues.push(primary.issue);

  const alternates: ProposalOption[] = [];
  for (const i of alternateIndexes) {
    const alternate = await normalizedOption(i, ctx, normalizer);
    if (alternate.issue) issues.push(alternate.issue);
    alternates.push(alternate.option);
  }

  return freezeProposal({
    filePath,
    status: primary.option.usedFallback ? "Unresolved" : "Proposed",
    confidence: top,
    primary: primary.option,
    alternates,
    issues,
  });
}

function freezeProposal(proposal: Proposal): Proposal {
  return Object.freeze({
    ...proposal,
    alternates: Object.freeze([...proposal.alternates]),
    issues: Object.freeze(proposal.issues.map((issue) => Object.freeze({ ...issue }))),
  });
}

/** The option would leave the file exactly where and as it is. */
export function isUnchanged(option: ProposalOption, descriptor: AudioFileDescriptor): boolean {
  if (path.resolve(option.destinationPath) !== path.resolve(descriptor.path)) return false;
  return Object.entries(option.tags).every(
    ([key, value]) => getTag(descriptor.existingTags, key) === value
  );
}
