import type { TagMap } from "../apply/tag-map.js";
import type { SourceKind } from "../evidence/types.js";

export type ProposalStatus = "Proposed" | "Unresolved";

/** One way to tag and place a file */
export interface ProposalOption {
  readonly tags: Readonly<TagMap>;
  readonly category: string;
  /** Absolute directory the file would land in */
  readonly destinationDir: string;
  /** Leaf name including extension */
  readonly filename: string;
  readonly destinationPath: string;
  readonly notes: readonly string[];
  /** Built from the deterministic template instead of the normalizer */
  readonly usedFallback: boolean;
  /** Required tags, and tags the category template uses, that have no value */
  readonly missingFields: readonly string[];
  /** 1-based rank of the candidate this option was built around */
  readonly candidateRank: number | null;
  readonly sourceKind: SourceKind | null;
}

export type IssueStage = "collect" | "decide" | "normalize";

/** Why a proposal or option was downgraded */
export interface ProposalIssue {
  readonly stage: IssueStage;
  /** Name of the check that failed */
  readonly check: string;
  readonly message: string;
  readonly candidateRank: number | null;
}

export interface Proposal {
  readonly filePath: string;
  readonly status: ProposalStatus;
  /** Top fused score, 0 when there were no candidates */
  readonly confidence: number;
  readonly primary: ProposalOption;
  readonly alternates: readonly ProposalOption[];
  readonly issues: readonly ProposalIssue[];
}
